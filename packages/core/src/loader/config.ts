import yaml from "js-yaml";
import { z } from "zod";
import { ErrorCode, StructureError } from "@stepslang/library";
import {
    DEFAULT_ITERATION_LIMIT,
    DEFAULT_RECURSION_LIMIT,
} from "../interpreter/Environment";

export const CONFIG_FILE = "steps.yml";

export const ProjectConfigSchema = z
    .object({
        building: z.string().min(1).optional(),
        iterationLimit: z.number().int().positive().optional(),
        recursionLimit: z.number().int().positive().optional(),
        logs: z.boolean().optional(),
    })
    .strict();

export interface ProjectConfig {
    /** Building file name relative to the project root, if configured. */
    building?: string;
    iterationLimit: number;
    recursionLimit: number;
    logs: boolean;
}

export const DEFAULT_CONFIG: ProjectConfig = {
    iterationLimit: DEFAULT_ITERATION_LIMIT,
    recursionLimit: DEFAULT_RECURSION_LIMIT,
    logs: true,
};

function configError(message: string, hint: string, file: string) {
    return new StructureError({
        code: ErrorCode.MissingBuilding,
        message,
        hint,
        file,
    });
}

/**
 * Parses the text of a `steps.yml`. An empty file yields the defaults.
 */
export function parseConfig(
    source: string,
    file: string = CONFIG_FILE,
): ProjectConfig {
    let raw: unknown;
    try {
        raw = yaml.load(source);
    } catch (e) {
        const reason = e instanceof yaml.YAMLException ? e.reason : String(e);
        throw configError(
            `Could not read ${CONFIG_FILE}: ${reason}`,
            "Check the YAML syntax of the project configuration.",
            file,
        );
    }
    if (raw === undefined || raw === null) return { ...DEFAULT_CONFIG };

    const parsed = ProjectConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field =
            issue.code === "unrecognized_keys"
                ? issue.keys.join(", ")
                : issue.path.join(".") || "(root)";
        throw configError(
            `Invalid ${CONFIG_FILE}: ${issue.message}`,
            `Fix or remove the field '${field}'. Allowed fields: building, iterationLimit, recursionLimit, logs.`,
            file,
        );
    }

    const config = parsed.data;
    return {
        building: config.building,
        iterationLimit: config.iterationLimit ?? DEFAULT_CONFIG.iterationLimit,
        recursionLimit: config.recursionLimit ?? DEFAULT_CONFIG.recursionLimit,
        logs: config.logs ?? DEFAULT_CONFIG.logs,
    };
}
