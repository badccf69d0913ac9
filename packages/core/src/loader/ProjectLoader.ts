import fs from "node:fs/promises";
import nodePath from "node:path";
import {
    ErrorCode,
    LexerError,
    StepsError,
    makeError,
} from "@stepslang/library";
import { parseBuilding, parseFloor, parseStep } from "../parser/Parser";
import { BuildingNode } from "../parser/structure";
import { Environment, EnvironmentOptions } from "../interpreter/Environment";
import { CONFIG_FILE, DEFAULT_CONFIG, ProjectConfig, parseConfig } from "./config";

export interface LoadResult {
    building: BuildingNode | null;
    environment: Environment;
    errors: StepsError[];
    config: ProjectConfig;
    /** Absolute path of the building file, when one was found. */
    buildingFile?: string;
    /** Source text of every file read, by path, for diagnostics. */
    sources: Map<string, string>;
}

const decoder = new TextDecoder("utf-8", { fatal: true });

async function exists(path: string): Promise<boolean> {
    try {
        await fs.access(path);
        return true;
    } catch {
        return false;
    }
}

function isMissing(e: unknown): boolean {
    return (
        e instanceof Error &&
        "code" in e &&
        (e.code === "ENOENT" || e.code === "ENOTDIR")
    );
}

/** Reads a file as strict UTF-8. */
export async function readSource(path: string): Promise<string> {
    const bytes = await fs.readFile(path);
    try {
        return decoder.decode(bytes);
    } catch {
        throw new LexerError({
            code: ErrorCode.UnexpectedCharacter,
            message: `File '${nodePath.basename(path)}' is not valid UTF-8.`,
            hint: "Save the file with UTF-8 encoding.",
            file: path,
        });
    }
}

class ProjectLoader {
    private errors: StepsError[] = [];
    private sources = new Map<string, string>();
    private config: ProjectConfig = { ...DEFAULT_CONFIG };

    constructor(
        private dir: string,
        private options: EnvironmentOptions,
    ) {}

    public async load(): Promise<LoadResult> {
        if (!(await this.checkDirectory())) {
            return this.result(null, this.createEnvironment());
        }
        await this.loadConfig();

        const buildingFile = await this.findBuilding();
        if (!buildingFile) {
            return this.result(null, this.createEnvironment());
        }

        const building = await this.parseFile(buildingFile, parseBuilding);
        const environment = this.createEnvironment(buildingFile);

        const entries = await fs.readdir(this.dir, { withFileTypes: true });
        const floors = entries
            .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
            .map((entry) => entry.name)
            .sort();
        for (const floor of floors) {
            await this.loadFloor(floor, environment);
        }

        return this.result(building, environment, buildingFile);
    }

    private async checkDirectory(): Promise<boolean> {
        try {
            if ((await fs.stat(this.dir)).isDirectory()) return true;
        } catch (e) {
            if (!isMissing(e)) throw e;
        }

        const error = makeError(
            ErrorCode.MissingBuilding,
            { expected: `${nodePath.basename(nodePath.resolve(this.dir))}.building` },
            undefined,
            `The project folder '${this.dir}' does not exist.\nCheck the path, or create a project with 'steps init'.`,
        );
        error.file = this.dir;
        this.errors.push(error);
        return false;
    }

    private async loadConfig() {
        const path = nodePath.join(this.dir, CONFIG_FILE);
        if (!(await exists(path))) return;
        try {
            const source = await readSource(path);
            this.sources.set(path, source);
            this.config = parseConfig(source, path);
        } catch (e) {
            this.record(e);
        }
    }

    private createEnvironment(file?: string): Environment {
        return new Environment({
            outputHandler: this.options.outputHandler,
            inputHandler: this.options.inputHandler,
            recursionLimit:
                this.options.recursionLimit ?? this.config.recursionLimit,
            iterationLimit:
                this.options.iterationLimit ?? this.config.iterationLimit,
            file,
        });
    }

    private async findBuilding(): Promise<string | undefined> {
        const base = nodePath.basename(nodePath.resolve(this.dir));
        const expected = this.config.building ?? `${base}.building`;
        const preferred = nodePath.join(this.dir, expected);
        if (await exists(preferred)) return preferred;

        if (!this.config.building) {
            const candidates = (await fs.readdir(this.dir))
                .filter((name) => name.endsWith(".building"))
                .sort();
            if (candidates.length > 0) return nodePath.join(this.dir, candidates[0]);
        }

        this.errors.push(makeError(ErrorCode.MissingBuilding, { expected }));
        return undefined;
    }

    private async loadFloor(name: string, environment: Environment) {
        const floorDir = nodePath.join(this.dir, name);
        const files = await fs.readdir(floorDir);
        const floorFile = nodePath.join(floorDir, `${name}.floor`);

        if (!files.includes(`${name}.floor`)) {
            if (files.some((file) => file.endsWith(".step"))) {
                const error = makeError(ErrorCode.MissingFloor, { floor: name });
                error.file = floorDir;
                this.errors.push(error);
            }
            return;
        }

        const floor = await this.parseFile(floorFile, parseFloor);
        if (!floor) return;
        environment.registerFloor(floor);

        for (const stepName of floor.steps) {
            const stepFile = nodePath.join(floorDir, `${stepName}.step`);
            if (!files.includes(`${stepName}.step`)) {
                this.errors.push(
                    makeError(ErrorCode.MissingStepFile, { step: stepName }, floor.loc),
                );
                continue;
            }

            const step = await this.parseFile(stepFile, parseStep);
            if (!step) continue;
            if (step.belongsTo !== null && step.belongsTo !== floor.name) {
                const error = makeError(
                    ErrorCode.StepFloorMismatch,
                    {
                        step: step.name,
                        expected: step.belongsTo,
                        actual: floor.name,
                    },
                    step.loc,
                );
                const source = this.sources.get(stepFile);
                this.errors.push(source ? error.withContext(source) : error);
            }
            environment.registerStep(step);
        }
    }

    private async parseFile<T>(
        path: string,
        parse: (source: string, file: string) => { ast: T | null; errors: StepsError[] },
    ): Promise<T | null> {
        let source: string;
        try {
            source = await readSource(path);
        } catch (e) {
            this.record(e);
            return null;
        }
        this.sources.set(path, source);
        const result = parse(source, path);
        this.errors.push(...result.errors);
        return result.ast;
    }

    private record(e: unknown) {
        if (!(e instanceof StepsError)) throw e;
        this.errors.push(e);
    }

    private result(
        building: BuildingNode | null,
        environment: Environment,
        buildingFile?: string,
    ): LoadResult {
        return {
            building,
            environment,
            errors: this.errors,
            config: this.config,
            buildingFile,
            sources: this.sources,
        };
    }
}

/**
 * Loads a project directory: the building file plus every floor folder
 * and the steps each floor lists.
 */
export async function loadProject(
    dir: string,
    options: EnvironmentOptions = {},
): Promise<LoadResult> {
    return new ProjectLoader(dir, options).load();
}

/** Parses a standalone building with no floors. */
export function loadBuildingSource(
    source: string,
    name: string = "<string>",
    options: EnvironmentOptions = {},
): LoadResult {
    const result = parseBuilding(source, name);
    return {
        building: result.ast,
        environment: new Environment({ ...options, file: name }),
        errors: result.errors,
        config: { ...DEFAULT_CONFIG },
        buildingFile: name,
        sources: new Map([[name, source]]),
    };
}

export async function loadBuildingFile(
    path: string,
    options: EnvironmentOptions = {},
): Promise<LoadResult> {
    let source: string;
    try {
        source = await readSource(path);
    } catch (e) {
        const error = isMissing(e)
            ? makeError(
                  ErrorCode.MissingBuilding,
                  { expected: nodePath.basename(path) },
                  undefined,
                  `The file '${path}' does not exist.`,
              )
            : e;
        if (!(error instanceof StepsError)) throw error;
        error.file = path;
        return {
            building: null,
            environment: new Environment({ ...options, file: path }),
            errors: [error],
            config: { ...DEFAULT_CONFIG },
            buildingFile: path,
            sources: new Map(),
        };
    }
    return loadBuildingSource(source, path, options);
}
