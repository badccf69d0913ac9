import fs from "node:fs/promises";
import nodePath from "node:path";
import readline from "node:readline/promises";
import chalk from "chalk";
import { StepsError } from "@stepslang/library";
import {
    EnvironmentOptions,
    LoadResult,
    loadBuildingFile,
    loadProject,
    renderDiagnostic,
    stripAnsi,
} from "@stepslang/core";

export const LOG_DIR = nodePath.join(".steps", "logs");

export interface LoadedTarget {
    load: LoadResult;
    /** Directory that owns the log folder. */
    projectDir: string;
}

/** Loads a project directory, or a lone `.building` file. */
export async function loadTarget(
    path: string,
    options: EnvironmentOptions = {},
): Promise<LoadedTarget> {
    const target = nodePath.resolve(path);
    const stat = await fs.stat(target);
    if (stat.isFile()) {
        return {
            load: await loadBuildingFile(target, options),
            projectDir: nodePath.dirname(target),
        };
    }
    return { load: await loadProject(target, options), projectDir: target };
}

/**
 * Prints each error with its source line, then a summary. Returns the
 * plain text of everything printed.
 */
export function printErrors(
    errors: StepsError[],
    sources: Map<string, string>,
): string {
    const rendered = errors.map((error) =>
        renderDiagnostic(error, error.file ? sources.get(error.file) : undefined),
    );
    for (const text of rendered) console.error(text + "\n");

    const summary = `Found ${errors.length} ${errors.length === 1 ? "error" : "errors"}.`;
    console.error(chalk.red(summary));
    return stripAnsi([...rendered, summary].join("\n\n"));
}

/** Writes `.steps/logs/latest.txt` under the project directory. */
export async function writeLog(projectDir: string, text: string): Promise<string> {
    const logDir = nodePath.join(projectDir, LOG_DIR);
    await fs.mkdir(logDir, { recursive: true });
    const logPath = nodePath.join(logDir, "latest.txt");
    await fs.writeFile(
        logPath,
        `Date: ${new Date().toISOString()}\n${stripAnsi(text)}\n`,
        "utf-8",
    );
    return logPath;
}

/** Reports errors, mirrors them to the log when enabled, and marks the process failed. */
export async function fail(
    errors: StepsError[],
    target: LoadedTarget,
): Promise<void> {
    const text = printErrors(errors, target.load.sources);
    if (target.load.config.logs) {
        await writeLog(target.projectDir, text);
    }
    process.exitCode = 1;
}

export async function promptLine(prompt: string): Promise<string> {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
    });
    try {
        return await rl.question(prompt);
    } finally {
        rl.close();
    }
}
