import nodePath from "node:path";
import readline, { Interface } from "node:readline/promises";
import chalk from "chalk";
import type { ArgumentsCamelCase, Argv, CommandModule } from "yargs";
import {
    DebugSnapshot,
    Debugger,
    VariableInfo,
} from "@stepslang/core";
import { fail, loadTarget } from "../report";

interface DebugArgs {
    path: string;
    break?: string[];
}

const HELP = [
    "c  continue to the next breakpoint",
    "s  step into",
    "n  step over",
    "o  step out",
    "v  show variables",
    "q  stop debugging",
].join("\n");

function printVariables(title: string, variables: VariableInfo[]) {
    console.log(chalk.bold(title));
    if (variables.length === 0) {
        console.log(chalk.gray("  (none)"));
        return;
    }
    for (const variable of variables) {
        const marker = variable.isChanged ? chalk.yellow("*") : " ";
        console.log(
            `${marker} ${variable.name} ${chalk.gray(`(${variable.valueType})`)} = ${variable.valueRepr}`,
        );
    }
}

function printPause(snapshot: DebugSnapshot, root: string) {
    const file = nodePath.relative(root, snapshot.currentFile) || snapshot.currentFile;
    console.log(chalk.cyan(`\nPaused at ${file}:${snapshot.currentLine}`));
    for (const frame of [...snapshot.callStack].reverse()) {
        const frameFile = nodePath.relative(root, frame.file) || frame.file;
        console.log(chalk.gray(`  in ${frame.name} (${frameFile}:${frame.line})`));
    }
}

/** Parses `file:line`, resolving the file against the project directory. */
export function parseBreakpoint(
    value: string,
    root: string,
): { file: string; line: number } | null {
    const split = value.lastIndexOf(":");
    if (split <= 0) return null;
    const line = Number(value.slice(split + 1));
    if (!Number.isInteger(line) || line < 1) return null;
    return { file: nodePath.resolve(root, value.slice(0, split)), line };
}

async function promptCommand(
    rl: Interface,
    debug: Debugger,
    snapshot: DebugSnapshot,
) {
    while (true) {
        const answer = (await rl.question(chalk.cyan("(steps) "))).trim();
        switch (answer) {
            case "c":
                debug.continue();
                return;
            case "s":
                debug.stepInto();
                return;
            case "n":
                debug.stepOver();
                return;
            case "o":
                debug.stepOut();
                return;
            case "q":
                debug.stop();
                return;
            case "v": {
                const locals = snapshot.callStack[snapshot.callStack.length - 1];
                if (snapshot.callStack.length > 1) {
                    printVariables(`Locals of ${locals.name}`, locals.localVariables);
                }
                printVariables("Building variables", snapshot.globalVariables);
                break;
            }
            default:
                console.log(HELP);
        }
    }
}

export const debugCommand: CommandModule<{}, DebugArgs> = {
    command: "debug <path>",
    describe: "Run a Steps project under the debugger",
    builder: (yargs: Argv) =>
        yargs
            .positional("path", {
                describe: "Path to the project directory or .building file",
                type: "string",
                demandOption: true,
            })
            .option("break", {
                alias: "b",
                describe: "Breakpoint as file:line, relative to the project",
                type: "string",
                array: true,
            }),
    handler: async (argv: ArgumentsCamelCase<DebugArgs>) => {
        const rl = readline.createInterface({
            input: process.stdin,
            output: process.stdout,
        });
        const target = await loadTarget(argv.path, {
            inputHandler: (prompt) => rl.question(prompt),
        });
        const { building, environment, errors } = target.load;

        if (errors.length > 0 || !building) {
            rl.close();
            await fail(errors, target);
            return;
        }

        const debug = new Debugger(environment);
        for (const location of argv.break ?? []) {
            const breakpoint = parseBreakpoint(location, target.projectDir);
            if (!breakpoint) {
                console.error(chalk.yellow(`Ignoring breakpoint '${location}': expected file:line.`));
                continue;
            }
            debug.breakpoints.add(breakpoint.file, breakpoint.line);
        }

        rl.on("close", () => debug.stop());
        debug.on((event) => {
            switch (event.type) {
                case "paused":
                    printPause(event.snapshot, target.projectDir);
                    promptCommand(rl, debug, event.snapshot).catch((e) => {
                        console.error(chalk.red(`Debugger input failed: ${String(e)}`));
                        debug.stop();
                    });
                    break;
                case "call":
                    console.log(chalk.gray(`-> ${event.name} (depth ${event.depth})`));
                    break;
                case "return":
                    console.log(chalk.gray(`<- ${event.name} (depth ${event.depth})`));
                    break;
                case "error":
                case "finished":
                    break;
            }
        });

        console.log(chalk.gray("Debugging. Type ? for commands.\n"));
        if (argv.break && argv.break.length > 0) debug.continue();
        const result = await debug.start(building);
        rl.close();

        if (result.error) {
            await fail([result.error], target);
            return;
        }
        if (!result.success) {
            console.log(chalk.yellow("\nDebugging stopped."));
            return;
        }
        console.log(chalk.green("\nProgram finished."));
    },
};
