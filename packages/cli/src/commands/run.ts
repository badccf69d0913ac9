import nodePath from "node:path";
import chalk from "chalk";
import type { ArgumentsCamelCase, Argv, CommandModule } from "yargs";
import { Interpreter } from "@stepslang/core";
import { fail, loadTarget, promptLine } from "../report";

interface RunArgs {
    path: string;
}

export const runCommand: CommandModule<{}, RunArgs> = {
    command: "run <path>",
    describe: "Run a Steps project or a single .building file",
    builder: (yargs: Argv) =>
        yargs.positional("path", {
            describe: "Path to the project directory or .building file",
            type: "string",
            demandOption: true,
        }),
    handler: async (argv: ArgumentsCamelCase<RunArgs>) => {
        const target = await loadTarget(argv.path, {
            inputHandler: promptLine,
        });
        const { building, environment, errors, buildingFile } = target.load;

        if (errors.length > 0 || !building) {
            await fail(errors, target);
            return;
        }

        if (buildingFile) {
            console.log(chalk.gray(`Running ${nodePath.basename(buildingFile)}...\n`));
        }
        const result = await new Interpreter(environment).runBuilding(building);

        if (result.error) {
            console.log();
            await fail([result.error], target);
            return;
        }
        if (!result.success) {
            console.error(chalk.yellow("\nExecution stopped."));
            process.exitCode = 1;
            return;
        }
        console.log(chalk.green("\nExecution completed successfully."));
    },
};
