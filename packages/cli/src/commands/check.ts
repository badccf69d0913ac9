import chalk from "chalk";
import type { ArgumentsCamelCase, Argv, CommandModule } from "yargs";
import { fail, loadTarget } from "../report";

interface CheckArgs {
    path: string;
}

export const checkCommand: CommandModule<{}, CheckArgs> = {
    command: "check <path>",
    describe: "Check a Steps project for errors without running it",
    builder: (yargs: Argv) =>
        yargs.positional("path", {
            describe: "Path to the project directory or .building file",
            type: "string",
            demandOption: true,
        }),
    handler: async (argv: ArgumentsCamelCase<CheckArgs>) => {
        const target = await loadTarget(argv.path);
        const { errors, environment } = target.load;

        if (errors.length > 0) {
            await fail(errors, target);
            return;
        }

        const floors = environment.floorNames().length;
        const steps = environment.stepNames().length;
        console.log(chalk.gray(`Checked ${floors} floor(s) and ${steps} step(s).`));
        console.log(chalk.green("No problems found."));
    },
};
