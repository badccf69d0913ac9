#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { runCommand } from "./commands/run";
import { checkCommand } from "./commands/check";
import { debugCommand } from "./commands/debug";
import { initCommand } from "./commands/init";

yargs(hideBin(process.argv))
    .scriptName("steps")
    .usage("$0 <cmd> [args]")
    .command(runCommand)
    .command(checkCommand)
    .command(debugCommand)
    .command(initCommand)
    .demandCommand(1, "Choose a command: run, check, debug or init.")
    .strict()
    .help()
    .parseAsync()
    .catch((e: unknown) => {
        const message = e instanceof Error ? e.message : String(e);
        console.error(chalk.red(message));
        process.exitCode = 1;
    });
