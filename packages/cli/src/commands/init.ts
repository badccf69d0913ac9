import fs from "node:fs/promises";
import nodePath from "node:path";
import chalk from "chalk";
import type { ArgumentsCamelCase, Argv, CommandModule } from "yargs";

interface InitArgs {
    name: string;
}

/** Turns a directory name into a valid Steps name. */
export function toStepsName(name: string): string {
    const cleaned = name.replace(/[^A-Za-z0-9_]/g, "_");
    return /^[A-Za-z_]/.test(cleaned) ? cleaned : `_${cleaned}`;
}

export function projectFiles(name: string): Record<string, string> {
    const title = toStepsName(name);
    return {
        [`${name}.building`]: `building: ${title}

    note: Your program starts here.
    display "Welcome to ${title}!"
    call greet with "World" storing result in message
    display message
`,
        [nodePath.join("main", "main.floor")]: `floor: main

    step: greet
`,
        [nodePath.join("main", "greet.step")]: `step: greet
    belongs to: main
    expects: name as text
    returns: greeting as text

    do:
        set greeting to "Hello, " added to name added to "!"
        return greeting
`,
        "steps.yml": `building: ${name}.building
iterationLimit: 10000
recursionLimit: 100
logs: true
`,
        ".gitignore": ".steps/\n",
    };
}

/** Writes a new project into `<parent>/<name>` and returns its path. */
export async function scaffoldProject(
    parent: string,
    name: string,
): Promise<string> {
    const projectDir = nodePath.resolve(parent, name);
    await fs.mkdir(nodePath.join(projectDir, "main"), { recursive: true });
    for (const [file, content] of Object.entries(projectFiles(name))) {
        await fs.writeFile(nodePath.join(projectDir, file), content, {
            encoding: "utf-8",
            flag: "wx",
        });
    }
    return projectDir;
}

export const initCommand: CommandModule<{}, InitArgs> = {
    command: "init <name>",
    describe: "Create a new Steps project",
    builder: (yargs: Argv) =>
        yargs.positional("name", {
            describe: "Name of the new project directory",
            type: "string",
            demandOption: true,
        }),
    handler: async (argv: ArgumentsCamelCase<InitArgs>) => {
        const name = nodePath.basename(argv.name);
        try {
            const projectDir = await scaffoldProject(
                nodePath.dirname(nodePath.resolve(argv.name)),
                name,
            );
            for (const file of Object.keys(projectFiles(name))) {
                console.log(chalk.gray(`Created ${nodePath.join(name, file)}`));
            }
            console.log(chalk.green(`\nProject '${name}' initialized successfully!`));
            console.log(`Run with: steps run ${nodePath.relative(process.cwd(), projectDir) || "."}`);
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            console.error(chalk.red(`Failed to initialize project: ${message}`));
            process.exitCode = 1;
        }
    },
};
