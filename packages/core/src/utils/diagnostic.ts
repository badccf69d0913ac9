import chalk from "chalk";
import { StepsError } from "@stepslang/library";

/**
 * Terminal rendering of an error: header, location, the offending line
 * with a caret under the column, then the hint.
 */
export function renderDiagnostic(error: StepsError, source?: string): string {
    const header = `${chalk.red.bold(`Error ${error.code}:`)} ${chalk.bold(error.message)}`;
    if (error.line === undefined) {
        return error.hint
            ? `${header}\n  ${chalk.blue("=")} ${error.hint}`
            : header;
    }

    const lines = source !== undefined ? source.split("\n") : [];
    const fromContext =
        error.contextStart !== undefined
            ? error.contextLines[error.line - error.contextStart]
            : undefined;
    const lineContent = lines[error.line - 1] ?? fromContext ?? "";

    const lineNumStr = String(error.line);
    const padding = " ".repeat(lineNumStr.length);
    const column = error.column ?? 1;
    const where = error.file
        ? `${error.file}:${error.line}:${column}`
        : `line ${error.line}:${column}`;

    const pipeLine = `${chalk.blue(padding)} ${chalk.blue("|")}`;
    const pointer = `${" ".repeat(Math.max(0, column - 1))}${chalk.red.bold("^")}`;

    const output = [
        header,
        `${chalk.blue(padding)} ${chalk.blue("-->")} ${where}`,
        pipeLine,
        `${chalk.blue(lineNumStr)} ${chalk.blue("|")} ${lineContent}`,
        `${chalk.blue(padding)} ${chalk.blue("|")} ${pointer}`,
        pipeLine,
    ];

    if (error.hint) {
        const [first, ...rest] = error.hint.split("\n");
        output.push(`${chalk.blue(padding)} ${chalk.blue("=")} ${first}`);
        for (const line of rest) output.push(`${padding}   ${line}`);
    }

    return output.join("\n");
}

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
    return text.replace(ANSI_PATTERN, "");
}
