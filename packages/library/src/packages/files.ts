import nativeFs from "fs";
import { ErrorCode, StepsError, StepsRuntimeError } from "../errors";
import { StepsValue } from "../types";
import { expectArg, native } from "../utils/native";
import { NOTHING, asText, boolean, list, table, text } from "../values";

function fileError(message: string, hint: string): StepsError {
    return new StepsRuntimeError({ code: ErrorCode.Internal, message, hint });
}

function readText(path: string, what: string): string {
    try {
        return nativeFs.readFileSync(path, "utf-8");
    } catch (e) {
        const code = e instanceof Error && "code" in e ? e.code : undefined;
        if (code === "ENOENT") {
            throw fileError(
                `${what} not found: '${path}'`,
                "Check that the file path is correct.",
            );
        }
        throw fileError(
            `Could not read file '${path}': ${String(e)}`,
            "Check file permissions.",
        );
    }
}

function writeText(path: string, content: string, append: boolean): void {
    try {
        if (append) nativeFs.appendFileSync(path, content, "utf-8");
        else nativeFs.writeFileSync(path, content, "utf-8");
    } catch (e) {
        throw fileError(
            `Could not write to file '${path}': ${String(e)}`,
            "Check file permissions and path.",
        );
    }
}

/** Splits CSV text into rows of fields. Quoted fields may hold commas, quotes and newlines. */
export function parseCsv(source: string): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let field = "";
    let quoted = false;

    for (let i = 0; i < source.length; i++) {
        const ch = source[i];
        if (quoted) {
            if (ch === '"' && source[i + 1] === '"') {
                field += '"';
                i++;
            } else if (ch === '"') {
                quoted = false;
            } else {
                field += ch;
            }
            continue;
        }

        if (ch === '"') {
            quoted = true;
        } else if (ch === ",") {
            row.push(field);
            field = "";
        } else if (ch === "\n" || ch === "\r") {
            if (ch === "\r" && source[i + 1] === "\n") i++;
            row.push(field);
            rows.push(row);
            row = [];
            field = "";
        } else {
            field += ch;
        }
    }

    if (field !== "" || row.length > 0) {
        row.push(field);
        rows.push(row);
    }
    return rows;
}

function quoteCsv(field: string): string {
    return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

export const files = {
    read_file: native(
        (path: StepsValue) => {
            const p = expectArg(path, "text", "read_file", 'call read_file with "notes.txt"');
            return text(readText(p.value, "File"));
        },
        {
            params: [{ name: "path", type: "text" }],
            returnType: "text",
        },
    ),

    write_file: native(
        (path: StepsValue, content: StepsValue) => {
            const p = expectArg(path, "text", "write_file", 'call write_file with "notes.txt", content');
            writeText(p.value, asText(content).value, false);
            return NOTHING;
        },
        {
            params: [
                { name: "path", type: "text" },
                { name: "content", type: "any" },
            ],
            returnType: "nothing",
        },
    ),

    append_file: native(
        (path: StepsValue, content: StepsValue) => {
            const p = expectArg(path, "text", "append_file", 'call append_file with "notes.txt", content');
            writeText(p.value, asText(content).value, true);
            return NOTHING;
        },
        {
            params: [
                { name: "path", type: "text" },
                { name: "content", type: "any" },
            ],
            returnType: "nothing",
        },
    ),

    file_exists: native(
        (path: StepsValue) => {
            const p = expectArg(path, "text", "file_exists", 'call file_exists with "notes.txt"');
            const stat = nativeFs.statSync(p.value, { throwIfNoEntry: false });
            return boolean(stat !== undefined && stat.isFile());
        },
        {
            params: [{ name: "path", type: "text" }],
            returnType: "boolean",
        },
    ),

    /**
     * Reads a CSV file with a header row into a list of tables
     */
    read_csv: native(
        (path: StepsValue) => {
            const p = expectArg(path, "text", "read_csv", 'call read_csv with "data.csv"');
            const [header, ...rows] = parseCsv(readText(p.value, "CSV file"));
            if (!header) return list();
            return list(
                rows.map((fields) =>
                    table(
                        header.map((name, i): [string, StepsValue] => [
                            name,
                            text(fields[i] ?? ""),
                        ]),
                    ),
                ),
            );
        },
        {
            params: [{ name: "path", type: "text" }],
            returnType: "list",
        },
    ),

    /**
     * Writes a list of tables as CSV, taking the header from the first table
     */
    write_csv: native(
        (path: StepsValue, data: StepsValue) => {
            const usage = 'call write_csv with "data.csv", rows';
            const p = expectArg(path, "text", "write_csv", usage);
            const rows = expectArg(data, "list", "write_csv", usage).value.toArray();
            const tables = rows.map((row) =>
                expectArg(row, "table", "write_csv", usage).value,
            );
            const header = tables.length > 0 ? tables[0].keys() : [];
            const lines = [header.map(quoteCsv).join(",")];
            for (const row of tables) {
                lines.push(
                    header
                        .map((key) =>
                            quoteCsv(
                                row.hasKey(key) ? asText(row.get(key)).value : "",
                            ),
                        )
                        .join(","),
                );
            }
            writeText(p.value, lines.join("\n") + "\n", false);
            return NOTHING;
        },
        {
            params: [
                { name: "path", type: "text" },
                { name: "data", type: "list" },
            ],
            returnType: "nothing",
        },
    ),
};
