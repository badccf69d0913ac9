import fs from "fs";
import os from "os";
import path from "path";
import {
    StepsError,
    StepsValue,
    displayString,
    list,
    natives,
    number,
    parseCsv,
    table,
    text,
} from "../src";

async function callNative(name: string, ...args: StepsValue[]) {
    return natives[name](...args);
}

async function failure(name: string, ...args: StepsValue[]) {
    try {
        await callNative(name, ...args);
    } catch (e) {
        if (e instanceof StepsError) return e;
        throw e;
    }
    throw new Error(`${name} did not fail`);
}

describe("Natives", () => {
    test("every native has a signature", () => {
        for (const fn of Object.values(natives)) {
            expect(Array.isArray(fn.signature.params)).toBe(true);
        }
        expect(natives.slice.signature.params.map((p) => p.name)).toEqual([
            "text",
            "start",
            "end",
        ]);
    });

    test("string helpers", async () => {
        expect(await callNative("uppercase", text("abc"))).toEqual(text("ABC"));
        expect(await callNative("slice", text("hello"), number(1), number(3))).toEqual(
            text("el"),
        );
        expect(await callNative("index_of", text("banana"), text("n"))).toEqual(
            number(2),
        );
        expect(
            await callNative("replace", text("a-b-c"), text("-"), text("+")),
        ).toEqual(text("a+b+c"));
    });

    test("wrong argument type is E302 with usage", async () => {
        const error = await failure("uppercase", number(1));
        expect(error.code).toBe("E302");
        expect(error.message).toBe("uppercase requires a text, got number.");
        expect(error.hint).toBe("Use: call uppercase with name");
    });

    test("slice out of range is E406", async () => {
        const error = await failure("slice", text("abc"), number(2), number(9));
        expect(error.code).toBe("E406");
    });

    test("random_int stays in range", async () => {
        for (let i = 0; i < 50; i++) {
            const value = await callNative("random_int", number(1), number(3));
            expect(value.type).toBe("number");
            if (value.type !== "number") return;
            expect(value.value).toBeGreaterThanOrEqual(1);
            expect(value.value).toBeLessThanOrEqual(3);
        }
        expect((await failure("random_int", number(5), number(1))).code).toBe("E302");
        expect((await failure("random_choice", list())).code).toBe("E406");
    });

    test("parseCsv handles quoted fields", () => {
        expect(parseCsv('name,note\nAda,"a, b"\n"Bo","say ""hi"""\n')).toEqual([
            ["name", "note"],
            ["Ada", "a, b"],
            ["Bo", 'say "hi"'],
        ]);
    });

    test("files round trip through csv", async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), "steps-natives-"));
        try {
            const file = text(path.join(dir, "people.csv"));
            const rows = list([
                table([["name", text("Ada")], ["age", number(36)]]),
                table([["name", text("Lin, Mei")], ["age", number(29)]]),
            ]);
            await callNative("write_csv", file, rows);
            expect(fs.readFileSync(file.value, "utf-8")).toBe(
                'name,age\nAda,36\n"Lin, Mei",29\n',
            );
            const loaded = await callNative("read_csv", file);
            expect(displayString(loaded)).toBe(
                '[["name": "Ada", "age": "36"], ["name": "Lin, Mei", "age": "29"]]',
            );

            const notes = text(path.join(dir, "notes.txt"));
            await callNative("write_file", notes, text("one\n"));
            await callNative("append_file", notes, number(2));
            expect(await callNative("read_file", notes)).toEqual(text("one\n2"));
            expect(await callNative("file_exists", notes)).toEqual({
                type: "boolean",
                value: true,
            });
            const missing = await failure("read_file", text(path.join(dir, "nope.txt")));
            expect(missing.code).toBe("E411");
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});
