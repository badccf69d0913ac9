import { ReplEnvironment } from "../src/interpreter/ReplEnvironment";
import { Environment, EnvironmentOptions } from "../src/interpreter/Environment";
import { Interpreter } from "../src/interpreter/Interpreter";
import { parseBuilding, parseReplStatements, parseStep } from "../src/parser/Parser";
import { interpret } from "../src";
import { StepsTypeError } from "@stepslang/library";

const silent = { outputHandler: () => {} };

function building(lines: string[]): string {
    return ["building: test", ...lines.map((line) => `    ${line}`)].join("\n") + "\n";
}

async function run(lines: string[], options: EnvironmentOptions = {}) {
    return interpret(building(lines), { ...silent, ...options });
}

/** Runs a building with the given step sources registered. */
async function runProject(
    lines: string[],
    steps: string[],
    options: EnvironmentOptions = {},
) {
    const environment = new Environment({ ...silent, ...options });
    for (const source of steps) {
        const { ast, errors } = parseStep(source);
        expect(errors).toEqual([]);
        if (ast) environment.registerStep(ast);
    }
    const { ast } = parseBuilding(building(lines));
    if (!ast) throw new Error("building did not parse");
    return new Interpreter(environment).runBuilding(ast);
}

const double = [
    "step: double",
    "    belongs to: main",
    "    expects: n",
    "    do:",
    "        return n * 2",
    "",
].join("\n");

describe("Interpreter", () => {
    test("should add numbers", async () => {
        const result = await run(["set x to 10", "set y to 5", "display x + y"]);
        expect(result.success).toBe(true);
        expect(result.output).toEqual(["15"]);
    });

    test("should send output to the handler", async () => {
        const lines: string[] = [];
        await run(['display "hi"'], { outputHandler: (line) => lines.push(line) });
        expect(lines).toEqual(["hi"]);
    });

    test("should report an undefined variable at its use", async () => {
        const result = await run(["display undefined_var"]);
        expect(result.success).toBe(false);
        expect(result.error?.code).toBe("E401");
        expect(result.error?.message).toBe(
            "Variable 'undefined_var' has not been defined yet.",
        );
        expect(result.error?.line).toBe(2);
        expect(result.error?.column).toBe(13);
    });

    test("should stop at the first runtime error", async () => {
        const result = await run(['display "before"', "display 1 / 0", 'display "after"']);
        expect(result.output).toEqual(["before"]);
        expect(result.error?.code).toBe("E404");
    });

    test("should join text with added to", async () => {
        const result = await run(['set n to 3', 'display "n = " added to n']);
        expect(result.output).toEqual(["n = 3"]);
    });

    test("should refuse + on text and hint at added to", async () => {
        const result = await run(['display "a" + 1']);
        expect(result.error?.code).toBe("E302");
        expect(result.error?.hint).toBe("To join text, use 'added to' instead of '+'.");
    });

    test("should share lists between variables", async () => {
        const result = await run([
            "set a to [1, 2]",
            "set b to a",
            "add 3 to b",
            "display a",
        ]);
        expect(result.output).toEqual(["[1, 2, 3]"]);
    });

    test("should remove the first match and ignore missing items", async () => {
        const result = await run([
            "set xs to [1, 2, 3]",
            "remove 2 from xs",
            "remove 9 from xs",
            "display xs",
        ]);
        expect(result.output).toEqual(["[1, 3]"]);
    });

    test("should read and write table entries", async () => {
        const result = await run([
            'set t to ["a": 1]',
            'set t["b"] to 2',
            'display t["b"]',
            "display length of t",
            'display t["zzz"]',
        ]);
        expect(result.output).toEqual(["2", "2"]);
        expect(result.error?.code).toBe("E407");
        expect(result.error?.line).toBe(6);
    });

    test("should report list indices out of bounds", async () => {
        const result = await run(["set xs to [1]", "display xs[5]"]);
        expect(result.error?.code).toBe("E406");
    });

    test("should require a list for add", async () => {
        const result = await run(["set xs to 5", "add 1 to xs"]);
        expect(result.error?.code).toBe("E302");
        expect(result.error?.hint).toBe("Create it as a list first, like 'set xs to []'.");
    });

    test("should choose the first true branch", async () => {
        const result = await run([
            "set x to 3",
            "if x is greater than 5",
            '    display "big"',
            "otherwise if x is greater than 2",
            '    display "mid"',
            "otherwise",
            '    display "small"',
        ]);
        expect(result.output).toEqual(["mid"]);
    });

    test("should drop variables created inside a block", async () => {
        const result = await run(["if true", "    set inner to 1", "display inner"]);
        expect(result.error?.code).toBe("E401");
    });

    test("should loop over text, lists and table keys", async () => {
        const result = await run([
            'repeat for each ch in "ab"',
            "    display ch",
            "repeat for each n in [1, 2]",
            "    display n * 10",
            'repeat for each key in ["x": 1, "y": 2]',
            "    display key",
        ]);
        expect(result.output).toEqual(["a", "b", "10", "20", "x", "y"]);
    });

    test("should reject iterating over a number", async () => {
        const result = await run(["repeat for each x in 5", "    display x"]);
        expect(result.error?.code).toBe("E303");
    });

    test("should leave the innermost loop on exit", async () => {
        const result = await run([
            "set i to 0",
            "repeat 5 times",
            "    set i to i + 1",
            "    if i is equal to 3",
            "        exit",
            "    display i",
            'display "end"',
        ]);
        expect(result.output).toEqual(["1", "2", "end"]);
    });

    test("should end the run successfully on exit at the top level", async () => {
        const result = await run(['display "a"', "exit", 'display "b"']);
        expect(result.success).toBe(true);
        expect(result.output).toEqual(["a"]);
    });

    test("should stop a runaway while loop", async () => {
        const result = await run(
            ["set n to 0", "repeat while true", "    set n to n + 1"],
            { iterationLimit: 50 },
        );
        expect(result.error?.code).toBe("E410");
        expect(result.error?.message).toBe("Maximum loop iterations exceeded (50).");
    });

    test("should allow a while loop to run exactly the limit", async () => {
        const result = await run(
            ["set n to 0", "repeat while n is less than 5", "    set n to n + 1", "display n"],
            { iterationLimit: 5 },
        );
        expect(result.output).toEqual(["5"]);
    });

    test("should run attempt, if unsuccessful and then continue in order", async () => {
        const result = await run([
            "attempt:",
            '    display "start"',
            "    display 1 / 0",
            '    display "never"',
            "if unsuccessful:",
            "    display problem_message",
            "then continue:",
            '    display "done"',
            'display "after"',
        ]);
        expect(result.success).toBe(true);
        expect(result.output).toEqual(["start", "Cannot divide by zero.", "done", "after"]);
    });

    test("should run then continue after a successful attempt", async () => {
        const result = await run([
            "attempt:",
            '    display "ok"',
            "if unsuccessful:",
            '    display "failed"',
            "then continue:",
            '    display "done"',
        ]);
        expect(result.output).toEqual(["ok", "done"]);
    });

    test("should recover silently when there is no unsuccessful block", async () => {
        const result = await run([
            "attempt:",
            '    display "a"',
            "    display 1 / 0",
            '    display "b"',
            "then continue:",
            '    display "c"',
            'display "d"',
        ]);
        expect(result.success).toBe(true);
        expect(result.output).toEqual(["a", "c", "d"]);
    });

    test("should let exit pass through an attempt after then continue runs", async () => {
        const result = await run([
            "attempt:",
            '    display "a"',
            "    exit",
            "if unsuccessful:",
            '    display "b"',
            "then continue:",
            '    display "c"',
            'display "d"',
        ]);
        expect(result.success).toBe(true);
        expect(result.output).toEqual(["a", "c"]);
    });

    test("should end the enclosing loop on exit inside an attempt", async () => {
        const result = await run([
            "repeat 3 times",
            "    attempt:",
            '        display "a"',
            "        exit",
            "    then continue:",
            '        display "c"',
            'display "d"',
        ]);
        expect(result.output).toEqual(["a", "c", "d"]);
    });

    test("should return from a step through an attempt", async () => {
        const safe = [
            "step: safe",
            "    belongs to: main",
            "    expects: n",
            "    do:",
            "        attempt:",
            "            return n * 2",
            "        then continue:",
            '            display "cleanup"',
            '        display "unreached"',
            "",
        ].join("\n");
        const result = await runProject(
            ["call safe with 5 storing result in r", "display r"],
            [safe],
        );
        expect(result.success).toBe(true);
        expect(result.output).toEqual(["cleanup", "10"]);
    });

    test("should unwind nested blocks when an attempt fails", async () => {
        const environment = new Environment(silent);
        const { ast } = parseBuilding(
            building([
                "set total to 0",
                "attempt:",
                "    repeat 2 times",
                "        set total to total + 1",
                "        if total is equal to 2",
                '            set inner to "x"',
                "            display 1 / 0",
                "if unsuccessful:",
                "    display problem_message",
                "display total",
                "set total to total + 10",
                "display total",
                "display inner",
            ]),
        );
        if (!ast) throw new Error("building did not parse");
        const result = await new Interpreter(environment).runBuilding(ast);

        expect(result.output).toEqual(["Cannot divide by zero.", "2", "12"]);
        expect(result.error?.code).toBe("E401");
        expect(environment.frames).toHaveLength(1);
        expect(environment.currentFrame.temps).toHaveLength(0);
        expect([...environment.globalFrame.main.variables.keys()]).toEqual(["total"]);
    });

    test("should convert and check types", async () => {
        const result = await run([
            'set n to "42" as number',
            "display n + 1",
            "display n is a number",
            "display type of [1]",
            "display 3.14159 as decimal(2)",
            'display character at 1 of "abc"',
        ]);
        expect(result.output).toEqual(["43", "true", "list", "3.14", "b"]);
    });

    test("should report a failed conversion as a type error", async () => {
        const result = await run(['set x to "hello" as number']);
        expect(result.error).toBeInstanceOf(StepsTypeError);
        expect(result.error?.code).toBe("E305");
        expect(result.error?.line).toBe(2);
    });

    test("should allow a variable named decimal", async () => {
        const result = await run([
            "set decimal to 2",
            "display decimal + 1",
            "display 3.14159 as decimal(decimal)",
        ]);
        expect(result.success).toBe(true);
        expect(result.output).toEqual(["3", "3.14"]);
    });

    test("should read input from the input handler", async () => {
        const result = await run(["set name to input", 'display "Hi " added to name'], {
            inputHandler: () => Promise.resolve("Ada"),
        });
        expect(result.output).toEqual(["Hi Ada"]);
    });

    test("should call built-in functions", async () => {
        const result = await run([
            'call uppercase with "abc" storing result in u',
            "display u",
        ]);
        expect(result.output).toEqual(["ABC"]);
    });

    test("should call a step and store its result", async () => {
        const result = await runProject(
            ["call double with 21 storing result in r", "display r"],
            [double],
        );
        expect(result.output).toEqual(["42"]);
    });

    test("should check the argument count", async () => {
        const result = await runProject(["call double with 1, 2"], [double]);
        expect(result.error?.code).toBe("E409");
        expect(result.error?.message).toBe("Step 'double' expects 1 argument(s), got 2.");
    });

    test("should suggest a step for a typo", async () => {
        const result = await runProject(["call doubel with 1"], [double]);
        expect(result.error?.code).toBe("E402");
        expect(result.error?.hint).toBe("Did you mean 'double'?\nAvailable steps: double");
    });

    test("should not let steps see building variables", async () => {
        const peek = [
            "step: peek",
            "    belongs to: main",
            "    do:",
            "        display secret",
            "",
        ].join("\n");
        const result = await runProject(['set secret to "x"', "call peek"], [peek]);
        expect(result.error?.code).toBe("E401");
    });

    test("should yield the returns variable when a step ends normally", async () => {
        const square = [
            "step: square",
            "    belongs to: main",
            "    expects: n as number",
            "    returns: result as number",
            "    do:",
            "        set result to n * n",
            "",
        ].join("\n");
        const result = await runProject(
            ["call square with 4 storing result in s", "display s"],
            [square],
        );
        expect(result.output).toEqual(["16"]);
    });

    test("should end a step early on exit", async () => {
        const early = [
            "step: early",
            "    belongs to: main",
            "    do:",
            '        display "in"',
            "        exit",
            '        display "never"',
            "",
        ].join("\n");
        const result = await runProject(["call early", 'display "back"'], [early]);
        expect(result.output).toEqual(["in", "back"]);
    });

    test("should enforce fixed declarations", async () => {
        const fixed = [
            "step: fixed_limit",
            "    belongs to: main",
            "    declare:",
            "        limit as number fixed",
            "    do:",
            "        set limit to 5",
            "        set limit to 6",
            "",
        ].join("\n");
        const result = await runProject(["call fixed_limit"], [fixed]);
        expect(result.error?.code).toBe("E403");
        expect(result.error?.message).toBe(
            "Cannot change 'limit' because it was declared as 'fixed'.",
        );
    });

    test("should reject arguments of the wrong declared type", async () => {
        const typed = [
            "step: shout",
            "    belongs to: main",
            "    expects: words as text",
            "    do:",
            "        display words",
            "",
        ].join("\n");
        const result = await runProject(["call shout with 5"], [typed]);
        expect(result.error?.code).toBe("E301");
    });

    test("should call risers of the running step", async () => {
        const outer = [
            "step: outer",
            "    belongs to: main",
            "    riser: helper",
            "        expects: x",
            "        do:",
            "            return x + 1",
            "    do:",
            "        call helper with 1 storing result in r",
            "        return r",
            "",
        ].join("\n");
        const result = await runProject(
            ["call outer storing result in v", "display v", "call helper with 1"],
            [outer],
        );
        expect(result.output).toEqual(["2"]);
        expect(result.error?.code).toBe("E402");
    });

    test("should stop infinite recursion", async () => {
        const forever = [
            "step: forever",
            "    belongs to: main",
            "    do:",
            "        call forever",
            "",
        ].join("\n");
        const result = await runProject(["call forever"], [forever], {
            recursionLimit: 5,
        });
        expect(result.error?.code).toBe("E408");
        expect(result.error?.message).toBe(
            "Maximum recursion depth (5) exceeded when calling 'forever'.",
        );
    });

    test("should keep REPL variables between entries and refuse steps", async () => {
        const interpreter = new Interpreter(new ReplEnvironment(silent));
        const first = parseReplStatements("set x to 2");
        const second = parseReplStatements("display x * 3\ncall greet");
        await interpreter.runStatements(first.ast ?? []);
        const result = await interpreter.runStatements(second.ast ?? []);
        expect(result.output).toEqual(["6"]);
        expect(result.error?.code).toBe("E405");
        expect(result.error?.hint).toBe(
            "The REPL cannot define steps. Create a project to use steps.",
        );
    });

    test("should report parse errors without running", async () => {
        const result = await interpret("building: test\n    print 1\n", silent);
        expect(result.success).toBe(false);
        expect(result.error?.code).toBe("E208");
        expect(result.output).toEqual([]);
    });
});
