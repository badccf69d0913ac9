import { Environment } from "../src/interpreter/Environment";
import { parseBuilding, parseStep } from "../src/parser/Parser";
import {
    BreakpointSet,
    DebugEvent,
    DebugMode,
    DebugSnapshot,
    Debugger,
    shouldPause,
} from "../src/debugger";

function pausesFor(mode: DebugMode, entryDepth: number, depths: number[]): number[] {
    return depths.flatMap((depth, i) =>
        shouldPause({ mode, entryDepth }, depth, false) ? [i] : [],
    );
}

const twice = [
    "step: twice",
    "    belongs to: main",
    "    expects: n",
    "    do:",
    "        set doubled to n * 2",
    "        return doubled",
    "",
].join("\n");

function setup(lines: string[], steps: string[] = []) {
    const output: string[] = [];
    const environment = new Environment({
        file: "main.building",
        outputHandler: (line) => output.push(line),
    });
    for (const source of steps) {
        const { ast } = parseStep(source, `${source.split("\n")[0].slice(6)}.step`);
        if (ast) environment.registerStep(ast);
    }
    const source = ["building: test", ...lines.map((l) => `    ${l}`)].join("\n") + "\n";
    const { ast } = parseBuilding(source, "main.building");
    if (!ast) throw new Error("building did not parse");
    const debug = new Debugger(environment);
    return { debug, building: ast, output };
}

describe("Debugger", () => {
    test("step over pauses only at or above the entry depth", () => {
        expect(pausesFor(DebugMode.STEP_OVER, 0, [0, 0, 1, 1, 0])).toEqual([0, 1, 4]);
    });

    test("step out pauses once the frame has returned", () => {
        expect(pausesFor(DebugMode.STEP_OUT, 1, [1, 1, 2, 1, 1, 0])).toEqual([5]);
    });

    test("step into and paused stop everywhere", () => {
        expect(pausesFor(DebugMode.STEP_INTO, 0, [0, 1, 2])).toEqual([0, 1, 2]);
        expect(pausesFor(DebugMode.PAUSED, 3, [0, 1])).toEqual([0, 1]);
    });

    test("breakpoints pause in every mode but stopped", () => {
        const running = { mode: DebugMode.RUN_TO_BREAKPOINT, entryDepth: 0 };
        expect(shouldPause(running, 0, false)).toBe(false);
        expect(shouldPause(running, 4, true)).toBe(true);
        expect(shouldPause({ mode: DebugMode.STEP_OUT, entryDepth: 0 }, 2, true)).toBe(true);
        expect(shouldPause({ mode: DebugMode.STOPPED, entryDepth: 0 }, 0, true)).toBe(false);
    });

    test("breakpoint set", () => {
        const breakpoints = new BreakpointSet();
        breakpoints.add("f", 10);
        expect(breakpoints.has("f", 10)).toBe(true);
        expect(breakpoints.has("f", 11)).toBe(false);

        breakpoints.setEnabled("f", 10, false);
        expect(breakpoints.has("f", 10)).toBe(false);
        expect(breakpoints.size).toBe(1);
        breakpoints.add("f", 10);
        expect(breakpoints.has("f", 10)).toBe(true);

        expect(breakpoints.toggle("f", 10)).toBe(false);
        expect(breakpoints.toggle("g", 2)).toBe(true);
        expect(breakpoints.list()).toEqual([{ file: "g", line: 2, enabled: true }]);
        breakpoints.clear();
        expect(breakpoints.size).toBe(0);
    });

    test("pauses at the first statement, then runs to a breakpoint", async () => {
        const { debug, building, output } = setup([
            "display 1",
            "display 2",
            "display 3",
        ]);
        debug.breakpoints.add("main.building", 4);
        const lines: number[] = [];
        debug.on((event) => {
            if (event.type !== "paused") return;
            lines.push(event.snapshot.currentLine);
            debug.continue();
        });

        const result = await debug.start(building);
        expect(result.success).toBe(true);
        expect(lines).toEqual([2, 4]);
        expect(output).toEqual(["1", "2", "3"]);
    });

    test("continue before start skips the first pause", async () => {
        const { debug, building } = setup(["display 1", "display 2"]);
        debug.breakpoints.add("main.building", 3);
        const lines: number[] = [];
        debug.on((event) => {
            if (event.type !== "paused") return;
            lines.push(event.snapshot.currentLine);
            expect(debug.isPaused).toBe(true);
            debug.continue();
        });
        debug.continue();
        await debug.start(building);
        expect(lines).toEqual([3]);
        expect(debug.isPaused).toBe(false);
    });

    test("flags variables that changed since the last pause", async () => {
        const { debug, building } = setup([
            "set x to 1",
            "set x to 2",
            "display x",
            'display "y"',
        ]);
        const snapshots: DebugSnapshot[] = [];
        debug.on((event) => {
            if (event.type !== "paused") return;
            snapshots.push(event.snapshot);
            debug.stepInto();
        });
        await debug.start(building);

        expect(snapshots.map((s) => s.globalVariables)).toEqual([
            [],
            [{ name: "x", valueType: "number", valueRepr: "1", isChanged: true }],
            [{ name: "x", valueType: "number", valueRepr: "2", isChanged: true }],
            [{ name: "x", valueType: "number", valueRepr: "2", isChanged: false }],
        ]);
        expect(debug.snapshot).toBe(snapshots[3]);
    });

    test("step over runs a call without pausing inside it", async () => {
        const { debug, building, output } = setup(
            ["call twice with 2 storing result in r", "display r"],
            [twice],
        );
        const stops: string[] = [];
        debug.on((event) => {
            if (event.type !== "paused") return;
            stops.push(`${event.snapshot.currentFile}:${event.snapshot.currentLine}`);
            debug.stepOver();
        });
        await debug.start(building);
        expect(stops).toEqual(["main.building:2", "main.building:3"]);
        expect(output).toEqual(["4"]);
    });

    test("step into enters a step and step out leaves it", async () => {
        const { debug, building } = setup(
            ["call twice with 2 storing result in r", "display r"],
            [twice],
        );
        const stops: DebugSnapshot[] = [];
        const commands = [
            () => debug.stepInto(),
            () => debug.stepOut(),
            () => debug.continue(),
        ];
        debug.on((event) => {
            if (event.type !== "paused") return;
            stops.push(event.snapshot);
            commands[stops.length - 1]();
        });
        await debug.start(building);

        expect(stops.map((s) => `${s.currentFile}:${s.currentLine}`)).toEqual([
            "main.building:2",
            "twice.step:5",
            "main.building:3",
        ]);
        const inside = stops[1];
        expect(inside.callStack.map((frame) => frame.name)).toEqual(["building", "twice"]);
        expect(inside.callStack[0].line).toBe(2);
        expect(inside.callStack[1].localVariables).toEqual([
            { name: "n", valueType: "number", valueRepr: "2", isChanged: true },
        ]);
    });

    test("reports calls and returns with their depth", async () => {
        const { debug, building } = setup(["call twice with 1"], [twice]);
        const events: string[] = [];
        debug.continue();
        debug.on((event: DebugEvent) => {
            if (event.type === "call" || event.type === "return") {
                events.push(`${event.type} ${event.name} ${event.depth}`);
            } else {
                events.push(event.type);
            }
        });
        await debug.start(building);
        expect(events).toEqual(["call twice 1", "return twice 0", "finished"]);
    });

    test("stop halts the run without running another statement", async () => {
        const { debug, building, output } = setup(["display 1", "display 2"]);
        const events: string[] = [];
        debug.on((event) => {
            events.push(event.type);
            if (event.type === "paused") debug.stop();
        });
        const result = await debug.start(building);
        expect(result.success).toBe(false);
        expect(result.error).toBeUndefined();
        expect(output).toEqual([]);
        expect(events).toEqual(["paused", "finished"]);
        expect(debug.mode).toBe(DebugMode.STOPPED);
    });

    test("stop inside an attempt skips then continue", async () => {
        const { debug, building, output } = setup([
            "attempt:",
            '    display "a"',
            "then continue:",
            '    display "c"',
            'display "d"',
        ]);
        debug.breakpoints.add("main.building", 3);
        debug.continue();
        debug.on((event) => {
            if (event.type === "paused") debug.stop();
        });
        const result = await debug.start(building);
        expect(result.success).toBe(false);
        expect(output).toEqual([]);
    });

    test("runtime errors are reported before finishing", async () => {
        const { debug, building } = setup(["display 1 / 0"]);
        const events: string[] = [];
        debug.continue();
        debug.on((event) => events.push(event.type));
        const result = await debug.start(building);
        expect(result.error?.code).toBe("E404");
        expect(events).toEqual(["error", "finished"]);
    });
});
