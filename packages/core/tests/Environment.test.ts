import { StepsError, number, text } from "@stepslang/library";
import { Environment } from "../src/interpreter/Environment";
import { ReplEnvironment } from "../src/interpreter/ReplEnvironment";

function failure(fn: () => unknown): StepsError {
    try {
        fn();
    } catch (e) {
        if (e instanceof StepsError) return e;
        throw e;
    }
    throw new Error("expected an error");
}

describe("Environment", () => {
    test("should define variables in the innermost scope", () => {
        const env = new Environment();
        env.setVariable("outer", number(1));
        env.pushScope();
        env.setVariable("inner", number(2));
        env.setVariable("outer", number(3));
        expect(env.getVariable("inner")).toEqual(number(2));
        env.popScope();

        expect(env.hasVariable("inner")).toBe(false);
        expect(env.getVariable("outer")).toEqual(number(3));
    });

    test("should suggest a close name for an undefined variable", () => {
        const env = new Environment();
        env.setVariable("counter", number(0));
        const error = failure(() => env.getVariable("countr"));
        expect(error.code).toBe("E401");
        expect(error.hint).toBe("Did you mean 'counter'?");
    });

    test("should allow one assignment to a fixed variable", () => {
        const env = new Environment();
        env.declareVariable("limit", "number", true);
        expect(env.getVariable("limit")).toEqual(number(0));
        env.setVariable("limit", number(5));
        const error = failure(() => env.setVariable("limit", number(6)));
        expect(error.code).toBe("E403");
        expect(env.getVariable("limit")).toEqual(number(5));
    });

    test("should enforce declared types", () => {
        const env = new Environment();
        env.declareVariable("name", "text");
        const error = failure(() => env.setVariable("name", number(1)));
        expect(error.code).toBe("E301");
        expect(error.message).toBe(
            "Cannot assign number to 'name' - it was declared as text.",
        );
    });

    test("should isolate step frames from the building", () => {
        const env = new Environment({ file: "main.building" });
        env.setVariable("total", number(1));
        env.pushFrame("add", "add.step", 1);
        expect(env.hasVariable("total")).toBe(false);
        expect(env.callDepth).toBe(1);
        expect(env.callStack).toEqual(["building", "add"]);
        env.popFrame();
        expect(env.callDepth).toBe(0);
        expect(env.currentFrame.file).toBe("main.building");
    });

    test("should refuse to pop what was never pushed", () => {
        const env = new Environment();
        expect(failure(() => env.popScope()).code).toBe("E411");
        expect(failure(() => env.popFrame()).code).toBe("E411");
    });

    test("should list available steps when one is missing", () => {
        const env = new Environment();
        const error = failure(() => env.resolveStep("greet"));
        expect(error.code).toBe("E402");
        expect(error.hint).toBe("Available steps: (none)");
    });

    test("REPL allows retyping fixed variables and has no steps", () => {
        const env = new ReplEnvironment();
        env.declareVariable("name", "text", true);
        env.setVariable("name", text("a"));
        env.setVariable("name", text("b"));
        expect(env.getVariable("name")).toEqual(text("b"));
        expect(env.currentFrame.file).toBe("<repl>");

        const error = failure(() => env.resolveStep("greet"));
        expect(error.code).toBe("E405");
        expect(error.message).toBe("Cannot call step 'greet' here.");
    });
});
