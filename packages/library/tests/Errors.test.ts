import {
    ErrorCode,
    LexerError,
    StepsError,
    StepsRuntimeError,
    StructureError,
    levenshtein,
    makeError,
    suggestName,
    undefinedStepError,
    undefinedVariableError,
} from "../src/errors";

describe("Errors", () => {
    test("makeError fills the template and picks the category class", () => {
        const error = makeError(ErrorCode.UndefinedVariable, { name: "score" }, {
            file: "game.building",
            line: 3,
            col: 13,
        });
        expect(error).toBeInstanceOf(StepsRuntimeError);
        expect(error.message).toBe("Variable 'score' has not been defined yet.");
        expect(error.hint).toBe(
            "Define it first with 'set score to ...' or declare it in 'declare:'.",
        );
        expect(error.location).toEqual({ file: "game.building", line: 3, col: 13 });

        expect(makeError(ErrorCode.TabCharacter)).toBeInstanceOf(LexerError);
        expect(makeError(ErrorCode.MissingFloor, { floor: "x" })).toBeInstanceOf(
            StructureError,
        );
    });

    test("unknown codes still produce an error", () => {
        const error = makeError("E999");
        expect(error).toBeInstanceOf(StepsError);
        expect(error.code).toBe("E999");
        expect(error.message).toBe("Unknown error E999");
        expect(error.hint).toBeUndefined();
    });

    test("format renders location, hint and context with a caret", () => {
        const error = makeError(ErrorCode.DivisionByZero, {}, {
            file: "main.building",
            line: 2,
            col: 13,
        });
        error.withContext("building: main\n    display 1 / 0\n", 2);
        expect(error.format()).toBe(
            [
                "Error E404: Cannot divide by zero.",
                "  --> main.building:2:13",
                "  Hint: Check that your divisor is not zero before dividing.",
                "   1 | building: main",
                ">> 2 |     display 1 / 0",
                "     |             ^",
                "   3 | ",
            ].join("\n"),
        );
    });

    test("multi-line hints are indented", () => {
        const error = undefinedStepError("greet", undefined, ["great", "add"]);
        expect(error.format()).toBe(
            [
                "Error E402: Step 'greet' does not exist.",
                "  Hint: Did you mean 'great'?",
                "        Available steps: great, add",
            ].join("\n"),
        );
        expect(undefinedStepError("x").hint).toBe("Available steps: (none)");
    });

    test("locate keeps an existing location", () => {
        const error = makeError(ErrorCode.Internal, { details: "x" }, {
            file: "a",
            line: 1,
            col: 1,
        });
        error.locate({ file: "b", line: 9, col: 9 });
        expect(error.file).toBe("a");
        expect(error.line).toBe(1);
    });

    test("suggestions", () => {
        expect(levenshtein("kitten", "sitting")).toBe(3);
        expect(suggestName("countr", ["counter", "total"])).toBe("counter");
        expect(suggestName("xyz", ["counter"])).toBeUndefined();
        expect(undefinedVariableError("totl", undefined, ["total"]).hint).toBe(
            "Did you mean 'total'?",
        );
    });
});
