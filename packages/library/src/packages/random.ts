import { ErrorCode, StepsRuntimeError } from "../errors";
import { StepsValue } from "../types";
import { expectArg, native } from "../utils/native";
import { number } from "../values";

export const random = {
    /**
     * Random integer between min and max, both inclusive
     */
    random_int: native(
        (min: StepsValue, max: StepsValue) => {
            const usage = "call random_int with 1, 100";
            const low = Math.trunc(expectArg(min, "number", "random_int", usage).value);
            const high = Math.trunc(expectArg(max, "number", "random_int", usage).value);
            if (low > high) {
                throw new StepsRuntimeError({
                    code: ErrorCode.InvalidOperation,
                    message: `random_int: minimum (${low}) cannot be greater than maximum (${high}).`,
                    hint: "Swap the values: call random_int with smaller, larger",
                });
            }
            return number(low + Math.floor(Math.random() * (high - low + 1)));
        },
        {
            params: [
                { name: "min", type: "number" },
                { name: "max", type: "number" },
            ],
            returnType: "number",
        },
    ),

    random_choice: native(
        (items: StepsValue) => {
            const source = expectArg(
                items,
                "list",
                "random_choice",
                "call random_choice with my_list",
            ).value;
            if (source.length === 0) {
                throw new StepsRuntimeError({
                    code: ErrorCode.IndexOutOfBounds,
                    message: "random_choice: cannot pick from an empty list.",
                    hint: "Make sure the list has at least one element.",
                });
            }
            return source.get(Math.floor(Math.random() * source.length));
        },
        {
            params: [{ name: "list", type: "list" }],
            returnType: "any",
            description: "Pick a random element from a list",
        },
    ),
};
