import {
    ErrorCode,
    StepsError,
    StepsTypeError,
    divisionByZeroError,
    makeError,
} from "../errors";
import { StepsValue, ValueOf, ValueType } from "../types";
import {
    asBoolean,
    asNumber,
    asText,
    boolean,
    displayString,
    list,
    number,
    text,
} from "./core";

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%";
export type ComparisonOperator = "<" | ">" | "<=" | ">=";

const OPERATION_NAMES: Record<ArithmeticOperator, string> = {
    "+": "add",
    "-": "subtract",
    "*": "multiply",
    "/": "divide",
    "%": "take the remainder",
};

function invalidOperand(
    operation: string,
    value: StepsValue,
    hint: string,
): StepsError {
    return new StepsTypeError({
        code: ErrorCode.InvalidOperation,
        message: `Cannot ${operation} a ${value.type}.`,
        hint,
    });
}

export function arithmetic(
    operator: ArithmeticOperator,
    left: StepsValue,
    right: StepsValue,
): ValueOf<"number"> {
    if (left.type !== "number" || right.type !== "number") {
        const hint =
            operator === "+" && (left.type === "text" || right.type === "text")
                ? "To join text, use 'added to' instead of '+'."
                : undefined;
        throw makeError(
            ErrorCode.InvalidOperation,
            {
                operation: OPERATION_NAMES[operator],
                left: left.type,
                right: right.type,
            },
            undefined,
            hint,
        );
    }

    const a = left.value;
    const b = right.value;
    switch (operator) {
        case "+":
            return number(a + b);
        case "-":
            return number(a - b);
        case "*":
            return number(a * b);
        case "/":
            if (b === 0) throw divisionByZeroError();
            return number(a / b);
        case "%":
            if (b === 0) throw divisionByZeroError();
            return number(((a % b) + b) % b);
    }
}

export function compare(
    operator: ComparisonOperator,
    left: StepsValue,
    right: StepsValue,
): ValueOf<"boolean"> {
    if (left.type !== "number" || right.type !== "number") {
        throw makeError(ErrorCode.InvalidComparison, {
            left: left.type,
            right: right.type,
            operator,
        });
    }
    switch (operator) {
        case "<":
            return boolean(left.value < right.value);
        case ">":
            return boolean(left.value > right.value);
        case "<=":
            return boolean(left.value <= right.value);
        case ">=":
            return boolean(left.value >= right.value);
    }
}

export function negate(value: StepsValue): ValueOf<"number"> {
    if (value.type !== "number") {
        throw invalidOperand("negate", value, "Only numbers can be negated.");
    }
    return number(-value.value);
}

export function addedTo(left: StepsValue, right: StepsValue): ValueOf<"text"> {
    return text(asText(left).value + asText(right).value);
}

export function splitBy(
    source: StepsValue,
    delimiter: StepsValue,
): ValueOf<"list"> {
    if (source.type !== "text") {
        throw invalidOperand(
            "split",
            source,
            "Make sure the value you're splitting is text.",
        );
    }
    const parts = source.value.split(asText(delimiter).value);
    return list(parts.map((part) => text(part)));
}

export function lengthOf(value: StepsValue): ValueOf<"number"> {
    switch (value.type) {
        case "text":
            return number([...value.value].length);
        case "list":
        case "table":
            return number(value.value.length);
        default:
            throw invalidOperand(
                "get the length of",
                value,
                "'length of' works with text, lists, and tables.",
            );
    }
}

export function characterAt(
    index: StepsValue,
    source: StepsValue,
): ValueOf<"text"> {
    if (source.type !== "text") {
        throw invalidOperand(
            "get a character from",
            source,
            "'character at' only works with text values.",
        );
    }
    if (index.type !== "number") {
        throw new StepsTypeError({
            code: ErrorCode.InvalidOperation,
            message: `Character index must be a number, not ${index.type}.`,
            hint: "Use a number for the index, like 'character at 0 of name'.",
        });
    }
    const chars = [...source.value];
    const i = Math.trunc(index.value);
    if (i < 0 || i >= chars.length) {
        throw makeError(ErrorCode.IndexOutOfBounds, {
            index: i,
            container: "text",
            length: chars.length,
            max: chars.length - 1,
        });
    }
    return text(chars[i]);
}

function requireText(
    value: StepsValue,
    phrase: string,
): ValueOf<"text"> {
    if (value.type !== "text") {
        throw new StepsTypeError({
            code: ErrorCode.InvalidOperation,
            message: `'${phrase}' needs text, not a ${value.type}.`,
            hint: `'${phrase}' works with text values.`,
        });
    }
    return value;
}

export function contains(
    haystack: StepsValue,
    needle: StepsValue,
): ValueOf<"boolean"> {
    if (haystack.type === "list") return boolean(haystack.value.contains(needle));
    const source = requireText(haystack, "contains");
    return boolean(source.value.includes(asText(needle).value));
}

export function startsWith(
    source: StepsValue,
    prefix: StepsValue,
): ValueOf<"boolean"> {
    const value = requireText(source, "starts with");
    return boolean(value.value.startsWith(asText(prefix).value));
}

export function endsWith(
    source: StepsValue,
    suffix: StepsValue,
): ValueOf<"boolean"> {
    const value = requireText(source, "ends with");
    return boolean(value.value.endsWith(asText(suffix).value));
}

export function isIn(
    item: StepsValue,
    collection: StepsValue,
): ValueOf<"boolean"> {
    switch (collection.type) {
        case "list":
            return boolean(collection.value.contains(item));
        case "text":
            return boolean(collection.value.includes(asText(item).value));
        case "table":
            return boolean(collection.value.hasKey(asText(item).value));
        default:
            throw invalidOperand(
                "look inside",
                collection,
                "'is in' works with lists, text, and tables.",
            );
    }
}

export function typeOf(value: StepsValue): ValueOf<"text"> {
    return text(value.type);
}

export function isType(value: StepsValue, type: ValueType): ValueOf<"boolean"> {
    return boolean(value.type === type);
}

export function convert(value: StepsValue, target: ValueType): StepsValue {
    switch (target) {
        case "number":
            return asNumber(value);
        case "text":
            return asText(value);
        case "boolean":
            return asBoolean(value);
        case "list":
            if (value.type === "list") return value;
            if (value.type === "text") {
                return list([...value.value].map((ch) => text(ch)));
            }
            break;
        case "table":
            if (value.type === "table") return value;
            break;
        case "nothing":
            break;
    }
    throw makeError(ErrorCode.ConversionFailed, {
        value: displayString(value),
        target,
    });
}

export function formatDecimal(
    value: StepsValue,
    places: number,
): ValueOf<"text"> {
    const digits = Math.min(100, Math.max(0, Math.trunc(places)));
    return text(asNumber(value).value.toFixed(digits));
}

/** Reads `container[key]`: a table by text key, a list by numeric index. */
export function indexValue(container: StepsValue, key: StepsValue): StepsValue {
    if (container.type === "table") {
        return container.value.get(asText(key).value);
    }
    if (container.type === "list") {
        return container.value.get(requireIndex(key));
    }
    throw invalidOperand(
        "index into",
        container,
        "Only lists and tables can be accessed with [ ].",
    );
}

/** Writes `container[key] = value`. */
export function assignIndex(
    container: StepsValue,
    key: StepsValue,
    value: StepsValue,
): void {
    if (container.type === "table") {
        container.value.set(asText(key).value, value);
        return;
    }
    if (container.type === "list") {
        container.value.set(requireIndex(key), value);
        return;
    }
    throw invalidOperand(
        "set an element of",
        container,
        "Only lists and tables can be changed with [ ].",
    );
}

function requireIndex(key: StepsValue): number {
    if (key.type !== "number") {
        throw new StepsTypeError({
            code: ErrorCode.InvalidOperation,
            message: `List index must be a number, not ${key.type}.`,
            hint: "Lists are indexed from 0, like items[0].",
        });
    }
    return key.value;
}
