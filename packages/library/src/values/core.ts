import { ErrorCode, makeError } from "../errors";
import { StepsValue, ValueOf, ValueType } from "../types";
import { StepsList, StepsTable } from "./containers";

export const NOTHING: ValueOf<"nothing"> = { type: "nothing", value: null };

export function number(value: number): ValueOf<"number"> {
    return { type: "number", value };
}

export function text(value: string): ValueOf<"text"> {
    return { type: "text", value };
}

export function boolean(value: boolean): ValueOf<"boolean"> {
    return { type: "boolean", value };
}

export function nothing(): ValueOf<"nothing"> {
    return NOTHING;
}

export function list(items: StepsValue[] = []): ValueOf<"list"> {
    return { type: "list", value: new StepsList(items) };
}

export function table(
    entries: Iterable<[string, StepsValue]> = [],
): ValueOf<"table"> {
    return { type: "table", value: new StepsTable(entries) };
}

export function typeName(value: StepsValue): ValueType {
    return value.type;
}

export function isValueType(name: string): name is ValueType {
    return (
        name === "number" ||
        name === "text" ||
        name === "boolean" ||
        name === "list" ||
        name === "table" ||
        name === "nothing"
    );
}

/** Default value bound by a `declare:` entry of the given type. */
export function defaultValue(type: ValueType): StepsValue {
    switch (type) {
        case "number":
            return number(0);
        case "text":
            return text("");
        case "boolean":
            return boolean(false);
        case "list":
            return list();
        case "table":
            return table();
        case "nothing":
            return NOTHING;
    }
}

export function formatNumber(value: number): string {
    if (Number.isInteger(value)) return value.toFixed(0);
    return String(value);
}

function nestedString(value: StepsValue): string {
    return value.type === "text" ? `"${value.value}"` : displayString(value);
}

/** Human-readable form used by `display`. Text is shown unquoted. */
export function displayString(value: StepsValue): string {
    switch (value.type) {
        case "number":
            return formatNumber(value.value);
        case "text":
            return value.value;
        case "boolean":
            return value.value ? "true" : "false";
        case "nothing":
            return "nothing";
        case "list":
            return `[${value.value.toArray().map(nestedString).join(", ")}]`;
        case "table": {
            const pairs = value.value.pairs();
            if (pairs.length === 0) return "[:]";
            return `[${pairs
                .map(([k, v]) => `"${k}": ${nestedString(v)}`)
                .join(", ")}]`;
        }
    }
}

export function isTruthy(value: StepsValue): boolean {
    switch (value.type) {
        case "number":
            return value.value !== 0;
        case "text":
            return value.value.length > 0;
        case "boolean":
            return value.value;
        case "nothing":
            return false;
        case "list":
        case "table":
            return value.value.length > 0;
    }
}

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function asNumber(value: StepsValue): ValueOf<"number"> {
    switch (value.type) {
        case "number":
            return value;
        case "boolean":
            return number(value.value ? 1 : 0);
        case "text": {
            const trimmed = value.value.trim();
            if (!NUMERIC_TEXT.test(trimmed)) {
                throw makeError(ErrorCode.ConversionFailed, {
                    value: value.value,
                    target: "number",
                });
            }
            return number(Number(trimmed));
        }
        default:
            throw makeError(ErrorCode.ConversionFailed, {
                value: displayString(value),
                target: "number",
            });
    }
}

export function asText(value: StepsValue): ValueOf<"text"> {
    return value.type === "text" ? value : text(displayString(value));
}

export function asBoolean(value: StepsValue): ValueOf<"boolean"> {
    return value.type === "boolean" ? value : boolean(isTruthy(value));
}
