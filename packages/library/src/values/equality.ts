import type { StepsValue } from "../types";

/** Structural equality across all value kinds. */
export function valuesEqual(a: StepsValue, b: StepsValue): boolean {
    switch (a.type) {
        case "number":
        case "text":
        case "boolean":
            return b.type === a.type && b.value === a.value;
        case "nothing":
            return b.type === "nothing";
        case "list": {
            if (b.type !== "list") return false;
            if (a.value === b.value) return true;
            const left = a.value.toArray();
            const right = b.value.toArray();
            return (
                left.length === right.length &&
                left.every((item, i) => valuesEqual(item, right[i]))
            );
        }
        case "table": {
            if (b.type !== "table") return false;
            if (a.value === b.value) return true;
            const other = b.value;
            return (
                a.value.length === other.length &&
                a.value
                    .pairs()
                    .every(
                        ([key, value]) =>
                            other.hasKey(key) &&
                            valuesEqual(value, other.get(key)),
                    )
            );
        }
    }
}
