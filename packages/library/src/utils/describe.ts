import { StepsValue } from "../types";
import { displayString, formatNumber } from "../values";

const LIST_LIMIT = 5;
const LIST_PREVIEW = 3;
const TABLE_LIMIT = 3;
const TABLE_PREVIEW = 2;

/**
 * Compact, quoted representation of a value for debugger views.
 * Long lists and tables are truncated.
 */
export function describeValue(value: StepsValue): string {
    switch (value.type) {
        case "text":
            return `"${value.value}"`;
        case "number":
            return formatNumber(value.value);
        case "list": {
            const items = value.value.toArray();
            if (items.length <= LIST_LIMIT) return displayString(value);
            const preview = items.slice(0, LIST_PREVIEW).map(describeValue);
            return `[${preview.join(", ")}, ... (${items.length} items)]`;
        }
        case "table": {
            const pairs = value.value.pairs();
            if (pairs.length <= TABLE_LIMIT) return displayString(value);
            const preview = pairs
                .slice(0, TABLE_PREVIEW)
                .map(([k, v]) => `"${k}": ${describeValue(v)}`);
            return `[${preview.join(", ")}, ... (${pairs.length} entries)]`;
        }
        default:
            return displayString(value);
    }
}
