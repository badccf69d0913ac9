import {
    NOTHING,
    addedTo,
    asNumber,
    boolean,
    characterAt,
    contains,
    convert,
    displayString,
    formatDecimal,
    indexValue,
    isIn,
    isTruthy,
    lengthOf,
    list,
    number,
    splitBy,
    table,
    text,
    valuesEqual,
} from "../src/values";
import { describeValue } from "../src/utils/describe";
import { StepsError, StepsTypeError } from "../src/errors";

function codeOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (e) {
        if (e instanceof StepsError) return e.code;
        throw e;
    }
    return undefined;
}

describe("Values", () => {
    test("display numbers without a trailing fraction", () => {
        expect(displayString(number(10))).toBe("10");
        expect(displayString(number(2.5))).toBe("2.5");
        expect(displayString(number(-3))).toBe("-3");
    });

    test("display nested text quoted inside containers", () => {
        const value = list([number(1), text("a"), list([boolean(true)])]);
        expect(displayString(value)).toBe('[1, "a", [true]]');
        expect(displayString(table())).toBe("[:]");
        expect(displayString(table([["name", text("Ada")]]))).toBe('["name": "Ada"]');
        expect(displayString(NOTHING)).toBe("nothing");
    });

    test("truthiness", () => {
        expect(isTruthy(number(0))).toBe(false);
        expect(isTruthy(text(""))).toBe(false);
        expect(isTruthy(list())).toBe(false);
        expect(isTruthy(NOTHING)).toBe(false);
        expect(isTruthy(text("x"))).toBe(true);
        expect(isTruthy(list([NOTHING]))).toBe(true);
    });

    test("converting displayed numbers back gives the same number", () => {
        for (const n of [0, 7, -12, 3.25, 1e21]) {
            expect(asNumber(text(displayString(number(n)))).value).toBe(n);
        }
    });

    test("text that is not a number fails conversion with a type error", () => {
        expect(codeOf(() => asNumber(text("12abc")))).toBe("E305");
        expect(codeOf(() => convert(number(1), "table"))).toBe("E305");
        expect(() => asNumber(text("hello"))).toThrow(StepsTypeError);
        expect(asNumber(text("  42 ")).value).toBe(42);
    });

    test("convert text to list gives characters", () => {
        expect(displayString(convert(text("ab"), "list"))).toBe('["a", "b"]');
        expect(convert(number(0), "boolean")).toEqual(boolean(false));
    });

    test("format decimal places", () => {
        expect(formatDecimal(number(3.14159), 2)).toEqual(text("3.14"));
        expect(formatDecimal(number(2), 0)).toEqual(text("2"));
    });

    test("lists are shared by reference", () => {
        const a = list([number(1)]);
        const b = a;
        b.value.add(number(2));
        expect(a.value.length).toBe(2);
        expect(displayString(a)).toBe("[1, 2]");
    });

    test("remove deletes only the first equal element", () => {
        const xs = list([number(1), number(2), number(1)]);
        expect(xs.value.remove(number(1))).toBe(true);
        expect(displayString(xs)).toBe("[2, 1]");
        expect(xs.value.remove(number(9))).toBe(false);
        expect(displayString(xs)).toBe("[2, 1]");
    });

    test("list index out of bounds is E406", () => {
        const xs = list([number(1)]);
        expect(codeOf(() => indexValue(xs, number(1)))).toBe("E406");
        expect(codeOf(() => indexValue(xs, number(-1)))).toBe("E406");
        expect(indexValue(xs, number(0))).toEqual(number(1));
    });

    test("missing table key is E407 and lists available keys", () => {
        const t = table([["a", number(1)], ["b", number(2)]]);
        try {
            t.value.get("c");
            throw new Error("expected failure");
        } catch (e) {
            expect(e).toBeInstanceOf(StepsError);
            if (!(e instanceof StepsError)) return;
            expect(e.code).toBe("E407");
            expect(e.message).toBe('Key "c" not found in table.');
            expect(e.hint).toBe('Available keys: "a", "b"');
        }
    });

    test("table keys keep insertion order", () => {
        const t = table();
        t.value.set("z", number(1));
        t.value.set("a", number(2));
        t.value.set("z", number(3));
        expect(t.value.keys()).toEqual(["z", "a"]);
        expect(displayString(t)).toBe('["z": 3, "a": 2]');
    });

    test("structural equality", () => {
        expect(valuesEqual(list([number(1)]), list([number(1)]))).toBe(true);
        expect(valuesEqual(number(1), text("1"))).toBe(false);
        expect(
            valuesEqual(
                table([["a", number(1)], ["b", number(2)]]),
                table([["b", number(2)], ["a", number(1)]]),
            ),
        ).toBe(true);
    });

    test("text operations", () => {
        expect(addedTo(text("n = "), number(5))).toEqual(text("n = 5"));
        expect(displayString(splitBy(text("a,b,c"), text(",")))).toBe('["a", "b", "c"]');
        expect(lengthOf(text("héllo"))).toEqual(number(5));
        expect(characterAt(number(1), text("abc"))).toEqual(text("b"));
        expect(codeOf(() => characterAt(number(3), text("abc")))).toBe("E406");
        expect(contains(text("hello"), text("ell"))).toEqual(boolean(true));
        expect(contains(list([number(2)]), number(2))).toEqual(boolean(true));
        expect(isIn(text("a"), table([["a", NOTHING]]))).toEqual(boolean(true));
    });

    test("describeValue truncates long containers", () => {
        const long = list([1, 2, 3, 4, 5, 6].map(number));
        expect(describeValue(long)).toBe("[1, 2, 3, ... (6 items)]");
        expect(describeValue(list([number(1), number(2)]))).toBe("[1, 2]");
        const wide = table([
            ["a", number(1)],
            ["b", text("x")],
            ["c", number(3)],
            ["d", number(4)],
        ]);
        expect(describeValue(wide)).toBe('["a": 1, "b": "x", ... (4 entries)]');
        expect(describeValue(text("hi"))).toBe('"hi"');
    });
});
