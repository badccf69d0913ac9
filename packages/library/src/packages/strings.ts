import { ErrorCode, StepsRuntimeError } from "../errors";
import { StepsValue } from "../types";
import { expectArg, native } from "../utils/native";
import { list, number, text } from "../values";

export const strings = {
    /**
     * Substring from `start` (inclusive) to `end` (exclusive)
     */
    slice: native(
        (source: StepsValue, start: StepsValue, end: StepsValue) => {
            const usage = 'call slice with "hello", 0, 2';
            const chars = [...expectArg(source, "text", "slice", usage).value];
            const from = Math.trunc(
                expectArg(start, "number", "slice", usage).value,
            );
            const to = Math.trunc(expectArg(end, "number", "slice", usage).value);
            if (from < 0 || to > chars.length || from > to) {
                throw new StepsRuntimeError({
                    code: ErrorCode.IndexOutOfBounds,
                    message: `slice range ${from} to ${to} is out of bounds for text of length ${chars.length}.`,
                    hint: `Use a start between 0 and ${chars.length} that is not after the end.`,
                });
            }
            return text(chars.slice(from, to).join(""));
        },
        {
            params: [
                { name: "text", type: "text" },
                { name: "start", type: "number" },
                { name: "end", type: "number" },
            ],
            returnType: "text",
            description: "Extract part of a text",
        },
    ),

    lowercase: native(
        (source: StepsValue) =>
            text(
                expectArg(source, "text", "lowercase", "call lowercase with name")
                    .value.toLowerCase(),
            ),
        {
            params: [{ name: "text", type: "text" }],
            returnType: "text",
        },
    ),

    uppercase: native(
        (source: StepsValue) =>
            text(
                expectArg(source, "text", "uppercase", "call uppercase with name")
                    .value.toUpperCase(),
            ),
        {
            params: [{ name: "text", type: "text" }],
            returnType: "text",
        },
    ),

    trim: native(
        (source: StepsValue) =>
            text(expectArg(source, "text", "trim", "call trim with name").value.trim()),
        {
            params: [{ name: "text", type: "text" }],
            returnType: "text",
            description: "Remove leading and trailing whitespace",
        },
    ),

    /**
     * Position of the first occurrence, or -1
     */
    index_of: native(
        (source: StepsValue, search: StepsValue) => {
            const usage = 'call index_of with name, "a"';
            const haystack = expectArg(source, "text", "index_of", usage).value;
            const needle = expectArg(search, "text", "index_of", usage).value;
            const unit = haystack.indexOf(needle);
            return number(unit === -1 ? -1 : [...haystack.slice(0, unit)].length);
        },
        {
            params: [
                { name: "text", type: "text" },
                { name: "search", type: "text" },
            ],
            returnType: "number",
        },
    ),

    /**
     * Replace every occurrence of `old` with `new`
     */
    replace: native(
        (source: StepsValue, from: StepsValue, to: StepsValue) => {
            const usage = 'call replace with sentence, "old", "new"';
            const value = expectArg(source, "text", "replace", usage).value;
            const search = expectArg(from, "text", "replace", usage).value;
            const replacement = expectArg(to, "text", "replace", usage).value;
            if (search === "") return text(value);
            return text(value.split(search).join(replacement));
        },
        {
            params: [
                { name: "text", type: "text" },
                { name: "old", type: "text" },
                { name: "new", type: "text" },
            ],
            returnType: "text",
        },
    ),

    characters: native(
        (source: StepsValue) => {
            const value = expectArg(
                source,
                "text",
                "characters",
                "call characters with name",
            ).value;
            return list([...value].map((ch) => text(ch)));
        },
        {
            params: [{ name: "text", type: "text" }],
            returnType: "list",
            description: "Split a text into a list of single characters",
        },
    ),
};
