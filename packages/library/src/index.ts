import { files } from "./packages/files";
import { random } from "./packages/random";
import { strings } from "./packages/strings";
import { NativeFunction } from "./types";

export * from "./types";
export * from "./errors";
export * from "./values";
export { describeValue } from "./utils/describe";
export { native, expectArg } from "./utils/native";
export { parseCsv } from "./packages/files";

export const packages = { files, random, strings };

/** Every native function callable from Steps code, by name. */
export const natives: Record<string, NativeFunction> = {
    ...random,
    ...files,
    ...strings,
};
