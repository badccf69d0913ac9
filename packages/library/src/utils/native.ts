import { ErrorCode, StepsTypeError } from "../errors";
import {
    FunctionSignature,
    NativeFunction,
    NativeImplementation,
    StepsValue,
    ValueOf,
    ValueType,
} from "../types";

/**
 * Define a native function with signature
 * @param fn Implementation
 * @param signature Signature metadata
 */
export function native(
    fn: NativeImplementation,
    signature: FunctionSignature,
): NativeFunction {
    return Object.assign(fn, { signature });
}

/**
 * Narrows a native argument to `type`, failing with a usage hint.
 */
export function expectArg<T extends ValueType>(
    value: StepsValue,
    type: T,
    fn: string,
    usage: string,
): ValueOf<T> {
    if (isOfType(value, type)) return value;
    throw new StepsTypeError({
        code: ErrorCode.InvalidOperation,
        message: `${fn} requires a ${type}, got ${value.type}.`,
        hint: `Use: ${usage}`,
    });
}

function isOfType<T extends ValueType>(
    value: StepsValue,
    type: T,
): value is ValueOf<T> {
    return value.type === type;
}
