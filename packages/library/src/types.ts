import type { StepsList, StepsTable } from "./values/containers";

export type ValueType =
    | "number"
    | "text"
    | "boolean"
    | "list"
    | "table"
    | "nothing";

export type StepsValue =
    | { type: "number"; value: number }
    | { type: "text"; value: string }
    | { type: "boolean"; value: boolean }
    | { type: "list"; value: StepsList }
    | { type: "table"; value: StepsTable }
    | { type: "nothing"; value: null };

export type ValueOf<T extends ValueType> = Extract<StepsValue, { type: T }>;

export interface FunctionSignature {
    params: { name: string; type: ValueType | "any"; description?: string }[];
    returnType: ValueType | "any";
    description?: string;
}

export type NativeImplementation = (
    ...args: StepsValue[]
) => StepsValue | Promise<StepsValue>;

export type NativeFunction = NativeImplementation & {
    signature: FunctionSignature;
};
