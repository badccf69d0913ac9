import { ErrorCode, makeError } from "../errors";
import { StepsValue } from "../types";
import { valuesEqual } from "./equality";

/**
 * Mutable list handle. Every variable holding the same `StepsList`
 * observes the same contents.
 */
export class StepsList implements Iterable<StepsValue> {
    private readonly items: StepsValue[];

    constructor(items: StepsValue[] = []) {
        this.items = items;
    }

    public get length(): number {
        return this.items.length;
    }

    public get(index: number): StepsValue {
        return this.items[this.checkIndex(index)];
    }

    public set(index: number, value: StepsValue): void {
        this.items[this.checkIndex(index)] = value;
    }

    public add(value: StepsValue): void {
        this.items.push(value);
    }

    /**
     * Removes the first element equal to `value`.
     * @returns whether an element was removed
     */
    public remove(value: StepsValue): boolean {
        const index = this.items.findIndex((item) => valuesEqual(item, value));
        if (index === -1) return false;
        this.items.splice(index, 1);
        return true;
    }

    public contains(value: StepsValue): boolean {
        return this.items.some((item) => valuesEqual(item, value));
    }

    public toArray(): StepsValue[] {
        return [...this.items];
    }

    public [Symbol.iterator](): Iterator<StepsValue> {
        return this.items[Symbol.iterator]();
    }

    private checkIndex(index: number): number {
        const i = Math.trunc(index);
        if (!Number.isFinite(index) || i < 0 || i >= this.items.length) {
            throw makeError(
                ErrorCode.IndexOutOfBounds,
                {
                    index,
                    container: "list",
                    length: this.items.length,
                    max: this.items.length - 1,
                },
                undefined,
                this.items.length === 0 ? "The list is empty." : undefined,
            );
        }
        return i;
    }
}

/**
 * Mutable string-keyed table handle.
 */
export class StepsTable {
    private readonly entries: Map<string, StepsValue>;

    constructor(entries?: Iterable<[string, StepsValue]>) {
        this.entries = new Map(entries ?? []);
    }

    public get length(): number {
        return this.entries.size;
    }

    public get(key: string): StepsValue {
        const value = this.entries.get(key);
        if (value === undefined) {
            const available = this.keys()
                .map((k) => `"${k}"`)
                .join(", ");
            throw makeError(ErrorCode.KeyNotFound, {
                key,
                available: available || "(none)",
            });
        }
        return value;
    }

    public set(key: string, value: StepsValue): void {
        this.entries.set(key, value);
    }

    public hasKey(key: string): boolean {
        return this.entries.has(key);
    }

    public keys(): string[] {
        return [...this.entries.keys()];
    }

    public pairs(): [string, StepsValue][] {
        return [...this.entries.entries()];
    }
}
