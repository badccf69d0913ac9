export interface Breakpoint {
    file: string;
    line: number;
    enabled: boolean;
}

function keyOf(file: string, line: number): string {
    return `${file}:${line}`;
}

export class BreakpointSet {
    private breakpoints: Map<string, Breakpoint> = new Map();

    public add(file: string, line: number): Breakpoint {
        const key = keyOf(file, line);
        const existing = this.breakpoints.get(key);
        if (existing) {
            existing.enabled = true;
            return existing;
        }
        const breakpoint = { file, line, enabled: true };
        this.breakpoints.set(key, breakpoint);
        return breakpoint;
    }

    public remove(file: string, line: number): boolean {
        return this.breakpoints.delete(keyOf(file, line));
    }

    /** Adds the breakpoint, or removes it if present. Returns whether it now exists. */
    public toggle(file: string, line: number): boolean {
        if (this.remove(file, line)) return false;
        this.add(file, line);
        return true;
    }

    public setEnabled(file: string, line: number, enabled: boolean): void {
        const breakpoint = this.breakpoints.get(keyOf(file, line));
        if (breakpoint) breakpoint.enabled = enabled;
    }

    /** True only for an enabled breakpoint at (file, line). */
    public has(file: string, line: number): boolean {
        return this.breakpoints.get(keyOf(file, line))?.enabled ?? false;
    }

    public clear(): void {
        this.breakpoints.clear();
    }

    public list(): Breakpoint[] {
        return [...this.breakpoints.values()];
    }

    public get size(): number {
        return this.breakpoints.size;
    }
}
