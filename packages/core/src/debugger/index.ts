export * from "./DebugState";
export * from "./BreakpointSet";
export * from "./Snapshot";
export * from "./Debugger";
