export * from "./codes";
export * from "./location";
export * from "./StepsError";
export * from "./helpers";
