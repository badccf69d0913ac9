export { StepsList, StepsTable } from "./containers";
export { valuesEqual } from "./equality";
export * from "./core";
export * from "./operations";
