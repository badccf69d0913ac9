export * from "./BuildingNode";
export * from "./FloorNode";
export * from "./StepNode";
