export * from "./errors";
export * from "./cycle-array";
export * from "./cycle-store";
export * from "./table-loader";
export * from "./specification-store";
export * from "./spec-document";
export * from "./bound-interpolator";
export * from "./step-validator";
export * from "./range-tuner";
export * from "./quality-aggregator";
export * from "./contralateral-offset";
export * from "./variable-naming";
export * from "./validation-run";
export { percentileOfSorted } from "./statistics";
