import { Counter, Gauge, Registry } from "prom-client";

const registry = new Registry();

const cyclesValidatedTotal = new Counter({
  name: "gait_cycles_validated_total",
  help: "Gait cycles run through range validation",
  labelNames: ["status"],
  registers: [registry],
});

const rangeFailuresTotal = new Counter({
  name: "gait_range_failures_total",
  help: "Samples found outside their interpolated range",
  registers: [registry],
});

const structuralAnomaliesTotal = new Counter({
  name: "gait_structural_anomalies_total",
  help: "Malformed cycles and unprocessable (subject, task) units",
  labelNames: ["kind"],
  registers: [registry],
});

const specGeneration = new Gauge({
  name: "gait_spec_generation",
  help: "Generation of the most recently published range specification",
  registers: [registry],
});

export type StructuralAnomalyKind =
  | "malformed_cycle"
  | "non_numeric"
  | "variable_count_mismatch"
  | "shape_mismatch"
  | "missing_column";

export const metrics = {
  recordCycles(valid: number, failed: number): void {
    if (valid > 0) cyclesValidatedTotal.inc({ status: "valid" }, valid);
    if (failed > 0) cyclesValidatedTotal.inc({ status: "failed" }, failed);
  },
  recordRangeFailures(count: number): void {
    if (count > 0) rangeFailuresTotal.inc(count);
  },
  recordStructuralAnomaly(kind: StructuralAnomalyKind, count = 1): void {
    if (count > 0) structuralAnomaliesTotal.inc({ kind }, count);
  },
  setSpecGeneration(generation: number): void {
    specGeneration.set(generation);
  },
};

export const getMetricsText = (): Promise<string> => registry.metrics();

export const __resetMetrics = (): void => {
  registry.resetMetrics();
};
