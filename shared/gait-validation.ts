import { z } from "zod";

export const RangeBound = z.object({
  min: z.number(),
  max: z.number(),
});

export type TRangeBound = z.infer<typeof RangeBound>;

export const RangeCheckpoint = z.object({
  phase_percent: z.number().min(0).max(100),
  min: z.number(),
  max: z.number(),
});

export type TRangeCheckpoint = z.infer<typeof RangeCheckpoint>;

export const PhaseVariableRanges = z.record(z.string().min(1), RangeBound);

export type TPhaseVariableRanges = z.infer<typeof PhaseVariableRanges>;

/**
 * On-disk range document, phase-major:
 * tasks -> phases ("0", "25", ...) -> variable -> { min, max }.
 */
export const RangeSpecificationDocument = z.object({
  version: z.string().default("1.0"),
  generated: z.string().optional(),
  source: z.string().optional(),
  method: z.string().optional(),
  tasks: z.record(
    z.string().min(1),
    z.object({
      phases: z.record(z.string(), PhaseVariableRanges),
    }),
  ),
});

export type TRangeSpecificationDocument = z.infer<typeof RangeSpecificationDocument>;

export const FailureRecord = z.object({
  subject: z.string(),
  task: z.string(),
  cycle_index: z.number().int().nonnegative(),
  variable: z.string(),
  phase_index: z.number().int().nonnegative(),
  phase_percent: z.number().min(0).max(100),
  value: z.number(),
  min: z.number(),
  max: z.number(),
});

export type TFailureRecord = z.infer<typeof FailureRecord>;

export const VariableQuality = z.object({
  failure_count: z.number().int().nonnegative(),
  failed_cycles: z.number().int().nonnegative(),
  failed_cycle_fraction: z.number().min(0).max(1),
});

export type TVariableQuality = z.infer<typeof VariableQuality>;

export const TaskQuality = VariableQuality.extend({
  cycles: z.number().int().nonnegative(),
  by_variable: z.record(z.string(), VariableQuality),
});

export type TTaskQuality = z.infer<typeof TaskQuality>;

export const ValidationSummary = z.object({
  total_cycles: z.number().int().nonnegative(),
  valid_cycles: z.number().int().nonnegative(),
  failed_cycles: z.number().int().nonnegative(),
  failure_count: z.number().int().nonnegative(),
  quality_score: z.number().min(0).max(1),
  cycles_by_task: z.record(z.string(), z.number().int().nonnegative()),
  by_task: z.record(z.string(), TaskQuality),
  by_variable: z.record(z.string(), VariableQuality),
});

export type TValidationSummary = z.infer<typeof ValidationSummary>;

export const StructuralErrorKind = z.enum([
  "non_numeric",
  "variable_count_mismatch",
  "shape_mismatch",
  "missing_column",
]);

export type TStructuralErrorKind = z.infer<typeof StructuralErrorKind>;

export const UnprocessableUnit = z.object({
  subject: z.string(),
  task: z.string(),
  kind: StructuralErrorKind,
  reason: z.string(),
  variable: z.string().optional(),
});

export type TUnprocessableUnit = z.infer<typeof UnprocessableUnit>;

export const MalformedCycleRun = z.object({
  subject: z.string(),
  task: z.string(),
  start_row: z.number().int().nonnegative(),
  length: z.number().int().nonnegative(),
});

export type TMalformedCycleRun = z.infer<typeof MalformedCycleRun>;

export const UnconstrainedVariable = z.object({
  task: z.string(),
  variable: z.string(),
});

export const ValidationCoverage = z.object({
  evaluated_samples: z.number().int().nonnegative(),
  constrained_samples: z.number().int().nonnegative(),
  skipped_samples: z.number().int().nonnegative(),
  unconstrained: z.array(UnconstrainedVariable),
});

export type TValidationCoverage = z.infer<typeof ValidationCoverage>;

export const ValidationRunResult = z.object({
  kind: z.literal("gait_validation_run"),
  spec_generation: z.number().int().nonnegative(),
  spec_hash: z.string().min(8),
  points_per_cycle: z.number().int().min(2),
  summary: ValidationSummary,
  failures: z.array(FailureRecord),
  coverage: ValidationCoverage,
  variable_pass_rate: z.number().min(0).max(1),
  quality_gate: z.object({
    threshold: z.number().min(0).max(1),
    passed: z.boolean(),
  }),
  anomalies: z.object({
    malformed_cycles: z.array(MalformedCycleRun),
    unprocessable_units: z.array(UnprocessableUnit),
  }),
  unconfigured_tasks: z.array(z.string()),
});

export type TValidationRunResult = z.infer<typeof ValidationRunResult>;

export const TuningMethod = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("percentile"),
    low: z.number(),
    high: z.number(),
  }),
  z.object({
    kind: z.literal("std_dev"),
    k: z.number(),
  }),
  z.object({
    kind: z.literal("iqr"),
    multiplier: z.number(),
  }),
]);

export type TTuningMethod = z.infer<typeof TuningMethod>;

export const TunedCheckpoint = RangeCheckpoint.extend({
  sample_count: z.number().int().nonnegative(),
});

export type TTunedCheckpoint = z.infer<typeof TunedCheckpoint>;

export const TuningCandidate = z.object({
  kind: z.literal("gait_range_candidate"),
  task: z.string().optional(),
  method: TuningMethod,
  phase_step: z.number().positive().max(100),
  reference_cycles: z.number().int().nonnegative(),
  variables: z.record(z.string(), z.array(TunedCheckpoint)),
  skipped_variables: z.array(z.string()),
});

export type TTuningCandidate = z.infer<typeof TuningCandidate>;
