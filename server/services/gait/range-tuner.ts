import type {
  TRangeCheckpoint,
  TTunedCheckpoint,
  TTuningCandidate,
  TTuningMethod,
} from "@shared/gait-validation";
import { GAIT_CONFIG } from "../../config/gait";
import { appendValidationLog } from "../observability/validation-log-store";
import { concatCycleArrays, phaseColumn, phaseIndexForPercent, type CycleArray } from "./cycle-array";
import type { CycleStore } from "./cycle-store";
import { InvalidParameterError, StructuralError } from "./errors";
import { assertValidCheckpoints, type SpecificationSnapshot, type SpecificationStore } from "./specification-store";
import { finiteSorted, mean, percentileOfSorted, standardDeviation } from "./statistics";
import { validateCycleArray } from "./step-validator";

export type RangeTuningOptions = {
  /** Spacing of tuned checkpoints in percent of the cycle. */
  phaseStep?: number;
  variables?: readonly string[];
};

export function assertTuningMethod(method: TTuningMethod): void {
  switch (method.kind) {
    case "percentile": {
      const { low, high } = method;
      if (!Number.isFinite(low) || low <= 0 || low >= 100) {
        throw new InvalidParameterError("percentile_low", `must lie strictly between 0 and 100, got ${low}`);
      }
      if (!Number.isFinite(high) || high <= 0 || high >= 100) {
        throw new InvalidParameterError("percentile_high", `must lie strictly between 0 and 100, got ${high}`);
      }
      if (low >= high) {
        throw new InvalidParameterError("percentile_low", `must be below percentile_high (${low} >= ${high})`);
      }
      return;
    }
    case "std_dev":
      if (!Number.isFinite(method.k) || method.k <= 0) {
        throw new InvalidParameterError("k", `must be a positive number, got ${method.k}`);
      }
      return;
    case "iqr":
      if (!Number.isFinite(method.multiplier) || method.multiplier < 0) {
        throw new InvalidParameterError("multiplier", `must be a non-negative number, got ${method.multiplier}`);
      }
      return;
  }
}

/** 0, step, 2·step, … and always 100. */
export function tuningPhases(step: number): number[] {
  if (!Number.isFinite(step) || step <= 0 || step > 100) {
    throw new InvalidParameterError("phase_step", `must lie in (0, 100], got ${step}`);
  }
  const count = Math.floor(100 / step + 1e-9);
  const phases = Array.from({ length: count + 1 }, (_, k) => Math.round(k * step * 1e6) / 1e6);
  if (phases[phases.length - 1] < 100) phases.push(100);
  return phases;
}

const boundsFor = (method: TTuningMethod, sorted: readonly number[]): { min: number; max: number } => {
  switch (method.kind) {
    case "percentile":
      return { min: percentileOfSorted(sorted, method.low), max: percentileOfSorted(sorted, method.high) };
    case "std_dev": {
      const mu = mean(sorted);
      const sigma = standardDeviation(sorted);
      return { min: mu - method.k * sigma, max: mu + method.k * sigma };
    }
    case "iqr": {
      const q1 = percentileOfSorted(sorted, 25);
      const q3 = percentileOfSorted(sorted, 75);
      const spread = q3 - q1;
      return { min: q1 - method.multiplier * spread, max: q3 + method.multiplier * spread };
    }
  }
};

/**
 * Candidate checkpoints from reference cycles: at each tuned phase, bounds
 * come from the distribution of that phase sample across every cycle.
 * Parameters are checked before any computation. Nothing is applied.
 */
export function tuneWithMethod(
  reference: CycleArray,
  method: TTuningMethod,
  options: RangeTuningOptions = {},
): TTuningCandidate {
  assertTuningMethod(method);
  const phaseStep = options.phaseStep ?? GAIT_CONFIG.tunePhaseStep;
  const phases = tuningPhases(phaseStep);
  const [cycles, points] = reference.shape;
  const requested = options.variables ?? reference.variables;

  const variables: Record<string, TTunedCheckpoint[]> = {};
  const skipped: string[] = [];
  for (const name of requested) {
    const v = reference.variables.indexOf(name);
    if (v < 0 || cycles === 0) {
      skipped.push(name);
      continue;
    }
    const checkpoints: TTunedCheckpoint[] = [];
    for (const phasePercent of phases) {
      const sorted = finiteSorted(phaseColumn(reference, phaseIndexForPercent(phasePercent, points), v));
      if (sorted.length === 0) continue;
      checkpoints.push({ phase_percent: phasePercent, ...boundsFor(method, sorted), sample_count: sorted.length });
    }
    if (checkpoints.length === 0) {
      skipped.push(name);
    } else {
      variables[name] = checkpoints;
    }
  }

  return {
    kind: "gait_range_candidate",
    method,
    phase_step: phaseStep,
    reference_cycles: cycles,
    variables,
    skipped_variables: skipped,
  };
}

export function tuneRanges(
  reference: CycleArray,
  percentileLow: number,
  percentileHigh: number,
  options: RangeTuningOptions = {},
): Record<string, TTunedCheckpoint[]> {
  return tuneWithMethod(reference, { kind: "percentile", low: percentileLow, high: percentileHigh }, options).variables;
}

/**
 * Pool every subject's cycles for `task` and tune over the pooled set.
 * Subjects whose data is structurally broken are left out and logged.
 */
export function tuneTask(
  store: CycleStore,
  task: string,
  method: TTuningMethod = {
    kind: "percentile",
    low: GAIT_CONFIG.tunePercentileLow,
    high: GAIT_CONFIG.tunePercentileHigh,
  },
  options: RangeTuningOptions = {},
): TTuningCandidate {
  assertTuningMethod(method);
  const variables = options.variables ?? store.signalVariables();
  const arrays: CycleArray[] = [];
  for (const unit of store.units()) {
    if (unit.task !== task) continue;
    try {
      arrays.push(store.extract(unit.subject, task, variables).array);
    } catch (error) {
      if (!(error instanceof StructuralError)) throw error;
      appendValidationLog({
        type: "unit_unprocessable",
        subject: unit.subject,
        task,
        variable: error.context.variable,
        detail: { kind: error.kind, reason: error.reason, stage: "tuning" },
      });
    }
  }
  const pooled = concatCycleArrays(arrays, store.pointsPerCycle);
  const candidate: TTuningCandidate = { ...tuneWithMethod(pooled, method, { ...options, variables }), task };
  appendValidationLog({
    type: "tuned",
    task,
    detail: {
      method: method.kind,
      reference_cycles: candidate.reference_cycles,
      variables: Object.keys(candidate.variables).length,
      skipped: candidate.skipped_variables.length,
    },
  });
  return candidate;
}

const stripSampleCounts = (checkpoints: readonly TTunedCheckpoint[]): TRangeCheckpoint[] =>
  checkpoints.map(({ phase_percent, min, max }) => ({ phase_percent, min, max }));

/**
 * Explicitly accept a candidate into the store. Every variable is checked
 * before the first replacement so a bad candidate changes nothing.
 */
export function applyTuningCandidate(
  spec: SpecificationStore,
  candidate: TTuningCandidate,
  task: string | undefined = candidate.task,
): SpecificationSnapshot {
  if (task === undefined) {
    throw new InvalidParameterError("task", "candidate names no task and none was given");
  }
  const entries = Object.entries(candidate.variables).map(
    ([variable, checkpoints]) => [variable, stripSampleCounts(checkpoints)] as const,
  );
  for (const [variable, checkpoints] of entries) {
    assertValidCheckpoints(checkpoints, { task, variable });
  }
  let snapshot = spec.snapshot();
  for (const [variable, checkpoints] of entries) {
    snapshot = spec.replace(task, variable, checkpoints);
  }
  return snapshot;
}

/**
 * Fraction of reference cycles each variable's ranges would fail. Variables
 * without ranges are left out.
 */
export function estimateFailureRate(
  reference: CycleArray,
  ranges: Readonly<Record<string, readonly TRangeCheckpoint[]>>,
): Record<string, number> {
  const task = "reference";
  for (const [variable, checkpoints] of Object.entries(ranges)) {
    assertValidCheckpoints(checkpoints, { task, variable });
  }
  const result = validateCycleArray(reference, { ranges: { [task]: ranges } }, { task });
  const failedByVariable = new Map<string, Set<number>>();
  for (const failure of result.failures) {
    const cyclesFailed = failedByVariable.get(failure.variable) ?? new Set<number>();
    cyclesFailed.add(failure.cycle_index);
    failedByVariable.set(failure.variable, cyclesFailed);
  }
  const rates: Record<string, number> = {};
  for (const variable of result.validatedVariables) {
    const failed = failedByVariable.get(variable)?.size ?? 0;
    rates[variable] = result.cycles > 0 ? failed / result.cycles : 0;
  }
  return rates;
}
