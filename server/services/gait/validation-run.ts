import type {
  TFailureRecord,
  TMalformedCycleRun,
  TUnprocessableUnit,
  TValidationCoverage,
  TValidationRunResult,
} from "@shared/gait-validation";
import { GAIT_CONFIG } from "../../config/gait";
import { metrics } from "../../metrics";
import { appendValidationLog } from "../observability/validation-log-store";
import { applyContralateralOffset } from "./contralateral-offset";
import type { CycleStore, CycleUnit } from "./cycle-store";
import { InvalidParameterError, StructuralError } from "./errors";
import { aggregateQuality, mergeSummaries } from "./quality-aggregator";
import { SpecificationStore, type SpecificationSnapshot } from "./specification-store";
import { validateCycleArray, type SpecificationView, type StepValidationResult } from "./step-validator";

export type ValidationRunOptions = {
  tasks?: readonly string[];
  subjects?: readonly string[];
  ignoreVariables?: readonly string[];
  /** Derive missing `_contra` ranges from `_ipsi` ones for gait tasks. */
  mirrorContralateral?: boolean;
  /** Advisory threshold on the quality score; defaults to GAIT_QUALITY_GATE. */
  qualityGate?: number;
};

export type UnitOutcome =
  | {
      status: "validated";
      unit: CycleUnit;
      step: StepValidationResult;
      malformed: TMalformedCycleRun[];
    }
  | {
      status: "unprocessable";
      unit: CycleUnit;
      issue: TUnprocessableUnit;
    };

/**
 * Extract and validate one (subject, task). Units are independent, so
 * callers may fan these out and merge the results.
 */
export function validateUnit(
  cycles: CycleStore,
  spec: SpecificationView,
  unit: CycleUnit,
  options: Pick<ValidationRunOptions, "ignoreVariables"> = {},
): UnitOutcome {
  try {
    const extraction = cycles.extract(unit.subject, unit.task);
    const step = validateCycleArray(extraction.array, spec, {
      subject: unit.subject,
      task: unit.task,
      pointsPerCycle: cycles.pointsPerCycle,
      ignoreVariables: options.ignoreVariables,
    });
    return { status: "validated", unit, step, malformed: extraction.malformed };
  } catch (error) {
    if (!(error instanceof StructuralError)) throw error;
    return {
      status: "unprocessable",
      unit,
      issue: {
        subject: unit.subject,
        task: unit.task,
        kind: error.kind,
        reason: error.reason,
        ...(error.context.variable !== undefined ? { variable: error.context.variable } : {}),
      },
    };
  }
}

const resolveQualityGate = (value: number | undefined): number => {
  const threshold = value ?? GAIT_CONFIG.qualityGate;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidParameterError("qualityGate", `must lie in [0, 1], got ${threshold}`);
  }
  return threshold;
};

const variablePassRate = (coverage: TValidationCoverage, failureCount: number): number => {
  const checked = coverage.constrained_samples - coverage.skipped_samples;
  return checked > 0 ? Math.max(0, 1 - failureCount / checked) : 1;
};

const sortUnconstrained = (entries: TValidationCoverage["unconstrained"]): TValidationCoverage["unconstrained"] => {
  const seen = new Map<string, { task: string; variable: string }>();
  for (const entry of entries) seen.set(`${entry.task}\u0000${entry.variable}`, entry);
  return Array.from(seen.values()).sort(
    (a, b) => a.task.localeCompare(b.task) || a.variable.localeCompare(b.variable),
  );
};

const logUnitOutcome = (outcome: UnitOutcome, generation: number): void => {
  const { subject, task } = outcome.unit;
  if (outcome.status === "unprocessable") {
    metrics.recordStructuralAnomaly(outcome.issue.kind);
    appendValidationLog({
      type: "unit_unprocessable",
      subject,
      task,
      variable: outcome.issue.variable,
      generation,
      detail: { kind: outcome.issue.kind, reason: outcome.issue.reason },
    });
    return;
  }
  const { step, malformed } = outcome;
  metrics.recordCycles(step.validCycles, step.cycles - step.validCycles);
  metrics.recordRangeFailures(step.failures.length);
  if (malformed.length > 0) {
    metrics.recordStructuralAnomaly("malformed_cycle", malformed.length);
    appendValidationLog({
      type: "malformed_cycles",
      subject,
      task,
      generation,
      detail: { runs: malformed.length, lengths: malformed.map((run) => run.length) },
    });
  }
  if (step.unconstrainedVariables.length > 0) {
    appendValidationLog({
      type: "reduced_coverage",
      subject,
      task,
      generation,
      detail: { unconstrained: step.unconstrainedVariables },
    });
  }
  appendValidationLog({
    type: "unit_validated",
    subject,
    task,
    generation,
    detail: { cycles: step.cycles, valid: step.validCycles, failures: step.failures.length },
  });
};

/**
 * Validate every configured (subject, task) in the store against one
 * specification snapshot. A store argument is read once, at the start, so a
 * concurrent `replace` does not affect this run.
 */
export function runValidation(
  cycles: CycleStore,
  spec: SpecificationStore | SpecificationSnapshot,
  options: ValidationRunOptions = {},
): TValidationRunResult {
  const snapshot = spec instanceof SpecificationStore ? spec.snapshot() : spec;
  const qualityGate = resolveQualityGate(options.qualityGate);
  const view: SpecificationView = options.mirrorContralateral
    ? { ranges: applyContralateralOffset(snapshot.ranges) }
    : snapshot;

  for (const variable of cycles.nonstandardVariables()) {
    appendValidationLog({ type: "nonstandard_variable", variable, generation: snapshot.generation });
  }

  const taskFilter = options.tasks ? new Set(options.tasks) : null;
  const subjectFilter = options.subjects ? new Set(options.subjects) : null;
  const units = cycles
    .units()
    .filter((unit) => (!taskFilter || taskFilter.has(unit.task)) && (!subjectFilter || subjectFilter.has(unit.subject)));

  const configured = (task: string): boolean => Object.prototype.hasOwnProperty.call(view.ranges, task);
  const unconfiguredTasks = Array.from(new Set(units.filter((unit) => !configured(unit.task)).map((unit) => unit.task))).sort();

  const failures: TFailureRecord[] = [];
  const cyclesByTask: Record<string, number> = {};
  const malformedCycles: TMalformedCycleRun[] = [];
  const unprocessableUnits: TUnprocessableUnit[] = [];
  const coverage: TValidationCoverage = {
    evaluated_samples: 0,
    constrained_samples: 0,
    skipped_samples: 0,
    unconstrained: [],
  };
  let totalCycles = 0;

  for (const unit of units) {
    if (!configured(unit.task)) continue;
    const outcome = validateUnit(cycles, view, unit, { ignoreVariables: options.ignoreVariables });
    logUnitOutcome(outcome, snapshot.generation);
    if (outcome.status === "unprocessable") {
      unprocessableUnits.push(outcome.issue);
      continue;
    }
    const { step } = outcome;
    totalCycles += step.cycles;
    cyclesByTask[unit.task] = (cyclesByTask[unit.task] ?? 0) + step.cycles;
    failures.push(...step.failures);
    malformedCycles.push(...outcome.malformed);
    coverage.evaluated_samples += step.evaluatedSamples;
    coverage.constrained_samples += step.constrainedSamples;
    coverage.skipped_samples += step.skippedSamples;
    for (const variable of step.unconstrainedVariables) {
      coverage.unconstrained.push({ task: unit.task, variable });
    }
  }
  coverage.unconstrained = sortUnconstrained(coverage.unconstrained);

  const summary = aggregateQuality(totalCycles, failures, cyclesByTask);
  return {
    kind: "gait_validation_run",
    spec_generation: snapshot.generation,
    spec_hash: snapshot.hash,
    points_per_cycle: cycles.pointsPerCycle,
    summary,
    failures,
    coverage,
    variable_pass_rate: variablePassRate(coverage, summary.failure_count),
    quality_gate: { threshold: qualityGate, passed: summary.quality_score >= qualityGate },
    anomalies: {
      malformed_cycles: malformedCycles,
      unprocessable_units: unprocessableUnits,
    },
    unconfigured_tasks: unconfiguredTasks,
  };
}

/** Combine runs over disjoint units that used the same specification snapshot. */
export function mergeRunResults(a: TValidationRunResult, b: TValidationRunResult): TValidationRunResult {
  if (a.spec_hash !== b.spec_hash) {
    throw new InvalidParameterError("spec_hash", "runs used different specification snapshots");
  }
  if (a.points_per_cycle !== b.points_per_cycle) {
    throw new InvalidParameterError("points_per_cycle", `${a.points_per_cycle} vs ${b.points_per_cycle}`);
  }
  const summary = mergeSummaries(a.summary, b.summary);
  const coverage: TValidationCoverage = {
    evaluated_samples: a.coverage.evaluated_samples + b.coverage.evaluated_samples,
    constrained_samples: a.coverage.constrained_samples + b.coverage.constrained_samples,
    skipped_samples: a.coverage.skipped_samples + b.coverage.skipped_samples,
    unconstrained: sortUnconstrained([...a.coverage.unconstrained, ...b.coverage.unconstrained]),
  };
  const threshold = a.quality_gate.threshold;
  return {
    kind: "gait_validation_run",
    spec_generation: a.spec_generation,
    spec_hash: a.spec_hash,
    points_per_cycle: a.points_per_cycle,
    summary,
    failures: [...a.failures, ...b.failures],
    coverage,
    variable_pass_rate: variablePassRate(coverage, summary.failure_count),
    quality_gate: { threshold, passed: summary.quality_score >= threshold },
    anomalies: {
      malformed_cycles: [...a.anomalies.malformed_cycles, ...b.anomalies.malformed_cycles],
      unprocessable_units: [...a.anomalies.unprocessable_units, ...b.anomalies.unprocessable_units],
    },
    unconfigured_tasks: Array.from(new Set([...a.unconfigured_tasks, ...b.unconfigured_tasks])).sort(),
  };
}
