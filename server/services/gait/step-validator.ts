import type { TFailureRecord } from "@shared/gait-validation";
import { sampleBoundsCurve, type BoundsCurve } from "./bound-interpolator";
import { phasePercentForIndex, type CycleArray } from "./cycle-array";
import { StructuralError } from "./errors";
import { lookupCheckpoints, type RangeSpecification } from "./specification-store";

/** Anything carrying ranges: a store snapshot or a derived view of one. */
export type SpecificationView = {
  readonly ranges: RangeSpecification;
};

export type StepValidationOptions = {
  task: string;
  subject?: string;
  /** Expected samples per cycle; a different array shape is a structural error. */
  pointsPerCycle?: number;
  ignoreVariables?: readonly string[];
};

export type StepValidationResult = {
  subject: string;
  task: string;
  cycles: number;
  validCycles: number;
  failedCycleIndices: number[];
  failures: TFailureRecord[];
  evaluatedSamples: number;
  constrainedSamples: number;
  skippedSamples: number;
  validatedVariables: string[];
  unconstrainedVariables: string[];
};

type VariablePlan = { kind: "ignored" } | { kind: "unconstrained" } | { kind: "bounded"; curve: BoundsCurve };

const assertShape = (array: CycleArray, options: StepValidationOptions): void => {
  const [cycles, points, nVars] = array.shape;
  const context = { subject: options.subject, task: options.task };
  if (nVars !== array.variables.length) {
    throw new StructuralError(
      "variable_count_mismatch",
      `array carries ${nVars} variables but ${array.variables.length} names`,
      context,
    );
  }
  if (array.data.length !== cycles * points * nVars) {
    throw new StructuralError(
      "shape_mismatch",
      `array holds ${array.data.length} values, expected ${cycles * points * nVars}`,
      context,
    );
  }
  if (options.pointsPerCycle !== undefined && points !== options.pointsPerCycle) {
    throw new StructuralError(
      "shape_mismatch",
      `cycles have ${points} samples, expected ${options.pointsPerCycle}`,
      context,
    );
  }
};

/**
 * Check every (cycle, phase, variable) sample against its interpolated
 * bounds, inclusive. Failures come back ordered by cycle, then phase, then
 * the array's variable order. Out-of-range samples never throw; only a
 * malformed array does. Non-finite samples are skipped, not failed.
 */
export function validateCycleArray(
  array: CycleArray,
  spec: SpecificationView,
  options: StepValidationOptions,
): StepValidationResult {
  assertShape(array, options);
  const [cycles, points, nVars] = array.shape;
  const subject = options.subject ?? "";
  const { task } = options;
  const ignored = new Set(options.ignoreVariables ?? []);

  const plans: VariablePlan[] = array.variables.map((name) => {
    if (ignored.has(name)) return { kind: "ignored" };
    const curve = sampleBoundsCurve(lookupCheckpoints(spec.ranges, task, name), points);
    return curve ? { kind: "bounded", curve } : { kind: "unconstrained" };
  });
  const phasePercents = Array.from({ length: points }, (_, p) => phasePercentForIndex(p, points));

  const failures: TFailureRecord[] = [];
  const failedCycleIndices: number[] = [];
  let evaluatedSamples = 0;
  let constrainedSamples = 0;
  let skippedSamples = 0;

  for (let c = 0; c < cycles; c++) {
    let cycleFailed = false;
    for (let p = 0; p < points; p++) {
      const base = (c * points + p) * nVars;
      for (let v = 0; v < nVars; v++) {
        const plan = plans[v];
        if (plan.kind === "ignored") continue;
        evaluatedSamples++;
        if (plan.kind === "unconstrained") continue;
        constrainedSamples++;
        const value = array.data[base + v];
        if (!Number.isFinite(value)) {
          skippedSamples++;
          continue;
        }
        const min = plan.curve.min[p];
        const max = plan.curve.max[p];
        if (value < min || value > max) {
          cycleFailed = true;
          failures.push({
            subject,
            task,
            cycle_index: c,
            variable: array.variables[v],
            phase_index: p,
            phase_percent: phasePercents[p],
            value,
            min,
            max,
          });
        }
      }
    }
    if (cycleFailed) failedCycleIndices.push(c);
  }

  return {
    subject,
    task,
    cycles,
    validCycles: cycles - failedCycleIndices.length,
    failedCycleIndices,
    failures,
    evaluatedSamples,
    constrainedSamples,
    skippedSamples,
    validatedVariables: array.variables.filter((_, v) => plans[v].kind === "bounded"),
    unconstrainedVariables: array.variables.filter((_, v) => plans[v].kind === "unconstrained"),
  };
}
