import type { TRangeCheckpoint } from "@shared/gait-validation";
import { phasePercentForIndex } from "./cycle-array";
import { InvalidParameterError } from "./errors";

export type InterpolatedBounds =
  | { kind: "bounded"; min: number; max: number }
  | { kind: "unconstrained" };

export const UNCONSTRAINED: InterpolatedBounds = Object.freeze({ kind: "unconstrained" });

const lerp = (a: number, b: number, t: number): number => a + (b - a) * t;

/**
 * Bounds at `phasePercent` from checkpoints ordered by phase. Linear between
 * the bracketing pair; clamped to the first/last checkpoint outside them.
 */
export function interpolateBounds(
  checkpoints: readonly TRangeCheckpoint[] | undefined,
  phasePercent: number,
): InterpolatedBounds {
  if (Number.isNaN(phasePercent)) {
    throw new InvalidParameterError("phasePercent", "must be a number, got NaN");
  }
  if (!checkpoints || checkpoints.length === 0) return UNCONSTRAINED;
  const first = checkpoints[0];
  if (checkpoints.length === 1 || phasePercent <= first.phase_percent) {
    return { kind: "bounded", min: first.min, max: first.max };
  }
  const last = checkpoints[checkpoints.length - 1];
  if (phasePercent >= last.phase_percent) {
    return { kind: "bounded", min: last.min, max: last.max };
  }

  let lo = 0;
  let hi = checkpoints.length - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (checkpoints[mid].phase_percent <= phasePercent) {
      lo = mid;
    } else {
      hi = mid;
    }
  }
  const left = checkpoints[lo];
  const right = checkpoints[hi];
  const t = (phasePercent - left.phase_percent) / (right.phase_percent - left.phase_percent);
  return {
    kind: "bounded",
    min: lerp(left.min, right.min, t),
    max: lerp(left.max, right.max, t),
  };
}

export type BoundsCurve = {
  min: Float64Array;
  max: Float64Array;
};

/** Bounds at every phase sample of a P-point cycle, or null when unconstrained. */
export function sampleBoundsCurve(
  checkpoints: readonly TRangeCheckpoint[] | undefined,
  pointsPerCycle: number,
): BoundsCurve | null {
  if (!checkpoints || checkpoints.length === 0) return null;
  const min = new Float64Array(pointsPerCycle);
  const max = new Float64Array(pointsPerCycle);
  for (let p = 0; p < pointsPerCycle; p++) {
    const bounds = interpolateBounds(checkpoints, phasePercentForIndex(p, pointsPerCycle));
    if (bounds.kind === "bounded") {
      min[p] = bounds.min;
      max[p] = bounds.max;
    }
  }
  return { min, max };
}
