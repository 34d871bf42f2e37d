import type { TRangeCheckpoint } from "@shared/gait-validation";
import type { RangeSpecification, TaskRangeSpecification, VariableCheckpoints } from "./specification-store";
import { oppositeSideVariable, parseVariableName } from "./variable-naming";

// Cyclic tasks where the contralateral limb runs half a cycle out of phase.
export const GAIT_TASK_PATTERNS = [
  "level_walking",
  "incline_walking",
  "decline_walking",
  "stair_ascent",
  "stair_descent",
  "running",
  "sprinting",
] as const;

export const isGaitTask = (task: string): boolean => {
  const lowered = task.toLowerCase();
  return GAIT_TASK_PATTERNS.some((pattern) => lowered.includes(pattern));
};

const isIpsilateral = (variable: string): boolean => {
  const parsed = parseVariableName(variable);
  return parsed ? parsed.side === "ipsi" : variable.includes("_ipsi");
};

/**
 * Rotate checkpoints by `offset` percent around the cycle. A checkpoint at
 * 100 duplicating one at 0 is folded away before the shift and restored after.
 */
export function shiftCheckpoints(checkpoints: readonly TRangeCheckpoint[], offset = 50): TRangeCheckpoint[] {
  const hasStart = checkpoints.some((checkpoint) => checkpoint.phase_percent === 0);
  const hasEnd = checkpoints.some((checkpoint) => checkpoint.phase_percent === 100);
  const source = hasStart ? checkpoints.filter((checkpoint) => checkpoint.phase_percent !== 100) : checkpoints;
  const normalizedOffset = ((offset % 100) + 100) % 100;
  const shifted = source
    .map((checkpoint) => ({
      phase_percent: (checkpoint.phase_percent + normalizedOffset) % 100,
      min: checkpoint.min,
      max: checkpoint.max,
    }))
    .sort((a, b) => a.phase_percent - b.phase_percent);
  const start = shifted.find((checkpoint) => checkpoint.phase_percent === 0);
  if (hasStart && hasEnd && start) {
    shifted.push({ ...start, phase_percent: 100 });
  }
  return shifted;
}

/**
 * For gait tasks, derive each unconfigured `_contra` variable from its
 * `_ipsi` counterpart shifted by half a cycle. Other tasks pass through.
 */
export function applyContralateralOffset(ranges: RangeSpecification): RangeSpecification {
  const out: Record<string, TaskRangeSpecification> = {};
  for (const [task, variables] of Object.entries(ranges)) {
    if (!isGaitTask(task)) {
      out[task] = variables;
      continue;
    }
    const merged: Record<string, VariableCheckpoints> = { ...variables };
    for (const [variable, checkpoints] of Object.entries(variables)) {
      if (!isIpsilateral(variable)) continue;
      const contra = oppositeSideVariable(variable);
      if (!contra || Object.prototype.hasOwnProperty.call(variables, contra)) continue;
      merged[contra] = shiftCheckpoints(checkpoints);
    }
    out[task] = merged;
  }
  return out;
}
