import { StructuralError } from "./errors";

/**
 * Row-major (cycle, phase, variable) block with its variable names.
 * `variables[v]` names the third axis; phase 0 is cycle start and
 * phase `shape[1] - 1` is cycle end.
 */
export type CycleArray = {
  data: Float64Array;
  shape: readonly [cycles: number, points: number, variables: number];
  variables: readonly string[];
};

export const phasePercentForIndex = (index: number, pointsPerCycle: number): number =>
  pointsPerCycle <= 1 ? 0 : (index * 100) / (pointsPerCycle - 1);

export const phaseIndexForPercent = (phasePercent: number, pointsPerCycle: number): number => {
  const clamped = Math.min(100, Math.max(0, phasePercent));
  return Math.round((clamped / 100) * (pointsPerCycle - 1));
};

export const cycleOffset = (array: CycleArray, cycle: number, phase: number, variable: number): number => {
  const [, points, variables] = array.shape;
  return (cycle * points + phase) * variables + variable;
};

export const cycleValue = (array: CycleArray, cycle: number, phase: number, variable: number): number =>
  array.data[cycleOffset(array, cycle, phase, variable)];

export const emptyCycleArray = (pointsPerCycle: number, variables: readonly string[]): CycleArray => ({
  data: new Float64Array(0),
  shape: [0, pointsPerCycle, variables.length],
  variables: [...variables],
});

/**
 * Build an array from nested `[cycle][phase][variable]` values. Every cycle
 * must carry the same number of phase samples and one value per variable.
 */
export function createCycleArray(cycles: readonly (readonly (readonly number[])[])[], variables: readonly string[]): CycleArray {
  const nCycles = cycles.length;
  const points = nCycles > 0 ? cycles[0].length : 0;
  const nVars = variables.length;
  const data = new Float64Array(nCycles * points * nVars);
  cycles.forEach((cycle, c) => {
    if (cycle.length !== points) {
      throw new StructuralError(
        "shape_mismatch",
        `cycle ${c} has ${cycle.length} phase samples, expected ${points}`,
      );
    }
    cycle.forEach((sample, p) => {
      if (sample.length !== nVars) {
        throw new StructuralError(
          "variable_count_mismatch",
          `cycle ${c} phase ${p} has ${sample.length} values for ${nVars} variables`,
        );
      }
      for (let v = 0; v < nVars; v++) {
        data[(c * points + p) * nVars + v] = sample[v];
      }
    });
  });
  return { data, shape: [nCycles, points, nVars], variables: [...variables] };
}

/** Values of one variable at one phase sample, across every cycle. */
export function phaseColumn(array: CycleArray, phase: number, variable: number): Float64Array {
  const [cycles] = array.shape;
  const out = new Float64Array(cycles);
  for (let c = 0; c < cycles; c++) {
    out[c] = cycleValue(array, c, phase, variable);
  }
  return out;
}

/** Concatenate arrays along the cycle axis; variable lists must match exactly. */
export function concatCycleArrays(arrays: readonly CycleArray[], pointsPerCycle: number): CycleArray {
  const nonEmpty = arrays.filter((array) => array.shape[0] > 0);
  if (nonEmpty.length === 0) {
    return emptyCycleArray(pointsPerCycle, arrays[0]?.variables ?? []);
  }
  const head = nonEmpty[0];
  for (const array of nonEmpty) {
    if (array.shape[1] !== pointsPerCycle) {
      throw new StructuralError(
        "shape_mismatch",
        `array has ${array.shape[1]} points per cycle, expected ${pointsPerCycle}`,
      );
    }
    if (array.variables.join("\u0000") !== head.variables.join("\u0000")) {
      throw new StructuralError("variable_count_mismatch", "arrays carry different variable lists");
    }
  }
  const total = nonEmpty.reduce((sum, array) => sum + array.data.length, 0);
  const data = new Float64Array(total);
  let offset = 0;
  for (const array of nonEmpty) {
    data.set(array.data, offset);
    offset += array.data.length;
  }
  const cycles = nonEmpty.reduce((sum, array) => sum + array.shape[0], 0);
  return { data, shape: [cycles, pointsPerCycle, head.variables.length], variables: [...head.variables] };
}
