import type { TableRow } from "../server/services/gait/cycle-store";

export const KNEE = "knee_flexion_angle_ipsi_rad";
export const HIP = "hip_flexion_angle_ipsi_rad";
export const KNEE_CONTRA = "knee_flexion_angle_contra_rad";

/**
 * Long-format rows for consecutive cycles of one (subject, task). The phase
 * marker is the within-cycle ordinal, so each cycle restarts at 0.
 */
export const cycleRows = (
  subject: string,
  task: string,
  cycles: ReadonlyArray<Record<string, ReadonlyArray<number | string>>>,
): TableRow[] => {
  const rows: TableRow[] = [];
  for (const cycle of cycles) {
    const names = Object.keys(cycle);
    const length = names.length > 0 ? cycle[names[0]].length : 0;
    for (let i = 0; i < length; i++) {
      const row: Record<string, number | string> = { subject, task, phase_ipsi: i };
      for (const name of names) row[name] = cycle[name][i];
      rows.push(row);
    }
  }
  return rows;
};

export const constant = (value: number, length: number): number[] => Array.from({ length }, () => value);

/** Small deterministic PRNG (mulberry32). */
export const seededRandom = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const csvFromRows = (columns: readonly string[], rows: readonly TableRow[]): string =>
  [columns.join(","), ...rows.map((row) => columns.map((column) => String(row[column] ?? "")).join(","))].join("\n");
