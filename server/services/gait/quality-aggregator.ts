import type {
  TFailureRecord,
  TTaskQuality,
  TValidationSummary,
  TVariableQuality,
} from "@shared/gait-validation";
import { InvalidParameterError } from "./errors";

const cycleKey = (failure: TFailureRecord): string =>
  `${failure.subject}\u0000${failure.task}\u0000${failure.cycle_index}`;

const fraction = (count: number, denominator: number): number =>
  denominator > 0 ? Math.min(1, count / denominator) : 0;

type Tally = { failureCount: number; cycles: Set<string> };

const tally = (): Tally => ({ failureCount: 0, cycles: new Set() });

const getTally = (map: Map<string, Tally>, key: string): Tally => {
  const existing = map.get(key);
  if (existing) return existing;
  const created = tally();
  map.set(key, created);
  return created;
};

const toVariableQuality = (failureCount: number, failedCycles: number, denominator: number): TVariableQuality => ({
  failure_count: failureCount,
  failed_cycles: failedCycles,
  failed_cycle_fraction: fraction(failedCycles, denominator),
});

/**
 * Reduce one run's failure records into counts and a quality score
 * (valid / total, 1 when there are no cycles). Task-level fractions use
 * `cyclesByTask` when it names the task, otherwise `totalCycles`.
 */
export function aggregateQuality(
  totalCycles: number,
  failures: readonly TFailureRecord[],
  cyclesByTask: Readonly<Record<string, number>> = {},
): TValidationSummary {
  if (!Number.isInteger(totalCycles) || totalCycles < 0) {
    throw new InvalidParameterError("totalCycles", `must be a non-negative integer, got ${totalCycles}`);
  }
  const failedCycles = new Set<string>();
  const byTask = new Map<string, { total: Tally; variables: Map<string, Tally> }>();
  const byVariable = new Map<string, Tally>();

  for (const failure of failures) {
    const key = cycleKey(failure);
    failedCycles.add(key);

    let task = byTask.get(failure.task);
    if (!task) {
      task = { total: tally(), variables: new Map() };
      byTask.set(failure.task, task);
    }
    task.total.failureCount++;
    task.total.cycles.add(key);
    const taskVariable = getTally(task.variables, failure.variable);
    taskVariable.failureCount++;
    taskVariable.cycles.add(key);

    const variable = getTally(byVariable, failure.variable);
    variable.failureCount++;
    variable.cycles.add(key);
  }

  if (failedCycles.size > totalCycles) {
    throw new InvalidParameterError(
      "failures",
      `${failedCycles.size} distinct failing cycles exceed total of ${totalCycles}`,
    );
  }

  const taskNames = new Set([...Object.keys(cyclesByTask), ...byTask.keys()]);
  const taskSummaries: Record<string, TTaskQuality> = {};
  for (const name of Array.from(taskNames).sort()) {
    const entry = byTask.get(name);
    const denominator = cyclesByTask[name] ?? totalCycles;
    const variables: Record<string, TVariableQuality> = {};
    if (entry) {
      for (const variable of Array.from(entry.variables.keys()).sort()) {
        const counts = entry.variables.get(variable) ?? tally();
        variables[variable] = toVariableQuality(counts.failureCount, counts.cycles.size, denominator);
      }
    }
    taskSummaries[name] = {
      cycles: cyclesByTask[name] ?? 0,
      ...toVariableQuality(entry?.total.failureCount ?? 0, entry?.total.cycles.size ?? 0, denominator),
      by_variable: variables,
    };
  }

  const variableSummaries: Record<string, TVariableQuality> = {};
  for (const variable of Array.from(byVariable.keys()).sort()) {
    const counts = byVariable.get(variable) ?? tally();
    variableSummaries[variable] = toVariableQuality(counts.failureCount, counts.cycles.size, totalCycles);
  }

  const valid = totalCycles - failedCycles.size;
  return {
    total_cycles: totalCycles,
    valid_cycles: valid,
    failed_cycles: failedCycles.size,
    failure_count: failures.length,
    quality_score: totalCycles === 0 ? 1 : valid / totalCycles,
    cycles_by_task: { ...cyclesByTask },
    by_task: taskSummaries,
    by_variable: variableSummaries,
  };
}

const sumRecords = (
  a: Readonly<Record<string, number>>,
  b: Readonly<Record<string, number>>,
): Record<string, number> => {
  const out: Record<string, number> = { ...a };
  for (const [key, value] of Object.entries(b)) {
    out[key] = (out[key] ?? 0) + value;
  }
  return out;
};

const mergeVariableCounts = (
  a: Readonly<Record<string, TVariableQuality>>,
  b: Readonly<Record<string, TVariableQuality>>,
  denominator: number,
): Record<string, TVariableQuality> => {
  const out: Record<string, TVariableQuality> = {};
  const names = Array.from(new Set([...Object.keys(a), ...Object.keys(b)])).sort();
  for (const name of names) {
    const failureCount = (a[name]?.failure_count ?? 0) + (b[name]?.failure_count ?? 0);
    const failedCycles = (a[name]?.failed_cycles ?? 0) + (b[name]?.failed_cycles ?? 0);
    out[name] = toVariableQuality(failureCount, failedCycles, denominator);
  }
  return out;
};

/**
 * Combine summaries of disjoint sub-runs. Counts add; fractions and the
 * quality score are recomputed from the summed counts.
 */
export function mergeSummaries(a: TValidationSummary, b: TValidationSummary): TValidationSummary {
  const totalCycles = a.total_cycles + b.total_cycles;
  const cyclesByTask = sumRecords(a.cycles_by_task, b.cycles_by_task);
  const failedCycles = a.failed_cycles + b.failed_cycles;
  const valid = totalCycles - failedCycles;

  const taskNames = Array.from(new Set([...Object.keys(a.by_task), ...Object.keys(b.by_task)])).sort();
  const byTask: Record<string, TTaskQuality> = {};
  for (const name of taskNames) {
    const left = a.by_task[name];
    const right = b.by_task[name];
    const denominator = cyclesByTask[name] ?? totalCycles;
    byTask[name] = {
      cycles: cyclesByTask[name] ?? 0,
      ...toVariableQuality(
        (left?.failure_count ?? 0) + (right?.failure_count ?? 0),
        (left?.failed_cycles ?? 0) + (right?.failed_cycles ?? 0),
        denominator,
      ),
      by_variable: mergeVariableCounts(left?.by_variable ?? {}, right?.by_variable ?? {}, denominator),
    };
  }

  return {
    total_cycles: totalCycles,
    valid_cycles: valid,
    failed_cycles: failedCycles,
    failure_count: a.failure_count + b.failure_count,
    quality_score: totalCycles === 0 ? 1 : valid / totalCycles,
    cycles_by_task: cyclesByTask,
    by_task: byTask,
    by_variable: mergeVariableCounts(a.by_variable, b.by_variable, totalCycles),
  };
}
