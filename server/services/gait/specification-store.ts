import type { TRangeCheckpoint } from "@shared/gait-validation";
import { metrics } from "../../metrics";
import { stableHash } from "../../utils/stable-json";
import { appendValidationLog } from "../observability/validation-log-store";
import { ConfigurationError, NotFoundError } from "./errors";

export type VariableCheckpoints = readonly Readonly<TRangeCheckpoint>[];
export type TaskRangeSpecification = Readonly<Record<string, VariableCheckpoints>>;
/** task -> variable -> checkpoints ordered by phase. */
export type RangeSpecification = Readonly<Record<string, TaskRangeSpecification>>;

export type SpecificationSnapshot = {
  readonly generation: number;
  readonly hash: string;
  readonly createdAt: string;
  readonly ranges: RangeSpecification;
};

/**
 * Throw ConfigurationError unless checkpoints are non-empty, finite, strictly
 * increasing in phase and have min <= max.
 */
export function assertValidCheckpoints(
  checkpoints: readonly TRangeCheckpoint[],
  context: { task: string; variable: string },
): void {
  if (checkpoints.length === 0) {
    throw new ConfigurationError("too_few_checkpoints", "at least one checkpoint is required", context);
  }
  let previous = Number.NEGATIVE_INFINITY;
  for (const checkpoint of checkpoints) {
    const where = { ...context, phase_percent: checkpoint.phase_percent };
    if (
      !Number.isFinite(checkpoint.phase_percent) ||
      !Number.isFinite(checkpoint.min) ||
      !Number.isFinite(checkpoint.max)
    ) {
      throw new ConfigurationError("non_finite_bound", "checkpoint values must be finite", where);
    }
    if (checkpoint.phase_percent < 0 || checkpoint.phase_percent > 100) {
      throw new ConfigurationError("unordered_checkpoints", "checkpoint phase must lie in [0, 100]", where);
    }
    if (checkpoint.phase_percent <= previous) {
      throw new ConfigurationError("unordered_checkpoints", "checkpoint phases must be strictly increasing", where);
    }
    if (checkpoint.min > checkpoint.max) {
      throw new ConfigurationError(
        "min_exceeds_max",
        `min ${checkpoint.min} exceeds max ${checkpoint.max}`,
        where,
      );
    }
    previous = checkpoint.phase_percent;
  }
}

const freezeCheckpoints = (checkpoints: readonly TRangeCheckpoint[]): VariableCheckpoints =>
  Object.freeze(
    checkpoints.map((checkpoint) =>
      Object.freeze({ phase_percent: checkpoint.phase_percent, min: checkpoint.min, max: checkpoint.max }),
    ),
  );

const freezeRanges = (ranges: Record<string, Record<string, readonly TRangeCheckpoint[]>>): RangeSpecification => {
  const out: Record<string, TaskRangeSpecification> = {};
  for (const task of Object.keys(ranges).sort()) {
    const variables: Record<string, VariableCheckpoints> = {};
    for (const variable of Object.keys(ranges[task]).sort()) {
      const checkpoints = ranges[task][variable];
      assertValidCheckpoints(checkpoints, { task, variable });
      variables[variable] = freezeCheckpoints(checkpoints);
    }
    out[task] = Object.freeze(variables);
  }
  return Object.freeze(out);
};

const buildSnapshot = (generation: number, ranges: RangeSpecification, now: () => Date): SpecificationSnapshot =>
  Object.freeze({
    generation,
    hash: stableHash(ranges),
    createdAt: now().toISOString(),
    ranges,
  });

/** Checkpoints for (task, variable), or undefined when nothing is configured. */
export const lookupCheckpoints = (
  ranges: RangeSpecification,
  task: string,
  variable: string,
): VariableCheckpoints | undefined => {
  const taskRanges = Object.prototype.hasOwnProperty.call(ranges, task) ? ranges[task] : undefined;
  if (!taskRanges || !Object.prototype.hasOwnProperty.call(taskRanges, variable)) return undefined;
  return taskRanges[variable];
};

export type SpecificationStoreOptions = {
  now?: () => Date;
};

/**
 * Holds the active range specification as immutable snapshots. Readers bind
 * to `snapshot()` for a whole run; `replace` publishes a new generation and
 * never touches a snapshot already handed out. Single writer.
 */
export class SpecificationStore {
  private current: SpecificationSnapshot;
  private readonly now: () => Date;

  constructor(
    initial: Record<string, Record<string, readonly TRangeCheckpoint[]>> = {},
    options: SpecificationStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.current = buildSnapshot(0, freezeRanges(initial), this.now);
  }

  snapshot(): SpecificationSnapshot {
    return this.current;
  }

  get generation(): number {
    return this.current.generation;
  }

  tasks(): string[] {
    return Object.keys(this.current.ranges);
  }

  hasTask(task: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.current.ranges, task);
  }

  variables(task: string): string[] {
    if (!this.hasTask(task)) {
      throw new NotFoundError(task);
    }
    return Object.keys(this.current.ranges[task]);
  }

  get(task: string, variable: string): VariableCheckpoints {
    const checkpoints = lookupCheckpoints(this.current.ranges, task, variable);
    if (!checkpoints) {
      throw new NotFoundError(task, variable);
    }
    return checkpoints;
  }

  replace(task: string, variable: string, checkpoints: readonly TRangeCheckpoint[]): SpecificationSnapshot {
    assertValidCheckpoints(checkpoints, { task, variable });
    const previous = this.current;
    const taskRanges = this.hasTask(task) ? previous.ranges[task] : {};
    const nextTask: Record<string, VariableCheckpoints> = { ...taskRanges, [variable]: freezeCheckpoints(checkpoints) };
    const sortedTask: Record<string, VariableCheckpoints> = {};
    for (const name of Object.keys(nextTask).sort()) sortedTask[name] = nextTask[name];

    const nextRanges: Record<string, TaskRangeSpecification> = { ...previous.ranges, [task]: Object.freeze(sortedTask) };
    const sortedRanges: Record<string, TaskRangeSpecification> = {};
    for (const name of Object.keys(nextRanges).sort()) sortedRanges[name] = nextRanges[name];

    this.current = buildSnapshot(previous.generation + 1, Object.freeze(sortedRanges), this.now);
    metrics.setSpecGeneration(this.current.generation);
    appendValidationLog({
      type: "spec_replaced",
      task,
      variable,
      generation: this.current.generation,
      detail: { checkpoints: checkpoints.length, hash: this.current.hash },
    });
    return this.current;
  }
}
