import { describe, expect, it } from "vitest";
import type { TFailureRecord } from "@shared/gait-validation";
import { InvalidParameterError } from "../server/services/gait/errors";
import { aggregateQuality, mergeSummaries } from "../server/services/gait/quality-aggregator";
import { HIP, KNEE } from "./gait-fixtures";

const failure = (subject: string, task: string, cycle: number, variable: string, phase = 10): TFailureRecord => ({
  subject,
  task,
  cycle_index: cycle,
  variable,
  phase_index: phase,
  phase_percent: phase,
  value: 2,
  min: 0,
  max: 1,
});

describe("aggregateQuality", () => {
  it("scores an empty run as perfect", () => {
    expect(aggregateQuality(0, [])).toEqual({
      total_cycles: 0,
      valid_cycles: 0,
      failed_cycles: 0,
      failure_count: 0,
      quality_score: 1,
      cycles_by_task: {},
      by_task: {},
      by_variable: {},
    });
  });

  it("counts failing cycles once however many samples fail in them", () => {
    const summary = aggregateQuality(
      4,
      [
        failure("S01", "level_walking", 0, KNEE),
        failure("S01", "level_walking", 0, HIP),
        failure("S01", "level_walking", 0, KNEE, 20),
        failure("S01", "level_walking", 2, KNEE),
      ],
      { level_walking: 4 },
    );

    expect(summary.failed_cycles).toBe(2);
    expect(summary.valid_cycles).toBe(2);
    expect(summary.failure_count).toBe(4);
    expect(summary.quality_score).toBe(0.5);
    expect(summary.by_variable).toEqual({
      [HIP]: { failure_count: 1, failed_cycles: 1, failed_cycle_fraction: 0.25 },
      [KNEE]: { failure_count: 3, failed_cycles: 2, failed_cycle_fraction: 0.5 },
    });
    expect(summary.by_task.level_walking).toEqual({
      cycles: 4,
      failure_count: 4,
      failed_cycles: 2,
      failed_cycle_fraction: 0.5,
      by_variable: {
        [HIP]: { failure_count: 1, failed_cycles: 1, failed_cycle_fraction: 0.25 },
        [KNEE]: { failure_count: 3, failed_cycles: 2, failed_cycle_fraction: 0.5 },
      },
    });
  });

  it("uses per-task cycle counts for task fractions", () => {
    const summary = aggregateQuality(10, [failure("S01", "running", 1, KNEE)], { level_walking: 8, running: 2 });
    expect(summary.by_task.running.failed_cycle_fraction).toBe(0.5);
    expect(summary.by_task.level_walking.failed_cycle_fraction).toBe(0);
    expect(summary.by_variable[KNEE].failed_cycle_fraction).toBe(0.1);
  });

  it("keeps cycles of different subjects apart", () => {
    const summary = aggregateQuality(3, [failure("S01", "level_walking", 0, KNEE), failure("S02", "level_walking", 0, KNEE)]);
    expect(summary.failed_cycles).toBe(2);
  });

  it("rejects failure records that outnumber the cycles", () => {
    expect(() => aggregateQuality(1, [failure("S01", "t", 0, KNEE), failure("S01", "t", 1, KNEE)])).toThrowError(
      InvalidParameterError,
    );
    expect(() => aggregateQuality(-1, [])).toThrowError(InvalidParameterError);
  });
});

describe("mergeSummaries", () => {
  it("matches aggregating the concatenated failures of disjoint sub-runs", () => {
    const walking = [failure("S01", "level_walking", 0, KNEE), failure("S01", "level_walking", 0, HIP)];
    const running = [
      failure("S02", "running", 1, KNEE),
      failure("S02", "running", 3, KNEE),
      failure("S02", "running", 3, HIP, 40),
    ];

    const merged = mergeSummaries(
      aggregateQuality(3, walking, { level_walking: 3 }),
      aggregateQuality(5, running, { running: 5 }),
    );

    expect(merged).toEqual(aggregateQuality(8, [...walking, ...running], { level_walking: 3, running: 5 }));
    expect(merged.quality_score).toBe(5 / 8);
  });

  it("is neutral with an empty summary", () => {
    const summary = aggregateQuality(4, [failure("S01", "level_walking", 2, KNEE)], { level_walking: 4 });
    expect(mergeSummaries(summary, aggregateQuality(0, []))).toEqual(summary);
  });
});
