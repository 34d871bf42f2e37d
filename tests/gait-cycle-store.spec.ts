import { describe, expect, it } from "vitest";
import { cycleValue } from "../server/services/gait/cycle-array";
import { CycleStore, parseNumericCell, type TableRow } from "../server/services/gait/cycle-store";
import { InvalidParameterError, StructuralError } from "../server/services/gait/errors";
import { HIP, KNEE, cycleRows } from "./gait-fixtures";

const P = 4;

const catchStructural = (run: () => unknown): StructuralError => {
  try {
    run();
  } catch (error) {
    if (error instanceof StructuralError) return error;
    throw error;
  }
  throw new Error("expected a StructuralError");
};

describe("CycleStore.extract", () => {
  it("reshapes consecutive cycles into a (cycle, phase, variable) array", () => {
    const rows = cycleRows("S01", "level_walking", [
      { [KNEE]: [0, 1, 2, 3], [HIP]: [10, 11, 12, 13] },
      { [KNEE]: [4, 5, 6, 7], [HIP]: [14, 15, 16, 17] },
    ]);
    const store = new CycleStore(rows, { pointsPerCycle: P });
    const extraction = store.extract("S01", "level_walking");

    expect(extraction.array.shape).toEqual([2, 4, 2]);
    expect(extraction.variables).toEqual([KNEE, HIP]);
    expect(cycleValue(extraction.array, 0, 0, 0)).toBe(0);
    expect(cycleValue(extraction.array, 1, 2, 0)).toBe(6);
    expect(cycleValue(extraction.array, 1, 3, 1)).toBe(17);
    expect(extraction.malformed).toEqual([]);
    expect(extraction.missingVariables).toEqual([]);
  });

  it("drops runs of the wrong length and reports where they start", () => {
    const rows = cycleRows("S01", "level_walking", [
      { [KNEE]: [0, 1, 2, 3] },
      { [KNEE]: [9, 9, 9] },
      { [KNEE]: [4, 5, 6, 7] },
    ]);
    const store = new CycleStore(rows, { pointsPerCycle: P });
    const extraction = store.extract("S01", "level_walking");

    expect(extraction.array.shape).toEqual([2, 4, 1]);
    expect(cycleValue(extraction.array, 1, 0, 0)).toBe(4);
    expect(extraction.malformed).toEqual([{ subject: "S01", task: "level_walking", start_row: 4, length: 3 }]);
  });

  it("returns zero cycles for an unknown pair", () => {
    const store = new CycleStore(cycleRows("S01", "level_walking", [{ [KNEE]: [0, 1, 2, 3] }]), {
      pointsPerCycle: P,
    });
    const extraction = store.extract("S99", "level_walking");
    expect(extraction.array.shape).toEqual([0, 4, 1]);
    expect(extraction.array.data.length).toBe(0);
    expect(extraction.malformed).toEqual([]);
  });

  it("raises a structural error naming the variable and row for non-numeric values", () => {
    const rows = cycleRows("S01", "level_walking", [{ [KNEE]: [0, 1, "bad", 3] }]);
    const store = new CycleStore(rows, { pointsPerCycle: P });
    const error = catchStructural(() => store.extract("S01", "level_walking"));

    expect(error.kind).toBe("non_numeric");
    expect(error.context).toEqual({ subject: "S01", task: "level_walking", variable: KNEE, row: 2 });
    expect(error.reason).toBe("value bad is not a number");
  });

  it("keeps missing samples as NaN without failing the unit", () => {
    const rows = cycleRows("S01", "level_walking", [{ [KNEE]: [0, "", "NaN", 3] }]);
    const store = new CycleStore(rows, { pointsPerCycle: P });
    const { array } = store.extract("S01", "level_walking");

    expect(array.shape).toEqual([1, 4, 1]);
    expect(Number.isNaN(cycleValue(array, 0, 1, 0))).toBe(true);
    expect(Number.isNaN(cycleValue(array, 0, 2, 0))).toBe(true);
    expect(cycleValue(array, 0, 3, 0)).toBe(3);
  });

  it("selects requested variables in request order and lists missing ones", () => {
    const rows = cycleRows("S01", "level_walking", [{ [KNEE]: [0, 1, 2, 3], [HIP]: [4, 5, 6, 7] }]);
    const store = new CycleStore(rows, { pointsPerCycle: P });
    const extraction = store.extract("S01", "level_walking", [HIP, "ankle_flexion_angle_ipsi_rad", KNEE]);

    expect(extraction.variables).toEqual([HIP, KNEE]);
    expect(extraction.missingVariables).toEqual(["ankle_flexion_angle_ipsi_rad"]);
    expect(cycleValue(extraction.array, 0, 1, 0)).toBe(5);
    expect(cycleValue(extraction.array, 0, 1, 1)).toBe(1);
  });

  it("starts a new cycle when the cycle id changes even if the phase keeps rising", () => {
    const rows: TableRow[] = Array.from({ length: 8 }, (_, i) => ({
      subject: "S01",
      task: "running",
      phase_ipsi: i,
      cycle_id: i < 4 ? "a" : "b",
      [KNEE]: i,
    }));
    const store = new CycleStore(rows, { pointsPerCycle: P });
    const { array, malformed } = store.extract("S01", "running");

    expect(array.shape).toEqual([2, 4, 1]);
    expect(cycleValue(array, 1, 0, 0)).toBe(4);
    expect(malformed).toEqual([]);
  });

  it("uses a step column as the within-cycle marker without also treating it as a cycle id", () => {
    const rows: TableRow[] = Array.from({ length: 8 }, (_, i) => ({
      subject: "S01",
      task: "level_walking",
      step: i % 4,
      [KNEE]: i,
    }));
    const store = new CycleStore(rows, { pointsPerCycle: P, phaseColumn: "step" });
    const { array, malformed } = store.extract("S01", "level_walking");

    expect(store.cycleColumn).toBeUndefined();
    expect(array.shape).toEqual([2, 4, 1]);
    expect(cycleValue(array, 1, 3, 0)).toBe(7);
    expect(malformed).toEqual([]);
  });

  it("refuses a cycle column that is also the phase column", () => {
    const rows: TableRow[] = [{ subject: "S01", task: "level_walking", step: 0, [KNEE]: 1 }];
    expect(() => new CycleStore(rows, { pointsPerCycle: P, phaseColumn: "step", cycleColumn: "step" })).toThrowError(
      InvalidParameterError,
    );
  });

  it("keeps repeated phase values inside one cycle", () => {
    const points = 150;
    const rows: TableRow[] = [0, 1].flatMap((c) =>
      Array.from({ length: points }, (_, i) => ({
        subject: "S01",
        task: "level_walking",
        phase_percent: Math.round((i * 100) / (points - 1)),
        [KNEE]: c * 1000 + i,
      })),
    );
    const store = new CycleStore(rows, { pointsPerCycle: points });
    const { array, malformed } = store.extract("S01", "level_walking");

    expect(array.shape).toEqual([2, 150, 1]);
    expect(cycleValue(array, 0, 149, 0)).toBe(149);
    expect(cycleValue(array, 1, 0, 0)).toBe(1000);
    expect(malformed).toEqual([]);
  });

  it("splits on a repeated phase value once the run holds a full cycle", () => {
    const rows: TableRow[] = Array.from({ length: 8 }, (_, i) => ({
      subject: "S01",
      task: "level_walking",
      phase_ipsi: 0,
      [KNEE]: i,
    }));
    const { array, malformed } = new CycleStore(rows, { pointsPerCycle: P }).extract("S01", "level_walking");
    expect(array.shape).toEqual([2, 4, 1]);
    expect(cycleValue(array, 1, 0, 0)).toBe(4);
    expect(malformed).toEqual([]);
  });

  it("does not mutate the rows it reads", () => {
    const rows = cycleRows("S01", "level_walking", [{ [KNEE]: [0, 1, 2, 3] }]).map((row) => Object.freeze({ ...row }));
    const store = new CycleStore(Object.freeze(rows), { pointsPerCycle: P });
    expect(store.extract("S01", "level_walking").array.shape).toEqual([1, 4, 1]);
    expect(rows[2]).toEqual({ subject: "S01", task: "level_walking", phase_ipsi: 2, [KNEE]: 2 });
  });
});

describe("CycleStore indexing", () => {
  it("lists sorted subjects, tasks and units and excludes metadata columns from signals", () => {
    const rows = [
      ...cycleRows("S02", "running", [{ [KNEE]: [0, 1, 2, 3], time_s: [0, 0.1, 0.2, 0.3] }]),
      ...cycleRows("S01", "level_walking", [{ [KNEE]: [0, 1, 2, 3], time_s: [0, 0.1, 0.2, 0.3] }]),
    ];
    const store = new CycleStore(rows, { pointsPerCycle: P });

    expect(store.subjects()).toEqual(["S01", "S02"]);
    expect(store.tasks()).toEqual(["level_walking", "running"]);
    expect(store.units()).toEqual([
      { subject: "S01", task: "level_walking" },
      { subject: "S02", task: "running" },
    ]);
    expect(store.signalVariables()).toEqual([KNEE]);
    expect(store.has("S02", "running")).toBe(true);
    expect(store.has("S02", "level_walking")).toBe(false);
  });

  it("flags signal columns outside the naming convention", () => {
    const rows = cycleRows("S01", "level_walking", [{ [KNEE]: [0, 1, 2, 3], emg_raw: [0, 0, 0, 0] }]);
    const store = new CycleStore(rows, { pointsPerCycle: P });
    expect(store.nonstandardVariables()).toEqual(["emg_raw"]);
  });

  it("rejects a table without a phase column", () => {
    const rows: TableRow[] = [{ subject: "S01", task: "level_walking", [KNEE]: 1 }];
    const error = catchStructural(() => new CycleStore(rows, { pointsPerCycle: P }));
    expect(error.kind).toBe("missing_column");
    expect(error.context.variable).toBe("phase_ipsi");
  });

  it("accepts an empty table", () => {
    const store = new CycleStore([], { pointsPerCycle: P });
    expect(store.units()).toEqual([]);
    expect(store.rowCount).toBe(0);
  });
});

describe("parseNumericCell", () => {
  it("maps text cells to numbers, NaN for missing samples and null for junk", () => {
    expect(parseNumericCell(" 1.5 ")).toBe(1.5);
    expect(parseNumericCell(2)).toBe(2);
    expect(Number.isNaN(parseNumericCell(""))).toBe(true);
    expect(Number.isNaN(parseNumericCell("nan"))).toBe(true);
    expect(Number.isNaN(parseNumericCell(null))).toBe(true);
    expect(parseNumericCell("-inf")).toBe(Number.NEGATIVE_INFINITY);
    expect(parseNumericCell("abc")).toBeNull();
  });
});
