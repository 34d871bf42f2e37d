import type { TMalformedCycleRun } from "@shared/gait-validation";
import { GAIT_CONFIG } from "../../config/gait";
import { emptyCycleArray, type CycleArray } from "./cycle-array";
import { InvalidParameterError, StructuralError } from "./errors";
import { isStandardVariableName } from "./variable-naming";

export type TableCell = string | number | null | undefined;
export type TableRow = Readonly<Record<string, TableCell>>;

export const METADATA_COLUMNS: ReadonlySet<string> = new Set([
  "time",
  "time_s",
  "step",
  "step_number",
  "cycle",
  "cycle_id",
  "activity_number",
  "task_info",
  "task_id",
  "is_reconstructed_r",
  "is_reconstructed_l",
]);

export const DEFAULT_PHASE_COLUMNS = ["phase_ipsi", "phase", "phase_percent"] as const;
const DEFAULT_CYCLE_COLUMNS = ["cycle_id", "cycle", "step"] as const;

export type CycleStoreOptions = {
  pointsPerCycle?: number;
  subjectColumn?: string;
  taskColumn?: string;
  /**
   * Within-cycle ordinal or percentage. A falling value starts a new cycle; a
   * repeated value does so only once the current run already holds a full cycle.
   */
  phaseColumn?: string;
  /** Optional stride identifier; a change of value starts a new cycle. */
  cycleColumn?: string;
};

export type CycleUnit = {
  subject: string;
  task: string;
};

export type CycleExtraction = CycleUnit & {
  array: CycleArray;
  variables: readonly string[];
  malformed: TMalformedCycleRun[];
  missingVariables: string[];
};

const unitKey = (subject: string, task: string): string => `${subject}\u0000${task}`;

const cellText = (cell: TableCell): string => (cell === null || cell === undefined ? "" : String(cell).trim());

/**
 * Numeric value of a cell. Empty cells and NaN spellings are missing samples
 * (NaN); any other text that is not a number yields null.
 */
export function parseNumericCell(cell: TableCell): number | null {
  if (cell === null || cell === undefined) return Number.NaN;
  if (typeof cell === "number") return cell;
  const trimmed = cell.trim();
  if (!trimmed) return Number.NaN;
  const lowered = trimmed.toLowerCase();
  if (lowered === "nan" || lowered === "na" || lowered === "null") return Number.NaN;
  if (lowered === "inf" || lowered === "+inf") return Number.POSITIVE_INFINITY;
  if (lowered === "-inf") return Number.NEGATIVE_INFINITY;
  const parsed = Number(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
}

const collectColumns = (rows: readonly TableRow[]): string[] => {
  const seen = new Set<string>();
  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
};

/**
 * Long-format table indexed by (subject, task). Rows are never mutated; each
 * `extract` call builds a fresh (cycle, phase, variable) array.
 */
export class CycleStore {
  readonly pointsPerCycle: number;
  readonly columns: readonly string[];
  readonly subjectColumn: string;
  readonly taskColumn: string;
  readonly phaseColumn: string;
  readonly cycleColumn?: string;
  private readonly rows: readonly TableRow[];
  private readonly signalColumns: readonly string[];
  private readonly index = new Map<string, number[]>();
  private readonly unitList: CycleUnit[] = [];

  constructor(rows: readonly TableRow[], options: CycleStoreOptions = {}) {
    this.rows = rows;
    this.pointsPerCycle = options.pointsPerCycle ?? GAIT_CONFIG.pointsPerCycle;
    if (!Number.isInteger(this.pointsPerCycle) || this.pointsPerCycle < 2) {
      throw new StructuralError("shape_mismatch", `points per cycle must be an integer >= 2, got ${this.pointsPerCycle}`);
    }
    this.columns = collectColumns(rows);
    this.subjectColumn = options.subjectColumn ?? "subject";
    this.taskColumn = options.taskColumn ?? "task";
    const present = new Set(this.columns);

    const phaseColumn = options.phaseColumn ?? DEFAULT_PHASE_COLUMNS.find((name) => present.has(name));
    this.phaseColumn = phaseColumn ?? DEFAULT_PHASE_COLUMNS[0];
    if (options.cycleColumn !== undefined && options.cycleColumn === this.phaseColumn) {
      throw new InvalidParameterError("cycleColumn", `${options.cycleColumn} is already the phase column`);
    }
    this.cycleColumn =
      options.cycleColumn ?? DEFAULT_CYCLE_COLUMNS.find((name) => name !== this.phaseColumn && present.has(name));

    if (rows.length > 0) {
      for (const required of [this.subjectColumn, this.taskColumn, this.phaseColumn]) {
        if (!present.has(required)) {
          throw new StructuralError("missing_column", `table has no ${required} column`, { variable: required });
        }
      }
      if (this.cycleColumn !== undefined && !present.has(this.cycleColumn)) {
        throw new StructuralError("missing_column", `table has no ${this.cycleColumn} column`, {
          variable: this.cycleColumn,
        });
      }
    }

    const reserved = new Set([this.subjectColumn, this.taskColumn, this.phaseColumn]);
    if (this.cycleColumn) reserved.add(this.cycleColumn);
    this.signalColumns = this.columns.filter((column) => !reserved.has(column) && !METADATA_COLUMNS.has(column));

    rows.forEach((row, rowIndex) => {
      const subject = cellText(row[this.subjectColumn]);
      const task = cellText(row[this.taskColumn]);
      const key = unitKey(subject, task);
      const bucket = this.index.get(key);
      if (bucket) {
        bucket.push(rowIndex);
      } else {
        this.index.set(key, [rowIndex]);
        this.unitList.push({ subject, task });
      }
    });
    this.unitList.sort((a, b) => a.subject.localeCompare(b.subject) || a.task.localeCompare(b.task));
  }

  get rowCount(): number {
    return this.rows.length;
  }

  subjects(): string[] {
    return Array.from(new Set(this.unitList.map((unit) => unit.subject))).sort();
  }

  tasks(): string[] {
    return Array.from(new Set(this.unitList.map((unit) => unit.task))).sort();
  }

  units(): CycleUnit[] {
    return this.unitList.map((unit) => ({ ...unit }));
  }

  has(subject: string, task: string): boolean {
    return this.index.has(unitKey(subject, task));
  }

  signalVariables(): readonly string[] {
    return this.signalColumns;
  }

  nonstandardVariables(): string[] {
    return this.signalColumns.filter((column) => !isStandardVariableName(column));
  }

  /**
   * Cycles of one (subject, task). Runs whose length is not `pointsPerCycle`
   * are left out and listed in `malformed`. An unknown pair yields zero cycles.
   * Throws StructuralError when a selected signal or the phase marker holds
   * non-numeric text.
   */
  extract(subject: string, task: string, variables?: readonly string[]): CycleExtraction {
    const available = new Set(this.signalColumns);
    const requested = variables ?? this.signalColumns;
    const selected = requested.filter((name) => available.has(name));
    const missingVariables = requested.filter((name) => !available.has(name));
    const points = this.pointsPerCycle;
    const rowIndices = this.index.get(unitKey(subject, task));
    if (!rowIndices || rowIndices.length === 0) {
      return { subject, task, array: emptyCycleArray(points, selected), variables: selected, malformed: [], missingVariables };
    }

    const nVars = selected.length;
    const values = new Float64Array(rowIndices.length * nVars);
    const runStarts: number[] = [];
    let previousPhase = Number.NaN;
    let previousCycleId: string | undefined;
    let runLength = 0;

    rowIndices.forEach((rowIndex, i) => {
      const row = this.rows[rowIndex];
      const phase = parseNumericCell(row[this.phaseColumn]);
      if (phase === null || !Number.isFinite(phase)) {
        throw new StructuralError("non_numeric", `phase marker ${String(row[this.phaseColumn])} is not a number`, {
          subject,
          task,
          variable: this.phaseColumn,
          row: rowIndex,
        });
      }
      const cycleId = this.cycleColumn ? cellText(row[this.cycleColumn]) : undefined;
      const repeatedAfterFullCycle = phase === previousPhase && runLength >= points;
      if (i === 0 || phase < previousPhase || repeatedAfterFullCycle || cycleId !== previousCycleId) {
        runStarts.push(i);
        runLength = 0;
      }
      runLength++;
      previousPhase = phase;
      previousCycleId = cycleId;

      for (let v = 0; v < nVars; v++) {
        const value = parseNumericCell(row[selected[v]]);
        if (value === null) {
          throw new StructuralError("non_numeric", `value ${String(row[selected[v]])} is not a number`, {
            subject,
            task,
            variable: selected[v],
            row: rowIndex,
          });
        }
        values[i * nVars + v] = value;
      }
    });

    const malformed: TMalformedCycleRun[] = [];
    const kept: number[] = [];
    runStarts.forEach((start, r) => {
      const end = r + 1 < runStarts.length ? runStarts[r + 1] : rowIndices.length;
      const length = end - start;
      if (length === points) {
        kept.push(start);
      } else {
        malformed.push({ subject, task, start_row: rowIndices[start], length });
      }
    });

    const data = new Float64Array(kept.length * points * nVars);
    kept.forEach((start, c) => {
      data.set(values.subarray(start * nVars, (start + points) * nVars), c * points * nVars);
    });

    return {
      subject,
      task,
      array: { data, shape: [kept.length, points, nVars], variables: selected },
      variables: selected,
      malformed,
      missingVariables,
    };
  }
}
