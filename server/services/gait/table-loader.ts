import { parse } from "csv-parse/sync";
import { z } from "zod";
import { StructuralError } from "./errors";
import type { TableRow } from "./cycle-store";

const CsvRecords = z.array(z.record(z.string(), z.string()));

export type LongFormatCsvOptions = {
  delimiter?: string;
};

/**
 * Parse a long-format CSV (header row, one row per phase sample) into rows
 * for the cycle store. Cells stay text; the store decides what is numeric.
 */
export function parseLongFormatCsv(text: string, options: LongFormatCsvOptions = {}): TableRow[] {
  let raw: unknown;
  try {
    raw = parse(text, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
      delimiter: options.delimiter ?? ",",
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StructuralError("shape_mismatch", `table could not be parsed: ${reason}`);
  }
  const records = CsvRecords.safeParse(raw);
  if (!records.success) {
    throw new StructuralError("shape_mismatch", "table rows are not flat string records");
  }
  return records.data;
}
