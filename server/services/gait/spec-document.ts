import {
  RangeSpecificationDocument,
  type TRangeCheckpoint,
  type TRangeSpecificationDocument,
} from "@shared/gait-validation";
import { ConfigurationError } from "./errors";
import { assertValidCheckpoints, type RangeSpecification } from "./specification-store";

export type MutableRangeSpecification = Record<string, Record<string, TRangeCheckpoint[]>>;

const parsePhaseKey = (key: string, task: string): number => {
  const phase = Number(key.trim());
  if (!key.trim() || !Number.isFinite(phase) || phase < 0 || phase > 100) {
    throw new ConfigurationError("invalid_document", `phase key "${key}" is not a percentage in [0, 100]`, { task });
  }
  return phase;
};

/**
 * Phase-major document -> variable-major ranges with checkpoints ordered by
 * phase. Two keys naming the same phase, or min > max, are configuration
 * errors.
 */
export function parseSpecificationDocument(input: unknown): MutableRangeSpecification {
  const parsed = RangeSpecificationDocument.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "unknown issue";
    throw new ConfigurationError("invalid_document", `range document rejected (${where})`);
  }
  const ranges: MutableRangeSpecification = {};
  for (const [task, taskDoc] of Object.entries(parsed.data.tasks)) {
    const variables: Record<string, TRangeCheckpoint[]> = {};
    for (const [phaseKey, phaseVariables] of Object.entries(taskDoc.phases)) {
      const phase = parsePhaseKey(phaseKey, task);
      for (const [variable, bound] of Object.entries(phaseVariables)) {
        (variables[variable] ??= []).push({ phase_percent: phase, min: bound.min, max: bound.max });
      }
    }
    for (const [variable, checkpoints] of Object.entries(variables)) {
      checkpoints.sort((a, b) => a.phase_percent - b.phase_percent);
      assertValidCheckpoints(checkpoints, { task, variable });
    }
    ranges[task] = variables;
  }
  return ranges;
}

export function parseSpecificationJson(text: string): MutableRangeSpecification {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError("invalid_document", `range document is not valid JSON (${reason})`);
  }
  return parseSpecificationDocument(raw);
}

export type SpecificationDocumentMetadata = {
  version?: string;
  generated?: string;
  source?: string;
  method?: string;
};

const phaseKey = (phase: number): string => String(phase);

/** Variable-major ranges -> phase-major document. Pure; writing it is the caller's job. */
export function serializeSpecification(
  ranges: RangeSpecification,
  metadata: SpecificationDocumentMetadata = {},
): TRangeSpecificationDocument {
  const tasks: TRangeSpecificationDocument["tasks"] = {};
  for (const task of Object.keys(ranges).sort()) {
    const byPhase = new Map<number, Record<string, { min: number; max: number }>>();
    for (const variable of Object.keys(ranges[task]).sort()) {
      for (const checkpoint of ranges[task][variable]) {
        const entry = byPhase.get(checkpoint.phase_percent) ?? {};
        entry[variable] = { min: checkpoint.min, max: checkpoint.max };
        byPhase.set(checkpoint.phase_percent, entry);
      }
    }
    const phases: Record<string, Record<string, { min: number; max: number }>> = {};
    for (const phase of Array.from(byPhase.keys()).sort((a, b) => a - b)) {
      phases[phaseKey(phase)] = byPhase.get(phase) ?? {};
    }
    tasks[task] = { phases };
  }
  return {
    version: metadata.version ?? "1.0",
    ...(metadata.generated !== undefined ? { generated: metadata.generated } : {}),
    ...(metadata.source !== undefined ? { source: metadata.source } : {}),
    ...(metadata.method !== undefined ? { method: metadata.method } : {}),
    tasks,
  };
}

export const toSpecificationJson = (ranges: RangeSpecification, metadata?: SpecificationDocumentMetadata): string =>
  `${JSON.stringify(serializeSpecification(ranges, metadata), null, 2)}\n`;
