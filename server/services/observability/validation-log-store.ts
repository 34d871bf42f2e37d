import { GAIT_CONFIG } from "../../config/gait";

export type ValidationLogEventType =
  | "unit_validated"
  | "unit_unprocessable"
  | "malformed_cycles"
  | "reduced_coverage"
  | "nonstandard_variable"
  | "spec_replaced"
  | "tuned";

export type ValidationLogRecord = {
  id: string;
  seq: number;
  ts: string;
  type: ValidationLogEventType;
  subject?: string;
  task?: string;
  variable?: string;
  generation?: number;
  detail?: Record<string, unknown>;
  text: string;
};

type ValidationLogListener = (entry: ValidationLogRecord) => void;

type AppendEvent = Omit<ValidationLogRecord, "id" | "seq" | "ts" | "text"> &
  Partial<Pick<ValidationLogRecord, "ts" | "text">>;

const MAX_BUFFER_SIZE = GAIT_CONFIG.logBufferSize;
const logBuffer: ValidationLogRecord[] = [];
const listeners = new Set<ValidationLogListener>();
let logSequence = 0;

const logToStdout = GAIT_CONFIG.logToStdout;

const buildLogText = (event: AppendEvent): string => {
  const where = [event.subject, event.task, event.variable].filter(Boolean).join("/");
  return where ? `${event.type} ${where}` : event.type;
};

export function appendValidationLog(event: AppendEvent): ValidationLogRecord {
  const seq = ++logSequence;
  const record: ValidationLogRecord = {
    id: String(seq),
    seq,
    ts: event.ts ?? new Date().toISOString(),
    type: event.type,
    subject: event.subject,
    task: event.task,
    variable: event.variable,
    generation: event.generation,
    detail: event.detail,
    text: event.text ?? buildLogText(event),
  };
  logBuffer.push(record);
  if (logBuffer.length > MAX_BUFFER_SIZE) {
    logBuffer.splice(0, logBuffer.length - MAX_BUFFER_SIZE);
  }
  if (logToStdout) {
    console.info(JSON.stringify({ channel: "gait_validation", ...record }));
  }
  for (const listener of Array.from(listeners)) {
    try {
      listener(record);
    } catch (err) {
      console.warn("[gait-validation] log listener error", err);
    }
  }
  return record;
}

type GetValidationLogOptions = {
  limit?: number;
  type?: ValidationLogEventType;
};

/** Most recent entries first. */
export function getValidationLogs(options?: GetValidationLogOptions): ValidationLogRecord[] {
  const haystack = options?.type ? logBuffer.filter((entry) => entry.type === options.type) : [...logBuffer];
  const limit = clampLimit(options?.limit);
  return haystack.slice(Math.max(0, haystack.length - limit)).reverse();
}

export function subscribeValidationLogs(listener: ValidationLogListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function __resetValidationLogStore(): void {
  logBuffer.length = 0;
  listeners.clear();
}

const clampLimit = (value?: number): number => {
  if (value === undefined || Number.isNaN(value)) {
    return 50;
  }
  return Math.min(Math.max(1, Math.floor(value)), MAX_BUFFER_SIZE);
};
