import type { TStructuralErrorKind } from "@shared/gait-validation";

export type GaitErrorContext = {
  subject?: string;
  task?: string;
  variable?: string;
  row?: number;
  phase_percent?: number;
};

const describeContext = (context: GaitErrorContext): string => {
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? ` (${parts.join(", ")})` : "";
};

/** Malformed input for one (subject, task) unit. Fatal for that unit only. */
export class StructuralError extends Error {
  readonly kind: TStructuralErrorKind;
  readonly context: GaitErrorContext;
  readonly reason: string;
  constructor(kind: TStructuralErrorKind, reason: string, context: GaitErrorContext = {}) {
    super(`${reason}${describeContext(context)}`);
    this.kind = kind;
    this.reason = reason;
    this.context = context;
    this.name = "StructuralError";
  }
}

export type ConfigurationErrorKind =
  | "unordered_checkpoints"
  | "min_exceeds_max"
  | "too_few_checkpoints"
  | "non_finite_bound"
  | "invalid_document";

/** Corrupt range specification; raised before any validation work starts. */
export class ConfigurationError extends Error {
  readonly kind: ConfigurationErrorKind;
  readonly context: GaitErrorContext;
  constructor(kind: ConfigurationErrorKind, message: string, context: GaitErrorContext = {}) {
    super(`${message}${describeContext(context)}`);
    this.kind = kind;
    this.context = context;
    this.name = "ConfigurationError";
  }
}

export class NotFoundError extends Error {
  readonly task: string;
  readonly variable?: string;
  constructor(task: string, variable?: string) {
    super(
      variable === undefined
        ? `no range expectations configured for task ${task}`
        : `no range expectations configured for ${variable} in task ${task}`,
    );
    this.task = task;
    this.variable = variable;
    this.name = "NotFoundError";
  }
}

export class InvalidParameterError extends Error {
  readonly parameter: string;
  constructor(parameter: string, message: string) {
    super(`${parameter}: ${message}`);
    this.parameter = parameter;
    this.name = "InvalidParameterError";
  }
}
