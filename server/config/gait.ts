// Centralized environment switches for the gait validation engine
const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

const numberOr = (value: string | undefined, fallback: number): number => {
  if (value === undefined || !value.trim()) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parsePointsPerCycle = (value: string | undefined): number => {
  const requested = Math.floor(numberOr(value, 150));
  return requested >= 2 ? requested : 150;
};

const parsePhaseStep = (value: string | undefined): number => {
  const requested = numberOr(value, 5);
  if (requested <= 0 || requested > 100 || 100 % requested !== 0) return 5;
  return requested;
};

const parseFraction = (value: string | undefined, fallback: number): number => {
  const requested = numberOr(value, fallback);
  return requested >= 0 && requested <= 1 ? requested : fallback;
};

export type GaitValidationConfig = {
  pointsPerCycle: number;
  tunePhaseStep: number;
  tunePercentileLow: number;
  tunePercentileHigh: number;
  qualityGate: number;
  logToStdout: boolean;
  logBufferSize: number;
};

export const resolveGaitValidationConfig = (env: NodeJS.ProcessEnv): GaitValidationConfig => {
  const bufferRequested = Math.floor(numberOr(env.GAIT_VALIDATION_LOG_BUFFER_SIZE, 200));
  return {
    pointsPerCycle: parsePointsPerCycle(env.GAIT_POINTS_PER_CYCLE),
    tunePhaseStep: parsePhaseStep(env.GAIT_TUNE_PHASE_STEP),
    tunePercentileLow: numberOr(env.GAIT_TUNE_PERCENTILE_LOW, 5),
    tunePercentileHigh: numberOr(env.GAIT_TUNE_PERCENTILE_HIGH, 95),
    qualityGate: parseFraction(env.GAIT_QUALITY_GATE, 0.9),
    logToStdout: flagEnabled(env.GAIT_VALIDATION_LOG_STDOUT, true),
    logBufferSize: Math.min(Math.max(25, bufferRequested < 1 ? 200 : bufferRequested), 1000),
  };
};

export const GAIT_CONFIG = resolveGaitValidationConfig(process.env);
