/**
 * Tolerance and angle limits shared by the region classifiers
 */

// ±5% band around a reference value
export const TOLERANCE_FACTOR = 0.05;

// A lifted leg is never expected past horizontal
export const MIN_TARGET_LEG_ANGLE_DEGREES = 0;
export const MAX_TARGET_LEG_ANGLE_DEGREES = 90;

export const BUILTIN_TARGET_LEG_ANGLE_DEGREES = 10.0;

export function readNumberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

// Deployments can move the defaults without touching stored settings
export const DEFAULT_TARGET_LEG_ANGLE_DEGREES = readNumberEnv(
  'POSTURE_TARGET_LEG_ANGLE',
  BUILTIN_TARGET_LEG_ANGLE_DEGREES
);
export const DEFAULT_TOLERANCE_FACTOR = readNumberEnv(
  'POSTURE_TOLERANCE_FACTOR',
  TOLERANCE_FACTOR
);
