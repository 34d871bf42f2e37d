/**
 * Signal column naming: `<joint>_<motion>_<measurement>_<side>_<unit>`,
 * e.g. `knee_flexion_angle_ipsi_rad` or `hip_flexion_moment_contra_Nm_kg`.
 * Units may themselves contain an underscore.
 */

export const STANDARD_JOINTS = ["hip", "knee", "ankle", "pelvis", "trunk", "thigh", "shank", "foot"] as const;
export const STANDARD_MOTIONS = ["flexion", "adduction", "rotation", "tilt", "obliquity", "anterior", "lateral", "vertical"] as const;
export const STANDARD_MEASUREMENTS = ["angle", "velocity", "moment", "power", "force", "cop"] as const;
export const STANDARD_SIDES = ["ipsi", "contra"] as const;
export const STANDARD_UNITS = ["rad", "rad_s", "Nm", "Nm_kg", "W", "W_kg", "deg", "deg_s", "N", "BW", "m"] as const;

export type Side = (typeof STANDARD_SIDES)[number];

export type VariableNameParts = {
  joint: string;
  motion: string;
  measurement: string;
  side: Side;
  unit: string;
};

const includes = <T extends string>(list: readonly T[], value: string): value is T =>
  list.some((entry) => entry === value);

export function parseVariableName(name: string): VariableNameParts | null {
  const parts = name.split("_");
  if (parts.length < 5) return null;
  const [joint, motion, measurement, side, ...unitParts] = parts;
  const unit = unitParts.join("_");
  if (!includes(STANDARD_JOINTS, joint)) return null;
  if (!includes(STANDARD_MOTIONS, motion)) return null;
  if (!includes(STANDARD_MEASUREMENTS, measurement)) return null;
  if (!includes(STANDARD_SIDES, side)) return null;
  if (!includes(STANDARD_UNITS, unit)) return null;
  return { joint, motion, measurement, side, unit };
}

export const isStandardVariableName = (name: string): boolean => parseVariableName(name) !== null;

export const formatVariableName = (parts: VariableNameParts): string =>
  [parts.joint, parts.motion, parts.measurement, parts.side, parts.unit].join("_");

/** Name of the same signal on the other side, or null when no side is encoded. */
export function oppositeSideVariable(name: string): string | null {
  const parsed = parseVariableName(name);
  if (parsed) {
    return formatVariableName({ ...parsed, side: parsed.side === "ipsi" ? "contra" : "ipsi" });
  }
  if (name.includes("_ipsi")) return name.replace("_ipsi", "_contra");
  if (name.includes("_contra")) return name.replace("_contra", "_ipsi");
  return null;
}
