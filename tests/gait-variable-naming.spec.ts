import { describe, expect, it } from "vitest";
import type { TRangeCheckpoint } from "@shared/gait-validation";
import {
  applyContralateralOffset,
  isGaitTask,
  shiftCheckpoints,
} from "../server/services/gait/contralateral-offset";
import {
  isStandardVariableName,
  oppositeSideVariable,
  parseVariableName,
} from "../server/services/gait/variable-naming";
import { HIP, KNEE, KNEE_CONTRA } from "./gait-fixtures";

describe("variable naming", () => {
  it("splits standard names into their parts, keeping multi-part units whole", () => {
    expect(parseVariableName("hip_flexion_moment_contra_Nm_kg")).toEqual({
      joint: "hip",
      motion: "flexion",
      measurement: "moment",
      side: "contra",
      unit: "Nm_kg",
    });
    expect(isStandardVariableName(KNEE)).toBe(true);
  });

  it("rejects names outside the convention", () => {
    expect(parseVariableName("emg_raw")).toBeNull();
    expect(parseVariableName("knee_flexion_angle_left_rad")).toBeNull();
    expect(parseVariableName("knee_flexion_angle_ipsi_furlongs")).toBeNull();
  });

  it("finds the opposite-side signal", () => {
    expect(oppositeSideVariable(KNEE)).toBe(KNEE_CONTRA);
    expect(oppositeSideVariable(KNEE_CONTRA)).toBe(KNEE);
    expect(oppositeSideVariable("custom_ipsi_signal")).toBe("custom_contra_signal");
    expect(oppositeSideVariable("emg_raw")).toBeNull();
  });
});

describe("contralateral offset", () => {
  it("rotates checkpoints half a cycle and restores the closing checkpoint", () => {
    const checkpoints: TRangeCheckpoint[] = [
      { phase_percent: 0, min: 0, max: 1 },
      { phase_percent: 25, min: 1, max: 2 },
      { phase_percent: 50, min: 2, max: 3 },
      { phase_percent: 75, min: 3, max: 4 },
      { phase_percent: 100, min: 0, max: 1 },
    ];
    expect(shiftCheckpoints(checkpoints)).toEqual([
      { phase_percent: 0, min: 2, max: 3 },
      { phase_percent: 25, min: 3, max: 4 },
      { phase_percent: 50, min: 0, max: 1 },
      { phase_percent: 75, min: 1, max: 2 },
      { phase_percent: 100, min: 2, max: 3 },
    ]);
  });

  it("shifts open-ended checkpoints without inventing a closing one", () => {
    expect(shiftCheckpoints([{ phase_percent: 10, min: 0, max: 1 }, { phase_percent: 70, min: 1, max: 2 }])).toEqual([
      { phase_percent: 20, min: 1, max: 2 },
      { phase_percent: 60, min: 0, max: 1 },
    ]);
  });

  it("adds contralateral ranges for gait tasks only, keeping configured ones", () => {
    const kneeRanges: TRangeCheckpoint[] = [{ phase_percent: 10, min: 0, max: 1 }];
    const hipContra: TRangeCheckpoint[] = [{ phase_percent: 0, min: 5, max: 6 }];
    const mirrored = applyContralateralOffset({
      level_walking: { [KNEE]: kneeRanges, [HIP]: kneeRanges, hip_flexion_angle_contra_rad: hipContra },
      sit_to_stand: { [KNEE]: kneeRanges },
    });

    expect(mirrored.level_walking[KNEE_CONTRA]).toEqual([{ phase_percent: 60, min: 0, max: 1 }]);
    expect(mirrored.level_walking.hip_flexion_angle_contra_rad).toBe(hipContra);
    expect(Object.keys(mirrored.sit_to_stand)).toEqual([KNEE]);
  });

  it("recognises gait tasks by name", () => {
    expect(isGaitTask("incline_walking_5deg")).toBe(true);
    expect(isGaitTask("sit_to_stand")).toBe(false);
  });
});
