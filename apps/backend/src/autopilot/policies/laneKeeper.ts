import { IDLE_INPUT, type DriveInput } from "../../models/drive";
import { clamp } from "../../utils/math";
import type { AutopilotObservation } from "../runTypes";

export interface LaneKeeperOptions {
  /** Fraction of the right half of the road to hold, 0 at the centre line, 1 at the edge. */
  lanePosition: number;
  deadband: number;
  dodgeOffset: number;
  brakeDistance: number;
  cornerSpeed: number;
  cornerSeverity: number;
}

const DEFAULT_OPTIONS: LaneKeeperOptions = {
  lanePosition: 0.5,
  deadband: 0.01,
  dodgeOffset: 0.07,
  brakeDistance: 60,
  cornerSpeed: 0.75,
  cornerSeverity: 0.5,
};

export const laneKeeperPolicy = (
  observation: AutopilotObservation,
  options: Partial<LaneKeeperOptions> = {},
): DriveInput => {
  const merged = { ...DEFAULT_OPTIONS, ...options };
  const { roadLeft, roadRight, roadCenter, x, nearestObstacle } = observation;

  let targetX = roadCenter + (roadRight - roadCenter) * merged.lanePosition;
  let accelerate = true;

  if (nearestObstacle) {
    const obstacleX = x + nearestObstacle.dx;
    const passRight = obstacleX + merged.dodgeOffset;
    const passLeft = obstacleX - merged.dodgeOffset;
    targetX = passRight <= roadRight ? passRight : passLeft;
    if (nearestObstacle.dy < merged.brakeDistance) {
      accelerate = false;
    }
  }

  if (observation.turnSeverity > merged.cornerSeverity && observation.speed > merged.cornerSpeed) {
    accelerate = false;
  }

  targetX = clamp(targetX, roadLeft, roadRight);
  return {
    ...IDLE_INPUT,
    accelerate,
    steerLeft: x > targetX + merged.deadband,
    steerRight: x < targetX - merged.deadband,
  };
};
