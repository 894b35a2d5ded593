import type { DriveSnapshot } from "../models/drive";
import type { AutopilotObservation, ObstacleView } from "./runTypes";

export interface ObservationOptions {
  lookAhead: number;
  lookWidth: number;
}

export const DEFAULT_OBSERVATION_OPTIONS: Readonly<ObservationOptions> = {
  lookAhead: 160,
  lookWidth: 0.06,
};

const directionSign = (snapshot: DriveSnapshot) => {
  if (snapshot.turn.phase === "turning_left") return -1;
  if (snapshot.turn.phase === "turning_right") return 1;
  return 0;
};

/** Reduces a full snapshot to what a driver sees: the road edges and the closest thing in the way. */
export const buildObservation = (
  snapshot: DriveSnapshot,
  options: ObservationOptions = DEFAULT_OBSERVATION_OPTIONS,
): AutopilotObservation => {
  const { player, road } = snapshot;

  const candidates: ObstacleView[] = [
    ...snapshot.vehicles.map((vehicle) => ({ dx: vehicle.x - player.x, dy: vehicle.y, label: vehicle.vehicleClass })),
    ...snapshot.hazards
      .filter((hazard) => hazard.kind !== "warning_sign")
      .map((hazard) => ({ dx: hazard.x - player.x, dy: hazard.y, label: hazard.kind })),
  ];
  const nearestObstacle = candidates
    .filter((obstacle) => obstacle.dy > 0 && obstacle.dy <= options.lookAhead && Math.abs(obstacle.dx) <= options.lookWidth)
    .reduce<ObstacleView | null>((nearest, obstacle) => (nearest === null || obstacle.dy < nearest.dy ? obstacle : nearest), null);

  return {
    phase: snapshot.phase,
    timeRemaining: snapshot.race.timeRemaining,
    speed: player.speed,
    x: player.x,
    roadLeft: road.left,
    roadRight: road.right,
    roadCenter: (road.left + road.right) / 2,
    curve: road.curve,
    turnDirection: directionSign(snapshot),
    turnSeverity: snapshot.turn.intensity * snapshot.turn.progress,
    slipFactor: snapshot.slipFactor,
    isOffRoad: player.isOffRoad,
    nearestObstacle,
  };
};
