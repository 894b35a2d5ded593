import type { DriveInput, GamePhase, HazardKind, RaceResults, VehicleClass } from "../models/drive";

export interface ObstacleView {
  /** Lateral offset from the player in normalized screen units; positive is to the right. */
  dx: number;
  /** Longitudinal distance ahead of the player. */
  dy: number;
  label: VehicleClass | HazardKind;
}

export interface AutopilotObservation {
  phase: GamePhase;
  timeRemaining: number;
  speed: number;
  x: number;
  roadLeft: number;
  roadRight: number;
  roadCenter: number;
  curve: number;
  turnDirection: number;
  turnSeverity: number;
  slipFactor: number;
  isOffRoad: boolean;
  nearestObstacle: ObstacleView | null;
}

export type AutopilotPolicy = (observation: AutopilotObservation) => DriveInput;

export interface RunMetadata {
  label: string;
  description?: string;
}

export interface RunSummary {
  frames: number;
  durationSeconds: number;
  collisions: number;
  crashes: number;
  slipHits: number;
  offRoadSeconds: number;
}

export interface RunRecord {
  runId: string;
  seed: number;
  trackId: string;
  vehicleId: string;
  metadata: RunMetadata;
  results: RaceResults;
  summary: RunSummary;
}
