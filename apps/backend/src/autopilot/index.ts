export { buildObservation, DEFAULT_OBSERVATION_OPTIONS } from "./observation";
export type { ObservationOptions } from "./observation";
export { laneKeeperPolicy } from "./policies/laneKeeper";
export type { LaneKeeperOptions } from "./policies/laneKeeper";
export { generateRunBatch, simulateRun } from "./runGenerator";
export type { RunBatchOptions, RunOptions } from "./runGenerator";
export type {
  AutopilotObservation,
  AutopilotPolicy,
  ObstacleView,
  RunMetadata,
  RunRecord,
  RunSummary,
} from "./runTypes";
