import { randomUUID } from "crypto";
import type { DriveTuningOverrides } from "../config/driveTuning";
import { DriveSessionController, MUSIC_TRACKS, VEHICLE_OPTIONS } from "../drive";
import type { FeedbackEvent, MusicTrack, VehicleOption } from "../models/drive";
import { randomSeed } from "../utils/random";
import { buildObservation } from "./observation";
import { laneKeeperPolicy } from "./policies/laneKeeper";
import type { AutopilotPolicy, RunMetadata, RunRecord, RunSummary } from "./runTypes";

const DEFAULT_FRAME_DT = 1 / 60;

export interface RunOptions {
  metadata: RunMetadata;
  seed?: number;
  frameDt?: number;
  maxFrames?: number;
  track?: MusicTrack;
  vehicle?: VehicleOption;
  tuning?: DriveTuningOverrides;
  policy?: AutopilotPolicy;
}

export interface RunBatchOptions extends RunOptions {
  runCount: number;
}

const firstOf = <T>(values: readonly T[], kind: string): T => {
  const [first] = values;
  if (first === undefined) {
    throw new Error(`No ${kind} available`);
  }
  return first;
};

/** Plays one whole race headless, from track selection to the finish. */
export const simulateRun = (options: RunOptions): RunRecord => {
  const seed = options.seed ?? randomSeed();
  const dt = options.frameDt ?? DEFAULT_FRAME_DT;
  const policy = options.policy ?? ((observation) => laneKeeperPolicy(observation));
  const track = options.track ?? firstOf(MUSIC_TRACKS, "music track");
  const vehicle = options.vehicle ?? firstOf(VEHICLE_OPTIONS, "vehicle");

  const summary: RunSummary = { frames: 0, durationSeconds: 0, collisions: 0, crashes: 0, slipHits: 0, offRoadSeconds: 0 };
  const countEvent = (event: FeedbackEvent) => {
    if (event.type === "collision") summary.collisions += 1;
    if (event.type === "crash") summary.crashes += 1;
    if (event.type === "effect" && event.effect === "slip") summary.slipHits += 1;
  };

  const controller = new DriveSessionController({
    seed,
    onEvent: countEvent,
    ...(options.tuning ? { tuning: options.tuning } : {}),
  });
  controller.enter();
  controller.handleSelection({ type: "track_selected", track });
  controller.handleSelection({ type: "vehicle_selected", vehicle });
  controller.command("start");

  const raceFrames = Math.ceil(controller.tuning.session.raceDuration / dt) + 1;
  const maxFrames = options.maxFrames ?? raceFrames;

  while (controller.getPhase() === "racing" && summary.frames < maxFrames) {
    const observation = buildObservation(controller.getSnapshot());
    controller.update(dt, policy(observation));
    summary.frames += 1;
    summary.durationSeconds += dt;
    if (observation.isOffRoad) {
      summary.offRoadSeconds += dt;
    }
  }
  if (controller.getPhase() === "racing") {
    controller.command("end");
  }

  return {
    runId: randomUUID(),
    seed,
    trackId: track.id,
    vehicleId: vehicle.id,
    metadata: options.metadata,
    results: controller.getResults(),
    summary,
  };
};

export const generateRunBatch = (options: RunBatchOptions): RunRecord[] => {
  const { runCount, ...runOptions } = options;
  const baseSeed = options.seed;
  const runs: RunRecord[] = [];
  for (let i = 0; i < runCount; i += 1) {
    runs.push(simulateRun({ ...runOptions, ...(baseSeed !== undefined ? { seed: baseSeed + i } : {}) }));
  }
  return runs;
};
