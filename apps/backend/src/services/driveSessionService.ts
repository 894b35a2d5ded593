import { randomUUID } from "crypto";
import { env } from "../config/env";
import { DEFAULT_DRIVE_TUNING, type DriveTuning, type DriveTuningOverrides } from "../config/driveTuning";
import { DriveSessionController, MUSIC_TRACKS, VEHICLE_OPTIONS, findTrack, findVehicle, type SoundPort } from "../drive";
import type {
  DriveCommand,
  DriveInput,
  DriveSnapshot,
  FeedbackEvent,
  MusicTrack,
  NavigationTarget,
  RaceResults,
  SelectorOutcome,
  VehicleOption,
} from "../models/drive";
import { IDLE_INPUT } from "../models/drive";
import { logger } from "../utils/logger";

const EVENT_LOG_LIMIT = 256;
export const MAX_FRAMES_PER_STEP = 600;

export class SessionNotFoundError extends Error {
  constructor(id: string) {
    super(`Drive session ${id} not found`);
    this.name = "SessionNotFoundError";
  }
}

export class SessionLimitError extends Error {
  constructor(limit: number) {
    super(`Session limit of ${limit} reached`);
    this.name = "SessionLimitError";
  }
}

/** Keeps the most recent feedback events until the host drains them. */
class FeedbackLog {
  private events: FeedbackEvent[] = [];
  private dropped = 0;

  push(event: FeedbackEvent) {
    this.events.push(event);
    if (this.events.length > EVENT_LOG_LIMIT) {
      this.events.shift();
      this.dropped += 1;
    }
  }

  drain(): { events: FeedbackEvent[]; dropped: number } {
    const drained = { events: this.events, dropped: this.dropped };
    this.events = [];
    this.dropped = 0;
    return drained;
  }
}

/** Sound port for a remote host: every call becomes a feedback event the client replays. */
const recordingSoundPort = (log: FeedbackLog): SoundPort => ({
  playSound: (id) => log.push({ type: "sound", id }),
  setMusicVolume: (volume) => log.push({ type: "music", action: "volume", value: volume }),
  crossfade: (track) => log.push({ type: "music", action: "crossfade", value: track.id }),
  preview: (track) => log.push({ type: "music", action: "preview", value: track.id }),
  stop: (fadeMs) =>
    log.push(fadeMs === undefined ? { type: "music", action: "stop" } : { type: "music", action: "stop", value: fadeMs }),
});

interface SessionEntry {
  id: string;
  createdAt: string;
  controller: DriveSessionController;
  log: FeedbackLog;
}

export interface CreateSessionRequest {
  seed?: number;
  tuning?: DriveTuningOverrides;
}

export interface StepRequest {
  dt: number;
  frames?: number;
  input?: Partial<DriveInput>;
}

export type SelectionRequest =
  | { type: "track_selected"; trackId: string }
  | { type: "vehicle_selected"; vehicleId: string }
  | { type: "cancelled" };

export interface CommandRequest {
  command: DriveCommand;
  trackId?: string;
}

export interface SessionSummary {
  id: string;
  createdAt: string;
  seed: number | null;
  snapshot: DriveSnapshot;
}

export interface StepResult {
  snapshot: DriveSnapshot;
  events: FeedbackEvent[];
  droppedEvents: number;
  navigation: NavigationTarget | null;
}

export class DriveSessionService {
  private static instance: DriveSessionService;

  private readonly sessions = new Map<string, SessionEntry>();

  private constructor(private readonly maxSessions: number) {}

  static getInstance(): DriveSessionService {
    if (!DriveSessionService.instance) {
      DriveSessionService.instance = new DriveSessionService(env.maxSessions);
    }
    return DriveSessionService.instance;
  }

  /** Standalone registry, for tests and embedding. */
  static create(maxSessions: number): DriveSessionService {
    return new DriveSessionService(maxSessions);
  }

  getCatalog(): { tracks: readonly MusicTrack[]; vehicles: readonly VehicleOption[] } {
    return { tracks: MUSIC_TRACKS, vehicles: VEHICLE_OPTIONS };
  }

  getDefaultTuning(): Readonly<DriveTuning> {
    return DEFAULT_DRIVE_TUNING;
  }

  listSessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  createSession(request: CreateSessionRequest = {}): SessionSummary {
    if (this.sessions.size >= this.maxSessions) {
      throw new SessionLimitError(this.maxSessions);
    }

    const log = new FeedbackLog();
    const seed = request.seed ?? env.defaultSeed;
    const controller = new DriveSessionController({
      ...(seed !== undefined ? { seed } : {}),
      ...(request.tuning ? { tuning: request.tuning } : {}),
      sound: recordingSoundPort(log),
      onEvent: (event) => log.push(event),
    });
    controller.enter();

    const entry: SessionEntry = {
      id: randomUUID(),
      createdAt: new Date().toISOString(),
      controller,
      log,
    };
    this.sessions.set(entry.id, entry);
    logger.info("Drive session created", { id: entry.id, seed: controller.seed });
    return this.summarize(entry);
  }

  getSession(id: string): SessionSummary {
    return this.summarize(this.require(id));
  }

  deleteSession(id: string) {
    const entry = this.require(id);
    entry.controller.exit();
    this.sessions.delete(id);
    logger.info("Drive session closed", { id });
  }

  step(id: string, request: StepRequest): StepResult {
    const entry = this.require(id);
    const frames = request.frames ?? 1;
    if (!Number.isInteger(frames) || frames < 1 || frames > MAX_FRAMES_PER_STEP) {
      throw new Error(`frames must be an integer between 1 and ${MAX_FRAMES_PER_STEP}`);
    }
    const input: DriveInput = { ...IDLE_INPUT, ...request.input };
    for (let frame = 0; frame < frames; frame += 1) {
      entry.controller.update(request.dt, input);
    }
    return this.drain(entry);
  }

  select(id: string, request: SelectionRequest): StepResult {
    const entry = this.require(id);
    const outcome = this.resolveSelection(request);
    if (!entry.controller.handleSelection(outcome)) {
      throw new Error(`Selection ${request.type} is not accepted during ${entry.controller.getPhase()}`);
    }
    return this.drain(entry);
  }

  command(id: string, request: CommandRequest): StepResult {
    const entry = this.require(id);
    const { controller } = entry;
    let accepted: boolean;
    if (request.command === "preview") {
      if (request.trackId === undefined) {
        throw new Error("trackId is required for preview");
      }
      accepted = controller.previewTrack(this.requireTrack(request.trackId));
    } else {
      accepted = controller.command(request.command);
    }
    if (!accepted) {
      throw new Error(`Command ${request.command} is not accepted during ${controller.getPhase()}`);
    }
    logger.debug("Drive command applied", { id, command: request.command });
    return this.drain(entry);
  }

  getResults(id: string): RaceResults {
    return this.require(id).controller.getResults();
  }

  clear() {
    for (const entry of this.sessions.values()) {
      entry.controller.exit();
    }
    this.sessions.clear();
  }

  private resolveSelection(request: SelectionRequest): SelectorOutcome {
    switch (request.type) {
      case "track_selected":
        return { type: "track_selected", track: this.requireTrack(request.trackId) };
      case "vehicle_selected": {
        const vehicle = findVehicle(request.vehicleId);
        if (!vehicle) {
          throw new Error(`Unknown vehicle ${request.vehicleId}`);
        }
        return { type: "vehicle_selected", vehicle };
      }
      case "cancelled":
        return { type: "cancelled" };
    }
  }

  private requireTrack(trackId: string): MusicTrack {
    const track = findTrack(trackId);
    if (!track) {
      throw new Error(`Unknown track ${trackId}`);
    }
    return track;
  }

  private drain(entry: SessionEntry): StepResult {
    const { events, dropped } = entry.log.drain();
    return {
      snapshot: entry.controller.getSnapshot(),
      events,
      droppedEvents: dropped,
      navigation: entry.controller.consumeNavigation(),
    };
  }

  private summarize(entry: SessionEntry): SessionSummary {
    return {
      id: entry.id,
      createdAt: entry.createdAt,
      seed: entry.controller.seed,
      snapshot: entry.controller.getSnapshot(),
    };
  }

  private require(id: string): SessionEntry {
    const entry = this.sessions.get(id);
    if (!entry) {
      throw new SessionNotFoundError(id);
    }
    return entry;
  }
}
