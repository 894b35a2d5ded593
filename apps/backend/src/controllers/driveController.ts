import { Request, Response } from "express";
import { parseDriveTuning } from "../config/driveTuning";
import type { DriveCommand, DriveInput } from "../models/drive";
import {
  DriveSessionService,
  SessionLimitError,
  SessionNotFoundError,
  type CommandRequest,
  type SelectionRequest,
} from "../services/driveSessionService";
import { logger } from "../utils/logger";

const INPUT_KEYS: ReadonlyArray<keyof DriveInput> = [
  "accelerate",
  "steerLeft",
  "steerRight",
  "pause",
  "quitToHub",
  "changeMusic",
];

const COMMANDS: readonly DriveCommand[] = [
  "start",
  "end",
  "restart",
  "change_music",
  "preview",
  "quit",
  "leaderboard",
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isCommand = (value: unknown): value is DriveCommand => COMMANDS.some((command) => command === value);

const paramId = (req: Request) => String(req.params.id);

const parseInput = (raw: unknown): Partial<DriveInput> => {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new Error("input must be an object");
  }
  const input: Partial<DriveInput> = {};
  for (const key of INPUT_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "boolean") {
      throw new Error(`input.${key} must be a boolean`);
    }
    input[key] = value;
  }
  return input;
};

const parseSelection = (body: Record<string, unknown>): SelectionRequest => {
  const { type, trackId, vehicleId } = body;
  if (type === "track_selected") {
    if (typeof trackId !== "string") throw new Error("trackId is required");
    return { type, trackId };
  }
  if (type === "vehicle_selected") {
    if (typeof vehicleId !== "string") throw new Error("vehicleId is required");
    return { type, vehicleId };
  }
  if (type === "cancelled") {
    return { type };
  }
  throw new Error("type must be one of track_selected, vehicle_selected, cancelled");
};

class DriveController {
  private readonly service = DriveSessionService.getInstance();

  getCatalog = (_req: Request, res: Response) => {
    res.json(this.service.getCatalog());
  };

  getTuning = (_req: Request, res: Response) => {
    res.json(this.service.getDefaultTuning());
  };

  createSession = (req: Request, res: Response) => {
    const body: unknown = req.body ?? {};
    this.handle(res, () => {
      if (!isRecord(body)) throw new Error("Body must be an object");
      const { seed, tuning } = body;
      if (seed !== undefined && !Number.isInteger(seed)) {
        throw new Error("seed must be an integer");
      }
      const overrides = parseDriveTuning(tuning);
      const summary = this.service.createSession({
        ...(typeof seed === "number" ? { seed } : {}),
        tuning: overrides,
      });
      res.status(201).json(summary);
    });
  };

  getSession = (req: Request, res: Response) => {
    this.handle(res, () => {
      res.json(this.service.getSession(paramId(req)));
    });
  };

  deleteSession = (req: Request, res: Response) => {
    this.handle(res, () => {
      this.service.deleteSession(paramId(req));
      res.status(204).send();
    });
  };

  step = (req: Request, res: Response) => {
    const body: unknown = req.body ?? {};
    this.handle(res, () => {
      if (!isRecord(body)) throw new Error("Body must be an object");
      const dt = Number(body.dt);
      if (body.dt === undefined || !Number.isFinite(dt)) {
        throw new Error("dt must be a number");
      }
      const frames = body.frames === undefined ? undefined : Number(body.frames);
      const input = parseInput(body.input);
      res.json(this.service.step(paramId(req), { dt, input, ...(frames !== undefined ? { frames } : {}) }));
    });
  };

  select = (req: Request, res: Response) => {
    const body: unknown = req.body ?? {};
    this.handle(res, () => {
      if (!isRecord(body)) throw new Error("Body must be an object");
      res.json(this.service.select(paramId(req), parseSelection(body)));
    });
  };

  command = (req: Request, res: Response) => {
    const body: unknown = req.body ?? {};
    this.handle(res, () => {
      if (!isRecord(body)) throw new Error("Body must be an object");
      const { command, trackId } = body;
      if (!isCommand(command)) {
        throw new Error(`command must be one of ${COMMANDS.join(", ")}`);
      }
      if (trackId !== undefined && typeof trackId !== "string") {
        throw new Error("trackId must be a string");
      }
      const request: CommandRequest = typeof trackId === "string" ? { command, trackId } : { command };
      res.json(this.service.command(paramId(req), request));
    });
  };

  getResults = (req: Request, res: Response) => {
    this.handle(res, () => {
      res.json(this.service.getResults(paramId(req)));
    });
  };

  private handle(res: Response, action: () => void) {
    try {
      action();
    } catch (error) {
      const message = error instanceof Error ? error.message : "Request failed";
      if (error instanceof SessionNotFoundError) {
        res.status(404).json({ error: message });
        return;
      }
      if (error instanceof SessionLimitError) {
        logger.warn("Drive session limit reached", { error: message });
        res.status(429).json({ error: message });
        return;
      }
      logger.warn("Drive request rejected", { error: message });
      res.status(400).json({ error: message });
    }
  }
}

export const driveController = new DriveController();
