import { describe, expect, it } from "vitest";
import { DriveSessionService, SessionLimitError, SessionNotFoundError } from "./driveSessionService";

describe("DriveSessionService", () => {
  it("creates sessions at track selection", () => {
    const service = DriveSessionService.create(4);
    const summary = service.createSession({ seed: 7 });
    expect(summary.seed).toBe(7);
    expect(summary.snapshot.phase).toBe("music_select");
    expect(service.listSessionIds()).toEqual([summary.id]);
  });

  it("enforces the session limit", () => {
    const service = DriveSessionService.create(1);
    service.createSession({ seed: 1 });
    expect(() => service.createSession({ seed: 2 })).toThrow(SessionLimitError);
  });

  it("reports unknown sessions", () => {
    const service = DriveSessionService.create(1);
    expect(() => service.getSession("missing")).toThrow(SessionNotFoundError);
    expect(() => service.step("missing", { dt: 0.016 })).toThrow(SessionNotFoundError);
  });

  it("drains feedback events from selections and commands", () => {
    const service = DriveSessionService.create(1);
    const { id } = service.createSession({ seed: 3 });

    const preview = service.command(id, { command: "preview", trackId: "turbo_rush" });
    expect(preview.events).toEqual([{ type: "music", action: "preview", value: "turbo_rush" }]);

    const picked = service.select(id, { type: "track_selected", trackId: "sunset_cruise" });
    expect(picked.events).toEqual([{ type: "phase", from: "music_select", to: "vehicle_select" }]);
    expect(picked.snapshot.selectedTrack?.id).toBe("sunset_cruise");

    service.select(id, { type: "vehicle_selected", vehicleId: "kids_drawing" });
    const started = service.command(id, { command: "start" });
    expect(started.events).toEqual([
      { type: "phase", from: "ready", to: "racing" },
      { type: "music", action: "volume", value: 0.7 },
      { type: "music", action: "crossfade", value: "sunset_cruise" },
    ]);

    const stepped = service.step(id, { dt: 0.016, frames: 10, input: { accelerate: true } });
    expect(stepped.snapshot.race.timeRemaining).toBeCloseTo(120 - 0.16, 6);
    expect(stepped.droppedEvents).toBe(0);
    expect(stepped.navigation).toBeNull();
  });

  it("rejects commands that do not apply", () => {
    const service = DriveSessionService.create(1);
    const { id } = service.createSession({ seed: 3 });
    expect(() => service.command(id, { command: "end" })).toThrow("Command end is not accepted during music_select");
    expect(() => service.command(id, { command: "preview" })).toThrow("trackId is required for preview");
    expect(() => service.select(id, { type: "track_selected", trackId: "polka" })).toThrow("Unknown track polka");
  });

  it("bounds the frame count of a step", () => {
    const service = DriveSessionService.create(1);
    const { id } = service.createSession({ seed: 3 });
    expect(() => service.step(id, { dt: 0.016, frames: 0 })).toThrow("frames must be an integer between 1 and 600");
    expect(() => service.step(id, { dt: 0.016, frames: 1.5 })).toThrow("frames must be an integer between 1 and 600");
  });

  it("reports navigation once and frees deleted sessions", () => {
    const service = DriveSessionService.create(1);
    const { id } = service.createSession({ seed: 3 });
    const cancelled = service.select(id, { type: "cancelled" });
    expect(cancelled.navigation).toBe("hub");
    expect(cancelled.events).toEqual([{ type: "navigate", target: "hub" }]);
    expect(service.step(id, { dt: 0.016 }).navigation).toBeNull();

    service.deleteSession(id);
    expect(service.listSessionIds()).toEqual([]);
    expect(() => service.getResults(id)).toThrow(SessionNotFoundError);
  });
});
