import { describe, expect, it } from "vitest";
import { DEFAULT_DRIVE_TUNING, parseDriveTuning, resolveDriveTuning } from "./driveTuning";

describe("resolveDriveTuning", () => {
  it("merges overrides section by section", () => {
    const tuning = resolveDriveTuning({ player: { maxSpeed: 0.8 } });
    expect(tuning.player.maxSpeed).toBe(0.8);
    expect(tuning.player.acceleration).toBe(DEFAULT_DRIVE_TUNING.player.acceleration);
    expect(tuning.road).toEqual(DEFAULT_DRIVE_TUNING.road);
  });
});

describe("parseDriveTuning", () => {
  it("returns the defaults when nothing is given", () => {
    expect(parseDriveTuning(undefined)).toEqual(DEFAULT_DRIVE_TUNING);
  });

  it("accepts known numeric and range settings", () => {
    const tuning = parseDriveTuning({ session: { raceDuration: 60, comicTextInterval: [5, 6] } });
    expect(tuning.session.raceDuration).toBe(60);
    expect(tuning.session.comicTextInterval).toEqual([5, 6]);
    expect(tuning.session.totalRacers).toBe(8);
  });

  it("names the first problem it finds", () => {
    expect(() => parseDriveTuning("fast")).toThrow("tuning must be an object");
    expect(() => parseDriveTuning({ weather: {} })).toThrow("tuning.weather is not a known section");
    expect(() => parseDriveTuning({ player: 3 })).toThrow("tuning.player must be an object");
    expect(() => parseDriveTuning({ player: { maxSpeed: "1" } })).toThrow("tuning.player.maxSpeed must be a finite number");
    expect(() => parseDriveTuning({ traffic: { aheadSpeed: [1] } })).toThrow(
      "tuning.traffic.aheadSpeed must be an array of 2 numbers",
    );
  });
});
