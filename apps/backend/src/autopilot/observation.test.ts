import { describe, expect, it } from "vitest";
import { DriveSessionController, MUSIC_TRACKS, VEHICLE_OPTIONS } from "../drive";
import { buildObservation } from "./observation";

const racingSnapshot = () => {
  const controller = new DriveSessionController({ seed: 9 });
  const [track] = MUSIC_TRACKS;
  const [vehicle] = VEHICLE_OPTIONS;
  if (!track || !vehicle) throw new Error("catalog is empty");
  controller.enter();
  controller.handleSelection({ type: "track_selected", track });
  controller.handleSelection({ type: "vehicle_selected", vehicle });
  controller.command("start");
  return controller;
};

describe("buildObservation", () => {
  it("reports the nearest obstacle ahead within the look window", () => {
    const controller = racingSnapshot();
    const { traffic, hazards, road } = controller.components;
    const band = road.getLaneBand();
    hazards.spawnStaticHazard("cone", 0.52, 90, 3);
    hazards.spawnStaticHazard("warning_sign", 0.5, 20, 0);
    traffic.addVehicle({ lane: 3, y: 140, speed: 0.5, x: 0.48 }, band);
    traffic.addVehicle({ lane: 3, y: -40, speed: 0.5, x: 0.5 }, band);
    traffic.addVehicle({ lane: 4, y: 30, speed: 0.5, x: 0.65 }, band);

    const observation = buildObservation(controller.getSnapshot());

    expect(observation.nearestObstacle?.label).toBe("cone");
    expect(observation.nearestObstacle?.dy).toBe(90);
    expect(observation.nearestObstacle?.dx).toBeCloseTo(0.02, 10);
    expect(observation.roadCenter).toBeCloseTo(0.5, 10);
    expect(observation.turnDirection).toBe(0);
  });

  it("reports a clear road", () => {
    const observation = buildObservation(racingSnapshot().getSnapshot());
    expect(observation.nearestObstacle).toBeNull();
    expect(observation.phase).toBe("racing");
    expect(observation.timeRemaining).toBe(120);
  });
});
