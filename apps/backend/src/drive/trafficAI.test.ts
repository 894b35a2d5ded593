import { describe, expect, it } from "vitest";
import { DEFAULT_DRIVE_TUNING, resolveDriveTuning } from "../config/driveTuning";
import type { LaneBand } from "../models/drive";
import { createRng, rngFromSource } from "../utils/random";
import { laneCenterInBand } from "./roadGeometry";
import { TrafficAI } from "./trafficAI";

const band: LaneBand = { left: 390 / 1280, right: 890 / 1280, width: 500 / 1280 };
const quietRng = () => rngFromSource(() => 0.99);
const eagerRng = () => rngFromSource(() => 0);
const noSpawns = resolveDriveTuning({ traffic: { spawnInterval: 1000 } }).traffic;

describe("TrafficAI", () => {
  it("moves an oncoming truck toward the player", () => {
    const traffic = new TrafficAI(DEFAULT_DRIVE_TUNING.traffic, quietRng());
    const truck = traffic.addVehicle({ lane: 1, y: 50, speed: 1.0, vehicleClass: "truck" }, band);
    expect(truck.direction).toBe(-1);

    for (let step = 0; step < 100; step += 1) {
      traffic.update({ dt: 0.016, playerSpeed: 0.2, playerX: 0.5, band });
    }

    const [moved] = traffic.getVehicles();
    expect(moved?.id).toBe(truck.id);
    expect(moved?.y).toBeCloseTo(-94, 6);
  });

  it("lets the player overtake slower same-direction traffic", () => {
    const traffic = new TrafficAI(DEFAULT_DRIVE_TUNING.traffic, quietRng());
    traffic.addVehicle({ lane: 3, y: 100, speed: 0.1 }, band);
    traffic.update({ dt: 0.5, playerSpeed: 0.6, playerX: 0.5, band });
    expect(traffic.getVehicles()[0]?.y).toBeCloseTo(75, 10);
  });

  it("despawns vehicles that leave the longitudinal window", () => {
    const traffic = new TrafficAI(DEFAULT_DRIVE_TUNING.traffic, quietRng());
    traffic.addVehicle({ lane: 3, y: 690, speed: 1.2 }, band);
    for (let step = 0; step < 5; step += 1) {
      traffic.update({ dt: 0.016, playerSpeed: 0, playerX: 0.5, band });
    }
    expect(traffic.getVehicles()).toHaveLength(1);
    traffic.update({ dt: 0.016, playerSpeed: 0, playerX: 0.5, band });
    expect(traffic.getVehicles()).toHaveLength(0);
  });

  it("pulls a car that strays across the centre line back to its own half", () => {
    const traffic = new TrafficAI(DEFAULT_DRIVE_TUNING.traffic, quietRng());
    traffic.addVehicle({ lane: 3, y: 300, speed: 0.5, x: 0.35 }, band);
    traffic.update({ dt: 0.016, playerSpeed: 0.5, playerX: 0.5, band });
    expect(traffic.getVehicles()[0]?.x).toBeCloseTo(0.52, 10);
  });

  it("keeps every vehicle within its direction's half over a long run", () => {
    const tuning = resolveDriveTuning({ traffic: { spawnInterval: 0.1, spawnProbability: 1 } }).traffic;
    const traffic = new TrafficAI(tuning, createRng(7));
    const center = band.left + band.width / 2;
    const margin = tuning.boundaryMargin;
    const rng = createRng(99);

    for (let step = 0; step < 3000; step += 1) {
      traffic.update({ dt: 0.05, playerSpeed: rng.between(0.2, 1), playerX: rng.between(0.35, 0.65), band });
      for (const car of traffic.getVehicles()) {
        if (car.direction === 1) {
          expect(car.x).toBeGreaterThanOrEqual(center + margin - 1e-9);
          expect(car.x).toBeLessThanOrEqual(band.right - margin + 1e-9);
          expect(car.lane).toBeGreaterThanOrEqual(3);
        } else {
          expect(car.x).toBeGreaterThanOrEqual(band.left + margin - 1e-9);
          expect(car.x).toBeLessThanOrEqual(center - margin + 1e-9);
          expect(car.lane).toBeLessThanOrEqual(2);
        }
      }
      expect(traffic.getVehicles().length).toBeLessThanOrEqual(tuning.maxVehicles);
    }
  });

  describe("isLaneChangeSafe", () => {
    it("rejects a lane on the other side of the road", () => {
      const traffic = new TrafficAI(DEFAULT_DRIVE_TUNING.traffic, quietRng());
      const car = traffic.addVehicle({ lane: 3, y: 100, speed: 0.5 }, band);
      expect(traffic.isLaneChangeSafe(car, 2, band, 0.3)).toBe(false);
    });

    it("rejects a lane occupied within the safety gap", () => {
      const traffic = new TrafficAI(DEFAULT_DRIVE_TUNING.traffic, quietRng());
      const car = traffic.addVehicle({ lane: 3, y: 100, speed: 0.5 }, band);
      traffic.addVehicle({ lane: 4, y: 150, speed: 0.5 }, band);
      expect(traffic.isLaneChangeSafe(car, 4, band, 0.3)).toBe(false);
    });

    it("accepts a lane whose traffic is far enough away", () => {
      const traffic = new TrafficAI(DEFAULT_DRIVE_TUNING.traffic, quietRng());
      const car = traffic.addVehicle({ lane: 3, y: 100, speed: 0.5 }, band);
      traffic.addVehicle({ lane: 4, y: 300, speed: 0.5 }, band);
      expect(traffic.isLaneChangeSafe(car, 4, band, 0.3)).toBe(true);
    });

    it("keeps same-direction cars from merging onto the player", () => {
      const traffic = new TrafficAI(DEFAULT_DRIVE_TUNING.traffic, quietRng());
      const car = traffic.addVehicle({ lane: 3, y: 50, speed: 0.5 }, band);
      expect(traffic.isLaneChangeSafe(car, 4, band, 0.6)).toBe(false);
      expect(traffic.isLaneChangeSafe(car, 4, band, 0.3)).toBe(true);
    });
  });

  it("ignores nudges for unknown vehicles", () => {
    const traffic = new TrafficAI(DEFAULT_DRIVE_TUNING.traffic, quietRng());
    const car = traffic.addVehicle({ lane: 2, y: 100, speed: 0.5 }, band);
    expect(traffic.nudgeVehicle(car.id + 1, 50)).toBe(false);
    expect(traffic.nudgeVehicle(car.id, -50)).toBe(true);
    expect(traffic.getVehicles()[0]?.y).toBe(50);
  });

  describe("lane changes", () => {
    it("slides a car into the next lane and settles on its centre", () => {
      const traffic = new TrafficAI(noSpawns, eagerRng());
      const car = traffic.addVehicle({ lane: 3, y: 300, speed: 0.5 }, band);

      traffic.update({ dt: 4.5, playerSpeed: 0.5, playerX: 0.3, band });
      const started = traffic.getVehicles()[0];
      expect(started?.ai).toEqual({ kind: "changing_lanes", targetX: laneCenterInBand(band, 4) });
      expect(started?.lane).toBe(4);
      expect(started?.x).toBe(laneCenterInBand(band, 3));

      traffic.update({ dt: 0.016, playerSpeed: 0.5, playerX: 0.3, band });
      expect(traffic.getVehicles()[0]?.x).toBeCloseTo(laneCenterInBand(band, 3) + 0.0128, 10);

      for (let step = 0; step < 10; step += 1) {
        traffic.update({ dt: 0.016, playerSpeed: 0.5, playerX: 0.3, band });
      }
      const settled = traffic.getVehicles()[0];
      expect(settled?.id).toBe(car.id);
      expect(settled?.ai.kind).toBe("cruising");
      expect(settled?.x).toBe(laneCenterInBand(band, 4));
    });

    it("brakes hard behind a close leader but never below the minimum speed", () => {
      const traffic = new TrafficAI(noSpawns, quietRng());
      traffic.addVehicle({ lane: 3, y: 0, speed: 0.5 }, band);
      traffic.addVehicle({ lane: 3, y: 40, speed: 0.1 }, band);

      traffic.update({ dt: 0.1, playerSpeed: 0, playerX: 0.3, band });
      expect(traffic.getVehicles()[0]?.speed).toBeCloseTo(0.3, 10);

      for (let step = 0; step < 10; step += 1) {
        traffic.update({ dt: 0.1, playerSpeed: 0, playerX: 0.3, band });
        expect(traffic.getVehicles()[0]?.speed).toBe(noSpawns.minNpcSpeed);
      }
      const [follower, leader] = traffic.getVehicles();
      expect(follower && leader ? leader.y - follower.y : 0).toBeGreaterThan(0);
    });

    it("merges out from behind a slower leader it cannot pass", () => {
      const traffic = new TrafficAI(noSpawns, eagerRng());
      const follower = traffic.addVehicle({ lane: 3, y: 0, speed: 0.5 }, band);
      traffic.addVehicle({ lane: 3, y: 70, speed: 0.3 }, band);

      traffic.update({ dt: 0.1, playerSpeed: 0.5, playerX: 0.3, band });

      const merged = traffic.getVehicles().find((vehicle) => vehicle.id === follower.id);
      expect(merged?.lane).toBe(4);
      expect(merged?.ai).toEqual({ kind: "changing_lanes", targetX: laneCenterInBand(band, 4) });
    });

    it("stays in lane behind the leader when the merge roll fails", () => {
      const traffic = new TrafficAI(noSpawns, quietRng());
      const follower = traffic.addVehicle({ lane: 3, y: 0, speed: 0.5 }, band);
      traffic.addVehicle({ lane: 3, y: 70, speed: 0.3 }, band);

      traffic.update({ dt: 0.1, playerSpeed: 0.5, playerX: 0.3, band });

      const kept = traffic.getVehicles().find((vehicle) => vehicle.id === follower.id);
      expect(kept?.lane).toBe(3);
      expect(kept?.ai.kind).toBe("cruising");
      expect(kept?.speed).toBeLessThan(0.5);
    });
  });
});
