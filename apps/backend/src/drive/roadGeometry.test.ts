import { describe, expect, it } from "vitest";
import { DEFAULT_DRIVE_TUNING } from "../config/driveTuning";
import { createRng } from "../utils/random";
import { RoadGeometryModel, deriveRoadBoundaries, laneCenterInBand } from "./roadGeometry";

const { road, screen } = DEFAULT_DRIVE_TUNING;

describe("deriveRoadBoundaries", () => {
  it("insets the straight road by the player's half width", () => {
    const boundaries = deriveRoadBoundaries(0, 500, screen, road);
    expect(boundaries.left).toBe(422 / 1280);
    expect(boundaries.right).toBe(858 / 1280);
  });

  it("shifts the band with the curve", () => {
    const boundaries = deriveRoadBoundaries(0.5, 500, screen, road);
    expect(boundaries.left).toBe(522 / 1280);
    expect(boundaries.right).toBe(958 / 1280);
  });

  it("keeps left < right for degenerate curves and widths", () => {
    const curves = [-10, -1, 0, 1, 10, Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY];
    const widths = [-1000, 0, 10, 64, 500, 5000, Number.NaN];
    for (const curve of curves) {
      for (const width of widths) {
        const { left, right } = deriveRoadBoundaries(curve, width, screen, road);
        expect(left).toBeLessThan(right);
        expect(left).toBeGreaterThanOrEqual(0);
        expect(right).toBeLessThanOrEqual(1);
      }
    }
  });

  it("falls back to a centred band when the road is narrower than the car", () => {
    const boundaries = deriveRoadBoundaries(0, 40, screen, road);
    expect(boundaries.left).toBeCloseTo(0.4, 10);
    expect(boundaries.right).toBeCloseTo(0.6, 10);
  });

  it("falls back around screen centre for a non-finite curve", () => {
    const boundaries = deriveRoadBoundaries(Number.NaN, 500, screen, road);
    expect(boundaries.left).toBeCloseTo(0.4, 10);
    expect(boundaries.right).toBeCloseTo(0.6, 10);
  });
});

describe("RoadGeometryModel", () => {
  it("lets a turn own the curve through the low-pass filter", () => {
    const model = new RoadGeometryModel(road, screen);
    model.advance({ dt: 0.016, speed: 0, isTurning: true, turnCurve: -0.5 });
    expect(model.getCurve()).toBeCloseTo(-0.35, 10);
  });

  it("relaxes the previous bend on a straight", () => {
    const model = new RoadGeometryModel(road, screen);
    model.advance({ dt: 0.016, speed: 0, isTurning: true, turnCurve: -0.5 });
    model.advance({ dt: 0.016, speed: 0, isTurning: false, turnCurve: 0 });
    expect(model.getCurve()).toBeCloseTo(-0.35 * 0.95 * 0.7, 10);
  });

  it("advances the road position with speed", () => {
    const model = new RoadGeometryModel(road, screen);
    model.advance({ dt: 0.5, speed: 0.8, isTurning: false, turnCurve: 0 });
    expect(model.getSnapshot().roadPosition).toBeCloseTo(4, 10);
  });

  it("holds the boundary invariant over a long randomized drive", () => {
    const rng = createRng(11);
    const model = new RoadGeometryModel(road, screen);
    for (let frame = 0; frame < 5000; frame += 1) {
      const isTurning = rng.chance(0.4);
      model.advance({
        dt: rng.between(0, 0.1),
        speed: rng.between(0, 1),
        isTurning,
        turnCurve: isTurning ? rng.between(-1, 1) : 0,
      });
      const { left, right } = model.getBoundaries();
      expect(left).toBeLessThan(right);
    }
  });

  it("offsets scanlines only below the horizon", () => {
    const model = new RoadGeometryModel(road, screen);
    expect(model.curveOffsetAtScanline(100)).toBe(0);
    expect(model.curveOffsetAtScanline(360)).toBe(50);
    expect(model.curveOffsetAtScanline(720)).toBe(-50);
  });

  it("resets to a straight road", () => {
    const model = new RoadGeometryModel(road, screen);
    model.advance({ dt: 0.1, speed: 1, isTurning: true, turnCurve: 0.9 });
    model.reset();
    expect(model.getCurve()).toBe(0);
    expect(model.getBoundaries()).toEqual({ left: 422 / 1280, right: 858 / 1280 });
  });

  it("centres lanes inside the live lane band", () => {
    const model = new RoadGeometryModel(road, screen);
    expect(model.getLaneBand()).toEqual({ left: 390 / 1280, right: 890 / 1280, width: 500 / 1280 });
    expect(model.laneCenter(1)).toBeCloseTo(0.353515625, 10);
    expect(model.laneCenter(4)).toBeCloseTo(0.646484375, 10);
  });
});

describe("laneCenterInBand", () => {
  it("places oncoming lanes on the left half and same-direction lanes on the right", () => {
    const band = { left: 0.3, right: 0.7, width: 0.4 };
    expect(laneCenterInBand(band, 1)).toBeCloseTo(0.35, 10);
    expect(laneCenterInBand(band, 2)).toBeCloseTo(0.45, 10);
    expect(laneCenterInBand(band, 3)).toBeCloseTo(0.55, 10);
    expect(laneCenterInBand(band, 4)).toBeCloseTo(0.65, 10);
  });
});
