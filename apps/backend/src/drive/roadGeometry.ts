import type { RoadTuning, ScreenTuning } from "../config/driveTuning";
import type { Lane, LaneBand, RoadBoundaries, RoadState } from "../models/drive";
import { clamp } from "../utils/math";

export interface RoadAdvanceInput {
  dt: number;
  speed: number;
  isTurning: boolean;
  turnCurve: number;
}

/**
 * Normalized drivable band for a road centred `curve * curveScreenScalePx` pixels
 * off screen centre and `widthPx` wide, narrowed by the player's half width.
 * Always returns left < right.
 */
export const deriveRoadBoundaries = (
  curve: number,
  widthPx: number,
  screen: ScreenTuning,
  road: RoadTuning,
): RoadBoundaries => {
  const centerPx = Math.floor(screen.width / 2) + Math.trunc(curve * road.curveScreenScalePx);
  const halfWidthPx = Math.floor(widthPx / 2);
  const safeLeftPx = centerPx - halfWidthPx + road.playerHalfWidthPx;
  const safeRightPx = centerPx + halfWidthPx - road.playerHalfWidthPx;

  const left = Math.max(0, safeLeftPx / screen.width);
  const right = Math.min(1, safeRightPx / screen.width);
  if (left < right) {
    return { left, right };
  }

  const mid = (left + right) / 2;
  const center = Number.isFinite(mid) ? clamp(mid, 0, 1) : 0.5;
  return {
    left: Math.max(0, center - road.fallbackHalfBand),
    right: Math.min(1, center + road.fallbackHalfBand),
  };
};

export class RoadGeometryModel {
  private curve = 0;
  private widthOscillation = 0;
  private surfaceNoise = 0;
  private speedShimmer = 0;
  private roadPosition = 0;
  private boundaries: RoadBoundaries;

  constructor(
    private readonly road: RoadTuning,
    private readonly screen: ScreenTuning,
  ) {
    this.boundaries = deriveRoadBoundaries(0, road.baseWidthPx, screen, road);
  }

  reset() {
    this.curve = 0;
    this.widthOscillation = 0;
    this.surfaceNoise = 0;
    this.speedShimmer = 0;
    this.roadPosition = 0;
    this.boundaries = deriveRoadBoundaries(0, this.road.baseWidthPx, this.screen, this.road);
  }

  advance({ dt, speed, isTurning, turnCurve }: RoadAdvanceInput) {
    const road = this.road;
    this.roadPosition += speed * dt * road.positionRate;
    const position = this.roadPosition;

    const freewayCurve = Math.sin(position * road.freewayCurveFrequency) * road.freewayCurveAmplitude;
    const freewayVariation =
      Math.sin(position * road.freewayCurveFrequency * road.freewayVariationFrequencyRatio) *
      road.freewayCurveAmplitude *
      road.freewayVariationAmplitudeRatio;
    const influence = isTurning ? road.turningFreewayInfluence : road.straightFreewayInfluence;

    // A turn owns the curve outright; a straight lets the previous bend relax.
    const previous = isTurning ? turnCurve : this.curve * road.straightCurveDecay;
    this.curve =
      previous * road.curveSmoothing +
      (freewayCurve + freewayVariation) * influence * (1 - road.curveSmoothing);

    const primaryFrequency = road.primaryWidthFrequency + speed * road.primaryWidthSpeedFactor;
    const secondaryFrequency = road.secondaryWidthFrequency + speed * road.secondaryWidthSpeedFactor;
    this.widthOscillation =
      Math.sin(position * primaryFrequency) * road.primaryWidthAmplitudePx +
      Math.sin(position * secondaryFrequency * road.secondaryWidthFrequencyRatio) *
        road.secondaryWidthAmplitudePx;

    const surfaceFrequency = road.surfaceNoiseFrequency + speed * road.surfaceNoiseSpeedFactor;
    this.surfaceNoise = Math.sin(position * surfaceFrequency) * road.surfaceNoiseAmplitudePx;
    this.speedShimmer = Math.sin(position * road.shimmerFrequency) * speed * road.shimmerSpeedFactor;

    this.boundaries = deriveRoadBoundaries(this.curve, this.currentWidthPx(), this.screen, road);
  }

  currentWidthPx(): number {
    return this.road.baseWidthPx + Math.trunc(this.widthOscillation) + Math.trunc(this.surfaceNoise);
  }

  getBoundaries(): RoadBoundaries {
    return { ...this.boundaries };
  }

  getCurve(): number {
    return this.curve;
  }

  /** Band the four traffic lanes share; it follows width changes but not the curve. */
  getLaneBand(): LaneBand {
    const centerPx = Math.floor(this.screen.width / 2);
    const halfWidthPx = Math.floor(this.currentWidthPx() / 2);
    const left = (centerPx - halfWidthPx) / this.screen.width;
    const right = (centerPx + halfWidthPx) / this.screen.width;
    return { left, right, width: right - left };
  }

  laneCenter(lane: Lane): number {
    return laneCenterInBand(this.getLaneBand(), lane);
  }

  /** Horizontal pixel offset of the road centre on screen row `screenY`. */
  curveOffsetAtScanline(screenY: number): number {
    const horizonY = Math.floor(this.screen.height / 2);
    if (screenY < horizonY) {
      return 0;
    }
    const screenFactor = clamp((screenY - horizonY) / (this.screen.height - horizonY), 0, 1);
    const distanceFactor = 1 - screenFactor;
    const scanlineCurve = Math.trunc(
      this.curve * this.road.scanlineCurveScalePx * distanceFactor * distanceFactor,
    );
    const sFactor = (distanceFactor - 0.5) * 2;
    const sCurve = sFactor * sFactor * sFactor * this.road.scanlineSCurveAmplitudePx;
    return scanlineCurve + Math.trunc(sCurve);
  }

  getSnapshot(): RoadState {
    return {
      curve: this.curve,
      widthOscillation: this.widthOscillation,
      surfaceNoise: this.surfaceNoise,
      speedShimmer: this.speedShimmer,
      roadPosition: this.roadPosition,
      left: this.boundaries.left,
      right: this.boundaries.right,
    };
  }
}

/** Lanes 1-2 split the left half, 3-4 the right half; each lane sits at its quarter's centre. */
export const laneCenterInBand = (band: LaneBand, lane: Lane): number => {
  const laneWidth = band.width / 4;
  const center = band.left + band.width / 2;
  if (lane === 1 || lane === 2) {
    return band.left + laneWidth * (lane - 1 + 0.5);
  }
  return center + laneWidth * (lane - 3 + 0.5);
};
