export interface ScreenTuning {
  width: number;
  height: number;
}

export interface RoadTuning {
  baseWidthPx: number;
  /** Road position advance per unit speed per second. */
  positionRate: number;
  curveScreenScalePx: number;
  freewayCurveFrequency: number;
  freewayCurveAmplitude: number;
  freewayVariationFrequencyRatio: number;
  freewayVariationAmplitudeRatio: number;
  straightFreewayInfluence: number;
  turningFreewayInfluence: number;
  curveSmoothing: number;
  straightCurveDecay: number;
  primaryWidthFrequency: number;
  primaryWidthSpeedFactor: number;
  primaryWidthAmplitudePx: number;
  secondaryWidthFrequency: number;
  secondaryWidthSpeedFactor: number;
  secondaryWidthFrequencyRatio: number;
  secondaryWidthAmplitudePx: number;
  surfaceNoiseFrequency: number;
  surfaceNoiseSpeedFactor: number;
  surfaceNoiseAmplitudePx: number;
  shimmerFrequency: number;
  shimmerSpeedFactor: number;
  playerHalfWidthPx: number;
  fallbackHalfBand: number;
  scanlineCurveScalePx: number;
  scanlineSCurveAmplitudePx: number;
}

export interface TurnTuning {
  initialStraightDuration: number;
  minStraightDuration: number;
  maxStraightDuration: number;
  turnDuration: number;
  alternateProbability: number;
  baseIntensity: number;
  intensityVariation: number;
  minIntensity: number;
  maxIntensity: number;
}

export interface TrafficTuning {
  spawnInterval: number;
  spawnProbability: number;
  maxVehicles: number;
  sameDirectionProbability: number;
  avoidPlayerLaneProbability: number;
  truckProbability: number;
  truckSpeedMultiplier: number;
  aheadSpawnY: [number, number];
  aheadSpeed: [number, number];
  behindSpawnY: [number, number];
  behindSpeed: [number, number];
  oncomingSpawnY: [number, number];
  oncomingSpeed: [number, number];
  baseOncomingSpeed: number;
  /** Longitudinal units per unit speed per second. */
  motionScale: number;
  despawnBelowY: number;
  despawnAboveY: number;
  carLaneChangeRate: number;
  truckLaneChangeRate: number;
  carLaneChangeCooldown: number;
  truckLaneChangeCooldown: number;
  laneChangeSpeed: number;
  laneChangeSnapDistance: number;
  laneSafetyGap: number;
  mergingSafetyGap: number;
  laneOccupancyTolerance: number;
  directionHalfMargin: number;
  playerClearance: number;
  playerClearanceWindow: number;
  minSafeDistance: number;
  brakeDistance: number;
  emergencyBrakeRate: number;
  followSpeedFloor: number;
  minNpcSpeed: number;
  stuckMergeWindow: number;
  stuckMergeRate: number;
  headOnWindow: number;
  boundaryMargin: number;
  laneDriftThreshold: number;
  laneDriftCorrection: number;
  sameDirectionJitterRate: number;
  oncomingJitterRate: number;
  speedJitter: number;
  sameDirectionSpeedRange: [number, number];
  oncomingSpeedRange: [number, number];
}

export interface HazardTuning {
  constructionInterval: number;
  maxConstructionZones: number;
  zoneLength: [number, number];
  zoneGap: [number, number];
  minZoneSpawnY: number;
  warningSignLead: number;
  coneSpacing: number;
  barrierMinZoneLength: number;
  pruneBelowY: number;
  /** Longitudinal units per unit speed per second. */
  scrollScale: number;
  oilSlickChancePerFrame: number;
  oilSlickJitter: number;
  oilSlickTrail: number;
  debrisChancePerFrame: number;
  debrisEdgeMargin: number;
  debrisForwardOffset: number;
  oilSlickSlipStrength: number;
  oilSlickSlipDuration: number;
  debrisDamage: number;
  puddleSlipStrength: number;
  puddleSlipDuration: number;
  slipSpinSpeed: number;
  slipSpinRecoverySpeed: number;
}

export interface PlayerTuning {
  maxSpeed: number;
  acceleration: number;
  deceleration: number;
  turnAccelerationPenalty: number;
  turnDecelerationIncrease: number;
  minSpeed: number;
  steeringSpeed: number;
  offRoadSteeringPenalty: number;
  boostThreshold: number;
  turningBoostThreshold: number;
  racingLineStrength: number;
  racingLineResponse: number;
  curveInfluence: number;
  maxRotation: number;
  inputRotationShare: number;
  turnRotationShare: number;
  rotationSpeed: number;
  momentumBuildRate: number;
  momentumResponse: number;
  momentumDecay: number;
  momentumInfluence: number;
  driftThreshold: number;
  driftGain: number;
  driftFadeTurning: number;
  driftFadeStraight: number;
  offRoadCorrectionGain: number;
  offRoadCorrectionSpeed: number;
  offRoadOvershootAllowance: number;
  offRoadPenaltyRate: number;
  maxOffRoadPenalty: number;
  offRoadTimerRecovery: number;
  offRoadPenaltyRecovery: number;
  offRoadSlowdownRate: number;
  crashLeftX: number;
  crashRightX: number;
  crashSpeedThreshold: number;
  crashSpeedFactor: number;
  crashFlagDuration: number;
}

export interface CollisionTuning {
  playerBoxWidth: number;
  playerBoxHeight: number;
  playerBoxTop: number;
  /** Pixel height that maps to one normalized unit of collision height. */
  verticalPixelScale: number;
  /** Longitudinal units per normalized screen unit. */
  longitudinalScale: number;
  recoveryRate: number;
  trafficCooldown: number;
  hazardCooldown: number;
  trafficFlash: number;
  hazardFlash: number;
  maxDamage: number;
  carSpeedPenalty: number;
  carDamage: number;
  truckSpeedPenalty: number;
  truckDamage: number;
  coneSpeedPenalty: number;
  coneDamage: number;
  barrierSpeedPenalty: number;
  barrierDamage: number;
  trafficPushback: number;
}

export interface SessionTuning {
  raceDuration: number;
  finalLapThreshold: number;
  totalRacers: number;
  victoryPosition: number;
  maxFrameDt: number;
  scorePerDistance: number;
  distanceScale: number;
  comicTextInterval: [number, number];
  comicTextDuration: number;
}

export interface DriveTuning {
  screen: ScreenTuning;
  road: RoadTuning;
  turn: TurnTuning;
  traffic: TrafficTuning;
  hazards: HazardTuning;
  player: PlayerTuning;
  collision: CollisionTuning;
  session: SessionTuning;
}

export type DriveTuningOverrides = {
  [Section in keyof DriveTuning]?: Partial<DriveTuning[Section]>;
};

export const DEFAULT_DRIVE_TUNING: Readonly<DriveTuning> = {
  screen: {
    width: 1280,
    height: 720,
  },
  road: {
    baseWidthPx: 500,
    positionRate: 10,
    curveScreenScalePx: 200,
    freewayCurveFrequency: 0.01,
    freewayCurveAmplitude: 0.3,
    freewayVariationFrequencyRatio: 1.7,
    freewayVariationAmplitudeRatio: 0.2,
    straightFreewayInfluence: 1.0,
    turningFreewayInfluence: 0.3,
    curveSmoothing: 0.7,
    straightCurveDecay: 0.95,
    primaryWidthFrequency: 0.08,
    primaryWidthSpeedFactor: 0.05,
    primaryWidthAmplitudePx: 20,
    secondaryWidthFrequency: 0.25,
    secondaryWidthSpeedFactor: 0.1,
    secondaryWidthFrequencyRatio: 1.3,
    secondaryWidthAmplitudePx: 7.5,
    surfaceNoiseFrequency: 1.8,
    surfaceNoiseSpeedFactor: 2.0,
    surfaceNoiseAmplitudePx: 3.75,
    shimmerFrequency: 3.2,
    shimmerSpeedFactor: 0.8,
    playerHalfWidthPx: 32,
    fallbackHalfBand: 0.1,
    scanlineCurveScalePx: 300,
    scanlineSCurveAmplitudePx: 50,
  },
  turn: {
    initialStraightDuration: 15,
    minStraightDuration: 8,
    maxStraightDuration: 10,
    turnDuration: 5,
    alternateProbability: 0.8,
    baseIntensity: 0.6,
    intensityVariation: 0.2,
    minIntensity: 0.3,
    maxIntensity: 1.0,
  },
  traffic: {
    spawnInterval: 1.5,
    spawnProbability: 0.7,
    maxVehicles: 10,
    sameDirectionProbability: 0.7,
    avoidPlayerLaneProbability: 0.6,
    truckProbability: 0.15,
    truckSpeedMultiplier: 0.85,
    aheadSpawnY: [150, 400],
    aheadSpeed: [0.4, 0.9],
    behindSpawnY: [-150, -50],
    behindSpeed: [0.6, 1.2],
    oncomingSpawnY: [300, 600],
    oncomingSpeed: [0.5, 1.0],
    baseOncomingSpeed: 0.7,
    motionScale: 100,
    despawnBelowY: -250,
    despawnAboveY: 700,
    carLaneChangeRate: 0.03,
    truckLaneChangeRate: 0.01,
    carLaneChangeCooldown: 4,
    truckLaneChangeCooldown: 8,
    laneChangeSpeed: 0.8,
    laneChangeSnapDistance: 0.05,
    laneSafetyGap: 100,
    mergingSafetyGap: 120,
    laneOccupancyTolerance: 0.08,
    directionHalfMargin: 0.02,
    playerClearance: 0.15,
    playerClearanceWindow: 100,
    minSafeDistance: 60,
    brakeDistance: 120,
    emergencyBrakeRate: 2.0,
    followSpeedFloor: 0.9,
    minNpcSpeed: 0.1,
    stuckMergeWindow: 0.7,
    stuckMergeRate: 0.02,
    headOnWindow: 50,
    boundaryMargin: 0.02,
    laneDriftThreshold: 0.4,
    laneDriftCorrection: 0.01,
    sameDirectionJitterRate: 0.1,
    oncomingJitterRate: 0.05,
    speedJitter: 0.05,
    sameDirectionSpeedRange: [0.2, 1.2],
    oncomingSpeedRange: [0.4, 1.0],
  },
  hazards: {
    constructionInterval: 8,
    maxConstructionZones: 2,
    zoneLength: [200, 400],
    zoneGap: [400, 800],
    minZoneSpawnY: 500,
    warningSignLead: 100,
    coneSpacing: 40,
    barrierMinZoneLength: 300,
    pruneBelowY: -300,
    scrollScale: 100,
    oilSlickChancePerFrame: 0.003,
    oilSlickJitter: 0.02,
    oilSlickTrail: 50,
    debrisChancePerFrame: 0.002,
    debrisEdgeMargin: 0.05,
    debrisForwardOffset: 500,
    oilSlickSlipStrength: 0.3,
    oilSlickSlipDuration: 1.5,
    debrisDamage: 0.15,
    puddleSlipStrength: 0.7,
    puddleSlipDuration: 0.8,
    slipSpinSpeed: 720,
    slipSpinRecoverySpeed: 1080,
  },
  player: {
    maxSpeed: 1.0,
    acceleration: 0.5,
    deceleration: 0.8,
    turnAccelerationPenalty: 0.4,
    turnDecelerationIncrease: 0.6,
    minSpeed: 0.1,
    steeringSpeed: 0.35,
    offRoadSteeringPenalty: 0.5,
    boostThreshold: 0.8,
    turningBoostThreshold: 0.9,
    racingLineStrength: 0.04,
    racingLineResponse: 0.15,
    curveInfluence: 0.04,
    maxRotation: 18,
    inputRotationShare: 0.7,
    turnRotationShare: 0.3,
    rotationSpeed: 150,
    momentumBuildRate: 0.8,
    momentumResponse: 3.0,
    momentumDecay: 0.85,
    momentumInfluence: 0.04,
    driftThreshold: 0.6,
    driftGain: 2.0,
    driftFadeTurning: 0.9,
    driftFadeStraight: 0.95,
    offRoadCorrectionGain: 8.0,
    offRoadCorrectionSpeed: 2.0,
    offRoadOvershootAllowance: 0.02,
    offRoadPenaltyRate: 1.5,
    maxOffRoadPenalty: 0.6,
    offRoadTimerRecovery: 2.0,
    offRoadPenaltyRecovery: 0.8,
    offRoadSlowdownRate: 2.0,
    crashLeftX: 0.1,
    crashRightX: 0.9,
    crashSpeedThreshold: 0.6,
    crashSpeedFactor: 0.3,
    crashFlagDuration: 0.5,
  },
  collision: {
    playerBoxWidth: 0.02,
    playerBoxHeight: 0.04,
    playerBoxTop: 0.42,
    verticalPixelScale: 200,
    longitudinalScale: 400,
    recoveryRate: 0.5,
    trafficCooldown: 1.0,
    hazardCooldown: 0.5,
    trafficFlash: 0.3,
    hazardFlash: 0.2,
    maxDamage: 1.0,
    carSpeedPenalty: 0.2,
    carDamage: 0.1,
    truckSpeedPenalty: 0.4,
    truckDamage: 0.2,
    coneSpeedPenalty: 0.1,
    coneDamage: 0.05,
    barrierSpeedPenalty: 0.3,
    barrierDamage: 0.15,
    trafficPushback: 50,
  },
  session: {
    raceDuration: 120,
    finalLapThreshold: 10,
    totalRacers: 8,
    victoryPosition: 3,
    maxFrameDt: 0.1,
    scorePerDistance: 10,
    distanceScale: 100,
    comicTextInterval: [10, 15],
    comicTextDuration: 3,
  },
};

export const resolveDriveTuning = (overrides: DriveTuningOverrides = {}): DriveTuning => ({
  screen: { ...DEFAULT_DRIVE_TUNING.screen, ...overrides.screen },
  road: { ...DEFAULT_DRIVE_TUNING.road, ...overrides.road },
  turn: { ...DEFAULT_DRIVE_TUNING.turn, ...overrides.turn },
  traffic: { ...DEFAULT_DRIVE_TUNING.traffic, ...overrides.traffic },
  hazards: { ...DEFAULT_DRIVE_TUNING.hazards, ...overrides.hazards },
  player: { ...DEFAULT_DRIVE_TUNING.player, ...overrides.player },
  collision: { ...DEFAULT_DRIVE_TUNING.collision, ...overrides.collision },
  session: { ...DEFAULT_DRIVE_TUNING.session, ...overrides.session },
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Describes the first place `value` departs from the layout of `shape`, or null when it matches. */
const findShapeMismatch = (value: unknown, shape: unknown, path: string): string | null => {
  if (typeof shape === "number") {
    return typeof value === "number" && Number.isFinite(value) ? null : `${path} must be a finite number`;
  }
  if (Array.isArray(shape)) {
    if (!Array.isArray(value) || value.length !== shape.length) {
      return `${path} must be an array of ${shape.length} numbers`;
    }
    for (let index = 0; index < shape.length; index += 1) {
      const problem = findShapeMismatch(value[index], shape[index], `${path}[${index}]`);
      if (problem) return problem;
    }
    return null;
  }
  if (isRecord(shape)) {
    if (!isRecord(value)) return `${path} must be an object`;
    for (const key of Object.keys(value)) {
      if (!(key in shape)) return `${path}.${key} is not a known setting`;
    }
    for (const [key, expected] of Object.entries(shape)) {
      const problem = findShapeMismatch(value[key], expected, `${path}.${key}`);
      if (problem) return problem;
    }
    return null;
  }
  return `${path} has an unsupported type`;
};

const isDriveTuning = (value: unknown): value is DriveTuning =>
  findShapeMismatch(value, DEFAULT_DRIVE_TUNING, "tuning") === null;

/** Merges untrusted per-section overrides (e.g. a request body) over the defaults; throws on unknown or mistyped fields. */
export const parseDriveTuning = (raw: unknown): DriveTuning => {
  if (raw === undefined) return resolveDriveTuning();
  if (!isRecord(raw)) {
    throw new Error("tuning must be an object");
  }
  const merged: Record<string, unknown> = {};
  for (const section of Object.keys(raw)) {
    if (!(section in DEFAULT_DRIVE_TUNING)) {
      throw new Error(`tuning.${section} is not a known section`);
    }
  }
  for (const [section, defaults] of Object.entries(DEFAULT_DRIVE_TUNING)) {
    const override = raw[section];
    if (override !== undefined && !isRecord(override)) {
      throw new Error(`tuning.${section} must be an object`);
    }
    merged[section] = { ...defaults, ...override };
  }
  if (!isDriveTuning(merged)) {
    throw new Error(findShapeMismatch(merged, DEFAULT_DRIVE_TUNING, "tuning") ?? "tuning is invalid");
  }
  return merged;
};
