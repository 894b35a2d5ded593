export type GamePhase = "music_select" | "vehicle_select" | "ready" | "racing" | "game_over";

export type NavigationTarget = "hub" | "leaderboard";

export interface RaceState {
  speed: number;
  position: number;
  totalRacers: number;
  timeRemaining: number;
  isBoost: boolean;
  isCrash: boolean;
  isFinalLap: boolean;
  isVictory: boolean;
  isGameOver: boolean;
}

export interface RoadBoundaries {
  left: number;
  right: number;
}

/** Un-curved band the traffic lanes are laid out on, in normalized screen x. */
export interface LaneBand {
  left: number;
  right: number;
  width: number;
}

export interface RoadState extends RoadBoundaries {
  curve: number;
  widthOscillation: number;
  surfaceNoise: number;
  speedShimmer: number;
  roadPosition: number;
}

export type TurnPhase = "straight" | "turning_left" | "turning_right";
export type TurnDirection = "left" | "right";

export interface TurnSnapshot {
  phase: TurnPhase;
  progress: number;
  intensity: number;
  timer: number;
  straightDuration: number;
  lastDirection: TurnDirection | null;
}

/** Lanes 1-2 carry oncoming traffic (left half), 3-4 run with the player (right half). */
export type Lane = 1 | 2 | 3 | 4;
export type TravelDirection = 1 | -1;
export type VehicleClass = "car" | "truck";

export type AiState = { kind: "cruising" } | { kind: "changing_lanes"; targetX: number };

export type Rgb = [number, number, number];

export interface CollisionBox {
  width: number;
  height: number;
}

export interface NpcVehicle {
  id: number;
  x: number;
  /** Longitudinal offset from the player; positive is ahead. */
  y: number;
  lane: Lane;
  direction: TravelDirection;
  speed: number;
  vehicleClass: VehicleClass;
  width: number;
  height: number;
  collisionBox: CollisionBox;
  color: Rgb;
  spriteName: string;
  ai: AiState;
  laneChangeTimer: number;
}

export type StaticHazardKind = "cone" | "barrier" | "warning_sign";
export type DebrisKind = "debris_tire" | "debris_metal" | "debris_cargo";
export type DynamicHazardKind = "oil_slick" | "water_puddle" | DebrisKind;
export type HazardKind = StaticHazardKind | DynamicHazardKind;

export type HazardSource = "truck" | "random" | "weather";

export type HazardEffect =
  | { type: "slip"; duration: number; strength: number; source: HazardSource }
  | { type: "damage"; strength: number; source: HazardSource };

interface HazardBase {
  id: number;
  x: number;
  y: number;
  /** -1 when the hazard is not tied to a lane. */
  lane: Lane | 0 | -1;
  width: number;
  height: number;
  collisionBox: CollisionBox;
  color: Rgb;
}

export interface StaticHazard extends HazardBase {
  category: "static";
  kind: StaticHazardKind;
}

export interface DynamicHazard extends HazardBase {
  category: "dynamic";
  kind: DynamicHazardKind;
  effect: HazardEffect;
}

export type Hazard = StaticHazard | DynamicHazard;

export interface ConstructionZone {
  startY: number;
  endY: number;
  lanes: Lane[];
}

export interface ActiveEffect {
  kind: "slip";
  remainingDuration: number;
  strength: number;
}

export interface CollisionPenaltyState {
  speedPenalty: number;
  cooldown: number;
  damage: number;
  flashTimer: number;
  lastCollision: string | null;
}

export interface DriveInput {
  accelerate: boolean;
  steerLeft: boolean;
  steerRight: boolean;
  pause: boolean;
  quitToHub: boolean;
  changeMusic: boolean;
}

export const IDLE_INPUT: Readonly<DriveInput> = {
  accelerate: false,
  steerLeft: false,
  steerRight: false,
  pause: false,
  quitToHub: false,
  changeMusic: false,
};

export interface PlayerState {
  x: number;
  speed: number;
  rotation: number;
  momentumX: number;
  driftFactor: number;
  offRoadTimer: number;
  offRoadPenalty: number;
  isOffRoad: boolean;
  isBoost: boolean;
  isCrash: boolean;
}

export type MusicMood = "energetic" | "relaxed" | "intense";

export interface MusicTrack {
  id: string;
  displayName: string;
  description: string;
  filename: string;
  bpm: number;
  mood: MusicMood;
  previewStart: number;
}

export interface VehicleOption {
  id: string;
  name: string;
  spriteName: string;
  description: string;
}

export type SelectorOutcome =
  | { type: "track_selected"; track: MusicTrack }
  | { type: "vehicle_selected"; vehicle: VehicleOption }
  | { type: "cancelled" };

export type DriveCommand = "start" | "end" | "restart" | "change_music" | "preview" | "quit" | "leaderboard";

export type FeedbackEvent =
  | { type: "sound"; id: string }
  | { type: "music"; action: "crossfade" | "preview" | "stop" | "volume"; value?: string | number }
  | { type: "collision"; target: string; speedPenalty: number; damage: number }
  | { type: "effect"; target: string; effect: HazardEffect["type"] }
  | { type: "crash"; speed: number }
  | { type: "phase"; from: GamePhase; to: GamePhase }
  | { type: "navigate"; target: NavigationTarget };

export interface RaceResults {
  score: number;
  distanceTraveled: number;
  topSpeedReached: number;
  finalPosition: number;
  isVictory: boolean;
}

export interface ComicTextSnapshot {
  text: string | null;
  remaining: number;
}

export interface DriveSnapshot {
  phase: GamePhase;
  paused: boolean;
  selectedTrack: MusicTrack | null;
  selectedVehicle: VehicleOption | null;
  race: RaceState;
  road: RoadState;
  turn: TurnSnapshot;
  player: PlayerState;
  penalty: CollisionPenaltyState;
  slipFactor: number;
  slipSpinAngle: number;
  /** Seconds left of the slip overlay the host draws after a hit. */
  slipVisualTimer: number;
  activeEffects: ActiveEffect[];
  vehicles: NpcVehicle[];
  hazards: Hazard[];
  constructionZones: ConstructionZone[];
  comicText: ComicTextSnapshot;
  results: RaceResults;
  pendingNavigation: NavigationTarget | null;
}
