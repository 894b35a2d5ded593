import type { TrafficTuning } from "../config/driveTuning";
import type {
  CollisionBox,
  Lane,
  LaneBand,
  NpcVehicle,
  Rgb,
  TravelDirection,
  VehicleClass,
} from "../models/drive";
import { clamp } from "../utils/math";
import type { Rng } from "../utils/random";
import { laneCenterInBand } from "./roadGeometry";

const CAR_SPRITES = [
  "sedan_blue",
  "sedan_red",
  "sedan_green",
  "suv_silver",
  "suv_black",
  "compact_yellow",
  "compact_orange",
] as const;

const TRUCK_SPRITES = [
  "semi_truck_white",
  "semi_truck_red",
  "delivery_truck_brown",
  "pickup_truck_blue",
] as const;

const TRUCK_COLORS: readonly Rgb[] = [
  [100, 100, 100],
  [80, 80, 80],
  [60, 60, 60],
  [120, 80, 40],
  [40, 40, 120],
  [80, 40, 40],
];

const SAME_DIRECTION_COLORS: readonly Rgb[] = [
  [255, 0, 0],
  [255, 255, 0],
  [255, 128, 0],
  [0, 255, 0],
];

const ONCOMING_COLORS: readonly Rgb[] = [
  [0, 0, 255],
  [0, 255, 255],
  [255, 0, 255],
  [128, 0, 128],
];

const VEHICLE_DIMENSIONS: Record<VehicleClass, { width: number; height: number; collisionBox: CollisionBox }> = {
  car: { width: 32, height: 48, collisionBox: { width: 32, height: 48 } },
  truck: { width: 40, height: 80, collisionBox: { width: 40, height: 80 } },
};

const lanesFor = (direction: TravelDirection): readonly [Lane, Lane] =>
  direction === 1 ? [3, 4] : [1, 2];

const neighbourLane = (direction: TravelDirection, lane: Lane): Lane => {
  if (direction === 1) return lane === 3 ? 4 : 3;
  return lane === 1 ? 2 : 1;
};

export interface TrafficFrame {
  dt: number;
  playerSpeed: number;
  playerX: number;
  band: LaneBand;
}

export interface NpcSpawnInput {
  lane: Lane;
  y: number;
  speed: number;
  direction?: TravelDirection;
  vehicleClass?: VehicleClass;
  x?: number;
}

/**
 * Owns the NPC traffic stream: spawning, per-car lane keeping and lane changes,
 * car-to-car avoidance, and keeping each car on its own side of the road.
 */
export class TrafficAI {
  private vehicles: NpcVehicle[] = [];
  private spawnTimer = 0;
  private nextId = 1;

  constructor(
    private readonly tuning: TrafficTuning,
    private readonly rng: Rng,
  ) {}

  reset() {
    this.vehicles = [];
    this.spawnTimer = 0;
  }

  update(frame: TrafficFrame) {
    const { dt } = frame;
    this.spawnTimer += dt;
    if (this.spawnTimer > this.tuning.spawnInterval && this.vehicles.length < this.tuning.maxVehicles) {
      if (this.rng.chance(this.tuning.spawnProbability)) {
        this.spawnRandomVehicle(frame.band, frame.playerX);
      }
      this.spawnTimer = 0;
    }

    for (const car of this.vehicles) {
      this.advance(car, frame);
      this.updateAi(car, frame);
      this.avoidTraffic(car, frame);
      this.enforceBoundaries(car, frame.band);
    }

    const { despawnBelowY, despawnAboveY } = this.tuning;
    this.vehicles = this.vehicles.filter((car) => car.y >= despawnBelowY && car.y <= despawnAboveY);
  }

  getVehicles(): readonly NpcVehicle[] {
    return this.vehicles;
  }

  getSnapshot(): NpcVehicle[] {
    return this.vehicles.map((car) => ({
      ...car,
      ai: { ...car.ai },
      color: [...car.color],
      collisionBox: { ...car.collisionBox },
    }));
  }

  /** Moves a car along the road; unknown ids are ignored. */
  nudgeVehicle(id: number, deltaY: number): boolean {
    const car = this.vehicles.find((candidate) => candidate.id === id);
    if (!car) return false;
    car.y += deltaY;
    return true;
  }

  addVehicle(input: NpcSpawnInput, band: LaneBand): NpcVehicle {
    const direction = input.direction ?? (input.lane >= 3 ? 1 : -1);
    const vehicleClass = input.vehicleClass ?? "car";
    const dims = VEHICLE_DIMENSIONS[vehicleClass];
    const sprites: readonly string[] = vehicleClass === "truck" ? TRUCK_SPRITES : CAR_SPRITES;
    const car: NpcVehicle = {
      id: this.nextId,
      x: input.x ?? laneCenterInBand(band, input.lane),
      y: input.y,
      lane: input.lane,
      direction,
      speed: input.speed,
      vehicleClass,
      width: dims.width,
      height: dims.height,
      collisionBox: { ...dims.collisionBox },
      color: this.pickColor(vehicleClass, direction),
      spriteName: this.rng.pick(sprites),
      ai: { kind: "cruising" },
      laneChangeTimer: 0,
    };
    this.nextId += 1;
    this.vehicles.push(car);
    return car;
  }

  /**
   * Whether `car` may move into `targetLane` this frame: the lane must be on the
   * car's own side, its centre inside that half, and clear of traffic and the player.
   */
  isLaneChangeSafe(car: NpcVehicle, targetLane: Lane, band: LaneBand, playerX: number): boolean {
    const t = this.tuning;
    if (!lanesFor(car.direction).includes(targetLane)) {
      return false;
    }

    const targetX = laneCenterInBand(band, targetLane);
    const [halfLeft, halfRight] = this.directionHalf(car.direction, band, t.directionHalfMargin);
    if (targetX <= halfLeft || targetX >= halfRight) {
      return false;
    }

    for (const other of this.vehicles) {
      if (other === car) continue;
      const gap = Math.abs(other.y - car.y);
      const occupiesTarget =
        other.lane === targetLane || Math.abs(other.x - targetX) < t.laneOccupancyTolerance;
      if (occupiesTarget && gap < t.laneSafetyGap) {
        return false;
      }
      if (
        other.ai.kind === "changing_lanes" &&
        Math.abs(other.ai.targetX - targetX) < t.laneOccupancyTolerance &&
        gap < t.mergingSafetyGap
      ) {
        return false;
      }
    }

    if (
      car.direction === 1 &&
      Math.abs(targetX - playerX) < t.playerClearance &&
      Math.abs(car.y) < t.playerClearanceWindow
    ) {
      return false;
    }

    return true;
  }

  private advance(car: NpcVehicle, { dt, playerSpeed }: TrafficFrame) {
    if (car.direction === 1) {
      car.y += (car.speed - playerSpeed) * dt * this.tuning.motionScale;
    } else {
      // Oncoming closing speed is kept visual rather than physical.
      car.y -= (this.tuning.baseOncomingSpeed + playerSpeed) * dt * this.tuning.motionScale;
    }
  }

  private updateAi(car: NpcVehicle, frame: TrafficFrame) {
    const t = this.tuning;
    const { dt } = frame;
    car.laneChangeTimer += dt;

    if (car.ai.kind === "changing_lanes") {
      const { targetX } = car.ai;
      if (Math.abs(car.x - targetX) < t.laneChangeSnapDistance) {
        car.x = targetX;
        car.ai = { kind: "cruising" };
      } else {
        car.x += (targetX > car.x ? 1 : -1) * t.laneChangeSpeed * dt;
      }
    } else if (car.direction === 1) {
      const isTruck = car.vehicleClass === "truck";
      const rate = isTruck ? t.truckLaneChangeRate : t.carLaneChangeRate;
      const cooldown = isTruck ? t.truckLaneChangeCooldown : t.carLaneChangeCooldown;
      if (this.rng.chance(rate * dt) && car.laneChangeTimer > cooldown) {
        this.tryLaneChange(car, frame);
      }
    }

    const jitterRate = car.direction === -1 ? t.oncomingJitterRate : t.sameDirectionJitterRate;
    if (this.rng.chance(jitterRate * dt)) {
      const [minSpeed, maxSpeed] =
        car.direction === 1 ? t.sameDirectionSpeedRange : t.oncomingSpeedRange;
      car.speed = clamp(car.speed + this.rng.between(-t.speedJitter, t.speedJitter), minSpeed, maxSpeed);
    }
  }

  private tryLaneChange(car: NpcVehicle, { band, playerX }: TrafficFrame): boolean {
    const targetLane = neighbourLane(car.direction, car.lane);
    if (!this.isLaneChangeSafe(car, targetLane, band, playerX)) {
      return false;
    }
    car.ai = { kind: "changing_lanes", targetX: laneCenterInBand(band, targetLane) };
    car.lane = targetLane;
    car.laneChangeTimer = 0;
    return true;
  }

  private avoidTraffic(car: NpcVehicle, frame: TrafficFrame) {
    const t = this.tuning;
    const { dt } = frame;

    for (const other of this.vehicles) {
      if (other === car) continue;
      const laneDiff = Math.abs(car.lane - other.lane);
      if (laneDiff > 1) continue;

      if (car.direction !== other.direction) {
        if (car.lane !== other.lane) continue;
        const nearPlayer = (y: number) => y > -t.headOnWindow && y < t.headOnWindow;
        if (nearPlayer(car.y) && nearPlayer(other.y) && car.ai.kind === "cruising") {
          // Best effort: with no safe lane the pair is left alone.
          this.tryLaneChange(car, frame);
        }
        continue;
      }

      const distance = car.direction === 1 ? other.y - car.y : car.y - other.y;
      if (distance <= 0 || distance >= t.brakeDistance || laneDiff !== 0) continue;

      if (distance < t.minSafeDistance) {
        car.speed = Math.max(t.minNpcSpeed, car.speed - t.emergencyBrakeRate * dt);
      } else {
        const speedDiff = car.speed - other.speed;
        if (speedDiff > 0) {
          const brakeForce = (1 - distance / t.brakeDistance) * speedDiff;
          car.speed = Math.max(other.speed * t.followSpeedFloor, car.speed - brakeForce * dt);
        }
      }

      if (
        car.ai.kind === "cruising" &&
        distance < t.brakeDistance * t.stuckMergeWindow &&
        this.rng.chance(t.stuckMergeRate * dt)
      ) {
        this.tryLaneChange(car, frame);
      }
    }
  }

  private enforceBoundaries(car: NpcVehicle, band: LaneBand) {
    const t = this.tuning;
    const [sideLeft, sideRight] = this.directionHalf(car.direction, band, t.boundaryMargin);

    if (car.x < sideLeft || car.x > sideRight) {
      car.x = car.x < sideLeft ? sideLeft : sideRight;
      if (car.ai.kind === "changing_lanes") {
        car.ai = { kind: "cruising" };
      }
    }

    if (car.ai.kind === "cruising") {
      const idealX = laneCenterInBand(band, car.lane);
      const laneWidth = band.width / 4;
      if (Math.abs(car.x - idealX) > laneWidth * t.laneDriftThreshold) {
        car.x += (idealX - car.x) * t.laneDriftCorrection;
      }
    }
  }

  private directionHalf(direction: TravelDirection, band: LaneBand, margin: number): [number, number] {
    const center = band.left + band.width / 2;
    return direction === 1 ? [center + margin, band.right - margin] : [band.left + margin, center - margin];
  }

  private spawnRandomVehicle(band: LaneBand, playerX: number) {
    const t = this.tuning;
    const playerLane: Lane = playerX < 0.5 ? 3 : 4;
    let lane: Lane;
    let direction: TravelDirection;
    let y: number;
    let speed: number;

    if (this.rng.chance(t.sameDirectionProbability)) {
      direction = 1;
      lane = this.rng.pick(lanesFor(direction));
      if (this.rng.chance(t.avoidPlayerLaneProbability) && lane === playerLane) {
        lane = neighbourLane(direction, lane);
      }
      if (this.rng.chance(0.5)) {
        y = this.rng.between(...t.aheadSpawnY);
        speed = this.rng.between(...t.aheadSpeed);
      } else {
        y = this.rng.between(...t.behindSpawnY);
        speed = this.rng.between(...t.behindSpeed);
      }
    } else {
      direction = -1;
      lane = this.rng.pick(lanesFor(direction));
      y = this.rng.between(...t.oncomingSpawnY);
      speed = this.rng.between(...t.oncomingSpeed);
    }

    const vehicleClass: VehicleClass = this.rng.chance(t.truckProbability) ? "truck" : "car";
    if (vehicleClass === "truck") {
      speed *= t.truckSpeedMultiplier;
    }

    this.addVehicle({ lane, y, speed, direction, vehicleClass }, band);
  }

  private pickColor(vehicleClass: VehicleClass, direction: TravelDirection): Rgb {
    if (vehicleClass === "truck") {
      return [...this.rng.pick(TRUCK_COLORS)];
    }
    return [...this.rng.pick(direction === 1 ? SAME_DIRECTION_COLORS : ONCOMING_COLORS)];
  }
}
