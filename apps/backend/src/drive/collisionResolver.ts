import type { CollisionTuning, ScreenTuning } from "../config/driveTuning";
import type {
  CollisionBox,
  CollisionPenaltyState,
  DynamicHazard,
  Hazard,
  HazardEffect,
  NpcVehicle,
  StaticHazard,
  VehicleClass,
} from "../models/drive";

interface Rect {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

export interface CollisionTrafficView {
  getVehicles(): readonly NpcVehicle[];
  nudgeVehicle(id: number, deltaY: number): boolean;
}

export interface CollisionHazardView {
  getHazards(): readonly Hazard[];
  removeHazard(id: number): boolean;
  addSlipEffect(duration: number, strength: number): void;
}

export interface CollisionPlayerView {
  scaleSpeed(factor: number): void;
}

export interface CollisionFrame {
  dt: number;
  playerX: number;
  traffic: CollisionTrafficView;
  hazards: CollisionHazardView;
  player: CollisionPlayerView;
}

export type CollisionOutcome =
  | {
      kind: "traffic";
      vehicleId: number;
      vehicleClass: VehicleClass;
      speedPenalty: number;
      damage: number;
      sound: string;
    }
  | {
      kind: "hazard";
      hazardId: number;
      target: string;
      speedPenalty: number;
      damage: number;
      effect: HazardEffect["type"] | null;
      sound: string;
    };

const EMPTY_STATE: Readonly<CollisionPenaltyState> = {
  speedPenalty: 0,
  cooldown: 0,
  damage: 0,
  flashTimer: 0,
  lastCollision: null,
};

/**
 * Detects player contact with traffic and hazards and owns the accumulated penalty state.
 * At most one collision is handled per frame, traffic first.
 */
export class CollisionResolver {
  private state: CollisionPenaltyState = { ...EMPTY_STATE };

  constructor(
    private readonly tuning: CollisionTuning,
    private readonly screen: ScreenTuning,
  ) {}

  reset() {
    this.state = { ...EMPTY_STATE };
  }

  getSpeedPenalty(): number {
    return this.state.speedPenalty;
  }

  getSnapshot(): CollisionPenaltyState {
    return { ...this.state };
  }

  resolve(frame: CollisionFrame): CollisionOutcome | null {
    const t = this.tuning;
    const { dt } = frame;

    if (this.state.cooldown > 0) {
      this.state.cooldown = Math.max(0, this.state.cooldown - dt);
    }
    if (this.state.flashTimer > 0) {
      this.state.flashTimer = Math.max(0, this.state.flashTimer - dt);
    }
    if (this.state.speedPenalty > 0) {
      this.state.speedPenalty = Math.max(0, this.state.speedPenalty - t.recoveryRate * dt);
    }

    if (this.state.cooldown > 0) {
      return null;
    }

    const playerRect = this.playerRect(frame.playerX);

    const car = frame.traffic.getVehicles().find((npc) => overlaps(playerRect, this.targetRect(npc, npc.collisionBox)));
    if (car) {
      return this.hitVehicle(car, frame.traffic);
    }

    const hazard = frame.hazards
      .getHazards()
      .find((candidate) => candidate.kind !== "warning_sign" && overlaps(playerRect, this.targetRect(candidate, candidate.collisionBox)));
    if (!hazard) {
      return null;
    }
    return hazard.category === "dynamic"
      ? this.hitDynamicHazard(hazard, frame)
      : this.hitStaticHazard(hazard, frame.hazards);
  }

  private hitVehicle(car: NpcVehicle, traffic: CollisionTrafficView): CollisionOutcome {
    const t = this.tuning;
    const isTruck = car.vehicleClass === "truck";
    const speedPenalty = isTruck ? t.truckSpeedPenalty : t.carSpeedPenalty;
    const damage = isTruck ? t.truckDamage : t.carDamage;

    this.applyPenalty(speedPenalty, damage, t.trafficCooldown, t.trafficFlash, car.vehicleClass);
    traffic.nudgeVehicle(car.id, car.direction === 1 ? t.trafficPushback : -t.trafficPushback);

    return {
      kind: "traffic",
      vehicleId: car.id,
      vehicleClass: car.vehicleClass,
      speedPenalty,
      damage,
      sound: isTruck ? "crash_heavy" : "crash_light",
    };
  }

  private hitStaticHazard(hazard: StaticHazard, hazards: CollisionHazardView): CollisionOutcome {
    const t = this.tuning;
    const isCone = hazard.kind === "cone";
    const speedPenalty = isCone ? t.coneSpeedPenalty : t.barrierSpeedPenalty;
    const damage = isCone ? t.coneDamage : t.barrierDamage;

    this.applyPenalty(speedPenalty, damage, t.hazardCooldown, t.hazardFlash, hazard.kind);
    if (isCone) {
      hazards.removeHazard(hazard.id);
    }

    return {
      kind: "hazard",
      hazardId: hazard.id,
      target: hazard.kind,
      speedPenalty,
      damage,
      effect: null,
      sound: isCone ? "cone_hit" : "barrier_hit",
    };
  }

  private hitDynamicHazard(hazard: DynamicHazard, frame: CollisionFrame): CollisionOutcome {
    const t = this.tuning;
    const { effect } = hazard;
    let target: string;
    let damage = 0;

    if (effect.type === "slip") {
      frame.hazards.addSlipEffect(effect.duration, effect.strength);
      target = `slippery_${hazard.kind}`;
    } else {
      damage = effect.strength;
      this.state.damage = Math.min(t.maxDamage, this.state.damage + effect.strength);
      frame.player.scaleSpeed(1 - effect.strength);
      this.state.flashTimer = t.trafficFlash;
      target = hazard.kind;
    }

    this.state.cooldown = t.hazardCooldown;
    this.state.lastCollision = target;
    frame.hazards.removeHazard(hazard.id);

    return {
      kind: "hazard",
      hazardId: hazard.id,
      target,
      speedPenalty: 0,
      damage,
      effect: effect.type,
      sound: "barrier_hit",
    };
  }

  private applyPenalty(speedPenalty: number, damage: number, cooldown: number, flash: number, label: string) {
    this.state.cooldown = cooldown;
    this.state.speedPenalty = Math.max(this.state.speedPenalty, speedPenalty);
    this.state.damage = Math.min(this.tuning.maxDamage, this.state.damage + damage);
    this.state.flashTimer = flash;
    this.state.lastCollision = label;
  }

  private playerRect(playerX: number): Rect {
    const t = this.tuning;
    return {
      left: playerX - t.playerBoxWidth / 2,
      right: playerX + t.playerBoxWidth / 2,
      top: t.playerBoxTop,
      bottom: t.playerBoxTop + t.playerBoxHeight,
    };
  }

  private targetRect(target: { x: number; y: number }, box: CollisionBox): Rect {
    const width = box.width / this.screen.width;
    const height = box.height / this.tuning.verticalPixelScale;
    const screenY = 0.5 - target.y / this.tuning.longitudinalScale;
    return {
      left: target.x - width / 2,
      right: target.x + width / 2,
      top: screenY - height / 2,
      bottom: screenY + height / 2,
    };
  }
}

const overlaps = (a: Rect, b: Rect) => a.right > b.left && a.left < b.right && a.bottom > b.top && a.top < b.bottom;
