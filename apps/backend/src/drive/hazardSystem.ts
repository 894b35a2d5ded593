import type { HazardTuning } from "../config/driveTuning";
import type {
  ActiveEffect,
  ConstructionZone,
  DebrisKind,
  DynamicHazard,
  DynamicHazardKind,
  Hazard,
  HazardSource,
  Lane,
  LaneBand,
  NpcVehicle,
  StaticHazard,
  StaticHazardKind,
} from "../models/drive";
import type { Rng } from "../utils/random";
import { laneCenterInBand } from "./roadGeometry";

const STATIC_SHAPES: Record<StaticHazardKind, Pick<StaticHazard, "width" | "height" | "collisionBox" | "color">> = {
  cone: { width: 16, height: 24, collisionBox: { width: 16, height: 24 }, color: [255, 140, 0] },
  barrier: { width: 48, height: 32, collisionBox: { width: 48, height: 32 }, color: [128, 128, 128] },
  warning_sign: { width: 32, height: 32, collisionBox: { width: 0, height: 0 }, color: [255, 255, 0] },
};

const DEBRIS_KINDS: readonly DebrisKind[] = ["debris_tire", "debris_metal", "debris_cargo"];

export interface HazardFrame {
  dt: number;
  playerSpeed: number;
  band: LaneBand;
}

export interface DynamicSpawnFrame {
  vehicles: readonly NpcVehicle[];
  band: LaneBand;
  horizonY: number;
}

export class HazardSystem {
  private hazards: Hazard[] = [];
  private zones: ConstructionZone[] = [];
  private effects: ActiveEffect[] = [];
  private constructionTimer = 0;
  private nextZoneY: number;
  private slipFactor = 1;
  private spinAngle = 0;
  private effectVisualTimer = 0;
  private nextId = 1;

  constructor(
    private readonly tuning: HazardTuning,
    private readonly rng: Rng,
  ) {
    this.nextZoneY = tuning.minZoneSpawnY;
  }

  reset() {
    this.hazards = [];
    this.zones = [];
    this.effects = [];
    this.constructionTimer = 0;
    this.nextZoneY = this.tuning.minZoneSpawnY;
    this.slipFactor = 1;
    this.spinAngle = 0;
    this.effectVisualTimer = 0;
  }

  /** Spawns construction zones on their timer and scrolls everything toward the player. */
  update({ dt, playerSpeed, band }: HazardFrame) {
    const t = this.tuning;
    this.constructionTimer += dt;
    if (this.constructionTimer > t.constructionInterval && this.zones.length < t.maxConstructionZones) {
      this.spawnConstructionZone(band);
      this.constructionTimer = 0;
    }

    const scroll = playerSpeed * dt * t.scrollScale;
    for (const hazard of this.hazards) {
      hazard.y -= scroll;
    }
    this.hazards = this.hazards.filter((hazard) => hazard.y >= t.pruneBelowY);

    for (const zone of this.zones) {
      zone.startY -= scroll;
      zone.endY -= scroll;
    }
    this.zones = this.zones.filter((zone) => zone.endY >= t.pruneBelowY);
    this.nextZoneY -= scroll;
  }

  spawnConstructionZone(band: LaneBand): ConstructionZone {
    const t = this.tuning;
    const length = this.rng.int(...t.zoneLength);
    const startY = Math.max(t.minZoneSpawnY, this.nextZoneY);
    const endY = startY + length;

    let lanes: Lane[];
    if (this.rng.chance(0.5)) {
      lanes = [this.rng.pick<Lane>([1, 2, 3, 4])];
    } else {
      lanes = this.rng.chance(0.5) ? [3, 4] : [1, 2];
    }

    const zone: ConstructionZone = { startY, endY, lanes };
    this.zones.push(zone);

    this.spawnStaticHazard("warning_sign", 0.5, startY - t.warningSignLead, 0);
    for (const lane of lanes) {
      const laneX = laneCenterInBand(band, lane);
      for (let y = Math.trunc(startY); y < Math.trunc(endY); y += t.coneSpacing) {
        this.spawnStaticHazard("cone", laneX, y, lane);
      }
      if (length > t.barrierMinZoneLength) {
        this.spawnStaticHazard("barrier", laneX, startY + Math.floor(length / 2), lane);
      }
    }

    this.nextZoneY = endY + this.rng.int(...t.zoneGap);
    return { ...zone, lanes: [...lanes] };
  }

  spawnStaticHazard(kind: StaticHazardKind, x: number, y: number, lane: StaticHazard["lane"]): StaticHazard {
    const shape = STATIC_SHAPES[kind];
    const hazard: StaticHazard = {
      id: this.allocateId(),
      category: "static",
      kind,
      x,
      y,
      lane,
      width: shape.width,
      height: shape.height,
      collisionBox: { ...shape.collisionBox },
      color: [...shape.color],
    };
    this.hazards.push(hazard);
    return hazard;
  }

  spawnDynamicHazard(kind: "oil_slick" | "debris" | "water_puddle", x: number, y: number, source: HazardSource): DynamicHazard {
    const t = this.tuning;
    let hazard: DynamicHazard;
    if (kind === "oil_slick") {
      hazard = this.dynamicHazard("oil_slick", x, y, {
        width: 64,
        height: 32,
        collisionBox: { width: 60, height: 28 },
        color: [32, 32, 48],
        effect: { type: "slip", duration: t.oilSlickSlipDuration, strength: t.oilSlickSlipStrength, source },
      });
    } else if (kind === "debris") {
      const debrisKind: DynamicHazardKind = this.rng.pick(DEBRIS_KINDS);
      hazard = this.dynamicHazard(debrisKind, x, y, {
        width: this.rng.int(16, 32),
        height: this.rng.int(16, 32),
        collisionBox: { width: 24, height: 24 },
        color: [64, 48, 32],
        effect: { type: "damage", strength: t.debrisDamage, source },
      });
    } else {
      hazard = this.dynamicHazard("water_puddle", x, y, {
        width: 48,
        height: 24,
        collisionBox: { width: 44, height: 20 },
        color: [64, 128, 192],
        effect: { type: "slip", duration: t.puddleSlipDuration, strength: t.puddleSlipStrength, source: "weather" },
      });
    }
    this.hazards.push(hazard);
    return hazard;
  }

  /** Reserved for weather; nothing in the frame loop calls it yet. */
  spawnWaterPuddle(x: number, y: number): DynamicHazard {
    return this.spawnDynamicHazard("water_puddle", x, y, "weather");
  }

  /** Rolls for oil slicks behind trucks ahead of the player and for loose debris. */
  spawnDynamicHazards({ vehicles, band, horizonY }: DynamicSpawnFrame) {
    const t = this.tuning;
    for (const npc of vehicles) {
      if (npc.vehicleClass === "truck" && npc.y > 0 && this.rng.chance(t.oilSlickChancePerFrame)) {
        const oilX = npc.x + this.rng.between(-t.oilSlickJitter, t.oilSlickJitter);
        this.spawnDynamicHazard("oil_slick", oilX, npc.y - t.oilSlickTrail, "truck");
      }
    }

    if (this.rng.chance(t.debrisChancePerFrame)) {
      const debrisX = this.rng.between(band.left + t.debrisEdgeMargin, band.right - t.debrisEdgeMargin);
      this.spawnDynamicHazard("debris", debrisX, horizonY + t.debrisForwardOffset, "random");
    }
  }

  /** Removing a hazard that is already gone is a no-op. */
  removeHazard(id: number): boolean {
    const index = this.hazards.findIndex((hazard) => hazard.id === id);
    if (index < 0) return false;
    this.hazards.splice(index, 1);
    return true;
  }

  addSlipEffect(duration: number, strength: number) {
    this.effects.push({ kind: "slip", remainingDuration: duration, strength });
    this.effectVisualTimer = duration;
  }

  /** Ticks active effects and recomputes the steering multiplier they impose. */
  updateEffects(dt: number) {
    let slipFactor = 1;
    let slipping = false;
    for (const effect of this.effects) {
      effect.remainingDuration -= dt;
      slipFactor *= effect.strength;
      slipping = true;
    }
    this.effects = this.effects.filter((effect) => effect.remainingDuration > 0);
    this.slipFactor = slipFactor;

    if (slipping) {
      this.spinAngle += this.tuning.slipSpinSpeed * dt;
      if (this.spinAngle >= 360) {
        this.spinAngle -= 360;
      }
    } else if (this.spinAngle > 0) {
      this.spinAngle = Math.max(0, this.spinAngle - this.tuning.slipSpinRecoverySpeed * dt);
    }

    if (this.effectVisualTimer > 0) {
      this.effectVisualTimer -= dt;
    }
  }

  getHazards(): readonly Hazard[] {
    return this.hazards;
  }

  getSlipFactor(): number {
    return this.slipFactor;
  }

  getSpinAngle(): number {
    return this.spinAngle;
  }

  getEffectVisualTimer(): number {
    return Math.max(0, this.effectVisualTimer);
  }

  getActiveEffects(): ActiveEffect[] {
    return this.effects.map((effect) => ({ ...effect }));
  }

  getZones(): ConstructionZone[] {
    return this.zones.map((zone) => ({ ...zone, lanes: [...zone.lanes] }));
  }

  getSnapshot(): Hazard[] {
    return this.hazards.map((hazard) => ({
      ...hazard,
      collisionBox: { ...hazard.collisionBox },
      color: [...hazard.color],
    }));
  }

  private dynamicHazard(
    kind: DynamicHazardKind,
    x: number,
    y: number,
    shape: Pick<DynamicHazard, "width" | "height" | "collisionBox" | "color" | "effect">,
  ): DynamicHazard {
    return { id: this.allocateId(), category: "dynamic", kind, x, y, lane: -1, ...shape };
  }

  private allocateId(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }
}
