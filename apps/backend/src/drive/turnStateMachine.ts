import type { TurnTuning } from "../config/driveTuning";
import type { TurnDirection, TurnPhase, TurnSnapshot } from "../models/drive";
import { clamp, easeInOutCosine } from "../utils/math";
import type { Rng } from "../utils/random";

const phaseFor = (direction: TurnDirection): TurnPhase =>
  direction === "left" ? "turning_left" : "turning_right";

/**
 * Schedules discrete left/right bends: a straight section of randomized length,
 * then a turn that eases in over `turnDuration`, then back to straight.
 */
export class TurnStateMachine {
  private phase: TurnPhase = "straight";
  private progress = 0;
  private intensity = 0;
  private timer = 0;
  private straightDuration: number;
  private lastDirection: TurnDirection | null = null;

  constructor(
    private readonly tuning: TurnTuning,
    private readonly rng: Rng,
  ) {
    this.straightDuration = tuning.initialStraightDuration;
  }

  reset() {
    this.phase = "straight";
    this.progress = 0;
    this.intensity = 0;
    this.timer = 0;
    this.straightDuration = this.tuning.initialStraightDuration;
    this.lastDirection = null;
  }

  update(dt: number) {
    this.timer += dt;

    if (this.phase === "straight") {
      if (this.timer >= this.straightDuration) {
        this.enterTurn(this.chooseDirection());
      }
      return;
    }

    this.progress = Math.min(1, this.timer / this.tuning.turnDuration);
    if (this.progress >= 1) {
      this.phase = "straight";
      this.progress = 0;
      this.timer = 0;
      this.straightDuration = this.rng.between(
        this.tuning.minStraightDuration,
        this.tuning.maxStraightDuration,
      );
    }
  }

  /** Starts a turn now. Intensity is sampled unless given. */
  enterTurn(direction: TurnDirection, intensity?: number) {
    const { baseIntensity, intensityVariation, minIntensity, maxIntensity } = this.tuning;
    const sampled =
      intensity ?? baseIntensity + this.rng.between(-intensityVariation, intensityVariation);
    this.phase = phaseFor(direction);
    this.lastDirection = direction;
    this.progress = 0;
    this.timer = 0;
    this.intensity = clamp(sampled, minIntensity, maxIntensity);
  }

  isTurning(): boolean {
    return this.phase !== "straight";
  }

  /** +1 while bending right, -1 while bending left, 0 on a straight. */
  directionSign(): number {
    if (this.phase === "turning_right") return 1;
    if (this.phase === "turning_left") return -1;
    return 0;
  }

  /** Signed curve the turn currently asks of the road. */
  curveContribution(): number {
    return this.directionSign() * this.intensity * easeInOutCosine(this.progress);
  }

  /** How hard the turn currently bites, 0 on a straight. */
  severity(): number {
    return this.isTurning() ? this.intensity * this.progress : 0;
  }

  getSnapshot(): TurnSnapshot {
    return {
      phase: this.phase,
      progress: this.progress,
      intensity: this.intensity,
      timer: this.timer,
      straightDuration: this.straightDuration,
      lastDirection: this.lastDirection,
    };
  }

  private chooseDirection(): TurnDirection {
    if (this.lastDirection === null) {
      return this.rng.chance(0.5) ? "left" : "right";
    }
    if (this.rng.chance(this.tuning.alternateProbability)) {
      return this.lastDirection === "left" ? "right" : "left";
    }
    return this.lastDirection;
  }
}
