import type { PlayerTuning } from "../config/driveTuning";
import type { DriveInput, PlayerState, RoadBoundaries } from "../models/drive";
import { approach, clamp } from "../utils/math";

export interface TurnInfluence {
  /** +1 bending right, -1 bending left, 0 straight. */
  direction: number;
  intensity: number;
  progress: number;
}

export interface PlayerFrame {
  dt: number;
  input: Pick<DriveInput, "accelerate" | "steerLeft" | "steerRight">;
  turn: TurnInfluence;
  curve: number;
  boundaries: RoadBoundaries;
  slipFactor: number;
  collisionSpeedPenalty: number;
}

export interface PlayerFrameResult {
  crashed: boolean;
}

const STRAIGHT: TurnInfluence = { direction: 0, intensity: 0, progress: 0 };

export class PlayerDriveModel {
  private x = 0.5;
  private speed = 0;
  private rotation = 0;
  private momentumX = 0;
  private driftFactor = 0;
  private offRoadTimer = 0;
  private offRoadPenalty = 0;
  private isOffRoad = false;
  private isBoost = false;
  private crashTimer = 0;

  constructor(private readonly tuning: PlayerTuning) {}

  reset() {
    this.x = 0.5;
    this.speed = 0;
    this.rotation = 0;
    this.momentumX = 0;
    this.driftFactor = 0;
    this.offRoadTimer = 0;
    this.offRoadPenalty = 0;
    this.isOffRoad = false;
    this.isBoost = false;
    this.crashTimer = 0;
  }

  place(state: { x?: number; speed?: number }) {
    if (state.x !== undefined) this.x = clamp(state.x, 0, 1);
    if (state.speed !== undefined) this.speed = clamp(state.speed, 0, this.tuning.maxSpeed);
  }

  update(frame: PlayerFrame): PlayerFrameResult {
    const t = this.tuning;
    const { dt, input } = frame;
    const turn = frame.turn.direction === 0 ? STRAIGHT : frame.turn;
    const turning = turn.direction !== 0;

    if (this.crashTimer > 0) {
      this.crashTimer = Math.max(0, this.crashTimer - dt);
    }

    this.updateSpeed(dt, input.accelerate, turn);

    // Collisions sap speed, but never to a full stall.
    this.speed = Math.max(t.minSpeed, this.speed * (1 - frame.collisionSpeedPenalty));

    const steering =
      t.steeringSpeed * dt * (1 - this.offRoadPenalty * t.offRoadSteeringPenalty) * frame.slipFactor;
    if (input.steerLeft) {
      this.x = Math.max(0, this.x - steering);
    }
    if (input.steerRight) {
      this.x = Math.min(1, this.x + steering);
    }

    if (turning) {
      const racingLineX = 0.5 - turn.direction * turn.intensity * t.racingLineStrength * turn.progress;
      this.x += (racingLineX - this.x) * t.racingLineResponse * dt;
    }
    this.x = clamp(this.x + frame.curve * this.speed * dt * t.curveInfluence, 0, 1);

    this.updateRotation(dt, input, turn);
    this.updateMomentum(dt, turn);
    this.x += this.momentumX * dt * t.momentumInfluence;

    this.enforceRoad(dt, frame.boundaries);

    if ((this.x < t.crashLeftX || this.x > t.crashRightX) && this.speed > t.crashSpeedThreshold) {
      this.speed *= t.crashSpeedFactor;
      this.crashTimer = t.crashFlagDuration;
      return { crashed: true };
    }
    return { crashed: false };
  }

  /** Instant loss of a fraction of current speed. */
  scaleSpeed(factor: number) {
    this.speed = Math.max(0, this.speed * factor);
  }

  getX(): number {
    return this.x;
  }

  getSpeed(): number {
    return this.speed;
  }

  getSnapshot(): PlayerState {
    return {
      x: this.x,
      speed: this.speed,
      rotation: this.rotation,
      momentumX: this.momentumX,
      driftFactor: this.driftFactor,
      offRoadTimer: this.offRoadTimer,
      offRoadPenalty: this.offRoadPenalty,
      isOffRoad: this.isOffRoad,
      isBoost: this.isBoost,
      isCrash: this.crashTimer > 0,
    };
  }

  private updateSpeed(dt: number, accelerate: boolean, turn: TurnInfluence) {
    const t = this.tuning;
    const severity = turn.intensity * turn.progress;
    const acceleration = t.acceleration * (1 - t.turnAccelerationPenalty * severity);
    const deceleration = t.deceleration * (1 + t.turnDecelerationIncrease * severity);

    if (accelerate) {
      this.speed = Math.min(t.maxSpeed, this.speed + acceleration * dt);
      const threshold = turn.direction === 0 ? t.boostThreshold : t.turningBoostThreshold;
      if (this.speed > threshold) {
        this.isBoost = true;
      }
    } else {
      this.speed = Math.max(0, this.speed - deceleration * dt);
      this.isBoost = false;
    }
  }

  private updateRotation(dt: number, input: PlayerFrame["input"], turn: TurnInfluence) {
    const t = this.tuning;
    let inputRotation = 0;
    if (input.steerLeft) {
      inputRotation = -t.maxRotation * t.inputRotationShare;
    } else if (input.steerRight) {
      inputRotation = t.maxRotation * t.inputRotationShare;
    }
    const turnRotation = turn.direction * t.maxRotation * t.turnRotationShare * turn.intensity * turn.progress;
    const target = clamp(inputRotation + turnRotation, -t.maxRotation, t.maxRotation);
    this.rotation = approach(this.rotation, target, t.rotationSpeed * dt);
  }

  private updateMomentum(dt: number, turn: TurnInfluence) {
    const t = this.tuning;
    if (turn.direction === 0) {
      this.momentumX *= t.momentumDecay;
      this.driftFactor *= t.driftFadeStraight;
      return;
    }

    const targetMomentum = turn.direction * this.speed * turn.intensity * dt * t.momentumBuildRate;
    this.momentumX += (targetMomentum - this.momentumX) * t.momentumResponse * dt;
    if (this.speed > t.driftThreshold) {
      this.driftFactor = Math.min(1, (this.speed - t.driftThreshold) * turn.intensity * t.driftGain);
    } else {
      this.driftFactor *= t.driftFadeTurning;
    }
  }

  private enforceRoad(dt: number, { left, right }: RoadBoundaries) {
    const t = this.tuning;
    this.isOffRoad = this.x < left || this.x > right;

    if (this.isOffRoad) {
      this.offRoadTimer += dt;
      if (this.x < left) {
        const correction = Math.min(1, (left - this.x) * t.offRoadCorrectionGain);
        this.x = Math.min(this.x + correction * dt * t.offRoadCorrectionSpeed, left + t.offRoadOvershootAllowance);
      } else {
        const correction = Math.min(1, (this.x - right) * t.offRoadCorrectionGain);
        this.x = Math.max(this.x - correction * dt * t.offRoadCorrectionSpeed, right - t.offRoadOvershootAllowance);
      }
      this.offRoadPenalty = Math.min(
        t.maxOffRoadPenalty,
        this.offRoadPenalty + t.offRoadPenaltyRate * this.speed * dt,
      );
    } else {
      this.offRoadTimer = Math.max(0, this.offRoadTimer - dt * t.offRoadTimerRecovery);
      this.offRoadPenalty = Math.max(0, this.offRoadPenalty - dt * t.offRoadPenaltyRecovery);
    }

    if (this.offRoadPenalty > 0) {
      const effectiveMax = t.maxSpeed * (1 - this.offRoadPenalty);
      if (this.speed > effectiveMax) {
        this.speed = Math.max(effectiveMax, this.speed - t.offRoadSlowdownRate * dt);
      }
    }
  }
}
