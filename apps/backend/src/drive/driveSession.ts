import { resolveDriveTuning, type DriveTuning, type DriveTuningOverrides } from "../config/driveTuning";
import {
  IDLE_INPUT,
  type DriveCommand,
  type DriveInput,
  type DriveSnapshot,
  type FeedbackEvent,
  type GamePhase,
  type MusicTrack,
  type NavigationTarget,
  type RaceResults,
  type RaceState,
  type SelectorOutcome,
  type VehicleOption,
} from "../models/drive";
import { logger } from "../utils/logger";
import { createRng, randomSeed, type Rng } from "../utils/random";
import { CollisionResolver } from "./collisionResolver";
import { ComicTextTimer } from "./comicText";
import { HazardSystem } from "./hazardSystem";
import { PlayerDriveModel } from "./playerDriveModel";
import { RaceMusicDirector, guardSoundPort, silentSoundPort, type SoundPort } from "./raceMusic";
import { RoadGeometryModel } from "./roadGeometry";
import { TrafficAI } from "./trafficAI";
import { TurnStateMachine } from "./turnStateMachine";

export interface DriveSessionOptions {
  tuning?: DriveTuningOverrides;
  seed?: number;
  /** Takes precedence over `seed`. */
  rng?: Rng;
  sound?: SoundPort;
  onEvent?: (event: FeedbackEvent) => void;
}

const RACE_START_FADE_MS = 1000;
const RACE_END_FADE_MS = 2000;
const EXIT_FADE_MS = 500;

/**
 * Owns one drive: the selection flow, the race timer and the per-frame component pipeline.
 * The host calls {@link update} once per frame with the held input.
 */
export class DriveSessionController {
  readonly tuning: DriveTuning;
  readonly seed: number | null;

  private readonly rng: Rng;
  private readonly sound: SoundPort;
  private readonly emit: (event: FeedbackEvent) => void;

  private readonly road: RoadGeometryModel;
  private readonly turn: TurnStateMachine;
  private readonly traffic: TrafficAI;
  private readonly hazards: HazardSystem;
  private readonly player: PlayerDriveModel;
  private readonly collisions: CollisionResolver;
  private readonly comic: ComicTextTimer;
  private readonly music: RaceMusicDirector;

  private phase: GamePhase = "music_select";
  private paused = false;
  private selectedTrack: MusicTrack | null = null;
  private selectedVehicle: VehicleOption | null = null;
  private race: RaceState;
  private score = 0;
  private distanceTraveled = 0;
  private topSpeedReached = 0;
  private pendingNavigation: NavigationTarget | null = null;
  private previousInput: DriveInput = { ...IDLE_INPUT };

  constructor(options: DriveSessionOptions = {}) {
    this.tuning = resolveDriveTuning(options.tuning);
    if (options.rng) {
      this.rng = options.rng;
      this.seed = null;
    } else {
      this.seed = options.seed ?? randomSeed();
      this.rng = createRng(this.seed);
    }
    this.sound = guardSoundPort(options.sound ?? silentSoundPort);
    this.emit = options.onEvent ?? (() => undefined);

    const t = this.tuning;
    this.road = new RoadGeometryModel(t.road, t.screen);
    this.turn = new TurnStateMachine(t.turn, this.rng);
    this.traffic = new TrafficAI(t.traffic, this.rng);
    this.hazards = new HazardSystem(t.hazards, this.rng);
    this.player = new PlayerDriveModel(t.player);
    this.collisions = new CollisionResolver(t.collision, t.screen);
    this.comic = new ComicTextTimer(t.session.comicTextInterval, t.session.comicTextDuration, this.rng);
    this.music = new RaceMusicDirector(this.sound);
    this.race = this.freshRaceState();
  }

  getPhase(): GamePhase {
    return this.phase;
  }

  isPaused(): boolean {
    return this.paused;
  }

  /** Re-entering the drive skips straight to the start line once a track is chosen. */
  enter() {
    this.pendingNavigation = null;
    this.transition(this.selectedTrack ? "ready" : "music_select");
  }

  exit() {
    this.music.stop(EXIT_FADE_MS);
  }

  /** Applies a selector result; returns false when the current phase has no selector open. */
  handleSelection(outcome: SelectorOutcome): boolean {
    if (this.phase === "music_select") {
      if (outcome.type === "track_selected") {
        this.selectedTrack = outcome.track;
        this.music.selectTrack(outcome.track);
        this.transition("vehicle_select");
        return true;
      }
      if (outcome.type === "cancelled") {
        if (this.selectedTrack) {
          this.transition("ready");
        } else {
          this.navigate("hub");
        }
        return true;
      }
      return false;
    }

    if (this.phase === "vehicle_select") {
      if (outcome.type === "vehicle_selected") {
        this.selectedVehicle = outcome.vehicle;
        this.transition("ready");
        return true;
      }
      if (outcome.type === "cancelled") {
        this.transition("music_select");
        return true;
      }
    }
    return false;
  }

  previewTrack(track: MusicTrack): boolean {
    if (this.phase !== "music_select") return false;
    this.sound.preview(track);
    return true;
  }

  /** Returns false when the command does not apply to the current phase. */
  command(command: Exclude<DriveCommand, "preview">): boolean {
    switch (command) {
      case "start":
        if (this.phase !== "ready") return false;
        this.startRace();
        return true;
      case "end":
        if (this.phase !== "racing") return false;
        this.endRace();
        return true;
      case "restart":
        if (this.phase !== "game_over") return false;
        this.transition("ready");
        return true;
      case "change_music":
        if (this.phase !== "ready" && this.phase !== "game_over") return false;
        this.transition("music_select");
        return true;
      case "quit":
        if (this.phase === "vehicle_select") return false;
        this.navigate("hub");
        return true;
      case "leaderboard":
        if (this.phase !== "game_over") return false;
        this.navigate("leaderboard");
        return true;
    }
  }

  consumeNavigation(): NavigationTarget | null {
    const target = this.pendingNavigation;
    this.pendingNavigation = null;
    return target;
  }

  update(rawDt: number, input: DriveInput = IDLE_INPUT) {
    const dt = Number.isFinite(rawDt) ? Math.min(Math.max(rawDt, 0), this.tuning.session.maxFrameDt) : 0;
    const previous = this.previousInput;
    this.previousInput = { ...input };

    if (input.quitToHub && !previous.quitToHub && this.phase !== "vehicle_select") {
      this.navigate("hub");
    }
    if (input.changeMusic && !previous.changeMusic) {
      this.command("change_music");
    }
    if (this.phase === "racing" && input.pause && !previous.pause) {
      this.paused = !this.paused;
    }

    if (this.phase === "racing" && !this.paused && this.pendingNavigation === null) {
      this.updateRacing(dt, input);
    }
    this.music.tick(dt);
  }

  getResults(): RaceResults {
    return {
      score: this.score,
      distanceTraveled: this.distanceTraveled,
      topSpeedReached: this.topSpeedReached,
      finalPosition: this.race.position,
      isVictory: this.race.isVictory,
    };
  }

  getSnapshot(): DriveSnapshot {
    return {
      phase: this.phase,
      paused: this.paused,
      selectedTrack: this.selectedTrack,
      selectedVehicle: this.selectedVehicle,
      race: { ...this.race },
      road: this.road.getSnapshot(),
      turn: this.turn.getSnapshot(),
      player: this.player.getSnapshot(),
      penalty: this.collisions.getSnapshot(),
      slipFactor: this.hazards.getSlipFactor(),
      slipSpinAngle: this.hazards.getSpinAngle(),
      slipVisualTimer: this.hazards.getEffectVisualTimer(),
      activeEffects: this.hazards.getActiveEffects(),
      vehicles: this.traffic.getSnapshot(),
      hazards: this.hazards.getSnapshot(),
      constructionZones: this.hazards.getZones(),
      comicText: this.comic.getSnapshot(),
      results: this.getResults(),
      pendingNavigation: this.pendingNavigation,
    };
  }

  /** Direct access for tests and tooling that stage a scene before stepping. */
  get components() {
    return {
      road: this.road,
      turn: this.turn,
      traffic: this.traffic,
      hazards: this.hazards,
      player: this.player,
      collisions: this.collisions,
      music: this.music,
    };
  }

  private updateRacing(dt: number, input: DriveInput) {
    const session = this.tuning.session;

    this.race.timeRemaining = Math.max(0, this.race.timeRemaining - dt);
    if (this.race.timeRemaining <= session.finalLapThreshold) {
      this.race.isFinalLap = true;
    }
    if (this.race.timeRemaining <= 0) {
      this.endRace();
      return;
    }

    const turnSnapshot = this.turn.getSnapshot();
    const frame = this.player.update({
      dt,
      input,
      turn: {
        direction: this.turn.directionSign(),
        intensity: turnSnapshot.intensity,
        progress: turnSnapshot.progress,
      },
      curve: this.road.getCurve(),
      boundaries: this.road.getBoundaries(),
      slipFactor: this.hazards.getSlipFactor(),
      collisionSpeedPenalty: this.collisions.getSpeedPenalty(),
    });
    if (frame.crashed) {
      this.sound.playSound("collision");
      this.emit({ type: "crash", speed: this.player.getSpeed() });
      logger.debug("Player crashed at road edge", { x: this.player.getX(), speed: this.player.getSpeed() });
    }

    this.turn.update(dt);
    const speed = this.player.getSpeed();
    this.road.advance({
      dt,
      speed,
      isTurning: this.turn.isTurning(),
      turnCurve: this.turn.curveContribution(),
    });

    const band = this.road.getLaneBand();
    this.traffic.update({ dt, playerSpeed: speed, playerX: this.player.getX(), band });
    this.hazards.update({ dt, playerSpeed: speed, band });
    this.hazards.spawnDynamicHazards({
      vehicles: this.traffic.getVehicles(),
      band,
      horizonY: Math.floor(this.tuning.screen.height / 2),
    });
    this.hazards.updateEffects(dt);
    this.comic.update(dt);

    const outcome = this.collisions.resolve({
      dt,
      playerX: this.player.getX(),
      traffic: this.traffic,
      hazards: this.hazards,
      player: this.player,
    });
    if (outcome) {
      this.sound.playSound(outcome.sound);
      if (outcome.kind === "traffic") {
        this.emit({
          type: "collision",
          target: outcome.vehicleClass,
          speedPenalty: outcome.speedPenalty,
          damage: outcome.damage,
        });
      } else if (outcome.effect) {
        this.emit({ type: "effect", target: outcome.target, effect: outcome.effect });
      } else {
        this.emit({
          type: "collision",
          target: outcome.target,
          speedPenalty: outcome.speedPenalty,
          damage: outcome.damage,
        });
      }
      logger.debug("Collision resolved", { kind: outcome.kind, sound: outcome.sound });
    }

    // Progress is credited at the speed the player drove this frame, before any hit lands.
    const distanceDelta = speed * dt * session.distanceScale;
    this.distanceTraveled += distanceDelta;
    this.score += Math.trunc(distanceDelta * session.scorePerDistance);
    this.topSpeedReached = Math.max(this.topSpeedReached, speed);

    const playerState = this.player.getSnapshot();
    this.race.speed = speed;
    this.race.position = Math.max(1, Math.trunc(session.totalRacers + 1 - speed * session.totalRacers));
    this.race.isBoost = playerState.isBoost;
    this.race.isCrash = playerState.isCrash;
    this.music.publish(this.race);
  }

  private startRace() {
    this.race = this.freshRaceState();
    this.road.reset();
    this.turn.reset();
    this.traffic.reset();
    this.hazards.reset();
    this.player.reset();
    this.collisions.reset();
    this.comic.reset();
    this.score = 0;
    this.distanceTraveled = 0;
    this.topSpeedReached = 0;
    this.paused = false;

    this.transition("racing");
    this.music.start(RACE_START_FADE_MS, this.race);
    logger.debug("Race started", { track: this.selectedTrack?.id ?? null, vehicle: this.selectedVehicle?.id ?? null });
  }

  private endRace() {
    this.transition("game_over");
    this.paused = false;

    this.race.isVictory = this.race.position <= this.tuning.session.victoryPosition;
    this.race.isGameOver = true;
    if (this.race.isVictory) {
      this.sound.playSound("stinger_victory");
    }
    logger.debug("Race ended", { ...this.getResults() });
  }

  private navigate(target: NavigationTarget) {
    if (this.phase === "racing") {
      this.paused = false;
    }
    this.exit();
    this.pendingNavigation = target;
    this.emit({ type: "navigate", target });
  }

  private transition(to: GamePhase) {
    const from = this.phase;
    if (from === to) return;
    if (from === "racing") {
      this.music.stop(RACE_END_FADE_MS);
    }
    this.phase = to;
    this.emit({ type: "phase", from, to });
  }

  private freshRaceState(): RaceState {
    const session = this.tuning.session;
    return {
      speed: 0,
      position: session.totalRacers,
      totalRacers: session.totalRacers,
      timeRemaining: session.raceDuration,
      isBoost: false,
      isCrash: false,
      isFinalLap: false,
      isVictory: false,
      isGameOver: false,
    };
  }
}
