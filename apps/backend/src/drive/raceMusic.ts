import type { MusicTrack, RaceState } from "../models/drive";
import { clamp } from "../utils/math";
import { logger } from "../utils/logger";

/** Audio collaborator the simulation drives. Implementations may throw; callers go through {@link guardSoundPort}. */
export interface SoundPort {
  playSound(id: string): void;
  setMusicVolume(volume: number): void;
  crossfade(track: MusicTrack, durationMs: number): void;
  preview(track: MusicTrack): void;
  stop(fadeMs?: number): void;
}

export const silentSoundPort: SoundPort = {
  playSound: () => undefined,
  setMusicVolume: () => undefined,
  crossfade: () => undefined,
  preview: () => undefined,
  stop: () => undefined,
};

const attempt = (operation: string, call: () => void) => {
  try {
    call();
  } catch (error) {
    logger.warn("Sound port call failed", {
      operation,
      error: error instanceof Error ? error.message : String(error),
    });
  }
};

/** Wraps a port so that a failing audio backend degrades to silence instead of stopping the race. */
export const guardSoundPort = (port: SoundPort): SoundPort => ({
  playSound: (id) => attempt("playSound", () => port.playSound(id)),
  setMusicVolume: (volume) => attempt("setMusicVolume", () => port.setMusicVolume(volume)),
  crossfade: (track, durationMs) => attempt("crossfade", () => port.crossfade(track, durationMs)),
  preview: (track) => attempt("preview", () => port.preview(track)),
  stop: (fadeMs) => attempt("stop", () => port.stop(fadeMs)),
});

export type Stinger = "crash" | "boost" | "victory" | "final_lap" | "position_up" | "position_down";

export interface RaceMusicTuning {
  baseVolume: number;
  boostVolume: number;
  crashVolume: number;
  finalLapVolume: number;
  volumeChangeThreshold: number;
  speedSensitivity: number;
  pitchRange: [number, number];
  duckLevel: number;
  duckDuration: number;
}

export const DEFAULT_RACE_MUSIC_TUNING: Readonly<RaceMusicTuning> = {
  baseVolume: 0.7,
  boostVolume: 1.1,
  crashVolume: 0.5,
  finalLapVolume: 1.05,
  volumeChangeThreshold: 0.05,
  speedSensitivity: 0.3,
  pitchRange: [0.85, 1.15],
  duckLevel: 0.3,
  duckDuration: 1.5,
};

export interface RaceMusicInfo {
  track: string | null;
  isPlaying: boolean;
  volume: number;
  pitch: number;
  isDucked: boolean;
}

const idleRaceState = (): RaceState => ({
  speed: 0,
  position: 1,
  totalRacers: 1,
  timeRemaining: 0,
  isBoost: false,
  isCrash: false,
  isFinalLap: false,
  isVictory: false,
  isGameOver: false,
});

/**
 * Turns race-state changes into stingers, volume and pitch for the music port.
 */
export class RaceMusicDirector {
  private track: MusicTrack | null = null;
  private playing = false;
  private raceState: RaceState = idleRaceState();
  private volume: number;
  private pitch = 1;
  private duckRemaining = 0;

  constructor(
    private readonly port: SoundPort,
    private readonly tuning: RaceMusicTuning = DEFAULT_RACE_MUSIC_TUNING,
  ) {
    this.volume = tuning.baseVolume;
  }

  selectTrack(track: MusicTrack) {
    this.track = track;
    logger.debug("Race track selected", { track: track.id });
  }

  /** `initial` is the baseline later states are compared against for stingers. */
  start(fadeInMs = 1000, initial: RaceState = idleRaceState()) {
    if (!this.track) {
      logger.warn("No track selected for race music");
      return;
    }
    this.raceState = { ...initial };
    this.volume = this.tuning.baseVolume;
    this.pitch = 1;
    this.duckRemaining = 0;
    this.port.setMusicVolume(this.volume);
    this.port.crossfade(this.track, fadeInMs);
    this.playing = true;
  }

  stop(fadeOutMs = 1000) {
    if (!this.playing) return;
    this.port.stop(fadeOutMs);
    this.playing = false;
    this.duckRemaining = 0;
  }

  isPlaying(): boolean {
    return this.playing;
  }

  /** Compares against the last published state; returns the stingers that fired. */
  publish(state: RaceState): Stinger[] {
    const previous = this.raceState;
    this.raceState = { ...state };
    const fired: Stinger[] = [];

    if (state.position < previous.position) {
      fired.push("position_up");
    } else if (state.position > previous.position) {
      fired.push("position_down");
    }

    if (state.isBoost && !previous.isBoost) {
      fired.push("boost");
    } else if (state.isCrash && !previous.isCrash) {
      fired.push("crash");
    } else if (state.isFinalLap && !previous.isFinalLap) {
      fired.push("final_lap");
    } else if (state.isVictory && !previous.isVictory) {
      fired.push("victory");
    }

    for (const stinger of fired) {
      this.playStinger(stinger);
    }
    this.updateDynamics();
    return fired;
  }

  /** Restores volume once a stinger's duck has run its course. */
  tick(dt: number) {
    if (this.duckRemaining <= 0) return;
    this.duckRemaining -= dt;
    if (this.duckRemaining <= 0) {
      this.duckRemaining = 0;
      this.port.setMusicVolume(this.volume);
    }
  }

  getInfo(): RaceMusicInfo {
    return {
      track: this.track ? this.track.displayName : null,
      isPlaying: this.playing,
      volume: this.volume,
      pitch: this.pitch,
      isDucked: this.duckRemaining > 0,
    };
  }

  private playStinger(stinger: Stinger) {
    if (this.playing) {
      this.duckRemaining = this.tuning.duckDuration;
      this.port.setMusicVolume(this.volume * this.tuning.duckLevel);
    }
    this.port.playSound(`stinger_${stinger}`);
  }

  private updateDynamics() {
    if (!this.playing) return;
    const t = this.tuning;
    const state = this.raceState;

    this.pitch = clamp(1 + state.speed * t.speedSensitivity, t.pitchRange[0], t.pitchRange[1]);

    let target = t.baseVolume;
    if (state.isBoost) {
      target *= t.boostVolume;
    } else if (state.isCrash) {
      target *= t.crashVolume;
    }
    if (state.isFinalLap) {
      target *= t.finalLapVolume;
    }

    if (Math.abs(this.volume - target) > t.volumeChangeThreshold) {
      this.volume = target;
      if (this.duckRemaining <= 0) {
        this.port.setMusicVolume(this.volume);
      }
    }
  }
}
