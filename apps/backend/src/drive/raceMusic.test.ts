import { describe, expect, it, vi } from "vitest";
import type { MusicTrack, RaceState } from "../models/drive";
import { MUSIC_TRACKS } from "./catalog";
import { RaceMusicDirector, guardSoundPort, type SoundPort } from "./raceMusic";

const fakePort = () => ({
  playSound: vi.fn<(id: string) => void>(),
  setMusicVolume: vi.fn<(volume: number) => void>(),
  crossfade: vi.fn<(track: MusicTrack, durationMs: number) => void>(),
  preview: vi.fn<(track: MusicTrack) => void>(),
  stop: vi.fn<(fadeMs?: number) => void>(),
});

const raceState = (overrides: Partial<RaceState> = {}): RaceState => ({
  speed: 0,
  position: 8,
  totalRacers: 8,
  timeRemaining: 120,
  isBoost: false,
  isCrash: false,
  isFinalLap: false,
  isVictory: false,
  isGameOver: false,
  ...overrides,
});

const track = (): MusicTrack => {
  const [first] = MUSIC_TRACKS;
  if (!first) throw new Error("catalog is empty");
  return first;
};

describe("RaceMusicDirector", () => {
  it("does nothing when started without a track", () => {
    const port = fakePort();
    const director = new RaceMusicDirector(port);
    director.start();
    expect(port.crossfade).not.toHaveBeenCalled();
    expect(director.isPlaying()).toBe(false);
  });

  it("fades the selected track in at base volume", () => {
    const port = fakePort();
    const director = new RaceMusicDirector(port);
    director.selectTrack(track());
    director.start(1000, raceState());
    expect(port.setMusicVolume).toHaveBeenCalledWith(0.7);
    expect(port.crossfade).toHaveBeenCalledWith(track(), 1000);
    expect(director.isPlaying()).toBe(true);
  });

  it("fires one stinger on a boost edge and ducks the music", () => {
    const port = fakePort();
    const director = new RaceMusicDirector(port);
    director.selectTrack(track());
    director.start(1000, raceState());
    port.setMusicVolume.mockClear();

    const fired = director.publish(raceState({ isBoost: true, isCrash: true, speed: 1 }));

    expect(fired).toEqual(["boost"]);
    expect(port.playSound).toHaveBeenCalledWith("stinger_boost");
    expect(port.setMusicVolume).toHaveBeenCalledTimes(1);
    expect(port.setMusicVolume.mock.calls[0]?.[0]).toBeCloseTo(0.21, 10);
    const info = director.getInfo();
    expect(info.isDucked).toBe(true);
    expect(info.volume).toBeCloseTo(0.77, 10);
    expect(info.pitch).toBe(1.15);

    expect(director.publish(raceState({ isBoost: true, isCrash: true, speed: 1 }))).toEqual([]);
  });

  it("restores the volume when the duck runs out", () => {
    const port = fakePort();
    const director = new RaceMusicDirector(port);
    director.selectTrack(track());
    director.start(1000, raceState());
    director.publish(raceState({ isBoost: true }));
    port.setMusicVolume.mockClear();

    director.tick(1.0);
    expect(port.setMusicVolume).not.toHaveBeenCalled();
    director.tick(0.5);
    expect(port.setMusicVolume).toHaveBeenCalledTimes(1);
    expect(port.setMusicVolume.mock.calls[0]?.[0]).toBeCloseTo(0.77, 10);
    expect(director.getInfo().isDucked).toBe(false);
  });

  it("reports position changes alongside state stingers", () => {
    const port = fakePort();
    const director = new RaceMusicDirector(port);
    director.selectTrack(track());
    director.start(1000, raceState());

    expect(director.publish(raceState({ position: 6, isFinalLap: true }))).toEqual(["position_up", "final_lap"]);
    expect(director.publish(raceState({ position: 7, isFinalLap: true }))).toEqual(["position_down"]);
  });

  it("stops once", () => {
    const port = fakePort();
    const director = new RaceMusicDirector(port);
    director.selectTrack(track());
    director.start();
    director.stop(2000);
    director.stop(2000);
    expect(port.stop).toHaveBeenCalledTimes(1);
    expect(port.stop).toHaveBeenCalledWith(2000);
  });
});

describe("guardSoundPort", () => {
  it("swallows failures from the audio backend", () => {
    const failing: SoundPort = {
      playSound: () => {
        throw new Error("device lost");
      },
      setMusicVolume: () => {
        throw new Error("device lost");
      },
      crossfade: () => {
        throw new Error("device lost");
      },
      preview: () => {
        throw new Error("device lost");
      },
      stop: () => {
        throw new Error("device lost");
      },
    };
    const director = new RaceMusicDirector(guardSoundPort(failing));
    director.selectTrack(track());

    expect(() => {
      director.start();
      director.publish(raceState({ isCrash: true }));
      director.stop();
    }).not.toThrow();
  });
});
