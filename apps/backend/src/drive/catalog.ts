import type { MusicTrack, VehicleOption } from "../models/drive";

export const MUSIC_TRACKS: readonly MusicTrack[] = [
  {
    id: "highway_dreams",
    displayName: "Highway Dreams",
    description: "The main theme - cruising down endless roads",
    filename: "highway_dreams.mp3",
    bpm: 125,
    mood: "energetic",
    previewStart: 15,
  },
  {
    id: "sunset_cruise",
    displayName: "Sunset Cruise",
    description: "Relaxed vibes for a peaceful drive",
    filename: "sunset_cruise.mp3",
    bpm: 108,
    mood: "relaxed",
    previewStart: 20,
  },
  {
    id: "turbo_rush",
    displayName: "Turbo Rush",
    description: "High energy beats for intense racing",
    filename: "turbo_rush.mp3",
    bpm: 140,
    mood: "intense",
    previewStart: 10,
  },
];

export const VEHICLE_OPTIONS: readonly VehicleOption[] = [
  {
    id: "professional",
    name: "Professional EV",
    spriteName: "professional",
    description: "Sleek and modern electric vehicle",
  },
  {
    id: "kids_drawing",
    name: "Kid's Drawing",
    spriteName: "kids_drawing",
    description: "Charming crayon-style artwork",
  },
];

export const findTrack = (id: string): MusicTrack | undefined => MUSIC_TRACKS.find((track) => track.id === id);

export const findVehicle = (id: string): VehicleOption | undefined =>
  VEHICLE_OPTIONS.find((vehicle) => vehicle.id === id);
