import type { Server } from "http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { buildApp } from "./app";
import { DriveSessionService } from "./services/driveSessionService";

let server: Server;
let baseUrl: string;

const request = async (method: string, path: string, body?: unknown) => {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: { "content-type": "application/json" },
    ...(body === undefined ? {} : { body: typeof body === "string" ? body : JSON.stringify(body) }),
  });
  const text = await response.text();
  const json: unknown = text.length > 0 ? JSON.parse(text) : null;
  return { status: response.status, json };
};

const field = (value: unknown, key: string): unknown =>
  typeof value === "object" && value !== null && key in value ? Reflect.get(value, key) : undefined;

beforeAll(async () => {
  server = buildApp().listen(0);
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Test server has no TCP address");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  DriveSessionService.getInstance().clear();
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

describe("drive API", () => {
  it("answers health checks", async () => {
    expect(await request("GET", "/health")).toEqual({ status: 200, json: { status: "ok" } });
  });

  it("lists the catalog", async () => {
    const { status, json } = await request("GET", "/api/drive/catalog");
    expect(status).toBe(200);
    const tracks = field(json, "tracks");
    expect(Array.isArray(tracks) ? tracks.map((track) => field(track, "id")) : null).toEqual([
      "highway_dreams",
      "sunset_cruise",
      "turbo_rush",
    ]);
  });

  it("runs a session from creation to the first race frames", async () => {
    const created = await request("POST", "/api/drive/sessions", { seed: 5 });
    expect(created.status).toBe(201);
    const id = field(created.json, "id");
    expect(typeof id).toBe("string");

    const track = await request("POST", `/api/drive/sessions/${String(id)}/selection`, {
      type: "track_selected",
      trackId: "highway_dreams",
    });
    expect(track.status).toBe(200);

    await request("POST", `/api/drive/sessions/${String(id)}/selection`, {
      type: "vehicle_selected",
      vehicleId: "professional",
    });
    const started = await request("POST", `/api/drive/sessions/${String(id)}/commands`, { command: "start" });
    expect(field(field(started.json, "snapshot"), "phase")).toBe("racing");

    const stepped = await request("POST", `/api/drive/sessions/${String(id)}/step`, {
      dt: 0.1,
      frames: 5,
      input: { accelerate: true },
    });
    expect(stepped.status).toBe(200);
    const race = field(field(stepped.json, "snapshot"), "race");
    expect(field(race, "timeRemaining")).toBeCloseTo(119.5, 6);

    const deleted = await request("DELETE", `/api/drive/sessions/${String(id)}`);
    expect(deleted.status).toBe(204);
  });

  it("validates request bodies", async () => {
    const created = await request("POST", "/api/drive/sessions", { seed: 6 });
    const id = String(field(created.json, "id"));

    expect(await request("POST", `/api/drive/sessions/${id}/step`, { dt: "soon" })).toEqual({
      status: 400,
      json: { error: "dt must be a number" },
    });
    expect(await request("POST", `/api/drive/sessions/${id}/step`, { dt: 0.1, input: { accelerate: "yes" } })).toEqual({
      status: 400,
      json: { error: "input.accelerate must be a boolean" },
    });
    expect(await request("POST", `/api/drive/sessions/${id}/commands`, { command: "fly" })).toEqual({
      status: 400,
      json: { error: "command must be one of start, end, restart, change_music, preview, quit, leaderboard" },
    });
    expect(await request("POST", "/api/drive/sessions", { tuning: { player: { warp: 9 } } })).toEqual({
      status: 400,
      json: { error: "tuning.player.warp is not a known setting" },
    });
    expect(await request("POST", "/api/drive/sessions", { seed: 1.5 })).toEqual({
      status: 400,
      json: { error: "seed must be an integer" },
    });
  });

  it("returns 404 for unknown sessions and routes", async () => {
    expect(await request("GET", "/api/drive/sessions/nope")).toEqual({
      status: 404,
      json: { error: "Drive session nope not found" },
    });
    expect((await request("GET", "/api/elsewhere")).status).toBe(404);
  });

  it("rejects malformed JSON", async () => {
    const { status } = await request("POST", "/api/drive/sessions", "{not json");
    expect(status).toBe(400);
  });
});
