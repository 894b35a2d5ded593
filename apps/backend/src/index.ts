export { buildApp } from "./app";
export * from "./autopilot";
export * from "./config/driveTuning";
export * from "./drive";
export * from "./models/drive";
export { createRng, rngFromSource, type Rng } from "./utils/random";
