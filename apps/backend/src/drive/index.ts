export * from "./catalog";
export * from "./collisionResolver";
export * from "./comicText";
export * from "./driveSession";
export * from "./hazardSystem";
export * from "./playerDriveModel";
export * from "./raceMusic";
export * from "./roadGeometry";
export * from "./trafficAI";
export * from "./turnStateMachine";
