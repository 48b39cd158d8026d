export * from "./types";
export * from "./errors";
export * from "./strategy";
export * from "./config";
export * from "./utils/logger";
export * from "./utils/round";
export * from "./portfolio/positionMath";
