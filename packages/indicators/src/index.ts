export * from "./sma";
export * from "./ema";
export * from "./statistics";
