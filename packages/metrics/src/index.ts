export * from "./metricsSchema";
export { inferPeriodsPerYear, replayTrades, summarize } from "./calcPerformance";
export type { SummarizeOptions } from "./calcPerformance";
export * from "./formatCSV";
export * from "./attribution";
