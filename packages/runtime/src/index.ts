export { BacktestEngine } from "./backtest/backtestEngine";
export { VisibleHistory } from "./backtest/VisibleHistory";
export type { HistoryShortfall } from "./backtest/VisibleHistory";
export * from "./backtest/backtestTypes";
export { asyncPool } from "./sweep/asyncPool";
export { mergeBacktestConfig, runParameterSweep } from "./sweep/parameterSweep";
export type { SweepOptions, SweepOutcome, SweepVariant } from "./sweep/parameterSweep";
export { MultiStrategyEngine } from "./multi/multiStrategyEngine";
export type { MultiStrategyResult } from "./multi/multiStrategyEngine";
export { StrategyGroup } from "./multi/strategyGroup";
