export { BaseStrategy } from "./BaseStrategy";
export { BuyAndHoldStrategy, parseBuyAndHoldConfig } from "./BuyAndHoldStrategy";
export type { BuyAndHoldConfig } from "./BuyAndHoldStrategy";
export {
	MovingAverageCrossStrategy,
	parseMovingAverageCrossConfig,
} from "./MovingAverageCrossStrategy";
export type {
	MovingAverageCrossConfig,
	MovingAverageKind,
} from "./MovingAverageCrossStrategy";
export { ParamReader } from "./params";
export type { StrategyParams } from "./params";
export {
	createStrategy,
	getRegisteredStrategyIds,
	isRegisteredStrategyId,
	validateUniqueStrategyIds,
} from "./registry";
export type { StrategyRegistryEntry } from "./registry";
