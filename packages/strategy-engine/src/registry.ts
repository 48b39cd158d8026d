import { ConfigurationError, type Strategy, type StrategyConfig } from "@backtide/core";
import { BuyAndHoldStrategy, parseBuyAndHoldConfig } from "./BuyAndHoldStrategy";
import {
	MovingAverageCrossStrategy,
	parseMovingAverageCrossConfig,
} from "./MovingAverageCrossStrategy";

export interface StrategyRegistryEntry {
	id: string;
	description: string;
	create: (config: StrategyConfig) => Strategy;
}

export function validateUniqueStrategyIds(entries: readonly StrategyRegistryEntry[]): void {
	const seen = new Set<string>();
	for (const entry of entries) {
		if (seen.has(entry.id)) {
			throw new Error(
				`Duplicate strategy id detected: ${entry.id}. Strategy ids must be unique.`
			);
		}
		seen.add(entry.id);
	}
}

const strategyRegistry: readonly StrategyRegistryEntry[] = Object.freeze([
	{
		id: "buy_and_hold",
		description: "Buys a fixed notional of every symbol once and holds it",
		create: (config: StrategyConfig) =>
			new BuyAndHoldStrategy(parseBuyAndHoldConfig(config.params), config.symbols),
	},
	{
		id: "moving_average_cross",
		description: "Trades fast/slow moving average crossovers",
		create: (config: StrategyConfig) =>
			new MovingAverageCrossStrategy(
				parseMovingAverageCrossConfig(config.params),
				config.symbols
			),
	},
]);

validateUniqueStrategyIds(strategyRegistry);

export const getRegisteredStrategyIds = (): string[] =>
	strategyRegistry.map((entry) => entry.id);

export const isRegisteredStrategyId = (value: unknown): value is string =>
	typeof value === "string" && strategyRegistry.some((entry) => entry.id === value);

const getStrategyDefinition = (id: string): StrategyRegistryEntry => {
	const definition = strategyRegistry.find((entry) => entry.id === id);
	if (!definition) {
		throw new ConfigurationError(`Unknown strategy id: ${id}`, [
			`registered ids: ${getRegisteredStrategyIds().join(", ")}`,
		]);
	}
	return definition;
};

export const createStrategy = (config: StrategyConfig): Strategy =>
	getStrategyDefinition(config.id).create(config);
