import { createLogger, type BarSource, type Strategy } from "@backtide/core";
import { attributeByStrategy, type StrategyAttribution } from "@backtide/metrics";
import { BacktestEngine } from "../backtest/backtestEngine";
import type { BacktestConfig, BacktestResult, RunOptions } from "../backtest/backtestTypes";
import { StrategyGroup } from "./strategyGroup";

const logger = createLogger("runtime");

export interface MultiStrategyResult extends BacktestResult {
	/** One entry per strategy, in the order they were given. */
	attribution: StrategyAttribution[];
}

/**
 * Runs several strategies against one portfolio, risk gate and simulator,
 * then attributes fills and P&L back to each of them.
 */
export class MultiStrategyEngine {
	private readonly engine: BacktestEngine;

	constructor(config: BacktestConfig = {}) {
		this.engine = new BacktestEngine(config);
	}

	run(
		strategies: readonly Strategy[],
		source: BarSource,
		start: number,
		end: number,
		options: RunOptions = {}
	): MultiStrategyResult {
		const group = new StrategyGroup(strategies);
		return this.attribute(group, this.engine.run(group, source, start, end, options));
	}

	async runAsync(
		strategies: readonly Strategy[],
		source: BarSource,
		start: number,
		end: number,
		options: RunOptions = {}
	): Promise<MultiStrategyResult> {
		const group = new StrategyGroup(strategies);
		const result = await this.engine.runAsync(group, source, start, end, options);
		return this.attribute(group, result);
	}

	private attribute(group: StrategyGroup, result: BacktestResult): MultiStrategyResult {
		const attribution = attributeByStrategy(result.fills, {
			strategies: group.members.map((member) => member.name),
			positions: result.snapshots.at(-1)?.positions ?? [],
		});
		for (const entry of attribution) {
			logger.info("strategy_attribution", {
				strategy: entry.strategy,
				fills: entry.fillCount,
				totalPnl: entry.totalPnl,
				winRate: entry.winRate,
			});
		}
		return { ...result, attribution };
	}
}
