import { createLogger, type BarSource, type Strategy } from "@backtide/core";
import { BacktestEngine } from "../backtest/backtestEngine";
import type { BacktestConfig, BacktestResult } from "../backtest/backtestTypes";
import { asyncPool } from "./asyncPool";

const logger = createLogger("sweep");

const DEFAULT_SWEEP_CONCURRENCY = 4;

export interface SweepVariant<P> {
	name: string;
	params: P;
	/** Layered over `SweepOptions.baseConfig`. */
	config?: BacktestConfig;
}

export interface SweepOptions<P> {
	source: BarSource;
	start: number;
	end: number;
	createStrategy: (params: P, variant: SweepVariant<P>) => Strategy;
	baseConfig?: BacktestConfig;
	concurrency?: number;
	signal?: AbortSignal;
}

export interface SweepOutcome<P> {
	name: string;
	params: P;
	result: BacktestResult;
}

export const mergeBacktestConfig = (
	base: BacktestConfig = {},
	override: BacktestConfig = {}
): BacktestConfig => ({
	...base,
	...override,
	risk: { ...base.risk, ...override.risk },
	execution: { ...base.execution, ...override.execution },
});

/**
 * Runs every variant in isolation: a fresh engine, ledger, risk gate and
 * strategy each, over the same read-only bar source. Results come back in
 * variant order whatever order the runs finish in.
 */
export const runParameterSweep = async <P>(
	variants: readonly SweepVariant<P>[],
	options: SweepOptions<P>
): Promise<SweepOutcome<P>[]> => {
	const engines = variants.map((variant) => {
		const engine = new BacktestEngine(mergeBacktestConfig(options.baseConfig, variant.config));
		engine.resolveConfig(options.start, options.end);
		return engine;
	});
	const concurrency = options.concurrency ?? DEFAULT_SWEEP_CONCURRENCY;
	logger.info("sweep_started", { variants: variants.length, concurrency });

	const outcomes = await asyncPool(variants, concurrency, async (variant, index) => {
		const strategy = options.createStrategy(variant.params, variant);
		const result = await engines[index].runAsync(
			strategy,
			options.source,
			options.start,
			options.end,
			{ signal: options.signal }
		);
		logger.info("sweep_variant_completed", {
			name: variant.name,
			status: result.status,
			totalReturn: result.metrics.totalReturn,
			sharpe: result.metrics.sharpe,
		});
		return { name: variant.name, params: variant.params, result };
	});

	logger.info("sweep_completed", {
		variants: outcomes.length,
		stopped: outcomes.filter((outcome) => outcome.result.status === "stopped").length,
	});
	return outcomes;
};
