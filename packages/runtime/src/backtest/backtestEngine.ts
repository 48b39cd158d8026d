import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import {
	ConfigurationError,
	createLogger,
	resolveExecutionSettings,
	resolveRiskSettings,
	type BarSource,
	type Strategy,
} from "@backtide/core";
import { summarize } from "@backtide/metrics";
import { BacktestSession } from "./backtestSession";
import type {
	BacktestConfig,
	BacktestResolvedConfig,
	BacktestResult,
	RunOptions,
} from "./backtestTypes";

const logger = createLogger("runtime");

const DEFAULT_INITIAL_CAPITAL = 100_000;
const DEFAULT_RISK_FREE_RATE = 0.02;
const DEFAULT_VAR_CONFIDENCE = 0.95;

const resolveWindow = (start: number, end: number): string[] => {
	const issues: string[] = [];
	if (Number.isNaN(start) || Number.isNaN(end)) {
		issues.push("start and end must be numbers");
	} else if (start > end) {
		issues.push(`start (${start}) must not be after end (${end})`);
	}
	return issues;
};

/**
 * Replays a bar source through one strategy. The engine itself holds only
 * settings; each run builds its own ledger, risk gate and simulator.
 */
export class BacktestEngine {
	constructor(private readonly config: BacktestConfig = {}) {}

	run(
		strategy: Strategy,
		source: BarSource,
		start: number,
		end: number,
		options: RunOptions = {}
	): BacktestResult {
		const { session, resolved } = this.open(strategy, source, start, end);
		const steps = session.steps(options.signal);
		let next = steps.next();
		while (!next.done) {
			next = steps.next();
		}
		return this.close(strategy, session, resolved);
	}

	/** Same loop as `run`, yielding to the event loop after every tick. */
	async runAsync(
		strategy: Strategy,
		source: BarSource,
		start: number,
		end: number,
		options: RunOptions = {}
	): Promise<BacktestResult> {
		const { session, resolved } = this.open(strategy, source, start, end);
		const steps = session.steps(options.signal);
		let next = steps.next();
		while (!next.done) {
			await yieldToEventLoop();
			next = steps.next();
		}
		return this.close(strategy, session, resolved);
	}

	/** Validates everything before the first tick runs. */
	resolveConfig(start: number, end: number): Omit<BacktestResolvedConfig, "symbols"> {
		const initialCapital = this.config.initialCapital ?? DEFAULT_INITIAL_CAPITAL;
		const riskFreeRate = this.config.riskFreeRate ?? DEFAULT_RISK_FREE_RATE;
		const periodsPerYear = this.config.periodsPerYear ?? null;
		const varConfidence = this.config.varConfidence ?? DEFAULT_VAR_CONFIDENCE;
		const issues = resolveWindow(start, end);
		if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
			issues.push(`initialCapital must be a positive number, got ${initialCapital}`);
		}
		if (!Number.isFinite(riskFreeRate)) {
			issues.push(`riskFreeRate must be a finite number, got ${riskFreeRate}`);
		}
		if (periodsPerYear !== null && !(Number.isFinite(periodsPerYear) && periodsPerYear > 0)) {
			issues.push(`periodsPerYear must be a positive number, got ${periodsPerYear}`);
		}
		if (!(varConfidence > 0 && varConfidence < 1)) {
			issues.push(`varConfidence must be between 0 and 1, got ${varConfidence}`);
		}
		if (issues.length) {
			throw new ConfigurationError("Invalid backtest configuration", issues);
		}
		return {
			initialCapital,
			risk: resolveRiskSettings(this.config.risk),
			execution: resolveExecutionSettings(this.config.execution),
			riskFreeRate,
			periodsPerYear,
			varConfidence,
			start,
			end,
		};
	}

	private open(
		strategy: Strategy,
		source: BarSource,
		start: number,
		end: number
	): { session: BacktestSession; resolved: BacktestResolvedConfig } {
		const base = this.resolveConfig(start, end);
		const session = new BacktestSession(strategy, source, base, start, end);
		const resolved: BacktestResolvedConfig = { ...base, symbols: session.symbols };
		logger.info("backtest_config", {
			strategy: strategy.name,
			symbols: resolved.symbols,
			start,
			end,
			ticks: session.timeline.length,
			initialCapital: resolved.initialCapital,
			risk: resolved.risk,
			execution: resolved.execution,
		});
		return { session, resolved };
	}

	private close(
		strategy: Strategy,
		session: BacktestSession,
		config: BacktestResolvedConfig
	): BacktestResult {
		const snapshots = session.ledger.snapshots();
		const metrics = summarize(snapshots, session.fills, {
			riskFreeRate: config.riskFreeRate,
			periodsPerYear: config.periodsPerYear ?? undefined,
			initialEquity: config.initialCapital,
			varConfidence: config.varConfidence,
		});
		const result: BacktestResult = {
			status: session.status,
			strategy: strategy.name,
			config,
			ticks: session.ticks,
			snapshots,
			fills: [...session.fills],
			trades: session.ledger.closedTrades(),
			journal: [...session.journal],
			metrics,
			circuitBreaker: { state: session.gate.state, trippedAt: session.gate.trip },
			haltedSymbols: [...session.halted].sort(),
		};
		logger.info("backtest_summary", {
			strategy: strategy.name,
			ticks: session.ticks,
			fills: result.fills.length,
			rejected: result.journal.filter((entry) => entry.kind === "rejected").length,
			finalEquity: metrics.finalEquity,
			totalReturn: metrics.totalReturn,
			maxDrawdown: metrics.maxDrawdown,
			status: result.status,
		});
		return result;
	}
}
