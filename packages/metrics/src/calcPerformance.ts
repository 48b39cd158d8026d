import {
	applyFillToPosition,
	type ClosedTrade,
	type Fill,
	type PortfolioSnapshot,
	type Position,
} from "@backtide/core";
import { mean, percentile, standardDeviation } from "@backtide/indicators";
import type {
	DrawdownSpan,
	EquityCurveStats,
	Metrics,
	StreakStats,
	TailRisk,
	TradeStats,
} from "./metricsSchema";

const MS_IN_DAY = 86_400_000;
const MS_IN_YEAR = 365 * MS_IN_DAY;
const DEFAULT_VAR_CONFIDENCE = 0.95;

export interface SummarizeOptions {
	riskFreeRate?: number;
	/** Overrides the annualization inferred from tick spacing. */
	periodsPerYear?: number;
	/** Equity before the first tick; defaults to the first snapshot's. */
	initialEquity?: number;
	/** Confidence for value at risk; 0.95 by default. */
	varConfidence?: number;
}

interface EquityPoint {
	timestamp: number;
	equity: number;
}

interface ActiveSpan {
	peakTimestamp: number;
	peakEquity: number;
	troughTimestamp: number;
	troughEquity: number;
}

/**
 * Annualization factor from the median spacing between ticks: daily bars map
 * to 252 trading periods, weekly to 52, monthly to 12, anything finer to
 * calendar time.
 */
export const inferPeriodsPerYear = (timestamps: number[]): number => {
	const gaps: number[] = [];
	for (let i = 1; i < timestamps.length; i += 1) {
		const gap = timestamps[i] - timestamps[i - 1];
		if (gap > 0) {
			gaps.push(gap);
		}
	}
	if (!gaps.length) {
		return 252;
	}
	gaps.sort((a, b) => a - b);
	const middle = Math.floor(gaps.length / 2);
	const median =
		gaps.length % 2 ? gaps[middle] : (gaps[middle - 1] + gaps[middle]) / 2;
	if (median >= 27 * MS_IN_DAY) {
		return 12;
	}
	if (median >= 5 * MS_IN_DAY) {
		return 52;
	}
	if (median >= 0.8 * MS_IN_DAY) {
		return 252;
	}
	return MS_IN_YEAR / median;
};

/** Rebuilds closed trades from a fill log with the ledger's average-cost math. */
export const replayTrades = (fills: readonly Fill[]): ClosedTrade[] => {
	const positions = new Map<string, Position>();
	const trades: ClosedTrade[] = [];
	for (const fill of fills) {
		const { position, closed } = applyFillToPosition(
			positions.get(fill.symbol) ?? null,
			fill
		);
		if (position) {
			positions.set(fill.symbol, position);
		} else {
			positions.delete(fill.symbol);
		}
		if (closed) {
			trades.push(closed);
		}
	}
	return trades;
};

/**
 * Read-only metrics over a finished run: equity returns per tick, drawdown
 * from the running peak, trade statistics from closed reductions.
 */
export const summarize = (
	snapshots: readonly PortfolioSnapshot[],
	fills: readonly Fill[],
	options: SummarizeOptions = {}
): Metrics => {
	const riskFreeRate = options.riskFreeRate ?? 0.02;
	const initialEquity =
		options.initialEquity ?? snapshots[0]?.equity ?? 0;
	const series: EquityPoint[] = snapshots.map((snapshot) => ({
		timestamp: snapshot.timestamp,
		equity: snapshot.equity,
	}));
	if (options.initialEquity !== undefined && series.length) {
		series.unshift({ timestamp: series[0].timestamp, equity: initialEquity });
	}

	const periodsPerYear =
		options.periodsPerYear ??
		inferPeriodsPerYear(snapshots.map((snapshot) => snapshot.timestamp));
	const { returns, drawdowns, maxDrawdown, maxDrawdownAmount, equityStats } =
		analyzeEquitySeries(series);

	const finalEquity = series.at(-1)?.equity ?? initialEquity;
	const totalReturn = initialEquity > 0 ? finalEquity / initialEquity - 1 : 0;
	const years = returns.length / periodsPerYear;
	const annualizedReturn =
		years > 0 && initialEquity > 0 && finalEquity > 0
			? Math.pow(finalEquity / initialEquity, 1 / years) - 1
			: 0;

	const closedTrades = replayTrades(fills);
	const tradedNotional = fills.reduce(
		(sum, fill) => sum + Math.abs(fill.price * fill.quantity),
		0
	);

	return {
		startTimestamp: snapshots[0]?.timestamp ?? null,
		endTimestamp: snapshots.at(-1)?.timestamp ?? null,
		periods: snapshots.length,
		periodsPerYear,
		initialEquity,
		finalEquity,
		netProfit: finalEquity - initialEquity,
		totalReturn,
		annualizedReturn,
		annualizedVolatility: standardDeviation(returns) * Math.sqrt(periodsPerYear),
		riskFreeRate,
		sharpe: computeSharpe(returns, riskFreeRate, periodsPerYear),
		sortino: computeSortino(returns, riskFreeRate, periodsPerYear),
		calmar: maxDrawdown > 0 ? annualizedReturn / maxDrawdown : 0,
		maxDrawdown,
		maxDrawdownAmount,
		drawdowns,
		equityCurve: equityStats,
		trades: buildTradeStats(closedTrades),
		fillCount: fills.length,
		totalCommission: fills.reduce((sum, fill) => sum + fill.commission, 0),
		totalSlippage: fills.reduce((sum, fill) => sum + fill.slippage, 0),
		realizedPnl: closedTrades.reduce((sum, trade) => sum + trade.realizedPnl, 0),
		tradedNotional,
		turnover: computeTurnover(tradedNotional, series),
		tailRisk: computeTailRisk(
			returns,
			options.varConfidence ?? DEFAULT_VAR_CONFIDENCE,
			finalEquity
		),
	};
};

const computeTurnover = (tradedNotional: number, series: EquityPoint[]): number => {
	const first = series[0];
	const last = series.at(-1);
	if (!first || !last) {
		return 0;
	}
	const averageEquity = mean(series.map((point) => point.equity));
	const days = (last.timestamp - first.timestamp) / MS_IN_DAY;
	if (tradedNotional <= 0 || averageEquity <= 0 || days <= 0) {
		return 0;
	}
	return (tradedNotional / averageEquity) * (365 / days);
};

const computeTailRisk = (
	returns: number[],
	confidence: number,
	equity: number
): TailRisk => {
	const valueAtRisk = percentile(returns, 1 - confidence);
	if (valueAtRisk === null) {
		return {
			confidence,
			valueAtRisk: 0,
			conditionalValueAtRisk: 0,
			valueAtRiskAmount: 0,
			conditionalValueAtRiskAmount: 0,
		};
	}
	const conditionalValueAtRisk = mean(returns.filter((value) => value <= valueAtRisk));
	return {
		confidence,
		valueAtRisk,
		conditionalValueAtRisk,
		valueAtRiskAmount: valueAtRisk * equity,
		conditionalValueAtRiskAmount: conditionalValueAtRisk * equity,
	};
};

const buildTradeStats = (trades: ClosedTrade[]): TradeStats => {
	const pnls = trades.map((trade) => trade.realizedPnl);
	const winning = pnls.filter((pnl) => pnl > 0);
	const losing = pnls.filter((pnl) => pnl < 0);
	const grossProfit = winning.reduce((sum, pnl) => sum + pnl, 0);
	const grossLoss = losing.reduce((sum, pnl) => sum + Math.abs(pnl), 0);
	const tradeCount = trades.length;
	const winRate = tradeCount ? winning.length / tradeCount : 0;
	const lossRate = tradeCount ? losing.length / tradeCount : 0;
	const avgWin = winning.length ? grossProfit / winning.length : 0;
	const avgLoss = losing.length ? -(grossLoss / losing.length) : 0;

	return {
		tradeCount,
		wins: winning.length,
		losses: losing.length,
		breakeven: tradeCount - winning.length - losing.length,
		winRate,
		lossRate,
		grossProfit,
		grossLoss,
		profitFactor:
			grossLoss > 0 ? grossProfit / grossLoss : grossProfit > 0 ? Infinity : 0,
		avgWin,
		avgLoss,
		payoffRatio: avgLoss !== 0 ? avgWin / Math.abs(avgLoss) : 0,
		expectancy: winRate * avgWin + lossRate * avgLoss,
		largestWin: winning.length ? Math.max(...winning) : 0,
		largestLoss: losing.length ? Math.min(...losing) : 0,
		avgHoldingMs: tradeCount
			? trades.reduce((sum, trade) => sum + (trade.closedAt - trade.openedAt), 0) /
				tradeCount
			: 0,
		streaks: buildStreaks(pnls),
	};
};

const buildStreaks = (pnls: number[]): StreakStats => {
	let longestWinStreak = 0;
	let longestLossStreak = 0;
	let currentWinStreak = 0;
	let currentLossStreak = 0;

	for (const pnl of pnls) {
		if (pnl > 0) {
			currentWinStreak += 1;
			currentLossStreak = 0;
			longestWinStreak = Math.max(longestWinStreak, currentWinStreak);
		} else if (pnl < 0) {
			currentLossStreak += 1;
			currentWinStreak = 0;
			longestLossStreak = Math.max(longestLossStreak, currentLossStreak);
		} else {
			currentLossStreak = 0;
			currentWinStreak = 0;
		}
	}

	return { longestWinStreak, longestLossStreak, currentWinStreak, currentLossStreak };
};

const analyzeEquitySeries = (series: EquityPoint[]) => {
	if (!series.length) {
		return {
			returns: [],
			drawdowns: [],
			maxDrawdown: 0,
			maxDrawdownAmount: 0,
			equityStats: {
				newHighCount: 0,
				averageRecoveryMs: 0,
				longestRecoveryMs: 0,
				meanReturn: 0,
				returnSampleCount: 0,
				maxEquity: 0,
				minEquity: 0,
			},
		};
	}

	const returns: number[] = [];
	const drawdowns: DrawdownSpan[] = [];
	let peakEquity = series[0].equity;
	let peakTimestamp = series[0].timestamp;
	let maxDrawdown = 0;
	let maxDrawdownAmount = 0;
	let newHighCount = 1;
	let activeSpan: ActiveSpan | null = null;

	for (let i = 1; i < series.length; i += 1) {
		const prev = series[i - 1];
		const point = series[i];
		returns.push(prev.equity !== 0 ? (point.equity - prev.equity) / prev.equity : 0);

		if (point.equity >= peakEquity) {
			if (activeSpan) {
				finalizeDrawdown(drawdowns, activeSpan, point.timestamp);
				activeSpan = null;
			}
			if (point.equity > peakEquity) {
				newHighCount += 1;
			}
			peakEquity = point.equity;
			peakTimestamp = point.timestamp;
			continue;
		}

		if (!activeSpan) {
			activeSpan = {
				peakTimestamp,
				peakEquity,
				troughTimestamp: point.timestamp,
				troughEquity: point.equity,
			};
		} else if (point.equity < activeSpan.troughEquity) {
			activeSpan.troughEquity = point.equity;
			activeSpan.troughTimestamp = point.timestamp;
		}

		const depth = peakEquity - point.equity;
		const depthPct = peakEquity > 0 ? depth / peakEquity : 0;
		if (depthPct > maxDrawdown) {
			maxDrawdown = depthPct;
		}
		if (depth > maxDrawdownAmount) {
			maxDrawdownAmount = depth;
		}
	}

	if (activeSpan) {
		finalizeDrawdown(drawdowns, activeSpan, null);
	}

	const recoveryDurations = drawdowns
		.map((span) => span.recoveryMs)
		.filter((value): value is number => typeof value === "number");
	const equities = series.map((point) => point.equity);
	const equityStats: EquityCurveStats = {
		newHighCount,
		averageRecoveryMs: recoveryDurations.length ? mean(recoveryDurations) : 0,
		longestRecoveryMs: recoveryDurations.length ? Math.max(...recoveryDurations) : 0,
		meanReturn: mean(returns),
		returnSampleCount: returns.length,
		maxEquity: Math.max(...equities),
		minEquity: Math.min(...equities),
	};

	return { returns, drawdowns, maxDrawdown, maxDrawdownAmount, equityStats };
};

const finalizeDrawdown = (
	drawdowns: DrawdownSpan[],
	span: ActiveSpan,
	recoveryTimestamp: number | null
): void => {
	const depth = span.peakEquity - span.troughEquity;
	drawdowns.push({
		peakTimestamp: span.peakTimestamp,
		troughTimestamp: span.troughTimestamp,
		recoveryTimestamp,
		depth,
		depthPct: span.peakEquity > 0 ? depth / span.peakEquity : 0,
		durationMs: span.troughTimestamp - span.peakTimestamp,
		recoveryMs:
			recoveryTimestamp !== null ? recoveryTimestamp - span.peakTimestamp : null,
	});
};

const computeSharpe = (
	returns: number[],
	riskFreeRate: number,
	periodsPerYear: number
): number => {
	if (returns.length < 2 || periodsPerYear <= 0) {
		return 0;
	}
	const rfPerPeriod = Math.pow(1 + riskFreeRate, 1 / periodsPerYear) - 1;
	const excess = mean(returns) - rfPerPeriod;
	const std = standardDeviation(returns);
	return std === 0 ? 0 : (excess / std) * Math.sqrt(periodsPerYear);
};

const computeSortino = (
	returns: number[],
	riskFreeRate: number,
	periodsPerYear: number
): number => {
	if (returns.length < 2 || periodsPerYear <= 0) {
		return 0;
	}
	const rfPerPeriod = Math.pow(1 + riskFreeRate, 1 / periodsPerYear) - 1;
	const downside = returns.filter((value) => value < rfPerPeriod);
	if (!downside.length) {
		return 0;
	}
	const excess = mean(returns) - rfPerPeriod;
	const downsideDeviation = Math.sqrt(
		downside.reduce((sum, value) => sum + (value - rfPerPeriod) ** 2, 0) /
			downside.length
	);
	return downsideDeviation === 0
		? 0
		: (excess / downsideDeviation) * Math.sqrt(periodsPerYear);
};
