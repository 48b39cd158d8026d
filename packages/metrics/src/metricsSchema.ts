export interface DrawdownSpan {
	peakTimestamp: number;
	troughTimestamp: number;
	recoveryTimestamp: number | null;
	depth: number;
	depthPct: number;
	durationMs: number;
	recoveryMs: number | null;
}

export interface EquityCurveStats {
	newHighCount: number;
	averageRecoveryMs: number;
	longestRecoveryMs: number;
	meanReturn: number;
	returnSampleCount: number;
	maxEquity: number;
	minEquity: number;
}

export interface StreakStats {
	longestWinStreak: number;
	longestLossStreak: number;
	currentWinStreak: number;
	currentLossStreak: number;
}

export interface TradeStats {
	tradeCount: number;
	wins: number;
	losses: number;
	breakeven: number;
	winRate: number;
	lossRate: number;
	grossProfit: number;
	grossLoss: number;
	/** Infinity with profits and no losses; 0 without trades. */
	profitFactor: number;
	avgWin: number;
	/** Negative or zero. */
	avgLoss: number;
	payoffRatio: number;
	expectancy: number;
	largestWin: number;
	largestLoss: number;
	avgHoldingMs: number;
	streaks: StreakStats;
}

/** Historical-simulation tail risk over per-tick equity returns. */
export interface TailRisk {
	confidence: number;
	/** Return at the (1 - confidence) percentile; negative is a loss. */
	valueAtRisk: number;
	/** Mean of the returns at or below `valueAtRisk`. */
	conditionalValueAtRisk: number;
	valueAtRiskAmount: number;
	conditionalValueAtRiskAmount: number;
}

export interface Metrics {
	startTimestamp: number | null;
	endTimestamp: number | null;
	periods: number;
	periodsPerYear: number;
	initialEquity: number;
	finalEquity: number;
	netProfit: number;
	totalReturn: number;
	annualizedReturn: number;
	annualizedVolatility: number;
	riskFreeRate: number;
	sharpe: number;
	sortino: number;
	calmar: number;
	/** Fraction of the running peak. */
	maxDrawdown: number;
	maxDrawdownAmount: number;
	drawdowns: DrawdownSpan[];
	equityCurve: EquityCurveStats;
	trades: TradeStats;
	fillCount: number;
	totalCommission: number;
	totalSlippage: number;
	realizedPnl: number;
	/** Sum of |price x quantity| over all fills. */
	tradedNotional: number;
	/** Traded notional over average equity, annualized by calendar days. */
	turnover: number;
	tailRisk: TailRisk;
}
