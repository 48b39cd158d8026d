import type {
	CircuitBreakerState,
	ClosedTrade,
	ExecutionSettings,
	Fill,
	JournalEntry,
	PortfolioSnapshot,
	RiskSettings,
} from "@backtide/core";
import type { ExportableResult, Metrics } from "@backtide/metrics";
import type { CircuitBreakerTrip } from "@backtide/risk-engine";

export interface BacktestConfig {
	initialCapital?: number;
	risk?: Partial<RiskSettings>;
	execution?: Partial<ExecutionSettings>;
	riskFreeRate?: number;
	/** Skips inference from tick spacing when set. */
	periodsPerYear?: number;
	/** Confidence for the value-at-risk metrics. */
	varConfidence?: number;
}

export interface BacktestResolvedConfig {
	initialCapital: number;
	risk: Readonly<RiskSettings>;
	execution: Readonly<ExecutionSettings>;
	riskFreeRate: number;
	periodsPerYear: number | null;
	varConfidence: number;
	start: number;
	end: number;
	symbols: string[];
}

export interface RunOptions {
	signal?: AbortSignal;
}

export type BacktestStatus = "completed" | "stopped";

export interface CircuitBreakerReport {
	state: CircuitBreakerState;
	trippedAt: CircuitBreakerTrip | null;
}

export interface BacktestResult extends ExportableResult {
	status: BacktestStatus;
	strategy: string;
	config: BacktestResolvedConfig;
	ticks: number;
	snapshots: readonly PortfolioSnapshot[];
	fills: readonly Fill[];
	trades: readonly ClosedTrade[];
	journal: readonly JournalEntry[];
	metrics: Metrics;
	circuitBreaker: CircuitBreakerReport;
	haltedSymbols: string[];
}
