export interface Bar {
	symbol: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export type OrderSide = "buy" | "sell";
export type OrderType = "market" | "limit";
export type PositionDirection = "LONG" | "SHORT";

/**
 * What a strategy asks for. The engine stamps an id and the tick timestamp
 * onto it and freezes the result before it reaches the risk gate.
 */
export interface OrderRequest {
	symbol: string;
	side: OrderSide;
	quantity: number;
	type?: OrderType;
	limitPrice?: number;
	tag?: string;
	/** Name of the strategy that asked for the order, when several share a run. */
	strategy?: string;
}

export interface Order {
	readonly id: string;
	readonly symbol: string;
	readonly side: OrderSide;
	readonly quantity: number;
	readonly type: OrderType;
	readonly limitPrice?: number;
	readonly timestamp: number;
	readonly tag?: string;
	readonly strategy?: string;
	/** Set on exits generated by the risk gate (liquidation, stop loss). */
	readonly forced: boolean;
}

export interface Fill {
	readonly orderId: string;
	readonly order: Order;
	readonly symbol: string;
	readonly side: OrderSide;
	readonly price: number;
	readonly quantity: number;
	readonly commission: number;
	/** Cost of slippage versus the reference price, always >= 0. */
	readonly slippage: number;
	readonly timestamp: number;
}

export interface Position {
	symbol: string;
	/** Signed: positive long, negative short. */
	quantity: number;
	averageCost: number;
	/** Entry commission not yet released by a reduction. */
	openCommission: number;
	openedAt: number;
}

export interface PositionView {
	symbol: string;
	quantity: number;
	averageCost: number;
	markPrice: number;
	marketValue: number;
	unrealizedPnl: number;
}

export interface PortfolioState {
	timestamp: number;
	cash: number;
	positions: readonly PositionView[];
	positionsValue: number;
	equity: number;
	peakEquity: number;
	drawdown: number;
	realizedPnl: number;
	unrealizedPnl: number;
}

export type PortfolioSnapshot = Readonly<PortfolioState>;

export interface ClosedTrade {
	symbol: string;
	side: PositionDirection;
	quantity: number;
	entryPrice: number;
	exitPrice: number;
	grossPnl: number;
	commission: number;
	realizedPnl: number;
	openedAt: number;
	closedAt: number;
	orderId: string;
}

export interface RiskSettings {
	maxPortfolioDrawdown: number;
	maxPositionSize: number;
	minCashRatio: number;
	maxCashRatio: number;
	maxConcurrentPositions: number;
	maxCorrelation: number;
	maxCorrelatedPairs: number;
	correlationLookback: number;
	positionStopLoss: number;
	enableCircuitBreaker: boolean;
	enableVolatilityTargeting: boolean;
	volatilityTarget: number;
	volatilityLookback: number;
}

export interface ExecutionSettings {
	slippagePct: number;
	commissionPct: number;
	limitVolumeParticipation?: number;
}

export type RiskOutcome = "approved" | "rejected" | "resized";

export type RiskReasonCode =
	| "APPROVED"
	| "EXIT_APPROVED"
	| "FORCED_EXIT"
	| "STOP_LOSS"
	| "CIRCUIT_BREAKER_TRIPPED"
	| "VOLATILITY_SCALED"
	| "POSITION_SIZE_CAPPED"
	| "POSITION_SIZE_LIMIT"
	| "CASH_BELOW_MIN"
	| "CASH_ABOVE_MAX"
	| "CORRELATION_LIMIT"
	| "MAX_POSITIONS_REACHED"
	| "NON_POSITIVE_EQUITY"
	| "NO_REFERENCE_PRICE"
	| "SYMBOL_HALTED";

export interface RiskDecision {
	orderId: string;
	order: Order;
	outcome: RiskOutcome;
	reason: RiskReasonCode;
	/** Quantity cleared for execution; 0 when rejected. */
	quantity: number;
	adjustedQuantity?: number;
	details?: Record<string, unknown>;
}

export type CircuitBreakerState = "ARMED" | "TRIPPED";

export type JournalKind =
	| "fill"
	| "rejected"
	| "unfilled"
	| "data_skip"
	| "strategy_error"
	| "circuit_breaker";

/** One line of the run's fill/trade log. Nothing is skipped silently. */
export interface JournalEntry {
	sequence: number;
	timestamp: number;
	kind: JournalKind;
	symbol?: string;
	orderId?: string;
	reason?: string;
	message?: string;
	details?: Record<string, unknown>;
}
