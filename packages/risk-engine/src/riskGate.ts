import {
	createLogger,
	resolveRiskSettings,
	roundCurrency,
	roundPrice,
	type CircuitBreakerState,
	type ExecutionSettings,
	type HistoryView,
	type Order,
	type OrderRequest,
	type PortfolioState,
	type PositionView,
	type RiskDecision,
	type RiskReasonCode,
	type RiskSettings,
} from "@backtide/core";
import {
	annualizedVolatility,
	pearsonCorrelation,
} from "@backtide/indicators";
import { CircuitBreaker, type CircuitBreakerTrip } from "./circuitBreaker";

const logger = createLogger("risk-engine");

const TRADING_DAYS_PER_YEAR = 252;
const QUANTITY_EPSILON = 1e-9;
const MIN_VOLATILITY_SCALAR = 0.1;
const MAX_VOLATILITY_SCALAR = 2;

export interface RiskContext {
	portfolio: PortfolioState;
	/** Bars visible at this tick; volatility and correlation checks need it. */
	history?: HistoryView;
	/** Price the order would trade at: bar open for market, limit for limit orders. */
	referencePrice?: number;
	haltedSymbols?: ReadonlySet<string>;
	/** Execution costs; the cash check prices the fill with them when given. */
	costs?: FillCosts;
}

export interface ForcedExit {
	request: OrderRequest;
	reason: Extract<RiskReasonCode, "CIRCUIT_BREAKER_TRIPPED" | "STOP_LOSS">;
	details: Record<string, unknown>;
}

const decide = (
	order: Order,
	outcome: RiskDecision["outcome"],
	reason: RiskReasonCode,
	quantity: number,
	details?: Record<string, unknown>
): RiskDecision => ({
	orderId: order.id,
	order,
	outcome,
	reason,
	quantity,
	...(outcome === "resized" ? { adjustedQuantity: quantity } : {}),
	...(details ? { details } : {}),
});

const reject = (
	order: Order,
	reason: RiskReasonCode,
	details?: Record<string, unknown>
): RiskDecision => decide(order, "rejected", reason, 0, details);

const signedDelta = (order: Pick<Order, "side" | "quantity">): number =>
	order.side === "buy" ? order.quantity : -order.quantity;

/**
 * Largest order quantity that keeps the post-fill position within
 * `maxAbs` units. Flipping through zero may use the held size plus the cap.
 */
const allowedQuantity = (held: number, delta: number, maxAbs: number): number => {
	const adding = held === 0 || Math.sign(held) === Math.sign(delta);
	return adding ? maxAbs - Math.abs(held) : maxAbs + Math.abs(held);
};

const clamp = (value: number, min: number, max: number): number =>
	Math.min(Math.max(value, min), max);

/** Returns keyed by timestamp over the last `lookback` bars of a symbol. */
const closeReturns = (
	history: HistoryView,
	symbol: string,
	lookback: number
): Map<number, number> => {
	const returns = new Map<number, number>();
	const available = history.length(symbol);
	if (available < 2) {
		return returns;
	}
	const bars = history.window(symbol, Math.min(available, lookback + 1));
	for (let i = 1; i < bars.length; i += 1) {
		const previous = bars[i - 1].close;
		if (previous !== 0) {
			returns.set(bars[i].timestamp, (bars[i].close - previous) / previous);
		}
	}
	return returns;
};

const correlationOf = (
	leftReturns: Map<number, number>,
	rightReturns: Map<number, number>,
	lookback: number
): number | null => {
	const shared = [...leftReturns.keys()]
		.filter((timestamp) => rightReturns.has(timestamp))
		.sort((a, b) => a - b)
		.slice(-lookback);
	if (shared.length < lookback) {
		return null;
	}
	return pearsonCorrelation(
		shared.map((timestamp) => leftReturns.get(timestamp) ?? 0),
		shared.map((timestamp) => rightReturns.get(timestamp) ?? 0)
	);
};

/**
 * Correlation of two symbols' returns over the last `lookback` timestamps
 * both have. Null when fewer than `lookback` shared returns exist.
 */
export const trailingCorrelation = (
	history: HistoryView,
	left: string,
	right: string,
	lookback: number
): number | null =>
	correlationOf(
		closeReturns(history, left, lookback),
		closeReturns(history, right, lookback),
		lookback
	);

interface CorrelatedPairs {
	/** Pairs among the positions already held. */
	existing: string[];
	/** Pairs the new symbol would form with a held symbol. */
	added: string[];
}

const findCorrelatedPairs = (
	history: HistoryView,
	heldSymbols: string[],
	symbol: string,
	settings: RiskSettings
): CorrelatedPairs => {
	const lookback = settings.correlationLookback;
	const returns = new Map(
		[...heldSymbols, symbol].map((name) => [name, closeReturns(history, name, lookback)])
	);
	const isCorrelated = (left: string, right: string): boolean => {
		const correlation = correlationOf(
			returns.get(left) ?? new Map<number, number>(),
			returns.get(right) ?? new Map<number, number>(),
			lookback
		);
		return correlation !== null && Math.abs(correlation) > settings.maxCorrelation;
	};

	const existing: string[] = [];
	for (let i = 0; i < heldSymbols.length; i += 1) {
		for (let j = i + 1; j < heldSymbols.length; j += 1) {
			if (isCorrelated(heldSymbols[i], heldSymbols[j])) {
				existing.push(`${heldSymbols[i]}/${heldSymbols[j]}`);
			}
		}
	}
	const added = heldSymbols
		.filter((other) => isCorrelated(other, symbol))
		.map((other) => `${other}/${symbol}`);
	return { existing, added };
};

const trailingVolatility = (
	history: HistoryView,
	symbol: string,
	lookback: number
): number | null => {
	if (history.length(symbol) < lookback + 1) {
		return null;
	}
	return annualizedVolatility(history.closes(symbol, lookback + 1), TRADING_DAYS_PER_YEAR);
};

/** Slippage and commission the simulator will charge on the fill. */
export type FillCosts = Pick<ExecutionSettings, "slippagePct" | "commissionPct">;

interface CashEffect {
	postCash: number;
	postEquity: number;
}

/**
 * Cash and equity after the fill, priced the way the simulator prices it:
 * market orders slip away from the reference price, limit orders do not.
 */
const estimateCashEffect = (
	order: Order,
	quantity: number,
	price: number,
	portfolio: PortfolioState,
	costs: FillCosts | undefined
): CashEffect => {
	const direction = order.side === "buy" ? 1 : -1;
	const slippagePct = costs && order.type === "market" ? costs.slippagePct : 0;
	const fillPrice = slippagePct ? roundPrice(price * (1 + direction * slippagePct)) : price;
	const commission = costs ? roundCurrency(fillPrice * quantity * costs.commissionPct) : 0;
	const slippage = Math.abs(fillPrice - price) * quantity;
	return {
		postCash: portfolio.cash - direction * fillPrice * quantity - commission,
		postEquity: portfolio.equity - slippage - commission,
	};
};

const openPositions = (portfolio: PortfolioState): PositionView[] =>
	portfolio.positions.filter((position) => position.quantity !== 0);

/**
 * Pure evaluation of one order against the portfolio as it stands. Exits are
 * always approved; entries run the sizing checks (volatility, size cap) and
 * then the rejecting checks (cash, correlation, position count).
 */
export const evaluateOrder = (
	order: Order,
	context: RiskContext,
	settings: RiskSettings,
	breakerState: CircuitBreakerState
): RiskDecision => {
	const { portfolio } = context;
	if (context.haltedSymbols?.has(order.symbol)) {
		return reject(order, "SYMBOL_HALTED");
	}

	const held =
		portfolio.positions.find((position) => position.symbol === order.symbol)
			?.quantity ?? 0;
	const delta = signedDelta(order);
	const reduces =
		held !== 0 &&
		Math.sign(held) !== Math.sign(delta) &&
		order.quantity <= Math.abs(held);

	if (reduces || order.forced) {
		return decide(
			order,
			"approved",
			order.forced ? "FORCED_EXIT" : "EXIT_APPROVED",
			order.quantity
		);
	}

	const equity = portfolio.equity;
	if (!(equity > 0)) {
		return reject(order, "NON_POSITIVE_EQUITY", { equity });
	}

	if (breakerState === "TRIPPED") {
		return reject(order, "CIRCUIT_BREAKER_TRIPPED", {
			drawdown: portfolio.drawdown,
			maxPortfolioDrawdown: settings.maxPortfolioDrawdown,
		});
	}

	const price = context.referencePrice;
	if (price === undefined || !Number.isFinite(price) || price <= 0) {
		return reject(order, "NO_REFERENCE_PRICE");
	}

	let quantity = order.quantity;
	let resizeReason: RiskReasonCode | null = null;
	const details: Record<string, unknown> = { equity, referencePrice: price };

	if (settings.enableVolatilityTargeting && context.history) {
		const volatility = trailingVolatility(
			context.history,
			order.symbol,
			settings.volatilityLookback
		);
		if (volatility !== null && volatility > 0) {
			const scalar = clamp(
				settings.volatilityTarget / volatility,
				MIN_VOLATILITY_SCALAR,
				MAX_VOLATILITY_SCALAR
			);
			// Only the part of the order that opens exposure is scaled.
			const closing = held !== 0 && Math.sign(held) !== Math.sign(delta) ? Math.abs(held) : 0;
			const scaled = closing + Math.floor((quantity - closing) * scalar + QUANTITY_EPSILON);
			details.volatility = volatility;
			details.volatilityScalar = scalar;
			if (scaled !== quantity) {
				quantity = scaled;
				resizeReason = "VOLATILITY_SCALED";
			}
		}
	}

	const capAbs = Math.floor(
		(settings.maxPositionSize * equity) / price + QUANTITY_EPSILON
	);
	const capAllowed = allowedQuantity(held, delta, capAbs);
	if (capAllowed < quantity) {
		quantity = Math.max(capAllowed, 0);
		resizeReason = "POSITION_SIZE_CAPPED";
	}
	if (quantity <= 0) {
		return reject(order, "POSITION_SIZE_LIMIT", {
			...details,
			maxPositionSize: settings.maxPositionSize,
			heldQuantity: held,
		});
	}

	const { postCash, postEquity } = estimateCashEffect(
		order,
		quantity,
		price,
		portfolio,
		context.costs
	);
	const cashRatio = postEquity > 0 ? postCash / postEquity : -Infinity;
	if (cashRatio < settings.minCashRatio) {
		return reject(order, "CASH_BELOW_MIN", {
			...details,
			cashRatio,
			postCash,
			minCashRatio: settings.minCashRatio,
		});
	}
	if (delta < 0 && cashRatio > settings.maxCashRatio) {
		return reject(order, "CASH_ABOVE_MAX", {
			...details,
			cashRatio,
			postCash,
			maxCashRatio: settings.maxCashRatio,
		});
	}

	const isNewSymbol = held === 0;
	const heldSymbols = openPositions(portfolio)
		.map((position) => position.symbol)
		.filter((symbol) => symbol !== order.symbol);

	if (isNewSymbol && context.history && heldSymbols.length) {
		const { existing, added } = findCorrelatedPairs(
			context.history,
			heldSymbols,
			order.symbol,
			settings
		);
		// Pairs already held only count once the new symbol adds one of its own.
		if (added.length && existing.length + added.length > settings.maxCorrelatedPairs) {
			return reject(order, "CORRELATION_LIMIT", {
				...details,
				correlatedPairs: added,
				existingPairs: existing,
				maxCorrelatedPairs: settings.maxCorrelatedPairs,
			});
		}
	}

	if (isNewSymbol && heldSymbols.length >= settings.maxConcurrentPositions) {
		return reject(order, "MAX_POSITIONS_REACHED", {
			openPositions: heldSymbols.length,
			maxConcurrentPositions: settings.maxConcurrentPositions,
		});
	}

	if (resizeReason) {
		return decide(order, "resized", resizeReason, quantity, {
			...details,
			requestedQuantity: order.quantity,
		});
	}
	return decide(order, "approved", "APPROVED", quantity, details);
};

/**
 * Stateful wrapper around `evaluateOrder`: one instance per run, owning the
 * circuit breaker. Never mutates the portfolio it is shown.
 */
export class RiskGate {
	readonly settings: Readonly<RiskSettings>;
	private readonly breaker: CircuitBreaker;

	constructor(settings: Partial<RiskSettings> = {}) {
		this.settings = resolveRiskSettings(settings);
		this.breaker = new CircuitBreaker(
			this.settings.maxPortfolioDrawdown,
			this.settings.enableCircuitBreaker
		);
	}

	get state(): CircuitBreakerState {
		return this.breaker.state;
	}

	get trip(): CircuitBreakerTrip | null {
		return this.breaker.trippedAt;
	}

	evaluate(order: Order, context: RiskContext): RiskDecision {
		this.observe(context.portfolio);
		const decision = evaluateOrder(order, context, this.settings, this.breaker.state);
		const payload = {
			orderId: order.id,
			symbol: order.symbol,
			side: order.side,
			quantity: order.quantity,
			outcome: decision.outcome,
			reason: decision.reason,
		};
		if (decision.outcome === "rejected") {
			logger.info("order_rejected", { ...payload, details: decision.details });
		} else {
			logger.debug("risk_decision", payload);
		}
		return decision;
	}

	/**
	 * Forced exits for this tick: every open position while the breaker is
	 * tripped, otherwise positions whose loss against average cost exceeds
	 * the stop loss.
	 */
	review(context: Pick<RiskContext, "portfolio">): ForcedExit[] {
		const { portfolio } = context;
		this.observe(portfolio);
		const positions = openPositions(portfolio);

		if (this.breaker.state === "TRIPPED") {
			return positions.map((position): ForcedExit => ({
				request: closeRequest(position, "liquidation"),
				reason: "CIRCUIT_BREAKER_TRIPPED",
				details: { drawdown: portfolio.drawdown },
			}));
		}

		const stopLoss = this.settings.positionStopLoss;
		if (stopLoss <= 0) {
			return [];
		}
		const exits: ForcedExit[] = [];
		for (const position of positions) {
			if (position.averageCost <= 0) {
				continue;
			}
			const positionReturn =
				((position.markPrice - position.averageCost) / position.averageCost) *
				Math.sign(position.quantity);
			if (positionReturn < -stopLoss) {
				logger.info("stop_loss_triggered", {
					symbol: position.symbol,
					positionReturn,
					stopLoss,
				});
				exits.push({
					request: closeRequest(position, "stop_loss"),
					reason: "STOP_LOSS",
					details: { positionReturn, positionStopLoss: stopLoss },
				});
			}
		}
		return exits;
	}

	reset(): void {
		this.breaker.reset();
	}

	private observe(portfolio: PortfolioState): void {
		if (this.breaker.observe(portfolio.drawdown, portfolio.timestamp)) {
			logger.warn("circuit_breaker_tripped", {
				timestamp: portfolio.timestamp,
				equity: portfolio.equity,
				peakEquity: portfolio.peakEquity,
				drawdown: portfolio.drawdown,
			});
		}
	}
}

const closeRequest = (position: PositionView, tag: string): OrderRequest => ({
	symbol: position.symbol,
	side: position.quantity > 0 ? "sell" : "buy",
	quantity: Math.abs(position.quantity),
	type: "market",
	tag,
});
