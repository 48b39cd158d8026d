import {
	DataIntegrityError,
	InsufficientDataError,
	OrderRejectedError,
	createLogger,
	describeError,
	type Bar,
	type BarSource,
	type ExecutionSettings,
	type Fill,
	type JournalEntry,
	type JournalKind,
	type Order,
	type OrderRequest,
	type RiskSettings,
	type Strategy,
} from "@backtide/core";
import { OrderSimulator, PortfolioLedger } from "@backtide/execution-engine";
import { RiskGate, type ForcedExit } from "@backtide/risk-engine";
import { VisibleHistory } from "./VisibleHistory";
import type { BacktestStatus } from "./backtestTypes";

const logger = createLogger("runtime");

type StrategyHook = "initialize" | "onData" | "onFill" | "finalize";
type JournalFields = Omit<JournalEntry, "sequence" | "timestamp" | "kind">;

interface SymbolFeed {
	symbol: string;
	bars: Bar[];
	next: number;
	lastTimestamp: number | null;
}

export interface SessionSettings {
	initialCapital: number;
	risk: Readonly<RiskSettings>;
	execution: Readonly<ExecutionSettings>;
}

/** Reason a bar cannot be admitted, or null when it is sound. */
const checkBarIntegrity = (bar: Bar, previousTimestamp: number | null): string | null => {
	if (!Number.isFinite(bar.timestamp)) {
		return "timestamp is not a finite number";
	}
	if (![bar.open, bar.high, bar.low, bar.close].every((price) => Number.isFinite(price))) {
		return "non-finite price";
	}
	if (!Number.isFinite(bar.volume) || bar.volume < 0) {
		return `volume ${bar.volume} is not a non-negative number`;
	}
	if (bar.high < bar.low) {
		return `high ${bar.high} is below low ${bar.low}`;
	}
	if (previousTimestamp !== null && bar.timestamp <= previousTimestamp) {
		return `timestamp ${bar.timestamp} does not follow ${previousTimestamp}`;
	}
	return null;
};

const describeInvalidRequest = (request: OrderRequest): string | null => {
	if (typeof request.symbol !== "string" || !request.symbol.length) {
		return "symbol must be a non-empty string";
	}
	if (request.side !== "buy" && request.side !== "sell") {
		return `side must be "buy" or "sell", got ${String(request.side)}`;
	}
	if (!Number.isInteger(request.quantity) || request.quantity <= 0) {
		return `quantity must be a positive integer, got ${request.quantity}`;
	}
	const type = request.type ?? "market";
	if (type !== "market" && type !== "limit") {
		return `type must be "market" or "limit", got ${String(type)}`;
	}
	if (
		type === "limit" &&
		(request.limitPrice === undefined || !Number.isFinite(request.limitPrice) || request.limitPrice <= 0)
	) {
		return "limit orders need a positive limitPrice";
	}
	return null;
};

const unfilledReason = (order: Order, bar: Bar | undefined): string => {
	if (!bar) {
		return "NO_BAR";
	}
	if (order.type === "limit" && order.limitPrice !== undefined) {
		const crosses =
			order.side === "buy" ? bar.low <= order.limitPrice : bar.high >= order.limitPrice;
		return crosses ? "NO_VOLUME" : "LIMIT_NOT_REACHED";
	}
	return "NOT_EXECUTABLE";
};

/**
 * One run's mutable state. Ticks are driven through `steps()`, which yields
 * after each recorded snapshot so sync and async runners share one loop.
 */
export class BacktestSession {
	readonly ledger: PortfolioLedger;
	readonly gate: RiskGate;
	readonly simulator: OrderSimulator;
	readonly history: VisibleHistory;
	readonly timeline: number[];
	readonly symbols: string[];
	readonly fills: Fill[] = [];
	readonly journal: JournalEntry[] = [];
	readonly halted = new Set<string>();
	status: BacktestStatus = "completed";
	ticks = 0;

	private readonly feeds: SymbolFeed[];
	private orderSequence = 0;
	private breakerRecorded = false;

	constructor(
		private readonly strategy: Strategy,
		source: BarSource,
		settings: SessionSettings,
		start: number,
		end: number
	) {
		this.ledger = new PortfolioLedger(settings.initialCapital);
		this.gate = new RiskGate(settings.risk);
		this.simulator = new OrderSimulator(settings.execution);

		this.symbols = [...new Set(source.symbols())].sort();
		this.feeds = this.symbols.map((symbol) => ({
			symbol,
			bars: [...source.bars(symbol, start, end)],
			next: 0,
			lastTimestamp: null,
		}));
		const stamps = new Set<number>();
		for (const feed of this.feeds) {
			for (const bar of feed.bars) {
				if (Number.isFinite(bar.timestamp)) {
					stamps.add(bar.timestamp);
				}
			}
		}
		this.timeline = [...stamps].sort((a, b) => a - b);
		this.history = new VisibleHistory(this.symbols);
	}

	*steps(signal?: AbortSignal): Generator<number, void, void> {
		this.guard(this.timeline[0] ?? 0, "initialize", () => this.strategy.initialize());
		for (const timestamp of this.timeline) {
			if (signal?.aborted) {
				this.status = "stopped";
				logger.warn("backtest_stopped", {
					strategy: this.strategy.name,
					timestamp,
					ticks: this.ticks,
				});
				break;
			}
			this.step(timestamp);
			this.ticks += 1;
			yield timestamp;
		}
		const last = this.ledger.snapshots().at(-1)?.timestamp ?? this.timeline[0] ?? 0;
		this.guard(last, "finalize", () => this.strategy.finalize());
	}

	private step(timestamp: number): void {
		this.history.advance(timestamp);
		const bars = this.admitBars(timestamp);
		const closes = new Map<string, number>();
		for (const [symbol, bar] of bars) {
			closes.set(symbol, bar.close);
		}
		this.ledger.markToMarket(closes, timestamp);

		this.runForcedExits(timestamp, bars);
		const armedBeforeOrders: boolean = this.gate.state === "ARMED";

		for (const request of this.collectOrders(timestamp)) {
			this.processOrder(this.submit(request, timestamp, false), bars);
		}

		// A trip during the order phase liquidates before the snapshot.
		if (armedBeforeOrders && this.gate.state === "TRIPPED") {
			this.runForcedExits(timestamp, bars);
		}
		this.ledger.recordSnapshot(timestamp);
	}

	private admitBars(timestamp: number): Map<string, Bar> {
		const admitted = new Map<string, Bar>();
		for (const feed of this.feeds) {
			while (!this.halted.has(feed.symbol) && feed.next < feed.bars.length) {
				const bar = feed.bars[feed.next];
				if (Number.isFinite(bar.timestamp) && bar.timestamp > timestamp) {
					break;
				}
				feed.next += 1;
				const problem = checkBarIntegrity(bar, feed.lastTimestamp);
				if (problem) {
					this.halt(feed.symbol, bar, problem, timestamp);
					break;
				}
				feed.lastTimestamp = bar.timestamp;
				const visible: Bar = { ...bar, symbol: feed.symbol };
				this.history.append(visible);
				admitted.set(feed.symbol, visible);
			}
		}
		return admitted;
	}

	private halt(symbol: string, bar: Bar, problem: string, timestamp: number): void {
		const error = new DataIntegrityError(symbol, bar.timestamp, problem);
		this.halted.add(symbol);
		logger.warn("symbol_halted", { symbol, timestamp, reason: problem });
		this.record("data_skip", timestamp, {
			symbol,
			reason: error.code,
			message: error.message,
			details: error.details,
		});
	}

	private runForcedExits(timestamp: number, bars: ReadonlyMap<string, Bar>): void {
		const exits = this.gate
			.review({ portfolio: this.ledger.state() })
			.filter((exit) => !this.halted.has(exit.request.symbol));
		this.recordBreaker(timestamp);
		for (const exit of exits) {
			this.processOrder(this.submit(exit.request, timestamp, true), bars, exit);
		}
	}

	private collectOrders(timestamp: number): OrderRequest[] {
		let requests: OrderRequest[] = [];
		let thrown: InsufficientDataError | null = null;
		try {
			requests = this.strategy.onData(timestamp, this.history.view());
		} catch (error) {
			if (error instanceof InsufficientDataError) {
				thrown = error;
			} else {
				this.strategyError(timestamp, "onData", error);
			}
		}

		const skipped = new Map<string, InsufficientDataError>();
		for (const shortfall of this.history.drainShortfalls()) {
			if (!skipped.has(shortfall.symbol)) {
				skipped.set(
					shortfall.symbol,
					new InsufficientDataError(shortfall.symbol, shortfall.requested, shortfall.available)
				);
			}
		}
		if (thrown && !skipped.has(thrown.symbol ?? "")) {
			skipped.set(thrown.symbol ?? "", thrown);
		}
		for (const [symbol, error] of skipped) {
			const dropped = requests.filter((request) => request.symbol === symbol).length;
			this.record("data_skip", timestamp, {
				symbol,
				reason: error.code,
				message: error.message,
				details: { ...error.details, droppedOrders: dropped },
			});
		}

		return requests.filter((request) => {
			if (skipped.has(request.symbol)) {
				return false;
			}
			const problem = describeInvalidRequest(request);
			if (problem) {
				this.strategyError(timestamp, "onData", new Error(`Invalid order request: ${problem}`));
				return false;
			}
			return true;
		});
	}

	private submit(request: OrderRequest, timestamp: number, forced: boolean): Order {
		this.orderSequence += 1;
		const order: Order = {
			id: `ord-${String(this.orderSequence).padStart(6, "0")}`,
			symbol: request.symbol,
			side: request.side,
			quantity: request.quantity,
			type: request.type ?? "market",
			...(request.limitPrice !== undefined ? { limitPrice: request.limitPrice } : {}),
			timestamp,
			...(request.tag !== undefined ? { tag: request.tag } : {}),
			...(request.strategy !== undefined ? { strategy: request.strategy } : {}),
			forced,
		};
		return Object.freeze(order);
	}

	/** Risk check, simulated execution and booking for one order. */
	private processOrder(
		order: Order,
		bars: ReadonlyMap<string, Bar>,
		exit?: ForcedExit
	): void {
		const bar = bars.get(order.symbol);
		const referencePrice = order.type === "limit" ? order.limitPrice : bar?.open;
		const decision = this.gate.evaluate(order, {
			portfolio: this.ledger.state(),
			history: this.history,
			referencePrice,
			haltedSymbols: this.halted,
			costs: this.simulator.settings,
		});
		this.recordBreaker(order.timestamp);

		if (decision.outcome === "rejected") {
			const error = new OrderRejectedError(decision);
			this.record("rejected", order.timestamp, {
				symbol: order.symbol,
				orderId: order.id,
				reason: decision.reason,
				message: error.message,
				...(decision.details ? { details: decision.details } : {}),
			});
			return;
		}

		const fill = this.simulator.execute(order, bar, decision.quantity);
		if (!fill) {
			this.record("unfilled", order.timestamp, {
				symbol: order.symbol,
				orderId: order.id,
				reason: unfilledReason(order, bar),
				details: { quantity: decision.quantity, type: order.type },
			});
			return;
		}

		this.ledger.applyFill(fill);
		this.fills.push(fill);
		this.record("fill", order.timestamp, {
			symbol: order.symbol,
			orderId: order.id,
			reason: exit?.reason ?? decision.reason,
			details: {
				side: fill.side,
				quantity: fill.quantity,
				price: fill.price,
				commission: fill.commission,
				slippage: fill.slippage,
				...(fill.quantity !== order.quantity ? { requestedQuantity: order.quantity } : {}),
				...(exit ? exit.details : {}),
			},
		});
		this.guard(order.timestamp, "onFill", () => this.strategy.onFill(fill));
	}

	private recordBreaker(timestamp: number): void {
		const trip = this.gate.trip;
		if (this.breakerRecorded || !trip) {
			return;
		}
		this.breakerRecorded = true;
		this.record("circuit_breaker", timestamp, {
			reason: "CIRCUIT_BREAKER_TRIPPED",
			details: {
				drawdown: trip.drawdown,
				trippedAt: trip.timestamp,
				maxPortfolioDrawdown: this.gate.settings.maxPortfolioDrawdown,
			},
		});
	}

	private guard(timestamp: number, hook: StrategyHook, action: () => void): void {
		try {
			action();
		} catch (error) {
			this.strategyError(timestamp, hook, error);
		}
	}

	private strategyError(timestamp: number, hook: StrategyHook, error: unknown): void {
		const message = describeError(error);
		logger.warn("strategy_error", {
			strategy: this.strategy.name,
			hook,
			timestamp,
			error: message,
		});
		this.record("strategy_error", timestamp, { reason: hook, message });
	}

	private record(kind: JournalKind, timestamp: number, fields: JournalFields): void {
		this.journal.push(
			Object.freeze({ sequence: this.journal.length + 1, timestamp, kind, ...fields })
		);
	}
}
