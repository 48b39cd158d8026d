import { describe, expect, it } from "vitest";
import {
	ConfigurationError,
	type Bar,
	type Fill,
	type HistoryView,
	type OrderRequest,
	type RiskSettings,
	type Strategy,
} from "@backtide/core";
import { InMemoryBarSource } from "@backtide/data";
import { BacktestEngine } from "./backtestEngine";

const DAY_MS = 86_400_000;
const T0 = Date.UTC(2024, 0, 2);
const at = (day: number): number => T0 + day * DAY_MS;

const bar = (symbol: string, day: number, close: number, overrides: Partial<Bar> = {}): Bar => ({
	symbol,
	timestamp: at(day),
	open: close,
	high: close + 1,
	low: close - 1,
	close,
	volume: 1_000,
	...overrides,
});

const series = (symbol: string, closes: number[]): Bar[] =>
	closes.map((close, day) => bar(symbol, day, close));

const NEUTRAL_RISK: Partial<RiskSettings> = {
	maxPositionSize: 1,
	minCashRatio: 0,
	positionStopLoss: 0,
	maxPortfolioDrawdown: 0.5,
};
const FRICTIONLESS = { slippagePct: 0, commissionPct: 0 };

type Script = (timestamp: number, history: HistoryView) => OrderRequest[];

const buy = (symbol: string, quantity: number, extra: Partial<OrderRequest> = {}): OrderRequest => ({
	symbol,
	side: "buy",
	quantity,
	...extra,
});
const sell = (symbol: string, quantity: number): OrderRequest => ({ symbol, side: "sell", quantity });

/** Emits orders per day index; records every hook call. */
class ScriptedStrategy implements Strategy {
	readonly name = "scripted";
	readonly calls: string[] = [];
	readonly fills: Fill[] = [];
	readonly observed: Array<{ timestamp: number; newest: number; length: number }> = [];

	constructor(private readonly script: Script = () => []) {}

	initialize(): void {
		this.calls.push("initialize");
	}

	onData(timestamp: number, history: HistoryView): OrderRequest[] {
		this.calls.push("onData");
		const newest = Math.max(
			...history.symbols().map((symbol) => history.latest(symbol)?.timestamp ?? -Infinity)
		);
		this.observed.push({ timestamp, newest, length: history.length("AAA") });
		return this.script(timestamp, history);
	}

	onFill(fill: Fill): void {
		this.fills.push(fill);
	}

	finalize(): void {
		this.calls.push("finalize");
	}
}

const onDays =
	(orders: Record<number, OrderRequest[]>): Script =>
	(timestamp) =>
		orders[(timestamp - T0) / DAY_MS] ?? [];

describe("BacktestEngine scenario", () => {
	it("books a market buy with slippage and commission", () => {
		const engine = new BacktestEngine({
			initialCapital: 100_000,
			execution: { slippagePct: 0.001, commissionPct: 0.001 },
		});
		const source = new InMemoryBarSource([bar("AAA", 0, 50.5, { open: 50, high: 51, low: 49 })]);
		const result = engine.run(new ScriptedStrategy(onDays({ 0: [buy("AAA", 100)] })), source, at(0), at(0));

		expect(result.status).toBe("completed");
		expect(result.fills).toHaveLength(1);
		const [fill] = result.fills;
		expect(fill.price).toBe(50.05);
		expect(fill.commission).toBe(5.01);
		expect(fill.slippage).toBe(5);
		expect(fill.orderId).toBe("ord-000001");

		const [snapshot] = result.snapshots;
		expect(snapshot.cash).toBeCloseTo(94_989.99, 6);
		expect(snapshot.positions).toHaveLength(1);
		expect(snapshot.positions[0].quantity).toBe(100);
		expect(snapshot.positions[0].averageCost).toBeCloseTo(50.05, 10);
		expect(snapshot.positions[0].markPrice).toBe(50.5);
		expect(snapshot.equity).toBeCloseTo(100_039.99, 6);
		expect(result.journal).toEqual([
			{
				sequence: 1,
				timestamp: at(0),
				kind: "fill",
				symbol: "AAA",
				orderId: "ord-000001",
				reason: "APPROVED",
				details: { side: "buy", quantity: 100, price: 50.05, commission: 5.01, slippage: 5 },
			},
		]);
	});
});

describe("BacktestEngine cash floor", () => {
	const runBuy = (quantity: number) =>
		new BacktestEngine({
			initialCapital: 100_000,
			risk: { ...NEUTRAL_RISK, minCashRatio: 0.2 },
			execution: { slippagePct: 0.001, commissionPct: 0.001 },
		}).run(
			new ScriptedStrategy(onDays({ 0: [buy("AAA", quantity)] })),
			new InMemoryBarSource([bar("AAA", 0, 50)]),
			at(0),
			at(0)
		);

	it("holds the minimum cash ratio after slippage and commission", () => {
		const rejected = runBuy(1_600);
		expect(rejected.fills).toEqual([]);
		expect(rejected.journal.map((entry) => [entry.kind, entry.reason])).toEqual([
			["rejected", "CASH_BELOW_MIN"],
		]);

		const filled = runBuy(1_595);
		expect(filled.fills.map((fill) => [fill.quantity, fill.price, fill.commission])).toEqual([
			[1_595, 50.05, 79.83],
		]);
		const [snapshot] = filled.snapshots;
		expect(snapshot.cash).toBeCloseTo(20_090.42, 6);
		expect(snapshot.cash / snapshot.equity).toBeGreaterThanOrEqual(0.2);
	});
});

describe("BacktestEngine invariants", () => {
	const source = new InMemoryBarSource([
		...series("AAA", [10, 11, 12, 11, 13]),
		...series("BBB", [20, 19, 21, 22, 20]),
	]);
	const script = onDays({
		0: [buy("AAA", 100), buy("BBB", 50)],
		2: [sell("AAA", 50)],
		3: [sell("BBB", 50)],
		4: [buy("AAA", 10)],
	});
	const runOnce = () =>
		new BacktestEngine({
			initialCapital: 10_000,
			risk: NEUTRAL_RISK,
			execution: { slippagePct: 0.001, commissionPct: 0.001 },
		}).run(new ScriptedStrategy(script), source, at(0), at(4));

	it("conserves cash plus position value at every tick", () => {
		const result = runOnce();
		expect(result.fills).toHaveLength(5);
		expect(result.snapshots).toHaveLength(5);
		for (const snapshot of result.snapshots) {
			const positionValue = snapshot.positions.reduce(
				(sum, position) => sum + position.quantity * position.markPrice,
				0
			);
			expect(Math.abs(snapshot.cash + positionValue - snapshot.equity)).toBeLessThan(1e-9);
		}
	});

	it("tracks drawdown against the running peak", () => {
		const result = runOnce();
		let peak = 10_000;
		let worst = 0;
		for (const snapshot of result.snapshots) {
			peak = Math.max(peak, snapshot.equity);
			const drawdown = (peak - snapshot.equity) / peak;
			expect(snapshot.drawdown).toBeGreaterThanOrEqual(0);
			expect(snapshot.drawdown).toBeCloseTo(drawdown, 12);
			worst = Math.max(worst, drawdown);
		}
		expect(result.metrics.maxDrawdown).toBeCloseTo(worst, 12);
	});

	it("is deterministic across runs", () => {
		const first = runOnce();
		const second = runOnce();
		expect(second.fills).toEqual(first.fills);
		expect(second.journal).toEqual(first.journal);
		expect(second.metrics).toEqual(first.metrics);
	});

	it("keeps metrics consistent with the ledger", () => {
		const result = runOnce();
		expect(result.metrics.fillCount).toBe(5);
		expect(result.metrics.finalEquity).toBe(result.snapshots[4].equity);
		expect(result.trades).toHaveLength(2);
		expect(result.trades.map((trade) => trade.symbol)).toEqual(["AAA", "BBB"]);
	});

	it("freezes everything it hands back", () => {
		const result = runOnce();
		expect(Object.isFrozen(result.snapshots[0])).toBe(true);
		expect(Object.isFrozen(result.fills[0])).toBe(true);
		expect(Object.isFrozen(result.fills[0].order)).toBe(true);
		expect(Object.isFrozen(result.journal[0])).toBe(true);
	});
});

describe("BacktestEngine visibility", () => {
	it("never shows the strategy a bar from the future", () => {
		const strategy = new ScriptedStrategy();
		const source = new InMemoryBarSource([
			...series("AAA", [1, 2, 3, 4]),
			bar("BBB", 1, 9),
			bar("BBB", 3, 9),
		]);
		new BacktestEngine().run(strategy, source, at(0), at(3));

		expect(strategy.observed.map((entry) => entry.timestamp)).toEqual([at(0), at(1), at(2), at(3)]);
		for (const entry of strategy.observed) {
			expect(entry.newest).toBeLessThanOrEqual(entry.timestamp);
		}
		expect(strategy.observed.map((entry) => entry.length)).toEqual([1, 2, 3, 4]);
	});

	it("keeps a retained history view on the tick it was handed out", () => {
		const retained: HistoryView[] = [];
		const strategy = new ScriptedStrategy((_timestamp, history) => {
			retained.push(history);
			return [];
		});
		new BacktestEngine().run(strategy, new InMemoryBarSource(series("AAA", [1, 2, 3])), at(0), at(2));

		expect(retained.map((view) => view.asOf)).toEqual([at(0), at(1), at(2)]);
		expect(retained.map((view) => view.closes("AAA"))).toEqual([[1], [1, 2], [1, 2, 3]]);
		expect(new Set(retained).size).toBe(3);
	});

	it("only loads bars inside the window", () => {
		const strategy = new ScriptedStrategy();
		const source = new InMemoryBarSource(series("AAA", [1, 2, 3, 4, 5]));
		const result = new BacktestEngine().run(strategy, source, at(1), at(3));
		expect(result.ticks).toBe(3);
		expect(result.snapshots.map((snapshot) => snapshot.timestamp)).toEqual([at(1), at(2), at(3)]);
	});
});

describe("BacktestEngine order flow", () => {
	it("lets each order see the fills before it in the same tick", () => {
		const engine = new BacktestEngine({
			initialCapital: 10_000,
			risk: { ...NEUTRAL_RISK, minCashRatio: 0.5 },
			execution: FRICTIONLESS,
		});
		const result = engine.run(
			new ScriptedStrategy(onDays({ 0: [buy("AAA", 40), buy("AAA", 20)] })),
			new InMemoryBarSource([bar("AAA", 0, 100)]),
			at(0),
			at(0)
		);

		expect(result.journal.map((entry) => [entry.kind, entry.orderId, entry.reason])).toEqual([
			["fill", "ord-000001", "APPROVED"],
			["rejected", "ord-000002", "CASH_BELOW_MIN"],
		]);
		expect(result.journal[1].message).toBe("Order ord-000002 rejected: CASH_BELOW_MIN");
		expect(result.snapshots[0].cash).toBe(6_000);
	});

	it("fills exactly at the position cap and resizes one unit above it", () => {
		const run = (quantity: number) =>
			new BacktestEngine({
				initialCapital: 10_000,
				risk: { ...NEUTRAL_RISK, maxPositionSize: 0.1 },
				execution: FRICTIONLESS,
			}).run(
				new ScriptedStrategy(onDays({ 0: [buy("AAA", quantity)] })),
				new InMemoryBarSource([bar("AAA", 0, 100)]),
				at(0),
				at(0)
			);

		const atCap = run(10);
		expect(atCap.fills[0].quantity).toBe(10);
		expect(atCap.journal[0].reason).toBe("APPROVED");

		const above = run(11);
		expect(above.fills[0].quantity).toBe(10);
		expect(above.journal[0].reason).toBe("POSITION_SIZE_CAPPED");
		expect(above.journal[0].details).toMatchObject({ quantity: 10, requestedQuantity: 11 });
	});

	it("lets a limit order lapse when the bar never reaches it", () => {
		const result = new BacktestEngine({ risk: NEUTRAL_RISK, execution: FRICTIONLESS }).run(
			new ScriptedStrategy(
				onDays({
					0: [buy("AAA", 5, { type: "limit", limitPrice: 95 })],
					1: [buy("AAA", 5, { type: "limit", limitPrice: 99.5 })],
				})
			),
			new InMemoryBarSource(series("AAA", [100, 100])),
			at(0),
			at(1)
		);

		expect(result.journal.map((entry) => [entry.kind, entry.reason])).toEqual([
			["unfilled", "LIMIT_NOT_REACHED"],
			["fill", "APPROVED"],
		]);
		expect(result.fills).toHaveLength(1);
		expect(result.fills[0].price).toBe(99.5);
		expect(result.fills[0].order.id).toBe("ord-000002");
	});

	it("reports an order for a symbol without a bar this tick", () => {
		const result = new BacktestEngine({ risk: NEUTRAL_RISK }).run(
			new ScriptedStrategy(onDays({ 0: [buy("BBB", 1)] })),
			new InMemoryBarSource([bar("AAA", 0, 10), bar("BBB", 1, 10)]),
			at(0),
			at(1)
		);
		expect(result.journal[0]).toMatchObject({ kind: "rejected", symbol: "BBB", reason: "NO_REFERENCE_PRICE" });
	});

	it("passes every fill to the strategy", () => {
		const strategy = new ScriptedStrategy(onDays({ 0: [buy("AAA", 1)], 1: [sell("AAA", 1)] }));
		const result = new BacktestEngine({ risk: NEUTRAL_RISK }).run(
			strategy,
			new InMemoryBarSource(series("AAA", [10, 11])),
			at(0),
			at(1)
		);
		expect(strategy.fills).toEqual(result.fills);
		expect(strategy.calls).toEqual(["initialize", "onData", "onData", "finalize"]);
	});
});

describe("BacktestEngine forced exits", () => {
	it("liquidates in the tick the circuit breaker trips and blocks later entries", () => {
		const result = new BacktestEngine({
			initialCapital: 10_000,
			risk: { ...NEUTRAL_RISK, maxPortfolioDrawdown: 0.1 },
			execution: FRICTIONLESS,
		}).run(
			new ScriptedStrategy(onDays({ 0: [buy("AAA", 90)], 2: [buy("AAA", 10)] })),
			new InMemoryBarSource([bar("AAA", 0, 100), bar("AAA", 1, 80), bar("AAA", 2, 82, { open: 80 })]),
			at(0),
			at(2)
		);

		expect(result.journal.map((entry) => [entry.timestamp, entry.kind, entry.reason])).toEqual([
			[at(0), "fill", "APPROVED"],
			[at(1), "circuit_breaker", "CIRCUIT_BREAKER_TRIPPED"],
			[at(1), "fill", "CIRCUIT_BREAKER_TRIPPED"],
			[at(2), "rejected", "CIRCUIT_BREAKER_TRIPPED"],
		]);
		const liquidation = result.fills[1];
		expect(liquidation.order.forced).toBe(true);
		expect(liquidation.order.tag).toBe("liquidation");
		expect(liquidation.side).toBe("sell");
		expect(liquidation.quantity).toBe(90);
		expect(liquidation.price).toBe(80);

		expect(result.snapshots[1].positions).toEqual([]);
		expect(result.snapshots[1].cash).toBe(8_200);
		expect(result.snapshots[1].drawdown).toBeCloseTo(0.18, 12);
		expect(result.circuitBreaker.state).toBe("TRIPPED");
		expect(result.circuitBreaker.trippedAt?.timestamp).toBe(at(1));
		expect(result.circuitBreaker.trippedAt?.drawdown).toBeCloseTo(0.18, 12);
		expect(result.metrics.maxDrawdown).toBeCloseTo(0.18, 12);
	});

	it("closes a position through its stop loss", () => {
		const result = new BacktestEngine({
			initialCapital: 10_000,
			risk: { ...NEUTRAL_RISK, positionStopLoss: 0.05 },
			execution: FRICTIONLESS,
		}).run(
			new ScriptedStrategy(onDays({ 0: [buy("AAA", 10)] })),
			new InMemoryBarSource(series("AAA", [100, 94])),
			at(0),
			at(1)
		);

		expect(result.fills).toHaveLength(2);
		expect(result.fills[1].order.tag).toBe("stop_loss");
		expect(result.fills[1].price).toBe(94);
		expect(result.journal[1]).toMatchObject({ kind: "fill", reason: "STOP_LOSS" });
		expect(result.trades).toHaveLength(1);
		expect(result.trades[0].realizedPnl).toBeCloseTo(-60, 10);
		expect(result.circuitBreaker.state).toBe("ARMED");
	});
});

describe("BacktestEngine data problems", () => {
	it("halts a symbol with a corrupt bar and keeps trading the rest", () => {
		const strategy = new ScriptedStrategy(onDays({ 2: [buy("BBB", 1), buy("AAA", 1)] }));
		const result = new BacktestEngine({ risk: NEUTRAL_RISK, execution: FRICTIONLESS }).run(
			strategy,
			new InMemoryBarSource([
				...series("AAA", [10, 11, 12]),
				bar("BBB", 0, 20),
				bar("BBB", 1, 20, { high: 19, low: 21 }),
				bar("BBB", 2, 22),
			]),
			at(0),
			at(2)
		);

		expect(result.haltedSymbols).toEqual(["BBB"]);
		expect(result.journal.map((entry) => [entry.timestamp, entry.kind, entry.symbol, entry.reason])).toEqual([
			[at(1), "data_skip", "BBB", "DATA_INTEGRITY"],
			[at(2), "rejected", "BBB", "SYMBOL_HALTED"],
			[at(2), "fill", "AAA", "APPROVED"],
		]);
		expect(result.journal[0].message).toBe(`Bad bar for BBB at ${at(1)}: high 19 is below low 21`);
		expect(result.fills[0].price).toBe(12);
		expect(result.ticks).toBe(3);
	});

	it("halts a symbol whose bar carries no usable volume", () => {
		const strategy = new ScriptedStrategy(
			onDays({ 1: [buy("BBB", 10, { type: "limit", limitPrice: 50 })] })
		);
		const result = new BacktestEngine({
			risk: NEUTRAL_RISK,
			execution: { ...FRICTIONLESS, limitVolumeParticipation: 0.1 },
		}).run(
			strategy,
			new InMemoryBarSource([
				...series("AAA", [10, 11]),
				bar("BBB", 0, 50),
				bar("BBB", 1, 50, { volume: Number.NaN }),
			]),
			at(0),
			at(1)
		);

		expect(result.haltedSymbols).toEqual(["BBB"]);
		expect(result.fills).toEqual([]);
		expect(result.journal.map((entry) => [entry.kind, entry.symbol, entry.reason])).toEqual([
			["data_skip", "BBB", "DATA_INTEGRITY"],
			["rejected", "BBB", "SYMBOL_HALTED"],
		]);
		expect(result.journal[0].message).toBe(
			`Bad bar for BBB at ${at(1)}: volume NaN is not a non-negative number`
		);
		expect(result.snapshots[1].cash).toBe(100_000);
		expect(result.snapshots[1].equity).toBe(100_000);
	});

	it("halts a symbol whose bars go back in time", () => {
		const result = new BacktestEngine().run(
			new ScriptedStrategy(),
			new InMemoryBarSource([bar("AAA", 0, 1), bar("AAA", 2, 3), bar("AAA", 1, 2)]),
			at(0),
			at(2)
		);
		expect(result.journal).toHaveLength(1);
		expect(result.journal[0]).toMatchObject({
			timestamp: at(2),
			kind: "data_skip",
			symbol: "AAA",
			reason: "DATA_INTEGRITY",
			message: `Bad bar for AAA at ${at(1)}: timestamp ${at(1)} does not follow ${at(2)}`,
		});
	});

	it("skips a tick whose lookback is not yet available", () => {
		const result = new BacktestEngine({ risk: NEUTRAL_RISK }).run(
			new ScriptedStrategy((_timestamp, history) => {
				history.window("AAA", 3);
				return [buy("AAA", 1)];
			}),
			new InMemoryBarSource(series("AAA", [10, 11, 12])),
			at(0),
			at(2)
		);

		expect(result.journal.map((entry) => [entry.timestamp, entry.kind, entry.reason])).toEqual([
			[at(0), "data_skip", "INSUFFICIENT_DATA"],
			[at(1), "data_skip", "INSUFFICIENT_DATA"],
			[at(2), "fill", "APPROVED"],
		]);
		expect(result.journal[1].details).toEqual({ requested: 3, available: 2, droppedOrders: 0 });
		expect(result.snapshots).toHaveLength(3);
	});

	it("drops only the short symbol's orders when the strategy carries on", () => {
		const result = new BacktestEngine({ risk: NEUTRAL_RISK }).run(
			new ScriptedStrategy((_timestamp, history) => {
				try {
					history.window("AAA", 2);
				} catch {
					// carry on with the other symbol
				}
				return [buy("AAA", 1), buy("BBB", 1)];
			}),
			new InMemoryBarSource([bar("AAA", 0, 10), bar("BBB", 0, 20)]),
			at(0),
			at(0)
		);

		expect(result.journal[0]).toMatchObject({
			kind: "data_skip",
			symbol: "AAA",
			details: { requested: 2, available: 1, droppedOrders: 1 },
		});
		expect(result.journal[1]).toMatchObject({ kind: "fill", symbol: "BBB", orderId: "ord-000001" });
	});
});

describe("BacktestEngine strategy failures", () => {
	it("journals a throwing strategy and keeps running", () => {
		const strategy = new ScriptedStrategy((timestamp) => {
			if (timestamp === at(1)) {
				throw new Error("boom");
			}
			return [];
		});
		const result = new BacktestEngine().run(
			strategy,
			new InMemoryBarSource(series("AAA", [1, 2, 3])),
			at(0),
			at(2)
		);

		expect(result.journal).toEqual([
			{ sequence: 1, timestamp: at(1), kind: "strategy_error", reason: "onData", message: "boom" },
		]);
		expect(result.snapshots).toHaveLength(3);
		expect(strategy.calls.at(-1)).toBe("finalize");
	});

	it("turns malformed order requests into strategy errors", () => {
		const result = new BacktestEngine().run(
			new ScriptedStrategy(onDays({ 0: [buy("AAA", 1.5), buy("AAA", 1, { type: "limit" })] })),
			new InMemoryBarSource(series("AAA", [10])),
			at(0),
			at(0)
		);
		expect(result.journal.map((entry) => entry.message)).toEqual([
			"Invalid order request: quantity must be a positive integer, got 1.5",
			"Invalid order request: limit orders need a positive limitPrice",
		]);
		expect(result.fills).toEqual([]);
	});
});

describe("BacktestEngine cancellation", () => {
	it("stops at the next tick once the signal aborts", () => {
		const controller = new AbortController();
		const strategy = new ScriptedStrategy((timestamp) => {
			if (timestamp === at(1)) {
				controller.abort();
			}
			return [];
		});
		const result = new BacktestEngine().run(
			strategy,
			new InMemoryBarSource(series("AAA", [1, 2, 3, 4])),
			at(0),
			at(3),
			{ signal: controller.signal }
		);

		expect(result.status).toBe("stopped");
		expect(result.ticks).toBe(2);
		expect(result.snapshots).toHaveLength(2);
		expect(strategy.calls).toEqual(["initialize", "onData", "onData", "finalize"]);
	});

	it("runs nothing under an already aborted signal", () => {
		const controller = new AbortController();
		controller.abort();
		const strategy = new ScriptedStrategy();
		const result = new BacktestEngine({ initialCapital: 5_000 }).run(
			strategy,
			new InMemoryBarSource(series("AAA", [1, 2])),
			at(0),
			at(1),
			{ signal: controller.signal }
		);
		expect(result.ticks).toBe(0);
		expect(result.snapshots).toEqual([]);
		expect(result.metrics.finalEquity).toBe(5_000);
		expect(strategy.calls).toEqual(["initialize", "finalize"]);
	});

	it("can be stopped from outside while running asynchronously", async () => {
		const controller = new AbortController();
		const pending = new BacktestEngine().runAsync(
			new ScriptedStrategy(),
			new InMemoryBarSource(series("AAA", [1, 2, 3, 4, 5])),
			at(0),
			at(4),
			{ signal: controller.signal }
		);
		controller.abort();
		const result = await pending;
		expect(result.status).toBe("stopped");
		expect(result.ticks).toBe(1);
	});

	it("matches the synchronous run when left alone", async () => {
		const source = new InMemoryBarSource(series("AAA", [10, 12, 11]));
		const script = onDays({ 0: [buy("AAA", 3)], 2: [sell("AAA", 3)] });
		const engine = new BacktestEngine({ risk: NEUTRAL_RISK });
		const sync = engine.run(new ScriptedStrategy(script), source, at(0), at(2));
		const async = await engine.runAsync(new ScriptedStrategy(script), source, at(0), at(2));
		expect(async.fills).toEqual(sync.fills);
		expect(async.metrics).toEqual(sync.metrics);
		expect(async.status).toBe("completed");
	});
});

describe("BacktestEngine configuration", () => {
	const source = new InMemoryBarSource(series("AAA", [1]));

	it("rejects bad settings before the first tick", () => {
		const strategy = new ScriptedStrategy();
		expect(() =>
			new BacktestEngine({ initialCapital: 0 }).run(strategy, source, at(0), at(0))
		).toThrowError(ConfigurationError);
		expect(() => new BacktestEngine().run(strategy, source, at(1), at(0))).toThrowError(
			/must not be after end/
		);
		expect(() =>
			new BacktestEngine({ risk: { maxPositionSize: 2 } }).run(strategy, source, at(0), at(0))
		).toThrowError(/maxPositionSize must be within/);
		expect(() =>
			new BacktestEngine({ varConfidence: 1 }).run(strategy, source, at(0), at(0))
		).toThrowError(/varConfidence must be between 0 and 1, got 1/);
		expect(strategy.calls).toEqual([]);
	});

	it("echoes the resolved configuration", () => {
		const result = new BacktestEngine({ initialCapital: 2_500, periodsPerYear: 52 }).run(
			new ScriptedStrategy(),
			source,
			at(0),
			at(0)
		);
		expect(result.config).toMatchObject({
			initialCapital: 2_500,
			riskFreeRate: 0.02,
			periodsPerYear: 52,
			varConfidence: 0.95,
			symbols: ["AAA"],
		});
		expect(result.config.risk.maxPortfolioDrawdown).toBe(0.12);
		expect(result.metrics.periodsPerYear).toBe(52);
		expect(result.strategy).toBe("scripted");
	});
});
