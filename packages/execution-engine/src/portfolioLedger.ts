import {
	ConfigurationError,
	applyFillToPosition,
	type ClosedTrade,
	type Fill,
	type PortfolioSnapshot,
	type PortfolioState,
	type Position,
	type PositionView,
} from "@backtide/core";

/**
 * Sole owner of cash, positions and the snapshot history for one run.
 * Everything it hands out is a copy or frozen.
 */
export class PortfolioLedger {
	readonly initialCapital: number;
	private cash: number;
	private peakEquity: number;
	private realizedPnl = 0;
	private timestamp = 0;
	private readonly positions = new Map<string, Position>();
	private readonly marks = new Map<string, number>();
	private readonly history: PortfolioSnapshot[] = [];
	private readonly trades: ClosedTrade[] = [];

	constructor(initialCapital: number) {
		if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
			throw new ConfigurationError("Invalid initial capital", [
				`initialCapital must be a positive number, got ${initialCapital}`,
			]);
		}
		this.initialCapital = initialCapital;
		this.cash = initialCapital;
		this.peakEquity = initialCapital;
	}

	/** Marks open positions at the given prices (latest closes). */
	markToMarket(prices: ReadonlyMap<string, number>, timestamp?: number): PortfolioState {
		for (const [symbol, price] of prices) {
			if (Number.isFinite(price)) {
				this.marks.set(symbol, price);
			}
		}
		if (timestamp !== undefined) {
			this.timestamp = timestamp;
		}
		return this.state();
	}

	/**
	 * Books a fill: buys debit notional plus commission, sells credit notional
	 * less commission. Returns the live state; snapshots are separate.
	 */
	applyFill(fill: Fill): PortfolioState {
		const notional = fill.price * fill.quantity;
		this.cash +=
			fill.side === "buy"
				? -(notional + fill.commission)
				: notional - fill.commission;

		const { position, closed } = applyFillToPosition(
			this.positions.get(fill.symbol) ?? null,
			fill
		);
		if (position) {
			this.positions.set(fill.symbol, position);
		} else {
			this.positions.delete(fill.symbol);
		}
		if (closed) {
			this.realizedPnl += closed.realizedPnl;
			this.trades.push(Object.freeze(closed));
		}
		if (!this.marks.has(fill.symbol)) {
			this.marks.set(fill.symbol, fill.price);
		}
		this.timestamp = Math.max(this.timestamp, fill.timestamp);
		return this.state();
	}

	state(): PortfolioState {
		const views: PositionView[] = [...this.positions.values()]
			.sort((a, b) => a.symbol.localeCompare(b.symbol))
			.map((position) => {
				const markPrice = this.marks.get(position.symbol) ?? position.averageCost;
				return {
					symbol: position.symbol,
					quantity: position.quantity,
					averageCost: position.averageCost,
					markPrice,
					marketValue: position.quantity * markPrice,
					unrealizedPnl: (markPrice - position.averageCost) * position.quantity,
				};
			});
		const positionsValue = views.reduce((sum, view) => sum + view.marketValue, 0);
		const equity = this.cash + positionsValue;
		const peakEquity = Math.max(this.peakEquity, equity);
		const drawdown = peakEquity > 0 ? (peakEquity - equity) / peakEquity : 0;

		return {
			timestamp: this.timestamp,
			cash: this.cash,
			positions: views,
			positionsValue,
			equity,
			peakEquity,
			drawdown,
			realizedPnl: this.realizedPnl,
			unrealizedPnl: views.reduce((sum, view) => sum + view.unrealizedPnl, 0),
		};
	}

	/**
	 * Appends the one snapshot for this tick. The running peak only moves
	 * here, so it is the maximum over recorded equity and starting capital.
	 */
	recordSnapshot(timestamp: number): PortfolioSnapshot {
		this.timestamp = timestamp;
		const current = this.state();
		this.peakEquity = current.peakEquity;
		const snapshot: PortfolioSnapshot = Object.freeze({
			...current,
			positions: Object.freeze(current.positions.map((view) => Object.freeze(view))),
		});
		this.history.push(snapshot);
		return snapshot;
	}

	snapshots(): readonly PortfolioSnapshot[] {
		return [...this.history];
	}

	closedTrades(): readonly ClosedTrade[] {
		return [...this.trades];
	}

	position(symbol: string): Position | undefined {
		const position = this.positions.get(symbol);
		return position ? { ...position } : undefined;
	}
}
