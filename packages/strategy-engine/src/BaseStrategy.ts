import {
	InsufficientDataError,
	type Fill,
	type HistoryView,
	type OrderRequest,
	type OrderSide,
	type Strategy,
} from "@backtide/core";

/**
 * Per-symbol dispatch, no-op lifecycle hooks and order helpers. Holdings are
 * tracked from the fills the engine reports, so subclasses never need the
 * ledger.
 */
export abstract class BaseStrategy implements Strategy {
	abstract readonly name: string;
	private readonly holdings = new Map<string, number>();

	constructor(protected readonly symbols?: readonly string[]) {}

	initialize(): void {
		this.holdings.clear();
	}

	onData(timestamp: number, history: HistoryView): OrderRequest[] {
		const orders: OrderRequest[] = [];
		for (const symbol of this.symbols ?? history.symbols()) {
			if (!history.has(symbol)) {
				continue;
			}
			try {
				orders.push(...this.onSymbol(symbol, history, timestamp));
			} catch (error) {
				// The history view has already recorded the shortfall for this symbol.
				if (!(error instanceof InsufficientDataError)) {
					throw error;
				}
			}
		}
		return orders;
	}

	onFill(fill: Fill): void {
		const next = this.position(fill.symbol) + (fill.side === "buy" ? fill.quantity : -fill.quantity);
		if (next === 0) {
			this.holdings.delete(fill.symbol);
		} else {
			this.holdings.set(fill.symbol, next);
		}
	}

	finalize(): void {}

	/** Signed quantity held, as seen through fills. */
	position(symbol: string): number {
		return this.holdings.get(symbol) ?? 0;
	}

	protected abstract onSymbol(
		symbol: string,
		history: HistoryView,
		timestamp: number
	): OrderRequest[];

	protected marketOrder(
		symbol: string,
		side: OrderSide,
		quantity: number,
		tag?: string
	): OrderRequest {
		return { symbol, side, quantity, type: "market", ...(tag ? { tag } : {}) };
	}

	protected limitOrder(
		symbol: string,
		side: OrderSide,
		quantity: number,
		limitPrice: number,
		tag?: string
	): OrderRequest {
		return { symbol, side, quantity, type: "limit", limitPrice, ...(tag ? { tag } : {}) };
	}
}
