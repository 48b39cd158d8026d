import type { HistoryView, OrderRequest } from "@backtide/core";
import { BaseStrategy } from "./BaseStrategy";
import { ParamReader, positive, type StrategyParams } from "./params";

export interface BuyAndHoldConfig {
	/** Cash committed per symbol, converted to whole units at the first close seen. */
	notional: number;
}

export const parseBuyAndHoldConfig = (params: StrategyParams): BuyAndHoldConfig => {
	const reader = new ParamReader("buy_and_hold", params);
	const notional = reader.number("notional", 10_000, positive);
	reader.done();
	return { notional };
};

/** One entry per symbol on its first visible bar, held to the end. */
export class BuyAndHoldStrategy extends BaseStrategy {
	readonly name = "buy_and_hold";
	private readonly requested = new Set<string>();

	constructor(
		private readonly config: BuyAndHoldConfig,
		symbols?: readonly string[]
	) {
		super(symbols);
	}

	initialize(): void {
		super.initialize();
		this.requested.clear();
	}

	protected onSymbol(symbol: string, history: HistoryView): OrderRequest[] {
		if (this.requested.has(symbol)) {
			return [];
		}
		const latest = history.latest(symbol);
		if (!latest || !(latest.close > 0)) {
			return [];
		}
		const quantity = Math.floor(this.config.notional / latest.close);
		this.requested.add(symbol);
		return quantity > 0 ? [this.marketOrder(symbol, "buy", quantity, "entry")] : [];
	}
}
