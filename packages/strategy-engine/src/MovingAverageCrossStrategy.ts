import type { HistoryView, OrderRequest } from "@backtide/core";
import { emaSeries, smaSeries } from "@backtide/indicators";
import { BaseStrategy } from "./BaseStrategy";
import { ParamReader, positive, positiveInteger, type StrategyParams } from "./params";

export type MovingAverageKind = "sma" | "ema";

export interface MovingAverageCrossConfig {
	fastWindow: number;
	slowWindow: number;
	average: MovingAverageKind;
	notional: number;
	allowShort: boolean;
}

export const parseMovingAverageCrossConfig = (
	params: StrategyParams
): MovingAverageCrossConfig => {
	const reader = new ParamReader("moving_average_cross", params);
	const fastWindow = reader.number("fastWindow", 10, positiveInteger);
	const slowWindow = reader.number("slowWindow", 30, positiveInteger);
	const average = reader.choice<MovingAverageKind>("average", ["sma", "ema"], "sma");
	const notional = reader.number("notional", 10_000, positive);
	const allowShort = reader.boolean("allowShort", false);
	reader.require(
		fastWindow < slowWindow,
		`fastWindow (${fastWindow}) must be shorter than slowWindow (${slowWindow})`
	);
	reader.done();
	return { fastWindow, slowWindow, average, notional, allowShort };
};

type Cross = "up" | "down" | null;

const detectCross = (fast: number[], slow: number[]): Cross => {
	if (fast.length < 2 || slow.length < 2) {
		return null;
	}
	const [fastPrev, fastNow] = fast.slice(-2);
	const [slowPrev, slowNow] = slow.slice(-2);
	if (fastPrev <= slowPrev && fastNow > slowNow) {
		return "up";
	}
	if (fastPrev >= slowPrev && fastNow < slowNow) {
		return "down";
	}
	return null;
};

/**
 * Goes long when the fast average crosses above the slow one and exits on the
 * cross back down; with `allowShort` the down cross also opens a short.
 */
export class MovingAverageCrossStrategy extends BaseStrategy {
	readonly name = "moving_average_cross";

	constructor(
		private readonly config: MovingAverageCrossConfig,
		symbols?: readonly string[]
	) {
		super(symbols);
	}

	protected onSymbol(symbol: string, history: HistoryView): OrderRequest[] {
		const { fastWindow, slowWindow, average } = this.config;
		// Throws for the symbol until one bar beyond the slow window is visible.
		const window = history.closes(symbol, slowWindow + 1);
		const closes = average === "ema" ? history.closes(symbol) : window;
		const series = average === "ema" ? emaSeries : smaSeries;
		const cross = detectCross(series(closes, fastWindow), series(closes, slowWindow));
		if (!cross) {
			return [];
		}

		const price = window[window.length - 1];
		const size = price > 0 ? Math.floor(this.config.notional / price) : 0;
		const held = this.position(symbol);

		if (cross === "up") {
			const orders: OrderRequest[] = [];
			if (held < 0) {
				orders.push(this.marketOrder(symbol, "buy", -held, "cover"));
			}
			if (held <= 0 && size > 0) {
				orders.push(this.marketOrder(symbol, "buy", size, "entry"));
			}
			return orders;
		}

		const orders: OrderRequest[] = [];
		if (held > 0) {
			orders.push(this.marketOrder(symbol, "sell", held, "exit"));
		}
		if (this.config.allowShort && held >= 0 && size > 0) {
			orders.push(this.marketOrder(symbol, "sell", size, "short"));
		}
		return orders;
	}
}
