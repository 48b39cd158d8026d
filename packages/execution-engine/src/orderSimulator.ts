import {
	resolveExecutionSettings,
	roundCurrency,
	roundPrice,
	type Bar,
	type ExecutionSettings,
	type Fill,
	type Order,
} from "@backtide/core";

/**
 * Turns approved orders into fills against a single bar. Orders that cannot
 * fill on that bar lapse; nothing is queued for later bars.
 */
export class OrderSimulator {
	readonly settings: Readonly<ExecutionSettings>;

	constructor(settings: Partial<ExecutionSettings> = {}) {
		this.settings = resolveExecutionSettings(settings);
	}

	/**
	 * `quantity` is the risk-approved size and defaults to the order's own.
	 * Returns null when the bar is missing, belongs to another symbol, or
	 * never reaches the limit price.
	 */
	execute(order: Order, bar: Bar | undefined, quantity = order.quantity): Fill | null {
		if (!bar || bar.symbol !== order.symbol || quantity <= 0) {
			return null;
		}
		return order.type === "limit"
			? this.fillLimit(order, bar, quantity)
			: this.fillMarket(order, bar, quantity);
	}

	private fillMarket(order: Order, bar: Bar, quantity: number): Fill {
		const direction = order.side === "buy" ? 1 : -1;
		const price = roundPrice(bar.open * (1 + direction * this.settings.slippagePct));
		return this.buildFill(order, bar, price, quantity, Math.abs(price - bar.open) * quantity);
	}

	private fillLimit(order: Order, bar: Bar, quantity: number): Fill | null {
		const limit = order.limitPrice;
		if (limit === undefined || !(limit > 0)) {
			return null;
		}
		const crosses = order.side === "buy" ? bar.low <= limit : bar.high >= limit;
		if (!crosses) {
			return null;
		}
		const participation = this.settings.limitVolumeParticipation;
		const fillable =
			participation === undefined
				? quantity
				: Math.min(quantity, Math.floor(bar.volume * participation));
		if (!Number.isFinite(fillable) || fillable <= 0) {
			return null;
		}
		return this.buildFill(order, bar, limit, fillable, 0);
	}

	private buildFill(
		order: Order,
		bar: Bar,
		price: number,
		quantity: number,
		slippage: number
	): Fill {
		return Object.freeze({
			orderId: order.id,
			order,
			symbol: order.symbol,
			side: order.side,
			price,
			quantity,
			commission: roundCurrency(price * quantity * this.settings.commissionPct),
			slippage: roundCurrency(slippage),
			timestamp: bar.timestamp,
		});
	}
}
