import type { ClosedTrade, Fill, Position, PositionDirection } from "../types";

export interface PositionFillOutcome {
	position: Position | null;
	closed: ClosedTrade | null;
}

export const directionOf = (quantity: number): PositionDirection =>
	quantity >= 0 ? "LONG" : "SHORT";

export const signedQuantity = (fill: Pick<Fill, "side" | "quantity">): number =>
	fill.side === "buy" ? fill.quantity : -fill.quantity;

/**
 * Average-cost position accounting shared by the ledger and the metrics
 * replay. Adds re-weight the average; reductions realize against it and
 * release a pro-rata share of the entry commission. A fill that crosses zero
 * closes the old side and opens the remainder at the fill price.
 */
export const applyFillToPosition = (
	position: Position | null,
	fill: Fill
): PositionFillOutcome => {
	const delta = signedQuantity(fill);
	const current = position?.quantity ?? 0;

	if (!position || current === 0 || Math.sign(current) === Math.sign(delta)) {
		const quantity = current + delta;
		const previousCost = position ? Math.abs(current) * position.averageCost : 0;
		return {
			position: {
				symbol: fill.symbol,
				quantity,
				averageCost:
					(previousCost + fill.quantity * fill.price) / Math.abs(quantity),
				openCommission: (position?.openCommission ?? 0) + fill.commission,
				openedAt: position && current !== 0 ? position.openedAt : fill.timestamp,
			},
			closed: null,
		};
	}

	const held = Math.abs(current);
	const closedQuantity = Math.min(held, fill.quantity);
	const exitCommission = fill.commission * (closedQuantity / fill.quantity);
	const entryCommission = position.openCommission * (closedQuantity / held);
	const grossPnl =
		(fill.price - position.averageCost) * closedQuantity * Math.sign(current);
	const commission = exitCommission + entryCommission;

	const closed: ClosedTrade = {
		symbol: fill.symbol,
		side: directionOf(current),
		quantity: closedQuantity,
		entryPrice: position.averageCost,
		exitPrice: fill.price,
		grossPnl,
		commission,
		realizedPnl: grossPnl - commission,
		openedAt: position.openedAt,
		closedAt: fill.timestamp,
		orderId: fill.orderId,
	};

	const remaining = current + delta;
	if (remaining === 0) {
		return { position: null, closed };
	}

	if (Math.sign(remaining) === Math.sign(current)) {
		return {
			position: {
				...position,
				quantity: remaining,
				openCommission: position.openCommission - entryCommission,
			},
			closed,
		};
	}

	return {
		position: {
			symbol: fill.symbol,
			quantity: remaining,
			averageCost: fill.price,
			openCommission: fill.commission - exitCommission,
			openedAt: fill.timestamp,
		},
		closed,
	};
};
