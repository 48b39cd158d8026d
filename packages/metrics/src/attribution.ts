import {
	applyFillToPosition,
	signedQuantity,
	type Fill,
	type Position,
	type PositionView,
} from "@backtide/core";

export const UNATTRIBUTED = "unattributed";

export interface StrategyAttribution {
	strategy: string;
	fillCount: number;
	/** Notional of the fills that opened or added to exposure. */
	deployedCapital: number;
	realizedPnl: number;
	unrealizedPnl: number;
	totalPnl: number;
	wins: number;
	losses: number;
	/** Wins over closed trades that won or lost. */
	winRate: number;
	/** Total P&L over deployed capital. */
	returnOnDeployed: number;
	commission: number;
}

export interface AttributionOptions {
	/** Reported first, in this order, even without fills. */
	strategies?: readonly string[];
	/** Open positions at the end of the run, for unrealized P&L. */
	positions?: readonly PositionView[];
}

interface Tally {
	fillCount: number;
	deployedCapital: number;
	realizedPnl: number;
	unrealizedPnl: number;
	wins: number;
	losses: number;
	commission: number;
}

const emptyTally = (): Tally => ({
	fillCount: 0,
	deployedCapital: 0,
	realizedPnl: 0,
	unrealizedPnl: 0,
	wins: 0,
	losses: 0,
	commission: 0,
});

/**
 * Splits a shared run's fills by the strategy that asked for them. Risk exits
 * carry no strategy and count towards the position's owner, the last strategy
 * whose own order filled on that symbol.
 */
export const attributeByStrategy = (
	fills: readonly Fill[],
	options: AttributionOptions = {}
): StrategyAttribution[] => {
	const tallies = new Map<string, Tally>();
	const tallyOf = (name: string): Tally => {
		const existing = tallies.get(name);
		if (existing) {
			return existing;
		}
		const created = emptyTally();
		tallies.set(name, created);
		return created;
	};
	for (const name of options.strategies ?? []) {
		tallyOf(name);
	}

	const positions = new Map<string, Position>();
	const owners = new Map<string, string>();
	for (const fill of fills) {
		const name = fill.order.strategy ?? owners.get(fill.symbol) ?? UNATTRIBUTED;
		const tally = tallyOf(name);
		const previous = positions.get(fill.symbol) ?? null;
		const held = previous?.quantity ?? 0;
		const opening =
			held === 0 || Math.sign(held) === Math.sign(signedQuantity(fill))
				? fill.quantity
				: Math.max(fill.quantity - Math.abs(held), 0);

		tally.fillCount += 1;
		tally.commission += fill.commission;
		tally.deployedCapital += opening * fill.price;

		const { position, closed } = applyFillToPosition(previous, fill);
		if (closed) {
			tally.realizedPnl += closed.realizedPnl;
			if (closed.realizedPnl > 0) {
				tally.wins += 1;
			} else if (closed.realizedPnl < 0) {
				tally.losses += 1;
			}
		}
		if (position) {
			positions.set(fill.symbol, position);
			owners.set(fill.symbol, name);
		} else {
			positions.delete(fill.symbol);
			owners.delete(fill.symbol);
		}
	}

	for (const view of options.positions ?? []) {
		if (view.quantity !== 0) {
			tallyOf(owners.get(view.symbol) ?? UNATTRIBUTED).unrealizedPnl += view.unrealizedPnl;
		}
	}

	return [...tallies].map(([strategy, tally]) => {
		const totalPnl = tally.realizedPnl + tally.unrealizedPnl;
		const decided = tally.wins + tally.losses;
		return {
			strategy,
			...tally,
			totalPnl,
			winRate: decided ? tally.wins / decided : 0,
			returnOnDeployed: tally.deployedCapital > 0 ? totalPnl / tally.deployedCapital : 0,
		};
	});
};
