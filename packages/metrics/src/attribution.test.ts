import { describe, expect, it } from "vitest";
import type { Fill, OrderSide } from "@backtide/core";
import { UNATTRIBUTED, attributeByStrategy } from "./attribution";

const DAY = 86_400_000;

const fillOf = (
	id: string,
	symbol: string,
	side: OrderSide,
	quantity: number,
	price: number,
	commission: number,
	strategy?: string
): Fill => {
	const order = {
		id,
		symbol,
		side,
		quantity,
		type: "market" as const,
		timestamp: DAY,
		forced: strategy === undefined,
		...(strategy !== undefined ? { strategy } : {}),
	};
	return {
		orderId: id,
		order,
		symbol,
		side,
		price,
		quantity,
		commission,
		slippage: 0,
		timestamp: DAY,
	};
};

describe("attributeByStrategy", () => {
	const fills = [
		fillOf("o-1", "AAA", "buy", 10, 100, 1, "trend"),
		fillOf("o-2", "BBB", "buy", 5, 200, 1, "revert"),
		fillOf("o-3", "AAA", "sell", 10, 110, 1, "trend"),
		// stop loss on BBB: no strategy of its own
		fillOf("o-4", "BBB", "sell", 5, 190, 0),
		fillOf("o-5", "AAA", "buy", 4, 100, 0, "revert"),
	];
	const positions = [
		{
			symbol: "AAA",
			quantity: 4,
			averageCost: 100,
			markPrice: 105,
			marketValue: 420,
			unrealizedPnl: 20,
		},
	];

	it("splits fills, realized P&L and deployed capital by strategy", () => {
		const [trend, revert, idle] = attributeByStrategy(fills, {
			strategies: ["trend", "revert", "idle"],
			positions,
		});

		// (110 - 100) * 10 less both commissions
		expect(trend).toEqual({
			strategy: "trend",
			fillCount: 2,
			deployedCapital: 1_000,
			realizedPnl: 98,
			unrealizedPnl: 0,
			totalPnl: 98,
			wins: 1,
			losses: 0,
			winRate: 1,
			returnOnDeployed: 0.098,
			commission: 2,
		});

		// (190 - 200) * 5 less the entry commission, then 4 AAA held at +20
		expect(revert).toMatchObject({
			strategy: "revert",
			fillCount: 3,
			deployedCapital: 1_400,
			realizedPnl: -51,
			unrealizedPnl: 20,
			totalPnl: -31,
			wins: 0,
			losses: 1,
			winRate: 0,
			commission: 1,
		});
		expect(revert.returnOnDeployed).toBeCloseTo(-31 / 1_400, 12);

		expect(idle).toMatchObject({ strategy: "idle", fillCount: 0, totalPnl: 0, returnOnDeployed: 0 });
	});

	it("books exits without an owner as unattributed", () => {
		const [entry] = attributeByStrategy([fillOf("o-1", "AAA", "sell", 3, 50, 0)]);
		expect(entry.strategy).toBe(UNATTRIBUTED);
		expect(entry.deployedCapital).toBe(150);
	});

	it("counts only the opening part of a flip as deployed", () => {
		const [entry] = attributeByStrategy([
			fillOf("o-1", "AAA", "buy", 10, 10, 0, "swing"),
			fillOf("o-2", "AAA", "sell", 15, 12, 0, "swing"),
		]);
		// 10 * 10 long, then 5 * 12 short
		expect(entry.deployedCapital).toBe(160);
		expect(entry.realizedPnl).toBe(20);
		expect(entry.wins).toBe(1);
	});
});
