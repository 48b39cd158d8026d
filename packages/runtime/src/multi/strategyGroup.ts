import {
	ConfigurationError,
	InsufficientDataError,
	createLogger,
	type Fill,
	type HistoryView,
	type OrderRequest,
	type Strategy,
} from "@backtide/core";

const logger = createLogger("runtime");

/**
 * Several strategies trading one portfolio. Each order is stamped with the
 * name of the member that asked for it and its fills go back to that member;
 * risk exits go to the member that owns the position.
 */
export class StrategyGroup implements Strategy {
	readonly name: string;
	private readonly owners = new Map<string, Strategy>();

	constructor(readonly members: readonly Strategy[], name?: string) {
		const issues: string[] = [];
		if (!members.length) {
			issues.push("at least one strategy is required");
		}
		const seen = new Set<string>();
		for (const member of members) {
			if (seen.has(member.name)) {
				issues.push(`duplicate strategy name: ${member.name}`);
			}
			seen.add(member.name);
		}
		if (issues.length) {
			throw new ConfigurationError("Invalid strategy group", issues);
		}
		this.name = name ?? members.map((member) => member.name).join("+");
	}

	initialize(): void {
		this.owners.clear();
		for (const member of this.members) {
			member.initialize();
		}
	}

	onData(timestamp: number, history: HistoryView): OrderRequest[] {
		const requests: OrderRequest[] = [];
		for (const member of this.members) {
			try {
				for (const request of member.onData(timestamp, history)) {
					requests.push({ ...request, strategy: member.name });
				}
			} catch (error) {
				if (!(error instanceof InsufficientDataError)) {
					throw error;
				}
				// The other members still trade this tick.
				logger.debug("strategy_member_skipped", {
					strategy: member.name,
					timestamp,
					symbol: error.symbol,
				});
			}
		}
		return requests;
	}

	onFill(fill: Fill): void {
		const requester = this.members.find((member) => member.name === fill.order.strategy);
		if (requester) {
			this.owners.set(fill.symbol, requester);
		}
		(requester ?? this.owners.get(fill.symbol))?.onFill(fill);
	}

	finalize(): void {
		for (const member of this.members) {
			member.finalize();
		}
	}
}
