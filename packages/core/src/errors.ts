import type { RiskDecision } from "./types";

export type BacktestErrorCode =
	| "INSUFFICIENT_DATA"
	| "ORDER_REJECTED"
	| "DATA_INTEGRITY"
	| "CONFIGURATION";

export interface BacktestErrorOptions {
	symbol?: string;
	details?: Record<string, unknown>;
	cause?: unknown;
}

export class BacktestError extends Error {
	readonly code: BacktestErrorCode;
	readonly symbol?: string;
	readonly details: Record<string, unknown>;

	constructor(
		code: BacktestErrorCode,
		message: string,
		options: BacktestErrorOptions = {}
	) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = new.target.name;
		this.code = code;
		this.symbol = options.symbol;
		this.details = options.details ?? {};
	}
}

/**
 * A strategy asked for more history than the symbol has at this tick.
 * The engine drops that symbol's orders for the tick and keeps running.
 */
export class InsufficientDataError extends BacktestError {
	readonly requested: number;
	readonly available: number;

	constructor(symbol: string, requested: number, available: number) {
		super(
			"INSUFFICIENT_DATA",
			`Lookback of ${requested} bars requested for ${symbol}, ${available} available`,
			{ symbol, details: { requested, available } }
		);
		this.requested = requested;
		this.available = available;
	}
}

export class OrderRejectedError extends BacktestError {
	readonly decision: RiskDecision;

	constructor(decision: RiskDecision) {
		super(
			"ORDER_REJECTED",
			`Order ${decision.orderId} rejected: ${decision.reason}`,
			{ symbol: decision.order.symbol, details: decision.details }
		);
		this.decision = decision;
	}
}

/** Corrupt bar data. Fatal for the symbol only. */
export class DataIntegrityError extends BacktestError {
	readonly timestamp: number;

	constructor(symbol: string, timestamp: number, reason: string) {
		super("DATA_INTEGRITY", `Bad bar for ${symbol} at ${timestamp}: ${reason}`, {
			symbol,
			details: { timestamp, reason },
		});
		this.timestamp = timestamp;
	}
}

/** Invalid settings. Raised before the first tick runs. */
export class ConfigurationError extends BacktestError {
	readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super("CONFIGURATION", issues.length ? `${message}: ${issues.join("; ")}` : message, {
			details: { issues },
		});
		this.issues = issues;
	}
}

export const describeError = (value: unknown): string =>
	value instanceof Error ? value.message : String(value);
