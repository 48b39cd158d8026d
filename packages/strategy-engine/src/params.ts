import { ConfigurationError } from "@backtide/core";

export type StrategyParams = Readonly<Record<string, unknown>>;

/** Collects problems instead of throwing on the first one. */
export class ParamReader {
	private readonly issues: string[] = [];

	constructor(
		private readonly strategyId: string,
		private readonly params: StrategyParams
	) {}

	number(key: string, fallback: number, check?: (value: number) => string | null): number {
		const raw = this.params[key];
		if (raw === undefined) {
			return fallback;
		}
		if (typeof raw !== "number" || !Number.isFinite(raw)) {
			this.issues.push(`${key} must be a number`);
			return fallback;
		}
		const problem = check?.(raw);
		if (problem) {
			this.issues.push(`${key} ${problem}, got ${raw}`);
		}
		return raw;
	}

	choice<T extends string>(key: string, options: readonly T[], fallback: T): T {
		const raw = this.params[key];
		if (raw === undefined) {
			return fallback;
		}
		const match = options.find((option) => option === raw);
		if (match === undefined) {
			this.issues.push(`${key} must be one of ${options.join(", ")}`);
			return fallback;
		}
		return match;
	}

	boolean(key: string, fallback: boolean): boolean {
		const raw = this.params[key];
		if (raw === undefined) {
			return fallback;
		}
		if (typeof raw !== "boolean") {
			this.issues.push(`${key} must be a boolean`);
			return fallback;
		}
		return raw;
	}

	require(condition: boolean, issue: string): void {
		if (!condition) {
			this.issues.push(issue);
		}
	}

	done(): void {
		if (this.issues.length) {
			throw new ConfigurationError(`Invalid ${this.strategyId} params`, this.issues);
		}
	}
}

export const positiveInteger = (value: number): string | null =>
	Number.isInteger(value) && value >= 1 ? null : "must be a positive integer";

export const positive = (value: number): string | null =>
	value > 0 ? null : "must be positive";
