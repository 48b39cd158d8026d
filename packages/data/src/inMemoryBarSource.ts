import type { Bar, BarSource } from "@backtide/core";

export type BarSeriesInput = Readonly<Record<string, readonly Bar[]>> | readonly Bar[];

/**
 * Bars held in memory per symbol, in the order given. Ordering problems are
 * left for the engine's integrity check to find.
 */
export class InMemoryBarSource implements BarSource {
	private readonly series = new Map<string, Bar[]>();

	constructor(input: BarSeriesInput = []) {
		if (isBarList(input)) {
			for (const bar of input) {
				this.append(bar);
			}
			return;
		}
		for (const [symbol, bars] of Object.entries(input)) {
			for (const bar of bars) {
				this.append({ ...bar, symbol });
			}
		}
	}

	symbols(): string[] {
		return [...this.series.keys()].sort();
	}

	*bars(symbol: string, start: number, end: number): Iterable<Bar> {
		for (const bar of this.series.get(symbol) ?? []) {
			if (bar.timestamp >= start && bar.timestamp <= end) {
				yield { ...bar };
			}
		}
	}

	size(symbol?: string): number {
		if (symbol !== undefined) {
			return this.series.get(symbol)?.length ?? 0;
		}
		let total = 0;
		for (const bars of this.series.values()) {
			total += bars.length;
		}
		return total;
	}

	/** Merges another source's series into a new source. */
	merge(other: InMemoryBarSource): InMemoryBarSource {
		const merged = new InMemoryBarSource();
		for (const source of [this, other]) {
			for (const [symbol, bars] of source.series) {
				for (const bar of bars) {
					merged.append({ ...bar, symbol });
				}
			}
		}
		return merged;
	}

	private append(bar: Bar): void {
		const bars = this.series.get(bar.symbol);
		if (bars) {
			bars.push({ ...bar });
		} else {
			this.series.set(bar.symbol, [{ ...bar }]);
		}
	}
}

const isBarList = (input: BarSeriesInput): input is readonly Bar[] =>
	Array.isArray(input);
