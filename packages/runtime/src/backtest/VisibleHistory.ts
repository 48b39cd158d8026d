import { InsufficientDataError, type Bar, type HistoryView } from "@backtide/core";

export interface HistoryShortfall {
	symbol: string;
	requested: number;
	available: number;
}

const readWindow = (
	frame: readonly Bar[],
	symbol: string,
	size: number,
	onShortfall: (shortfall: HistoryShortfall) => void
): Bar[] => {
	if (!Number.isInteger(size) || size < 1) {
		throw new RangeError(`Window size must be a positive integer, got ${size}`);
	}
	if (frame.length < size) {
		onShortfall({ symbol, requested: size, available: frame.length });
		throw new InsufficientDataError(symbol, size, frame.length);
	}
	return frame.slice(frame.length - size);
};

/**
 * The history as it stood at one tick. Buffers only grow, so pinning each
 * symbol's length keeps a retained view from seeing later bars.
 */
class PinnedHistory implements HistoryView {
	constructor(
		readonly asOf: number,
		private readonly frames: ReadonlyMap<string, readonly Bar[]>,
		private readonly lengths: ReadonlyMap<string, number>,
		private readonly onShortfall: (shortfall: HistoryShortfall) => void
	) {}

	symbols(): string[] {
		return [...this.lengths.keys()].sort();
	}

	has(symbol: string): boolean {
		return this.length(symbol) > 0;
	}

	length(symbol: string): number {
		return this.lengths.get(symbol) ?? 0;
	}

	bars(symbol: string): Bar[] {
		return this.frame(symbol);
	}

	latest(symbol: string): Bar | undefined {
		const size = this.length(symbol);
		return size ? this.frames.get(symbol)?.[size - 1] : undefined;
	}

	window(symbol: string, size: number): Bar[] {
		return readWindow(this.frame(symbol), symbol, size, this.onShortfall);
	}

	closes(symbol: string, size?: number): number[] {
		const bars = size === undefined ? this.bars(symbol) : this.window(symbol, size);
		return bars.map((bar) => bar.close);
	}

	private frame(symbol: string): Bar[] {
		return (this.frames.get(symbol) ?? []).slice(0, this.length(symbol));
	}
}

/**
 * Per-symbol bar buffers that only ever hold bars the engine has admitted.
 * The engine appends a tick's bars after advancing `asOf`, so nothing with a
 * later timestamp can be read from here.
 */
export class VisibleHistory implements HistoryView {
	private readonly frames = new Map<string, Bar[]>();
	private readonly shortfalls: HistoryShortfall[] = [];
	private cursor = Number.NEGATIVE_INFINITY;
	private readonly recordShortfall = (shortfall: HistoryShortfall): void => {
		this.shortfalls.push(shortfall);
	};

	constructor(symbols: string[] = []) {
		for (const symbol of symbols) {
			this.frames.set(symbol, []);
		}
	}

	get asOf(): number {
		return this.cursor;
	}

	advance(timestamp: number): void {
		if (timestamp < this.cursor) {
			throw new Error(`History cannot move back from ${this.cursor} to ${timestamp}`);
		}
		this.cursor = timestamp;
	}

	append(bar: Bar): void {
		if (bar.timestamp > this.cursor) {
			throw new Error(
				`Bar for ${bar.symbol} at ${bar.timestamp} is ahead of the history cursor ${this.cursor}`
			);
		}
		const frozen = Object.freeze({ ...bar });
		const frame = this.frames.get(bar.symbol);
		if (frame) {
			frame.push(frozen);
		} else {
			this.frames.set(bar.symbol, [frozen]);
		}
	}

	symbols(): string[] {
		return [...this.frames.keys()].sort();
	}

	has(symbol: string): boolean {
		return (this.frames.get(symbol)?.length ?? 0) > 0;
	}

	length(symbol: string): number {
		return this.frames.get(symbol)?.length ?? 0;
	}

	bars(symbol: string): Bar[] {
		return [...(this.frames.get(symbol) ?? [])];
	}

	latest(symbol: string): Bar | undefined {
		return this.frames.get(symbol)?.at(-1);
	}

	window(symbol: string, size: number): Bar[] {
		return readWindow(this.frames.get(symbol) ?? [], symbol, size, this.recordShortfall);
	}

	closes(symbol: string, size?: number): number[] {
		const bars = size === undefined ? this.bars(symbol) : this.window(symbol, size);
		return bars.map((bar) => bar.close);
	}

	/**
	 * Read-only view pinned to the current tick. Window shortfalls on it are
	 * recorded here as well.
	 */
	view(): HistoryView {
		const lengths = new Map<string, number>();
		for (const [symbol, frame] of this.frames) {
			lengths.set(symbol, frame.length);
		}
		return new PinnedHistory(this.cursor, this.frames, lengths, this.recordShortfall);
	}

	/** Shortfalls recorded since the last call, oldest first. */
	drainShortfalls(): HistoryShortfall[] {
		return this.shortfalls.splice(0, this.shortfalls.length);
	}
}
