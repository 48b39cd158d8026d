import type { Bar, Fill, OrderRequest } from "./types";

/**
 * Read-only view of the bars a strategy may see at one tick. Every bar it
 * hands out has `timestamp <= asOf`; arrays are fresh copies.
 */
export interface HistoryView {
	readonly asOf: number;
	symbols(): string[];
	has(symbol: string): boolean;
	length(symbol: string): number;
	bars(symbol: string): Bar[];
	latest(symbol: string): Bar | undefined;
	/** Last `size` bars; throws InsufficientDataError when fewer exist. */
	window(symbol: string, size: number): Bar[];
	/** Closes of the last `size` bars (all visible bars when omitted). */
	closes(symbol: string, size?: number): number[];
}

export interface Strategy {
	readonly name: string;
	initialize(): void;
	onData(timestamp: number, history: HistoryView): OrderRequest[];
	onFill(fill: Fill): void;
	finalize(): void;
}

/**
 * Restartable, finite, ordered bar supply. Each call to `bars` starts a new
 * pass over the symbol's series within [start, end].
 */
export interface BarSource {
	symbols(): string[];
	bars(symbol: string, start: number, end: number): Iterable<Bar>;
}
