import { promises as fs } from "node:fs";
import path from "node:path";
import {
	ConfigurationError,
	createLogger,
	isRecord,
	type Bar,
} from "@backtide/core";
import { InMemoryBarSource } from "./inMemoryBarSource";

const logger = createLogger("data");

const TIMESTAMP_COLUMNS = ["timestamp", "date", "datetime", "time"];
const PRICE_COLUMNS = ["open", "high", "low", "close"] as const;
// Epoch values below this are read as seconds.
const SECONDS_CUTOFF = 100_000_000_000;

export interface ParseBarsOptions {
	/** Used when rows carry no symbol column. */
	symbol?: string;
}

/**
 * Epoch seconds, epoch milliseconds or an ISO date. Unparseable input gives
 * NaN, which the engine's integrity check rejects.
 */
export const parseTimestamp = (raw: unknown): number => {
	if (typeof raw === "number") {
		return Math.abs(raw) < SECONDS_CUTOFF ? raw * 1000 : raw;
	}
	if (typeof raw !== "string") {
		return Number.NaN;
	}
	const trimmed = raw.trim();
	if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
		return parseTimestamp(Number(trimmed));
	}
	return Date.parse(trimmed);
};

const parseNumber = (raw: unknown): number => {
	if (typeof raw === "number") {
		return raw;
	}
	if (typeof raw === "string" && raw.trim().length) {
		return Number(raw.trim());
	}
	return Number.NaN;
};

// A blank volume reads the same as a missing volume column.
const parseVolume = (raw: unknown): number =>
	raw === undefined || raw === null || (typeof raw === "string" && !raw.trim().length)
		? 0
		: parseNumber(raw);

const splitCsvLine = (line: string): string[] => {
	const cells: string[] = [];
	let current = "";
	let quoted = false;
	for (let i = 0; i < line.length; i += 1) {
		const char = line[i];
		if (char === '"') {
			if (quoted && line[i + 1] === '"') {
				current += '"';
				i += 1;
			} else {
				quoted = !quoted;
			}
		} else if (char === "," && !quoted) {
			cells.push(current);
			current = "";
		} else {
			current += char;
		}
	}
	cells.push(current);
	return cells.map((cell) => cell.trim());
};

export const parseBarCsv = (text: string, options: ParseBarsOptions = {}): Bar[] => {
	const lines = text
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0 && !line.startsWith("#"));
	if (!lines.length) {
		return [];
	}

	const header = splitCsvLine(lines[0]).map((cell) => cell.toLowerCase());
	const timestampIndex = header.findIndex((cell) => TIMESTAMP_COLUMNS.includes(cell));
	const symbolIndex = header.indexOf("symbol");
	const volumeIndex = header.indexOf("volume");
	const priceIndexes = PRICE_COLUMNS.map((column) => header.indexOf(column));

	const issues: string[] = [];
	if (timestampIndex < 0) {
		issues.push(`missing a timestamp column (${TIMESTAMP_COLUMNS.join("/")})`);
	}
	PRICE_COLUMNS.forEach((column, index) => {
		if (priceIndexes[index] < 0) {
			issues.push(`missing column "${column}"`);
		}
	});
	if (symbolIndex < 0 && !options.symbol) {
		issues.push("no symbol column and no symbol given");
	}
	if (issues.length) {
		throw new ConfigurationError("Unreadable bar CSV", issues);
	}

	const [openIndex, highIndex, lowIndex, closeIndex] = priceIndexes;
	return lines.slice(1).map((line) => {
		const cells = splitCsvLine(line);
		return {
			symbol: (symbolIndex >= 0 ? cells[symbolIndex] : undefined) || options.symbol || "",
			timestamp: parseTimestamp(cells[timestampIndex]),
			open: parseNumber(cells[openIndex]),
			high: parseNumber(cells[highIndex]),
			low: parseNumber(cells[lowIndex]),
			close: parseNumber(cells[closeIndex]),
			volume: volumeIndex >= 0 ? parseVolume(cells[volumeIndex]) : 0,
		};
	});
};

const barFromRecord = (
	record: Record<string, unknown>,
	fallbackSymbol: string | undefined
): Bar => {
	const rawTimestamp =
		TIMESTAMP_COLUMNS.map((column) => record[column]).find(
			(value) => value !== undefined
		);
	const symbol = typeof record.symbol === "string" ? record.symbol : fallbackSymbol;
	return {
		symbol: symbol ?? "",
		timestamp: parseTimestamp(rawTimestamp),
		open: parseNumber(record.open),
		high: parseNumber(record.high),
		low: parseNumber(record.low),
		close: parseNumber(record.close),
		volume: parseVolume(record.volume),
	};
};

/**
 * Accepts an array of bar objects, or an object keyed by symbol whose values
 * are arrays of bar objects.
 */
export const parseBarJson = (text: string, options: ParseBarsOptions = {}): Bar[] => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		throw new ConfigurationError("Unreadable bar JSON", [
			error instanceof Error ? error.message : String(error),
		]);
	}

	const fromList = (list: unknown[], symbol: string | undefined): Bar[] =>
		list.map((entry, index) => {
			if (!isRecord(entry)) {
				throw new ConfigurationError("Unreadable bar JSON", [
					`entry ${index} is not an object`,
				]);
			}
			return barFromRecord(entry, symbol);
		});

	if (Array.isArray(parsed)) {
		return fromList(parsed, options.symbol);
	}
	if (isRecord(parsed)) {
		const bars: Bar[] = [];
		for (const [symbol, list] of Object.entries(parsed)) {
			if (!Array.isArray(list)) {
				throw new ConfigurationError("Unreadable bar JSON", [
					`"${symbol}" must map to an array of bars`,
				]);
			}
			bars.push(...fromList(list, symbol));
		}
		return bars;
	}
	throw new ConfigurationError("Unreadable bar JSON", [
		"expected an array or an object keyed by symbol",
	]);
};

/** `AAA.csv` and `AAA_daily.json` both default to symbol `AAA`. */
export const symbolFromPath = (filePath: string): string =>
	path.basename(filePath, path.extname(filePath)).split(/[_\s]/)[0].toUpperCase();

export const loadBarFile = async (
	filePath: string,
	options: ParseBarsOptions = {}
): Promise<Bar[]> => {
	let text: string;
	try {
		text = await fs.readFile(filePath, "utf-8");
	} catch (error) {
		throw new ConfigurationError(`Bar file not readable: ${filePath}`, [
			error instanceof Error ? error.message : String(error),
		]);
	}
	const symbol = options.symbol ?? symbolFromPath(filePath);
	const bars =
		path.extname(filePath).toLowerCase() === ".json"
			? parseBarJson(text, { symbol })
			: parseBarCsv(text, { symbol });
	logger.info("bar_file_loaded", {
		path: filePath,
		bars: bars.length,
		symbols: [...new Set(bars.map((bar) => bar.symbol))],
	});
	return bars;
};

export const loadBarSource = async (filePaths: string[]): Promise<InMemoryBarSource> => {
	const batches = await Promise.all(filePaths.map((filePath) => loadBarFile(filePath)));
	return new InMemoryBarSource(batches.flat());
};
