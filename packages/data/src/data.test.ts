import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { ConfigurationError, type Bar } from "@backtide/core";
import {
	InMemoryBarSource,
	loadBarFile,
	loadBarSource,
	parseBarCsv,
	parseBarJson,
	parseTimestamp,
	symbolFromPath,
} from "./index";

const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), "__tests__", "fixtures");
const JAN_2 = 1_704_153_600_000;
const DAY_MS = 86_400_000;

const bar = (symbol: string, timestamp: number, close: number): Bar => ({
	symbol,
	timestamp,
	open: close,
	high: close,
	low: close,
	close,
	volume: 100,
});

describe("InMemoryBarSource", () => {
	it("groups bars by symbol and lists symbols sorted", () => {
		const source = new InMemoryBarSource([bar("BBB", 1, 10), bar("AAA", 1, 5), bar("BBB", 2, 11)]);
		expect(source.symbols()).toEqual(["AAA", "BBB"]);
		expect(source.size()).toBe(3);
		expect(source.size("BBB")).toBe(2);
	});

	it("yields the inclusive range on every pass", () => {
		const source = new InMemoryBarSource({ AAA: [bar("x", 1, 1), bar("x", 2, 2), bar("x", 3, 3)] });
		const first = [...source.bars("AAA", 2, 3)].map((item) => item.close);
		const second = [...source.bars("AAA", 2, 3)].map((item) => item.close);
		expect(first).toEqual([2, 3]);
		expect(second).toEqual([2, 3]);
		expect([...source.bars("AAA", 1, 1)][0].symbol).toBe("AAA");
	});

	it("hands out copies", () => {
		const source = new InMemoryBarSource([bar("AAA", 1, 10)]);
		const [first] = [...source.bars("AAA", 0, 10)];
		first.close = 999;
		expect([...source.bars("AAA", 0, 10)][0].close).toBe(10);
	});

	it("keeps input order so the engine can detect disorder", () => {
		const source = new InMemoryBarSource([bar("AAA", 2, 2), bar("AAA", 1, 1)]);
		expect([...source.bars("AAA", 0, 5)].map((item) => item.timestamp)).toEqual([2, 1]);
	});

	it("merges into a new source", () => {
		const left = new InMemoryBarSource([bar("AAA", 1, 1)]);
		const right = new InMemoryBarSource([bar("AAA", 2, 2), bar("BBB", 1, 3)]);
		const merged = left.merge(right);
		expect(merged.size("AAA")).toBe(2);
		expect(merged.symbols()).toEqual(["AAA", "BBB"]);
		expect(left.size()).toBe(1);
	});

	it("returns nothing for unknown symbols", () => {
		expect([...new InMemoryBarSource().bars("ZZZ", 0, 10)]).toEqual([]);
	});
});

describe("parseTimestamp", () => {
	it("reads epoch seconds, epoch milliseconds and ISO dates", () => {
		expect(parseTimestamp(1_704_153_600)).toBe(JAN_2);
		expect(parseTimestamp("1704153600")).toBe(JAN_2);
		expect(parseTimestamp(JAN_2)).toBe(JAN_2);
		expect(parseTimestamp("2024-01-02")).toBe(JAN_2);
		expect(parseTimestamp("2024-01-02T00:00:00Z")).toBe(JAN_2);
	});

	it("gives NaN for anything else", () => {
		expect(parseTimestamp("yesterday")).toBeNaN();
		expect(parseTimestamp(undefined)).toBeNaN();
	});
});

describe("parseBarCsv", () => {
	it("maps header columns case-insensitively and tolerates column order", () => {
		const bars = parseBarCsv(
			"Close,Symbol,Timestamp,Open,High,Low,Volume\n10.5,AAA,1704153600,10,11,9.5,42",
		);
		expect(bars).toEqual([
			{ symbol: "AAA", timestamp: JAN_2, open: 10, high: 11, low: 9.5, close: 10.5, volume: 42 },
		]);
	});

	it("uses the fallback symbol and a zero volume when columns are absent", () => {
		const [only] = parseBarCsv("time,open,high,low,close\n1704153600,1,2,0.5,1.5", { symbol: "QQQ" });
		expect(only.symbol).toBe("QQQ");
		expect(only.volume).toBe(0);
	});

	it("reads a blank volume cell as zero and a garbled one as NaN", () => {
		const bars = parseBarCsv("timestamp,open,high,low,close,volume\n1704153600,1,2,0.5,1.5,\n1704240000,1,2,0.5,1.5,lots", {
			symbol: "AAA",
		});
		expect(bars[0].volume).toBe(0);
		expect(bars[1].volume).toBeNaN();
		expect(parseBarJson('[{"symbol":"AAA","timestamp":1,"open":1,"high":1,"low":1,"close":1,"volume":null}]')[0].volume).toBe(0);
	});

	it("leaves unparseable cells as NaN", () => {
		const [only] = parseBarCsv("timestamp,open,high,low,close\n1704153600,abc,2,,1.5", { symbol: "AAA" });
		expect(only.open).toBeNaN();
		expect(only.low).toBeNaN();
		expect(only.close).toBe(1.5);
	});

	it("rejects headers without the required columns", () => {
		expect(() => parseBarCsv("timestamp,open,high,close\n1,1,1,1")).toThrowError(ConfigurationError);
		try {
			parseBarCsv("timestamp,open,high,close\n1,1,1,1");
		} catch (error) {
			expect(error instanceof ConfigurationError ? error.issues : []).toEqual([
				'missing column "low"',
				"no symbol column and no symbol given",
			]);
		}
	});

	it("returns nothing for an empty document", () => {
		expect(parseBarCsv("\n\n")).toEqual([]);
	});
});

describe("parseBarJson", () => {
	it("reads a flat list of bars", () => {
		const bars = parseBarJson(
			'[{"symbol":"AAA","date":"2024-01-02","open":1,"high":2,"low":0.5,"close":1.5,"volume":7}]',
		);
		expect(bars[0]).toEqual({
			symbol: "AAA",
			timestamp: JAN_2,
			open: 1,
			high: 2,
			low: 0.5,
			close: 1.5,
			volume: 7,
		});
	});

	it("rejects malformed documents", () => {
		expect(() => parseBarJson("{")).toThrowError(ConfigurationError);
		expect(() => parseBarJson("42")).toThrowError(/expected an array/);
		expect(() => parseBarJson('{"AAA": 1}')).toThrowError(/"AAA" must map to an array/);
		expect(() => parseBarJson("[1]")).toThrowError(/entry 0 is not an object/);
	});
});

describe("bar files", () => {
	it("derives the symbol from the file name", () => {
		expect(symbolFromPath("/data/aaa.csv")).toBe("AAA");
		expect(symbolFromPath("BBB_daily.json")).toBe("BBB");
	});

	it("loads a CSV file with comments and ISO dates", async () => {
		const bars = await loadBarFile(path.join(FIXTURES, "AAA.csv"));
		expect(bars).toHaveLength(3);
		expect(bars.map((item) => item.timestamp)).toEqual([JAN_2, JAN_2 + DAY_MS, JAN_2 + 2 * DAY_MS]);
		expect(bars[1]).toMatchObject({ symbol: "AAA", open: 101, high: 104, low: 100.5, close: 103, volume: 1200 });
	});

	it("loads a JSON file keyed by symbol", async () => {
		const bars = await loadBarFile(path.join(FIXTURES, "multi.json"));
		expect(bars.map((item) => item.symbol)).toEqual(["BBB", "BBB", "CCC"]);
		expect(bars[1].volume).toBe(0);
		expect(bars[2].timestamp).toBe(JAN_2);
	});

	it("combines several files into one source", async () => {
		const source = await loadBarSource([
			path.join(FIXTURES, "AAA.csv"),
			path.join(FIXTURES, "multi.json"),
		]);
		expect(source.symbols()).toEqual(["AAA", "BBB", "CCC"]);
		expect(source.size()).toBe(6);
	});

	it("reports missing and malformed files as configuration errors", async () => {
		await expect(loadBarFile(path.join(FIXTURES, "absent.csv"))).rejects.toThrowError(
			/Bar file not readable/,
		);
		await expect(loadBarFile(path.join(FIXTURES, "broken.csv"))).rejects.toThrowError(
			/missing column "low"/,
		);
	});
});
