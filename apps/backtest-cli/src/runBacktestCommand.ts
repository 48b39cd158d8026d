import fs from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import process from "node:process";
import {
	ConfigurationError,
	createLogger,
	loadEnvConfig,
	loadExecutionSettings,
	loadRiskSettings,
	loadStrategyConfig,
	type BarSource,
	type StrategyConfig,
} from "@backtide/core";
import { loadBarSource } from "@backtide/data";
import { formatResultCsv } from "@backtide/metrics";
import { BacktestEngine, type BacktestResult } from "@backtide/runtime";
import { createStrategy, isRegisteredStrategyId } from "@backtide/strategy-engine";
import type { BacktestCliOptions } from "./cliArgs";

const logger = createLogger("backtest-cli");

export interface BacktestCommandOutput {
	result: BacktestResult;
	jsonPath: string;
	csvPath?: string;
}

/**
 * `--strategy` names a profile under config/strategies, or a registered
 * strategy id run with its default params.
 */
export const resolveStrategyConfig = (
	configDir: string,
	name: string
): StrategyConfig => {
	const profilePath = path.join(configDir, "strategies", `${name}.json`);
	if (!fs.existsSync(profilePath) && isRegisteredStrategyId(name)) {
		return { id: name, params: {} };
	}
	return loadStrategyConfig(configDir, name);
};

export const findTimeRange = (
	source: BarSource
): { start: number; end: number } | null => {
	let start = Number.POSITIVE_INFINITY;
	let end = Number.NEGATIVE_INFINITY;
	for (const symbol of source.symbols()) {
		for (const bar of source.bars(symbol, -Infinity, Infinity)) {
			if (!Number.isFinite(bar.timestamp)) {
				continue;
			}
			start = Math.min(start, bar.timestamp);
			end = Math.max(end, bar.timestamp);
		}
	}
	return Number.isFinite(start) ? { start, end } : null;
};

const fileStamp = (now: Date): string => now.toISOString().replace(/[:.]/g, "-");

/**
 * Pretty JSON in which non-finite numbers (a profit factor with no losing
 * trades is Infinity) are written as "Infinity", "-Infinity" or "NaN"
 * rather than null.
 */
export const serializeResult = (value: unknown): string =>
	JSON.stringify(
		value,
		(_key, item: unknown) =>
			typeof item === "number" && !Number.isFinite(item) ? String(item) : item,
		2
	);

export const runBacktestCommand = async (
	options: BacktestCliOptions,
	now: Date = new Date()
): Promise<BacktestCommandOutput> => {
	const env = loadEnvConfig(options.envPath);
	const configDir = options.configDir ?? env.configDir;
	const profiles = {
		riskProfile: options.riskProfile ?? env.riskProfile,
		executionProfile: options.executionProfile ?? env.executionProfile,
		strategyProfile: options.strategy,
	};
	const risk = loadRiskSettings(configDir, profiles.riskProfile);
	const execution = loadExecutionSettings(configDir, profiles.executionProfile);
	const strategyConfig = resolveStrategyConfig(configDir, options.strategy);
	const strategy = createStrategy(strategyConfig);

	const source = await loadBarSource(options.dataFiles);
	const range = findTimeRange(source);
	if (!range) {
		throw new ConfigurationError("No bars with a usable timestamp were loaded", options.dataFiles);
	}
	const start = options.start ?? range.start;
	const end = options.end ?? range.end;

	const engine = new BacktestEngine({
		initialCapital: options.initialCapital ?? env.initialCapital,
		riskFreeRate: env.riskFreeRate,
		risk,
		execution,
	});
	logger.info("backtest_cli_started", {
		strategyId: strategyConfig.id,
		dataFiles: options.dataFiles,
		start: new Date(start).toISOString(),
		end: new Date(end).toISOString(),
		...profiles,
	});
	const result = await engine.runAsync(strategy, source, start, end);

	const outputDir = path.resolve(
		options.outDir ?? path.join(process.cwd(), "output", "backtests")
	);
	fs.mkdirSync(outputDir, { recursive: true });
	const fingerprint = createHash("sha1")
		.update(JSON.stringify({ strategyConfig, profiles, risk, execution }))
		.digest("hex")
		.slice(0, 12);
	const baseName = `${strategyConfig.id}-${fileStamp(now)}`;
	const jsonPath = path.join(outputDir, `${baseName}.json`);
	fs.writeFileSync(
		jsonPath,
		serializeResult({
			...result,
			metadata: {
				strategyId: strategyConfig.id,
				dataFiles: options.dataFiles,
				profiles,
				configFingerprint: fingerprint,
			},
		})
	);

	let csvPath: string | undefined;
	if (options.csv) {
		csvPath = path.join(outputDir, `${baseName}-${options.csv}.csv`);
		fs.writeFileSync(csvPath, `${formatResultCsv(result, options.csv)}\n`);
	}
	logger.info("backtest_cli_saved", { jsonPath, csvPath, fingerprint });
	return { result, jsonPath, csvPath };
};
