#!/usr/bin/env tsx

import path from "node:path";
import process from "node:process";
import { CSV_MODES } from "@backtide/metrics";
import { getRegisteredStrategyIds } from "@backtide/strategy-engine";
import { parseBacktestCliOptions, parseCliArgs } from "./cliArgs";
import { runBacktestCommand, serializeResult } from "./runBacktestCommand";

const USAGE = `Usage:
  npm run backtest -- --data <file[,file]> --strategy <id> [options]

Options:
  --data <files>             Comma separated CSV or JSON bar files (required)
  --strategy <id>            Strategy profile under config/strategies or a
                             registered id: ${getRegisteredStrategyIds().join(", ")}
  --start <iso>              First tick (defaults to the earliest bar)
  --end <iso>                Last tick (defaults to the latest bar)
  --riskProfile <id>         Risk profile under config/risk
  --executionProfile <id>    Execution profile under config/execution
  --initialCapital <usd>     Starting cash
  --json                     Print the full JSON result
  --csv [mode]               Also write a CSV (${CSV_MODES.join(", ")})
  --out <dir>                Output directory (default output/backtests)
  --envPath <path>           Custom .env path
  --configDir <path>         Custom config directory
  --help                     Show this message
`;

const formatPct = (value: number): string => `${(value * 100).toFixed(2)}%`;

const main = async (): Promise<void> => {
	const options = parseBacktestCliOptions(parseCliArgs(process.argv.slice(2)));
	if (options.help) {
		console.log(USAGE);
		return;
	}

	console.log(`Running backtest for ${options.dataFiles.join(", ")} (${options.strategy})...`);
	const { result, jsonPath, csvPath } = await runBacktestCommand(options);
	const { metrics } = result;

	if (options.json) {
		console.log(serializeResult(result));
	} else {
		console.log("---- Summary ----");
		console.log(`Status: ${result.status}`);
		console.log(`Ticks: ${result.ticks}`);
		console.log(`Fills: ${metrics.fillCount}, closed trades: ${metrics.trades.tradeCount}`);
		console.log(`Starting equity: $${metrics.initialEquity.toFixed(2)}`);
		console.log(`Final equity: $${metrics.finalEquity.toFixed(2)}`);
		console.log(`Total return: ${formatPct(metrics.totalReturn)}`);
		console.log(`Sharpe: ${metrics.sharpe.toFixed(3)}, Sortino: ${metrics.sortino.toFixed(3)}`);
		console.log(`Max drawdown: ${formatPct(metrics.maxDrawdown)}`);
		if (result.circuitBreaker.state === "TRIPPED") {
			console.log("Circuit breaker tripped; open positions were liquidated.");
		}
	}

	const saved = [jsonPath, csvPath].filter((file): file is string => file !== undefined);
	for (const file of saved) {
		console.log(`📤 Backtest saved to ${path.relative(process.cwd(), file) || file}`);
	}
};

main().catch((error: unknown) => {
	console.error("Backtest failed:", error instanceof Error ? error.message : error);
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
