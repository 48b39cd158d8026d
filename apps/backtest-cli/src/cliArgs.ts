import { ConfigurationError } from "@backtide/core";
import { isCsvMode, type CsvMode } from "@backtide/metrics";

export type ArgValue = string | boolean;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.data === undefined) {
		args.data = positionals[0];
	}
	return args;
};

export interface BacktestCliOptions {
	help: boolean;
	dataFiles: string[];
	strategy: string;
	start?: number;
	end?: number;
	riskProfile?: string;
	executionProfile?: string;
	initialCapital?: number;
	json: boolean;
	csv?: CsvMode;
	outDir?: string;
	envPath?: string;
	configDir?: string;
}

const readString = (
	args: Record<string, ArgValue>,
	key: string,
	issues: string[]
): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		issues.push(`--${key} needs a value`);
		return undefined;
	}
	return value;
};

const readFlag = (args: Record<string, ArgValue>, key: string): boolean =>
	args[key] === true || args[key] === "true";

const readTimestamp = (
	args: Record<string, ArgValue>,
	key: string,
	issues: string[]
): number | undefined => {
	const raw = readString(args, key, issues);
	if (raw === undefined) {
		return undefined;
	}
	const ts = Date.parse(raw);
	if (Number.isNaN(ts)) {
		issues.push(`Invalid ${key} timestamp: ${raw}`);
		return undefined;
	}
	return ts;
};

export const parseBacktestCliOptions = (
	args: Record<string, ArgValue>
): BacktestCliOptions => {
	const issues: string[] = [];
	const help = readFlag(args, "help");

	const data = readString(args, "data", issues);
	const dataFiles = (data ?? "")
		.split(",")
		.map((file) => file.trim())
		.filter((file) => file.length > 0);
	const strategy = readString(args, "strategy", issues) ?? "";
	if (!help) {
		if (!dataFiles.length) {
			issues.push("Missing required --data <file[,file]>");
		}
		if (!strategy) {
			issues.push("Missing required --strategy <id>");
		}
	}

	const start = readTimestamp(args, "start", issues);
	const end = readTimestamp(args, "end", issues);
	if (start !== undefined && end !== undefined && start > end) {
		issues.push("--start must not be after --end");
	}

	let initialCapital: number | undefined;
	const rawCapital = readString(args, "initialCapital", issues);
	if (rawCapital !== undefined) {
		initialCapital = Number(rawCapital);
		if (!Number.isFinite(initialCapital)) {
			issues.push(`Invalid numeric value for --initialCapital: ${rawCapital}`);
		}
	}

	let csv: CsvMode | undefined;
	const rawCsv = args.csv;
	if (rawCsv === true) {
		csv = "summary";
	} else if (typeof rawCsv === "string") {
		if (isCsvMode(rawCsv)) {
			csv = rawCsv;
		} else {
			issues.push(`Unknown --csv mode: ${rawCsv}`);
		}
	}

	const options: BacktestCliOptions = {
		help,
		dataFiles,
		strategy,
		start,
		end,
		riskProfile: readString(args, "riskProfile", issues),
		executionProfile: readString(args, "executionProfile", issues),
		initialCapital,
		json: readFlag(args, "json"),
		csv,
		outDir: readString(args, "out", issues),
		envPath: readString(args, "envPath", issues),
		configDir: readString(args, "configDir", issues),
	};
	if (issues.length) {
		throw new ConfigurationError("Invalid command line", issues);
	}
	return options;
};
