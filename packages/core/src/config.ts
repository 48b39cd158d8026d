import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigurationError } from "./errors";
import type { ExecutionSettings, RiskSettings } from "./types";

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("backtide.config.meta");

export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isConfigMetadata = (value: unknown): value is ConfigMetadata =>
	isRecord(value) && typeof value.source === "string";

const readConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	return isConfigMetadata(meta) ? meta : null;
};

const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = readConfigMetadata(config);
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...existing, ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null =>
	readConfigMetadata(config);

export const DEFAULT_RISK_SETTINGS: Readonly<RiskSettings> = Object.freeze({
	maxPortfolioDrawdown: 0.12,
	maxPositionSize: 0.1,
	minCashRatio: 0.2,
	maxCashRatio: 0.8,
	maxConcurrentPositions: 10,
	maxCorrelation: 0.8,
	maxCorrelatedPairs: 1,
	correlationLookback: 20,
	positionStopLoss: 0.05,
	enableCircuitBreaker: true,
	enableVolatilityTargeting: false,
	volatilityTarget: 0.15,
	volatilityLookback: 20,
});

const DEFAULT_EXECUTION_SETTINGS: Readonly<ExecutionSettings> =
	Object.freeze({
		slippagePct: 0.0005,
		commissionPct: 0.001,
	});

let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [".git", path.join("config", "risk")];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

const getDefaultEnvPath = (): string => path.join(findWorkspaceRoot(), ".env");

const getDefaultConfigDir = (): string => {
	const fromEnv = readOptionalEnvVar("BACKTIDE_CONFIG_DIR");
	if (fromEnv) {
		return path.isAbsolute(fromEnv)
			? fromEnv
			: path.join(findWorkspaceRoot(), fromEnv);
	}
	return path.join(findWorkspaceRoot(), "config");
};

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readNumericEnvVar = (key: string, fallback: number): number => {
	const raw = readOptionalEnvVar(key);
	if (raw === undefined) {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ConfigurationError(`Environment variable ${key} must be numeric`, [
			`${key}=${raw}`,
		]);
	}
	return value;
};

const readJsonRecord = (filePath: string): Record<string, unknown> => {
	if (!fs.existsSync(filePath)) {
		throw new ConfigurationError(`Config file not found: ${filePath}`);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		throw new ConfigurationError(`Config file is not valid JSON: ${filePath}`, [
			error instanceof Error ? error.message : String(error),
		]);
	}
	if (!isRecord(parsed)) {
		throw new ConfigurationError(`Config file must hold an object: ${filePath}`);
	}
	return parsed;
};

export interface EnvConfig {
	configDir: string;
	riskProfile: string;
	executionProfile: string;
	initialCapital: number;
	riskFreeRate: number;
}

export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		loadedEnvPath = envPath;
	}

	return {
		configDir: getDefaultConfigDir(),
		riskProfile: readOptionalEnvVar("RISK_PROFILE") ?? "conservative",
		executionProfile: readOptionalEnvVar("EXECUTION_PROFILE") ?? "default",
		initialCapital: readNumericEnvVar("INITIAL_CAPITAL", 100_000),
		riskFreeRate: readNumericEnvVar("RISK_FREE_RATE", 0.02),
	};
};

// Older profile files used these names.
const RISK_FIELD_ALIASES: Record<string, keyof RiskSettings> = {
	maxPositions: "maxConcurrentPositions",
	minCashBuffer: "minCashRatio",
	maxCashBuffer: "maxCashRatio",
	targetPortfolioVolatility: "volatilityTarget",
};

const NUMERIC_RISK_FIELDS = [
	"maxPortfolioDrawdown",
	"maxPositionSize",
	"minCashRatio",
	"maxCashRatio",
	"maxConcurrentPositions",
	"maxCorrelation",
	"maxCorrelatedPairs",
	"correlationLookback",
	"positionStopLoss",
	"volatilityTarget",
	"volatilityLookback",
] as const;

const BOOLEAN_RISK_FIELDS = [
	"enableCircuitBreaker",
	"enableVolatilityTargeting",
] as const;

type RiskFileValue = number | boolean;

const parseRiskSettings = (
	raw: Record<string, unknown>,
	source: string
): Partial<RiskSettings> => {
	const normalized: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(raw)) {
		normalized[RISK_FIELD_ALIASES[key] ?? key] = value;
	}

	const issues: string[] = [];
	const parsed: Partial<Record<keyof RiskSettings, RiskFileValue>> = {};
	for (const field of NUMERIC_RISK_FIELDS) {
		const value = normalized[field];
		if (value === undefined) {
			continue;
		}
		if (typeof value !== "number" || Number.isNaN(value)) {
			issues.push(`${field} must be a number`);
			continue;
		}
		parsed[field] = value;
	}
	for (const field of BOOLEAN_RISK_FIELDS) {
		const value = normalized[field];
		if (value === undefined) {
			continue;
		}
		if (typeof value !== "boolean") {
			issues.push(`${field} must be a boolean`);
			continue;
		}
		parsed[field] = value;
	}
	if (issues.length) {
		throw new ConfigurationError(`Invalid risk settings in ${source}`, issues);
	}
	return {
		...pickNumbers(parsed, NUMERIC_RISK_FIELDS),
		...pickBooleans(parsed, BOOLEAN_RISK_FIELDS),
	};
};

const pickNumbers = <K extends string>(
	values: Partial<Record<string, RiskFileValue>>,
	fields: readonly K[]
): Partial<Record<K, number>> => {
	const out: Partial<Record<K, number>> = {};
	for (const field of fields) {
		const value = values[field];
		if (typeof value === "number") {
			out[field] = value;
		}
	}
	return out;
};

const pickBooleans = <K extends string>(
	values: Partial<Record<string, RiskFileValue>>,
	fields: readonly K[]
): Partial<Record<K, boolean>> => {
	const out: Partial<Record<K, boolean>> = {};
	for (const field of fields) {
		const value = values[field];
		if (typeof value === "boolean") {
			out[field] = value;
		}
	}
	return out;
};

const checkRange = (
	issues: string[],
	field: string,
	value: number,
	min: number,
	max: number,
	minInclusive = true
): void => {
	const aboveMin = minInclusive ? value >= min : value > min;
	if (!Number.isFinite(value) || !aboveMin || value > max) {
		const lower = minInclusive ? `[${min}` : `(${min}`;
		issues.push(`${field} must be within ${lower}, ${max}], got ${value}`);
	}
};

const checkInteger = (
	issues: string[],
	field: string,
	value: number,
	min: number
): void => {
	if (!Number.isInteger(value) || value < min) {
		issues.push(`${field} must be an integer >= ${min}, got ${value}`);
	}
};

const validateRiskSettings = (settings: RiskSettings): RiskSettings => {
	const issues: string[] = [];
	checkRange(issues, "maxPortfolioDrawdown", settings.maxPortfolioDrawdown, 0, 1, false);
	checkRange(issues, "maxPositionSize", settings.maxPositionSize, 0, 1, false);
	checkRange(issues, "minCashRatio", settings.minCashRatio, 0, 1);
	// Above 1 only matters for short books, where cash exceeds equity.
	checkRange(issues, "maxCashRatio", settings.maxCashRatio, 0, 10, false);
	checkRange(issues, "maxCorrelation", settings.maxCorrelation, 0, 1);
	checkRange(issues, "positionStopLoss", settings.positionStopLoss, 0, 1);
	checkRange(issues, "volatilityTarget", settings.volatilityTarget, 0, 1, false);
	checkInteger(issues, "maxConcurrentPositions", settings.maxConcurrentPositions, 1);
	checkInteger(issues, "maxCorrelatedPairs", settings.maxCorrelatedPairs, 0);
	checkInteger(issues, "correlationLookback", settings.correlationLookback, 2);
	checkInteger(issues, "volatilityLookback", settings.volatilityLookback, 2);
	if (typeof settings.enableCircuitBreaker !== "boolean") {
		issues.push("enableCircuitBreaker must be a boolean");
	}
	if (typeof settings.enableVolatilityTargeting !== "boolean") {
		issues.push("enableVolatilityTargeting must be a boolean");
	}
	if (settings.minCashRatio > settings.maxCashRatio) {
		issues.push(
			`minCashRatio (${settings.minCashRatio}) cannot exceed maxCashRatio (${settings.maxCashRatio})`
		);
	}
	if (issues.length) {
		throw new ConfigurationError("Invalid risk settings", issues);
	}
	return settings;
};

export const resolveRiskSettings = (
	overrides: Partial<RiskSettings> = {}
): Readonly<RiskSettings> =>
	Object.freeze(validateRiskSettings({ ...DEFAULT_RISK_SETTINGS, ...overrides }));

const validateExecutionSettings = (
	settings: ExecutionSettings
): ExecutionSettings => {
	const issues: string[] = [];
	checkRange(issues, "slippagePct", settings.slippagePct, 0, 0.1);
	checkRange(issues, "commissionPct", settings.commissionPct, 0, 0.1);
	if (settings.limitVolumeParticipation !== undefined) {
		checkRange(
			issues,
			"limitVolumeParticipation",
			settings.limitVolumeParticipation,
			0,
			1,
			false
		);
	}
	if (issues.length) {
		throw new ConfigurationError("Invalid execution settings", issues);
	}
	return settings;
};

export const resolveExecutionSettings = (
	overrides: Partial<ExecutionSettings> = {}
): Readonly<ExecutionSettings> =>
	Object.freeze(
		validateExecutionSettings({ ...DEFAULT_EXECUTION_SETTINGS, ...overrides })
	);

export const loadRiskSettings = (
	configDir = getDefaultConfigDir(),
	riskProfile = "conservative"
): Readonly<RiskSettings> => {
	const riskPath = path.join(configDir, "risk", `${riskProfile}.json`);
	const parsed = parseRiskSettings(readJsonRecord(riskPath), riskPath);
	const settings = validateRiskSettings({ ...DEFAULT_RISK_SETTINGS, ...parsed });
	return Object.freeze(
		withConfigMetadata(settings, {
			source: "file",
			path: riskPath,
			profile: riskProfile,
		})
	);
};

export const loadExecutionSettings = (
	configDir = getDefaultConfigDir(),
	executionProfile = "default"
): Readonly<ExecutionSettings> => {
	const executionPath = path.join(
		configDir,
		"execution",
		`${executionProfile}.json`
	);
	const file = readJsonRecord(executionPath);
	const issues: string[] = [];
	const readField = (key: keyof ExecutionSettings): number | undefined => {
		const value = file[key];
		if (value === undefined) {
			return undefined;
		}
		if (typeof value !== "number") {
			issues.push(`${key} must be a number`);
			return undefined;
		}
		return value;
	};
	const slippagePct = readField("slippagePct");
	const commissionPct = readField("commissionPct");
	const limitVolumeParticipation = readField("limitVolumeParticipation");
	if (issues.length) {
		throw new ConfigurationError(
			`Invalid execution settings in ${executionPath}`,
			issues
		);
	}
	const settings = validateExecutionSettings({
		slippagePct: slippagePct ?? DEFAULT_EXECUTION_SETTINGS.slippagePct,
		commissionPct: commissionPct ?? DEFAULT_EXECUTION_SETTINGS.commissionPct,
		...(limitVolumeParticipation === undefined
			? {}
			: { limitVolumeParticipation }),
	});
	return Object.freeze(
		withConfigMetadata(settings, {
			source: "file",
			path: executionPath,
			profile: executionProfile,
		})
	);
};

export interface StrategyConfig {
	id: string;
	symbols?: string[];
	params: Record<string, unknown>;
}

export const loadStrategyConfig = (
	configDir = getDefaultConfigDir(),
	strategyProfile: string
): StrategyConfig => {
	const strategyPath = path.join(
		configDir,
		"strategies",
		strategyProfile.endsWith(".json") ? strategyProfile : `${strategyProfile}.json`
	);
	const { id, symbols, ...params } = readJsonRecord(strategyPath);
	if (typeof id !== "string" || !id.length) {
		throw new ConfigurationError(
			`Strategy config at ${strategyPath} must include an "id" property.`
		);
	}
	if (
		symbols !== undefined &&
		(!Array.isArray(symbols) ||
			!symbols.every((symbol): symbol is string => typeof symbol === "string"))
	) {
		throw new ConfigurationError(
			`Strategy config at ${strategyPath} has a non-string "symbols" entry.`
		);
	}
	return withConfigMetadata(
		{ id, symbols, params },
		{ source: "file", path: strategyPath, profile: strategyProfile }
	);
};
