import type {
	ClosedTrade,
	Fill,
	JournalEntry,
	PortfolioSnapshot,
} from "@backtide/core";
import type { Metrics } from "./metricsSchema";

export type CsvMode = "summary" | "fills" | "equity" | "trades" | "journal";

export const CSV_MODES: readonly CsvMode[] = [
	"summary",
	"fills",
	"equity",
	"trades",
	"journal",
];

export const isCsvMode = (value: string): value is CsvMode =>
	CSV_MODES.some((mode) => mode === value);

/** The parts of a backtest result the exporters read. */
export interface ExportableResult {
	strategy: string;
	status: string;
	metrics: Metrics;
	snapshots: readonly PortfolioSnapshot[];
	fills: readonly Fill[];
	trades: readonly ClosedTrade[];
	journal: readonly JournalEntry[];
}

export interface FormatCsvOptions {
	includeHeader?: boolean;
}

export const formatResultCsv = (
	result: ExportableResult,
	mode: CsvMode = "summary",
	options: FormatCsvOptions = {}
): string => {
	const includeHeader = options.includeHeader ?? true;
	switch (mode) {
		case "fills":
			return toCsv(buildFillRows(result.fills), includeHeader);
		case "equity":
			return toCsv(buildEquityRows(result.snapshots), includeHeader);
		case "trades":
			return toCsv(buildTradeRows(result.trades), includeHeader);
		case "journal":
			return toCsv(buildJournalRows(result.journal), includeHeader);
		case "summary":
		default:
			return toCsv([buildSummaryRow(result)], includeHeader);
	}
};

const isoOrNull = (timestamp: number | null): string | null =>
	timestamp === null ? null : new Date(timestamp).toISOString();

const buildSummaryRow = (result: ExportableResult): Record<string, unknown> => {
	const { metrics } = result;
	return {
		strategy: result.strategy,
		status: result.status,
		start: isoOrNull(metrics.startTimestamp),
		end: isoOrNull(metrics.endTimestamp),
		periods: metrics.periods,
		initialEquity: metrics.initialEquity,
		finalEquity: metrics.finalEquity,
		totalReturn: metrics.totalReturn,
		annualizedReturn: metrics.annualizedReturn,
		annualizedVolatility: metrics.annualizedVolatility,
		sharpe: metrics.sharpe,
		sortino: metrics.sortino,
		calmar: metrics.calmar,
		maxDrawdown: metrics.maxDrawdown,
		maxDrawdownAmount: metrics.maxDrawdownAmount,
		tradeCount: metrics.trades.tradeCount,
		winRate: metrics.trades.winRate,
		profitFactor: metrics.trades.profitFactor,
		expectancy: metrics.trades.expectancy,
		fillCount: metrics.fillCount,
		totalCommission: metrics.totalCommission,
		totalSlippage: metrics.totalSlippage,
		turnover: metrics.turnover,
		valueAtRisk: metrics.tailRisk.valueAtRisk,
		conditionalValueAtRisk: metrics.tailRisk.conditionalValueAtRisk,
	};
};

const buildFillRows = (fills: readonly Fill[]): Record<string, unknown>[] =>
	fills.map((fill) => ({
		timestamp: new Date(fill.timestamp).toISOString(),
		orderId: fill.orderId,
		symbol: fill.symbol,
		side: fill.side,
		type: fill.order.type,
		quantity: fill.quantity,
		price: fill.price,
		commission: fill.commission,
		slippage: fill.slippage,
		tag: fill.order.tag,
		forced: fill.order.forced,
	}));

const buildEquityRows = (
	snapshots: readonly PortfolioSnapshot[]
): Record<string, unknown>[] =>
	snapshots.map((snapshot) => ({
		timestamp: new Date(snapshot.timestamp).toISOString(),
		cash: snapshot.cash,
		positionsValue: snapshot.positionsValue,
		equity: snapshot.equity,
		peakEquity: snapshot.peakEquity,
		drawdown: snapshot.drawdown,
		realizedPnl: snapshot.realizedPnl,
		unrealizedPnl: snapshot.unrealizedPnl,
		openPositions: snapshot.positions.length,
	}));

const buildTradeRows = (trades: readonly ClosedTrade[]): Record<string, unknown>[] =>
	trades.map((trade) => ({
		symbol: trade.symbol,
		side: trade.side,
		opened: new Date(trade.openedAt).toISOString(),
		closed: new Date(trade.closedAt).toISOString(),
		quantity: trade.quantity,
		entryPrice: trade.entryPrice,
		exitPrice: trade.exitPrice,
		grossPnl: trade.grossPnl,
		commission: trade.commission,
		realizedPnl: trade.realizedPnl,
		orderId: trade.orderId,
	}));

const buildJournalRows = (
	journal: readonly JournalEntry[]
): Record<string, unknown>[] =>
	journal.map((entry) => ({
		sequence: entry.sequence,
		timestamp: new Date(entry.timestamp).toISOString(),
		kind: entry.kind,
		symbol: entry.symbol,
		orderId: entry.orderId,
		reason: entry.reason,
		message: entry.message,
	}));

const toCsv = (rows: Record<string, unknown>[], includeHeader: boolean): string => {
	if (!rows.length) {
		return "";
	}
	const headers = Object.keys(rows[0]);
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(headers.join(","));
	}
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return lines.join("\n");
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (/[",\n]/.test(value)) {
			return `"${value.replace(/"/g, '""')}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		if (Number.isFinite(value)) {
			return value.toString();
		}
		return Number.isNaN(value) ? "" : value > 0 ? "Infinity" : "-Infinity";
	}
	return String(value);
};
