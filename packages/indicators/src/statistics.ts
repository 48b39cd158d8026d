export const mean = (values: number[]): number =>
	values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;

/**
 * `ddof` 0 gives the population deviation used for equity curves, 1 the
 * sample deviation used for trailing price windows.
 */
export const standardDeviation = (values: number[], ddof = 0): number => {
	if (values.length < 2 || values.length - ddof <= 0) {
		return 0;
	}
	const avg = mean(values);
	const variance =
		values.reduce((sum, value) => sum + (value - avg) ** 2, 0) /
		(values.length - ddof);
	return Math.sqrt(variance);
};

/** Close-to-close simple returns; one shorter than the input. */
export const simpleReturns = (closes: number[]): number[] => {
	const returns: number[] = [];
	for (let i = 1; i < closes.length; i += 1) {
		const previous = closes[i - 1];
		returns.push(previous === 0 ? 0 : (closes[i] - previous) / previous);
	}
	return returns;
};

/**
 * Pearson correlation of two equally long series. Null when there are fewer
 * than two points or either series is flat.
 */
export const pearsonCorrelation = (left: number[], right: number[]): number | null => {
	const length = Math.min(left.length, right.length);
	if (length < 2) {
		return null;
	}
	const a = left.slice(left.length - length);
	const b = right.slice(right.length - length);
	const meanA = mean(a);
	const meanB = mean(b);
	let covariance = 0;
	let varianceA = 0;
	let varianceB = 0;
	for (let i = 0; i < length; i += 1) {
		const da = a[i] - meanA;
		const db = b[i] - meanB;
		covariance += da * db;
		varianceA += da * da;
		varianceB += db * db;
	}
	if (varianceA === 0 || varianceB === 0) {
		return null;
	}
	return covariance / Math.sqrt(varianceA * varianceB);
};

/** Sample volatility of close-to-close returns scaled by sqrt(periodsPerYear). */
export const annualizedVolatility = (
	closes: number[],
	periodsPerYear = 252
): number | null => {
	const returns = simpleReturns(closes);
	if (returns.length < 2) {
		return null;
	}
	return standardDeviation(returns, 1) * Math.sqrt(periodsPerYear);
};

/**
 * Percentile with linear interpolation between closest ranks, `p` in [0, 1].
 * Null for an empty series.
 */
export const percentile = (values: number[], p: number): number | null => {
	if (!(p >= 0 && p <= 1)) {
		throw new RangeError(`Percentile must be within [0, 1], got ${p}`);
	}
	if (!values.length) {
		return null;
	}
	const sorted = [...values].sort((a, b) => a - b);
	const rank = p * (sorted.length - 1);
	const lower = Math.floor(rank);
	const upper = Math.ceil(rank);
	return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
};
