/**
 * Half-up rounding that survives binary representation error
 * (5.005 -> 5.01, where `toFixed(2)` gives 5.00).
 */
export const roundTo = (value: number, decimals: number): number => {
	if (!Number.isFinite(value)) {
		return value;
	}
	const factor = 10 ** decimals;
	const scaled = Number((Math.abs(value) * factor).toPrecision(12));
	const rounded = Math.round(scaled) / factor;
	return value < 0 && rounded !== 0 ? -rounded : rounded;
};

export const roundCurrency = (value: number): number => roundTo(value, 2);

export const roundPrice = (value: number): number => roundTo(value, 6);
