/**
 * Exponential moving average seeded with the simple average of the first
 * `length` values. Returns one value per index from `length - 1` onward.
 */
export function emaSeries(values: number[], length: number): number[] {
	if (length <= 0 || values.length < length) {
		return [];
	}

	const multiplier = 2 / (length + 1);
	let emaValue = average(values.slice(0, length));
	const series = [emaValue];

	for (let i = length; i < values.length; i += 1) {
		emaValue = (values[i] - emaValue) * multiplier + emaValue;
		series.push(emaValue);
	}

	return series;
}

export function ema(values: number[], length: number): number | null {
	const series = emaSeries(values, length);
	return series.length ? series[series.length - 1] : null;
}

const average = (nums: number[]): number => {
	const sum = nums.reduce((acc, value) => acc + value, 0);
	return sum / nums.length;
};
