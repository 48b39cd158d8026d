export function sma(values: number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}

	const window = values.slice(values.length - period);
	const sum = window.reduce((acc, value) => acc + value, 0);
	return Number((sum / period).toFixed(6));
}

/** One value per full window, aligned to the window's last element. */
export function smaSeries(values: number[], period: number): number[] {
	if (period <= 0 || values.length < period) {
		return [];
	}

	const series: number[] = [];
	let sum = 0;
	for (let i = 0; i < values.length; i += 1) {
		sum += values[i];
		if (i >= period) {
			sum -= values[i - period];
		}
		if (i >= period - 1) {
			series.push(Number((sum / period).toFixed(6)));
		}
	}
	return series;
}
