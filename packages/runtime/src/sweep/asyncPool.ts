/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`.
 */
export async function asyncPool<T, R>(
	items: readonly T[],
	concurrency: number,
	worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new RangeError(`Concurrency must be an integer >= 1, got ${concurrency}`);
	}

	const results: R[] = new Array(items.length);
	let nextIndex = 0;

	async function runWorker(): Promise<void> {
		while (nextIndex < items.length) {
			const current = nextIndex;
			nextIndex += 1;
			results[current] = await worker(items[current], current);
		}
	}

	const workers = Array.from({ length: Math.min(concurrency, items.length) }, () =>
		runWorker()
	);
	await Promise.all(workers);
	return results;
}
