/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Once `signal` is aborted no new item is started; items already started run
 * to completion. Results keep the order of `items`; skipped items are `undefined`.
 */
export async function runWithConcurrency<T, R>(
	items: readonly T[],
	concurrency: number,
	worker: (item: T, index: number) => Promise<R>,
	signal?: AbortSignal,
): Promise<Array<R | undefined>> {
	const results: Array<R | undefined> = new Array(items.length).fill(undefined)
	let next = 0

	const lane = async (): Promise<void> => {
		while (next < items.length && !signal?.aborted) {
			const index = next++
			results[index] = await worker(items[index], index)
		}
	}

	const lanes = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => lane())
	await Promise.all(lanes)
	return results
}
