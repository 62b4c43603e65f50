/**
 * Map over items with at most `limit` promises in flight.
 * Results keep the order of the input, whatever order the work finishes in.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const runWorker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await worker(items[index], index);
        }
    };

    const workers = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, () => runWorker());
    await Promise.all(workers);
    return results;
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
