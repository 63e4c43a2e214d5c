/**
 * Runs `task` over `items` with at most `limit` tasks in flight.
 * Results keep the order of `items`.
 */
export async function mapWithLimit<T, R>(
    items: readonly T[],
    limit: number,
    task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const lane = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            const item = items[index];
            if (item === undefined) continue;
            results[index] = await task(item, index);
        }
    };

    const lanes = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: lanes }, lane));
    return results;
}
