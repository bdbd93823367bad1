/**
 * Maps items through an async worker with at most `concurrency` calls in flight.
 *
 * Results keep the input order. The worker is expected to handle its own failures.
 *
 * @param items Input items.
 * @param concurrency Maximum number of parallel calls, at least 1.
 * @param worker Async mapping function.
 * @returns Mapped results.
 */
export const mapWithConcurrency = async <TItem, TResult>(
  items: readonly TItem[],
  concurrency: number,
  worker: (item: TItem) => Promise<TResult>
): Promise<TResult[]> => {
  const results = new Array<TResult>(items.length)
  const limit = Number.isFinite(concurrency) ? Math.floor(concurrency) : items.length
  const workerCount = Math.max(1, Math.min(limit, items.length))
  let nextIndex = 0

  const drain = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex
      nextIndex += 1
      const item = items[index]
      if (item !== undefined) {
        results[index] = await worker(item)
      }
    }
  }

  await Promise.all(Array.from({ length: workerCount }, drain))
  return results
}
