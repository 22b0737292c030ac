/**
 * Newsbrief — Worker Pool
 */

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Each runner
 * pulls the next unclaimed index until the list is exhausted.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  const size = items.length;
  if (size === 0) return;

  let cursor = 0;
  const runners: Promise<void>[] = [];
  const limit = Math.max(1, Math.floor(concurrency));

  for (let i = 0; i < Math.min(limit, size); i++) {
    runners.push(
      (async function pump() {
        while (cursor < size) {
          const current = cursor++;
          await worker(items[current], current);
        }
      })()
    );
  }

  await Promise.all(runners);
}
