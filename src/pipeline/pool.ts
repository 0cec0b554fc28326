export type PoolOutcome<R> =
  | { ok: true; value: R }
  | { ok: false; error: unknown };

/**
 * Run `worker` over `items` with at most `concurrency` jobs in flight.
 * `onSettled` is called once per item in completion order; a failed job is
 * reported there and does not stop the others.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled: (outcome: PoolOutcome<R>, item: T, index: number) => void
): Promise<void> {
  const total = items.length;
  const workers = Math.max(1, Math.min(Math.floor(concurrency), total));
  if (total === 0) return;

  let next = 0;
  await Promise.all(
    Array.from({ length: workers }, async () => {
      for (;;) {
        const currentIndex = next++;
        if (currentIndex >= total) break;

        const item = items[currentIndex];
        if (item === undefined) continue;

        let outcome: PoolOutcome<R>;
        try {
          outcome = { ok: true, value: await worker(item, currentIndex) };
        } catch (error) {
          outcome = { ok: false, error };
        }
        onSettled(outcome, item, currentIndex);
      }
    })
  );
}
