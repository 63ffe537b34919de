/**
 * Bounded worker pool.
 *
 * N workers pull task indices from a shared counter until the queue is empty.
 * Results land at the index of their task, whatever order they finish in.
 * A failing task never stops the others: the processor is expected to turn
 * failures into values.
 */

type TaskProcessor<T, R> = (task: T, index: number) => Promise<R>;

export async function runWorkerPool<T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  concurrency: number
): Promise<R[]> {
  const results = new Array<R>(tasks.length);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < tasks.length) {
      const index = nextIndex++;
      results[index] = await processor(tasks[index], index);
    }
  };

  // Infinity means unbounded; NaN falls back to sequential
  const limit =
    concurrency === Number.POSITIVE_INFINITY ? tasks.length : Number.isFinite(concurrency) ? Math.floor(concurrency) : 1;
  const workerCount = Math.max(1, Math.min(limit, tasks.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
