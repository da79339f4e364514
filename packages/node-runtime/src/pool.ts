// packages/node-runtime/src/pool.ts

/**
 * Run `worker` over `items` with at most `jobs` in flight. Results keep the
 * input order; `onResult` sees each one as it completes.
 */
export async function runPool<T, R>(
  items    : readonly T[],
  jobs     : number,
  worker   : (item: T) => Promise<R>,
  onResult : (result: R, item: T) => void = () => {},
): Promise<R[]> {
  if (!Number.isInteger(jobs) || jobs < 1) throw new RangeError(`Invalid job count: ${jobs}`);

  const results = new Array<R>(items.length);
  let next = 0;

  async function lane(): Promise<void> {
    while (next < items.length) {
      const idx = next++;
      const r   = await worker(items[idx]);
      results[idx] = r;
      onResult(r, items[idx]);
    }
  }

  await Promise.all(Array.from({ length: Math.min(jobs, items.length) }, lane));
  return results;
}
