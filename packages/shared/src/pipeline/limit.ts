/**
 * Run tasks with at most `limit` in flight. Results keep task order; the
 * first rejection rejects the whole run.
 */
export async function withLimit<T>(limit: number, tasks: Array<() => Promise<T>>): Promise<T[]> {
  const results = new Array<T>(tasks.length);
  let nextIndex = 0;

  const runNext = async (): Promise<void> => {
    while (nextIndex < tasks.length) {
      const i = nextIndex++;
      results[i] = await tasks[i]();
    }
  };

  const lanes = Math.min(Math.max(1, Math.floor(limit) || 1), tasks.length);
  await Promise.all(Array.from({ length: lanes }, runNext));
  return results;
}
