/**
 * Bounded worker pool over a list of items. Results keep input order.
 */
export async function mapWithConcurrency<TItem, TResult>(params: {
  items: readonly TItem[];
  concurrency: number;
  fn: (item: TItem, index: number) => Promise<TResult>;
}): Promise<TResult[]> {
  const items = params.items;
  const max = Math.max(1, Math.floor(params.concurrency || 1));
  const out = new Array<TResult>(items.length);

  let nextIndex = 0;
  const workers = Array.from({ length: Math.min(max, items.length) }, async () => {
    while (nextIndex < items.length) {
      const idx = nextIndex;
      nextIndex += 1;
      out[idx] = await params.fn(items[idx], idx);
    }
  });

  await Promise.all(workers);
  return out;
}

/**
 * Like {@link mapWithConcurrency}, but every item runs to completion and
 * failures are returned alongside successes instead of rejecting early.
 */
export async function settleWithConcurrency<TItem, TResult>(params: {
  items: readonly TItem[];
  concurrency: number;
  fn: (item: TItem, index: number) => Promise<TResult>;
}): Promise<PromiseSettledResult<TResult>[]> {
  return mapWithConcurrency({
    items: params.items,
    concurrency: params.concurrency,
    fn: async (item, index): Promise<PromiseSettledResult<TResult>> => {
      try {
        return { status: 'fulfilled', value: await params.fn(item, index) };
      } catch (reason) {
        return { status: 'rejected', reason };
      }
    },
  });
}
