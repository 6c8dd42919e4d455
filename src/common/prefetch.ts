/**
 * Overlap the producer with the consumer by one item.
 *
 * While the caller works on item n (typically writing it to the sink), the
 * fetch for item n+1 is already in flight. At most two items are resident:
 * the one being consumed and the one being fetched.
 */
export async function* prefetchOne<T>(
  source: AsyncIterable<T>,
): AsyncGenerator<T> {
  const iterator = source[Symbol.asyncIterator]();
  let pending = observe(iterator.next());
  let exhausted = false;

  try {
    while (true) {
      const current = await pending;
      if (current.done) {
        exhausted = true;
        return;
      }
      pending = observe(iterator.next());
      yield current.value;
    }
  } finally {
    if (!exhausted) {
      // Consumer stopped early: settle the in-flight fetch before closing
      // the producer.
      await Promise.allSettled([pending]);
      await iterator.return?.();
    }
  }
}

/**
 * Marks the fetch as handled while the consumer is busy. The rejection is
 * still delivered to whoever awaits the returned promise.
 */
function observe<T>(promise: Promise<T>): Promise<T> {
  void promise.catch(() => undefined);
  return promise;
}
