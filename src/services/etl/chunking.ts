/**
 * Split a sequence into fixed-size batches, preserving order. The last
 * batch holds the remainder and is never empty.
 */
export function* chunk<T>(items: Iterable<T>, size: number): Generator<T[]> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(
      `Batch size must be a positive integer, got ${String(size)}`
    );
  }

  let buffer: T[] = [];
  for (const item of items) {
    buffer.push(item);
    if (buffer.length >= size) {
      yield buffer;
      buffer = [];
    }
  }

  if (buffer.length > 0) {
    yield buffer;
  }
}
