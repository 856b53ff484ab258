/** Byte streams accepted as package sources. */
export type ByteStream = ReadableStream<Uint8Array> | NodeJS.ReadableStream;

export function isWebReadable(value: unknown): value is ReadableStream<Uint8Array> {
  return typeof value === 'object' && value !== null && 'getReader' in value && typeof value.getReader === 'function';
}

export function isNodeReadable(value: unknown): value is NodeJS.ReadableStream {
  if (typeof value !== 'object' || value === null) return false;
  return 'pipe' in value && typeof value.pipe === 'function' && Symbol.asyncIterator in value;
}

export function toWebReadable(stream: ByteStream): ReadableStream<Uint8Array> {
  return isWebReadable(stream) ? stream : readableFromAsyncIterable(bytesOf(stream));
}

/** Pull-based web stream over an async iterable; cancelling it ends the iteration. */
export function readableFromAsyncIterable(source: AsyncIterable<Uint8Array>): ReadableStream<Uint8Array> {
  const chunks = source[Symbol.asyncIterator]();
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const next = await chunks.next();
      if (next.done) controller.close();
      else controller.enqueue(next.value);
    },
    async cancel() {
      await chunks.return?.();
    }
  });
}

async function* bytesOf(stream: NodeJS.ReadableStream): AsyncGenerator<Uint8Array> {
  const encoder = new TextEncoder();
  for await (const chunk of stream) {
    yield typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
  }
}
