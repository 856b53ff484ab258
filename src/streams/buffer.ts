import { concatBytes } from '../binary.js';

/** Raised when a stream carries more than the caller allowed. */
export class StreamSizeError extends RangeError {
  constructor(readonly maxBytes: bigint) {
    super(`Stream exceeds maximum allowed size of ${maxBytes} bytes`);
    this.name = 'StreamSizeError';
  }
}

/** Collects a stream into one array. Going over `maxBytes` cancels the stream. */
export async function readAllBytes(
  stream: ReadableStream<Uint8Array>,
  options?: { maxBytes?: bigint | number }
): Promise<Uint8Array> {
  const limit = options?.maxBytes === undefined ? undefined : BigInt(options.maxBytes);
  const chunks: Uint8Array[] = [];
  let total = 0n;
  // Leaving the loop early cancels the stream.
  for await (const chunk of stream) {
    total += BigInt(chunk.length);
    if (limit !== undefined && total > limit) throw new StreamSizeError(limit);
    if (chunk.length > 0) chunks.push(chunk);
  }
  return chunks.length === 0 ? new Uint8Array(0) : concatBytes(chunks);
}
