import { getCompressionCodec } from '../compression/registry.js';
import { ZipError, type ZipWarning } from '../errors.js';
import { createEntryGuard } from '../streams/entryGuard.js';
import type { RandomAccess } from './RandomAccess.js';
import type { ZipEntryRecord } from './centralDirectory.js';
import { readLocalHeader } from './localHeader.js';

const READ_SIZE = 64 * 1024;

export interface OpenEntryOptions {
  strict: boolean;
  maxUncompressedBytes: bigint;
  maxCompressionRatio: number;
  onWarning?: (warning: ZipWarning) => void;
}

/** Raw bytes, then the codec, then the size, ratio and CRC32 checks. */
export async function openEntryStream(
  source: RandomAccess,
  entry: ZipEntryRecord,
  options: OpenEntryOptions
): Promise<ReadableStream<Uint8Array>> {
  const local = await readLocalHeader(source, entry);
  if (entry.encrypted || (local.flags & 0x1) !== 0) {
    throw new ZipError('ZIP_UNSUPPORTED_ENCRYPTION', `${entry.name} is encrypted`, { entryName: entry.name });
  }
  const codec = getCompressionCodec(entry.method);
  if (!codec) {
    throw new ZipError('ZIP_UNSUPPORTED_METHOD', `Unsupported compression method ${entry.method}`, {
      entryName: entry.name,
      method: entry.method
    });
  }

  const decoded = readRange(source, local.dataOffset, entry.compressedSize).pipeThrough(codec.createDecompressStream());
  return reportCodecFailures(decoded, entry, codec.name).pipeThrough(
    createEntryGuard({
      entryName: entry.name,
      compressedSize: entry.compressedSize,
      expectedCrc: entry.crc32,
      expectedSize: entry.uncompressedSize,
      maxBytes: options.maxUncompressedBytes,
      maxCompressionRatio: options.maxCompressionRatio,
      strict: options.strict,
      ...(options.onWarning ? { onWarning: options.onWarning } : {})
    })
  );
}

/** Byte range of the entry's stored data, for entries that can be read in place. */
export async function resolveStoredRange(
  source: RandomAccess,
  entry: ZipEntryRecord
): Promise<{ offset: bigint; length: bigint } | undefined> {
  if (entry.method !== 0 || entry.encrypted) return undefined;
  const local = await readLocalHeader(source, entry);
  if ((local.flags & 0x1) !== 0) return undefined;
  return { offset: local.dataOffset, length: entry.compressedSize };
}

/** Re-raises failures of the codec itself as `ZIP_DECOMPRESSION_FAILED`. */
function reportCodecFailures(
  stream: ReadableStream<Uint8Array>,
  entry: ZipEntryRecord,
  codecName: string
): ReadableStream<Uint8Array> {
  const reader = stream.getReader();
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const next = await reader.read();
        if (next.done) controller.close();
        else controller.enqueue(next.value);
      } catch (err) {
        controller.error(
          err instanceof ZipError
            ? err
            : new ZipError('ZIP_DECOMPRESSION_FAILED', `Cannot decode ${entry.name} (${codecName})`, {
                entryName: entry.name,
                method: entry.method,
                cause: err
              })
        );
      }
    },
    async cancel(reason) {
      await reader.cancel(reason);
    }
  });
}

function readRange(source: RandomAccess, start: bigint, length: bigint): ReadableStream<Uint8Array> {
  let position = start;
  const end = start + length;
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      if (position >= end) {
        controller.close();
        return;
      }
      const left = end - position;
      const chunk = await source.read(position, left < BigInt(READ_SIZE) ? Number(left) : READ_SIZE);
      if (chunk.length === 0) {
        controller.error(new ZipError('ZIP_TRUNCATED', 'Entry data truncated', { offset: position }));
        return;
      }
      position += BigInt(chunk.length);
      controller.enqueue(chunk);
    }
  });
}
