import { Crc32 } from '../checksum.js';
import { ZipError, type ZipWarning } from '../errors.js';

export interface EntryGuardOptions {
  entryName: string;
  compressedSize: bigint;
  expectedCrc: number;
  expectedSize: bigint;
  /** Hard ceiling on decoded bytes; exceeding it always fails. */
  maxBytes: bigint;
  maxCompressionRatio: number;
  strict: boolean;
  onWarning?: (warning: ZipWarning) => void;
}

/**
 * Counts decoded bytes against the size and ratio ceilings as they pass, and
 * checks CRC32 and length against the central directory once the entry ends.
 * Outside strict mode the ratio, CRC and length checks only warn.
 */
export function createEntryGuard(options: EntryGuardOptions): TransformStream<Uint8Array, Uint8Array> {
  const { entryName } = options;
  const crc = new Crc32();
  let produced = 0n;
  let ratioReported = false;

  const report = (code: 'ZIP_LIMIT_EXCEEDED' | 'ZIP_BAD_CRC', message: string): void => {
    if (options.strict) throw new ZipError(code, message, { entryName });
    options.onWarning?.({ code, message, entryName });
  };

  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      produced += BigInt(chunk.length);
      if (produced > options.maxBytes) {
        throw new ZipError('ZIP_LIMIT_EXCEEDED', `${entryName} decodes to more than ${options.maxBytes} bytes`, {
          entryName,
          context: { limitBytes: options.maxBytes.toString() }
        });
      }
      if (
        !ratioReported &&
        options.compressedSize > 0n &&
        Number(produced) > Number(options.compressedSize) * options.maxCompressionRatio
      ) {
        ratioReported = true;
        report('ZIP_LIMIT_EXCEEDED', `${entryName} exceeds a compression ratio of ${options.maxCompressionRatio}`);
      }
      crc.update(chunk);
      controller.enqueue(chunk);
    },
    flush() {
      if (crc.digest() !== options.expectedCrc) {
        report('ZIP_BAD_CRC', `CRC32 mismatch for ${entryName}`);
      }
      if (produced !== options.expectedSize) {
        report('ZIP_BAD_CRC', `${entryName} decoded to ${produced} bytes, expected ${options.expectedSize}`);
      }
    }
  });
}
