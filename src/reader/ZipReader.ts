import { ensureBuiltinCodecs } from '../compression/registry.js';
import type { ZipWarning } from '../errors.js';
import { resolveLimits, type PackageLimits, type ResolvedPackageLimits } from '../limits.js';
import { debugZip } from '../log.js';
import type { RandomAccess } from './RandomAccess.js';
import { iterCentralDirectory, type ZipEntryRecord } from './centralDirectory.js';
import { openEntryStream, resolveStoredRange } from './entryStream.js';
import { findEocd } from './eocd.js';

/** ZIP entry metadata exposed by ZipReader. */
export type ZipEntry = Readonly<ZipEntryRecord>;

export type ZipReaderOptions = {
  /** Reject structural irregularities instead of recording warnings. Defaults to true. */
  strict?: boolean;
  limits?: PackageLimits;
};

export type OpenZipEntryOptions = {
  /** Replaces `maxUncompressedPartBytes` for this read. */
  maxUncompressedBytes?: bigint;
};

/**
 * Read-only view of a ZIP archive's central directory with on-demand entry
 * decoding. Owns its source: `close()` closes it, and so does a failed `open()`.
 */
export class ZipReader {
  private constructor(
    private readonly source: RandomAccess,
    private readonly strict: boolean,
    private readonly limits: ResolvedPackageLimits,
    private readonly entriesList: readonly ZipEntryRecord[],
    private readonly warningsList: ZipWarning[]
  ) {}

  static async open(source: RandomAccess, options?: ZipReaderOptions): Promise<ZipReader> {
    ensureBuiltinCodecs();
    const strict = options?.strict ?? true;
    const limits = resolveLimits(options?.limits);
    const warnings: ZipWarning[] = [];
    const entries: ZipEntryRecord[] = [];
    try {
      const location = await findEocd(source, { strict, maxEntries: limits.maxParts });
      warnings.push(...location.warnings);
      const walk = iterCentralDirectory(source, location, {
        strict,
        maxEntries: limits.maxParts,
        onWarning: (warning) => warnings.push(warning)
      });
      for await (const entry of walk) entries.push(entry);
      debugZip('central directory: %d entries (zip64=%s)', entries.length, location.zip64);
    } catch (err) {
      await source.close();
      throw err;
    }
    return new ZipReader(source, strict, limits, entries, warnings);
  }

  entries(): ZipEntry[] {
    return this.entriesList.map((entry) => ({ ...entry }));
  }

  warnings(): ZipWarning[] {
    return [...this.warningsList];
  }

  /** Decoded contents of an entry; CRC32 and size are checked when the stream ends. */
  async open(entry: ZipEntry, options?: OpenZipEntryOptions): Promise<ReadableStream<Uint8Array>> {
    return openEntryStream(this.source, entry, {
      strict: this.strict,
      maxUncompressedBytes: options?.maxUncompressedBytes ?? this.limits.maxUncompressedPartBytes,
      maxCompressionRatio: this.limits.maxCompressionRatio,
      onWarning: (warning) => this.warningsList.push(warning)
    });
  }

  /** Location of a stored, unencrypted entry's bytes within the source. */
  async storedRange(entry: ZipEntry): Promise<{ offset: bigint; length: bigint } | undefined> {
    return resolveStoredRange(this.source, entry);
  }

  /** The underlying source. Reads through it stay valid until `close()`. */
  get randomAccess(): RandomAccess {
    return this.source;
  }

  async close(): Promise<void> {
    await this.source.close();
  }

  async [Symbol.asyncDispose](): Promise<void> {
    await this.close();
  }
}
