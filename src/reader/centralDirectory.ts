import { LeBytes, concatBytes } from '../binary.js';
import { ZipError, type ZipWarning } from '../errors.js';
import type { RandomAccess } from './RandomAccess.js';
import type { CentralDirectoryLocation } from './eocd.js';

const HEADER_SIGNATURE = 0x02014b50;
const HEADER_SIZE = 46;
const CHUNK_SIZE = 64 * 1024;
const ZIP64_FIELD_ID = 0x0001;
const SATURATED_16 = 0xffff;
const SATURATED_32 = 0xffffffff;

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const utf8Lenient = new TextDecoder('utf-8', { ignoreBOM: true });

export interface ZipEntryRecord {
  name: string;
  flags: number;
  method: number;
  crc32: number;
  compressedSize: bigint;
  uncompressedSize: bigint;
  /** Offset of the local file header. */
  offset: bigint;
  isDirectory: boolean;
  encrypted: boolean;
  zip64: boolean;
}

export interface CentralDirectoryOptions {
  strict: boolean;
  maxEntries: number;
  onWarning?: (warning: ZipWarning) => void;
}

/** Walks the central directory one header at a time, reading it in chunks. */
export async function* iterCentralDirectory(
  source: RandomAccess,
  location: Pick<CentralDirectoryLocation, 'offset' | 'size' | 'entries'>,
  options: CentralDirectoryOptions
): AsyncGenerator<ZipEntryRecord> {
  const warn = (warning: ZipWarning): void => options.onWarning?.(warning);
  const cursor = new DirectoryCursor(source, location.offset, location.size);
  let left = location.size;
  let seen = 0n;

  while (left >= BigInt(HEADER_SIZE)) {
    const fixed = await cursor.peek(HEADER_SIZE);
    if (fixed.u32(0) !== HEADER_SIGNATURE) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Invalid central directory signature', {
        offset: cursor.position
      });
    }
    const headerSize = HEADER_SIZE + fixed.u16(28) + fixed.u16(30) + fixed.u16(32);
    if (BigInt(headerSize) > left) {
      throw new ZipError('ZIP_TRUNCATED', 'Central directory truncated', { offset: cursor.position });
    }
    seen += 1n;
    if (seen > BigInt(options.maxEntries)) {
      throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Too many entries in ZIP');
    }
    const header = await cursor.peek(headerSize);
    cursor.skip(headerSize);
    left -= BigInt(headerSize);
    yield readHeader(header, options.strict, warn);
  }

  const irregularities = [
    left !== 0n ? 'Central directory has trailing data' : undefined,
    seen !== location.entries ? 'Central directory entry count mismatch' : undefined
  ];
  for (const message of irregularities) {
    if (message === undefined) continue;
    if (options.strict) throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', message);
    warn({ code: 'ZIP_BAD_CENTRAL_DIRECTORY', message: `${message}; using parsed entries` });
  }
}

/** Sequential view over a byte range of a source, fetched on demand. */
class DirectoryCursor {
  private buffered: Uint8Array = new Uint8Array(0);
  private next: bigint;
  private unread: bigint;

  constructor(
    private readonly source: RandomAccess,
    start: bigint,
    size: bigint
  ) {
    this.next = start;
    this.unread = size;
  }

  /** Offset of the first unconsumed byte. */
  get position(): bigint {
    return this.next - BigInt(this.buffered.length);
  }

  async peek(length: number): Promise<LeBytes> {
    while (this.buffered.length < length && this.unread > 0n) {
      const want = this.unread < BigInt(CHUNK_SIZE) ? Number(this.unread) : CHUNK_SIZE;
      const chunk = await this.source.read(this.next, want);
      if (chunk.length === 0) break;
      this.next += BigInt(chunk.length);
      this.unread -= BigInt(chunk.length);
      this.buffered = concatBytes([this.buffered, chunk]);
    }
    if (this.buffered.length < length) {
      throw new ZipError('ZIP_TRUNCATED', 'Central directory truncated', { offset: this.position });
    }
    return new LeBytes(this.buffered.subarray(0, length));
  }

  skip(length: number): void {
    this.buffered = this.buffered.subarray(length);
  }
}

function readHeader(header: LeBytes, strict: boolean, warn: (warning: ZipWarning) => void): ZipEntryRecord {
  const flags = header.u16(8);
  const nameLength = header.u16(28);
  const extraLength = header.u16(30);
  const name = decodeItemName(header.sub(HEADER_SIZE, nameLength), flags, strict, warn);

  const raw = {
    compressedSize: header.u32(20),
    uncompressedSize: header.u32(24),
    offset: header.u32(42),
    disk: header.u16(34)
  };
  const zip64 =
    raw.compressedSize === SATURATED_32 ||
    raw.uncompressedSize === SATURATED_32 ||
    raw.offset === SATURATED_32 ||
    raw.disk === SATURATED_16;
  const placement = zip64
    ? widenFromZip64Field(new LeBytes(header.sub(HEADER_SIZE + nameLength, extraLength)), raw, name)
    : {
        compressedSize: BigInt(raw.compressedSize),
        uncompressedSize: BigInt(raw.uncompressedSize),
        offset: BigInt(raw.offset),
        disk: raw.disk
      };
  if (placement.disk !== 0) {
    throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Multi-disk ZIP is not supported', { entryName: name });
  }

  return {
    name,
    flags,
    method: header.u16(10),
    crc32: header.u32(16),
    compressedSize: placement.compressedSize,
    uncompressedSize: placement.uncompressedSize,
    offset: placement.offset,
    isDirectory: name.endsWith('/'),
    encrypted: (flags & 0x1) !== 0,
    zip64
  };
}

type EntryPlacement = { compressedSize: bigint; uncompressedSize: bigint; offset: bigint; disk: number };

/**
 * Takes each saturated header value from the ZIP64 extended information
 * field. Only saturated values are present there, in the order uncompressed
 * size, compressed size, local header offset, disk.
 */
function widenFromZip64Field(
  extra: LeBytes,
  raw: { compressedSize: number; uncompressedSize: number; offset: number; disk: number },
  entryName: string
): EntryPlacement {
  const field = findExtraField(extra, ZIP64_FIELD_ID);
  if (!field) {
    throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 extra field missing', { entryName });
  }
  let at = 0;
  const take = (width: 4 | 8): bigint => {
    if (at + width > field.length) {
      throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 extra field truncated', { entryName });
    }
    const value = width === 8 ? field.u64(at) : BigInt(field.u32(at));
    at += width;
    return value;
  };
  const uncompressedSize = raw.uncompressedSize === SATURATED_32 ? take(8) : BigInt(raw.uncompressedSize);
  const compressedSize = raw.compressedSize === SATURATED_32 ? take(8) : BigInt(raw.compressedSize);
  const offset = raw.offset === SATURATED_32 ? take(8) : BigInt(raw.offset);
  const disk = raw.disk === SATURATED_16 ? Number(take(4)) : raw.disk;
  return { compressedSize, uncompressedSize, offset, disk };
}

function findExtraField(extra: LeBytes, id: number): LeBytes | undefined {
  let at = 0;
  while (at + 4 <= extra.length) {
    const size = extra.u16(at + 2);
    if (at + 4 + size > extra.length) return undefined;
    if (extra.u16(at) === id) return new LeBytes(extra.sub(at + 4, size));
    at += 4 + size;
  }
  return undefined;
}

/**
 * Package item names are ASCII with non-ASCII characters percent-encoded.
 * Any other name must at least be valid UTF-8, flagged or not.
 */
function decodeItemName(
  bytes: Uint8Array,
  flags: number,
  strict: boolean,
  warn: (warning: ZipWarning) => void
): string {
  try {
    return utf8.decode(bytes);
  } catch (err) {
    if (strict) {
      throw new ZipError('ZIP_INVALID_ENCODING', 'Invalid entry name encoding', {
        cause: err,
        context: { utf8Flag: String((flags & 0x800) !== 0) }
      });
    }
    const name = utf8Lenient.decode(bytes);
    warn({ code: 'ZIP_INVALID_ENCODING', message: 'Invalid entry name encoding; using replacement characters', entryName: name });
    return name;
  }
}
