import { LeBytes } from '../binary.js';
import { ZipError, type ZipWarning } from '../errors.js';
import type { RandomAccess } from './RandomAccess.js';

const END_SIGNATURE = 0x06054b50;
const END_SIZE = 22;
const MAX_COMMENT = 0xffff;
const ZIP64_END_SIGNATURE = 0x06064b50;
const ZIP64_END_SIZE = 56;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const ZIP64_LOCATOR_SIZE = 20;

/** Where the central directory lives, as recorded by the end records. */
export interface CentralDirectoryLocation {
  offset: bigint;
  size: bigint;
  entries: bigint;
  zip64: boolean;
  warnings: ZipWarning[];
}

export interface FindEocdOptions {
  strict: boolean;
  maxEntries?: number;
}

/**
 * Locates the end of central directory record, following the ZIP64 locator
 * when any field is saturated.
 */
export async function findEocd(source: RandomAccess, options: FindEocdOptions): Promise<CentralDirectoryLocation> {
  const fileSize = await source.size();
  if (fileSize < BigInt(END_SIZE)) {
    throw new ZipError('ZIP_EOCD_NOT_FOUND', 'File too small for EOCD');
  }
  const tailSize = fileSize < BigInt(END_SIZE + MAX_COMMENT) ? Number(fileSize) : END_SIZE + MAX_COMMENT;
  const tailStart = fileSize - BigInt(tailSize);
  const tail = new LeBytes(await source.read(tailStart, tailSize));

  const warnings: ZipWarning[] = [];
  const at = pickEndRecord(tail, tailStart, fileSize, options.strict, warnings);
  const end = new LeBytes(tail.sub(at, END_SIZE));
  const endOffset = tailStart + BigInt(at);

  const thisDisk = end.u16(4);
  const directoryDisk = end.u16(6);
  const entries = end.u16(10);
  const size = end.u32(12);
  const offset = end.u32(16);
  const saturated = directoryDisk === 0xffff || entries === 0xffff || size === 0xffffffff || offset === 0xffffffff;

  const location = saturated
    ? await readZip64End(source, endOffset, warnings)
    : checkSingleDisk(thisDisk, directoryDisk, {
        offset: BigInt(offset),
        size: BigInt(size),
        entries: BigInt(entries),
        zip64: false,
        warnings
      });

  if (options.maxEntries !== undefined && location.entries > BigInt(options.maxEntries)) {
    throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Entry count exceeds limit', {
      context: { requiredEntries: location.entries.toString(), limitEntries: String(options.maxEntries) }
    });
  }
  if (location.offset + location.size > fileSize) {
    throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Central directory extends past end of file', {
      offset: location.offset
    });
  }
  return location;
}

/**
 * Index of the archive's own record within `tail`. Stored entries such as
 * nested packages can carry EOCD signatures too, so the record whose comment
 * ends exactly at EOF wins; failing that, strict mode rejects the archive and
 * lenient mode takes the last signature found.
 */
function pickEndRecord(
  tail: LeBytes,
  tailStart: bigint,
  fileSize: bigint,
  strict: boolean,
  warnings: ZipWarning[]
): number {
  let fallback: number | undefined;
  for (let at = tail.length - END_SIZE; at >= 0; at -= 1) {
    if (tail.u32(at) !== END_SIGNATURE) continue;
    if (tailStart + BigInt(at + END_SIZE + tail.u16(at + 20)) === fileSize) return at;
    fallback ??= at;
  }
  if (fallback === undefined) {
    throw new ZipError('ZIP_EOCD_NOT_FOUND', 'End of central directory not found');
  }
  if (strict) {
    throw new ZipError('ZIP_BAD_EOCD', 'EOCD does not end at EOF');
  }
  warnings.push({ code: 'ZIP_BAD_EOCD', message: 'EOCD does not end at EOF; continuing in non-strict mode' });
  return fallback;
}

async function readZip64End(
  source: RandomAccess,
  endOffset: bigint,
  warnings: ZipWarning[]
): Promise<CentralDirectoryLocation> {
  const locatorOffset = endOffset - BigInt(ZIP64_LOCATOR_SIZE);
  if (locatorOffset < 0n) {
    throw new ZipError('ZIP_BAD_ZIP64', 'Missing ZIP64 locator');
  }
  const locator = new LeBytes(await source.read(locatorOffset, ZIP64_LOCATOR_SIZE));
  if (locator.length < ZIP64_LOCATOR_SIZE || locator.u32(0) !== ZIP64_LOCATOR_SIGNATURE) {
    throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 locator signature missing', { offset: locatorOffset });
  }
  const recordOffset = locator.u64(8);
  const record = new LeBytes(await source.read(recordOffset, ZIP64_END_SIZE));
  if (record.length < ZIP64_END_SIZE || record.u32(0) !== ZIP64_END_SIGNATURE) {
    throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 EOCD signature missing', { offset: recordOffset });
  }
  return checkSingleDisk(record.u32(16), record.u32(20), {
    entries: record.u64(32),
    size: record.u64(40),
    offset: record.u64(48),
    zip64: true,
    warnings
  });
}

function checkSingleDisk(
  thisDisk: number,
  directoryDisk: number,
  location: CentralDirectoryLocation
): CentralDirectoryLocation {
  if (thisDisk !== 0 || directoryDisk !== 0) {
    throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Multi-disk ZIP archives are not supported', {
      context: { diskNumber: String(thisDisk), cdDisk: String(directoryDisk) }
    });
  }
  return location;
}
