import { LeBytes } from '../binary.js';
import { ZipError } from '../errors.js';
import type { RandomAccess } from './RandomAccess.js';
import type { ZipEntryRecord } from './centralDirectory.js';

const LOCAL_SIGNATURE = 0x04034b50;
const LOCAL_SIZE = 30;

export interface LocalHeaderInfo {
  flags: number;
  method: number;
  /** Offset of the first byte of entry data. */
  dataOffset: bigint;
}

/**
 * Reads the local header in front of an entry's data. Its variable-length
 * fields can differ from the central directory's, so the data offset comes
 * from here.
 */
export async function readLocalHeader(source: RandomAccess, entry: ZipEntryRecord): Promise<LocalHeaderInfo> {
  const header = new LeBytes(await source.read(entry.offset, LOCAL_SIZE));
  if (header.length < LOCAL_SIZE || header.u32(0) !== LOCAL_SIGNATURE) {
    throw new ZipError('ZIP_INVALID_SIGNATURE', `No local header for ${entry.name}`, {
      entryName: entry.name,
      offset: entry.offset
    });
  }
  const dataOffset = entry.offset + BigInt(LOCAL_SIZE + header.u16(26) + header.u16(28));
  if (dataOffset + entry.compressedSize > (await source.size())) {
    throw new ZipError('ZIP_TRUNCATED', `Data of ${entry.name} runs past the end of the archive`, {
      entryName: entry.name,
      offset: dataOffset
    });
  }
  return { flags: header.u16(6), method: header.u16(8), dataOffset };
}
