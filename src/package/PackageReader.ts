import { stat } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { PackageError, toPackageError, type PackageWarning } from '../errors.js';
import { resolveLimits, type ResolvedPackageLimits } from '../limits.js';
import { debugPackage } from '../log.js';
import { BufferRandomAccess, FileRandomAccess, SliceRandomAccess, type RandomAccess } from '../reader/RandomAccess.js';
import { ZipReader, type OpenZipEntryOptions, type ZipEntry } from '../reader/ZipReader.js';
import { readAllBytes, StreamSizeError } from '../streams/buffer.js';
import { isNodeReadable, isWebReadable, toWebReadable, type ByteStream } from '../streams/adapters.js';
import { decodeXmlBytes, parseXmlDocument, type XmlDocument, type XmlParseOptions } from '../xml/parse.js';
import { CONTENT_TYPES_ITEM_NAME, ContentTypeMap } from './contentTypes.js';
import { findPartByContentType, findPartByUri } from './parts.js';
import { normalizePartUri, partUriFromItemName } from './partUri.js';
import type { PackagePart, PackageReaderOptions } from './types.js';

/** Anything a package can be opened from. */
export type PackageSource = string | URL | Uint8Array | ArrayBuffer | ByteStream | RandomAccess;

type PartIndex = {
  parts: PackagePart[];
  entries: Map<string, ZipEntry>;
  warnings: PackageWarning[];
};

/**
 * Read-only view of a package: the ZIP archive's items as parts with URIs and
 * content types. Owns its source until `close()`.
 */
export class PackageReader {
  private closed = false;
  private readonly limits: ResolvedPackageLimits;

  private constructor(
    private readonly zip: ZipReader,
    private readonly index: PartIndex,
    private readonly options: PackageReaderOptions | undefined,
    /** Where the package came from, for diagnostics. */
    readonly label: string
  ) {
    this.limits = resolveLimits(options?.limits);
  }

  /** Opens a package file. Fails with `PACKAGE_NOT_FOUND` unless the path names an existing file. */
  static async fromFile(pathLike: string | URL, options?: PackageReaderOptions): Promise<PackageReader> {
    const filePath = typeof pathLike === 'string' ? pathLike : fileURLToPath(pathLike);
    let source: FileRandomAccess;
    try {
      const info = await stat(filePath);
      if (!info.isFile()) {
        throw new PackageError('PACKAGE_NOT_FOUND', `Package path is not a file: ${filePath}`, {
          context: { path: filePath }
        });
      }
      source = await FileRandomAccess.open(filePath);
    } catch (err) {
      if (isMissingFileError(err)) {
        throw new PackageError('PACKAGE_NOT_FOUND', `Package file not found: ${filePath}`, {
          context: { path: filePath },
          cause: err
        });
      }
      throw err;
    }
    return PackageReader.fromRandomAccess(source, options, filePath);
  }

  static async fromUint8Array(data: Uint8Array, options?: PackageReaderOptions): Promise<PackageReader> {
    return PackageReader.fromRandomAccess(new BufferRandomAccess(data), options, '<memory>');
  }

  /** Buffers a stream into memory, up to `limits.maxInputBytes`, and opens it. */
  static async fromStream(stream: ByteStream, options?: PackageReaderOptions): Promise<PackageReader> {
    const maxBytes = resolveLimits(options?.limits).maxInputBytes;
    let data: Uint8Array;
    try {
      data = await readAllBytes(toWebReadable(stream), { maxBytes });
    } catch (err) {
      if (err instanceof StreamSizeError) {
        throw new PackageError('PACKAGE_LIMIT_EXCEEDED', err.message, {
          context: { limitInputBytes: maxBytes.toString() },
          cause: err
        });
      }
      throw err;
    }
    return PackageReader.fromRandomAccess(new BufferRandomAccess(data), options, '<stream>');
  }

  /** Opens a package over `source`, taking ownership: it is closed with the reader or when opening fails. */
  static async fromRandomAccess(
    source: RandomAccess,
    options?: PackageReaderOptions,
    label = '<random-access>'
  ): Promise<PackageReader> {
    let zip: ZipReader;
    try {
      zip = await ZipReader.open(source, options);
    } catch (err) {
      throw toPackageError(err, `Cannot open ${label} as a package`);
    }
    try {
      const index = await buildPartIndex(zip, options?.strict ?? true, resolveLimits(options?.limits));
      debugPackage('opened %s: %d parts', label, index.parts.length);
      return new PackageReader(zip, index, options, label);
    } catch (err) {
      await zip.close();
      throw toPackageError(err, `Cannot open ${label} as a package`);
    }
  }

  /** Parts in archive order. */
  parts(): PackagePart[] {
    this.assertOpen();
    return this.index.parts.map((part) => ({ ...part }));
  }

  warnings(): PackageWarning[] {
    const zipWarnings = this.zip.warnings().map(
      (warning): PackageWarning => ({
        code: warning.code,
        message: warning.message,
        ...(warning.entryName !== undefined ? { partUri: partUriFromItemName(warning.entryName) } : {})
      })
    );
    return [...zipWarnings, ...this.index.warnings];
  }

  hasPartWithContentType(contentType: string): boolean {
    this.assertOpen();
    return this.index.parts.some((part) => part.contentType === contentType);
  }

  findPartByContentType(contentType: string): PackagePart {
    this.assertOpen();
    const part = findPartByContentType(this.index.parts, contentType);
    debugPackage('%s: %s resolved to %s', this.label, contentType, part.uri);
    return { ...part };
  }

  findPartByUri(uri: string): PackagePart {
    this.assertOpen();
    return { ...findPartByUri(this.index.parts, uri) };
  }

  /** A fresh stream of the part's decoded bytes. Cancel it to release it early. */
  async openPart(part: PackagePart): Promise<ReadableStream<Uint8Array>> {
    return this.openEntry(part);
  }

  async readPartBytes(part: PackagePart, options?: { maxBytes?: bigint | number }): Promise<Uint8Array> {
    return this.collect(part, await this.openPart(part), options?.maxBytes);
  }

  /** Reads a part as text, honouring a UTF-16 byte order mark and otherwise requiring UTF-8. */
  async readPartText(part: PackagePart): Promise<string> {
    const bytes = await this.readPartBytes(part, { maxBytes: this.limits.maxXmlBytes });
    return decodeXmlBytes(bytes, part.uri);
  }

  async readPartXml(part: PackagePart, options?: Omit<XmlParseOptions, 'partUri'>): Promise<XmlDocument> {
    const text = await this.readPartText(part);
    return parseXmlDocument(text, { ...options, partUri: part.uri });
  }

  /**
   * Opens a part holding a package of its own. Stored parts are read in place
   * through this reader's source, so the nested reader must be closed before
   * this one; compressed parts are inflated into memory first.
   */
  async openNestedPackage(part: PackagePart, options?: PackageReaderOptions): Promise<PackageReader> {
    const entry = this.entryFor(part);
    const nestedOptions = options ?? this.options;
    const label = `${this.label}${part.uri}`;
    let range: { offset: bigint; length: bigint } | undefined;
    try {
      range = await this.zip.storedRange(entry);
    } catch (err) {
      throw toPackageError(err, `Cannot read part ${part.uri}`, part.uri);
    }
    if (range) {
      debugPackage('%s: opening stored nested package in place (%s bytes)', label, range.length);
      const slice = new SliceRandomAccess(this.zip.randomAccess, range.offset, range.length);
      return PackageReader.fromRandomAccess(slice, nestedOptions, label);
    }
    debugPackage('%s: inflating nested package into memory', label);
    // Bounded by maxNestedPackageBytes alone, not the per-part ceiling.
    const maxBytes = this.limits.maxNestedPackageBytes;
    const data = await this.collect(part, await this.openEntry(part, { maxUncompressedBytes: maxBytes }), maxBytes);
    return PackageReader.fromRandomAccess(new BufferRandomAccess(data), nestedOptions, label);
  }

  /** Releases the source. Later calls are no-ops. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    debugPackage('closing %s', this.label);
    await this.zip.close();
  }

  async [Symbol.asyncDispose](): Promise<void> {
    await this.close();
  }

  private async openEntry(part: PackagePart, options?: OpenZipEntryOptions): Promise<ReadableStream<Uint8Array>> {
    const entry = this.entryFor(part);
    try {
      return await this.zip.open(entry, options);
    } catch (err) {
      throw toPackageError(err, `Cannot read part ${part.uri}`, part.uri);
    }
  }

  private async collect(
    part: PackagePart,
    stream: ReadableStream<Uint8Array>,
    maxBytes: bigint | number | undefined
  ): Promise<Uint8Array> {
    try {
      return await readAllBytes(stream, maxBytes === undefined ? undefined : { maxBytes });
    } catch (err) {
      if (err instanceof StreamSizeError) {
        throw new PackageError('PACKAGE_LIMIT_EXCEEDED', `Part ${part.uri} exceeds ${err.maxBytes} bytes`, {
          partUri: part.uri,
          cause: err
        });
      }
      throw toPackageError(err, `Cannot read part ${part.uri}`, part.uri);
    }
  }

  private entryFor(part: PackagePart): ZipEntry {
    this.assertOpen();
    const entry = this.index.entries.get(part.uri);
    if (!entry) {
      throw new PackageError('PACKAGE_PART_NOT_FOUND', `No part named ${part.uri} in ${this.label}`, {
        partUri: part.uri
      });
    }
    return entry;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new PackageError('PACKAGE_CLOSED', `Package ${this.label} has been closed`);
    }
  }
}

/** Opens a package from a path, URL, bytes, stream or random-access source. */
export async function openPackage(source: PackageSource, options?: PackageReaderOptions): Promise<PackageReader> {
  if (typeof source === 'string' || source instanceof URL) {
    return PackageReader.fromFile(source, options);
  }
  if (source instanceof Uint8Array) {
    return PackageReader.fromUint8Array(source, options);
  }
  if (source instanceof ArrayBuffer) {
    return PackageReader.fromUint8Array(new Uint8Array(source), options);
  }
  if (isWebReadable(source) || isNodeReadable(source)) {
    return PackageReader.fromStream(source, options);
  }
  return PackageReader.fromRandomAccess(source, options);
}

async function buildPartIndex(zip: ZipReader, strict: boolean, limits: ResolvedPackageLimits): Promise<PartIndex> {
  const entries = zip.entries().filter((entry) => !entry.isDirectory);
  const contentTypesEntry = entries.find((entry) => entry.name.toLowerCase() === CONTENT_TYPES_ITEM_NAME.toLowerCase());
  if (!contentTypesEntry) {
    throw new PackageError('PACKAGE_INVALID_CONTAINER', `Archive has no ${CONTENT_TYPES_ITEM_NAME}`);
  }
  const contentTypesXml = await readEntry(zip, contentTypesEntry, limits.maxXmlBytes);
  let contentTypes: ContentTypeMap;
  try {
    contentTypes = ContentTypeMap.parse(decodeXmlBytes(contentTypesXml));
  } catch (err) {
    if (err instanceof PackageError && err.code === 'PACKAGE_XML_INVALID') {
      throw new PackageError('PACKAGE_INVALID_CONTAINER', `${CONTENT_TYPES_ITEM_NAME} is malformed: ${err.message}`, {
        cause: err
      });
    }
    throw err;
  }

  const parts: PackagePart[] = [];
  const byUri = new Map<string, ZipEntry>();
  const seen = new Map<string, string>();
  const warnings: PackageWarning[] = [];
  for (const entry of entries) {
    if (entry === contentTypesEntry) continue;
    const uri = partUriFromItemName(entry.name);
    const key = normalizePartUri(uri);
    const previous = seen.get(key);
    if (previous !== undefined) {
      const message = `Part ${uri} collides with ${previous}`;
      if (strict) {
        throw new PackageError('PACKAGE_INVALID_CONTAINER', message, { partUri: uri });
      }
      warnings.push({ code: 'PACKAGE_PART_COLLISION', message: `${message}; keeping the first`, partUri: uri });
      continue;
    }
    seen.set(key, uri);

    let contentType = contentTypes.resolve(uri);
    if (contentType === undefined) {
      const message = `Part ${uri} has no declared content type`;
      if (strict) {
        throw new PackageError('PACKAGE_INVALID_CONTAINER', message, { partUri: uri });
      }
      warnings.push({ code: 'PACKAGE_MISSING_CONTENT_TYPE', message, partUri: uri });
      contentType = '';
    }

    parts.push({
      uri,
      itemName: entry.name,
      contentType,
      size: entry.uncompressedSize,
      compressedSize: entry.compressedSize,
      method: entry.method
    });
    byUri.set(uri, entry);
  }
  return { parts, entries: byUri, warnings };
}

async function readEntry(zip: ZipReader, entry: ZipEntry, maxBytes: number): Promise<Uint8Array> {
  try {
    return await readAllBytes(await zip.open(entry), { maxBytes });
  } catch (err) {
    if (err instanceof StreamSizeError) {
      throw new PackageError('PACKAGE_LIMIT_EXCEEDED', `${entry.name} exceeds ${maxBytes} bytes`, { cause: err });
    }
    throw err;
  }
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}
