export {
  extractFromBundle,
  extractFromPackage,
  extractManifest,
  readPackageManifest
} from './manifest/extract.js';
export type { ExtractOptions, ManifestDocument } from './manifest/extract.js';
export { readBundleManifest, selectMainPackage } from './manifest/bundle.js';
export type { BundleManifest, BundlePackageEntry } from './manifest/bundle.js';
export { APPX_BUNDLE_MANIFEST_CONTENT_TYPE, APPX_MANIFEST_CONTENT_TYPE } from './manifest/contentTypes.js';

export { PackageReader, openPackage } from './package/PackageReader.js';
export type { PackageSource } from './package/PackageReader.js';
export type { PackagePart, PackageReaderOptions } from './package/types.js';
export { CONTENT_TYPES_ITEM_NAME, ContentTypeMap } from './package/contentTypes.js';
export { normalizePartUri, partUriFromItemName } from './package/partUri.js';
export { findPartByContentType, findPartByUri } from './package/parts.js';

export { ZipReader } from './reader/ZipReader.js';
export type { OpenZipEntryOptions, ZipEntry, ZipReaderOptions } from './reader/ZipReader.js';
export { BufferRandomAccess, FileRandomAccess, SliceRandomAccess } from './reader/RandomAccess.js';
export type { RandomAccess } from './reader/RandomAccess.js';
export { listCompressionCodecs, registerCompressionCodec } from './compression/registry.js';
export type { ZipCompressionCodec, ZipCompressionStream } from './compression/types.js';

export { PackageError, ZipError } from './errors.js';
export type { PackageErrorCode, PackageErrorReport, PackageWarning, PackageWarningCode, ZipErrorCode, ZipWarning } from './errors.js';
export { DEFAULT_PACKAGE_LIMITS } from './limits.js';
export type { PackageLimits } from './limits.js';
export type { XmlDocument, XmlElement, XmlValue } from './xml/parse.js';
