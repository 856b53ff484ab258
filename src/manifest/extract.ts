import { debugExtract } from '../log.js';
import { openPackage, type PackageReader, type PackageSource } from '../package/PackageReader.js';
import type { PackageReaderOptions } from '../package/types.js';
import { parseXmlDocument, type XmlDocument } from '../xml/parse.js';
import { readBundleManifest, selectMainPackage } from './bundle.js';
import { APPX_BUNDLE_MANIFEST_CONTENT_TYPE, APPX_MANIFEST_CONTENT_TYPE } from './contentTypes.js';

/** An application manifest as read from its package. */
export interface ManifestDocument extends XmlDocument {
  /** Manifest part within the package it was read from. */
  partUri: string;
  /** Manifest text as stored, after decoding. */
  xml: string;
  /** For bundles: item name of the main package the manifest came from. */
  packageFileName?: string;
}

export type ExtractOptions = PackageReaderOptions;

/** Reads the application manifest of an open package. */
export async function readPackageManifest(pkg: PackageReader): Promise<ManifestDocument> {
  const part = pkg.findPartByContentType(APPX_MANIFEST_CONTENT_TYPE);
  const xml = await pkg.readPartText(part);
  const document = parseXmlDocument(xml, { partUri: part.uri });
  debugExtract('%s: manifest %s parsed, root <%s>', pkg.label, part.uri, document.rootName);
  return { ...document, partUri: part.uri, xml };
}

/** Extracts the application manifest of a package. The package is closed before this settles. */
export async function extractFromPackage(source: PackageSource, options?: ExtractOptions): Promise<ManifestDocument> {
  const pkg = await openPackage(source, options);
  try {
    return await readPackageManifest(pkg);
  } finally {
    await pkg.close();
  }
}

/**
 * Extracts the manifest of a bundle's main application package. The nested
 * package is closed before the bundle, on success and failure alike.
 */
export async function extractFromBundle(source: PackageSource, options?: ExtractOptions): Promise<ManifestDocument> {
  const bundle = await openPackage(source, options);
  try {
    return await readMainPackageManifest(bundle, options);
  } finally {
    await bundle.close();
  }
}

/** Extracts from a bundle or a package, whichever the container turns out to be. */
export async function extractManifest(source: PackageSource, options?: ExtractOptions): Promise<ManifestDocument> {
  const pkg = await openPackage(source, options);
  try {
    if (pkg.hasPartWithContentType(APPX_BUNDLE_MANIFEST_CONTENT_TYPE)) {
      debugExtract('%s: bundle manifest present, reading main package', pkg.label);
      return await readMainPackageManifest(pkg, options);
    }
    return await readPackageManifest(pkg);
  } finally {
    await pkg.close();
  }
}

async function readMainPackageManifest(bundle: PackageReader, options?: ExtractOptions): Promise<ManifestDocument> {
  const manifest = await readBundleManifest(bundle);
  const main = selectMainPackage(manifest.packages);
  debugExtract('%s: main package %s', bundle.label, main.fileName);
  const part = bundle.findPartByUri(`/${main.fileName}`);
  const inner = await bundle.openNestedPackage(part, options);
  try {
    const document = await readPackageManifest(inner);
    return { ...document, packageFileName: main.fileName };
  } finally {
    await inner.close();
  }
}
