import { PackageError } from '../errors.js';
import { debugExtract } from '../log.js';
import type { PackageReader } from '../package/PackageReader.js';
import { attribute, childElements, type XmlElement } from '../xml/parse.js';
import { APPX_BUNDLE_MANIFEST_CONTENT_TYPE } from './contentTypes.js';

export const APPLICATION_PACKAGE_TYPE = 'Application';

/** One `Packages/Package` element of a bundle manifest. */
export type BundlePackageEntry = {
  type: string;
  /** Item name of the package inside the bundle, relative to its root. */
  fileName: string;
  version?: string;
  architecture?: string;
  resourceId?: string;
  offset?: bigint;
  size?: bigint;
};

export type BundleManifest = {
  partUri: string;
  /** Package entries in document order. Entries without a `FileName` are left out. */
  packages: BundlePackageEntry[];
};

/** Reads the bundle manifest part of an open bundle. */
export async function readBundleManifest(bundle: PackageReader): Promise<BundleManifest> {
  const part = bundle.findPartByContentType(APPX_BUNDLE_MANIFEST_CONTENT_TYPE);
  const document = await bundle.readPartXml(part, { removeNamespacePrefixes: true });
  const packages = childElements(document.root, 'Packages')
    .flatMap((list) => childElements(list, 'Package'))
    .flatMap((element) => {
      const entry = toPackageEntry(element);
      return entry ? [entry] : [];
    });
  debugExtract('%s: bundle manifest lists %d packages', bundle.label, packages.length);
  return { partUri: part.uri, packages };
}

/**
 * First entry whose type is `Application`, compared ignoring ASCII case.
 * Further application entries are not considered.
 */
export function selectMainPackage(packages: readonly BundlePackageEntry[]): BundlePackageEntry {
  const main = packages.find((entry) => entry.type.toLowerCase() === APPLICATION_PACKAGE_TYPE.toLowerCase());
  if (!main) {
    throw new PackageError('PACKAGE_MAIN_PACKAGE_NOT_FOUND', 'Bundle manifest lists no application package', {
      context: { packages: String(packages.length) }
    });
  }
  return main;
}

function toPackageEntry(element: XmlElement): BundlePackageEntry | undefined {
  const fileName = attribute(element, 'FileName');
  if (fileName === undefined || fileName === '') return undefined;
  const version = attribute(element, 'Version');
  const architecture = attribute(element, 'Architecture');
  const resourceId = attribute(element, 'ResourceId');
  const offset = parseUnsigned(attribute(element, 'Offset'));
  const size = parseUnsigned(attribute(element, 'Size'));
  return {
    type: attribute(element, 'Type') ?? '',
    fileName,
    ...(version !== undefined ? { version } : {}),
    ...(architecture !== undefined ? { architecture } : {}),
    ...(resourceId !== undefined ? { resourceId } : {}),
    ...(offset !== undefined ? { offset } : {}),
    ...(size !== undefined ? { size } : {})
  };
}

function parseUnsigned(value: string | undefined): bigint | undefined {
  return value !== undefined && /^\d+$/.test(value) ? BigInt(value) : undefined;
}
