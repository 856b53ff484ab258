import type { RandomAccess } from '../../src/index.js';
import { buildZip, type ZipItem } from './zipBuilder.js';

export const MANIFEST_CT = 'application/vnd.ms-appx.manifest+xml';
export const BUNDLE_MANIFEST_CT = 'application/vnd.ms-appx.bundlemanifest+xml';

export function manifestXml(name = 'Example.App', architecture = 'x64'): string {
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<Package xmlns="http://schemas.microsoft.com/appx/manifest/foundation/windows10">',
    `  <Identity Name="${name}" Publisher="CN=Example" Version="1.0.0.0" ProcessorArchitecture="${architecture}"/>`,
    '  <Properties>',
    '    <DisplayName>Example App</DisplayName>',
    '  </Properties>',
    '</Package>'
  ].join('\n');
}

export type ContentTypeDecls = {
  defaults?: Record<string, string>;
  overrides?: Record<string, string>;
};

export function contentTypesXml(decls: ContentTypeDecls): string {
  const defaults = Object.entries(decls.defaults ?? {}).map(
    ([extension, contentType]) => `<Default Extension="${extension}" ContentType="${contentType}"/>`
  );
  const overrides = Object.entries(decls.overrides ?? {}).map(
    ([partName, contentType]) => `<Override PartName="${partName}" ContentType="${contentType}"/>`
  );
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">',
    ...defaults,
    ...overrides,
    '</Types>'
  ].join('');
}

export type PackageFixtureOptions = {
  manifest?: string;
  method?: 'store' | 'deflate';
  /** Extra items placed after the manifest. */
  extra?: ZipItem[];
  contentTypes?: ContentTypeDecls;
  zip64?: boolean;
};

/** An application package with `[Content_Types].xml`, `AppxManifest.xml` and one asset. */
export function buildPackage(options?: PackageFixtureOptions): Uint8Array {
  const method = options?.method ?? 'deflate';
  const contentTypes = options?.contentTypes ?? {
    defaults: { xml: 'application/xml', png: 'image/png' },
    overrides: { '/AppxManifest.xml': MANIFEST_CT }
  };
  return buildZip([
    { name: '[Content_Types].xml', data: contentTypesXml(contentTypes), method },
    { name: 'AppxManifest.xml', data: options?.manifest ?? manifestXml(), method },
    { name: 'Assets/Logo.png', data: new Uint8Array([0x89, 0x50, 0x4e, 0x47, 1, 2, 3, 4]), method },
    ...(options?.extra ?? [])
  ], { zip64: options?.zip64 ?? false });
}

export type BundleEntryFixture = {
  type: string;
  fileName: string;
  architecture?: string;
};

export function bundleManifestXml(entries: readonly BundleEntryFixture[]): string {
  const packages = entries.map(
    (entry) =>
      `<Package Type="${entry.type}" Version="1.0.0.0" Architecture="${entry.architecture ?? 'neutral'}" ` +
      `FileName="${entry.fileName}" Offset="0" Size="0"/>`
  );
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<Bundle xmlns="http://schemas.microsoft.com/appx/2013/bundle" SchemaVersion="5.0">',
    '<Identity Name="Example.App" Publisher="CN=Example" Version="1.0.0.0"/>',
    '<Packages>',
    ...packages,
    '</Packages>',
    '</Bundle>'
  ].join('');
}

export type BundleFixtureOptions = {
  /** Bundle manifest text; defaults to one listing `packages`. */
  bundleManifest?: string;
  packages: readonly (BundleEntryFixture & { data: Uint8Array; method?: 'store' | 'deflate' })[];
  zip64?: boolean;
};

/** A bundle holding the given packages and an `AppxMetadata/AppxBundleManifest.xml` listing them. */
export function buildBundle(options: BundleFixtureOptions): Uint8Array {
  return buildZip([
    {
      name: '[Content_Types].xml',
      data: contentTypesXml({
        defaults: { appx: 'application/vnd.ms-appx', msix: 'application/vnd.ms-appx', xml: 'application/xml' },
        overrides: { '/AppxMetadata/AppxBundleManifest.xml': BUNDLE_MANIFEST_CT }
      })
    },
    ...options.packages.map((pkg): ZipItem => ({ name: pkg.fileName, data: pkg.data, method: pkg.method ?? 'store' })),
    {
      name: 'AppxMetadata/AppxBundleManifest.xml',
      data: options.bundleManifest ?? bundleManifestXml(options.packages),
      method: 'deflate'
    }
  ], { zip64: options.zip64 ?? false });
}

export type AccessEvent = { kind: 'read' | 'close'; source: string };

/** RandomAccess over bytes that records every read and close into a shared log. */
export class TrackingRandomAccess implements RandomAccess {
  closed = false;

  constructor(
    private readonly data: Uint8Array,
    readonly events: AccessEvent[] = [],
    readonly label = 'outer'
  ) {}

  async size(): Promise<bigint> {
    return BigInt(this.data.length);
  }

  async read(offset: bigint, length: number): Promise<Uint8Array> {
    if (this.closed) throw new Error(`${this.label} read after close`);
    this.events.push({ kind: 'read', source: this.label });
    const start = Number(offset);
    return this.data.subarray(start, Math.min(this.data.length, start + length));
  }

  async close(): Promise<void> {
    this.closed = true;
    this.events.push({ kind: 'close', source: this.label });
  }
}
