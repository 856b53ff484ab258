/** Resource ceilings applied while reading packages and bundles. */
export type PackageLimits = {
  /** Maximum number of ZIP entries in one container. */
  maxParts?: number;
  /** Maximum decoded size of a single part. */
  maxUncompressedPartBytes?: bigint | number;
  /** Maximum decoded/encoded size ratio of a single part. */
  maxCompressionRatio?: number;
  /** Maximum size of an XML part read for parsing. */
  maxXmlBytes?: number;
  /** Maximum size of a compressed nested package inflated into memory. */
  maxNestedPackageBytes?: bigint | number;
  /** Maximum size of a stream source buffered into memory. */
  maxInputBytes?: bigint | number;
};

export type ResolvedPackageLimits = {
  maxParts: number;
  maxUncompressedPartBytes: bigint;
  maxCompressionRatio: number;
  maxXmlBytes: number;
  maxNestedPackageBytes: bigint;
  maxInputBytes: bigint;
};

export const DEFAULT_PACKAGE_LIMITS: Readonly<ResolvedPackageLimits> = Object.freeze({
  maxParts: 10000,
  maxUncompressedPartBytes: 512n * 1024n * 1024n,
  maxCompressionRatio: 1000,
  maxXmlBytes: 16 * 1024 * 1024,
  maxNestedPackageBytes: 1024n * 1024n * 1024n,
  maxInputBytes: 2n * 1024n * 1024n * 1024n
});

export function resolveLimits(limits?: PackageLimits): ResolvedPackageLimits {
  const defaults = DEFAULT_PACKAGE_LIMITS;
  return {
    maxParts: positiveInt(limits?.maxParts) ?? defaults.maxParts,
    maxUncompressedPartBytes: toBigInt(limits?.maxUncompressedPartBytes) ?? defaults.maxUncompressedPartBytes,
    maxCompressionRatio: limits?.maxCompressionRatio ?? defaults.maxCompressionRatio,
    maxXmlBytes: positiveInt(limits?.maxXmlBytes) ?? defaults.maxXmlBytes,
    maxNestedPackageBytes: toBigInt(limits?.maxNestedPackageBytes) ?? defaults.maxNestedPackageBytes,
    maxInputBytes: toBigInt(limits?.maxInputBytes) ?? defaults.maxInputBytes
  };
}

function positiveInt(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isFinite(value)) return undefined;
  return Math.max(0, Math.floor(value));
}

function toBigInt(value?: bigint | number): bigint | undefined {
  if (value === undefined) return undefined;
  return typeof value === 'bigint' ? value : BigInt(Math.floor(value));
}
