import type { PackageLimits } from '../limits.js';

/** A named, typed entry of a package. */
export type PackagePart = {
  /** Part name: `/` followed by the percent-decoded ZIP item name. */
  uri: string;
  /** ZIP item name as stored in the archive. */
  itemName: string;
  /** Declared content type; empty only for undeclared parts read in non-strict mode. */
  contentType: string;
  size: bigint;
  compressedSize: bigint;
  /** ZIP compression method id. */
  method: number;
};

export type PackageReaderOptions = {
  /** Reject structural irregularities instead of recording warnings. Defaults to true. */
  strict?: boolean;
  limits?: PackageLimits;
};
