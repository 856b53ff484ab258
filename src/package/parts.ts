import { PackageError } from '../errors.js';
import type { PackagePart } from './types.js';

/**
 * First part, in archive order, whose content type equals `contentType`.
 * The comparison is exact; later parts with the same type are ignored.
 */
export function findPartByContentType(parts: readonly PackagePart[], contentType: string): PackagePart {
  const part = parts.find((candidate) => candidate.contentType === contentType);
  if (!part) {
    throw new PackageError('PACKAGE_PART_NOT_FOUND', `No part with content type ${contentType}`, {
      context: { contentType }
    });
  }
  return part;
}

/** Part whose URI equals `uri` exactly. */
export function findPartByUri(parts: readonly PackagePart[], uri: string): PackagePart {
  const part = parts.find((candidate) => candidate.uri === uri);
  if (!part) {
    throw new PackageError('PACKAGE_PART_NOT_FOUND', `No part named ${uri}`, { partUri: uri });
  }
  return part;
}
