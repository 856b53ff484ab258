export const REPORT_SCHEMA_VERSION = '1';

/** Codes raised while reading the ZIP container underneath a package. */
export type ZipErrorCode =
  | 'ZIP_EOCD_NOT_FOUND'
  | 'ZIP_BAD_EOCD'
  | 'ZIP_BAD_ZIP64'
  | 'ZIP_BAD_CENTRAL_DIRECTORY'
  | 'ZIP_UNSUPPORTED_METHOD'
  | 'ZIP_UNSUPPORTED_FEATURE'
  | 'ZIP_UNSUPPORTED_ENCRYPTION'
  | 'ZIP_BAD_CRC'
  | 'ZIP_DECOMPRESSION_FAILED'
  | 'ZIP_LIMIT_EXCEEDED'
  | 'ZIP_INVALID_ENCODING'
  | 'ZIP_TRUNCATED'
  | 'ZIP_INVALID_SIGNATURE';

export type ZipErrorDetails = {
  entryName?: string | undefined;
  method?: number | undefined;
  offset?: bigint | undefined;
  context?: Record<string, string> | undefined;
  cause?: unknown;
};

/**
 * Archive-level failure. Package operations never surface it directly: it
 * reaches callers as the `cause` of a {@link PackageError}.
 */
export class ZipError extends Error {
  readonly code: ZipErrorCode;
  readonly entryName: string | undefined;
  readonly method: number | undefined;
  /** Byte offset in the archive, when the failure has one. */
  readonly offset: bigint | undefined;
  readonly context: Record<string, string> | undefined;

  constructor(code: ZipErrorCode, message: string, details: ZipErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ZipError';
    this.code = code;
    this.entryName = details.entryName;
    this.method = details.method;
    this.offset = details.offset;
    this.context = details.context;
  }
}

/** Structural irregularities tolerated outside strict mode. */
export type ZipWarningCode =
  | 'ZIP_BAD_EOCD'
  | 'ZIP_BAD_CENTRAL_DIRECTORY'
  | 'ZIP_BAD_CRC'
  | 'ZIP_INVALID_ENCODING'
  | 'ZIP_LIMIT_EXCEEDED';

export type ZipWarning = {
  code: ZipWarningCode;
  message: string;
  entryName?: string;
};

export type PackageErrorCode =
  | 'PACKAGE_NOT_FOUND'
  | 'PACKAGE_INVALID_CONTAINER'
  | 'PACKAGE_PART_NOT_FOUND'
  | 'PACKAGE_MAIN_PACKAGE_NOT_FOUND'
  | 'PACKAGE_XML_INVALID'
  | 'PACKAGE_LIMIT_EXCEEDED'
  | 'PACKAGE_CLOSED';

export type PackageErrorDetails = {
  /** URI of the part involved, if any. */
  partUri?: string | undefined;
  context?: Record<string, string> | undefined;
  cause?: unknown;
};

export type PackageErrorReport = {
  schemaVersion: string;
  name: string;
  code: PackageErrorCode;
  message: string;
  hint: string;
  context: Record<string, string>;
  partUri?: string;
  cause?: { name: string; code?: string; message: string };
};

// Context keys that would collide with the report's own fields.
const REPORT_KEYS: ReadonlySet<string> = new Set([
  'schemaVersion',
  'name',
  'code',
  'message',
  'hint',
  'context',
  'partUri',
  'cause'
]);

/** Error thrown while opening packages, resolving parts and reading manifests. */
export class PackageError extends Error {
  readonly code: PackageErrorCode;
  readonly partUri: string | undefined;
  readonly context: Record<string, string> | undefined;

  constructor(code: PackageErrorCode, message: string, details: PackageErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'PackageError';
    this.code = code;
    this.partUri = details.partUri;
    this.context = details.context;
  }

  /** JSON-safe report; the cause is summarized rather than nested. */
  toJSON(): PackageErrorReport {
    const context = Object.fromEntries(
      Object.entries(this.context ?? {}).filter(([key]) => !REPORT_KEYS.has(key))
    );
    const cause = summarizeCause(this.cause);
    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context,
      ...(this.partUri !== undefined ? { partUri: this.partUri } : {}),
      ...(cause ? { cause } : {})
    };
  }
}

export type PackageWarningCode = 'PACKAGE_PART_COLLISION' | 'PACKAGE_MISSING_CONTENT_TYPE';

export type PackageWarning = {
  code: PackageWarningCode | ZipWarningCode;
  message: string;
  partUri?: string;
};

/**
 * Wraps a {@link ZipError} as `PACKAGE_LIMIT_EXCEEDED` when a ceiling was hit
 * and `PACKAGE_INVALID_CONTAINER` otherwise. Anything else is returned as is.
 */
export function toPackageError(err: unknown, message: string, partUri?: string): unknown {
  if (!(err instanceof ZipError)) return err;
  return new PackageError(
    err.code === 'ZIP_LIMIT_EXCEEDED' ? 'PACKAGE_LIMIT_EXCEEDED' : 'PACKAGE_INVALID_CONTAINER',
    `${message}: ${err.message}`,
    { partUri, context: { zipCode: err.code }, cause: err }
  );
}

function summarizeCause(cause: unknown): PackageErrorReport['cause'] {
  if (!(cause instanceof Error)) return undefined;
  const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
  return { name: cause.name, message: cause.message, ...(code !== undefined ? { code } : {}) };
}
