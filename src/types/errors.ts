export type CatalogErrorKind =
  | 'PARSE_FAILURE'
  | 'MISSING_FIELD'
  | 'INVALID_FIELD_VALUE'
  | 'COLLISION_CONFLICT'
  | 'FILESYSTEM_FAILURE';

/**
 * Per-file failure. Batch code catches these, logs them with their path and
 * moves on to the next file.
 */
export class CatalogError extends Error {
  readonly kind: CatalogErrorKind;
  readonly filePath: string;

  constructor(kind: CatalogErrorKind, message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogError';
    this.kind = kind;
    this.filePath = filePath;
  }
}

/** Message of an unknown thrown value, for log lines. */
export function describeError(err: unknown): string {
  if (err instanceof CatalogError && err.cause !== undefined) {
    return `${err.message}: ${describeError(err.cause)}`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
