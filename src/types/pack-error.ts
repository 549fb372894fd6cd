/**
 * Error and result types shared by every pack codec operation.
 */

export type PackErrorKind =
  | 'BadMagic'
  | 'TruncatedFile'
  | 'TrailingData'
  | 'DuplicateBlock'
  | 'MissingRequiredBlock'
  | 'BlockIdMismatch'
  | 'InvalidDdsHeader'
  | 'InconsistentSize'
  | 'EmptyTable'
  | 'InvalidRange'
  | 'InvalidBlockName'
  | 'InvalidOperation'
  | 'IoFailure';

/**
 * Error raised by a pack load or write.
 * Carries the failure kind and the file it came from ("buffer" for in-memory input).
 */
export class PackError extends Error {
  constructor(
    public readonly kind: PackErrorKind,
    public readonly detail: string,
    public readonly source: string,
    public readonly cause?: unknown
  ) {
    super(`${detail} (${kind}, source: ${source})`);
    this.name = 'PackError';
  }
}

export type PackResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: PackError };

export function ok<T>(value: T): PackResult<T> {
  return { ok: true, value };
}

export function fail(kind: PackErrorKind, detail: string, source: string, cause?: unknown): PackResult<never> {
  return { ok: false, error: new PackError(kind, detail, source, cause) };
}
