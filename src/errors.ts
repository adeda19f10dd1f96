export const ERROR_KINDS = [
  "MissingArgument",
  "UnknownArgument",
  "InvalidArgumentType",
  "InvalidRange",
  "InvalidPath",
  "FileNotFound",
  "UnsupportedOrCorruptImage",
  "InvalidVectorDimensions",
  "ProcessorError",
] as const;
export type SiteImageErrorKind = (typeof ERROR_KINDS)[number];

/**
 * Terminal failure of an image function. `kind` lets callers branch on the
 * failure without matching message text; decode failures keep the
 * underlying error as `cause`.
 */
export class SiteImageError extends Error {
  readonly kind: SiteImageErrorKind;

  constructor(kind: SiteImageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SiteImageError";
    this.kind = kind;
  }
}

export function isSiteImageError(error: unknown, kind?: SiteImageErrorKind): error is SiteImageError {
  return error instanceof SiteImageError && (kind === undefined || error.kind === kind);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
