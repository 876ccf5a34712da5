export type IconsmithErrorKind =
  | "InvalidIdentifierFormat"
  | "NotFound"
  | "TransportFailure"
  | "MalformedSource"
  | "AmbiguousName"
  | "FilesystemFailure";

/**
 * Error raised anywhere in the pipeline. `subject` is the input, identifier or file the error is about.
 */
export class IconsmithError extends Error {
  constructor(
    public readonly kind: IconsmithErrorKind,
    message: string,
    public readonly subject?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "IconsmithError";
  }
}

export function isIconsmithError(error: unknown): error is IconsmithError {
  return error instanceof IconsmithError;
}

// Keeps an IconsmithError as-is, wraps anything else under the given kind
export function toIconsmithError(error: unknown, kind: IconsmithErrorKind, subject?: string): IconsmithError {
  if (error instanceof IconsmithError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new IconsmithError(kind, message, subject, { cause: error });
}

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return error instanceof Error && "code" in error && typeof error.code === "string" && codes.includes(error.code);
}

export function isMissingFile(error: unknown): boolean {
  return hasErrorCode(error, "ENOENT");
}

export interface ItemFailure {
  input: string;
  kind: IconsmithErrorKind;
  message: string;
}

export function toItemFailure(input: string, error: unknown, fallbackKind: IconsmithErrorKind): ItemFailure {
  const wrapped = toIconsmithError(error, fallbackKind, input);
  return { input, kind: wrapped.kind, message: wrapped.message };
}
