/**
 * Error taxonomy shared by every layer of the engine.
 */

export type PackageErrorKind =
  | "NotFound"
  | "CorruptArchive"
  | "IOFailure"
  | "InvalidPath"
  | "MalformedMarkup"
  | "SerializationMismatch"
  | "FilterFailure"
  | "InvalidConfiguration"
  | "AuthenticationFailure"
  | "ManifestInconsistent"
  | "Cancelled"
  | "Timeout";

export class PackageError extends Error {
  readonly kind: PackageErrorKind;
  /** Offending entry or file path, when there is one */
  readonly path?: string;

  constructor(
    kind: PackageErrorKind,
    message: string,
    options: { path?: string; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PackageError";
    this.kind = kind;
    this.path = options.path;
  }
}

/**
 * A filter's internal error, attributed to the filter that raised it.
 */
export class FilterFailure extends PackageError {
  readonly filter: string;

  constructor(filter: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("FilterFailure", `Filter "${filter}" failed: ${detail}`, {
      path: cause instanceof PackageError ? cause.path : undefined,
      cause,
    });
    this.name = "FilterFailure";
    this.filter = filter;
  }
}

export function isPackageError(error: unknown, kind?: PackageErrorKind): error is PackageError {
  return error instanceof PackageError && (kind === undefined || error.kind === kind);
}

/**
 * Error kind of the innermost PackageError in a cause chain.
 * A FilterFailure wrapping a NotFound reports "NotFound".
 */
export function rootKind(error: unknown): PackageErrorKind | null {
  let current: unknown = error;
  let kind: PackageErrorKind | null = null;
  while (current instanceof Error) {
    if (current instanceof PackageError) kind = current.kind;
    current = current.cause;
  }
  return kind;
}

/**
 * Short user-facing description: taxonomy kind, path where applicable, message.
 */
export function describeError(error: unknown): string {
  if (error instanceof PackageError) {
    return error.path
      ? `${error.kind} (${error.path}): ${error.message}`
      : `${error.kind}: ${error.message}`;
  }
  return error instanceof Error ? error.message : "Unknown error";
}
