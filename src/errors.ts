/** Error taxonomy for a push run. Consumers branch on `kind`, not on the subclass. */
export type PushErrorKind = "configuration" | "unauthorized" | "conflict" | "bad_request" | "transport";

export class PushError extends Error {
  readonly kind: PushErrorKind;
  /** Operations this error travelled through, innermost first. */
  readonly operations: string[];

  constructor(kind: PushErrorKind, message: string, options?: { cause?: unknown; operations?: string[] }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PushError";
    this.kind = kind;
    this.operations = options?.operations ?? [];
  }
}

export class ConfigurationError extends PushError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("configuration", message, options);
    this.name = "ConfigurationError";
  }
}

/** The registry rejected the bearer credential; the message is its response body. */
export class UnauthorizedError extends PushError {
  constructor(body: string) {
    super("unauthorized", `Unauthorized: ${body}`);
    this.name = "UnauthorizedError";
  }
}

export class ConflictError extends PushError {
  readonly uploadName: string;
  readonly version: string;

  constructor(uploadName: string, version: string) {
    super("conflict", `${uploadName}/${version} already exists`);
    this.name = "ConflictError";
    this.uploadName = uploadName;
    this.version = version;
  }
}

export class BadRequestError extends PushError {
  constructor(body: string) {
    super("bad_request", `Bad request: ${body}`);
    this.name = "BadRequestError";
  }
}

export class TransportError extends PushError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transport", message, options);
    this.name = "TransportError";
  }
}

/**
 * Attach the failing operation to an error. Kinds survive wrapping;
 * anything that is not a PushError becomes a transport error.
 */
export function wrapError(operation: string, err: unknown): PushError {
  if (err instanceof PushError) {
    return new PushError(err.kind, `${operation}: ${err.message}`, {
      cause: err,
      operations: [...err.operations, operation],
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new PushError("transport", `${operation}: ${message}`, { cause: err, operations: [operation] });
}

/** Run `fn`, wrapping whatever it throws with `operation`. */
export async function withOperation<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw wrapError(operation, err);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
