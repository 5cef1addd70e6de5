// api/src/common/errors/serving.errors.ts

/**
 * Failure kinds raised by the serving runtime. Each carries a `kind`
 * discriminant so handlers can switch on it without instanceof chains.
 * Status codes are assigned only at the HTTP boundary
 * (see ServingExceptionFilter).
 */
export type ServingErrorKind =
  | 'ArtifactLoad'
  | 'ServiceUnavailable'
  | 'InferenceFailure'
  | 'AuditWriteFailure'
  | 'MalformedBody';

export abstract class ServingError extends Error {
  abstract readonly kind: ServingErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ArtifactLoadReason =
  | 'NotFound'
  | 'Unreadable'
  | 'InvalidFormat'
  | 'FeatureMismatch';

export class ArtifactLoadError extends ServingError {
  readonly kind = 'ArtifactLoad' as const;

  constructor(
    readonly reason: ArtifactLoadReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The registry holds no artifact pair (never loaded, failed, or unloaded). */
export class ServiceUnavailableError extends ServingError {
  readonly kind = 'ServiceUnavailable' as const;

  constructor(message = 'Model registry is not ready') {
    super(message);
  }
}

/** Scaling or regression failed on a loaded pair: corrupt data or artifact. */
export class InferenceFailureError extends ServingError {
  readonly kind = 'InferenceFailure' as const;
}

export class AuditWriteFailureError extends ServingError {
  readonly kind = 'AuditWriteFailure' as const;
}

/** The request body could not be parsed as JSON. */
export class MalformedBodyError extends ServingError {
  readonly kind = 'MalformedBody' as const;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
