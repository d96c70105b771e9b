export const ERROR_KINDS = [
  'CaptureUnavailable',
  'TransportError',
  'ClassificationError',
  'ActuationError',
  'ProtocolError',
  'Busy',
  'InvalidState',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Structured failure as it travels in results and over the wire. */
export interface CycleFailure {
  kind: ErrorKind;
  message: string;
}

/**
 * Error raised by any stage of a cycle. Every failure in this codebase is
 * reported as one of these so callers can branch on `kind`.
 */
export class CycleError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CycleError';
    this.kind = kind;
  }

  toFailure(): CycleFailure {
    return { kind: this.kind, message: this.message };
  }
}

/**
 * Normalize anything thrown inside a stage. Errors that already carry a kind
 * pass through unmodified; everything else takes the stage's kind.
 */
export function toCycleError(error: unknown, fallback: ErrorKind): CycleError {
  if (error instanceof CycleError) return error;
  if (error instanceof Error) return new CycleError(fallback, error.message, { cause: error });
  return new CycleError(fallback, String(error));
}

const HTTP_STATUS: Record<ErrorKind, number> = {
  InvalidState: 400,
  ProtocolError: 400,
  Busy: 409,
  ActuationError: 500,
  TransportError: 502,
  ClassificationError: 502,
  CaptureUnavailable: 503,
};

export function httpStatusFor(kind: ErrorKind): number {
  return HTTP_STATUS[kind];
}
