/**
 * Reasons a session cannot be logged. Nothing is stored when one is thrown.
 */
export type LogSessionErrorKind = 'unknownTemplate' | 'scoreOutOfRange' | 'missingResult';

export class LogSessionError extends Error {
  public readonly kind: LogSessionErrorKind;
  /** Position of the offending drill in the request, when there is one */
  public readonly drillIndex: number | null;

  constructor(kind: LogSessionErrorKind, message: string, drillIndex: number | null = null) {
    super(message);
    this.name = 'LogSessionError';
    this.kind = kind;
    this.drillIndex = drillIndex;

    Error.captureStackTrace?.(this, LogSessionError);
  }
}
