export enum ErrorCode {
  ConfigInvalid = 'CONFIG_INVALID',
  SignalUnavailable = 'SIGNAL_UNAVAILABLE',
  SignalReadFailed = 'SIGNAL_READ_FAILED',
  StateIo = 'STATE_IO',
  LockFailed = 'LOCK_FAILED',
  ShutdownFailed = 'SHUTDOWN_FAILED',
  Unknown = 'UNKNOWN',
}

export class MonitorError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.Unknown,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'MonitorError';
  }
}

/**
 * Errno code of a Node system error, if the value carries one. Checked by
 * shape: errors raised inside Node's own modules may come from another realm,
 * where `instanceof Error` is false.
 */
export const errnoCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

export const errorMessage = (error: unknown, fallback = 'Unknown error'): string => {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return error === undefined || error === null ? fallback : String(error);
};

export const isMissingFile = (error: unknown): boolean => {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
};

export const toMonitorError = (error: unknown, fallback: ErrorCode = ErrorCode.Unknown): MonitorError => {
  if (error instanceof MonitorError) {
    return error;
  }

  if (isMissingFile(error)) {
    return new MonitorError(errorMessage(error, 'File not found'), ErrorCode.SignalUnavailable, error);
  }

  return new MonitorError(errorMessage(error), fallback, error);
};
