export type RunlogErrorCode = 'LOG_CLOSED';

export class RunlogError extends Error {
  constructor(
    message: string,
    readonly code: RunlogErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised by an append on a log whose file handle was already released. */
export class ClosedLogError extends RunlogError {
  constructor(readonly logPath: string) {
    super(`Cannot append to closed log: ${logPath}`, 'LOG_CLOSED');
  }
}
