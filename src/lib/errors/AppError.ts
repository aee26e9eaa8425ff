export type AppErrorCode =
  | 'APP_ERROR'
  | 'SCHEMA_INVALID'
  | 'CRUD_INVALID_INPUT'
  | 'CRUD_NOT_FOUND'
  | 'STORE_ACTION_FAILED'
  | (string & {});

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly cause?: unknown;

  constructor(message: string, code: AppErrorCode = 'APP_ERROR', cause?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.cause = cause;
  }
}
