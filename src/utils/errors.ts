/** Error carrying the HTTP status the bridge should answer with. */
export class AppError extends Error {
  constructor(
    message: string,
    readonly status = 500,
    readonly code = 'internal_error'
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function badRequest(message: string): AppError {
  return new AppError(message, 400, 'bad_request');
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  // Body parser errors carry their own status
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return new AppError(error.message, error.status, error.status < 500 ? 'bad_request' : 'internal_error');
  }
  return new AppError(error instanceof Error ? error.message : String(error));
}
