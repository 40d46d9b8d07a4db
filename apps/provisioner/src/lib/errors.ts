import { ErrorCodes, SOFT_ERROR_CODES, type ErrorCode } from '@netmount/shared';

export class NetmountError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'NetmountError';
  }

  /** Fatal errors abort the run; the others end only the current host */
  get isFatal(): boolean {
    return !SOFT_ERROR_CODES.has(this.code);
  }
}

export function isNetmountError(err: unknown): err is NetmountError {
  return err instanceof NetmountError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

export function configError(errors: string[]): NetmountError {
  return new NetmountError(
    'Invalid environment configuration:\n  - ' + errors.join('\n  - '),
    ErrorCodes.CONFIG_VALIDATION_ERROR,
    errors
  );
}
