export const ErrorCodes = {
  // Fatal: the run cannot continue
  CONFIG_VALIDATION_ERROR: 'CONFIG_VALIDATION_ERROR',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  PRIVILEGE_REQUIRED: 'PRIVILEGE_REQUIRED',
  TOOL_MISSING: 'TOOL_MISSING',
  NETWORK_RANGE_UNAVAILABLE: 'NETWORK_RANGE_UNAVAILABLE',
  INVALID_NETWORK_RANGE: 'INVALID_NETWORK_RANGE',
  SCAN_FAILED: 'SCAN_FAILED',

  // Per-host: recorded in the run summary
  CREDENTIAL_WRITE_FAILED: 'CREDENTIAL_WRITE_FAILED',
  MOUNT_TABLE_READ_FAILED: 'MOUNT_TABLE_READ_FAILED',
  MOUNT_TABLE_WRITE_FAILED: 'MOUNT_TABLE_WRITE_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const SOFT_ERROR_CODES = new Set<ErrorCode>([
  ErrorCodes.CREDENTIAL_WRITE_FAILED,
  ErrorCodes.MOUNT_TABLE_READ_FAILED,
  ErrorCodes.MOUNT_TABLE_WRITE_FAILED,
]);
