/**
 * Status value constants.
 * Runtime values that mirror the TypeScript types for safe comparisons.
 */

// Per-host pipeline outcome
export const HostStatusValues = {
  PROVISIONED: 'provisioned',
  NO_SHARES: 'no-shares',
  CANCELLED: 'cancelled',
  FAILED: 'failed',
} as const;

export type HostStatus = (typeof HostStatusValues)[keyof typeof HostStatusValues];

// Mount table merge outcome
export const MergeOutcomeValues = {
  APPENDED: 'appended',
  EXISTS: 'exists',
  CONFLICT: 'conflict',
} as const;

export type MergeOutcome = (typeof MergeOutcomeValues)[keyof typeof MergeOutcomeValues];

// Activation outcome
export const ActivationStatusValues = {
  STARTED: 'started',
  DEFERRED: 'deferred',
} as const;

export type ActivationStatus = (typeof ActivationStatusValues)[keyof typeof ActivationStatusValues];

export const PrompterKindValues = {
  AUTO: 'auto',
  WHIPTAIL: 'whiptail',
  DIALOG: 'dialog',
  PLAIN: 'plain',
} as const;

export type PrompterKind = (typeof PrompterKindValues)[keyof typeof PrompterKindValues];
