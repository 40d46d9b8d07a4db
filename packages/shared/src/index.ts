// Types
export * from './types/network.js';
export * from './types/share.js';
export * from './types/credential.js';
export * from './types/mount.js';
export * from './types/run.js';

// Constants
export * from './constants/status.js';
export * from './constants/errors.js';
export * from './constants/defaults.js';

// Schemas
export * from './schemas/config.js';
