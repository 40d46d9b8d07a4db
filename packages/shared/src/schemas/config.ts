import { z } from 'zod';
import {
  DEFAULT_CREDENTIALS_DIR,
  DEFAULT_FSTAB_PATH,
  DEFAULT_MOUNT_ROOT,
  DEFAULT_USERNAME,
  SMB_PORT,
} from '../constants/defaults.js';

const absolutePath = z.string().startsWith('/', { message: 'must be an absolute path' });

const numericId = z
  .string()
  .regex(/^\d+$/, { message: 'must be a numeric id' })
  .transform((value) => parseInt(value, 10));

export const MenuToolSchema = z.enum(['auto', 'whiptail', 'dialog', 'plain']);

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const EnvConfigSchema = z.object({
  NODE_ENV: z.string().default('production'),
  LOG_LEVEL: LogLevelSchema.optional(),
  NETMOUNT_MOUNT_ROOT: absolutePath.default(DEFAULT_MOUNT_ROOT),
  NETMOUNT_CREDENTIALS_DIR: absolutePath.default(DEFAULT_CREDENTIALS_DIR),
  NETMOUNT_FSTAB_PATH: absolutePath.default(DEFAULT_FSTAB_PATH),
  NETMOUNT_SMB_PORT: z.coerce.number().int().min(1).max(65535).default(SMB_PORT),
  NETMOUNT_DEFAULT_USERNAME: z.string().min(1).default(DEFAULT_USERNAME),
  NETMOUNT_EXTRA_OPTIONS: z
    .string()
    .default('')
    .transform((value) => value.split(',').map((option) => option.trim()).filter(Boolean)),
  NETMOUNT_MENU_TOOL: MenuToolSchema.default('auto'),
  SUDO_UID: numericId.optional(),
  SUDO_GID: numericId.optional(),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;
