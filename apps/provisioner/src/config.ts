import { EnvConfigSchema, type PrompterKind } from '@netmount/shared';
import { configError } from './lib/errors.js';

export interface NetmountConfig {
  nodeEnv: string;
  isDevelopment: boolean;

  paths: {
    mountRoot: string;
    credentialsDir: string;
    fstab: string;
  };

  smb: {
    port: number;
    defaultUsername: string;
    extraMountOptions: string[];
  };

  menuTool: PrompterKind;

  /**
   * Owner suggested for mounted files. Under sudo this is the invoking
   * user, otherwise root.
   */
  defaultOwner: {
    uid: number;
    gid: number;
  };
}

/**
 * Build the configuration from environment variables.
 * Throws a CONFIG_VALIDATION_ERROR listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): NetmountConfig {
  // Unset and empty mean the same thing here
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      present[key] = value;
    }
  }

  const parsed = EnvConfigSchema.safeParse(present);
  if (!parsed.success) {
    throw configError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const uid = values.SUDO_UID ?? 0;

  return {
    nodeEnv: values.NODE_ENV,
    isDevelopment: values.NODE_ENV === 'development',
    paths: {
      mountRoot: values.NETMOUNT_MOUNT_ROOT.replace(/\/+$/, '') || '/',
      credentialsDir: values.NETMOUNT_CREDENTIALS_DIR,
      fstab: values.NETMOUNT_FSTAB_PATH,
    },
    smb: {
      port: values.NETMOUNT_SMB_PORT,
      defaultUsername: values.NETMOUNT_DEFAULT_USERNAME,
      extraMountOptions: values.NETMOUNT_EXTRA_OPTIONS,
    },
    menuTool: values.NETMOUNT_MENU_TOOL,
    defaultOwner: {
      uid,
      gid: values.SUDO_GID ?? uid,
    },
  };
}
