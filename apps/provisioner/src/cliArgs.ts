import { ErrorCodes, MenuToolSchema, type PrompterKind } from '@netmount/shared';
import { NetmountError } from './lib/errors.js';

export interface CliOptions {
  help: boolean;
  dryRun: boolean;
  range?: string;
  menuTool?: PrompterKind;
}

export const USAGE = `
netmount - discover SMB servers and provision on-demand CIFS mounts

Usage: netmount [options]

Options:
  --range <cidr>        Network range to scan (skips detection), e.g. 192.168.1.0/24
  --menu-tool <tool>    Menu backend: auto, whiptail, dialog or plain (default: auto)
  --plain               Same as --menu-tool plain
  --dry-run             Scan and list shares, but write nothing and start no mounts
  -h, --help            Show this help message

Environment:
  NETMOUNT_MOUNT_ROOT        Where mount points are created (default: /mnt)
  NETMOUNT_CREDENTIALS_DIR   Credential file directory (default: /etc/netmount/credentials)
  NETMOUNT_FSTAB_PATH        Mount table to update (default: /etc/fstab)
  NETMOUNT_SMB_PORT          Port probed by the scan (default: 445)
  NETMOUNT_DEFAULT_USERNAME  Suggested SMB username (default: guest)
  NETMOUNT_EXTRA_OPTIONS     Extra mount options, comma separated (e.g. vers=3.0)
  NETMOUNT_MENU_TOOL         Default for --menu-tool
  LOG_LEVEL                  Log level (default: info)

Examples:
  sudo netmount
  sudo netmount --range 10.0.0.0/24 --plain
  netmount --dry-run
`;

function parseMenuTool(value: string): PrompterKind {
  const parsed = MenuToolSchema.safeParse(value);
  if (!parsed.success) {
    throw new NetmountError(
      `--menu-tool must be one of auto, whiptail, dialog, plain: ${value}`,
      ErrorCodes.INVALID_ARGUMENT
    );
  }
  return parsed.data;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = { help: false, dryRun: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const [flag, inlineValue] = arg.startsWith('--') && arg.includes('=')
      ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
      : [arg, undefined];

    const takeValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new NetmountError(`${flag} requires a value`, ErrorCodes.INVALID_ARGUMENT);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '--range':
        options.range = takeValue();
        break;
      case '--menu-tool':
        options.menuTool = parseMenuTool(takeValue());
        break;
      case '--plain':
        options.menuTool = 'plain';
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new NetmountError(`Unknown option: ${arg}`, ErrorCodes.INVALID_ARGUMENT);
    }
  }

  return options;
}
