// Well-known SMB-over-TCP port
export const SMB_PORT = 445;

export const DEFAULT_MOUNT_ROOT = '/mnt';
export const DEFAULT_CREDENTIALS_DIR = '/etc/netmount/credentials';
export const DEFAULT_FSTAB_PATH = '/etc/fstab';
export const DEFAULT_USERNAME = 'guest';

export const MOUNT_FS_TYPE = 'cifs';

// On-demand mount: nothing at boot, systemd automount on first access,
// ordered after the network is online.
export const BASE_MOUNT_OPTIONS = [
  'iocharset=utf8',
  'noauto',
  'x-systemd.automount',
  '_netdev',
  'x-systemd.requires=network-online.target',
  'x-systemd.after=network-online.target',
] as const;

export const CREDENTIAL_FILE_MODE = 0o600;
export const CREDENTIAL_DIR_MODE = 0o700;

export const REQUIRED_TOOLS = ['ip', 'nmap', 'smbclient', 'systemctl', 'mount', 'findmnt'] as const;
