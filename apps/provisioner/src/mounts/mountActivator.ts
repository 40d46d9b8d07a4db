import { ActivationStatusValues, MOUNT_FS_TYPE, type ActivationResult, type MountEntry } from '@netmount/shared';
import { failureText, succeeded, type CommandRunner } from '../executor/commandRunner.js';
import logger from '../lib/logger.js';

const activatorLogger = logger.child({ component: 'mountActivator' });

// findmnt only reads the mount table; keep it from hanging on a stale mount
const FINDMNT_TIMEOUT = 5000;

/**
 * Makes systemd pick up new fstab entries and tries to bring the mount up
 * right away. Never unmounts or disables anything.
 */
export class MountActivator {
  constructor(private readonly runner: CommandRunner) {}

  /**
   * True when a cifs filesystem is mounted at the path. An armed automount
   * shows up as `autofs` and does not count.
   */
  isMounted(localPath: string): boolean {
    const result = this.runner.run('findmnt', ['-n', '-o', 'FSTYPE', localPath], {
      timeoutMs: FINDMNT_TIMEOUT,
    });
    if (!succeeded(result)) {
      return false;
    }
    return result.stdout.split('\n').some((line) => line.trim() === MOUNT_FS_TYPE);
  }

  reloadUnits(): boolean {
    const result = this.runner.run('systemctl', ['daemon-reload']);
    if (!succeeded(result)) {
      activatorLogger.warn({ error: failureText(result) }, 'systemctl daemon-reload failed');
      return false;
    }
    return true;
  }

  activate(entry: MountEntry): ActivationResult {
    this.reloadUnits();

    if (this.isMounted(entry.localPath)) {
      activatorLogger.info({ localPath: entry.localPath }, 'Already mounted');
      return { status: ActivationStatusValues.STARTED, alreadyMounted: true };
    }

    const trigger = this.runner.run('mount', [entry.localPath]);

    if (trigger.skipped) {
      return { status: ActivationStatusValues.DEFERRED, alreadyMounted: false, reason: 'dry run' };
    }

    if (!succeeded(trigger)) {
      const reason = failureText(trigger);
      activatorLogger.warn(
        { localPath: entry.localPath, reason },
        'Mount not started now; it will be mounted on first access'
      );
      return { status: ActivationStatusValues.DEFERRED, alreadyMounted: false, reason };
    }

    activatorLogger.info({ localPath: entry.localPath }, 'Mounted');
    return { status: ActivationStatusValues.STARTED, alreadyMounted: false };
  }
}
