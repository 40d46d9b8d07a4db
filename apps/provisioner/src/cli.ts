#!/usr/bin/env node
/**
 * netmount CLI
 * Discover SMB servers on the local network and provision on-demand mounts.
 */

import { loadConfig } from './config.js';
import { USAGE, parseCliArgs } from './cliArgs.js';
import { checkPreconditions } from './executor/preconditions.js';
import { DryRunCommandRunner, SystemCommandRunner, type CommandRunner } from './executor/commandRunner.js';
import { createPrompter } from './prompts/index.js';
import { CredentialStore } from './credentials/credentialStore.js';
import { MountTable } from './mounts/mountTable.js';
import { MountEntryPlanner } from './mounts/mountPlanner.js';
import { MountActivator } from './mounts/mountActivator.js';
import { Provisioner } from './pipeline/provisioner.js';
import { formatRunSummary } from './pipeline/summary.js';
import { describeError, isNetmountError } from './lib/errors.js';
import logger from './lib/logger.js';

async function main(argv: string[]): Promise<number> {
  const options = parseCliArgs(argv);
  if (options.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const config = loadConfig();
  const uid = process.getuid?.();
  checkPreconditions({ uid, requireRoot: !options.dryRun });

  const systemRunner = new SystemCommandRunner();
  const runner: CommandRunner = options.dryRun ? new DryRunCommandRunner(systemRunner) : systemRunner;

  const prompter = createPrompter(options.menuTool ?? config.menuTool);
  const credentials = new CredentialStore({
    directory: config.paths.credentialsDir,
    // Staged dry-run files belong to whoever runs the preview
    owner: options.dryRun ? { uid: uid ?? 0, gid: process.getgid?.() ?? 0 } : { uid: 0, gid: 0 },
    dryRun: options.dryRun,
  });
  const table = new MountTable({ path: config.paths.fstab, dryRun: options.dryRun });
  const planner = new MountEntryPlanner({
    mountRoot: config.paths.mountRoot,
    extraOptions: config.smb.extraMountOptions,
    table,
    dryRun: options.dryRun,
  });

  const provisioner = new Provisioner({
    runner,
    prompter,
    credentials,
    planner,
    activator: new MountActivator(runner),
    smbPort: config.smb.port,
    defaultUsername: config.smb.defaultUsername,
    defaultOwner: config.defaultOwner,
    explicitRange: options.range,
    dryRun: options.dryRun,
  });

  logger.info({ prompter: prompter.kind, dryRun: options.dryRun }, 'Starting netmount');

  try {
    const summary = await provisioner.run();
    const report = formatRunSummary(summary);
    await prompter.message('netmount summary', report);
    if (prompter.kind !== 'plain') {
      // Dialog boxes are gone once the tool exits; leave the report on screen
      process.stdout.write(`${report}\n`);
    }
    return 0;
  } finally {
    prompter.close();
    credentials.dispose();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (isNetmountError(err)) {
      logger.error({ code: err.code }, err.message);
    } else {
      logger.error({ err }, 'Unexpected error');
    }
    process.stderr.write(`Error: ${describeError(err)}\n`);
    process.exitCode = 1;
  });
