import { ErrorCodes, type PrompterKind } from '@netmount/shared';
import { NetmountError } from '../lib/errors.js';
import { findExecutable } from '../executor/preconditions.js';
import { DialogPrompter, WhiptailPrompter, spawnDialog, type DialogInvoker } from './dialogPrompter.js';
import { PlainPrompter } from './plainPrompter.js';
import type { Prompter } from './types.js';

export type { ChoiceOption, Prompter } from './types.js';
export { DialogPrompter, WhiptailPrompter } from './dialogPrompter.js';
export { PlainPrompter } from './plainPrompter.js';

export interface CreatePrompterOptions {
  locate?: (name: string) => string | null;
  invoke?: DialogInvoker;
}

/**
 * Pick the presentation backend once at startup. `auto` prefers whiptail,
 * then dialog, then plain text.
 */
export function createPrompter(kind: PrompterKind, options: CreatePrompterOptions = {}): Prompter {
  const { locate = (name) => findExecutable(name), invoke = spawnDialog } = options;

  const requireTool = (tool: string): void => {
    if (locate(tool) === null) {
      throw new NetmountError(`Menu tool "${tool}" not found on PATH`, ErrorCodes.TOOL_MISSING, [tool]);
    }
  };

  switch (kind) {
    case 'whiptail':
      requireTool('whiptail');
      return new WhiptailPrompter(invoke);
    case 'dialog':
      requireTool('dialog');
      return new DialogPrompter(invoke);
    case 'plain':
      return new PlainPrompter();
    case 'auto':
      if (locate('whiptail') !== null) {
        return new WhiptailPrompter(invoke);
      }
      if (locate('dialog') !== null) {
        return new DialogPrompter(invoke);
      }
      return new PlainPrompter();
  }
}
