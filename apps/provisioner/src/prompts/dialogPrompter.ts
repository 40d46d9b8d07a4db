import { spawnSync } from 'child_process';
import type { ChoiceOption, Prompter } from './types.js';

export interface DialogResult {
  /** 0 = OK/Yes, 1 = Cancel/No, 255 = Esc; null when the tool did not run */
  status: number | null;
  /** What the tool printed on stderr: the answer */
  output: string;
}

export type DialogInvoker = (tool: string, args: string[]) => DialogResult;

/**
 * Run a dialog tool on the terminal. The box is drawn through the inherited
 * stdin/stdout; the answer comes back on stderr.
 */
export const spawnDialog: DialogInvoker = (tool, args) => {
  const result = spawnSync(tool, args, {
    stdio: ['inherit', 'inherit', 'pipe'],
    encoding: 'utf-8',
  });
  return { status: result.status, output: result.stderr ?? '' };
};

const BOX_HEIGHT = '20';
const BOX_WIDTH = '78';
const LIST_HEIGHT = '10';
const INPUT_HEIGHT = '10';
const INPUT_WIDTH = '70';

/**
 * whiptail and dialog take the same box options; subclasses only add what
 * differs between the two.
 */
abstract class TerminalDialogPrompter implements Prompter {
  abstract readonly kind: 'whiptail' | 'dialog';
  protected abstract readonly tool: string;

  constructor(private readonly invoke: DialogInvoker = spawnDialog) {}

  /** Options placed before every box */
  protected commonArgs(): string[] {
    return [];
  }

  /** Options placed before a message box */
  protected messageArgs(): string[] {
    return [];
  }

  protected run(title: string, box: string[]): DialogResult {
    return this.invoke(this.tool, [...this.commonArgs(), '--title', title, ...box]);
  }

  async choose(title: string, prompt: string, options: ChoiceOption[]): Promise<string[]> {
    if (options.length === 0) {
      return [];
    }
    const items = options.flatMap((option) => [
      option.value,
      option.description ?? '',
      option.selected ? 'ON' : 'OFF',
    ]);
    const result = this.run(title, [
      '--separate-output',
      '--checklist',
      prompt,
      BOX_HEIGHT,
      BOX_WIDTH,
      LIST_HEIGHT,
      ...items,
    ]);
    if (result.status !== 0) {
      return [];
    }

    const picked = new Set(result.output.split('\n').map((line) => line.trim().replace(/^"|"$/g, '')));
    return options.map((option) => option.value).filter((value) => picked.has(value));
  }

  async promptText(title: string, defaultValue = ''): Promise<string | null> {
    const result = this.run(title, ['--inputbox', title, INPUT_HEIGHT, INPUT_WIDTH, defaultValue]);
    return result.status === 0 ? result.output.trim() : null;
  }

  async promptSecret(title: string): Promise<string | null> {
    const result = this.run(title, ['--passwordbox', title, INPUT_HEIGHT, INPUT_WIDTH]);
    // No trim: leading or trailing spaces may be part of the password
    return result.status === 0 ? result.output.replace(/\n$/, '') : null;
  }

  async confirm(question: string): Promise<boolean> {
    const result = this.run('Confirm', ['--yesno', question, INPUT_HEIGHT, INPUT_WIDTH]);
    return result.status === 0;
  }

  async message(title: string, text: string): Promise<void> {
    this.run(title, [...this.messageArgs(), '--msgbox', text, BOX_HEIGHT, BOX_WIDTH]);
  }

  close(): void {
    // Nothing held open between boxes
  }
}

export class WhiptailPrompter extends TerminalDialogPrompter {
  readonly kind = 'whiptail' as const;
  protected readonly tool = 'whiptail';

  // Long diagnostics (smbclient output, the summary) need scrolling
  protected override messageArgs(): string[] {
    return ['--scrolltext'];
  }
}

export class DialogPrompter extends TerminalDialogPrompter {
  readonly kind = 'dialog' as const;
  protected readonly tool = 'dialog';

  protected override commonArgs(): string[] {
    return ['--clear'];
  }
}
