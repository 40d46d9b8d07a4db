import { createInterface, type Interface } from 'readline';
import { Writable } from 'stream';
import type { ChoiceOption, Prompter } from './types.js';

/**
 * Forwards to the real output unless muted; used to hide password echo.
 */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

/**
 * Line-based fallback when neither whiptail nor dialog is installed.
 */
export class PlainPrompter implements Prompter {
  readonly kind = 'plain' as const;

  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;
  private readonly echo: MutableOutput;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.echo = new MutableOutput(output);
    this.rl = createInterface({
      input,
      output: this.echo,
      terminal: 'isTTY' in input && input.isTTY === true,
    });
    // Created up front so lines arriving before a question are buffered
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  private async readLine(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  async choose(title: string, prompt: string, options: ChoiceOption[]): Promise<string[]> {
    if (options.length === 0) {
      return [];
    }

    this.output.write(`\n${title}\n${prompt}\n`);
    options.forEach((option, index) => {
      const mark = option.selected ? '*' : ' ';
      const description = option.description ? `  ${option.description}` : '';
      this.output.write(` ${mark}${index + 1}) ${option.value}${description}\n`);
    });

    const answer = await this.readLine("Numbers separated by spaces, 'all', or empty to cancel: ");
    if (answer === null) {
      return [];
    }
    return parseSelection(answer, options);
  }

  async promptText(title: string, defaultValue = ''): Promise<string | null> {
    const suffix = defaultValue ? ` [${defaultValue}]` : '';
    const answer = await this.readLine(`${title}${suffix}: `);
    if (answer === null) {
      return null;
    }
    const trimmed = answer.trim();
    return trimmed === '' ? defaultValue : trimmed;
  }

  async promptSecret(title: string): Promise<string | null> {
    this.output.write(`${title}: `);
    this.echo.muted = true;
    try {
      const next = await this.lines.next();
      return next.done ? null : next.value;
    } finally {
      this.echo.muted = false;
      this.output.write('\n');
    }
  }

  async confirm(question: string): Promise<boolean> {
    const answer = await this.readLine(`${question} [y/N]: `);
    return answer !== null && /^y/i.test(answer.trim());
  }

  async message(title: string, text: string): Promise<void> {
    this.output.write(`\n${title}\n${text}\n`);
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * `1 3`, `1,3` or `all` -> chosen values in option order. Unknown numbers are
 * ignored.
 */
export function parseSelection(answer: string, options: ChoiceOption[]): string[] {
  const trimmed = answer.trim();
  if (trimmed === '') {
    return [];
  }
  if (trimmed.toLowerCase() === 'all') {
    return options.map((option) => option.value);
  }

  const indexes = new Set(
    trimmed
      .split(/[\s,]+/)
      .map((token) => Number(token))
      .filter((n) => Number.isInteger(n) && n >= 1 && n <= options.length)
  );
  return options.filter((_, index) => indexes.has(index + 1)).map((option) => option.value);
}
