import { describe, it, expect } from 'vitest';
import { DialogPrompter, WhiptailPrompter, type DialogResult } from './dialogPrompter.js';

function recorder(...results: DialogResult[]) {
  const calls: Array<{ tool: string; args: string[] }> = [];
  const invoke = (tool: string, args: string[]): DialogResult => {
    calls.push({ tool, args });
    return results.shift() ?? { status: 1, output: '' };
  };
  return { calls, invoke };
}

const OPTIONS = [
  { value: '192.168.1.10', description: 'nas.lan' },
  { value: '192.168.1.20' },
  { value: '192.168.1.30', selected: true },
];

describe('WhiptailPrompter', () => {
  it('renders a checklist and returns picks in option order', async () => {
    const { calls, invoke } = recorder({ status: 0, output: '192.168.1.30\n192.168.1.10\n' });

    const picked = await new WhiptailPrompter(invoke).choose('SMB hosts', 'Pick hosts', OPTIONS);

    expect(picked).toEqual(['192.168.1.10', '192.168.1.30']);
    expect(calls).toEqual([
      {
        tool: 'whiptail',
        args: [
          '--title', 'SMB hosts',
          '--separate-output', '--checklist', 'Pick hosts', '20', '78', '10',
          '192.168.1.10', 'nas.lan', 'OFF',
          '192.168.1.20', '', 'OFF',
          '192.168.1.30', '', 'ON',
        ],
      },
    ]);
  });

  it('accepts quoted output from older tool versions', async () => {
    const { invoke } = recorder({ status: 0, output: '"192.168.1.20"\n' });
    expect(await new WhiptailPrompter(invoke).choose('t', 'p', OPTIONS)).toEqual(['192.168.1.20']);
  });

  it('treats cancel and escape as an empty choice', async () => {
    const { invoke } = recorder({ status: 1, output: '' }, { status: 255, output: '' });
    const prompter = new WhiptailPrompter(invoke);

    expect(await prompter.choose('t', 'p', OPTIONS)).toEqual([]);
    expect(await prompter.choose('t', 'p', OPTIONS)).toEqual([]);
  });

  it('does not open a box for an empty list', async () => {
    const { calls, invoke } = recorder();
    expect(await new WhiptailPrompter(invoke).choose('t', 'p', [])).toEqual([]);
    expect(calls).toHaveLength(0);
  });

  it('prefills text input and returns null on cancel', async () => {
    const { calls, invoke } = recorder({ status: 0, output: ' alice \n' }, { status: 1, output: '' });
    const prompter = new WhiptailPrompter(invoke);

    expect(await prompter.promptText('Username', 'guest')).toBe('alice');
    expect(await prompter.promptText('Username', 'guest')).toBeNull();
    expect(calls[0]?.args).toEqual(['--title', 'Username', '--inputbox', 'Username', '10', '70', 'guest']);
  });

  it('keeps surrounding spaces in a secret', async () => {
    const { calls, invoke } = recorder({ status: 0, output: ' test-secret \n' });

    expect(await new WhiptailPrompter(invoke).promptSecret('Password')).toBe(' test-secret ');
    expect(calls[0]?.args).toEqual(['--title', 'Password', '--passwordbox', 'Password', '10', '70']);
  });

  it('maps yes/no to a boolean', async () => {
    const { calls, invoke } = recorder({ status: 0, output: '' }, { status: 1, output: '' });
    const prompter = new WhiptailPrompter(invoke);

    expect(await prompter.confirm('Proceed?')).toBe(true);
    expect(await prompter.confirm('Proceed?')).toBe(false);
    expect(calls[0]?.args).toEqual(['--title', 'Confirm', '--yesno', 'Proceed?', '10', '70']);
  });

  it('shows scrollable messages', async () => {
    const { calls, invoke } = recorder({ status: 0, output: '' });

    await new WhiptailPrompter(invoke).message('Done', 'All mounts added');

    expect(calls[0]?.args).toEqual(['--title', 'Done', '--scrolltext', '--msgbox', 'All mounts added', '20', '78']);
  });
});

describe('DialogPrompter', () => {
  it('clears the screen before every box', async () => {
    const { calls, invoke } = recorder({ status: 0, output: '' });

    await new DialogPrompter(invoke).message('Done', 'ok');

    expect(calls).toEqual([
      { tool: 'dialog', args: ['--clear', '--title', 'Done', '--msgbox', 'ok', '20', '78'] },
    ]);
  });
});
