import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { AutoApproveProvider } from '../src/confirm/auto.js';
import { HeadlessConfirmProvider } from '../src/confirm/headless.js';
import { SHELL_PROMPT, TerminalConfirmProvider, parseShellChoice } from '../src/confirm/terminal.js';
import type { ConfirmRequest } from '../src/types.js';

const req: ConfirmRequest = { tool: 'run_shell', args: { command: 'ls -la' }, summary: 'ls -la' };

/** Readline stand-in that answers from a queue and records the prompts. */
function fakeReadline(answers: string[]) {
  const prompts: string[] = [];
  return {
    prompts,
    question: async (query: string) => {
      prompts.push(query);
      return answers.shift() ?? '';
    },
  };
}

describe('parseShellChoice', () => {
  it('maps answers to decisions', () => {
    assert.equal(parseShellChoice(''), 'execute');
    assert.equal(parseShellChoice(' Y '), 'execute');
    assert.equal(parseShellChoice('yes'), 'execute');
    assert.equal(parseShellChoice('n'), 'skip');
    assert.equal(parseShellChoice('No'), 'skip');
    assert.equal(parseShellChoice('c'), 'copy');
    assert.equal(parseShellChoice('copy'), 'copy');
    assert.equal(parseShellChoice('maybe'), null);
  });
});

describe('TerminalConfirmProvider', () => {
  it('returns the operator decision', async () => {
    const rl = fakeReadline(['n']);
    assert.equal(await new TerminalConfirmProvider(rl).confirmShell(req), 'skip');
    assert.deepEqual(rl.prompts, [SHELL_PROMPT]);
  });

  it('asks again after an unrecognized answer', async () => {
    const rl = fakeReadline(['what', 'c']);
    assert.equal(await new TerminalConfirmProvider(rl).confirmShell(req), 'copy');
    assert.equal(rl.prompts.length, 2);
  });

  it('treats an empty answer as yes', async () => {
    const rl = fakeReadline(['']);
    assert.equal(await new TerminalConfirmProvider(rl).confirmShell(req), 'execute');
  });
});

describe('non-interactive providers', () => {
  it('auto-approve executes', async () => {
    assert.equal(await new AutoApproveProvider().confirmShell(req), 'execute');
  });

  it('headless skips', async () => {
    assert.equal(await new HeadlessConfirmProvider().confirmShell(req), 'skip');
  });
});
