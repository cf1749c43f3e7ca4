import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';

import { clipboardCommands } from '../src/tools/clipboard.js';
import { MAX_TIMEOUT_SEC, combineOutput, runCommand, runShellTool } from '../src/tools/exec-core.js';
import { ProcessError } from '../src/tools/tool-error.js';
import { createDefaultRegistry } from '../src/tools.js';

import { ScriptedConfirm, makeWorkspace, removeWorkspace, toolContext } from './helpers.js';

const posix = process.platform !== 'win32';

let root: string;

before(async () => {
  root = await makeWorkspace();
});

after(async () => {
  await removeWorkspace(root);
});

describe('run_shell', { skip: !posix }, () => {
  it('runs in the workspace root and returns a non-zero exit as data', async () => {
    const confirm = new ScriptedConfirm('execute');
    const r = await runShellTool(toolContext(root, confirm), {
      command: 'pwd; echo err 1>&2; exit 3',
    });
    assert.deepEqual(r, {
      command: 'pwd; echo err 1>&2; exit 3',
      executed: true,
      exit_code: 3,
      stdout: `${root}\n`,
      stderr: 'err\n',
      combined: `${root}\n\nerr\n`,
    });
    assert.deepEqual(confirm.requests, [
      {
        tool: 'run_shell',
        args: { command: 'pwd; echo err 1>&2; exit 3' },
        summary: 'pwd; echo err 1>&2; exit 3',
      },
    ]);
  });

  it('does not spawn anything when the operator skips', async () => {
    const confirm = new ScriptedConfirm('skip');
    const r = await runShellTool(toolContext(root, confirm), { command: 'touch skipped.txt' });
    assert.deepEqual(r, { command: 'touch skipped.txt', executed: false });
    assert.deepEqual(confirm.notices, ['Command execution cancelled']);
    await assert.rejects(() => fs.stat(path.join(root, 'skipped.txt')), { code: 'ENOENT' });
  });

  it('copies the command instead of running it', async () => {
    const confirm = new ScriptedConfirm('copy');
    const copied: string[] = [];
    const ctx = {
      root,
      confirm,
      clipboard: async (text: string) => {
        copied.push(text);
      },
    };
    const r = await runShellTool(ctx, { command: 'touch copied.txt' });
    assert.deepEqual(r, { command: 'touch copied.txt', executed: false, copied: true });
    assert.deepEqual(copied, ['touch copied.txt']);
    assert.deepEqual(confirm.notices, ['Command copied to clipboard']);
  });

  it('reports copied: false when the clipboard is unavailable', async () => {
    const ctx = {
      root,
      confirm: new ScriptedConfirm('copy'),
      clipboard: async () => {
        throw new Error('no clipboard helper available (test)');
      },
    };
    const r = await runShellTool(ctx, { command: 'ls' });
    assert.deepEqual(r, { command: 'ls', executed: false, copied: false });
  });

  it('kills a command that outlives its timeout, children included', async () => {
    const registry = createDefaultRegistry(toolContext(root));
    const res = await registry.dispatch({
      id: 'call_t',
      type: 'function',
      function: {
        name: 'run_shell',
        arguments: JSON.stringify({
          command: '(sleep 2; echo late > late.txt) & sleep 5',
          timeout_sec: 1,
        }),
      },
    });
    assert.deepEqual(res.payload, { error: 'timeout after 1s' });
    await delay(2500);
    await assert.rejects(() => fs.stat(path.join(root, 'late.txt')), { code: 'ENOENT' });
  });

  it('rejects a timeout too large for a timer before asking', async () => {
    const confirm = new ScriptedConfirm('execute');
    await assert.rejects(
      () => runShellTool(toolContext(root, confirm), { command: 'echo hi', timeout_sec: 3_000_000 }),
      {
        name: 'ValidationError',
        message: `run_shell: 'timeout_sec' must be at most ${MAX_TIMEOUT_SEC} (got 3000000)`,
      }
    );
    assert.deepEqual(confirm.requests, []);
  });

  it('runs a quick command under the largest timeout', async () => {
    const r = await runShellTool(toolContext(root), { command: 'echo hi', timeout_sec: MAX_TIMEOUT_SEC });
    assert.equal(r.exit_code, 0);
    assert.equal(r.stdout, 'hi\n');
  });

  it('fails with ProcessError when the shell cannot be spawned', async () => {
    await assert.rejects(
      () => runCommand('echo hi', path.join(root, 'does-not-exist'), 5),
      ProcessError
    );
  });
});

describe('combineOutput', () => {
  it('joins both streams only when both have text', () => {
    assert.equal(combineOutput('a', ''), 'a');
    assert.equal(combineOutput('', 'b'), 'b');
    assert.equal(combineOutput('a', 'b'), 'a\nb');
  });
});

describe('clipboardCommands', () => {
  it('picks the platform helper', () => {
    assert.deepEqual(clipboardCommands('darwin', {}), [{ file: 'pbcopy', args: [] }]);
    assert.deepEqual(clipboardCommands('win32', {}), [{ file: 'clip', args: [] }]);
  });

  it('prefers wl-copy under Wayland and falls back to X helpers', () => {
    assert.deepEqual(
      clipboardCommands('linux', { WAYLAND_DISPLAY: 'wayland-0' }).map((c) => c.file),
      ['wl-copy', 'xclip', 'xsel']
    );
    assert.deepEqual(clipboardCommands('linux', {}).map((c) => c.file), ['xclip', 'xsel']);
  });
});
