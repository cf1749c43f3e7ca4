import { spawn } from 'node:child_process';

import type { ToolContext } from '../tools.js';
import type { JsonObject, ProcessResult } from '../types.js';
import { osName, shellInvocation } from '../utils.js';

import { compact, optInt, requireString, type ToolArgs } from './args.js';
import { copyToClipboard } from './clipboard.js';
import type { Tool } from './registry.js';
import { ProcessError, TimeoutError, ValidationError } from './tool-error.js';

export const DEFAULT_TIMEOUT_SEC = 120;

/** Largest deadline a Node timer can hold (2^31-1 ms), in whole seconds. */
export const MAX_TIMEOUT_SEC = Math.floor(0x7fffffff / 1000);

type Captured = { exitCode: number | null; stdout: string; stderr: string };

/** stdout, stderr, or both joined by a newline when both are non-empty. */
export function combineOutput(stdout: string, stderr: string): string {
  if (!stderr) return stdout;
  if (!stdout) return stderr;
  return `${stdout}\n${stderr}`;
}

/**
 * Run `command` through the platform shell and wait for it to exit.
 * The deadline timer kills the whole process group, so children the shell
 * started do not outlive the call.
 */
export function runCommand(command: string, cwd: string, timeoutSec: number): Promise<Captured> {
  const { file, args } = shellInvocation(command);
  const posix = process.platform !== 'win32';

  return new Promise((resolve, reject) => {
    const child = spawn(file, args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: posix,
      windowsHide: true,
    });

    const outChunks: Buffer[] = [];
    const errChunks: Buffer[] = [];
    let timedOut = false;

    const killProcessGroup = () => {
      const pid = child.pid;
      if (pid && posix) {
        try {
          process.kill(-pid, 'SIGKILL');
          return;
        } catch {
          // group already gone; fall back to the direct child
        }
      }
      child.kill('SIGKILL');
    };

    const killTimer = setTimeout(() => {
      timedOut = true;
      killProcessGroup();
    }, timeoutSec * 1000);

    child.stdout.on('data', (d: Buffer) => outChunks.push(d));
    child.stderr.on('data', (d: Buffer) => errChunks.push(d));

    child.on('error', (err: NodeJS.ErrnoException) => {
      clearTimeout(killTimer);
      reject(new ProcessError(`Failed to execute command: ${err.message} (${err.code ?? 'unknown'})`));
    });
    child.on('close', (code) => {
      clearTimeout(killTimer);
      if (timedOut) {
        reject(new TimeoutError(timeoutSec));
        return;
      }
      resolve({
        exitCode: code,
        stdout: Buffer.concat(outChunks).toString('utf8'),
        stderr: Buffer.concat(errChunks).toString('utf8'),
      });
    });
  });
}

export async function runShellTool(ctx: ToolContext, args: ToolArgs): Promise<JsonObject> {
  const command = requireString(args, 'command', 'run_shell');
  const timeoutSec = optInt(args, 'timeout_sec', 'run_shell') ?? DEFAULT_TIMEOUT_SEC;
  if (timeoutSec > MAX_TIMEOUT_SEC) {
    throw new ValidationError(`run_shell: 'timeout_sec' must be at most ${MAX_TIMEOUT_SEC} (got ${timeoutSec})`);
  }

  const decision = await ctx.confirm.confirmShell({
    tool: 'run_shell',
    args: { command },
    summary: command,
  });

  if (decision === 'copy') {
    const copy = ctx.clipboard ?? copyToClipboard;
    let copied = true;
    try {
      await copy(command);
      ctx.confirm.showNotice?.('Command copied to clipboard');
    } catch (e: unknown) {
      copied = false;
      console.error(
        `[warn] Failed to copy to clipboard: ${e instanceof Error ? e.message : String(e)}`
      );
    }
    const result: ProcessResult = { command, executed: false, copied };
    return compact(result);
  }
  if (decision === 'skip') {
    ctx.confirm.showNotice?.('Command execution cancelled');
    const result: ProcessResult = { command, executed: false };
    return compact(result);
  }

  const out = await runCommand(command, ctx.root, timeoutSec);
  const result: ProcessResult = {
    command,
    executed: true,
    exit_code: out.exitCode,
    stdout: out.stdout,
    stderr: out.stderr,
    combined: combineOutput(out.stdout, out.stderr),
  };
  return compact(result);
}

function shellLabel(): string {
  return process.platform === 'win32' ? 'Using `cmd /C`' : 'Using `sh -c`';
}

export const runShell: Tool = {
  spec: {
    name: 'run_shell',
    description: `Execute a shell command on the user's machine. The machine runs ${osName()}. The user can see the command output! Use for tasks that require terminal operations. Always prefer safe, idempotent commands and avoid destructive operations.`,
    parameters: [
      {
        name: 'command',
        type: 'string',
        description: `The exact shell command to execute (${shellLabel()})`,
        required: true,
      },
      {
        name: 'timeout_sec',
        type: 'integer',
        description: `Optional timeout in seconds (defaults to ${DEFAULT_TIMEOUT_SEC})`,
      },
    ],
  },
  execute: runShellTool,
};
