/**
 * Shared utility functions.
 *
 * Avoids duplicate implementations scattered across modules.
 */

import { randomBytes } from 'node:crypto';
import { readFileSync } from 'node:fs';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

/** Package version read once at startup. Falls back to '0.0.0'. */
export const PKG_VERSION: string = (() => {
  try {
    const parsed: unknown = JSON.parse(
      readFileSync(new URL('../package.json', import.meta.url), 'utf8')
    );
    if (parsed && typeof parsed === 'object' && 'version' in parsed) {
      return typeof parsed.version === 'string' ? parsed.version : '0.0.0';
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
})();

/**
 * Platform command shell: `sh -c` on POSIX, `cmd /C` on Windows.
 */
export function shellInvocation(command: string): { file: string; args: string[] } {
  if (process.platform === 'win32') return { file: 'cmd', args: ['/C', command] };
  return { file: 'sh', args: ['-c', command] };
}

/** Human-readable OS name for prompts and tool descriptions. */
export function osName(): string {
  switch (process.platform) {
    case 'win32':
      return 'Windows';
    case 'darwin':
      return 'Mac OS';
    case 'linux':
      return 'Linux';
    default:
      return os.type();
  }
}

/**
 * Escape special regex metacharacters in a string so it can be used as a
 * literal match inside a `new RegExp(...)` expression.
 */
export function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * XDG-compatible state directory for persistent app data.
 * `~/.local/state/termpilot`
 */
export function stateDir(): string {
  if (process.env.TERMPILOT_STATE_DIR) return process.env.TERMPILOT_STATE_DIR;
  if (process.env.XDG_STATE_HOME) return path.join(process.env.XDG_STATE_HOME, 'termpilot');
  const base =
    process.platform === 'win32'
      ? process.env.LOCALAPPDATA || path.join(os.homedir(), 'AppData', 'Local')
      : path.join(os.homedir(), '.local', 'state');
  return path.join(base, 'termpilot');
}

/**
 * XDG-compatible config directory.
 * `~/.config/termpilot`
 * Can be overridden with TERMPILOT_CONFIG_DIR environment variable.
 */
export function configDir(): string {
  if (process.env.TERMPILOT_CONFIG_DIR) return process.env.TERMPILOT_CONFIG_DIR;
  if (process.env.XDG_CONFIG_HOME) return path.join(process.env.XDG_CONFIG_HOME, 'termpilot');
  const base =
    process.platform === 'win32'
      ? process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming')
      : path.join(os.homedir(), '.config');
  return path.join(base, 'termpilot');
}

/**
 * Generate a short random hex ID.
 * @param bytes - Number of random bytes (default 6 = 12 hex chars)
 */
export function randomId(bytes = 6): string {
  return randomBytes(bytes).toString('hex');
}

/** Narrow an unknown value to a plain object record. */
export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Nearest ancestor of `start` (inclusive) that contains a `.git` entry. */
export async function findGitRoot(start: string): Promise<string | null> {
  let dir = path.resolve(start);
  for (;;) {
    const hit = await fs.stat(path.join(dir, '.git')).catch(() => null);
    if (hit) return dir;
    const up = path.dirname(dir);
    if (up === dir) return null;
    dir = up;
  }
}
