/**
 * Path sandbox for tool operations.
 * Every filesystem tool resolves its path arguments through `resolvePath`, which
 * guarantees the canonical result lies inside the session's workspace root.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import type { ToolContext } from '../tools.js';

import { IOError, PathEscapeError, ValidationError, errnoCode } from './tool-error.js';

/**
 * Check if a resolved target path resides within a directory (or is the directory itself).
 * Both arguments must already be absolute and normalized.
 */
export function isWithinDir(target: string, dir: string): boolean {
  const rel = path.relative(dir, target);
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * Canonicalize the workspace root once at session start.
 * Failure here is fatal to the whole session, not to a single tool call.
 */
export async function canonicalRoot(dir: string): Promise<string> {
  const abs = path.resolve(dir);
  const real = await fs.realpath(abs).catch((e: unknown) => {
    throw new Error(`workspace root ${abs} cannot be resolved: ${describe(e)}`);
  });
  const st = await fs.stat(real);
  if (!st.isDirectory()) throw new Error(`workspace root ${real} is not a directory`);
  return real;
}

/**
 * Resolve a tool argument path to a canonical absolute path inside `ctx.root`.
 *
 * With `allowNonexistent`, only the parent directory has to exist; the last
 * component is appended as given. An existing leaf is still canonicalized in full
 * so a symlink cannot carry a write outside the root.
 */
export async function resolvePath(
  ctx: Pick<ToolContext, 'root'>,
  input: unknown,
  allowNonexistent = false
): Promise<string> {
  if (typeof input !== 'string' || !input.trim()) throw new ValidationError('missing path');
  const root = ctx.root;
  const abs = path.isAbsolute(input) ? path.normalize(input) : path.resolve(root, input);

  let canonical: string;
  if (allowNonexistent) {
    const leaf = await fs.lstat(abs).catch(() => null);
    if (leaf) {
      canonical = await fs.realpath(abs).catch((e: unknown) => {
        if (leaf.isSymbolicLink()) {
          throw new ValidationError(`refusing to write through dangling symlink ${abs}`);
        }
        throw new IOError(`Failed to canonicalize ${abs}: ${describe(e)}`);
      });
    } else {
      canonical = await canonicalizeMissing(abs);
    }
  } else {
    canonical = await fs.realpath(abs).catch((e: unknown) => {
      throw new IOError(`Failed to canonicalize ${abs}: ${describe(e)}`);
    });
  }

  if (!isWithinDir(canonical, root)) throw new PathEscapeError(canonical, root);
  return canonical;
}

/**
 * Display form of a sandboxed path: relative to the root, `.` for the root itself.
 */
export function displayPath(absPath: string, root: string): string {
  if (!isWithinDir(absPath, root)) return `[outside-root]/${path.basename(absPath)}`;
  return path.relative(root, absPath) || '.';
}

/**
 * Canonicalize the nearest existing ancestor of a missing path and re-append the
 * missing tail. Missing components cannot be symlinks, so the tail needs no resolution.
 */
async function canonicalizeMissing(abs: string): Promise<string> {
  const tail: string[] = [path.basename(abs)];
  let dir = path.dirname(abs);
  for (;;) {
    const st = await fs.lstat(dir).catch(() => null);
    if (st) break;
    const up = path.dirname(dir);
    if (up === dir) break;
    tail.unshift(path.basename(dir));
    dir = up;
  }
  const realDir = await fs.realpath(dir).catch((e: unknown) => {
    throw new IOError(`Failed to canonicalize parent of ${abs}: ${describe(e)}`);
  });
  return path.join(realDir, ...tail);
}

function describe(e: unknown): string {
  const code = errnoCode(e);
  const msg = e instanceof Error ? e.message : String(e);
  return code && !msg.includes(code) ? `${code}: ${msg}` : msg;
}
