import type { Dirent, Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { minimatch } from 'minimatch';

import type { ToolContext } from '../tools.js';
import type { JsonObject, PathInfo } from '../types.js';

import { optBool, optInt, optString, optStringArray, requireString, type ToolArgs } from './args.js';
import { resolvePath } from './path-safety.js';
import type { Tool } from './registry.js';
import { IOError, ValidationError } from './tool-error.js';

export type WalkEntry = {
  abs: string;
  /** Path relative to the walk root, `/`-separated. */
  rel: string;
  dirent: Dirent;
};

export type WalkOptions = {
  /** Return false to keep the walker out of a directory (the entry itself is still yielded). */
  descend?: (entry: WalkEntry) => boolean | Promise<boolean>;
};

/**
 * Depth-first walk in name order. Symlinked directories are yielded but never
 * followed, so a walk cannot leave the tree it started in.
 */
export async function* walkTree(root: string, opts: WalkOptions = {}): AsyncGenerator<WalkEntry> {
  async function* visit(dir: string, relDir: string): AsyncGenerator<WalkEntry> {
    const ents = await fs.readdir(dir, { withFileTypes: true }).catch(() => null);
    if (!ents) return;
    ents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const dirent of ents) {
      const entry: WalkEntry = {
        abs: path.join(dir, dirent.name),
        rel: relDir ? `${relDir}/${dirent.name}` : dirent.name,
        dirent,
      };
      yield entry;
      if (dirent.isDirectory() && (!opts.descend || (await opts.descend(entry)))) {
        yield* visit(entry.abs, entry.rel);
      }
    }
  }
  yield* visit(root, '');
}

/** Compile glob patterns into a predicate over root-relative paths. */
export function globMatcher(patterns: string[], tool: string): (rel: string) => boolean {
  const compiled = patterns.map((g) => {
    if (!g.trim()) throw new ValidationError(`${tool}: bad glob "${g}"`);
    // A pattern without a slash matches the basename at any depth
    return { g, opts: { dot: true, matchBase: !g.includes('/') } };
  });
  return (rel) => compiled.some(({ g, opts }) => minimatch(rel, g, opts));
}

function fmtTime(d: Date): string | null {
  const t = d.getTime();
  if (!Number.isFinite(t) || t <= 0) return null;
  return d.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function entryType(st: Stats): PathInfo['type'] {
  if (st.isDirectory()) return 'dir';
  if (st.isFile()) return 'file';
  if (st.isSymbolicLink()) return 'symlink';
  return 'other';
}

/** Metadata for one path without following a symlink leaf. */
export async function pathInfo(abs: string): Promise<PathInfo> {
  const st = await fs.lstat(abs).catch((e: unknown) => {
    throw new IOError(`stat failed for ${abs}: ${e instanceof Error ? e.message : String(e)}`);
  });
  return {
    path: abs,
    type: entryType(st),
    size: st.size,
    modified: fmtTime(st.mtime),
    created: fmtTime(st.birthtime),
    mode: process.platform === 'win32' ? '' : st.mode.toString(8),
  };
}

export async function listDirTool(ctx: ToolContext, args: ToolArgs): Promise<JsonObject> {
  const p = await resolvePath(ctx, optString(args, 'path', 'list_dir') ?? '.');
  const recursive = optBool(args, 'recursive', 'list_dir') ?? false;
  const includeHidden = optBool(args, 'include_hidden', 'list_dir') ?? false;
  const limit = optInt(args, 'limit', 'list_dir') ?? 1000;
  const includes = optStringArray(args, 'include_globs', 'list_dir') ?? [];
  const excludes = optStringArray(args, 'exclude_globs', 'list_dir') ?? [];

  const st = await fs.stat(p);
  if (!st.isDirectory()) throw new IOError(`list_dir: ${p} is not a directory`);

  const isIncluded = includes.length ? globMatcher(includes, 'list_dir') : () => true;
  const isExcluded = excludes.length ? globMatcher(excludes, 'list_dir') : () => false;

  const items: PathInfo[] = [];
  if (limit > 0) {
    const walk = walkTree(p, {
      descend: (e) => recursive && (includeHidden || !e.dirent.name.startsWith('.')),
    });
    for await (const e of walk) {
      if (!includeHidden && e.dirent.name.startsWith('.')) continue;
      if (isExcluded(e.rel) || !isIncluded(e.rel)) continue;
      items.push(await pathInfo(e.abs));
      if (items.length >= limit) break;
    }
  }

  return { path: p, count: items.length, items };
}

export async function statTool(ctx: ToolContext, args: ToolArgs): Promise<JsonObject> {
  const p = await resolvePath(ctx, requireString(args, 'path', 'stat'));
  return await pathInfo(p);
}

export async function globTool(ctx: ToolContext, args: ToolArgs): Promise<JsonObject> {
  const pattern = requireString(args, 'pattern', 'glob');
  const root = await resolvePath(ctx, optString(args, 'root', 'glob') ?? '.');
  const limit = optInt(args, 'limit', 'glob') ?? 200;
  const matches = globMatcher([pattern], 'glob');

  const paths: string[] = [];
  if (limit > 0) {
    for await (const e of walkTree(root)) {
      if (!e.dirent.isFile() || !matches(e.rel)) continue;
      paths.push(e.abs);
      if (paths.length >= limit) break;
    }
  }

  return { root, pattern, count: paths.length, paths };
}

const globArray = (description: string) =>
  ({
    type: 'array',
    description,
    items: { type: 'string', description: 'glob' },
  }) as const;

export const listDir: Tool = {
  spec: {
    name: 'list_dir',
    description: 'List files in a directory with optional recursion and glob filters.',
    parameters: [
      { name: 'path', type: 'string', description: "Directory path (default '.')" },
      { name: 'recursive', type: 'boolean', description: 'Recurse into subdirectories (default false)' },
      { name: 'include_globs', ...globArray('Include glob patterns') },
      { name: 'exclude_globs', ...globArray('Exclude glob patterns') },
      { name: 'limit', type: 'integer', description: 'Limit number of entries (default 1000)' },
      { name: 'include_hidden', type: 'boolean', description: 'Include dotfiles (default false)' },
    ],
  },
  execute: listDirTool,
};

export const stat: Tool = {
  spec: {
    name: 'stat',
    description: 'Get file metadata (type, size, mtime, ctime, mode).',
    parameters: [{ name: 'path', type: 'string', description: 'Path to stat', required: true }],
  },
  execute: statTool,
};

export const glob: Tool = {
  spec: {
    name: 'glob',
    description: 'Find files matching a glob pattern under a root (recursive).',
    parameters: [
      {
        name: 'pattern',
        type: 'string',
        description: 'Glob pattern (e.g., src/**/*.ts)',
        required: true,
      },
      { name: 'root', type: 'string', description: "Root directory to search (default '.')" },
      { name: 'limit', type: 'integer', description: 'Max results (default 200)' },
    ],
  },
  execute: globTool,
};
