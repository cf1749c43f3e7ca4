import fs from 'node:fs/promises';
import path from 'node:path';

import type { ToolContext } from '../tools.js';
import type { JsonObject } from '../types.js';
import { escapeRegex, findGitRoot } from '../utils.js';

import { optBool, optInt, optString, optStringArray, requireString, type ToolArgs } from './args.js';
import { globMatcher, walkTree } from './file-discovery.js';
import { IgnoreRules } from './ignore-rules.js';
import { resolvePath } from './path-safety.js';
import type { Tool } from './registry.js';
import { isBinary, splitLines } from './text-utils.js';
import { ToolError } from './tool-error.js';

type GrepHit = { file: string; abs_path: string; line: number; match: string };

function compilePattern(pattern: string, literal: boolean, caseSensitive: boolean): RegExp {
  const source = literal ? escapeRegex(pattern) : pattern;
  try {
    return new RegExp(source, caseSensitive ? '' : 'i');
  } catch (e: unknown) {
    throw new ToolError(
      'validation',
      `grep: invalid regex pattern: ${e instanceof Error ? e.message : String(e)}`,
      false,
      'set literal=true to search for the text as written'
    );
  }
}

/** Append hits from one file; returns false once the cap is reached. */
async function scanFile(
  abs: string,
  rel: string,
  re: RegExp,
  hits: GrepHit[],
  max: number
): Promise<boolean> {
  const buf = await fs.readFile(abs).catch(() => null);
  if (!buf || isBinary(buf)) return true;
  const lines = splitLines(buf.toString('utf8'));
  for (let i = 0; i < lines.length; i++) {
    if (!re.test(lines[i])) continue;
    hits.push({ file: rel, abs_path: abs, line: i + 1, match: lines[i] });
    if (hits.length >= max) return false;
  }
  return true;
}

export async function grepTool(ctx: ToolContext, args: ToolArgs): Promise<JsonObject> {
  const pattern = requireString(args, 'pattern', 'grep');
  const root = await resolvePath(ctx, optString(args, 'root', 'grep') ?? '.');
  const literal = optBool(args, 'literal', 'grep') ?? false;
  const caseSensitive = optBool(args, 'case_sensitive', 'grep') ?? true;
  const maxResults = optInt(args, 'max_results', 'grep') ?? 100;
  const includes = optStringArray(args, 'include_globs', 'grep') ?? [];
  const excludes = optStringArray(args, 'exclude_globs', 'grep') ?? [];

  const re = compilePattern(pattern, literal, caseSensitive);
  const isIncluded = includes.length ? globMatcher(includes, 'grep') : () => true;
  const isExcluded = excludes.length ? globMatcher(excludes, 'grep') : () => false;

  const hits: GrepHit[] = [];
  const done = () => ({ root, pattern, count: hits.length, results: hits });
  if (maxResults === 0) return done();

  const st = await fs.stat(root);
  if (st.isFile()) {
    await scanFile(root, path.basename(root), re, hits, maxResults);
    return done();
  }

  const ignore = new IgnoreRules({ gitignore: (await findGitRoot(ctx.root)) !== null });
  await ignore.loadChain(ctx.root, root);

  const walk = walkTree(root, {
    descend: async (e) => {
      if (ignore.isIgnored(e.abs, true)) return false;
      await ignore.load(e.abs);
      return true;
    },
  });
  for await (const e of walk) {
    if (!e.dirent.isFile()) continue;
    if (ignore.isIgnored(e.abs, false)) continue;
    if (isExcluded(e.rel) || !isIncluded(e.rel)) continue;
    if (!(await scanFile(e.abs, e.rel, re, hits, maxResults))) break;
  }

  return done();
}

export const grep: Tool = {
  spec: {
    name: 'grep',
    description:
      'Search files for a pattern. Respects .ignore, and .gitignore inside a git repository. Returns file, line, and match snippet.',
    parameters: [
      {
        name: 'pattern',
        type: 'string',
        description: 'Regex or literal text to search for',
        required: true,
      },
      { name: 'root', type: 'string', description: "Root directory to search (default '.')" },
      {
        name: 'include_globs',
        type: 'array',
        description: 'Include glob patterns',
        items: { type: 'string', description: 'glob' },
      },
      {
        name: 'exclude_globs',
        type: 'array',
        description: 'Exclude glob patterns',
        items: { type: 'string', description: 'glob' },
      },
      { name: 'literal', type: 'boolean', description: 'Treat pattern as literal (default false)' },
      { name: 'case_sensitive', type: 'boolean', description: 'Case sensitive (default true)' },
      { name: 'max_results', type: 'integer', description: 'Maximum results to return (default 100)' },
    ],
  },
  execute: grepTool,
};
