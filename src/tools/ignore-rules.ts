/**
 * Ignore-file handling for content search.
 *
 * Reads `.ignore` from each directory as the walk enters it, and `.gitignore` as
 * well when the search runs inside a git work tree.
 * Rules from deeper directories are checked after (and override) rules from
 * their ancestors; within one file the last matching line wins.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { minimatch } from 'minimatch';

import { isWithinDir } from './path-safety.js';

export type IgnoreOptions = {
  /** Honour `.gitignore` files; off outside a git repository. */
  gitignore?: boolean;
};

type IgnoreRule = {
  pattern: string;
  negate: boolean;
  dirOnly: boolean;
  /** Anchored rules match the path relative to `base`; the rest match the basename. */
  anchored: boolean;
};

type RuleSet = {
  base: string;
  rules: IgnoreRule[];
};

export function parseIgnoreFile(text: string): IgnoreRule[] {
  const rules: IgnoreRule[] = [];
  for (const raw of text.split(/\r?\n/)) {
    let line = raw.replace(/(?<!\\)\s+$/, '');
    if (!line || line.startsWith('#')) continue;
    let negate = false;
    if (line.startsWith('!')) {
      negate = true;
      line = line.slice(1);
    } else if (line.startsWith('\\!') || line.startsWith('\\#')) {
      line = line.slice(1);
    }
    let dirOnly = false;
    if (line.endsWith('/')) {
      dirOnly = true;
      line = line.slice(0, -1);
    }
    if (!line) continue;
    const anchored = line.includes('/');
    if (line.startsWith('/')) line = line.slice(1);
    rules.push({ pattern: line, negate, dirOnly, anchored });
  }
  return rules;
}

export class IgnoreRules {
  private readonly sets: RuleSet[] = [];
  private readonly fileNames: string[];

  constructor(opts: IgnoreOptions = {}) {
    this.fileNames = opts.gitignore === false ? ['.ignore'] : ['.gitignore', '.ignore'];
  }

  /** Load the ignore files found directly in `dir`. */
  async load(dir: string): Promise<void> {
    const rules: IgnoreRule[] = [];
    for (const name of this.fileNames) {
      const text = await fs.readFile(path.join(dir, name), 'utf8').catch(() => null);
      if (text != null) rules.push(...parseIgnoreFile(text));
    }
    if (rules.length) this.sets.push({ base: dir, rules });
  }

  /** Load every directory from `top` down to and including `dir`. */
  async loadChain(top: string, dir: string): Promise<void> {
    const rel = path.relative(top, dir);
    const parts = rel && isWithinDir(dir, top) ? rel.split(path.sep) : [];
    let cur = top;
    await this.load(cur);
    for (const part of parts) {
      cur = path.join(cur, part);
      await this.load(cur);
    }
  }

  isIgnored(abs: string, isDir: boolean): boolean {
    if (path.basename(abs) === '.git') return true;
    let ignored = false;
    for (const set of this.sets) {
      const rel = path.relative(set.base, abs);
      if (!rel || !isWithinDir(abs, set.base)) continue;
      const relPosix = rel.split(path.sep).join('/');
      for (const rule of set.rules) {
        if (rule.dirOnly && !isDir) continue;
        const subject = rule.anchored ? relPosix : path.posix.basename(relPosix);
        if (minimatch(subject, rule.pattern, { dot: true })) ignored = !rule.negate;
      }
    }
    return ignored;
  }
}
