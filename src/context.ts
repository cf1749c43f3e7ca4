import fs from 'node:fs/promises';
import path from 'node:path';

import { findGitRoot } from './utils.js';

export type ContextFile = {
  /** `local`, `project`, `global:<name>` or the name given with --context. */
  name: string;
  path: string;
  content: string;
};

export type ContextOptions = {
  root: string;
  configDir: string;
  /** Project context file names, first match wins. */
  fileNames: string[];
  /** Named context from `<configDir>/context/<name>.md`, replacing the project file. */
  contextName?: string;
  /** Always-on named contexts. */
  globalContexts?: string[];
  noContext?: boolean;
};

async function readIfExists(p: string): Promise<string | null> {
  try {
    const st = await fs.stat(p);
    if (!st.isFile()) return null;
    return await fs.readFile(p, 'utf8');
  } catch {
    return null;
  }
}

export function namedContextPath(configDir: string, name: string): string {
  return path.join(configDir, 'context', `${name}.md`);
}

async function firstExisting(dir: string, names: string[]): Promise<{ path: string; content: string } | null> {
  for (const n of names) {
    const abs = path.join(dir, n);
    const content = await readIfExists(abs);
    if (content != null && content.trim()) return { path: abs, content: content.trim() };
  }
  return null;
}

export async function loadContextFiles(opts: ContextOptions): Promise<ContextFile[]> {
  if (opts.noContext) return [];
  const out: ContextFile[] = [];

  if (opts.contextName) {
    const abs = namedContextPath(opts.configDir, opts.contextName);
    const content = await readIfExists(abs);
    if (content != null) {
      out.push({ name: opts.contextName, path: abs, content: content.trim() });
    } else {
      console.warn(`[warn] context '${opts.contextName}' not found (${abs})`);
    }
  } else {
    const local = await firstExisting(opts.root, opts.fileNames);
    if (local) {
      out.push({ name: 'local', ...local });
    } else {
      const gitRoot = await findGitRoot(opts.root);
      const project = gitRoot && gitRoot !== opts.root ? await firstExisting(gitRoot, opts.fileNames) : null;
      if (project) out.push({ name: 'project', ...project });
    }
  }

  for (const g of opts.globalContexts ?? []) {
    const abs = namedContextPath(opts.configDir, g);
    const content = await readIfExists(abs);
    if (content != null) out.push({ name: `global:${g}`, path: abs, content: content.trim() });
  }

  return out;
}
