import type { Dispatcher } from 'undici';

import { fetchUrl } from './tools/fetch-url.js';
import { glob, listDir, stat } from './tools/file-discovery.js';
import { patchFile, writeFile } from './tools/file-mutations.js';
import { readFile } from './tools/file-read.js';
import { runShell } from './tools/exec-core.js';
import { ToolRegistry, type Tool } from './tools/registry.js';
import { grep } from './tools/search.js';
import type { ConfirmationProvider } from './types.js';

export { ToolRegistry, type Tool } from './tools/registry.js';
export { resolvePath, canonicalRoot, displayPath } from './tools/path-safety.js';
export { ToolError } from './tools/tool-error.js';

export type ToolContext = {
  /** Canonical workspace root; every filesystem path is confined to it. */
  root: string;
  /** Decides what happens to each shell command before it runs. */
  confirm: ConfirmationProvider;
  /** Overrides the system clipboard for run_shell's copy choice. */
  clipboard?: (text: string) => Promise<void>;
  /** HTTP dispatcher for fetch_url; by default each request gets its own Agent. */
  dispatcher?: Dispatcher;
};

/** The built-in tool set, in catalog order. */
export function defaultTools(): Tool[] {
  return [readFile, writeFile, patchFile, listDir, stat, glob, grep, runShell, fetchUrl];
}

export function createDefaultRegistry(ctx: ToolContext): ToolRegistry {
  const registry = new ToolRegistry(ctx);
  for (const tool of defaultTools()) registry.register(tool);
  return registry;
}
