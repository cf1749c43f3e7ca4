import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { canonicalRoot, type ToolContext } from '../src/tools.js';
import type { ConfirmationProvider, ConfirmRequest, ShellDecision } from '../src/types.js';

/** Fresh canonical temp workspace. */
export async function makeWorkspace(prefix = 'termpilot-test-'): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  return canonicalRoot(dir);
}

export async function removeWorkspace(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Confirmation provider that answers from a fixed decision and records what it was asked. */
export class ScriptedConfirm implements ConfirmationProvider {
  readonly requests: ConfirmRequest[] = [];
  readonly notices: string[] = [];

  constructor(private readonly decision: ShellDecision = 'execute') {}

  async confirmShell(req: ConfirmRequest): Promise<ShellDecision> {
    this.requests.push(req);
    return this.decision;
  }

  showNotice(msg: string): void {
    this.notices.push(msg);
  }
}

export function toolContext(root: string, confirm: ConfirmationProvider = new ScriptedConfirm()): ToolContext {
  return { root, confirm };
}
