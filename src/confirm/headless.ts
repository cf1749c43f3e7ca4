/**
 * HeadlessConfirmProvider: piped or non-interactive use.
 * There is no terminal to ask, so shell commands are skipped and reported.
 */

import type { ConfirmationProvider, ConfirmRequest, ShellDecision } from '../types.js';

export class HeadlessConfirmProvider implements ConfirmationProvider {
  async confirmShell(opts: ConfirmRequest): Promise<ShellDecision> {
    console.error(`[headless] skipped ${opts.tool}: ${opts.summary} (no TTY; use --yes to allow)`);
    return 'skip';
  }

  showNotice(msg: string): void {
    console.error(`[headless] ${msg}`);
  }
}
