/**
 * TerminalConfirmProvider: asks on the terminal before each shell command.
 */

import type { Interface as ReadlineInterface } from 'node:readline/promises';

import { makeStyler, type Styler } from '../term.js';
import type { ConfirmationProvider, ConfirmRequest, ShellDecision } from '../types.js';

export const SHELL_PROMPT = 'Do you want to execute this command? [Y/n/c] ';

/** Map an answer to a decision; `null` for anything unrecognized. */
export function parseShellChoice(answer: string): ShellDecision | null {
  const a = answer.trim().toLowerCase();
  if (a === '' || a === 'y' || a === 'yes') return 'execute';
  if (a === 'n' || a === 'no') return 'skip';
  if (a === 'c' || a === 'copy') return 'copy';
  return null;
}

export class TerminalConfirmProvider implements ConfirmationProvider {
  constructor(
    private rl: Pick<ReadlineInterface, 'question'>,
    private s: Styler = makeStyler(false)
  ) {}

  async confirmShell(opts: ConfirmRequest): Promise<ShellDecision> {
    const cmd = typeof opts.args.command === 'string' ? opts.args.command : opts.summary;
    console.error(this.s.cyan('$ ') + cmd);
    for (;;) {
      const choice = parseShellChoice(await this.rl.question(SHELL_PROMPT));
      if (choice) return choice;
      console.error(this.s.dim('Please answer y (execute), n (skip) or c (copy to clipboard).'));
    }
  }

  showNotice(msg: string): void {
    console.error(this.s.dim(msg));
  }
}
