/**
 * AutoApproveProvider runs every shell command without asking (`--yes`).
 */

import type { ConfirmationProvider, ConfirmRequest, ShellDecision } from '../types.js';

export class AutoApproveProvider implements ConfirmationProvider {
  async confirmShell(_opts: ConfirmRequest): Promise<ShellDecision> {
    return 'execute';
  }
}
