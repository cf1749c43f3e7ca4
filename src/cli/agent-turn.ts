/**
 * Shared helper: run one agent turn with the operator-facing tool display.
 * Used by both one-shot mode and the REPL.
 */

import type { AgentHooks, AgentResult, AgentSession } from '../agent.js';
import { formatToolParams, formatToolResult } from '../agent/formatting.js';
import { toolLabel, type Styler } from '../term.js';

export type TurnOutput = {
  /** Tool traffic and diagnostics. */
  err: (line: string) => void;
  /** The final answer. */
  out: (text: string) => void;
};

const defaultOutput: TurnOutput = {
  err: (line) => console.error(line),
  out: (text) => console.log(text),
};

/** Hooks that echo each tool call and its result to the operator. */
export function displayHooks(S: Styler, verbose: boolean, io: TurnOutput = defaultOutput): AgentHooks {
  return {
    onToolCall: (call) => {
      io.err(toolLabel(call.function.name, S));
      const params = formatToolParams(call.function.arguments, S);
      if (params) io.err(params);
    },
    onToolResult: (result) => {
      const error = result.payload.error;
      if (typeof error === 'string') {
        io.err(S.red(`  ✗ ${error}`));
        return;
      }
      io.err(S.dim(formatToolResult(result.payload)));
    },
    onStateChange: verbose ? (state) => io.err(S.dim(`[verbose] state: ${state}`)) : undefined,
  };
}

export async function runAgentTurn(
  session: AgentSession,
  input: string,
  S: Styler,
  verbose: boolean,
  io: TurnOutput = defaultOutput
): Promise<AgentResult> {
  const res = await session.ask(input, displayHooks(S, verbose, io));
  io.out(res.text);
  if (verbose) {
    io.err(S.dim(`[verbose] ${res.turns} model request(s), ${res.toolCalls} tool call(s)`));
  }
  return res;
}
