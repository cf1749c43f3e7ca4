import { DEFAULT_MAX_ITERATIONS, SHELL_STEERING, SHELL_TOOL_NAME, TOOL_STEERING } from './agent/constants.js';
import { AgentLoopBreak, MaxIterationsError, ModelError } from './agent/errors.js';
import type { InteractionHistory } from './history.js';
import type { ToolRegistry } from './tools/registry.js';
import type { ChatMessage, ChatModel, ToolCall, ToolResult, TurnState } from './types.js';

export { AgentLoopBreak, MaxIterationsError, ModelError } from './agent/errors.js';

export type AgentResult = {
  text: string;
  /** Model requests made during the turn. */
  turns: number;
  toolCalls: number;
};

export type AgentHooks = {
  onToolCall?: (call: ToolCall) => void;
  onToolResult?: (result: ToolResult) => void | Promise<void>;
  onStateChange?: (state: TurnState) => void;
};

export type AgentSession = {
  /** Conversation so far; append-only. */
  readonly messages: readonly ChatMessage[];
  readonly state: TurnState;
  ask: (input: string, hooks?: AgentHooks) => Promise<AgentResult>;
  getSystemPrompt: () => string;
  /** Forget the conversation; the next ask starts with a fresh system prompt. */
  reset: () => void;
};

export type SessionOptions = {
  model: ChatModel;
  registry: ToolRegistry;
  /** Built on the first turn, so history and context are read as late as possible. */
  systemPrompt: string | (() => string);
  history?: InteractionHistory;
  maxIterations?: number;
  hooks?: AgentHooks;
};

function steeringFor(calls: ToolCall[]): string {
  return calls.some((c) => c.function.name === SHELL_TOOL_NAME) ? SHELL_STEERING : TOOL_STEERING;
}

export function createSession(opts: SessionOptions): AgentSession {
  const maxIterations = opts.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new Error(`max_iterations must be a positive integer (got ${maxIterations})`);
  }

  let messages: ChatMessage[] = [];
  let state: TurnState = 'idle';
  let systemPrompt: string | undefined;

  const getSystemPrompt = (): string => {
    if (systemPrompt === undefined) {
      systemPrompt = typeof opts.systemPrompt === 'function' ? opts.systemPrompt() : opts.systemPrompt;
    }
    return systemPrompt;
  };

  const ask = async (input: string, turnHooks?: AgentHooks): Promise<AgentResult> => {
    if (state === 'awaiting_model' || state === 'dispatching_tools') {
      throw new Error('a turn is already in progress');
    }
    const hooks: AgentHooks = { ...opts.hooks, ...turnHooks };
    const setState = (next: TurnState) => {
      state = next;
      hooks.onStateChange?.(next);
    };

    if (!messages.length) messages.push({ role: 'system', content: getSystemPrompt() });
    messages.push({ role: 'user', content: input });

    const schemas = opts.registry.schemas();
    let toolCalls = 0;

    try {
      for (let turn = 1; turn <= maxIterations; turn++) {
        setState('awaiting_model');
        const reply = await opts.model.chat(messages, schemas).catch((e: unknown) => {
          if (e instanceof AgentLoopBreak) throw e;
          const status =
            e && typeof e === 'object' && 'status' in e && typeof e.status === 'number'
              ? e.status
              : undefined;
          throw new ModelError(`Chat failed: ${e instanceof Error ? e.message : String(e)}`, status);
        });

        if (!reply.tool_calls.length) {
          messages.push({ role: 'assistant', content: reply.content });
          setState('done');
          if (opts.history) {
            await opts.history.add(input, reply.content).catch((e: unknown) => {
              console.warn(
                `[warn] failed to save interaction history: ${e instanceof Error ? e.message : String(e)}`
              );
            });
          }
          return { text: reply.content, turns: turn, toolCalls };
        }

        setState('dispatching_tools');
        messages.push({ role: 'assistant', content: reply.content, tool_calls: reply.tool_calls });
        // Strictly sequential: a later call may depend on an earlier one's side effects.
        for (const call of reply.tool_calls) {
          hooks.onToolCall?.(call);
          const result = await opts.registry.dispatch(call);
          toolCalls++;
          messages.push({
            role: 'tool',
            tool_call_id: result.id,
            content: JSON.stringify(result.payload),
          });
          await hooks.onToolResult?.(result);
        }
        messages.push({ role: 'system', content: steeringFor(reply.tool_calls) });
      }
      throw new MaxIterationsError(maxIterations);
    } catch (e: unknown) {
      setState('idle');
      throw e;
    }
  };

  return {
    get messages() {
      return messages;
    },
    get state() {
      return state;
    },
    ask,
    getSystemPrompt,
    reset: () => {
      if (state === 'awaiting_model' || state === 'dispatching_tools') {
        throw new Error('cannot reset while a turn is in progress');
      }
      messages = [];
      systemPrompt = undefined;
      state = 'idle';
    },
  };
}
