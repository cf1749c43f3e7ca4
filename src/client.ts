import { setTimeout as delay } from 'node:timers/promises';

import { Agent, fetch, type Dispatcher } from 'undici';

import {
  ClientError,
  asError,
  getRetryDelayMs,
  isConnRefused,
  isTimeout,
} from './client/error-utils.js';
import type { ChatMessage, ChatModel, ModelReply, ToolCall, ToolSchema } from './types.js';
import { isRecord, randomId } from './utils.js';

export { ClientError } from './client/error-utils.js';

// ── Persistent connection pool ───────────────────────────────────────────
// Reuses TCP+TLS connections across requests in a session.
const pooledAgent = new Agent({
  keepAliveTimeout: 30_000,
  keepAliveMaxTimeout: 120_000,
  connections: 16,
  pipelining: 1,
});

const MAX_ATTEMPTS = 3;

export type ClientOptions = {
  endpoint: string;
  model: string;
  apiKey?: string;
  maxTokens?: number;
  temperature?: number;
  /** Response timeout for one request, ms. */
  timeoutMs?: number;
  verbose?: boolean;
  /** Alternate undici dispatcher (tests pass a MockAgent). */
  dispatcher?: Dispatcher;
};

function parseToolCall(raw: unknown): ToolCall | null {
  if (!isRecord(raw) || !isRecord(raw.function)) return null;
  const name = raw.function.name;
  if (typeof name !== 'string' || !name) return null;
  const args = raw.function.arguments;
  return {
    id: typeof raw.id === 'string' && raw.id ? raw.id : `call_${randomId(6)}`,
    type: 'function',
    function: {
      name,
      // some servers send arguments as an object rather than a JSON string
      arguments: typeof args === 'string' ? args : args == null ? '{}' : JSON.stringify(args),
    },
  };
}

/** Pull the first choice out of a chat-completions response body. */
export function parseChatResponse(body: unknown): ModelReply {
  const choices = isRecord(body) && Array.isArray(body.choices) ? body.choices : [];
  const first: unknown = choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    throw new ClientError('chat completion response has no message');
  }
  const msg = first.message;
  const toolCalls = Array.isArray(msg.tool_calls)
    ? msg.tool_calls.map(parseToolCall).filter((c): c is ToolCall => c !== null)
    : [];
  return {
    content: typeof msg.content === 'string' ? msg.content : '',
    tool_calls: toolCalls,
  };
}

export class OpenAIClient implements ChatModel {
  private readonly endpoint: string;
  private readonly dispatcher: Dispatcher;

  constructor(private readonly opts: ClientOptions) {
    this.endpoint = opts.endpoint.replace(/\/+$/, '');
    this.dispatcher = opts.dispatcher ?? pooledAgent;
  }

  get model(): string {
    return this.opts.model;
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.opts.apiKey) h.Authorization = `Bearer ${this.opts.apiKey}`;
    return h;
  }

  private log(msg: string) {
    if (this.opts.verbose) console.error(`[client] ${msg}`);
  }

  buildBody(messages: ChatMessage[], tools: ToolSchema[]): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.opts.model,
      messages,
      stream: false,
    };
    if (tools.length) {
      body.tools = tools;
      body.tool_choice = 'auto';
    }
    if (this.opts.temperature !== undefined) body.temperature = this.opts.temperature;
    if (this.opts.maxTokens !== undefined) body.max_tokens = this.opts.maxTokens;
    return body;
  }

  /** Non-streaming chat with retry (connection refused, 429/503 with exponential backoff). */
  async chat(messages: ChatMessage[], tools: ToolSchema[]): Promise<ModelReply> {
    const url = `${this.endpoint}/chat/completions`;
    const body = JSON.stringify(this.buildBody(messages, tools));
    const timeoutMs = this.opts.timeoutMs ?? 600_000;

    this.log(`→ POST ${url} (${messages.length} messages, ${tools.length} tools)`);

    let lastErr: Error = new ClientError('POST /chat/completions failed without response', 503, true);
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      const backoff = Math.pow(2, attempt + 1) * 1000; // 2s, 4s
      const last = attempt === MAX_ATTEMPTS - 1;
      try {
        const res = await fetch(url, {
          method: 'POST',
          headers: this.headers(),
          body,
          dispatcher: this.dispatcher,
          signal: AbortSignal.timeout(timeoutMs),
        });

        if (res.status === 503 || res.status === 429) {
          await res.text().catch(() => '');
          lastErr = new ClientError(
            `POST /chat/completions returned ${res.status}, attempt ${attempt + 1}/${MAX_ATTEMPTS}`,
            res.status,
            true
          );
          if (last) throw lastErr;
          this.log(`${res.status} from server, retrying in ${backoff}ms...`);
          await delay(getRetryDelayMs(backoff));
          continue;
        }

        if (!res.ok) {
          const text = await res.text().catch(() => '');
          throw new ClientError(
            `POST /chat/completions failed: ${res.status} ${res.statusText}${text ? `\n${text.slice(0, 2000)}` : ''}`,
            res.status
          );
        }

        const json: unknown = await res.json();
        const reply = parseChatResponse(json);
        this.log(`← ${reply.tool_calls.length} tool call(s), ${reply.content.length} chars`);
        return reply;
      } catch (e: unknown) {
        if (e instanceof ClientError) throw e;
        if (isTimeout(e)) {
          throw new ClientError(`Response timeout (${timeoutMs}ms) waiting for ${url}`, undefined, true);
        }
        lastErr = asError(e, `POST /chat/completions attempt ${attempt + 1} failed`);
        if (isConnRefused(e) && !last) {
          this.log(`Connection refused, retrying in ${backoff}ms (attempt ${attempt + 1})...`);
          await delay(getRetryDelayMs(backoff));
          continue;
        }
        throw new ClientError(`connection failure to ${url}: ${describe(lastErr)}`, undefined, true);
      }
    }
    throw lastErr;
  }
}

function describe(e: Error): string {
  return e.cause instanceof Error ? `${e.message} (${e.cause.message})` : e.message;
}
