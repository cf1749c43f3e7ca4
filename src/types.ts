export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; tool_calls?: ToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string };

export type ToolCall = {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
};

export type ToolSchema = {
  type: 'function';
  function: {
    name: string;
    description?: string;
    // OpenAI style JSON schema
    parameters: Record<string, unknown>;
  };
};

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type ToolResult = {
  /** Echoes ToolCall.id. */
  id: string;
  name: string;
  payload: JsonObject;
};

export type ParamType = 'string' | 'integer' | 'boolean' | 'object' | 'array';

export type ToolParam = {
  name: string;
  type: ParamType;
  description: string;
  required?: boolean;
  /** Element type for array params. */
  items?: { type: ParamType; description?: string };
};

export type ToolSpec = {
  name: string;
  description: string;
  parameters: ToolParam[];
};

export type FileReplacement = {
  old_string: string;
  new_string: string;
  replace_all?: boolean;
};

export type ProcessResult = {
  command: string;
  executed: boolean;
  copied?: boolean;
  exit_code?: number | null;
  stdout?: string;
  stderr?: string;
  combined?: string;
  error?: string;
};

export type PathInfo = {
  path: string;
  type: 'file' | 'dir' | 'symlink' | 'other';
  size: number;
  modified: string | null;
  created: string | null;
  mode: string;
};

/** One model step: either final text or a list of tool-call requests. */
export type ModelReply = {
  content: string;
  tool_calls: ToolCall[];
};

/** The opaque chat capability the conversation engine drives. */
export interface ChatModel {
  chat(messages: ChatMessage[], tools: ToolSchema[]): Promise<ModelReply>;
}

export type ShellDecision = 'execute' | 'skip' | 'copy';

export type ConfirmRequest = {
  tool: string;
  args: Record<string, unknown>;
  summary: string; // human-readable one-liner
};

export interface ConfirmationProvider {
  /** Decide what to do with a shell command before it is spawned. */
  confirmShell(opts: ConfirmRequest): Promise<ShellDecision>;
  /** Called when a decision was made without prompting (informational). */
  showNotice?(msg: string): void;
}

export type TurnState = 'idle' | 'awaiting_model' | 'dispatching_tools' | 'done';

export type TermpilotConfig = {
  endpoint: string;
  model: string;
  api_key?: string;
  dir?: string;
  max_tokens: number;
  temperature: number;
  /** Model response timeout, seconds. */
  timeout: number;
  max_iterations: number;
  no_confirm: boolean;
  verbose: boolean;
  history_size: number;
  context_file_names: string[];
  /** Named contexts from the config dir that are always loaded. */
  global_contexts: string[];
  no_context: boolean;
};
