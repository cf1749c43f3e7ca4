/** Steering note appended after a tool round that included run_shell. */
export const SHELL_STEERING =
  "Summarize the results of the terminal command succinctly and proceed with any next steps to complete the user's request. If the command output already satisfies the request, provide the final answer concisely.";

/** Steering note appended after a tool round without run_shell. */
export const TOOL_STEERING =
  'Use the tool outputs above to answer the user directly. Provide a concise summary or the requested information. If more actions are needed, call a tool.';

export const SHELL_TOOL_NAME = 'run_shell';

export const DEFAULT_MAX_ITERATIONS = 50;

/** Interaction history entries kept on disk. */
export const DEFAULT_HISTORY_SIZE = 10;

/** Only history younger than this is shown to the model. */
export const HISTORY_RELEVANCE_MS = 60 * 60 * 1000;
