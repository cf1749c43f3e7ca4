#!/usr/bin/env node

import readline from 'node:readline/promises';

import { createSession, type AgentSession } from './agent.js';
import { buildDefaultSystemPrompt } from './agent/prompt-builder.js';
import { runAgentTurn } from './cli/agent-turn.js';
import {
  UsageError,
  cliOverrides,
  colorMode,
  flagBool,
  flagString,
  friendlyError,
  helpText,
  parseArgs,
  type ParsedArgs,
} from './cli/args.js';
import { OpenAIClient } from './client.js';
import { loadConfig, type ConfigOverrides } from './config.js';
import { AutoApproveProvider } from './confirm/auto.js';
import { HeadlessConfirmProvider } from './confirm/headless.js';
import { TerminalConfirmProvider } from './confirm/terminal.js';
import { loadContextFiles } from './context.js';
import { InteractionHistory, defaultHistoryPath } from './history.js';
import { err as errFmt, warn as warnFmt, makeStyler, resolveColorMode, type ColorMode, type Styler } from './term.js';
import { canonicalRoot, createDefaultRegistry } from './tools.js';
import type { ConfirmationProvider, TermpilotConfig } from './types.js';
import { PKG_VERSION, configDir } from './utils.js';

async function readStdinIfPiped(): Promise<string> {
  if (process.stdin.isTTY) return '';
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function runRepl(
  rl: readline.Interface,
  session: AgentSession,
  S: Styler,
  verbose: boolean
): Promise<number> {
  let isClosed = false;
  const closed = new Promise<null>((resolve) =>
    rl.once('close', () => {
      isClosed = true;
      resolve(null);
    })
  );
  const ask = (prompt: string) =>
    rl.question(prompt).catch((e: unknown) => {
      // Ctrl-D / Ctrl-C while waiting for input
      if (isClosed) return null;
      throw e;
    });
  console.error(S.dim(`termpilot ${PKG_VERSION}. /reset clears the conversation, /exit quits.`));

  for (;;) {
    const raw = await Promise.race([ask(S.cyan('> ')), closed]);
    if (raw === null) break;
    const line = raw.trim();
    if (!line) continue;
    if (line === '/exit' || line === '/quit') break;
    if (line === '/reset') {
      session.reset();
      console.error(S.dim('Conversation cleared.'));
      continue;
    }
    if (line === '/help') {
      console.error(S.dim('/reset  start a new conversation\n/exit   quit'));
      continue;
    }

    try {
      await runAgentTurn(session, line, S, verbose);
    } catch (e: unknown) {
      console.error(errFmt(friendlyError(e), S));
    }
  }
  return 0;
}

async function main(argv: string[]): Promise<number> {
  let args: ParsedArgs;
  let color: ColorMode;
  let cli: ConfigOverrides;
  try {
    args = parseArgs(argv);
    color = colorMode(args);
    cli = cliOverrides(args);
  } catch (e: unknown) {
    if (e instanceof UsageError) {
      console.error(`termpilot: ${e.message}`);
      console.error('Try `termpilot --help` for usage.');
      return 2;
    }
    throw e;
  }

  const S = makeStyler(resolveColorMode(color, process.env, !!process.stderr.isTTY).enabled);

  if (flagBool(args, 'version')) {
    console.log(PKG_VERSION);
    return 0;
  }
  if (flagBool(args, 'help')) {
    process.stdout.write(helpText());
    return 0;
  }

  let config: TermpilotConfig;
  try {
    ({ config } = await loadConfig({ configPath: flagString(args, 'config'), cli }));
  } catch (e: unknown) {
    console.error(errFmt(friendlyError(e), S));
    return 1;
  }

  const history = new InteractionHistory(defaultHistoryPath(), config.history_size);
  if (flagBool(args, 'clear-history')) {
    await history.clear();
    console.log('History cleared');
    return 0;
  }

  let root: string;
  try {
    root = await canonicalRoot(config.dir ?? process.cwd());
  } catch (e: unknown) {
    console.error(errFmt(friendlyError(e), S));
    return 1;
  }

  let message = args._.join(' ').trim();
  if (!message && !process.stdin.isTTY) {
    message = (await readStdinIfPiped()).trim();
    if (!message) {
      console.error('termpilot: no message given (pass one as arguments or on stdin)');
      return 2;
    }
  }

  const rl = process.stdin.isTTY
    ? readline.createInterface({ input: process.stdin, output: process.stdout })
    : null;
  const confirm: ConfirmationProvider = config.no_confirm
    ? new AutoApproveProvider()
    : rl
      ? new TerminalConfirmProvider(rl, S)
      : new HeadlessConfirmProvider();
  if (config.no_confirm && config.verbose) {
    console.error(warnFmt('shell commands run without confirmation', S));
  }

  try {
    await history.load();
    const contexts = await loadContextFiles({
      root,
      configDir: configDir(),
      fileNames: config.context_file_names,
      contextName: flagString(args, 'context'),
      globalContexts: config.global_contexts,
      noContext: config.no_context,
    });

    if (config.verbose) {
      console.error(S.dim(`[verbose] workspace: ${root}`));
      console.error(S.dim(`[verbose] endpoint: ${config.endpoint} model: ${config.model || '(server default)'}`));
      for (const c of contexts) console.error(S.dim(`[verbose] context ${c.name}: ${c.path}`));
    }

    const model = new OpenAIClient({
      endpoint: config.endpoint,
      model: config.model,
      apiKey: config.api_key,
      maxTokens: config.max_tokens,
      temperature: config.temperature,
      timeoutMs: config.timeout * 1000,
      verbose: config.verbose,
    });

    const session = createSession({
      model,
      registry: createDefaultRegistry({ root, confirm }),
      history,
      maxIterations: config.max_iterations,
      systemPrompt: () => buildDefaultSystemPrompt({ contexts, history: history.relevant() }),
    });

    if (message) {
      try {
        await runAgentTurn(session, message, S, config.verbose);
        return 0;
      } catch (e: unknown) {
        console.error(errFmt(friendlyError(e), S));
        return 1;
      }
    }

    if (!rl) return 2;
    return await runRepl(rl, session, S, config.verbose);
  } finally {
    rl?.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (e: unknown) => {
    console.error(friendlyError(e));
    process.exit(1);
  }
);
