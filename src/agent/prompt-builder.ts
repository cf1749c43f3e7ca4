/**
 * System prompt builder.
 *
 * The prompt is a list of named sections, each rendered from a PromptContext.
 * Sections that render to an empty string are left out.
 */

import type { ContextFile } from '../context.js';
import type { RelevantEntry } from '../history.js';
import { osName } from '../utils.js';

export interface PromptSection {
  /** Unique section identifier. */
  name: string;
  /** Build the section text. Return empty string to skip. */
  build(ctx: PromptContext): string;
}

export interface PromptContext {
  /** OS name the shell commands run on. */
  os: string;
  /** Terminal height; drives the answer length budget. */
  termLines: number;
  contexts: ContextFile[];
  history: RelevantEntry[];
}

const DEFAULT_TERM_LINES = 50;

/** Words the final answer may use so it fits on one screen. */
export function maxWords(termLines: number): number {
  return Math.max(1, termLines - 6) * 16;
}

export class IdentitySection implements PromptSection {
  name = 'identity';
  build(_ctx: PromptContext): string {
    return `You are an AI assistant running in a terminal that can call tools to operate on the user's machine.
Your goal is to help the user achieve their task efficiently and safely.`;
  }
}

export class RulesSection implements PromptSection {
  name = 'rules';
  build(ctx: PromptContext): string {
    return `System rules:
- If the user asks you to perform a terminal task, call the run_shell tool with the exact command to execute. Prefer pipes over multiple sequential commands when possible.
- Keep commands non-interactive, idempotent, and safe by default. Avoid destructive operations unless the user explicitly requests them.
- The commands are being executed on ${ctx.os}.
- When executing a terminal command the user can already see the output of the command. Do NOT summarize or restate the command's output.
- If the user is asking about a command (explanatory), answer concisely and include a one-line example, then a brief explanation of key flags.
- After running a command via the tool, use its output to decide next steps. You may call tools multiple times until the task is complete.
- Use read_file, list_dir, glob and grep to inspect files; use write_file and patch_file to change them. Paths are relative to the workspace root.
- Do not invent file paths or secrets. Never print sensitive values.
- Keep your answer short and concise. Do not exceed ${maxWords(ctx.termLines)} words!
- When you include code, always use fenced code blocks with a language identifier like \`\`\`ts, \`\`\`bash, \`\`\`python, etc. Avoid plain triple backticks without a language.
- Always respond using Markdown syntax.`;
  }
}

export class ContextSection implements PromptSection {
  name = 'context';
  build(ctx: PromptContext): string {
    if (!ctx.contexts.length) return '';
    const parts = ['## Additional Context'];
    for (const c of ctx.contexts) parts.push(`### Context from ${c.name}\n\n${c.content}`);
    return parts.join('\n\n');
  }
}

export class HistorySection implements PromptSection {
  name = 'history';
  build(ctx: PromptContext): string {
    if (!ctx.history.length) return '';
    const parts = [
      'Here are some of your previous interactions (these may not be related to the current query and are just for reference):',
    ];
    ctx.history.forEach(({ entry, ageMs }, i) => {
      const minutes = Math.floor(ageMs / 60_000);
      parts.push(
        `Interaction ${i + 1} (from ${minutes} minutes ago):\nUser: ${entry.user_input}\nAssistant: ${entry.llm_response}`
      );
    });
    return parts.join('\n\n');
  }
}

export class SystemPromptBuilder {
  private sections: PromptSection[] = [];

  /** Create a builder with the default section set. */
  static withDefaults(): SystemPromptBuilder {
    return new SystemPromptBuilder()
      .addSection(new IdentitySection())
      .addSection(new RulesSection())
      .addSection(new ContextSection())
      .addSection(new HistorySection());
  }

  addSection(section: PromptSection): this {
    this.sections.push(section);
    return this;
  }

  /** Replace a section by name, or append if not found. */
  replaceSection(name: string, section: PromptSection): this {
    const idx = this.sections.findIndex((s) => s.name === name);
    if (idx >= 0) {
      this.sections[idx] = section;
    } else {
      this.sections.push(section);
    }
    return this;
  }

  removeSection(name: string): this {
    this.sections = this.sections.filter((s) => s.name !== name);
    return this;
  }

  sectionNames(): string[] {
    return this.sections.map((s) => s.name);
  }

  build(ctx: PromptContext): string {
    const parts: string[] = [];
    for (const section of this.sections) {
      const text = section.build(ctx).trim();
      if (text) parts.push(text);
    }
    return parts.join('\n\n');
  }
}

export function buildDefaultSystemPrompt(ctx: Partial<PromptContext> = {}): string {
  return SystemPromptBuilder.withDefaults().build({
    os: ctx.os ?? osName(),
    termLines: ctx.termLines ?? process.stdout.rows ?? DEFAULT_TERM_LINES,
    contexts: ctx.contexts ?? [],
    history: ctx.history ?? [],
  });
}
