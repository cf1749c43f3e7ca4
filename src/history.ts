/**
 * Bounded log of past interactions, persisted as JSON in the state directory.
 * Recent entries are shown to the model so follow-up questions have context.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { DEFAULT_HISTORY_SIZE, HISTORY_RELEVANCE_MS } from './agent/constants.js';
import { atomicWrite } from './tools/atomic.js';
import { isRecord, stateDir } from './utils.js';

export type HistoryEntry = {
  /** ISO-8601 timestamp of when the turn finished. */
  timestamp: string;
  user_input: string;
  llm_response: string;
};

export type RelevantEntry = {
  entry: HistoryEntry;
  ageMs: number;
};

function parseEntry(v: unknown): HistoryEntry | null {
  if (!isRecord(v)) return null;
  const { timestamp, user_input, llm_response } = v;
  if (typeof timestamp !== 'string' || Number.isNaN(Date.parse(timestamp))) return null;
  if (typeof user_input !== 'string' || typeof llm_response !== 'string') return null;
  return { timestamp, user_input, llm_response };
}

export function defaultHistoryPath(): string {
  return path.join(stateDir(), 'history.json');
}

export class InteractionHistory {
  private entries: HistoryEntry[] = [];

  constructor(
    readonly filePath: string = defaultHistoryPath(),
    private readonly limit: number = DEFAULT_HISTORY_SIZE
  ) {}

  /**
   * Read the history file. A missing or empty file is an empty history;
   * a corrupt one is reported and ignored so the session can still start.
   */
  async load(): Promise<this> {
    const raw = await fs.readFile(this.filePath, 'utf8').catch(() => '');
    if (!raw.trim()) {
      this.entries = [];
      return this;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      const list = isRecord(parsed) && Array.isArray(parsed.entries) ? parsed.entries : [];
      this.entries = list
        .map(parseEntry)
        .filter((e): e is HistoryEntry => e !== null)
        .slice(-this.limit);
    } catch (e: unknown) {
      console.warn(
        `[warn] ignoring unreadable history file ${this.filePath}: ${e instanceof Error ? e.message : String(e)}`
      );
      this.entries = [];
    }
    return this;
  }

  all(): readonly HistoryEntry[] {
    return this.entries;
  }

  /** Append one finished turn, keep the newest `limit` entries, and save. */
  async add(userInput: string, llmResponse: string, now: Date = new Date()): Promise<void> {
    this.entries.push({
      timestamp: now.toISOString(),
      user_input: userInput,
      llm_response: llmResponse,
    });
    if (this.entries.length > this.limit) {
      this.entries = this.entries.slice(this.entries.length - this.limit);
    }
    await this.save();
  }

  /** Entries younger than one hour, oldest first, with their age. */
  relevant(now: Date = new Date()): RelevantEntry[] {
    const out: RelevantEntry[] = [];
    for (const entry of this.entries) {
      const ageMs = now.getTime() - Date.parse(entry.timestamp);
      if (ageMs < HISTORY_RELEVANCE_MS) out.push({ entry, ageMs: Math.max(0, ageMs) });
    }
    return out;
  }

  async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await atomicWrite(this.filePath, JSON.stringify({ entries: this.entries }, null, 2) + '\n');
  }

  async clear(): Promise<void> {
    this.entries = [];
    await fs.rm(this.filePath, { force: true });
  }
}
