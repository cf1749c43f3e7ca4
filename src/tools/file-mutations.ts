import fs from 'node:fs/promises';
import path from 'node:path';

import type { ToolContext } from '../tools.js';
import type { FileReplacement, JsonObject } from '../types.js';
import { isRecord } from '../utils.js';

import { optBool, requireString, type ToolArgs } from './args.js';
import { atomicWrite, directWrite } from './atomic.js';
import { displayPath, resolvePath } from './path-safety.js';
import type { Tool } from './registry.js';
import { countOccurrences, isBinary } from './text-utils.js';
import { IOError, ParseError, ValidationError } from './tool-error.js';

export async function writeFileTool(ctx: ToolContext, args: ToolArgs): Promise<JsonObject> {
  const rawPath = requireString(args, 'path', 'write_file');
  // Content may arrive as a string (normal) or as a parsed JSON object
  // when the model passes a JSON document without quoting it.
  const raw = args.content;
  const contentWasObject = raw != null && typeof raw === 'object';
  const content =
    typeof raw === 'string' ? raw : contentWasObject ? JSON.stringify(raw, null, 2) : undefined;
  if (content == null) throw new ValidationError(`write_file: missing 'content' (got ${typeof raw})`);
  if (contentWasObject) {
    console.warn(
      `[write_file] Warning: content for "${rawPath}" arrived as an object; serialized to a JSON string.`
    );
  }

  const atomic = optBool(args, 'atomic', 'write_file') ?? true;
  const createParents = optBool(args, 'create_parents', 'write_file') ?? true;
  const p = await resolvePath(ctx, rawPath, true);

  if (createParents) {
    await fs.mkdir(path.dirname(p), { recursive: true }).catch((e: unknown) => {
      throw new IOError(
        `Failed to create ${path.dirname(p)}: ${e instanceof Error ? e.message : String(e)}`
      );
    });
  }

  const write = atomic ? atomicWrite : directWrite;
  await write(p, content).catch((e: unknown) => {
    throw new IOError(`Failed to write ${p}: ${e instanceof Error ? e.message : String(e)}`);
  });

  return { path: p, bytes: Buffer.byteLength(content, 'utf8') };
}

/**
 * Validate the `replacements` argument before anything touches the file.
 */
export function parseReplacements(raw: unknown): FileReplacement[] {
  if (!Array.isArray(raw)) throw new ParseError("patch_file: 'replacements' must be an array");
  return raw.map((rep: unknown, i: number): FileReplacement => {
    if (!isRecord(rep)) throw new ParseError(`patch_file: replacement ${i} must be an object`);
    const { old_string, new_string, replace_all } = rep;
    if (typeof old_string !== 'string') {
      throw new ParseError(`patch_file: replacement ${i} missing 'old_string'`);
    }
    if (typeof new_string !== 'string') {
      throw new ParseError(`patch_file: replacement ${i} missing 'new_string'`);
    }
    if (!old_string) throw new ParseError(`patch_file: replacement ${i}: old_string cannot be empty`);
    if (replace_all !== undefined && replace_all !== null && typeof replace_all !== 'boolean') {
      throw new ParseError(`patch_file: replacement ${i}: replace_all must be a boolean`);
    }
    return { old_string, new_string, replace_all: replace_all === true };
  });
}

/**
 * Apply replacements in order to one in-memory buffer.
 * Each later replacement sees the result of the earlier ones.
 */
export function applyReplacements(
  content: string,
  replacements: FileReplacement[]
): { updated: string; counts: number[] } {
  let updated = content;
  const counts: number[] = [];
  for (const rep of replacements) {
    if (rep.replace_all) {
      const c = countOccurrences(updated, rep.old_string);
      if (c > 0) updated = updated.split(rep.old_string).join(rep.new_string);
      counts.push(c);
      continue;
    }
    const idx = updated.indexOf(rep.old_string);
    if (idx === -1) {
      counts.push(0);
      continue;
    }
    updated = updated.slice(0, idx) + rep.new_string + updated.slice(idx + rep.old_string.length);
    counts.push(1);
  }
  return { updated, counts };
}

export async function patchFileTool(ctx: ToolContext, args: ToolArgs): Promise<JsonObject> {
  const p = await resolvePath(ctx, requireString(args, 'path', 'patch_file'));
  const replacements = parseReplacements(args.replacements);
  const atomic = optBool(args, 'atomic', 'patch_file') ?? true;

  const buf = await fs.readFile(p).catch((e: unknown) => {
    throw new IOError(`Failed to read ${p}: ${e instanceof Error ? e.message : String(e)}`);
  });
  if (isBinary(buf)) {
    throw new IOError(`patch_file: ${displayPath(p, ctx.root)} is a binary file`);
  }
  const content = buf.toString('utf8');
  const { updated, counts } = applyReplacements(content, replacements);
  const total = counts.reduce((a, b) => a + b, 0);
  const changed = updated !== content;

  // one write for the whole patch, and none when nothing changed
  if (changed) {
    const write = atomic ? atomicWrite : directWrite;
    await write(p, updated).catch((e: unknown) => {
      throw new IOError(`Failed to replace ${p}: ${e instanceof Error ? e.message : String(e)}`);
    });
  }

  return { path: p, changed, replacements: counts, total_replacements: total };
}

export const writeFile: Tool = {
  spec: {
    name: 'write_file',
    description: 'Write content to a file atomically. Creates parent directories if needed.',
    parameters: [
      {
        name: 'path',
        type: 'string',
        description: 'File path to write (relative to workspace)',
        required: true,
      },
      { name: 'content', type: 'string', description: 'Full file content to write', required: true },
      { name: 'atomic', type: 'boolean', description: 'Write atomically (default true)' },
      {
        name: 'create_parents',
        type: 'boolean',
        description: 'Create parent directories if needed (default true)',
      },
    ],
  },
  execute: writeFileTool,
};

export const patchFile: Tool = {
  spec: {
    name: 'patch_file',
    description:
      'Apply multiple string replacements to a file (transactional). Each replacement may be replace_all or single occurrence.',
    parameters: [
      { name: 'path', type: 'string', description: 'File path to patch', required: true },
      {
        name: 'replacements',
        type: 'array',
        description: 'Array of {old_string,new_string,replace_all?}',
        required: true,
        items: { type: 'object', description: 'Replacement operation' },
      },
      { name: 'atomic', type: 'boolean', description: 'Apply atomically (default true)' },
    ],
  },
  execute: patchFileTool,
};
