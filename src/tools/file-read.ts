import fs from 'node:fs/promises';

import type { ToolContext } from '../tools.js';
import type { JsonObject } from '../types.js';

import { optInt, requireString, type ToolArgs } from './args.js';
import { resolvePath, displayPath } from './path-safety.js';
import type { Tool } from './registry.js';
import { isBinary, splitLines } from './text-utils.js';
import { IOError, ToolError } from './tool-error.js';

export async function readFileTool(ctx: ToolContext, args: ToolArgs): Promise<JsonObject> {
  const p = await resolvePath(ctx, requireString(args, 'path', 'read_file'));
  const offset = optInt(args, 'offset', 'read_file') ?? 0;
  const limit = optInt(args, 'limit', 'read_file');

  const stat = await fs.stat(p);
  if (stat.isDirectory()) {
    throw new ToolError(
      'io',
      `read_file: "${displayPath(p, ctx.root)}" is a directory, not a file`,
      false,
      'use list_dir to see its contents'
    );
  }

  const buf = await fs.readFile(p).catch((e: unknown) => {
    throw new IOError(`Failed reading ${p}: ${e instanceof Error ? e.message : String(e)}`);
  });
  if (isBinary(buf)) {
    throw new IOError(`read_file: ${displayPath(p, ctx.root)} is a binary file (${buf.length} bytes)`);
  }

  const lines = splitLines(buf.toString('utf8'));
  const totalLines = lines.length;
  // an offset past the end clamps to an empty slice
  const start = Math.min(offset, totalLines);
  const end = limit === undefined ? totalLines : Math.min(start + limit, totalLines);

  return {
    path: p,
    start,
    end,
    total_lines: totalLines,
    content: lines.slice(start, end).join('\n'),
  };
}

export const readFile: Tool = {
  spec: {
    name: 'read_file',
    description:
      'Read a text file with optional line offset and limit. Returns content and metadata.',
    parameters: [
      {
        name: 'path',
        type: 'string',
        description: 'File path to read (relative to workspace)',
        required: true,
      },
      { name: 'offset', type: 'integer', description: 'Optional starting line (0-based)' },
      { name: 'limit', type: 'integer', description: 'Optional number of lines to return' },
    ],
  },
  execute: readFileTool,
};
