/**
 * Tool contract and registry.
 *
 * The registry is the single place where tool failures are normalized: `dispatch`
 * never throws, it always returns a ToolResult whose payload is either the tool's
 * value or `{ error }`.
 */

import { buildToolsSchema } from '../agent/tools-schema.js';
import type { ToolContext } from '../tools.js';
import type { JsonObject, ToolCall, ToolResult, ToolSchema, ToolSpec } from '../types.js';
import { isRecord } from '../utils.js';

import type { ToolArgs } from './args.js';
import { ParseError, ToolError, ValidationError } from './tool-error.js';

export interface Tool {
  readonly spec: ToolSpec;
  execute(ctx: ToolContext, args: ToolArgs): Promise<JsonObject>;
}

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(private readonly ctx: ToolContext) {}

  /** Add a tool. Names are unique; registering a taken name throws. */
  register(tool: Tool): this {
    const name = tool.spec.name;
    if (this.tools.has(name)) throw new Error(`tool already registered: ${name}`);
    this.tools.set(name, tool);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /** Specs in registration order. */
  catalog(): ToolSpec[] {
    return [...this.tools.values()].map((t) => t.spec);
  }

  schemas(): ToolSchema[] {
    return buildToolsSchema(this.catalog());
  }

  async dispatch(call: ToolCall): Promise<ToolResult> {
    const name = call.function.name;
    const tool = this.tools.get(name);
    if (!tool) return { id: call.id, name, payload: { error: `Unknown tool: ${name}` } };

    try {
      const args = parseArguments(name, call.function.arguments);
      checkRequired(tool.spec, args);
      const payload = await tool.execute(this.ctx, args);
      return { id: call.id, name, payload };
    } catch (e: unknown) {
      const te = ToolError.fromError(e);
      return { id: call.id, name, payload: { error: te.toPayloadMessage() } };
    }
  }
}

export function parseArguments(toolName: string, raw: string): ToolArgs {
  if (!raw.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ParseError(`Failed parsing tool args for ${toolName}: ${msg}`);
  }
  if (!isRecord(parsed)) {
    throw new ParseError(`Failed parsing tool args for ${toolName}: expected a JSON object`);
  }
  return parsed;
}

function checkRequired(spec: ToolSpec, args: ToolArgs): void {
  for (const p of spec.parameters) {
    if (!p.required) continue;
    const v = args[p.name];
    if (v === undefined || v === null) {
      throw new ValidationError(`Missing required parameter '${p.name}' for ${spec.name}`);
    }
  }
}
