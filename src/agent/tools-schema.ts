import type { ToolParam, ToolSchema, ToolSpec } from '../types.js';

const obj = (properties: Record<string, unknown>, required: string[] = []) => ({
  type: 'object',
  properties,
  required,
});

function paramSchema(p: ToolParam): Record<string, unknown> {
  return {
    type: p.type,
    description: p.description,
    ...(p.items && {
      items: {
        type: p.items.type,
        ...(p.items.description !== undefined && { description: p.items.description }),
      },
    }),
  };
}

/** Convert one declarative tool spec to the function-calling schema the model expects. */
export function toToolSchema(spec: ToolSpec): ToolSchema {
  const properties: Record<string, unknown> = {};
  for (const p of spec.parameters) properties[p.name] = paramSchema(p);
  const required = spec.parameters.filter((p) => p.required).map((p) => p.name);
  return {
    type: 'function',
    function: {
      name: spec.name,
      description: spec.description,
      parameters: obj(properties, required),
    },
  };
}

export function buildToolsSchema(specs: ToolSpec[]): ToolSchema[] {
  return specs.map(toToolSchema);
}
