import Ajv from 'ajv';

export interface RawToolCall {
  name: string;
  args?: Record<string, unknown>;
}

export interface RawGeneration {
  reply: string;
  tool_calls: RawToolCall[];
}

/**
 * JSON Schema for the generation contract.
 * The model is instructed to return JSON matching this schema.
 */
export const GENERATION_CONTRACT_SCHEMA = {
  type: 'object',
  properties: {
    reply: {
      type: 'string',
      description: 'Reply body for the customer, without greeting or sign-off. Use {{tool_name}} where a tool result belongs.',
    },
    tool_calls: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          args: { type: 'object', additionalProperties: true },
        },
        required: ['name'],
      },
      description: 'Tools to call. Actions that change the account are held for human confirmation.',
    },
  },
  required: ['reply', 'tool_calls'],
} as const;

export const validateGeneration = new Ajv({ allErrors: true }).compile<RawGeneration>(GENERATION_CONTRACT_SCHEMA);

/** Strip the "functions." prefix some models add to tool names */
export function normalizeToolName(name: string): string {
  return name.trim().replace(/^functions\./, '');
}
