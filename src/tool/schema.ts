// pattern: Functional Core

/**
 * Derives the advertised input schema from a tool's zod argument schema, so the
 * description handed to the model and the decoder applied to its arguments
 * cannot drift apart. The zod JSON Schema output is projected onto the small
 * closed schema the catalog advertises.
 */

import { z } from 'zod';
import type { InputSchema, ToolProperty, ToolPropertyType } from './types.ts';

const PROPERTY_TYPES: ReadonlyArray<ToolPropertyType> = [
  'string',
  'number',
  'integer',
  'boolean',
  'array',
  'object',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPropertyType(value: unknown): value is ToolPropertyType {
  return typeof value === 'string' && PROPERTY_TYPES.some((type) => type === value);
}

function toProperty(raw: unknown): ToolProperty {
  if (!isRecord(raw)) {
    return { type: 'object' };
  }

  const enumValues = Array.isArray(raw['enum'])
    ? raw['enum'].filter((value): value is string => typeof value === 'string')
    : undefined;
  const type = isPropertyType(raw['type']) ? raw['type'] : enumValues ? 'string' : 'object';
  const description = typeof raw['description'] === 'string' ? raw['description'] : undefined;
  const items = isRecord(raw['items']) && isPropertyType(raw['items']['type'])
    ? { type: raw['items']['type'] }
    : undefined;

  return {
    type,
    ...(description !== undefined && { description }),
    ...(enumValues && enumValues.length > 0 && { enum: enumValues }),
    ...(items && { items }),
  };
}

export function deriveInputSchema(args: z.ZodType): InputSchema {
  const json: unknown = z.toJSONSchema(args, { io: 'input', unrepresentable: 'any' });
  const rawProperties = isRecord(json) && isRecord(json['properties']) ? json['properties'] : {};
  const rawRequired = isRecord(json) && Array.isArray(json['required']) ? json['required'] : [];

  const properties: Record<string, ToolProperty> = {};
  for (const [key, value] of Object.entries(rawProperties)) {
    properties[key] = toProperty(value);
  }

  return {
    type: 'object',
    properties,
    required: rawRequired.filter((name): name is string => typeof name === 'string'),
  };
}
