/**
 * MCP Tool Registry
 */

import { z } from 'zod';
import { answerQuestion, answerQuestionSchema } from './answer.js';
import { verifyClaim, verifyClaimSchema } from './verify.js';
import { searchKnowledge, searchKnowledgeSchema } from './search.js';
import type { ToolResult } from '../../types/index.js';

// Tool definitions for MCP
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  /** Validates its params against inputSchema before running */
  handler: (params: unknown) => Promise<ToolResult>;
}

export interface JsonSchemaProperty {
  type?: string;
  description?: string;
  enum?: readonly string[];
  minLength?: number;
  maxLength?: number;
  minimum?: number;
  maximum?: number;
  items?: JsonSchemaProperty;
}

export interface ObjectJsonSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
}

function defineTool<S extends z.ZodTypeAny>(
  name: string,
  description: string,
  inputSchema: S,
  run: (params: z.infer<S>) => Promise<ToolResult>
): ToolDefinition {
  return {
    name,
    description,
    inputSchema,
    handler: async (params) => run(inputSchema.parse(params)),
  };
}

export const tools: ToolDefinition[] = [
  defineTool(
    'answer_question',
    'Answer a question by sampling several reasoning chains, stopping early on a validated consensus, ' +
      'otherwise correcting each chain against Wikidata, Wikipedia and web evidence before consolidating a final answer.',
    answerQuestionSchema,
    answerQuestion
  ),
  defineTool(
    'verify_claim',
    'Verify a factual claim against retrieved knowledge. Returns SUPPORTS, REFUTES or NOT ENOUGH INFO.',
    verifyClaimSchema,
    verifyClaim
  ),
  defineTool(
    'search_knowledge',
    'Search the knowledge sources directly. Returns the most relevant snippets for the query, ' +
      'ranked by relevance, using the sources preferred for the domain and query type.',
    searchKnowledgeSchema,
    searchKnowledge
  ),
];

/**
 * Get tool by name
 */
export function getTool(name: string): ToolDefinition | undefined {
  return tools.find(t => t.name === name);
}

export function getToolNames(): string[] {
  return tools.map(t => t.name);
}

/**
 * Convert a Zod object schema to the JSON Schema advertised over MCP
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): ObjectJsonSchema {
  if (!(schema instanceof z.ZodObject)) {
    return { type: 'object', properties: {} };
  }

  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  for (const [key, value] of Object.entries(shape)) {
    properties[key] = zodTypeToJsonSchema(value);
    if (!value.isOptional()) {
      required.push(key);
    }
  }

  return required.length > 0
    ? { type: 'object', properties, required }
    : { type: 'object', properties };
}

function zodTypeToJsonSchema(schema: z.ZodTypeAny): JsonSchemaProperty {
  const described = (property: JsonSchemaProperty): JsonSchemaProperty =>
    schema.description ? { ...property, description: schema.description } : property;

  // Wrapped types keep the outer description when they have one
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return described(zodTypeToJsonSchema(schema.unwrap()));
  }
  if (schema instanceof z.ZodDefault) {
    return described(zodTypeToJsonSchema(schema.removeDefault()));
  }
  if (schema instanceof z.ZodEffects) {
    return described(zodTypeToJsonSchema(schema.innerType()));
  }

  if (schema instanceof z.ZodString) {
    const result: JsonSchemaProperty = { type: 'string' };
    if (schema.minLength !== null) result.minLength = schema.minLength;
    if (schema.maxLength !== null) result.maxLength = schema.maxLength;
    return described(result);
  }

  if (schema instanceof z.ZodNumber) {
    const result: JsonSchemaProperty = { type: schema.isInt ? 'integer' : 'number' };
    if (schema.minValue !== null) result.minimum = schema.minValue;
    if (schema.maxValue !== null) result.maximum = schema.maxValue;
    return described(result);
  }

  if (schema instanceof z.ZodBoolean) {
    return described({ type: 'boolean' });
  }

  if (schema instanceof z.ZodEnum) {
    const options: readonly string[] = schema.options;
    return described({ type: 'string', enum: options });
  }

  if (schema instanceof z.ZodArray) {
    return described({ type: 'array', items: zodTypeToJsonSchema(schema.element) });
  }

  // Fallback to string
  return described({ type: 'string' });
}
