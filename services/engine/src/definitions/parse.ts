import { z } from 'zod';
import { ValidationError, formatZodIssues } from '../errors';
import type { Definition, NodeDefinition } from './types';

const nodeDefinitionSchema = z.object({
  id: z.string(),
  type: z.string(),
  config: z.unknown(),
  next: z.array(z.string()).default([])
});

// Structural checks only: node references are resolved during traversal.
export const definitionSchema = z.object({
  name: z.string(),
  version: z.string(),
  nodes: z.record(z.string(), nodeDefinitionSchema),
  entryPoints: z.array(z.string())
});

export function parseDefinition(input: unknown): Definition {
  const result = definitionSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`invalid definition: ${formatZodIssues(result.error)}`, result.error.flatten());
  }

  const nodes: Record<string, NodeDefinition> = {};
  for (const [key, node] of Object.entries(result.data.nodes)) {
    nodes[key] = {
      id: node.id,
      type: node.type,
      config: node.config ?? null,
      next: node.next
    };
  }

  return {
    name: result.data.name,
    version: result.data.version,
    nodes,
    entryPoints: result.data.entryPoints
  };
}
