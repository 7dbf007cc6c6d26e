/** Zod schema for a recipe's components.json metadata record. */

import { z } from 'zod';

export const COMPONENT_TYPES = ['service', 'agent', 'library', 'tool', 'core'] as const;

const RECIPE_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const recipeName = z.string().min(1).max(200).regex(RECIPE_NAME_RE, {
  message: 'Recipe names may contain letters, digits, ".", "_" and "-" only',
});

export const ComponentsFileSchema = z.object({
  name: recipeName,
  version: z.string().min(1).max(50).default('0.1.0'),
  type: z.enum(COMPONENT_TYPES),
  dependencies: z.array(recipeName).max(200).default([]),
  description: z.string().max(5000).default(''),
  metadata: z.record(z.string().max(200), z.unknown()).default({}),
}).strict();

export type ComponentsFile = z.output<typeof ComponentsFileSchema>;

/** `self_hosting` -> `selfHosting`; keys already in camelCase pass through. */
export function camelCaseKey(key: string): string {
  return key.replace(/[_-]([a-z0-9])/g, (_, ch: string) => ch.toUpperCase());
}

export function normalizeAttributes(metadata: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(metadata).map(([key, value]) => [camelCaseKey(key), value]));
}
