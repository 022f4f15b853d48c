/**
 * Signal-type dimension: definitions and seeding
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { SIGNAL_TYPES } from '@wearable/core';
import type { AnalyticsStore, SignalTypeDefinition } from './types.js';

export const SIGNAL_TYPES_DATA_PATH = fileURLToPath(new URL('../data/signal-types.json', import.meta.url));

const SignalTypeDefinitionSchema = z.object({
  signalType: z.enum(SIGNAL_TYPES),
  signalName: z.string().min(1),
  unit: z.string().min(1),
  sampleRateHz: z.number().positive().nullable(),
  normalRangeMin: z.number().nullable(),
  normalRangeMax: z.number().nullable(),
  description: z.string(),
});

const SignalTypeListSchema = z.array(SignalTypeDefinitionSchema).superRefine((definitions, ctx) => {
  const seen = new Set<string>();
  for (const definition of definitions) {
    if (seen.has(definition.signalType)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate signal type ${definition.signalType}` });
    }
    seen.add(definition.signalType);
  }
});

export function parseSignalTypeDefinitions(raw: unknown): SignalTypeDefinition[] {
  const result = SignalTypeListSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid signal type definitions: ${result.error.issues.map((i) => i.message).join('; ')}`);
  }
  return result.data;
}

export function loadSignalTypeDefinitions(path: string = SIGNAL_TYPES_DATA_PATH): SignalTypeDefinition[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseSignalTypeDefinitions(raw);
}

/**
 * Upsert every definition (idempotent, keyed by signal_type)
 */
export async function seedSignalTypes(
  store: AnalyticsStore,
  definitions: readonly SignalTypeDefinition[] = loadSignalTypeDefinitions()
): Promise<number> {
  await store.upsertSignalTypes(definitions);
  return definitions.length;
}
