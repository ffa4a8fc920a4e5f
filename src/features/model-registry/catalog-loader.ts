// src/features/model-registry/catalog-loader.ts

/**
 * Model Catalog Loader
 *
 * Reads extra model definitions from a YAML file:
 *
 *   models:
 *     - provider: openai-compatible
 *       modelId: qwen2.5-coder
 *       baseUrl: http://localhost:11434
 *       contextWindow: 32768
 *       pricing: { inputPricePerMillion: 0, outputPricePerMillion: 0 }
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ModelSpec } from './types.js';

const pricingSchema = z.object({
  inputPricePerMillion: z.number().min(0),
  outputPricePerMillion: z.number().min(0),
  cachedInputPricePerMillion: z.number().min(0).optional()
});

const baseFields = {
  modelId: z.string().min(1),
  displayName: z.string().min(1).optional(),
  contextWindow: z.number().int().positive(),
  maxOutputTokens: z.number().int().positive().optional(),
  supportsTools: z.boolean().default(true),
  supportsSystemRole: z.boolean().default(true),
  charsPerToken: z.number().positive().optional(),
  pricing: pricingSchema
};

const modelEntrySchema = z.discriminatedUnion('provider', [
  z.object({ ...baseFields, provider: z.literal('openai'), reasoning: z.boolean().default(false) }),
  z.object({ ...baseFields, provider: z.literal('anthropic'), maxOutputTokens: z.number().int().positive() }),
  z.object({ ...baseFields, provider: z.literal('google'), temperature: z.number().min(0).max(2).default(0.7) }),
  z.object({
    ...baseFields,
    provider: z.literal('openai-compatible'),
    baseUrl: z.string().url(),
    apiKeyEnv: z.string().min(1).optional()
  })
]);

const catalogSchema = z.object({
  models: z.array(modelEntrySchema).default([])
});

type ModelEntry = z.infer<typeof modelEntrySchema>;

function toModelSpec(entry: ModelEntry): ModelSpec {
  const displayName = entry.displayName ?? entry.modelId;

  switch (entry.provider) {
    case 'openai':
      return { ...entry, displayName };
    case 'anthropic':
      return { ...entry, displayName };
    case 'google':
      return { ...entry, displayName };
    case 'openai-compatible':
      return { ...entry, displayName, baseUrl: entry.baseUrl.replace(/\/+$/, '') };
  }
}

export function parseModelCatalog(content: string, source: string = 'catalog'): ModelSpec[] {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse model catalog ${source}`, error);
  }

  const parsed = catalogSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid model catalog ${source}: ${details}`, parsed.error);
  }

  return parsed.data.models.map(toModelSpec);
}

export function loadModelCatalog(filePath: string): ModelSpec[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Model catalog not found: ${filePath}`);
  }

  const specs = parseModelCatalog(fs.readFileSync(filePath, 'utf-8'), filePath);
  logger.debug({ filePath, models: specs.length }, 'Loaded model catalog');
  return specs;
}
