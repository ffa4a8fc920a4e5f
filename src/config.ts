// src/config.ts

import { z } from 'zod';
import { ConfigurationError } from './utils/errors.js';
import { DEFAULT_RETRY } from './utils/retry.js';
import { DEFAULT_PROXY_URL, DEFAULT_REQUEST_TIMEOUT_MS } from './services/provider-client.js';

export const COMPACTION_STRATEGIES = ['summarize', 'truncate'] as const;

export type CompactionStrategyName = (typeof COMPACTION_STRATEGIES)[number];

const ENV_BOOLEAN_TRUE_VALUES = new Set(['1', 'on', 'true', 'yes']);
const ENV_BOOLEAN_FALSE_VALUES = new Set(['', '0', 'false', 'no', 'off']);

function envBoolean(defaultValue: boolean): z.ZodType<boolean, z.ZodTypeDef, string | undefined> {
  return z.string().optional().transform((rawValue, context) => {
    if (rawValue === undefined) {
      return defaultValue;
    }

    const normalized = rawValue.trim().toLowerCase();
    if (ENV_BOOLEAN_TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (ENV_BOOLEAN_FALSE_VALUES.has(normalized)) {
      return false;
    }

    context.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid boolean value "${rawValue}". Expected one of: true, false, 1, 0, yes, no, on, off.`
    });
    return z.NEVER;
  });
}

export const envSchema = z.object({
  AUTOLOOP_PROXY_URL: z.string().url().default(DEFAULT_PROXY_URL),
  AUTOLOOP_API_KEY: z.string().min(1).optional(),
  AUTOLOOP_DEFAULT_MODEL: z.string().min(1).default('anthropic/claude-sonnet-4-5'),
  AUTOLOOP_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  AUTOLOOP_RETRY_MAX: z.coerce.number().int().min(0).max(10).default(DEFAULT_RETRY.maxRetries),
  AUTOLOOP_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY.baseDelayMs),
  AUTOLOOP_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY.maxDelayMs),
  AUTOLOOP_COMPACTION_THRESHOLD: z.coerce.number().gt(0).lte(1).default(0.85),
  AUTOLOOP_COMPACTION_STRATEGY: z.enum(COMPACTION_STRATEGIES).default('summarize'),
  AUTOLOOP_COMPACTION_PRESERVE_RECENT: z.coerce.number().int().min(1).default(6),
  AUTOLOOP_BUDGET_ALERT_THRESHOLD: z.coerce.number().gt(0).lte(1).default(0.8),
  AUTOLOOP_STATE_FILE: z.string().min(1).default('.autoloop/loop-state.json'),
  AUTOLOOP_RESULT_CACHE_SIZE: z.coerce.number().int().positive().default(20),
  AUTOLOOP_AUTONOMOUS: envBoolean(false),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export interface AutoloopConfig {
  proxyUrl: string;
  apiKey?: string;
  defaultModel: string;
  requestTimeoutMs: number;
  retry: {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  compaction: {
    threshold: number;
    strategy: CompactionStrategyName;
    preserveRecent: number;
  };
  budget: {
    alertThreshold: number;
  };
  stateFilePath: string;
  resultCacheSize: number;
  autonomous: boolean;
  logLevel: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AutoloopConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${details}`, parsed.error);
  }

  const values = parsed.data;

  return {
    proxyUrl: values.AUTOLOOP_PROXY_URL.replace(/\/+$/, ''),
    apiKey: values.AUTOLOOP_API_KEY,
    defaultModel: values.AUTOLOOP_DEFAULT_MODEL,
    requestTimeoutMs: values.AUTOLOOP_REQUEST_TIMEOUT_MS,
    retry: {
      maxRetries: values.AUTOLOOP_RETRY_MAX,
      baseDelayMs: values.AUTOLOOP_RETRY_BASE_DELAY_MS,
      maxDelayMs: values.AUTOLOOP_RETRY_MAX_DELAY_MS
    },
    compaction: {
      threshold: values.AUTOLOOP_COMPACTION_THRESHOLD,
      strategy: values.AUTOLOOP_COMPACTION_STRATEGY,
      preserveRecent: values.AUTOLOOP_COMPACTION_PRESERVE_RECENT
    },
    budget: {
      alertThreshold: values.AUTOLOOP_BUDGET_ALERT_THRESHOLD
    },
    stateFilePath: values.AUTOLOOP_STATE_FILE,
    resultCacheSize: values.AUTOLOOP_RESULT_CACHE_SIZE,
    autonomous: values.AUTOLOOP_AUTONOMOUS,
    logLevel: values.LOG_LEVEL
  };
}

