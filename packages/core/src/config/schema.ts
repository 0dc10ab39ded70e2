// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { SweepConfig } from '../types/config.js';
import {
  ARTIFACT_FILENAME,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_SEC,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const advisoryConfigSchema = z.object({
  model: z.string().min(1).default(DEFAULT_MODEL),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  timeoutSec: z.number().positive().default(DEFAULT_TIMEOUT_SEC),
  maxTokens: z.number().int().positive().optional(),
});

const scanConfigSchema = z.object({
  exclude: z.array(z.string().min(1)).default([]),
});

export const sweepConfigSchema = z.object({
  configVersion: z.number().int().positive().optional(),
  directory: z.string().min(1),
  suppressionFile: z.string().min(1),
  artifactName: z
    .string()
    .min(1)
    .default(ARTIFACT_FILENAME)
    .refine((name) => !/[\\/]/.test(name) && name !== '.' && name !== '..', {
      message: 'artifactName must be a plain file name',
    }),
  scan: scanConfigSchema.default({}),
  advisory: advisoryConfigSchema.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type SweepConfigInput = z.input<typeof sweepConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): SweepConfig {
  const result = sweepConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}
