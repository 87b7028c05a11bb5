/*!
 * Copyright (c) Shehan Edirimannage, 2025
 *
 * This file is part of the SecHeto-FL project.
 * 
 * Licensed for evaluation and personal testing purposes only.
 * Redistribution, modification, or commercial use of this file,
 * in whole or in part, is strictly prohibited without explicit 
 * written permission from the copyright holder.
 *
 * For license inquiries, contact developers.
 */

import { z } from 'zod';
import {
  CONNECTION_RETRY_DELAY,
  DEFAULT_COORDINATOR_PORT,
  DEFAULT_MASK_BITS,
  MAX_CONNECTION_RETRIES,
  MAX_TREE_DEPTH,
  MIN_GAIN_THRESHOLD,
  MIN_INSTANCES_PER_LEAF,
  MIN_MASK_BITS,
  REQUEST_TIMEOUT,
} from './constants';
import { DataFormatError } from './errors';
import type { RetryPolicy } from './protocol/transport';

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

// ─── Process environment ─────────────────────────────────────────────────────

const EnvironmentSchema = z.object({
  COORDINATOR_PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_COORDINATOR_PORT),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(REQUEST_TIMEOUT),
  CONNECT_RETRIES: z.coerce.number().int().positive().default(MAX_CONNECTION_RETRIES),
  CONNECT_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(CONNECTION_RETRY_DELAY),
  MASK_BITS: z.coerce.number().int().min(MIN_MASK_BITS).multipleOf(8).default(DEFAULT_MASK_BITS),
});

export interface NodeEnvironment {
  coordinatorPort: number;
  requestTimeoutMs: number;
  retry: RetryPolicy;
  maskBits: number;
}

/** Reads node settings from the environment; call `dotenv.config()` first to pick up a .env file. */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): NodeEnvironment {
  const result = EnvironmentSchema.safeParse(env);
  if (!result.success) {
    throw new DataFormatError(`Invalid environment: ${describeIssues(result.error)}`);
  }
  const vars = result.data;
  return {
    coordinatorPort: vars.COORDINATOR_PORT,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    retry: { attempts: vars.CONNECT_RETRIES, delayMs: vars.CONNECT_RETRY_DELAY_MS },
    maskBits: vars.MASK_BITS,
  };
}

// ─── Run configuration (travels in the Initiation message) ───────────────────

const RunConfigurationSchema = z.object({
  maxDepth: z.coerce.number().int().nonnegative().default(MAX_TREE_DEPTH),
  minInstances: z.coerce.number().int().nonnegative().default(MIN_INSTANCES_PER_LEAF),
  minGainThreshold: z.coerce.number().nonnegative().default(MIN_GAIN_THRESHOLD),
  classIndex: z.coerce.number().int().nonnegative().optional(),
  allowTwoPartySum: z
    .enum(['true', 'false'])
    .default('false')
    .transform(value => value === 'true'),
  maskBits: z.coerce.number().int().min(MIN_MASK_BITS).multipleOf(8).default(DEFAULT_MASK_BITS),
});

export type RunConfiguration = z.infer<typeof RunConfigurationSchema>;

const RUN_CONFIGURATION_KEYS = new Set(Object.keys(RunConfigurationSchema.shape));

export function parseRunConfiguration(configuration: Readonly<Record<string, string>>): RunConfiguration {
  for (const key of Object.keys(configuration)) {
    if (!RUN_CONFIGURATION_KEYS.has(key)) {
      console.warn(`Ignoring unrecognized configuration key "${key}"`);
    }
  }
  const result = RunConfigurationSchema.safeParse(configuration);
  if (!result.success) {
    throw new DataFormatError(`Invalid run configuration: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function formatRunConfiguration(configuration: Partial<RunConfiguration>): Record<string, string> {
  const formatted: Record<string, string> = {};
  for (const [key, value] of Object.entries(configuration)) {
    if (value !== undefined) {
      formatted[key] = String(value);
    }
  }
  return formatted;
}
