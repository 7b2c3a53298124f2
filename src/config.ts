/**
 * Client configuration defaults and validation
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ValidationError } from './errors';
import { defaultLogger, Logger } from './utils/logger';
import { RubixClientConfig } from './types';

export const DEFAULT_NODE_URL = 'http://localhost:20000';
export const DEFAULT_TIMEOUT_SECONDS = 300;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 500;
export const DEFAULT_QUORUM_TYPE = 2;
export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.rubix');

const clientConfigSchema = z.object({
  nodeUrl: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//.test(value), 'nodeUrl must use http or https')
    .default(DEFAULT_NODE_URL),
  timeout: z.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
  apiKey: z.string().min(1).optional(),
  maxRetries: z.number().int().min(0).default(DEFAULT_MAX_RETRIES),
  retryDelay: z.number().int().min(0).default(DEFAULT_RETRY_DELAY_MS),
});

export interface ResolvedClientConfig {
  nodeUrl: string;
  timeout: number;
  apiKey?: string;
  maxRetries: number;
  retryDelay: number;
  logger: Logger;
}

/**
 * Apply defaults to a client configuration and reject unusable values.
 * The trailing slash of `nodeUrl` is dropped so endpoint paths join cleanly.
 */
export function resolveClientConfig(config: RubixClientConfig = {}): ResolvedClientConfig {
  const { logger, ...options } = config;
  const parsed = clientConfigSchema.safeParse(options);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid client configuration: ${issue.path.join('.')} ${issue.message}`, {
      issues: parsed.error.issues,
    });
  }

  return {
    ...parsed.data,
    nodeUrl: parsed.data.nodeUrl.replace(/\/+$/, ''),
    logger: logger ?? defaultLogger,
  };
}
