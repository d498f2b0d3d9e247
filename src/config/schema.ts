/**
 * Zod schema for application configuration.
 *
 * Every field has a `.default()` so that `AppConfigSchema.parse({})`
 * returns a complete config.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';
import type { AppConfig } from './types.js';

export const AuthConfigSchema = z.object({
  login_url: z.string().url().optional(),
  open_browser: z.boolean().default(true),
});

export const AppConfigSchema = z.object({
  log_level: z.enum(LOG_LEVELS).default('info'),

  openvpn_binary: z.string().min(1).default('openvpn'),

  /** Tried in order; the first free one is bound. */
  acs_ports: z.array(z.number().int().min(1).max(65535)).min(1).default([35001]),

  connect_timeout_seconds: z.number().int().min(0).default(0),

  teardown_grace_ms: z.number().int().min(0).max(60000).default(5000),

  auth: AuthConfigSchema.default({}),
});

export type InferredAppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_APP_CONFIG: AppConfig = AppConfigSchema.parse({});
