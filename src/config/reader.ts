/**
 * Application config file reader with Zod validation.
 *
 * Missing file = all defaults. Invalid input = error listing each
 * offending field.
 *
 * @module config/reader
 */

import { readFile } from 'node:fs/promises';
import { AppConfigSchema, DEFAULT_APP_CONFIG } from './schema.js';
import type { AppConfig } from './types.js';

export class AppConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'AppConfigError';
  }
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string[] {
  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Read and validate the config file.
 *
 * @throws {AppConfigError} On invalid JSON or validation failure
 */
export async function readAppConfig(configPath: string): Promise<AppConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_APP_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new AppConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = validateAppConfig(raw);

  if (!result.valid) {
    throw new AppConfigError(
      `Config validation failed (${configPath}): ${result.errors.join('; ')}`,
      result.fields[0],
    );
  }

  return result.config;
}

/**
 * Validate raw input against the config schema (no I/O).
 *
 * `errors` are `field: message` lines; `fields` holds the matching dotted
 * paths in the same order.
 */
export function validateAppConfig(
  raw: unknown,
): { valid: true; config: AppConfig } | { valid: false; errors: string[]; fields: string[] } {
  const result = AppConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  return {
    valid: false,
    errors: formatIssues(result.error.issues),
    fields: result.error.issues.map((issue) => issue.path.join('.')),
  };
}
