/**
 * Authority Configuration
 *
 * Programmatic options merge over defaults; `getConfigFromEnv` reads the
 * same settings from environment variables:
 * - AUTHORITY_CACHE_POLICY: "invalidate" | "lock" | "retain" (default: "invalidate")
 * - AUTHORITY_VERBOSE: "true" / "1" to attach evaluation details (default: false)
 */

import { z } from 'zod';
import { parseBool, validateConfig, type EnvMap } from '@warden/shared';
import { InvalidConfigError } from './errors';
import { constructorNameResolver } from './resource';
import type { ResourceTypeResolver } from './types';

/**
 * What a rule addition does to relevance cache entries filled earlier
 */
export const CACHE_POLICIES = ['invalidate', 'lock', 'retain'] as const;

export type CachePolicy = (typeof CACHE_POLICIES)[number];

const authoritySettingsSchema = z
  .object({
    cachePolicy: z.enum(CACHE_POLICIES),
    verbose: z.boolean(),
  })
  .strict();

/**
 * Settings that can come from the environment
 */
export type AuthoritySettings = z.infer<typeof authoritySettingsSchema>;

export interface AuthorityConfig<TValue = unknown> extends AuthoritySettings {
  /** Resolves resource values to type names */
  resolver: ResourceTypeResolver<TValue>;
}

export const DEFAULT_AUTHORITY_SETTINGS: AuthoritySettings = {
  cachePolicy: 'invalidate',
  verbose: false,
};

function parseSettings(raw: Record<string, unknown>): AuthoritySettings {
  const result = validateConfig(authoritySettingsSchema, raw);
  if (!result.success) {
    throw new InvalidConfigError(result.errors);
  }
  return result.data;
}

/**
 * Merge partial options over the defaults and validate them
 *
 * @throws InvalidConfigError for an unknown cache policy or a non-boolean verbose flag
 */
export function resolveAuthorityConfig<TValue>(
  config: Partial<AuthorityConfig<TValue>> = {}
): AuthorityConfig<TValue> {
  const settings = parseSettings({
    cachePolicy: config.cachePolicy ?? DEFAULT_AUTHORITY_SETTINGS.cachePolicy,
    verbose: config.verbose ?? DEFAULT_AUTHORITY_SETTINGS.verbose,
  });

  return {
    ...settings,
    resolver: config.resolver ?? constructorNameResolver,
  };
}

/**
 * Read settings from environment variables
 *
 * @throws InvalidConfigError when AUTHORITY_CACHE_POLICY names an unknown policy
 */
export function getConfigFromEnv(env: EnvMap): AuthoritySettings {
  return parseSettings({
    cachePolicy: env.AUTHORITY_CACHE_POLICY || DEFAULT_AUTHORITY_SETTINGS.cachePolicy,
    verbose: parseBool(env.AUTHORITY_VERBOSE, DEFAULT_AUTHORITY_SETTINGS.verbose),
  });
}
