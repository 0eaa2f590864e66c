/**
 * Configuration loading from environment variables
 *
 * Provides the typed connection settings for the address-set API.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_ENTRY_DESCRIPTION = 'Added by addrset';

/**
 * Environment configuration schema
 */
export const addressSetEnvSchema = z.object({
  ADDRSET_API_URL: z
    .string({ required_error: 'ADDRSET_API_URL is required' })
    .url('ADDRSET_API_URL must be a URL'),
  // Empty string means "no key", the same as unset
  ADDRSET_API_KEY: z
    .string()
    .optional()
    .transform((val) => (val ? val : undefined)),
  ADDRSET_TIMEOUT_MS: z.coerce
    .number()
    .int('ADDRSET_TIMEOUT_MS must be an integer')
    .positive('ADDRSET_TIMEOUT_MS must be positive')
    .default(DEFAULT_TIMEOUT_MS),
  ADDRSET_ENTRY_DESCRIPTION: z.string().min(1).default(DEFAULT_ENTRY_DESCRIPTION),
});

export type AddressSetEnv = z.infer<typeof addressSetEnvSchema>;

export interface AddressSetApiConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  entryDescription: string;
}

/**
 * Load address-set API configuration
 *
 * @throws ConfigurationError naming the first offending variable
 */
export function getAddressSetApiConfig(env: NodeJS.ProcessEnv = process.env): AddressSetApiConfig {
  const parsed = addressSetEnvSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const configKey = issue ? String(issue.path[0]) : undefined;
    throw new ConfigurationError(issue ? issue.message : 'Invalid configuration', configKey);
  }

  return {
    baseUrl: parsed.data.ADDRSET_API_URL,
    apiKey: parsed.data.ADDRSET_API_KEY,
    timeoutMs: parsed.data.ADDRSET_TIMEOUT_MS,
    entryDescription: parsed.data.ADDRSET_ENTRY_DESCRIPTION,
  };
}
