/**
 * Environment configuration.
 *
 * Values here act as defaults for the CLI options; a flag given on the
 * command line always wins. Blank variables count as unset.
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import { EMPTY_PAGE_POLICIES, type EmptyPagePolicy } from '../utils/constants.js';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z.object({
  /** Default for --output */
  PDF_PAGE_MD_OUTPUT: z.preprocess(blankToUndefined, z.string().optional()),

  /** Body written for a page without text */
  PDF_PAGE_MD_EMPTY_PAGE: z.preprocess(
    blankToUndefined,
    z.enum(EMPTY_PAGE_POLICIES).default('empty')
  ),

  PDF_PAGE_MD_VERBOSE: z.preprocess(
    (value) => (typeof value === 'string' ? blankToUndefined(value.toLowerCase()) : value),
    z
      .enum(['true', 'false', '1', '0'])
      .optional()
      .transform((value) => value === 'true' || value === '1')
  ),
});

export interface AppConfig {
  output: string | undefined;
  emptyPage: EmptyPagePolicy;
  verbose: boolean;
}

/**
 * Validate the environment and map it onto the CLI defaults.
 *
 * @throws ConfigError naming each invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${problems}`);
  }

  return {
    output: result.data.PDF_PAGE_MD_OUTPUT,
    emptyPage: result.data.PDF_PAGE_MD_EMPTY_PAGE,
    verbose: result.data.PDF_PAGE_MD_VERBOSE,
  };
}

export function isEmptyPagePolicy(value: unknown): value is EmptyPagePolicy {
  return EMPTY_PAGE_POLICIES.some((policy) => policy === value);
}
