/**
 * Runtime configuration, read from environment variables.
 *
 *   SABLE_MAX_DEPTH  maximum nesting of evaluations before a
 *                    RecursionLimitError (default 1000)
 *   SABLE_PROMPT     REPL prompt (default "sable> ")
 */

import { z } from 'zod';
import { ConfigError } from './errors';

const ConfigSchema = z.object({
  SABLE_MAX_DEPTH: z.coerce.number().int().positive().default(1000),
  SABLE_PROMPT: z.string().min(1).default('sable> '),
});

export interface SableConfig {
  maxDepth: number;
  prompt: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SableConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(issues);
  }
  return {
    maxDepth: result.data.SABLE_MAX_DEPTH,
    prompt: result.data.SABLE_PROMPT,
  };
}
