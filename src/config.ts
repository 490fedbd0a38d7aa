import { z } from 'zod';

export type OutputFormat = 'jsonl' | 'summary';

export interface OutlineConfig {
  ignoreDirs: string[];
  verbose: boolean;
  output: OutputFormat;
}

const flag = z
  .enum(['1', '0', 'true', 'false'])
  .optional()
  .transform(value => value === '1' || value === 'true');

const envSchema = z.object({
  CODE_OUTLINE_IGNORE_DIRS: z
    .string()
    .optional()
    .transform(value => (value ?? '').split(',').map(name => name.trim()).filter(name => name !== '')),
  CODE_OUTLINE_VERBOSE: flag,
  CODE_OUTLINE_OUTPUT: z.enum(['jsonl', 'summary']).default('summary'),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): OutlineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${details}`);
  }
  return {
    ignoreDirs: parsed.data.CODE_OUTLINE_IGNORE_DIRS,
    verbose: parsed.data.CODE_OUTLINE_VERBOSE,
    output: parsed.data.CODE_OUTLINE_OUTPUT,
  };
}
