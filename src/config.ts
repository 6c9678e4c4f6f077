import dotenv from 'dotenv';
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ValidatorConfig {
  /** Default translation directories, used when the command line names none */
  translationDirs: string[];
  verbose: boolean;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

const envSchema = z.object({
  I18N_TRANSLATION_DIRS: z.string().optional().default('').transform(splitList),
  I18N_VALIDATOR_VERBOSE: z.enum(['true', 'false']).optional().default('false').transform(val => val === 'true'),
});

/**
 * Loads variables from a .env file into process.env; variables already set win.
 * A missing file is not an error.
 */
export function loadDotenv(path?: string): void {
  dotenv.config(path ? { path } : {});
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ValidatorConfig {
  const processEnv = envSchema.safeParse(env);

  if (!processEnv.success) {
    const details = processEnv.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment variables: ${details}`);
  }

  return {
    translationDirs: processEnv.data.I18N_TRANSLATION_DIRS,
    verbose: processEnv.data.I18N_VALIDATOR_VERBOSE,
  };
}
