import { resolve } from 'node:path';
import { z } from 'zod';
import { PreconditionError } from './errors.js';
import { createConsoleLogger, type Logger } from './log.js';
import { DEFAULT_TEXT_ENCODING, isKnownEncoding } from './text.js';

export const DEFAULT_PROJECT_EXTENSION = '.usproj';

/**
 * Settings every file-facing entry point takes explicitly. There is no
 * module-level instance; build one with `loadConfig` or `defineConfig`.
 */
export interface CoreConfig {
  /** Directory persisted projects are written to when no dir is given. */
  outputDir: string;
  /** Suffix of persisted project files, dot included. */
  extension: string;
  /** Text encoding of UST, OTO and character/readme files. */
  encoding: string;
  logger: Logger;
}

const EnvSchema = z.object({
  OUTPUT_DIR: z.string().min(1).optional(),
  PROJECT_EXTENSION: z
    .string()
    .regex(/^\.[^./\\]+$/, 'must look like ".ext"')
    .optional(),
  TEXT_ENCODING: z
    .string()
    .refine(isKnownEncoding, 'unknown text encoding')
    .optional(),
});

export function defineConfig(overrides: Partial<CoreConfig> = {}): CoreConfig {
  return {
    outputDir: resolve(overrides.outputDir ?? 'output'),
    extension: overrides.extension ?? DEFAULT_PROJECT_EXTENSION,
    encoding: overrides.encoding ?? DEFAULT_TEXT_ENCODING,
    logger: overrides.logger ?? createConsoleLogger('core'),
  };
}

/** Build a config from environment variables (`process.env` by default). */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  logger?: Logger,
): CoreConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new PreconditionError(`Invalid environment configuration: ${issues}`);
  }
  return defineConfig({
    outputDir: parsed.data.OUTPUT_DIR,
    extension: parsed.data.PROJECT_EXTENSION,
    encoding: parsed.data.TEXT_ENCODING,
    logger,
  });
}
