/**
 * Process configuration
 *
 * Read once from the environment at startup (dotenv fills it from `.env`),
 * validated with zod, then passed explicitly to the server and every tool.
 */

import { z } from 'zod';
import { DEFAULTS } from './constants.js';
import { ConfigurationError, toError } from './errors.js';
import { normalizeHost } from './host.js';

export interface Configuration {
  /** Normalized base URL, `scheme://host[:port]` */
  host: string;
  apiKey: string;
  /** Default project for project-scoped tools */
  projectId?: string;
  requestTimeoutMs: number;
  /** Pause between files during folder upload */
  uploadDelayMs: number;
  /** Runtime sent by create_job when the caller names none */
  defaultRuntimeIdentifier?: string;
}

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

const requiredString = (name: string) =>
  z.string({ required_error: `${name} environment variable is required` })
    .trim()
    .min(1, `${name} environment variable is required`);

const envSchema = z.object({
  HOST: requiredString('HOST'),
  API_KEY: requiredString('API_KEY'),
  PROJECT_ID: optionalString,
  REQUEST_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(DEFAULTS.REQUEST_TIMEOUT_MS)
  ),
  UPLOAD_DELAY_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().nonnegative().default(DEFAULTS.UPLOAD_DELAY_MS)
  ),
  DEFAULT_RUNTIME_IDENTIFIER: optionalString,
});

export type EnvironmentSource = Record<string, string | undefined>;

/**
 * Build the configuration from environment variables.
 *
 * @throws ConfigurationError listing every invalid or missing variable
 */
export function loadConfig(env: EnvironmentSource = process.env): Configuration {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue =>
      issue.message.includes('environment variable')
        ? issue.message
        : `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, {
      issues: parsed.error.issues,
    });
  }

  const values = parsed.data;

  return {
    host: normalizeHost(values.HOST),
    apiKey: values.API_KEY,
    projectId: values.PROJECT_ID,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    uploadDelayMs: values.UPLOAD_DELAY_MS,
    defaultRuntimeIdentifier: values.DEFAULT_RUNTIME_IDENTIFIER,
  };
}

/**
 * Startup variant of `loadConfig`: the problem goes straight to stderr,
 * independent of LOG_LEVEL, and the caller gets undefined.
 */
export function loadConfigOrReport(
  env: EnvironmentSource = process.env,
  report: (message: string) => void = message => console.error(message)
): Configuration | undefined {
  try {
    return loadConfig(env);
  } catch (error) {
    report(toError(error).message);
    return undefined;
  }
}
