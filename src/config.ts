import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Env } from './types/env';
import type { Association } from './types/association';
import { AssociationListSchema } from './types/association';
import { ConfigurationError } from './utils/errors';

const EnvSchema = z.object({
  HANDLE_SERVICE_URL: z.string().url(),
  HANDLE_PREFIX: z.string().min(1),
  HANDLE_SERVICE_USER: z.string().min(1),
  HANDLE_SERVICE_PASSWORD: z.string().min(1),
  HANDLE_TARGET_BASE_URL: z.string().url(),
  HANDLE_ASSOCIATIONS_FILE: z.string().min(1).default('./associations.json'),
  HANDLE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  HANDLE_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
});

/**
 * Validated configuration
 */
export interface HandleConfig {
  serviceUrl: string;
  prefix: string;
  username: string;
  password: string;
  targetBaseUrl: string;
  associationsFile: string;
  timeoutMs: number;
  maxRetries: number;
}

function describeIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Validate and parse environment configuration
 * Throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: Env = process.env): HandleConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const errors = describeIssues(parsed.error);
    throw new ConfigurationError(
      `Invalid environment: ${errors.map((e) => e.path).join(', ')}`,
      { errors }
    );
  }

  const vars = parsed.data;
  return {
    serviceUrl: vars.HANDLE_SERVICE_URL,
    prefix: vars.HANDLE_PREFIX,
    username: vars.HANDLE_SERVICE_USER,
    password: vars.HANDLE_SERVICE_PASSWORD,
    targetBaseUrl: vars.HANDLE_TARGET_BASE_URL,
    associationsFile: vars.HANDLE_ASSOCIATIONS_FILE,
    timeoutMs: vars.HANDLE_REQUEST_TIMEOUT_MS,
    maxRetries: vars.HANDLE_MAX_RETRIES,
  };
}

/**
 * Load associations from a JSON array
 *
 * @example
 * // associations.json
 * [{ "contentModel": "islandora:sp_large_image_cmodel", "datastreamId": "MODS", "transform": "mods" }]
 */
export async function readAssociationsFile(path: string): Promise<Association[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read associations file ${path}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Associations file ${path} is not valid JSON`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = AssociationListSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid associations in ${path}`, {
      errors: describeIssues(parsed.error),
    });
  }
  return parsed.data;
}
