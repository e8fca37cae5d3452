import { StorageError } from '@docket/core';
import { z } from 'zod';

/**
 * Connection settings of the MongoDB store driver
 */
export const MongoStorageConfigSchema = z.object({
  /** Connection string */
  uri: z
    .string()
    .min(1)
    .refine((uri) => uri.startsWith('mongodb://') || uri.startsWith('mongodb+srv://'), {
      message: 'must start with mongodb:// or mongodb+srv://',
    }),
  /** Database name; defaults to the name the Database was created with */
  database: z.string().min(1).optional(),
  /** Reported to the server in connection metadata */
  appName: z.string().min(1).optional(),
  maxPoolSize: z.number().int().positive().default(10),
  /** Server selection and connect timeout */
  timeoutMs: z.number().int().positive().default(10_000),
  /** Treat 24-character hex string identities as ObjectIds */
  objectIdStrings: z.boolean().default(true),
});

/** Settings as accepted by the driver */
export type MongoStorageConfig = z.input<typeof MongoStorageConfigSchema>;

/** Settings with defaults applied */
export type ResolvedMongoStorageConfig = z.output<typeof MongoStorageConfigSchema>;

const MongoEnvSchema = z.object({
  DOCKET_MONGODB_URI: z.string().optional(),
  DOCKET_MONGODB_DATABASE: z.string().optional(),
  DOCKET_MONGODB_APP_NAME: z.string().optional(),
  DOCKET_MONGODB_MAX_POOL_SIZE: z.coerce.number().optional(),
  DOCKET_MONGODB_TIMEOUT_MS: z.coerce.number().optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate settings and apply defaults
 *
 * @throws StorageError `DOCKET_S302` listing every invalid setting
 */
export function parseMongoConfig(input: unknown): ResolvedMongoStorageConfig {
  const result = MongoStorageConfigSchema.safeParse(input);
  if (!result.success) {
    throw new StorageError(
      'DOCKET_S302',
      `Invalid MongoDB configuration: ${describeIssues(result.error)}`,
      { issues: result.error.issues.map((issue) => issue.path.join('.')) }
    );
  }
  return result.data;
}

/**
 * Read settings from `DOCKET_MONGODB_*` environment variables.
 *
 * @example
 * ```typescript
 * // DOCKET_MONGODB_URI=mongodb://localhost:27017 DOCKET_MONGODB_DATABASE=app
 * const storage = createMongoStorage(loadMongoConfigFromEnv());
 * ```
 */
export function loadMongoConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): ResolvedMongoStorageConfig {
  const parsed = MongoEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new StorageError(
      'DOCKET_S302',
      `Invalid MongoDB environment: ${describeIssues(parsed.error)}`
    );
  }

  const vars = parsed.data;
  return parseMongoConfig({
    uri: vars.DOCKET_MONGODB_URI,
    ...(vars.DOCKET_MONGODB_DATABASE ? { database: vars.DOCKET_MONGODB_DATABASE } : {}),
    ...(vars.DOCKET_MONGODB_APP_NAME ? { appName: vars.DOCKET_MONGODB_APP_NAME } : {}),
    ...(vars.DOCKET_MONGODB_MAX_POOL_SIZE !== undefined
      ? { maxPoolSize: vars.DOCKET_MONGODB_MAX_POOL_SIZE }
      : {}),
    ...(vars.DOCKET_MONGODB_TIMEOUT_MS !== undefined
      ? { timeoutMs: vars.DOCKET_MONGODB_TIMEOUT_MS }
      : {}),
  });
}
