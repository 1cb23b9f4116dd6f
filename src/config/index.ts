import { z } from 'zod';
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 */
function interpolateEnvVars(value: string): string {
  return value.replace(
    /\$\{([^}:]+)(?::-([^}]*))?\}/g,
    (_, varName: string, defaultValue: string | undefined) => {
      const envValue = process.env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      return defaultValue ?? '';
    }
  );
}

/**
 * Recursively interpolate environment variables in string values
 */
function processEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(processEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = processEnvVars(value);
    }
    return result;
  }
  return obj;
}

// YAML values may arrive as strings after interpolation
const port = z.coerce.number().int().min(1).max(65535);
const positiveInt = z.coerce.number().int().positive();
const flag = z.union([z.boolean(), z.enum(['true', 'false']).transform((v) => v === 'true')]);

const ConfigSchema = z.object({
  server: z
    .object({
      listen_port: port.default(8080),
      host: z.string().default('0.0.0.0'),
      body_limit: positiveInt.default(1048576),
      // Browser origin allowed to call the API; unset disables CORS
      cors_origin: z
        .string()
        .url()
        .refine((v) => /^https?:\/\//.test(v), 'cors_origin must be an http(s) URL')
        .optional(),
      rate_limit: z
        .object({
          max: positiveInt.default(100),
          window_ms: z.coerce.number().int().min(1000).default(60000),
        })
        .default({}),
    })
    .default({}),
  storage: z
    .object({
      path: z.string().min(1).default('./data/tenant-validator.db'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      format: z.enum(['json', 'pretty']).default('json'),
    })
    .default({}),
  validation: z
    .object({
      // Operator-level kill switch, independent of the stored tenant settings
      enabled: flag.default(false),
      cache_max_entries: positiveInt.default(5000),
      cleanup_interval_ms: positiveInt.default(600000),
    })
    .default({}),
  conflict: z
    .object({
      max_increment_attempts: positiveInt.default(10),
      random_suffix_length: positiveInt.default(4),
    })
    .default({}),
  secrets: z
    .object({
      encryption_key: z.string().min(1).optional(),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}

export function loadConfig(configPath: string): Config {
  try {
    const content = readFileSync(configPath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    return parseConfig(processEnvVars(parsed ?? {}));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      // Config file doesn't exist, use defaults
      return ConfigSchema.parse({});
    }
    throw error;
  }
}

/**
 * Environment overrides. Only variables that are set take effect.
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const overrides = {
    server: {
      ...config.server,
      ...(env.PORT !== undefined && { listen_port: env.PORT }),
      ...(env.HOST !== undefined && { host: env.HOST }),
      ...(env.CORS_ORIGIN !== undefined && { cors_origin: env.CORS_ORIGIN }),
      rate_limit: {
        ...config.server.rate_limit,
        ...(env.RATE_LIMIT_MAX !== undefined && { max: env.RATE_LIMIT_MAX }),
        ...(env.RATE_LIMIT_WINDOW !== undefined && { window_ms: env.RATE_LIMIT_WINDOW }),
      },
    },
    storage: {
      ...config.storage,
      ...(env.DATABASE_PATH !== undefined && { path: env.DATABASE_PATH }),
    },
    logging: {
      ...config.logging,
      ...(env.LOG_LEVEL !== undefined && { level: env.LOG_LEVEL }),
      ...(env.LOG_FORMAT !== undefined && { format: env.LOG_FORMAT }),
    },
    validation: {
      ...config.validation,
      ...(env.TENANT_VALIDATION_ENABLED !== undefined && {
        enabled: env.TENANT_VALIDATION_ENABLED,
      }),
      ...(env.VALIDATION_CACHE_MAX_ENTRIES !== undefined && {
        cache_max_entries: env.VALIDATION_CACHE_MAX_ENTRIES,
      }),
    },
    conflict: {
      ...config.conflict,
      ...(env.CONFLICT_MAX_ATTEMPTS !== undefined && {
        max_increment_attempts: env.CONFLICT_MAX_ATTEMPTS,
      }),
      ...(env.CONFLICT_SUFFIX_LENGTH !== undefined && {
        random_suffix_length: env.CONFLICT_SUFFIX_LENGTH,
      }),
    },
    secrets: {
      ...config.secrets,
      ...(env.SECRETS_ENCRYPTION_KEY !== undefined && {
        encryption_key: env.SECRETS_ENCRYPTION_KEY,
      }),
    },
  };

  return ConfigSchema.parse(overrides);
}
