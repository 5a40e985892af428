import { z } from 'zod';

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Environment schema. Every field is read once at boot and passed explicitly.
 */
const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(3600),
  JWT_REFRESH_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 3600),
  MASTER_KEY: z.string().min(1, 'MASTER_KEY is required'),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost,http://localhost:3000,http://localhost:5173')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  AUDIT_LOG_FILE: z.string().min(1).optional(),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  LOGIN_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  databaseUrl: string;
  jwt: {
    secret: string;
    accessTtlSeconds: number;
    refreshTtlSeconds: number;
  };
  masterKey: string;
  corsOrigins: string[];
  log: {
    level: (typeof logLevels)[number];
    auditFile?: string;
  };
  rateLimit: {
    max: number;
    loginMax: number;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    jwt: {
      secret: parsed.JWT_SECRET,
      accessTtlSeconds: parsed.JWT_EXPIRES_IN_SECONDS,
      refreshTtlSeconds: parsed.JWT_REFRESH_EXPIRES_IN_SECONDS,
    },
    masterKey: parsed.MASTER_KEY,
    corsOrigins: parsed.CORS_ORIGINS,
    log: {
      level: parsed.LOG_LEVEL,
      auditFile: parsed.AUDIT_LOG_FILE,
    },
    rateLimit: {
      max: parsed.RATE_LIMIT_MAX,
      loginMax: parsed.LOGIN_RATE_LIMIT_MAX,
    },
  };
}
