import { z } from 'zod';
import { isKnownTimezone } from './utils';

const intFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a positive integer')
    .transform(Number)
    .pipe(z.number().int().positive())
    .default(String(fallback));

const envSchema = z.object({
  NODE_ENV: z.string().trim().default('development'),
  PORT: intFromEnv(3000),
  BASE_URL: z.string().trim().url().default('http://localhost:3000'),
  SESSION_SECRET: z.string().default(''),
  STORAGE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().trim().optional(),
  DISCORD_CLIENT_ID: z.string().trim().default(''),
  DISCORD_CLIENT_SECRET: z.string().trim().default(''),
  DISCORD_BOT_TOKEN: z.string().trim().default(''),
  DISCORD_API_URL: z.string().trim().url().default('https://discord.com/api'),
  PUBLIC_SERVER_INVITE_URL: z.string().trim().default(''),
  POLL_SECONDS: intFromEnv(30),
  POLL_LIMIT: intFromEnv(50),
  DEFAULT_TZ: z
    .string()
    .trim()
    .default('Asia/Seoul')
    .refine(isKnownTimezone, 'must be a known IANA time zone'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info')
});

export interface AppConfig {
  nodeEnv: string;
  port: number;
  baseUrl: string;
  sessionSecret: string;
  storage: {
    driver: 'postgres' | 'memory';
    databaseUrl?: string;
  };
  discord: {
    clientId: string;
    clientSecret: string;
    botToken: string;
    apiUrl: string;
  };
  publicServerInviteUrl: string;
  poll: {
    intervalSeconds: number;
    batchLimit: number;
  };
  defaultTimezone: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

/**
 * Reads configuration from the environment. Values missing from `env` take
 * their defaults; malformed values throw a `ZodError`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    baseUrl: parsed.BASE_URL.replace(/\/+$/, ''),
    sessionSecret: parsed.SESSION_SECRET,
    storage: {
      driver: parsed.STORAGE_DRIVER,
      databaseUrl: parsed.DATABASE_URL || undefined
    },
    discord: {
      clientId: parsed.DISCORD_CLIENT_ID,
      clientSecret: parsed.DISCORD_CLIENT_SECRET,
      botToken: parsed.DISCORD_BOT_TOKEN,
      apiUrl: parsed.DISCORD_API_URL.replace(/\/+$/, '')
    },
    publicServerInviteUrl: parsed.PUBLIC_SERVER_INVITE_URL,
    poll: {
      intervalSeconds: parsed.POLL_SECONDS,
      batchLimit: parsed.POLL_LIMIT
    },
    defaultTimezone: parsed.DEFAULT_TZ,
    logLevel: parsed.LOG_LEVEL
  };
}
