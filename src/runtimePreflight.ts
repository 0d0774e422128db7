import { isKnownTimezone } from './utils';

export interface RuntimePreflightOptions {
  allowNonProd?: boolean;
  allowMemoryInProduction?: boolean;
}

const REQUIRED_SECRETS = [
  'SESSION_SECRET',
  'DISCORD_CLIENT_ID',
  'DISCORD_CLIENT_SECRET',
  'DISCORD_BOT_TOKEN'
] as const;

function isBlank(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

function checkPositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: string,
  errors: string[]
): void {
  const raw = (env[name] ?? fallback).trim();
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    errors.push(`${name}=${raw} is invalid, expected a positive integer`);
  }
}

export function shouldRunRuntimePreflight(env: NodeJS.ProcessEnv): boolean {
  return env.ENABLE_RUNTIME_PREFLIGHT === '1' || env.NODE_ENV === 'production';
}

export function validateRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): string[] {
  const errors: string[] = [];
  const allowNonProd = options.allowNonProd ?? false;
  const allowMemoryInProduction = options.allowMemoryInProduction ?? false;

  const nodeEnv = env.NODE_ENV?.trim();
  if (isBlank(nodeEnv)) {
    errors.push('NODE_ENV is not set');
  } else if (nodeEnv !== 'production' && !allowNonProd) {
    errors.push(`NODE_ENV=${nodeEnv} is not production (set ALLOW_NON_PROD=1 to skip)`);
  }

  const storageDriver = env.STORAGE_DRIVER?.trim();
  if (isBlank(storageDriver)) {
    errors.push('STORAGE_DRIVER is not set, expected postgres or memory');
  } else if (storageDriver !== 'postgres' && storageDriver !== 'memory') {
    errors.push(`STORAGE_DRIVER=${storageDriver} is invalid, expected postgres or memory`);
  }

  if (storageDriver === 'memory' && nodeEnv === 'production' && !allowMemoryInProduction) {
    errors.push(
      'memory storage loses every timer on restart (set ALLOW_MEMORY_IN_PRODUCTION=1 to skip)'
    );
  }

  if (storageDriver === 'postgres') {
    const databaseUrl = env.DATABASE_URL?.trim();
    if (!databaseUrl) {
      errors.push('DATABASE_URL is required when STORAGE_DRIVER=postgres');
    } else if (!/^postgres(ql)?:\/\//.test(databaseUrl)) {
      errors.push('DATABASE_URL must start with postgres:// or postgresql://');
    }
  }

  REQUIRED_SECRETS.forEach((name) => {
    if (isBlank(env[name])) {
      errors.push(`${name} is required`);
    }
  });

  const port = (env.PORT ?? '3000').trim();
  if (!/^\d+$/.test(port)) {
    errors.push(`PORT=${port} is invalid, expected a number`);
  } else {
    const value = Number(port);
    if (value < 1 || value > 65535) {
      errors.push(`PORT=${port} is out of range 1-65535`);
    }
  }

  checkPositiveInt(env, 'POLL_SECONDS', '30', errors);
  checkPositiveInt(env, 'POLL_LIMIT', '50', errors);

  const defaultTz = env.DEFAULT_TZ?.trim();
  if (defaultTz && !isKnownTimezone(defaultTz)) {
    errors.push(`DEFAULT_TZ=${defaultTz} is not a known IANA time zone`);
  }

  return errors;
}

export function assertRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): void {
  const errors = validateRuntimeEnv(env, options);
  if (errors.length === 0) {
    return;
  }

  const message = ['Runtime environment check failed:', ...errors.map((item) => `- ${item}`)].join(
    '\n'
  );
  throw new Error(message);
}
