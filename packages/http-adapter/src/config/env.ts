import { z } from 'zod';

import type { KernelOptions, ResolvedKernelOptions } from '../kernel/interfaces';

const DEFAULT_PORT = 3000;
const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_BODY_LIMIT = 1024 * 1024;

const TRUE_FLAGS = ['true', '1', 'yes', 'on'] as const;
const FALSE_FLAGS = ['false', '0', 'no', 'off'] as const;

const flag = z
  .string()
  .transform(value => value.trim().toLowerCase())
  .pipe(z.enum([...TRUE_FLAGS, ...FALSE_FLAGS]))
  .transform(value => value === 'true' || value === '1' || value === 'yes' || value === 'on');

const envSchema = z
  .object({
    SWITCHYARD_DEBUG: flag.optional(),
    SWITCHYARD_DEFAULT_FORMAT: z.string().min(1).optional(),
    SWITCHYARD_CASE_SENSITIVE: flag.optional(),
    SWITCHYARD_IGNORE_TRAILING_SLASH: flag.optional(),
    // 0 disables the match cache
    SWITCHYARD_ROUTE_CACHE_SIZE: z.coerce.number().int().nonnegative().optional(),
    SWITCHYARD_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'notice', 'warn', 'error', 'fatal']).optional(),
    SWITCHYARD_LOG_FORMAT: z.enum(['pretty', 'json']).optional(),
    SWITCHYARD_HOST: z.string().min(1).optional(),
    SWITCHYARD_PORT: z.coerce.number().int().min(0).max(65535).optional(),
    SWITCHYARD_BODY_LIMIT: z.coerce.number().int().positive().optional(),
  })
  .transform(raw => ({
    kernel: {
      debug: raw.SWITCHYARD_DEBUG,
      defaultFormat: raw.SWITCHYARD_DEFAULT_FORMAT,
      router: {
        caseSensitive: raw.SWITCHYARD_CASE_SENSITIVE,
        ignoreTrailingSlash: raw.SWITCHYARD_IGNORE_TRAILING_SLASH,
        enableCache: raw.SWITCHYARD_ROUTE_CACHE_SIZE === undefined ? undefined : raw.SWITCHYARD_ROUTE_CACHE_SIZE > 0,
        cacheSize: raw.SWITCHYARD_ROUTE_CACHE_SIZE || undefined,
      },
    },
    logger: {
      level: raw.SWITCHYARD_LOG_LEVEL,
      format: raw.SWITCHYARD_LOG_FORMAT,
    },
    server: {
      host: raw.SWITCHYARD_HOST ?? DEFAULT_HOST,
      port: raw.SWITCHYARD_PORT ?? DEFAULT_PORT,
      bodyLimit: raw.SWITCHYARD_BODY_LIMIT ?? DEFAULT_BODY_LIMIT,
    },
  }));

export type Env = z.infer<typeof envSchema>;

export type EnvSource = Readonly<Record<string, string | undefined>>;

function value(source: EnvSource, name: string): string | undefined {
  const raw = source[name];

  return raw === undefined || raw.trim() === '' ? undefined : raw;
}

/**
 * Reads the `SWITCHYARD_*` variables. Unset and empty variables are left undefined; invalid
 * values throw a `ZodError`.
 */
export function readEnv(source: EnvSource): Env {
  return envSchema.parse({
    SWITCHYARD_DEBUG: value(source, 'SWITCHYARD_DEBUG'),
    SWITCHYARD_DEFAULT_FORMAT: value(source, 'SWITCHYARD_DEFAULT_FORMAT'),
    SWITCHYARD_CASE_SENSITIVE: value(source, 'SWITCHYARD_CASE_SENSITIVE'),
    SWITCHYARD_IGNORE_TRAILING_SLASH: value(source, 'SWITCHYARD_IGNORE_TRAILING_SLASH'),
    SWITCHYARD_ROUTE_CACHE_SIZE: value(source, 'SWITCHYARD_ROUTE_CACHE_SIZE'),
    SWITCHYARD_LOG_LEVEL: value(source, 'SWITCHYARD_LOG_LEVEL'),
    SWITCHYARD_LOG_FORMAT: value(source, 'SWITCHYARD_LOG_FORMAT'),
    SWITCHYARD_HOST: value(source, 'SWITCHYARD_HOST'),
    SWITCHYARD_PORT: value(source, 'SWITCHYARD_PORT'),
    SWITCHYARD_BODY_LIMIT: value(source, 'SWITCHYARD_BODY_LIMIT'),
  });
}

/**
 * Kernel options from defaults, then the environment, then explicit overrides.
 */
export function resolveKernelOptions(overrides: KernelOptions = {}, source: EnvSource = process.env): ResolvedKernelOptions {
  const env = readEnv(source).kernel;

  return {
    debug: overrides.debug ?? env.debug ?? false,
    defaultFormat: overrides.defaultFormat ?? env.defaultFormat ?? 'json',
    router: {
      ...overrides.router,
      caseSensitive: overrides.router?.caseSensitive ?? env.router.caseSensitive,
      ignoreTrailingSlash: overrides.router?.ignoreTrailingSlash ?? env.router.ignoreTrailingSlash,
      enableCache: overrides.router?.enableCache ?? env.router.enableCache,
      cacheSize: overrides.router?.cacheSize ?? env.router.cacheSize,
    },
  };
}
