import path from 'path';
import { z } from 'zod';
import { AppConfig } from '../types';

const GIB = 1024 * 1024 * 1024;

const numberFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const booleanFromEnv = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ''
        ? fallback
        : ['true', '1', 'yes'].includes(value.trim().toLowerCase()),
    );

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: numberFromEnv(7860),
  DEBUG: booleanFromEnv(false),
  LOG_LEVEL: z.string().default('info'),
  LOCALXPOSE_AUTHTOKEN: optionalText,
  LOCALXPOSE_PATH: z.string().default('loclx'),
  CLIENT_PATH: optionalText,
  CLIENT_INSTALL_CMD: optionalText,
  ARCHIVER_PATH: z.string().default('7z'),
  ARCHIVER_INSTALL_CMD: optionalText,
  WORK_ROOT: z.string().default('./game'),
  OUTPUT_DIR: z.string().default('./output'),
  QUEUE_DIR: z.string().default('./queue'),
  LOGS_DIR: z.string().default('./logs'),
  LOGIN_TIMEOUT_MS: numberFromEnv(60000),
  SIZE_TIMEOUT_MS: numberFromEnv(120000),
  LOGIN_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  LOGIN_RETRY_DELAY_MS: numberFromEnv(10000),
  LOGIN_SETTLE_DELAY_MS: numberFromEnv(20000),
  ARCHIVE_FORMAT: z.string().regex(/^[a-z0-9]+$/i).default('7z'),
  VOLUME_SIZE: z.string().default('4g'),
  MIN_FREE_BYTES: numberFromEnv(10 * GIB),
  VALIDATE_DOWNLOAD: booleanFromEnv(true),
  ESTIMATE_SIZE: booleanFromEnv(true),
  PROCESS_GRACE_MS: numberFromEnv(5000),
});

export type RawEnv = Record<string, string | undefined>;

/**
 * Load configuration from environment variables.
 * Relative paths are resolved against `cwd` once, at startup.
 */
export function loadConfig(
  env: RawEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const vars = parsed.data;
  const resolve = (p: string) => path.resolve(cwd, p);

  const defaultClient = resolve(path.join('steamcmd', 'steamcmd.sh'));
  const clientPath = vars.CLIENT_PATH ? resolve(vars.CLIENT_PATH) : defaultClient;
  const volumeSize = vars.VOLUME_SIZE.trim();

  return {
    port: vars.PORT,
    debug: vars.DEBUG,
    logLevel: vars.LOG_LEVEL,
    tunnelAuthToken: vars.LOCALXPOSE_AUTHTOKEN,
    client: {
      path: clientPath,
      candidates: Array.from(
        new Set([clientPath, defaultClient, '/app/steamcmd/steamcmd.sh']),
      ),
      installCommand: vars.CLIENT_INSTALL_CMD,
    },
    archiver: {
      path: vars.ARCHIVER_PATH,
      candidates: Array.from(new Set([vars.ARCHIVER_PATH, '7z', '7za'])),
      installCommand: vars.ARCHIVER_INSTALL_CMD,
    },
    tunnelBinary: vars.LOCALXPOSE_PATH,
    outputDir: resolve(vars.OUTPUT_DIR),
    queueDir: resolve(vars.QUEUE_DIR),
    logsDir: resolve(vars.LOGS_DIR),
    processGraceMs: vars.PROCESS_GRACE_MS,
    session: {
      workRoot: resolve(vars.WORK_ROOT),
      loginTimeoutMs: vars.LOGIN_TIMEOUT_MS,
      sizeTimeoutMs: vars.SIZE_TIMEOUT_MS,
      loginAttempts: vars.LOGIN_ATTEMPTS,
      loginRetryDelayMs: vars.LOGIN_RETRY_DELAY_MS,
      loginSettleDelayMs: vars.LOGIN_SETTLE_DELAY_MS,
      archiveFormat: vars.ARCHIVE_FORMAT,
      volumeSize: volumeSize.length > 0 ? volumeSize : undefined,
      minFreeBytes: vars.MIN_FREE_BYTES,
      validateDownload: vars.VALIDATE_DOWNLOAD,
      estimateSize: vars.ESTIMATE_SIZE,
    },
  };
}
