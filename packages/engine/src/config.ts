import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import dotenv from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ValidationError } from '@notesync/shared';

const NonEmptyTrimmedStringSchema = z.string().trim().min(1);

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const NoteFormatSchema = z.enum(['keep', 'frontmatter']);
export type NoteFormat = z.infer<typeof NoteFormatSchema>;

const RetryConfigSchema = z.object({
  baseDelayMs: z.number().int().min(0).default(5_000),
  maxDelayMs: z.number().int().min(0).default(300_000),
  staleAfterFailures: z.number().int().min(1).default(3),
});

export const NoteSyncConfigSchema = z
  .object({
    cacheDir: NonEmptyTrimmedStringSchema,
    account: NonEmptyTrimmedStringSchema.default('default'),
    /**
     * Directory mirrored as one file per note. Without it notes only live in
     * ephemeral buffers.
     */
    syncDir: NonEmptyTrimmedStringSchema.optional(),
    syncArchived: z.boolean().default(false),
    noteFormat: NoteFormatSchema.default('keep'),
    remoteTimeoutMs: z.number().int().min(1).default(30_000),
    retry: RetryConfigSchema.default({}),
    liveSearchDebounceMs: z.number().int().min(0).default(150),
    logLevel: LogLevelSchema.default('warn'),
  })
  .superRefine((value, ctx) => {
    if (value.retry.maxDelayMs < value.retry.baseDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retry', 'maxDelayMs'],
        message: 'retry.maxDelayMs must not be smaller than retry.baseDelayMs',
      });
    }
  });

export type NoteSyncConfig = z.output<typeof NoteSyncConfigSchema>;
export type NoteSyncConfigInput = z.input<typeof NoteSyncConfigSchema>;

const DEFAULT_CONFIG_FILENAMES = [
  'notesync.config.json',
  'notesync.config.yaml',
  'notesync.config.yml',
];

type Env = Record<string, string | undefined>;

function expandHome(value: string): string {
  if (value === '~') {
    return os.homedir();
  }
  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

function defaultCacheDir(env: Env): string {
  const xdgCache = env['XDG_CACHE_HOME'];
  const base =
    typeof xdgCache === 'string' && xdgCache.trim().length > 0
      ? xdgCache.trim()
      : path.join(os.homedir(), '.cache');
  return path.join(base, 'notesync');
}

function readEnvFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function readEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function findConfigFile(cwd: string): string | undefined {
  for (const filename of DEFAULT_CONFIG_FILENAMES) {
    const fullPath = path.join(cwd, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  const content = fs.readFileSync(configPath, 'utf8');
  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ValidationError(`Failed to parse ${configPath}: ${String(err)}`);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ValidationError(`${configPath} must contain an object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function readDotenv(cwd: string): Env {
  const envPath = path.join(cwd, '.env');
  if (!fs.existsSync(envPath)) {
    return {};
  }
  return dotenv.parse(fs.readFileSync(envPath));
}

function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };
  const stringKeys: Array<[string, string]> = [
    ['NOTESYNC_CACHE_DIR', 'cacheDir'],
    ['NOTESYNC_ACCOUNT', 'account'],
    ['NOTESYNC_SYNC_DIR', 'syncDir'],
    ['NOTESYNC_NOTE_FORMAT', 'noteFormat'],
    ['NOTESYNC_LOG_LEVEL', 'logLevel'],
  ];
  for (const [envKey, configKey] of stringKeys) {
    const value = env[envKey];
    if (typeof value === 'string' && value.trim().length > 0) {
      result[configKey] = value.trim();
    }
  }

  const syncArchived = readEnvFlag(env['NOTESYNC_SYNC_ARCHIVED']);
  if (syncArchived !== undefined) {
    result['syncArchived'] = syncArchived;
  }
  const remoteTimeoutMs = readEnvNumber(env['NOTESYNC_REMOTE_TIMEOUT_MS']);
  if (remoteTimeoutMs !== undefined) {
    result['remoteTimeoutMs'] = remoteTimeoutMs;
  }
  return result;
}

export function parseConfig(raw: unknown, cwd: string = process.cwd()): NoteSyncConfig {
  const result = NoteSyncConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid notesync config: ${details}`);
  }

  const config = result.data;
  return {
    ...config,
    cacheDir: path.resolve(cwd, expandHome(config.cacheDir)),
    ...(config.syncDir ? { syncDir: path.resolve(cwd, expandHome(config.syncDir)) } : {}),
  };
}

/**
 * Resolves configuration from `notesync.config.*` in `cwd`, a `.env` file beside it and
 * `NOTESYNC_*` variables. Variables from the real environment win over `.env`.
 */
export function loadConfig(cwd: string = process.cwd(), env: Env = process.env): NoteSyncConfig {
  const configPath = findConfigFile(cwd);
  const fileConfig = configPath ? readConfigFile(configPath) : {};
  const mergedEnv: Env = { ...readDotenv(cwd), ...env };

  const raw = applyEnvOverrides(fileConfig, mergedEnv);
  if (raw['cacheDir'] === undefined) {
    raw['cacheDir'] = defaultCacheDir(mergedEnv);
  }
  return parseConfig(raw, cwd);
}

export function cacheFilePath(config: NoteSyncConfig): string {
  const account = config.account.replace(/[^A-Za-z0-9@._-]+/g, '_');
  return path.join(config.cacheDir, `notesync-${account}.json`);
}
