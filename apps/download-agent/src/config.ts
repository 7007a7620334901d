import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export interface ToolUpdateConfig {
  command: string;
  args: string[];
  timeoutSec: number;
}

export interface QueueConfig {
  sqlitePath: string;
  workerManifestPath: string;
  mediaRootPath: string;
  defaultConcurrency: number;
  dispatchIntervalMs: number;
  registryRefreshIntervalMs: number;
  maxRunDurationSec?: number;
  killGraceMs: number;
  logLevel: LogLevel;
  toolUpdate: ToolUpdateConfig;
}

const DEFAULT_CONFIG_PATH = './config/local.json';

const logLevelSchema = z.enum(LOG_LEVELS);

const configFileSchema = z.object({
  sqlitePath: z.string().min(1),
  workerManifestPath: z.string().min(1),
  mediaRootPath: z.string().min(1).default('/media'),
  defaultConcurrency: z.number().int().nonnegative().default(3),
  dispatchIntervalMs: z.number().int().positive().default(5_000),
  registryRefreshIntervalMs: z.number().int().nonnegative().default(60_000),
  maxRunDurationSec: z.number().int().positive().optional(),
  killGraceMs: z.number().int().positive().default(5_000),
  logLevel: logLevelSchema.default('info'),
  toolUpdate: z
    .object({
      command: z.string().min(1).default('pip'),
      args: z.array(z.string()).default(['install', '--upgrade', 'yt-dlp']),
      timeoutSec: z.number().int().positive().default(300),
    })
    .default({}),
});

const envSchema = z.object({
  DOWNLOAD_QUEUE_SQLITE_PATH: z.string().min(1).optional(),
  DOWNLOAD_QUEUE_MEDIA_ROOT: z.string().min(1).optional(),
  LOG_LEVEL: logLevelSchema.optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseQueueConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): QueueConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid config: ${formatIssues(parsed.error)}`);
  }

  const overrides = envSchema.safeParse(env);
  if (!overrides.success) {
    throw new Error(`Invalid environment: ${formatIssues(overrides.error)}`);
  }

  const config = parsed.data;
  return {
    ...config,
    sqlitePath: overrides.data.DOWNLOAD_QUEUE_SQLITE_PATH ?? config.sqlitePath,
    mediaRootPath: overrides.data.DOWNLOAD_QUEUE_MEDIA_ROOT ?? config.mediaRootPath,
    logLevel: overrides.data.LOG_LEVEL ?? config.logLevel,
  };
}

/** Relative paths in the file are taken from the file's own directory. */
export function loadQueueConfig(configPath = process.env.DOWNLOAD_QUEUE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH): QueueConfig {
  const absolutePath = resolve(configPath);
  const raw = readFileSync(absolutePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Invalid config: ${absolutePath} is not valid JSON`, { cause: error });
  }

  const baseDir = dirname(absolutePath);
  const config = parseQueueConfig(parsed);
  return {
    ...config,
    sqlitePath: resolve(baseDir, config.sqlitePath),
    workerManifestPath: resolve(baseDir, config.workerManifestPath),
    mediaRootPath: resolve(baseDir, config.mediaRootPath),
  };
}
