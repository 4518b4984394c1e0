import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../core/errors';
import { Platform, type HostInfo } from './platform';

export const APP_NAME = 'engman';

const EnvSchema = z.object({
  ENGMAN_DATA_DIR: z.string().optional(),
  ENGMAN_CACHE_DIR: z.string().optional(),
  ENGMAN_RELEASE_REPO: z
    .string()
    .regex(/^[\w.-]+\/[\w.-]+$/, 'expected "owner/name"')
    .default('godotengine/godot'),
  ENGMAN_GITHUB_API: z.string().url().default('https://api.github.com'),
  ENGMAN_BINARY_PREFIX: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'expected letters, digits, "_" or "-"')
    .default('Godot'),
  GITHUB_TOKEN: z.string().optional(),
  XDG_DATA_HOME: z.string().optional(),
  XDG_CACHE_HOME: z.string().optional(),
  LOCALAPPDATA: z.string().optional(),
});

type Env = z.infer<typeof EnvSchema>;

export interface EngineManagerConfig {
  dataDir: string;
  cacheDir: string;
  releaseRepo: string;
  githubApiUrl: string;
  binaryPrefix: string;
  githubToken?: string;
  userAgent: string;
}

/**
 * Resolve configuration from environment variables, falling back to per-platform defaults.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  host: HostInfo = Platform.host(),
  homeDir: string = os.homedir()
): EngineManagerConfig {
  // Empty variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(issues);
  }

  const values = parsed.data;

  return {
    dataDir: values.ENGMAN_DATA_DIR ?? defaultDataDir(values, host, homeDir),
    cacheDir: values.ENGMAN_CACHE_DIR ?? defaultCacheDir(values, host, homeDir),
    releaseRepo: values.ENGMAN_RELEASE_REPO,
    githubApiUrl: values.ENGMAN_GITHUB_API.replace(/\/+$/, ''),
    binaryPrefix: values.ENGMAN_BINARY_PREFIX,
    githubToken: values.GITHUB_TOKEN,
    userAgent: `${APP_NAME}-cli`,
  };
}

function defaultDataDir(env: Env, host: HostInfo, homeDir: string): string {
  if (Platform.isMac(host)) {
    return path.join(homeDir, 'Library', 'Application Support', APP_NAME);
  }

  if (Platform.isWindows(host)) {
    return path.join(env.LOCALAPPDATA ?? path.join(homeDir, 'AppData', 'Local'), APP_NAME, 'data');
  }

  // Follow XDG Base Directory Specification everywhere else
  return path.join(env.XDG_DATA_HOME ?? path.join(homeDir, '.local', 'share'), APP_NAME);
}

function defaultCacheDir(env: Env, host: HostInfo, homeDir: string): string {
  if (Platform.isMac(host)) {
    return path.join(homeDir, 'Library', 'Caches', APP_NAME);
  }

  if (Platform.isWindows(host)) {
    return path.join(env.LOCALAPPDATA ?? path.join(homeDir, 'AppData', 'Local'), APP_NAME, 'cache');
  }

  return path.join(env.XDG_CACHE_HOME ?? path.join(homeDir, '.cache'), APP_NAME);
}
