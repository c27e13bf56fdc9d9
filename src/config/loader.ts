/**
 * Quire — Configuration Loader
 *
 * Reads the source list (JSON) and the runtime settings (environment).
 * A missing config file is created from the bundled example, with the
 * directory at 0700 and the file at 0600.
 */

import { chmod, mkdir, readFile, writeFile } from 'fs/promises';
import { homedir } from 'os';
import { dirname, join } from 'path';
import type { ZodError } from 'zod';
import { ConfigError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';
import {
  QuireConfigSchema,
  RuntimeSettingsSchema,
  type QuireConfig,
} from './schema';

const EXAMPLE_CONFIG_URL = new URL('../../data/example-config.json', import.meta.url);

export interface RuntimeSettings {
  configPath: string;
  timeoutMs: number;
  maxConcurrency?: number;
}

export function defaultConfigPath(): string {
  return join(homedir(), '.quire', 'config.json');
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Validate an already-parsed config document.
 */
export function parseConfig(document: unknown, origin = 'configuration'): QuireConfig {
  const result = QuireConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigError(`Invalid ${origin}: ${formatIssues(result.error)}`);
  }

  if (result.data.sources.rss.length === 0) {
    logger.warn('No sources configured', { origin });
  }

  return result.data;
}

/**
 * Write the example config to `path`, creating its directory if needed.
 */
export async function initWithExample(path: string): Promise<void> {
  const dir = dirname(path);

  try {
    await mkdir(dir, { recursive: true, mode: 0o700 });
    const example = await readFile(EXAMPLE_CONFIG_URL, 'utf-8');
    await writeFile(path, example, { mode: 0o600 });
    // mode on writeFile is masked by the umask
    await chmod(path, 0o600);
  } catch (error) {
    throw new ConfigError(`Failed to write example configuration to ${path}: ${describeError(error)}`, {
      cause: error,
    });
  }

  logger.info('Created example configuration', { path });
}

export async function loadConfig(path: string = defaultConfigPath()): Promise<QuireConfig> {
  let contents: string;

  try {
    contents = await readFile(path, 'utf-8');
  } catch (error) {
    if (!isMissingFile(error)) {
      throw new ConfigError(`Failed to read configuration file at ${path}: ${describeError(error)}`, {
        cause: error,
      });
    }
    await initWithExample(path);
    contents = await readFile(path, 'utf-8');
  }

  let document: unknown;
  try {
    document = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(`Failed to parse configuration file ${path}: ${describeError(error)}`, {
      cause: error,
    });
  }

  return parseConfig(document, `configuration file ${path}`);
}

/**
 * Runtime settings from the environment (QUIRE_CONFIG, QUIRE_TIMEOUT_MS,
 * QUIRE_MAX_CONCURRENCY).
 */
export function loadRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  const result = RuntimeSettingsSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(result.error)}`);
  }

  const { QUIRE_CONFIG, QUIRE_TIMEOUT_MS, QUIRE_MAX_CONCURRENCY } = result.data;

  return {
    configPath: QUIRE_CONFIG ?? defaultConfigPath(),
    timeoutMs: QUIRE_TIMEOUT_MS,
    maxConcurrency: QUIRE_MAX_CONCURRENCY,
  };
}
