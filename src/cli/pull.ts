/**
 * Quire — Pull Command
 *
 * Loads the configured sources, runs one fetch cycle and reports it.
 * Individual source failures never fail the command.
 */

import { loadConfig, loadRuntimeSettings } from '../config';
import {
  MAX_TIMEOUT_MS,
  createSources,
  fetchAll,
  formatRunSummary,
  type FetchAllResult,
} from '../feeds';
import { ConfigError } from '../lib/errors';
import { getLogLevel, setLogLevel } from '../lib/logger';

export interface PullOptions {
  configPath?: string;
  timeoutMs?: number;
  maxConcurrency?: number;
  quiet: boolean;
}

export interface PullIO {
  env: NodeJS.ProcessEnv;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const DEFAULT_IO: PullIO = {
  env: process.env,
  stdout: line => console.log(line),
  stderr: line => console.error(line),
};

function positiveInt(flag: string, value: string | undefined, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${flag} expects a positive integer, got ${value ?? 'nothing'}`);
  }
  if (parsed > max) {
    throw new ConfigError(`${flag} must not exceed ${max}, got ${value}`);
  }
  return parsed;
}

export function parsePullArgs(args: readonly string[]): PullOptions {
  const options: PullOptions = { quiet: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--config': {
        const value = args[i + 1];
        if (!value) throw new ConfigError('--config expects a path');
        options.configPath = value;
        i++;
        break;
      }
      case '--timeout':
        options.timeoutMs = positiveInt(arg, args[i + 1], MAX_TIMEOUT_MS);
        i++;
        break;
      case '--max-concurrency':
        options.maxConcurrency = positiveInt(arg, args[i + 1]);
        i++;
        break;
      case '--quiet':
      case '-q':
        options.quiet = true;
        break;
      default:
        throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

/**
 * Run one cycle. Flags override the environment.
 *
 * Quiet runs print only the failed sources. The log threshold is
 * restored when the run ends.
 */
export async function runPull(
  options: PullOptions,
  io: PullIO = DEFAULT_IO
): Promise<FetchAllResult> {
  const previousLevel = getLogLevel();
  if (options.quiet) {
    setLogLevel('warn');
  }

  try {
    const settings = loadRuntimeSettings(io.env);
    const config = await loadConfig(options.configPath ?? settings.configPath);
    const sources = createSources(config.sources.rss);

    const result = await fetchAll(sources, {
      timeoutMs: options.timeoutMs ?? settings.timeoutMs,
      maxConcurrency: options.maxConcurrency ?? settings.maxConcurrency,
    });

    const [summary, ...failures] = formatRunSummary(result.stats);

    if (options.quiet) {
      failures.filter(Boolean).forEach(line => io.stderr(line));
      return result;
    }

    io.stdout(summary);
    failures.forEach(line => io.stderr(line));
    for (const item of result.items) {
      io.stdout(`${item.sourceName}  ${item.title}  ${item.link}`);
    }

    return result;
  } finally {
    setLogLevel(previousLevel);
  }
}
