import { Command } from 'commander';
import { startApp, type RunningApp } from './app.js';
import { DEFAULT_LISTEN_ADDRESS, DEFAULT_UPSTREAMS, loadConfig, type Flags, type ServerConfig } from './config.js';
import { CacheFileError, ConfigError } from './errors.js';
import { createLogger, toError } from './logger.js';

export function createProgram(): Command {
  return new Command('splitdns')
    .description('Caching DNS forwarder that resolves listed domains over DNS-over-HTTPS')
    .version('0.1.0')
    .option('--addr <address>', 'UDP listen address', DEFAULT_LISTEN_ADDRESS)
    .option('--pac <path>', 'File of domains to resolve over DoH, one per line', '')
    .option('--cache <path>', 'File to persist the record cache to', '')
    .option('--upstreams <list>', 'Comma-separated upstreams for domains not in the policy file', DEFAULT_UPSTREAMS)
    .option('--api-port <port>', 'Status API port (0 disables)', '0')
    .option('--metrics-port <port>', 'Prometheus metrics port (0 disables)', '0')
    .action(async (options: Flags) => {
      await run(options);
    });
}

/**
 * Start the server and keep it running until SIGINT/SIGTERM. Sets a non-zero
 * exit code for bad flags, an unusable cache file, or a failed cache write.
 */
export async function run(flags: Flags, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  let config: ServerConfig;
  try {
    config = loadConfig(flags, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const logger = createLogger(config.log);
  let app: RunningApp | null = null;
  let stopping = false;

  const shutdown = (reason: string): void => {
    if (stopping || !app) return;
    stopping = true;
    logger.info('Shutting down', { reason });
    app.stop().catch((error: unknown) => {
      logger.error('Error during shutdown', { error: toError(error) });
      process.exitCode = 1;
    });
  };

  const onPersistenceFailure = (error: CacheFileError) => {
    logger.error('Cache file is not writable, stopping', { path: error.path, error });
    process.exitCode = 1;
    shutdown('cache write failure');
  };

  try {
    app = await startApp(config, { logger, onPersistenceFailure });
  } catch (error) {
    if (error instanceof CacheFileError) {
      logger.error('Failed to load cache file', { path: error.path, error });
    } else {
      logger.error('Failed to start server', { error: toError(error) });
    }
    process.exitCode = 1;
    return;
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => shutdown(signal));
  }
}
