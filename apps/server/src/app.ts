import { serve, type ServerType } from '@hono/node-server';
import { createApi } from './api.js';
import { POLICY_UPSTREAMS, type ServerConfig } from './config.js';
import { DNSServer } from './dns-server.js';
import { DoHResolver, type FetchLike } from './doh-resolver.js';
import type { CacheFileError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { initializeOtelMetrics, shutdownOtelMetrics } from './otel-metrics.js';
import { QueryHandler } from './query-handler.js';
import { RecordCache } from './record-cache.js';
import { RoutingPolicy } from './routing-policy.js';
import type { DnsExchange } from './udp-client.js';
import { UpstreamResolver } from './upstream-resolver.js';

export interface StartOptions {
  logger?: Logger;
  /** Overrides for the network transports */
  fetch?: FetchLike;
  exchange?: DnsExchange;
  onPersistenceFailure?: (error: CacheFileError) => void;
}

export interface RunningApp {
  dnsServer: DNSServer;
  handler: QueryHandler;
  cache: RecordCache;
  policy: RoutingPolicy;
  logger: Logger;
  stop(): Promise<void>;
}

/**
 * Load cache and policy, wire the resolvers and start listening. Rejects with
 * CacheFileError when the cache file cannot be read or created.
 */
export async function startApp(config: ServerConfig, options: StartOptions = {}): Promise<RunningApp> {
  const logger = options.logger ?? createLogger(config.log);

  const cache = new RecordCache({ logger, persistPath: config.cachePath });
  if (config.cachePath) {
    await cache.loadFrom(config.cachePath);
  }

  const policy = await RoutingPolicy.loadFrom(config.pacPath, logger);

  const upstream = new UpstreamResolver({ logger, exchange: options.exchange });
  const doh = new DoHResolver({ logger, fallback: upstream, fetch: options.fetch });
  logger.debug('Upstreams', { nonPolicy: config.upstreams, policy: POLICY_UPSTREAMS });

  const handler = new QueryHandler({
    logger,
    cache,
    policy,
    doh,
    upstream,
    nonPolicyUpstreams: config.upstreams,
    policyUpstreams: POLICY_UPSTREAMS,
    onPersistenceFailure: options.onPersistenceFailure,
  });

  initializeOtelMetrics({ enabled: config.metricsPort > 0, prometheusPort: config.metricsPort }, logger);

  let apiServer: ServerType | null = null;
  if (config.apiPort > 0) {
    const api = createApi({ handler, cache, policy, logger, dohProviders: () => doh.getProviderStats() });
    apiServer = serve({ fetch: api.fetch, port: config.apiPort }, (info) => {
      logger.info('Status API running', { port: info.port });
    });
  }

  const dnsServer = new DNSServer({ listen: config.listen, handler, logger });
  try {
    await dnsServer.start();
  } catch (error) {
    apiServer?.close();
    await shutdownOtelMetrics();
    throw error;
  }

  return {
    dnsServer,
    handler,
    cache,
    policy,
    logger,
    async stop() {
      if (apiServer) {
        const server = apiServer;
        apiServer = null;
        await new Promise<void>((resolve) => server.close(() => resolve()));
      }
      await dnsServer.stop();
      await shutdownOtelMetrics();
    },
  };
}
