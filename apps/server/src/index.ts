export { createApi, type ApiDependencies } from './api.js';
export { startApp, type RunningApp, type StartOptions } from './app.js';
export { createProgram, run } from './cli.js';
export * from './config.js';
export * from './dns-message.js';
export { DNSServer, type DNSServerOptions } from './dns-server.js';
export { DoHResolver, DoHTimeoutError, type DoHResolverOptions, type FetchLike } from './doh-resolver.js';
export { CacheFileError, ConfigError, UpstreamError } from './errors.js';
export { createLogger, createSilentLogger, Logger, type LoggerOptions, type LogLevel } from './logger.js';
export { QueryHandler, type LookupResult, type QueryHandlerOptions, type QueryStats } from './query-handler.js';
export { RecordCache, type CacheEntry, type RecordCacheOptions } from './record-cache.js';
export { RoutingPolicy } from './routing-policy.js';
export { createUdpExchange, type DnsExchange } from './udp-client.js';
export { UpstreamResolver, type AddressResolver, type UpstreamResolverOptions } from './upstream-resolver.js';
