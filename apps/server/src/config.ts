import { isIP, isIPv6 } from 'net';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LoggerOptions } from './logger.js';

export const DEFAULT_LISTEN_ADDRESS = ':5353';
export const DEFAULT_UPSTREAMS = '114.114.114.114:53,8.8.8.8:53';
export const DEFAULT_DNS_PORT = 53;

/** UDP chain used when a DoH lookup for a listed domain fails */
export const POLICY_UPSTREAMS: readonly string[] = ['8.8.8.8:53', '8.8.4.4:53', '1.1.1.1:53', '114.114.114.114:53'];

export interface DoHProvider {
  name: string;
  /** JSON API endpoint, queried with `?name=<fqdn>&type=A` */
  url: string;
}

export const DOH_PROVIDERS: readonly DoHProvider[] = [
  { name: 'quad9', url: 'https://dns.quad9.net:5053/dns-query' },
  { name: 'cloudflare', url: 'https://cloudflare-dns.com/dns-query' },
  { name: 'google', url: 'https://dns.google/resolve' },
];

export const DOH_TIMEOUT_MS = 10_000;
export const UDP_EXCHANGE_TIMEOUT_MS = 2_000;
export const UDP_BUFFER_SIZE = 65535;

export const DEBUG_ENV = 'SPLITDNS_DEBUG';

export interface Endpoint {
  host: string;
  port: number;
}

export interface ServerConfig {
  listen: Endpoint;
  pacPath: string;
  cachePath: string;
  upstreams: string[];
  apiPort: number;
  metricsPort: number;
  log: LoggerOptions;
}

const portSchema = z.union([z.string(), z.number()]).pipe(z.coerce.number().int().min(0).max(65535));

export const FlagsSchema = z.object({
  addr: z.string().default(DEFAULT_LISTEN_ADDRESS),
  pac: z.string().default(''),
  cache: z.string().default(''),
  upstreams: z.string().default(DEFAULT_UPSTREAMS),
  apiPort: portSchema.default(0),
  metricsPort: portSchema.default(0),
});

export type Flags = z.input<typeof FlagsSchema>;

function parsePort(value: string, source: string): number {
  const result = portSchema.safeParse(value);
  if (!/^\d+$/.test(value) || !result.success) {
    throw new ConfigError(`Invalid port in ${source}`);
  }
  return result.data;
}

/**
 * Split `host:port`, `[v6]:port`, `:port` or a bare host. A bare IPv6
 * literal is taken as a host without port.
 */
export function parseEndpoint(value: string, defaultPort: number = DEFAULT_DNS_PORT): Endpoint {
  const trimmed = value.trim();

  const bracketed = trimmed.match(/^\[([^\]]+)\](?::(\d*))?$/);
  if (bracketed) {
    const [, host, port] = bracketed;
    if (!isIPv6(host)) {
      throw new ConfigError(`Invalid IPv6 address: ${trimmed}`);
    }
    return { host, port: port ? parsePort(port, trimmed) : defaultPort };
  }

  if (isIPv6(trimmed)) {
    return { host: trimmed, port: defaultPort };
  }

  const separator = trimmed.lastIndexOf(':');
  if (separator === -1) {
    if (!trimmed) {
      throw new ConfigError('Empty address');
    }
    return { host: trimmed, port: defaultPort };
  }

  return {
    host: trimmed.slice(0, separator),
    port: parsePort(trimmed.slice(separator + 1), trimmed),
  };
}

/**
 * Comma-separated upstream list; entries are trimmed and empty ones dropped
 */
export function parseUpstreamList(value: string): string[] {
  const upstreams = value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  for (const upstream of upstreams) {
    const { host } = parseEndpoint(upstream);
    if (!host) {
      throw new ConfigError(`Upstream without host: ${upstream}`);
    }
  }

  return upstreams;
}

export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv): LoggerOptions {
  return {
    level: env[DEBUG_ENV] === '1' ? 'debug' : 'info',
    json: env.NODE_ENV === 'production' || env.LOG_FORMAT === 'json',
    color: Boolean(process.stdout.isTTY) && env.NO_COLOR === undefined && env.FORCE_COLOR !== '0',
  };
}

export function loadConfig(flags: Flags, env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = FlagsSchema.safeParse(flags);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const parsed = result.data;

  const listen = parseEndpoint(parsed.addr);
  if (listen.host && isIP(listen.host) === 0 && listen.host !== 'localhost') {
    throw new ConfigError(`Listen address must be an IP literal: ${parsed.addr}`);
  }

  const upstreams = parseUpstreamList(parsed.upstreams);
  if (upstreams.length === 0) {
    throw new ConfigError('At least one upstream is required');
  }

  return {
    listen,
    pacPath: parsed.pac,
    cachePath: parsed.cache,
    upstreams,
    apiPort: parsed.apiPort,
    metricsPort: parsed.metricsPort,
    log: loggerOptionsFromEnv(env),
  };
}
