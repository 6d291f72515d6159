import { isIPv4 } from 'net';
import { z } from 'zod';
import { DOH_PROVIDERS, DOH_TIMEOUT_MS, type DoHProvider } from './config.js';
import { DNS_TYPE_A, RCODE_NOERROR } from './dns-message.js';
import { UpstreamError } from './errors.js';
import type { Logger } from './logger.js';
import { toError } from './logger.js';
import { recordUpstreamMetrics } from './otel-metrics.js';
import type { AddressResolver } from './upstream-resolver.js';

const RCODE_NXDOMAIN = 3;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

// application/dns-json, as served by Google, Cloudflare and Quad9
const DoHAnswerSchema = z.object({
  name: z.string(),
  type: z.number(),
  TTL: z.number().optional(),
  data: z.string(),
});

const DoHResponseSchema = z.object({
  Status: z.number(),
  Answer: z.array(DoHAnswerSchema).optional(),
});

export type DoHResponse = z.infer<typeof DoHResponseSchema>;

export class DoHTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`DoH query timeout after ${timeoutMs}ms`);
    this.name = 'DoHTimeoutError';
  }
}

export interface DoHResolverOptions {
  logger: Logger;
  /** Used with the caller's upstream list when every provider fails */
  fallback: AddressResolver;
  providers?: readonly DoHProvider[];
  fetch?: FetchLike;
  timeoutMs?: number;
}

export interface DoHProviderStats {
  name: string;
  wins: number;
  failures: number;
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/**
 * DNS-over-HTTPS resolver. All providers are asked at once and the first good
 * answer wins; the rest are cancelled.
 */
export class DoHResolver implements AddressResolver {
  private readonly logger: Logger;
  private readonly fallback: AddressResolver;
  private readonly providers: readonly DoHProvider[];
  private readonly fetch: FetchLike;
  private readonly timeoutMs: number;
  private readonly stats: Map<string, DoHProviderStats> = new Map();

  constructor(options: DoHResolverOptions) {
    this.logger = options.logger;
    this.fallback = options.fallback;
    this.providers = options.providers ?? DOH_PROVIDERS;
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? DOH_TIMEOUT_MS;

    for (const provider of this.providers) {
      this.stats.set(provider.name, { name: provider.name, wins: 0, failures: 0 });
    }
  }

  async resolve(domain: string, fallbackUpstreams: readonly string[]): Promise<string[]> {
    try {
      const addresses = await this.queryProviders(domain);
      this.logger.debug('DoH answered', { domain, addresses });
      return addresses;
    } catch (error) {
      this.logger.debug('DoH query failed, falling back to UDP', { domain, error: toError(error) });
      return this.fallback.resolve(domain, fallbackUpstreams);
    }
  }

  getProviderStats(): DoHProviderStats[] {
    return Array.from(this.stats.values(), (entry) => ({ ...entry }));
  }

  private async queryProviders(domain: string): Promise<string[]> {
    if (this.providers.length === 0) {
      throw new Error('No DoH providers configured');
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort(new DoHTimeoutError(this.timeoutMs));
    }, this.timeoutMs);

    try {
      return await Promise.race([
        Promise.any(this.providers.map((provider) => this.queryProvider(provider, domain, controller.signal))),
        rejectOnAbort(controller.signal),
      ]);
    } finally {
      clearTimeout(timeout);
      // Cancel the providers that lost the race
      controller.abort();
    }
  }

  private async queryProvider(provider: DoHProvider, domain: string, signal: AbortSignal): Promise<string[]> {
    const startTime = Date.now();
    const stats = this.stats.get(provider.name);

    try {
      const url = new URL(provider.url);
      url.searchParams.set('name', domain);
      url.searchParams.set('type', 'A');

      const response = await this.fetch(url.toString(), {
        method: 'GET',
        headers: { Accept: 'application/dns-json' },
        signal,
      });

      if (!response.ok) {
        throw new UpstreamError(`DoH request failed: ${response.status} ${response.statusText}`, provider.name);
      }

      const parsed = DoHResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new UpstreamError(`Unexpected DoH response: ${parsed.error.message}`, provider.name);
      }

      const { Status, Answer } = parsed.data;
      if (Status !== RCODE_NOERROR && Status !== RCODE_NXDOMAIN) {
        throw new UpstreamError(`DoH provider returned rcode ${Status}`, provider.name);
      }

      const addresses = (Answer ?? [])
        .filter((answer) => answer.type === DNS_TYPE_A && isIPv4(answer.data))
        .map((answer) => answer.data);

      if (stats && !signal.aborted) stats.wins++;
      recordUpstreamMetrics({ upstream: provider.name, protocol: 'doh', success: true, responseTime: Date.now() - startTime });
      return addresses;
    } catch (error) {
      // Losing providers are aborted once a winner is in; that is not a failure
      if (!signal.aborted || signal.reason instanceof DoHTimeoutError) {
        if (stats) stats.failures++;
        recordUpstreamMetrics({ upstream: provider.name, protocol: 'doh', success: false });
        this.logger.debug('DoH provider failed', { provider: provider.name, domain, error: toError(error) });
      }
      throw error;
    }
  }
}
