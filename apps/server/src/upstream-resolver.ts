import { parseEndpoint } from './config.js';
import { createDNSQuery, DNS_TYPE_A, extractARecords, parseDNSMessage, type DNSMessage } from './dns-message.js';
import { UpstreamError } from './errors.js';
import type { Logger } from './logger.js';
import { toError } from './logger.js';
import { recordUpstreamMetrics } from './otel-metrics.js';
import { createUdpExchange, type DnsExchange } from './udp-client.js';

/**
 * Resolves a name to IPv4 addresses. `upstreams` is the UDP chain to use,
 * either directly or as the fallback when another transport fails.
 */
export interface AddressResolver {
  resolve(domain: string, upstreams: readonly string[]): Promise<string[]>;
}

export interface UpstreamResolverOptions {
  logger: Logger;
  exchange?: DnsExchange;
}

/**
 * Plain-UDP resolver that walks an ordered upstream list.
 *
 * The first upstream that returns a well-formed reply ends the walk, even when
 * that reply has no A records: an empty answer is an answer.
 */
export class UpstreamResolver implements AddressResolver {
  private readonly logger: Logger;
  private readonly exchange: DnsExchange;

  constructor(options: UpstreamResolverOptions) {
    this.logger = options.logger;
    this.exchange = options.exchange ?? createUdpExchange();
  }

  async resolve(domain: string, upstreams: readonly string[]): Promise<string[]> {
    if (upstreams.length === 0) {
      this.logger.warn('No upstreams configured', { domain });
      return [];
    }

    const query = createDNSQuery(domain, DNS_TYPE_A);

    for (const [index, upstream] of upstreams.entries()) {
      let reply: DNSMessage;
      try {
        reply = await this.query(query, upstream);
      } catch (error) {
        if (index === upstreams.length - 1) {
          this.logger.warn('Error querying from upstreams', { domain, upstream, error: toError(error) });
          return [];
        }
        this.logger.debug('Upstream failed, trying next', { domain, upstream, error: toError(error) });
        continue;
      }

      const addresses = extractARecords(reply);
      this.logger.debug('Upstream answered', { domain, upstream, addresses });
      return addresses;
    }

    return [];
  }

  /**
   * One exchange with one upstream. Resolves only on transport success: a
   * reply that decodes and belongs to `query`.
   */
  private async query(query: Buffer, upstream: string): Promise<DNSMessage> {
    const startTime = Date.now();
    try {
      const response = await this.exchange(query, parseEndpoint(upstream));
      const reply = parseDNSMessage(response);

      if (!reply.header.qr) {
        throw new UpstreamError('Upstream sent a query instead of a reply', upstream);
      }
      if (reply.header.id !== query.readUInt16BE(0)) {
        throw new UpstreamError('Reply id does not match query id', upstream);
      }

      recordUpstreamMetrics({ upstream, protocol: 'udp', success: true, responseTime: Date.now() - startTime });
      return reply;
    } catch (error) {
      recordUpstreamMetrics({ upstream, protocol: 'udp', success: false, responseTime: Date.now() - startTime });
      throw error;
    }
  }
}
