import { POLICY_UPSTREAMS } from './config.js';
import {
  createDNSReply,
  DNS_TYPE_A,
  MalformedMessageError,
  OPCODE_QUERY,
  parseDNSMessage,
  parseHeader,
  RCODE_FORMERR,
  RCODE_SERVFAIL,
  toFqdn,
  type DNSHeader,
  type DNSMessage,
  type DNSQuestion,
} from './dns-message.js';
import { CacheFileError } from './errors.js';
import type { Logger } from './logger.js';
import { toError } from './logger.js';
import { recordCacheMetrics, recordDNSQuery } from './otel-metrics.js';
import type { RecordCache } from './record-cache.js';
import type { RoutingPolicy } from './routing-policy.js';
import { SingleFlight } from './single-flight.js';
import type { AddressResolver } from './upstream-resolver.js';

const RCODE_NOTIMP = 4;

export type AnswerSource = 'cache' | 'doh' | 'upstream';

export interface LookupResult {
  addresses: string[];
  source: AnswerSource;
}

export interface QueryHandlerOptions {
  logger: Logger;
  cache: RecordCache;
  policy: RoutingPolicy;
  doh: AddressResolver;
  upstream: AddressResolver;
  /** Operator-configured chain for names outside the policy */
  nonPolicyUpstreams: readonly string[];
  /** Fallback chain for failed DoH lookups */
  policyUpstreams?: readonly string[];
  /** Called when a background cache write cannot persist the cache file */
  onPersistenceFailure?: (error: CacheFileError) => void;
}

export interface QueryStats {
  queries: number;
  cacheHits: number;
  cacheMisses: number;
  dohResolutions: number;
  upstreamResolutions: number;
  sharedLookups: number;
  emptyAnswers: number;
  errors: number;
  pendingWrites: number;
}

/**
 * Answers A questions from the cache, or resolves them over DoH (names in the
 * policy) or the upstream chain (everything else). Fresh results are written
 * back to the cache in the background.
 */
export class QueryHandler {
  private readonly logger: Logger;
  private readonly cache: RecordCache;
  private readonly policy: RoutingPolicy;
  private readonly doh: AddressResolver;
  private readonly upstream: AddressResolver;
  private readonly nonPolicyUpstreams: readonly string[];
  private readonly policyUpstreams: readonly string[];
  private readonly onPersistenceFailure: (error: CacheFileError) => void;
  private readonly flights = new SingleFlight<LookupResult>();
  private readonly pendingWrites: Set<Promise<void>> = new Set();
  /** Results whose cache write has not landed yet, served like cache entries */
  private readonly unwritten: Map<string, readonly string[]> = new Map();
  private stats: Omit<QueryStats, 'pendingWrites'> = {
    queries: 0,
    cacheHits: 0,
    cacheMisses: 0,
    dohResolutions: 0,
    upstreamResolutions: 0,
    sharedLookups: 0,
    emptyAnswers: 0,
    errors: 0,
  };

  constructor(options: QueryHandlerOptions) {
    this.logger = options.logger;
    this.cache = options.cache;
    this.policy = options.policy;
    this.doh = options.doh;
    this.upstream = options.upstream;
    this.nonPolicyUpstreams = options.nonPolicyUpstreams;
    this.policyUpstreams = options.policyUpstreams ?? POLICY_UPSTREAMS;
    this.onPersistenceFailure = options.onPersistenceFailure ?? (() => {});
  }

  /**
   * Decode a query and build the reply. Returns null for messages that get no
   * reply at all (too short for a header, or not a query).
   */
  async handleDNSQuery(msg: Buffer): Promise<Buffer | null> {
    let header: DNSHeader;
    try {
      header = parseHeader(msg);
    } catch (error) {
      this.logger.debug('Dropping malformed message', { length: msg.length, error: toError(error) });
      return null;
    }

    if (header.qr) {
      this.logger.debug('Dropping response message', { id: header.id });
      return null;
    }

    if (header.opcode !== OPCODE_QUERY) {
      return createDNSReply(header, [], [], RCODE_NOTIMP);
    }

    let message: DNSMessage;
    try {
      message = parseDNSMessage(msg);
    } catch (error) {
      if (error instanceof MalformedMessageError) {
        this.logger.debug('Malformed question section', { id: header.id, error });
        return createDNSReply(header, [], [], RCODE_FORMERR);
      }
      throw error;
    }

    // Only the first question is answered; it is the only one echoed back
    const question = message.questions[0];
    if (!question) {
      this.logger.debug('Query without a question', { id: header.id });
      return createDNSReply(header, [], [], RCODE_FORMERR);
    }

    this.stats.queries++;
    this.logger.debug('Query', { domain: question.name, type: question.type });

    try {
      if (question.type !== DNS_TYPE_A) {
        recordDNSQuery({ type: `TYPE${question.type}`, source: 'none', answers: 0 });
        return createDNSReply(header, [question]);
      }

      const { addresses, source } = await this.lookup(question.name);
      if (addresses.length === 0) {
        this.stats.emptyAnswers++;
      }
      recordDNSQuery({ type: 'A', source, answers: addresses.length });
      return createDNSReply(
        header,
        [question],
        addresses.map((address) => ({ name: question.name, address })),
      );
    } catch (error) {
      this.stats.errors++;
      this.logger.error('Error resolving query', { domain: question.name, error: toError(error) });
      return this.serverFailure(header, question);
    }
  }

  /**
   * Addresses for `domain`: from the cache (including results still being
   * written to it), or from one shared resolution when several callers miss on
   * the same name at once.
   */
  async lookup(domain: string): Promise<LookupResult> {
    const name = toFqdn(domain);

    const cached = this.unwritten.get(name) ?? (await this.cache.get(name));
    if (cached) {
      this.stats.cacheHits++;
      recordCacheMetrics('hit');
      this.logger.debug('Cache hit', { domain: name, addresses: cached });
      return { addresses: [...cached], source: 'cache' };
    }

    this.stats.cacheMisses++;
    recordCacheMetrics('miss');

    const { value, shared } = await this.flights.do(name, () => this.resolveAndStore(name));
    if (shared) {
      this.stats.sharedLookups++;
    }
    return { addresses: [...value.addresses], source: value.source };
  }

  /**
   * Wait for every scheduled cache write to finish
   */
  async drain(): Promise<void> {
    while (this.pendingWrites.size > 0) {
      await Promise.all(this.pendingWrites);
    }
  }

  getStats(): QueryStats {
    return { ...this.stats, pendingWrites: this.pendingWrites.size };
  }

  private serverFailure(header: DNSHeader, question: DNSQuestion): Buffer {
    try {
      return createDNSReply(header, [question], [], RCODE_SERVFAIL);
    } catch (error) {
      // The question cannot be encoded again; answer without echoing it
      this.logger.debug('Replying without the question', { id: header.id, error: toError(error) });
      return createDNSReply(header, [], [], RCODE_SERVFAIL);
    }
  }

  private async resolveAndStore(name: string): Promise<LookupResult> {
    let result: LookupResult;
    if (this.policy.matches(name)) {
      this.stats.dohResolutions++;
      this.logger.debug('Policy match, resolving over DoH', { domain: name });
      result = { addresses: await this.doh.resolve(name, this.policyUpstreams), source: 'doh' };
    } else {
      this.stats.upstreamResolutions++;
      result = { addresses: await this.upstream.resolve(name, this.nonPolicyUpstreams), source: 'upstream' };
    }

    if (result.addresses.length > 0) {
      this.scheduleCacheUpdate(name, result.addresses);
    } else {
      this.logger.debug('No records found', { domain: name });
    }
    return result;
  }

  private scheduleCacheUpdate(name: string, addresses: readonly string[]): void {
    this.unwritten.set(name, addresses);
    const write: Promise<void> = this.cache
      .set(name, addresses)
      .catch((error: unknown) => {
        if (error instanceof CacheFileError) {
          this.logger.error('Failed to persist cache', { path: error.path, error });
          this.onPersistenceFailure(error);
          return;
        }
        this.logger.error('Failed to update cache', { domain: name, error: toError(error) });
      })
      .finally(() => {
        if (this.unwritten.get(name) === addresses) {
          this.unwritten.delete(name);
        }
        this.pendingWrites.delete(write);
      });
    this.pendingWrites.add(write);
  }
}
