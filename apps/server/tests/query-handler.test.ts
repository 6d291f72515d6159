import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  createDNSQuery,
  extractARecords,
  parseDNSMessage,
  RCODE_FORMERR,
  RCODE_NOERROR,
  RCODE_SERVFAIL,
} from '../src/dns-message.js';
import { DoHResolver } from '../src/doh-resolver.js';
import { CacheFileError } from '../src/errors.js';
import { createSilentLogger } from '../src/logger.js';
import { QueryHandler, type QueryHandlerOptions } from '../src/query-handler.js';
import { RecordCache } from '../src/record-cache.js';
import { RoutingPolicy } from '../src/routing-policy.js';
import { buildUpstreamReply, deferred, dohJsonResponse, makeTempDir } from './dns-test-helper.js';

const NON_POLICY_UPSTREAMS = ['192.0.2.20:53'];
const POLICY_UPSTREAMS = ['192.0.2.10:53'];

function fakeResolver(answer: (domain: string) => Promise<string[]> | string[] = () => []) {
  return { resolve: vi.fn(async (domain: string, _upstreams: readonly string[]) => answer(domain)) };
}

function createHandler(overrides: Partial<QueryHandlerOptions> = {}) {
  const logger = createSilentLogger();
  const cache = new RecordCache({ logger });
  const doh = fakeResolver(() => ['10.1.1.1']);
  const upstream = fakeResolver(() => ['10.2.2.2']);
  const options: QueryHandlerOptions = {
    logger,
    cache,
    policy: new RoutingPolicy(['example.com']),
    doh,
    upstream,
    nonPolicyUpstreams: NON_POLICY_UPSTREAMS,
    policyUpstreams: POLICY_UPSTREAMS,
    ...overrides,
  };
  return { handler: new QueryHandler(options), cache: options.cache, doh, upstream };
}

/**
 * Query whose question name is built from raw label bytes
 */
function rawQuery(labels: Buffer[], type: number, id: number): Buffer {
  const header = Buffer.alloc(12);
  header.writeUInt16BE(id, 0);
  header.writeUInt16BE(0x0100, 2);
  header.writeUInt16BE(1, 4);
  const tail = Buffer.alloc(4);
  tail.writeUInt16BE(type, 0);
  tail.writeUInt16BE(1, 2);
  return Buffer.concat([
    header,
    ...labels.flatMap((label) => [Buffer.from([label.length]), label]),
    Buffer.from([0]),
    tail,
  ]);
}

/**
 * RecordCache whose writes wait until `release` is called
 */
class GatedCache extends RecordCache {
  private readonly gate = deferred<void>();

  release(): void {
    this.gate.resolve();
  }

  override async set(domain: string, addresses: readonly string[]): Promise<void> {
    await this.gate.promise;
    await super.set(domain, addresses);
  }
}

describe('QueryHandler', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  describe('routing', () => {
    it('should resolve policy names over DoH with the policy fallback pool', async () => {
      const { handler, doh, upstream } = createHandler();

      expect(await handler.lookup('example.com.')).toEqual({ addresses: ['10.1.1.1'], source: 'doh' });
      expect(doh.resolve).toHaveBeenCalledWith('example.com.', POLICY_UPSTREAMS);
      expect(upstream.resolve).not.toHaveBeenCalled();
    });

    it('should resolve other names through the configured upstreams', async () => {
      const { handler, doh, upstream } = createHandler();

      expect(await handler.lookup('www.example.com.')).toEqual({ addresses: ['10.2.2.2'], source: 'upstream' });
      expect(upstream.resolve).toHaveBeenCalledWith('www.example.com.', NON_POLICY_UPSTREAMS);
      expect(doh.resolve).not.toHaveBeenCalled();
    });

    it('should send failed DoH lookups to the policy pool, not the configured upstreams', async () => {
      const logger = createSilentLogger();
      const udp = fakeResolver(() => ['10.9.9.9']);
      const doh = new DoHResolver({
        logger,
        fallback: udp,
        providers: [{ name: 'test', url: 'https://doh.test/dns-query' }],
        fetch: async () => dohJsonResponse({}, 502),
      });
      const { handler } = createHandler({ doh, upstream: udp });

      expect(await handler.lookup('example.com.')).toEqual({ addresses: ['10.9.9.9'], source: 'doh' });
      expect(udp.resolve).toHaveBeenCalledTimes(1);
      expect(udp.resolve).toHaveBeenCalledWith('example.com.', POLICY_UPSTREAMS);
    });
  });

  describe('cache', () => {
    it('should answer from the cache without asking any resolver', async () => {
      const { handler, cache, doh, upstream } = createHandler();
      await cache.set('example.com.', ['10.0.0.1']);

      expect(await handler.lookup('example.com.')).toEqual({ addresses: ['10.0.0.1'], source: 'cache' });
      expect(doh.resolve).not.toHaveBeenCalled();
      expect(upstream.resolve).not.toHaveBeenCalled();
      expect(handler.getStats()).toMatchObject({ cacheHits: 1, cacheMisses: 0 });
    });

    it('should store fresh results in the background', async () => {
      const cache = new GatedCache({ logger: createSilentLogger() });
      const { handler } = createHandler({ cache });

      expect(await handler.lookup('other.example.')).toEqual({ addresses: ['10.2.2.2'], source: 'upstream' });
      expect(handler.getStats().pendingWrites).toBe(1);
      expect(await cache.get('other.example.')).toBeUndefined();

      cache.release();
      await handler.drain();

      expect(handler.getStats().pendingWrites).toBe(0);
      expect(await cache.get('other.example.')).toEqual(['10.2.2.2']);
    });

    it('should serve a result from memory until its cache write lands', async () => {
      const cache = new GatedCache({ logger: createSilentLogger() });
      const upstream = fakeResolver(() => ['10.2.2.2']);
      const { handler } = createHandler({ cache, upstream });

      expect(await handler.lookup('other.example.')).toEqual({ addresses: ['10.2.2.2'], source: 'upstream' });
      expect(await handler.lookup('other.example.')).toEqual({ addresses: ['10.2.2.2'], source: 'cache' });
      expect(upstream.resolve).toHaveBeenCalledTimes(1);

      cache.release();
      await handler.drain();

      expect(await handler.lookup('other.example.')).toEqual({ addresses: ['10.2.2.2'], source: 'cache' });
      expect(upstream.resolve).toHaveBeenCalledTimes(1);
    });

    it('should not cache empty results', async () => {
      const upstream = fakeResolver(() => []);
      const { handler, cache } = createHandler({ upstream });

      expect(await handler.lookup('nothing.example.')).toEqual({ addresses: [], source: 'upstream' });
      await handler.drain();
      expect(await cache.size()).toBe(0);

      await handler.lookup('nothing.example.');
      expect(upstream.resolve).toHaveBeenCalledTimes(2);
    });

    it('should persist results to the cache file', async () => {
      const path = join(dir, 'cache.txt');
      const cache = new RecordCache({ logger: createSilentLogger(), persistPath: path });
      const { handler } = createHandler({ cache });

      await handler.lookup('other.example.');
      await handler.drain();

      expect(await readFile(path, 'utf8')).toBe('other.example. 10.2.2.2\n');
    });

    it('should report a cache file that cannot be written', async () => {
      const onPersistenceFailure = vi.fn();
      const cache = new RecordCache({ logger: createSilentLogger(), persistPath: join(dir, 'gone', 'cache.txt') });
      const { handler } = createHandler({ cache, onPersistenceFailure });

      expect(await handler.lookup('other.example.')).toEqual({ addresses: ['10.2.2.2'], source: 'upstream' });
      await handler.drain();

      expect(onPersistenceFailure).toHaveBeenCalledTimes(1);
      expect(onPersistenceFailure.mock.calls[0][0]).toBeInstanceOf(CacheFileError);
    });
  });

  describe('concurrency', () => {
    it('should share one resolution between concurrent misses on a name', async () => {
      const pending = deferred<string[]>();
      const upstream = fakeResolver(() => pending.promise);
      const { handler, cache } = createHandler({ upstream });

      const lookups = Array.from({ length: 10 }, () => handler.lookup('busy.example.'));
      await vi.waitFor(() => expect(upstream.resolve).toHaveBeenCalled());
      pending.resolve(['10.3.3.3']);

      const results = await Promise.all(lookups);
      expect(results.every((result) => result.addresses.join() === '10.3.3.3')).toBe(true);
      expect(upstream.resolve).toHaveBeenCalledTimes(1);
      expect(handler.getStats()).toMatchObject({ cacheMisses: 10, sharedLookups: 9 });

      await handler.drain();
      expect(await cache.get('busy.example.')).toEqual(['10.3.3.3']);
    });

    it('should keep every name correct under many concurrent lookups', async () => {
      const path = join(dir, 'cache.txt');
      const cache = new RecordCache({ logger: createSilentLogger(), persistPath: path });
      const upstream = fakeResolver((domain) => [`10.4.0.${Number(domain.slice(1, domain.indexOf('.')))}`]);
      const { handler } = createHandler({ cache, upstream });
      const names = Array.from({ length: 40 }, (_, i) => `n${i}.example.`);

      const results = await Promise.all([...names, ...names].map((name) => handler.lookup(name)));
      await handler.drain();

      results.forEach((result, i) => {
        expect(result.addresses).toEqual([`10.4.0.${i % names.length}`]);
      });
      for (const [i, name] of names.entries()) {
        expect(await cache.get(name)).toEqual([`10.4.0.${i}`]);
      }

      const reloaded = new RecordCache({ logger: createSilentLogger() });
      expect(await reloaded.loadFrom(path)).toBe(names.length);
    });
  });

  describe('handleDNSQuery', () => {
    it('should answer an A query with the resolved addresses', async () => {
      const { handler } = createHandler({ upstream: fakeResolver(() => ['10.0.0.1', '10.0.0.2']) });

      const reply = await handler.handleDNSQuery(createDNSQuery('www.test.', 1, 0x4242));
      expect(reply).not.toBeNull();
      const message = parseDNSMessage(reply ?? Buffer.alloc(0));

      expect(message.header).toMatchObject({ id: 0x4242, qr: true, rd: true, rcode: RCODE_NOERROR });
      expect(message.questions).toEqual([{ name: 'www.test.', type: 1, class: 1 }]);
      expect(extractARecords(message)).toEqual(['10.0.0.1', '10.0.0.2']);
      expect(message.answers.map((answer) => answer.ttl)).toEqual([3600, 3600]);
    });

    it('should answer a name with no records with an empty NOERROR reply', async () => {
      const { handler } = createHandler({ upstream: fakeResolver(() => []) });

      const message = parseDNSMessage((await handler.handleDNSQuery(createDNSQuery('none.test.', 1, 7))) ?? Buffer.alloc(0));
      expect(message.header.rcode).toBe(RCODE_NOERROR);
      expect(message.answers).toEqual([]);
      expect(handler.getStats().emptyAnswers).toBe(1);
    });

    it('should answer other query types with no records and no lookup', async () => {
      const { handler, doh, upstream } = createHandler();

      const message = parseDNSMessage((await handler.handleDNSQuery(createDNSQuery('example.com', 28, 9))) ?? Buffer.alloc(0));
      expect(message.header.rcode).toBe(RCODE_NOERROR);
      expect(message.questions).toEqual([{ name: 'example.com.', type: 28, class: 1 }]);
      expect(message.answers).toEqual([]);
      expect(doh.resolve).not.toHaveBeenCalled();
      expect(upstream.resolve).not.toHaveBeenCalled();
    });

    it('should drop messages that are too short or are responses', async () => {
      const { handler } = createHandler();

      expect(await handler.handleDNSQuery(Buffer.from([0x00, 0x01, 0x01]))).toBeNull();
      expect(await handler.handleDNSQuery(buildUpstreamReply(createDNSQuery('example.com', 1, 5), ['10.0.0.1']))).toBeNull();
    });

    it('should reply FORMERR to a truncated question', async () => {
      const { handler } = createHandler();
      const query = createDNSQuery('example.com', 1, 11);

      const reply = await handler.handleDNSQuery(query.subarray(0, query.length - 3));
      const message = parseDNSMessage(reply ?? Buffer.alloc(0));
      expect(message.header).toMatchObject({ id: 11, qr: true, rcode: RCODE_FORMERR, qdcount: 0 });
    });

    it('should reply FORMERR to a query without a question', async () => {
      const { handler } = createHandler();
      const query = Buffer.from(createDNSQuery('example.com', 1, 14).subarray(0, 12));
      query.writeUInt16BE(0, 4);

      const message = parseDNSMessage((await handler.handleDNSQuery(query)) ?? Buffer.alloc(0));
      expect(message.header).toMatchObject({ id: 14, qr: true, rcode: RCODE_FORMERR, qdcount: 0 });
    });

    it('should echo names with non-ASCII label bytes unchanged', async () => {
      const { handler, upstream } = createHandler();
      const labels = [Buffer.alloc(40, 0xff), Buffer.from('com')];

      const query = rawQuery(labels, 28, 15);
      const reply = await handler.handleDNSQuery(query);
      expect(reply).not.toBeNull();
      const message = parseDNSMessage(reply ?? Buffer.alloc(0));
      expect(message.header).toMatchObject({ id: 15, rcode: RCODE_NOERROR });
      expect((reply ?? Buffer.alloc(0)).subarray(12)).toEqual(query.subarray(12));

      const aReply = parseDNSMessage((await handler.handleDNSQuery(rawQuery(labels, 1, 16))) ?? Buffer.alloc(0));
      expect(aReply.header.rcode).toBe(RCODE_NOERROR);
      expect(extractARecords(aReply)).toEqual(['10.2.2.2']);
      expect(upstream.resolve).toHaveBeenCalledWith(`${'\xff'.repeat(40)}.com.`, NON_POLICY_UPSTREAMS);
    });

    it('should reply NOTIMP to opcodes other than QUERY', async () => {
      const { handler } = createHandler();
      const query = createDNSQuery('example.com', 1, 12);
      // opcode 2 (STATUS)
      query.writeUInt16BE(0x1100, 2);

      const message = parseDNSMessage((await handler.handleDNSQuery(query)) ?? Buffer.alloc(0));
      expect(message.header).toMatchObject({ id: 12, opcode: 2, rcode: 4 });
    });

    it('should reply SERVFAIL when resolution throws', async () => {
      const upstream = fakeResolver(() => Promise.reject(new Error('boom')));
      const { handler } = createHandler({ upstream });

      const message = parseDNSMessage((await handler.handleDNSQuery(createDNSQuery('fail.test.', 1, 13))) ?? Buffer.alloc(0));
      expect(message.header.rcode).toBe(RCODE_SERVFAIL);
      expect(message.questions).toEqual([{ name: 'fail.test.', type: 1, class: 1 }]);
      expect(handler.getStats().errors).toBe(1);
    });
  });

  describe('end to end', () => {
    it('should resolve a listed domain over DoH and write it to the cache file', async () => {
      const pacPath = join(dir, 'pac.txt');
      const cachePath = join(dir, 'cache.txt');
      await writeFile(pacPath, 'example.com\n');

      const logger = createSilentLogger();
      const cache = new RecordCache({ logger, persistPath: cachePath });
      await cache.loadFrom(cachePath);
      const udp = fakeResolver(() => ['10.9.9.9']);
      const doh = new DoHResolver({
        logger,
        fallback: udp,
        providers: [{ name: 'test', url: 'https://doh.test/dns-query' }],
        fetch: async () =>
          dohJsonResponse({ Status: 0, Answer: [{ name: 'example.com.', type: 1, TTL: 60, data: '93.184.216.34' }] }),
      });
      const handler = new QueryHandler({
        logger,
        cache,
        policy: await RoutingPolicy.loadFrom(pacPath, logger),
        doh,
        upstream: udp,
        nonPolicyUpstreams: NON_POLICY_UPSTREAMS,
      });

      const reply = await handler.handleDNSQuery(createDNSQuery('example.com', 1, 42));
      const message = parseDNSMessage(reply ?? Buffer.alloc(0));
      expect(extractARecords(message)).toEqual(['93.184.216.34']);
      expect(udp.resolve).not.toHaveBeenCalled();

      await handler.drain();
      expect(await readFile(cachePath, 'utf8')).toBe('example.com. 93.184.216.34\n');
    });

    it('should answer from a loaded cache file without any network lookup', async () => {
      const cachePath = join(dir, 'cache.txt');
      await writeFile(cachePath, 'test.local. 10.0.0.1\n');

      const logger = createSilentLogger();
      const cache = new RecordCache({ logger, persistPath: cachePath });
      await cache.loadFrom(cachePath);
      const { handler, doh, upstream } = createHandler({ cache, policy: new RoutingPolicy() });

      const message = parseDNSMessage((await handler.handleDNSQuery(createDNSQuery('test.local', 1, 1))) ?? Buffer.alloc(0));
      expect(extractARecords(message)).toEqual(['10.0.0.1']);
      expect(doh.resolve).not.toHaveBeenCalled();
      expect(upstream.resolve).not.toHaveBeenCalled();
    });
  });
});
