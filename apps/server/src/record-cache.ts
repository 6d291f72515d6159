import { readFile, writeFile } from 'fs/promises';
import { toFqdn } from './dns-message.js';
import { CacheFileError, isNotFoundError } from './errors.js';
import type { Logger } from './logger.js';
import { Mutex } from './mutex.js';
import { recordCacheMetrics } from './otel-metrics.js';

export interface RecordCacheOptions {
  logger: Logger;
  /** When set, every successful `set` rewrites this file */
  persistPath?: string;
}

export interface CacheEntry {
  domain: string;
  addresses: string[];
}

/**
 * FQDN -> IPv4 address list. Entries never expire; they are replaced by the
 * next successful resolution of the same name.
 *
 * All access to the map, including persistence, goes through one mutex.
 */
export class RecordCache {
  private records: Map<string, string[]> = new Map();
  private readonly mutex = new Mutex();
  private readonly logger: Logger;
  private readonly persistPath: string | undefined;

  constructor(options: RecordCacheOptions) {
    this.logger = options.logger;
    this.persistPath = options.persistPath || undefined;
  }

  async get(domain: string): Promise<string[] | undefined> {
    return this.mutex.runExclusive(() => {
      const addresses = this.records.get(domain);
      return addresses ? [...addresses] : undefined;
    });
  }

  /**
   * Store a resolution result. Empty lists are ignored so a failed lookup never
   * replaces a good entry.
   */
  async set(domain: string, addresses: readonly string[]): Promise<void> {
    if (addresses.length === 0) {
      return;
    }

    await this.mutex.runExclusive(async () => {
      this.records.set(domain, [...addresses]);
      recordCacheMetrics('set');
      if (this.persistPath) {
        await this.write(this.persistPath);
      }
    });
  }

  async loadFrom(path: string): Promise<number> {
    return this.mutex.runExclusive(async () => {
      let content: string;
      try {
        content = await readFile(path, 'utf8');
      } catch (error) {
        if (!isNotFoundError(error)) {
          throw new CacheFileError(`Failed to read cache file ${path}`, path, { cause: error });
        }
        this.logger.info('Cache file not found, creating a new one', { path });
        try {
          await writeFile(path, '', 'utf8');
        } catch (createError) {
          throw new CacheFileError(`Failed to create cache file ${path}`, path, { cause: createError });
        }
        return 0;
      }

      const lines = content.split('\n');
      if (lines[lines.length - 1] === '') {
        lines.pop();
      }

      let loaded = 0;
      for (const line of lines) {
        const parts = line.trim().split(/\s+/).filter((part) => part.length > 0);
        if (parts.length < 2) {
          this.logger.warn('Skipping invalid line in cache file', { path, line });
          continue;
        }
        const [domain, ...addresses] = parts;
        this.records.set(toFqdn(domain), addresses);
        loaded++;
      }

      this.logger.info('Cache loaded', { path, entries: loaded });
      return loaded;
    });
  }

  async saveTo(path: string): Promise<void> {
    await this.mutex.runExclusive(() => this.write(path));
  }

  async size(): Promise<number> {
    return this.mutex.runExclusive(() => this.records.size);
  }

  async entries(): Promise<CacheEntry[]> {
    return this.mutex.runExclusive(() =>
      Array.from(this.records.entries(), ([domain, addresses]) => ({ domain, addresses: [...addresses] })),
    );
  }

  /**
   * Full rewrite of the backing file. Caller must hold the mutex.
   */
  private async write(path: string): Promise<void> {
    let content = '';
    for (const [domain, addresses] of this.records) {
      content += `${domain} ${addresses.join(' ')}\n`;
    }

    try {
      await writeFile(path, content, 'utf8');
    } catch (error) {
      throw new CacheFileError(`Failed to write cache file ${path}`, path, { cause: error });
    }
    this.logger.debug('Cache persisted', { path, entries: this.records.size });
  }
}
