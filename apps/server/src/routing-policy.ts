import { readFile } from 'fs/promises';
import { toFqdn } from './dns-message.js';
import { isNotFoundError } from './errors.js';
import type { Logger } from './logger.js';
import { toError } from './logger.js';

/**
 * Domains that are resolved over DoH. Exact matches only: listing
 * `example.com` does not cover `www.example.com`.
 */
export class RoutingPolicy {
  private readonly rules: ReadonlySet<string>;

  constructor(domains: Iterable<string> = []) {
    const rules = new Set<string>();
    for (const domain of domains) {
      const trimmed = domain.trim();
      if (trimmed) {
        rules.add(toFqdn(trimmed));
      }
    }
    this.rules = rules;
  }

  static async loadFrom(path: string, logger: Logger): Promise<RoutingPolicy> {
    if (!path) {
      return new RoutingPolicy();
    }

    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      if (isNotFoundError(error)) {
        logger.info('Policy file not found, all queries use the upstream chain', { path });
      } else {
        logger.warn('Failed to read policy file, all queries use the upstream chain', {
          path,
          error: toError(error),
        });
      }
      return new RoutingPolicy();
    }

    const policy = new RoutingPolicy(content.split('\n'));
    logger.info('Policy loaded', { path, domains: policy.size });
    logger.debug('Policy rules', { domains: policy.domains() });
    return policy;
  }

  matches(domain: string): boolean {
    return this.rules.has(toFqdn(domain));
  }

  get size(): number {
    return this.rules.size;
  }

  domains(): string[] {
    return Array.from(this.rules).sort();
  }
}
