import { Hono } from 'hono';
import { z } from 'zod';
import { toFqdn } from './dns-message.js';
import type { DoHProviderStats } from './doh-resolver.js';
import { handleError } from './error-handler.js';
import type { Logger } from './logger.js';
import type { QueryHandler } from './query-handler.js';
import type { RecordCache } from './record-cache.js';
import type { RoutingPolicy } from './routing-policy.js';

export interface ApiDependencies {
  handler: QueryHandler;
  cache: RecordCache;
  policy: RoutingPolicy;
  logger: Logger;
  dohProviders?: () => DoHProviderStats[];
  startTime?: number;
}

const DOMAIN_REQUIRED = 'Domain is required';

function hasValidLabels(domain: string): boolean {
  const labels = (domain.endsWith('.') ? domain.slice(0, -1) : domain).split('.');
  return labels.every((label) => label.length > 0 && label.length <= 63 && !/[^\x00-\xff]/.test(label));
}

const TestQuerySchema = z.object({
  domain: z
    .string({ required_error: DOMAIN_REQUIRED, invalid_type_error: DOMAIN_REQUIRED })
    .trim()
    .min(1, DOMAIN_REQUIRED)
    .max(253, 'Domain name is longer than 253 characters')
    .refine(hasValidLabels, 'Domain labels must be 1 to 63 characters'),
});

/**
 * Read-only status API: health, counters, cache contents and policy list,
 * plus a test endpoint that runs a lookup through the normal path.
 */
export function createApi(deps: ApiDependencies): Hono {
  const app = new Hono();
  const startTime = deps.startTime ?? Date.now();

  app.onError((error, c) => handleError(c, error, deps.logger));

  app.get('/health', (c) => {
    return c.json({ status: 'ok', uptime: Math.floor((Date.now() - startTime) / 1000) });
  });

  app.get('/api/stats', async (c) => {
    return c.json({
      ...deps.handler.getStats(),
      cacheSize: await deps.cache.size(),
      policySize: deps.policy.size,
      dohProviders: deps.dohProviders?.() ?? [],
    });
  });

  app.get('/api/cache', async (c) => {
    return c.json({ entries: await deps.cache.entries() });
  });

  app.get('/api/cache/:domain', async (c) => {
    const domain = toFqdn(c.req.param('domain'));
    const addresses = await deps.cache.get(domain);
    if (!addresses) {
      return c.json({ error: 'Not found' }, 404);
    }
    return c.json({ domain, addresses });
  });

  app.get('/api/policy', (c) => {
    return c.json({ domains: deps.policy.domains() });
  });

  app.post('/api/dns/test', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = TestQuerySchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues.find((entry) => entry.path[0] === 'domain');
      return c.json({ error: issue?.message ?? DOMAIN_REQUIRED }, 400);
    }

    const domain = toFqdn(parsed.data.domain);
    const result = await deps.handler.lookup(domain);
    return c.json({ domain, ...result });
  });

  return app;
}
