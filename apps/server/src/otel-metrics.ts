import { metrics, type Counter, type Histogram, type Meter } from '@opentelemetry/api';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { MeterProvider } from '@opentelemetry/sdk-metrics';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import type { Logger } from './logger.js';
import { toError } from './logger.js';

export interface MetricsConfig {
  enabled: boolean;
  prometheusPort: number;
}

const SERVICE_NAME = 'splitdns';
const SERVICE_VERSION = '0.1.0';

interface Instruments {
  queries: Counter;
  cacheOperations: Counter;
  upstreamQueries: Counter;
  upstreamErrors: Counter;
  upstreamResponseTime: Histogram;
}

let meterProvider: MeterProvider | null = null;
let instruments: Instruments | null = null;
let metricsLogger: Logger | null = null;

function createInstruments(meter: Meter): Instruments {
  return {
    queries: meter.createCounter('dns.queries', {
      description: 'DNS questions answered, by type and source',
    }),
    cacheOperations: meter.createCounter('dns.cache.operations', {
      description: 'DNS cache operations',
    }),
    upstreamQueries: meter.createCounter('dns.upstream.queries', {
      description: 'Queries sent to upstream resolvers',
    }),
    upstreamErrors: meter.createCounter('dns.upstream.errors', {
      description: 'Upstream queries that failed',
    }),
    upstreamResponseTime: meter.createHistogram('dns.upstream.response_time', {
      description: 'Upstream response time',
      unit: 'ms',
    }),
  };
}

/**
 * Start the Prometheus exporter. Recording functions are no-ops until this
 * has been called with `enabled: true`.
 */
export function initializeOtelMetrics(config: MetricsConfig, logger: Logger): void {
  if (!config.enabled || meterProvider) {
    return;
  }
  metricsLogger = logger;

  const exporter = new PrometheusExporter({ port: config.prometheusPort }, (error) => {
    if (error) {
      logger.error('Failed to start Prometheus exporter', { error: toError(error), port: config.prometheusPort });
    } else {
      logger.info('Prometheus metrics endpoint running', { port: config.prometheusPort, path: '/metrics' });
    }
  });

  meterProvider = new MeterProvider({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: SERVICE_NAME,
      [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
    }),
    readers: [exporter],
  });
  metrics.setGlobalMeterProvider(meterProvider);
  instruments = createInstruments(meterProvider.getMeter(SERVICE_NAME, SERVICE_VERSION));
}

export async function shutdownOtelMetrics(): Promise<void> {
  if (!meterProvider) return;
  const provider = meterProvider;
  meterProvider = null;
  instruments = null;
  metrics.disable();
  await provider.shutdown();
}

function record(name: string, fn: (active: Instruments) => void): void {
  if (!instruments) return;
  try {
    fn(instruments);
  } catch (error) {
    metricsLogger?.error('Error recording metric', { error: toError(error), metric: name });
  }
}

export function recordDNSQuery(attributes: { type: string; source: 'cache' | 'doh' | 'upstream' | 'none'; answers: number }): void {
  record('dns.queries', (active) => {
    active.queries.add(1, {
      'dns.query.type': attributes.type,
      'dns.answer.source': attributes.source,
      'dns.answer.empty': attributes.answers === 0,
    });
  });
}

export function recordCacheMetrics(operation: 'hit' | 'miss' | 'set'): void {
  record('dns.cache.operations', (active) => {
    active.cacheOperations.add(1, { 'cache.operation': operation });
  });
}

export function recordUpstreamMetrics(attributes: {
  upstream: string;
  protocol: 'udp' | 'doh';
  success: boolean;
  responseTime?: number;
}): void {
  record('dns.upstream', (active) => {
    const labels = { 'dns.upstream': attributes.upstream, 'dns.upstream.protocol': attributes.protocol };
    active.upstreamQueries.add(1, labels);
    if (!attributes.success) {
      active.upstreamErrors.add(1, labels);
    }
    if (attributes.responseTime !== undefined) {
      active.upstreamResponseTime.record(attributes.responseTime, labels);
    }
  });
}
