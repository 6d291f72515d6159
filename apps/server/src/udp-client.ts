import dgram from 'dgram';
import { isIPv6 } from 'net';
import { UDP_EXCHANGE_TIMEOUT_MS, type Endpoint } from './config.js';

/**
 * Send one DNS message and resolve with the first datagram that comes back.
 */
export type DnsExchange = (query: Buffer, endpoint: Endpoint) => Promise<Buffer>;

export function createUdpExchange(timeoutMs: number = UDP_EXCHANGE_TIMEOUT_MS): DnsExchange {
  return (query, endpoint) =>
    new Promise<Buffer>((resolve, reject) => {
      const client = dgram.createSocket(isIPv6(endpoint.host) ? 'udp6' : 'udp4');
      let settled = false;

      const finish = (error: Error | null, response?: Buffer) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        client.close();
        if (error) {
          reject(error);
        } else if (response) {
          resolve(response);
        }
      };

      const timeout = setTimeout(() => {
        finish(new Error(`DNS query timeout after ${timeoutMs}ms`));
      }, timeoutMs);

      client.on('message', (response) => {
        finish(null, response);
      });

      client.on('error', (err) => {
        finish(err);
      });

      client.send(query, endpoint.port, endpoint.host, (err) => {
        if (err) {
          finish(err);
        }
      });
    });
}
