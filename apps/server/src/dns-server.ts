import dgram from 'dgram';
import type { AddressInfo } from 'net';
import { isIPv6 } from 'net';
import { UDP_BUFFER_SIZE, type Endpoint } from './config.js';
import type { Logger } from './logger.js';
import { toError } from './logger.js';
import type { QueryHandler } from './query-handler.js';

export interface DNSServerOptions {
  listen: Endpoint;
  handler: QueryHandler;
  logger: Logger;
}

/**
 * UDP front end. Every datagram is handed to the QueryHandler on its own, so
 * many queries can be in flight at once.
 */
export class DNSServer {
  private server: dgram.Socket | null = null;
  private readonly listen: Endpoint;
  private readonly handler: QueryHandler;
  private readonly logger: Logger;

  constructor(options: DNSServerOptions) {
    this.listen = options.listen;
    this.handler = options.handler;
    this.logger = options.logger;
  }

  async start(): Promise<void> {
    const host = this.listen.host || '0.0.0.0';
    const server = dgram.createSocket({
      type: isIPv6(host) ? 'udp6' : 'udp4',
      reuseAddr: true,
      recvBufferSize: UDP_BUFFER_SIZE,
    });
    this.server = server;

    server.on('message', (msg, rinfo) => {
      this.handleMessage(server, msg, rinfo).catch((error: unknown) => {
        // handleMessage already logs; this only guards against an unhandled rejection
        this.logger.error('Unhandled error in UDP message handler', { error: toError(error) });
      });
    });

    await new Promise<void>((resolve, reject) => {
      let started = false;

      server.on('error', (err) => {
        if (started) {
          // After binding, errors are logged but do not stop the server
          this.logger.error('UDP DNS server error', { error: err });
        } else {
          this.server = null;
          server.close();
          reject(err);
        }
      });

      server.bind(this.listen.port, host, () => {
        started = true;
        this.logger.info('DNS server (UDP) running', { address: host, port: this.address()?.port ?? this.listen.port });
        resolve();
      });
    });
  }

  address(): AddressInfo | null {
    if (!this.server) return null;
    try {
      return this.server.address();
    } catch {
      // Not bound
      return null;
    }
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
      this.logger.info('DNS server (UDP) stopped');
    }
    await this.handler.drain();
  }

  private async handleMessage(server: dgram.Socket, msg: Buffer, rinfo: dgram.RemoteInfo): Promise<void> {
    let response: Buffer | null;
    try {
      response = await this.handler.handleDNSQuery(msg);
    } catch (error) {
      this.logger.error('Error handling UDP query', { clientIp: rinfo.address, error: toError(error) });
      return;
    }

    if (!response) return;

    server.send(response, rinfo.port, rinfo.address, (err) => {
      if (err) {
        this.logger.error('Error sending UDP response', { clientIp: rinfo.address, error: err });
      }
    });
  }
}
