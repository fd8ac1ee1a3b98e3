import net from 'net';
import type { Duplex } from 'stream';
import { logger } from '../utils/logger';
import type { TargetAddress } from '../types/remote';

/** Pipes decrypted relay sessions to the local service. */
export class ProxyService {
  private target: TargetAddress;

  constructor(target: TargetAddress) {
    this.target = target;
  }

  public proxySession(socket: Duplex, label: string): net.Socket {
    const upstream = net.connect(this.target.port, this.target.host);

    const teardown = (source: string) => (err?: Error) => {
      if (err) {
        logger.warn(`Session ${label} ${source} error: ${err.message}`);
      }
      socket.destroy();
      upstream.destroy();
    };

    upstream.on('error', teardown('upstream'));
    socket.on('error', teardown('relay'));
    upstream.on('close', () => {
      if (!socket.destroyed) {
        socket.end();
      }
    });
    socket.on('close', () => upstream.end());

    socket.pipe(upstream);
    upstream.pipe(socket);

    logger.debug(`Proxying session ${label} to ${this.target.host}:${this.target.port}`);
    return upstream;
  }
}
