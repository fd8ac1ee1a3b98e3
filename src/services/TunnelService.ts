import { EventEmitter } from 'events';
import tls from 'tls';
import WebSocket from 'ws';
import type { RawData } from 'ws';
import { logger } from '../utils/logger';
import { TunnelError } from '../utils/errors';
import { isRecord } from '../utils/helpers';
import type { RelayMessage, TargetAddress, TunnelClient, TunnelClientOptions } from '../types/remote';
import { ProxyService } from './ProxyService';
import { RelaySession } from './RelaySession';

export interface TunnelServiceOptions extends TunnelClientOptions {
  target: TargetAddress;
  protocol?: 'wss' | 'ws';
  stopTimeout?: number;
  handshakeTimeout?: number;
}

export function isRelayMessage(value: unknown): value is RelayMessage {
  if (!isRecord(value) || typeof value.type !== 'string') {
    return false;
  }
  switch (value.type) {
    case 'authorize':
      return typeof value.token === 'string' && typeof value.key === 'string' && typeof value.iv === 'string';
    case 'session-open':
    case 'session-close':
      return typeof value.sessionId === 'string';
    case 'session-data':
      return typeof value.sessionId === 'string' && typeof value.data === 'string';
    default:
      return false;
  }
}

/**
 * Client side of the relay tunnel. Holds one WebSocket to the relay server;
 * every relayed session is TLS-terminated here with the instance certificate
 * and piped to the local target.
 */
export class TunnelService extends EventEmitter implements TunnelClient {
  private ws?: WebSocket;
  private sessions: Map<string, RelaySession> = new Map();
  private options: TunnelServiceOptions;
  private proxyService: ProxyService;

  constructor(options: TunnelServiceOptions) {
    super();
    this.options = options;
    this.proxyService = new ProxyService(options.target);
  }

  public get server(): string {
    return this.options.server;
  }

  public get port(): number {
    return this.options.port;
  }

  public get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  public get activeSessions(): number {
    return this.sessions.size;
  }

  public async start(): Promise<void> {
    if (this.ws) {
      return;
    }

    const { server, port, protocol = 'wss' } = this.options;
    const ws = new WebSocket(`${protocol}://${server}:${port}/tunnel`, {
      handshakeTimeout: this.options.handshakeTimeout ?? 10000
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        ws.off('open', onOpen);
        reject(new TunnelError(`Can't connect to relay server ${server}:${port}`, { cause: err }));
      };
      const onOpen = () => {
        ws.off('error', onError);
        resolve();
      };
      ws.once('error', onError);
      ws.once('open', onOpen);
    });

    this.ws = ws;
    ws.on('message', (data: RawData) => this.handleMessage(data));
    ws.on('error', (err) => {
      logger.error(`Relay connection to ${server} failed:`, err);
    });
    ws.on('close', () => {
      logger.info(`Relay connection to ${server} closed`);
      if (this.ws === ws) {
        this.ws = undefined;
      }
      this.closeSessions();
      this.emit('closed');
    });

    logger.info(`Tunnel to relay server ${server}:${port} established`);
  }

  public async stop(): Promise<void> {
    const ws = this.ws;
    this.ws = undefined;
    this.closeSessions();

    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => ws.terminate(), this.options.stopTimeout ?? 5000);
      ws.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      ws.close();
    });
  }

  public async connect(token: string, key: Buffer, iv: Buffer): Promise<void> {
    await this.send({
      type: 'authorize',
      token,
      key: key.toString('base64'),
      iv: iv.toString('base64')
    });
  }

  private send(message: RelayMessage): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TunnelError('Tunnel is not connected'));
    }

    return new Promise((resolve, reject) => {
      ws.send(JSON.stringify(message), (err) => {
        if (err) {
          reject(new TunnelError('Failed to send to relay server', { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  private handleMessage(data: RawData): void {
    let message: unknown;
    try {
      message = JSON.parse(data.toString());
    } catch (err) {
      logger.warn('Dropping malformed relay message');
      return;
    }

    if (!isRelayMessage(message)) {
      logger.warn('Dropping unknown relay message');
      return;
    }

    switch (message.type) {
      case 'session-open':
        this.openSession(message.sessionId);
        break;
      case 'session-data':
        this.sessions.get(message.sessionId)?.receive(Buffer.from(message.data, 'base64'));
        break;
      case 'session-close':
        this.sessions.get(message.sessionId)?.closeFromRemote();
        break;
      default:
        logger.debug(`Ignoring relay message ${message.type}`);
    }
  }

  private openSession(sessionId: string): void {
    if (this.sessions.has(sessionId)) {
      logger.warn(`Session ${sessionId} already open`);
      return;
    }

    const session = new RelaySession(sessionId, (message) => this.send(message));
    this.sessions.set(sessionId, session);
    session.on('error', (err: Error) => {
      logger.warn(`Session ${sessionId} lost: ${err.message}`);
    });
    session.on('close', () => this.sessions.delete(sessionId));

    const secure = new tls.TLSSocket(session, {
      isServer: true,
      secureContext: this.options.context
    });
    this.proxyService.proxySession(secure, sessionId);
    logger.debug(`Session ${sessionId} opened`);
  }

  private closeSessions(): void {
    for (const session of this.sessions.values()) {
      session.destroy();
    }
    this.sessions.clear();
  }
}
