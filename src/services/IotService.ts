import { EventEmitter } from 'events';
import WebSocket from 'ws';
import type { RawData } from 'ws';
import { logger } from '../utils/logger';
import { isRecord } from '../utils/helpers';
import type { ConnectionSupervisor, IotMessage, LifecycleHook, MessageHandler } from '../types/remote';

export interface IotServiceOptions {
  url: string;
  accessToken: string;
  reconnectDelay: number;
}

function isIotMessage(value: unknown): value is IotMessage {
  return isRecord(value) && typeof value.msgid === 'string' && typeof value.handler === 'string';
}

/**
 * Cloud message channel. Runs the registered hooks whenever the channel
 * comes up or goes down and reconnects until stopped.
 */
export class IotService extends EventEmitter implements ConnectionSupervisor {
  private ws?: WebSocket;
  private options: IotServiceOptions;
  private onConnect: LifecycleHook[] = [];
  private onDisconnect: LifecycleHook[] = [];
  private handlers: Map<string, MessageHandler> = new Map();
  private reconnectTimer?: NodeJS.Timeout;
  private running = false;

  constructor(options: IotServiceOptions) {
    super();
    this.options = options;
  }

  public get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  public registerOnConnect(hook: LifecycleHook): void {
    this.onConnect.push(hook);
  }

  public registerOnDisconnect(hook: LifecycleHook): void {
    this.onDisconnect.push(hook);
  }

  public registerHandler(name: string, handler: MessageHandler): void {
    this.handlers.set(name, handler);
  }

  public start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.connect();
  }

  public async stop(): Promise<void> {
    this.running = false;
    clearTimeout(this.reconnectTimer);
    this.reconnectTimer = undefined;

    const ws = this.ws;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else {
        ws.close();
      }
    });
  }

  private connect(): void {
    const ws = new WebSocket(this.options.url, {
      headers: { authorization: this.options.accessToken }
    });
    this.ws = ws;
    let opened = false;

    ws.on('open', () => {
      opened = true;
      logger.info(`Connected to cloud message channel ${this.options.url}`);
      this.emit('connected');
      void this.runHooks('connect', this.onConnect);
    });

    ws.on('message', (data: RawData) => {
      void this.handleMessage(ws, data);
    });

    ws.on('error', (err) => {
      logger.error('Cloud message channel error:', err);
    });

    ws.on('close', () => {
      if (this.ws === ws) {
        this.ws = undefined;
      }
      if (opened) {
        logger.info('Disconnected from cloud message channel');
        this.emit('disconnected');
        void this.runHooks('disconnect', this.onDisconnect);
      }
      this.scheduleReconnect();
    });
  }

  private scheduleReconnect(): void {
    if (!this.running) {
      return;
    }
    logger.info(`Reconnecting to cloud message channel in ${this.options.reconnectDelay}ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      if (this.running) {
        this.connect();
      }
    }, this.options.reconnectDelay);
  }

  private async runHooks(kind: string, hooks: LifecycleHook[]): Promise<void> {
    for (const hook of hooks) {
      try {
        await hook();
      } catch (err) {
        logger.error(`Cloud ${kind} hook failed:`, err);
      }
    }
    this.emit(`${kind}_hooks_done`);
  }

  private async handleMessage(ws: WebSocket, data: RawData): Promise<void> {
    let message: unknown;
    try {
      message = JSON.parse(data.toString());
    } catch (err) {
      logger.warn('Dropping malformed cloud message');
      return;
    }

    if (!isIotMessage(message)) {
      logger.warn('Dropping cloud message without msgid or handler');
      return;
    }

    const handler = this.handlers.get(message.handler);
    let reply: Record<string, unknown>;
    if (!handler) {
      logger.warn(`No handler for cloud message ${message.handler}`);
      reply = { msgid: message.msgid, error: 'unknown-handler' };
    } else {
      try {
        const payload = await handler(message.payload);
        reply = { msgid: message.msgid, payload };
      } catch (err) {
        logger.error(`Cloud handler ${message.handler} failed:`, err);
        reply = { msgid: message.msgid, error: err instanceof Error ? err.name : 'exception' };
      }
    }

    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(reply));
    }
  }
}
