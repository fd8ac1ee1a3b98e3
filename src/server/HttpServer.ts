import express from 'express';
import cors from 'cors';
import * as http from 'http';
import type { RemoteService } from '../services/RemoteService';
import { logger } from '../utils/logger';

export class HttpServer {
  private app: express.Application;
  private server?: http.Server;

  constructor(
    private port: number,
    private host: string,
    private remoteService: RemoteService
  ) {
    this.app = express();
    this.setupExpress();
  }

  private setupExpress(): void {
    // Add CORS headers in development
    if (process.env.NODE_ENV !== 'production') {
      this.app.use(cors());
    }

    this.app.get('/health', (req, res) => {
      res.send('OK');
    });

    this.app.get('/api/remote', (req, res) => {
      res.json({
        state: this.remoteService.state,
        relayServer: this.remoteService.relayServer ?? null,
        domain: this.remoteService.registration?.domain ?? null
      });
    });
  }

  public getApp(): express.Application {
    return this.app;
  }

  public start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = http.createServer(this.app);
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        logger.info(`HTTP server listening on ${this.host}:${port}`);
        resolve(port);
      });
      this.server = server;
    });
  }

  public stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
