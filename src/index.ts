// src/index.ts
import { config } from './config';
import { sslConfig } from './config/ssl';
import { HttpServer } from './server/HttpServer';
import { CloudApiService } from './services/CloudApiService';
import { IotService } from './services/IotService';
import { RemoteService } from './services/RemoteService';
import { SSLService } from './services/SSLService';
import { TunnelService } from './services/TunnelService';
import { RemoteEventType } from './types/events';
import type { StateChangedEvent } from './types/events';
import { logger } from './utils/logger';

async function main() {
  const cloudApi = new CloudApiService({
    apiUrl: config.cloud.apiUrl,
    accessToken: config.cloud.accessToken
  });

  const iot = new IotService({
    url: config.cloud.iotUrl,
    accessToken: config.cloud.accessToken,
    reconnectDelay: config.cloud.reconnectDelay
  });

  const remoteService = new RemoteService(iot, cloudApi, {
    backendTimeout: config.remote.backendTimeout,
    relayPort: config.remote.relayPort,
    createCertificateHandler: (domain, email) => new SSLService(cloudApi, domain, email, {
      sslDir: sslConfig.certsPath,
      directoryUrl: sslConfig.directoryUrl,
      challengeDelay: sslConfig.challengeDelay,
      renewBeforeDays: sslConfig.renewBeforeDays
    }),
    createTunnelClient: (options) => new TunnelService({
      ...options,
      target: config.remote.target,
      handshakeTimeout: config.remote.handshakeTimeout
    })
  });

  remoteService.on(RemoteEventType.STATE_CHANGED, (event: StateChangedEvent) => {
    logger.info(`Remote state ${event.previous} -> ${event.state}`);
  });

  logger.info(`Environment: ${process.env.NODE_ENV}`);
  logger.info(`Forwarding remote sessions to ${config.remote.target.host}:${config.remote.target.port}`);

  const httpServer = new HttpServer(config.server.port, config.server.host, remoteService);
  await httpServer.start();
  iot.start();

  // Handle graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');

    try {
      await iot.stop();
      await remoteService.closeBackend();
      await httpServer.stop();
      logger.info('Shutdown complete');
    } catch (error) {
      logger.error('Error during shutdown:', error);
    }

    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.error('Failed to start:', error);
  process.exit(1);
});
