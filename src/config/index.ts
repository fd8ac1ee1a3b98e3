import { config as loadEnv } from 'dotenv';
import { parseTarget } from '../utils/helpers';

loadEnv();

export const config = {
  server: {
    port: parseInt(process.env.PORT || '3000', 10),
    host: process.env.HOST || '0.0.0.0'
  },
  cloud: {
    apiUrl: process.env.CLOUD_API_URL || 'https://remote.example.org',
    iotUrl: process.env.CLOUD_IOT_URL || 'wss://cloud.example.org/websocket',
    accessToken: process.env.CLOUD_ACCESS_TOKEN || '',
    reconnectDelay: parseInt(process.env.IOT_RECONNECT_DELAY || '5000', 10)
  },
  remote: {
    backendTimeout: parseInt(process.env.REMOTE_BACKEND_TIMEOUT || '10000', 10),
    relayPort: parseInt(process.env.REMOTE_RELAY_PORT || '443', 10),
    handshakeTimeout: parseInt(process.env.REMOTE_HANDSHAKE_TIMEOUT || '10000', 10),
    target: parseTarget(process.env.REMOTE_TARGET || '127.0.0.1:8123')
  },
  ssl: {
    certsDir: process.env.CERTS_DIR || './certs',
    acmeDirectory: process.env.ACME_DIRECTORY === 'staging' ? 'staging' : 'production',
    challengeDelay: parseInt(process.env.ACME_CHALLENGE_DELAY || '30000', 10)
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    file: process.env.LOG_FILE
  }
} as const;
