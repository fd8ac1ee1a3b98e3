import * as acme from 'acme-client';
import path from 'path';
import { config } from './index';

export const sslConfig = {
  certsPath: path.resolve(process.cwd(), config.ssl.certsDir),
  directoryUrl: acme.directory.letsencrypt[config.ssl.acmeDirectory],
  challengeDelay: config.ssl.challengeDelay,
  renewBeforeDays: 30,
  // Mozilla "modern" compatible set, TLS 1.3 suites are always enabled by Node
  modernProfile: {
    minVersion: 'TLSv1.2',
    ciphers: [
      'ECDHE-ECDSA-AES256-GCM-SHA384',
      'ECDHE-RSA-AES256-GCM-SHA384',
      'ECDHE-ECDSA-CHACHA20-POLY1305',
      'ECDHE-RSA-CHACHA20-POLY1305',
      'ECDHE-ECDSA-AES128-GCM-SHA256',
      'ECDHE-RSA-AES128-GCM-SHA256'
    ].join(':'),
    honorCipherOrder: true
  }
} as const;
