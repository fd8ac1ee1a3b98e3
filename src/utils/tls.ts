import { promises as fs } from 'fs';
import tls from 'tls';
import { sslConfig } from '../config/ssl';

/**
 * Builds the server-side context used to terminate relayed sessions.
 * The PEM files are read through fs promises so a slow disk never blocks
 * the event loop.
 */
export async function createServerContext(fullchainPath: string, privateKeyPath: string): Promise<tls.SecureContext> {
  const [cert, key] = await Promise.all([
    fs.readFile(fullchainPath),
    fs.readFile(privateKeyPath)
  ]);

  return tls.createSecureContext({
    ...sslConfig.modernProfile,
    cert,
    key
  });
}
