import { promises as fs } from 'fs';
import path from 'path';
import { setTimeout as delay } from 'timers/promises';
import * as acme from 'acme-client';
import forge from 'node-forge';
import { logger } from '../utils/logger';
import { CertificateError } from '../utils/errors';
import type { CertificateHandler, ChallengeBackend } from '../types/remote';

export interface SSLServiceOptions {
  sslDir: string;
  directoryUrl: string;
  challengeDelay: number;
  renewBeforeDays: number;
}

const DAY = 1000 * 60 * 60 * 24;

/**
 * Keeps a Let's Encrypt certificate for the instance domain on disk.
 * DNS-01 challenges are published through the cloud backend, which owns
 * the DNS zone of the assigned domain.
 */
export class SSLService implements CertificateHandler {
  public readonly domain: string;
  public readonly email: string;
  private backend: ChallengeBackend;
  private options: SSLServiceOptions;

  constructor(backend: ChallengeBackend, domain: string, email: string, options: SSLServiceOptions) {
    this.backend = backend;
    this.domain = domain;
    this.email = email;
    this.options = options;
  }

  public get pathFullchain(): string {
    return path.join(this.livePath, 'fullchain.pem');
  }

  public get pathPrivateKey(): string {
    return path.join(this.livePath, 'privkey.pem');
  }

  public get pathAccountKey(): string {
    return path.join(this.options.sslDir, 'account.key');
  }

  private get livePath(): string {
    return path.join(this.options.sslDir, 'live', this.domain);
  }

  public async isValidCertificate(): Promise<boolean> {
    let certificate: forge.pki.Certificate;
    try {
      const pem = await fs.readFile(this.pathFullchain, 'utf8');
      certificate = forge.pki.certificateFromPem(pem);
    } catch (err) {
      logger.debug(`No usable certificate for ${this.domain}`, { error: String(err) });
      return false;
    }

    if (!this.coversDomain(certificate)) {
      logger.info(`Stored certificate does not match domain ${this.domain}`);
      return false;
    }

    const daysUntilExpiry = (certificate.validity.notAfter.getTime() - Date.now()) / DAY;
    return daysUntilExpiry > this.options.renewBeforeDays;
  }

  public async issueCertificate(): Promise<void> {
    logger.info(`Issuing certificate for ${this.domain}`);
    try {
      await fs.mkdir(this.livePath, { recursive: true });

      const client = new acme.Client({
        directoryUrl: this.options.directoryUrl,
        accountKey: await this.getAccountKey()
      });

      const [privateKey, csr] = await acme.crypto.createCsr({
        commonName: this.domain,
        altNames: [this.domain]
      });

      const cert = await client.auto({
        csr,
        email: this.email,
        termsOfServiceAgreed: true,
        challengePriority: ['dns-01'],
        challengeCreateFn: async (authz, challenge, keyAuthorization) => {
          logger.info(`Publishing ${challenge.type} TXT record for ${authz.identifier.value}`);
          const resp = await this.backend.setChallengeTxt(keyAuthorization);
          if (resp.status !== 200) {
            throw new CertificateError(`Backend refused challenge TXT record (${resp.status})`);
          }
          // Wait for the record to propagate
          await delay(this.options.challengeDelay);
        },
        challengeRemoveFn: async (authz) => {
          logger.debug(`Challenge for ${authz.identifier.value} finished`);
        }
      });

      await fs.writeFile(this.pathFullchain, cert);
      await fs.writeFile(this.pathPrivateKey, privateKey, { mode: 0o600 });
      logger.info(`Certificate for ${this.domain} stored`);
    } catch (err) {
      logger.error(`Failed to issue certificate for ${this.domain}:`, err);
      if (err instanceof CertificateError) {
        throw err;
      }
      throw new CertificateError(`Can't issue certificate for ${this.domain}`, { cause: err });
    }
  }

  private coversDomain(certificate: forge.pki.Certificate): boolean {
    const commonName = certificate.subject.getField('CN');
    if (commonName && commonName.value === this.domain) {
      return true;
    }

    const altNames = certificate.getExtension('subjectAltName');
    if (altNames && 'altNames' in altNames && Array.isArray(altNames.altNames)) {
      return altNames.altNames.some((entry: { value?: string }) => entry.value === this.domain);
    }
    return false;
  }

  private async getAccountKey(): Promise<string> {
    try {
      return await fs.readFile(this.pathAccountKey, 'utf8');
    } catch (err) {
      logger.info('Creating new ACME account key');
      const keypair = forge.pki.rsa.generateKeyPair({ bits: 2048 });
      const pem = forge.pki.privateKeyToPem(keypair.privateKey);

      await fs.mkdir(this.options.sslDir, { recursive: true });
      await fs.writeFile(this.pathAccountKey, pem, { mode: 0o600 });
      return pem;
    }
  }
}
