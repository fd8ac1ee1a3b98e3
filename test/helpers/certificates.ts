import { promises as fs } from 'fs';
import path from 'path';
import forge from 'node-forge';

const DAY = 1000 * 60 * 60 * 24;

let keypair: forge.pki.rsa.KeyPair | undefined;

function getKeypair(): forge.pki.rsa.KeyPair {
  if (!keypair) {
    keypair = forge.pki.rsa.generateKeyPair({ bits: 2048 });
  }
  return keypair;
}

export interface TestCertificateOptions {
  commonName: string;
  altNames?: string[];
  validDays: number;
}

export interface TestCertificateFiles {
  pathFullchain: string;
  pathPrivateKey: string;
}

export function createTestCertificate(options: TestCertificateOptions): { cert: string; key: string } {
  const keys = getKeypair();
  const cert = forge.pki.createCertificate();
  cert.publicKey = keys.publicKey;
  cert.serialNumber = '01';
  cert.validity.notBefore = new Date(Date.now() - DAY);
  cert.validity.notAfter = new Date(Date.now() + options.validDays * DAY);

  const attrs = [{ name: 'commonName', value: options.commonName }];
  cert.setSubject(attrs);
  cert.setIssuer(attrs);
  if (options.altNames) {
    cert.setExtensions([{
      name: 'subjectAltName',
      altNames: options.altNames.map((value) => ({ type: 2, value }))
    }]);
  }
  cert.sign(keys.privateKey, forge.md.sha256.create());

  return {
    cert: forge.pki.certificateToPem(cert),
    key: forge.pki.privateKeyToPem(keys.privateKey)
  };
}

/** Writes a self-signed pair where SSLService expects it. */
export async function writeTestCertificate(
  sslDir: string,
  domain: string,
  options: TestCertificateOptions
): Promise<TestCertificateFiles> {
  const livePath = path.join(sslDir, 'live', domain);
  await fs.mkdir(livePath, { recursive: true });

  const { cert, key } = createTestCertificate(options);
  const files = {
    pathFullchain: path.join(livePath, 'fullchain.pem'),
    pathPrivateKey: path.join(livePath, 'privkey.pem')
  };
  await fs.writeFile(files.pathFullchain, cert);
  await fs.writeFile(files.pathPrivateKey, key);
  return files;
}
