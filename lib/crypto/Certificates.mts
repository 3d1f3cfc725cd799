/**
 * Hub credential loading and inspection
 *
 * The hub authenticates the bridge with the client certificate issued at
 * pairing time. Expired or mismatched material is refused here, before any
 * connection attempt, since the hub would refuse it on every retry.
 */

import { readFileSync } from 'node:fs';
import forge from 'node-forge';
import { AuthError, ConfigError, describeError } from '../errors.mjs';
import { isRecord } from '../utils/guards.mjs';
import { createLogger } from '../utils/Logger.mjs';
import type { HubConfig } from '../types.mjs';

const logger = createLogger('Certificates');

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * PEM material handed to the TLS layer
 */
export interface HubCredentials {
  ca: Buffer;
  cert: Buffer;
  key: Buffer;
}

/**
 * What inspection found out about the client certificate
 */
export interface CredentialSummary {
  subject: string;
  issuer: string;
  notAfter: Date;
  daysRemaining: number;
  /** false when the key type could not be compared against the certificate */
  keyMatched: boolean;
}

type CredentialPaths = Pick<HubConfig, 'caCertPath' | 'clientCertPath' | 'clientKeyPath'>;

function readPem(path: string, label: string): Buffer {
  try {
    return readFileSync(path);
  } catch (error) {
    throw new ConfigError(`Cannot read ${label} at ${path}: ${describeError(error)}`);
  }
}

/**
 * Read the three PEM files
 *
 * @throws ConfigError when a file cannot be read
 */
export function loadHubCredentials(paths: CredentialPaths): HubCredentials {
  return {
    ca: readPem(paths.caCertPath, 'CA certificate'),
    cert: readPem(paths.clientCertPath, 'client certificate'),
    key: readPem(paths.clientKeyPath, 'client key'),
  };
}

function commonName(attributes: forge.pki.Certificate['subject']): string {
  const field: unknown = attributes.getField('CN');
  if (isRecord(field) && typeof field.value === 'string') {
    return field.value;
  }
  return 'unknown';
}

const NON_RSA_KEY = /OID is not RSA/;

/**
 * Parse a PEM certificate. Certificates with a non-RSA public key (EC
 * pairings) cannot be read and yield undefined.
 */
function parseCertificate(pem: Buffer, label: string): forge.pki.Certificate | undefined {
  try {
    return forge.pki.certificateFromPem(pem.toString('utf8'));
  } catch (error) {
    if (NON_RSA_KEY.test(describeError(error))) {
      logger.warn(`${label} has a non-RSA key; not inspected, leaving it to the TLS handshake`);
      return undefined;
    }
    throw new AuthError(`Invalid ${label}: ${describeError(error)}`);
  }
}

function checkValidity(certificate: forge.pki.Certificate, label: string, now: Date): void {
  const { notBefore, notAfter } = certificate.validity;
  if (now < notBefore) {
    throw new AuthError(`${label} is not valid before ${notBefore.toISOString()}`);
  }
  if (now > notAfter) {
    throw new AuthError(`${label} expired on ${notAfter.toISOString()}`);
  }
}

/**
 * Compare the private key modulus against the certificate's public key.
 * Returns false when the key is not RSA and no comparison was possible.
 */
function keyMatchesCertificate(certificate: forge.pki.Certificate, keyPem: Buffer): boolean {
  let privateKey: forge.pki.rsa.PrivateKey;
  try {
    privateKey = forge.pki.privateKeyFromPem(keyPem.toString('utf8'));
  } catch (error) {
    logger.warn(`Client key not inspected (${describeError(error)}); leaving it to the TLS handshake`);
    return false;
  }

  const publicKey = certificate.publicKey;
  if (!('n' in publicKey)) {
    throw new AuthError('Client key is RSA but the client certificate is not');
  }
  if (publicKey.n.toString(16) !== privateKey.n.toString(16)) {
    throw new AuthError('Client key does not belong to the client certificate');
  }
  return true;
}

/**
 * Validate credentials before they are used
 *
 * @returns null when the client certificate has a key type that cannot be inspected
 * @throws AuthError when the material can never authenticate
 */
export function inspectCredentials(
  credentials: HubCredentials,
  now: Date = new Date()
): CredentialSummary | null {
  const ca = parseCertificate(credentials.ca, 'CA certificate');
  if (ca) checkValidity(ca, 'CA certificate', now);

  const certificate = parseCertificate(credentials.cert, 'client certificate');
  if (!certificate) return null;
  checkValidity(certificate, 'Client certificate', now);

  const keyMatched = keyMatchesCertificate(certificate, credentials.key);
  const notAfter = certificate.validity.notAfter;
  const summary: CredentialSummary = {
    subject: commonName(certificate.subject),
    issuer: commonName(certificate.issuer),
    notAfter,
    daysRemaining: Math.floor((notAfter.getTime() - now.getTime()) / DAY_MS),
    keyMatched,
  };

  logger.info(
    `Client certificate CN=${summary.subject} issued by ${summary.issuer}, ${summary.daysRemaining} days remaining`
  );
  return summary;
}
