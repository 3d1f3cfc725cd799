import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import forge from 'node-forge';
import { inspectCredentials, loadHubCredentials } from '../lib/crypto/Certificates.mjs';
import { AuthError, ConfigError } from '../lib/errors.mjs';

const DAY_MS = 24 * 60 * 60 * 1000;
const now = new Date('2026-01-15T00:00:00Z');

function makeCertificate(
  keys: forge.pki.rsa.KeyPair,
  commonName: string,
  notBefore: Date,
  notAfter: Date
): string {
  const certificate = forge.pki.createCertificate();
  certificate.publicKey = keys.publicKey;
  certificate.serialNumber = '01';
  certificate.validity.notBefore = notBefore;
  certificate.validity.notAfter = notAfter;
  const attributes = [{ name: 'commonName', value: commonName }];
  certificate.setSubject(attributes);
  certificate.setIssuer(attributes);
  certificate.sign(keys.privateKey, forge.md.sha256.create());
  return forge.pki.certificateToPem(certificate);
}

const clientKeys = forge.pki.rsa.generateKeyPair({ bits: 512, e: 0x10001 });
const otherKeys = forge.pki.rsa.generateKeyPair({ bits: 512, e: 0x10001 });
const clientKeyPem = forge.pki.privateKeyToPem(clientKeys.privateKey);
const validFrom = new Date(now.getTime() - DAY_MS);
const validUntil = new Date(now.getTime() + 30 * DAY_MS);
const caPem = makeCertificate(otherKeys, 'test-ca', validFrom, validUntil);
const clientPem = makeCertificate(clientKeys, 'bridge-client', validFrom, validUntil);

const ecCaPem = readFileSync(new URL('./fixtures/ec-ca.pem', import.meta.url), 'utf8');
const ecClientPem = readFileSync(new URL('./fixtures/ec-client.pem', import.meta.url), 'utf8');
const ecClientKeyPem = readFileSync(new URL('./fixtures/ec-client.key', import.meta.url), 'utf8');

function credentials(cert: string, key: string = clientKeyPem, ca: string = caPem) {
  return { ca: Buffer.from(ca), cert: Buffer.from(cert), key: Buffer.from(key) };
}

describe('inspectCredentials', () => {
  it('summarizes a valid certificate and matching key', () => {
    const summary = inspectCredentials(credentials(clientPem), now);

    assert.ok(summary);
    assert.equal(summary.subject, 'bridge-client');
    assert.equal(summary.issuer, 'bridge-client');
    assert.equal(summary.daysRemaining, 30);
    assert.equal(summary.keyMatched, true);
    assert.equal(summary.notAfter.getTime(), validUntil.getTime());
  });

  it('rejects an expired certificate', () => {
    const expired = makeCertificate(
      clientKeys,
      'bridge-client',
      new Date(now.getTime() - 60 * DAY_MS),
      new Date(now.getTime() - DAY_MS)
    );
    assert.throws(() => inspectCredentials(credentials(expired), now), (error: unknown) => {
      assert.ok(error instanceof AuthError);
      assert.match(error.message, /expired/);
      return true;
    });
  });

  it('rejects a certificate that is not yet valid', () => {
    const future = makeCertificate(
      clientKeys,
      'bridge-client',
      new Date(now.getTime() + DAY_MS),
      new Date(now.getTime() + 60 * DAY_MS)
    );
    assert.throws(() => inspectCredentials(credentials(future), now), /not valid before/);
  });

  it('rejects a key that does not belong to the certificate', () => {
    const wrongKey = forge.pki.privateKeyToPem(otherKeys.privateKey);
    assert.throws(
      () => inspectCredentials(credentials(clientPem, wrongKey), now),
      /does not belong to the client certificate/
    );
  });

  it('rejects an unparseable certificate', () => {
    assert.throws(
      () => inspectCredentials(credentials('not a certificate'), now),
      (error: unknown) => error instanceof AuthError && /Invalid client certificate/.test(error.message)
    );
  });

  it('leaves a key it cannot read to the TLS layer', () => {
    const summary = inspectCredentials(credentials(clientPem, 'opaque key material'), now);
    assert.ok(summary);
    assert.equal(summary.keyMatched, false);
  });

  it('inspects an RSA client certificate issued under an EC CA', () => {
    const summary = inspectCredentials(credentials(clientPem, clientKeyPem, ecCaPem), now);

    assert.ok(summary);
    assert.equal(summary.subject, 'bridge-client');
    assert.equal(summary.keyMatched, true);
  });

  it('leaves an EC client certificate to the TLS layer', () => {
    assert.equal(inspectCredentials(credentials(ecClientPem, ecClientKeyPem, ecCaPem), now), null);
  });
});

describe('loadHubCredentials', () => {
  let dir = '';

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'leap-creds-'));
    writeFileSync(join(dir, 'ca.crt'), caPem);
    writeFileSync(join(dir, 'client.crt'), clientPem);
    writeFileSync(join(dir, 'client.key'), clientKeyPem);
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads the three files', () => {
    const loaded = loadHubCredentials({
      caCertPath: join(dir, 'ca.crt'),
      clientCertPath: join(dir, 'client.crt'),
      clientKeyPath: join(dir, 'client.key'),
    });
    assert.equal(loaded.cert.toString('utf8'), clientPem);
    assert.equal(loaded.key.toString('utf8'), clientKeyPem);
  });

  it('fails with ConfigError for a missing file', () => {
    assert.throws(
      () =>
        loadHubCredentials({
          caCertPath: join(dir, 'ca.crt'),
          clientCertPath: join(dir, 'missing.crt'),
          clientKeyPath: join(dir, 'client.key'),
        }),
      ConfigError
    );
  });
});
