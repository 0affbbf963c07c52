import crypto from 'crypto';
import { decodeJwt, decodeProtectedHeader, jwtVerify } from 'jose';
import { loadAppIdentity, mintAppJwt } from './appJwt';

const keys = crypto.generateKeyPairSync('rsa', {
  modulusLength: 2048,
  publicKeyEncoding: { type: 'spki', format: 'pem' },
  privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
});

describe('mintAppJwt', () => {
  const identity = { appId: '12345', privateKey: crypto.createPrivateKey(keys.privateKey) };
  const nowMs = 1_700_000_000_000;

  it('issues an RS256 assertion backdated by a minute and valid for ten', async () => {
    const jwt = await mintAppJwt(identity, nowMs);
    expect(decodeProtectedHeader(jwt)).toEqual({ alg: 'RS256', typ: 'JWT' });
    expect(decodeJwt(jwt)).toEqual({ iss: '12345', iat: 1_700_000_000 - 60, exp: 1_700_000_000 + 600 });
  });

  it('is verifiable with the public key', async () => {
    const jwt = await mintAppJwt(identity, nowMs);
    const { payload } = await jwtVerify(jwt, crypto.createPublicKey(keys.publicKey), {
      issuer: '12345',
      currentDate: new Date(nowMs),
    });
    expect(payload.iss).toBe('12345');
  });

  it('mints a fresh assertion per call', async () => {
    const first = await mintAppJwt(identity, nowMs);
    const second = await mintAppJwt(identity, nowMs + 1_000);
    expect(second).not.toBe(first);
    expect(decodeJwt(second).iat).toBe(1_700_000_001 - 60);
  });
});

describe('loadAppIdentity', () => {
  it('is null without an app id', () => {
    expect(
      loadAppIdentity({ GITHUB_APP_ID: '', GITHUB_APP_PRIVATE_KEY: keys.privateKey, GITHUB_APP_PRIVATE_KEY_PATH: '' })
    ).toBeNull();
  });

  it('is null without key material', () => {
    expect(loadAppIdentity({ GITHUB_APP_ID: '12345', GITHUB_APP_PRIVATE_KEY: '', GITHUB_APP_PRIVATE_KEY_PATH: '' })).toBeNull();
  });

  it('accepts a key with escaped newlines', () => {
    const escaped = keys.privateKey.replace(/\n/g, '\\n');
    const identity = loadAppIdentity({ GITHUB_APP_ID: '12345', GITHUB_APP_PRIVATE_KEY: escaped, GITHUB_APP_PRIVATE_KEY_PATH: '' });
    expect(identity?.appId).toBe('12345');
    expect(identity?.privateKey.asymmetricKeyType).toBe('rsa');
  });
});
