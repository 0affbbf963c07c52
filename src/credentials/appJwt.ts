import crypto, { KeyObject } from 'crypto';
import fs from 'fs';
import { SignJWT } from 'jose';
import type { Config } from '../config/config';

export interface AppIdentity {
  appId: string;
  privateKey: KeyObject;
}

// Backdated to tolerate clock skew between us and GitHub
export const JWT_BACKDATE_SECONDS = 60;
export const JWT_TTL_SECONDS = 10 * 60;

/**
 * App-level assertion for the GitHub App API. Minted on every call: it is cheap and
 * only ever lives for one token exchange.
 */
export async function mintAppJwt(identity: AppIdentity, nowMs: number = Date.now()): Promise<string> {
  const now = Math.floor(nowMs / 1000);
  return new SignJWT({})
    .setProtectedHeader({ alg: 'RS256', typ: 'JWT' })
    .setIssuer(identity.appId)
    .setIssuedAt(now - JWT_BACKDATE_SECONDS)
    .setExpirationTime(now + JWT_TTL_SECONDS)
    .sign(identity.privateKey);
}

// PEM from GITHUB_APP_PRIVATE_KEY (escaped newlines allowed) or GITHUB_APP_PRIVATE_KEY_PATH
export function loadAppIdentity(
  cfg: Pick<Config, 'GITHUB_APP_ID' | 'GITHUB_APP_PRIVATE_KEY' | 'GITHUB_APP_PRIVATE_KEY_PATH'>
): AppIdentity | null {
  if (!cfg.GITHUB_APP_ID) {
    return null;
  }
  let pem = cfg.GITHUB_APP_PRIVATE_KEY.replace(/\\n/g, '\n');
  if (!pem && cfg.GITHUB_APP_PRIVATE_KEY_PATH) {
    pem = fs.readFileSync(cfg.GITHUB_APP_PRIVATE_KEY_PATH, 'utf8');
  }
  if (!pem) {
    return null;
  }
  return { appId: cfg.GITHUB_APP_ID, privateKey: crypto.createPrivateKey(pem) };
}
