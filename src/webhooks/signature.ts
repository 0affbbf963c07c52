import crypto from 'crypto';

export const SIGNATURE_PREFIX = 'sha256=';

// Header value GitHub sends in X-Hub-Signature-256
export function sign(secret: string, body: Buffer | string): string {
  return SIGNATURE_PREFIX + crypto.createHmac('sha256', secret).update(body).digest('hex');
}

// Never throws: missing header, foreign prefix or length mismatch are plain mismatches
export function verify(secret: string, rawBody: Buffer | string, presented: string | null | undefined): boolean {
  if (!secret || !presented || !presented.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }
  const expected = Buffer.from(sign(secret, rawBody));
  const actual = Buffer.from(presented);
  if (expected.length !== actual.length) {
    return false;
  }
  return crypto.timingSafeEqual(expected, actual);
}

// Linear scan over active registrations; fine while there are only a handful
export function findMatchingRegistration<T extends { secret: string }>(
  registrations: readonly T[],
  rawBody: Buffer | string,
  presented: string | null | undefined
): T | null {
  for (const registration of registrations) {
    if (verify(registration.secret, rawBody, presented)) {
      return registration;
    }
  }
  return null;
}
