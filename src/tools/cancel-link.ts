import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';

export interface CancelLinkSettings {
  baseUrl: string;
  secret: string;
  ttlHours: number;
}

interface CancelTokenPayload {
  email: string;
  exp: number;
}

function keyFrom(secret: string): Buffer {
  return createHash('sha256').update(secret).digest();
}

/**
 * Self-service cancellation link. The token is AES-256-GCM over
 * `{email, exp}`; the cancellation page decrypts it with the same secret.
 */
export function generateCancelLink(email: string, settings: CancelLinkSettings, now = Date.now()): { url: string; expiresAt: string } {
  const exp = now + settings.ttlHours * 3600 * 1000;
  const payload: CancelTokenPayload = { email: email.toLowerCase(), exp };

  const iv = randomBytes(12);
  const cipher = createCipheriv('aes-256-gcm', keyFrom(settings.secret), iv);
  const encrypted = Buffer.concat([cipher.update(JSON.stringify(payload), 'utf8'), cipher.final()]);
  const token = Buffer.concat([iv, cipher.getAuthTag(), encrypted]).toString('base64url');

  return {
    url: `${settings.baseUrl}?token=${token}`,
    expiresAt: new Date(exp).toISOString(),
  };
}

/** Returns the email a token was issued for, or null if it is invalid or expired */
export function verifyCancelToken(token: string, secret: string, now = Date.now()): string | null {
  try {
    const raw = Buffer.from(token, 'base64url');
    const iv = raw.subarray(0, 12);
    const tag = raw.subarray(12, 28);
    const body = raw.subarray(28);

    const decipher = createDecipheriv('aes-256-gcm', keyFrom(secret), iv);
    decipher.setAuthTag(tag);
    const decoded: unknown = JSON.parse(Buffer.concat([decipher.update(body), decipher.final()]).toString('utf8'));

    if (!isTokenPayload(decoded) || decoded.exp < now) return null;
    return decoded.email;
  } catch {
    // tampered, or signed with another secret
    return null;
  }
}

function isTokenPayload(value: unknown): value is CancelTokenPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'email' in value &&
    'exp' in value &&
    typeof value.email === 'string' &&
    typeof value.exp === 'number'
  );
}
