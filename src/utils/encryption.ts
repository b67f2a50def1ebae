import CryptoJS from 'crypto-js';

function getSecret(): string {
  const secret = process.env.SESSION_SECRET;
  if (!secret) {
    throw new Error('Missing SESSION_SECRET in environment variables');
  }
  return secret;
}

function signature(value: string, secret: string): string {
  return CryptoJS.HmacSHA256(value, secret).toString(CryptoJS.enc.Hex);
}

export function sign(value: string, secret: string = getSecret()): string {
  return `${value}.${signature(value, secret)}`;
}

/** Returns the signed value, or null when the token was not produced with the same secret. */
export function unsign(token: string, secret: string = getSecret()): string | null {
  const separator = token.lastIndexOf('.');
  if (separator <= 0) {
    return null;
  }
  const value = token.slice(0, separator);
  const provided = token.slice(separator + 1);
  return provided === signature(value, secret) ? value : null;
}

export function passwordMatches(candidate: string, expected: string): boolean {
  const key = 'password-check';
  return CryptoJS.HmacSHA256(candidate, key).toString() === CryptoJS.HmacSHA256(expected, key).toString();
}
