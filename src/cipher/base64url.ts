/**
 * URL-safe base64 with padding, as used by Fernet tokens
 */

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*={0,2}$/;

export function encodeBase64Url(data: Buffer): string {
  return data.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

/**
 * Strict decode: rejects foreign characters, bad padding and
 * non-canonical trailing bits. Returns null on any of those.
 */
export function decodeBase64Url(text: string): Buffer | null {
  if (!BASE64URL_PATTERN.test(text) || text.length % 4 !== 0) {
    return null;
  }

  const decoded = Buffer.from(text.replace(/-/g, '+').replace(/_/g, '/'), 'base64');
  return encodeBase64Url(decoded) === text ? decoded : null;
}
