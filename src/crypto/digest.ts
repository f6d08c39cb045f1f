/**
 * Injectable SHA-256.
 * Node entry registers node:crypto, browser entry registers WebCrypto.
 */

type DigestFn = (data: Uint8Array) => Promise<Uint8Array>;

let _digest: DigestFn | null = null;

export function setDigestImpl(fn: DigestFn): void {
  _digest = fn;
}

export async function sha256(data: Uint8Array): Promise<Uint8Array> {
  if (!_digest) throw new Error('No digest implementation configured. Import from "pdfsleuth" or "pdfsleuth/browser".');
  return _digest(data);
}

export async function sha256Hex(data: Uint8Array): Promise<string> {
  return toHex(await sha256(data));
}

export function toHex(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) out += b.toString(16).padStart(2, '0');
  return out;
}
