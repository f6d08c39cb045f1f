/**
 * PDF text strings: UTF-16BE or UTF-8 behind a byte order mark, otherwise
 * one byte per character (PDFDocEncoding agrees with Latin-1 on the
 * printable range).
 */

const utf16 = new TextDecoder('utf-16be');
const utf8 = new TextDecoder('utf-8');

export function decodeTextString(bytes: Uint8Array): string {
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    return utf16.decode(bytes.subarray(2));
  }
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return utf8.decode(bytes.subarray(3));
  }
  return latin1(bytes);
}

export function latin1(bytes: Uint8Array, limit = bytes.length): string {
  let out = '';
  const end = Math.min(limit, bytes.length);
  for (let i = 0; i < end; i++) out += String.fromCharCode(bytes[i]);
  return out;
}
