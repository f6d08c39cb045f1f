/**
 * PDF stream decompression filters.
 * Inflate implementation is injected at startup via src/stream/inflate.ts.
 *
 * Each filter throws on input it cannot decode; the decoder tags the error
 * with the filter's position in the chain.
 */

import { inflate } from './inflate.js';
import { PdfDecodeError } from '../errors.js';

/** Decompress FlateDecode (zlib/deflate) data */
export function flateDecode(data: Uint8Array): Uint8Array {
  try {
    return inflate(data);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PdfDecodeError(`FlateDecode decompression failed: ${reason}`, 'FlateDecode', 0);
  }
}

/** Decode ASCIIHexDecode filter */
export function asciiHexDecode(data: Uint8Array): Uint8Array {
  const result: number[] = [];
  let high = -1;

  for (let i = 0; i < data.length; i++) {
    const c = data[i];

    if (c === 0x3e) break; // > = EOD marker
    if (isFilterWhitespace(c)) continue;

    const val = hexDigitValue(c);
    if (val === -1) {
      throw new Error(`Invalid hex digit 0x${c.toString(16).padStart(2, '0')} at position ${i}`);
    }

    if (high === -1) {
      high = val;
    } else {
      result.push((high << 4) | val);
      high = -1;
    }
  }

  // Odd trailing digit: pad with 0
  if (high !== -1) {
    result.push(high << 4);
  }

  return new Uint8Array(result);
}

/** Decode ASCII85Decode (btoa) filter */
export function ascii85Decode(data: Uint8Array): Uint8Array {
  const result: number[] = [];
  let i = 0;

  // Skip leading <~ if present
  if (data.length >= 2 && data[0] === 0x3c && data[1] === 0x7e) {
    i = 2;
  }

  while (i < data.length) {
    const c = data[i];

    // End of data marker ~>
    if (c === 0x7e) break;

    if (isFilterWhitespace(c)) {
      i++;
      continue;
    }

    // 'z' shorthand for 4 zero bytes
    if (c === 0x7a) {
      result.push(0, 0, 0, 0);
      i++;
      continue;
    }

    // Collect up to 5 ASCII85 digits
    const group: number[] = [];
    while (group.length < 5 && i < data.length) {
      const ch = data[i];
      if (ch === 0x7e) break; // ~> end
      if (isFilterWhitespace(ch)) {
        i++;
        continue;
      }
      if (ch < 0x21 || ch > 0x75) {
        throw new Error(`Invalid ASCII85 byte 0x${ch.toString(16).padStart(2, '0')} at position ${i}`);
      }
      group.push(ch - 0x21);
      i++;
    }

    if (group.length === 0) break;
    if (group.length === 1) throw new Error('ASCII85 group with a single digit');

    // Pad incomplete groups with 'u' (84)
    const padding = 5 - group.length;
    while (group.length < 5) group.push(84);

    let value = 0;
    value += group[0] * 85 * 85 * 85 * 85;
    value += group[1] * 85 * 85 * 85;
    value += group[2] * 85 * 85;
    value += group[3] * 85;
    value += group[4];
    if (value > 0xffffffff) throw new Error('ASCII85 group out of range');

    result.push((value >>> 24) & 0xff);
    if (padding < 3) result.push((value >>> 16) & 0xff);
    if (padding < 2) result.push((value >>> 8) & 0xff);
    if (padding < 1) result.push(value & 0xff);
  }

  return new Uint8Array(result);
}

/** Decode LZWDecode filter */
export function lzwDecode(data: Uint8Array, earlyChange = 1): Uint8Array {
  const result: number[] = [];
  let bitPos = 0;
  let codeSize = 9;
  const clearCode = 256;
  const eoiCode = 257;

  type DictEntry = number[];
  let dictionary: DictEntry[] = [];
  let prevEntry: DictEntry | null = null;

  function resetDictionary(): void {
    dictionary = [];
    for (let i = 0; i < 256; i++) {
      dictionary.push([i]);
    }
    dictionary.push([]); // 256 = clear
    dictionary.push([]); // 257 = EOI
    codeSize = 9;
    prevEntry = null;
  }

  function readBits(n: number): number {
    let value = 0;
    for (let i = 0; i < n; i++) {
      const byteIndex = (bitPos + i) >> 3;
      const bitIndex = 7 - ((bitPos + i) & 7);
      if (byteIndex < data.length) {
        value = (value << 1) | ((data[byteIndex] >> bitIndex) & 1);
      }
    }
    bitPos += n;
    return value;
  }

  resetDictionary();

  while (bitPos + codeSize <= data.length * 8) {
    const code = readBits(codeSize);

    if (code === eoiCode) break;

    if (code === clearCode) {
      resetDictionary();
      continue;
    }

    let entry: DictEntry;
    if (code < dictionary.length) {
      entry = dictionary[code];
    } else if (code === dictionary.length && prevEntry) {
      entry = [...prevEntry, prevEntry[0]];
    } else {
      throw new Error(`Invalid LZW code ${code} at bit ${bitPos - codeSize}`);
    }

    for (const b of entry) result.push(b);

    if (prevEntry) {
      dictionary.push([...prevEntry, entry[0]]);
    }

    prevEntry = entry;

    // Increase code size when dictionary reaches threshold
    if (dictionary.length >= (1 << codeSize) - earlyChange && codeSize < 12) {
      codeSize++;
    }
  }

  return new Uint8Array(result);
}

/** Decode RunLengthDecode filter */
export function runLengthDecode(data: Uint8Array): Uint8Array {
  const result: number[] = [];
  let i = 0;

  while (i < data.length) {
    const length = data[i++];
    if (length === 128) break; // EOD

    if (length < 128) {
      // Copy the next length + 1 bytes literally
      const count = length + 1;
      if (i + count > data.length) throw new Error('RunLength literal run past end of data');
      for (let j = 0; j < count; j++) result.push(data[i + j]);
      i += count;
    } else {
      // Repeat the next byte 257 - length times
      if (i >= data.length) throw new Error('RunLength repeat run past end of data');
      const byte = data[i++];
      for (let j = 0; j < 257 - length; j++) result.push(byte);
    }
  }

  return new Uint8Array(result);
}

/** Apply PNG predictor to decoded data */
export function applyPNGPredictor(data: Uint8Array, columns: number, colors = 1, bitsPerComponent = 8): Uint8Array {
  if (!Number.isInteger(columns) || columns <= 0 || colors <= 0 || bitsPerComponent <= 0) return data;

  const bytesPerPixel = Math.max(1, Math.ceil((colors * bitsPerComponent) / 8));
  const rowBytes = Math.ceil((columns * colors * bitsPerComponent) / 8);
  if (rowBytes <= 0) return data;
  const rows = Math.floor(data.length / (rowBytes + 1));
  const result = new Uint8Array(rows * rowBytes);

  let srcOffset = 0;
  let dstOffset = 0;

  for (let row = 0; row < rows; row++) {
    const filterType = data[srcOffset++];
    const prevRow = row > 0 ? dstOffset - rowBytes : -1;

    for (let col = 0; col < rowBytes; col++) {
      const raw = data[srcOffset++];
      const left = col >= bytesPerPixel ? result[dstOffset - bytesPerPixel] : 0;
      const above = prevRow >= 0 ? result[prevRow + col] : 0;
      const upperLeft = (prevRow >= 0 && col >= bytesPerPixel) ? result[prevRow + col - bytesPerPixel] : 0;

      let value: number;
      switch (filterType) {
        case 0: // None
          value = raw;
          break;
        case 1: // Sub
          value = (raw + left) & 0xff;
          break;
        case 2: // Up
          value = (raw + above) & 0xff;
          break;
        case 3: // Average
          value = (raw + ((left + above) >> 1)) & 0xff;
          break;
        case 4: // Paeth
          value = (raw + paethPredictor(left, above, upperLeft)) & 0xff;
          break;
        default:
          throw new Error(`Unknown PNG predictor type ${filterType} in row ${row}`);
      }

      result[dstOffset++] = value;
    }
  }

  return result;
}

/** Apply TIFF predictor 2 (horizontal differencing); 8 and 16 bits per component */
export function applyTIFFPredictor(data: Uint8Array, columns: number, colors = 1, bitsPerComponent = 8): Uint8Array {
  if (!Number.isInteger(columns) || !Number.isInteger(colors) || columns <= 0 || colors <= 0) return data;
  if (bitsPerComponent !== 8 && bitsPerComponent !== 16) {
    throw new Error(`TIFF predictor with ${bitsPerComponent} bits per component is not supported`);
  }

  const bytesPerSample = bitsPerComponent / 8;
  const rowBytes = columns * colors * bytesPerSample;
  if (rowBytes <= 0) return data;
  const result = new Uint8Array(data);

  for (let rowStart = 0; rowStart + rowBytes <= result.length; rowStart += rowBytes) {
    if (bytesPerSample === 1) {
      for (let i = colors; i < rowBytes; i++) {
        result[rowStart + i] = (result[rowStart + i] + result[rowStart + i - colors]) & 0xff;
      }
    } else {
      const stride = colors * 2;
      for (let i = stride; i < rowBytes; i += 2) {
        const prev = (result[rowStart + i - stride] << 8) | result[rowStart + i - stride + 1];
        const cur = (result[rowStart + i] << 8) | result[rowStart + i + 1];
        const sum = (prev + cur) & 0xffff;
        result[rowStart + i] = sum >> 8;
        result[rowStart + i + 1] = sum & 0xff;
      }
    }
  }

  return result;
}

function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

function isFilterWhitespace(c: number): boolean {
  return c === 0x20 || c === 0x09 || c === 0x0a || c === 0x0d || c === 0x0c || c === 0x00;
}

function hexDigitValue(c: number): number {
  if (c >= 0x30 && c <= 0x39) return c - 0x30;
  if (c >= 0x41 && c <= 0x46) return c - 0x41 + 10;
  if (c >= 0x61 && c <= 0x66) return c - 0x61 + 10;
  return -1;
}
