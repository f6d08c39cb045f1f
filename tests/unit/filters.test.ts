import { describe, it, expect } from 'vitest';
import { deflateSync } from 'node:zlib';
import {
  flateDecode, asciiHexDecode, ascii85Decode, lzwDecode, runLengthDecode,
  applyPNGPredictor, applyTIFFPredictor,
} from '../../src/stream/filters.js';
import { PdfDecodeError } from '../../src/errors.js';

const encode = (s: string) => new TextEncoder().encode(s);
const decode = (b: Uint8Array) => new TextDecoder().decode(b);

describe('Stream Filters', () => {
  describe('flateDecode', () => {
    it('decompresses zlib data', () => {
      const compressed = deflateSync(encode('Hello, World!'));
      expect(decode(flateDecode(new Uint8Array(compressed)))).toBe('Hello, World!');
    });

    it('handles an empty stream', () => {
      const result = flateDecode(new Uint8Array([0x78, 0x9c, 0x03, 0x00, 0x00, 0x00, 0x00, 0x01]));
      expect(result).toEqual(new Uint8Array(0));
    });

    it('throws PdfDecodeError for data that is not zlib', () => {
      expect(() => flateDecode(encode('plainly not compressed'))).toThrow(PdfDecodeError);
    });
  });

  describe('asciiHexDecode', () => {
    it('decodes hex-encoded data', () => {
      expect(decode(asciiHexDecode(encode('48656C6C6F>')))).toBe('Hello');
    });

    it('handles whitespace in hex data', () => {
      expect(decode(asciiHexDecode(encode('48 65 6C 6C 6F>')))).toBe('Hello');
    });

    it('pads odd-length hex with zero', () => {
      expect(asciiHexDecode(encode('4>'))).toEqual(new Uint8Array([0x40]));
    });

    it('rejects a non-hex digit', () => {
      expect(() => asciiHexDecode(encode('4G>'))).toThrow('Invalid hex digit 0x47 at position 1');
    });
  });

  describe('ascii85Decode', () => {
    it('decodes a full group and a partial group', () => {
      expect(decode(ascii85Decode(encode('87cURDZ~>')))).toBe('Hello');
    });

    it('handles z shorthand for zero bytes', () => {
      expect(ascii85Decode(encode('z~>'))).toEqual(new Uint8Array([0, 0, 0, 0]));
    });

    it('strips <~ prefix', () => {
      expect(ascii85Decode(encode('<~z~>')).length).toBe(4);
    });

    it('rejects a byte outside the alphabet', () => {
      expect(() => ascii85Decode(encode('87c{R~>'))).toThrow('Invalid ASCII85 byte 0x7b at position 3');
    });

    it('rejects a trailing single digit', () => {
      expect(() => ascii85Decode(encode('87cURD~>'))).toThrow('ASCII85 group with a single digit');
    });
  });

  describe('lzwDecode', () => {
    it('decodes the classic example', () => {
      const result = lzwDecode(new Uint8Array([0x80, 0x0b, 0x60, 0x50, 0x22, 0x0c, 0x0c, 0x85, 0x01]));
      expect(decode(result)).toBe('-----A---B');
    });

    it('rejects a code beyond the table', () => {
      // First 9-bit code is 300
      expect(() => lzwDecode(new Uint8Array([0x96, 0x00]))).toThrow('Invalid LZW code 300 at bit 0');
    });
  });

  describe('runLengthDecode', () => {
    it('expands literal and repeat runs', () => {
      const data = new Uint8Array([2, 0x61, 0x62, 0x63, 254, 0x7a, 128]);
      expect(decode(runLengthDecode(data))).toBe('abczzz');
    });

    it('rejects a literal run past the end', () => {
      expect(() => runLengthDecode(new Uint8Array([4, 0x61]))).toThrow('RunLength literal run past end of data');
    });
  });

  describe('predictors', () => {
    it('undoes PNG Up and Sub rows', () => {
      const data = new Uint8Array([2, 1, 2, 2, 1, 1, 1, 10, 5]);
      expect(applyPNGPredictor(data, 2)).toEqual(new Uint8Array([1, 2, 2, 3, 10, 15]));
    });

    it('rejects an unknown PNG row type', () => {
      expect(() => applyPNGPredictor(new Uint8Array([7, 1, 2]), 2)).toThrow('Unknown PNG predictor type 7 in row 0');
    });

    it('undoes TIFF horizontal differencing at 8 bits', () => {
      expect(applyTIFFPredictor(new Uint8Array([1, 1, 1]), 3)).toEqual(new Uint8Array([1, 2, 3]));
    });

    it('undoes TIFF horizontal differencing at 16 bits', () => {
      const data = new Uint8Array([0x00, 0x01, 0x00, 0x02]);
      expect(applyTIFFPredictor(data, 2, 1, 16)).toEqual(new Uint8Array([0x00, 0x01, 0x00, 0x03]));
    });

    it('leaves data unchanged when a row has no bytes', () => {
      const data = new Uint8Array([1, 1, 1]);
      expect(applyTIFFPredictor(data, 3, 0)).toEqual(data);
      expect(applyTIFFPredictor(data, 3, -1)).toEqual(data);
      expect(applyTIFFPredictor(data, 1.5)).toEqual(data);
      expect(applyPNGPredictor(data, 2, 0)).toEqual(data);
    });
  });
});
