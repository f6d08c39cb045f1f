/**
 * Stream decoder: dispatches to the appropriate filter(s) based on the
 * /Filter and /DecodeParms entries in a stream dictionary.
 */

import type { PdfDict, PdfObject } from '../parser/types.js';
import { dictGet, dictGetNumber, isArray, isName, isDict } from '../parser/types.js';
import { PdfDecodeError } from '../errors.js';
import {
  flateDecode, asciiHexDecode, ascii85Decode, lzwDecode, runLengthDecode,
  applyPNGPredictor, applyTIFFPredictor,
} from './filters.js';

type ResolveFn = (obj: PdfObject) => PdfObject;

/** One step of a /Filter chain with its /DecodeParms */
export interface FilterSpec {
  readonly name: string;
  readonly parms?: PdfDict;
}

/** Abbreviations allowed in inline images and, in practice, in streams */
const FILTER_ALIASES: Readonly<Record<string, string>> = {
  Fl: 'FlateDecode',
  AHx: 'ASCIIHexDecode',
  A85: 'ASCII85Decode',
  LZW: 'LZWDecode',
  RL: 'RunLengthDecode',
  DCT: 'DCTDecode',
  CCF: 'CCITTFaxDecode',
};

/** Image codecs: the chain ends here and the encoded bytes are kept */
export const IMAGE_CODECS: ReadonlySet<string> = new Set([
  'DCTDecode', 'JPXDecode', 'CCITTFaxDecode', 'JBIG2Decode',
]);

export function canonicalFilterName(name: string): string {
  return FILTER_ALIASES[name] ?? name;
}

/** The /Filter chain of a stream dictionary, names expanded */
export function getFilterChain(dict: PdfDict, resolve?: ResolveFn): FilterSpec[] {
  let filterObj = dictGet(dict, 'Filter');
  if (!filterObj) return [];

  // Resolve indirect refs for /Filter and /DecodeParms
  if (resolve) filterObj = resolve(filterObj);
  let parmsObj = dictGet(dict, 'DecodeParms') ?? dictGet(dict, 'DP');
  if (parmsObj && resolve) parmsObj = resolve(parmsObj);

  // Single filter
  if (isName(filterObj)) {
    const parms = parmsObj && isDict(parmsObj) ? parmsObj : undefined;
    return [withParms(canonicalFilterName(filterObj.value), parms)];
  }

  const chain: FilterSpec[] = [];
  if (isArray(filterObj)) {
    for (let i = 0; i < filterObj.items.length; i++) {
      let filter = filterObj.items[i];
      if (resolve) filter = resolve(filter);
      if (!isName(filter)) {
        throw new PdfDecodeError(`Filter at position ${i} is not a name`, 'Unknown', i);
      }
      let parms: PdfDict | undefined;
      if (parmsObj && isArray(parmsObj) && i < parmsObj.items.length) {
        let p = parmsObj.items[i];
        if (resolve) p = resolve(p);
        if (isDict(p)) parms = p;
      } else if (parmsObj && isDict(parmsObj)) {
        parms = parmsObj;
      }
      chain.push(withParms(canonicalFilterName(filter.value), parms));
    }
  }
  return chain;
}

export function decodeStream(
  data: Uint8Array,
  dict: PdfDict,
  resolve?: ResolveFn,
): Uint8Array {
  const chain = getFilterChain(dict, resolve);
  let result = data;
  for (let i = 0; i < chain.length; i++) {
    const { name, parms } = chain[i];
    if (IMAGE_CODECS.has(name)) break;
    try {
      result = applyFilter(result, name, parms);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new PdfDecodeError(`${name} failed at filter ${i}: ${reason}`, name, i);
    }
  }
  return result;
}

function withParms(name: string, parms: PdfDict | undefined): FilterSpec {
  return parms ? { name, parms } : { name };
}

function applyFilter(data: Uint8Array, filterName: string, parms?: PdfDict): Uint8Array {
  let decoded: Uint8Array;

  switch (filterName) {
    case 'FlateDecode':
      decoded = flateDecode(data);
      break;
    case 'ASCIIHexDecode':
      return asciiHexDecode(data);
    case 'ASCII85Decode':
      return ascii85Decode(data);
    case 'LZWDecode': {
      const earlyChange = parms ? (dictGetNumber(parms, 'EarlyChange') ?? 1) : 1;
      decoded = lzwDecode(data, earlyChange);
      break;
    }
    case 'RunLengthDecode':
      return runLengthDecode(data);
    case 'Crypt':
      // Identity unless the document is decrypted, which is out of scope
      return data;
    default:
      throw new Error(`Unsupported filter /${filterName}`);
  }

  // Predictors only apply to Flate and LZW
  if (parms) {
    const predictor = dictGetNumber(parms, 'Predictor') ?? 1;
    if (predictor === 1) return decoded;
    const columns = positiveInteger(parms, 'Columns', 1);
    const colors = positiveInteger(parms, 'Colors', 1);
    const bpc = positiveInteger(parms, 'BitsPerComponent', 8);
    if (predictor >= 10) {
      decoded = applyPNGPredictor(decoded, columns, colors, bpc);
    } else if (predictor === 2) {
      decoded = applyTIFFPredictor(decoded, columns, colors, bpc);
    } else {
      throw new Error(`Unknown predictor ${predictor}`);
    }
  }

  return decoded;
}

function positiveInteger(parms: PdfDict, key: string, fallback: number): number {
  const value = dictGetNumber(parms, key) ?? fallback;
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`/DecodeParms /${key} must be a positive integer, got ${value}`);
  }
  return value;
}
