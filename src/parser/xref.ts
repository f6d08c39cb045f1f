/**
 * PDF Cross-Reference Section Readers
 *
 * Handles both:
 * - Traditional xref tables (text-based, PDF 1.0+)
 * - Cross-reference streams (compressed, PDF 1.5+)
 *
 * Each reader returns one section exactly as written; merging revisions and
 * recovery live in resolver.ts.
 */

import { PdfLexer, TokenType, isWhitespace, isDelimiter } from './lexer.js';
import { ObjectParser, parseValue } from './parser.js';
import type { ParsedObject } from './parser.js';
import { PdfXRefError } from '../errors.js';
import type { XRefEntry, TrailerInfo, PdfDict } from './types.js';
import {
  isNumber, isDict, isStream, isArray, isValidId,
  dictGet, dictGetNumber, dictGetName, dictGetRef,
} from './types.js';
import { decodeStream } from '../stream/decoder.js';

/** An entry as written in its section, before it is assigned a revision */
export type SectionEntry = Omit<XRefEntry, 'section'>;

/** How a revision's cross-reference data was obtained; 'recovered' comes from a full scan */
export type SectionForm = 'table' | 'stream' | 'recovered';

export interface RawSection {
  readonly offset: number;
  readonly form: Exclude<SectionForm, 'recovered'>;
  readonly entries: Map<number, SectionEntry>;
  readonly trailer: TrailerInfo;
}

/** An "N G obj" header found by the full-file scan */
export interface ScannedHeader {
  readonly objNum: number;
  readonly gen: number;
  readonly offset: number;
}

export interface ScannedTrailer {
  readonly offset: number;
  readonly dict: PdfDict;
}

export interface ScanResult {
  /** In file order */
  readonly headers: ScannedHeader[];
  /** `trailer` dictionaries in file order */
  readonly trailers: ScannedTrailer[];
}

const STARTXREF_MARKER = new TextEncoder().encode('startxref');
const OBJ_MARKER = new TextEncoder().encode(' obj');
const TRAILER_MARKER = new TextEncoder().encode('trailer');

/** Widest /W field we read; wider values cannot address a real file */
const MAX_FIELD_WIDTH = 8;

/**
 * Locate the startxref offset by scanning backward from the end of the file.
 */
export function findStartXRef(lexer: PdfLexer): number {
  const pos = lexer.findLast(STARTXREF_MARKER);
  if (pos === -1) {
    throw new PdfXRefError('Could not find startxref marker');
  }

  lexer.position = pos + STARTXREF_MARKER.length;
  lexer.skipWhitespaceAndComments();

  const token = lexer.nextToken();
  if (token.type !== TokenType.Number || token.real || (token.value as number) < 0) {
    throw new PdfXRefError('Invalid startxref offset', pos);
  }

  return token.value as number;
}

/**
 * Read the section at `offset`, whichever form it takes.
 */
export function readSectionAt(parser: ObjectParser, lexer: PdfLexer, offset: number): RawSection {
  if (offset < 0 || offset >= lexer.length) {
    throw new PdfXRefError(`Cross-reference offset ${offset} is outside the file`, offset);
  }
  lexer.position = offset;
  lexer.skipWhitespaceAndComments();
  const token = lexer.nextToken();
  if (token.type === TokenType.Keyword && token.value === 'xref') {
    return parseXRefTable(lexer, offset);
  }
  if (token.type === TokenType.Number) {
    return parseXRefStream(parser, offset);
  }
  throw new PdfXRefError(`No cross-reference section at offset ${offset}`, offset);
}

/**
 * Parse a traditional xref table section.
 * Returns the entries and trailer info.
 */
export function parseXRefTable(lexer: PdfLexer, offset: number): RawSection {
  const entries = new Map<number, SectionEntry>();

  lexer.position = offset;
  lexer.skipWhitespaceAndComments();

  // Read "xref" keyword
  const line = lexer.readLine().trim();
  if (line !== 'xref') {
    throw new PdfXRefError(`Expected 'xref' at offset ${offset}`, offset);
  }

  // Read subsections
  while (true) {
    lexer.skipWhitespaceAndComments();
    const savedPos = lexer.position;

    const firstLine = lexer.readLine().trim();
    if (firstLine.startsWith('trailer')) {
      // The dictionary may share the keyword's line
      lexer.position = savedPos + 'trailer'.length;
      break;
    }

    const parts = firstLine.split(/\s+/);
    const startObj = parts.length >= 2 ? parseInt(parts[0], 10) : NaN;
    const count = parts.length >= 2 ? parseInt(parts[1], 10) : NaN;
    if (isNaN(startObj) || isNaN(count) || startObj < 0 || count < 0) {
      throw new PdfXRefError(`Malformed xref subsection header '${firstLine}'`, savedPos);
    }

    for (let i = 0; i < count; i++) {
      const entryPos = lexer.position;
      const entryParts = lexer.readLine().trim().split(/\s+/);
      const entryOffset = parseInt(entryParts[0], 10);
      const gen = parseInt(entryParts[1], 10);
      const type = entryParts[2];
      const objNum = startObj + i;

      if (entryParts.length < 3 || isNaN(entryOffset) || isNaN(gen) || (type !== 'n' && type !== 'f')) {
        throw new PdfXRefError(`Malformed xref entry for object ${objNum}`, entryPos);
      }

      // A repeated number within one section: the first entry is kept
      if (!entries.has(objNum)) {
        entries.set(objNum, { offset: entryOffset, gen, free: type === 'f' });
      }
    }
  }

  // Parse trailer dictionary
  const trailerDict = parseValue(lexer);
  if (!isDict(trailerDict)) {
    throw new PdfXRefError(`Missing trailer dictionary for xref at offset ${offset}`, offset);
  }

  return { offset, form: 'table', entries, trailer: extractTrailerInfo(trailerDict) };
}

/**
 * Parse a cross-reference stream (PDF 1.5+).
 * The stream at the given offset is an indirect object containing both the
 * xref entries and the trailer dictionary.
 */
export function parseXRefStream(parser: ObjectParser, offset: number): RawSection {
  const entries = new Map<number, SectionEntry>();

  let parsed: ParsedObject;
  try {
    parsed = parser.parseObjectAt(offset);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PdfXRefError(`Unreadable xref stream at offset ${offset}: ${reason}`, offset);
  }
  const stream = parsed.value;
  if (!isStream(stream) || dictGetName(stream.dict, 'Type') !== 'XRef') {
    throw new PdfXRefError(`Object at offset ${offset} is not an xref stream`, offset);
  }
  const dict = stream.dict;

  let decoded: Uint8Array;
  try {
    decoded = decodeStream(stream.data, dict);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PdfXRefError(`Cannot decode xref stream at offset ${offset}: ${reason}`, offset);
  }

  // Parse W array for field widths
  const wObj = dictGet(dict, 'W');
  if (!wObj || !isArray(wObj)) {
    throw new PdfXRefError('Missing /W array in xref stream', offset);
  }
  const w = wObj.items.map(item => isNumber(item) ? item.value : -1);
  if (w.length < 3 || w.some(width => !Number.isInteger(width) || width < 0 || width > MAX_FIELD_WIDTH)) {
    throw new PdfXRefError('/W array must have 3 valid field widths', offset);
  }

  // Parse Size
  const size = dictGetNumber(dict, 'Size') ?? 0;

  // Parse Index array (default: [0 Size])
  let indexPairs: number[] = [0, size];
  const indexObj = dictGet(dict, 'Index');
  if (indexObj && isArray(indexObj)) {
    indexPairs = indexObj.items.map(item => isNumber(item) ? item.value : 0);
  }

  const entrySize = w[0] + w[1] + w[2];
  if (entrySize === 0) {
    throw new PdfXRefError('/W array describes empty entries', offset);
  }
  let dataPos = 0;

  for (let idx = 0; idx + 1 < indexPairs.length; idx += 2) {
    const startObj = indexPairs[idx];
    const count = indexPairs[idx + 1];

    for (let i = 0; i < count; i++) {
      if (dataPos + entrySize > decoded.length) break;

      const field1 = readFieldValue(decoded, dataPos, w[0]);
      const field2 = readFieldValue(decoded, dataPos + w[0], w[1]);
      const field3 = readFieldValue(decoded, dataPos + w[0] + w[1], w[2]);
      dataPos += entrySize;

      const objNum = startObj + i;

      // Default type is 1 if w[0] is 0
      const type = w[0] === 0 ? 1 : field1;

      if (entries.has(objNum)) continue;

      switch (type) {
        case 0: // free object
          entries.set(objNum, { offset: 0, gen: field3, free: true });
          break;
        case 1: // uncompressed object
          entries.set(objNum, { offset: field2, gen: field3, free: false });
          break;
        case 2: // compressed object in an object stream
          entries.set(objNum, {
            offset: 0,
            gen: 0,
            free: false,
            streamObjNum: field2,
            streamIndex: field3,
          });
          break;
        // Unknown types are reserved and read as null references
      }
    }
  }

  return { offset, form: 'stream', entries, trailer: extractTrailerInfo(dict) };
}

/**
 * Read a big-endian integer value from a byte sequence of a given width.
 */
function readFieldValue(data: Uint8Array, offset: number, width: number): number {
  let value = 0;
  for (let i = 0; i < width; i++) {
    value = value * 256 + (data[offset + i] ?? 0);
  }
  return value;
}

export function extractTrailerInfo(dict: PdfDict): TrailerInfo {
  const encrypt = dictGet(dict, 'Encrypt');
  return {
    size: dictGetNumber(dict, 'Size') ?? 0,
    root: dictGetRef(dict, 'Root'),
    info: dictGetRef(dict, 'Info'),
    encrypt: encrypt && encrypt.kind !== 'null' ? encrypt : undefined,
    prev: dictGetNumber(dict, 'Prev'),
    xrefStm: dictGetNumber(dict, 'XRefStm'),
    dict,
  };
}

/**
 * Full document scan. Finds every "N G obj" header and every `trailer`
 * dictionary, in file order. Mirrors PDF.js's "Indexing all PDF objects"
 * recovery strategy; choosing between duplicates is left to the caller.
 */
export function scanForObjects(lexer: PdfLexer): ScanResult {
  const headers: ScannedHeader[] = [];

  // Scan for "N N obj" patterns by searching for " obj" marker
  let searchPos = 0;
  while (searchPos < lexer.length) {
    const objPos = lexer.findNext(OBJ_MARKER, searchPos);
    if (objPos === -1) break;

    const after = objPos + OBJ_MARKER.length;
    const terminated = after >= lexer.length
      || isWhitespace(lexer.byteAt(after)) || isDelimiter(lexer.byteAt(after));
    const header = terminated ? parseObjHeader(lexer, objPos) : null;
    if (header) headers.push(header);

    searchPos = after;
  }

  const trailers: ScannedTrailer[] = [];
  let trailerPos = lexer.findNext(TRAILER_MARKER, 0);
  while (trailerPos !== -1) {
    lexer.position = trailerPos + TRAILER_MARKER.length;
    const dict = parseValue(lexer);
    if (isDict(dict)) trailers.push({ offset: trailerPos, dict });
    trailerPos = lexer.findNext(TRAILER_MARKER, trailerPos + TRAILER_MARKER.length);
  }

  return { headers, trailers };
}

/**
 * Parse backward from a " obj" marker to extract objNum and gen.
 * Returns null if the bytes before " obj" don't form a valid "N N" pattern.
 */
function parseObjHeader(lexer: PdfLexer, objSpacePos: number): ScannedHeader | null {
  // objSpacePos points to the space in " obj"
  // We need to look backward to find digits, then a space, then more digits
  let pos = objSpacePos - 1;

  // Skip any whitespace before " obj"
  while (pos >= 0 && isWhitespace(lexer.byteAt(pos))) pos--;

  // Read gen number digits backward
  const genEnd = pos + 1;
  while (pos >= 0 && isDigit(lexer.byteAt(pos))) pos--;
  const genStart = pos + 1;
  if (genStart >= genEnd) return null;

  // Expect whitespace
  if (pos < 0 || !isWhitespace(lexer.byteAt(pos))) return null;

  // Skip whitespace
  while (pos >= 0 && isWhitespace(lexer.byteAt(pos))) pos--;

  // Read objNum digits backward
  const numEnd = pos + 1;
  while (pos >= 0 && isDigit(lexer.byteAt(pos))) pos--;
  const numStart = pos + 1;
  if (numStart >= numEnd) return null;

  // The byte before objNum should be whitespace, a delimiter or start of file
  if (pos >= 0 && !isWhitespace(lexer.byteAt(pos)) && !isDelimiter(lexer.byteAt(pos))) {
    return null;
  }

  // Longer digit runs cannot be valid ids
  if (numEnd - numStart > 10 || genEnd - genStart > 5) return null;
  const objNum = readDigits(lexer, numStart, numEnd);
  const gen = readDigits(lexer, genStart, genEnd);
  if (!isValidId(objNum, gen)) return null;

  return { objNum, gen, offset: numStart };
}

function isDigit(b: number): boolean {
  return b >= 0x30 && b <= 0x39;
}

function readDigits(lexer: PdfLexer, start: number, end: number): number {
  let value = 0;
  for (let i = start; i < end; i++) value = value * 10 + (lexer.byteAt(i) - 0x30);
  return value;
}
