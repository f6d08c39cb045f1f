/**
 * PDF Object Parser
 *
 * Turns tokens into PdfObject values and assembles indirect objects
 * ("N G obj ... endobj"), including stream bodies and object streams.
 * Problems that do not break the object are collected as ParseIssues; a
 * missing endobj/endstream throws PdfMalformedObjectError with whatever was
 * parsed so far, and the caller decides whether to recover.
 */

import { PdfLexer, TokenType, isWhitespace } from './lexer.js';
import type { Token } from './lexer.js';
import { PdfMalformedObjectError } from '../errors.js';
import type { PdfObject, PdfDict, PdfStream, PdfRef, ObjectId } from './types.js';
import {
  pdfRef, pdfDict, pdfName, pdfNumber, pdfArray, pdfString,
  pdfBool, pdfStream, PDF_NULL,
  isRef, isDict, isNumber, isValidId,
  dictGet, dictGetNumber,
} from './types.js';

export type ParseIssueKind =
  | 'lex-error'
  | 'unexpected-token'
  | 'duplicate-key'
  | 'nesting-limit'
  | 'malformed-object'
  | 'stream-length-mismatch';

/** A recoverable problem found while parsing one object */
export interface ParseIssue {
  readonly kind: ParseIssueKind;
  readonly message: string;
  readonly offset: number;
  readonly details?: Readonly<Record<string, string | number | boolean>>;
}

export interface ParsedObject {
  readonly id: ObjectId;
  readonly value: PdfObject;
  /** Offset of the object header */
  readonly start: number;
  /** Offset just past endobj */
  readonly end: number;
  readonly issues: readonly ParseIssue[];
}

/** Resolves an indirect /Length before the object graph exists */
export type LengthResolver = (ref: PdfRef) => number | undefined;

/** How far past the value to look for a misplaced endobj */
export const ENDOBJ_WINDOW = 1024;

const MAX_NESTING = 256;

const ENDSTREAM_MARKER = new TextEncoder().encode('endstream');
const ENDOBJ_MARKER = new TextEncoder().encode('endobj');
const OBJ_MARKER = new TextEncoder().encode(' obj');

/** Keywords that can only end or frame an object, never appear inside a value */
const STRUCTURAL_KEYWORDS = new Set([
  'obj', 'endobj', 'stream', 'endstream', 'xref', 'trailer', 'startxref',
]);

function isStructural(token: Token): boolean {
  return token.type === TokenType.Keyword && STRUCTURAL_KEYWORDS.has(token.value as string);
}

/** Parse a single PDF value from the given lexer position. */
export function parseValue(lexer: PdfLexer, issues?: ParseIssue[], depth = 0): PdfObject {
  return parseFromToken(lexer, lexer.nextToken(), issues, depth);
}

function parseFromToken(lexer: PdfLexer, token: Token, issues: ParseIssue[] | undefined, depth: number): PdfObject {
  switch (token.type) {
    case TokenType.Number: {
      if (!token.real && (token.value as number) >= 0) {
        const next = lexer.nextToken();
        if (next.type === TokenType.Number && !next.real) {
          const next2 = lexer.nextToken();
          if (next2.type === TokenType.Keyword && next2.value === 'R'
              && isValidId(token.value as number, next.value as number)) {
            return pdfRef(token.value as number, next.value as number);
          }
        }
        // Not a ref: back up so only the first number is consumed
        lexer.position = next.offset;
      }
      return pdfNumber(token.value as number, token.real === true);
    }

    case TokenType.String:
      return pdfString(token.value as Uint8Array);

    case TokenType.HexString:
      return pdfString(token.value as Uint8Array, true);

    case TokenType.Name:
      return pdfName(token.value as string);

    case TokenType.Bool:
      return pdfBool(token.value as boolean);

    case TokenType.Null:
      return PDF_NULL;

    case TokenType.DictStart:
      if (depth >= MAX_NESTING) return nestingLimit(lexer, token, issues);
      return parseDict(lexer, token, issues, depth + 1);

    case TokenType.ArrayStart:
      if (depth >= MAX_NESTING) return nestingLimit(lexer, token, issues);
      return parseArray(lexer, token, issues, depth + 1);

    case TokenType.LexError:
      issues?.push({ kind: 'lex-error', message: token.value as string, offset: token.offset });
      return PDF_NULL;

    case TokenType.EOF:
      issues?.push({ kind: 'unexpected-token', message: 'Unexpected end of input', offset: token.offset });
      return PDF_NULL;

    default:
      // Closing delimiters and structural keywords belong to the caller
      if (token.type === TokenType.DictEnd || token.type === TokenType.ArrayEnd || isStructural(token)) {
        lexer.position = token.offset;
      }
      issues?.push({
        kind: 'unexpected-token',
        message: `Unexpected ${token.type} '${String(token.value)}' where a value was expected`,
        offset: token.offset,
      });
      return PDF_NULL;
  }
}

function parseDict(lexer: PdfLexer, open: Token, issues: ParseIssue[] | undefined, depth: number): PdfDict {
  const entries = new Map<string, PdfObject>();
  while (true) {
    const keyToken = lexer.nextToken();
    if (keyToken.type === TokenType.DictEnd) break;
    if (keyToken.type === TokenType.EOF || isStructural(keyToken)) {
      lexer.position = keyToken.offset;
      issues?.push({
        kind: 'unexpected-token',
        message: `Unterminated dictionary starting at offset ${open.offset}`,
        offset: keyToken.offset,
      });
      break;
    }
    if (keyToken.type === TokenType.LexError) {
      issues?.push({ kind: 'lex-error', message: keyToken.value as string, offset: keyToken.offset });
      continue;
    }
    if (keyToken.type !== TokenType.Name) {
      issues?.push({
        kind: 'unexpected-token',
        message: `Dictionary key is a ${keyToken.type}, not a name`,
        offset: keyToken.offset,
      });
      continue;
    }
    const key = keyToken.value as string;
    const value = parseValue(lexer, issues, depth);
    if (entries.has(key)) {
      issues?.push({
        kind: 'duplicate-key',
        message: `Duplicate dictionary key /${key}`,
        offset: keyToken.offset,
        details: { key },
      });
    }
    entries.set(key, value);
  }
  return pdfDict(entries);
}

function parseArray(lexer: PdfLexer, open: Token, issues: ParseIssue[] | undefined, depth: number): PdfObject {
  const items: PdfObject[] = [];
  while (true) {
    const token = lexer.nextToken();
    if (token.type === TokenType.ArrayEnd) break;
    if (token.type === TokenType.EOF || token.type === TokenType.DictEnd || isStructural(token)) {
      lexer.position = token.offset;
      issues?.push({
        kind: 'unexpected-token',
        message: `Unterminated array starting at offset ${open.offset}`,
        offset: token.offset,
      });
      break;
    }
    if (token.type === TokenType.LexError) {
      issues?.push({ kind: 'lex-error', message: token.value as string, offset: token.offset });
      continue;
    }
    items.push(parseFromToken(lexer, token, issues, depth));
  }
  return pdfArray(items);
}

function nestingLimit(lexer: PdfLexer, token: Token, issues: ParseIssue[] | undefined): PdfObject {
  issues?.push({
    kind: 'nesting-limit',
    message: `Nesting deeper than ${MAX_NESTING} levels`,
    offset: token.offset,
  });
  // Skip the whole nested span so the enclosing container stays aligned
  let level = 1;
  while (level > 0) {
    const t = lexer.nextToken();
    if (t.type === TokenType.EOF) break;
    if (t.type === TokenType.DictStart || t.type === TokenType.ArrayStart) level++;
    if (t.type === TokenType.DictEnd || t.type === TokenType.ArrayEnd) level--;
  }
  return PDF_NULL;
}

export class ObjectParser {
  private readonly lexer: PdfLexer;
  private lengthResolver: LengthResolver | undefined;

  constructor(data: Uint8Array, lengthResolver?: LengthResolver) {
    this.lexer = new PdfLexer(data);
    this.lengthResolver = lengthResolver;
  }

  get length(): number {
    return this.lexer.length;
  }

  setLengthResolver(fn: LengthResolver | undefined): void {
    this.lengthResolver = fn;
  }

  /** Raw bytes of the underlying file */
  slice(start: number, end: number): Uint8Array {
    return this.lexer.slice(start, end);
  }

  /** Parse the object header "N G obj" at `offset` without parsing its body. */
  readHeader(offset: number): ObjectId | null {
    if (offset < 0 || offset >= this.lexer.length) return null;
    this.lexer.position = offset;
    const numToken = this.lexer.nextToken();
    const genToken = this.lexer.nextToken();
    const objKeyword = this.lexer.nextToken();
    if (numToken.type !== TokenType.Number || genToken.type !== TokenType.Number) return null;
    if (objKeyword.type !== TokenType.Keyword || objKeyword.value !== 'obj') return null;
    const objNum = numToken.value as number;
    const gen = genToken.value as number;
    return isValidId(objNum, gen) ? { objNum, gen } : null;
  }

  /** Parse "N G obj <value> [stream ... endstream] endobj" at `offset`. */
  parseObjectAt(offset: number): ParsedObject {
    const id = this.readHeader(offset);
    if (!id) {
      throw new PdfMalformedObjectError(`No object header at offset ${offset}`, offset);
    }

    const issues: ParseIssue[] = [];
    let value = parseValue(this.lexer, issues);

    this.lexer.skipWhitespaceAndComments();
    const afterValue = this.lexer.position;
    const next = this.lexer.nextToken();

    if (next.type === TokenType.Keyword && next.value === 'stream') {
      if (!isDict(value)) {
        throw new PdfMalformedObjectError(
          `Object ${id.objNum} ${id.gen} has a stream body without a dictionary`, offset, value,
        );
      }
      value = this.readStreamBody(id, value, offset, issues);
    } else {
      this.lexer.position = afterValue;
    }

    const bodyEnd = this.lexer.position;
    const endToken = this.lexer.nextToken();
    if (endToken.type === TokenType.Keyword && endToken.value === 'endobj') {
      return { id, value, start: offset, end: endToken.end, issues };
    }

    // Tolerate junk before a nearby endobj, unless another object starts first
    const limit = bodyEnd + ENDOBJ_WINDOW;
    const endPos = this.lexer.findNext(ENDOBJ_MARKER, bodyEnd, limit);
    if (endPos !== -1 && this.lexer.findNext(OBJ_MARKER, bodyEnd, endPos) === -1) {
      issues.push({
        kind: 'unexpected-token',
        message: `Unexpected bytes before endobj of object ${id.objNum} ${id.gen}`,
        offset: bodyEnd,
      });
      return { id, value, start: offset, end: endPos + ENDOBJ_MARKER.length, issues };
    }

    throw new PdfMalformedObjectError(
      `Object ${id.objNum} ${id.gen} at offset ${offset} is missing endobj`, offset, value,
    );
  }

  /**
   * Locate the raw span of a stream. The declared /Length is tried first and
   * accepted when "endstream" follows it; otherwise the span ends at the next
   * "endstream". Both lengths are kept in the issue when they disagree.
   */
  private readStreamBody(id: ObjectId, dict: PdfDict, objOffset: number, issues: ParseIssue[]): PdfStream {
    // Skip the single line ending after "stream"
    const b = this.lexer.peek();
    if (b === 0x0d) { // CR
      this.lexer.read();
      if (this.lexer.peek() === 0x0a) this.lexer.read(); // CRLF
    } else if (b === 0x0a) { // LF
      this.lexer.read();
    }

    const streamStart = this.lexer.position;
    const fileLength = this.lexer.length;
    const declared = this.declaredLength(dict);

    if (declared !== undefined && declared >= 0 && streamStart + declared <= fileLength) {
      const endstream = this.endstreamAt(streamStart + declared);
      if (endstream !== -1) {
        this.lexer.position = endstream + ENDSTREAM_MARKER.length;
        return pdfStream(dict, this.lexer.slice(streamStart, streamStart + declared));
      }
    }

    const endPos = this.lexer.findNext(ENDSTREAM_MARKER, streamStart);
    if (endPos === -1) {
      const fallbackEnd = declared !== undefined && declared >= 0 && streamStart + declared <= fileLength
        ? streamStart + declared
        : fileLength;
      throw new PdfMalformedObjectError(
        `Stream ${id.objNum} ${id.gen} is missing endstream`,
        objOffset,
        pdfStream(dict, this.lexer.slice(streamStart, fallbackEnd)),
      );
    }

    let dataEnd = endPos;
    if (dataEnd > streamStart && this.lexer.byteAt(dataEnd - 1) === 0x0a) dataEnd--;
    if (dataEnd > streamStart && this.lexer.byteAt(dataEnd - 1) === 0x0d) dataEnd--;
    const actual = dataEnd - streamStart;

    if (declared !== undefined && declared !== actual) {
      issues.push({
        kind: 'stream-length-mismatch',
        message: `Stream ${id.objNum} ${id.gen} declares /Length ${declared} but endstream is found after ${actual} bytes`,
        offset: streamStart,
        details: { declared, actual },
      });
    }

    this.lexer.position = endPos + ENDSTREAM_MARKER.length;
    return pdfStream(dict, this.lexer.slice(streamStart, dataEnd));
  }

  private declaredLength(dict: PdfDict): number | undefined {
    const lengthObj = dictGet(dict, 'Length');
    if (!lengthObj) return undefined;
    if (isNumber(lengthObj)) return lengthObj.value;
    if (isRef(lengthObj)) return this.lengthResolver?.(lengthObj);
    return undefined;
  }

  /** Offset of "endstream" if it follows `pos` after optional whitespace, else -1 */
  private endstreamAt(pos: number): number {
    let p = pos;
    while (p < this.lexer.length && isWhitespace(this.lexer.byteAt(p))) p++;
    for (let i = 0; i < ENDSTREAM_MARKER.length; i++) {
      if (this.lexer.byteAt(p + i) !== ENDSTREAM_MARKER[i]) return -1;
    }
    return p;
  }
}

/** One member of an object stream */
export interface ObjectStreamMember {
  readonly objNum: number;
  readonly value: PdfObject;
}

/**
 * Parse all members of a /Type /ObjStm stream from its decoded content.
 * Members whose header is unusable are reported and left out.
 */
export function parseObjectStream(
  stream: PdfStream,
  decoded: Uint8Array,
  issues?: ParseIssue[],
): ObjectStreamMember[] {
  const n = dictGetNumber(stream.dict, 'N') ?? 0;
  const first = dictGetNumber(stream.dict, 'First') ?? 0;
  if (!Number.isInteger(n) || n < 0 || !Number.isInteger(first) || first < 0 || first > decoded.length) {
    issues?.push({
      kind: 'malformed-object',
      message: `Object stream header /N ${n} /First ${first} does not fit ${decoded.length} decoded bytes`,
      offset: 0,
      details: { n, first },
    });
    return [];
  }

  const headerLexer = new PdfLexer(decoded);
  const pairs: Array<{ objNum: number; offset: number }> = [];

  for (let i = 0; i < n; i++) {
    const numToken = headerLexer.nextToken();
    const offsetToken = headerLexer.nextToken();
    if (numToken.type !== TokenType.Number || offsetToken.type !== TokenType.Number) break;
    const objNum = numToken.value as number;
    const offset = (offsetToken.value as number) + first;
    if (!Number.isInteger(objNum) || !Number.isInteger(offset) || offset < first || offset >= decoded.length) {
      issues?.push({
        kind: 'malformed-object',
        message: `Object stream member ${i} (object ${objNum}) has offset ${offset}, outside ${first}..${decoded.length - 1}`,
        offset: numToken.offset,
        details: { index: i, objNum, offset },
      });
      continue;
    }
    pairs.push({ objNum, offset });
  }

  return pairs.map(({ objNum, offset }) => {
    const objLexer = new PdfLexer(decoded, offset);
    return { objNum, value: parseValue(objLexer, issues) };
  });
}
