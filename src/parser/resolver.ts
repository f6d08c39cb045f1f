/**
 * Cross-Reference Resolver
 *
 * Follows the startxref / Prev chain, merges every revision into one live
 * map (the latest revision wins) and keeps what the later revisions hide.
 * When the chain cannot be trusted the file is rebuilt from a scan of its
 * object headers.
 */

import { PdfLexer } from './lexer.js';
import { ObjectParser, parseObjectStream } from './parser.js';
import type { ParsedObject } from './parser.js';
import { findStartXRef, readSectionAt, scanForObjects, extractTrailerInfo } from './xref.js';
import type { RawSection, SectionForm } from './xref.js';
import { PdfXRefError } from '../errors.js';
import { decodeStream } from '../stream/decoder.js';
import type { AnomalyLog } from '../forensics/anomalies.js';
import type { ObjectId, PdfDict, PdfObject, PdfRef, PdfStream, TrailerInfo, XRefEntry } from './types.js';
import {
  pdfRef, pdfDict, pdfNumber, asDict, isStream, isRef, dictGet, dictGetName,
} from './types.js';

/** One revision of the file, as read from its cross-reference section */
export interface XRefSection {
  /** 0 is the original file, higher numbers are later updates */
  readonly index: number;
  /** Byte offset of the section; -1 for a reconstructed one */
  readonly offset: number;
  readonly form: SectionForm;
  readonly entries: ReadonlyMap<number, XRefEntry>;
  readonly trailer: TrailerInfo;
}

/** An older entry hidden by a later revision (or a later duplicate header) */
export interface ShadowedEntry {
  readonly objNum: number;
  readonly entry: XRefEntry;
  readonly shadowedBy: XRefEntry;
}

export interface HeaderInfo {
  /** Version from the %PDF-x.y header */
  readonly version?: string;
  /** Offset of the header, -1 when absent */
  readonly offset: number;
  /** Offset of the last %%EOF marker, -1 when absent */
  readonly eofOffset: number;
  /** Bytes after the last %%EOF other than trailing whitespace */
  readonly trailingBytes: number;
}

const HEADER_MARKER = new TextEncoder().encode('%PDF-');
const EOF_MARKER = new TextEncoder().encode('%%EOF');

/** How far into the file a header is still accepted */
const HEADER_WINDOW = 1024;

/** Trailer keys a later revision inherits when it omits them */
const INHERITED_KEYS = ['Root', 'Info', 'Encrypt', 'ID'];

interface Resolution {
  readonly sections: XRefSection[];
  readonly trailers: TrailerInfo[];
  readonly trailer: TrailerInfo;
  readonly entries: Map<number, XRefEntry>;
  readonly shadowed: ShadowedEntry[];
  readonly xrefStreamOffsets: Set<number>;
}

export class XRefResolver {
  private constructor(
    readonly parser: ObjectParser,
    readonly header: HeaderInfo,
    readonly sections: readonly XRefSection[],
    /** Every trailer, oldest first */
    readonly trailers: readonly TrailerInfo[],
    /** The effective trailer */
    readonly trailer: TrailerInfo,
    readonly entries: ReadonlyMap<number, XRefEntry>,
    readonly shadowed: readonly ShadowedEntry[],
    readonly xrefStreamOffsets: ReadonlySet<number>,
    readonly isRecovered: boolean,
    readonly fileSize: number,
  ) {}

  get rootRef(): PdfRef | undefined {
    return this.trailer.root;
  }

  get infoRef(): PdfRef | undefined {
    return this.trailer.info;
  }

  get encryptRef(): PdfRef | undefined {
    const encrypt = this.trailer.encrypt;
    return encrypt && isRef(encrypt) ? encrypt : undefined;
  }

  /** Ids of every in-use entry, ascending */
  liveIds(): ObjectId[] {
    const ids: ObjectId[] = [];
    for (const [objNum, entry] of this.entries) {
      if (!entry.free) ids.push({ objNum, gen: entry.gen });
    }
    return ids.sort((a, b) => a.objNum - b.objNum);
  }

  static resolve(data: Uint8Array, anomalies: AnomalyLog): XRefResolver {
    const lexer = new PdfLexer(data);
    const parser = new ObjectParser(data);
    const header = inspectHeader(lexer, anomalies);

    let resolution: Resolution;
    let recovered = false;
    try {
      resolution = resolveChain(lexer, parser, anomalies);
    } catch (err) {
      if (!(err instanceof PdfXRefError)) throw err;
      anomalies.record('xref-reconstructed', `Cross-reference data rebuilt by scanning the file: ${err.message}`, {
        details: { reason: err.message },
      });
      resolution = reconstruct(lexer, parser);
      recovered = true;
    }

    return new XRefResolver(
      parser,
      header,
      resolution.sections,
      resolution.trailers,
      resolution.trailer,
      resolution.entries,
      resolution.shadowed,
      resolution.xrefStreamOffsets,
      recovered,
      data.length,
    );
  }
}

// ─── Header inspection ───

function inspectHeader(lexer: PdfLexer, anomalies: AnomalyLog): HeaderInfo {
  const offset = lexer.findNext(HEADER_MARKER, 0, HEADER_WINDOW + HEADER_MARKER.length);
  let version: string | undefined;

  if (offset === -1) {
    anomalies.record('missing-header', 'No %PDF- header in the first 1024 bytes');
  } else {
    if (offset > 0) {
      anomalies.record('header-offset', `%PDF- header starts at offset ${offset}, not 0`, {
        offset,
        details: { headerOffset: offset },
      });
    }
    let p = offset + HEADER_MARKER.length;
    let text = '';
    while (p < lexer.length && text.length < 8) {
      const b = lexer.byteAt(p);
      if ((b < 0x30 || b > 0x39) && b !== 0x2e) break;
      text += String.fromCharCode(b);
      p++;
    }
    if (text.length > 0) version = text;
  }

  const eofOffset = lexer.findLast(EOF_MARKER);
  let trailingBytes = 0;
  if (eofOffset !== -1) {
    let end = lexer.length;
    while (end > eofOffset + EOF_MARKER.length && isTrailingSpace(lexer.byteAt(end - 1))) end--;
    trailingBytes = end - (eofOffset + EOF_MARKER.length);
    if (trailingBytes > 0) {
      anomalies.record('trailing-data', `${trailingBytes} bytes follow the last %%EOF`, {
        offset: eofOffset + EOF_MARKER.length,
        details: { bytes: trailingBytes },
      });
    }
  }

  return version !== undefined
    ? { version, offset, eofOffset, trailingBytes }
    : { offset, eofOffset, trailingBytes };
}

function isTrailingSpace(b: number): boolean {
  return b === 0x0a || b === 0x0d || b === 0x20 || b === 0x09 || b === 0x00 || b === 0x0c;
}

// ─── Chain resolution ───

function resolveChain(lexer: PdfLexer, parser: ObjectParser, anomalies: AnomalyLog): Resolution {
  const xrefStreamOffsets = new Set<number>();
  const raws = readChain(lexer, parser, anomalies, xrefStreamOffsets);

  // Read newest first; revisions count from the oldest
  const sections: XRefSection[] = raws.reverse().map((raw, index) => ({
    index,
    offset: raw.offset,
    form: raw.form,
    entries: new Map([...raw.entries].map(([objNum, e]): [number, XRefEntry] => [objNum, { ...e, section: index }])),
    trailer: raw.trailer,
  }));

  const { entries, shadowed } = mergeSections(sections);
  const trailer = effectiveTrailer(sections.map(s => s.trailer.dict));

  const root = trailer.root;
  if (!root) throw new PdfXRefError('No trailer carries a /Root entry');
  const rootEntry = entries.get(root.objNum);
  if (!rootEntry || rootEntry.free) {
    throw new PdfXRefError(`Document catalog ${root.objNum} ${root.gen} R has no cross-reference entry`);
  }

  validateOffsets(entries, parser, lexer.length, anomalies);
  if (!entries.has(root.objNum)) {
    throw new PdfXRefError(`Document catalog ${root.objNum} ${root.gen} R points outside the file`);
  }

  const trailers = sections.map(s => s.trailer);
  return { sections, trailers, trailer, entries, shadowed, xrefStreamOffsets };
}

/** Sections from startxref backward along /Prev, newest first */
function readChain(
  lexer: PdfLexer,
  parser: ObjectParser,
  anomalies: AnomalyLog,
  xrefStreamOffsets: Set<number>,
): RawSection[] {
  const raws: RawSection[] = [];
  const visited = new Set<number>();
  let offset: number | undefined = findStartXRef(lexer);

  while (offset !== undefined) {
    if (visited.has(offset)) {
      anomalies.record('xref-section-unreadable', `/Prev chain loops back to offset ${offset}`, {
        offset,
        details: { loop: true },
      });
      break;
    }
    visited.add(offset);

    let section: RawSection;
    try {
      section = readSectionAt(parser, lexer, offset);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      if (raws.length === 0) throw new PdfXRefError(reason, offset);
      anomalies.record('xref-section-unreadable', `Earlier revision at offset ${offset} is unreadable: ${reason}`, {
        offset,
      });
      break;
    }

    if (section.form === 'stream') {
      xrefStreamOffsets.add(section.offset);
    } else if (section.trailer.xrefStm !== undefined) {
      section = mergeHybrid(section, section.trailer.xrefStm, lexer, parser, anomalies, xrefStreamOffsets);
    }

    raws.push(section);
    offset = section.trailer.prev;
  }

  return raws;
}

/** A hybrid file's /XRefStm entries sit beneath the table's own entries */
function mergeHybrid(
  table: RawSection,
  streamOffset: number,
  lexer: PdfLexer,
  parser: ObjectParser,
  anomalies: AnomalyLog,
  xrefStreamOffsets: Set<number>,
): RawSection {
  let stream: RawSection;
  try {
    stream = readSectionAt(parser, lexer, streamOffset);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    anomalies.record('xref-section-unreadable', `/XRefStm at offset ${streamOffset} is unreadable: ${reason}`, {
      offset: streamOffset,
    });
    return table;
  }
  if (stream.form !== 'stream') {
    anomalies.record('xref-section-unreadable', `/XRefStm at offset ${streamOffset} is not an xref stream`, {
      offset: streamOffset,
    });
    return table;
  }
  xrefStreamOffsets.add(streamOffset);
  const entries = new Map(stream.entries);
  for (const [objNum, entry] of table.entries) entries.set(objNum, entry);
  return { ...table, entries };
}

function mergeSections(sections: readonly XRefSection[]): {
  entries: Map<number, XRefEntry>;
  shadowed: ShadowedEntry[];
} {
  const entries = new Map<number, XRefEntry>();
  const shadowed: ShadowedEntry[] = [];
  for (const section of sections) {
    for (const [objNum, entry] of section.entries) {
      const prior = entries.get(objNum);
      if (prior && !(prior.free && entry.free) && !sameLocation(prior, entry)) {
        shadowed.push({ objNum, entry: prior, shadowedBy: entry });
      }
      entries.set(objNum, entry);
    }
  }
  return { entries, shadowed };
}

function sameLocation(a: XRefEntry, b: XRefEntry): boolean {
  return a.offset === b.offset && a.gen === b.gen && a.free === b.free
    && a.streamObjNum === b.streamObjNum && a.streamIndex === b.streamIndex;
}

/** The newest trailer, with Root/Info/Encrypt/ID inherited from older ones */
function effectiveTrailer(dicts: readonly PdfDict[]): TrailerInfo {
  const newest = dicts[dicts.length - 1];
  const entries = new Map<string, PdfObject>(newest ? newest.entries : []);
  for (const key of INHERITED_KEYS) {
    if (entries.has(key)) continue;
    for (let i = dicts.length - 2; i >= 0; i--) {
      const value = dictGet(dicts[i], key);
      if (value) {
        entries.set(key, value);
        break;
      }
    }
  }
  return extractTrailerInfo(pdfDict(entries));
}

/**
 * Drops entries pointing outside the file. An entry that lands on the wrong
 * object, or on no object at all, means the table cannot be trusted.
 */
function validateOffsets(
  entries: Map<number, XRefEntry>,
  parser: ObjectParser,
  fileLength: number,
  anomalies: AnomalyLog,
): void {
  let mismatches = 0;
  for (const [objNum, entry] of [...entries]) {
    if (entry.free || entry.streamObjNum !== undefined) continue;
    if (entry.offset < 0 || entry.offset >= fileLength) {
      anomalies.record('offset-out-of-bounds', `Object ${objNum} points to offset ${entry.offset}, outside the file`, {
        objectId: { objNum, gen: entry.gen },
        offset: entry.offset,
        details: { fileSize: fileLength },
      });
      entries.delete(objNum);
      continue;
    }
    const header = parser.readHeader(entry.offset);
    if (!header || header.objNum !== objNum) {
      anomalies.record('offset-mismatch', header
        ? `Entry for object ${objNum} points to object ${header.objNum} ${header.gen}`
        : `Entry for object ${objNum} points to offset ${entry.offset}, where no object starts`, {
        objectId: { objNum, gen: entry.gen },
        offset: entry.offset,
      });
      mismatches++;
    }
  }
  if (mismatches > 0) {
    throw new PdfXRefError(`${mismatches} cross-reference entries do not point at their objects`);
  }
}

// ─── Reconstruction ───

interface LocatedDict {
  readonly offset: number;
  readonly dict: PdfDict;
}

function reconstruct(lexer: PdfLexer, parser: ObjectParser): Resolution {
  const scan = scanForObjects(lexer);
  const entries = new Map<number, XRefEntry>();
  const shadowed: ShadowedEntry[] = [];

  // Later occurrences of a number win
  for (const h of scan.headers) {
    const entry: XRefEntry = { offset: h.offset, gen: h.gen, free: false, section: 0 };
    const prior = entries.get(h.objNum);
    if (prior) shadowed.push({ objNum: h.objNum, entry: prior, shadowedBy: entry });
    entries.set(h.objNum, entry);
  }

  const xrefStreamOffsets = new Set<number>();
  const trailerDicts: LocatedDict[] = scan.trailers.map(t => ({ offset: t.offset, dict: t.dict }));
  const compressed = new Map<number, XRefEntry>();
  let catalog: PdfRef | undefined;

  const inFileOrder = [...entries].sort((a, b) => a[1].offset - b[1].offset);
  for (const [objNum, entry] of inFileOrder) {
    const parsed = tryParse(parser, entry.offset);
    if (!parsed) continue;
    const value = parsed.value;
    const dict = asDict(value);
    if (!dict) continue;

    const type = dictGetName(dict, 'Type');
    if (type === 'Catalog') {
      catalog = pdfRef(objNum, entry.gen);
    } else if (type === 'XRef' && isStream(value)) {
      xrefStreamOffsets.add(entry.offset);
      trailerDicts.push({ offset: entry.offset, dict });
    } else if (type === 'ObjStm' && isStream(value)) {
      const members = tryObjectStream(value);
      members.forEach((objNumInStream, index) => {
        if (!compressed.has(objNumInStream)) {
          compressed.set(objNumInStream, {
            offset: 0, gen: 0, free: false, section: 0, streamObjNum: objNum, streamIndex: index,
          });
        }
      });
    }
  }

  // Plain objects take precedence over copies inside object streams
  for (const [objNum, entry] of compressed) {
    if (!entries.has(objNum)) entries.set(objNum, entry);
  }

  trailerDicts.sort((a, b) => a.offset - b.offset);
  const withRoot = trailerDicts.filter(t => {
    const root = dictGet(t.dict, 'Root');
    return root !== undefined && isRef(root) && entries.has(root.objNum);
  });
  const dicts = trailerDicts.map(t => t.dict);

  const trailers = dicts.map(extractTrailerInfo);
  let trailer: TrailerInfo;
  if (withRoot.length > 0) {
    const chosen = withRoot[withRoot.length - 1];
    trailer = effectiveTrailer([...dicts.filter(d => d !== chosen.dict), chosen.dict]);
  } else if (catalog) {
    const synthetic = new Map<string, PdfObject>([
      ['Size', pdfNumber([...entries.keys()].reduce((max, n) => Math.max(max, n), 0) + 1)],
      ['Root', catalog],
    ]);
    trailer = effectiveTrailer([...dicts, pdfDict(synthetic)]);
    trailers.push(trailer);
  } else {
    throw new PdfXRefError('Could not recover PDF structure: no document catalog found during full scan');
  }

  const section: XRefSection = { index: 0, offset: -1, form: 'recovered', entries: new Map(entries), trailer };
  return { sections: [section], trailers, trailer, entries, shadowed, xrefStreamOffsets };
}

/** Unparseable objects are reported once the graph loads them */
function tryParse(parser: ObjectParser, offset: number): ParsedObject | null {
  try {
    return parser.parseObjectAt(offset);
  } catch {
    return null;
  }
}

/** Object numbers held by an object stream, in index order */
function tryObjectStream(stream: PdfStream): number[] {
  try {
    return parseObjectStream(stream, decodeStream(stream.data, stream.dict)).map(m => m.objNum);
  } catch {
    return [];
  }
}
