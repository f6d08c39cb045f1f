/**
 * Inventories of the objects an investigator asks about first: images,
 * embedded files and signatures.
 */

import type { ObjectGraph } from '../graph/object-graph.js';
import type { AnomalyLog } from './anomalies.js';
import type { ObjectId, PdfDict, PdfObject } from '../parser/types.js';
import {
  PDF_NULL, objectKey, formatId, asDict, isRef, isArray, isName, isNumber, isString, isStream,
  dictGet, dictGetName,
} from '../parser/types.js';
import { sha256Hex } from '../crypto/digest.js';
import { serializeObject } from './serialize.js';
import { mapWithConcurrency } from '../util/concurrency.js';
import { decodeTextString } from './text.js';
import type { EmbeddedFileEntry, ImageEntry, ImageFormat, SignatureEntry } from '../types.js';

// ─── Images ───

const IMAGE_FORMATS: Readonly<Record<string, ImageFormat>> = {
  DCTDecode: 'jpeg',
  JPXDecode: 'jpeg2000',
  CCITTFaxDecode: 'ccitt',
  JBIG2Decode: 'jbig2',
};

export async function inventoryImages(graph: ObjectGraph, concurrency: number): Promise<ImageEntry[]> {
  const candidates: { id: ObjectId; dict: PdfDict; data: Uint8Array }[] = [];
  for (const id of graph.liveIds()) {
    const value = graph.get(id);
    if (value && isStream(value) && dictGetName(value.dict, 'Subtype') === 'Image') {
      candidates.push({ id, dict: value.dict, data: value.data });
    }
  }

  return mapWithConcurrency(candidates, concurrency, async ({ id, dict, data }) => {
    const filters = graph.decoded(id)?.filters ?? [];
    const codec = filters.find(name => IMAGE_FORMATS[name] !== undefined);
    const width = numberOf(graph, dict, 'Width');
    const height = numberOf(graph, dict, 'Height');
    const bitsPerComponent = numberOf(graph, dict, 'BitsPerComponent');
    const colorSpace = colorSpaceName(graph, dictGet(dict, 'ColorSpace'));
    const entry: ImageEntry = {
      objectId: id,
      ...(width !== undefined ? { width } : {}),
      ...(height !== undefined ? { height } : {}),
      ...(bitsPerComponent !== undefined ? { bitsPerComponent } : {}),
      ...(colorSpace !== undefined ? { colorSpace } : {}),
      format: codec ? IMAGE_FORMATS[codec] : 'raw',
      filters,
      rawSize: data.length,
      hash: await sha256Hex(data),
      reachable: graph.isReachable(id),
    };
    return entry;
  });
}

/** A colour space name, or the family of an array colour space */
function colorSpaceName(graph: ObjectGraph, value: PdfObject | undefined): string | undefined {
  if (!value) return undefined;
  const resolved = graph.resolve(value);
  if (isName(resolved)) return resolved.value;
  if (isArray(resolved) && resolved.items.length > 0) {
    const family = graph.resolve(resolved.items[0]);
    if (isName(family)) return family.value;
  }
  return undefined;
}

// ─── Embedded files ───

interface MagicSignature {
  readonly type: string;
  readonly magic: readonly number[];
  readonly extensions: readonly string[];
  readonly executable: boolean;
}

const bytesOf = (text: string): number[] => Array.from(text, c => c.charCodeAt(0));

export const MAGIC_SIGNATURES: readonly MagicSignature[] = [
  { type: 'pe', magic: bytesOf('MZ'), extensions: ['exe', 'dll', 'sys', 'scr', 'com', 'cpl', 'ocx', 'efi'], executable: true },
  { type: 'elf', magic: [0x7f, ...bytesOf('ELF')], extensions: ['so', 'elf', 'bin', 'o', 'ko'], executable: true },
  { type: 'pdf', magic: bytesOf('%PDF-'), extensions: ['pdf'], executable: false },
  { type: 'zip', magic: bytesOf('PK\x03\x04'), extensions: ['zip', 'jar', 'apk', 'docx', 'xlsx', 'pptx', 'docm', 'xlsm', 'pptm', 'odt', 'ods', 'odp', 'epub'], executable: false },
  { type: 'ole', magic: [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1], extensions: ['doc', 'xls', 'ppt', 'msi', 'msg', 'dot', 'xlt'], executable: false },
  { type: 'rtf', magic: bytesOf('{\\rtf'), extensions: ['rtf', 'doc'], executable: false },
];

export function detectFileType(data: Uint8Array): MagicSignature | undefined {
  return MAGIC_SIGNATURES.find(sig =>
    data.length >= sig.magic.length && sig.magic.every((byte, i) => data[i] === byte));
}

function extensionOf(fileName: string): string | undefined {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;
  const dot = base.lastIndexOf('.');
  return dot > 0 && dot < base.length - 1 ? base.slice(dot + 1).toLowerCase() : undefined;
}

interface FilespecInfo {
  readonly id: ObjectId;
  readonly dict: PdfDict;
  readonly fileName?: string;
  readonly embeddedFile?: ObjectId;
}

export async function inventoryEmbeddedFiles(
  graph: ObjectGraph,
  anomalies: AnomalyLog,
  concurrency: number,
): Promise<EmbeddedFileEntry[]> {
  const filespecs: FilespecInfo[] = [];
  const candidates: { id: ObjectId; dict: PdfDict }[] = [];

  for (const id of graph.liveIds()) {
    const value = graph.get(id);
    if (!value) continue;
    if (isStream(value)) {
      candidates.push({ id, dict: value.dict });
      continue;
    }
    const dict = asDict(value);
    if (dict && (dictGetName(dict, 'Type') === 'Filespec' || dictGet(dict, 'EF') !== undefined)) {
      filespecs.push(describeFilespec(graph, id, dict));
    }
  }

  // A stream a filespec points at through /EF is embedded whatever its /Type says
  const referenced = new Set<string>();
  for (const spec of filespecs) {
    if (spec.embeddedFile) referenced.add(objectKey(spec.embeddedFile));
  }
  const streams = candidates.filter(({ id, dict }) =>
    dictGetName(dict, 'Type') === 'EmbeddedFile' || referenced.has(objectKey(id)));

  // The name an embedded stream carries is the name of the filespec holding it
  const namesByStream = new Map<string, string>();
  for (const spec of filespecs) {
    if (spec.embeddedFile && spec.fileName !== undefined && !namesByStream.has(objectKey(spec.embeddedFile))) {
      namesByStream.set(objectKey(spec.embeddedFile), spec.fileName);
    }
  }

  // Checks run in file order; only hashing is concurrent
  const described = streams.map(({ id, dict }) => {
    const content = graph.decoded(id);
    const data = content?.data ?? new Uint8Array(0);
    const decodedSize = content?.decoded ? data.length : undefined;
    const params = graph.resolveDict(dictGet(dict, 'Params'));
    const declaredSize = params ? numberOf(graph, params, 'Size') : undefined;
    const fileName = namesByStream.get(objectKey(id));
    const mimeType = dictGetName(dict, 'Subtype');
    const detected = content?.decoded ? detectFileType(data) : undefined;

    if (declaredSize !== undefined && decodedSize !== undefined && declaredSize !== decodedSize) {
      anomalies.record('embedded-file-size-mismatch',
        `Embedded file ${formatId(id)} declares ${declaredSize} bytes but decodes to ${decodedSize}`, {
          objectId: id,
          details: { declared: declaredSize, actual: decodedSize },
        });
    }
    if (detected && fileName !== undefined) {
      const extension = extensionOf(fileName);
      if (extension !== undefined && !detected.extensions.includes(extension)) {
        anomalies.record('disguised-embedded-file',
          `Embedded file ${formatId(id)} is named "${fileName}" but its content is ${detected.type}`, {
            objectId: id,
            severity: detected.executable ? 'critical' : undefined,
            details: { fileName, detectedType: detected.type },
          });
      }
    }

    const entry: Omit<EmbeddedFileEntry, 'hash'> = {
      objectId: id,
      kind: 'EmbeddedFile',
      ...(fileName !== undefined ? { fileName } : {}),
      ...(mimeType !== undefined ? { mimeType } : {}),
      ...(declaredSize !== undefined ? { declaredSize } : {}),
      ...(decodedSize !== undefined ? { size: decodedSize } : {}),
      ...(detected ? { detectedType: detected.type } : {}),
    };
    return { entry, data };
  });

  const streamEntries = await mapWithConcurrency(described, concurrency, async ({ entry, data }) => {
    const hashed: EmbeddedFileEntry = { ...entry, hash: await sha256Hex(data) };
    return hashed;
  });

  const hashByStream = new Map(streamEntries.map(e => [objectKey(e.objectId), e.hash] as const));
  const specEntries = await mapWithConcurrency(filespecs, concurrency, async spec => {
    const description = textOf(graph, spec.dict, 'Desc');
    const linked = spec.embeddedFile ? hashByStream.get(objectKey(spec.embeddedFile)) : undefined;
    const entry: EmbeddedFileEntry = {
      objectId: spec.id,
      kind: 'Filespec',
      ...(spec.fileName !== undefined ? { fileName: spec.fileName } : {}),
      ...(description !== undefined ? { description } : {}),
      hash: linked ?? await sha256Hex(serializeObject(spec.dict)),
      ...(spec.embeddedFile ? { embeddedFile: spec.embeddedFile } : {}),
    };
    return entry;
  });

  return [...streamEntries, ...specEntries];
}

function describeFilespec(graph: ObjectGraph, id: ObjectId, dict: PdfDict): FilespecInfo {
  const fileName = textOf(graph, dict, 'UF') ?? textOf(graph, dict, 'F');
  const ef = graph.resolveDict(dictGet(dict, 'EF'));
  const target = ef ? dictGet(ef, 'UF') ?? dictGet(ef, 'F') : undefined;
  return {
    id,
    dict,
    ...(fileName !== undefined ? { fileName } : {}),
    ...(target && isRef(target) ? { embeddedFile: { objNum: target.objNum, gen: target.gen } } : {}),
  };
}

// ─── Signatures ───

export function inventorySignatures(graph: ObjectGraph, anomalies: AnomalyLog): SignatureEntry[] {
  const fileSize = graph.resolver.fileSize;
  const entries: SignatureEntry[] = [];

  for (const id of graph.liveIds()) {
    const dict = asDict(graph.get(id) ?? PDF_NULL);
    if (!dict || !isSignature(dict)) continue;

    const range = graph.resolve(dictGet(dict, 'ByteRange') ?? PDF_NULL);
    const byteRange = isArray(range)
      ? range.items.map(item => graph.resolve(item)).filter(isNumber).map(n => n.value)
      : [];
    const coversWholeFile = byteRange.length === 4 && byteRange[0] === 0 && byteRange[2] + byteRange[3] === fileSize;

    if (!coversWholeFile) {
      anomalies.record('signature-partial-coverage',
        `Signature ${formatId(id)} covers [${byteRange.join(' ')}] of a ${fileSize}-byte file`, {
          objectId: id,
          details: { byteRange: byteRange.join(' '), fileSize },
        });
    }

    const filter = dictGetName(dict, 'Filter');
    const subFilter = dictGetName(dict, 'SubFilter');
    const signer = textOf(graph, dict, 'Name');
    const signingTime = textOf(graph, dict, 'M');
    entries.push({
      objectId: id,
      ...(filter !== undefined ? { filter } : {}),
      ...(subFilter !== undefined ? { subFilter } : {}),
      byteRange,
      coversWholeFile,
      ...(signer !== undefined ? { signer } : {}),
      ...(signingTime !== undefined ? { signingTime } : {}),
    });
  }
  return entries;
}

function isSignature(dict: PdfDict): boolean {
  const type = dictGetName(dict, 'Type');
  if (type === 'Sig' || type === 'DocTimeStamp') return true;
  return dictGet(dict, 'ByteRange') !== undefined
    && dictGet(dict, 'Contents') !== undefined
    && dictGet(dict, 'Filter') !== undefined;
}

// ─── Helpers ───

function numberOf(graph: ObjectGraph, dict: PdfDict, key: string): number | undefined {
  const value = dictGet(dict, key);
  if (!value) return undefined;
  const resolved = graph.resolve(value);
  return isNumber(resolved) ? resolved.value : undefined;
}

/** A text string entry; names are accepted for writers that use them */
export function textOf(graph: ObjectGraph, dict: PdfDict, key: string): string | undefined {
  const value = dictGet(dict, key);
  if (!value) return undefined;
  const resolved = graph.resolve(value);
  if (isString(resolved)) return decodeTextString(resolved.value);
  if (isName(resolved)) return resolved.value;
  return undefined;
}
