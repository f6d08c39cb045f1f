/**
 * Internal PDF object model types.
 * These represent the primitive and compound types found in the PDF file format.
 */

/** Identity of an indirect object within one revision */
export interface ObjectId {
  readonly objNum: number;
  readonly gen: number;
}

/** Reference to an indirect object: "objNum gen R" */
export interface PdfRef extends ObjectId {
  readonly kind: 'ref';
}

/** A PDF name object, e.g. /Type */
export interface PdfName {
  readonly kind: 'name';
  readonly value: string;
}

/** A PDF string (literal or hex) */
export interface PdfString {
  readonly kind: 'string';
  readonly value: Uint8Array;
  readonly hex?: boolean;
}

/** A PDF dictionary << /Key Value ... >> */
export interface PdfDict {
  readonly kind: 'dict';
  readonly entries: Map<string, PdfObject>;
}

/** A PDF array [ ... ] */
export interface PdfArray {
  readonly kind: 'array';
  readonly items: PdfObject[];
}

/** A PDF stream: dictionary + raw byte data */
export interface PdfStream {
  readonly kind: 'stream';
  readonly dict: PdfDict;
  readonly data: Uint8Array;
}

/** A PDF boolean */
export interface PdfBool {
  readonly kind: 'bool';
  readonly value: boolean;
}

/** A PDF number. `real` separates 1.0 from 1, which the value alone cannot. */
export interface PdfNumber {
  readonly kind: 'number';
  readonly value: number;
  readonly real: boolean;
}

/** PDF null */
export interface PdfNull {
  readonly kind: 'null';
}

/** Union of all PDF object types */
export type PdfObject =
  | PdfRef
  | PdfName
  | PdfString
  | PdfDict
  | PdfArray
  | PdfStream
  | PdfBool
  | PdfNumber
  | PdfNull;

/** Cross-reference entry: byte offset for an in-use object */
export interface XRefEntry {
  readonly offset: number;
  readonly gen: number;
  readonly free: boolean;
  /** Index of the revision that produced the entry; 0 is the original file */
  readonly section: number;
  /** For compressed objects: the object number of the containing object stream */
  readonly streamObjNum?: number;
  /** For compressed objects: the index within the object stream */
  readonly streamIndex?: number;
}

/** PDF trailer dictionary fields we care about */
export interface TrailerInfo {
  readonly size: number;
  readonly root?: PdfRef;
  readonly info?: PdfRef;
  readonly encrypt?: PdfObject;
  readonly prev?: number;
  readonly xrefStm?: number;
  readonly dict: PdfDict;
}

// ─── ObjectId helpers ───

export const MAX_OBJ_NUM = 0xffffffff;
export const MAX_GEN = 0xffff;

export function objectId(objNum: number, gen = 0): ObjectId {
  return { objNum, gen };
}

export function objectKey(id: ObjectId): string {
  return `${id.objNum} ${id.gen}`;
}

export function formatId(id: ObjectId): string {
  return `${id.objNum} ${id.gen} R`;
}

export function compareIds(a: ObjectId, b: ObjectId): number {
  return a.objNum - b.objNum || a.gen - b.gen;
}

export function isValidId(objNum: number, gen: number): boolean {
  return Number.isInteger(objNum) && Number.isInteger(gen) &&
    objNum >= 0 && objNum <= MAX_OBJ_NUM && gen >= 0 && gen <= MAX_GEN;
}

// ─── Helper constructors ───

export function pdfRef(objNum: number, gen: number): PdfRef {
  return { kind: 'ref', objNum, gen };
}

export function pdfName(value: string): PdfName {
  return { kind: 'name', value };
}

export function pdfString(value: Uint8Array, hex = false): PdfString {
  return hex ? { kind: 'string', value, hex } : { kind: 'string', value };
}

export function pdfDict(entries?: Map<string, PdfObject>): PdfDict {
  return { kind: 'dict', entries: entries ?? new Map() };
}

export function pdfArray(items?: PdfObject[]): PdfArray {
  return { kind: 'array', items: items ?? [] };
}

export function pdfStream(dict: PdfDict, data: Uint8Array): PdfStream {
  return { kind: 'stream', dict, data };
}

export function pdfBool(value: boolean): PdfBool {
  return { kind: 'bool', value };
}

export function pdfNumber(value: number, real = !Number.isInteger(value)): PdfNumber {
  return { kind: 'number', value, real };
}

export const PDF_NULL: PdfNull = { kind: 'null' };

// ─── Type guards ───

export function isRef(obj: PdfObject): obj is PdfRef {
  return obj.kind === 'ref';
}

export function isName(obj: PdfObject): obj is PdfName {
  return obj.kind === 'name';
}

export function isString(obj: PdfObject): obj is PdfString {
  return obj.kind === 'string';
}

export function isDict(obj: PdfObject): obj is PdfDict {
  return obj.kind === 'dict';
}

export function isArray(obj: PdfObject): obj is PdfArray {
  return obj.kind === 'array';
}

export function isStream(obj: PdfObject): obj is PdfStream {
  return obj.kind === 'stream';
}

export function isBool(obj: PdfObject): obj is PdfBool {
  return obj.kind === 'bool';
}

export function isNumber(obj: PdfObject): obj is PdfNumber {
  return obj.kind === 'number';
}

/** The dictionary of a dict or stream value */
export function asDict(obj: PdfObject): PdfDict | null {
  if (isDict(obj)) return obj;
  if (isStream(obj)) return obj.dict;
  return null;
}

// ─── Dictionary helpers ───

export function dictGet(dict: PdfDict, key: string): PdfObject | undefined {
  return dict.entries.get(key);
}

export function dictGetName(dict: PdfDict, key: string): string | undefined {
  const obj = dict.entries.get(key);
  return obj && isName(obj) ? obj.value : undefined;
}

export function dictGetNumber(dict: PdfDict, key: string): number | undefined {
  const obj = dict.entries.get(key);
  return obj && isNumber(obj) ? obj.value : undefined;
}

export function dictGetRef(dict: PdfDict, key: string): PdfRef | undefined {
  const obj = dict.entries.get(key);
  return obj && isRef(obj) ? obj : undefined;
}
