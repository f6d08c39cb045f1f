/**
 * Encryption dictionary summary. The dictionary is described, never used:
 * no key is derived and nothing is decrypted.
 */

import { z } from 'zod';
import type { ObjectGraph } from '../graph/object-graph.js';
import type { AnomalyLog } from './anomalies.js';
import type { PdfDict, PdfObject } from '../parser/types.js';
import { isRef, isName, isNumber, isBool, isString, dictGet, dictGetName } from '../parser/types.js';
import type { EncryptionSummary } from '../types.js';
import { latin1 } from './text.js';

type RawValue = string | number | boolean;
type RawRecord = Readonly<Record<string, RawValue>>;

// ─── Schema ───

export const EncryptDictSchema = z.object({
  Filter: z.string(),
  SubFilter: z.string().optional(),
  V: z.number().int().min(0).max(5).default(0),
  R: z.number().int().min(2).max(6).optional(),
  Length: z.number().int().min(40).max(256)
    .refine(n => n % 8 === 0, { message: 'must be a multiple of 8' })
    .optional(),
  P: z.number().int().optional(),
  EncryptMetadata: z.boolean().default(true),
  StmF: z.string().optional(),
  StrF: z.string().optional(),
  CFM: z.string().optional(),
}).superRefine((dict, ctx) => {
  if (dict.Filter === 'Standard') {
    if (dict.R === undefined) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['R'], message: 'required by the standard security handler' });
    if (dict.P === undefined) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['P'], message: 'required by the standard security handler' });
  }
  if (dict.V >= 4 && dict.StmF !== undefined && dict.StmF !== 'Identity' && dict.CFM === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['StmF'], message: `names crypt filter ${dict.StmF} missing from /CF` });
  }
});

/** Validated fields, or the same fields read loosely from an invalid dictionary */
type EncryptFields = Omit<z.infer<typeof EncryptDictSchema>, 'Filter'> & { Filter?: string };

// ─── Permissions ───

/** User access permission bits of /P, numbered from 1 */
export const PERMISSION_BITS: ReadonlyArray<readonly [number, string]> = [
  [3, 'print'],
  [4, 'modify'],
  [5, 'copy'],
  [6, 'annotate'],
  [9, 'fill-forms'],
  [10, 'extract-accessibility'],
  [11, 'assemble'],
  [12, 'print-high-quality'],
];

export function decodePermissions(p: number): string[] {
  const bits = p >>> 0;
  return PERMISSION_BITS.filter(([bit]) => (bits & (1 << (bit - 1))) !== 0).map(([, name]) => name);
}

// ─── Summary ───

export function summarizeEncryption(graph: ObjectGraph, anomalies: AnomalyLog): EncryptionSummary | null {
  const encrypt = graph.trailer.encrypt;
  if (!encrypt) return null;
  const objectId = isRef(encrypt) ? { objNum: encrypt.objNum, gen: encrypt.gen } : undefined;

  const dict = graph.encryptDict();
  if (!dict) {
    anomalies.record('encryption-dictionary-invalid', 'Trailer /Encrypt does not resolve to a dictionary', { objectId });
    return { version: 0, keyLength: 40, granted: [], encryptMetadata: true, valid: false };
  }

  const record = toRecord(graph, dict);
  const parsed = EncryptDictSchema.safeParse(record);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `/${issue.path.join('/')} ${issue.message}` : issue.message);
    anomalies.record('encryption-dictionary-invalid', `Encryption dictionary is invalid: ${issues.join('; ')}`, {
      objectId,
      details: { issues: issues.length },
    });
  }

  const fields: EncryptFields = parsed.success ? parsed.data : looseFields(record);
  const version = fields.V;

  return {
    ...optional('filter', fields.Filter),
    ...optional('subFilter', fields.SubFilter),
    version,
    ...optional('revision', fields.R),
    keyLength: fields.Length ?? defaultKeyLength(version, fields.CFM),
    ...optional('permissions', fields.P),
    granted: fields.P !== undefined ? decodePermissions(fields.P) : [],
    encryptMetadata: fields.EncryptMetadata,
    ...optional('streamFilter', fields.StmF),
    ...optional('stringFilter', fields.StrF),
    ...optional('cryptMethod', fields.CFM),
    valid: parsed.success,
  };
}

function looseFields(record: RawRecord): EncryptFields {
  return {
    Filter: stringField(record, 'Filter'),
    SubFilter: stringField(record, 'SubFilter'),
    V: numberField(record, 'V') ?? 0,
    R: numberField(record, 'R'),
    Length: numberField(record, 'Length'),
    P: numberField(record, 'P'),
    EncryptMetadata: record.EncryptMetadata !== false,
    StmF: stringField(record, 'StmF'),
    StrF: stringField(record, 'StrF'),
    CFM: stringField(record, 'CFM'),
  };
}

function defaultKeyLength(version: number, cryptMethod: string | undefined): number {
  if (version === 5 || cryptMethod === 'AESV3') return 256;
  if (cryptMethod === 'AESV2') return 128;
  return 40;
}

/** Scalar entries of the dictionary, with the default crypt filter's /CFM lifted up */
function toRecord(graph: ObjectGraph, dict: PdfDict): RawRecord {
  const record: Record<string, RawValue> = {};
  for (const [key, value] of dict.entries) {
    const scalar = scalarOf(graph.resolve(value));
    if (scalar !== undefined) record[key] = scalar;
  }

  const stmF = dictGetName(dict, 'StmF');
  const filters = graph.resolveDict(dictGet(dict, 'CF'));
  const filter = stmF && filters ? graph.resolveDict(dictGet(filters, stmF)) : null;
  const cfm = filter ? dictGetName(filter, 'CFM') : undefined;
  if (cfm !== undefined) record.CFM = cfm;
  return record;
}

function scalarOf(value: PdfObject): RawValue | undefined {
  if (isName(value)) return value.value;
  if (isNumber(value)) return value.value;
  if (isBool(value)) return value.value;
  if (isString(value)) return latin1(value.value);
  return undefined;
}

function numberField(record: RawRecord, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' ? value : undefined;
}

function stringField(record: RawRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function optional<K extends string, V>(key: K, value: V | undefined): { [P in K]?: V } {
  const out: { [P in K]?: V } = {};
  if (value !== undefined) out[key] = value;
  return out;
}
