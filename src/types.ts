/**
 * Public types for the pdfsleuth library.
 */

import type { ObjectId } from './parser/types.js';
import type { Anomaly, AnomalyKind } from './forensics/anomalies.js';

export const SCHEMA_VERSION = 1;

export type ValueKind = 'null' | 'bool' | 'number' | 'string' | 'name' | 'array' | 'dict' | 'stream' | 'ref';

export interface StreamSummary {
  readonly rawLength: number;
  /** Absent when decoding failed or was not attempted */
  readonly decodedLength?: number;
  readonly decoded: boolean;
  readonly filters: readonly string[];
}

/** One live object with its forensic classification */
export interface ClassifiedObject {
  readonly id: ObjectId;
  readonly kind: ValueKind;
  /** /Type for dictionaries and streams, else the kind; "Unknown" when untyped */
  readonly type: string;
  readonly subtype?: string;
  /** Length of the canonical serialization */
  readonly size: number;
  /** SHA-256 hex of the canonical serialization */
  readonly hash: string;
  readonly reachable: boolean;
  readonly stream?: StreamSummary;
  readonly anomalies: readonly AnomalyKind[];
}

/** Metadata from the header, catalog and document info dictionary */
export interface DocumentMetadata {
  readonly version?: string;
  readonly catalogVersion?: string;
  readonly pageCount: number;
  readonly linearized: boolean;
  readonly title?: string;
  readonly author?: string;
  readonly subject?: string;
  readonly keywords?: string;
  readonly creator?: string;
  readonly producer?: string;
  readonly creationDate?: string;
  readonly modDate?: string;
}

export type ScriptTrigger =
  | 'OpenAction'
  | 'DocumentAA'
  | 'NamesJavaScript'
  | 'PageAA'
  | 'AnnotationA'
  | 'AnnotationAA'
  | 'FieldAA'
  | 'Unattached';

export interface ScriptEntry {
  /** The action object, or the object holding an inline action */
  readonly objectId: ObjectId;
  readonly inline: boolean;
  readonly trigger: ScriptTrigger;
  /** Additional-actions event key, such as O or WC */
  readonly event?: string;
  readonly autoExecute: boolean;
  /** Where the /JS source lives when it is a separate object */
  readonly sourceId?: ObjectId;
  readonly length: number;
  readonly hash: string;
  /** False when the source is an undecodable stream */
  readonly decoded: boolean;
  /** First characters of the source, Latin-1 */
  readonly preview: string;
}

export interface ActionEntry {
  readonly objectId: ObjectId;
  readonly inline: boolean;
  /** The action's /S, or "Unknown" */
  readonly type: string;
  readonly trigger: ScriptTrigger;
  readonly event?: string;
  readonly autoExecute: boolean;
  /** Hops along /Next from the trigger */
  readonly depth: number;
  /** URI, file or named action the action points at */
  readonly target?: string;
}

export type ImageFormat = 'jpeg' | 'jpeg2000' | 'ccitt' | 'jbig2' | 'raw';

export interface ImageEntry {
  readonly objectId: ObjectId;
  readonly width?: number;
  readonly height?: number;
  readonly bitsPerComponent?: number;
  readonly colorSpace?: string;
  readonly format: ImageFormat;
  readonly filters: readonly string[];
  readonly rawSize: number;
  readonly hash: string;
  readonly reachable: boolean;
}

export interface EmbeddedFileEntry {
  readonly objectId: ObjectId;
  readonly kind: 'EmbeddedFile' | 'Filespec';
  readonly fileName?: string;
  readonly description?: string;
  /** MIME subtype from the stream's /Subtype */
  readonly mimeType?: string;
  /** /Params /Size */
  readonly declaredSize?: number;
  /** Decoded length; absent for a Filespec or an undecodable stream */
  readonly size?: number;
  readonly hash: string;
  /** For a Filespec: the embedded stream it points to */
  readonly embeddedFile?: ObjectId;
  /** Content type recognized from the leading bytes */
  readonly detectedType?: string;
}

export interface SignatureEntry {
  readonly objectId: ObjectId;
  readonly filter?: string;
  readonly subFilter?: string;
  readonly byteRange: readonly number[];
  readonly coversWholeFile: boolean;
  readonly signer?: string;
  readonly signingTime?: string;
}

export interface EncryptionSummary {
  readonly filter?: string;
  readonly subFilter?: string;
  readonly version: number;
  readonly revision?: number;
  /** Bits */
  readonly keyLength: number;
  /** Raw /P value */
  readonly permissions?: number;
  /** Names of the operations /P allows */
  readonly granted: readonly string[];
  readonly encryptMetadata: boolean;
  readonly streamFilter?: string;
  readonly stringFilter?: string;
  /** /CFM of the default crypt filter */
  readonly cryptMethod?: string;
  /** False when the dictionary failed validation */
  readonly valid: boolean;
}

export interface RevisionSummary {
  readonly index: number;
  /** -1 for a reconstructed table */
  readonly offset: number;
  readonly form: 'table' | 'stream' | 'recovered';
  readonly entryCount: number;
  readonly hasRoot: boolean;
  readonly prev?: number;
}

export interface AnalysisResult {
  readonly schemaVersion: typeof SCHEMA_VERSION;
  /** SHA-256 over the ids, reachability and hashes of every live object */
  readonly fingerprint: string;
  readonly fileSize: number;
  readonly recovered: boolean;
  readonly metadata: DocumentMetadata;
  readonly objects: readonly ClassifiedObject[];
  readonly javascript: readonly ScriptEntry[];
  readonly actions: readonly ActionEntry[];
  readonly images: readonly ImageEntry[];
  readonly embeddedFiles: readonly EmbeddedFileEntry[];
  readonly signatures: readonly SignatureEntry[];
  readonly encryption: EncryptionSummary | null;
  readonly revisions: readonly RevisionSummary[];
  readonly anomalies: readonly Anomaly[];
}
