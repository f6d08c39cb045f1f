/**
 * Anomaly model: every recovered problem and every forensic finding becomes
 * one tagged record. Severity comes from a per-kind base table, adjusted by
 * the configured security level.
 */

import type { ObjectId } from '../parser/types.js';
import { objectKey } from '../parser/types.js';
import type { AnalysisPhase, LogSink } from '../logging.js';
import { NOOP_SINK } from '../logging.js';

export type Severity = 'info' | 'suspicious' | 'critical';

export type SecurityLevel = 'relaxed' | 'standard' | 'strict';

export type AnomalyKind =
  // container
  | 'missing-header'
  | 'header-offset'
  | 'trailing-data'
  // cross-reference
  | 'xref-reconstructed'
  | 'xref-section-unreadable'
  | 'offset-out-of-bounds'
  | 'offset-mismatch'
  | 'generation-mismatch'
  | 'revision-shadowed-object'
  // objects and streams
  | 'lex-error'
  | 'unexpected-token'
  | 'duplicate-key'
  | 'nesting-limit'
  | 'malformed-object'
  | 'stream-length-mismatch'
  | 'decode-failure'
  | 'cyclic-reference'
  | 'unreferenced-object'
  | 'dangling-reference'
  // scripts and actions
  | 'auto-executing-script'
  | 'javascript-present'
  | 'launch-action'
  | 'action-chain-truncated'
  // embedded content
  | 'embedded-file-size-mismatch'
  | 'disguised-embedded-file'
  | 'signature-partial-coverage'
  | 'encryption-dictionary-invalid';

export type AnomalyDetails = Readonly<Record<string, string | number | boolean>>;

export interface Anomaly {
  readonly kind: AnomalyKind;
  readonly severity: Severity;
  readonly message: string;
  readonly objectId?: ObjectId;
  readonly offset?: number;
  readonly details?: AnomalyDetails;
}

export interface AnomalyInit {
  readonly objectId?: ObjectId;
  readonly offset?: number;
  readonly details?: AnomalyDetails;
  /** Overrides the base severity for this one record */
  readonly severity?: Severity;
}

const BASE_SEVERITY: Readonly<Record<AnomalyKind, Severity>> = {
  'missing-header': 'suspicious',
  'header-offset': 'suspicious',
  'trailing-data': 'info',
  'xref-reconstructed': 'suspicious',
  'xref-section-unreadable': 'suspicious',
  'offset-out-of-bounds': 'suspicious',
  'offset-mismatch': 'suspicious',
  'generation-mismatch': 'suspicious',
  'revision-shadowed-object': 'info',
  'lex-error': 'info',
  'unexpected-token': 'info',
  'duplicate-key': 'suspicious',
  'nesting-limit': 'suspicious',
  'malformed-object': 'suspicious',
  'stream-length-mismatch': 'suspicious',
  'decode-failure': 'suspicious',
  'cyclic-reference': 'suspicious',
  'unreferenced-object': 'info',
  'dangling-reference': 'info',
  'auto-executing-script': 'suspicious',
  'javascript-present': 'info',
  'launch-action': 'critical',
  'action-chain-truncated': 'info',
  'embedded-file-size-mismatch': 'suspicious',
  'disguised-embedded-file': 'suspicious',
  'signature-partial-coverage': 'suspicious',
  'encryption-dictionary-invalid': 'suspicious',
};

/** Kinds raised one level under `strict` */
const STRICT_RAISED: ReadonlySet<AnomalyKind> = new Set<AnomalyKind>([
  'unreferenced-object',
  'xref-reconstructed',
  'revision-shadowed-object',
  'trailing-data',
  'auto-executing-script',
]);

/** Kinds lowered to info under `relaxed` */
const RELAXED_LOWERED: ReadonlySet<AnomalyKind> = new Set<AnomalyKind>([
  'stream-length-mismatch',
  'decode-failure',
  'dangling-reference',
]);

const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  critical: 0,
  suspicious: 1,
  info: 2,
};

export function severityFor(kind: AnomalyKind, level: SecurityLevel, base = BASE_SEVERITY[kind]): Severity {
  if (level === 'strict' && STRICT_RAISED.has(kind)) {
    return base === 'info' ? 'suspicious' : 'critical';
  }
  if (level === 'relaxed' && RELAXED_LOWERED.has(kind)) return 'info';
  return base;
}

/** Stable sort: critical first, then suspicious, then info. */
export function sortAnomalies(anomalies: readonly Anomaly[]): Anomaly[] {
  return anomalies
    .map((anomaly, index) => ({ anomaly, index }))
    .sort((a, b) =>
      SEVERITY_RANK[a.anomaly.severity] - SEVERITY_RANK[b.anomaly.severity] || a.index - b.index)
    .map(e => e.anomaly);
}

/**
 * Append-only anomaly log for one analysis run. Each record is forwarded to
 * the sink as it is made, tagged with the current phase.
 */
export class AnomalyLog {
  private readonly records: Anomaly[] = [];
  private readonly byObject = new Map<string, AnomalyKind[]>();

  /** Phase reported with forwarded events */
  phase: AnalysisPhase = 'xref';

  constructor(
    private readonly sink: LogSink = NOOP_SINK,
    readonly level: SecurityLevel = 'standard',
  ) {}

  record(kind: AnomalyKind, message: string, init: AnomalyInit = {}): Anomaly {
    const anomaly: Anomaly = {
      kind,
      severity: severityFor(kind, this.level, init.severity),
      message,
      ...(init.objectId ? { objectId: { objNum: init.objectId.objNum, gen: init.objectId.gen } } : {}),
      ...(init.offset !== undefined ? { offset: init.offset } : {}),
      ...(init.details ? { details: { ...init.details } } : {}),
    };
    this.records.push(anomaly);

    if (anomaly.objectId) {
      const key = objectKey(anomaly.objectId);
      const kinds = this.byObject.get(key);
      if (!kinds) this.byObject.set(key, [kind]);
      else if (!kinds.includes(kind)) kinds.push(kind);
    }

    this.sink.log({
      level: anomaly.severity === 'info' ? 'info' : 'warn',
      phase: this.phase,
      message,
      anomaly,
    });
    return anomaly;
  }

  get size(): number {
    return this.records.length;
  }

  has(kind: AnomalyKind): boolean {
    return this.records.some(a => a.kind === kind);
  }

  /** Distinct kinds recorded against one object, in first-seen order */
  kindsFor(id: ObjectId): AnomalyKind[] {
    return [...(this.byObject.get(objectKey(id)) ?? [])];
  }

  /** All records in severity order */
  list(): Anomaly[] {
    return sortAnomalies(this.records);
  }
}
