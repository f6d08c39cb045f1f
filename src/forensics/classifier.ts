/**
 * Forensic Classifier
 *
 * Turns a built object graph into the analysis result. Everything that
 * records anomalies runs first and in a fixed order, so the anomaly list
 * never depends on scheduling; hashing runs last with bounded fan-out.
 */

import type { ObjectGraph, StreamContent } from '../graph/object-graph.js';
import type { AnomalyLog } from './anomalies.js';
import type { AnalysisConfig } from '../config.js';
import type { ObjectId, PdfObject } from '../parser/types.js';
import { isStream, isDict, dictGetName } from '../parser/types.js';
import { sha256Hex } from '../crypto/digest.js';
import { mapWithConcurrency } from '../util/concurrency.js';
import { serializeObject } from './serialize.js';
import { traceActions } from './actions.js';
import { summarizeEncryption } from './encryption.js';
import { inventoryEmbeddedFiles, inventoryImages, inventorySignatures } from './inventory.js';
import { extractMetadata, summarizeRevisions } from './metadata.js';
import { SCHEMA_VERSION } from '../types.js';
import type { AnalysisResult, ClassifiedObject, ScriptEntry, StreamSummary } from '../types.js';

interface Typed {
  readonly id: ObjectId;
  readonly value: PdfObject;
  readonly type: string;
  readonly subtype?: string;
  readonly content?: StreamContent;
}

const encoder = new TextEncoder();

export async function classify(
  graph: ObjectGraph,
  config: AnalysisConfig,
  anomalies: AnomalyLog,
): Promise<AnalysisResult> {
  // Decoding records its failures; do it once, in id order
  const typed: Typed[] = [];
  for (const id of graph.liveIds()) {
    const value = graph.get(id);
    if (!value) continue;
    const content = isStream(value) ? graph.decoded(id) ?? undefined : undefined;
    typed.push({ id, value, ...typeOf(value), ...(content ? { content } : {}) });
  }

  const trace = traceActions(graph, anomalies, config.depth);
  const encryption = summarizeEncryption(graph, anomalies);
  const signatures = inventorySignatures(graph, anomalies);
  const metadata = extractMetadata(graph);
  const revisions = summarizeRevisions(graph);
  const embeddedFiles = await inventoryEmbeddedFiles(graph, anomalies, config.concurrency);
  const images = await inventoryImages(graph, config.concurrency);

  // ─── Hashing ───

  const objects = await mapWithConcurrency(typed, config.concurrency, async item => {
    const canonical = serializeObject(item.value);
    const classified: ClassifiedObject = {
      id: item.id,
      kind: item.value.kind,
      type: item.type,
      ...(item.subtype !== undefined ? { subtype: item.subtype } : {}),
      size: canonical.length,
      hash: await sha256Hex(canonical),
      reachable: graph.isReachable(item.id),
      ...(isStream(item.value) ? { stream: streamSummary(item.value.data, item.content) } : {}),
      anomalies: anomalies.kindsFor(item.id),
    };
    return classified;
  });

  const javascript = await mapWithConcurrency(trace.scripts, config.concurrency, async script => {
    const entry: ScriptEntry = {
      objectId: script.objectId,
      inline: script.inline,
      trigger: script.trigger,
      ...(script.event !== undefined ? { event: script.event } : {}),
      autoExecute: script.autoExecute,
      ...(script.sourceId ? { sourceId: script.sourceId } : {}),
      length: script.source.length,
      hash: await sha256Hex(script.source),
      decoded: script.decoded,
      preview: script.preview,
    };
    return entry;
  });

  const fingerprint = await sha256Hex(encoder.encode(objects.map(o =>
    `${o.id.objNum} ${o.id.gen} ${o.reachable ? 'reachable' : 'unreferenced'} ${o.hash}\n`).join('')));

  const result: AnalysisResult = {
    schemaVersion: SCHEMA_VERSION,
    fingerprint,
    fileSize: graph.resolver.fileSize,
    recovered: graph.resolver.isRecovered,
    metadata,
    objects,
    javascript,
    actions: trace.actions,
    images,
    embeddedFiles,
    signatures,
    encryption,
    revisions,
    anomalies: anomalies.list(),
  };
  deepFreeze(result);
  return result;
}

/** /Type and /Subtype for dictionaries and streams, the value kind otherwise */
function typeOf(value: PdfObject): { type: string; subtype?: string } {
  const dict = isStream(value) ? value.dict : isDict(value) ? value : null;
  if (!dict) return { type: value.kind };
  const subtype = dictGetName(dict, 'Subtype');
  const type = dictGetName(dict, 'Type')
    ?? (isStream(value) && subtype === 'Image' ? 'XObject' : 'Unknown');
  return subtype !== undefined ? { type, subtype } : { type };
}

function streamSummary(raw: Uint8Array, content: StreamContent | undefined): StreamSummary {
  return {
    rawLength: raw.length,
    ...(content?.decoded ? { decodedLength: content.data.length } : {}),
    decoded: content?.decoded ?? false,
    filters: content?.filters ?? [],
  };
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
}
