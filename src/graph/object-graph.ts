/**
 * Object Graph
 *
 * One slot per live cross-reference entry, parsed on first use and kept for
 * the rest of the run. References stay plain ids and are looked up here, so
 * cycles in the file never become cycles in memory. After loading, the graph
 * walks everything reachable from the trailer and reports what the file
 * contains but never uses.
 */

import type { XRefResolver } from '../parser/resolver.js';
import type { ObjectParser, ParsedObject, ParseIssue, ObjectStreamMember } from '../parser/parser.js';
import { parseObjectStream } from '../parser/parser.js';
import type { ObjectId, PdfDict, PdfObject, PdfRef, TrailerInfo, XRefEntry } from '../parser/types.js';
import {
  PDF_NULL, objectKey, formatId, compareIds,
  asDict, isRef, isArray, isDict, isStream, isNumber,
  dictGet, dictGetName,
} from '../parser/types.js';
import { PdfDecodeError, PdfMalformedObjectError } from '../errors.js';
import { decodeStream, getFilterChain } from '../stream/decoder.js';
import type { AnomalyLog } from '../forensics/anomalies.js';
import { serializeObject } from '../forensics/serialize.js';

/** Bytes of a stream after its filter chain, or raw when decoding failed */
export interface StreamContent {
  readonly decoded: boolean;
  readonly data: Uint8Array;
  readonly filters: readonly string[];
  readonly error?: string;
}

export interface ReferenceIssue {
  readonly from: ObjectId;
  readonly to: ObjectId;
}

export interface ConsistencyReport {
  readonly unreachable: readonly ObjectId[];
  readonly dangling: readonly ReferenceIssue[];
  readonly staleGenerations: readonly ReferenceIssue[];
}

export interface PageNode {
  /** Absent for a page written inline in its parent's /Kids */
  readonly id?: ObjectId;
  readonly dict: PdfDict;
}

type SlotState = 'pending' | 'loading' | 'done';

interface Slot {
  readonly id: ObjectId;
  readonly entry: XRefEntry;
  state: SlotState;
  value: PdfObject;
  content?: StreamContent;
}

/** Deepest page tree we descend */
export const MAX_TREE_DEPTH = 64;

export class ObjectGraph {
  private readonly slots = new Map<string, Slot>();
  private readonly byNumber = new Map<number, Slot>();
  private readonly objectStreams = new Map<number, ObjectStreamMember[] | null>();
  private readonly reportedCycles = new Set<string>();
  private readonly reachable = new Set<string>();
  private pageList: PageNode[] | undefined;
  private consistency: ConsistencyReport = { unreachable: [], dangling: [], staleGenerations: [] };

  /** Streams of an encrypted document stay encoded; decryption is out of scope */
  readonly encrypted: boolean;

  private constructor(
    readonly resolver: XRefResolver,
    private readonly parser: ObjectParser,
    private readonly anomalies: AnomalyLog,
  ) {
    for (const id of resolver.liveIds()) {
      const entry = resolver.entries.get(id.objNum);
      if (!entry) continue;
      const slot: Slot = { id, entry, state: 'pending', value: PDF_NULL };
      this.slots.set(objectKey(id), slot);
      this.byNumber.set(id.objNum, slot);
    }
    this.encrypted = resolver.trailer.encrypt !== undefined;
    parser.setLengthResolver(ref => {
      const length = this.resolve(ref);
      return isNumber(length) && !length.real && length.value >= 0 ? length.value : undefined;
    });
  }

  static build(resolver: XRefResolver, parser: ObjectParser, anomalies: AnomalyLog): ObjectGraph {
    const graph = new ObjectGraph(resolver, parser, anomalies);
    for (const slot of graph.slots.values()) graph.load(slot);
    graph.computeReachability();
    graph.checkReferences();
    graph.checkShadowed();
    return graph;
  }

  get trailer(): TrailerInfo {
    return this.resolver.trailer;
  }

  get report(): ConsistencyReport {
    return this.consistency;
  }

  /** Live ids, ascending */
  liveIds(): ObjectId[] {
    return [...this.slots.values()].map(s => s.id).sort(compareIds);
  }

  reachableIds(): ObjectId[] {
    return this.liveIds().filter(id => this.reachable.has(objectKey(id)));
  }

  has(id: ObjectId): boolean {
    return this.slots.has(objectKey(id));
  }

  isReachable(id: ObjectId): boolean {
    return this.reachable.has(objectKey(id));
  }

  get(id: ObjectId): PdfObject | undefined {
    const slot = this.slots.get(objectKey(id));
    return slot ? this.load(slot) : undefined;
  }

  /** The linearization dictionary, present only as the first object in the file */
  linearizationId(): ObjectId | undefined {
    let first: Slot | undefined;
    for (const slot of this.slots.values()) {
      if (slot.entry.streamObjNum !== undefined) continue;
      if (!first || slot.entry.offset < first.entry.offset) first = slot;
    }
    if (!first) return undefined;
    const dict = asDict(this.load(first));
    return dict && dictGet(dict, 'Linearized') !== undefined ? first.id : undefined;
  }

  /**
   * Follow a chain of references to a direct value. A chain that comes back
   * to an object it already passed is a cycle: it yields null.
   */
  resolve(value: PdfObject): PdfObject {
    const chain: PdfRef[] = [];
    let current = value;
    while (isRef(current)) {
      const key = objectKey(current);
      const at = chain.findIndex(r => objectKey(r) === key);
      if (at !== -1) {
        this.reportCycle(chain.slice(at), 'reference chain');
        return PDF_NULL;
      }
      chain.push(current);
      const slot = this.slots.get(key);
      if (!slot) return PDF_NULL;
      if (slot.state === 'loading') {
        this.reportCycle(chain, 'object refers to itself while being read');
        return PDF_NULL;
      }
      current = this.load(slot);
    }
    return current;
  }

  resolveDict(value: PdfObject | undefined): PdfDict | null {
    return value ? asDict(this.resolve(value)) : null;
  }

  /** Decoded stream content, computed once per stream */
  decoded(id: ObjectId): StreamContent | null {
    const slot = this.slots.get(objectKey(id));
    if (!slot) return null;
    const value = this.load(slot);
    if (!isStream(value)) return null;
    if (slot.content) return slot.content;

    const resolve = (v: PdfObject): PdfObject => this.resolve(v);
    let filters: string[] = [];
    let content: StreamContent;
    try {
      filters = getFilterChain(value.dict, resolve).map(f => f.name);
      if (this.encrypted && dictGetName(value.dict, 'Type') !== 'XRef') {
        content = { decoded: false, data: value.data, filters, error: 'Stream data is encrypted' };
      } else {
        content = { decoded: true, data: decodeStream(value.data, value.dict, resolve), filters };
      }
    } catch (err) {
      if (!(err instanceof PdfDecodeError)) throw err;
      this.anomalies.record('decode-failure', err.message, {
        objectId: slot.id,
        details: { filter: err.filter, filterIndex: err.filterIndex },
      });
      content = { decoded: false, data: value.data, filters, error: err.message };
    }
    slot.content = content;
    return content;
  }

  catalog(): PdfDict | null {
    const root = this.resolver.rootRef;
    return root ? this.resolveDict(root) : null;
  }

  info(): PdfDict | null {
    const info = this.resolver.infoRef;
    return info ? this.resolveDict(info) : null;
  }

  encryptDict(): PdfDict | null {
    return this.resolveDict(this.trailer.encrypt);
  }

  /** Leaf pages in document order */
  pages(): PageNode[] {
    if (this.pageList) return this.pageList;
    const pages: PageNode[] = [];
    const root = this.catalog();
    const treeRoot = root ? dictGet(root, 'Pages') : undefined;
    if (treeRoot) this.walkPages(treeRoot, [], new Set(), pages, 0);
    this.pageList = pages;
    return pages;
  }

  /**
   * Report a cycle once per distinct member set. Used by every walker over
   * a structure that is supposed to be a tree or a chain.
   */
  reportCycle(members: readonly ObjectId[], via: string): void {
    const distinct = new Map(members.map(id => [objectKey(id), id] as const));
    const sorted = [...distinct.values()].sort(compareIds);
    const key = sorted.map(objectKey).join(',');
    if (sorted.length === 0 || this.reportedCycles.has(key)) return;
    this.reportedCycles.add(key);
    this.anomalies.record('cyclic-reference', `Cycle through ${members.map(formatId).join(' -> ')} (${via})`, {
      objectId: members[0],
      details: { members: sorted.map(formatId).join(', '), via },
    });
  }

  // ─── Loading ───

  private load(slot: Slot): PdfObject {
    if (slot.state === 'done') return slot.value;
    if (slot.state === 'loading') {
      this.reportCycle([slot.id], 'object refers to itself while being read');
      return PDF_NULL;
    }
    slot.state = 'loading';
    try {
      slot.value = slot.entry.streamObjNum !== undefined
        ? this.loadCompressed(slot, slot.entry.streamObjNum)
        : this.loadDirect(slot);
    } finally {
      slot.state = 'done';
    }
    return slot.value;
  }

  private loadDirect(slot: Slot): PdfObject {
    let parsed: ParsedObject;
    try {
      parsed = this.parser.parseObjectAt(slot.entry.offset);
    } catch (err) {
      if (!(err instanceof PdfMalformedObjectError)) throw err;
      this.anomalies.record('malformed-object', err.message, {
        objectId: slot.id,
        offset: slot.entry.offset,
      });
      return err.partial ?? PDF_NULL;
    }

    this.recordIssues(slot.id, parsed.issues);

    if (parsed.id.objNum !== slot.id.objNum) {
      this.anomalies.record('offset-mismatch',
        `Entry for ${formatId(slot.id)} points to object ${formatId(parsed.id)}`, {
          objectId: slot.id,
          offset: slot.entry.offset,
        });
    } else if (parsed.id.gen !== slot.id.gen) {
      this.anomalies.record('generation-mismatch',
        `Object ${slot.id.objNum} is listed with generation ${slot.id.gen} but written with ${parsed.id.gen}`, {
          objectId: slot.id,
          offset: slot.entry.offset,
          details: { listed: slot.id.gen, written: parsed.id.gen },
        });
    }
    return parsed.value;
  }

  private loadCompressed(slot: Slot, containerNum: number): PdfObject {
    const members = this.objectStreamMembers(containerNum);
    if (!members) return PDF_NULL;

    const index = slot.entry.streamIndex ?? -1;
    const member = members[index]?.objNum === slot.id.objNum
      ? members[index]
      : members.find(m => m.objNum === slot.id.objNum);
    if (!member) {
      this.anomalies.record('malformed-object',
        `Object ${formatId(slot.id)} is missing from object stream ${containerNum}`, {
          objectId: slot.id,
          details: { container: containerNum },
        });
      return PDF_NULL;
    }
    return member.value;
  }

  /** Members of an object stream; an unreadable container is reported once */
  private objectStreamMembers(containerNum: number): ObjectStreamMember[] | null {
    const cached = this.objectStreams.get(containerNum);
    if (cached !== undefined) return cached;
    // Mark before loading so a container that points into itself stops here
    this.objectStreams.set(containerNum, null);

    const container = this.byNumber.get(containerNum);
    let members: ObjectStreamMember[] | null = null;
    let problem: string;

    if (!container || container.entry.streamObjNum !== undefined) {
      problem = `Object stream ${containerNum} is not a live uncompressed object`;
    } else {
      const value = this.load(container);
      const content = isStream(value) && dictGetName(value.dict, 'Type') === 'ObjStm'
        ? this.decoded(container.id)
        : null;
      if (!isStream(value) || !content) {
        problem = `Object ${containerNum} is not an object stream`;
      } else if (!content.decoded) {
        problem = `Object stream ${containerNum} cannot be decoded: ${content.error ?? 'unknown error'}`;
      } else {
        const issues: ParseIssue[] = [];
        members = parseObjectStream(value, content.data, issues);
        this.recordIssues(container.id, issues);
        problem = '';
      }
    }

    if (!members) {
      this.anomalies.record('malformed-object', `${problem}; the objects it holds are unavailable`, {
        objectId: container?.id,
        details: { container: containerNum },
      });
    }
    this.objectStreams.set(containerNum, members);
    return members;
  }

  private recordIssues(id: ObjectId, issues: readonly ParseIssue[]): void {
    for (const issue of issues) {
      this.anomalies.record(issue.kind, issue.message, {
        objectId: id,
        offset: issue.offset,
        details: issue.details,
      });
    }
  }

  // ─── Page tree ───

  private walkPages(node: PdfObject, path: ObjectId[], done: Set<string>, out: PageNode[], depth: number): void {
    let id: ObjectId | undefined;
    if (isRef(node)) {
      id = { objNum: node.objNum, gen: node.gen };
      const key = objectKey(id);
      const at = path.findIndex(p => objectKey(p) === key);
      if (at !== -1) {
        this.reportCycle(path.slice(at), 'page tree /Kids');
        return;
      }
      if (done.has(key)) return;
      done.add(key);
    }
    if (depth > MAX_TREE_DEPTH) {
      this.anomalies.record('nesting-limit', `Page tree deeper than ${MAX_TREE_DEPTH} levels`, { objectId: id });
      return;
    }

    const dict = asDict(this.resolve(node));
    if (!dict) return;
    const kids = this.resolve(dictGet(dict, 'Kids') ?? PDF_NULL);
    const type = dictGetName(dict, 'Type');

    if (type === 'Pages' || (type !== 'Page' && isArray(kids))) {
      if (!isArray(kids)) return;
      const childPath = id ? [...path, id] : path;
      for (const kid of kids.items) this.walkPages(kid, childPath, done, out, depth + 1);
    } else {
      out.push(id ? { id, dict } : { dict });
    }
  }

  // ─── Consistency ───

  private computeReachability(): void {
    const queue: string[] = [];
    const enqueue = (key: string): void => {
      if (this.reachable.has(key) || !this.slots.has(key)) return;
      this.reachable.add(key);
      queue.push(key);
    };

    const trailer = this.resolver.trailer;
    for (const root of [trailer.root, trailer.info, trailer.encrypt]) {
      if (root && isRef(root)) enqueue(objectKey(root));
    }

    // Structural objects nothing in the document body points at
    for (const slot of this.slots.values()) {
      if (slot.entry.streamObjNum !== undefined) continue;
      if (this.resolver.xrefStreamOffsets.has(slot.entry.offset)) enqueue(objectKey(slot.id));
    }
    const linearization = this.linearizationId();
    if (linearization) enqueue(objectKey(linearization));

    for (let i = 0; i < queue.length; i++) {
      const slot = this.slots.get(queue[i]);
      if (!slot) continue;
      if (slot.entry.streamObjNum !== undefined) {
        const container = this.byNumber.get(slot.entry.streamObjNum);
        if (container) enqueue(objectKey(container.id));
      }
      forEachRef(this.load(slot), ref => enqueue(objectKey(ref)));
    }

    const unreachable = this.liveIds().filter(id => !this.reachable.has(objectKey(id)));
    for (const id of unreachable) {
      this.anomalies.record('unreferenced-object', `Object ${formatId(id)} is not reachable from the trailer`, {
        objectId: id,
      });
    }
    this.consistency = { ...this.consistency, unreachable };
  }

  private checkReferences(): void {
    const dangling: ReferenceIssue[] = [];
    const staleGenerations: ReferenceIssue[] = [];
    const seen = new Set<string>();

    for (const slot of this.slots.values()) {
      forEachRef(this.load(slot), ref => {
        const targetKey = objectKey(ref);
        if (this.slots.has(targetKey)) return;
        const pairKey = `${objectKey(slot.id)}>${targetKey}`;
        if (seen.has(pairKey)) return;
        seen.add(pairKey);

        const to = { objNum: ref.objNum, gen: ref.gen };
        const live = this.byNumber.get(ref.objNum);
        if (live) {
          staleGenerations.push({ from: slot.id, to });
          this.anomalies.record('generation-mismatch',
            `Object ${formatId(slot.id)} references ${formatId(to)}, but the live generation is ${live.id.gen}`, {
              objectId: slot.id,
              details: { target: formatId(to), liveGeneration: live.id.gen },
            });
        } else {
          dangling.push({ from: slot.id, to });
          this.anomalies.record('dangling-reference',
            `Object ${formatId(slot.id)} references missing object ${formatId(to)}`, {
              objectId: slot.id,
              details: { target: formatId(to) },
            });
        }
      });
    }

    this.consistency = { ...this.consistency, dangling, staleGenerations };
  }

  /** Compare every object a later revision replaced with its replacement */
  private checkShadowed(): void {
    for (const { objNum, entry, shadowedBy } of this.resolver.shadowed) {
      // A free slot being reused is ordinary
      if (entry.free) continue;
      const oldId = { objNum, gen: entry.gen };

      let outcome: 'deleted' | 'changed' | 'unchanged' | 'not compared';
      if (shadowedBy.free) {
        outcome = 'deleted';
      } else if (entry.streamObjNum !== undefined) {
        outcome = 'not compared';
      } else {
        const old = this.parseShadowed(entry.offset);
        const live = this.get({ objNum, gen: shadowedBy.gen });
        outcome = old && live && bytesEqual(serializeObject(old), serializeObject(live)) ? 'unchanged' : 'changed';
      }

      const divergent = outcome === 'deleted' || outcome === 'changed';
      this.anomalies.record('revision-shadowed-object',
        `Object ${formatId(oldId)} from revision ${entry.section} is replaced in revision ${shadowedBy.section} (${outcome})`, {
          objectId: oldId,
          offset: entry.streamObjNum === undefined ? entry.offset : undefined,
          severity: divergent ? 'suspicious' : 'info',
          details: { revision: entry.section, replacedIn: shadowedBy.section, outcome },
        });
    }
  }

  private parseShadowed(offset: number): PdfObject | null {
    try {
      return this.parser.parseObjectAt(offset).value;
    } catch (err) {
      if (!(err instanceof PdfMalformedObjectError)) throw err;
      return err.partial ?? null;
    }
  }
}

/** Visit every reference inside a value, including a stream's dictionary */
export function forEachRef(value: PdfObject, visit: (ref: PdfRef) => void): void {
  const stack: PdfObject[] = [value];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) continue;
    if (isRef(current)) {
      visit(current);
    } else if (isArray(current)) {
      for (let i = current.items.length - 1; i >= 0; i--) stack.push(current.items[i]);
    } else if (isDict(current)) {
      for (const item of [...current.entries.values()].reverse()) stack.push(item);
    } else if (isStream(current)) {
      stack.push(current.dict);
    }
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
