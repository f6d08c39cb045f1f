/**
 * Action tracer: finds every action a viewer could run by walking the
 * structures that can trigger one, traces automatic triggers before
 * user-driven ones, then sweeps the remaining objects for JavaScript
 * actions nothing points at. No content is pattern-matched;
 * only the /S of action dictionaries decides what is a script.
 */

import type { ObjectGraph } from '../graph/object-graph.js';
import { MAX_TREE_DEPTH } from '../graph/object-graph.js';
import type { AnomalyLog } from './anomalies.js';
import type { ObjectId, PdfDict, PdfObject } from '../parser/types.js';
import {
  PDF_NULL, pdfRef, objectKey, formatId, asDict, isRef, isArray, isString, isStream,
  dictGet, dictGetName,
} from '../parser/types.js';
import type { ActionEntry, ScriptTrigger } from '../types.js';
import { decodeTextString } from './text.js';

/** A script found by the tracer, before hashing */
export interface TracedScript {
  readonly objectId: ObjectId;
  readonly inline: boolean;
  readonly trigger: ScriptTrigger;
  readonly event?: string;
  readonly autoExecute: boolean;
  readonly sourceId?: ObjectId;
  readonly source: Uint8Array;
  readonly decoded: boolean;
  readonly preview: string;
}

export interface TraceResult {
  readonly actions: ActionEntry[];
  readonly scripts: TracedScript[];
}

interface TriggerContext {
  readonly trigger: ScriptTrigger;
  readonly event?: string;
  readonly autoExecute: boolean;
}

/** An action value found at a trigger, waiting to be traced */
interface TriggerSite {
  readonly value: PdfObject | undefined;
  readonly holder: ObjectId;
  readonly path: string;
  readonly ctx: TriggerContext;
}

export const PREVIEW_LENGTH = 120;

/** Page events that fire without user interaction */
const AUTO_PAGE_EVENTS = new Set(['O', 'C']);
const AUTO_ANNOTATION_EVENTS = new Set(['PO', 'PC', 'PV', 'PI']);

export function traceActions(graph: ObjectGraph, anomalies: AnomalyLog, maxDepth: number): TraceResult {
  return new ActionTracer(graph, anomalies, maxDepth).run();
}

class ActionTracer {
  private readonly actions: ActionEntry[] = [];
  private readonly scripts: TracedScript[] = [];
  private readonly seen = new Set<string>();
  private readonly sites: TriggerSite[] = [];

  constructor(
    private readonly graph: ObjectGraph,
    private readonly anomalies: AnomalyLog,
    private readonly maxDepth: number,
  ) {}

  run(): TraceResult {
    const rootRef = this.graph.resolver.rootRef;
    const catalog = this.graph.catalog();

    if (rootRef && catalog) {
      const catalogId = idOf(rootRef);
      const openAction = dictGet(catalog, 'OpenAction');
      // An array here is a destination, not an action
      if (openAction && !isArray(this.graph.resolve(openAction))) {
        this.sites.push({
          value: openAction,
          holder: catalogId,
          path: 'OpenAction',
          ctx: { trigger: 'OpenAction', autoExecute: true },
        });
      }
      this.collectAdditional(catalog, catalogId, 'DocumentAA', () => true);

      const names = this.graph.resolveDict(dictGet(catalog, 'Names'));
      const scripts = names ? dictGet(names, 'JavaScript') : undefined;
      if (scripts) {
        this.walkTree(scripts, catalogId, 'name tree', (node, holder) => {
          const pairs = this.graph.resolve(dictGet(node, 'Names') ?? PDF_NULL);
          if (!isArray(pairs)) return;
          for (let i = 0; i + 1 < pairs.items.length; i += 2) {
            const key = pairs.items[i];
            const name = isString(key) ? decodeTextString(key.value) : String(i / 2);
            this.sites.push({
              value: pairs.items[i + 1],
              holder,
              path: `Names/JavaScript/${name}`,
              ctx: { trigger: 'NamesJavaScript', autoExecute: true },
            });
          }
        });
      }
    }

    for (const page of this.graph.pages()) {
      const pageId = page.id ?? (rootRef ? idOf(rootRef) : { objNum: 0, gen: 0 });
      this.collectAdditional(page.dict, pageId, 'PageAA', event => AUTO_PAGE_EVENTS.has(event));

      const annots = this.graph.resolve(dictGet(page.dict, 'Annots') ?? PDF_NULL);
      if (!isArray(annots)) continue;
      for (const item of annots.items) {
        const annot = this.graph.resolveDict(item);
        if (!annot) continue;
        const annotId = isRef(item) ? idOf(item) : pageId;
        this.sites.push({
          value: dictGet(annot, 'A'),
          holder: annotId,
          path: 'A',
          ctx: { trigger: 'AnnotationA', autoExecute: false },
        });
        this.collectAdditional(annot, annotId, 'AnnotationAA', event => AUTO_ANNOTATION_EVENTS.has(event));
      }
    }

    if (rootRef && catalog) {
      const acroForm = this.graph.resolveDict(dictGet(catalog, 'AcroForm'));
      const fields = acroForm ? this.graph.resolve(dictGet(acroForm, 'Fields') ?? PDF_NULL) : undefined;
      if (fields && isArray(fields)) {
        for (const field of fields.items) {
          this.walkTree(field, idOf(rootRef), 'form field /Kids', (node, holder) => {
            this.collectAdditional(node, holder, 'FieldAA', () => false);
          });
        }
      }
    }

    // An action shared by several triggers is traced first from one that runs unprompted
    const automatic = this.sites.filter(site => site.ctx.autoExecute);
    const prompted = this.sites.filter(site => !site.ctx.autoExecute);
    for (const site of [...automatic, ...prompted]) {
      this.visit(site.value, site.holder, site.path, site.ctx, 0, []);
    }

    // JavaScript actions no trigger reaches
    for (const id of this.graph.liveIds()) {
      if (this.seen.has(objectKey(id))) continue;
      const dict = asDict(this.graph.get(id) ?? PDF_NULL);
      if (dict && dictGetName(dict, 'S') === 'JavaScript') {
        this.visit(pdfRef(id.objNum, id.gen), id, '', { trigger: 'Unattached', autoExecute: false }, 0, []);
      }
    }

    return { actions: this.actions, scripts: this.scripts };
  }

  private collectAdditional(
    dict: PdfDict,
    holder: ObjectId,
    trigger: ScriptTrigger,
    isAuto: (event: string) => boolean,
  ): void {
    const aaValue = dictGet(dict, 'AA');
    const aa = this.graph.resolveDict(aaValue);
    if (!aaValue || !aa) return;
    const aaHolder = isRef(aaValue) ? idOf(aaValue) : holder;
    for (const [event, action] of aa.entries) {
      const ctx = { trigger, event, autoExecute: isAuto(event) };
      this.sites.push({ value: action, holder: aaHolder, path: `AA/${event}`, ctx });
    }
  }

  private visit(
    value: PdfObject | undefined,
    holder: ObjectId,
    path: string,
    ctx: TriggerContext,
    depth: number,
    chain: readonly ObjectId[],
  ): void {
    if (!value) return;
    const inline = !isRef(value);
    const id = isRef(value) ? idOf(value) : holder;
    const key = inline ? `${objectKey(holder)}#${path}` : objectKey(id);

    if (!inline) {
      const at = chain.findIndex(c => objectKey(c) === key);
      if (at !== -1) {
        this.graph.reportCycle(chain.slice(at), 'action /Next');
        return;
      }
    }

    const dict = this.graph.resolveDict(value);
    if (!dict || this.seen.has(key)) return;
    this.seen.add(key);

    const type = dictGetName(dict, 'S') ?? 'Unknown';
    const target = type === 'JavaScript' ? undefined : actionTarget(this.graph, dict);
    const entry: ActionEntry = {
      objectId: id,
      inline,
      type,
      trigger: ctx.trigger,
      ...(ctx.event !== undefined ? { event: ctx.event } : {}),
      autoExecute: ctx.autoExecute,
      depth,
      ...(target !== undefined ? { target } : {}),
    };
    this.actions.push(entry);

    if (type === 'JavaScript') this.recordScript(dict, id, inline, ctx);
    if (type === 'Launch') {
      this.anomalies.record('launch-action', `Launch action in ${formatId(id)} (${describe(ctx)})`, {
        objectId: id,
        details: { trigger: ctx.trigger, target: target ?? '' },
      });
    }

    const next = dictGet(dict, 'Next');
    if (!next) return;
    if (depth >= this.maxDepth) {
      this.anomalies.record('action-chain-truncated',
        `Action chain through ${formatId(id)} continues past ${this.maxDepth} hops`, {
          objectId: id,
          details: { maxDepth: this.maxDepth },
        });
      return;
    }
    const resolvedNext = this.graph.resolve(next);
    const items = isArray(resolvedNext) ? resolvedNext.items : [next];
    const nextChain = inline ? chain : [...chain, id];
    items.forEach((item, i) => {
      const step = items.length > 1 ? `/Next[${i}]` : '/Next';
      this.visit(item, id, `${path}${step}`, ctx, depth + 1, nextChain);
    });
  }

  private recordScript(dict: PdfDict, id: ObjectId, inline: boolean, ctx: TriggerContext): void {
    const js = dictGet(dict, 'JS');
    let source: Uint8Array = new Uint8Array(0);
    let decoded = true;
    let sourceId: ObjectId | undefined;

    if (js) {
      if (isRef(js)) sourceId = idOf(js);
      const value = this.graph.resolve(js);
      if (isString(value)) {
        source = value.value;
      } else if (isStream(value) && sourceId) {
        const content = this.graph.decoded(sourceId);
        if (content) {
          source = content.data;
          decoded = content.decoded;
        }
      }
    }

    const preview = decodeTextString(source.subarray(0, PREVIEW_LENGTH * 2 + 3)).slice(0, PREVIEW_LENGTH);
    this.scripts.push({
      objectId: id,
      inline,
      trigger: ctx.trigger,
      ...(ctx.event !== undefined ? { event: ctx.event } : {}),
      autoExecute: ctx.autoExecute,
      ...(sourceId ? { sourceId } : {}),
      source,
      decoded,
      preview,
    });

    if (ctx.autoExecute) {
      this.anomalies.record('auto-executing-script', `JavaScript in ${formatId(id)} runs automatically (${describe(ctx)})`, {
        objectId: id,
        details: { trigger: ctx.trigger, length: source.length },
      });
    } else {
      this.anomalies.record('javascript-present', `JavaScript in ${formatId(id)} (${describe(ctx)})`, {
        objectId: id,
        details: { trigger: ctx.trigger, length: source.length },
      });
    }
  }

  /**
   * Depth-first walk over a /Kids tree. A node met again below itself is a
   * cycle; a node shared between branches is visited once.
   */
  private walkTree(
    root: PdfObject,
    holder: ObjectId,
    label: string,
    visitNode: (node: PdfDict, holder: ObjectId) => void,
  ): void {
    const done = new Set<string>();
    const walk = (node: PdfObject, nodeHolder: ObjectId, path: readonly ObjectId[], depth: number): void => {
      let current = nodeHolder;
      if (isRef(node)) {
        current = idOf(node);
        const key = objectKey(current);
        const at = path.findIndex(p => objectKey(p) === key);
        if (at !== -1) {
          this.graph.reportCycle(path.slice(at), label);
          return;
        }
        if (done.has(key)) return;
        done.add(key);
      }
      if (depth > MAX_TREE_DEPTH) {
        this.anomalies.record('nesting-limit', `${label} deeper than ${MAX_TREE_DEPTH} levels`, { objectId: current });
        return;
      }
      const dict = this.graph.resolveDict(node);
      if (!dict) return;
      visitNode(dict, current);
      const kids = this.graph.resolve(dictGet(dict, 'Kids') ?? PDF_NULL);
      if (!isArray(kids)) return;
      const childPath = isRef(node) ? [...path, current] : path;
      for (const kid of kids.items) walk(kid, current, childPath, depth + 1);
    };
    walk(root, holder, [], 0);
  }
}

function idOf(ref: ObjectId): ObjectId {
  return { objNum: ref.objNum, gen: ref.gen };
}

function describe(ctx: TriggerContext): string {
  return ctx.event !== undefined ? `${ctx.trigger} ${ctx.event}` : ctx.trigger;
}

/** What a non-script action points at: a URI, a file or a named action */
function actionTarget(graph: ObjectGraph, dict: PdfDict): string | undefined {
  const uri = graph.resolve(dictGet(dict, 'URI') ?? PDF_NULL);
  if (isString(uri)) return decodeTextString(uri.value);

  const win = graph.resolveDict(dictGet(dict, 'Win'));
  const file = dictGet(dict, 'F') ?? (win ? dictGet(win, 'F') : undefined);
  if (file) {
    const resolved = graph.resolve(file);
    if (isString(resolved)) return decodeTextString(resolved.value);
    const spec = asDict(resolved);
    const name = spec ? graph.resolve(dictGet(spec, 'UF') ?? dictGet(spec, 'F') ?? PDF_NULL) : undefined;
    if (name && isString(name)) return decodeTextString(name.value);
  }

  return dictGetName(dict, 'N');
}
