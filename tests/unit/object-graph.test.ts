import { describe, it, expect } from 'vitest';
import { deflateSync } from 'node:zlib';
import { XRefResolver } from '../../src/parser/resolver.js';
import { ObjectGraph } from '../../src/graph/object-graph.js';
import { AnomalyLog } from '../../src/forensics/anomalies.js';
import { extractMetadata } from '../../src/forensics/metadata.js';
import type { SecurityLevel } from '../../src/forensics/anomalies.js';
import { PDF_NULL, pdfRef, isDict, isStream, dictGetName, dictGetNumber } from '../../src/parser/types.js';
import {
  PdfBuilder, minimalDocument, buildWithXRefStream, objectStream, bytes, text,
} from '../helpers/pdf-builder.js';

function load(data: Uint8Array, level: SecurityLevel = 'standard'): { graph: ObjectGraph; log: AnomalyLog } {
  const log = new AnomalyLog(undefined, level);
  const resolver = XRefResolver.resolve(data, log);
  return { graph: ObjectGraph.build(resolver, resolver.parser, log), log };
}

const kinds = (log: AnomalyLog) => log.list().map(a => a.kind);
const id = (objNum: number, gen = 0) => ({ objNum, gen });

describe('ObjectGraph', () => {
  describe('reachability', () => {
    it('reports an object nothing points at', () => {
      const { graph, log } = load(minimalDocument().addObject(4, '(orphan)').build());
      expect(graph.reachableIds()).toEqual([id(1), id(2), id(3)]);
      expect(graph.isReachable(id(4))).toBe(false);
      expect(graph.report.unreachable).toEqual([id(4)]);
      expect(log.list().map(a => a.message)).toEqual(['Object 4 0 R is not reachable from the trailer']);
    });

    it('reaches the info dictionary from the trailer', () => {
      const builder = minimalDocument().addObject(4, '<< /Title (Quarterly) >>').setInfo('4 0 R');
      const { graph, log } = load(builder.build());
      expect(log.size).toBe(0);
      expect(graph.isReachable(id(4))).toBe(true);
      expect(graph.info()?.entries.has('Title')).toBe(true);
    });

    it('reaches a linearization dictionary only when it opens the file', () => {
      const leading = minimalDocument(new PdfBuilder().addObject(5, '<< /Linearized 1 /L 900 >>'));
      const { graph, log } = load(leading.build());
      expect(graph.linearizationId()).toEqual(id(5));
      expect(graph.isReachable(id(5))).toBe(true);
      expect(extractMetadata(graph).linearized).toBe(true);
      expect(log.size).toBe(0);

      const trailing = load(minimalDocument().addObject(5, '<< /Linearized 1 /L 900 >>').build());
      expect(trailing.graph.linearizationId()).toBeUndefined();
      expect(trailing.graph.isReachable(id(5))).toBe(false);
      expect(extractMetadata(trailing.graph).linearized).toBe(false);
    });

    it('reaches objects inside an object stream and the xref stream itself', () => {
      const { data } = buildWithXRefStream([
        { num: 1, body: '<< /Type /Catalog /Pages 2 0 R >>' },
        {
          num: 4,
          body: objectStream([
            { num: 2, content: '<< /Type /Pages /Kids [3 0 R] /Count 1 >>' },
            { num: 3, content: '<< /Type /Page /Parent 2 0 R >>' },
          ]),
        },
      ], [{ num: 2, container: 4, index: 0 }, { num: 3, container: 4, index: 1 }], 5);
      const { graph, log } = load(data);

      expect(log.size).toBe(0);
      expect(graph.reachableIds()).toEqual([id(1), id(2), id(3), id(4), id(5)]);
      const pages = graph.get(id(2));
      expect(pages && isDict(pages) && dictGetName(pages, 'Type')).toBe('Pages');
      expect(graph.pages().map(p => p.id)).toEqual([id(3)]);
    });
  });

  describe('references', () => {
    it('reports a reference to a missing object', () => {
      const { graph, log } = load(minimalDocument(new PdfBuilder(), ' /Contents 9 0 R').build());
      expect(kinds(log)).toEqual(['dangling-reference']);
      expect(log.list()[0].message).toBe('Object 3 0 R references missing object 9 0 R');
      expect(graph.report.dangling).toEqual([{ from: id(3), to: id(9) }]);
      expect(graph.resolve(pdfRef(9, 0))).toBe(PDF_NULL);
    });

    it('reports a reference with a stale generation', () => {
      const { graph, log } = load(minimalDocument(new PdfBuilder(), '', ' /Extra 2 5 R').build());
      expect(kinds(log)).toEqual(['generation-mismatch']);
      expect(log.list()[0].message).toBe('Object 1 0 R references 2 5 R, but the live generation is 0');
      expect(graph.report.staleGenerations).toEqual([{ from: id(1), to: id(2, 5) }]);
    });

    it('resolves an indirect stream /Length', () => {
      const builder = minimalDocument(new PdfBuilder(), ' /Contents 4 0 R')
        .addStream(4, '', 'abc', { length: '5 0 R' })
        .addObject(5, '3');
      const { graph, log } = load(builder.build());
      expect(log.size).toBe(0);
      const stream = graph.get(id(4));
      expect(stream && isStream(stream) && text(stream.data)).toBe('abc');
    });
  });

  describe('cycles', () => {
    it('reports a page tree that loops once', () => {
      const builder = new PdfBuilder()
        .addObject(1, '<< /Type /Catalog /Pages 2 0 R >>')
        .addObject(2, '<< /Type /Pages /Kids [3 0 R] /Count 1 >>')
        .addObject(3, '<< /Type /Pages /Parent 2 0 R /Kids [2 0 R] /Count 1 >>');
      const { graph, log } = load(builder.build());

      expect(graph.pages()).toEqual([]);
      graph.pages();
      expect(kinds(log)).toEqual(['cyclic-reference']);
      expect(log.list()[0].message).toBe('Cycle through 2 0 R -> 3 0 R (page tree /Kids)');
      expect(log.list()[0].details).toEqual({ members: '2 0 R, 3 0 R', via: 'page tree /Kids' });
    });

    it('breaks a reference chain that returns to itself', () => {
      const builder = minimalDocument(new PdfBuilder(), '', ' /Loop 4 0 R')
        .addObject(4, '5 0 R')
        .addObject(5, '4 0 R');
      const { graph, log } = load(builder.build());

      expect(graph.resolve(pdfRef(4, 0))).toBe(PDF_NULL);
      expect(graph.resolve(pdfRef(5, 0))).toBe(PDF_NULL);
      expect(kinds(log)).toEqual(['cyclic-reference']);
      expect(log.list()[0].message).toBe('Cycle through 4 0 R -> 5 0 R (reference chain)');
    });
  });

  describe('objects and streams', () => {
    it('records a wrong /Length against its object', () => {
      const builder = minimalDocument(new PdfBuilder(), ' /Contents 4 0 R')
        .addStream(4, '', 'Hello World', { length: 5 });
      const { log } = load(builder.build());
      const [anomaly] = log.list();
      expect(kinds(log)).toEqual(['stream-length-mismatch']);
      expect(anomaly.objectId).toEqual(id(4));
      expect(anomaly.details).toEqual({ declared: 5, actual: 11 });
      expect(log.kindsFor(id(4))).toEqual(['stream-length-mismatch']);
    });

    it('keeps the partial value of an object missing endobj', () => {
      const builder = minimalDocument(new PdfBuilder(), '', ' /Extra 4 0 R').addObject(4, '<< /A 1 >>');
      const broken = text(builder.build()).replace('<< /A 1 >>\nendobj', '<< /A 1 >>\nendxxx');
      const { graph, log } = load(bytes(broken));
      expect(kinds(log)).toEqual(['malformed-object']);
      expect(log.list()[0].message).toBe(`Object 4 0 at offset ${builder.offsetOf(4)} is missing endobj`);
      const partial = graph.get(id(4));
      expect(partial && isDict(partial) && dictGetNumber(partial, 'A')).toBe(1);
    });

    it('records a decode failure once and keeps the raw bytes', () => {
      const builder = minimalDocument(new PdfBuilder(), ' /Contents 4 0 R')
        .addStream(4, '/Filter /FlateDecode', 'not compressed');
      const { graph, log } = load(builder.build());

      const content = graph.decoded(id(4));
      expect(content?.decoded).toBe(false);
      expect(content?.filters).toEqual(['FlateDecode']);
      expect(content && text(content.data)).toBe('not compressed');
      expect(content?.error?.startsWith('FlateDecode failed at filter 0: ')).toBe(true);
      expect(graph.decoded(id(4))).toBe(content);
      expect(kinds(log)).toEqual(['decode-failure']);
      expect(log.list()[0].details).toEqual({ filter: 'FlateDecode', filterIndex: 0 });
      expect(graph.decoded(id(3))).toBeNull();
    });

    it('reports object stream members with unusable offsets', () => {
      const header = '2 0 3 -50 ';
      const content = `${header}<< /Type /Pages /Kids [3 0 R] /Count 1 >> `;
      const { data } = buildWithXRefStream([
        { num: 1, body: '<< /Type /Catalog /Pages 2 0 R >>' },
        {
          num: 4,
          body: `<< /Type /ObjStm /N 2 /First ${header.length} /Length ${content.length} >>\nstream\n${content}\nendstream`,
        },
      ], [{ num: 2, container: 4, index: 0 }, { num: 3, container: 4, index: 1 }], 5);
      const { graph, log } = load(data);

      expect(log.list().map(a => [a.kind, a.message])).toEqual([
        ['malformed-object', `Object stream member 1 (object 3) has offset -40, outside 10..${content.length - 1}`],
        ['malformed-object', 'Object 3 0 R is missing from object stream 4'],
      ]);
      expect(graph.get(id(3))).toBe(PDF_NULL);
      expect(graph.pages()).toEqual([]);
    });

    it('turns degenerate predictor parameters into a decode failure', () => {
      const builder = minimalDocument(new PdfBuilder(), ' /Contents 4 0 R')
        .addStream(4, '/Filter /FlateDecode /DecodeParms << /Predictor 2 /Colors 0 /Columns 3 >>',
          new Uint8Array(deflateSync(Buffer.from('abcdef'))));
      const { graph, log } = load(builder.build());

      expect(graph.decoded(id(4))?.decoded).toBe(false);
      expect(log.list().map(a => [a.kind, a.message])).toEqual([
        ['decode-failure', 'FlateDecode failed at filter 0: /DecodeParms /Colors must be a positive integer, got 0'],
      ]);
    });

    it('leaves the streams of an encrypted document encoded', () => {
      const builder = minimalDocument(new PdfBuilder(), ' /Contents 4 0 R')
        .addStream(4, '/Filter /FlateDecode', 'ciphertext')
        .addObject(5, '<< /Filter /Standard /V 1 /R 2 /O <00> /U <00> /P -4 >>')
        .setTrailerExtra('/Encrypt 5 0 R');
      const { graph, log } = load(builder.build());

      expect(graph.encrypted).toBe(true);
      expect(graph.decoded(id(4))).toEqual({
        decoded: false,
        data: bytes('ciphertext'),
        filters: ['FlateDecode'],
        error: 'Stream data is encrypted',
      });
      expect(log.size).toBe(0);
    });
  });

  describe('revisions', () => {
    const base = () => minimalDocument();

    it('marks a replaced object that changed as suspicious', () => {
      const builder = base();
      const updated = PdfBuilder.appendUpdate(builder.build(), [
        { num: 3, content: '<< /Type /Page /Parent 2 0 R /Rotate 90 >>' },
      ], 4);
      const { log } = load(updated);
      const [anomaly] = log.list();
      expect(kinds(log)).toEqual(['revision-shadowed-object']);
      expect(anomaly.severity).toBe('suspicious');
      expect(anomaly.message).toBe('Object 3 0 R from revision 0 is replaced in revision 1 (changed)');
      expect(anomaly.offset).toBe(builder.offsetOf(3));
      expect(anomaly.details).toEqual({ revision: 0, replacedIn: 1, outcome: 'changed' });
    });

    it('marks an identical replacement as info, raised under strict', () => {
      const updated = PdfBuilder.appendUpdate(base().build(), [
        { num: 3, content: '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] >>' },
      ], 4);
      expect(load(updated).log.list().map(a => [a.severity, a.details?.outcome]))
        .toEqual([['info', 'unchanged']]);
      expect(load(updated, 'strict').log.list().map(a => a.severity)).toEqual(['suspicious']);
    });
  });
});
