import { describe, it, expect } from 'vitest';
import { XRefResolver } from '../../src/parser/resolver.js';
import { AnomalyLog } from '../../src/forensics/anomalies.js';
import { PdfXRefError } from '../../src/errors.js';
import { PdfBuilder, minimalDocument, buildWithXRefStream, bytes, text, concat } from '../helpers/pdf-builder.js';

function resolve(data: Uint8Array): { resolver: XRefResolver; log: AnomalyLog } {
  const log = new AnomalyLog();
  return { resolver: XRefResolver.resolve(data, log), log };
}

const kinds = (log: AnomalyLog) => log.list().map(a => a.kind);

const MINIMAL_OBJECTS = [
  { num: 1, body: '<< /Type /Catalog /Pages 2 0 R >>' },
  { num: 2, body: '<< /Type /Pages /Kids [3 0 R] /Count 1 >>' },
  { num: 3, body: '<< /Type /Page /Parent 2 0 R >>' },
];

describe('XRefResolver', () => {
  describe('intact files', () => {
    it('reads a single xref table', () => {
      const { resolver, log } = resolve(minimalDocument().build());
      expect(log.size).toBe(0);
      expect(resolver.isRecovered).toBe(false);
      expect(resolver.sections.map(s => s.form)).toEqual(['table']);
      expect(resolver.rootRef).toEqual({ kind: 'ref', objNum: 1, gen: 0 });
      expect(resolver.liveIds()).toEqual([
        { objNum: 1, gen: 0 }, { objNum: 2, gen: 0 }, { objNum: 3, gen: 0 },
      ]);
      expect(resolver.header).toEqual({ version: '1.7', offset: 0, eofOffset: resolver.fileSize - 6, trailingBytes: 0 });
    });

    it('reads a cross-reference stream', () => {
      const { data, xrefOffset } = buildWithXRefStream(MINIMAL_OBJECTS, [], 4);
      const { resolver, log } = resolve(data);
      expect(log.size).toBe(0);
      expect(resolver.sections.map(s => s.form)).toEqual(['stream']);
      expect(resolver.liveIds().map(id => id.objNum)).toEqual([1, 2, 3, 4]);
      expect([...resolver.xrefStreamOffsets]).toEqual([xrefOffset]);
      expect(resolver.entries.get(0)).toEqual({ offset: 0, gen: 65535, free: true, section: 0 });
    });

    it('merges an incremental update, newest entry winning', () => {
      const builder = minimalDocument();
      const base = builder.build();
      const updated = PdfBuilder.appendUpdate(base, [
        { num: 3, content: '<< /Type /Page /Parent 2 0 R /Rotate 90 >>' },
      ], 4);
      const { resolver, log } = resolve(updated);

      expect(log.size).toBe(0);
      expect(resolver.sections.map(s => [s.index, s.offset])).toEqual([
        [0, parseInt(text(base).slice(text(base).lastIndexOf('startxref') + 10), 10)],
        [1, resolver.sections[1].offset],
      ]);
      expect(resolver.sections[1].trailer.prev).toBe(resolver.sections[0].offset);
      expect(resolver.entries.get(3)?.section).toBe(1);
      expect(resolver.entries.get(3)?.offset).toBe(base.length);
      expect(resolver.shadowed).toHaveLength(1);
      expect(resolver.shadowed[0].objNum).toBe(3);
      expect(resolver.shadowed[0].entry.offset).toBe(builder.offsetOf(3));
      expect(resolver.trailers).toHaveLength(2);
    });
  });

  describe('header and tail', () => {
    it('reports a header that does not start the file', () => {
      const { resolver, log } = resolve(minimalDocument(new PdfBuilder().setHeader('junk\n%PDF-1.4\n')).build());
      expect(resolver.header.offset).toBe(5);
      expect(resolver.header.version).toBe('1.4');
      expect(kinds(log)).toEqual(['header-offset']);
    });

    it('reports a missing header', () => {
      const { resolver, log } = resolve(minimalDocument(new PdfBuilder().setHeader('')).build());
      expect(resolver.header.version).toBeUndefined();
      expect(resolver.header.offset).toBe(-1);
      expect(kinds(log)).toEqual(['missing-header']);
    });

    it('reports bytes after the last %%EOF but not trailing whitespace', () => {
      const data = concat(minimalDocument().build(), bytes('garbage\r\n\n'));
      const { resolver, log } = resolve(data);
      expect(resolver.header.trailingBytes).toBe(7);
      const [anomaly] = log.list();
      expect(anomaly.kind).toBe('trailing-data');
      expect(anomaly.message).toBe('7 bytes follow the last %%EOF');
      expect(anomaly.offset).toBe(resolver.header.eofOffset + 5);
    });
  });

  describe('reconstruction', () => {
    it('rebuilds the table when startxref points outside the file', () => {
      const good = text(minimalDocument().build());
      const { resolver, log } = resolve(bytes(good.replace(/startxref\n\d+/, 'startxref\n99999')));

      expect(resolver.isRecovered).toBe(true);
      expect(resolver.sections).toHaveLength(1);
      expect(resolver.sections[0].form).toBe('recovered');
      expect(resolver.sections[0].offset).toBe(-1);
      expect(resolver.liveIds().map(id => id.objNum)).toEqual([1, 2, 3]);
      expect(resolver.rootRef).toEqual({ kind: 'ref', objNum: 1, gen: 0 });
      expect(log.list().map(a => a.message)).toEqual([
        'Cross-reference data rebuilt by scanning the file: Cross-reference offset 99999 is outside the file',
      ]);
    });

    it('rebuilds the table when an entry points at the wrong object', () => {
      const builder = minimalDocument();
      const pad = (n: number) => String(n).padStart(10, '0');
      const corrupted = text(builder.build())
        .replace(`${pad(builder.offsetOf(2))} 00000 n`, `${pad(builder.offsetOf(3))} 00000 n`);
      const { resolver, log } = resolve(bytes(corrupted));

      expect(kinds(log)).toEqual(['offset-mismatch', 'xref-reconstructed']);
      expect(log.list()[0].message).toBe('Entry for object 2 points to object 3 0');
      expect(resolver.isRecovered).toBe(true);
      expect(resolver.entries.get(2)?.offset).toBe(builder.offsetOf(2));
    });

    it('drops an entry outside the file without rebuilding', () => {
      const builder = minimalDocument().addObject(4, '(orphan)');
      const pad = (n: number) => String(n).padStart(10, '0');
      const corrupted = text(builder.build()).replace(`${pad(builder.offsetOf(4))} 00000 n`, `${pad(88888)} 00000 n`);
      const { resolver, log } = resolve(bytes(corrupted));

      expect(kinds(log)).toEqual(['offset-out-of-bounds']);
      expect(resolver.isRecovered).toBe(false);
      expect(resolver.entries.has(4)).toBe(false);
    });

    it('rebuilds the table when the catalog entry points outside the file', () => {
      const builder = minimalDocument();
      const pad = (n: number) => String(n).padStart(10, '0');
      const corrupted = text(builder.build()).replace(`${pad(builder.offsetOf(1))} 00000 n`, '9999999999 00000 n');
      const { resolver, log } = resolve(bytes(corrupted));

      expect(log.list().map(a => [a.kind, a.message])).toEqual([
        ['offset-out-of-bounds', 'Object 1 points to offset 9999999999, outside the file'],
        ['xref-reconstructed', 'Cross-reference data rebuilt by scanning the file: Document catalog 1 0 R points outside the file'],
      ]);
      expect(resolver.isRecovered).toBe(true);
      expect(resolver.entries.get(1)?.offset).toBe(builder.offsetOf(1));
    });

    it('synthesizes a trailer from the catalog when /Root is unusable', () => {
      const { resolver, log } = resolve(minimalDocument(new PdfBuilder().setRoot('99 0 R')).build());
      expect(kinds(log)).toEqual(['xref-reconstructed']);
      expect(log.list()[0].details).toEqual({ reason: 'Document catalog 99 0 R has no cross-reference entry' });
      expect(resolver.rootRef).toEqual({ kind: 'ref', objNum: 1, gen: 0 });
      expect(resolver.trailer.size).toBe(4);
    });

    it('stops a /Prev chain that loops and rebuilds from the scan', () => {
      const base = minimalDocument().build();
      const updated = text(PdfBuilder.appendUpdate(base, [{ num: 3, content: '<< /Type /Page /Parent 2 0 R >>' }], 4));
      const newest = parseInt(updated.slice(updated.lastIndexOf('startxref') + 10), 10);
      const looped = updated.replace(/\/Prev \d+/, `/Prev ${newest}`);
      const { resolver, log } = resolve(bytes(looped));

      expect(kinds(log)).toEqual(['xref-section-unreadable', 'xref-reconstructed']);
      expect(log.list()[0].message).toBe(`/Prev chain loops back to offset ${newest}`);
      expect(resolver.isRecovered).toBe(true);
      expect(resolver.entries.get(3)?.offset).toBe(base.length);
      expect(resolver.shadowed.map(s => s.objNum)).toEqual([3]);
    });

    it('throws PdfXRefError when no catalog exists anywhere', () => {
      const data = bytes('%PDF-1.4\n1 0 obj\n<< /Type /Pages /Kids [] /Count 0 >>\nendobj\nstartxref\n9999\n%%EOF\n');
      expect(() => resolve(data)).toThrow(PdfXRefError);
    });
  });
});
