import { describe, it, expect } from 'vitest';
import { AnomalyLog, severityFor, sortAnomalies } from '../../src/forensics/anomalies.js';
import type { Anomaly } from '../../src/forensics/anomalies.js';
import { MemorySink } from '../../src/logging.js';

describe('severityFor', () => {
  it('uses the base severity under standard', () => {
    expect(severityFor('launch-action', 'standard')).toBe('critical');
    expect(severityFor('unreferenced-object', 'standard')).toBe('info');
    expect(severityFor('decode-failure', 'standard')).toBe('suspicious');
  });

  it('raises selected kinds one level under strict', () => {
    expect(severityFor('unreferenced-object', 'strict')).toBe('suspicious');
    expect(severityFor('auto-executing-script', 'strict')).toBe('critical');
    expect(severityFor('decode-failure', 'strict')).toBe('suspicious');
  });

  it('lowers selected kinds to info under relaxed', () => {
    expect(severityFor('stream-length-mismatch', 'relaxed')).toBe('info');
    expect(severityFor('dangling-reference', 'relaxed')).toBe('info');
    expect(severityFor('launch-action', 'relaxed')).toBe('critical');
  });

  it('adjusts an overridden base', () => {
    expect(severityFor('revision-shadowed-object', 'strict', 'suspicious')).toBe('critical');
  });
});

describe('sortAnomalies', () => {
  it('orders by severity and keeps insertion order within one', () => {
    const make = (message: string, severity: Anomaly['severity']): Anomaly =>
      ({ kind: 'lex-error', severity, message });
    const sorted = sortAnomalies([
      make('a', 'info'),
      make('b', 'suspicious'),
      make('c', 'critical'),
      make('d', 'suspicious'),
      make('e', 'info'),
    ]);
    expect(sorted.map(a => a.message)).toEqual(['c', 'b', 'd', 'a', 'e']);
  });
});

describe('AnomalyLog', () => {
  it('forwards every record to the sink with the current phase', () => {
    const sink = new MemorySink();
    const log = new AnomalyLog(sink);
    log.phase = 'graph';
    const anomaly = log.record('dangling-reference', 'Object 4 0 R references missing object 9 0 R', {
      objectId: { objNum: 4, gen: 0 },
      details: { target: '9 0 R' },
    });
    log.record('launch-action', 'Launch action');

    expect(sink.events).toEqual([
      { level: 'info', phase: 'graph', message: 'Object 4 0 R references missing object 9 0 R', anomaly },
      { level: 'warn', phase: 'graph', message: 'Launch action', anomaly: log.list()[0] },
    ]);
  });

  it('omits fields that were not given', () => {
    const log = new AnomalyLog();
    expect(log.record('trailing-data', '3 bytes follow the last %%EOF'))
      .toEqual({ kind: 'trailing-data', severity: 'info', message: '3 bytes follow the last %%EOF' });
  });

  it('tracks distinct kinds per object in first-seen order', () => {
    const log = new AnomalyLog();
    const id = { objNum: 7, gen: 0 };
    log.record('decode-failure', 'x', { objectId: id });
    log.record('lex-error', 'y', { objectId: id });
    log.record('decode-failure', 'z', { objectId: id });
    expect(log.kindsFor(id)).toEqual(['decode-failure', 'lex-error']);
    expect(log.kindsFor({ objNum: 7, gen: 1 })).toEqual([]);
    expect(log.size).toBe(3);
    expect(log.has('lex-error')).toBe(true);
    expect(log.has('launch-action')).toBe(false);
  });

  it('applies its security level', () => {
    const log = new AnomalyLog(undefined, 'strict');
    expect(log.record('xref-reconstructed', 'rebuilt').severity).toBe('critical');
  });
});
