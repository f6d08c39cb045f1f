/**
 * Structured event sink. The analysis never writes to the console itself:
 * callers inject a sink and forward events to whatever backend they use.
 */

import type { Anomaly } from './forensics/anomalies.js';

export type LogLevel = 'debug' | 'info' | 'warn';

export type AnalysisPhase = 'read' | 'xref' | 'graph' | 'classify' | 'cache';

export interface LogEvent {
  readonly level: LogLevel;
  readonly phase: AnalysisPhase;
  readonly message: string;
  /** Set when the event reports a recorded anomaly */
  readonly anomaly?: Anomaly;
  readonly data?: Readonly<Record<string, string | number | boolean>>;
}

export interface LogSink {
  log(event: LogEvent): void;
}

export const NOOP_SINK: LogSink = {
  log(): void {},
};

/** Collects events in memory; handy for tests and for batch reporting. */
export class MemorySink implements LogSink {
  readonly events: LogEvent[] = [];

  log(event: LogEvent): void {
    this.events.push(event);
  }

  ofPhase(phase: AnalysisPhase): LogEvent[] {
    return this.events.filter(e => e.phase === phase);
  }
}
