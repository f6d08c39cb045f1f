/**
 * Public surface shared by the Node and browser entries.
 */

export { PdfSleuth } from './analyzer.js';
export type { PdfSleuthOptions } from './analyzer.js';
export { AnalysisCache } from './cache.js';
export type { AnalysisCacheOptions } from './cache.js';
export { AnalyzeOptionsSchema, DEFAULT_CONFIG, parseOptions, configKey } from './config.js';
export type { AnalyzeOptions, AnalysisConfig } from './config.js';
export { NOOP_SINK, MemorySink } from './logging.js';
export type { LogSink, LogEvent, LogLevel, AnalysisPhase } from './logging.js';
export { severityFor, sortAnomalies } from './forensics/anomalies.js';
export type { Anomaly, AnomalyKind, AnomalyDetails, Severity, SecurityLevel } from './forensics/anomalies.js';
export { formatId } from './parser/types.js';
export type { ObjectId } from './parser/types.js';
export {
  PdfSleuthError,
  PdfLexError,
  PdfMalformedObjectError,
  PdfXRefError,
  PdfDecodeError,
  PdfIoError,
  PdfConfigError,
} from './errors.js';
export { SCHEMA_VERSION } from './types.js';
export type {
  AnalysisResult,
  ClassifiedObject,
  ValueKind,
  StreamSummary,
  DocumentMetadata,
  ScriptTrigger,
  ScriptEntry,
  ActionEntry,
  ImageFormat,
  ImageEntry,
  EmbeddedFileEntry,
  SignatureEntry,
  EncryptionSummary,
  RevisionSummary,
} from './types.js';
