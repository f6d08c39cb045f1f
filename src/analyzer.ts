/**
 * PdfSleuth - structural and forensic analysis of PDF files.
 *
 * Runs the pipeline: xref resolution, object graph, classification. Each
 * run owns its anomaly log; the cache (when given) is shared and decides
 * whether a run happens at all.
 */

import { XRefResolver } from './parser/resolver.js';
import { ObjectGraph } from './graph/object-graph.js';
import { classify } from './forensics/classifier.js';
import { AnomalyLog } from './forensics/anomalies.js';
import { parseOptions, configKey } from './config.js';
import type { AnalyzeOptions, AnalysisConfig } from './config.js';
import type { AnalysisCache } from './cache.js';
import type { LogSink } from './logging.js';
import { NOOP_SINK } from './logging.js';
import { sha256Hex } from './crypto/digest.js';
import { PdfIoError } from './errors.js';
import type { AnalysisResult } from './types.js';

export interface PdfSleuthOptions extends AnalyzeOptions {
  /** Shared result cache; without one every call analyzes */
  cache?: AnalysisCache;
  /** Receives phase starts and every anomaly as it is recorded */
  logger?: LogSink;
}

export class PdfSleuth {
  readonly config: AnalysisConfig;
  private readonly cache: AnalysisCache | undefined;
  private readonly logger: LogSink;

  constructor(options: PdfSleuthOptions = {}) {
    const { cache, logger, ...analyzeOptions } = options;
    this.config = parseOptions(analyzeOptions);
    this.cache = cache;
    this.logger = logger ?? NOOP_SINK;
  }

  /**
   * Analyze a PDF from a file path or its bytes.
   *
   * @example
   * ```typescript
   * const result = await PdfSleuth.analyze('suspicious.pdf', { securityLevel: 'strict' });
   * for (const anomaly of result.anomalies) console.log(anomaly.severity, anomaly.message);
   * ```
   */
  static async analyze(source: string | Uint8Array, options?: PdfSleuthOptions): Promise<AnalysisResult> {
    return new PdfSleuth(options).analyze(source);
  }

  async analyze(source: string | Uint8Array): Promise<AnalysisResult> {
    const data = await this.readSource(source);
    if (!this.cache) return this.analyzeBytes(data);

    const key = `${await sha256Hex(data)}:${configKey(this.config)}`;
    this.logger.log({ level: 'debug', phase: 'cache', message: 'Cache lookup', data: { key } });
    return this.cache.getOrCompute(key, () => this.analyzeBytes(data));
  }

  private async readSource(source: string | Uint8Array): Promise<Uint8Array> {
    if (typeof source !== 'string') return source;
    this.logger.log({ level: 'debug', phase: 'read', message: `Reading ${source}` });
    try {
      const { readFile } = await import('node:fs/promises');
      const buffer = await readFile(source);
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new PdfIoError(`Cannot read ${source}: ${reason}`, source, { cause: err });
    }
  }

  private async analyzeBytes(data: Uint8Array): Promise<AnalysisResult> {
    const anomalies = new AnomalyLog(this.logger, this.config.securityLevel);

    this.phase(anomalies, 'xref', `Resolving cross-references in ${data.length} bytes`);
    const resolver = XRefResolver.resolve(data, anomalies);

    this.phase(anomalies, 'graph', `Loading ${resolver.entries.size} entries`);
    const graph = ObjectGraph.build(resolver, resolver.parser, anomalies);

    this.phase(anomalies, 'classify', 'Classifying objects');
    return classify(graph, this.config, anomalies);
  }

  private phase(anomalies: AnomalyLog, phase: 'xref' | 'graph' | 'classify', message: string): void {
    anomalies.phase = phase;
    this.logger.log({ level: 'debug', phase, message });
  }
}
