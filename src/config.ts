/**
 * Analysis options, validated at the API boundary.
 */

import { z } from 'zod';
import { PdfConfigError } from './errors.js';

export const SecurityLevelSchema = z.enum(['relaxed', 'standard', 'strict']);

export const AnalyzeOptionsSchema = z.object({
  /** Maximum hops followed along action /Next chains */
  depth: z.number().int().min(1).max(10).default(3),
  /** Maximum hashing tasks in flight during classification */
  concurrency: z.number().int().min(1).max(64).default(4),
  /** Shifts anomaly severities; never drops an anomaly */
  securityLevel: SecurityLevelSchema.default('standard'),
}).strict();

export type AnalyzeOptions = z.input<typeof AnalyzeOptionsSchema>;
export type AnalysisConfig = z.output<typeof AnalyzeOptionsSchema>;

export const DEFAULT_CONFIG: AnalysisConfig = AnalyzeOptionsSchema.parse({});

export function parseOptions(options: unknown = {}): AnalysisConfig {
  const result = AnalyzeOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message);
    throw new PdfConfigError(`Invalid analysis options: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/** Options that change the result; concurrency only changes scheduling */
export function configKey(config: AnalysisConfig): string {
  return `d${config.depth}:${config.securityLevel}`;
}
