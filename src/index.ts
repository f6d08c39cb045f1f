/**
 * pdfsleuth - Structural and forensic analysis of PDF files
 *
 * @example
 * ```typescript
 * import { PdfSleuth, AnalysisCache } from 'pdfsleuth';
 *
 * const sleuth = new PdfSleuth({ depth: 5, cache: new AnalysisCache() });
 * const result = await sleuth.analyze('invoice.pdf');
 *
 * for (const script of result.javascript) {
 *   console.log(script.trigger, script.autoExecute, script.preview);
 * }
 * ```
 */

import { inflateSync } from 'node:zlib';
import { createHash } from 'node:crypto';
import { setInflate } from './stream/inflate.js';
import { setDigestImpl } from './crypto/digest.js';

function nodeInflate(data: Uint8Array): Uint8Array {
  try {
    return new Uint8Array(inflateSync(data));
  } catch {
    // Truncated streams still yield what was decompressed
    return new Uint8Array(inflateSync(data, { finishFlush: 0 }));
  }
}

setInflate(nodeInflate);
setDigestImpl(async data => new Uint8Array(createHash('sha256').update(data).digest()));

export * from './exports.js';
