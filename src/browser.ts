/**
 * pdfsleuth/browser - Browser-compatible PDF forensic analysis
 *
 * Uses fflate for decompression and WebCrypto for hashing.
 * Pass bytes to analyze(); file paths need the Node entry.
 *
 * @example
 * ```typescript
 * import { PdfSleuth } from 'pdfsleuth/browser';
 *
 * const response = await fetch('/upload.pdf');
 * const bytes = new Uint8Array(await response.arrayBuffer());
 * const result = await PdfSleuth.analyze(bytes);
 * console.log(result.anomalies);
 * ```
 */

import { decompressSync } from 'fflate';
import { setInflate } from './stream/inflate.js';
import { setDigestImpl } from './crypto/digest.js';

setInflate((data) => decompressSync(data));
// slice() hands WebCrypto a copy backed by a plain ArrayBuffer
setDigestImpl(async (data) => new Uint8Array(await crypto.subtle.digest('SHA-256', data.slice())));

export * from './exports.js';
