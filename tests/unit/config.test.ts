import { describe, it, expect } from 'vitest';
import { parseOptions, configKey, DEFAULT_CONFIG } from '../../src/config.js';
import { PdfConfigError } from '../../src/errors.js';
import { PdfSleuth } from '../../src/index.js';

describe('parseOptions', () => {
  it('fills defaults', () => {
    expect(parseOptions()).toEqual({ depth: 3, concurrency: 4, securityLevel: 'standard' });
    expect(DEFAULT_CONFIG).toEqual(parseOptions({}));
  });

  it('keeps given values', () => {
    expect(parseOptions({ depth: 10, concurrency: 1, securityLevel: 'strict' }))
      .toEqual({ depth: 10, concurrency: 1, securityLevel: 'strict' });
  });

  it('rejects a depth out of range', () => {
    expect(() => parseOptions({ depth: 0 })).toThrow(PdfConfigError);
    expect(() => parseOptions({ depth: 11 })).toThrow(PdfConfigError);
  });

  it('rejects a fractional concurrency', () => {
    expect(() => parseOptions({ concurrency: 1.5 })).toThrow(PdfConfigError);
  });

  it('rejects an unknown key', () => {
    expect(() => parseOptions({ verbose: true })).toThrow(PdfConfigError);
  });

  it('prefixes each issue with its path', () => {
    let caught: unknown;
    try {
      parseOptions({ securityLevel: 'paranoid' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PdfConfigError);
    if (!(caught instanceof PdfConfigError)) return;
    expect(caught.issues).toHaveLength(1);
    expect(caught.issues[0].startsWith('securityLevel: ')).toBe(true);
    expect(caught.message.startsWith('Invalid analysis options: securityLevel: ')).toBe(true);
  });

  it('is checked when a PdfSleuth is constructed', () => {
    expect(() => new PdfSleuth({ depth: -1 })).toThrow(PdfConfigError);
  });
});

describe('configKey', () => {
  it('covers depth and security level only', () => {
    expect(configKey(parseOptions({ depth: 5, securityLevel: 'relaxed' }))).toBe('d5:relaxed');
    expect(configKey(parseOptions({ concurrency: 16 }))).toBe(configKey(parseOptions({ concurrency: 2 })));
  });
});
