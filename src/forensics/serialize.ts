/**
 * Canonical byte form of a PDF value. Two values that mean the same thing
 * serialize identically: dictionary keys are sorted, strings are always
 * hex, and a real keeps its fractional marker. Streams carry their raw
 * (still encoded) bytes.
 */

import type { PdfObject } from '../parser/types.js';

const encoder = new TextEncoder();

class ByteSink {
  private readonly chunks: Uint8Array[] = [];
  private total = 0;

  text(s: string): void {
    this.bytes(encoder.encode(s));
  }

  bytes(b: Uint8Array): void {
    this.chunks.push(b);
    this.total += b.length;
  }

  finish(): Uint8Array {
    const out = new Uint8Array(this.total);
    let pos = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, pos);
      pos += chunk.length;
    }
    return out;
  }
}

export function serializeObject(obj: PdfObject): Uint8Array {
  const sink = new ByteSink();
  write(sink, obj);
  return sink.finish();
}

/** Canonical text of a value without stream data; for messages and comparisons */
export function canonicalText(obj: PdfObject): string {
  switch (obj.kind) {
    case 'null':
      return 'null';
    case 'bool':
      return obj.value ? 'true' : 'false';
    case 'number':
      return formatNumber(obj.value, obj.real);
    case 'string':
      return `<${hex(obj.value)}>`;
    case 'name':
      return `/${escapeName(obj.value)}`;
    case 'ref':
      return `${obj.objNum} ${obj.gen} R`;
    case 'array':
      return `[${obj.items.map(canonicalText).join(' ')}]`;
    case 'dict':
      return `<<${[...obj.entries.keys()].sort().map(k => {
        const value = obj.entries.get(k);
        return `/${escapeName(k)} ${value ? canonicalText(value) : 'null'}`;
      }).join(' ')}>>`;
    case 'stream':
      return `${canonicalText(obj.dict)} stream[${obj.data.length}]`;
  }
}

function write(sink: ByteSink, obj: PdfObject): void {
  if (obj.kind === 'stream') {
    sink.text(canonicalText(obj.dict));
    sink.text(' stream\n');
    sink.bytes(obj.data);
    sink.text('\nendstream');
    return;
  }
  if (obj.kind === 'array') {
    sink.text('[');
    obj.items.forEach((item, i) => {
      if (i > 0) sink.text(' ');
      write(sink, item);
    });
    sink.text(']');
    return;
  }
  sink.text(canonicalText(obj));
}

function formatNumber(value: number, real: boolean): string {
  if (!real) return String(value);
  return Number.isInteger(value) ? `${value}.0` : String(value);
}

function hex(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) out += b.toString(16).padStart(2, '0');
  return out;
}

/** Names hold one byte per char; `#xx` for irregular bytes, delimiters and `#` */
function escapeName(name: string): string {
  let out = '';
  for (let i = 0; i < name.length; i++) {
    const b = name.charCodeAt(i) & 0xff;
    const regular = b > 0x20 && b < 0x7f && !'()<>[]{}/%#'.includes(name[i]);
    out += regular ? name[i] : `#${b.toString(16).padStart(2, '0')}`;
  }
  return out;
}
