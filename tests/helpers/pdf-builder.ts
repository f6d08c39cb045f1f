/**
 * Builds small PDFs in memory with correctly computed xref offsets.
 * Strings are written one byte per character, so binary stream data can be
 * passed as a Uint8Array or as a Latin-1 string.
 */

interface BuiltObject {
  num: number;
  gen: number;
  body: Uint8Array;
}

export interface StreamOptions {
  /** Written as /Length; a string such as "9 0 R" for an indirect length */
  length?: number | string;
  gen?: number;
}

export interface UpdateObject {
  num: number;
  gen?: number;
  content: string;
}

export function bytes(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) out[i] = text.charCodeAt(i) & 0xff;
  return out;
}

export function text(data: Uint8Array): string {
  let out = '';
  for (const b of data) out += String.fromCharCode(b);
  return out;
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

function xrefEntry(offset: number, gen: number, type: 'n' | 'f'): string {
  return `${String(offset).padStart(10, '0')} ${String(gen).padStart(5, '0')} ${type} \r\n`;
}

export class PdfBuilder {
  private readonly objects: BuiltObject[] = [];
  private readonly offsets = new Map<number, number>();
  private header = '%PDF-1.7\n';
  private root = '1 0 R';
  private info: string | null = null;
  private trailerExtra = '';

  addObject(num: number, content: string, gen = 0): this {
    this.objects.push({ num, gen, body: bytes(content) });
    return this;
  }

  addStream(num: number, dictBody: string, data: Uint8Array | string, options: StreamOptions = {}): this {
    const raw = typeof data === 'string' ? bytes(data) : data;
    const length = options.length ?? raw.length;
    const body = concat(
      bytes(`<< ${dictBody} /Length ${length} >>\nstream\n`),
      raw,
      bytes('\nendstream'),
    );
    this.objects.push({ num, gen: options.gen ?? 0, body });
    return this;
  }

  setHeader(header: string): this {
    this.header = header;
    return this;
  }

  setRoot(ref: string): this {
    this.root = ref;
    return this;
  }

  setInfo(ref: string): this {
    this.info = ref;
    return this;
  }

  /** Extra trailer entries, written verbatim */
  setTrailerExtra(extra: string): this {
    this.trailerExtra = extra;
    return this;
  }

  /** Offset of an object's header in the last build */
  offsetOf(num: number): number {
    const offset = this.offsets.get(num);
    if (offset === undefined) throw new Error(`Object ${num} was not built`);
    return offset;
  }

  build(): Uint8Array {
    const parts: Uint8Array[] = [bytes(this.header)];
    let current = this.header.length;
    this.offsets.clear();

    for (const obj of this.objects) {
      this.offsets.set(obj.num, current);
      const part = concat(bytes(`${obj.num} ${obj.gen} obj\n`), obj.body, bytes('\nendobj\n\n'));
      parts.push(part);
      current += part.length;
    }

    const xrefOffset = current;
    const maxObj = this.objects.reduce((max, o) => Math.max(max, o.num), 0);
    const gens = new Map(this.objects.map(o => [o.num, o.gen] as const));
    let xref = `xref\n0 ${maxObj + 1}\n${xrefEntry(0, 65535, 'f')}`;
    for (let i = 1; i <= maxObj; i++) {
      const offset = this.offsets.get(i);
      xref += offset !== undefined ? xrefEntry(offset, gens.get(i) ?? 0, 'n') : xrefEntry(0, 65535, 'f');
    }

    const info = this.info ? ` /Info ${this.info}` : '';
    const extra = this.trailerExtra ? ` ${this.trailerExtra}` : '';
    xref += `trailer\n<< /Size ${maxObj + 1} /Root ${this.root}${info}${extra} >>\n`;
    xref += `startxref\n${xrefOffset}\n%%EOF\n`;
    parts.push(bytes(xref));
    return concat(...parts);
  }

  /**
   * Append an incremental update: the objects, an xref section listing them
   * and a trailer whose /Prev points at the previous section.
   */
  static appendUpdate(base: Uint8Array, objects: UpdateObject[], size: number, trailerExtra = ''): Uint8Array {
    const baseText = text(base);
    const marker = baseText.lastIndexOf('startxref');
    const prev = parseInt(baseText.slice(marker + 'startxref'.length).trim(), 10);

    let current = base.length;
    let body = '';
    const entries: string[] = [];
    for (const obj of objects) {
      const gen = obj.gen ?? 0;
      const part = `${obj.num} ${gen} obj\n${obj.content}\nendobj\n\n`;
      entries.push(`${obj.num} 1\n${xrefEntry(current, gen, 'n')}`);
      body += part;
      current += part.length;
    }

    const extra = trailerExtra ? ` ${trailerExtra}` : '';
    const update = `${body}xref\n${entries.join('')}trailer\n<< /Size ${size} /Root 1 0 R /Prev ${prev}${extra} >>\n`
      + `startxref\n${current}\n%%EOF\n`;
    return concat(base, bytes(update));
  }
}

/** Catalog, page tree and one page: objects 1, 2 and 3 */
export function minimalDocument(builder = new PdfBuilder(), pageExtra = '', catalogExtra = ''): PdfBuilder {
  return builder
    .addObject(1, `<< /Type /Catalog /Pages 2 0 R${catalogExtra} >>`)
    .addObject(2, '<< /Type /Pages /Kids [3 0 R] /Count 1 >>')
    .addObject(3, `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792]${pageExtra} >>`);
}

// ─── Cross-reference streams ───

export interface PlainObject {
  num: number;
  /** Everything between "N 0 obj" and "endobj" */
  body: string | Uint8Array;
}

export interface CompressedEntry {
  num: number;
  container: number;
  index: number;
}

/** Body of an uncompressed /ObjStm holding `members` in order */
export function objectStream(members: { num: number; content: string }[]): string {
  let header = '';
  let data = '';
  for (const member of members) {
    header += `${member.num} ${data.length} `;
    data += `${member.content} `;
  }
  const body = header + data;
  return `<< /Type /ObjStm /N ${members.length} /First ${header.length} /Length ${body.length} >>\nstream\n${body}\nendstream`;
}

function writeRow(row: Uint8Array, type: number, field2: number, field3: number): void {
  row[0] = type;
  row[1] = (field2 >>> 24) & 0xff;
  row[2] = (field2 >>> 16) & 0xff;
  row[3] = (field2 >>> 8) & 0xff;
  row[4] = field2 & 0xff;
  row[5] = (field3 >>> 8) & 0xff;
  row[6] = field3 & 0xff;
}

/**
 * A file indexed by a cross-reference stream instead of a table. The stream
 * is written last as object `xrefNum`, with /W [1 4 2] and /Root 1 0 R.
 */
export function buildWithXRefStream(
  objects: PlainObject[],
  compressed: CompressedEntry[],
  xrefNum: number,
  trailerExtra = '',
): { data: Uint8Array; xrefOffset: number } {
  const parts: Uint8Array[] = [bytes('%PDF-1.7\n')];
  let current = parts[0].length;
  const offsets = new Map<number, number>();
  for (const obj of objects) {
    offsets.set(obj.num, current);
    const body = typeof obj.body === 'string' ? bytes(obj.body) : obj.body;
    const part = concat(bytes(`${obj.num} 0 obj\n`), body, bytes('\nendobj\n'));
    parts.push(part);
    current += part.length;
  }
  const xrefOffset = current;
  offsets.set(xrefNum, xrefOffset);

  const packed = new Map(compressed.map(c => [c.num, c] as const));
  const rows = new Uint8Array((xrefNum + 1) * 7);
  for (let num = 0; num <= xrefNum; num++) {
    const row = rows.subarray(num * 7, num * 7 + 7);
    const offset = offsets.get(num);
    const member = packed.get(num);
    if (offset !== undefined) writeRow(row, 1, offset, 0);
    else if (member) writeRow(row, 2, member.container, member.index);
    else writeRow(row, 0, 0, num === 0 ? 0xffff : 0);
  }

  const extra = trailerExtra ? ` ${trailerExtra}` : '';
  parts.push(
    bytes(`${xrefNum} 0 obj\n<< /Type /XRef /Size ${xrefNum + 1} /W [1 4 2] /Root 1 0 R${extra} /Length ${rows.length} >>\nstream\n`),
    rows,
    bytes(`\nendstream\nendobj\nstartxref\n${xrefOffset}\n%%EOF\n`),
  );
  return { data: concat(...parts), xrefOffset };
}
