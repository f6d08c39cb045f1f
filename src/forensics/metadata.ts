/**
 * Document metadata and the revision history read from the xref chain.
 */

import type { ObjectGraph } from '../graph/object-graph.js';
import { dictGetName } from '../parser/types.js';
import type { DocumentMetadata, RevisionSummary } from '../types.js';
import { textOf } from './inventory.js';

const INFO_FIELDS = [
  ['title', 'Title'],
  ['author', 'Author'],
  ['subject', 'Subject'],
  ['keywords', 'Keywords'],
  ['creator', 'Creator'],
  ['producer', 'Producer'],
  ['creationDate', 'CreationDate'],
  ['modDate', 'ModDate'],
] as const;

type InfoField = (typeof INFO_FIELDS)[number][0];

export function extractMetadata(graph: ObjectGraph): DocumentMetadata {
  const version = graph.resolver.header.version;
  const catalog = graph.catalog();
  const catalogVersion = catalog ? dictGetName(catalog, 'Version') : undefined;

  const info = graph.info();
  const fields: { [K in InfoField]?: string } = {};
  if (info) {
    for (const [field, key] of INFO_FIELDS) {
      const text = textOf(graph, info, key);
      if (text !== undefined) fields[field] = text;
    }
  }

  return {
    ...(version !== undefined ? { version } : {}),
    ...(catalogVersion !== undefined ? { catalogVersion } : {}),
    pageCount: graph.pages().length,
    linearized: graph.linearizationId() !== undefined,
    ...fields,
  };
}

export function summarizeRevisions(graph: ObjectGraph): RevisionSummary[] {
  return graph.resolver.sections.map(section => ({
    index: section.index,
    offset: section.offset,
    form: section.form,
    entryCount: section.entries.size,
    hasRoot: section.trailer.root !== undefined,
    ...(section.trailer.prev !== undefined ? { prev: section.trailer.prev } : {}),
  }));
}
