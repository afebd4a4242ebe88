import { MalformedDocumentError, MissingSectionHeaderError } from '../errors.js';
import type { CollectionKind } from '../types/catalogue.js';
import type { NormalizedRecord } from '../types/record.js';

export interface DocumentSection {
  name: string;
  /** Keys keep their original case; values are taken literally, `%` included */
  fields: Map<string, string>;
}

const BOM = '\uFEFF';

const COLLECTION_LABELS: Record<CollectionKind, string> = {
  scenarios: 'scenarios',
  'content-packs': 'content packs',
};

/**
 * Parses a sectioned key/value document. A leading byte-order mark makes the
 * first line unreadable as a header, so a missing-header failure is retried
 * once with the mark removed.
 */
export function parseDocument(text: string): DocumentSection[] {
  try {
    return parseSections(text);
  } catch (err) {
    if (err instanceof MissingSectionHeaderError && text.startsWith(BOM)) {
      return parseSections(text.slice(BOM.length));
    }
    throw err;
  }
}

export function findSection(sections: DocumentSection[], name: string): DocumentSection | undefined {
  return sections.find((s) => s.name === name);
}

const HEADER = /^\[(.+)\]/;

function parseSections(text: string): DocumentSection[] {
  const sections: DocumentSection[] = [];
  const lines = text.split(/\r?\n/);
  let current: DocumentSection | null = null;
  // Last key of the current section and its indentation; deeper lines continue its value
  let lastKey: string | null = null;
  let keyIndent = 0;

  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const raw = lines[i] ?? '';
    const line = raw.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;
    const indent = raw.length - raw.trimStart().length;

    if (current && lastKey !== null && indent > keyIndent) {
      current.fields.set(lastKey, `${current.fields.get(lastKey) ?? ''}\n${line}`);
      continue;
    }

    if (line.startsWith('[')) {
      const header = HEADER.exec(line);
      if (!header?.[1]) {
        throw new MalformedDocumentError('Invalid section header', current?.name ?? '', lineNo);
      }
      const name = header[1];
      if (sections.some((s) => s.name === name)) {
        throw new MalformedDocumentError('Duplicate section', name, lineNo);
      }
      current = { name, fields: new Map() };
      sections.push(current);
      lastKey = null;
      continue;
    }

    if (!current) throw new MissingSectionHeaderError(lineNo);

    const delimiter = findDelimiter(line);
    if (delimiter < 0) {
      throw new MalformedDocumentError('Line has no key/value delimiter', current.name, lineNo);
    }
    const key = line.slice(0, delimiter).trim();
    if (!key) {
      throw new MalformedDocumentError('Empty key', current.name, lineNo);
    }
    if (current.fields.has(key)) {
      throw new MalformedDocumentError(`Duplicate key "${key}"`, current.name, lineNo);
    }
    current.fields.set(key, line.slice(delimiter + 1).trim());
    lastKey = key;
    keyIndent = indent;
  }

  return sections;
}

function findDelimiter(line: string): number {
  const eq = line.indexOf('=');
  const colon = line.indexOf(':');
  if (eq < 0) return colon;
  if (colon < 0) return eq;
  return Math.min(eq, colon);
}

/**
 * Renders the output manifest: a count comment, then one section per record.
 * Multi-line values are written as tab-indented continuation lines.
 */
export function serializeManifest(
  records: readonly NormalizedRecord[],
  count: number,
  kind: CollectionKind,
): string {
  let out = `# ${count} ${COLLECTION_LABELS[kind]}\n`;

  for (const record of records) {
    out += `[${record.name}]\n`;
    for (const [key, value] of record.data) {
      out += `${key}=${value.replace(/\n/g, '\n\t')}\n`;
    }
    out += '\n';
  }

  return out;
}
