import { parseDocument } from '../codec/document.js';
import type { CatalogueEntry } from '../types/catalogue.js';

export const SOURCE_URL_KEY = 'external';

/** One entry per catalogue section, in document order. Other keys are ignored. */
export function readCatalogue(text: string): CatalogueEntry[] {
  return parseDocument(text).map((section) => {
    const url = section.fields.get(SOURCE_URL_KEY)?.trim();
    return { name: section.name, sourceUrl: url ? url : null };
  });
}
