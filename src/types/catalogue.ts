export type CollectionKind = 'scenarios' | 'content-packs';

export interface CatalogueEntry {
  /** Section name in the catalogue, published unchanged as the record name */
  name: string;
  /** Repository URL from the `external` key; absent entries are skipped */
  sourceUrl: string | null;
}
