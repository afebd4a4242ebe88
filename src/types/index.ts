export type { CatalogueEntry, CollectionKind } from './catalogue.js';
export type { NormalizedRecord, ScenarioMetrics, StatsIndex, FileInfo } from './record.js';
export type { Resolution } from './resolution.js';
