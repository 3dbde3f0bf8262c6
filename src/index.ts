export * from './models/catalogEntry';
export * from './services/errors';
export { CatalogManager } from './services/catalogManager';
export type {
  CatalogManagerOptions,
  CatalogStats,
  GetElementOptions,
  SearchElementsOptions,
  SyncCounts,
  SyncResult,
} from './services/catalogManager';
export { Scanner } from './services/scanner';
export type { ScanResult, ScanSkipReason, ScanSummary, ScanWarning, ScannerOptions } from './services/scanner';
export { Syncer, emptyCatalog } from './services/syncer';
export type { CatalogSource, LoadedCatalog, MergeResult, SavedCatalog, SyncerOptions } from './services/syncer';
export {
  Searcher,
  compareRanked,
  filterByScope,
  filterByTags,
  filterByType,
  scoreEntry,
  search,
  tokenize,
} from './services/searcher';
export type { RankedEntry, SearchOptions, TagMode } from './services/searcher';
export { DefaultScopeResolver, StaticScopeResolver, expandScopes, findProjectRoot } from './services/scopeResolver';
export type { ScopeResolver } from './services/scopeResolver';
export { parseMetadataHeader, readMetadataHeader } from './services/frontmatter';
export type { MetadataHeaderParser } from './services/frontmatter';
export { decodeEntry, serializeCatalog, serializeEntry } from './services/manifestCodec';
export { inspectManifest, validateManifest } from './services/manifestValidator';
export type { ManifestValidator } from './services/manifestValidator';
export { SCHEMA_VERSION, migrateManifestRecord } from './versioning/schemaVersion';
export { getRuntimeConfig, reloadRuntimeConfig } from './config/runtimeConfig';
export type { RuntimeConfig, LogLevel } from './config/runtimeConfig';
