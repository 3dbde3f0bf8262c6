import { Catalog, CatalogEntry, EntryParseResult, pluralOf, safeParseEntry } from '../models/catalogEntry';

// On disk everything is snake_case; in memory camelCase. Only top-level entry keys are
// converted: `metadata` is user data and round-trips untouched.

export function toSnakeKey(key: string): string {
  return key.replace(/[A-Z]/g, c => `_${c.toLowerCase()}`);
}

export function toCamelKey(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_m, c: string) => c.toUpperCase());
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function serializeEntry(entry: CatalogEntry): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for(const [k, v] of Object.entries(entry)) out[toSnakeKey(k)] = v;
  return out;
}

export function serializeCatalog(catalog: Catalog): Record<string, unknown> {
  return {
    schema_version: catalog.schemaVersion,
    last_synced: catalog.lastSynced,
    [pluralOf(catalog.elementType)]: catalog.entries.map(serializeEntry),
  };
}

export function decodeEntry(raw: unknown): EntryParseResult {
  if(!isRecord(raw)) return { ok: false, issues: ['(root): entry must be an object'] };
  const camel: Record<string, unknown> = {};
  for(const [k, v] of Object.entries(raw)) camel[toCamelKey(k)] = v;
  return safeParseEntry(camel);
}
