// Central schema version for manifest files.
// Bump this when the on-disk layout changes in a way older readers cannot take; the
// migration below detects older layouts by shape and rewrites them in memory. The
// rewritten form is persisted by the next save.
export const SCHEMA_VERSION = '1.1';

import { ElementType, pluralOf } from '../models/catalogEntry';
import { isRecord } from '../services/manifestCodec';

export interface MigrationResult { changed: boolean; notes?: string[] }

// Builder-era manifests kept variant fields inside metadata.
const HOISTED_FIELDS: Record<ElementType, string[]> = {
  skill: ['template', 'has_scripts', 'file_count', 'allowed_tools'],
  command: ['aliases', 'requires_tools', 'tags'],
  agent: ['model', 'specialization', 'requires_skills', 'tags'],
};

const OFFSET_TS = /(?:z|[+-]\d\d:?\d\d)$/i;

/** Timestamps written without an offset are read as local time and re-emitted in UTC. */
function normalizeTimestamp(value: unknown): string | undefined {
  if(typeof value !== 'string' || !value.trim()) return undefined;
  if(OFFSET_TS.test(value)) return value;
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? undefined : d.toISOString();
}

function migrateEntry(entry: Record<string, unknown>, type: ElementType, now: string): string[] {
  const notes: string[] = [];
  if(entry.path === undefined && typeof entry.file_path === 'string'){
    entry.path = entry.file_path;
    delete entry.file_path;
    notes.push('file_path renamed to path');
  }
  if(entry.element_type === undefined){
    entry.element_type = type;
    notes.push('element_type added');
  }
  if(!isRecord(entry.metadata)){
    entry.metadata = {};
    notes.push('metadata defaulted');
  }
  const metadata = isRecord(entry.metadata) ? entry.metadata : {};
  for(const field of HOISTED_FIELDS[type]){
    if(entry[field] === undefined && metadata[field] !== undefined){
      entry[field] = metadata[field];
      delete metadata[field];
      notes.push(`${field} moved out of metadata`);
    }
  }
  for(const field of ['created_at', 'updated_at']){
    const normalized = normalizeTimestamp(entry[field]);
    if(normalized === undefined){
      entry[field] = field === 'updated_at' && typeof entry.created_at === 'string' ? entry.created_at : now;
      notes.push(`${field} defaulted`);
    } else if(normalized !== entry[field]){
      entry[field] = normalized;
      notes.push(`${field} normalized to UTC`);
    }
  }
  return notes;
}

/**
 * Bring a raw (snake_case) manifest record up to the current layout. Mutates `rec` in place.
 * Entries are fixed up field by field; whether they are then valid is the validator's call.
 */
export function migrateManifestRecord(rec: Record<string, unknown>, type: ElementType, now = new Date().toISOString()): MigrationResult {
  const notes: string[] = [];
  const plural = pluralOf(type);
  const prevVersion = typeof rec.schema_version === 'string' ? rec.schema_version : '1.0';

  if(rec[plural] === undefined && Array.isArray(rec.entries)){
    rec[plural] = rec.entries;
    delete rec.entries;
    notes.push(`entries renamed to ${plural}`);
  }
  if(rec.last_synced === undefined){
    const legacy = normalizeTimestamp(rec.last_sync);
    rec.last_synced = legacy ?? now;
    delete rec.last_sync;
    notes.push(legacy ? 'last_sync renamed to last_synced' : 'last_synced defaulted');
  }
  const list = rec[plural];
  if(Array.isArray(list)){
    list.forEach((item: unknown, i) => {
      if(!isRecord(item)) return;
      for(const n of migrateEntry(item, type, now)) notes.push(`${plural}[${i}]: ${n}`);
    });
  }
  if(rec.schema_version !== SCHEMA_VERSION){
    rec.schema_version = SCHEMA_VERSION;
    notes.push(`schema_version updated ${prevVersion}→${SCHEMA_VERSION}`);
  }
  return { changed: notes.length > 0, notes: notes.length ? notes : undefined };
}
