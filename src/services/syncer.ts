import fs from 'fs';
import path from 'path';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { Catalog, CatalogEntry, ElementType, entryKey, pluralOf, Scope } from '../models/catalogEntry';
import { SCHEMA_VERSION, migrateManifestRecord } from '../versioning/schemaVersion';
import { atomicWriteJson, backupPathFor, copyToBackup, removeQuietly } from './atomicFs';
import { BackupError, CatalogError, CatalogLoadError, CatalogSaveError, errorMessage, ValidationError } from './errors';
import { logInfo, logWarn } from './logger';
import { isRecord, serializeCatalog } from './manifestCodec';
import { inspectManifest, ManifestValidator, validateManifest } from './manifestValidator';
import { DefaultScopeResolver, ScopeResolver } from './scopeResolver';

export type CatalogSource = 'primary' | 'backup' | 'empty';

export interface LoadedCatalog {
  catalog: Catalog;
  source: CatalogSource;
  warnings: string[];
}

export interface MergeResult {
  entries: CatalogEntry[];
  added: number;
  updated: number;
  retained: number;
}

export interface SavedCatalog {
  path: string;
  /** The catalog as written, with the save's `lastSynced` and `schemaVersion`. */
  catalog: Catalog;
}

export interface SyncerOptions {
  resolver?: ScopeResolver;
  /** Directory holding every manifest; overrides the per-scope `.manifest` location. */
  manifestDir?: string;
  /** Scope whose root holds the manifests when no directory override is set. */
  manifestScope?: Scope;
  /** Read-back and load validation; swapped in tests to inject failures. */
  validate?: ManifestValidator;
  now?: () => Date;
}

const MANIFEST_DIR_NAME = '.manifest';

export function emptyCatalog(type: ElementType, lastSynced = new Date().toISOString()): Catalog {
  return { schemaVersion: SCHEMA_VERSION, lastSynced, elementType: type, entries: [] };
}

export class Syncer {
  private readonly resolver: ScopeResolver;
  private readonly manifestDir?: string;
  private readonly manifestScope: Scope;
  private readonly validate: ManifestValidator;
  private readonly now: () => Date;

  constructor(options: SyncerOptions = {}){
    const cfg = getRuntimeConfig().catalog;
    this.resolver = options.resolver ?? new DefaultScopeResolver();
    this.manifestDir = options.manifestDir ?? cfg.manifestDir;
    this.manifestScope = options.manifestScope ?? cfg.manifestScope;
    this.validate = options.validate ?? validateManifest;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Canonical manifest file for a type. Without a directory override the manifest sits under
   * `<root>/.manifest/`, taking the first configured root of: requested scope, project, global.
   */
  manifestPath(type: ElementType, scope: Scope = this.manifestScope): string {
    const file = `${pluralOf(type)}.json`;
    if(this.manifestDir) return path.join(path.resolve(this.manifestDir), file);
    for(const candidate of [scope, 'project', 'global'] as const){
      const root = this.resolver.root(candidate);
      if(root) return path.join(root, MANIFEST_DIR_NAME, file);
    }
    throw new CatalogError(`No manifest location for ${pluralOf(type)}: no scope root is configured`, 'CATALOG_LOAD');
  }

  private readManifest(file: string, type: ElementType): { catalog: Catalog; warnings: string[] } {
    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    if(!isRecord(raw)) throw new ValidationError('Invalid manifest', ['(root): must be an object']);
    const migration = migrateManifestRecord(raw, type, this.now().toISOString());
    if(!migration.changed) return { catalog: this.validate(raw, type), warnings: [] };

    logInfo('manifest:migrated', { file, type, notes: migration.notes });
    const { catalog, dropped } = inspectManifest(raw, type, { lenient: true });
    return { catalog, warnings: dropped.map(issue => `Dropped unmigratable entry in ${file}: ${issue}`) };
  }

  /** Never throws: primary, then `.backup`, then a fresh empty catalog with a warning. */
  loadCatalog(type: ElementType, scope: Scope = this.manifestScope): LoadedCatalog {
    let file: string;
    try {
      file = this.manifestPath(type, scope);
    } catch(err){
      const warning = errorMessage(err);
      logWarn('manifest:no-location', { type, scope, warning });
      return { catalog: emptyCatalog(type, this.now().toISOString()), source: 'empty', warnings: [warning] };
    }
    const backup = backupPathFor(file);
    const hasPrimary = fs.existsSync(file);
    const hasBackup = fs.existsSync(backup);
    if(!hasPrimary && !hasBackup){
      return { catalog: emptyCatalog(type, this.now().toISOString()), source: 'empty', warnings: [] };
    }

    let primaryError = 'manifest is missing';
    if(hasPrimary){
      try {
        const { catalog, warnings } = this.readManifest(file, type);
        return { catalog, source: 'primary', warnings };
      } catch(err){
        primaryError = errorMessage(err);
        logWarn('manifest:primary-invalid', { file, error: primaryError });
      }
    }
    if(hasBackup){
      try {
        const { catalog, warnings } = this.readManifest(backup, type);
        const recovered = `Manifest ${file} unusable (${primaryError}); loaded ${catalog.entries.length} entries from backup ${backup}`;
        logWarn('manifest:recovered-from-backup', { file, backup, entries: catalog.entries.length });
        return { catalog, source: 'backup', warnings: [recovered, ...warnings] };
      } catch(err){
        logWarn('manifest:backup-invalid', { backup, error: errorMessage(err) });
        primaryError = `${primaryError}; backup: ${errorMessage(err)}`;
      }
    }
    const loadErr = new CatalogLoadError(file, primaryError);
    logWarn('manifest:load-failed', { file, error: loadErr.message });
    return { catalog: emptyCatalog(type, this.now().toISOString()), source: 'empty', warnings: [loadErr.message] };
  }

  /**
   * Persist a catalog with the backup / tmp / read-back / rename sequence. Returns the written path.
   * `BackupError` propagates as is; any later failure becomes `CatalogSaveError` with the canonical
   * file untouched and the backup left in place.
   */
  saveCatalog(catalog: Catalog, type: ElementType = catalog.elementType, scope: Scope = this.manifestScope): string {
    return this.commitCatalog(catalog, type, scope).path;
  }

  /** `saveCatalog`, returning the stamped catalog that reached disk along with its path. */
  commitCatalog(catalog: Catalog, type: ElementType = catalog.elementType, scope: Scope = this.manifestScope): SavedCatalog {
    let file: string;
    try {
      file = this.manifestPath(type, scope);
    } catch(err){
      throw new CatalogSaveError(pluralOf(type), errorMessage(err), { cause: err });
    }
    if(catalog.elementType !== type || catalog.entries.some(e => e.elementType !== type)){
      throw new CatalogSaveError(file, `catalog holds entries that are not of type ${type}`);
    }
    const backup = fs.existsSync(file) ? copyToBackup(file) : undefined;
    const toWrite: Catalog = { ...catalog, schemaVersion: SCHEMA_VERSION, lastSynced: this.now().toISOString() };
    try {
      atomicWriteJson(file, serializeCatalog(toWrite), { verify: parsed => { this.validate(parsed, type); } });
    } catch(err){
      logWarn('manifest:save-failed', { file, backup, error: errorMessage(err) });
      throw new CatalogSaveError(file, errorMessage(err), { cause: err, backupPath: backup });
    }
    if(backup) removeQuietly(backup);
    logInfo('manifest:saved', { file, type, entries: toWrite.entries.length });
    return { path: file, catalog: toWrite };
  }

  backupCatalog(type: ElementType, scope: Scope = this.manifestScope): string {
    const file = this.manifestPath(type, scope);
    if(!fs.existsSync(file)) throw new BackupError(file, { cause: new Error('manifest does not exist') });
    return copyToBackup(file);
  }

  /**
   * Reconcile persisted entries with freshly scanned ones on (scope, path). Matched entries keep
   * their id and createdAt and take everything else from the scan; unmatched persisted entries
   * are kept as they are. Existing order first, new entries appended in discovery order.
   */
  mergeEntries(existing: CatalogEntry[], discovered: CatalogEntry[]): MergeResult {
    const now = this.now().toISOString();
    const byKey = new Map<string, CatalogEntry>();
    for(const d of discovered){
      const key = entryKey(d);
      if(!byKey.has(key)) byKey.set(key, d);
    }
    const matched = new Set<string>();
    let updated = 0;
    let retained = 0;
    const entries: CatalogEntry[] = existing.map(prev => {
      const key = entryKey(prev);
      const found = byKey.get(key);
      if(!found){
        retained++;
        return prev;
      }
      matched.add(key);
      updated++;
      return { ...found, id: prev.id, createdAt: prev.createdAt, updatedAt: now };
    });
    let added = 0;
    for(const [key, d] of byKey){
      if(matched.has(key)) continue;
      entries.push(d);
      added++;
    }
    return { entries, added, updated, retained };
  }
}
