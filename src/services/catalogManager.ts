import fs from 'fs';
import { getRuntimeConfig } from '../config/runtimeConfig';
import {
  Catalog,
  CatalogEntry,
  ELEMENT_TYPES,
  ElementType,
  ElementTypeFilter,
  nameKey,
  Scope,
  ScopeFilter,
  SCOPES,
} from '../models/catalogEntry';
import { errorMessage } from './errors';
import { logDebug, logInfo, logWarn } from './logger';
import { Scanner } from './scanner';
import { DefaultScopeResolver, ScopeResolver } from './scopeResolver';
import { filterByScope, RankedEntry, search, SearchOptions } from './searcher';
import { Syncer } from './syncer';

export interface SyncCounts {
  total: number;
  added: number;
  updated: number;
  retained: number;
  /** Entries whose backing path no longer exists; reported, never removed. */
  stale: number;
  /** True when the result came from the in-memory cache without touching disk. */
  cached: boolean;
}

export interface SyncResult {
  counts: Partial<Record<ElementType, SyncCounts>>;
  warnings: string[];
}

export interface CatalogStats {
  total: number;
  byType: Record<ElementType, number>;
  byScope: Record<Scope, number>;
}

export interface SearchElementsOptions extends SearchOptions {
  autoSync?: boolean;
}

export interface GetElementOptions {
  fuzzy?: boolean;
  minScore?: number;
  autoSync?: boolean;
}

export interface CatalogManagerOptions {
  resolver?: ScopeResolver;
  scanner?: Scanner;
  syncer?: Syncer;
  cacheTtlMs?: number;
  fuzzyMinScore?: number;
  /** Millisecond clock for cache expiry. */
  clock?: () => number;
}

interface CacheSlot {
  catalog: Catalog;
  storedAt: number;
}

interface TypeSync {
  catalog: Catalog;
  counts: SyncCounts;
  warnings: string[];
}

function pathMissing(entry: CatalogEntry): boolean {
  return !fs.existsSync(entry.path);
}

function zeroByType(): Record<ElementType, number> { return { skill: 0, command: 0, agent: 0 }; }
function zeroByScope(): Record<Scope, number> { return { global: 0, project: 0, local: 0 }; }

/**
 * Facade over scan → merge → save → search. One instance per invocation: the cache lives on
 * the instance and expires after `cacheTtlMs`.
 */
export class CatalogManager {
  readonly scanner: Scanner;
  readonly syncer: Syncer;
  private readonly cacheTtlMs: number;
  private readonly fuzzyMinScore: number;
  private readonly clock: () => number;
  private readonly cache = new Map<ElementType, CacheSlot>();
  // last catalog seen per type, synced or merely loaded; used when a sync fails
  private readonly lastKnown = new Map<ElementType, Catalog>();

  constructor(options: CatalogManagerOptions = {}){
    const cfg = getRuntimeConfig();
    const resolver = options.resolver ?? new DefaultScopeResolver();
    this.scanner = options.scanner ?? new Scanner({ resolver });
    this.syncer = options.syncer ?? new Syncer({ resolver });
    this.cacheTtlMs = options.cacheTtlMs ?? cfg.catalog.cacheTtlMs;
    this.fuzzyMinScore = options.fuzzyMinScore ?? cfg.search.fuzzyMinScore;
    this.clock = options.clock ?? Date.now;
  }

  private cached(type: ElementType): Catalog | undefined {
    const slot = this.cache.get(type);
    if(!slot) return undefined;
    if(this.clock() - slot.storedAt < this.cacheTtlMs) return slot.catalog;
    this.cache.delete(type);
    return undefined;
  }

  private syncType(type: ElementType, force: boolean): TypeSync {
    const hit = force ? undefined : this.cached(type);
    if(hit){
      logDebug('catalog:cache-hit', { type });
      const counts = { total: hit.entries.length, added: 0, updated: 0, retained: 0, stale: hit.entries.filter(pathMissing).length, cached: true };
      return { catalog: hit, counts, warnings: [] };
    }

    const warnings: string[] = [];
    const loaded = this.syncer.loadCatalog(type);
    warnings.push(...loaded.warnings);
    this.lastKnown.set(type, loaded.catalog);

    const scan = this.scanner.scan(type, 'all');
    warnings.push(...scan.warnings.map(w => `Skipped ${w.path} (${w.reason}): ${w.message}`));

    const merged = this.syncer.mergeEntries(loaded.catalog.entries, scan.entries);
    const { catalog } = this.syncer.commitCatalog({ ...loaded.catalog, entries: merged.entries }, type);
    this.cache.set(type, { catalog, storedAt: this.clock() });
    this.lastKnown.set(type, catalog);

    const counts: SyncCounts = {
      total: merged.entries.length,
      added: merged.added,
      updated: merged.updated,
      retained: merged.retained,
      stale: merged.entries.filter(pathMissing).length,
      cached: false,
    };
    logInfo('catalog:synced', { type, ...counts });
    return { catalog, counts, warnings };
  }

  /** Each type independently; a failing type is reported in `warnings` and the others proceed. */
  syncCatalogs(types: readonly ElementType[] = ELEMENT_TYPES, force = false): SyncResult {
    const result: SyncResult = { counts: {}, warnings: [] };
    for(const type of types){
      try {
        const { counts, warnings } = this.syncType(type, force);
        result.counts[type] = counts;
        result.warnings.push(...warnings.map(w => `${type}: ${w}`));
      } catch(err){
        logWarn('catalog:sync-failed', { type, error: errorMessage(err) });
        result.warnings.push(`${type}: sync failed: ${errorMessage(err)}`);
      }
    }
    return result;
  }

  /** The type's catalog: synced (or served from cache) when `autoSync`, otherwise as loaded from disk. */
  getCatalog(type: ElementType, autoSync = true): Catalog {
    if(autoSync){
      try {
        return this.syncType(type, false).catalog;
      } catch(err){
        logWarn('catalog:sync-failed', { type, error: errorMessage(err) });
        const known = this.lastKnown.get(type);
        if(known) return known;
      }
    }
    const loaded = this.syncer.loadCatalog(type).catalog;
    this.lastKnown.set(type, loaded);
    return loaded;
  }

  /** Entries of the requested type(s) in manifest order, narrowed to `scope`. */
  listElements(type: ElementTypeFilter = 'all', scope: ScopeFilter = 'all', autoSync = true): CatalogEntry[] {
    const types: readonly ElementType[] = type === 'all' ? ELEMENT_TYPES : [type];
    const entries = types.flatMap(t => this.getCatalog(t, autoSync).entries);
    return filterByScope(entries, scope);
  }

  searchElements(query: string, options: SearchElementsOptions = {}): RankedEntry[] {
    const { autoSync = true, ...searchOptions } = options;
    // validates query and options before any disk work
    search([], query, searchOptions);
    const entries = this.listElements(searchOptions.elementType ?? 'all', 'all', autoSync);
    return search(entries, query, searchOptions);
  }

  /**
   * Exact, case-insensitive name lookup (leading "/" ignored). When several scopes define the
   * name the most specific one wins: local, then project, then global. With `fuzzy` the best
   * search hit is returned if it scores at least `minScore`.
   */
  getElement(name: string, type: ElementTypeFilter = 'all', options: GetElementOptions = {}): CatalogEntry | undefined {
    const entries = this.listElements(type, 'all', options.autoSync ?? true);
    const key = nameKey(name);
    const exact = entries
      .filter(e => nameKey(e.name) === key)
      .sort((a, b) => (SCOPES.indexOf(b.scope) - SCOPES.indexOf(a.scope)) || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    if(exact.length) return exact[0];
    if(!options.fuzzy) return undefined;
    const [best] = search(entries, name, { limit: 1 });
    const threshold = options.minScore ?? this.fuzzyMinScore;
    return best && best.score >= threshold ? best.entry : undefined;
  }

  /** Counts over the loaded manifests; never scans. */
  getStats(): CatalogStats {
    const stats: CatalogStats = { total: 0, byType: zeroByType(), byScope: zeroByScope() };
    for(const type of ELEMENT_TYPES){
      const catalog = this.lastKnown.get(type) ?? this.syncer.loadCatalog(type).catalog;
      for(const entry of catalog.entries){
        stats.total++;
        stats.byType[entry.elementType]++;
        stats.byScope[entry.scope]++;
      }
    }
    return stats;
  }

  findStale(type: ElementType): CatalogEntry[] {
    const catalog = this.lastKnown.get(type) ?? this.syncer.loadCatalog(type).catalog;
    return catalog.entries.filter(pathMissing);
  }

  invalidate(type?: ElementType){
    if(type) this.cache.delete(type);
    else this.cache.clear();
  }
}
