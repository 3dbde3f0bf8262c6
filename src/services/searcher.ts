import { z } from 'zod';
import { getRuntimeConfig } from '../config/runtimeConfig';
import {
  CatalogEntry,
  ELEMENT_TYPE_FILTERS,
  ElementTypeFilter,
  entryTags,
  nameKey,
  SCOPE_FILTERS,
  ScopeFilter,
  SCOPES,
} from '../models/catalogEntry';
import { SearchError } from './errors';

export type TagMode = 'all' | 'any';

export interface RankedEntry<T extends CatalogEntry = CatalogEntry> {
  entry: T;
  score: number;
}

export interface SearchOptions {
  elementType?: ElementTypeFilter;
  scope?: ScopeFilter;
  tags?: string[];
  tagMode?: TagMode;
  limit?: number;
}

export const SCORE_EXACT_NAME = 100;
export const SCORE_NAME_TOKEN = 50;
export const SCORE_DESCRIPTION_TOKEN = 10;
export const SCORE_TAG = 20;

export const MAX_QUERY_LENGTH = 500;
export const MAX_QUERY_TOKENS = 20;

const SearchOptionsSchema = z.object({
  elementType: z.enum(ELEMENT_TYPE_FILTERS).default('all'),
  scope: z.enum(SCOPE_FILTERS).default('all'),
  tags: z.array(z.string()).default([]),
  tagMode: z.enum(['all', 'any']).default('all'),
  limit: z.number().int().min(1).max(1000).optional(),
}).strict();

const QuerySchema = z.string().max(MAX_QUERY_LENGTH);

function normalizeTag(tag: string): string { return tag.trim().toLowerCase(); }

/** Lower-cased, de-duplicated whitespace tokens in first-seen order. */
export function tokenize(query: string): string[] {
  return Array.from(new Set(query.toLowerCase().split(/\s+/).filter(Boolean)));
}

export function filterByType<T extends CatalogEntry>(entries: readonly T[], type: ElementTypeFilter): T[] {
  return type === 'all' ? [...entries] : entries.filter(e => e.elementType === type);
}

export function filterByScope<T extends CatalogEntry>(entries: readonly T[], scope: ScopeFilter): T[] {
  return scope === 'all' ? [...entries] : entries.filter(e => e.scope === scope);
}

/** `all` (default): every filter tag present. `any`: at least one. Comparison ignores case. */
export function filterByTags<T extends CatalogEntry>(entries: readonly T[], tags: readonly string[], mode: TagMode = 'all'): T[] {
  const wanted = tags.map(normalizeTag).filter(Boolean);
  if(!wanted.length) return [...entries];
  return entries.filter(e => {
    const have = new Set(entryTags(e).map(normalizeTag));
    return mode === 'all' ? wanted.every(t => have.has(t)) : wanted.some(t => have.has(t));
  });
}

export function scoreEntry(entry: CatalogEntry, query: string, tokens: readonly string[] = tokenize(query)): number {
  const name = entry.name.toLowerCase();
  const description = entry.description.toLowerCase();
  let score = 0;
  if(nameKey(entry.name) === nameKey(query)) score += SCORE_EXACT_NAME;
  if(tokens.some(t => name.includes(t))) score += SCORE_NAME_TOKEN;
  for(const t of tokens){
    if(description.includes(t)) score += SCORE_DESCRIPTION_TOKEN;
  }
  for(const tag of entryTags(entry)){
    if(tokens.includes(normalizeTag(tag))) score += SCORE_TAG;
  }
  return score;
}

function compareText(a: string, b: string): number {
  if(a === b) return 0;
  return a < b ? -1 : 1;
}

/** Total order: score desc, then name, scope (global < project < local), path. */
export function compareRanked(a: RankedEntry, b: RankedEntry): number {
  return (b.score - a.score)
    || compareText(a.entry.name, b.entry.name)
    || (SCOPES.indexOf(a.entry.scope) - SCOPES.indexOf(b.entry.scope))
    || compareText(a.entry.path, b.entry.path);
}

function parseOptions(options: SearchOptions) {
  const parsed = SearchOptionsSchema.safeParse(options);
  if(!parsed.success){
    const detail = parsed.error.issues.map(i => `${i.path.join('.') || 'options'}: ${i.message}`).join('; ');
    throw new SearchError(`Invalid search options: ${detail}`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Rank `entries` against `query`. Entries scoring zero are dropped. A query with no tokens
 * returns every entry that passes the filters, score 0, by name, without truncation.
 */
export function search<T extends CatalogEntry>(entries: readonly T[], query: unknown, options: SearchOptions = {}): RankedEntry<T>[] {
  const q = QuerySchema.safeParse(query);
  if(!q.success){
    throw new SearchError(typeof query === 'string'
      ? `Query exceeds ${MAX_QUERY_LENGTH} characters`
      : 'Query must be a string', { cause: q.error });
  }
  const opts = parseOptions(options);
  const tokens = tokenize(q.data);
  if(tokens.length > MAX_QUERY_TOKENS){
    throw new SearchError(`Query has ${tokens.length} distinct terms; at most ${MAX_QUERY_TOKENS} are allowed`);
  }

  const filtered = filterByTags(filterByScope(filterByType(entries, opts.elementType), opts.scope), opts.tags, opts.tagMode);
  if(!tokens.length){
    return filtered.map(entry => ({ entry, score: 0 })).sort(compareRanked);
  }
  const ranked: RankedEntry<T>[] = [];
  for(const entry of filtered){
    const score = scoreEntry(entry, q.data, tokens);
    if(score > 0) ranked.push({ entry, score });
  }
  ranked.sort(compareRanked);
  return ranked.slice(0, opts.limit ?? getRuntimeConfig().search.defaultLimit);
}

export const Searcher = {
  tokenize,
  filterByType,
  filterByScope,
  filterByTags,
  scoreEntry,
  search,
} as const;
