import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { ZodError } from 'zod';
import {
  AgentCatalogEntry,
  AgentCatalogEntrySchema,
  CatalogEntry,
  CommandCatalogEntry,
  CommandCatalogEntrySchema,
  ElementType,
  formatZodIssues,
  pluralOf,
  Scope,
  ScopeFilter,
  SkillCatalogEntry,
  SkillCatalogEntrySchema,
  toStringList,
} from '../models/catalogEntry';
import { errorMessage, ScanError } from './errors';
import { MetadataHeaderParser, readMetadataHeader } from './frontmatter';
import { logDebug, logInfo, logWarn } from './logger';
import { DefaultScopeResolver, expandScopes, ScopeResolver } from './scopeResolver';

export type ScanSkipReason = 'no-metadata' | 'schema' | 'unreadable';

export interface ScanWarning {
  path: string;
  scope: Scope;
  reason: ScanSkipReason;
  message: string;
}

// Same reason-bucket shape the loader summary has always used; keys are stable.
export interface ScanSummary {
  scanned: number;
  accepted: number;
  skipped: number;
  reasons: Record<string, number>;
}

export interface ScanResult<T extends CatalogEntry = CatalogEntry> {
  entries: T[];
  warnings: ScanWarning[];
  summary: ScanSummary;
}

export interface ScannerOptions {
  resolver?: ScopeResolver;
  parseHeader?: MetadataHeaderParser;
  now?: () => Date;
  newId?: () => string;
}

/** A file or directory that matched a type pattern and is about to be turned into an entry. */
interface Candidate {
  scope: Scope;
  entryPath: string;   // what the entry's `path` will hold
  definingFile: string; // file whose header carries the metadata
  defaultName: string;
}

interface EntryBase {
  id: string;
  scope: Scope;
  path: string;
  createdAt: string;
  updatedAt: string;
}

type EntryBuilder<T extends CatalogEntry> = (header: Record<string, unknown>, candidate: Candidate, base: EntryBase) => T;

const SYSTEM_DIRS = ['/etc', '/sys', '/proc', '/dev'];
const SKILL_FILE = 'SKILL.md';
const COMMON_KEYS = ['name', 'description'];

function isMarkdown(name: string): boolean {
  return name.toLowerCase().endsWith('.md') && !name.startsWith('.');
}

function pick(header: Record<string, unknown>, ...keys: string[]): unknown {
  for(const k of keys){
    if(header[k] !== undefined && header[k] !== null) return header[k];
  }
  return undefined;
}

/** Header keys not consumed by typed fields, reduced to JSON-representable values. */
function extraMetadata(header: Record<string, unknown>, consumed: string[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for(const [k, v] of Object.entries(header)){
    if(COMMON_KEYS.includes(k) || consumed.includes(k) || v === undefined) continue;
    out[k] = v instanceof Date ? v.toISOString() : v;
  }
  const jsonSafe: Record<string, unknown> = JSON.parse(JSON.stringify(out));
  return jsonSafe;
}

function isDirectory(p: string): boolean {
  try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

function isFile(p: string): boolean {
  try { return fs.statSync(p).isFile(); } catch { return false; }
}

export class Scanner {
  private readonly resolver: ScopeResolver;
  private readonly parseHeader: MetadataHeaderParser;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(options: ScannerOptions = {}){
    this.resolver = options.resolver ?? new DefaultScopeResolver();
    this.parseHeader = options.parseHeader ?? readMetadataHeader;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? (() => crypto.randomUUID());
  }

  scan(type: ElementType, scope: ScopeFilter = 'all'): ScanResult {
    switch(type){
      case 'skill': return this.scanSkills(scope);
      case 'command': return this.scanCommands(scope);
      case 'agent': return this.scanAgents(scope);
    }
  }

  scanSkills(scope: ScopeFilter = 'all'): ScanResult<SkillCatalogEntry> {
    const consumed = ['template', 'allowed-tools', 'allowed_tools', 'allowedTools'];
    return this.run('skill', scope, (header, candidate, base) => {
      const dir = candidate.entryPath;
      return SkillCatalogEntrySchema.parse({
        ...base,
        elementType: 'skill',
        name: pick(header, 'name') ?? candidate.defaultName,
        description: pick(header, 'description'),
        template: pick(header, 'template'),
        hasScripts: isDirectory(path.join(dir, 'scripts')),
        fileCount: fs.readdirSync(dir).length,
        allowedTools: toStringList(pick(header, 'allowed-tools', 'allowed_tools', 'allowedTools')),
        metadata: extraMetadata(header, consumed),
      });
    });
  }

  scanCommands(scope: ScopeFilter = 'all'): ScanResult<CommandCatalogEntry> {
    const consumed = ['aliases', 'requires_tools', 'requires-tools', 'requiresTools', 'tags'];
    return this.run('command', scope, (header, candidate, base) => CommandCatalogEntrySchema.parse({
      ...base,
      elementType: 'command',
      name: pick(header, 'name') ?? candidate.defaultName,
      description: pick(header, 'description'),
      aliases: toStringList(pick(header, 'aliases')),
      requiresTools: toStringList(pick(header, 'requires_tools', 'requires-tools', 'requiresTools')),
      tags: toStringList(pick(header, 'tags')),
      metadata: extraMetadata(header, consumed),
    }));
  }

  scanAgents(scope: ScopeFilter = 'all'): ScanResult<AgentCatalogEntry> {
    const consumed = ['model', 'specialization', 'requires_skills', 'requires-skills', 'requiresSkills', 'tags'];
    return this.run('agent', scope, (header, candidate, base) => AgentCatalogEntrySchema.parse({
      ...base,
      elementType: 'agent',
      name: pick(header, 'name') ?? candidate.defaultName,
      description: pick(header, 'description'),
      model: pick(header, 'model'),
      specialization: pick(header, 'specialization'),
      requiresSkills: toStringList(pick(header, 'requires_skills', 'requires-skills', 'requiresSkills')),
      tags: toStringList(pick(header, 'tags')),
      metadata: extraMetadata(header, consumed),
    }));
  }

  /**
   * Resolve and vet a scope root. Missing roots are simply absent layers; a root that exists
   * but cannot serve as a directory, or that points somewhere it must not, is fatal.
   */
  private resolveRoot(scope: Scope): string | undefined {
    const raw = this.resolver.root(scope);
    if(!raw) return undefined;
    if(raw.split(/[\\/]+/).includes('..')){
      throw new ScanError(`Invalid scope root for ${scope}: path traversal not allowed: ${raw}`, { scopeRoot: raw });
    }
    const resolved = path.resolve(raw);
    if(SYSTEM_DIRS.some(d => resolved === d || resolved.startsWith(d + path.sep))){
      throw new ScanError(`Invalid scope root for ${scope}: system directory access not allowed: ${resolved}`, { scopeRoot: resolved });
    }
    if(!fs.existsSync(resolved)) return undefined;
    if(!isDirectory(resolved)){
      throw new ScanError(`Scope root for ${scope} is not a directory: ${resolved}`, { scopeRoot: resolved });
    }
    try {
      fs.accessSync(resolved, fs.constants.R_OK | fs.constants.X_OK);
    } catch(err){
      throw new ScanError(`Scope root for ${scope} is not accessible: ${resolved}`, { scopeRoot: resolved, cause: err });
    }
    return resolved;
  }

  private listCandidates(type: ElementType, scope: Scope, typeDir: string, warn: (w: ScanWarning) => void): Candidate[] {
    let names: string[];
    try {
      names = fs.readdirSync(typeDir).sort();
    } catch(err){
      warn({ path: typeDir, scope, reason: 'unreadable', message: `cannot read directory: ${errorMessage(err)}` });
      return [];
    }
    const out: Candidate[] = [];
    for(const name of names){
      if(name.startsWith('.')) continue;
      const full = path.join(typeDir, name);
      if(type !== 'skill'){
        if(isMarkdown(name) && isFile(full)){
          out.push({ scope, entryPath: full, definingFile: full, defaultName: path.basename(name, path.extname(name)) });
        }
        continue;
      }
      if(!isDirectory(full)) continue;
      let files: string[];
      try {
        files = fs.readdirSync(full).filter(f => isMarkdown(f) && isFile(path.join(full, f))).sort();
      } catch(err){
        warn({ path: full, scope, reason: 'unreadable', message: `cannot read directory: ${errorMessage(err)}` });
        continue;
      }
      if(!files.length) continue;
      const defining = files.includes(SKILL_FILE) ? SKILL_FILE : files[0];
      out.push({ scope, entryPath: full, definingFile: path.join(full, defining), defaultName: name });
    }
    return out;
  }

  private run<T extends CatalogEntry>(type: ElementType, scopeFilter: ScopeFilter, build: EntryBuilder<T>): ScanResult<T> {
    const started = Date.now();
    const entries: T[] = [];
    const warnings: ScanWarning[] = [];
    const reasons: Record<string, number> = {};
    let scanned = 0;
    const skip = (w: ScanWarning) => {
      reasons[w.reason] = (reasons[w.reason]||0)+1;
      warnings.push(w);
      logWarn('scan:skip', w);
    };

    for(const scope of expandScopes(scopeFilter)){
      const root = this.resolveRoot(scope);
      if(!root){
        logDebug('scan:no-root', { type, scope });
        continue;
      }
      const typeDir = path.join(root, pluralOf(type));
      if(!isDirectory(typeDir)) continue;

      for(const candidate of this.listCandidates(type, scope, typeDir, skip)){
        scanned++;
        let header: Record<string, unknown> | null;
        try {
          header = this.parseHeader(candidate.definingFile);
        } catch(err){
          skip({ path: candidate.definingFile, scope, reason: 'unreadable', message: `cannot read file: ${errorMessage(err)}` });
          continue;
        }
        if(!header){
          skip({ path: candidate.definingFile, scope, reason: 'no-metadata', message: 'no parseable metadata header' });
          continue;
        }
        const ts = this.now().toISOString();
        const base: EntryBase = { id: this.newId(), scope, path: candidate.entryPath, createdAt: ts, updatedAt: ts };
        try {
          entries.push(build(header, candidate, base));
        } catch(err){
          if(err instanceof ZodError){
            skip({ path: candidate.definingFile, scope, reason: 'schema', message: formatZodIssues(err).join('; ') });
          } else {
            skip({ path: candidate.definingFile, scope, reason: 'unreadable', message: errorMessage(err) });
          }
        }
      }
    }

    const summary: ScanSummary = { scanned, accepted: entries.length, skipped: scanned - entries.length, reasons };
    logInfo('scan:complete', { type, scope: scopeFilter, ...summary, ms: Date.now() - started });
    return { entries, warnings, summary };
  }
}
