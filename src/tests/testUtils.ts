import fs from 'fs';
import os from 'os';
import path from 'path';
import { stringify as toYaml } from 'yaml';
import {
  AgentCatalogEntry,
  AgentCatalogEntrySchema,
  Catalog,
  CatalogEntry,
  CommandCatalogEntry,
  CommandCatalogEntrySchema,
  ElementType,
  Scope,
  SkillCatalogEntry,
  SkillCatalogEntrySchema,
} from '../models/catalogEntry';
import { StaticScopeResolver } from '../services/scopeResolver';

export const FIXED_TS = '2024-05-01T10:00:00.000Z';

export function makeTempDir(prefix = 'catalog-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFile(file: string, content: string){
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, 'utf8');
}

/** Markdown document with a YAML metadata header. */
export function markdown(fields: Record<string, unknown>, body = '# Body\n'): string {
  return `---\n${toYaml(fields)}---\n\n${body}`;
}

export interface ScopeTree {
  base: string;
  roots: Record<Scope, string>;
  resolver: StaticScopeResolver;
}

/** Three empty scope roots under one temp directory. */
export function makeScopeTree(): ScopeTree {
  const base = makeTempDir('catalog-scopes-');
  const roots: Record<Scope, string> = {
    global: path.join(base, 'home', '.claude'),
    project: path.join(base, 'repo', '.claude'),
    local: path.join(base, 'repo', 'local', '.claude'),
  };
  for(const r of Object.values(roots)) fs.mkdirSync(r, { recursive: true });
  return { base, roots, resolver: new StaticScopeResolver(roots) };
}

export function writeSkill(root: string, dirName: string, fields: Record<string, unknown>, opts: { file?: string; scripts?: boolean } = {}): string {
  const dir = path.join(root, 'skills', dirName);
  writeFile(path.join(dir, opts.file ?? 'SKILL.md'), markdown(fields));
  if(opts.scripts) fs.mkdirSync(path.join(dir, 'scripts'), { recursive: true });
  return dir;
}

export function writeCommand(root: string, stem: string, fields: Record<string, unknown>): string {
  const file = path.join(root, 'commands', `${stem}.md`);
  writeFile(file, markdown(fields));
  return file;
}

export function writeAgent(root: string, stem: string, fields: Record<string, unknown>): string {
  const file = path.join(root, 'agents', `${stem}.md`);
  writeFile(file, markdown(fields));
  return file;
}

export function fixedId(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
}

type Overrides<T> = Partial<T> & { name: string };

function base(name: string){
  return {
    id: fixedId(1),
    description: `${name} description`,
    scope: 'project' as const,
    path: path.resolve('/catalog', name.replace(/^\//, '')),
    createdAt: FIXED_TS,
    updatedAt: FIXED_TS,
  };
}

export function skillEntry(over: Overrides<SkillCatalogEntry>): SkillCatalogEntry {
  return SkillCatalogEntrySchema.parse({ ...base(over.name), elementType: 'skill', ...over });
}

export function commandEntry(over: Overrides<CommandCatalogEntry>): CommandCatalogEntry {
  return CommandCatalogEntrySchema.parse({ ...base(over.name), elementType: 'command', ...over });
}

export function agentEntry(over: Overrides<AgentCatalogEntry>): AgentCatalogEntry {
  return AgentCatalogEntrySchema.parse({ ...base(over.name), elementType: 'agent', ...over });
}

export function catalogOf(type: ElementType, entries: CatalogEntry[]): Catalog {
  return { schemaVersion: '1.1', lastSynced: FIXED_TS, elementType: type, entries };
}

/** Every entry minus `updatedAt`, for comparisons across syncs. */
export function withoutUpdatedAt(entries: CatalogEntry[]): Record<string, unknown>[] {
  return entries.map(e => {
    const { updatedAt: _ignored, ...rest } = e;
    return rest;
  });
}
