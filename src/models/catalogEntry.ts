import path from 'path';
import { z, ZodError } from 'zod';
import { ValidationError } from '../services/errors';

export const ELEMENT_TYPES = ['skill', 'command', 'agent'] as const;
export type ElementType = typeof ELEMENT_TYPES[number];
export const ELEMENT_TYPE_FILTERS = [...ELEMENT_TYPES, 'all'] as const;
export type ElementTypeFilter = typeof ELEMENT_TYPE_FILTERS[number];

// Order doubles as shadowing precedence (lowest first) where a single match must be chosen.
export const SCOPES = ['global', 'project', 'local'] as const;
export type Scope = typeof SCOPES[number];
export const SCOPE_FILTERS = [...SCOPES, 'all'] as const;
export type ScopeFilter = typeof SCOPE_FILTERS[number];

export const SKILL_TEMPLATES = ['basic', 'analysis', 'implementation', 'validation'] as const;
export type SkillTemplate = typeof SKILL_TEMPLATES[number];

export const AGENT_MODELS = ['sonnet', 'opus', 'haiku', 'inherit'] as const;
export type AgentModel = typeof AGENT_MODELS[number];

const PLURALS: Record<ElementType, string> = { skill: 'skills', command: 'commands', agent: 'agents' };
/** Directory name under a scope root, manifest file stem and manifest array key. */
export function pluralOf(type: ElementType): string { return PLURALS[type]; }

export function normalizeCommandName(name: string): string {
  const trimmed = name.trim();
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

const isoTimestamp = z.string().datetime({ offset: true });
const stringList = z.array(z.string().trim().min(1)).default([]);

const baseShape = {
  id: z.string().uuid(),
  description: z.string().trim().min(1).max(500),
  scope: z.enum(SCOPES),
  path: z.string().min(1).refine(p => path.isAbsolute(p), { message: 'path must be absolute' }),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp,
  metadata: z.record(z.unknown()).default({}),
};

const plainName = z.string().trim().min(1).max(100)
  .refine(n => !n.includes('/'), { message: 'name must not contain "/"' });

const commandName = z.string().trim().min(1)
  .transform(normalizeCommandName)
  .refine(n => n.length <= 100, { message: 'name must be at most 100 characters' })
  .refine(n => /^\/[^/\s]+$/.test(n), { message: 'command name must be a single "/"-prefixed word' });

export const SkillCatalogEntrySchema = z.object({
  ...baseShape,
  elementType: z.literal('skill'),
  name: plainName,
  template: z.enum(SKILL_TEMPLATES).default('basic'),
  hasScripts: z.boolean().default(false),
  fileCount: z.number().int().nonnegative().default(0),
  allowedTools: stringList,
});

export const CommandCatalogEntrySchema = z.object({
  ...baseShape,
  elementType: z.literal('command'),
  name: commandName,
  aliases: stringList,
  requiresTools: stringList,
  tags: stringList,
});

export const AgentCatalogEntrySchema = z.object({
  ...baseShape,
  elementType: z.literal('agent'),
  name: plainName,
  model: z.enum(AGENT_MODELS).default('sonnet'),
  specialization: z.string().trim().min(1).default('general'),
  requiresSkills: stringList,
  tags: stringList,
});

export const CatalogEntrySchema = z.discriminatedUnion('elementType', [
  SkillCatalogEntrySchema,
  CommandCatalogEntrySchema,
  AgentCatalogEntrySchema,
]);

export type SkillCatalogEntry = z.infer<typeof SkillCatalogEntrySchema>;
export type CommandCatalogEntry = z.infer<typeof CommandCatalogEntrySchema>;
export type AgentCatalogEntry = z.infer<typeof AgentCatalogEntrySchema>;
export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;
export type EntryOf<K extends ElementType> = Extract<CatalogEntry, { elementType: K }>;

/** One manifest's worth of entries; every entry has `elementType === elementType`. */
export interface Catalog {
  schemaVersion: string;
  lastSynced: string;
  elementType: ElementType;
  entries: CatalogEntry[];
}

export function formatZodIssues(err: ZodError): string[] {
  return err.issues.map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

export type EntryParseResult = { ok: true; entry: CatalogEntry } | { ok: false; issues: string[] };

export function safeParseEntry(raw: unknown): EntryParseResult {
  const parsed = CatalogEntrySchema.safeParse(raw);
  if(parsed.success) return { ok: true, entry: parsed.data };
  return { ok: false, issues: formatZodIssues(parsed.error) };
}

export function parseEntry(raw: unknown): CatalogEntry {
  const res = safeParseEntry(raw);
  if(!res.ok) throw new ValidationError('Invalid catalog entry', res.issues);
  return res.entry;
}

/** Natural key used by merge: the same file at the same layer is the same entry. */
export function entryKey(entry: Pick<CatalogEntry, 'scope' | 'path'>): string {
  return `${entry.scope}\u0000${path.resolve(entry.path)}`;
}

/** Case-insensitive comparison key for names; a leading "/" is not significant. */
export function nameKey(name: string): string {
  return name.trim().replace(/^\//, '').toLowerCase();
}

/** Accepts a YAML list or a comma-separated string; anything else is an empty list. */
export function toStringList(value: unknown): string[] {
  if(Array.isArray(value)){
    return value.filter((v): v is string | number => typeof v === 'string' || typeof v === 'number')
      .map(v => String(v).trim()).filter(Boolean);
  }
  if(typeof value === 'string') return value.split(',').map(s => s.trim()).filter(Boolean);
  return [];
}

export function entryTags(entry: CatalogEntry): string[] {
  switch(entry.elementType){
    case 'command':
    case 'agent':
      return entry.tags;
    case 'skill':
      return toStringList(entry.metadata.tags);
  }
}
