import Ajv, { ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import manifestSchema from '../../schemas/catalog-manifest.schema.json';
import { Catalog, CatalogEntry, ElementType, pluralOf } from '../models/catalogEntry';
import { ValidationError } from './errors';
import { decodeEntry, isRecord } from './manifestCodec';

/** Full validation of a raw (parsed JSON) manifest; throws `ValidationError` listing every issue. */
export type ManifestValidator = (raw: unknown, type: ElementType) => Catalog;

export interface ManifestValidationOptions {
  /** Drop individually invalid entries (reported in `dropped`) instead of rejecting the manifest. */
  lenient?: boolean;
}

export interface ManifestValidationResult {
  catalog: Catalog;
  dropped: string[];
}

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);
const validateContainer = ajv.compile(manifestSchema);
// Entry-level check compiled on its own so a single bad entry can be isolated.
const validateEntryShape = ajv.compile({ ...manifestSchema.definitions.entry, definitions: manifestSchema.definitions });

function formatAjvErrors(errors: ErrorObject[] | null | undefined, prefix = ''): string[] {
  return (errors ?? []).map(e => `${(prefix + e.instancePath) || '(root)'}: ${e.message ?? 'invalid'}`);
}

function checkEntry(raw: unknown, type: ElementType, label: string): { entry?: CatalogEntry; issues: string[] } {
  if(!validateEntryShape(raw)) return { issues: formatAjvErrors(validateEntryShape.errors, label) };
  const decoded = decodeEntry(raw);
  if(!decoded.ok) return { issues: decoded.issues.map(i => `${label}/${i}`) };
  if(decoded.entry.elementType !== type){
    return { issues: [`${label}: element_type ${decoded.entry.elementType} does not belong in the ${pluralOf(type)} manifest`] };
  }
  return { entry: decoded.entry, issues: [] };
}

export function inspectManifest(raw: unknown, type: ElementType, options: ManifestValidationOptions = {}): ManifestValidationResult {
  if(!isRecord(raw)) throw new ValidationError('Invalid manifest', ['(root): must be an object']);
  const plural = pluralOf(type);
  const list = raw[plural];
  if(!Array.isArray(list)) throw new ValidationError('Invalid manifest', [`(root): missing "${plural}" array`]);

  const issues: string[] = [];
  const dropped: string[] = [];
  const entries: CatalogEntry[] = [];
  const kept: unknown[] = [];
  const seenIds = new Set<string>();
  list.forEach((item: unknown, i) => {
    const label = `/${plural}/${i}`;
    const res = checkEntry(item, type, label);
    let problems = res.issues;
    if(res.entry && seenIds.has(res.entry.id)) problems = [`${label}/id: duplicate id ${res.entry.id}`];
    if(!res.entry || problems.length){
      (options.lenient ? dropped : issues).push(...problems);
      return;
    }
    seenIds.add(res.entry.id);
    entries.push(res.entry);
    kept.push(item);
  });

  if(!validateContainer({ ...raw, [plural]: kept })) issues.push(...formatAjvErrors(validateContainer.errors));
  if(issues.length) throw new ValidationError('Invalid manifest', issues);

  const schemaVersion = raw.schema_version;
  const lastSynced = raw.last_synced;
  // both guaranteed strings by the container schema; narrowed again for the compiler
  if(typeof schemaVersion !== 'string' || typeof lastSynced !== 'string'){
    throw new ValidationError('Invalid manifest', ['(root): schema_version and last_synced must be strings']);
  }
  return { catalog: { schemaVersion, lastSynced, elementType: type, entries }, dropped };
}

export const validateManifest: ManifestValidator = (raw, type) => inspectManifest(raw, type).catalog;
