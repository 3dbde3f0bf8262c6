import { describe, it, expect } from 'vitest';
import { serializeCatalog } from '../services/manifestCodec';
import { inspectManifest } from '../services/manifestValidator';
import { migrateManifestRecord, SCHEMA_VERSION } from '../versioning/schemaVersion';
import { catalogOf, commandEntry, fixedId } from './testUtils';

const NOW = '2024-06-01T12:00:00.000Z';

describe('manifest schema migration', () => {
  it('leaves a current manifest alone', () => {
    const rec = serializeCatalog(catalogOf('command', [commandEntry({ name: 'deploy' })]));
    const before = JSON.stringify(rec);
    expect(migrateManifestRecord(rec, 'command', NOW)).toEqual({ changed: false, notes: undefined });
    expect(JSON.stringify(rec)).toBe(before);
  });

  it('upgrades builder-era manifests with variant fields in metadata', () => {
    const rec: Record<string, unknown> = {
      schema_version: '1.0',
      skills: [{
        id: fixedId(1),
        name: 'lint',
        description: 'Lints sources',
        scope: 'project',
        path: '/catalog/lint',
        created_at: '2024-01-02T03:04:05',
        updated_at: '2024-01-02T03:04:05',
        metadata: { template: 'validation', file_count: 2, owner: 'platform' },
      }],
    };
    const res = migrateManifestRecord(rec, 'skill', NOW);
    expect(res.changed).toBe(true);
    expect(res.notes).toContain('last_synced defaulted');
    expect(res.notes).toContain('skills[0]: template moved out of metadata');
    expect(res.notes).toContain(`schema_version updated 1.0→${SCHEMA_VERSION}`);

    const local = new Date('2024-01-02T03:04:05').toISOString();
    const { catalog, dropped } = inspectManifest(rec, 'skill', { lenient: true });
    expect(dropped).toEqual([]);
    expect(catalog.lastSynced).toBe(NOW);
    expect(catalog.entries[0]).toMatchObject({
      elementType: 'skill',
      template: 'validation',
      fileCount: 2,
      createdAt: local,
      updatedAt: local,
      metadata: { owner: 'platform' },
    });
  });

  it('renames the generic entries layout', () => {
    const rec: Record<string, unknown> = {
      schema_version: '1.0',
      last_sync: '2024-03-01T00:00:00Z',
      entries: [
        { id: fixedId(2), name: 'deploy', description: 'Deploys', scope: 'global', file_path: '/catalog/deploy.md', created_at: '2024-03-01T00:00:00Z' },
        { id: fixedId(3), description: 'no name', scope: 'global', file_path: '/catalog/x.md' },
      ],
    };
    migrateManifestRecord(rec, 'command', NOW);
    expect(rec.entries).toBeUndefined();
    expect(rec.last_sync).toBeUndefined();
    expect(rec.last_synced).toBe('2024-03-01T00:00:00Z');

    const { catalog, dropped } = inspectManifest(rec, 'command', { lenient: true });
    expect(catalog.entries.map(e => [e.name, e.path, e.updatedAt])).toEqual([['/deploy', '/catalog/deploy.md', '2024-03-01T00:00:00Z']]);
    expect(dropped).toEqual(["/commands/1: must have required property 'name'"]);
  });
});
