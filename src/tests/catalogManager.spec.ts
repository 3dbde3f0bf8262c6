import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { CatalogManager } from '../services/catalogManager';
import { SearchError } from '../services/errors';
import { Scanner } from '../services/scanner';
import { Syncer } from '../services/syncer';
import { makeScopeTree, ScopeTree, withoutUpdatedAt, writeAgent, writeCommand, writeSkill } from './testUtils';

const NOW = new Date('2024-06-01T12:00:00.000Z');

describe('CatalogManager', () => {
  let tree: ScopeTree;
  let t: number;
  let manager: CatalogManager;
  let plannerFile: string;

  function makeManager(): CatalogManager {
    return new CatalogManager({
      resolver: tree.resolver,
      scanner: new Scanner({ resolver: tree.resolver, now: () => NOW }),
      syncer: new Syncer({ resolver: tree.resolver, manifestScope: 'project', now: () => NOW }),
      cacheTtlMs: 1000,
      clock: () => t,
    });
  }

  beforeEach(() => {
    tree = makeScopeTree();
    t = 0;
    writeSkill(tree.roots.project, 'code-analysis', { name: 'code-analysis', description: 'Analyzes code quality' });
    writeCommand(tree.roots.global, 'deploy', { description: 'Deploy app', tags: ['ops'] });
    writeCommand(tree.roots.project, 'deploy', { description: 'Deploy project' });
    plannerFile = writeAgent(tree.roots.local, 'planner', { description: 'Plans work' });
    manager = makeManager();
  });

  it('syncs every type and writes one manifest per type', () => {
    const res = manager.syncCatalogs();
    expect(res.warnings).toEqual([]);
    expect(res.counts).toEqual({
      skill: { total: 1, added: 1, updated: 0, retained: 0, stale: 0, cached: false },
      command: { total: 2, added: 2, updated: 0, retained: 0, stale: 0, cached: false },
      agent: { total: 1, added: 1, updated: 0, retained: 0, stale: 0, cached: false },
    });
    const manifestDir = path.join(tree.roots.project, '.manifest');
    expect(fs.readdirSync(manifestDir).sort()).toEqual(['agents.json', 'commands.json', 'skills.json']);
  });

  it('is idempotent on an unchanged tree', () => {
    manager.syncCatalogs();
    const first = manager.listElements('all', 'all', false);
    const again = manager.syncCatalogs(undefined, true);
    expect(again.counts.command).toEqual({ total: 2, added: 0, updated: 2, retained: 0, stale: 0, cached: false });
    const second = manager.listElements('all', 'all', false);
    expect(second.map(e => e.id)).toEqual(first.map(e => e.id));
    expect(withoutUpdatedAt(second)).toEqual(withoutUpdatedAt(first));
  });

  it('serves repeat syncs from the cache until the ttl passes', () => {
    manager.syncCatalogs();
    expect(manager.syncCatalogs().counts.skill).toEqual({ total: 1, added: 0, updated: 0, retained: 0, stale: 0, cached: true });
    manager.invalidate('skill');
    const partial = manager.syncCatalogs();
    expect(partial.counts.skill?.cached).toBe(false);
    expect(partial.counts.agent?.cached).toBe(true);
    t = 1000;
    expect(manager.syncCatalogs().counts.agent?.cached).toBe(false);
  });

  it('caches the catalog exactly as it was written', () => {
    let tick = 0;
    const ticking = new CatalogManager({
      resolver: tree.resolver,
      scanner: new Scanner({ resolver: tree.resolver, now: () => NOW }),
      syncer: new Syncer({ resolver: tree.resolver, manifestScope: 'project', now: () => new Date(NOW.getTime() + 1000 * tick++) }),
      cacheTtlMs: 1000,
      clock: () => t,
    });
    ticking.syncCatalogs(['skill']);
    const onDisk = JSON.parse(fs.readFileSync(path.join(tree.roots.project, '.manifest', 'skills.json'), 'utf8'));
    const cached = ticking.getCatalog('skill');
    expect(cached.lastSynced).toBe(onDisk.last_synced);
    expect(cached.lastSynced).not.toBe(NOW.toISOString());
    expect(cached.schemaVersion).toBe(onDisk.schema_version);
  });

  it('reports a failing type and still syncs the others', () => {
    const blocked = path.join(tree.roots.project, '.manifest', 'commands.json');
    fs.mkdirSync(blocked, { recursive: true });
    const res = manager.syncCatalogs();
    expect(res.counts.command).toBeUndefined();
    expect(res.counts.skill?.total).toBe(1);
    expect(res.counts.agent?.total).toBe(1);
    expect(res.warnings).toHaveLength(1);
    expect(res.warnings[0].startsWith(`command: sync failed: Failed to back up ${blocked}`)).toBe(true);
    expect(manager.listElements('command')).toEqual([]);
  });

  it('lists entries in manifest order narrowed by scope', () => {
    expect(manager.listElements('command').map(e => [e.name, e.scope])).toEqual([['/deploy', 'global'], ['/deploy', 'project']]);
    expect(manager.listElements('command', 'project').map(e => e.description)).toEqual(['Deploy project']);
    expect(manager.listElements('all', 'local').map(e => e.name)).toEqual(['planner']);
  });

  it('searches across types', () => {
    const hits = manager.searchElements('deploy');
    expect(hits.map(h => [h.entry.name, h.entry.scope, h.score])).toEqual([
      ['/deploy', 'global', 160],
      ['/deploy', 'project', 160],
    ]);
    expect(manager.searchElements('deploy', { scope: 'project' }).map(h => h.entry.description)).toEqual(['Deploy project']);
  });

  it('rejects bad search input before touching disk', () => {
    expect(() => manager.searchElements('deploy', { limit: 0 })).toThrow(SearchError);
    expect(fs.existsSync(path.join(tree.roots.project, '.manifest'))).toBe(false);
  });

  it('looks up names with the most specific scope winning', () => {
    expect(manager.getElement('deploy')?.description).toBe('Deploy project');
    expect(manager.getElement('/DEPLOY', 'command')?.scope).toBe('project');
    expect(manager.getElement('deploy', 'skill')).toBeUndefined();
    expect(manager.getElement('plan')).toBeUndefined();
  });

  it('falls back to the best search hit when fuzzy', () => {
    expect(manager.getElement('plan', 'all', { fuzzy: true })?.name).toBe('planner');
    expect(manager.getElement('plan', 'all', { fuzzy: true, minScore: 100 })).toBeUndefined();
    expect(manager.getElement('nothing-like-it', 'all', { fuzzy: true })).toBeUndefined();
  });

  it('counts entries by type and scope', () => {
    manager.syncCatalogs();
    expect(manager.getStats()).toEqual({
      total: 4,
      byType: { skill: 1, command: 2, agent: 1 },
      byScope: { global: 1, project: 2, local: 1 },
    });
    expect(makeManager().getStats().total).toBe(4);
  });

  it('keeps entries whose files vanished and reports them as stale', () => {
    manager.syncCatalogs();
    fs.rmSync(plannerFile);
    expect(manager.findStale('agent').map(e => e.path)).toEqual([plannerFile]);
    const res = manager.syncCatalogs(['agent'], true);
    expect(res.counts.agent).toEqual({ total: 1, added: 0, updated: 0, retained: 1, stale: 1, cached: false });
    expect(manager.listElements('agent', 'all', false).map(e => e.name)).toEqual(['planner']);
  });
});
