import fs from 'fs';
import os from 'os';
import path from 'path';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { Scope, ScopeFilter, SCOPES } from '../models/catalogEntry';

/** Maps a logical scope to the absolute base directory holding its elements. */
export interface ScopeResolver {
  root(scope: Scope): string | undefined;
}

export class StaticScopeResolver implements ScopeResolver {
  constructor(private readonly roots: Partial<Record<Scope, string>>){}
  root(scope: Scope): string | undefined {
    const r = this.roots[scope];
    return r ? path.resolve(r) : undefined;
  }
}

const SCOPE_DIR_NAME = '.claude';

function isDirectory(p: string): boolean {
  try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

/**
 * Nearest `.claude` directory walking up from `startDir`, excluding the global one so a
 * working directory under the home folder does not mistake it for a project layer.
 */
export function findProjectRoot(startDir: string, globalRoot?: string): string | undefined {
  let dir = path.resolve(startDir);
  const globalResolved = globalRoot ? path.resolve(globalRoot) : undefined;
  for(;;){
    const candidate = path.join(dir, SCOPE_DIR_NAME);
    if(candidate !== globalResolved && isDirectory(candidate)) return candidate;
    const parent = path.dirname(dir);
    if(parent === dir) return undefined;
    dir = parent;
  }
}

/**
 * Environment-driven resolver:
 *  - global: CATALOG_GLOBAL_ROOT or ~/.claude
 *  - project: CATALOG_PROJECT_ROOT or the nearest .claude above the working directory
 *  - local: CATALOG_LOCAL_ROOT only
 */
export class DefaultScopeResolver implements ScopeResolver {
  constructor(private readonly cwd = process.cwd(), private readonly home = os.homedir()){}

  root(scope: Scope): string | undefined {
    const roots = getRuntimeConfig().catalog.roots;
    const globalRoot = roots.global ?? path.join(this.home, SCOPE_DIR_NAME);
    switch(scope){
      case 'global': return globalRoot;
      case 'project': return roots.project ?? findProjectRoot(this.cwd, globalRoot);
      case 'local': return roots.local;
    }
  }
}

export function expandScopes(filter: ScopeFilter): Scope[] {
  return filter === 'all' ? [...SCOPES] : [filter];
}
