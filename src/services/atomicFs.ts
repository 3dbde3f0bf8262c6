import fs from 'fs';
import path from 'path';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { BackupError, errorMessage } from './errors';
import { logDebug, logWarn } from './logger';

/**
 * Atomic JSON writes for manifest files.
 *
 * Sequence:
 *  1. serialize to `<file>.tmp` in the same directory and fsync it;
 *  2. read the temp file back and hand the parsed value to `verify` (throwing aborts the write);
 *  3. rename over the canonical file with retry/backoff, since on Windows / network filesystems
 *     a scanner or indexer can briefly hold the destination (EPERM / EBUSY / EACCES);
 *  4. fsync the directory where the platform allows it.
 * On any failure the temp file is removed and the canonical file is left as it was.
 *
 * Retry tuning comes from runtime config:
 *  - atomicFs.retries (CATALOG_ATOMIC_WRITE_RETRIES, default 5): total rename attempts
 *  - atomicFs.backoffMs (CATALOG_ATOMIC_WRITE_BACKOFF_MS, default 10): initial backoff, exponential with jitter
 */

export interface AtomicWriteOptions {
  verify?: (parsed: unknown) => void;
}

const TRANSIENT_RENAME_CODES = new Set(['EPERM', 'EBUSY', 'EACCES']);

export function tmpPathFor(filePath: string): string { return `${filePath}.tmp`; }
export function backupPathFor(filePath: string): string { return `${filePath}.backup`; }

function errnoCode(err: unknown): string | undefined {
  if(err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

// Synchronous sleep without spinning the CPU.
function pause(ms: number){
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function writeDurable(file: string, data: string){
  const fd = fs.openSync(file, 'w');
  try {
    fs.writeSync(fd, data, 0, 'utf8');
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}

function syncDirectory(dir: string){
  let fd: number | undefined;
  try {
    fd = fs.openSync(dir, 'r');
    fs.fsyncSync(fd);
  } catch(err){
    // not supported for directories on every platform (win32)
    logDebug('atomicFs:dir-fsync-skipped', { dir, error: errorMessage(err) });
  } finally {
    if(fd !== undefined) fs.closeSync(fd);
  }
}

function renameWithRetry(from: string, to: string){
  const { retries, backoffMs } = getRuntimeConfig().atomicFs;
  const maxAttempts = Math.max(1, retries);
  const baseBackoff = Math.max(1, backoffMs);
  for(let attempt=1; ; attempt++){
    try {
      fs.renameSync(from, to);
      return;
    } catch(err){
      const code = errnoCode(err);
      if(!code || !TRANSIENT_RENAME_CODES.has(code) || attempt >= maxAttempts) throw err;
      const sleepMs = baseBackoff * Math.pow(2, attempt-1) + Math.floor(Math.random()*baseBackoff);
      logDebug('atomicFs:rename-retry', { to, attempt, code, sleepMs });
      pause(sleepMs);
    }
  }
}

/** Unlink if present; a failure here is logged, never thrown, so it cannot mask the error being handled. */
export function removeQuietly(filePath: string){
  try {
    if(fs.existsSync(filePath)) fs.unlinkSync(filePath);
  } catch(err){
    logWarn('atomicFs:cleanup-failed', { file: filePath, error: errorMessage(err) });
  }
}

/** Copy `filePath` to its `.backup` sibling and return the backup path. */
export function copyToBackup(filePath: string): string {
  const backup = backupPathFor(filePath);
  try {
    fs.copyFileSync(filePath, backup);
  } catch(err){
    throw new BackupError(filePath, { cause: err });
  }
  return backup;
}

export function atomicWriteJson(filePath: string, obj: unknown, options: AtomicWriteOptions = {}){
  const dir = path.dirname(filePath);
  if(!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  const data = JSON.stringify(obj, null, 2) + '\n';
  const tmp = tmpPathFor(filePath);
  try {
    writeDurable(tmp, data);
    if(options.verify){
      const parsed: unknown = JSON.parse(fs.readFileSync(tmp, 'utf8'));
      options.verify(parsed);
    }
    renameWithRetry(tmp, filePath);
  } catch(err){
    removeQuietly(tmp);
    throw err;
  }
  syncDirectory(dir);
}
