/**
 * Typed error classes for the catalog system.
 *
 * Every error carries a stable string `code` so callers (CLI, UI) can branch without
 * relying on class identity across bundles. Underlying causes are kept on `cause`.
 */

export type CatalogErrorCode = 'CATALOG_LOAD' | 'CATALOG_SAVE' | 'SCAN' | 'SEARCH' | 'VALIDATION' | 'BACKUP';

export class CatalogError extends Error {
  public readonly code: CatalogErrorCode;

  constructor(message: string, code: CatalogErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** Manifest and its backup both unreadable; the caller degrades to an empty catalog. */
export class CatalogLoadError extends CatalogError {
  public readonly manifestPath: string;

  constructor(manifestPath: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load catalog ${manifestPath}: ${message}`, 'CATALOG_LOAD', options);
    this.name = 'CatalogLoadError';
    this.manifestPath = manifestPath;
  }
}

/** Atomic write failed before the rename; the canonical file is untouched. */
export class CatalogSaveError extends CatalogError {
  public readonly manifestPath: string;
  public readonly backupPath?: string;

  constructor(manifestPath: string, message: string, options?: { cause?: unknown; backupPath?: string }) {
    super(`Failed to save catalog ${manifestPath}: ${message}`, 'CATALOG_SAVE', options);
    this.name = 'CatalogSaveError';
    this.manifestPath = manifestPath;
    this.backupPath = options?.backupPath;
  }
}

/** Scan-level fatal condition (scope root unusable). Per-file problems are warnings, not this. */
export class ScanError extends CatalogError {
  public readonly scopeRoot?: string;

  constructor(message: string, options?: { cause?: unknown; scopeRoot?: string }) {
    super(message, 'SCAN', options);
    this.name = 'ScanError';
    this.scopeRoot = options?.scopeRoot;
  }
}

export class SearchError extends CatalogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SEARCH', options);
    this.name = 'SearchError';
  }
}

export class ValidationError extends CatalogError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message, 'VALIDATION', options);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** Backup copy could not be created; the write sequence does not proceed. */
export class BackupError extends CatalogError {
  public readonly sourcePath: string;

  constructor(sourcePath: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to back up ${sourcePath}${detail}`, 'BACKUP', options);
    this.name = 'BackupError';
    this.sourcePath = sourcePath;
  }
}

export function isCatalogError(e: unknown): e is CatalogError {
  return e instanceof CatalogError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
