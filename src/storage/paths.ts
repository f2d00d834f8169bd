/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * ~/.addrclean/                              # Default data directory
 * ├── cache/
 * │   └── lookup-cache.json                  # Persisted geocoder lookups
 * └── batches/
 *     └── <batch_id>.json                    # e.g., 20260102-143512-prospects
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * Rejects IDs containing:
 * - `..` (parent directory traversal)
 * - `/` (forward slash - Unix path separator)
 * - `\` (backslash - Windows path separator)
 *
 * @param id - The ID to validate
 * @param idName - Name of the ID for error messages (e.g., 'batchId')
 * @throws {Error} If the ID contains path traversal characters
 */
export function validateIdSecurity(id: string, idName: string): void {
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Resolve a directory setting, expanding a leading `~`.
 */
export function resolveDir(dir: string): string {
  if (dir.startsWith('~')) {
    return path.join(os.homedir(), dir.slice(1));
  }
  return path.resolve(dir);
}

/**
 * Gets the root data directory for the application.
 *
 * Uses the `ADDRCLEAN_DATA_DIR` environment variable if set,
 * otherwise defaults to `~/.addrclean/`.
 *
 * @example
 * ```typescript
 * process.env.ADDRCLEAN_DATA_DIR = '/custom/path';
 * getDataDir(); // '/custom/path'
 * ```
 */
export function getDataDir(): string {
  const envDir = process.env.ADDRCLEAN_DATA_DIR;
  if (envDir) {
    return resolveDir(envDir);
  }
  return path.join(os.homedir(), '.addrclean');
}

/**
 * Gets the directory holding saved batch results.
 */
export function getBatchesDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'batches');
}

/**
 * Gets the file path of a saved batch.
 *
 * @param batchId - The batch ID (format: YYYYMMDD-HHMMSS-slug)
 * @throws {Error} If batchId is empty or contains path separators
 * @example
 * ```typescript
 * getBatchFilePath('20260102-143512-prospects', '/data');
 * // '/data/batches/20260102-143512-prospects.json'
 * ```
 */
export function getBatchFilePath(batchId: string, dataDir: string = getDataDir()): string {
  if (!batchId || batchId.trim() === '') {
    throw new Error('batchId is required');
  }
  validateIdSecurity(batchId, 'batchId');

  return path.join(getBatchesDir(dataDir), `${batchId}.json`);
}

/**
 * Gets the path of the persisted lookup cache.
 */
export function getLookupCachePath(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'cache', 'lookup-cache.json');
}
