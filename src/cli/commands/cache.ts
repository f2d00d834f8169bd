/**
 * Cache Commands
 *
 * Inspect or clear the persisted geocoder lookup cache.
 *
 * @module cli/commands/cache
 */

import * as fs from 'node:fs/promises';
import type { Command } from 'commander';
import { getBaseCommand } from '../base-command.js';
import { loadConfig } from '../../config/index.js';
import { LookupCache } from '../../geocoding/cache.js';
import { fileExists } from '../../storage/atomic.js';
import { getLookupCachePath } from '../../storage/paths.js';

export interface CacheStatsOptions {
  json?: boolean;
}

export async function cacheStatsHandler(options: CacheStatsOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);

  try {
    const config = loadConfig();
    const cachePath = getLookupCachePath(base.dataDir);
    const exists = await fileExists(cachePath);
    const cache = new LookupCache({ maxEntries: config.lookupCacheMaxEntries });
    if (exists) {
      await cache.load(cachePath);
    }

    if (options.json) {
      base.json({ path: cachePath, exists, entries: cache.size, maxEntries: config.lookupCacheMaxEntries });
      return;
    }

    base.section('Lookup Cache');
    base.keyValue('Path', cachePath);
    base.keyValue('Entries', exists ? `${cache.size} / ${config.lookupCacheMaxEntries}` : 'none saved');
  } catch (error) {
    base.error(error instanceof Error ? error.message : String(error), error instanceof Error ? error : undefined);
  }
}

export async function cacheClearHandler(_options: unknown, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const cachePath = getLookupCachePath(base.dataDir);

  try {
    if (!(await fileExists(cachePath))) {
      base.info('Lookup cache is already empty');
      return;
    }
    await fs.rm(cachePath, { force: true });
    base.success(`Removed ${cachePath}`);
  } catch (error) {
    base.error(error instanceof Error ? error.message : String(error), error instanceof Error ? error : undefined);
  }
}

export function registerCacheCommands(program: Command): void {
  const cache = program.command('cache').description('Manage the geocoder lookup cache');

  cache
    .command('stats')
    .description('Show the persisted lookup cache')
    .option('--json', 'Print as JSON')
    .action(cacheStatsHandler);

  cache.command('clear').description('Delete the persisted lookup cache').action(cacheClearHandler);
}
