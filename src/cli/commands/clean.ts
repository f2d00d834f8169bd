/**
 * Clean Command
 *
 * Reads a prospect list, optionally filters it by property class, normalizes
 * and deduplicates the addresses, then saves the batch and writes the
 * cleaned CSV.
 *
 * @module cli/commands/clean
 */

import * as path from 'node:path';
import type { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { createSpinner, formatBatchSummary, formatFailedRows, formatProgress } from '../formatters/index.js';
import { loadConfig, isConfigurationError } from '../../config/index.js';
import { LookupCache } from '../../geocoding/cache.js';
import { DEFAULT_ADDRESS_FIELDS } from '../../ingest/rows.js';
import { readRowsFromFile } from '../../ingest/files.js';
import {
  DEFAULT_CLASS_COLUMN,
  DEFAULT_PROPERTY_CLASSES,
  filterByPropertyClass,
  type PropertyClassStats,
} from '../../ingest/property-class.js';
import { createBatchEngine } from '../../pipeline/engine.js';
import { saveBatchResult } from '../../storage/batches.js';
import { exportRepresentativesCsv } from '../../storage/export.js';
import { getLookupCachePath } from '../../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the clean command.
 */
export interface CleanOptions {
  /** Address columns in order; repeatable */
  addressField: string[];
  /** Skip the geocoder */
  offline?: boolean;
  /** Comma-separated allowed property classes */
  propertyClasses?: string;
  /** Column holding the property class */
  classColumn?: string;
  /** CSV file to write the cleaned list to */
  output?: string;
  /** commander sets false for --no-save */
  save: boolean;
  /** Print the batch result as JSON */
  json?: boolean;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Collect a repeatable option into an array.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Split a comma-separated class list.
 */
export function parseClassList(value: string): string[] {
  return value
    .split(',')
    .map((code) => code.trim())
    .filter((code) => code.length > 0);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function fail(base: BaseCommand, error: unknown): never {
  if (isConfigurationError(error)) {
    base.error(error.message, EXIT_CODES.CONFIG_ERROR);
  }
  if (isMissingFile(error)) {
    base.error(error instanceof Error ? error.message : String(error), EXIT_CODES.NOT_FOUND);
  }
  if (error instanceof Error) {
    base.error(error.message, error);
  }
  base.error(String(error));
}

// ============================================================================
// Handler
// ============================================================================

export async function cleanHandler(file: string, options: CleanOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd, options.json ? { quiet: true } : {});
  const logger = base.toLogger();

  try {
    const config = loadConfig();
    const addressField = options.addressField.length > 0 ? options.addressField : [...DEFAULT_ADDRESS_FIELDS];

    let records = await readRowsFromFile(file);
    base.debug(`Read ${records.length} rows from ${file}`);

    let filterStats: PropertyClassStats | undefined;
    if (options.propertyClasses !== undefined || options.classColumn !== undefined) {
      const filtered = filterByPropertyClass(records, {
        column: options.classColumn ?? DEFAULT_CLASS_COLUMN,
        allowed: options.propertyClasses ? parseClassList(options.propertyClasses) : DEFAULT_PROPERTY_CLASSES,
      });
      records = filtered.records;
      filterStats = filtered.stats;
      if (records.length === 0) {
        base.warn('No rows have an allowed property class');
      }
    }

    const cachePath = getLookupCachePath(base.dataDir);
    const cache = new LookupCache({ maxEntries: config.lookupCacheMaxEntries });
    if (!options.offline) {
      try {
        const loaded = await cache.load(cachePath);
        base.debug(`Loaded ${loaded} cached lookups`);
      } catch (error) {
        base.warn(`Ignoring unreadable lookup cache: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    const engine = createBatchEngine(config, { offline: options.offline, cache, logger });

    const controller = new AbortController();
    const onSigint = (): void => controller.abort();
    process.once('SIGINT', onSigint);

    const spinner = createSpinner('Cleaning addresses...', { enabled: !base.isQuiet() });
    spinner.start();

    try {
      const result = await engine.run(records, {
        addressField,
        signal: controller.signal,
        onProgress: ({ completed, total }) => {
          spinner.update(formatProgress('Cleaning addresses', completed, total));
        },
      });

      if (result.status === 'cancelled') {
        spinner.warn('Batch cancelled');
      } else {
        spinner.succeed(`Cleaned ${result.counts.total} rows`);
      }

      if (engine.cache) {
        await engine.cache.save(cachePath);
      }

      let batchId: string | undefined;
      if (options.save) {
        const saved = await saveBatchResult(result, { dataDir: base.dataDir, source: path.basename(file) });
        batchId = saved.batchId;
        base.debug(`Saved batch to ${saved.filePath}`);
      }

      if (options.output && result.status === 'completed') {
        const written = await exportRepresentativesCsv(result, options.output);
        base.debug(`Wrote ${written} rows to ${options.output}`);
      }

      if (options.json) {
        base.json({ batchId, ...result });
      } else {
        base.info(
          formatBatchSummary(result, {
            source: path.basename(file),
            batchId,
            outputPath: result.status === 'completed' ? options.output : undefined,
            filter: filterStats,
          })
        );
        const failed = formatFailedRows(result.failedRows);
        if (failed) {
          base.blank();
          base.info(failed);
        }
      }

      if (result.status === 'cancelled') {
        process.exitCode = EXIT_CODES.CANCELLED;
      }
    } catch (error) {
      spinner.fail('Batch failed');
      throw error;
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  } catch (error) {
    fail(base, error);
  }
}

// ============================================================================
// Registration
// ============================================================================

export function registerCleanCommand(program: Command): void {
  program
    .command('clean <file>')
    .description('Normalize and deduplicate the addresses in a .csv or .json file')
    .option(
      '-a, --address-field <column>',
      `Address column, repeat to join several (default: ${DEFAULT_ADDRESS_FIELDS.join(', ')})`,
      collect,
      []
    )
    .option('--offline', 'Do not call the geocoder; ambiguous addresses stay partial')
    .option('--property-classes <list>', `Allowed property classes (default: ${DEFAULT_PROPERTY_CLASSES.join(',')})`)
    .option('--class-column <column>', `Property class column (default: ${DEFAULT_CLASS_COLUMN})`)
    .option('-o, --output <csv>', 'Write the cleaned list to a CSV file')
    .option('--no-save', 'Do not save the batch result')
    .option('--json', 'Print the batch result as JSON')
    .action(cleanHandler);
}
