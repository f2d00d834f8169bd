/**
 * Normalize Command
 *
 * Runs a single address through parse, canonicalize and fingerprint and
 * prints the result.
 *
 * @module cli/commands/normalize
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { normalizeAddress } from '../../address/index.js';
import { formatAddressLine } from '../../address/canonicalizer.js';
import { ADDRESS_FIELDS, isParseFailure } from '../../schemas/address.js';
import { loadConfig, isConfigurationError } from '../../config/index.js';
import { LookupCache } from '../../geocoding/cache.js';
import { createBatchEngine } from '../../pipeline/engine.js';
import { getLookupCachePath } from '../../storage/paths.js';

/**
 * Options for the normalize command.
 */
export interface NormalizeOptions {
  offline?: boolean;
  json?: boolean;
}

/** Display labels for the address components */
const FIELD_LABELS: Record<(typeof ADDRESS_FIELDS)[number], string> = {
  houseNumber: 'House number',
  street: 'Street',
  unit: 'Unit',
  city: 'City',
  state: 'State',
  postalCode: 'Postal code',
};

const CONFIDENCE_COLORS = {
  exact: chalk.green,
  resolved: chalk.cyan,
  partial: chalk.yellow,
} as const;

export async function normalizeHandler(
  address: string,
  options: NormalizeOptions,
  cmd: Command
): Promise<void> {
  const base: BaseCommand = getBaseCommand(cmd, options.json ? { quiet: true } : {});

  try {
    const config = loadConfig();
    const cachePath = getLookupCachePath(base.dataDir);
    const cache = new LookupCache({ maxEntries: config.lookupCacheMaxEntries });
    if (!options.offline) {
      await cache.load(cachePath);
    }

    const engine = createBatchEngine(config, {
      offline: options.offline,
      cache,
      logger: base.toLogger(),
    });

    const result = await normalizeAddress(address, { geocoder: engine.geocoder, logger: base.toLogger() });

    if (engine.cache) {
      await engine.cache.save(cachePath);
    }

    if (isParseFailure(result)) {
      if (options.json) {
        base.json(result);
      }
      base.error(`Could not parse "${address}": ${result.reason}`, EXIT_CODES.ERROR);
    }

    const fullAddress = formatAddressLine(result.address);
    if (options.json) {
      base.json({ input: address, ...result, fullAddress });
      return;
    }

    base.section('Canonical Address');
    base.keyValue('Address', fullAddress);
    for (const field of ADDRESS_FIELDS) {
      const value = result.address[field];
      if (value !== undefined) {
        base.keyValue(`  ${FIELD_LABELS[field]}`, value);
      }
    }
    const confidence = result.address.confidence;
    base.keyValue('Confidence', CONFIDENCE_COLORS[confidence](confidence));
    base.keyValue('Fingerprint', result.fingerprint);
  } catch (error) {
    if (isConfigurationError(error)) {
      base.error(error.message, EXIT_CODES.CONFIG_ERROR);
    }
    base.error(error instanceof Error ? error.message : String(error), error instanceof Error ? error : undefined);
  }
}

export function registerNormalizeCommand(program: Command): void {
  program
    .command('normalize <address>')
    .description('Show the canonical form and fingerprint of one address')
    .option('--offline', 'Do not call the geocoder')
    .option('--json', 'Print the result as JSON')
    .action(normalizeHandler);
}
