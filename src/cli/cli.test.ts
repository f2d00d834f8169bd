/**
 * CLI Smoke Tests
 *
 * Program wiring, base command output, formatters and the command handlers
 * run end to end against a temporary data directory.
 *
 * @module cli/cli.test
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import chalk from 'chalk';
import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { Command } from 'commander';
import { createProgram } from './index.js';
import { BaseCommand, EXIT_CODES, createBaseCommand, getBaseCommand } from './base-command.js';
import { VERSION, getVersionInfo } from './version.js';
import { ProgressSpinner, formatDuration, formatProgress, createSpinner } from './formatters/progress.js';
import { formatBatchSummary, formatFailedRows } from './formatters/batch-summary.js';
import { collect, parseClassList } from './commands/clean.js';
import { formatBatchRow } from './commands/batches.js';
import { listBatches } from '../storage/batches.js';
import { LookupCache } from '../geocoding/cache.js';
import type { BatchResult } from '../schemas/batch.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';

type ConsoleSpies = {
  log: jest.SpiedFunction<typeof console.log>;
  warn: jest.SpiedFunction<typeof console.warn>;
  error: jest.SpiedFunction<typeof console.error>;
};

function spyOnConsole(): ConsoleSpies {
  return {
    log: jest.spyOn(console, 'log').mockImplementation(() => undefined),
    warn: jest.spyOn(console, 'warn').mockImplementation(() => undefined),
    error: jest.spyOn(console, 'error').mockImplementation(() => undefined),
  };
}

function restoreConsole(spies: ConsoleSpies): void {
  spies.log.mockRestore();
  spies.warn.mockRestore();
  spies.error.mockRestore();
}

function findCommand(parent: Command, name: string): Command {
  const found = parent.commands.find((command) => command.name() === name);
  if (!found) {
    throw new Error(`command ${name} is not registered`);
  }
  return found;
}

function printedJson(spy: jest.SpiedFunction<typeof console.log>): unknown {
  const lastCall = spy.mock.calls[spy.mock.calls.length - 1];
  const text: unknown = lastCall?.[0];
  if (typeof text !== 'string') {
    throw new Error('nothing was printed');
  }
  return JSON.parse(text);
}

// ============================================================================
// Program Tests
// ============================================================================

describe('CLI Program', () => {
  it('should create a program with correct name and version', () => {
    const program = createProgram();

    expect(program.name()).toBe('addrclean');
    expect(program.version()).toBe(VERSION);
  });

  it('should have global options configured', () => {
    const optionNames = createProgram().options.map((o) => o.long);

    expect(optionNames).toEqual(['--version', '--verbose', '--quiet', '--no-color', '--data-dir']);
  });

  it('should register the commands', () => {
    const program = createProgram();

    expect(program.commands.map((c) => c.name())).toEqual(['clean', 'normalize', 'batches', 'cache']);
    expect(findCommand(program, 'batches').commands.map((c) => c.name())).toEqual(['list', 'show']);
    expect(findCommand(program, 'cache').commands.map((c) => c.name())).toEqual(['stats', 'clear']);
  });

  it('should give clean its options', () => {
    const clean = findCommand(createProgram(), 'clean');

    expect(clean.options.map((o) => o.long)).toEqual([
      '--address-field',
      '--offline',
      '--property-classes',
      '--class-column',
      '--output',
      '--no-save',
      '--json',
    ]);
  });
});

describe('Version', () => {
  it('should describe the tool', () => {
    expect(getVersionInfo()).toBe('Prospect Address Cleaner v1.0.0');
  });
});

// ============================================================================
// BaseCommand Tests
// ============================================================================

describe('BaseCommand', () => {
  let consoleSpy: ConsoleSpies;

  beforeEach(() => {
    consoleSpy = spyOnConsole();
  });

  afterEach(() => {
    restoreConsole(consoleSpy);
  });

  it('should create with default options', () => {
    const cmd = new BaseCommand({});

    expect(cmd.isVerbose()).toBe(false);
    expect(cmd.isQuiet()).toBe(false);
    expect(cmd.dataDir).toBe(path.join(os.homedir(), '.addrclean'));
  });

  it('should resolve the data directory option', () => {
    expect(new BaseCommand({ dataDir: '~/prospects' }).dataDir).toBe(path.join(os.homedir(), 'prospects'));
  });

  it('should print debug messages only when verbose', () => {
    new BaseCommand({}).debug('hidden');
    expect(consoleSpy.log).not.toHaveBeenCalled();

    new BaseCommand({ verbose: true, color: false }).debug('shown');
    expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] shown');
  });

  it('should hide info in quiet mode but keep warnings', () => {
    const cmd = new BaseCommand({ quiet: true, color: false });

    cmd.info('info message');
    cmd.warn('warning message');

    expect(consoleSpy.log).not.toHaveBeenCalled();
    expect(consoleSpy.warn).toHaveBeenCalledWith('Warning: warning message');
  });

  it('should mark success and failure without color', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.success('done');
    cmd.fail('broken');

    expect(consoleSpy.log.mock.calls).toEqual([['[OK] done'], ['[FAIL] broken']]);
  });

  it('should print key-value pairs and JSON', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.keyValue('Entries', 3);
    cmd.json({ entries: 3 });

    expect(consoleSpy.log.mock.calls).toEqual([['Entries: 3'], ['{\n  "entries": 3\n}']]);
  });

  it('should exit with the given code on error', () => {
    const exitSpy = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    try {
      expect(() => new BaseCommand({ color: false }).error('bad input', EXIT_CODES.USAGE_ERROR)).toThrow('exit 2');
      expect(consoleSpy.error).toHaveBeenCalledWith('Error: bad input');
    } finally {
      exitSpy.mockRestore();
    }
  });

  it('should log errors through the pipeline logger without exiting', () => {
    const exitSpy = jest.spyOn(process, 'exit');
    const logger = new BaseCommand({ color: false }).toLogger();

    logger.error('lookup failed');
    logger.info('progress');

    expect(consoleSpy.error).toHaveBeenCalledWith('Error: lookup failed');
    expect(consoleSpy.log).toHaveBeenCalledWith('progress');
    expect(exitSpy).not.toHaveBeenCalled();
    exitSpy.mockRestore();
  });

  it('should create with factory function', () => {
    const cmd = createBaseCommand({ verbose: true });

    expect(cmd).toBeInstanceOf(BaseCommand);
    expect(cmd.isVerbose()).toBe(true);
  });

  it('should merge global options with handler overrides', () => {
    const program = new Command().option('-v, --verbose').option('--data-dir <path>');
    const sub = program.command('sub').action(() => undefined);
    program.parse(['node', 'addrclean', '--verbose', '--data-dir', '/tmp/addrclean-data', 'sub']);

    const base = getBaseCommand(sub, { quiet: true });

    expect(base.isVerbose()).toBe(true);
    expect(base.isQuiet()).toBe(true);
    expect(base.dataDir).toBe('/tmp/addrclean-data');
  });
});

describe('Exit Codes', () => {
  it('should define standard exit codes', () => {
    expect(EXIT_CODES).toEqual({
      SUCCESS: 0,
      ERROR: 1,
      USAGE_ERROR: 2,
      CONFIG_ERROR: 3,
      NOT_FOUND: 4,
      CANCELLED: 130,
    });
  });
});

// ============================================================================
// Formatter Tests
// ============================================================================

describe('Progress Formatters', () => {
  describe('formatDuration', () => {
    it('should format milliseconds', () => {
      expect(formatDuration(500)).toBe('500ms');
      expect(formatDuration(999)).toBe('999ms');
    });

    it('should format seconds', () => {
      expect(formatDuration(1000)).toBe('1.0s');
      expect(formatDuration(5500)).toBe('5.5s');
    });

    it('should format minutes and seconds', () => {
      expect(formatDuration(90000)).toBe('1m 30s');
      expect(formatDuration(125000)).toBe('2m 5s');
    });
  });

  describe('formatProgress', () => {
    it('should show counts and percentage', () => {
      expect(formatProgress('Cleaning addresses', 40, 120)).toBe('Cleaning addresses 40/120 (33%)');
    });

    it('should treat an empty batch as done', () => {
      expect(formatProgress('Cleaning addresses', 0, 0)).toBe('Cleaning addresses 0/0 (100%)');
    });
  });

  describe('ProgressSpinner', () => {
    it('should support method chaining', () => {
      const spinner = new ProgressSpinner('Loading...', { enabled: false });
      expect(spinner.start('Starting...').update('Processing...').stop()).toBe(spinner);
    });

    it('should create with factory function', () => {
      expect(createSpinner('Loading...', { enabled: false })).toBeInstanceOf(ProgressSpinner);
    });
  });
});

describe('Batch Summary Formatters', () => {
  const previousLevel = chalk.level;

  beforeEach(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = previousLevel;
  });

  const result: BatchResult = {
    schemaVersion: SCHEMA_VERSIONS.batch,
    status: 'completed',
    representatives: [],
    groups: [],
    failedRows: [
      { rowIndex: 3, reason: 'unrecognized format', raw: 'not an address' },
      { rowIndex: 7, reason: 'missing address field', raw: '' },
    ],
    counts: {
      total: 10,
      parsed: 8,
      parseFailed: 2,
      uniqueAfterDedup: 5,
      duplicatesAbsorbed: 3,
      exact: 6,
      resolved: 1,
      partial: 1,
    },
    timing: {
      startedAt: '2026-01-02T14:35:12.000Z',
      completedAt: '2026-01-02T14:35:14.500Z',
      durationMs: 2500,
    },
  };

  it('should format a completed batch', () => {
    const text = formatBatchSummary(result, { source: 'prospects.csv', outputPath: 'cleaned.csv' });

    expect(text.split('\n')).toEqual([
      '=== Batch Complete ===',
      'Source:  prospects.csv',
      '',
      'Status:   COMPLETED',
      'Duration: 2.5s',
      '',
      'Rows:',
      '  Total:                10',
      '  Parsed:               8',
      '  Failed:               2',
      '  Unique addresses:     5',
      '  Duplicates absorbed:  3',
      '',
      'Confidence:',
      '  Exact:                6 (75.0%)',
      '  Resolved:             1 (12.5%)',
      '  Partial:              1 (12.5%)',
      '',
      'Output: cleaned.csv',
    ]);
  });

  it('should leave out confidence for a cancelled batch', () => {
    const text = formatBatchSummary({ ...result, status: 'cancelled' });

    expect(text.startsWith('=== Batch Cancelled ===')).toBe(true);
    expect(text).toContain('Status:   CANCELLED');
    expect(text).not.toContain('Confidence:');
  });

  it('should list failed rows up to the limit', () => {
    expect(formatFailedRows(result.failedRows, 1).split('\n')).toEqual([
      'Failed rows (2):',
      '  row 3: unrecognized format "not an address"',
      '  ... and 1 more',
    ]);
  });

  it('should print nothing without failures', () => {
    expect(formatFailedRows([])).toBe('');
  });

  it('should format a saved batch as a table row', () => {
    expect(formatBatchRow('20260102-143512-prospects', result)).toBe(
      '20260102-143512-prospects'.padEnd(40) + 'completed  ' + '10      ' + '5       ' + '2       '
    );
  });
});

// ============================================================================
// Command Handlers
// ============================================================================

describe('Command helpers', () => {
  it('should collect repeated options', () => {
    expect(collect('City', collect('Address', []))).toEqual(['Address', 'City']);
  });

  it('should split class lists', () => {
    expect(parseClassList(' C1, b9,,C0 ')).toEqual(['C1', 'b9', 'C0']);
  });
});

describe('Command handlers', () => {
  let tempDir: string;
  let consoleSpy: ConsoleSpies;

  async function run(...args: string[]): Promise<void> {
    await createProgram().parseAsync(['node', 'addrclean', '--data-dir', tempDir, ...args]);
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-test-'));
    consoleSpy = spyOnConsole();
  });

  afterEach(async () => {
    restoreConsole(consoleSpy);
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('normalize prints the canonical address as JSON', async () => {
    await run('normalize', '123 Main St Apt 4B, Springfield, IL 62704', '--offline', '--json');

    expect(printedJson(consoleSpy.log)).toMatchObject({
      input: '123 Main St Apt 4B, Springfield, IL 62704',
      fullAddress: '123 MAIN STREET APT 4B, SPRINGFIELD, IL 62704',
      address: { confidence: 'exact', postalCode: '62704' },
    });
  });

  it('clean saves the batch and writes the cleaned CSV', async () => {
    const input = path.join(tempDir, 'prospects.csv');
    const output = path.join(tempDir, 'cleaned.csv');
    await fs.writeFile(
      input,
      'Address,Owner\n"123 Main St, Springfield, IL 62704",Pat Doe\n"123 MAIN STREET, SPRINGFIELD, IL 62704",P. Doe\nnot an address,Sam Roe\n'
    );

    await run('clean', input, '--offline', '--output', output, '--json');

    expect(printedJson(consoleSpy.log)).toMatchObject({
      status: 'completed',
      counts: { total: 3, parsed: 2, uniqueAfterDedup: 1, duplicatesAbsorbed: 1 },
      failedRows: [{ rowIndex: 2, reason: 'unrecognized format', raw: 'not an address' }],
    });
    expect((await fs.readFile(output, 'utf-8')).trim().split('\n')).toHaveLength(2);
    expect(await fs.readdir(path.join(tempDir, 'batches'))).toHaveLength(1);
  });

  it('batches list and show read back a saved batch', async () => {
    const input = path.join(tempDir, 'prospects.csv');
    await fs.writeFile(input, 'Address\n"123 Main St, Springfield, IL 62704"\n');
    await run('clean', input, '--offline', '--json');
    const [batchId] = await listBatches(tempDir);

    await run('batches', 'list', '--json');
    expect(printedJson(consoleSpy.log)).toMatchObject([
      { batchId, status: 'completed', counts: { total: 1, uniqueAfterDedup: 1 } },
    ]);

    const exported = path.join(tempDir, 'again.csv');
    await run('batches', 'show', String(batchId), '--export', exported, '--json');
    expect(printedJson(consoleSpy.log)).toMatchObject({ batchId, status: 'completed' });
    expect((await fs.readFile(exported, 'utf-8')).trim().split('\n')).toHaveLength(2);
  });

  it('batches show exits with NOT_FOUND for an unknown batch', async () => {
    const exitSpy = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    try {
      await expect(run('batches', 'show', '20260102-143512-missing')).rejects.toThrow('exit 4');
    } finally {
      exitSpy.mockRestore();
    }
  });

  it('cache stats reports a missing cache', async () => {
    await run('cache', 'stats', '--json');

    expect(printedJson(consoleSpy.log)).toMatchObject({
      path: path.join(tempDir, 'cache', 'lookup-cache.json'),
      exists: false,
      entries: 0,
    });
  });

  it('cache stats counts the entries kept under the configured size', async () => {
    const saved = new LookupCache({ maxEntries: 10 });
    saved.set('77 sunset', { street: 'Sunset Boulevard', city: 'Los Angeles', state: 'CA' });
    saved.set('9 elm', { street: 'Elm Street', postalCode: '62704' });
    saved.set('4 oak', { street: 'Oak Avenue' });
    await saved.save(path.join(tempDir, 'cache', 'lookup-cache.json'));
    const previous = process.env.LOOKUP_CACHE_MAX_ENTRIES;
    process.env.LOOKUP_CACHE_MAX_ENTRIES = '1';

    try {
      await run('cache', 'stats', '--json');
    } finally {
      if (previous === undefined) {
        delete process.env.LOOKUP_CACHE_MAX_ENTRIES;
      } else {
        process.env.LOOKUP_CACHE_MAX_ENTRIES = previous;
      }
    }

    expect(printedJson(consoleSpy.log)).toMatchObject({ exists: true, entries: 1, maxEntries: 1 });
  });

  it('cache clear removes the saved cache', async () => {
    const cachePath = path.join(tempDir, 'cache', 'lookup-cache.json');
    await fs.mkdir(path.dirname(cachePath), { recursive: true });
    await fs.writeFile(cachePath, '{}');

    await run('--no-color', 'cache', 'clear');

    expect(consoleSpy.log).toHaveBeenCalledWith(`[OK] Removed ${cachePath}`);
    await expect(fs.stat(cachePath)).rejects.toThrow();
  });

  it('cache clear reports an empty cache', async () => {
    await run('cache', 'clear');

    expect(consoleSpy.log).toHaveBeenCalledWith('Lookup cache is already empty');
  });
});
