import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { z } from 'zod';
import { atomicWriteJson, readJson, readValidatedJson, fileExists } from './atomic.js';

describe('atomic', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('atomicWriteJson', () => {
    it('writes 2-space indented JSON and creates parent directories', async () => {
      const filePath = path.join(tempDir, 'nested', 'deep', 'cache.json');
      await atomicWriteJson(filePath, { a: 1 });

      expect(await fs.readFile(filePath, 'utf-8')).toBe('{\n  "a": 1\n}');
    });

    it('overwrites an existing file and leaves no temp files', async () => {
      const filePath = path.join(tempDir, 'batch.json');
      await atomicWriteJson(filePath, { first: true });
      await atomicWriteJson(filePath, { second: true });

      expect(JSON.parse(await fs.readFile(filePath, 'utf-8'))).toEqual({ second: true });
      expect(await fs.readdir(tempDir)).toEqual(['batch.json']);
    });

    it('names the target when the write fails', async () => {
      const blocker = path.join(tempDir, 'blocker');
      await fs.writeFile(blocker, 'file, not a directory');
      const filePath = path.join(blocker, 'out.json');

      await expect(atomicWriteJson(filePath, {})).rejects.toThrow(`Atomic write failed for ${filePath}`);
    });
  });

  describe('readJson', () => {
    it('returns parsed content', async () => {
      const filePath = path.join(tempDir, 'rows.json');
      await fs.writeFile(filePath, '[{"Address":"123 Main St"}]');

      expect(await readJson(filePath)).toEqual([{ Address: '123 Main St' }]);
    });

    it('throws for a missing file', async () => {
      const filePath = path.join(tempDir, 'missing.json');
      await expect(readJson(filePath)).rejects.toThrow(`File not found: ${filePath}`);
    });

    it('throws for invalid JSON', async () => {
      const filePath = path.join(tempDir, 'invalid.json');
      await fs.writeFile(filePath, 'not json');

      await expect(readJson(filePath)).rejects.toThrow(`Invalid JSON in file: ${filePath}`);
    });
  });

  describe('readValidatedJson', () => {
    const schema = z.object({ schemaVersion: z.literal(1), entries: z.array(z.string()) });

    it('returns data matching the schema', async () => {
      const filePath = path.join(tempDir, 'ok.json');
      await fs.writeFile(filePath, '{"schemaVersion":1,"entries":["a"]}');

      expect(await readValidatedJson(filePath, schema)).toEqual({ schemaVersion: 1, entries: ['a'] });
    });

    it('names the file and the offending path', async () => {
      const filePath = path.join(tempDir, 'bad.json');
      await fs.writeFile(filePath, '{"schemaVersion":1,"entries":[7]}');

      await expect(readValidatedJson(filePath, schema)).rejects.toThrow(
        `Invalid data in ${filePath} at entries.0: Expected string, received number`
      );
    });
  });

  describe('fileExists', () => {
    it('returns true for an existing file', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await fs.writeFile(filePath, '{}');

      expect(await fileExists(filePath)).toBe(true);
    });

    it('returns false for a missing file', async () => {
      expect(await fileExists(path.join(tempDir, 'missing.json'))).toBe(false);
    });

    it('returns false for directories', async () => {
      expect(await fileExists(tempDir)).toBe(false);
    });
  });
});
