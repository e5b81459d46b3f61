import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { appendFileSync, existsSync, rmSync } from 'fs';
import { JsonlLogger, createTimestamp } from '../Logging/jsonl.js';
import type { BaseLogEntry } from '../Logging/jsonl.js';

interface TestEntry extends BaseLogEntry {
  action: string;
  value?: number;
}

function isTestEntry(value: unknown): value is TestEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value &&
    typeof value.timestamp === 'string' &&
    'action' in value &&
    typeof value.action === 'string'
  );
}

const tempDirs: string[] = [];

function createLogger(): { logger: JsonlLogger<TestEntry>; path: string } {
  const dir = join(tmpdir(), `shared-test-${randomUUID()}`);
  tempDirs.push(dir);
  const path = join(dir, 'nested', 'log.jsonl');
  return { logger: new JsonlLogger<TestEntry>(path, isTestEntry), path };
}

afterEach(() => {
  for (const dir of tempDirs) {
    if (existsSync(dir)) rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe('JsonlLogger', () => {
  describe('write and read', () => {
    it('should create missing directories and read entries back', async () => {
      const { logger } = createLogger();

      await logger.write({ timestamp: '2025-01-01T00:00:00Z', action: 'create' });
      await logger.write({ timestamp: '2025-01-02T00:00:00Z', action: 'delete' });

      const entries = await logger.read();
      expect(entries.map((e) => e.action)).toEqual(['delete', 'create']);
    });

    it('should return empty array for non-existent file', async () => {
      const { logger } = createLogger();
      expect(await logger.read()).toEqual([]);
    });

    it('should skip lines that are not JSON or fail the guard', async () => {
      const { logger, path } = createLogger();
      await logger.write({ timestamp: '2025-01-01T00:00:00Z', action: 'kept' });
      appendFileSync(path, '{"timestamp": "2025-01-0\n');
      appendFileSync(path, '{"timestamp":"2025-01-03T00:00:00Z"}\n');
      appendFileSync(path, '\n');

      const entries = await logger.read();
      expect(entries).toEqual([{ timestamp: '2025-01-01T00:00:00Z', action: 'kept' }]);
    });
  });

  describe('ordering', () => {
    it('should return newest first', async () => {
      const { logger } = createLogger();
      await logger.write({ timestamp: '2025-01-03T00:00:00Z', action: 'third' });
      await logger.write({ timestamp: '2025-01-01T00:00:00Z', action: 'first' });
      await logger.write({ timestamp: '2025-01-02T00:00:00Z', action: 'second' });

      const entries = await logger.read();
      expect(entries.map((e) => e.action)).toEqual(['third', 'second', 'first']);
    });

    it('should put the later-written entry first when timestamps are equal', async () => {
      const { logger } = createLogger();
      await logger.write({ timestamp: '2025-01-01T00:00:00.000Z', action: 'earlier' });
      await logger.write({ timestamp: '2025-01-01T00:00:00.000Z', action: 'later' });
      await logger.write({ timestamp: '2025-01-01T00:00:00.000Z', action: 'latest' });

      const entries = await logger.read();
      expect(entries.map((e) => e.action)).toEqual(['latest', 'later', 'earlier']);
    });
  });

  describe('limit', () => {
    it('should keep only the newest entries', async () => {
      const { logger } = createLogger();
      for (let i = 1; i <= 5; i++) {
        await logger.write({ timestamp: `2025-01-0${i}T00:00:00Z`, action: 'run', value: i });
      }

      const entries = await logger.read({ limit: 2 });
      expect(entries.map((e) => e.value)).toEqual([5, 4]);
    });
  });

  describe('getPath', () => {
    it('should return the configured path', () => {
      const { logger, path } = createLogger();
      expect(logger.getPath()).toBe(path);
    });
  });
});

describe('createTimestamp', () => {
  it('should return an ISO-8601 string', () => {
    const ts = createTimestamp();
    expect(new Date(ts).toISOString()).toBe(ts);
  });
});
