import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { randomUUID } from 'node:crypto';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ValidationError } from '@margin/shared/Types/errors.js';
import {
  NoBlockFoundError,
  UnsupportedLanguageError,
  resetConfig,
  runBlock,
  runBlockText,
} from '../../src/runblock.js';
import { readHistory } from '../../src/logging/history.js';

const NOTES = '# Notes\n\n```sh\necho from-file\n```\n';

describe('runBlock', () => {
  let dir: string;
  let savedHistoryFile: string | undefined;

  beforeEach(() => {
    dir = join(tmpdir(), `runblock-doc-${randomUUID()}`);
    mkdirSync(dir, { recursive: true });
    savedHistoryFile = process.env.RUNBLOCK_HISTORY_FILE;
    delete process.env.RUNBLOCK_HISTORY_FILE;
    resetConfig();
  });

  afterEach(() => {
    if (savedHistoryFile === undefined) delete process.env.RUNBLOCK_HISTORY_FILE;
    else process.env.RUNBLOCK_HISTORY_FILE = savedHistoryFile;
    resetConfig();
    rmSync(dir, { recursive: true, force: true });
  });

  function writeDoc(content: string): string {
    const path = join(dir, 'notes.md');
    writeFileSync(path, content);
    return path;
  }

  it('should run the block nearest the cursor', async () => {
    const path = writeDoc(NOTES);
    const result = await runBlock(path, 0, { shellPath: 'sh' });

    expect(result.language).toBe('sh');
    expect(result.output).toBe('from-file\n');
    expect(result.exit_code).toBe(0);
    expect(result.block_end).toBe(34);
  });

  it('should run the block under the cursor when there are several', async () => {
    const path = writeDoc('```sh\necho one\n```\n\n```json\n{"b":2,"a":1}\n```\n');
    const result = await runBlock(path, 25, { shellPath: 'sh' });

    expect(result.language).toBe('json');
    expect(result.output).toBe('{\n  "a": 1,\n  "b": 2\n}');
  });

  it('should propagate read errors unchanged', async () => {
    await expect(runBlock(join(dir, 'missing.md'), 0, {})).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should fail when the document has no blocks', async () => {
    const path = writeDoc('nothing to run here\n');
    await expect(runBlock(path, 0, {})).rejects.toBeInstanceOf(NoBlockFoundError);
  });

  it('should reject a negative cursor', async () => {
    const path = writeDoc(NOTES);
    await expect(runBlock(path, -1, {})).rejects.toBeInstanceOf(ValidationError);
  });

  it('should reject a malformed execution config', async () => {
    const path = writeDoc(NOTES);
    await expect(runBlock(path, 0, { shellPath: 42 })).rejects.toBeInstanceOf(ValidationError);
  });

  it('should record the run when history is configured', async () => {
    const historyFile = join(dir, 'history.jsonl');
    process.env.RUNBLOCK_HISTORY_FILE = historyFile;
    resetConfig();
    const path = writeDoc(NOTES);

    await runBlock(path, 0, { shellPath: 'sh' });

    const entries = await readHistory(10, historyFile);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      file: path,
      language: 'sh',
      exit_code: 0,
      block_start: 9,
      block_end: 34,
      output_chars: 10,
    });
    expect(entries[0].run_id).toMatch(/^run_[0-9a-f]{12}$/);
  });
});

describe('runBlockText', () => {
  it('should run from text already in memory', async () => {
    const result = await runBlockText('```json\n[1,2]\n```\n', 0, {});
    expect(result.output).toBe('[\n  1,\n  2\n]');
  });

  it('should locate blocks by byte offset in multi-byte documents', async () => {
    const doc = 'ü\n```sh\necho one\n```\n```json\n{}\n```\n';
    const bytes = Buffer.from(doc, 'utf8');
    const jsonStart = bytes.indexOf('```json');

    // The sh block's end offset is the json opener's start, and ends are inclusive
    const result = await runBlockText(bytes, jsonStart + 1, { shellPath: 'sh' });
    expect(result.language).toBe('json');
    expect(result.block_end).toBe(bytes.length);
  });

  it('should reject an unsupported language', async () => {
    await expect(runBlockText('```Haskell\nmain = pure ()\n```\n', 0, {})).rejects.toBeInstanceOf(
      UnsupportedLanguageError,
    );
  });
});
