import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@margin/shared/Types/errors.js';
import { tokenizeCommand } from '../../src/utils/tokenize.js';

describe('tokenizeCommand', () => {
  it('should split on whitespace', () => {
    expect(tokenizeCommand('sqlite3 notes.db')).toEqual(['sqlite3', 'notes.db']);
  });

  it('should honor double and single quotes', () => {
    expect(tokenizeCommand('psql -d "my db" --quiet')).toEqual(['psql', '-d', 'my db', '--quiet']);
    expect(tokenizeCommand("sh -c 'tr a-z A-Z'")).toEqual(['sh', '-c', 'tr a-z A-Z']);
  });

  it('should leave variable references unexpanded', () => {
    expect(tokenizeCommand('sqlite3 $HOME/notes.db')).toEqual(['sqlite3', '$HOME/notes.db']);
  });

  it('should keep glob patterns as plain arguments', () => {
    expect(tokenizeCommand('cat *.sql')).toEqual(['cat', '*.sql']);
  });

  it('should stop at a comment', () => {
    expect(tokenizeCommand('sqlite3 notes.db # scratch')).toEqual(['sqlite3', 'notes.db']);
  });

  it('should return nothing for a blank line', () => {
    expect(tokenizeCommand('   ')).toEqual([]);
  });

  it('should reject shell operators', () => {
    expect(() => tokenizeCommand('sqlite3 notes.db | cat')).toThrow(ConfigurationError);
    expect(() => tokenizeCommand('psql && echo done')).toThrow('shell operator "&&" is not supported');
  });
});
