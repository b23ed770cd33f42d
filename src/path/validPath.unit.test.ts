import { describe, expect, it } from 'vitest';
import { assertValidPath, baseName, isValidPath, joinPath, parentPath, pathDepth, pathPrefixes } from './validPath.js';
import { SourceError } from '../errors/SourceError.js';
import { ErrorCode } from '../types/enums.js';

function thrownBy(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('isValidPath', () => {
  it('accepts the root marker and relative paths', () => {
    expect(isValidPath('.')).toBe(true);
    expect(isValidPath('a')).toBe(true);
    expect(isValidPath('a/b.txt')).toBe(true);
    expect(isValidPath('a/.hidden')).toBe(true);
  });

  it('rejects empty, absolute, dotted and slash-terminated paths', () => {
    expect(isValidPath('')).toBe(false);
    expect(isValidPath('/a')).toBe(false);
    expect(isValidPath('a/')).toBe(false);
    expect(isValidPath('a//b')).toBe(false);
    expect(isValidPath('./bad.txt')).toBe(false);
    expect(isValidPath('a/../b')).toBe(false);
    expect(isValidPath('..')).toBe(false);
  });
});

describe('assertValidPath', () => {
  it('throws INVALID_PATH for malformed paths', () => {
    expect(() => assertValidPath('a/../b')).toThrow(SourceError);
    expect(thrownBy(() => assertValidPath('/a'))).toMatchObject({ code: ErrorCode.INVALID_PATH, path: '/a' });
  });
});

describe('pathPrefixes', () => {
  it('accumulates prefixes left to right', () => {
    expect(pathPrefixes('a/b/c')).toEqual(['a', 'a/b', 'a/b/c']);
    expect(pathPrefixes('a')).toEqual(['a']);
    expect(pathPrefixes('.')).toEqual(['.']);
  });
});

describe('path helpers', () => {
  it('splits base names and parents', () => {
    expect(baseName('a/b/c.txt')).toBe('c.txt');
    expect(baseName('a')).toBe('a');
    expect(baseName('.')).toBe('.');
    expect(parentPath('a/b')).toBe('a');
    expect(parentPath('a')).toBe('.');
    expect(parentPath('.')).toBeNull();
  });

  it('joins children onto the root and nested directories', () => {
    expect(joinPath('.', 'a')).toBe('a');
    expect(joinPath('a/b', 'c')).toBe('a/b/c');
  });

  it('counts depth below the root', () => {
    expect(pathDepth('.')).toBe(0);
    expect(pathDepth('a')).toBe(1);
    expect(pathDepth('a/b/c')).toBe(3);
  });
});
