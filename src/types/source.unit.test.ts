import { describe, expect, it } from 'vitest';
import { isDirectory, toDirEntry } from './source.js';
import { NodeKind } from './enums.js';

describe('source helpers', () => {
  it('only treats DIR as a directory', () => {
    expect(isDirectory({ kind: NodeKind.DIR })).toBe(true);
    expect(isDirectory({ kind: NodeKind.SYMLINK })).toBe(false);
    expect(isDirectory({ kind: NodeKind.FILE })).toBe(false);
  });

  it('copies the entry fields off richer objects', () => {
    const info = Object.assign({ extra: true }, { name: 'a', kind: NodeKind.FILE, mode: 0o644, mtime: 'x', size: 1 });
    expect(toDirEntry(info)).toEqual({ name: 'a', kind: NodeKind.FILE, mode: 0o644, mtime: 'x', size: 1 });
  });
});
