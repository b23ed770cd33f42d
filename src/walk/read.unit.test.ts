import { describe, expect, it } from 'vitest';
import { readDir, readFile, statPath } from './read.js';
import { MemorySource } from '../source/MemorySource.js';
import type { FileInfo, FileSource } from '../types/source.js';
import { ErrorCode, NodeKind } from '../types/enums.js';
import { T0 } from '../merge/testHelpers.js';

describe('read helpers', () => {
  const source = new MemorySource({ 'docs/readme.md': { data: 'read me', mtime: T0 }, 'docs/a.md': { data: '' } }, { mtime: T0 });

  it('reads whole files', async () => {
    const content = await readFile(source, 'docs/readme.md');
    expect(content.toString('utf8')).toBe('read me');
    await expect(readFile(source, 'docs')).rejects.toMatchObject({ code: ErrorCode.IS_DIRECTORY });
  });

  it('lists and stats paths', async () => {
    expect((await readDir(source, 'docs')).map((entry) => entry.name)).toEqual(['a.md', 'readme.md']);
    await expect(readDir(source, 'docs/a.md')).rejects.toMatchObject({ code: ErrorCode.NOT_DIRECTORY });
    expect(await statPath(source, 'docs/readme.md')).toEqual({ name: 'readme.md', kind: NodeKind.FILE, mode: 0o644, mtime: T0, size: 7 });
  });

  it('closes the handle when reading fails', async () => {
    let closed = 0;
    const info: FileInfo = { name: 'x', kind: NodeKind.FILE, mode: 0o644, mtime: T0, size: 1 };
    const failing: FileSource = {
      open: async () => ({
        stat: async () => info,
        read: async () => {
          throw new Error('disk gone');
        },
        listChildren: async () => null,
        close: async () => {
          closed += 1;
        }
      })
    };
    await expect(readFile(failing, 'x')).rejects.toThrow('disk gone');
    expect(closed).toBe(1);
  });
});
