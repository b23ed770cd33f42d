import { describe, expect, it } from 'vitest';
import { verifySource } from './verify.js';
import { MemorySource } from '../source/MemorySource.js';
import { MergedFs } from '../merge/MergedFs.js';
import type { FileHandle, FileSource } from '../types/source.js';
import { T0, T2 } from '../merge/testHelpers.js';

class SkewedSource implements FileSource {
  constructor(
    private readonly inner: FileSource,
    private readonly name: string
  ) {}

  async open(path: string): Promise<FileHandle> {
    const handle = await this.inner.open(path);
    if (path !== '.') return handle;
    return {
      stat: () => handle.stat(),
      read: (buffer) => handle.read(buffer),
      listChildren: async (n) => {
        const entries = await handle.listChildren(n);
        return entries?.map((entry) => (entry.name === this.name ? { ...entry, mtime: T2 } : entry)) ?? null;
      },
      close: () => handle.close()
    };
  }
}

describe('verifySource', () => {
  it('accepts consistent sources and union views', async () => {
    const upper = new MemorySource({ 'a.txt': { data: 'a' }, 'dir/x': { data: 'x' }, blocker: { data: '' } }, { mtime: T0 });
    const lower = new MemorySource({ 'dir/y': { data: 'yy' }, 'blocker/hidden': { data: 'h' } }, { mtime: T2 });
    expect(await verifySource(upper, ['a.txt', 'dir/x'])).toEqual([]);
    expect(await verifySource(new MergedFs(upper, lower), ['a.txt', 'dir', 'dir/x', 'dir/y', 'blocker'])).toEqual([]);
  });

  it('reports missing expected paths', async () => {
    const source = new MemorySource({ 'a.txt': { data: 'a' } });
    expect(await verifySource(source, ['a.txt', 'nope'])).toEqual(['nope: expected but not found']);
  });

  it('reports listings that disagree with direct opens', async () => {
    const inner = new MemorySource({ 'a.txt': { data: 'a' }, 'b.txt': { data: 'bb' } }, { mtime: T0 });
    expect(await verifySource(new SkewedSource(inner, 'a.txt'))).toEqual([
      `a.txt: listing reports mtime ${T2}, open reports ${T0}`
    ]);
  });
});
