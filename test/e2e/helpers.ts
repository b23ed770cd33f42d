import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import yazl from 'yazl';
import { ArchiveRegistry } from '../../src/archive/ArchiveRegistry.js';
import { ZipArchiveReader } from '../../src/archive/zip/ZipArchiveReader.js';
import type { ArchiveSource } from '../../src/archive/types.js';

export function createTempDir(prefix = 'unionfs-e2e-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function createZip(zipPath: string, entries: { name: string; content: string }[]): Promise<void> {
  const zip = new yazl.ZipFile();
  for (const entry of entries) {
    zip.addBuffer(Buffer.from(entry.content, 'utf8'), entry.name);
  }
  zip.end();
  return new Promise((resolve, reject) => {
    const out = fs.createWriteStream(zipPath);
    zip.outputStream.pipe(out);
    out.on('close', () => resolve());
    out.on('error', reject);
  });
}

export const LAYER_ENTRIES: Record<string, { name: string; content: string }[]> = {
  'test_a.zip': [
    { name: 'test1.txt', content: 'hi' },
    { name: 'a', content: 'a is a file here' }
  ],
  'test_b.zip': [
    { name: 'test1.txt', content: 'hello from b' },
    { name: 'test2.txt', content: 'two' },
    { name: 'a/test4.txt', content: 'hidden' },
    { name: 'b/0.txt', content: 'zero' }
  ],
  'test_c.zip': [
    { name: 'test3.txt', content: 'three' },
    { name: 'b/0.txt', content: 'old zero' },
    { name: 'b/1.txt', content: 'one' }
  ]
};

export const LAYER_FILES = ['test1.txt', 'test2.txt', 'test3.txt', 'b/0.txt', 'b/1.txt', 'b', 'a'];

export interface LayerFixture {
  dir: string;
  zips: ArchiveSource[];
  close(): Promise<void>;
}

export async function createLayerFixture(): Promise<LayerFixture> {
  const dir = createTempDir();
  const registry = new ArchiveRegistry([new ZipArchiveReader()]);
  const zips: ArchiveSource[] = [];
  for (const [name, entries] of Object.entries(LAYER_ENTRIES)) {
    const zipPath = path.join(dir, name);
    await createZip(zipPath, entries);
    zips.push(await registry.open({ path: zipPath }));
  }
  return {
    dir,
    zips,
    async close() {
      for (const zip of zips) {
        await zip.close();
      }
      cleanupTempDir(dir);
    }
  };
}
