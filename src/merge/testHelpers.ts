import type { FileHandle, FileSource } from '../types/source.js';
import { ErrorCode, SourceOp } from '../types/enums.js';
import { SourceError } from '../errors/SourceError.js';

export const T0 = '2024-01-01T00:00:00.000Z';
export const T1 = '2024-02-01T00:00:00.000Z';
export const T2 = '2024-03-01T00:00:00.000Z';

export async function readText(handle: FileHandle): Promise<string> {
  const chunks: Buffer[] = [];
  const buffer = new Uint8Array(4);
  for (;;) {
    const count = await handle.read(buffer);
    if (count === null) break;
    chunks.push(Buffer.from(buffer.subarray(0, count)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

export async function listNames(source: FileSource, path: string): Promise<string[]> {
  const handle = await source.open(path);
  const entries = (await handle.listChildren(-1)) ?? [];
  await handle.close();
  return entries.map((entry) => entry.name);
}

export class ProbeSource implements FileSource {
  readonly opens = new Map<string, number>();
  readonly failing = new Set<string>();

  constructor(private readonly inner: FileSource) {}

  get totalOpens(): number {
    let total = 0;
    for (const count of this.opens.values()) total += count;
    return total;
  }

  async open(path: string): Promise<FileHandle> {
    this.opens.set(path, (this.opens.get(path) ?? 0) + 1);
    if (this.failing.has(path)) {
      throw new SourceError(ErrorCode.IO_ERROR, 'device error', { op: SourceOp.OPEN, path });
    }
    return this.inner.open(path);
  }
}
