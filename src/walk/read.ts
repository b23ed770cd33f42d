import type { DirEntry, FileInfo, FileSource } from '../types/source.js';
import { closeAfterFailure } from '../merge/handles.js';

const READ_CHUNK = 64 * 1024;

export async function readFile(source: FileSource, path: string): Promise<Buffer> {
  const handle = await source.open(path);
  const chunks: Buffer[] = [];
  try {
    const buffer = new Uint8Array(READ_CHUNK);
    for (;;) {
      const count = await handle.read(buffer);
      if (count === null) break;
      chunks.push(Buffer.from(buffer.subarray(0, count)));
    }
  } catch (err) {
    throw await closeAfterFailure(handle, err);
  }
  await handle.close();
  return Buffer.concat(chunks);
}

export async function readDir(source: FileSource, path: string): Promise<DirEntry[]> {
  const handle = await source.open(path);
  let entries: DirEntry[];
  try {
    entries = (await handle.listChildren(-1)) ?? [];
  } catch (err) {
    throw await closeAfterFailure(handle, err);
  }
  await handle.close();
  return entries;
}

export async function statPath(source: FileSource, path: string): Promise<FileInfo> {
  const handle = await source.open(path);
  let info: FileInfo;
  try {
    info = await handle.stat();
  } catch (err) {
    throw await closeAfterFailure(handle, err);
  }
  await handle.close();
  return info;
}
