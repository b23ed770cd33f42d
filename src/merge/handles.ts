import type { DirEntry, FileHandle, FileInfo } from '../types/source.js';
import { SourceOp, SourceSide } from '../types/enums.js';
import { wrapSourceError } from '../errors/SourceError.js';

export async function closeAfterFailure(handle: FileHandle, failure: unknown): Promise<unknown> {
  try {
    await handle.close();
  } catch (closeErr) {
    const message = failure instanceof Error ? failure.message : String(failure);
    return new AggregateError([failure, closeErr], message);
  }
  return failure;
}

export async function closeHandle(handle: FileHandle, path: string, side: SourceSide): Promise<void> {
  try {
    await handle.close();
  } catch (err) {
    throw wrapSourceError(err, { op: SourceOp.CLOSE, path, side });
  }
}

export async function statOpened(handle: FileHandle, path: string, side: SourceSide): Promise<FileInfo> {
  try {
    return await handle.stat();
  } catch (err) {
    throw await closeAfterFailure(handle, wrapSourceError(err, { op: SourceOp.STAT, path, side }));
  }
}

export async function listAll(handle: FileHandle, path: string, side: SourceSide): Promise<DirEntry[]> {
  try {
    return (await handle.listChildren(-1)) ?? [];
  } catch (err) {
    throw wrapSourceError(err, { op: SourceOp.LIST, path, side });
  }
}
