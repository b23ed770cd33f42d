import type { FileHandle, FileSource } from '../types/source.js';
import { NodeKind, SourceOp } from '../types/enums.js';
import { notFound } from '../errors/SourceError.js';
import { ROOT_PATH, assertValidPath } from '../path/validPath.js';
import { EPOCH_INSTANT } from '../utils/time.js';
import { ListingHandle } from './handles.js';

export class EmptySource implements FileSource {
  async open(path: string): Promise<FileHandle> {
    assertValidPath(path);
    if (path !== ROOT_PATH) {
      throw notFound(SourceOp.OPEN, path);
    }
    const info = { name: ROOT_PATH, kind: NodeKind.DIR, mode: 0o555, mtime: EPOCH_INSTANT, size: 0 };
    return new ListingHandle(path, info, async () => []);
  }
}
