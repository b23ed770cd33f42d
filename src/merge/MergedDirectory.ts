import type { DirEntry, FileHandle, FileInfo } from '../types/source.js';
import type { Instant } from '../types/ids.js';
import { ErrorCode, NodeKind, SourceOp } from '../types/enums.js';
import { SourceError } from '../errors/SourceError.js';
import { nextPage } from '../utils/pagination.js';

export class MergedDirectory implements FileHandle, FileInfo {
  readonly kind = NodeKind.DIR;
  readonly size = 0;
  private entries: readonly DirEntry[];
  private readOffset = 0;

  constructor(
    readonly name: string,
    readonly mode: number,
    readonly mtime: Instant,
    entries: readonly DirEntry[] = []
  ) {
    this.entries = entries;
  }

  async stat(): Promise<FileInfo> {
    return this;
  }

  async read(_buffer: Uint8Array): Promise<number | null> {
    throw new SourceError(ErrorCode.IS_DIRECTORY, 'is a directory', { op: SourceOp.READ, path: this.name });
  }

  async listChildren(n = -1): Promise<DirEntry[] | null> {
    const page = nextPage(this.entries, this.readOffset, n);
    if (!page) return null;
    this.readOffset = page.nextOffset;
    return page.items;
  }

  async close(): Promise<void> {
    this.entries = [];
    this.readOffset = 0;
  }
}
