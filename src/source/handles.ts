import type { Readable } from 'node:stream';
import type { DirEntry, FileHandle, FileInfo } from '../types/source.js';
import { ErrorCode, SourceOp } from '../types/enums.js';
import { SourceError } from '../errors/SourceError.js';
import { nextPage } from '../utils/pagination.js';
import { utf8ByteCompare } from '../utils/utf8.js';

function closedError(op: SourceOp, path: string): SourceError {
  return new SourceError(ErrorCode.CLOSED, 'file already closed', { op, path });
}

export class ListingHandle implements FileHandle {
  private entries: DirEntry[] | undefined;
  private offset = 0;
  private closed = false;

  constructor(
    private readonly path: string,
    private readonly info: FileInfo,
    private readonly loadEntries: () => Promise<DirEntry[]>
  ) {}

  async stat(): Promise<FileInfo> {
    return this.info;
  }

  async read(_buffer: Uint8Array): Promise<number | null> {
    if (this.closed) throw closedError(SourceOp.READ, this.path);
    throw new SourceError(ErrorCode.IS_DIRECTORY, 'is a directory', { op: SourceOp.READ, path: this.path });
  }

  async listChildren(n = -1): Promise<DirEntry[] | null> {
    if (this.closed) throw closedError(SourceOp.LIST, this.path);
    if (!this.entries) {
      const loaded = await this.loadEntries();
      this.entries = loaded.sort((a, b) => utf8ByteCompare(a.name, b.name));
    }
    const page = nextPage(this.entries, this.offset, n);
    if (!page) return null;
    this.offset = page.nextOffset;
    return page.items;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.entries = undefined;
  }
}

export class ContentHandle implements FileHandle {
  private content: Uint8Array | undefined;
  private position = 0;
  private closed = false;

  constructor(
    private readonly path: string,
    private readonly info: FileInfo,
    private readonly loadContent: () => Promise<Uint8Array>
  ) {}

  async stat(): Promise<FileInfo> {
    return this.info;
  }

  async read(buffer: Uint8Array): Promise<number | null> {
    if (this.closed) throw closedError(SourceOp.READ, this.path);
    const content = (this.content ??= await this.loadContent());
    if (this.position >= content.length) return null;
    const count = Math.min(buffer.length, content.length - this.position);
    buffer.set(content.subarray(this.position, this.position + count));
    this.position += count;
    return count;
  }

  async listChildren(_n?: number): Promise<DirEntry[] | null> {
    if (this.closed) throw closedError(SourceOp.LIST, this.path);
    throw new SourceError(ErrorCode.NOT_DIRECTORY, 'not a directory', { op: SourceOp.LIST, path: this.path });
  }

  async close(): Promise<void> {
    this.closed = true;
    this.content = undefined;
  }
}

export class StreamHandle implements FileHandle {
  private stream: Readable | undefined;
  private chunks: AsyncIterator<unknown> | undefined;
  private pending: Uint8Array = new Uint8Array(0);
  private ended = false;
  private closed = false;

  constructor(
    private readonly path: string,
    private readonly info: FileInfo,
    private readonly openStream: () => Promise<Readable>
  ) {}

  async stat(): Promise<FileInfo> {
    return this.info;
  }

  async read(buffer: Uint8Array): Promise<number | null> {
    if (this.closed) throw closedError(SourceOp.READ, this.path);
    while (this.pending.length === 0) {
      if (this.ended) return null;
      const next = await this.nextChunk();
      if (next === null) {
        this.ended = true;
        return null;
      }
      this.pending = next;
    }
    const count = Math.min(buffer.length, this.pending.length);
    buffer.set(this.pending.subarray(0, count));
    this.pending = this.pending.subarray(count);
    return count;
  }

  async listChildren(_n?: number): Promise<DirEntry[] | null> {
    if (this.closed) throw closedError(SourceOp.LIST, this.path);
    throw new SourceError(ErrorCode.NOT_DIRECTORY, 'not a directory', { op: SourceOp.LIST, path: this.path });
  }

  async close(): Promise<void> {
    this.closed = true;
    this.pending = new Uint8Array(0);
    this.stream?.destroy();
    this.stream = undefined;
    this.chunks = undefined;
  }

  private async nextChunk(): Promise<Uint8Array | null> {
    try {
      if (!this.chunks) {
        this.stream = await this.openStream();
        this.chunks = this.stream[Symbol.asyncIterator]();
      }
      const { value, done } = await this.chunks.next();
      if (done) return null;
      if (value instanceof Uint8Array) return value;
      return typeof value === 'string' ? Buffer.from(value, 'utf8') : new Uint8Array(0);
    } catch (err) {
      if (err instanceof SourceError) throw err;
      const detail = err instanceof Error ? err.message : String(err);
      throw new SourceError(ErrorCode.IO_ERROR, detail, { op: SourceOp.READ, path: this.path, cause: err });
    }
  }
}
