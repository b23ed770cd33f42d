import type { DirEntry, FileHandle, FileInfo, FileSource } from '../types/source.js';
import type { Instant } from '../types/ids.js';
import { ErrorCode, NodeKind, SourceOp } from '../types/enums.js';
import { SourceError, notFound } from '../errors/SourceError.js';
import { ROOT_PATH, assertValidPath, baseName, parentPath, pathPrefixes } from '../path/validPath.js';
import { nowInstant } from '../utils/time.js';
import { ContentHandle, ListingHandle } from './handles.js';

export interface MemoryEntryInit {
  data?: string | Uint8Array;
  mode?: number;
  mtime?: Instant;
  dir?: boolean;
}

export interface MemorySourceOptions {
  mtime?: Instant;
}

interface MemoryNode {
  kind: NodeKind;
  mode: number;
  mtime: Instant;
  data: Uint8Array;
}

const DEFAULT_FILE_MODE = 0o644;
const DEFAULT_DIR_MODE = 0o755;

export class MemorySource implements FileSource {
  private readonly nodes = new Map<string, MemoryNode>();
  private readonly defaultMtime: Instant;

  constructor(entries: Record<string, MemoryEntryInit> = {}, options: MemorySourceOptions = {}) {
    this.defaultMtime = options.mtime ?? nowInstant();
    this.nodes.set(ROOT_PATH, this.makeNode({ dir: true }));
    for (const [path, init] of Object.entries(entries)) {
      this.set(path, init);
    }
  }

  set(path: string, init: MemoryEntryInit): void {
    assertValidPath(path);
    if (path === ROOT_PATH && !init.dir) {
      throw new SourceError(ErrorCode.NOT_DIRECTORY, 'root must be a directory', { op: SourceOp.OPEN, path });
    }
    if (path !== ROOT_PATH) {
      for (const prefix of pathPrefixes(path).slice(0, -1)) {
        const existing = this.nodes.get(prefix);
        if (!existing) {
          this.nodes.set(prefix, this.makeNode({ dir: true }));
        } else if (existing.kind !== NodeKind.DIR) {
          throw new SourceError(ErrorCode.NOT_DIRECTORY, `parent ${prefix} is not a directory`, { op: SourceOp.OPEN, path });
        }
      }
    }
    const existing = this.nodes.get(path);
    if (existing?.kind === NodeKind.DIR && !init.dir) {
      this.removeDescendants(path);
    }
    this.nodes.set(path, this.makeNode(init));
  }

  remove(path: string): void {
    assertValidPath(path);
    this.removeDescendants(path);
    if (path === ROOT_PATH) {
      this.nodes.set(ROOT_PATH, this.makeNode({ dir: true }));
      return;
    }
    this.nodes.delete(path);
  }

  async open(path: string): Promise<FileHandle> {
    assertValidPath(path);
    const node = this.nodes.get(path);
    if (!node) {
      throw notFound(SourceOp.OPEN, path);
    }
    const info = this.infoFor(path, node);
    if (node.kind === NodeKind.DIR) {
      return new ListingHandle(path, info, async () => this.listEntries(path));
    }
    const data = node.data;
    return new ContentHandle(path, info, async () => data);
  }

  private listEntries(dir: string): DirEntry[] {
    const entries: DirEntry[] = [];
    for (const [path, node] of this.nodes) {
      if (path !== ROOT_PATH && parentPath(path) === dir) {
        entries.push(this.infoFor(path, node));
      }
    }
    return entries;
  }

  private removeDescendants(path: string): void {
    const prefix = path === ROOT_PATH ? '' : `${path}/`;
    for (const key of [...this.nodes.keys()]) {
      if (key !== ROOT_PATH && key.startsWith(prefix)) {
        this.nodes.delete(key);
      }
    }
  }

  private infoFor(path: string, node: MemoryNode): FileInfo {
    return {
      name: baseName(path),
      kind: node.kind,
      mode: node.mode,
      mtime: node.mtime,
      size: node.kind === NodeKind.DIR ? 0 : node.data.length
    };
  }

  private makeNode(init: MemoryEntryInit): MemoryNode {
    const isDir = init.dir === true;
    const data = typeof init.data === 'string' ? Buffer.from(init.data, 'utf8') : (init.data ?? new Uint8Array(0));
    return {
      kind: isDir ? NodeKind.DIR : NodeKind.FILE,
      mode: init.mode ?? (isDir ? DEFAULT_DIR_MODE : DEFAULT_FILE_MODE),
      mtime: init.mtime ?? this.defaultMtime,
      data: isDir ? new Uint8Array(0) : data
    };
  }
}
