import type yauzl from 'yauzl';
import type { Readable } from 'node:stream';
import type { DirEntry, FileHandle, FileInfo } from '../../types/source.js';
import { toDirEntry } from '../../types/source.js';
import type { ArchiveOpenOptions, ArchiveSource } from '../types.js';
import { ErrorCode, NodeKind, SourceOp } from '../../types/enums.js';
import { SourceError, notFound } from '../../errors/SourceError.js';
import { ROOT_PATH, assertValidPath, baseName, pathPrefixes } from '../../path/validPath.js';
import { EPOCH_INSTANT, formatInstant } from '../../utils/time.js';
import { getUnionLogger, type Logger } from '../../logging/logger.js';
import { ContentHandle, ListingHandle, StreamHandle } from '../../source/handles.js';
import { ZipEntryError, normalizeZipPath, zipEntryMode } from './normalize.js';

export type ZipSourceOptions = ArchiveOpenOptions;

interface ZipNode {
  info: FileInfo;
  raw?: yauzl.Entry;
  implicit: boolean;
  children: Set<string>;
}

const IMPLICIT_DIR_MODE = 0o555;

export class ZipSource implements ArchiveSource {
  private readonly nodes = new Map<string, ZipNode>();
  private readonly root: ZipNode = this.makeDir(ROOT_PATH);
  private readonly reported: Error[] = [];
  private readonly logger: Logger;
  private closed = false;

  constructor(
    private readonly zipFile: yauzl.ZipFile,
    entries: readonly yauzl.Entry[],
    private readonly options: ZipSourceOptions = {}
  ) {
    this.logger = options.logger ?? getUnionLogger('zip');
    this.nodes.set(ROOT_PATH, this.root);
    for (const entry of entries) {
      try {
        this.addEntry(entry);
      } catch (err) {
        this.report(entry.fileName, err);
      }
    }
  }

  get errors(): readonly Error[] {
    return this.reported;
  }

  async open(path: string): Promise<FileHandle> {
    assertValidPath(path);
    if (this.closed) {
      throw new SourceError(ErrorCode.CLOSED, 'archive already closed', { op: SourceOp.OPEN, path });
    }
    const node = this.nodes.get(path);
    if (!node) {
      throw notFound(SourceOp.OPEN, path);
    }
    const info = toDirEntry(node.info);
    if (info.kind === NodeKind.DIR) {
      return new ListingHandle(path, info, async () => this.listEntries(node));
    }
    const raw = node.raw;
    if (!raw) {
      return new ContentHandle(path, info, async () => new Uint8Array(0));
    }
    return new StreamHandle(path, info, () => this.openEntryStream(raw));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.zipFile.close();
  }

  private listEntries(node: ZipNode): DirEntry[] {
    const entries: DirEntry[] = [];
    for (const child of node.children) {
      const childNode = this.nodes.get(child);
      if (childNode) entries.push(toDirEntry(childNode.info));
    }
    return entries;
  }

  private openEntryStream(raw: yauzl.Entry): Promise<Readable> {
    return new Promise<Readable>((resolve, reject) => {
      this.zipFile.openReadStream(raw, (err, stream) => {
        if (err || !stream) {
          reject(err ?? new Error('Failed to open entry stream'));
          return;
        }
        resolve(stream);
      });
    });
  }

  private addEntry(entry: yauzl.Entry): void {
    const isDir = entry.fileName.endsWith('/');
    const path = normalizeZipPath(entry.fileName);
    if (path === ROOT_PATH) {
      return;
    }
    const parent = this.ensureParents(entry.fileName, path);
    const info: FileInfo = {
      name: baseName(path),
      kind: isDir ? NodeKind.DIR : NodeKind.FILE,
      mode: zipEntryMode(entry.versionMadeBy, entry.externalFileAttributes, isDir),
      mtime: formatInstant(entry.getLastModDate()),
      size: isDir ? 0 : entry.uncompressedSize
    };
    const existing = this.nodes.get(path);
    if (existing) {
      if (!(existing.implicit && isDir)) {
        throw new ZipEntryError(ErrorCode.DUPLICATE_ENTRY, entry.fileName, 'Duplicate zip entry');
      }
      existing.info = info;
      existing.implicit = false;
      return;
    }
    this.nodes.set(path, { info, raw: isDir ? undefined : entry, implicit: false, children: new Set() });
    parent.children.add(path);
  }

  private ensureParents(entryName: string, path: string): ZipNode {
    let parent = this.root;
    for (const prefix of pathPrefixes(path).slice(0, -1)) {
      const existing = this.nodes.get(prefix);
      if (existing && existing.info.kind !== NodeKind.DIR) {
        throw new ZipEntryError(ErrorCode.NOT_DIRECTORY, entryName, `Zip entry below file ${prefix}`);
      }
      const dir = existing ?? this.makeDir(prefix);
      if (!existing) {
        this.nodes.set(prefix, dir);
        parent.children.add(prefix);
      }
      parent = dir;
    }
    return parent;
  }

  private makeDir(path: string): ZipNode {
    return {
      info: { name: baseName(path), kind: NodeKind.DIR, mode: IMPLICIT_DIR_MODE, mtime: EPOCH_INSTANT, size: 0 },
      implicit: true,
      children: new Set()
    };
  }

  private report(entryName: string, err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    this.reported.push(error);
    this.logger.warn('Skipping zip entry {entry}: {reason}', { entry: entryName, reason: error.message });
    this.options.onError?.(error);
  }
}
