import fs from 'node:fs';
import path from 'node:path';
import type { FileHandle as FsFileHandle } from 'node:fs/promises';
import type { DirEntry, FileHandle, FileInfo, FileSource } from '../types/source.js';
import { ErrorCode, NodeKind, SourceOp } from '../types/enums.js';
import { SourceError } from '../errors/SourceError.js';
import { mapFsError } from '../errors/errorMapper.js';
import { ROOT_PATH, assertValidPath, baseName } from '../path/validPath.js';
import { formatInstant } from '../utils/time.js';
import { ContentHandle, ListingHandle } from './handles.js';

function kindFromStats(stat: fs.Stats): NodeKind {
  return stat.isDirectory()
    ? NodeKind.DIR
    : stat.isFile()
      ? NodeKind.FILE
      : stat.isSymbolicLink()
        ? NodeKind.SYMLINK
        : NodeKind.SPECIAL;
}

function infoFromStats(name: string, stat: fs.Stats): FileInfo {
  const kind = kindFromStats(stat);
  return {
    name,
    kind,
    mode: stat.mode & 0o777,
    mtime: formatInstant(stat.mtime),
    size: kind === NodeKind.FILE ? stat.size : 0
  };
}

export class DirectorySource implements FileSource {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async open(relPath: string): Promise<FileHandle> {
    assertValidPath(relPath);
    const osPath = this.toOsPath(relPath);
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(osPath);
    } catch (err) {
      throw mapFsError(err, SourceOp.OPEN, relPath);
    }
    const info = infoFromStats(baseName(relPath), stat);
    if (info.kind === NodeKind.DIR) {
      return new ListingHandle(relPath, info, () => this.listEntries(relPath, osPath));
    }
    if (info.kind !== NodeKind.FILE) {
      return new ContentHandle(relPath, info, async () => new Uint8Array(0));
    }
    try {
      const fd = await fs.promises.open(osPath, 'r');
      return new DescriptorHandle(relPath, info, fd);
    } catch (err) {
      throw mapFsError(err, SourceOp.OPEN, relPath);
    }
  }

  private toOsPath(relPath: string): string {
    return relPath === ROOT_PATH ? this.rootDir : path.join(this.rootDir, ...relPath.split('/'));
  }

  private async listEntries(relPath: string, osPath: string): Promise<DirEntry[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(osPath);
    } catch (err) {
      throw mapFsError(err, SourceOp.LIST, relPath);
    }
    const entries: DirEntry[] = [];
    for (const name of names) {
      const childPath = path.join(osPath, name);
      let stat: fs.Stats;
      try {
        stat = await fs.promises.stat(childPath);
      } catch (err) {
        const mapped = mapFsError(err, SourceOp.LIST, relPath);
        if (mapped.code !== ErrorCode.NOT_FOUND) throw mapped;
        // dangling link, or removed after readdir
        try {
          stat = await fs.promises.lstat(childPath);
        } catch (lstatErr) {
          const gone = mapFsError(lstatErr, SourceOp.LIST, relPath);
          if (gone.code === ErrorCode.NOT_FOUND) continue;
          throw gone;
        }
      }
      entries.push(infoFromStats(name, stat));
    }
    return entries;
  }
}

class DescriptorHandle implements FileHandle {
  private position = 0;
  private closed = false;

  constructor(
    private readonly path: string,
    private readonly info: FileInfo,
    private readonly fd: FsFileHandle
  ) {}

  async stat(): Promise<FileInfo> {
    return this.info;
  }

  async read(buffer: Uint8Array): Promise<number | null> {
    if (this.closed) {
      throw new SourceError(ErrorCode.CLOSED, 'file already closed', { op: SourceOp.READ, path: this.path });
    }
    if (buffer.length === 0) return 0;
    let bytesRead: number;
    try {
      ({ bytesRead } = await this.fd.read(buffer, 0, buffer.length, this.position));
    } catch (err) {
      throw mapFsError(err, SourceOp.READ, this.path);
    }
    if (bytesRead === 0) return null;
    this.position += bytesRead;
    return bytesRead;
  }

  async listChildren(_n?: number): Promise<DirEntry[] | null> {
    throw new SourceError(ErrorCode.NOT_DIRECTORY, 'not a directory', { op: SourceOp.LIST, path: this.path });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.fd.close();
    } catch (err) {
      throw mapFsError(err, SourceOp.CLOSE, this.path);
    }
  }
}
