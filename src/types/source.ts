import type { Instant } from './ids.js';
import { NodeKind } from './enums.js';

export interface FileInfo {
  name: string;
  kind: NodeKind;
  mode: number;
  mtime: Instant;
  size: number;
}

export type DirEntry = FileInfo;

export interface FileHandle {
  stat(): Promise<FileInfo>;
  read(buffer: Uint8Array): Promise<number | null>;
  listChildren(n?: number): Promise<DirEntry[] | null>;
  close(): Promise<void>;
}

export interface FileSource {
  open(path: string): Promise<FileHandle>;
}

export function isDirectory(info: Pick<FileInfo, 'kind'>): boolean {
  return info.kind === NodeKind.DIR;
}

export function toDirEntry(info: FileInfo): DirEntry {
  return { name: info.name, kind: info.kind, mode: info.mode, mtime: info.mtime, size: info.size };
}
