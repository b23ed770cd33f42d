import { ErrorCode } from '../../types/enums.js';
import { ROOT_PATH } from '../../path/validPath.js';

export class ZipEntryError extends Error {
  readonly code: ErrorCode;
  readonly entryName: string;

  constructor(code: ErrorCode, entryName: string, message: string) {
    super(`${message}: ${entryName}`);
    this.name = 'ZipEntryError';
    this.code = code;
    this.entryName = entryName;
  }
}

export function normalizeZipPath(name: string): string {
  let normalized = name.replace(/\\/g, '/');
  if (normalized.startsWith('/')) {
    throw new ZipEntryError(ErrorCode.INVALID_PATH, name, 'Absolute zip entry path');
  }
  if (normalized.endsWith('/')) {
    normalized = normalized.slice(0, -1);
  }
  const parts: string[] = [];
  for (const part of normalized.split('/')) {
    if (part === '.') {
      continue;
    }
    if (part.length === 0) {
      if (normalized.length === 0) break;
      throw new ZipEntryError(ErrorCode.INVALID_PATH, name, 'Empty zip entry segment');
    }
    if (part === '..') {
      throw new ZipEntryError(ErrorCode.INVALID_PATH, name, 'Zip entry traversal');
    }
    parts.push(part);
  }
  return parts.length === 0 ? ROOT_PATH : parts.join('/');
}

export function zipEntryMode(versionMadeBy: number, externalFileAttributes: number, isDir: boolean): number {
  const unixMode = (externalFileAttributes >>> 16) & 0o777;
  if (versionMadeBy >>> 8 === 3 && unixMode !== 0) {
    return unixMode;
  }
  if (isDir) return 0o777;
  return (externalFileAttributes & 0x01) !== 0 ? 0o444 : 0o666;
}
