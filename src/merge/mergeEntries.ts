import type { DirEntry } from '../types/source.js';
import { isDirectory } from '../types/source.js';
import { ErrorCode, NodeKind, SourceOp } from '../types/enums.js';
import { SourceError } from '../errors/SourceError.js';
import { utf8ByteCompare } from '../utils/utf8.js';
import { latestInstant } from '../utils/time.js';

export function reconcileDirEntry(primary: DirEntry, secondary: DirEntry): DirEntry {
  return {
    name: primary.name,
    kind: NodeKind.DIR,
    mode: primary.mode,
    mtime: latestInstant(primary.mtime, secondary.mtime),
    size: 0
  };
}

export function mergeDirEntries(primary: readonly DirEntry[], secondary: readonly DirEntry[]): DirEntry[] {
  const positions = new Map<string, number>();
  const merged: DirEntry[] = [];

  for (const entry of primary) {
    if (positions.has(entry.name)) {
      throw new SourceError(ErrorCode.DUPLICATE_ENTRY, 'duplicate name in primary listing', { op: SourceOp.LIST, path: entry.name });
    }
    positions.set(entry.name, merged.length);
    merged.push(entry);
  }

  for (const entry of secondary) {
    const existingIndex = positions.get(entry.name);
    if (existingIndex === undefined) {
      positions.set(entry.name, merged.length);
      merged.push(entry);
      continue;
    }
    const existing = merged[existingIndex];
    if (!(isDirectory(existing) && isDirectory(entry))) {
      continue;
    }
    merged[existingIndex] = reconcileDirEntry(existing, entry);
  }

  merged.sort((a, b) => utf8ByteCompare(a.name, b.name));
  return merged;
}
