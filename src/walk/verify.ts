import type { DirEntry, FileInfo, FileSource } from '../types/source.js';
import { NodeKind } from '../types/enums.js';
import { ROOT_PATH, joinPath } from '../path/validPath.js';
import { utf8ByteCompare } from '../utils/utf8.js';
import { readFile } from './read.js';

const COMPARED_FIELDS = ['name', 'kind', 'mode', 'mtime', 'size'] as const;

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function verifySource(source: FileSource, expected: readonly string[] = []): Promise<string[]> {
  const problems: string[] = [];
  const seen = new Set<string>();

  const statDirect = async (path: string): Promise<FileInfo | null> => {
    try {
      const handle = await source.open(path);
      try {
        return await handle.stat();
      } finally {
        await handle.close();
      }
    } catch (err) {
      problems.push(`${path}: ${describeError(err)}`);
      return null;
    }
  };

  const listPaged = async (path: string): Promise<string[] | null> => {
    const handle = await source.open(path);
    const names: string[] = [];
    try {
      for (;;) {
        const page = await handle.listChildren(1);
        if (page === null) break;
        if (page.length === 0) {
          problems.push(`${path}: paginated listing returned an empty page before the end`);
          break;
        }
        names.push(...page.map((entry) => entry.name));
      }
    } finally {
      await handle.close();
    }
    return names;
  };

  const checkFile = async (path: string, info: FileInfo): Promise<void> => {
    try {
      const content = await readFile(source, path);
      if (content.length !== info.size) {
        problems.push(`${path}: size ${info.size} but read ${content.length} bytes`);
      }
    } catch (err) {
      problems.push(`${path}: ${describeError(err)}`);
    }
  };

  const checkDir = async (path: string): Promise<DirEntry[]> => {
    let entries: DirEntry[];
    try {
      const handle = await source.open(path);
      try {
        entries = (await handle.listChildren(-1)) ?? [];
      } finally {
        await handle.close();
      }
      const paged = await listPaged(path);
      const names = entries.map((entry) => entry.name);
      if (paged && paged.join('\n') !== names.join('\n')) {
        problems.push(`${path}: paginated listing [${paged.join(', ')}] differs from full listing [${names.join(', ')}]`);
      }
    } catch (err) {
      problems.push(`${path}: ${describeError(err)}`);
      return [];
    }
    for (let i = 1; i < entries.length; i += 1) {
      if (utf8ByteCompare(entries[i - 1].name, entries[i].name) >= 0) {
        problems.push(`${path}: listing not sorted or has duplicate at ${entries[i].name}`);
      }
    }
    return entries;
  };

  const visit = async (path: string, info: FileInfo): Promise<void> => {
    seen.add(path);
    if (info.kind === NodeKind.FILE) {
      await checkFile(path, info);
      return;
    }
    if (info.kind !== NodeKind.DIR) return;
    for (const entry of await checkDir(path)) {
      const childPath = joinPath(path, entry.name);
      const direct = await statDirect(childPath);
      if (!direct) continue;
      for (const field of COMPARED_FIELDS) {
        if (entry[field] !== direct[field]) {
          problems.push(`${childPath}: listing reports ${field} ${String(entry[field])}, open reports ${String(direct[field])}`);
        }
      }
      await visit(childPath, direct);
    }
  };

  const root = await statDirect(ROOT_PATH);
  if (root) {
    if (root.kind !== NodeKind.DIR) {
      problems.push(`${ROOT_PATH}: root is not a directory`);
    }
    await visit(ROOT_PATH, root);
  }
  for (const path of expected) {
    if (!seen.has(path)) {
      problems.push(`${path}: expected but not found`);
    }
  }
  return problems;
}
