import type { FileInfo, FileSource } from '../types/source.js';
import { NodeKind } from '../types/enums.js';
import { ROOT_PATH, joinPath } from '../path/validPath.js';
import { utf8ByteCompare } from '../utils/utf8.js';
import { readDir, statPath } from './read.js';

export type WalkVisitResult = 'skip' | void;
export type WalkVisitor = (path: string, info: FileInfo) => WalkVisitResult | Promise<WalkVisitResult>;

export async function walk(source: FileSource, root: string, visit: WalkVisitor): Promise<void> {
  const info = await statPath(source, root);
  await visitNode(source, root, info, visit);
}

async function visitNode(source: FileSource, path: string, info: FileInfo, visit: WalkVisitor): Promise<void> {
  const result = await visit(path, info);
  if (result === 'skip' || info.kind !== NodeKind.DIR) return;
  const entries = await readDir(source, path);
  entries.sort((a, b) => utf8ByteCompare(a.name, b.name));
  for (const entry of entries) {
    await visitNode(source, joinPath(path, entry.name), entry, visit);
  }
}

export async function listTree(source: FileSource, root: string = ROOT_PATH): Promise<string[]> {
  const paths: string[] = [];
  await walk(source, root, (path) => {
    if (path !== root) paths.push(path);
  });
  return paths;
}
