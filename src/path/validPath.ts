import { SourceOp } from '../types/enums.js';
import { invalidPath } from '../errors/SourceError.js';

export const ROOT_PATH = '.';

export function isValidPath(path: string): boolean {
  if (path === ROOT_PATH) return true;
  if (path.length === 0) return false;
  for (const segment of path.split('/')) {
    if (segment.length === 0 || segment === '.' || segment === '..') {
      return false;
    }
  }
  return true;
}

export function assertValidPath(path: string, op: SourceOp = SourceOp.OPEN): void {
  if (!isValidPath(path)) {
    throw invalidPath(op, path);
  }
}

export function pathPrefixes(path: string): string[] {
  if (path === ROOT_PATH) return [ROOT_PATH];
  const prefixes: string[] = [];
  let end = path.indexOf('/');
  while (end !== -1) {
    prefixes.push(path.slice(0, end));
    end = path.indexOf('/', end + 1);
  }
  prefixes.push(path);
  return prefixes;
}

export function baseName(path: string): string {
  const idx = path.lastIndexOf('/');
  return idx === -1 ? path : path.slice(idx + 1);
}

export function parentPath(path: string): string | null {
  if (path === ROOT_PATH) return null;
  const idx = path.lastIndexOf('/');
  return idx === -1 ? ROOT_PATH : path.slice(0, idx);
}

export function joinPath(dir: string, name: string): string {
  return dir === ROOT_PATH ? name : `${dir}/${name}`;
}

export function pathDepth(path: string): number {
  if (path === ROOT_PATH) return 0;
  let depth = 1;
  for (let i = 0; i < path.length; i += 1) {
    if (path[i] === '/') depth += 1;
  }
  return depth;
}
