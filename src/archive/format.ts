import { baseName } from '../path/validPath.js';

export function guessArchiveFormat(path: string): string {
  const name = baseName(path);
  const idx = name.lastIndexOf('.');
  if (idx <= 0) return '';
  return name.slice(idx + 1).toLowerCase();
}
