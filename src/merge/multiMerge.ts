import type { FileSource } from '../types/source.js';
import { EmptySource } from '../source/EmptySource.js';
import { MergedFs, type MergedFsOptions } from './MergedFs.js';

export function multiMerge(sources: readonly FileSource[], options: MergedFsOptions = {}): FileSource {
  if (sources.length === 0) {
    return new EmptySource();
  }
  let merged = sources[sources.length - 1];
  for (let i = sources.length - 2; i >= 0; i -= 1) {
    merged = new MergedFs(sources[i], merged, options);
  }
  return merged;
}
