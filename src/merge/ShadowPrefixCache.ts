import type { FileHandle, FileSource } from '../types/source.js';
import { isDirectory } from '../types/source.js';
import { SourceOp, SourceSide } from '../types/enums.js';
import { ShadowedPathError, isNotFoundError, wrapSourceError } from '../errors/SourceError.js';
import { pathPrefixes } from '../path/validPath.js';
import { closeHandle, statOpened } from './handles.js';

export class ShadowPrefixCache {
  private readonly knownOk = new Set<string>();
  private enabled: boolean;
  private generation = 0;

  constructor(enabled = true) {
    this.enabled = enabled;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  get size(): number {
    return this.knownOk.size;
  }

  get prefixes(): string[] {
    return [...this.knownOk].sort();
  }

  has(prefix: string): boolean {
    return this.knownOk.has(prefix);
  }

  setEnabled(enabled: boolean): void {
    if (!enabled) {
      this.knownOk.clear();
    }
    if (enabled !== this.enabled) {
      this.enabled = enabled;
      this.generation += 1;
    }
  }

  async validate(path: string, primary: FileSource): Promise<void> {
    if (this.isKnownOk(path)) return;
    // a toggle while this runs discards what it finds
    const generation = this.generation;
    const remember = (prefix: string) => {
      if (this.enabled && this.generation === generation) {
        this.knownOk.add(prefix);
      }
    };

    for (const prefix of pathPrefixes(path)) {
      if (this.isKnownOk(prefix)) continue;
      let handle: FileHandle;
      try {
        handle = await primary.open(prefix);
      } catch (err) {
        if (isNotFoundError(err)) {
          remember(prefix);
          remember(path);
          return;
        }
        throw wrapSourceError(err, { op: SourceOp.OPEN, path: prefix, side: SourceSide.PRIMARY });
      }
      const info = await statOpened(handle, prefix, SourceSide.PRIMARY);
      await closeHandle(handle, prefix, SourceSide.PRIMARY);
      if (!isDirectory(info)) {
        throw new ShadowedPathError(path, prefix);
      }
      remember(prefix);
    }
  }

  private isKnownOk(prefix: string): boolean {
    return this.enabled && this.knownOk.has(prefix);
  }
}
