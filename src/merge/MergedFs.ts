import type { DirEntry, FileHandle, FileInfo, FileSource } from '../types/source.js';
import { isDirectory } from '../types/source.js';
import { SourceOp, SourceSide } from '../types/enums.js';
import { ShadowedPathError, isNotFoundError, wrapSourceError } from '../errors/SourceError.js';
import { assertValidPath, baseName } from '../path/validPath.js';
import { latestInstant } from '../utils/time.js';
import { getUnionLogger, type Logger } from '../logging/logger.js';
import { MergedDirectory } from './MergedDirectory.js';
import { ShadowPrefixCache } from './ShadowPrefixCache.js';
import { mergeDirEntries } from './mergeEntries.js';
import { closeAfterFailure, closeHandle, listAll, statOpened } from './handles.js';

export interface MergedFsOptions {
  pathCaching?: boolean;
  logger?: Logger;
}

export class MergedFs implements FileSource {
  private readonly cache: ShadowPrefixCache;
  private readonly logger: Logger;

  constructor(
    readonly primary: FileSource,
    readonly secondary: FileSource,
    options: MergedFsOptions = {}
  ) {
    this.cache = new ShadowPrefixCache(options.pathCaching ?? true);
    this.logger = options.logger ?? getUnionLogger('merged');
  }

  get prefixCache(): ShadowPrefixCache {
    return this.cache;
  }

  setPathCaching(enabled: boolean): void {
    this.cache.setEnabled(enabled);
    this.logger.debug('Path caching {state}', { state: enabled ? 'enabled' : 'disabled' });
  }

  async open(path: string): Promise<FileHandle> {
    assertValidPath(path);

    let primaryHandle: FileHandle;
    try {
      primaryHandle = await this.primary.open(path);
    } catch (err) {
      if (!isNotFoundError(err)) {
        throw wrapSourceError(err, { op: SourceOp.OPEN, path, side: SourceSide.PRIMARY });
      }
      return this.openBelowPrimary(path);
    }

    const primaryInfo = await statOpened(primaryHandle, path, SourceSide.PRIMARY);
    if (!isDirectory(primaryInfo)) {
      return primaryHandle;
    }

    let secondaryHandle: FileHandle;
    try {
      secondaryHandle = await this.secondary.open(path);
    } catch (err) {
      if (isNotFoundError(err)) {
        return primaryHandle;
      }
      throw await closeAfterFailure(primaryHandle, wrapSourceError(err, { op: SourceOp.OPEN, path, side: SourceSide.SECONDARY }));
    }

    let secondaryInfo: FileInfo;
    try {
      secondaryInfo = await statOpened(secondaryHandle, path, SourceSide.SECONDARY);
    } catch (err) {
      throw await closeAfterFailure(primaryHandle, err);
    }
    if (!isDirectory(secondaryInfo)) {
      try {
        await closeHandle(secondaryHandle, path, SourceSide.SECONDARY);
      } catch (err) {
        throw await closeAfterFailure(primaryHandle, err);
      }
      return primaryHandle;
    }

    return this.mergeDirectories(path, primaryHandle, primaryInfo, secondaryHandle, secondaryInfo);
  }

  private async openBelowPrimary(path: string): Promise<FileHandle> {
    try {
      await this.cache.validate(path, this.primary);
    } catch (err) {
      if (err instanceof ShadowedPathError) {
        this.logger.debug('{path} is shadowed by {blockedBy} in primary', { path, blockedBy: err.blockedBy });
      }
      throw err;
    }
    this.logger.debug('Falling back to secondary for {path}', { path });
    return this.secondary.open(path);
  }

  private async mergeDirectories(
    path: string,
    primaryHandle: FileHandle,
    primaryInfo: FileInfo,
    secondaryHandle: FileHandle,
    secondaryInfo: FileInfo
  ): Promise<MergedDirectory> {
    let merged: MergedDirectory;
    let count = 0;
    try {
      const primaryEntries = await listAll(primaryHandle, path, SourceSide.PRIMARY);
      const secondaryEntries = await listAll(secondaryHandle, path, SourceSide.SECONDARY);
      let entries: DirEntry[];
      try {
        entries = mergeDirEntries(primaryEntries, secondaryEntries);
      } catch (err) {
        throw wrapSourceError(err, { op: SourceOp.LIST, path, side: SourceSide.PRIMARY });
      }
      count = entries.length;
      merged = new MergedDirectory(baseName(path), primaryInfo.mode, latestInstant(primaryInfo.mtime, secondaryInfo.mtime), entries);
    } catch (err) {
      throw await closeAfterFailure(secondaryHandle, await closeAfterFailure(primaryHandle, err));
    }

    try {
      await closeHandle(primaryHandle, path, SourceSide.PRIMARY);
    } catch (err) {
      throw await closeAfterFailure(secondaryHandle, err);
    }
    await closeHandle(secondaryHandle, path, SourceSide.SECONDARY);

    this.logger.debug('Merged directory {path} with {count} entries', { path, count });
    return merged;
  }
}
