export * from './types/enums.js';
export type { Instant } from './types/ids.js';
export type { DirEntry, FileHandle, FileInfo, FileSource } from './types/source.js';
export { isDirectory, toDirEntry } from './types/source.js';

export {
  SourceError,
  ShadowedPathError,
  isNotFoundError,
  notFound,
  invalidPath,
  wrapSourceError,
  type SourceErrorInit
} from './errors/SourceError.js';
export { mapFsError } from './errors/errorMapper.js';

export { ROOT_PATH, isValidPath, assertValidPath, pathPrefixes, baseName, parentPath, joinPath } from './path/validPath.js';

export { MergedFs, type MergedFsOptions } from './merge/MergedFs.js';
export { MergedDirectory } from './merge/MergedDirectory.js';
export { ShadowPrefixCache } from './merge/ShadowPrefixCache.js';
export { mergeDirEntries } from './merge/mergeEntries.js';
export { multiMerge } from './merge/multiMerge.js';

export { EmptySource } from './source/EmptySource.js';
export { MemorySource, type MemoryEntryInit, type MemorySourceOptions } from './source/MemorySource.js';
export { DirectorySource } from './source/DirectorySource.js';

export { ArchiveRegistry } from './archive/ArchiveRegistry.js';
export { guessArchiveFormat } from './archive/format.js';
export type { ArchiveOpenOptions, ArchiveReader, ArchiveSource, ReadableSource } from './archive/types.js';
export { ZipArchiveReader } from './archive/zip/ZipArchiveReader.js';
export { ZipSource, type ZipSourceOptions } from './archive/zip/ZipSource.js';
export { ZipEntryError } from './archive/zip/normalize.js';

export { readFile, readDir, statPath } from './walk/read.js';
export { walk, listTree, type WalkVisitor, type WalkVisitResult } from './walk/walk.js';
export { glob, findPaths } from './walk/find.js';
export { PathMatcher, type PathRules } from './walk/PathMatcher.js';
export { verifySource } from './walk/verify.js';

export { LOG_CATEGORY, getUnionLogger, type Logger } from './logging/logger.js';
