import type { Readable } from 'node:stream';
import type { FileSource } from '../types/source.js';
import type { Logger } from '../logging/logger.js';

export interface ArchiveOpenOptions {
  onError?: (err: Error) => void;
  logger?: Logger;
}

export type ReadableSource = { path: string } | { buffer: Buffer } | { stream: Readable };

export interface ArchiveSource extends FileSource {
  readonly errors: readonly Error[];
  close(): Promise<void>;
}

export interface ArchiveReader {
  supports(format: string): boolean;
  open(container: ReadableSource, options?: ArchiveOpenOptions): Promise<ArchiveSource>;
}
