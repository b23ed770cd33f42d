import type { FileSource } from '../types/source.js';
import type { ArchiveOpenOptions, ArchiveReader, ArchiveSource, ReadableSource } from './types.js';
import { guessArchiveFormat } from './format.js';
import { readFile } from '../walk/read.js';

export class ArchiveRegistry {
  private readonly readers: ArchiveReader[];

  constructor(readers: ArchiveReader[]) {
    this.readers = readers;
  }

  getReader(format: string): ArchiveReader | undefined {
    return this.readers.find((reader) => reader.supports(format));
  }

  async open(container: ReadableSource, format?: string, options?: ArchiveOpenOptions): Promise<ArchiveSource> {
    const effective = format ?? ('path' in container ? guessArchiveFormat(container.path) : '');
    const reader = this.getReader(effective);
    if (!reader) {
      throw new Error(`Unsupported archive format: ${effective || '(none)'}`);
    }
    return reader.open(container, options);
  }

  async openWithin(source: FileSource, path: string, options?: ArchiveOpenOptions): Promise<ArchiveSource> {
    const format = guessArchiveFormat(path);
    if (!this.getReader(format)) {
      throw new Error(`Unsupported archive format: ${format || '(none)'}`);
    }
    const buffer = await readFile(source, path);
    return this.open({ buffer }, format, options);
  }
}
