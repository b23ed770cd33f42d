import yauzl from 'yauzl';
import type { ArchiveOpenOptions, ArchiveReader, ReadableSource } from '../types.js';
import { readStreamToBuffer } from '../../utils/streams.js';
import { ZipSource } from './ZipSource.js';

const ZIP_OPTIONS: yauzl.Options = { lazyEntries: true, decodeStrings: true, autoClose: false };

function settle(resolve: (zipFile: yauzl.ZipFile) => void, reject: (err: Error) => void) {
  return (err: Error | null, zipFile?: yauzl.ZipFile): void => {
    if (err || !zipFile) {
      reject(err ?? new Error('Failed to open zip'));
    } else {
      resolve(zipFile);
    }
  };
}

export class ZipArchiveReader implements ArchiveReader {
  supports(format: string): boolean {
    return format.toLowerCase() === 'zip';
  }

  async open(container: ReadableSource, options: ArchiveOpenOptions = {}): Promise<ZipSource> {
    const zipFile = await this.openZip(container);
    try {
      const entries = await this.collectEntries(zipFile);
      return new ZipSource(zipFile, entries, options);
    } catch (err) {
      zipFile.close();
      throw err;
    }
  }

  private async openZip(container: ReadableSource): Promise<yauzl.ZipFile> {
    if ('path' in container) {
      return new Promise((resolve, reject) => yauzl.open(container.path, ZIP_OPTIONS, settle(resolve, reject)));
    }
    const buffer = 'buffer' in container ? container.buffer : await readStreamToBuffer(container.stream);
    return new Promise((resolve, reject) => yauzl.fromBuffer(buffer, ZIP_OPTIONS, settle(resolve, reject)));
  }

  private async collectEntries(zipFile: yauzl.ZipFile): Promise<yauzl.Entry[]> {
    const entries: yauzl.Entry[] = [];
    await new Promise<void>((resolve, reject) => {
      zipFile.on('entry', (entry: yauzl.Entry) => {
        entries.push(entry);
        zipFile.readEntry();
      });
      zipFile.on('end', () => resolve());
      zipFile.on('error', (err) => reject(err));
      zipFile.readEntry();
    });
    return entries;
  }
}
