import yazl from 'yazl';
import { readStreamToBuffer } from '../../../src/utils/streams.js';

export interface ZipFixtureEntry {
  name: string;
  content?: string;
  dir?: boolean;
  mtime?: string;
  mode?: number;
}

export async function buildZip(entries: ZipFixtureEntry[]): Promise<Buffer> {
  const zip = new yazl.ZipFile();
  for (const entry of entries) {
    const options = {
      ...(entry.mtime ? { mtime: new Date(entry.mtime) } : {}),
      ...(entry.mode !== undefined ? { mode: entry.mode } : {})
    };
    if (entry.dir) {
      zip.addEmptyDirectory(entry.name, options);
    } else {
      zip.addBuffer(Buffer.from(entry.content ?? '', 'utf8'), entry.name, options);
    }
  }
  zip.end();
  return readStreamToBuffer(zip.outputStream);
}
