/**
 * Document Source
 * Supplies raw document bytes addressed by bucket and key.
 */

import { readFile } from 'fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'path';

export interface DocumentSource {
  getObject(bucket: string, key: string): Promise<Uint8Array>;
}

/**
 * Reads objects from a local directory tree: `<rootDir>/<bucket>/<key>`.
 */
export class FileSystemDocumentSource implements DocumentSource {
  private rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  resolvePath(bucket: string, key: string): string {
    const fullPath = resolve(join(this.rootDir, bucket, key));
    const rel = relative(this.rootDir, fullPath);
    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new Error(`Object path escapes the document root: ${bucket}/${key}`);
    }
    return fullPath;
  }

  async getObject(bucket: string, key: string): Promise<Uint8Array> {
    const buffer = await readFile(this.resolvePath(bucket, key));
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }
}
