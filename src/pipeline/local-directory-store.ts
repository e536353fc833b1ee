import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { PipelineError } from './errors';
import type { ObjectLocation, ObjectStore } from './object-store';

/**
 * Keeps objects as files under `rootDir/<bucket>/<key>`.
 * Used to stage chunks on disk before uploading them by other means.
 */
export class LocalDirectoryStore implements ObjectStore {
  constructor(private readonly rootDir: string) {}

  async getText(location: ObjectLocation): Promise<string> {
    return readFile(this.resolve(location), 'utf-8');
  }

  async putText(location: ObjectLocation, body: string, _contentType: string): Promise<void> {
    const target = this.resolve(location);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, body, 'utf-8');
  }

  private resolve({ bucket, key }: ObjectLocation): string {
    const root = path.resolve(this.rootDir);
    const target = path.resolve(root, bucket, key);
    if (!target.startsWith(root + path.sep)) {
      throw new PipelineError(`Key ${bucket}/${key} escapes ${root}`, 'INVALID_KEY');
    }
    return target;
  }
}
