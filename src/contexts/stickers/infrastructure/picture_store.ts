/**
 * Picture Stores
 *
 * Local copies of uploaded images, kept under PIC_DIR when it is set.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { PictureStore } from '../application/ports.ts';

/**
 * Keeps pictures as files in one directory
 */
export class LocalPictureStore implements PictureStore {
  constructor(private directory: string) {}

  async save(name: string, data: Uint8Array): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.pathFor(name), data);
  }

  async remove(name: string): Promise<void> {
    await rm(this.pathFor(name), { force: true });
  }

  pathFor(name: string): string {
    return join(this.directory, basename(name));
  }
}

/**
 * Used when no picture directory is configured
 */
export class NullPictureStore implements PictureStore {
  async save(): Promise<void> {}

  async remove(): Promise<void> {}
}
