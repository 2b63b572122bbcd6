import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { logger } from '../logger.js';

export interface BlobStore {
  /** Persists the bytes and returns a reference to them. */
  put(bytes: Uint8Array, suggestedName: string): Promise<string>;
}

export function sanitizeFileName(name: string): string {
  const cleaned = name
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^[._]+/, '');
  return cleaned.length > 0 ? cleaned : 'output.bin';
}

export class LocalBlobStore implements BlobStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async put(bytes: Uint8Array, suggestedName: string): Promise<string> {
    await mkdir(this.root, { recursive: true });
    // Prefix keeps concurrent writes with the same suggested name apart
    const fileName = `${randomUUID().slice(0, 8)}-${sanitizeFileName(suggestedName)}`;
    const filePath = join(this.root, fileName);
    await writeFile(filePath, bytes);

    logger.info({ filePath, sizeMb: (bytes.byteLength / 1024 / 1024).toFixed(2) }, 'Stored generated asset');
    return filePath;
  }
}
