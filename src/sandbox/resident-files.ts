import { createHash } from 'node:crypto';
import type { FileData, FileEntry } from '../core/types.js';

/**
 * Digests of files already written into one sandbox. Lets a reused sandbox
 * skip uploads whose content has not changed.
 */
export class ResidentFiles {
  private digests = new Map<string, string>();

  private static digest(data: FileData): string {
    return createHash('sha256')
      .update(typeof data === 'string' ? data : Buffer.from(data))
      .digest('hex');
  }

  /** Entries not yet present with identical content. */
  pending(entries: FileEntry[]): FileEntry[] {
    return entries.filter((entry) => this.digests.get(entry.path) !== ResidentFiles.digest(entry.data));
  }

  commit(entries: FileEntry[]): void {
    for (const entry of entries) {
      this.digests.set(entry.path, ResidentFiles.digest(entry.data));
    }
  }
}
