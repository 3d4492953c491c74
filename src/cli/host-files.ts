// Sandbay Host Files - Read `--file` arguments for upload into the sandbox

import { readFileSync } from 'node:fs';
import { basename } from 'node:path';

/**
 * Host files keyed by base name; they land in the sandbox working directory.
 * Two paths with the same base name are rejected rather than overwriting one another.
 */
export function readHostFiles(paths: string[]): Record<string, string> {
  const files: Record<string, string> = {};
  const sources = new Map<string, string>();

  for (const path of paths) {
    const name = basename(path);
    const previous = sources.get(name);
    if (previous !== undefined) {
      throw new Error(`--file ${path} and ${previous} would both upload as "${name}"`);
    }
    sources.set(name, path);
    files[name] = readFileSync(path, 'utf-8');
  }
  return files;
}
