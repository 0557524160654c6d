import { existsSync, statSync } from 'node:fs';
import { fileSha1 } from '../utils/hash.js';

export const PATHS_HEADER = 'Information on paths seen while diffing:';

/** One line per path: whether it exists, is a file, and what it hashes to. */
export function reportOnPaths(paths: Iterable<string>): string[] {
  const lines: string[] = [];
  for (const path of [...paths].sort()) {
    if (!existsSync(path)) {
      lines.push(` ${path} does not exist`);
      continue;
    }
    try {
      if (!statSync(path).isFile()) {
        lines.push(` ${path} is not a file`);
      } else {
        lines.push(` ${path} exists and hashes to ${fileSha1(path)}`);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      lines.push(` ${path} error hashing: ${message}`);
    }
  }
  return lines;
}
