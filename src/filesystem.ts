import fs from 'node:fs';
import path from 'node:path';

/** Read-only view of the project being inspected. Paths are relative to its root. */
export interface FileSystem {
  exists(relPath: string): boolean;
  /** Throws when the file cannot be read or is not valid UTF-8. */
  readText(relPath: string): string;
}

export function createNodeFileSystem(root: string = process.cwd()): FileSystem {
  const resolve = (relPath: string) => path.resolve(root, relPath);
  const decoder = new TextDecoder('utf-8', { fatal: true });

  return {
    exists: (relPath) => fs.existsSync(resolve(relPath)),
    readText: (relPath) => decoder.decode(fs.readFileSync(resolve(relPath))),
  };
}
