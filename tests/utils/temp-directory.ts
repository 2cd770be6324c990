/**
 * Scratch directories for tests that touch the real filesystem
 */

import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export interface TempDirContext {
  /** Absolute path of the directory */
  path: string;
  /** Remove the directory and everything in it */
  cleanup: () => void;
  /** Write a file (parents created), returning its absolute path */
  writeFile: (relativePath: string, content: string) => string;
  readFile: (relativePath: string) => string;
  exists: (relativePath: string) => boolean;
}

export function createTempDirContext(prefix = 'taskweave-test-'): TempDirContext {
  const root = mkdtempSync(join(tmpdir(), prefix));
  const at = (relativePath: string): string => join(root, relativePath);

  return {
    path: root,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
    writeFile: (relativePath, content) => {
      const target = at(relativePath);
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, content, 'utf-8');
      return target;
    },
    readFile: (relativePath) => readFileSync(at(relativePath), 'utf-8'),
    exists: (relativePath) => existsSync(at(relativePath)),
  };
}
