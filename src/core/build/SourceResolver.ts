/**
 * Resolves a configured module path against the ordered source roots
 *
 * Roots are the main source directory followed by `<submodule>/src` for each
 * configured submodule. The first root holding the file wins.
 */

import { statSync } from 'fs';
import path from 'path';

export interface ResolvedSource {
  /** Absolute or cwd-relative path of the source file */
  path: string;
  root: string;
  rootIndex: number;
}

export type ExistsCheck = (filePath: string) => boolean;

export const isRegularFile: ExistsCheck = (filePath) => {
  try {
    return statSync(filePath).isFile();
  } catch {
    return false;
  }
};

export function sourceRoots(srcDir: string, submodules: readonly string[]): string[] {
  return [srcDir, ...submodules.map(sub => path.join(sub, 'src'))];
}

export function resolveSource(
  relPath: string,
  roots: readonly string[],
  exists: ExistsCheck = isRegularFile
): ResolvedSource | null {
  for (let i = 0; i < roots.length; i++) {
    const candidate = path.join(roots[i], relPath);
    if (exists(candidate)) {
      return { path: candidate, root: roots[i], rootIndex: i };
    }
  }
  return null;
}
