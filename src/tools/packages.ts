import { dirname, relative, resolve } from 'node:path';
import { isZipFile, leavesBase } from './archive.js';
import type { PackageReference } from '../control-plane/types.js';

export interface PackageSearchOptions {
  /**
   * Highest directory the walk may test (inclusive). Without one the walk
   * runs to the filesystem root.
   */
  ceiling?: string;
}

function isWithin(path: string, ceiling: string): boolean {
  const rel = relative(ceiling, path);
  return !leavesBase(rel);
}

/**
 * Walks up from the document's parent directory and returns the nearest
 * ancestor that is itself a zip file. Ancestors that do not exist on disk
 * (the part of a virtual path beneath an archive), plain directories and
 * malformed archives are passed over.
 */
export async function findEnclosingPackage(
  documentPath: string,
  options: PackageSearchOptions = {}
): Promise<PackageReference | undefined> {
  const ceiling = options.ceiling ? resolve(options.ceiling) : undefined;
  let current = dirname(resolve(documentPath));

  for (;;) {
    if (ceiling !== undefined && !isWithin(current, ceiling)) return undefined;
    if (await isZipFile(current)) {
      return { path: current, isArchive: true };
    }
    const parent = dirname(current);
    if (parent === current) return undefined;
    current = parent;
  }
}
