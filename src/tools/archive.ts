import { readFile, stat } from 'node:fs/promises';
import { isAbsolute, relative, sep } from 'node:path';
import JSZip from 'jszip';

export interface ArchiveLocation {
  archivePath: string;
  /** Entry name inside the archive, always `/`-separated. */
  entryName: string;
}

/**
 * Opens `path` as a zip container. Anything that is not a regular file or
 * does not parse as a zip yields `null`.
 */
export async function openArchive(path: string): Promise<JSZip | null> {
  try {
    const info = await stat(path);
    if (!info.isFile()) return null;
  } catch {
    return null;
  }
  try {
    return await JSZip.loadAsync(await readFile(path));
  } catch {
    return null;
  }
}

export async function isZipFile(path: string): Promise<boolean> {
  return (await openArchive(path)) !== null;
}

/** File entries in archive order, directories excluded. */
export function listFileEntries(zip: JSZip): string[] {
  return Object.values(zip.files)
    .filter((entry) => !entry.dir)
    .map((entry) => entry.name);
}

/** True when a `path.relative` result points outside its base directory. */
export function leavesBase(rel: string): boolean {
  return rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel);
}

/**
 * Splits a virtual path such as `/tmp/filing.zip/accounts.xhtml` into the
 * archive it lives in and the entry name, using the first matching archive.
 */
export function locateInArchives(
  path: string,
  archivePaths: readonly string[]
): ArchiveLocation | undefined {
  for (const archivePath of archivePaths) {
    const rel = relative(archivePath, path);
    if (rel.length === 0 || leavesBase(rel)) continue;
    return { archivePath, entryName: rel.split(sep).join('/') };
  }
  return undefined;
}

export async function readArchiveEntry(location: ArchiveLocation): Promise<string> {
  const zip = await openArchive(location.archivePath);
  if (!zip) {
    throw new Error(`Not a readable archive: ${location.archivePath}`);
  }
  const entry = zip.file(location.entryName);
  if (!entry) {
    throw new Error(`Entry "${location.entryName}" not found in ${location.archivePath}`);
  }
  return entry.async('string');
}
