import { describe, it, expect, beforeEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { findEnclosingPackage } from '../tools/packages.js';
import { isZipFile, locateInArchives } from '../tools/archive.js';
import { makeTempDir, sampleDocument, writeZip } from './fixtures.js';

describe('findEnclosingPackage', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('packages');
  });

  it('returns the archive a virtual document path sits beneath', async () => {
    const zipPath = join(root, 'a', 'b.zip');
    await mkdir(join(root, 'a'), { recursive: true });
    await writeZip(zipPath, { 'c/doc.xhtml': sampleDocument() });

    const found = await findEnclosingPackage(join(zipPath, 'c', 'doc.xhtml'), { ceiling: root });
    expect(found).toEqual({ path: zipPath, isArchive: true });
  });

  it('walks past plain directories', async () => {
    const zipPath = join(root, 'pkg.zip');
    await writeZip(zipPath, { 'x/y/z/doc.xhtml': sampleDocument() });

    const found = await findEnclosingPackage(join(zipPath, 'x', 'y', 'z', 'doc.xhtml'), { ceiling: root });
    expect(found?.path).toBe(zipPath);
  });

  it('walks to the filesystem root without a ceiling', async () => {
    const docDir = join(root, 'plain');
    await mkdir(docDir, { recursive: true });

    expect(await findEnclosingPackage(join(docDir, 'doc.xhtml'))).toBeUndefined();
  });

  it('returns undefined when no ancestor is an archive', async () => {
    const docDir = join(root, 'plain', 'dir');
    await mkdir(docDir, { recursive: true });
    await writeFile(join(docDir, 'doc.xhtml'), sampleDocument(), 'utf-8');

    expect(await findEnclosingPackage(join(docDir, 'doc.xhtml'), { ceiling: root })).toBeUndefined();
  });

  it('treats a malformed archive as not a package and keeps walking', async () => {
    const bad = join(root, 'bad.zip');
    await writeFile(bad, 'PK this is not really a zip', 'utf-8');

    expect(await findEnclosingPackage(join(bad, 'doc.xhtml'), { ceiling: root })).toBeUndefined();
  });

  it('does not test ancestors above the ceiling', async () => {
    const zipPath = join(root, 'pkg.zip');
    await writeZip(zipPath, { 'sub/doc.xhtml': sampleDocument() });

    const ceiling = join(zipPath, 'sub');
    expect(await findEnclosingPackage(join(ceiling, 'doc.xhtml'), { ceiling })).toBeUndefined();
  });

  it('finds an archive whose name starts with two dots', async () => {
    const zipPath = join(root, '..pkg.zip');
    await writeZip(zipPath, { 'doc.xhtml': sampleDocument() });

    const found = await findEnclosingPackage(join(zipPath, 'doc.xhtml'), { ceiling: root });
    expect(found).toEqual({ path: zipPath, isArchive: true });
  });

  it('tests the ceiling itself', async () => {
    const zipPath = join(root, 'pkg.zip');
    await writeZip(zipPath, { 'doc.xhtml': sampleDocument() });

    const found = await findEnclosingPackage(join(zipPath, 'doc.xhtml'), { ceiling: zipPath });
    expect(found?.path).toBe(zipPath);
  });
});

describe('archive helpers', () => {
  it('does not treat a directory as a zip file', async () => {
    const root = await makeTempDir('archive');
    expect(await isZipFile(root)).toBe(false);
  });

  it('splits a virtual path into archive and entry', () => {
    expect(locateInArchives('/data/filing.zip/accounts/doc.xhtml', ['/other.zip', '/data/filing.zip'])).toEqual({
      archivePath: '/data/filing.zip',
      entryName: 'accounts/doc.xhtml',
    });
  });

  it('accepts an entry whose name starts with two dots', () => {
    expect(locateInArchives('/data/filing.zip/..notes.xhtml', ['/data/filing.zip'])).toEqual({
      archivePath: '/data/filing.zip',
      entryName: '..notes.xhtml',
    });
  });

  it('does not match a path above the archive', () => {
    expect(locateInArchives('/data/doc.xhtml', ['/data/filing.zip'])).toBeUndefined();
  });

  it('does not match a sibling path that shares a prefix', () => {
    expect(locateInArchives('/data/filing.zip2/doc.xhtml', ['/data/filing.zip'])).toBeUndefined();
  });
});
