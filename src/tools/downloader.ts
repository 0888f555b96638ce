import { copyFile, mkdir, writeFile } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { listFileEntries, openArchive } from './archive.js';
import { S3ObjectStore, parseS3Url, type ObjectStore } from './object-store.js';
import { sanitizeForPath } from '../utils/id.js';
import type { ProcessorOptions } from '../control-plane/options.js';
import type { DownloadManager, FilingDownloadResult, JobMessage } from '../control-plane/types.js';

const DOCUMENT_EXTENSIONS = ['.xhtml', '.html', '.htm'];
const TAXONOMY_PACKAGE_DIR = 'taxonomy-packages';

function fileNameFromSource(source: string, fallback: string): string {
  const withoutQuery = source.split(/[?#]/)[0];
  const name = basename(withoutQuery);
  if (!name) return fallback;
  const ext = extname(name);
  return sanitizeForPath(name.slice(0, name.length - ext.length), 80) + ext.replace(/[^a-zA-Z0-9.]/g, '');
}

/**
 * Picks the entry document of a package: the first html/xhtml file in
 * archive order outside META-INF.
 */
export function selectPackageDocument(entries: readonly string[]): string | undefined {
  return entries.find((name) => {
    if (name.startsWith('META-INF/') || name.includes('/META-INF/')) return false;
    const lower = name.toLowerCase();
    return DOCUMENT_EXTENSIONS.some((ext) => lower.endsWith(ext));
  });
}

/**
 * Returns the path the engine should open for a downloaded file: the file
 * itself, or `<archive>/<entry>` when the download is a package.
 */
export async function resolveDocumentPath(downloadPath: string): Promise<string> {
  const zip = await openArchive(downloadPath);
  if (!zip) return downloadPath;
  const entry = selectPackageDocument(listFileEntries(zip));
  if (!entry) {
    throw new Error(`No inline XBRL document found in package ${basename(downloadPath)}`);
  }
  return join(downloadPath, ...entry.split('/'));
}

export class MainDownloadManager implements DownloadManager {
  private objectStore?: ObjectStore;

  constructor(
    private readonly options: ProcessorOptions,
    objectStore?: ObjectStore
  ) {
    this.objectStore = objectStore;
  }

  async download(
    job: JobMessage,
    directory: string,
    signal?: AbortSignal
  ): Promise<FilingDownloadResult> {
    await mkdir(directory, { recursive: true });

    const downloadPath = join(directory, fileNameFromSource(job.downloadUrl, 'filing'));
    await this.fetchTo(job, job.downloadUrl, downloadPath, signal);
    console.log(`    [download] ${job.downloadUrl} -> ${downloadPath}`);
    const documentPath = await resolveDocumentPath(downloadPath);

    const taxonomyPackagePaths: string[] = [];
    if (job.taxonomyPackageUrls.length > 0) {
      const packageDir = join(directory, TAXONOMY_PACKAGE_DIR);
      await mkdir(packageDir, { recursive: true });
      for (const [index, url] of job.taxonomyPackageUrls.entries()) {
        const name = `${String(index + 1).padStart(2, '0')}-${fileNameFromSource(url, 'package.zip')}`;
        const target = join(packageDir, name);
        await this.fetchTo(job, url, target, signal);
        taxonomyPackagePaths.push(target);
      }
      console.log(`    [download] ${taxonomyPackagePaths.length} taxonomy package(s)`);
    }

    return { downloadPath, documentPath, taxonomyPackagePaths };
  }

  private async fetchTo(
    job: JobMessage,
    source: string,
    target: string,
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();
    if (/^https?:\/\//i.test(source)) {
      await writeFile(target, await this.httpGet(job, source, signal));
    } else if (source.startsWith('s3://')) {
      const { bucket, key } = parseS3Url(source);
      await writeFile(target, await this.getObjectStore().getObject(bucket, key, signal));
    } else {
      const localPath = source.startsWith('file://') ? fileURLToPath(source) : resolve(source);
      await copyFile(localPath, target);
    }
  }

  private async httpGet(job: JobMessage, url: string, signal?: AbortSignal): Promise<Buffer> {
    const headers: Record<string, string> = { 'User-Agent': this.options.httpUserAgent };
    const apiKey = this.options.companiesHouseRestApiKey;
    if (job.registryCode === 'CH' && apiKey) {
      headers.Authorization = `Basic ${Buffer.from(`${apiKey}:`).toString('base64')}`;
    }
    const res = await fetch(url, { headers, signal });
    if (!res.ok) {
      throw new Error(`Download failed: ${res.status} ${res.statusText} for ${url}`);
    }
    return Buffer.from(await res.arrayBuffer());
  }

  private getObjectStore(): ObjectStore {
    if (!this.objectStore) {
      this.objectStore = new S3ObjectStore(this.options.awsRegion);
    }
    return this.objectStore;
  }
}
