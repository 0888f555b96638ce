import { cp, mkdir, readFile, readdir } from 'node:fs/promises';
import { extname, join, posix, resolve } from 'node:path';
import { S3ObjectStore, type ObjectStore } from './object-store.js';
import { VIEWER_HTML_FILENAME } from '../engine/viewer.js';
import { sanitizeForPath } from '../utils/id.js';
import type { ProcessorOptions } from '../control-plane/options.js';
import type { JobMessage, UploadManager } from '../control-plane/types.js';

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.xhtml': 'application/xhtml+xml',
  '.js': 'text/javascript',
  '.json': 'application/json',
  '.css': 'text/css',
  '.xml': 'application/xml',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',
};

export function contentTypeFor(path: string): string {
  const ext = extname(path).toLowerCase();
  return Object.hasOwn(CONTENT_TYPES, ext) ? CONTENT_TYPES[ext] : 'application/octet-stream';
}

/** Files beneath `root` as `/`-separated relative paths, sorted. */
export async function listFilesRecursive(root: string, prefix = ''): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(join(root, prefix), { withFileTypes: true });
  for (const entry of entries) {
    const rel = prefix ? posix.join(prefix, entry.name) : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(root, rel)));
    } else if (entry.isFile()) {
      files.push(rel);
    }
  }
  return files.sort();
}

export class S3UploadManager implements UploadManager {
  private readonly objectStore: ObjectStore;
  private readonly bucket: string;

  constructor(private readonly options: ProcessorOptions, objectStore?: ObjectStore) {
    if (!options.resultsBucket) {
      throw new Error('Missing setting S3_RESULTS_BUCKET_NAME');
    }
    this.bucket = options.resultsBucket;
    this.objectStore = objectStore ?? new S3ObjectStore(options.awsRegion);
  }

  async upload(job: JobMessage, viewerDirectory: string, signal?: AbortSignal): Promise<string> {
    const files = await listFilesRecursive(viewerDirectory);
    if (files.length === 0) {
      throw new Error(`Nothing to upload for filing ${job.filingId}`);
    }
    const keyPrefix = `${this.options.resultsPrefix}${job.filingId}/`;
    for (const file of files) {
      signal?.throwIfAborted();
      const body = await readFile(join(viewerDirectory, ...file.split('/')));
      await this.objectStore.putObject(this.bucket, keyPrefix + file, body, contentTypeFor(file), signal);
    }
    console.log(`    [upload] ${files.length} file(s) to s3://${this.bucket}/${keyPrefix}`);
    return keyPrefix + VIEWER_HTML_FILENAME;
  }
}

/** Publishes the viewer into a local directory, one subdirectory per filing. */
export class LocalUploadManager implements UploadManager {
  constructor(private readonly outDir: string) {}

  async upload(job: JobMessage, viewerDirectory: string, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    const files = await listFilesRecursive(viewerDirectory);
    if (files.length === 0) {
      throw new Error(`Nothing to upload for filing ${job.filingId}`);
    }
    const target = resolve(this.outDir, sanitizeForPath(job.filingId, 128));
    await mkdir(target, { recursive: true });
    await cp(viewerDirectory, target, { recursive: true });
    console.log(`    [upload] ${files.length} file(s) to ${target}`);
    return join(target, VIEWER_HTML_FILENAME);
  }
}
