import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { WorkerError } from './errors.js';
import { findEnclosingPackage } from '../tools/packages.js';
import { StepTimer } from '../utils/timer.js';
import { sanitizeForPath } from '../utils/id.js';
import { withScratchDirectory } from '../utils/scratch.js';
import type {
  DownloadManager,
  FailedWorkerResult,
  FilingDownloadResult,
  JobMessage,
  PackageReference,
  StageName,
  UploadManager,
  WorkerFactory,
  WorkerResult,
} from './types.js';

export interface ProcessorDependencies {
  downloadManager: DownloadManager;
  uploadManager: UploadManager;
  workerFactory: WorkerFactory;
  scratchRoot: string;
  /** Highest directory the package search may test. Defaults to the invocation's scratch directory. */
  packageCeiling?: string;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function failure(job: JobMessage, error: string, logs = ''): FailedWorkerResult {
  return { filingId: job.filingId, success: false, error, logs };
}

/** Thrown internally to carry a classified failure out of a stage. */
class StageFailure extends Error {
  constructor(readonly stage: StageName, cause: unknown) {
    super(describe(cause), { cause });
  }
}

export class Processor {
  constructor(private readonly deps: ProcessorDependencies) {}

  /**
   * Processes one filing: download, package discovery, viewer generation and
   * (when that succeeds) upload. Never rejects; every failure comes back as
   * an unsuccessful {@link WorkerResult}. The viewer entrypoint reported is
   * the worker's file name; the published location is only logged.
   */
  async run(job: JobMessage, signal?: AbortSignal): Promise<WorkerResult> {
    console.log(`\n[processor] filing=${job.filingId} registry=${job.registryCode}`);
    try {
      const result = await withScratchDirectory(
        this.deps.scratchRoot,
        `filing-${sanitizeForPath(job.filingId)}-`,
        (scratch) => this.runStages(job, scratch, signal)
      );
      console.log(`[processor] done. success=${result.success}`);
      return result;
    } catch (err) {
      const result = this.classify(job, err, signal);
      console.error(`[processor] FAILED: ${result.error}`);
      return result;
    }
  }

  private async runStages(job: JobMessage, scratch: string, signal?: AbortSignal): Promise<WorkerResult> {
    const downloadDirectory = join(scratch, 'download');
    const viewerDirectory = join(scratch, 'viewer');
    await mkdir(viewerDirectory, { recursive: true });

    const download = await this.stage('download', signal, () =>
      this.deps.downloadManager.download(job, downloadDirectory, signal)
    );

    const packages = await this.stage('discover', signal, () => this.discoverPackages(download, scratch));

    const result = await this.stage('process', signal, () => {
      const worker = this.deps.workerFactory.createWorker(job, packages);
      return worker.work(job, download.documentPath, viewerDirectory, signal);
    });
    if (!result.success) {
      console.log(`  [skip] upload (${result.error})`);
      return result;
    }

    const published = await this.stage('upload', signal, () =>
      this.deps.uploadManager.upload(job, viewerDirectory, signal)
    );
    console.log(`    [upload] published ${published}`);
    return result;
  }

  private async discoverPackages(
    download: FilingDownloadResult,
    scratch: string
  ): Promise<PackageReference[]> {
    const enclosing = await findEnclosingPackage(download.documentPath, {
      ceiling: this.deps.packageCeiling ?? scratch,
    });
    const packages: PackageReference[] = enclosing ? [enclosing] : [];
    for (const path of download.taxonomyPackagePaths) {
      packages.push({ path, isArchive: true });
    }
    return packages;
  }

  private async stage<T>(name: StageName, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    const timer = new StepTimer();
    console.log(`  [run]  ${name}...`);
    try {
      signal?.throwIfAborted();
      const value = await fn();
      console.log(`  [pass] ${name} (${timer.elapsed()}ms)`);
      return value;
    } catch (err) {
      console.error(`  [FAIL] ${name} (${timer.elapsed()}ms): ${describe(err)}`);
      throw new StageFailure(name, err);
    }
  }

  private classify(job: JobMessage, err: unknown, signal?: AbortSignal): FailedWorkerResult {
    const logs = err instanceof StageFailure && err.cause instanceof WorkerError ? err.cause.logs : '';
    if (signal?.aborted) {
      return failure(job, `Processing was cancelled: ${describe(signal.reason)}`, logs);
    }
    if (!(err instanceof StageFailure)) {
      return failure(job, `Unexpected processing error: ${describe(err)}`);
    }
    switch (err.stage) {
      case 'download':
        return failure(job, `Failed to download filing: ${err.message}`);
      case 'upload':
        return failure(job, `Failed to upload viewer: ${err.message}`);
      case 'discover':
      case 'process':
        return failure(job, `Unexpected processing error: ${err.message}`, logs);
    }
  }
}
