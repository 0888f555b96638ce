import type { JobMessage, PackageReference, Worker, WorkerFactory, WorkerResult } from '../control-plane/types.js';

/**
 * Returns pre-baked results keyed by filing id. Asking for a filing that was
 * not configured is a mistake in the test and throws.
 */
export class MockWorker implements Worker {
  readonly calls: Array<{ filingId: string; documentPath: string; viewerDirectory: string }> = [];

  constructor(private readonly results: ReadonlyMap<string, WorkerResult>) {}

  async work(job: JobMessage, documentPath: string, viewerDirectory: string): Promise<WorkerResult> {
    this.calls.push({ filingId: job.filingId, documentPath, viewerDirectory });
    const result = this.results.get(job.filingId);
    if (!result) {
      throw new Error(`No mock result configured for filing ${job.filingId}`);
    }
    return result;
  }
}

export class MockWorkerFactory implements WorkerFactory {
  readonly worker: MockWorker;
  readonly packagesSeen: Array<readonly PackageReference[]> = [];

  constructor(results: Record<string, WorkerResult>) {
    this.worker = new MockWorker(new Map(Object.entries(results)));
  }

  createWorker(_job: JobMessage, packages: readonly PackageReference[]): MockWorker {
    this.packagesSeen.push(packages);
    return this.worker;
  }
}
