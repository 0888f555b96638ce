import { InlineXbrlEngine } from '../engine/engine.js';
import type { ProcessingEngine } from '../engine/types.js';
import type { ProcessorOptions } from '../control-plane/options.js';
import type { JobMessage, PackageReference, Worker, WorkerFactory } from '../control-plane/types.js';
import { IxbrlViewerWorker } from './viewer-worker.js';

export class MainWorkerFactory implements WorkerFactory {
  constructor(
    private readonly options: ProcessorOptions,
    private readonly engine: ProcessingEngine = new InlineXbrlEngine()
  ) {}

  createWorker(job: JobMessage, packages: readonly PackageReference[]): Worker {
    switch (job.registryCode) {
      case 'CH':
      case 'FCA':
        return new IxbrlViewerWorker(this.engine, {
          packages,
          viewerUrl: this.options.viewerUrl,
        });
    }
  }
}
