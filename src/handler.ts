import { loadProcessorOptions, type ProcessorOptions } from './control-plane/options.js';
import { parseJobMessage } from './control-plane/job.js';
import { Processor } from './control-plane/processor.js';
import { toInvocationResponse } from './control-plane/response.js';
import { MainDownloadManager } from './tools/downloader.js';
import { S3UploadManager } from './tools/uploader.js';
import { MainWorkerFactory } from './workers/factory.js';
import type { InvocationResponse, UploadManager } from './control-plane/types.js';

const DEADLINE_MARGIN_MS = 1_000;

export interface InvocationContext {
  awsRequestId?: string;
  getRemainingTimeInMillis?: () => number;
  signal?: AbortSignal;
}

export interface HandlerDependencies {
  loadOptions?: (secretsFilepath?: string) => Promise<ProcessorOptions>;
  createUploadManager?: (options: ProcessorOptions) => UploadManager;
}

/** Combines the platform deadline and any caller-supplied signal. */
export function invocationSignal(context: InvocationContext = {}): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (context.signal) signals.push(context.signal);
  if (context.getRemainingTimeInMillis) {
    const remaining = context.getRemainingTimeInMillis() - DEADLINE_MARGIN_MS;
    signals.push(AbortSignal.timeout(Math.max(remaining, 0)));
  }
  if (signals.length === 0) return undefined;
  return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
}

export function createHandler(deps: HandlerDependencies = {}) {
  const loadOptions = deps.loadOptions ?? loadProcessorOptions;
  const createUploadManager =
    deps.createUploadManager ?? ((options: ProcessorOptions) => new S3UploadManager(options));

  return async function handler(
    event: unknown,
    context: InvocationContext = {}
  ): Promise<InvocationResponse> {
    const parsed = parseJobMessage(event);
    if (!parsed.ok) {
      console.error(`[handler] ${parsed.error}`);
      return toInvocationResponse({ filingId: parsed.filingId, success: false, error: parsed.error, logs: '' });
    }
    const { job } = parsed;

    let processor: Processor;
    try {
      const options = await loadOptions(process.env.SECRETS_FILEPATH);
      processor = new Processor({
        downloadManager: new MainDownloadManager(options),
        uploadManager: createUploadManager(options),
        workerFactory: new MainWorkerFactory(options),
        scratchRoot: options.scratchRoot,
        packageCeiling: options.packageCeiling,
      });
    } catch (err) {
      const message = `Failed to configure processor: ${err instanceof Error ? err.message : String(err)}`;
      console.error(`[handler] ${message}`);
      return toInvocationResponse({ filingId: job.filingId, success: false, error: message, logs: '' });
    }

    if (context.awsRequestId) {
      console.log(`[handler] request=${context.awsRequestId}`);
    }
    const result = await processor.run(job, invocationSignal(context));
    return toInvocationResponse(result);
  };
}

export const handler = createHandler();
