import { Command } from 'commander';
import { createJobMessage } from '../control-plane/job.js';
import { loadProcessorOptions } from '../control-plane/options.js';
import { Processor } from '../control-plane/processor.js';
import { toInvocationResponse } from '../control-plane/response.js';
import { MainDownloadManager } from '../tools/downloader.js';
import { LocalUploadManager } from '../tools/uploader.js';
import { MainWorkerFactory } from '../workers/factory.js';
import { generateInvocationId } from '../utils/id.js';
import type { RegistryCode } from '../control-plane/types.js';

function parseRegistry(value: string): RegistryCode {
  const code = value.toUpperCase();
  if (code !== 'CH' && code !== 'FCA') {
    throw new Error(`Unknown registry "${value}" (expected CH or FCA)`);
  }
  return code;
}

interface ProcessCommandOptions {
  url: string;
  filingId?: string;
  registry: string;
  companyNumber?: string;
  taxonomyPackage: string[];
  out: string;
  secrets?: string;
  packageCeiling?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name('filing-processor')
    .description(
      'Inline XBRL filing processor.\n\n' +
      'Downloads one filing, generates an interactive viewer, extracts the company\n' +
      'name, number and balance sheet date, and prints the result as JSON.'
    )
    .version('0.1.0');

  program
    .command('process')
    .description('Process a single filing and publish its viewer to a local directory')
    .requiredOption('--url <string>', 'Filing location: http(s)://, s3://, file:// or a local path')
    .option('--filing-id <string>', 'Filing identifier (generated when omitted)')
    .option('--registry <code>', 'Registry the filing came from: CH or FCA', 'CH')
    .option('--company-number <string>', 'Company number, if already known')
    .option('--taxonomy-package <url>', 'Taxonomy package to load (repeatable)', collect, [])
    .option('--out <path>', 'Output directory for generated viewers', './out')
    .option('--secrets <path>', 'Secrets file (defaults to $SECRETS_FILEPATH)')
    .option('--package-ceiling <path>', 'Highest directory searched for an enclosing package')
    .action(async (opts: ProcessCommandOptions) => {
      const options = await loadProcessorOptions(opts.secrets ?? process.env.SECRETS_FILEPATH);
      const job = createJobMessage({
        filingId: opts.filingId ?? generateInvocationId('filing'),
        registryCode: parseRegistry(opts.registry),
        downloadUrl: opts.url,
        companyNumber: opts.companyNumber,
        taxonomyPackageUrls: opts.taxonomyPackage,
      });

      const processor = new Processor({
        downloadManager: new MainDownloadManager(options),
        uploadManager: new LocalUploadManager(opts.out),
        workerFactory: new MainWorkerFactory(options),
        scratchRoot: options.scratchRoot,
        packageCeiling: opts.packageCeiling ?? options.packageCeiling,
      });

      const controller = new AbortController();
      const onSigint = () => controller.abort(new Error('interrupted'));
      process.once('SIGINT', onSigint);
      try {
        const response = toInvocationResponse(await processor.run(job, controller.signal));
        console.log(JSON.stringify(response, null, 2));
        if (!response.Success) process.exitCode = 2;
      } finally {
        process.off('SIGINT', onSigint);
      }
    });

  return program;
}
