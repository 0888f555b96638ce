import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { parseCalendarDate } from '../utils/calendar-date.js';
import { WorkerError } from '../control-plane/errors.js';
import { DEFAULT_VIEWER_URL, VIEWER_HTML_FILENAME } from '../engine/viewer.js';
import { LOG_TO_BUFFER, type DocumentModel, type ProcessingEngine, type RuntimeOptions } from '../engine/types.js';
import type {
  CalendarDate,
  JobMessage,
  PackageReference,
  Worker,
  WorkerResult,
} from '../control-plane/types.js';

export const ENGINE_FAILURE_MESSAGE =
  'Viewer generation failed within the processing engine. Check the logs for details.';
export const VIEWER_MISSING_MESSAGE =
  'Processing engine reported success but viewer was not found. Check the logs for details.';

const COMPANY_NAME_FACT = 'EntityCurrentLegalOrRegisteredName';
const COMPANY_NUMBER_FACT = 'UKCompaniesHouseRegisteredNumber';
const DOCUMENT_DATE_FACT = 'BalanceSheetDate';

export interface ViewerWorkerOptions {
  packages: readonly PackageReference[];
  viewerUrl?: string;
}

interface ViewerGenerationResult {
  success: boolean;
  logs: string;
  companyName?: string;
  companyNumber?: string;
  documentDate?: CalendarDate;
}

/**
 * First fact with the given local name, in document order. Duplicates are
 * common (the same name reported for several contexts); which one wins is
 * fixed so repeated runs agree.
 */
export function getValueByLocalName(model: DocumentModel, localName: string): string | undefined {
  const facts = model.factsByLocalName.get(localName);
  if (!facts || facts.length === 0) return undefined;
  const value = facts[0].value;
  return value.length > 0 ? value : undefined;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export class IxbrlViewerWorker implements Worker {
  constructor(
    private readonly engine: ProcessingEngine,
    private readonly options: ViewerWorkerOptions
  ) {}

  async work(
    job: JobMessage,
    documentPath: string,
    viewerDirectory: string,
    signal?: AbortSignal
  ): Promise<WorkerResult> {
    const result = await this.generateViewer(documentPath, viewerDirectory, signal);
    const facts = {
      companyName: result.companyName,
      companyNumber: result.companyNumber,
      documentDate: result.documentDate,
    };
    if (!result.success) {
      return { filingId: job.filingId, success: false, error: ENGINE_FAILURE_MESSAGE, logs: result.logs };
    }
    if (!(await fileExists(join(viewerDirectory, VIEWER_HTML_FILENAME)))) {
      return { filingId: job.filingId, success: false, error: VIEWER_MISSING_MESSAGE, logs: result.logs };
    }
    return {
      filingId: job.filingId,
      success: true,
      viewerEntrypoint: VIEWER_HTML_FILENAME,
      logs: result.logs,
      ...facts,
    };
  }

  private async generateViewer(
    documentPath: string,
    viewerDirectory: string,
    signal?: AbortSignal
  ): Promise<ViewerGenerationResult> {
    const runtimeOptions: RuntimeOptions = {
      entrypointFile: documentPath,
      packages: this.options.packages.map((pkg) => pkg.path),
      disablePersistentConfig: true,
      logFile: LOG_TO_BUFFER,
      pluginOptions: {
        saveViewerDest: viewerDirectory,
        useStubViewer: true,
        viewerNoCopyScript: true,
        viewerURL: this.options.viewerUrl ?? DEFAULT_VIEWER_URL,
      },
    };

    const session = this.engine.openSession();
    try {
      let success: boolean;
      try {
        success = await session.run(runtimeOptions, signal);
      } catch (err) {
        throw new WorkerError(err, session.getLogs({ clear: true }));
      }
      const result: ViewerGenerationResult = { success, logs: '' };
      const model = session.getModels()[0];
      if (model) {
        result.companyName = getValueByLocalName(model, COMPANY_NAME_FACT);
        result.companyNumber = getValueByLocalName(model, COMPANY_NUMBER_FACT);
        result.documentDate = parseCalendarDate(getValueByLocalName(model, DOCUMENT_DATE_FACT));
      }
      result.logs = session.getLogs({ clear: true });
      return result;
    } finally {
      await session.close();
    }
  }
}

