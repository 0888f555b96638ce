export type RegistryCode = 'CH' | 'FCA';

export interface JobMessage {
  readonly filingId: string;
  readonly registryCode: RegistryCode;
  readonly downloadUrl: string;
  readonly companyNumber?: string;
  readonly externalFilingId?: string;
  readonly taxonomyPackageUrls: readonly string[];
}

export interface FilingDownloadResult {
  /** Local file the download was written to (a document or a package). */
  downloadPath: string;
  /**
   * Entry document. When the download is a package this is a virtual path
   * beneath the archive file, e.g. `/tmp/x/filing.zip/accounts.xhtml`.
   */
  documentPath: string;
  taxonomyPackagePaths: string[];
}

export interface PackageReference {
  path: string;
  isArchive: boolean;
}

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

interface WorkerResultBase {
  filingId: string;
  logs: string;
  companyName?: string;
  companyNumber?: string;
  documentDate?: CalendarDate;
}

export interface SuccessfulWorkerResult extends WorkerResultBase {
  success: true;
  viewerEntrypoint: string;
  error?: undefined;
}

export interface FailedWorkerResult extends WorkerResultBase {
  success: false;
  error: string;
  viewerEntrypoint?: undefined;
}

export type WorkerResult = SuccessfulWorkerResult | FailedWorkerResult;

export interface Worker {
  work(
    job: JobMessage,
    documentPath: string,
    viewerDirectory: string,
    signal?: AbortSignal
  ): Promise<WorkerResult>;
}

export interface WorkerFactory {
  createWorker(job: JobMessage, packages: readonly PackageReference[]): Worker;
}

export interface DownloadManager {
  download(
    job: JobMessage,
    directory: string,
    signal?: AbortSignal
  ): Promise<FilingDownloadResult>;
}

export interface UploadManager {
  upload(job: JobMessage, viewerDirectory: string, signal?: AbortSignal): Promise<string>;
}

export type StageName = 'download' | 'discover' | 'process' | 'upload';

/** Flat response returned across the invocation boundary. */
export interface InvocationResponse {
  CompanyName?: string;
  CompanyNumber?: string;
  Error?: string;
  FilingId: string;
  Logs: string;
  Success: boolean;
  ViewerEntrypoint?: string;
  DocumentDate?: string;
}
