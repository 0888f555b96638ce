export const LOG_TO_BUFFER = 'logToBuffer';

export type FactKind = 'nonNumeric' | 'nonFraction';

export interface Fact {
  id: string;
  kind: FactKind;
  /** Qualified name as written in the document, e.g. `uk-bus:EntityCurrentLegalOrRegisteredName`. */
  qname: string;
  prefix?: string;
  localName: string;
  /** Value after any inline transformation has been applied. */
  value: string;
  rawValue: string;
  contextRef?: string;
  unitRef?: string;
  format?: string;
}

export interface DocumentModel {
  entrypoint: string;
  sourceFile: string;
  facts: readonly Fact[];
  /** Facts grouped by local name, each group in document order. */
  factsByLocalName: ReadonlyMap<string, readonly Fact[]>;
}

export interface ViewerPluginOptions {
  saveViewerDest?: string;
  useStubViewer?: boolean;
  viewerNoCopyScript?: boolean;
  viewerURL?: string;
  viewerScriptPath?: string;
}

export interface RuntimeOptions {
  entrypointFile: string;
  packages?: readonly string[];
  disablePersistentConfig?: boolean;
  /** `logToBuffer`, or a file the formatted log is appended to as well. */
  logFile?: string;
  logFormat?: string;
  pluginOptions?: ViewerPluginOptions;
}

export interface EngineSession {
  run(options: RuntimeOptions, signal?: AbortSignal): Promise<boolean>;
  getModels(): readonly DocumentModel[];
  getLogs(options?: { clear?: boolean }): string;
  close(): Promise<void>;
}

export interface ProcessingEngine {
  openSession(): EngineSession;
}
