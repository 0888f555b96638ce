import { appendFile, readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { locateInArchives, readArchiveEntry } from '../tools/archive.js';
import { parseInlineDocument } from './inline-xbrl.js';
import { DEFAULT_LOG_FORMAT, LogBuffer } from './log-buffer.js';
import { writeViewer } from './viewer.js';
import {
  LOG_TO_BUFFER,
  type DocumentModel,
  type EngineSession,
  type ProcessingEngine,
  type RuntimeOptions,
} from './types.js';

const PersistentConfigSchema = z.object({
  logFormat: z.string().optional(),
  pluginOptions: z
    .object({
      useStubViewer: z.boolean().optional(),
      viewerNoCopyScript: z.boolean().optional(),
      viewerURL: z.string().optional(),
      viewerScriptPath: z.string().optional(),
    })
    .optional(),
});

type PersistentConfig = z.infer<typeof PersistentConfigSchema>;

export interface InlineXbrlEngineOptions {
  /** JSON file with default options, read unless a run disables persistent config. */
  configFile?: string;
}

/** In-process inline XBRL loader and viewer generator. */
export class InlineXbrlEngine implements ProcessingEngine {
  constructor(private readonly options: InlineXbrlEngineOptions = {}) {}

  openSession(): EngineSession {
    return new InlineXbrlSession(this.options.configFile);
  }
}

class InlineXbrlSession implements EngineSession {
  private readonly logs = new LogBuffer();
  private models: DocumentModel[] = [];
  private closed = false;

  constructor(private readonly configFile: string | undefined) {}

  async run(options: RuntimeOptions, signal?: AbortSignal): Promise<boolean> {
    if (this.closed) {
      throw new Error('Engine session is closed');
    }
    this.models = [];
    const firstEntry = this.logs.size;

    const settings = await this.applyPersistentConfig(options);
    this.logs.setFormat(settings.logFormat ?? DEFAULT_LOG_FORMAT);
    try {
      signal?.throwIfAborted();
      const success = await this.load(settings, signal);
      return success;
    } finally {
      await this.writeLogFile(settings.logFile, firstEntry);
    }
  }

  getModels(): readonly DocumentModel[] {
    return this.models;
  }

  getLogs(options: { clear?: boolean } = {}): string {
    const text = this.logs.render();
    if (options.clear) this.logs.clear();
    return text;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.models = [];
    this.logs.clear();
  }

  private async load(settings: RuntimeOptions, signal?: AbortSignal): Promise<boolean> {
    const entrypoint = settings.entrypointFile;
    const sourceFile = basename(entrypoint);
    const packages = settings.packages ?? [];
    for (const pkg of packages) {
      this.logs.info('engine:package', `Using package ${basename(pkg)}`, pkg);
    }

    let source: string;
    try {
      const location = locateInArchives(entrypoint, packages);
      source = location ? await readArchiveEntry(location) : await readFile(entrypoint, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logs.error('engine:loadError', `Unable to load entrypoint: ${message}`, sourceFile);
      return false;
    }

    const model = parseInlineDocument(source, entrypoint, sourceFile, this.logs);
    if (!model) return false;
    this.models.push(model);

    signal?.throwIfAborted();
    return writeViewer(model, source, settings.pluginOptions ?? {}, this.logs);
  }

  private async applyPersistentConfig(options: RuntimeOptions): Promise<RuntimeOptions> {
    if (options.disablePersistentConfig || !this.configFile) return options;

    let config: PersistentConfig;
    try {
      const raw: unknown = JSON.parse(await readFile(this.configFile, 'utf-8'));
      config = PersistentConfigSchema.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logs.warning('engine:configError', `Ignoring persistent config: ${message}`, this.configFile);
      return options;
    }

    return {
      ...options,
      logFormat: options.logFormat ?? config.logFormat,
      pluginOptions: { ...config.pluginOptions, ...options.pluginOptions },
    };
  }

  private async writeLogFile(logFile: string | undefined, from: number): Promise<void> {
    if (!logFile || logFile === LOG_TO_BUFFER) return;
    const text = this.logs.render(from);
    if (text.length === 0) return;
    await appendFile(logFile, `${text}\n`, 'utf-8');
  }
}
