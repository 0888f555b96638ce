import { copyFile, mkdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import * as cheerio from 'cheerio';
import type { LogBuffer } from './log-buffer.js';
import type { DocumentModel, ViewerPluginOptions } from './types.js';

export const VIEWER_HTML_FILENAME = 'ixbrlviewer.html';
export const DEFAULT_VIEWER_URL = '/ixbrlviewer.js';

const VIEWER_DATA_TYPE = 'application/x.ixbrl-viewer+json';

interface ViewerFact {
  n: string;
  v: string;
  c?: string;
  u?: string;
}

export interface ViewerData {
  sourceFiles: string[];
  facts: Record<string, ViewerFact>;
}

export function buildViewerData(model: DocumentModel): ViewerData {
  const facts: Record<string, ViewerFact> = {};
  for (const fact of model.facts) {
    facts[fact.id] = {
      n: fact.qname,
      v: fact.value,
      ...(fact.contextRef ? { c: fact.contextRef } : {}),
      ...(fact.unitRef ? { u: fact.unitRef } : {}),
    };
  }
  return { sourceFiles: [model.sourceFile], facts };
}

function serializeViewerData(data: ViewerData): string {
  // keeps "</script>" inside values from closing the tag
  return JSON.stringify(data).replace(/</g, '\\u003c');
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;');
}

export function renderStubViewer(data: ViewerData, viewerUrl: string): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8"/>',
    '<title>Inline XBRL Viewer</title>',
    `<script type="${VIEWER_DATA_TYPE}">${serializeViewerData(data)}</script>`,
    `<script type="text/javascript" src="${escapeAttribute(viewerUrl)}"></script>`,
    '</head>',
    '<body></body>',
    '</html>',
    '',
  ].join('\n');
}

/** Injects the viewer data and script into the head of the source document. */
export function injectViewer(source: string, data: ViewerData, viewerUrl: string): string | undefined {
  const $ = cheerio.load(source, { xml: true });
  const head = $('head').first();
  if (head.length === 0) return undefined;
  head.append(`<script type="${VIEWER_DATA_TYPE}">${serializeViewerData(data)}</script>`);
  head.append(`<script type="text/javascript" src="${escapeAttribute(viewerUrl)}"></script>`);
  return $.xml();
}

/**
 * Writes the viewer for `model` into `plugin.saveViewerDest`. Returns false
 * when nothing usable could be written; the reason is in `logs`.
 */
export async function writeViewer(
  model: DocumentModel,
  source: string,
  plugin: ViewerPluginOptions,
  logs: LogBuffer
): Promise<boolean> {
  const dest = plugin.saveViewerDest;
  if (!dest) return true;

  const viewerUrl = plugin.viewerURL ?? DEFAULT_VIEWER_URL;
  const data = buildViewerData(model);

  try {
    await mkdir(dest, { recursive: true });

    let useStub = plugin.useStubViewer === true;
    if (!useStub) {
      const injected = injectViewer(source, data, viewerUrl);
      if (injected === undefined) {
        logs.warning('viewer:noHead', 'Document has no head element, writing a stub viewer instead', model.sourceFile);
        useStub = true;
      } else {
        await writeFile(join(dest, VIEWER_HTML_FILENAME), injected, 'utf-8');
      }
    }
    if (useStub) {
      await writeFile(join(dest, model.sourceFile), source, 'utf-8');
      await writeFile(join(dest, VIEWER_HTML_FILENAME), renderStubViewer(data, viewerUrl), 'utf-8');
    }

    if (plugin.viewerNoCopyScript !== true) {
      if (plugin.viewerScriptPath) {
        await copyFile(plugin.viewerScriptPath, join(dest, basename(viewerUrl)));
      } else {
        logs.warning('viewer:scriptMissing', 'No viewer script available to copy', model.sourceFile);
      }
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logs.error('viewer:writeError', `Unable to write viewer: ${message}`, model.sourceFile);
    return false;
  }

  logs.info('viewer:written', `Viewer written to ${dest}`, VIEWER_HTML_FILENAME);
  return true;
}
