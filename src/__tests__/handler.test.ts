import { describe, it, expect, beforeEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createHandler, invocationSignal } from '../handler.js';
import { LocalUploadManager } from '../tools/uploader.js';
import { ACME_FACTS, makeOptions, makeTempDir, sampleDocument } from './fixtures.js';

describe('handler', () => {
  let documentPath: string;
  let outDir: string;
  let scratchRoot: string;

  beforeEach(async () => {
    const sourceDir = await makeTempDir('handler-source');
    documentPath = join(sourceDir, 'accounts.xhtml');
    await writeFile(documentPath, sampleDocument(ACME_FACTS), 'utf-8');
    outDir = await makeTempDir('handler-out');
    scratchRoot = await makeTempDir('handler-scratch');
  });

  function handlerUnderTest() {
    return createHandler({
      loadOptions: async () => makeOptions({ scratchRoot }),
      createUploadManager: () => new LocalUploadManager(outDir),
    });
  }

  it('processes a filing and returns the flat response', async () => {
    const response = await handlerUnderTest()({ FilingId: 'F-100', DownloadUrl: documentPath });

    expect(response).toEqual({
      FilingId: 'F-100',
      Success: true,
      CompanyName: 'Acme Ltd',
      CompanyNumber: '01234567',
      DocumentDate: '2023-12-31',
      ViewerEntrypoint: 'ixbrlviewer.html',
      Logs: expect.stringContaining('[ix:loaded] Loaded 3 facts - accounts.xhtml'),
    });
  });

  it('omits the document date when the filing has none', async () => {
    await writeFile(documentPath, sampleDocument({ companyName: 'Acme Ltd' }), 'utf-8');
    const response = await handlerUnderTest()({ FilingId: 'F-101', DownloadUrl: documentPath });

    expect(response.Success).toBe(true);
    expect(response).not.toHaveProperty('DocumentDate');
    expect(response).not.toHaveProperty('CompanyNumber');
  });

  it('reports an engine failure with logs and no viewer', async () => {
    await writeFile(documentPath, sampleDocument({ ...ACME_FACTS, withHeader: false }), 'utf-8');
    const response = await handlerUnderTest()({ FilingId: 'F-102', DownloadUrl: documentPath });

    expect(response).toEqual({
      FilingId: 'F-102',
      Success: false,
      Error: 'Viewer generation failed within the processing engine. Check the logs for details.',
      Logs: '[ix:missingHeader] Document does not contain an inline XBRL header - accounts.xhtml',
    });
  });

  it('rejects an invalid event without processing', async () => {
    const response = await handlerUnderTest()({ FilingId: 'F-103' });
    expect(response).toEqual({
      FilingId: 'F-103',
      Success: false,
      Error: 'Invalid job message: DownloadUrl: Required',
      Logs: '',
    });
  });

  it('reports configuration problems as a failed response', async () => {
    const handler = createHandler({
      loadOptions: async () => {
        throw new Error('Secrets file not found: /run/secrets/processor');
      },
    });
    const response = await handler({ FilingId: 'F-104', DownloadUrl: documentPath });
    expect(response).toEqual({
      FilingId: 'F-104',
      Success: false,
      Error: 'Failed to configure processor: Secrets file not found: /run/secrets/processor',
      Logs: '',
    });
  });

  it('reports a cancelled invocation', async () => {
    const controller = new AbortController();
    controller.abort(new Error('platform shutdown'));
    const response = await handlerUnderTest()(
      { FilingId: 'F-105', DownloadUrl: documentPath },
      { signal: controller.signal }
    );
    expect(response.Error).toBe('Processing was cancelled: platform shutdown');
  });
});

describe('invocationSignal', () => {
  it('is undefined without a deadline or signal', () => {
    expect(invocationSignal({})).toBeUndefined();
  });

  it('passes a lone caller signal through', () => {
    const controller = new AbortController();
    expect(invocationSignal({ signal: controller.signal })).toBe(controller.signal);
  });

  it('is not aborted while time remains', () => {
    const signal = invocationSignal({ getRemainingTimeInMillis: () => 60_000 });
    expect(signal?.aborted).toBe(false);
  });

  it('follows the caller signal when combined with a deadline', () => {
    const controller = new AbortController();
    const signal = invocationSignal({ signal: controller.signal, getRemainingTimeInMillis: () => 60_000 });
    controller.abort(new Error('stop'));
    expect(signal?.aborted).toBe(true);
  });
});
