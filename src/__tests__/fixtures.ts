import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import JSZip from 'jszip';
import { createJobMessage } from '../control-plane/job.js';
import type { ProcessorOptions } from '../control-plane/options.js';
import type { JobMessage } from '../control-plane/types.js';

export interface SampleFacts {
  companyName?: string;
  companyNumber?: string;
  balanceSheetDate?: string;
  extraFacts?: string[];
  withHeader?: boolean;
}

export function sampleDocument(facts: SampleFacts = {}): string {
  const body: string[] = [];
  if (facts.withHeader !== false) {
    body.push('<div style="display:none"><ix:header><ix:hidden/><ix:resources/></ix:header></div>');
  }
  if (facts.companyName !== undefined) {
    body.push(
      `<p>Company: <ix:nonNumeric name="bus:EntityCurrentLegalOrRegisteredName" contextRef="c1">${facts.companyName}</ix:nonNumeric></p>`
    );
  }
  if (facts.companyNumber !== undefined) {
    body.push(
      `<p>Number: <ix:nonNumeric name="bus:UKCompaniesHouseRegisteredNumber" contextRef="c1">${facts.companyNumber}</ix:nonNumeric></p>`
    );
  }
  if (facts.balanceSheetDate !== undefined) {
    body.push(
      `<p>As at <ix:nonNumeric name="bus:BalanceSheetDate" contextRef="c1" format="ixt:date-day-monthname-year-en">${facts.balanceSheetDate}</ix:nonNumeric></p>`
    );
  }
  body.push(...(facts.extraFacts ?? []));

  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<html xmlns="http://www.w3.org/1999/xhtml" xmlns:ix="http://www.xbrl.org/2013/inlineXBRL"' +
      ' xmlns:ixt="http://www.xbrl.org/inlineXBRL/transformation/2020-02-12"' +
      ' xmlns:bus="http://xbrl.frc.org.uk/cd/2021-01-01/business"' +
      ' xmlns:core="http://xbrl.frc.org.uk/fr/2021-01-01/core">',
    '<head><title>Accounts</title></head>',
    '<body>',
    ...body,
    '</body>',
    '</html>',
  ].join('\n');
}

export const ACME_FACTS: SampleFacts = {
  companyName: 'Acme Ltd',
  companyNumber: '01234567',
  balanceSheetDate: '31 December 2023',
};

export async function makeTempDir(label = 'test'): Promise<string> {
  return mkdtemp(join(tmpdir(), `filing-processor-${label}-`));
}

export async function writeZip(path: string, entries: Record<string, string>): Promise<void> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.file(name, content);
  }
  await writeFile(path, await zip.generateAsync({ type: 'nodebuffer' }));
}

export function makeJob(overrides: Partial<JobMessage> = {}): JobMessage {
  return createJobMessage({
    filingId: 'F-100',
    registryCode: 'CH',
    downloadUrl: '/dev/null',
    ...overrides,
  });
}

export function makeOptions(overrides: Partial<ProcessorOptions> = {}): ProcessorOptions {
  return {
    resultsPrefix: '',
    httpUserAgent: 'filing-processor-test',
    viewerUrl: '/ixbrlviewer.js',
    scratchRoot: tmpdir(),
    ...overrides,
  };
}
