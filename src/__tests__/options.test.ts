import { describe, it, expect } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadProcessorOptions } from '../control-plane/options.js';
import { makeTempDir } from './fixtures.js';

async function secretsFile(content: string): Promise<string> {
  const path = join(await makeTempDir('secrets'), 'processor.secrets');
  await writeFile(path, content, 'utf-8');
  return path;
}

describe('loadProcessorOptions', () => {
  it('reads settings from the secrets bundle', async () => {
    const path = await secretsFile(
      ['S3_RESULTS_BUCKET_NAME=results', 'COMPANIES_HOUSE_REST_API_KEY=test-secret', 'VIEWER_URL=/static/viewer.js'].join('\n')
    );
    const options = await loadProcessorOptions(path, {});
    expect(options.resultsBucket).toBe('results');
    expect(options.companiesHouseRestApiKey).toBe('test-secret');
    expect(options.viewerUrl).toBe('/static/viewer.js');
  });

  it('prefers the bundle and falls back to the environment', async () => {
    const path = await secretsFile('AWS_REGION=eu-west-2\n');
    const options = await loadProcessorOptions(path, { AWS_REGION: 'us-east-1', S3_RESULTS_PREFIX: 'viewers/' });
    expect(options.awsRegion).toBe('eu-west-2');
    expect(options.resultsPrefix).toBe('viewers/');
  });

  it('treats blank values as unset', async () => {
    const path = await secretsFile('S3_RESULTS_BUCKET_NAME=\n');
    const options = await loadProcessorOptions(path, { S3_RESULTS_BUCKET_NAME: 'from-env' });
    expect(options.resultsBucket).toBe('from-env');
  });

  it('applies defaults', async () => {
    const options = await loadProcessorOptions(undefined, {});
    expect(options).toEqual({
      awsRegion: undefined,
      resultsBucket: undefined,
      resultsPrefix: '',
      companiesHouseRestApiKey: undefined,
      httpUserAgent: 'filing-processor/0.1.0',
      viewerUrl: '/ixbrlviewer.js',
      scratchRoot: tmpdir(),
      packageCeiling: undefined,
    });
  });

  it('uses AWS_DEFAULT_REGION when AWS_REGION is not set', async () => {
    const options = await loadProcessorOptions(undefined, { AWS_DEFAULT_REGION: 'eu-west-1' });
    expect(options.awsRegion).toBe('eu-west-1');
  });

  it('returns a frozen object', async () => {
    expect(Object.isFrozen(await loadProcessorOptions(undefined, {}))).toBe(true);
  });

  it('fails when the named secrets file is missing', async () => {
    await expect(loadProcessorOptions('/nonexistent/processor.secrets', {})).rejects.toThrow(
      'Secrets file not found: /nonexistent/processor.secrets'
    );
  });
});
