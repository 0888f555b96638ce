import { readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { parse } from 'dotenv';

const DEFAULT_USER_AGENT = 'filing-processor/0.1.0';
const DEFAULT_VIEWER_URL = '/ixbrlviewer.js';

export interface ProcessorOptions {
  readonly awsRegion?: string;
  readonly resultsBucket?: string;
  readonly resultsPrefix: string;
  readonly companiesHouseRestApiKey?: string;
  readonly httpUserAgent: string;
  readonly viewerUrl: string;
  readonly scratchRoot: string;
  /** Highest directory the package search may test; defaults to the invocation's scratch directory. */
  readonly packageCeiling?: string;
}

type Settings = Record<string, string | undefined>;

async function readSecrets(secretsFilepath: string): Promise<Settings> {
  let content: string;
  try {
    content = await readFile(secretsFilepath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new Error(`Secrets file not found: ${secretsFilepath}`);
    }
    throw err;
  }
  return parse(content);
}

function pick(secrets: Settings, env: Settings, ...keys: string[]): string | undefined {
  for (const source of [secrets, env]) {
    for (const key of keys) {
      const value = source[key]?.trim();
      if (value) return value;
    }
  }
  return undefined;
}

/**
 * Resolves processor settings from the dotenv-format secrets bundle (when
 * given), falling back to the environment for each key.
 */
export async function loadProcessorOptions(
  secretsFilepath?: string,
  env: Settings = process.env
): Promise<ProcessorOptions> {
  const secrets = secretsFilepath ? await readSecrets(secretsFilepath) : {};

  return Object.freeze({
    awsRegion: pick(secrets, env, 'AWS_REGION', 'AWS_DEFAULT_REGION'),
    resultsBucket: pick(secrets, env, 'S3_RESULTS_BUCKET_NAME'),
    resultsPrefix: pick(secrets, env, 'S3_RESULTS_PREFIX') ?? '',
    companiesHouseRestApiKey: pick(secrets, env, 'COMPANIES_HOUSE_REST_API_KEY'),
    httpUserAgent: pick(secrets, env, 'HTTP_USER_AGENT') ?? DEFAULT_USER_AGENT,
    viewerUrl: pick(secrets, env, 'VIEWER_URL') ?? DEFAULT_VIEWER_URL,
    scratchRoot: pick(secrets, env, 'SCRATCH_ROOT') ?? tmpdir(),
    packageCeiling: pick(secrets, env, 'PACKAGE_SEARCH_CEILING'),
  });
}
