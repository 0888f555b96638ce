import { z } from 'zod';
import type { JobMessage } from './types.js';

export const JobMessageSchema = z.object({
  // Kept exactly as sent; the id is echoed back unchanged.
  FilingId: z.string().refine((id) => id.trim().length > 0, 'Must not be blank'),
  RegistryCode: z.enum(['CH', 'FCA']).default('CH'),
  DownloadUrl: z.string().trim().min(1),
  CompanyNumber: z.string().optional(),
  ExternalFilingId: z.string().optional(),
  TaxonomyPackageUrls: z.array(z.string().min(1)).default([]),
});

export type JobParseResult =
  | { ok: true; job: JobMessage }
  | { ok: false; filingId: string; error: string };

export function createJobMessage(fields: Omit<JobMessage, 'taxonomyPackageUrls'> & {
  taxonomyPackageUrls?: readonly string[];
}): JobMessage {
  return Object.freeze({
    ...fields,
    taxonomyPackageUrls: Object.freeze([...(fields.taxonomyPackageUrls ?? [])]),
  });
}

export function parseJobMessage(event: unknown): JobParseResult {
  const parsed = JobMessageSchema.safeParse(event);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, filingId: echoFilingId(event), error: `Invalid job message: ${issues}` };
  }
  const data = parsed.data;
  return {
    ok: true,
    job: createJobMessage({
      filingId: data.FilingId,
      registryCode: data.RegistryCode,
      downloadUrl: data.DownloadUrl,
      companyNumber: data.CompanyNumber,
      externalFilingId: data.ExternalFilingId,
      taxonomyPackageUrls: data.TaxonomyPackageUrls,
    }),
  };
}

function echoFilingId(event: unknown): string {
  if (typeof event === 'object' && event !== null && 'FilingId' in event) {
    return typeof event.FilingId === 'string' ? event.FilingId : '';
  }
  return '';
}
