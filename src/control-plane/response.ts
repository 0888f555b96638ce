import { formatCalendarDate } from '../utils/calendar-date.js';
import type { InvocationResponse, WorkerResult } from './types.js';

/**
 * Flattens a worker result into the invocation response. Absent optional
 * values are left out of the object rather than set to null, and a document
 * date is only reported for a successful run.
 */
export function toInvocationResponse(result: WorkerResult): InvocationResponse {
  const response: InvocationResponse = {
    FilingId: result.filingId,
    Logs: result.logs,
    Success: result.success,
  };
  if (result.companyName !== undefined) response.CompanyName = result.companyName;
  if (result.companyNumber !== undefined) response.CompanyNumber = result.companyNumber;
  if (result.error !== undefined) response.Error = result.error;
  if (result.viewerEntrypoint !== undefined) response.ViewerEntrypoint = result.viewerEntrypoint;
  if (result.success && result.documentDate !== undefined) {
    response.DocumentDate = formatCalendarDate(result.documentDate);
  }
  return response;
}
