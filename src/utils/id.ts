import { randomBytes } from 'node:crypto';

export function generateInvocationId(prefix = 'inv'): string {
  const stamp = new Date().toISOString().slice(0, 19).replace(/[-:T]/g, '');
  const rand = randomBytes(3).toString('hex');
  return `${prefix}_${stamp}_${rand}`;
}

/** Makes an identifier safe to embed in a directory name. */
export function sanitizeForPath(id: string, maxLength = 48): string {
  const cleaned = id.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, maxLength);
  return cleaned.length > 0 ? cleaned : 'unnamed';
}
