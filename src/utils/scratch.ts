import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Runs `fn` with a fresh temporary directory under `root` and removes the
 * directory afterwards, whether `fn` resolves or rejects. A failed removal is
 * reported on stderr and does not replace the outcome of `fn`.
 */
export async function withScratchDirectory<T>(
  root: string,
  prefix: string,
  fn: (directory: string) => Promise<T>
): Promise<T> {
  const directory = await mkdtemp(join(root, prefix));
  try {
    return await fn(directory);
  } finally {
    await rm(directory, { recursive: true, force: true }).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`  [warn] unable to remove scratch directory ${directory}: ${message}`);
    });
  }
}
