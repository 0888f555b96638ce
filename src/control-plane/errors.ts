/** A worker failure that carries whatever the engine logged before it. */
export class WorkerError extends Error {
  constructor(
    cause: unknown,
    readonly logs: string
  ) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'WorkerError';
  }
}
