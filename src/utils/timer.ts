export class StepTimer {
  private readonly start: bigint = process.hrtime.bigint();

  /** Milliseconds since construction. */
  elapsed(): number {
    return Number((process.hrtime.bigint() - this.start) / 1_000_000n);
  }
}
