export interface OpenLimiterPort {
  /**
   * Resolve once a file may be opened. Every resolved acquire must be paired
   * with exactly one `release`.
   */
  acquire(): Promise<void>;
  release(): void;
}
