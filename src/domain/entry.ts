import type { EntryKind } from './entry-kind';

export type KindProbe = (entry: Entry) => Promise<EntryKind>;

/**
 * One name inside one listed directory.
 *
 * Listing never stats its children: a directory can hold tens of thousands of
 * names. The kind is probed on the first `kind()` call and kept for the life
 * of the entry. A failed probe is not remembered, so calling again retries.
 */
export class Entry {
  private resolved: EntryKind | null = null;
  private pending: Promise<EntryKind> | null = null;

  public constructor(
    public readonly dir: string,
    public readonly base: string,
    public readonly path: string,
    private readonly probe: KindProbe,
  ) { }

  public kind(): Promise<EntryKind> {
    if (this.resolved !== null) {
      return Promise.resolve(this.resolved);
    }

    // Concurrent first callers share the same probe
    if (!this.pending) {
      this.pending = this.probe(this).then(
        (kind) => {
          this.resolved = kind;
          this.pending = null;
          return kind;
        },
        (error: unknown) => {
          this.pending = null;
          throw error;
        },
      );
    }
    return this.pending;
  }
}
