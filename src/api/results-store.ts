/**
 * Holds the most recent test-results payload.
 *
 * The body is stored as received (after validation) so GET returns the exact
 * bytes that were POSTed, large integers included. The swap is a single
 * reference assignment, so readers see the previous snapshot or the new one
 * and never a partial write.
 */

export interface StoredResults {
  readonly json: string;
  readonly count: number;
}

export const EMPTY_RESULTS_JSON = '{}';

export class TestResultsStore {
  private current: StoredResults | null = null;

  replace(json: string, count: number): StoredResults {
    const next: StoredResults = Object.freeze({ json, count });
    this.current = next;
    return next;
  }

  /**
   * Stored payload text, or `{}` before anything has been stored.
   */
  snapshotJson(): string {
    return this.current?.json ?? EMPTY_RESULTS_JSON;
  }

  clear(): void {
    this.current = null;
  }
}
