// src/openqa/dataset_cache.ts
import type { HarmonizedDataset } from "./harmonize.js";
import { DatasetBuildError, errorMessage } from "./errors.js";

/**
 * Process-wide lazy build of the harmonized dataset. Concurrent first callers share
 * one in-flight build; a failed build is not cached.
 */
export class DatasetCache {
  private pending: Promise<HarmonizedDataset> | null = null;
  private builds = 0;

  constructor(private readonly build: () => Promise<HarmonizedDataset>) {}

  get(): Promise<HarmonizedDataset> {
    if (!this.pending) {
      this.builds++;
      const started = Date.now();
      const p: Promise<HarmonizedDataset> = this.build().then(
        ds => {
          console.log(`[dataset] build #${this.builds} ready in ${Date.now() - started} ms`);
          return ds;
        },
        (e: unknown) => {
          if (this.pending === p) this.pending = null;
          console.error(`[dataset] build #${this.builds} failed: ${errorMessage(e)}`);
          throw e instanceof DatasetBuildError ? e : new DatasetBuildError(errorMessage(e), { cause: e });
        },
      );
      this.pending = p;
    }
    return this.pending;
  }

  /** The next `get()` rebuilds. Callers holding the old dataset keep using it. */
  invalidate(): void {
    this.pending = null;
  }

  get buildCount(): number {
    return this.builds;
  }
}
