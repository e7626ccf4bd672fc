import type { SizeMetrics } from "@repometrics/core";

export type FileMeasurement = SizeMetrics & {
  language: string;
  /** Relative to the measured directory, `/`-separated. */
  path: string;
};

export interface LineCounter {
  measure(directory: string): readonly FileMeasurement[];
}

/** The part of a version-control provider the size stage drives. */
export interface RevisionCheckout {
  readonly repositoryPath: string;
  checkout(commitHash: string): void;
  checkoutLatest(): void;
}
