// pattern: Functional Core
// Outcomes of best-effort package manager operations

/**
 * Install and uninstall never throw; callers inspect the outcome instead.
 */
export type OperationOutcome =
  | { ok: true }
  | { ok: false; error: string; exitCode?: number };

/**
 * What `pip show` knows about an installed distribution
 */
export interface DistributionInfo {
  name: string;
  version: string;
  /** site-packages directory the distribution lives in */
  location: string;
}

export const OK: OperationOutcome = Object.freeze({ ok: true });
