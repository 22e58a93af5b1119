// CHANGE: Wrap a comparison result with the labels a renderer needs.
// WHY: Renderers consume one immutable object; they never see manifests or refs directly.

import { Category, CategoryDiff, ComparisonResult } from "./types.js";

export interface SideLabel {
  readonly name: string;
  readonly ref: string;
  readonly resolvedCommit?: string;
}

export interface ComparisonReport {
  readonly a: SideLabel;
  readonly b: SideLabel;
  readonly mediaWikiVersion?: string;
  readonly result: ComparisonResult;
}

export interface CategorySummary {
  readonly onlyInA: number;
  readonly onlyInB: number;
  readonly differing: number;
}

export const CATEGORIES: readonly Category[] = ["extensions", "skins", "composerPackages", "repositories"];

/**
 * Assemble the report handed to a renderer.
 *
 * @param result - Output of `compareManifests`.
 * @param a - Label of side A.
 * @param b - Label of side B.
 * @param mediaWikiVersion - MediaWiki release both documents target, when known.
 */
export function buildReport(result: ComparisonResult, a: SideLabel, b: SideLabel, mediaWikiVersion?: string): ComparisonReport {
  return Object.freeze({ a, b, mediaWikiVersion, result });
}

function count(diff: CategoryDiff<unknown>): CategorySummary {
  return {
    onlyInA: diff.onlyInA.length,
    onlyInB: diff.onlyInB.length,
    differing: diff.differing.length
  };
}

/**
 * Count entries per category and bucket.
 */
export function summarize(result: ComparisonResult): Record<Category, CategorySummary> {
  return {
    extensions: count(result.extensions),
    skins: count(result.skins),
    composerPackages: count(result.composerPackages),
    repositories: count(result.repositories)
  };
}

export function hasDifferences(result: ComparisonResult): boolean {
  const summary = summarize(result);
  return CATEGORIES.some(category => {
    const counts = summary[category];
    return counts.onlyInA > 0 || counts.onlyInB > 0 || counts.differing > 0;
  });
}
