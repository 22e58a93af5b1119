// CHANGE: Compute per-category differences between two normalised manifests.
// WHY: The report and any downstream diff of reports need name-ordered, side-symmetric output.

import {
  CategoryDiff,
  ComparisonResult,
  ComposerRequirement,
  DifferingEntry,
  FieldDiff,
  JsonValue,
  Manifest,
  ManifestEntry
} from "./types.js";

/**
 * Code-unit ordering. Independent of the host locale.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function sortedKeys<T>(map: ReadonlyMap<string, T>, exclude: ReadonlyMap<string, T>): string[] {
  return [...map.keys()].filter(key => !exclude.has(key)).sort(compareNames);
}

function sameSteps(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) {
    return false;
  }
  for (const step of left) {
    if (!right.has(step)) {
      return false;
    }
  }
  return true;
}

function isJsonArray(value: JsonValue): value is readonly JsonValue[] {
  return Array.isArray(value);
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Structural equality over YAML-derived values; object key order is ignored.
 */
export function deepEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) {
    return true;
  }
  if (isJsonArray(a) || isJsonArray(b)) {
    if (!isJsonArray(a) || !isJsonArray(b) || a.length !== b.length) {
      return false;
    }
    const left: readonly JsonValue[] = a;
    const right: readonly JsonValue[] = b;
    return left.every((item, index) => deepEqual(item, right[index]));
  }
  if (isJsonObject(a) && isJsonObject(b)) {
    const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
    for (const key of keys) {
      if (!deepEqual(a[key], b[key])) {
        return false;
      }
    }
    return true;
  }
  return false;
}

function entryFieldDiffs(a: ManifestEntry, b: ManifestEntry): { [field: string]: FieldDiff } {
  const diffs: { [field: string]: FieldDiff } = {};
  if (a.commit !== b.commit) {
    diffs.commit = { a: a.commit, b: b.commit };
  }
  if (a.repository !== b.repository) {
    diffs.repository = { a: a.repository, b: b.repository };
  }
  if (a.branch !== b.branch) {
    diffs.branch = { a: a.branch, b: b.branch };
  }
  if (!sameSteps(a.extraSteps, b.extraSteps)) {
    diffs.extraSteps = { a: [...a.extraSteps], b: [...b.extraSteps] };
  }
  const extraKeys = [...new Set([...Object.keys(a.extra), ...Object.keys(b.extra)])].sort(compareNames);
  for (const key of extraKeys) {
    if (!deepEqual(a.extra[key], b.extra[key])) {
      diffs[key] = { a: a.extra[key], b: b.extra[key] };
    }
  }
  return diffs;
}

function composerFieldDiffs(a: ComposerRequirement, b: ComposerRequirement): { [field: string]: FieldDiff } {
  // Only two explicit constraints can disagree; an extension-implied requirement has no version.
  if (a.version !== undefined && b.version !== undefined && a.version !== b.version) {
    return { version: { a: a.version, b: b.version } };
  }
  return {};
}

function compareCategory<T>(
  a: ReadonlyMap<string, T>,
  b: ReadonlyMap<string, T>,
  fieldDiffs: (left: T, right: T) => { [field: string]: FieldDiff }
): CategoryDiff<T> {
  const onlyInA = sortedKeys(a, b).flatMap(name => {
    const entry = a.get(name);
    return entry === undefined ? [] : [entry];
  });
  const onlyInB = sortedKeys(b, a).flatMap(name => {
    const entry = b.get(name);
    return entry === undefined ? [] : [entry];
  });
  const differing: DifferingEntry[] = [];
  for (const name of [...a.keys()].sort(compareNames)) {
    const left = a.get(name);
    const right = b.get(name);
    if (left === undefined || right === undefined) {
      continue;
    }
    const diffs = fieldDiffs(left, right);
    if (Object.keys(diffs).length > 0) {
      differing.push({ name, fieldDiffs: diffs });
    }
  }
  return { onlyInA, onlyInB, differing };
}

function compareSets(a: ReadonlySet<string>, b: ReadonlySet<string>): CategoryDiff<string> {
  return {
    onlyInA: [...a].filter(url => !b.has(url)).sort(compareNames),
    onlyInB: [...b].filter(url => !a.has(url)).sort(compareNames),
    differing: []
  };
}

/**
 * Compare two manifests.
 *
 * Total over well-formed manifests: never throws, never mutates its inputs.
 *
 * @param a - Manifest of side A.
 * @param b - Manifest of side B.
 * @returns Name-ordered differences per category.
 */
export function compareManifests(a: Manifest, b: Manifest): ComparisonResult {
  return {
    extensions: compareCategory(a.extensions, b.extensions, entryFieldDiffs),
    skins: compareCategory(a.skins, b.skins, entryFieldDiffs),
    composerPackages: compareCategory(a.composerPackages, b.composerPackages, composerFieldDiffs),
    repositories: compareSets(a.repositories, b.repositories)
  };
}
