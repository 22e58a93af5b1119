// CHANGE: Verify per-category classification, field diffs and ordering.
// WHY: Report output and downstream report diffs depend on deterministic comparator output.

import { describe, expect, it } from "vitest";
import { compareManifests, compareNames, deepEqual } from "../src/comparator.js";
import { parseManifest } from "../src/loader.js";
import { ComparisonResult, Manifest } from "../src/types.js";

function manifest(text: string): Manifest {
  return parseManifest(text);
}

function expectEmpty(result: ComparisonResult): void {
  for (const diff of [result.extensions, result.skins, result.composerPackages, result.repositories]) {
    expect(diff.onlyInA).toEqual([]);
    expect(diff.onlyInB).toEqual([]);
    expect(diff.differing).toEqual([]);
  }
}

const left = manifest(`
extensions:
  - Zeta:
      commit: z1
  - Alpha:
      commit: a1
      repository: https://github.com/example/Alpha
  - shared:
      commit: s1
skins:
  - Timeless:
      commit: t1
packages:
  - name: vendor/lib
    version: "^1.0"
repositories:
  - url: https://github.com/example/Custom
`);

const right = manifest(`
extensions:
  - beta:
      commit: b1
  - Gamma:
      commit: g1
  - shared:
      commit: s2
skins:
  - Vector:
      commit: v1
packages:
  - name: vendor/lib
    version: "^2.0"
  - name: vendor/other
repositories:
  - url: https://github.com/example/Other.git
`);

describe("compareManifests", () => {
  it("reports an entry missing on side B", () => {
    const a = manifest("extensions:\n  - Foo:\n      commit: abc\n      branch: master\n");
    const b = manifest("extensions: []\n");
    const result = compareManifests(a, b);
    expect(result.extensions.onlyInA).toEqual([
      { name: "Foo", commit: "abc", repository: undefined, branch: "master", extraSteps: [], extra: {} }
    ]);
    expect(result.extensions.onlyInB).toEqual([]);
    expect(result.extensions.differing).toEqual([]);
  });

  it("reports commits that only look alike as numbers", () => {
    const a = manifest("extensions:\n  - Foo:\n      commit: 0e12345\n");
    const b = manifest("extensions:\n  - Foo:\n      commit: 0e98765\n");
    expect(compareManifests(a, b).extensions.differing).toEqual([
      { name: "Foo", fieldDiffs: { commit: { a: "0e12345", b: "0e98765" } } }
    ]);
  });

  it("treats repository URLs with and without .git as equal", () => {
    const a = manifest("extensions:\n  - Bar:\n      commit: c1\n      repository: https://x/y.git\n");
    const b = manifest("extensions:\n  - Bar:\n      commit: c1\n      repository: https://x/y\n");
    expect(compareManifests(a, b).extensions.differing).toEqual([]);
  });

  it("records an extraSteps difference", () => {
    const a = manifest("extensions:\n  - Baz:\n      additional steps: [composer update]\n");
    const b = manifest("extensions:\n  - Baz:\n      additional steps: []\n");
    const result = compareManifests(a, b);
    expect(result.extensions.differing).toEqual([
      { name: "Baz", fieldDiffs: { extraSteps: { a: ["composer update"], b: [] } } }
    ]);
  });

  it("ignores the order of extra steps", () => {
    const a = manifest("extensions:\n  - Baz:\n      additional steps: [composer update, database update]\n");
    const b = manifest("extensions:\n  - Baz:\n      additional steps: [database update, composer update]\n");
    expect(compareManifests(a, b).extensions.differing).toEqual([]);
  });

  it("does not report a branch difference when both sides omit it", () => {
    const a = manifest("extensions:\n  - Foo:\n      commit: c1\n");
    const b = manifest("extensions:\n  - Foo:\n      commit: c1\n");
    expectEmpty(compareManifests(a, b));
  });

  it("reports an explicit branch against the defaulted one", () => {
    const a = manifest("extensions:\n  - Foo: {}\n");
    const b = manifest("extensions:\n  - Foo:\n      branch: master\n");
    expect(compareManifests(a, b).extensions.differing).toEqual([
      { name: "Foo", fieldDiffs: { branch: { a: "REL1_43", b: "master" } } }
    ]);
  });

  it("collects every differing field of one entry", () => {
    const a = manifest(`
extensions:
  - Foo:
      commit: c1
      repository: https://git.example/one
      Wikidata ID: Q1
`);
    const b = manifest(`
extensions:
  - Foo:
      commit: c2
      repository: https://git.example/two
`);
    expect(compareManifests(a, b).extensions.differing).toEqual([
      {
        name: "Foo",
        fieldDiffs: {
          commit: { a: "c1", b: "c2" },
          repository: { a: "https://git.example/one", b: "https://git.example/two" },
          "Wikidata ID": { a: "Q1", b: undefined }
        }
      }
    ]);
  });

  it("orders every list by code unit", () => {
    const result = compareManifests(left, right);
    expect(result.extensions.onlyInA.map(entry => entry.name)).toEqual(["Alpha", "Zeta"]);
    expect(result.extensions.onlyInB.map(entry => entry.name)).toEqual(["Gamma", "beta"]);
    expect(result.extensions.differing).toEqual([{ name: "shared", fieldDiffs: { commit: { a: "s1", b: "s2" } } }]);
    expect(result.skins.onlyInA.map(entry => entry.name)).toEqual(["Timeless"]);
    expect(result.skins.onlyInB.map(entry => entry.name)).toEqual(["Vector"]);
  });

  it("compares composer packages by key and declared version", () => {
    const result = compareManifests(left, right);
    expect(result.composerPackages.onlyInA).toEqual([]);
    expect(result.composerPackages.onlyInB).toEqual([
      { name: "vendor/other", displayName: "vendor/other", version: undefined, origin: "package" }
    ]);
    expect(result.composerPackages.differing).toEqual([
      { name: "vendor/lib", fieldDiffs: { version: { a: "^1.0", b: "^2.0" } } }
    ]);
  });

  it("surfaces a one-sided composer update flag under composer packages", () => {
    const a = manifest("extensions:\n  - Maps:\n      additional steps: [composer update]\n");
    const b = manifest("extensions:\n  - Maps: {}\n");
    const result = compareManifests(a, b);
    expect(result.composerPackages.onlyInA).toEqual([{ name: "maps", displayName: "Maps", origin: "extension" }]);
    expect(result.composerPackages.onlyInB).toEqual([]);
  });

  it("matches an explicit package with an extension-implied one without a diff", () => {
    const a = manifest("extensions: []\npackages:\n  - name: Maps\n    version: '^10'\n");
    const b = manifest("extensions:\n  - Maps:\n      additional steps: [composer update]\n");
    const result = compareManifests(a, b);
    expect(result.composerPackages.onlyInA).toEqual([]);
    expect(result.composerPackages.onlyInB).toEqual([]);
    expect(result.composerPackages.differing).toEqual([]);
  });

  it("compares repositories as normalised sets", () => {
    const result = compareManifests(left, right);
    expect(result.repositories).toEqual({
      onlyInA: ["https://github.com/example/Custom"],
      onlyInB: ["https://github.com/example/Other"],
      differing: []
    });
  });

  it("is symmetric", () => {
    const forward = compareManifests(left, right);
    const backward = compareManifests(right, left);
    expect(forward.extensions.onlyInA).toEqual(backward.extensions.onlyInB);
    expect(forward.skins.onlyInA).toEqual(backward.skins.onlyInB);
    expect(forward.composerPackages.onlyInA).toEqual(backward.composerPackages.onlyInB);
    expect(forward.repositories.onlyInA).toEqual(backward.repositories.onlyInB);
  });

  it("finds nothing when a manifest is compared with itself", () => {
    expectEmpty(compareManifests(left, left));
    expectEmpty(compareManifests(right, right));
  });
});

describe("compareNames", () => {
  it("sorts upper case before lower case", () => {
    expect(["b", "A", "a", "B"].sort(compareNames)).toEqual(["A", "B", "a", "b"]);
  });
});

describe("deepEqual", () => {
  it("ignores object key order but not array order", () => {
    expect(deepEqual({ a: 1, b: [1, 2] }, { b: [1, 2], a: 1 })).toBe(true);
    expect(deepEqual([1, 2], [2, 1])).toBe(false);
    expect(deepEqual({ a: 1 }, { a: 1, b: null })).toBe(false);
  });
});
