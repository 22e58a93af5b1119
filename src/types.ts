// CHANGE: Define strongly typed domain models for manifest comparison.
// WHY: The comparator only accepts fully-normalised manifests; the types encode that boundary.

/**
 * JSON-like value type used for permissive properties without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Revision selector for a remote document.
 *
 * A commit is used verbatim; a branch is resolved to its tip on every fetch.
 */
export type GitRef =
  | { readonly kind: "branch"; readonly name: string }
  | { readonly kind: "commit"; readonly sha: string };

/**
 * Human-readable form of a ref, as shown in logs and report headers.
 */
export function refLabel(ref: GitRef): string {
  return ref.kind === "branch" ? ref.name : ref.sha;
}

/**
 * One extension or skin after normalisation.
 *
 * @property name - Unique key within its category.
 * @property commit - Pinned commit hash, if any.
 * @property repository - Repository URL without trailing `/` or `.git`.
 * @property branch - Branch to track; defaulted when absent in the document.
 * @property extraSteps - Auxiliary actions such as "composer update".
 * @property extra - Remaining keys of the entry body, compared by deep equality.
 */
export interface ManifestEntry {
  readonly name: string;
  readonly commit?: string;
  readonly repository?: string;
  readonly branch: string;
  readonly extraSteps: readonly string[];
  readonly extra: { readonly [key: string]: JsonValue };
}

export type ComposerOrigin = "package" | "extension";

/**
 * Composer requirement, either declared under `packages` or implied by an
 * extension with a "composer update" step.
 *
 * @property name - Lower-cased lookup key.
 * @property displayName - Name as written in the document.
 */
export interface ComposerRequirement {
  readonly name: string;
  readonly displayName: string;
  readonly version?: string;
  readonly origin: ComposerOrigin;
}

/**
 * Normalised form of one side's document. Immutable once parsed.
 */
export interface Manifest {
  readonly extensions: ReadonlyMap<string, ManifestEntry>;
  readonly skins: ReadonlyMap<string, ManifestEntry>;
  readonly composerPackages: ReadonlyMap<string, ComposerRequirement>;
  readonly repositories: ReadonlySet<string>;
  readonly mediaWikiVersion?: string;
}

export type EntryCategory = "extensions" | "skins";

export type Category = EntryCategory | "composerPackages" | "repositories";

export interface FieldDiff {
  readonly a: JsonValue;
  readonly b: JsonValue;
}

export interface DifferingEntry {
  readonly name: string;
  readonly fieldDiffs: { readonly [field: string]: FieldDiff };
}

export interface CategoryDiff<T> {
  readonly onlyInA: readonly T[];
  readonly onlyInB: readonly T[];
  readonly differing: readonly DifferingEntry[];
}

/**
 * Output of one comparison run; every list is ordered by name.
 */
export interface ComparisonResult {
  readonly extensions: CategoryDiff<ManifestEntry>;
  readonly skins: CategoryDiff<ManifestEntry>;
  readonly composerPackages: CategoryDiff<ComposerRequirement>;
  readonly repositories: CategoryDiff<string>;
}

/**
 * Fetched document content addressed by resolved commit.
 *
 * @property fetchedAt - ISO timestamp of the network download.
 */
export interface CacheEntry {
  readonly repository: string;
  readonly path: string;
  readonly resolvedCommit: string;
  readonly fetchedAt: string;
  readonly content: Buffer;
}
