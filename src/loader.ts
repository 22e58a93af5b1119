// CHANGE: Parse manifest YAML into the normalised Manifest model.
// WHY: Defaults and URL normalisation happen once here so the comparator works on normalised data only.

import { FAILSAFE_SCHEMA, Type, YAMLException, load } from "js-yaml";
import { z } from "zod";
import { MANIFEST } from "./config.js";
import { DuplicateEntryError, MalformedDocumentError } from "./errors.js";
import { debug } from "./logger.js";
import { ComposerRequirement, EntryCategory, JsonValue, Manifest, ManifestEntry } from "./types.js";
import { normalizeRepositoryUrl } from "./utils/url.js";

export interface ParseOptions {
  /** Branch assumed for entries that do not name one. */
  readonly defaultBranch?: string;
  /** Label of the document, used in error messages. */
  readonly source?: string;
}

type RawRecord = { readonly [key: string]: unknown };

const STEP_KEYS = ["additional steps", "extraSteps"] as const;
const RESERVED_KEYS = new Set<string>(["commit", "repository", "branch", ...STEP_KEYS]);
const VERSION_KEYS = ["version", "mediawiki_version", "mw_version", "mediawiki"] as const;

const NULL_FORMS = new Set(["", "~", "null", "Null", "NULL"]);
const TRUE_FORMS = new Set(["true", "True", "TRUE"]);
const BOOL_FORMS = new Set([...TRUE_FORMS, "false", "False", "FALSE"]);

const NullType = new Type("tag:yaml.org,2002:null", {
  kind: "scalar",
  resolve: (data: string | null) => data === null || NULL_FORMS.has(data),
  construct: () => null
});

const BoolType = new Type("tag:yaml.org,2002:bool", {
  kind: "scalar",
  resolve: (data: string | null) => data !== null && BOOL_FORMS.has(data),
  construct: (data: string) => TRUE_FORMS.has(data)
});

// Only null and booleans are resolved; numbers stay as written, since
// `0123456`, `0e12345` and `1234e56` are commit hashes, not numbers.
const MANIFEST_SCHEMA = FAILSAFE_SCHEMA.extend({ implicit: [NullType, BoolType] });

const ScalarSchema = z.string({ message: "must be a string" });

const StepsSchema = z.array(z.string({ message: "steps must be strings" }), {
  message: "must be a list of strings"
});

const EntryBodySchema = z
  .object({
    commit: ScalarSchema.nullish(),
    repository: ScalarSchema.nullish(),
    branch: ScalarSchema.nullish(),
    "additional steps": StepsSchema.nullish(),
    extraSteps: StepsSchema.nullish()
  })
  .passthrough();

const PackageSchema = z
  .object({
    name: z.string({ message: "name must be a string" }),
    version: ScalarSchema.nullish()
  })
  .passthrough();

const RepositorySchema = z.union([
  z.string(),
  z.object({ url: z.string({ message: "url must be a string" }) }).passthrough()
]);

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow an arbitrary YAML value to the JSON subset kept in `extra`.
 */
function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(item => toJsonValue(item));
  }
  if (isRecord(value)) {
    // fromEntries defines own properties, so a `__proto__` key stays data.
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toJsonValue(item)]));
  }
  return String(value);
}

function describeIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

function readDocument(rawText: string, source: string): RawRecord {
  let data: unknown;
  try {
    data = load(rawText, { schema: MANIFEST_SCHEMA, filename: source });
  } catch (error) {
    if (error instanceof YAMLException) {
      throw new MalformedDocumentError(`Invalid YAML in ${source}: ${error.reason}`, undefined, undefined, {
        cause: error
      });
    }
    throw error;
  }
  if (!isRecord(data)) {
    throw new MalformedDocumentError(`Document ${source} must be a mapping at the top level`);
  }
  return data;
}

function readList(document: RawRecord, key: string, required: boolean, source: string): readonly unknown[] {
  const value = document[key];
  if (value === undefined || value === null) {
    if (required) {
      throw new MalformedDocumentError(`Document ${source} is missing required key "${key}"`, key, key);
    }
    return [];
  }
  if (!Array.isArray(value)) {
    throw new MalformedDocumentError(`Key "${key}" in ${source} must be a list`, key, key);
  }
  return value;
}

function buildEntry(category: EntryCategory, name: string, body: unknown, defaultBranch: string, source: string): ManifestEntry {
  const parsed = EntryBodySchema.safeParse(body ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map(describeIssue).join("; ");
    throw new MalformedDocumentError(`Malformed ${category} entry "${name}" in ${source}: ${detail}`, category, name);
  }
  const fields = parsed.data;
  const extra: { readonly [key: string]: JsonValue } = Object.fromEntries(
    Object.entries(fields)
      .filter(([key, value]) => !RESERVED_KEYS.has(key) && value !== undefined)
      .map(([key, value]) => [key, toJsonValue(value)])
  );
  return {
    name,
    commit: fields.commit ?? undefined,
    repository: fields.repository ? normalizeRepositoryUrl(fields.repository) : undefined,
    branch: fields.branch ?? defaultBranch,
    extraSteps: fields["additional steps"] ?? fields.extraSteps ?? [],
    extra
  };
}

function readEntries(
  document: RawRecord,
  category: EntryCategory,
  required: boolean,
  defaultBranch: string,
  source: string
): Map<string, ManifestEntry> {
  const entries = new Map<string, ManifestEntry>();
  for (const item of readList(document, category, required, source)) {
    if (!isRecord(item)) {
      throw new MalformedDocumentError(`Each item under "${category}" in ${source} must be a mapping`, category);
    }
    for (const [name, body] of Object.entries(item)) {
      if (entries.has(name)) {
        throw new DuplicateEntryError(category, name);
      }
      entries.set(name, buildEntry(category, name, body, defaultBranch, source));
    }
  }
  return entries;
}

function readComposerPackages(
  document: RawRecord,
  extensions: ReadonlyMap<string, ManifestEntry>,
  source: string
): Map<string, ComposerRequirement> {
  const packages = new Map<string, ComposerRequirement>();
  for (const item of readList(document, "packages", false, source)) {
    const parsed = PackageSchema.safeParse(item);
    if (!parsed.success) {
      const detail = parsed.error.issues.map(describeIssue).join("; ");
      throw new MalformedDocumentError(`Malformed package in ${source}: ${detail}`, "packages");
    }
    const key = parsed.data.name.toLowerCase();
    if (packages.has(key)) {
      throw new DuplicateEntryError("packages", parsed.data.name);
    }
    packages.set(key, {
      name: key,
      displayName: parsed.data.name,
      version: parsed.data.version ?? undefined,
      origin: "package"
    });
  }
  for (const entry of extensions.values()) {
    const key = entry.name.toLowerCase();
    if (entry.extraSteps.includes(MANIFEST.COMPOSER_UPDATE_STEP) && !packages.has(key)) {
      packages.set(key, { name: key, displayName: entry.name, origin: "extension" });
    }
  }
  return packages;
}

function readRepositories(
  document: RawRecord,
  entries: readonly ReadonlyMap<string, ManifestEntry>[],
  source: string
): Set<string> {
  const repositories = new Set<string>();
  if (document.repositories === undefined) {
    for (const category of entries) {
      for (const entry of category.values()) {
        if (entry.repository) {
          repositories.add(entry.repository);
        }
      }
    }
    return repositories;
  }
  for (const item of readList(document, "repositories", false, source)) {
    const parsed = RepositorySchema.safeParse(item);
    if (!parsed.success) {
      throw new MalformedDocumentError(`Each repository in ${source} needs a url`, "repositories");
    }
    const url = typeof parsed.data === "string" ? parsed.data : parsed.data.url;
    repositories.add(normalizeRepositoryUrl(url));
  }
  return repositories;
}

/**
 * Detect the MediaWiki release a document targets.
 *
 * @param document - Parsed top-level mapping.
 * @returns Version in `major.minor` form, or undefined when the document does not say.
 */
export function detectMediaWikiVersion(document: RawRecord): string | undefined {
  for (const key of VERSION_KEYS) {
    const value = document[key];
    if (typeof value !== "string") {
      continue;
    }
    // CHANGE: Read the release from the text as written.
    // WHY: `1.40` must not collapse to `1.4`, and a bare `2` means `2.0`.
    const match = /^(\d+)(?:\.(\d+))?(?:\.\d+)*$/.exec(value.trim());
    if (match) {
      return `${match[1]}.${match[2] ?? "0"}`;
    }
  }
  return undefined;
}

/**
 * Parse one manifest document.
 *
 * @param rawText - YAML text.
 * @param options - Normalisation options.
 * @returns Frozen, normalised manifest.
 * @throws MalformedDocumentError when the text is not YAML or lacks the manifest shape.
 * @throws DuplicateEntryError when a name repeats within a category.
 */
export function parseManifest(rawText: string, options: ParseOptions = {}): Manifest {
  const source = options.source ?? "document";
  const defaultBranch = options.defaultBranch ?? MANIFEST.DEFAULT_BRANCH;
  const document = readDocument(rawText, source);

  const extensions = readEntries(document, "extensions", true, defaultBranch, source);
  const skins = readEntries(document, "skins", false, defaultBranch, source);
  const composerPackages = readComposerPackages(document, extensions, source);
  const repositories = readRepositories(document, [extensions, skins], source);
  const mediaWikiVersion = detectMediaWikiVersion(document);

  debug(
    `Parsed ${source}: extensions=${extensions.size} skins=${skins.size} packages=${composerPackages.size} repositories=${repositories.size}`
  );

  return Object.freeze({
    extensions,
    skins,
    composerPackages,
    repositories,
    mediaWikiVersion
  });
}
