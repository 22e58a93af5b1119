// CHANGE: Render a comparison report as plain text.
// WHY: The CLI prints to stdout or a file; output must be byte-stable for a given result.

import { ComparisonReport, SideLabel, hasDifferences } from "./report.js";
import { CategoryDiff, ComposerRequirement, DifferingEntry, FieldDiff, JsonValue, ManifestEntry } from "./types.js";

const RULE = "=".repeat(70);
const ENTRY_FIELDS = new Set(["commit", "repository", "branch", "extraSteps"]);

function sideHeader(side: SideLabel): string {
  const pinned =
    side.resolvedCommit && side.resolvedCommit !== side.ref ? ` @ ${side.resolvedCommit.slice(0, 7)}` : "";
  return `${side.name} (${side.ref}${pinned})`;
}

function formatValue(value: JsonValue): string {
  if (value === undefined) {
    return "(unset)";
  }
  return typeof value === "string" ? value : JSON.stringify(value);
}

function stepsOf(value: JsonValue): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const items: readonly JsonValue[] = value;
  return items.filter((item): item is string => typeof item === "string");
}

function renderEntryDetails(entry: ManifestEntry): string[] {
  const lines: string[] = [];
  if (entry.commit !== undefined) {
    lines.push(`        commit: ${entry.commit}`);
  }
  if (entry.repository !== undefined) {
    lines.push(`        repository: ${entry.repository}`);
  }
  return lines;
}

function renderEntryDiff(entry: DifferingEntry, a: SideLabel, b: SideLabel): string[] {
  const lines = [`    ~ ${entry.name}:`];
  const { commit, repository, branch, extraSteps } = entry.fieldDiffs;
  if (commit) {
    lines.push(`        ${a.name} commit: ${formatValue(commit.a)}`);
    lines.push(`        ${b.name} commit: ${formatValue(commit.b)}`);
  }
  if (repository) {
    lines.push(`        ${a.name} repo: ${repository.a === undefined ? "wikimedia" : formatValue(repository.a)}`);
    lines.push(`        ${b.name} repo: ${repository.b === undefined ? "wikimedia" : formatValue(repository.b)}`);
  }
  if (branch) {
    lines.push(`        ${a.name} branch: ${formatValue(branch.a)}`);
    lines.push(`        ${b.name} branch: ${formatValue(branch.b)}`);
  }
  if (extraSteps) {
    const left = stepsOf(extraSteps.a);
    const right = stepsOf(extraSteps.b);
    const onlyLeft = left.filter(step => !right.includes(step));
    const onlyRight = right.filter(step => !left.includes(step));
    if (onlyLeft.length > 0) {
      lines.push(`        Only in ${a.name}: ${JSON.stringify(onlyLeft)}`);
    }
    if (onlyRight.length > 0) {
      lines.push(`        Only in ${b.name}: ${JSON.stringify(onlyRight)}`);
    }
  }
  const others = Object.entries(entry.fieldDiffs).filter(([field]) => !ENTRY_FIELDS.has(field));
  if (others.length > 0) {
    lines.push("        Other differences:");
    for (const [field, diff] of others) {
      lines.push(`          ${field}: ${formatValue(diff.a)} → ${formatValue(diff.b)}`);
    }
  }
  return lines;
}

function renderEntryCategory(title: string, diff: CategoryDiff<ManifestEntry>, a: SideLabel, b: SideLabel): string[] {
  const lines: string[] = [];
  if (diff.onlyInA.length > 0) {
    lines.push(`  ${title} only in ${a.name}:`);
    for (const entry of diff.onlyInA) {
      lines.push(`    + ${entry.name}`, ...renderEntryDetails(entry));
    }
  }
  if (diff.onlyInB.length > 0) {
    lines.push(`  ${title} only in ${b.name}:`);
    for (const entry of diff.onlyInB) {
      lines.push(`    - ${entry.name}`, ...renderEntryDetails(entry));
    }
  }
  if (diff.differing.length > 0) {
    lines.push(`  ${title} with different configurations:`);
    for (const entry of diff.differing) {
      lines.push(...renderEntryDiff(entry, a, b));
    }
  }
  return lines;
}

function composerLine(marker: string, requirement: ComposerRequirement): string {
  if (requirement.origin === "extension") {
    return `    ${marker} ${requirement.displayName} (composer update)`;
  }
  return `    ${marker} ${requirement.displayName} @ ${requirement.version ?? "dev"}`;
}

function renderComposer(diff: CategoryDiff<ComposerRequirement>, a: SideLabel, b: SideLabel): string[] {
  const lines: string[] = [];
  if (diff.onlyInA.length > 0) {
    lines.push(`  Composer packages only in ${a.name}:`);
    lines.push(...diff.onlyInA.map(requirement => composerLine("+", requirement)));
  }
  if (diff.onlyInB.length > 0) {
    lines.push(`  Composer packages only in ${b.name}:`);
    lines.push(...diff.onlyInB.map(requirement => composerLine("-", requirement)));
  }
  if (diff.differing.length > 0) {
    lines.push("  Composer packages with different versions:");
    for (const entry of diff.differing) {
      const version: FieldDiff | undefined = entry.fieldDiffs.version;
      if (version) {
        lines.push(`    ~ ${entry.name}: ${a.name} ${formatValue(version.a)}, ${b.name} ${formatValue(version.b)}`);
      }
    }
  }
  return lines;
}

function renderRepositories(diff: CategoryDiff<string>, a: SideLabel, b: SideLabel): string[] {
  const lines: string[] = [];
  if (diff.onlyInA.length > 0) {
    lines.push(`  Custom repositories only in ${a.name}:`, ...diff.onlyInA.map(url => `    + ${url}`));
  }
  if (diff.onlyInB.length > 0) {
    lines.push(`  Custom repositories only in ${b.name}:`, ...diff.onlyInB.map(url => `    - ${url}`));
  }
  return lines;
}

/**
 * Render the report in the tool's text layout.
 *
 * @param report - Report produced by `buildReport`.
 * @returns Text without a trailing newline.
 */
export function renderReport(report: ComparisonReport): string {
  const { a, b, result } = report;
  const output = [`Comparing ${sideHeader(a)} vs ${sideHeader(b)}`];
  if (report.mediaWikiVersion) {
    output.push(`MediaWiki Version: ${report.mediaWikiVersion}`);
  }
  output.push(RULE);

  const sections: ReadonlyArray<readonly [string, string[]]> = [
    ["EXTENSIONS:", renderEntryCategory("Extensions", result.extensions, a, b)],
    ["SKINS:", renderEntryCategory("Skins", result.skins, a, b)],
    ["COMPOSER PACKAGES:", renderComposer(result.composerPackages, a, b)],
    ["REPOSITORIES:", renderRepositories(result.repositories, a, b)]
  ];
  for (const [title, lines] of sections) {
    if (lines.length > 0) {
      output.push("", title, ...lines);
    }
  }

  if (!hasDifferences(result)) {
    output.push("", "No differences found!");
  }
  return output.join("\n");
}
