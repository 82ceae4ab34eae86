import { parseFilterExpression, type ExceptionEntry } from "./exception-entry";
import type { BugOutcome, BugOutcomeKind, SyncRunResult } from "./sync-engine";

const OUTCOME_ORDER: BugOutcomeKind[] = [
  "applied-and-closed",
  "applied",
  "planned",
  "skipped-conflict",
  "skipped-not-actionable",
  "skipped-incomplete",
  "skipped-malformed",
  "failed",
];

export function describeVersionRange(filterExpression: string | null): string {
  const range = parseFilterExpression(filterExpression);
  if (!range) return `filter ${filterExpression ?? ""}`.trim();
  if (range.min === null && range.max === null) return "all versions";
  if (range.min === null) return `< ${range.max}`;
  if (range.max === null) return `>= ${range.min}`;
  return `>= ${range.min} < ${range.max}`;
}

export function describeEntry(entry: ExceptionEntry): string {
  const site = entry.topLevelUrlPattern ?? "global";
  return `${entry.category} ${entry.urlPattern} on ${site} ${entry.classifierFeatures.join(",")} [${describeVersionRange(entry.filterExpression)}]`;
}

function describeTransition(outcome: BugOutcome): string | null {
  if (!outcome.transition) return null;
  if (outcome.outcome === "planned") return "would close bug and needinfo reporter";
  if (outcome.outcome === "applied-and-closed") return "closed bug and sent needinfo";
  return "closed bug";
}

export function formatBugOutcome(outcome: BugOutcome): string[] {
  const reason = outcome.reason ? ` (${outcome.reason})` : "";
  const lines = [`bug ${outcome.bugId}: ${outcome.outcome}${reason}`];

  if (outcome.plan) {
    for (const id of outcome.plan.toRemove) {
      lines.push(`  - remove ${id}`);
    }
    for (const entry of outcome.plan.toCreate) {
      lines.push(`  + create ${describeEntry(entry)}`);
    }
  }

  const transition = describeTransition(outcome);
  if (transition) {
    lines.push(`  > ${transition}`);
  }

  return lines;
}

export function countOutcomes(outcomes: BugOutcome[]): Map<BugOutcomeKind, number> {
  const counts = new Map<BugOutcomeKind, number>();
  for (const kind of OUTCOME_ORDER) {
    const count = outcomes.filter((outcome) => outcome.outcome === kind).length;
    if (count > 0) counts.set(kind, count);
  }
  return counts;
}

export function formatRunReport(result: SyncRunResult, dryRun: boolean): string[] {
  const lines: string[] = [];

  if (!result.outcomes.length) {
    lines.push("auto: no candidate bugs.");
  } else {
    lines.push(dryRun ? "auto: planned changes:" : "auto: results:");
    for (const outcome of result.outcomes) {
      lines.push(...formatBugOutcome(outcome));
    }
  }

  const totals = Array.from(countOutcomes(result.outcomes), ([kind, count]) => `${kind}=${count}`);
  lines.push(`auto: totals ${totals.length ? totals.join(" ") : "none"}`);
  return lines;
}
