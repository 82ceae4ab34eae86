import pLimit from "p-limit";
import type { Bug, BugTracker } from "./bugzilla";
import type { RunConfig } from "./config";
import { ConflictError, errorMessage } from "./errors";
import { compareText } from "./exception-entry";
import { domainUrlPattern, findGlobalExemptions, planExceptionEntries } from "./exception-planner";
import { advanceBugLifecycle, type LifecycleTransition } from "./lifecycle";
import { parseBugMetadata, type MetadataRejection } from "./metadata-parser";
import type { ExceptionStore, RecordFilter } from "./remote-settings";
import { diffExceptionState, isPlanEmpty, type StateConflict, type SyncPlan } from "./state-differ";

export type BugOutcomeKind =
  | "skipped-not-actionable"
  | "skipped-incomplete"
  | "skipped-malformed"
  | "skipped-conflict"
  | "planned"
  | "applied"
  | "applied-and-closed"
  | "failed";

export type BugOutcome = {
  bugId: number;
  outcome: BugOutcomeKind;
  reason: string | null;
  plan: SyncPlan | null;
  transition: LifecycleTransition | null;
};

export type SyncRunResult = {
  outcomes: BugOutcome[];
  exitCode: 0 | 1;
};

export type SyncDependencies = {
  tracker: BugTracker;
  store: ExceptionStore;
  log?: (line: string) => void;
};

const CLOSED_STATUSES = new Set(["RESOLVED", "VERIFIED", "CLOSED"]);

const SKIP_OUTCOMES: Record<MetadataRejection, BugOutcomeKind> = {
  "not-actionable": "skipped-not-actionable",
  incomplete: "skipped-incomplete",
  malformed: "skipped-malformed",
};

const FAILING_OUTCOMES = new Set<BugOutcomeKind>(["failed", "skipped-conflict"]);

function skipped(bug: Bug, outcome: BugOutcomeKind, reason: string, plan: SyncPlan | null = null): BugOutcome {
  return { bugId: bug.id, outcome, reason, plan, transition: null };
}

export function describeConflicts(conflicts: StateConflict[]): string {
  return conflicts
    .map((conflict) => `${conflict.kind} on ${conflict.recordId} (bugs ${conflict.ownerBugIds.join(", ")})`)
    .join("; ");
}

function recordFilterFor(bugId: string, domains: string[]): RecordFilter {
  return {
    bugId,
    urlPatterns: Array.from(new Set(domains.map(domainUrlPattern))).sort(compareText),
  };
}

async function applyPlan(plan: SyncPlan, store: ExceptionStore): Promise<{ changed: boolean; failures: string[] }> {
  const failures: string[] = [];
  let changed = false;

  for (const id of plan.toRemove) {
    try {
      await store.deleteRecord(id);
      changed = true;
    } catch (error) {
      failures.push(`remove ${id}: ${errorMessage(error)}`);
    }
  }

  if (failures.length > 0) {
    return { changed, failures };
  }

  for (const entry of plan.toCreate) {
    try {
      await store.createRecord(entry);
      changed = true;
    } catch (error) {
      // Ids derive from the identity key: a 412 means the record is already in the workspace.
      if (error instanceof ConflictError) {
        changed = true;
        continue;
      }
      failures.push(`create ${entry.urlPattern} ${entry.classifierFeatures.join(",")}: ${errorMessage(error)}`);
    }
  }

  return { changed, failures };
}

async function processBug(
  bug: Bug,
  config: RunConfig,
  deps: SyncDependencies,
  log: (line: string) => void,
): Promise<BugOutcome> {
  if (CLOSED_STATUSES.has(bug.status)) {
    return skipped(bug, "skipped-not-actionable", `bug is ${bug.status}`);
  }
  if (bug.status === "REOPENED") {
    return skipped(bug, "skipped-not-actionable", "bug was reopened");
  }

  const parsed = parseBugMetadata(bug);
  if (parsed.status !== "ok") {
    return skipped(bug, SKIP_OUTCOMES[parsed.status], parsed.reason);
  }

  const bugId = String(bug.id);
  const filter = recordFilterFor(bugId, parsed.fields.trackerDomains);
  const records = await deps.store.listRecords(filter);

  const exemptions = findGlobalExemptions(parsed.fields.trackerDomains, records);
  for (const exemption of exemptions) {
    log(`auto: bug ${bug.id} ${exemption.domain} is covered by global exception ${exemption.recordId}`);
  }
  const exempt = new Set(exemptions.map((exemption) => exemption.domain));
  const trackerDomains = parsed.fields.trackerDomains.filter((domain) => !exempt.has(domain));
  if (trackerDomains.length === 0) {
    return skipped(bug, "skipped-not-actionable", "covered by global exceptions");
  }

  const desired = planExceptionEntries({ ...parsed.fields, trackerDomains }, bugId, config.settings.cutoffVersion);
  // Global records are maintained by hand; the engine only manages site-scoped ones.
  const siteRecords = records.filter((record) => record.topLevelUrlPattern !== null);
  const plan = diffExceptionState(bugId, desired, siteRecords, { force: config.force });

  if (plan.blocked) {
    return skipped(bug, "skipped-conflict", describeConflicts(plan.conflicts), plan);
  }

  let after = records;
  let applyFailures: string[] = [];
  if (!config.dryRun && !isPlanEmpty(plan)) {
    const applied = await applyPlan(plan, deps.store);
    applyFailures = applied.failures;

    if (applied.changed) {
      try {
        await deps.store.requestReview();
      } catch (error) {
        applyFailures.push(`request review: ${errorMessage(error)}`);
      }
      after = await deps.store.listRecords(filter);
    }
  }

  const lifecycle = await advanceBugLifecycle(
    {
      bug,
      plan,
      applyFailures,
      records: after,
      environment: config.environment,
      dryRun: config.dryRun,
    },
    deps.tracker,
  );

  return { bugId: bug.id, outcome: lifecycle.outcome, reason: lifecycle.reason, plan, transition: lifecycle.transition };
}

export async function runAutoSync(config: RunConfig, deps: SyncDependencies): Promise<SyncRunResult> {
  const log = deps.log ?? (() => undefined);
  const { product, component } = config.settings.bugzilla;

  const bugs = await deps.tracker.searchBugs({ product, component });
  log(`auto: ${bugs.length} candidate bug(s) on ${config.environment}${config.dryRun ? " (dry run)" : ""}`);

  const limit = pLimit(config.settings.concurrency);
  const outcomes = await Promise.all(
    bugs.map((bug) =>
      limit(async (): Promise<BugOutcome> => {
        let outcome: BugOutcome;
        try {
          outcome = await processBug(bug, config, deps, log);
        } catch (error) {
          outcome = { bugId: bug.id, outcome: "failed", reason: errorMessage(error), plan: null, transition: null };
        }
        log(`auto: bug ${bug.id} ${outcome.outcome}${outcome.reason ? ` (${outcome.reason})` : ""}`);
        return outcome;
      }),
    ),
  );

  outcomes.sort((left, right) => left.bugId - right.bugId);
  const exitCode = outcomes.some((outcome) => FAILING_OUTCOMES.has(outcome.outcome)) ? 1 : 0;
  return { outcomes, exitCode };
}
