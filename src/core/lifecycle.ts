import type { Bug, BugTracker } from "./bugzilla";
import type { ServerEnvironment } from "./config";
import { errorMessage } from "./errors";
import { compareText, identityKey, toWireRecord, type ExceptionEntry, type RemoteRecord } from "./exception-entry";
import { isPlanEmpty, type SyncPlan } from "./state-differ";

export const CLOSE_RESOLUTION = "FIXED";

const AUTO_GENERATED_NOTICE = "This message is auto-generated.";

export type LifecycleTransition = "close-and-needinfo";

export type LifecycleOutcome = "planned" | "applied" | "applied-and-closed" | "failed";

export type LifecycleInput = {
  bug: Bug;
  plan: SyncPlan;
  applyFailures: string[];
  records: RemoteRecord[];
  environment: ServerEnvironment;
  dryRun: boolean;
};

export type LifecycleResult = {
  outcome: LifecycleOutcome;
  reason: string | null;
  transition: LifecycleTransition | null;
};

export function buildCloseComment(records: RemoteRecord[]): string {
  const deployed = records.map((record) => {
    const { id: _id, ...wire } = toWireRecord(record, record.id);
    return wire;
  });

  return [
    AUTO_GENERATED_NOTICE,
    "",
    "Enhanced Tracking Protection (ETP) exceptions have been deployed to address this issue.",
    "We have deployed the following exceptions:",
    "```",
    JSON.stringify(deployed, null, 2),
    "```",
    "",
  ].join("\n");
}

export function buildNeedinfoMessage(): string {
  return [
    AUTO_GENERATED_NOTICE,
    "",
    "Would you please verify if the issue is resolved by the ETP exceptions? Really appreciate your help.",
    "",
  ].join("\n");
}

/**
 * Returns the live record for every desired entry, or null while any of them
 * is still missing or pending review.
 */
export function findDeployedRecords(
  desired: ExceptionEntry[],
  records: RemoteRecord[],
): RemoteRecord[] | null {
  const live = new Map<string, RemoteRecord>();
  for (const record of records) {
    if (record.status !== "published") continue;
    const key = identityKey(record);
    if (!live.has(key)) {
      live.set(key, record);
    }
  }

  const deployed: RemoteRecord[] = [];
  for (const entry of desired) {
    const record = live.get(identityKey(entry));
    if (!record) return null;
    deployed.push(record);
  }

  return deployed.sort((left, right) => compareText(identityKey(left), identityKey(right)));
}

export async function advanceBugLifecycle(input: LifecycleInput, tracker: BugTracker): Promise<LifecycleResult> {
  const { bug, plan } = input;

  if (input.applyFailures.length > 0) {
    return {
      outcome: "failed",
      reason: `apply incomplete: ${input.applyFailures.join("; ")}`,
      transition: null,
    };
  }

  const deployed = findDeployedRecords(plan.desired, input.records);

  if (input.dryRun) {
    const wouldClose = input.environment === "prod" && isPlanEmpty(plan) && deployed !== null;
    return {
      outcome: "planned",
      reason: "dry run",
      transition: wouldClose ? "close-and-needinfo" : null,
    };
  }

  if (input.environment !== "prod") {
    return { outcome: "applied", reason: `bugs are not closed on ${input.environment}`, transition: null };
  }

  if (deployed === null) {
    return { outcome: "applied", reason: "awaiting review", transition: null };
  }

  try {
    await tracker.closeBug(bug.id, CLOSE_RESOLUTION, buildCloseComment(deployed));
  } catch (error) {
    return { outcome: "failed", reason: `close failed: ${errorMessage(error)}`, transition: null };
  }

  try {
    const requestee = bug.creator ?? (await tracker.getBugCreator(bug.id));
    if (!requestee) {
      return {
        outcome: "failed",
        reason: "bug closed; needinfo failed: reporter unknown",
        transition: "close-and-needinfo",
      };
    }
    await tracker.requestInfo(bug.id, requestee, buildNeedinfoMessage());
  } catch (error) {
    return {
      outcome: "failed",
      reason: `bug closed; needinfo failed: ${errorMessage(error)}`,
      transition: "close-and-needinfo",
    };
  }

  return { outcome: "applied-and-closed", reason: null, transition: "close-and-needinfo" };
}
