import { compareText, identityKey, sortBugIds, type ExceptionEntry, type RemoteRecord } from "./exception-entry";

export type StateConflict = {
  kind: "shared-removal";
  key: string;
  recordId: string;
  ownerBugIds: string[];
};

export type SyncPlan = {
  bugId: string;
  desired: ExceptionEntry[];
  toCreate: ExceptionEntry[];
  toRemove: string[];
  conflicts: StateConflict[];
  blocked: boolean;
};

export type DiffOptions = {
  force: boolean;
};

function stripRecord(record: RemoteRecord): ExceptionEntry {
  const { id: _id, status: _status, ...entry } = record;
  return entry;
}

function byId(left: RemoteRecord, right: RemoteRecord): number {
  return compareText(left.id, right.id);
}

export function isPlanEmpty(plan: Pick<SyncPlan, "toCreate" | "toRemove">): boolean {
  return plan.toCreate.length === 0 && plan.toRemove.length === 0;
}

export function diffExceptionState(
  bugId: number | string,
  desired: ExceptionEntry[],
  records: RemoteRecord[],
  options: DiffOptions,
): SyncPlan {
  const owner = String(bugId);
  const desiredByKey = new Map<string, ExceptionEntry>();
  for (const entry of desired) {
    const key = identityKey(entry);
    if (!desiredByKey.has(key)) {
      desiredByKey.set(key, entry);
    }
  }

  const recordsByKey = new Map<string, RemoteRecord[]>();
  for (const record of [...records].sort(byId)) {
    const key = identityKey(record);
    const bucket = recordsByKey.get(key) ?? [];
    bucket.push(record);
    recordsByKey.set(key, bucket);
  }

  const toCreate: ExceptionEntry[] = [];
  const toRemove = new Set<string>();
  const conflicts: StateConflict[] = [];

  for (const [key, entry] of desiredByKey) {
    const matching = recordsByKey.get(key) ?? [];
    const own = matching.filter((record) => record.bugIds.includes(owner));

    if (own.length > 0) {
      for (const duplicate of own.slice(1)) {
        if (duplicate.bugIds.every((id) => id === owner)) {
          toRemove.add(duplicate.id);
        }
      }
      continue;
    }

    if (matching.length === 0) {
      toCreate.push(entry);
      continue;
    }

    // Held only by other bugs: the key is satisfied. Under force this bug joins the owners.
    if (options.force) {
      const owners: string[] = [owner];
      for (const record of matching) {
        owners.push(...record.bugIds);
        toRemove.add(record.id);
      }
      toCreate.push({ ...entry, bugIds: sortBugIds(owners) });
    }
  }

  for (const [key, matching] of recordsByKey) {
    if (desiredByKey.has(key)) continue;

    for (const record of matching) {
      if (!record.bugIds.includes(owner)) continue;

      const remainingOwners = record.bugIds.filter((id) => id !== owner);
      if (remainingOwners.length === 0) {
        toRemove.add(record.id);
        continue;
      }

      conflicts.push({ kind: "shared-removal", key, recordId: record.id, ownerBugIds: sortBugIds(record.bugIds) });
      if (options.force) {
        toRemove.add(record.id);
        toCreate.push({ ...stripRecord(record), bugIds: sortBugIds(remainingOwners) });
      }
    }
  }

  return {
    bugId: owner,
    desired: Array.from(desiredByKey.values()),
    toCreate: toCreate.sort((left, right) => compareText(identityKey(left), identityKey(right))),
    toRemove: Array.from(toRemove).sort(compareText),
    conflicts,
    blocked: conflicts.length > 0 && !options.force,
  };
}
