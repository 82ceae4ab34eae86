import { createHash } from "node:crypto";
import { z } from "zod";
import { ValidationError } from "./errors";

export const EXCEPTION_CATEGORIES = ["baseline", "convenience"] as const;
export type ExceptionCategory = (typeof EXCEPTION_CATEGORIES)[number];

/** `min` inclusive, `max` exclusive; `null` leaves that side unbounded. */
export type VersionRange = {
  min: string | null;
  max: string | null;
};

export type ExceptionEntry = {
  bugIds: string[];
  category: ExceptionCategory;
  urlPattern: string;
  topLevelUrlPattern: string | null;
  classifierFeatures: string[];
  filterExpression: string | null;
  isPrivateBrowsingOnly?: boolean;
  filterContentBlockingCategories?: string[];
};

export type RemoteRecordStatus = "published" | "pending";

export type RemoteRecord = ExceptionEntry & {
  id: string;
  status: RemoteRecordStatus;
};

export type WireRecord = {
  id: string;
  bugIds: string[];
  category: ExceptionCategory;
  urlPattern: string;
  classifierFeatures: string[];
  topLevelUrlPattern?: string;
  isPrivateBrowsingOnly?: boolean;
  filterContentBlockingCategories?: string[];
  filter_expression?: string;
};

const BugIdSchema = z.union([z.string().min(1), z.number().int().positive()]).transform((value) => String(value));

const ExceptionInputSchema = z
  .object({
    id: z.string().min(1).optional(),
    bugIds: z.array(BugIdSchema).optional(),
    bugId: BugIdSchema.optional(),
    urlPattern: z.string().min(1),
    classifierFeatures: z.array(z.string().min(1)).min(1),
    category: z.enum(EXCEPTION_CATEGORIES).optional(),
    topLevelUrlPattern: z.string().min(1).optional(),
    isPrivateBrowsingOnly: z.boolean().optional(),
    filterContentBlockingCategories: z.array(z.string().min(1)).optional(),
    filter_expression: z.string().optional(),
  })
  .passthrough();

const VERSION_CLAUSE = /^env\.version\|versionCompare\("([^"]+)"\)\s*(>=|<)\s*0$/;

export function renderFilterExpression(range: VersionRange): string | null {
  const clauses: string[] = [];
  if (range.min !== null) clauses.push(`env.version|versionCompare("${range.min}") >= 0`);
  if (range.max !== null) clauses.push(`env.version|versionCompare("${range.max}") < 0`);
  return clauses.length ? clauses.join(" && ") : null;
}

export function parseFilterExpression(expression: string | null | undefined): VersionRange | null {
  const trimmed = expression?.trim() ?? "";
  if (!trimmed) {
    return { min: null, max: null };
  }

  const range: VersionRange = { min: null, max: null };
  for (const clause of trimmed.split("&&")) {
    const match = VERSION_CLAUSE.exec(clause.trim());
    if (!match) return null;

    const [, version = "", operator] = match;
    if (operator === ">=") {
      if (range.min !== null) return null;
      range.min = version;
    } else {
      if (range.max !== null) return null;
      range.max = version;
    }
  }

  return range;
}

function normalizeFilterExpression(expression: string | null): string {
  if (expression === null) return "all";
  const range = parseFilterExpression(expression);
  if (!range) return `raw:${expression.trim()}`;
  return renderFilterExpression(range) ?? "all";
}

export function identityKey(entry: Pick<
  ExceptionEntry,
  "category" | "topLevelUrlPattern" | "urlPattern" | "classifierFeatures" | "filterExpression"
>): string {
  const features = Array.from(new Set(entry.classifierFeatures)).sort().join(",");
  return [
    entry.category,
    entry.topLevelUrlPattern ?? "global",
    entry.urlPattern,
    features,
    normalizeFilterExpression(entry.filterExpression),
  ].join("|");
}

export function compareText(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export function sortBugIds(bugIds: Iterable<string>): string[] {
  return Array.from(new Set(bugIds)).sort((left, right) => {
    const diff = Number(left) - Number(right);
    return Number.isNaN(diff) || diff === 0 ? left.localeCompare(right) : diff;
  });
}

export function recordIdFor(entry: ExceptionEntry): string {
  const digest = createHash("sha256").update(identityKey(entry)).digest("hex");
  const variant = ((Number.parseInt(digest.slice(16, 17), 16) & 0x3) | 0x8).toString(16);
  return [
    digest.slice(0, 8),
    digest.slice(8, 12),
    `5${digest.slice(13, 16)}`,
    `${variant}${digest.slice(17, 20)}`,
    digest.slice(20, 32),
  ].join("-");
}

export function parseExceptionInput(raw: unknown): ExceptionEntry & { id: string | null } {
  const parsed = ExceptionInputSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? issue.path.join(".") : "record";
    throw new ValidationError(`invalid exception record (${where}: ${issue?.message ?? "unknown error"})`);
  }

  const data = parsed.data;
  const bugIds = data.bugIds ?? (data.bugId !== undefined ? [data.bugId] : []);
  const entry: ExceptionEntry & { id: string | null } = {
    id: data.id ?? null,
    bugIds,
    category: data.category ?? "convenience",
    urlPattern: data.urlPattern,
    topLevelUrlPattern: data.topLevelUrlPattern ?? null,
    classifierFeatures: data.classifierFeatures,
    filterExpression: data.filter_expression?.trim() ? data.filter_expression : null,
  };

  if (data.isPrivateBrowsingOnly !== undefined) {
    entry.isPrivateBrowsingOnly = data.isPrivateBrowsingOnly;
  }
  if (data.filterContentBlockingCategories !== undefined) {
    entry.filterContentBlockingCategories = data.filterContentBlockingCategories;
  }

  return entry;
}

export function parseRemoteRecord(raw: unknown, status: RemoteRecordStatus): RemoteRecord {
  const { id, ...entry } = parseExceptionInput(raw);
  if (id === null) {
    throw new ValidationError("invalid exception record (id: Required)");
  }
  return { ...entry, id, status };
}

export function toWireRecord(entry: ExceptionEntry, id: string): WireRecord {
  const wire: WireRecord = {
    id,
    bugIds: sortBugIds(entry.bugIds),
    category: entry.category,
    urlPattern: entry.urlPattern,
    classifierFeatures: [...entry.classifierFeatures],
  };

  if (entry.topLevelUrlPattern !== null) wire.topLevelUrlPattern = entry.topLevelUrlPattern;
  if (entry.isPrivateBrowsingOnly !== undefined) wire.isPrivateBrowsingOnly = entry.isPrivateBrowsingOnly;
  if (entry.filterContentBlockingCategories !== undefined) {
    wire.filterContentBlockingCategories = [...entry.filterContentBlockingCategories];
  }
  if (entry.filterExpression !== null) wire.filter_expression = entry.filterExpression;

  return wire;
}
