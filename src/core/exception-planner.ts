import { compareText, identityKey, renderFilterExpression, type ExceptionEntry, type RemoteRecord, type VersionRange } from "./exception-entry";
import type { StructuredFields } from "./metadata-parser";

export const DEFAULT_CUTOFF_VERSION = "142.0a1";

const PRE_CUTOFF_CONTENT_BLOCKING_CATEGORIES = ["standard"];

export type VersionWindow = {
  name: "before-cutoff" | "from-cutoff";
  range: VersionRange;
};

export function versionWindows(cutoffVersion: string): [VersionWindow, VersionWindow] {
  return [
    { name: "before-cutoff", range: { min: null, max: cutoffVersion } },
    { name: "from-cutoff", range: { min: cutoffVersion, max: null } },
  ];
}

export function domainUrlPattern(domain: string): string {
  return `*://${domain}/*`;
}

export function isGlobalBlockingException(entry: ExceptionEntry): boolean {
  return entry.topLevelUrlPattern === null && entry.classifierFeatures.some((feature) => feature.endsWith("-protection"));
}

export type GlobalExemption = {
  domain: string;
  recordId: string;
};

export function findGlobalExemptions(domains: string[], records: RemoteRecord[]): GlobalExemption[] {
  const globalRecords = records.filter(isGlobalBlockingException);
  const exemptions: GlobalExemption[] = [];
  for (const domain of unique(domains)) {
    const record = globalRecords.find((candidate) => candidate.urlPattern === domainUrlPattern(domain));
    if (record) {
      exemptions.push({ domain, recordId: record.id });
    }
  }
  return exemptions;
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values)).sort(compareText);
}

export function planExceptionEntries(fields: StructuredFields, bugId: number | string, cutoffVersion: string): ExceptionEntry[] {
  const entries: ExceptionEntry[] = [];

  for (const domain of unique(fields.trackerDomains)) {
    for (const feature of unique(fields.classifierFeatures)) {
      for (const window of versionWindows(cutoffVersion)) {
        const entry: ExceptionEntry = {
          bugIds: [String(bugId)],
          category: fields.category,
          urlPattern: domainUrlPattern(domain),
          topLevelUrlPattern: fields.topLevelUrlPattern,
          classifierFeatures: [feature],
          filterExpression: renderFilterExpression(window.range),
        };

        // Clients before the cutoff only honor the exception in private browsing under ETP standard.
        if (window.name === "before-cutoff") {
          entry.isPrivateBrowsingOnly = true;
          entry.filterContentBlockingCategories = [...PRE_CUTOFF_CONTENT_BLOCKING_CATEGORIES];
        }

        entries.push(entry);
      }
    }
  }

  return entries.sort((left, right) => compareText(identityKey(left), identityKey(right)));
}
