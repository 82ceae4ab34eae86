import type { Bug } from "./bugzilla";
import type { ExceptionCategory } from "./exception-entry";

export const DIAGNOSED_TAG = "privacy-team:diagnosed";

const CATEGORY_TAGS: ReadonlyArray<{ tag: string; category: ExceptionCategory }> = [
  { tag: "exception-baseline", category: "baseline" },
  { tag: "exception-convenience", category: "convenience" },
];

const TRACKERS_LABEL = "trackers-blocked";
const FEATURES_LABEL = "classifier-features";

export const KNOWN_CLASSIFIER_FEATURES: readonly string[] = [
  "tracking-protection",
  "tracking-annotation",
  "emailtracking-protection",
  "emailtracking-data-collection",
  "fingerprinting-protection",
  "fingerprinting-annotation",
  "cryptomining-protection",
  "cryptomining-annotation",
  "socialtracking-protection",
  "socialtracking-annotation",
];

const HOSTNAME = /^(\*\.)?([a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)(\.[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)+$/;

export type StructuredFields = {
  diagnosed: true;
  category: ExceptionCategory;
  trackerDomains: string[];
  classifierFeatures: string[];
  topLevelUrlPattern: string;
};

export type MetadataRejection = "not-actionable" | "incomplete" | "malformed";

export type MetadataParseResult =
  | { status: "ok"; fields: StructuredFields }
  | { status: MetadataRejection; reason: string };

type LabeledLine =
  | { state: "missing" }
  | { state: "duplicate" }
  | { state: "present"; value: string };

type TokenList = { state: "empty" } | { state: "has-empty-token" } | { state: "ok"; tokens: string[] };

export function parseWhiteboardTags(whiteboard: string): string[] {
  const tags: string[] = [];
  const regex = /\[([^\]]*)\]/g;
  let match: RegExpExecArray | null = regex.exec(whiteboard);

  while (match) {
    const tag = match[1]?.trim().toLowerCase();
    if (tag) {
      tags.push(tag);
    }
    match = regex.exec(whiteboard);
  }

  return tags;
}

function findLabeledLine(userStory: string, label: string): LabeledLine {
  const prefix = `${label}:`;
  let found: string | null = null;

  for (const rawLine of userStory.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line.toLowerCase().startsWith(prefix)) continue;
    if (found !== null) return { state: "duplicate" };
    found = line.slice(prefix.length);
  }

  return found === null ? { state: "missing" } : { state: "present", value: found };
}

function splitTokens(value: string): TokenList {
  if (!value.trim()) {
    return { state: "empty" };
  }

  const tokens = value.split(",").map((token) => token.trim());
  if (tokens.some((token) => !token)) {
    return { state: "has-empty-token" };
  }

  return { state: "ok", tokens };
}

function lineRejection(label: string, line: Exclude<LabeledLine, { state: "present" }>): MetadataParseResult {
  if (line.state === "duplicate") {
    return { status: "malformed", reason: `user story repeats the ${label}: line` };
  }
  return { status: "incomplete", reason: `user story has no ${label}: line` };
}

function topLevelPatternFromUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return null;
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return null;
  if (!parsed.hostname) return null;
  return `*://${parsed.hostname}/*`;
}

export function parseBugMetadata(bug: Pick<Bug, "whiteboardTags" | "userStory" | "url">): MetadataParseResult {
  const tags = new Set(bug.whiteboardTags.map((tag) => tag.trim().toLowerCase()));

  if (!tags.has(DIAGNOSED_TAG)) {
    return { status: "not-actionable", reason: `missing [${DIAGNOSED_TAG}] tag` };
  }

  const categories = CATEGORY_TAGS.filter((entry) => tags.has(entry.tag));
  if (categories.length > 1) {
    return { status: "malformed", reason: "both [exception-baseline] and [exception-convenience] are set" };
  }
  const category = categories[0]?.category;
  if (!category) {
    return { status: "incomplete", reason: "no exception category tag" };
  }

  const trackersLine = findLabeledLine(bug.userStory, TRACKERS_LABEL);
  if (trackersLine.state !== "present") {
    return lineRejection(TRACKERS_LABEL, trackersLine);
  }
  const featuresLine = findLabeledLine(bug.userStory, FEATURES_LABEL);
  if (featuresLine.state !== "present") {
    return lineRejection(FEATURES_LABEL, featuresLine);
  }

  const domains = splitTokens(trackersLine.value);
  if (domains.state === "empty") {
    return { status: "incomplete", reason: `${TRACKERS_LABEL}: is empty` };
  }
  if (domains.state === "has-empty-token") {
    return { status: "malformed", reason: `${TRACKERS_LABEL}: contains an empty entry` };
  }

  const trackerDomains = domains.tokens.map((token) => token.toLowerCase());
  const badDomain = trackerDomains.find((domain) => !HOSTNAME.test(domain));
  if (badDomain !== undefined) {
    return { status: "malformed", reason: `${TRACKERS_LABEL}: '${badDomain}' is not a hostname` };
  }

  const features = splitTokens(featuresLine.value);
  if (features.state === "empty") {
    return { status: "incomplete", reason: `${FEATURES_LABEL}: is empty` };
  }
  if (features.state === "has-empty-token") {
    return { status: "malformed", reason: `${FEATURES_LABEL}: contains an empty entry` };
  }

  const classifierFeatures = features.tokens.map((token) => token.toLowerCase());
  const unknownFeature = classifierFeatures.find((feature) => !KNOWN_CLASSIFIER_FEATURES.includes(feature));
  if (unknownFeature !== undefined) {
    return { status: "malformed", reason: `${FEATURES_LABEL}: unknown feature '${unknownFeature}'` };
  }

  if (!bug.url?.trim()) {
    return { status: "incomplete", reason: "bug has no URL" };
  }
  const topLevelUrlPattern = topLevelPatternFromUrl(bug.url);
  if (!topLevelUrlPattern) {
    return { status: "malformed", reason: `bug URL '${bug.url}' is not an http(s) URL` };
  }

  return {
    status: "ok",
    fields: {
      diagnosed: true,
      category,
      trackerDomains,
      classifierFeatures,
      topLevelUrlPattern,
    },
  };
}
