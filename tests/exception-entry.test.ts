import { describe, expect, it } from "vitest";

import { ValidationError } from "../src/core/errors";
import {
  identityKey,
  parseExceptionInput,
  parseFilterExpression,
  parseRemoteRecord,
  recordIdFor,
  renderFilterExpression,
  sortBugIds,
  toWireRecord,
  type ExceptionEntry,
} from "../src/core/exception-entry";

function entry(overrides: Partial<ExceptionEntry> = {}): ExceptionEntry {
  return {
    bugIds: ["100"],
    category: "baseline",
    urlPattern: "*://a.com/*",
    topLevelUrlPattern: "*://site.example/*",
    classifierFeatures: ["tracking-protection"],
    filterExpression: 'env.version|versionCompare("142.0a1") >= 0',
    ...overrides,
  };
}

describe("exception entry", () => {
  it("renders and parses version filter expressions", () => {
    expect(renderFilterExpression({ min: null, max: "142.0a1" })).toBe('env.version|versionCompare("142.0a1") < 0');
    expect(renderFilterExpression({ min: "140.0", max: "142.0a1" })).toBe(
      'env.version|versionCompare("140.0") >= 0 && env.version|versionCompare("142.0a1") < 0',
    );
    expect(renderFilterExpression({ min: null, max: null })).toBeNull();

    expect(parseFilterExpression('env.version|versionCompare("142.0a1")>=0')).toEqual({ min: "142.0a1", max: null });
    expect(parseFilterExpression(null)).toEqual({ min: null, max: null });
    expect(parseFilterExpression('env.channel == "nightly"')).toBeNull();
  });

  it("builds the same identity key regardless of owners and feature order", () => {
    const left = entry({ bugIds: ["1"], classifierFeatures: ["b-feature", "a-feature"] });
    const right = entry({
      bugIds: ["2", "3"],
      classifierFeatures: ["a-feature", "b-feature"],
      filterExpression: 'env.version|versionCompare("142.0a1")  >=  0',
    });

    expect(identityKey(left)).toBe(identityKey(right));
    expect(identityKey(left)).toBe(
      'baseline|*://site.example/*|*://a.com/*|a-feature,b-feature|env.version|versionCompare("142.0a1") >= 0',
    );
  });

  it("distinguishes keys by top-level site and version range", () => {
    expect(identityKey(entry())).not.toBe(identityKey(entry({ topLevelUrlPattern: null })));
    expect(identityKey(entry())).not.toBe(identityKey(entry({ filterExpression: null })));
    expect(identityKey(entry({ topLevelUrlPattern: null, filterExpression: null }))).toBe(
      "baseline|global|*://a.com/*|tracking-protection|all",
    );
  });

  it("sorts bug ids numerically and removes duplicates", () => {
    expect(sortBugIds(["20", "3", "20", "100"])).toEqual(["3", "20", "100"]);
  });

  it("derives a stable uuid-shaped record id from the identity key alone", () => {
    const id = recordIdFor(entry({ bugIds: ["2", "1"] }));
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(recordIdFor(entry({ bugIds: ["1"] }))).toBe(id);
    expect(recordIdFor(entry({ urlPattern: "*://other.com/*" }))).not.toBe(id);
  });

  it("reads legacy records with a single bugId and no category", () => {
    const record = parseRemoteRecord(
      { id: "rec-1", bugId: 1234, urlPattern: "*://a.com/*", classifierFeatures: ["tracking-protection"], last_modified: 1 },
      "pending",
    );

    expect(record).toEqual({
      id: "rec-1",
      status: "pending",
      bugIds: ["1234"],
      category: "convenience",
      urlPattern: "*://a.com/*",
      topLevelUrlPattern: null,
      classifierFeatures: ["tracking-protection"],
      filterExpression: null,
    });
  });

  it("rejects records without url pattern or features", () => {
    expect(() => parseExceptionInput({ bugIds: ["1"], classifierFeatures: ["tracking-protection"] })).toThrow(
      ValidationError,
    );
    expect(() => parseExceptionInput({ bugIds: ["1"], urlPattern: "*://a.com/*", classifierFeatures: [] })).toThrow(
      "invalid exception record (classifierFeatures:",
    );
  });

  it("writes wire records with the remote field names", () => {
    const wire = toWireRecord(
      entry({
        bugIds: ["9", "1"],
        filterExpression: 'env.version|versionCompare("142.0a1") < 0',
        isPrivateBrowsingOnly: true,
        filterContentBlockingCategories: ["standard"],
      }),
      "rec-9",
    );

    expect(wire).toEqual({
      id: "rec-9",
      bugIds: ["1", "9"],
      category: "baseline",
      urlPattern: "*://a.com/*",
      topLevelUrlPattern: "*://site.example/*",
      classifierFeatures: ["tracking-protection"],
      isPrivateBrowsingOnly: true,
      filterContentBlockingCategories: ["standard"],
      filter_expression: 'env.version|versionCompare("142.0a1") < 0',
    });
  });
});
