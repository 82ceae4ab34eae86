import { describe, expect, it } from "vitest";

import { parseBugMetadata, parseWhiteboardTags } from "../src/core/metadata-parser";

type BugInput = {
  whiteboard?: string;
  userStory?: string;
  url?: string | null;
};

function bug(input: BugInput = {}) {
  return {
    whiteboardTags: parseWhiteboardTags(input.whiteboard ?? "[privacy-team:diagnosed][exception-baseline]"),
    userStory:
      input.userStory ?? "trackers-blocked: a.com, b.com\nclassifier-features: tracking-protection",
    url: input.url === undefined ? "https://shop.example.com/cart" : input.url,
  };
}

describe("metadata parser", () => {
  it("extracts lower-cased whiteboard tags", () => {
    expect(parseWhiteboardTags("[Privacy-Team:Diagnosed] notes [exception-baseline][ ]")).toEqual([
      "privacy-team:diagnosed",
      "exception-baseline",
    ]);
  });

  it("parses a fully tagged bug", () => {
    expect(parseBugMetadata(bug())).toEqual({
      status: "ok",
      fields: {
        diagnosed: true,
        category: "baseline",
        trackerDomains: ["a.com", "b.com"],
        classifierFeatures: ["tracking-protection"],
        topLevelUrlPattern: "*://shop.example.com/*",
      },
    });
  });

  it("accepts indented, case-insensitive labels and lower-cases domains", () => {
    const result = parseBugMetadata(
      bug({
        whiteboard: "[privacy-team:diagnosed][exception-convenience]",
        userStory: "notes first\n  Trackers-Blocked: CDN.Tracker.net, *.ads.io\r\n\tCLASSIFIER-FEATURES: fingerprinting-protection",
      }),
    );

    expect(result.status).toBe("ok");
    if (result.status !== "ok") return;
    expect(result.fields.category).toBe("convenience");
    expect(result.fields.trackerDomains).toEqual(["cdn.tracker.net", "*.ads.io"]);
    expect(result.fields.classifierFeatures).toEqual(["fingerprinting-protection"]);
  });

  it("treats bugs without the diagnosed tag as not actionable", () => {
    expect(parseBugMetadata(bug({ whiteboard: "[exception-baseline]" }))).toEqual({
      status: "not-actionable",
      reason: "missing [privacy-team:diagnosed] tag",
    });
  });

  it("rejects conflicting category tags as malformed", () => {
    const result = parseBugMetadata(
      bug({ whiteboard: "[privacy-team:diagnosed][exception-baseline][exception-convenience]" }),
    );
    expect(result.status).toBe("malformed");
  });

  it("reports a missing category as incomplete", () => {
    expect(parseBugMetadata(bug({ whiteboard: "[privacy-team:diagnosed]" }))).toEqual({
      status: "incomplete",
      reason: "no exception category tag",
    });
  });

  it("reports a missing classifier-features line as incomplete", () => {
    expect(parseBugMetadata(bug({ userStory: "trackers-blocked: a.com" }))).toEqual({
      status: "incomplete",
      reason: "user story has no classifier-features: line",
    });
  });

  it("reports a blank trackers value as incomplete", () => {
    const result = parseBugMetadata(bug({ userStory: "trackers-blocked:   \nclassifier-features: tracking-protection" }));
    expect(result).toEqual({ status: "incomplete", reason: "trackers-blocked: is empty" });
  });

  it("rejects a repeated label as malformed", () => {
    const result = parseBugMetadata(
      bug({ userStory: "trackers-blocked: a.com\ntrackers-blocked: b.com\nclassifier-features: tracking-protection" }),
    );
    expect(result).toEqual({ status: "malformed", reason: "user story repeats the trackers-blocked: line" });
  });

  it("rejects empty tokens among domains", () => {
    const result = parseBugMetadata(
      bug({ userStory: "trackers-blocked: a.com,,b.com\nclassifier-features: tracking-protection" }),
    );
    expect(result).toEqual({ status: "malformed", reason: "trackers-blocked: contains an empty entry" });
  });

  it("rejects values that are not hostnames", () => {
    const result = parseBugMetadata(
      bug({ userStory: "trackers-blocked: https://a.com/path\nclassifier-features: tracking-protection" }),
    );
    expect(result.status).toBe("malformed");
  });

  it("rejects unknown classifier features", () => {
    const result = parseBugMetadata(bug({ userStory: "trackers-blocked: a.com\nclassifier-features: mystery-blocker" }));
    expect(result).toEqual({ status: "malformed", reason: "classifier-features: unknown feature 'mystery-blocker'" });
  });

  it("requires an http(s) bug URL", () => {
    expect(parseBugMetadata(bug({ url: null }))).toEqual({ status: "incomplete", reason: "bug has no URL" });
    expect(parseBugMetadata(bug({ url: "ftp://files.example.com/" })).status).toBe("malformed");
  });
});
