import { describe, expect, it, vi } from "vitest";

import { createBugzillaClient } from "../src/core/bugzilla";
import { HttpError, TransientError } from "../src/core/errors";
import type { FetchFn } from "../src/core/http";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

const NO_BACKOFF = { backoffMs: [0, 0, 0] };

describe("bugzilla client", () => {
  it("searches open bugs in the configured component", async () => {
    const fetchFn = vi.fn<FetchFn>(async () =>
      jsonResponse({
        bugs: [
          {
            id: 1934,
            summary: "Login broken",
            url: " https://site.example/login ",
            whiteboard: "[privacy-team:diagnosed][exception-baseline]",
            status: "NEW",
            resolution: "",
            cf_user_story: "trackers-blocked: a.com",
            creator: "reporter@example.com",
          },
        ],
      }),
    );
    const client = createBugzillaClient({ baseUrl: "https://bugzilla.test/", apiKey: "test-secret", fetchFn });

    const bugs = await client.searchBugs({ product: "Web Compatibility", component: "Privacy: Site Reports" });

    expect(bugs).toEqual([
      {
        id: 1934,
        summary: "Login broken",
        url: "https://site.example/login",
        whiteboard: "[privacy-team:diagnosed][exception-baseline]",
        whiteboardTags: ["privacy-team:diagnosed", "exception-baseline"],
        userStory: "trackers-blocked: a.com",
        status: "NEW",
        resolution: "",
        creator: "reporter@example.com",
      },
    ]);

    const [input, init] = fetchFn.mock.calls[0] ?? [];
    const url = new URL(String(input));
    expect(url.origin + url.pathname).toBe("https://bugzilla.test/rest/bug");
    expect(url.searchParams.get("product")).toBe("Web Compatibility");
    expect(url.searchParams.get("component")).toBe("Privacy: Site Reports");
    expect(url.searchParams.get("resolution")).toBe("---");
    expect(url.searchParams.get("f1")).toBeNull();
    expect(new Headers(init?.headers).get("X-BUGZILLA-API-KEY")).toBe("test-secret");
  });

  it("filters by whiteboard tag when asked", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ bugs: [] }));
    const client = createBugzillaClient({ baseUrl: "https://bugzilla.test", fetchFn });

    await client.searchBugs({ product: "P", component: "C", whiteboardTag: "privacy-team:diagnosed" });

    const url = new URL(String(fetchFn.mock.calls[0]?.[0]));
    expect(url.searchParams.get("f1")).toBe("status_whiteboard");
    expect(url.searchParams.get("o1")).toBe("substring");
    expect(url.searchParams.get("v1")).toBe("[privacy-team:diagnosed]");
  });

  it("retries searches after a transient server error", async () => {
    let calls = 0;
    const fetchFn = vi.fn<FetchFn>(async () => {
      calls += 1;
      return calls === 1 ? new Response("", { status: 502 }) : jsonResponse({ bugs: [] });
    });
    const client = createBugzillaClient({ baseUrl: "https://bugzilla.test", fetchFn, retry: NO_BACKOFF });

    await expect(client.searchBugs({ product: "P", component: "C" })).resolves.toEqual([]);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("closes a bug with a resolution and comment", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ bugs: [{ id: 5, changes: {} }] }));
    const client = createBugzillaClient({ baseUrl: "https://bugzilla.test", apiKey: "test-secret", fetchFn });

    await client.closeBug(5, "FIXED", "done");

    const [input, init] = fetchFn.mock.calls[0] ?? [];
    expect(String(input)).toBe("https://bugzilla.test/rest/bug/5");
    expect(init?.method).toBe("PUT");
    expect(JSON.parse(String(init?.body))).toEqual({ status: "RESOLVED", resolution: "FIXED", comment: { body: "done" } });
  });

  it("sends needinfo flags with the comment", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ bugs: [] }));
    const client = createBugzillaClient({ baseUrl: "https://bugzilla.test", apiKey: "test-secret", fetchFn });

    await client.requestInfo(5, "reporter@example.com", "please verify");

    expect(JSON.parse(String(fetchFn.mock.calls[0]?.[1]?.body))).toEqual({
      flags: [{ name: "needinfo", status: "?", requestee: "reporter@example.com" }],
      comment: { body: "please verify" },
    });
  });

  it("does not retry bug updates", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("", { status: 503 }));
    const client = createBugzillaClient({ baseUrl: "https://bugzilla.test", apiKey: "test-secret", fetchFn, retry: NO_BACKOFF });

    await expect(client.closeBug(5, "FIXED", "done")).rejects.toThrow(TransientError);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("refuses updates without an API key", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({}));
    const client = createBugzillaClient({ baseUrl: "https://bugzilla.test", fetchFn });

    await expect(client.requestInfo(5, "reporter@example.com", "x")).rejects.toThrow(HttpError);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("surfaces Bugzilla error payloads", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ error: true, code: 410, message: "You must log in" }));
    const client = createBugzillaClient({ baseUrl: "https://bugzilla.test", fetchFn });

    await expect(client.searchBugs({ product: "P", component: "C" })).rejects.toThrow("bugzilla search: You must log in");
  });

  it("looks up the bug creator", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ bugs: [{ creator: "reporter@example.com" }] }));
    const client = createBugzillaClient({ baseUrl: "https://bugzilla.test", fetchFn });

    await expect(client.getBugCreator(9)).resolves.toBe("reporter@example.com");
    expect(String(fetchFn.mock.calls[0]?.[0])).toBe("https://bugzilla.test/rest/bug/9?include_fields=creator");
  });
});
