import { z } from "zod";
import { HttpError } from "./errors";
import { requestJson, type FetchFn } from "./http";
import { parseWhiteboardTags } from "./metadata-parser";
import { withRetry, type RetryOptions } from "./retry";

export const DEFAULT_BUGZILLA_URL = "https://bugzilla.mozilla.org";
export const DEFAULT_BUG_PRODUCT = "Web Compatibility";
export const DEFAULT_BUG_COMPONENT = "Privacy: Site Reports";

const BUG_FIELDS = ["id", "summary", "url", "whiteboard", "status", "resolution", "cf_user_story", "creator"];

export type Bug = {
  id: number;
  summary: string;
  url: string | null;
  whiteboard: string;
  whiteboardTags: string[];
  userStory: string;
  status: string;
  resolution: string;
  creator: string | null;
};

export type BugSearchQuery = {
  product: string;
  component: string;
  whiteboardTag?: string;
};

export type BugTracker = {
  searchBugs(query: BugSearchQuery): Promise<Bug[]>;
  closeBug(bugId: number, resolution: string, comment: string): Promise<void>;
  requestInfo(bugId: number, requestee: string, message: string): Promise<void>;
  getBugCreator(bugId: number): Promise<string | null>;
};

export type BugzillaClientOptions = {
  baseUrl?: string;
  apiKey?: string | null;
  fetchFn?: FetchFn;
  retry?: RetryOptions;
  timeoutMs?: number;
};

const BugRowSchema = z
  .object({
    id: z.number().int().positive(),
    summary: z.string().optional(),
    url: z.string().nullable().optional(),
    whiteboard: z.string().optional(),
    status: z.string(),
    resolution: z.string().optional(),
    cf_user_story: z.string().optional(),
    creator: z.string().optional(),
  })
  .passthrough();

const BugListSchema = z.object({ bugs: z.array(BugRowSchema) }).passthrough();

const BugzillaErrorSchema = z.object({ error: z.literal(true), message: z.string().optional(), code: z.number().optional() });

export function toBug(row: z.infer<typeof BugRowSchema>): Bug {
  const whiteboard = row.whiteboard ?? "";
  return {
    id: row.id,
    summary: row.summary ?? "",
    url: row.url?.trim() ? row.url.trim() : null,
    whiteboard,
    whiteboardTags: parseWhiteboardTags(whiteboard),
    userStory: row.cf_user_story ?? "",
    status: row.status,
    resolution: row.resolution ?? "",
    creator: row.creator?.trim() ? row.creator.trim() : null,
  };
}

function assertNoBugzillaError(payload: unknown, context: string): void {
  const error = BugzillaErrorSchema.safeParse(payload);
  if (error.success) {
    throw new HttpError(400, `${context}: ${error.data.message ?? "Bugzilla reported an error"}`);
  }
}

export function createBugzillaClient(options: BugzillaClientOptions = {}): BugTracker {
  const baseUrl = (options.baseUrl ?? DEFAULT_BUGZILLA_URL).replace(/\/+$/, "");
  const fetchFn = options.fetchFn ?? fetch;
  const retry = options.retry ?? {};
  const headers: Record<string, string> = {};
  if (options.apiKey) {
    headers["X-BUGZILLA-API-KEY"] = options.apiKey;
  }

  function requireApiKey(context: string): void {
    if (!options.apiKey) {
      throw new HttpError(401, `${context}: a Bugzilla API key is required`);
    }
  }

  async function updateBug(bugId: number, body: Record<string, unknown>, label: string): Promise<void> {
    requireApiKey(label);
    const response = await withRetry(
      () =>
        requestJson(
          `${baseUrl}/rest/bug/${bugId}`,
          { method: "PUT", headers, body },
          { fetchFn, label, timeoutMs: options.timeoutMs },
        ),
      { ...retry, idempotent: false },
    );
    assertNoBugzillaError(response.body, label);
  }

  return {
    async searchBugs(query) {
      const params = new URLSearchParams({
        product: query.product,
        component: query.component,
        resolution: "---",
        include_fields: BUG_FIELDS.join(","),
      });
      if (query.whiteboardTag) {
        params.set("f1", "status_whiteboard");
        params.set("o1", "substring");
        params.set("v1", `[${query.whiteboardTag}]`);
      }

      const label = "bugzilla search";
      const response = await withRetry(
        () =>
          requestJson(`${baseUrl}/rest/bug?${params.toString()}`, { headers }, { fetchFn, label, timeoutMs: options.timeoutMs }),
        retry,
      );
      assertNoBugzillaError(response.body, label);

      const parsed = BugListSchema.safeParse(response.body);
      if (!parsed.success) {
        throw new HttpError(502, `${label}: unexpected response shape`);
      }
      return parsed.data.bugs.map(toBug);
    },

    async closeBug(bugId, resolution, comment) {
      await updateBug(
        bugId,
        { status: "RESOLVED", resolution, comment: { body: comment } },
        `bugzilla close ${bugId}`,
      );
    },

    async requestInfo(bugId, requestee, message) {
      await updateBug(
        bugId,
        {
          flags: [{ name: "needinfo", status: "?", requestee }],
          comment: { body: message },
        },
        `bugzilla needinfo ${bugId}`,
      );
    },

    async getBugCreator(bugId) {
      const label = `bugzilla creator ${bugId}`;
      const response = await withRetry(
        () =>
          requestJson(
            `${baseUrl}/rest/bug/${bugId}?include_fields=creator`,
            { headers },
            { fetchFn, label, timeoutMs: options.timeoutMs },
          ),
        retry,
      );
      assertNoBugzillaError(response.body, label);

      const parsed = z
        .object({ bugs: z.array(z.object({ creator: z.string().optional() }).passthrough()) })
        .safeParse(response.body);
      const creator = parsed.success ? parsed.data.bugs[0]?.creator?.trim() : undefined;
      return creator ? creator : null;
    },
  };
}
