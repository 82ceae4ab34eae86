import { z } from "zod";
import {
  identityKey,
  parseRemoteRecord,
  recordIdFor,
  toWireRecord,
  type ExceptionEntry,
  type RemoteRecord,
} from "./exception-entry";
import { HttpError, ValidationError, errorMessage } from "./errors";
import { requestJson, type FetchFn, type JsonResponse } from "./http";
import { withRetry, type RetryOptions } from "./retry";

export const WORKSPACE_BUCKET = "main-workspace";
export const PUBLISHED_BUCKET = "main";
export const EXCEPTIONS_COLLECTION = "url-classifier-exceptions";

export type RecordFilter = {
  bugId?: string;
  urlPatterns?: string[];
};

export type ReviewRequestResult = "review-requested" | "approved" | "unchanged";

export type ExceptionStore = {
  listRecords(filter?: RecordFilter): Promise<RemoteRecord[]>;
  createRecord(entry: ExceptionEntry): Promise<RemoteRecord>;
  deleteRecord(id: string): Promise<void>;
  deleteAllRecords(): Promise<void>;
  requestReview(): Promise<ReviewRequestResult>;
};

export type RemoteSettingsClientOptions = {
  serverUrl: string;
  authToken: string;
  selfApprove?: boolean;
  fetchFn?: FetchFn;
  retry?: RetryOptions;
  timeoutMs?: number;
  warn?: (line: string) => void;
};

const RecordListSchema = z.object({ data: z.array(z.unknown()) }).passthrough();
const RowIdSchema = z.object({ id: z.string() }).passthrough();
const CollectionSchema = z.object({ data: z.object({ status: z.string().optional() }).passthrough() }).passthrough();

export function authorizationHeader(token: string): string {
  const trimmed = token.trim();
  if (/\s/.test(trimmed)) {
    return trimmed;
  }
  if (trimmed.includes(":")) {
    return `Basic ${Buffer.from(trimmed, "utf8").toString("base64")}`;
  }
  return `Bearer ${trimmed}`;
}

export function matchesRecordFilter(record: RemoteRecord, filter: RecordFilter | undefined): boolean {
  if (!filter || (filter.bugId === undefined && filter.urlPatterns === undefined)) {
    return true;
  }
  if (filter.bugId !== undefined && record.bugIds.includes(filter.bugId)) {
    return true;
  }
  return filter.urlPatterns?.includes(record.urlPattern) ?? false;
}

export function createRemoteSettingsClient(options: RemoteSettingsClientOptions): ExceptionStore {
  const serverUrl = options.serverUrl.replace(/\/+$/, "");
  const fetchFn = options.fetchFn ?? fetch;
  const retry = options.retry ?? {};
  const headers = { Authorization: authorizationHeader(options.authToken) };
  const warn = options.warn ?? ((line: string) => console.error(line));
  const reported = new Set<string>();

  const collectionUrl = (bucket: string) => `${serverUrl}/buckets/${bucket}/collections/${EXCEPTIONS_COLLECTION}`;
  const recordsUrl = (bucket: string) => `${collectionUrl(bucket)}/records`;

  async function fetchRawRecords(bucket: string): Promise<unknown[]> {
    const label = `remote-settings list ${bucket}`;
    const rows: unknown[] = [];
    let nextUrl: string | null = recordsUrl(bucket);

    while (nextUrl) {
      const url: string = nextUrl;
      const response: JsonResponse = await withRetry(
        () => requestJson(url, { headers }, { fetchFn, label, timeoutMs: options.timeoutMs }),
        retry,
      );
      const parsed = RecordListSchema.safeParse(response.body);
      if (!parsed.success) {
        throw new HttpError(502, `${label}: unexpected response shape`);
      }
      rows.push(...parsed.data.data);
      nextUrl = response.headers.get("Next-Page");
    }

    return rows;
  }

  function readRows(rows: unknown[], bucket: string, status: RemoteRecord["status"]): RemoteRecord[] {
    const records: RemoteRecord[] = [];
    for (const row of rows) {
      try {
        records.push(parseRemoteRecord(row, status));
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        const parsedId = RowIdSchema.safeParse(row);
        const id = parsedId.success ? parsedId.data.id : "(no id)";
        if (!reported.has(`${bucket}/${id}`)) {
          reported.add(`${bucket}/${id}`);
          warn(`remote-settings: skipping record ${id} in ${bucket}: ${errorMessage(error)}`);
        }
      }
    }
    return records;
  }

  return {
    async listRecords(filter) {
      const [workspaceRows, publishedRows] = await Promise.all([
        fetchRawRecords(WORKSPACE_BUCKET),
        fetchRawRecords(PUBLISHED_BUCKET),
      ]);

      const published = new Map<string, string>();
      for (const record of readRows(publishedRows, PUBLISHED_BUCKET, "published")) {
        published.set(record.id, identityKey(record));
      }

      return readRows(workspaceRows, WORKSPACE_BUCKET, "pending")
        .map((record) => {
          const live = published.get(record.id) === identityKey(record);
          return live ? { ...record, status: "published" as const } : record;
        })
        .filter((record) => matchesRecordFilter(record, filter));
    },

    async createRecord(entry) {
      const id = recordIdFor(entry);
      const label = `remote-settings create ${id}`;
      await withRetry(
        () =>
          requestJson(
            `${recordsUrl(WORKSPACE_BUCKET)}/${id}`,
            { method: "PUT", headers: { ...headers, "If-None-Match": "*" }, body: { data: toWireRecord(entry, id) } },
            { fetchFn, label, timeoutMs: options.timeoutMs },
          ),
        retry,
      );
      return { ...entry, id, status: "pending" };
    },

    async deleteRecord(id) {
      const label = `remote-settings delete ${id}`;
      try {
        await withRetry(
          () =>
            requestJson(
              `${recordsUrl(WORKSPACE_BUCKET)}/${id}`,
              { method: "DELETE", headers },
              { fetchFn, label, timeoutMs: options.timeoutMs },
            ),
          retry,
        );
      } catch (error) {
        // Already gone: the desired end state holds.
        if (error instanceof HttpError && error.status === 404) {
          return;
        }
        throw error;
      }
    },

    async deleteAllRecords() {
      const label = "remote-settings delete all";
      await withRetry(
        () =>
          requestJson(recordsUrl(WORKSPACE_BUCKET), { method: "DELETE", headers }, { fetchFn, label, timeoutMs: options.timeoutMs }),
        retry,
      );
    },

    async requestReview() {
      const label = "remote-settings review";
      const response = await withRetry(
        () => requestJson(collectionUrl(WORKSPACE_BUCKET), { headers }, { fetchFn, label, timeoutMs: options.timeoutMs }),
        retry,
      );
      const parsed = CollectionSchema.safeParse(response.body);
      if (!parsed.success) {
        throw new HttpError(502, `${label}: unexpected response shape`);
      }
      if (parsed.data.data.status !== "work-in-progress") {
        return "unchanged";
      }

      const status = options.selfApprove ? "to-sign" : "to-review";
      await withRetry(
        () =>
          requestJson(
            collectionUrl(WORKSPACE_BUCKET),
            { method: "PATCH", headers, body: { data: { status } } },
            { fetchFn, label, timeoutMs: options.timeoutMs },
          ),
        retry,
      );
      return options.selfApprove ? "approved" : "review-requested";
    },
  };
}
