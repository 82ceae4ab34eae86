import { ConflictError, HttpError, TransientError, isTransientStatus } from "./errors";

export type FetchFn = typeof fetch;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export type JsonRequest = {
  method?: "GET" | "PUT" | "PATCH" | "DELETE";
  headers?: Record<string, string>;
  body?: unknown;
};

export type JsonResponse = {
  body: unknown;
  headers: Headers;
};

export type JsonRequestContext = {
  fetchFn: FetchFn;
  timeoutMs?: number;
  label: string;
};

async function readErrorDetail(response: Response): Promise<string> {
  try {
    const text = (await response.text()).trim();
    if (!text) return "";
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "object" && parsed !== null && "message" in parsed && typeof parsed.message === "string") {
      return parsed.message;
    }
    return text.slice(0, 500);
  } catch {
    return "";
  }
}

export async function requestJson(url: string, request: JsonRequest, context: JsonRequestContext): Promise<JsonResponse> {
  const method = request.method ?? "GET";
  const headers: Record<string, string> = { Accept: "application/json", ...request.headers };
  if (request.body !== undefined) {
    headers["Content-Type"] = "application/json";
  }

  let response: Response;
  try {
    response = await context.fetchFn(url, {
      method,
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: AbortSignal.timeout(context.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS),
    });
  } catch (error) {
    throw new TransientError(`${context.label}: ${method} ${url} failed`, { cause: error });
  }

  if (!response.ok) {
    const detail = await readErrorDetail(response);
    const message = `${context.label}: ${method} ${url} returned ${response.status}${detail ? ` (${detail})` : ""}`;
    if (response.status === 412) {
      throw new ConflictError(message);
    }
    if (isTransientStatus(response.status)) {
      throw new TransientError(message);
    }
    throw new HttpError(response.status, message);
  }

  const text = await response.text();
  const body: unknown = text.trim() ? JSON.parse(text) : null;
  return { body, headers: response.headers };
}
