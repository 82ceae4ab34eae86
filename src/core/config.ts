import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { DEFAULT_BUG_COMPONENT, DEFAULT_BUG_PRODUCT, DEFAULT_BUGZILLA_URL } from "./bugzilla";
import { FatalError } from "./errors";
import { DEFAULT_CUTOFF_VERSION } from "./exception-planner";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "./http";

export const SERVER_ENVIRONMENTS = ["dev", "stage", "prod"] as const;
export type ServerEnvironment = (typeof SERVER_ENVIRONMENTS)[number];

export const SERVER_LOCATIONS: Readonly<Record<ServerEnvironment, string>> = {
  dev: "https://remote-settings-dev.allizom.org/v1",
  stage: "https://remote-settings.allizom.org/v1",
  prod: "https://remote-settings.mozilla.org/v1",
};

export const DEFAULT_CONCURRENCY = 4;

export type RunSettings = {
  cutoffVersion: string;
  concurrency: number;
  requestTimeoutMs: number;
  retry: {
    attempts: number;
    backoffMs: number[];
  };
  bugzilla: {
    url: string;
    product: string;
    component: string;
  };
};

export type ServerConnection = {
  environment: ServerEnvironment;
  serverLocation: string;
  authToken: string;
};

export type RunConfig = ServerConnection & {
  bugzillaApiKey: string;
  dryRun: boolean;
  force: boolean;
  settings: RunSettings;
};

export type ServerFlags = {
  server?: string;
  auth?: string;
  serverLocation?: string;
};

export type AutoFlags = ServerFlags & {
  dryRun?: boolean;
  force?: boolean;
};

const SettingsFileSchema = z
  .object({
    cutoffVersion: z
      .string()
      .regex(/^\d+(\.\d+)*([ab]\d+)?$/, "must look like 142.0a1")
      .optional(),
    concurrency: z.number().int().min(1).max(32).optional(),
    requestTimeoutMs: z.number().int().positive().optional(),
    retry: z
      .object({
        attempts: z.number().int().min(1).max(10).optional(),
        backoffMs: z.array(z.number().int().min(0)).min(1).optional(),
      })
      .strict()
      .optional(),
    bugzilla: z
      .object({
        url: z.string().url().optional(),
        product: z.string().min(1).optional(),
        component: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export function defaultRunSettings(): RunSettings {
  return {
    cutoffVersion: DEFAULT_CUTOFF_VERSION,
    concurrency: DEFAULT_CONCURRENCY,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    retry: { attempts: 3, backoffMs: [250, 750, 1500] },
    bugzilla: { url: DEFAULT_BUGZILLA_URL, product: DEFAULT_BUG_PRODUCT, component: DEFAULT_BUG_COMPONENT },
  };
}

export function parseRunSettings(raw: unknown, source: string): RunSettings {
  const parsed = SettingsFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.length ? issue.path.join(".") : "settings"}: ${issue.message}`)
      .join("; ");
    throw new FatalError(`invalid settings in ${source} (${details})`);
  }

  const defaults = defaultRunSettings();
  const data = parsed.data;
  return {
    cutoffVersion: data.cutoffVersion ?? defaults.cutoffVersion,
    concurrency: data.concurrency ?? defaults.concurrency,
    requestTimeoutMs: data.requestTimeoutMs ?? defaults.requestTimeoutMs,
    retry: {
      attempts: data.retry?.attempts ?? defaults.retry.attempts,
      backoffMs: data.retry?.backoffMs ?? defaults.retry.backoffMs,
    },
    bugzilla: {
      url: data.bugzilla?.url ?? defaults.bugzilla.url,
      product: data.bugzilla?.product ?? defaults.bugzilla.product,
      component: data.bugzilla?.component ?? defaults.bugzilla.component,
    },
  };
}

export async function loadRunSettings(filePath?: string | null, env: NodeJS.ProcessEnv = process.env): Promise<RunSettings> {
  let settings = defaultRunSettings();

  if (filePath?.trim()) {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FatalError(`unable to read settings file ${filePath}: ${message}`);
    }

    let document: unknown;
    try {
      document = parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FatalError(`invalid YAML in ${filePath}: ${message}`);
    }
    settings = parseRunSettings(document, filePath);
  }

  const bugzillaUrl = env.BUGZILLA_URL?.trim();
  if (bugzillaUrl) {
    settings = { ...settings, bugzilla: { ...settings.bugzilla, url: bugzillaUrl } };
  }

  return settings;
}

function envFlag(value: string | undefined): boolean {
  const normalized = value?.trim().toLowerCase() ?? "";
  return normalized !== "" && normalized !== "0" && normalized !== "false";
}

function firstNonEmpty(...values: Array<string | undefined>): string | null {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return null;
}

function parseEnvironment(value: string | null): ServerEnvironment | null {
  const normalized = value?.toLowerCase() ?? "";
  return SERVER_ENVIRONMENTS.find((environment) => environment === normalized) ?? null;
}

function resolveConnection(flags: ServerFlags, env: NodeJS.ProcessEnv, missing: string[]): ServerConnection | null {
  const serverRaw = firstNonEmpty(flags.server, env.ENVIRONMENT);
  const environment = parseEnvironment(serverRaw);
  if (serverRaw === null) {
    missing.push("--server / ENVIRONMENT");
  } else if (environment === null) {
    throw new FatalError(`unknown server '${serverRaw}' (expected one of: ${SERVER_ENVIRONMENTS.join(", ")})`);
  }

  const authToken = firstNonEmpty(flags.auth, env.AUTHORIZATION);
  if (authToken === null) {
    missing.push("--auth / AUTHORIZATION");
  }

  if (environment === null || authToken === null) {
    return null;
  }

  const serverLocation = firstNonEmpty(flags.serverLocation, env.SERVER) ?? SERVER_LOCATIONS[environment];
  return { environment, serverLocation, authToken };
}

function missingConfigError(missing: string[]): FatalError {
  return new FatalError(`missing required configuration: ${missing.join(", ")}`);
}

export function resolveServerConnection(flags: ServerFlags, env: NodeJS.ProcessEnv = process.env): ServerConnection {
  const missing: string[] = [];
  const connection = resolveConnection(flags, env, missing);
  if (connection === null) {
    throw missingConfigError(missing);
  }
  return connection;
}

export function resolveAutoConfig(
  flags: AutoFlags,
  settings: RunSettings,
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const missing: string[] = [];
  const connection = resolveConnection(flags, env, missing);

  const bugzillaApiKey = firstNonEmpty(env.BZ_API_KEY);
  if (bugzillaApiKey === null) {
    missing.push("BZ_API_KEY");
  }

  if (connection === null || bugzillaApiKey === null) {
    throw missingConfigError(missing);
  }

  return {
    ...connection,
    bugzillaApiKey,
    dryRun: Boolean(flags.dryRun) || envFlag(env.DRY_RUN),
    force: Boolean(flags.force) || envFlag(env.FORCE),
    settings,
  };
}
