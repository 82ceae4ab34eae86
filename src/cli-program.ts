import { readFile } from "node:fs/promises";
import { Command } from "commander";
import { createBugzillaClient, type BugTracker, type BugzillaClientOptions } from "./core/bugzilla";
import {
  loadRunSettings,
  resolveAutoConfig,
  resolveServerConnection,
  type RunSettings,
  type ServerConnection,
} from "./core/config";
import { ConflictError, FatalError, ValidationError, errorMessage } from "./core/errors";
import { identityKey, parseExceptionInput, sortBugIds, toWireRecord, type ExceptionEntry } from "./core/exception-entry";
import type { FetchFn } from "./core/http";
import { buildNeedinfoMessage, CLOSE_RESOLUTION } from "./core/lifecycle";
import { DIAGNOSED_TAG } from "./core/metadata-parser";
import {
  createRemoteSettingsClient,
  type ExceptionStore,
  type RemoteSettingsClientOptions,
} from "./core/remote-settings";
import type { RetryOptions } from "./core/retry";
import { describeEntry, formatRunReport } from "./core/run-report";
import { runAutoSync } from "./core/sync-engine";

export type CliDependencies = {
  fetchFn?: FetchFn;
  env?: NodeJS.ProcessEnv;
  createTracker?: (options: BugzillaClientOptions) => BugTracker;
  createStore?: (options: RemoteSettingsClientOptions) => ExceptionStore;
  confirmFn?: (question: string) => Promise<boolean>;
};

type CommandOptions = Record<string, unknown>;

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

async function confirmOnTerminal(question: string): Promise<boolean> {
  const { createInterface } = await import("node:readline/promises");
  const { stdin, stdout } = process;
  const rl = createInterface({ input: stdin, output: stdout });

  try {
    const answer = (await rl.question(question)).trim().toLowerCase();
    return answer === "y" || answer === "yes";
  } finally {
    rl.close();
  }
}

function retryOptions(settings: RunSettings): RetryOptions {
  return { attempts: settings.retry.attempts, backoffMs: settings.retry.backoffMs };
}

export function parseBugIdList(raw: string): number[] {
  const ids: number[] = [];
  for (const token of raw.split(/[\s,]+/)) {
    if (!token) continue;
    if (!/^[0-9]+$/.test(token) || Number.parseInt(token, 10) <= 0) {
      throw new ValidationError(`invalid bug id '${token}'`);
    }
    ids.push(Number.parseInt(token, 10));
  }
  return Array.from(new Set(ids)).sort((left, right) => left - right);
}

async function resolveBugIds(opts: CommandOptions, context: string): Promise<number[]> {
  const bugId = optionalString(opts.bugId);
  const bugIdsFile = optionalString(opts.bugIdsFile);

  if (bugId && bugIdsFile) {
    throw new ValidationError(`${context}: use either --bug-id or --bug-ids-file, not both`);
  }
  if (bugId) {
    return parseBugIdList(bugId);
  }
  if (bugIdsFile) {
    const ids = parseBugIdList(await readFile(bugIdsFile, "utf8"));
    if (!ids.length) {
      throw new ValidationError(`${context}: ${bugIdsFile} lists no bug ids`);
    }
    return ids;
  }
  throw new ValidationError(`${context}: --bug-id or --bug-ids-file is required`);
}

export async function readExceptionFile(filePath: string): Promise<ExceptionEntry[]> {
  const raw = await readFile(filePath, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const rows: unknown[] = Array.isArray(json) ? json : [json];
  return rows.map((row, index) => {
    try {
      const { id: _id, ...entry } = parseExceptionInput(row);
      return entry;
    } catch (error) {
      throw new ValidationError(`${filePath} entry ${index}: ${errorMessage(error)}`);
    }
  });
}

function printError(context: string, error: unknown): void {
  console.error(`${context}: ERROR`);
  console.error(error);
  process.exitCode = 1;
}

export function createProgram(deps: CliDependencies = {}): Command {
  const env = deps.env ?? process.env;
  const fetchFn = deps.fetchFn ?? fetch;
  const createTracker = deps.createTracker ?? createBugzillaClient;
  const createStore = deps.createStore ?? createRemoteSettingsClient;
  const confirmFn = deps.confirmFn ?? confirmOnTerminal;

  function openStore(connection: ServerConnection, settings: RunSettings): ExceptionStore {
    return createStore({
      serverUrl: connection.serverLocation,
      authToken: connection.authToken,
      selfApprove: connection.environment === "dev",
      fetchFn,
      retry: retryOptions(settings),
      timeoutMs: settings.requestTimeoutMs,
    });
  }

  function openTracker(settings: RunSettings, requireKey: boolean): BugTracker {
    const apiKey = env.BZ_API_KEY?.trim() || null;
    if (requireKey && !apiKey) {
      throw new FatalError("missing required configuration: BZ_API_KEY");
    }
    return createTracker({
      baseUrl: settings.bugzilla.url,
      apiKey,
      fetchFn,
      retry: retryOptions(settings),
      timeoutMs: settings.requestTimeoutMs,
    });
  }

  const program = new Command();

  program
    .name("etp-exceptions")
    .description("Reconcile tracking-protection exception bugs with Remote Settings")
    .version("0.1.0");

  const withServerOptions = (command: Command): Command =>
    command
      .option("--server <env>", "Remote Settings environment (dev, stage, prod); defaults to $ENVIRONMENT")
      .option("--auth <token>", "Remote Settings credentials (user:password, bearer token, or full header); defaults to $AUTHORIZATION")
      .option("--server-location <url>", "Override the Remote Settings server URL; defaults to $SERVER")
      .option("--config <path>", "YAML settings file");

  withServerOptions(program.command("auto"))
    .description("Reconcile diagnosed bugs with the exception collection and advance their lifecycle")
    .option("--dry-run", "Print the plan without changing records or bugs", false)
    .option("--force", "Override records owned by other bugs", false)
    .action(async (opts: CommandOptions) => {
      try {
        const settings = await loadRunSettings(optionalString(opts.config), env);
        const config = resolveAutoConfig(
          {
            server: optionalString(opts.server),
            auth: optionalString(opts.auth),
            serverLocation: optionalString(opts.serverLocation),
            dryRun: Boolean(opts.dryRun),
            force: Boolean(opts.force),
          },
          settings,
          env,
        );

        const tracker = createTracker({
          baseUrl: settings.bugzilla.url,
          apiKey: config.bugzillaApiKey,
          fetchFn,
          retry: retryOptions(settings),
          timeoutMs: settings.requestTimeoutMs,
        });
        const store = openStore(config, settings);

        console.log(`auto: server ${config.environment} (${config.serverLocation})`);
        const result = await runAutoSync(config, { tracker, store, log: (line) => console.log(line) });

        console.log("");
        for (const line of formatRunReport(result, config.dryRun)) {
          console.log(line);
        }

        if (config.dryRun) {
          console.log("\nauto: dry-run complete.");
        }
        if (result.exitCode !== 0) {
          process.exitCode = result.exitCode;
        }
      } catch (error) {
        printError("auto", error);
      }
    });

  withServerOptions(program.command("list"))
    .description("List exception records in the workspace bucket")
    .option("--json", "Print records as JSON", false)
    .action(async (opts: CommandOptions) => {
      try {
        const settings = await loadRunSettings(optionalString(opts.config), env);
        const connection = resolveServerConnection(
          { server: optionalString(opts.server), auth: optionalString(opts.auth), serverLocation: optionalString(opts.serverLocation) },
          env,
        );
        const records = await openStore(connection, settings).listRecords();

        if (opts.json) {
          console.log(JSON.stringify(records.map((record) => toWireRecord(record, record.id)), null, 2));
          return;
        }

        console.log(`list: ${records.length} record(s) on ${connection.environment}`);
        for (const record of records) {
          console.log(`${record.id} ${record.status} bugs[${sortBugIds(record.bugIds).join(", ")}] ${describeEntry(record)}`);
        }
      } catch (error) {
        printError("list", error);
      }
    });

  withServerOptions(program.command("add"))
    .description("Add exception records from a JSON file (one object or an array)")
    .argument("<json-file>", "Path to the JSON file")
    .option("--force", "Skip the confirmation prompt", false)
    .action(async (jsonFile: string, opts: CommandOptions) => {
      try {
        const settings = await loadRunSettings(optionalString(opts.config), env);
        const connection = resolveServerConnection(
          { server: optionalString(opts.server), auth: optionalString(opts.auth), serverLocation: optionalString(opts.serverLocation) },
          env,
        );
        const entries = await readExceptionFile(jsonFile);
        const store = openStore(connection, settings);

        const seen = new Set((await store.listRecords()).map((record) => identityKey(record)));
        const pending: ExceptionEntry[] = [];
        for (const entry of entries) {
          const key = identityKey(entry);
          if (seen.has(key)) continue;
          seen.add(key);
          pending.push(entry);
        }

        console.log(`add: ${pending.length} new record(s), ${entries.length - pending.length} already present`);
        if (!pending.length) {
          return;
        }
        for (const entry of pending) {
          console.log(`+ ${describeEntry(entry)}`);
        }

        if (!opts.force && !(await confirmFn(`add: create ${pending.length} record(s) on ${connection.environment}? [y/N] `))) {
          console.log("add: aborted.");
          return;
        }

        let created = 0;
        for (const entry of pending) {
          try {
            await store.createRecord(entry);
            created += 1;
          } catch (error) {
            if (!(error instanceof ConflictError)) throw error;
          }
        }

        const review = await store.requestReview();
        console.log(`add: DONE (${created} created, review ${review})`);
      } catch (error) {
        printError("add", error);
      }
    });

  withServerOptions(program.command("remove"))
    .description("Remove exception records by id, or all of them")
    .argument("[ids...]", "Record ids to remove")
    .option("--all", "Remove every record in the collection", false)
    .option("--force", "Skip the confirmation prompt", false)
    .action(async (idArgs: string[] | undefined, opts: CommandOptions) => {
      try {
        const ids = idArgs ?? [];
        const removeAll = Boolean(opts.all);
        if (!removeAll && !ids.length) {
          throw new ValidationError("remove: pass record ids or --all");
        }
        if (removeAll && ids.length) {
          throw new ValidationError("remove: pass either record ids or --all, not both");
        }

        const settings = await loadRunSettings(optionalString(opts.config), env);
        const connection = resolveServerConnection(
          { server: optionalString(opts.server), auth: optionalString(opts.auth), serverLocation: optionalString(opts.serverLocation) },
          env,
        );
        const store = openStore(connection, settings);

        const target = removeAll ? "every record" : `${ids.length} record(s)`;
        if (!opts.force && !(await confirmFn(`remove: delete ${target} on ${connection.environment}? [y/N] `))) {
          console.log("remove: aborted.");
          return;
        }

        if (removeAll) {
          await store.deleteAllRecords();
        } else {
          for (const id of ids) {
            await store.deleteRecord(id);
          }
        }

        const review = await store.requestReview();
        console.log(`remove: DONE (${target}, review ${review})`);
      } catch (error) {
        printError("remove", error);
      }
    });

  program
    .command("bz-info")
    .description("Print candidate bugs as JSON")
    .option("--product <name>", "Bugzilla product")
    .option("--component <name>", "Bugzilla component")
    .option("--diagnosed-only", `Only bugs tagged [${DIAGNOSED_TAG}]`, false)
    .option("--config <path>", "YAML settings file")
    .action(async (opts: CommandOptions) => {
      try {
        const settings = await loadRunSettings(optionalString(opts.config), env);
        const tracker = openTracker(settings, false);
        const bugs = await tracker.searchBugs({
          product: optionalString(opts.product) ?? settings.bugzilla.product,
          component: optionalString(opts.component) ?? settings.bugzilla.component,
          whiteboardTag: opts.diagnosedOnly ? DIAGNOSED_TAG : undefined,
        });
        console.log(JSON.stringify(bugs, null, 2));
      } catch (error) {
        printError("bz-info", error);
      }
    });

  program
    .command("bz-close")
    .description("Close bugs with a comment")
    .option("--bug-id <id>", "Bug id (comma-separated for several)")
    .option("--bug-ids-file <path>", "File listing bug ids")
    .option("--resolution <resolution>", "Resolution to set", CLOSE_RESOLUTION)
    .requiredOption("--message <text>", "Closing comment")
    .option("--config <path>", "YAML settings file")
    .action(async (opts: CommandOptions) => {
      try {
        const settings = await loadRunSettings(optionalString(opts.config), env);
        const bugIds = await resolveBugIds(opts, "bz-close");
        const tracker = openTracker(settings, true);
        const resolution = optionalString(opts.resolution) ?? CLOSE_RESOLUTION;
        const message = optionalString(opts.message) ?? "";

        for (const bugId of bugIds) {
          try {
            await tracker.closeBug(bugId, resolution, message);
            console.log(`bz-close: closed bug ${bugId} as ${resolution}`);
          } catch (error) {
            console.error(`bz-close: bug ${bugId} failed: ${errorMessage(error)}`);
            process.exitCode = 1;
          }
        }
      } catch (error) {
        printError("bz-close", error);
      }
    });

  program
    .command("bz-ni")
    .description("Request needinfo on bugs")
    .option("--bug-id <id>", "Bug id (comma-separated for several)")
    .option("--bug-ids-file <path>", "File listing bug ids")
    .option("--requestee <email>", "Who to ask; defaults to the bug's reporter")
    .option("--message <text>", "Comment to post with the request")
    .option("--config <path>", "YAML settings file")
    .action(async (opts: CommandOptions) => {
      try {
        const settings = await loadRunSettings(optionalString(opts.config), env);
        const bugIds = await resolveBugIds(opts, "bz-ni");
        const tracker = openTracker(settings, true);
        const message = optionalString(opts.message) ?? buildNeedinfoMessage();

        for (const bugId of bugIds) {
          try {
            const requestee = optionalString(opts.requestee) ?? (await tracker.getBugCreator(bugId));
            if (!requestee) {
              throw new ValidationError("reporter unknown; pass --requestee");
            }
            await tracker.requestInfo(bugId, requestee, message);
            console.log(`bz-ni: requested info from ${requestee} on bug ${bugId}`);
          } catch (error) {
            console.error(`bz-ni: bug ${bugId} failed: ${errorMessage(error)}`);
            process.exitCode = 1;
          }
        }
      } catch (error) {
        printError("bz-ni", error);
      }
    });

  return program;
}

export async function runCli(argv: string[] = process.argv, deps: CliDependencies = {}): Promise<void> {
  const program = createProgram(deps);
  await program.parseAsync(argv);
}
