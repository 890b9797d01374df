#!/usr/bin/env node
import { runGeotag, type RunOptions } from "../composition/root";

type ErrorContext = Partial<Record<"itemId" | "status" | "apiCode" | "path" | "requestUrl", string | number>>;

type CliErrorEnvelope = {
  event: "geotag.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

const allowedContextKeys: Array<keyof ErrorContext> = ["itemId", "status", "apiCode", "path", "requestUrl"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of allowedContextKeys) {
    const raw = value[key];
    if ((typeof raw === "number" && Number.isFinite(raw)) || typeof raw === "string") {
      sanitizedContext[key] = raw;
    }
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "geotag.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const usage = `Usage: geotag [options]

Scope (default: uploads of --target-user, or of COMMONS_USER):
  --target-user <name>        uploader whose files are scanned
  --category <name>           scan a category instead of an uploader
  --max-depth <n>             subcategory depth for --category (default 1)
  --file-list <path>          scan the titles in a .csv (title column) or plain text file
  --author-filter <text>      keep files whose author contains text (default: target user; "" disables)

Queue:
  --state-file <path>         checkpoint location (default gps_scan.json)
  --no-resume                 ignore an existing checkpoint
  --rescan                    crawl again even if the previous scan completed

Processing:
  --count <n>                 maximum successful edits this run (default 19)
  --sleep <seconds>           base pause between edits, jittered +/-50% (default 10)
  --max-edits-per-min <n>     hard ceiling per sliding minute (default 30)
  --upload                    upload the modified files back
  --dry-run                   report what would be done without touching files
`;

const BOOLEAN_FLAGS = new Set(["upload", "dry-run", "resume", "no-resume", "rescan", "help"]);
const VALUE_FLAGS = new Set([
  "target-user",
  "category",
  "max-depth",
  "file-list",
  "author-filter",
  "state-file",
  "count",
  "sleep",
  "max-edits-per-min"
]);

const parseInteger = (name: string, raw: string, min: number): number => {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(value) || value < min) {
    throw new Error(`--${name} must be an integer >= ${min}. Received: ${raw}`);
  }
  return value;
};

const parseSeconds = (name: string, raw: string): number => {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value) || value < 0) {
    throw new Error(`--${name} must be a number of seconds >= 0. Received: ${raw}`);
  }
  return Math.round(value * 1000);
};

export type ParsedArgs = { help: true } | { help: false; options: RunOptions };

export const parseCliArgs = (argv: string[]): ParsedArgs => {
  const flags = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--") continue;
    if (!arg.startsWith("--")) throw new Error(`Unexpected argument: ${arg}`);

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (BOOLEAN_FLAGS.has(name) && eq === -1) {
      switches.add(name);
      continue;
    }
    if (!VALUE_FLAGS.has(name)) throw new Error(`Unknown option: --${name}`);

    if (eq !== -1) {
      flags.set(name, arg.slice(eq + 1));
    } else {
      const value = argv[i + 1];
      if (value === undefined) throw new Error(`--${name} needs a value`);
      flags.set(name, value);
      i += 1;
    }
  }

  if (switches.has("help")) return { help: true };

  const count = flags.get("count");
  const sleep = flags.get("sleep");
  const perMinute = flags.get("max-edits-per-min");
  const maxDepth = flags.get("max-depth");

  return {
    help: false,
    options: {
      targetUser: flags.get("target-user"),
      category: flags.get("category"),
      maxDepth: maxDepth === undefined ? 1 : parseInteger("max-depth", maxDepth, 0),
      fileList: flags.get("file-list"),
      authorFilter: flags.get("author-filter"),
      stateFile: flags.get("state-file") ?? "gps_scan.json",
      resume: !switches.has("no-resume"),
      rescan: switches.has("rescan"),
      upload: switches.has("upload"),
      dryRun: switches.has("dry-run"),
      maxEdits: count === undefined ? undefined : parseInteger("count", count, 1),
      maxPerMinute: perMinute === undefined ? undefined : parseInteger("max-edits-per-min", perMinute, 1),
      baseSleepMs: sleep === undefined ? undefined : parseSeconds("sleep", sleep)
    }
  };
};

export const executeGeotagCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const parsed = parseCliArgs(argv);
    if (parsed.help) {
      process.stdout.write(usage);
      return;
    }
    await runGeotag(parsed.options);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeGeotagCli();
}
