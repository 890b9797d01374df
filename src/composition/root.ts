import { crawl, describeScope, type CrawlOutcome } from "../application/crawl/crawl.usecase";
import { ItemClassifier } from "../application/crawl/itemClassifier";
import type { ProcessingReport } from "../application/process/processing.report";
import { processQueue } from "../application/process/processQueue.usecase";
import type { ProcessorConfigInput } from "../application/process/processor.config";
import { FatalAuthError } from "../core/errors";
import { createEmptyScanState } from "../core/scan/ScanState";
import { FileCheckpointStore } from "../infrastructure/checkpoint/FileCheckpointStore";
import { MongoCheckpointStore } from "../infrastructure/checkpoint/MongoCheckpointStore";
import { CommonsApiClient, type Credentials } from "../infrastructure/commons/CommonsApiClient";
import { CommonsItemDetailSource } from "../infrastructure/commons/CommonsItemDetailSource";
import { CommonsListingGateway } from "../infrastructure/commons/CommonsListingGateway";
import { ExifGpsWriter } from "../infrastructure/exif/ExifGpsWriter";
import { readTitleList } from "../infrastructure/files/titleList";
import { GeotagMutationAction } from "../infrastructure/mutation/GeotagMutationAction";
import type { CheckpointStore } from "../ports/CheckpointStore";
import type { ListingScope } from "../ports/ListingGateway";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { consoleEventLogger } from "../shared/logging/eventLogger";

export type RunOptions = {
  targetUser?: string;
  category?: string;
  maxDepth: number;
  fileList?: string;
  authorFilter?: string; // undefined: the target user; "": no filtering
  stateFile: string;
  resume: boolean;
  rescan: boolean;
  upload: boolean;
  dryRun: boolean;
  maxEdits?: number;
  maxPerMinute?: number;
  baseSleepMs?: number;
};

export type RunSummary = {
  crawl: CrawlOutcome;
  report: ProcessingReport;
};

export const resolveScope = async (options: RunOptions, target: string | undefined): Promise<ListingScope> => {
  if (options.fileList) {
    return { kind: "titles", titles: await readTitleList(options.fileList) };
  }
  if (options.category) {
    return { kind: "category", category: options.category, maxDepth: options.maxDepth };
  }
  if (!target) {
    throw new Error("An uploader is required: pass --target-user or set COMMONS_USER");
  }
  return { kind: "user", user: target };
};

export const resolveAuthorFilter = (options: RunOptions, target: string | undefined): string | undefined =>
  options.authorFilter === undefined ? target : options.authorFilter;

export const createCheckpointStore = (env: Env, stateFile: string): CheckpointStore =>
  env.CHECKPOINT_MONGO_URI
    ? new MongoCheckpointStore(env.CHECKPOINT_MONGO_URI, stateFile)
    : new FileCheckpointStore(stateFile);

const resolveCredentials = (env: Env): Credentials | undefined =>
  env.COMMONS_USER && env.COMMONS_PASS ? { username: env.COMMONS_USER, password: env.COMMONS_PASS } : undefined;

export const runGeotag = async (options: RunOptions): Promise<RunSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const logger = consoleEventLogger;
  const credentials = resolveCredentials(env);

  if (options.upload && !options.dryRun && !credentials) {
    throw new FatalAuthError({ message: "Uploading requires COMMONS_USER and COMMONS_PASS" });
  }

  const processorConfig: ProcessorConfigInput = {
    maxEdits: options.maxEdits ?? runtime.processor.maxEdits,
    maxPerMinute: options.maxPerMinute ?? runtime.processor.maxPerMinute,
    baseSleepMs: options.baseSleepMs ?? runtime.processor.baseSleepMs,
    dryRun: options.dryRun
  };

  const store = createCheckpointStore(env, options.stateFile);
  let api: CommonsApiClient | undefined;

  try {
    api = await CommonsApiClient.open(
      { apiUrl: env.COMMONS_API_URL, userAgent: env.COMMONS_USER_AGENT, timeoutMs: runtime.timeoutMs, logger },
      credentials
    );

    const target = options.targetUser ?? env.COMMONS_USER;
    const scope = await resolveScope(options, target);
    const state = options.resume ? await store.load() : createEmptyScanState();
    const classifier = new ItemClassifier(new CommonsItemDetailSource(api), {
      authorFilter: resolveAuthorFilter(options, target)
    });

    const crawlOutcome = await crawl({
      gateway: new CommonsListingGateway(api, 500, logger),
      classifier,
      store,
      scope,
      state,
      config: { ...runtime.crawler, rescan: options.rescan },
      logger
    });

    logger.info("geotag.queue_summary", {
      scope: describeScope(scope),
      crawl: crawlOutcome.status,
      needsMutation: state.needsMutation.length,
      needsAlternateAction: state.needsAlternateAction.length,
      alternateActionSample: state.needsAlternateAction.slice(0, 5)
    });

    const report = await processQueue({
      state,
      store,
      action: new GeotagMutationAction(api, new ExifGpsWriter(), options.upload),
      config: processorConfig,
      logger
    });

    logger.info("geotag.completed", { ...report, crawl: crawlOutcome.status });
    return { crawl: crawlOutcome, report };
  } finally {
    await api?.close();
    await store.close?.();
  }
};
