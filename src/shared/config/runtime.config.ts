import {
  crawlerCaps,
  defaultCrawlerConfig,
  type CrawlerConfigInput
} from "../../application/crawl/crawler.config";
import {
  defaultProcessorConfig,
  processorCaps,
  type ProcessorConfigInput
} from "../../application/process/processor.config";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 60000 }
} as const;

export type RuntimeConfig = {
  crawler: CrawlerConfigInput;
  processor: ProcessorConfigInput;
  timeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const processor: ProcessorConfigInput = {
    maxEdits: parseOptionalIntInRange(env, "GEOTAG_MAX_EDITS", processorCaps.maxEdits) ?? defaultProcessorConfig.maxEdits,
    maxPerMinute:
      parseOptionalIntInRange(env, "GEOTAG_MAX_EDITS_PER_MIN", processorCaps.maxPerMinute) ??
      defaultProcessorConfig.maxPerMinute,
    baseSleepMs:
      parseOptionalIntInRange(env, "GEOTAG_SLEEP_MS", processorCaps.baseSleepMs) ?? defaultProcessorConfig.baseSleepMs
  };

  const crawler: CrawlerConfigInput = {
    pageDelayMs:
      parseOptionalIntInRange(env, "GEOTAG_PAGE_DELAY_MS", crawlerCaps.pageDelayMs) ?? defaultCrawlerConfig.pageDelayMs
  };

  const timeoutMs =
    parseOptionalIntInRange(env, "COMMONS_TIMEOUT_MS", {
      min: runtimeCaps.timeoutMs.min,
      max: runtimeCaps.timeoutMs.max
    }) ?? 10000;

  return { crawler, processor, timeoutMs };
};
