export type CrawlerConfig = {
  pageDelayMs: number;
  rescan: boolean; // ignore a completed previous scan and restart the listing
};

export type CrawlerConfigInput = Partial<CrawlerConfig>;

export const defaultCrawlerConfig: CrawlerConfig = {
  pageDelayMs: 1000,
  rescan: false
};

export const crawlerCaps = {
  pageDelayMs: { min: 0, max: 60000 }
} as const;

export const resolveCrawlerConfig = (input: CrawlerConfigInput = {}): CrawlerConfig => {
  const config: CrawlerConfig = {
    pageDelayMs: input.pageDelayMs ?? defaultCrawlerConfig.pageDelayMs,
    rescan: input.rescan ?? defaultCrawlerConfig.rescan
  };
  const { min, max } = crawlerCaps.pageDelayMs;
  if (!Number.isInteger(config.pageDelayMs) || config.pageDelayMs < min || config.pageDelayMs > max) {
    throw new Error(`pageDelayMs=${String(config.pageDelayMs)} is out of allowed range [${min}..${max}]`);
  }
  return config;
};
