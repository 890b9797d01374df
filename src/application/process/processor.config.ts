export type ProcessorConfig = {
  maxEdits: number;
  maxPerMinute: number;
  baseSleepMs: number;
  dryRun: boolean;
};

export type ProcessorConfigInput = Partial<ProcessorConfig>;

export const defaultProcessorConfig: ProcessorConfig = {
  maxEdits: 19,
  maxPerMinute: 30,
  baseSleepMs: 10_000,
  dryRun: false
};

export const processorCaps = {
  maxEdits: { min: 1, max: 100000 },
  maxPerMinute: { min: 1, max: 120 },
  baseSleepMs: { min: 0, max: 600000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateProcessorConfig = (config: ProcessorConfig): ProcessorConfig => {
  assertIntegerInRange("maxEdits", config.maxEdits, processorCaps.maxEdits.min, processorCaps.maxEdits.max);
  assertIntegerInRange(
    "maxPerMinute",
    config.maxPerMinute,
    processorCaps.maxPerMinute.min,
    processorCaps.maxPerMinute.max
  );
  assertIntegerInRange(
    "baseSleepMs",
    config.baseSleepMs,
    processorCaps.baseSleepMs.min,
    processorCaps.baseSleepMs.max
  );
  return config;
};

export const resolveProcessorConfig = (input: ProcessorConfigInput = {}): ProcessorConfig =>
  validateProcessorConfig({
    maxEdits: input.maxEdits ?? defaultProcessorConfig.maxEdits,
    maxPerMinute: input.maxPerMinute ?? defaultProcessorConfig.maxPerMinute,
    baseSleepMs: input.baseSleepMs ?? defaultProcessorConfig.baseSleepMs,
    dryRun: input.dryRun ?? defaultProcessorConfig.dryRun
  });
