export type Env = {
  COMMONS_API_URL: string;
  COMMONS_USER?: string;
  COMMONS_PASS?: string;
  COMMONS_USER_AGENT: string;
  CHECKPOINT_MONGO_URI?: string;
};

export const DEFAULT_USER_AGENT = "commons-geotagger/0.1 (resumable EXIF geotagging bot)";

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const optional = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const COMMONS_API_URL = validateHttpUrl(
    "COMMONS_API_URL",
    env.COMMONS_API_URL ?? "https://commons.wikimedia.org/w/api.php"
  );
  const COMMONS_USER_AGENT = optional(env.COMMONS_USER_AGENT) ?? DEFAULT_USER_AGENT;
  const CHECKPOINT_MONGO_URI = optional(env.CHECKPOINT_MONGO_URI);

  return {
    COMMONS_API_URL,
    COMMONS_USER: optional(env.COMMONS_USER),
    COMMONS_PASS: env.COMMONS_PASS ? env.COMMONS_PASS : undefined,
    COMMONS_USER_AGENT,
    CHECKPOINT_MONGO_URI
  };
};
