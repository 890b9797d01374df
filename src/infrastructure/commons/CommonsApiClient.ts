import { FatalAuthError, TransientFetchError } from "../../core/errors";
import { consoleEventLogger, type EventLogger } from "../../shared/logging/eventLogger";
import { retry } from "../../shared/retry/retry";

export type ApiParams = Record<string, string | number | boolean | undefined>;
export type ApiResponse = Record<string, unknown>;

export type CommonsApiClientOptions = {
  apiUrl: string;
  userAgent: string;
  timeoutMs?: number;
  retries?: number;
  minRetryDelayMs?: number;
  logger?: EventLogger;
  sleep?: (ms: number) => Promise<void>;
};

export type Credentials = {
  username: string;
  password: string;
};

const AUTH_ERROR_CODES = new Set([
  "readapidenied",
  "permissiondenied",
  "notloggedin",
  "assertuserfailed",
  "assertbotfailed",
  "badtoken",
  "blocked",
  "mwoauth-invalid-authorization"
]);

const TRANSIENT_ERROR_CODES = new Set(["maxlag", "ratelimited", "readonly", "internal_api_error_DBQueryError"]);

/** An API `error` object whose code is neither an auth failure nor a throttling signal. */
export class CommonsApiError extends Error {
  readonly code = "api_error";
  readonly context: { apiCode: string; requestUrl: string };

  constructor(readonly apiCode: string, info: string, requestUrl: string) {
    super(`API error (${apiCode}): ${info}`);
    this.name = "CommonsApiError";
    this.context = { apiCode, requestUrl };
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseRetryAfterMs = (header: string | null): number | undefined => {
  if (!header || !/^\d+$/.test(header)) return undefined;
  const ms = Number(header) * 1000;
  return Number.isSafeInteger(ms) ? ms : undefined;
};

const toQueryValue = (value: string | number | boolean): string => {
  if (typeof value === "boolean") return value ? "1" : "0";
  return String(value);
};

/**
 * Session-scoped client for a MediaWiki action API. Holds the cookie jar and
 * tokens for one run: create with `open`, pass it to the adapters that need it,
 * and `close` it when done. Calls after `close` are rejected.
 */
export class CommonsApiClient {
  private readonly cookies = new Map<string, string>();
  private readonly logger: EventLogger;
  private csrfToken?: string;
  private closed = false;

  constructor(private readonly options: CommonsApiClientOptions) {
    this.logger = options.logger ?? consoleEventLogger;
  }

  static async open(options: CommonsApiClientOptions, credentials?: Credentials): Promise<CommonsApiClient> {
    const client = new CommonsApiClient(options);
    if (credentials) await client.login(credentials);
    return client;
  }

  async login(credentials: Credentials): Promise<void> {
    const tokenResponse = await this.get({ action: "query", meta: "tokens", type: "login" });
    const loginToken = this.readToken(tokenResponse, "logintoken");

    const response = await this.post({
      action: "login",
      lgname: credentials.username,
      lgpassword: credentials.password,
      lgtoken: loginToken
    });
    const login = isRecord(response.login) ? response.login : {};
    if (login.result !== "Success") {
      const reason = typeof login.reason === "string" ? login.reason : String(login.result ?? "unknown");
      throw new FatalAuthError({ message: `Login failed for ${credentials.username}: ${reason}` });
    }

    const csrfResponse = await this.get({ action: "query", meta: "tokens", type: "csrf" });
    this.csrfToken = this.readToken(csrfResponse, "csrftoken");
    this.logger.info("session.logged_in", { user: credentials.username });
  }

  async get(params: ApiParams): Promise<ApiResponse> {
    const url = this.buildUrl(params);
    return this.send(url, { method: "GET" });
  }

  async post(params: ApiParams, file?: { field: string; filename: string; bytes: Buffer }): Promise<ApiResponse> {
    const url = this.buildUrl({});
    const fields = this.withFormat(params);

    const makeBody = (): URLSearchParams | FormData => {
      if (!file) {
        const body = new URLSearchParams();
        for (const [key, value] of Object.entries(fields)) body.set(key, value);
        return body;
      }
      const form = new FormData();
      for (const [key, value] of Object.entries(fields)) form.set(key, value);
      form.set(file.field, new Blob([new Uint8Array(file.bytes)]), file.filename);
      return form;
    };

    return this.send(url, { method: "POST", makeBody });
  }

  /** Uploads new bytes over an existing file title; duplicate/overwrite warnings are ignored. */
  async upload(args: { filename: string; bytes: Buffer; comment: string }): Promise<ApiResponse> {
    if (!this.csrfToken) {
      throw new FatalAuthError({ message: "Upload requires a logged-in session" });
    }
    const response = await this.post(
      {
        action: "upload",
        filename: args.filename,
        comment: args.comment,
        ignorewarnings: true,
        token: this.csrfToken
      },
      { field: "file", filename: args.filename, bytes: args.bytes }
    );
    const upload = isRecord(response.upload) ? response.upload : {};
    if (upload.result !== "Success" && upload.result !== "Warning") {
      throw new Error(`Upload of ${args.filename} was not accepted: ${String(upload.result ?? "no result")}`);
    }
    return response;
  }

  async download(fileUrl: string): Promise<Buffer> {
    this.assertOpen();
    const safeUrl = this.safeUrl(new URL(fileUrl));
    return this.withRetry(safeUrl, async () => {
      const res = await this.fetchWithTimeout(fileUrl, { method: "GET" }, safeUrl);
      if (!res.ok) {
        await res.arrayBuffer().catch(() => undefined);
        throw this.statusError(res, safeUrl);
      }
      return Buffer.from(await res.arrayBuffer());
    });
  }

  async close(): Promise<void> {
    this.cookies.clear();
    this.csrfToken = undefined;
    this.closed = true;
  }

  private assertOpen() {
    if (this.closed) throw new Error("CommonsApiClient is closed");
  }

  private readToken(response: ApiResponse, name: "logintoken" | "csrftoken"): string {
    const query = isRecord(response.query) ? response.query : {};
    const tokens = isRecord(query.tokens) ? query.tokens : {};
    const token = tokens[name];
    if (typeof token !== "string" || token === "") {
      throw new FatalAuthError({ message: `API did not return a ${name}` });
    }
    return token;
  }

  private withFormat(params: ApiParams): Record<string, string> {
    const fields: Record<string, string> = { format: "json", formatversion: "2" };
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) fields[key] = toQueryValue(value);
    }
    return fields;
  }

  private buildUrl(params: ApiParams): URL {
    const url = new URL(this.options.apiUrl);
    if (Object.keys(params).length === 0) return url;
    for (const [key, value] of Object.entries(this.withFormat(params))) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private safeUrl(url: URL): string {
    return `${url.origin}${url.pathname}${url.search}`;
  }

  private async send(
    url: URL,
    init: { method: "GET" } | { method: "POST"; makeBody: () => URLSearchParams | FormData }
  ): Promise<ApiResponse> {
    this.assertOpen();
    const safeUrl = this.safeUrl(url);

    return this.withRetry(safeUrl, async () => {
      const res = await this.fetchWithTimeout(
        url.toString(),
        init.method === "GET" ? { method: "GET" } : { method: "POST", body: init.makeBody() },
        safeUrl
      );
      this.storeCookies(res);

      if (!res.ok) {
        await res.text().catch(() => "");
        throw this.statusError(res, safeUrl);
      }

      const json: unknown = await res.json();
      if (!isRecord(json)) {
        throw new Error(`API response from ${safeUrl} is not an object`);
      }
      this.throwOnApiError(json, safeUrl);
      return json;
    });
  }

  private async fetchWithTimeout(
    url: string,
    init: { method: "GET" | "POST"; body?: URLSearchParams | FormData },
    safeUrl: string
  ): Promise<Response> {
    const timeoutMs = this.options.timeoutMs ?? 10000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const headers: Record<string, string> = { "User-Agent": this.options.userAgent };
    const cookieHeader = this.cookieHeader();
    if (cookieHeader) headers.Cookie = cookieHeader;

    try {
      return await fetch(url, { ...init, headers, signal: controller.signal });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TransientFetchError({
          message: `Request timeout after ${timeoutMs}ms`,
          context: { requestUrl: safeUrl },
          cause: err
        });
      }
      throw new TransientFetchError({
        message: `Network error: ${err instanceof Error ? err.message : String(err)}`,
        context: { requestUrl: safeUrl },
        cause: err
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private statusError(res: Response, safeUrl: string): Error {
    const status = res.status;
    const context = { status, requestUrl: safeUrl };
    if (status === 401 || status === 403) {
      return new FatalAuthError({ message: `Request not authorized: ${status}`, status, context });
    }
    if (status === 429) {
      return new TransientFetchError({
        message: `Request rate limited: ${status}`,
        status,
        retryDelayMs: parseRetryAfterMs(res.headers.get("retry-after")),
        context
      });
    }
    if (status >= 500) {
      return new TransientFetchError({ message: `Request failed: ${status}`, status, context });
    }
    return Object.assign(new Error(`Request failed: ${status}`), { status });
  }

  private throwOnApiError(json: ApiResponse, safeUrl: string) {
    if (!isRecord(json.error)) return;
    const code = typeof json.error.code === "string" ? json.error.code : "unknown";
    const info = typeof json.error.info === "string" ? json.error.info : code;
    const context = { apiCode: code, requestUrl: safeUrl };

    if (AUTH_ERROR_CODES.has(code)) {
      throw new FatalAuthError({ message: `API refused the request (${code}): ${info}`, context });
    }
    if (TRANSIENT_ERROR_CODES.has(code)) {
      throw new TransientFetchError({ message: `API temporarily unavailable (${code}): ${info}`, context });
    }
    throw new CommonsApiError(code, info, safeUrl);
  }

  private storeCookies(res: Response) {
    for (const raw of res.headers.getSetCookie()) {
      const [pair] = raw.split(";");
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }

  private cookieHeader(): string {
    return Array.from(this.cookies.entries())
      .map(([name, value]) => `${name}=${value}`)
      .join("; ");
  }

  private withRetry<T>(safeUrl: string, fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      retries: this.options.retries ?? 5,
      minDelayMs: this.options.minRetryDelayMs ?? 250,
      maxDelayMs: 30000,
      sleep: this.options.sleep,
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        this.logger.warn("http.retry", {
          status: error instanceof TransientFetchError ? error.status ?? null : null,
          url: safeUrl,
          attempt,
          maxAttempts,
          delayMs
        });
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        this.logger.warn("http.give_up", {
          status: error instanceof TransientFetchError ? error.status ?? null : null,
          url: safeUrl,
          attempt,
          maxAttempts
        });
      }
    });
  }
}
