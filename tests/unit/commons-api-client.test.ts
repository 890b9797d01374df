import { FatalAuthError, TransientFetchError } from "../../src/core/errors";
import { CommonsApiClient, CommonsApiError } from "../../src/infrastructure/commons/CommonsApiClient";
import { silentEventLogger } from "../../src/shared/logging/eventLogger";
import { sendJson, startServer, type TestServer } from "./support/httpServer";

describe("CommonsApiClient", () => {
  let server: TestServer | undefined;
  let sleeps: number[];

  const clientFor = (baseUrl: string, overrides: { retries?: number; timeoutMs?: number } = {}) =>
    new CommonsApiClient({
      apiUrl: `${baseUrl}/w/api.php`,
      userAgent: "geotagger-test/1.0",
      minRetryDelayMs: 10,
      logger: silentEventLogger,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      ...overrides
    });

  beforeEach(() => {
    sleeps = [];
    jest.spyOn(Math, "random").mockReturnValue(0);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await server?.close();
    server = undefined;
  });

  it("sends format parameters and the user agent on every request", async () => {
    server = await startServer((_req, res) => sendJson(res, { query: { pages: [] } }));
    const client = clientFor(server.baseUrl);

    await expect(client.get({ action: "query", titles: "File:A.jpg", redirects: true })).resolves.toEqual({
      query: { pages: [] }
    });

    const [request] = server.requests;
    expect(request?.url.pathname).toBe("/w/api.php");
    expect(Object.fromEntries(request?.url.searchParams ?? [])).toEqual({
      format: "json",
      formatversion: "2",
      action: "query",
      titles: "File:A.jpg",
      redirects: "1"
    });
    expect(request?.headers["user-agent"]).toBe("geotagger-test/1.0");
  });

  it("retries 5xx responses with backoff and then succeeds", async () => {
    let calls = 0;
    server = await startServer((_req, res) => {
      calls += 1;
      if (calls <= 2) {
        res.writeHead(503);
        res.end("busy");
        return;
      }
      sendJson(res, { ok: true });
    });

    await expect(clientFor(server.baseUrl).get({ action: "query" })).resolves.toEqual({ ok: true });
    expect(calls).toBe(3);
    expect(sleeps).toEqual([10, 20]);
  });

  it("waits for Retry-After on 429", async () => {
    let calls = 0;
    server = await startServer((_req, res) => {
      calls += 1;
      if (calls === 1) {
        res.writeHead(429, { "Retry-After": "2" });
        res.end("slow down");
        return;
      }
      sendJson(res, { ok: true });
    });

    await clientFor(server.baseUrl).get({ action: "query" });
    expect(sleeps).toEqual([2000]);
  });

  it("gives up with a TransientFetchError once retries are used up", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(502);
      res.end();
    });

    const failure = clientFor(server.baseUrl, { retries: 1 }).get({ action: "query" });
    await expect(failure).rejects.toBeInstanceOf(TransientFetchError);
    await expect(failure).rejects.toThrow("Request failed: 502");
    expect(server.requests).toHaveLength(2);
  });

  it("fails fast on 403 without retrying", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(403);
      res.end();
    });

    await expect(clientFor(server.baseUrl).get({ action: "query" })).rejects.toBeInstanceOf(FatalAuthError);
    expect(server.requests).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it("maps API error codes", async () => {
    const codes = ["maxlag", "permissiondenied", "badvalue"];
    server = await startServer((_req, res) => {
      const code = codes.shift() ?? "badvalue";
      sendJson(res, { error: { code, info: `info for ${code}` } });
    });
    const client = clientFor(server.baseUrl, { retries: 0 });

    await expect(client.get({ action: "query" })).rejects.toThrow(
      new TransientFetchError({ message: "API temporarily unavailable (maxlag): info for maxlag" })
    );
    await expect(client.get({ action: "query" })).rejects.toBeInstanceOf(FatalAuthError);
    const other = client.get({ action: "query" });
    await expect(other).rejects.toBeInstanceOf(CommonsApiError);
    await expect(other).rejects.toMatchObject({
      message: "API error (badvalue): info for badvalue",
      apiCode: "badvalue",
      code: "api_error"
    });
  });

  it("logs in with the session cookie and uploads with the csrf token", async () => {
    server = await startServer((req, res) => {
      const params = req.method === "GET" ? req.url.searchParams : new URLSearchParams(req.body);
      if (req.method === "GET" && params.get("type") === "login") {
        sendJson(res, { query: { tokens: { logintoken: "login-token" } } }, 200, {
          "Set-Cookie": "session=abc123; Path=/; HttpOnly"
        });
        return;
      }
      if (req.method === "POST" && params.get("action") === "login") {
        const ok = params.get("lgtoken") === "login-token" && req.headers.cookie === "session=abc123";
        sendJson(res, { login: ok ? { result: "Success" } : { result: "Failed", reason: "bad session" } });
        return;
      }
      if (req.method === "GET" && params.get("type") === "csrf") {
        sendJson(res, { query: { tokens: { csrftoken: "csrf-token" } } });
        return;
      }
      sendJson(res, { upload: { result: "Success" } });
    });

    const client = await CommonsApiClient.open(
      {
        apiUrl: `${server.baseUrl}/w/api.php`,
        userAgent: "geotagger-test/1.0",
        logger: silentEventLogger
      },
      { username: "Example bot", password: "test-secret" }
    );

    await client.upload({ filename: "A.jpg", bytes: Buffer.from([0xff, 0xd8, 0xff, 0xd9]), comment: "Adding geolocation" });

    const uploadRequest = server.requests[3];
    expect(uploadRequest?.method).toBe("POST");
    expect(uploadRequest?.headers["content-type"]).toMatch(/^multipart\/form-data/);
    expect(uploadRequest?.headers.cookie).toBe("session=abc123");
    expect(uploadRequest?.body).toContain("csrf-token");
    expect(uploadRequest?.body).toContain('filename="A.jpg"');
  });

  it("reports a refused login as FatalAuthError", async () => {
    server = await startServer((req, res) => {
      if (req.method === "GET") {
        sendJson(res, { query: { tokens: { logintoken: "login-token" } } });
        return;
      }
      sendJson(res, { login: { result: "Failed", reason: "Incorrect password" } });
    });

    const failure = CommonsApiClient.open(
      { apiUrl: `${server.baseUrl}/w/api.php`, userAgent: "geotagger-test/1.0", logger: silentEventLogger },
      { username: "Example bot", password: "test-secret" }
    );
    await expect(failure).rejects.toBeInstanceOf(FatalAuthError);
    await expect(failure).rejects.toThrow("Login failed for Example bot: Incorrect password");
  });

  it("refuses to upload without a session", async () => {
    server = await startServer((_req, res) => sendJson(res, {}));
    await expect(
      clientFor(server.baseUrl).upload({ filename: "A.jpg", bytes: Buffer.from([1]), comment: "x" })
    ).rejects.toThrow("Upload requires a logged-in session");
    expect(server.requests).toHaveLength(0);
  });

  it("downloads file bytes", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(200, { "content-type": "image/jpeg" });
      res.end(Buffer.from([0xff, 0xd8, 0x01, 0x02]));
    });

    const bytes = await clientFor(server.baseUrl).download(`${server.baseUrl}/files/A.jpg`);
    expect([...bytes]).toEqual([0xff, 0xd8, 0x01, 0x02]);
  });

  it("rejects calls after close", async () => {
    server = await startServer((_req, res) => sendJson(res, {}));
    const client = clientFor(server.baseUrl);
    await client.close();

    await expect(client.get({ action: "query" })).rejects.toThrow("CommonsApiClient is closed");
    await expect(client.download(`${server.baseUrl}/files/A.jpg`)).rejects.toThrow("CommonsApiClient is closed");
  });
});
