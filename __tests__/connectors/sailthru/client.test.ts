import { describe, expect, it, vi } from "vitest";
import type { Logger } from "../../../src/connectors/core/types.js";
import { SailthruClient } from "../../../src/connectors/sailthru/client.js";
import type { FetchLike } from "../../../src/connectors/sailthru/client.js";
import {
  RequestTimeoutError,
  SailthruClientError,
  SailthruError,
  SailthruForbiddenError,
  SailthruRateLimitError,
  SailthruServerError,
  SailthruStatsNotReadyError,
  SailthruUnauthorizedError,
  TransportError,
} from "../../../src/connectors/sailthru/errors.js";
import { getSignatureHash } from "../../../src/connectors/sailthru/signature.js";
import { silentLogger } from "../../helpers/fakes.js";
import { fakeClock, fakeFetch, jsonResponse, requestUrl } from "../../helpers/http.js";

function makeClient(
  fetchImpl: FetchLike,
  opts: { requestTimeout?: unknown; start?: number; logger?: Logger } = {},
) {
  const clock = fakeClock(opts.start);
  const client = new SailthruClient(
    {
      apiKey: "test-key",
      apiSecret: "test-secret",
      userAgent: "sailthru-tap-test",
      requestTimeout: opts.requestTimeout,
      logger: opts.logger ?? silentLogger(),
    },
    { fetchImpl, sleep: clock.sleep, now: clock.now, random: () => 0 },
  );
  return { client, clock };
}

function timeoutError(): Error {
  const err = new Error("The operation was aborted due to timeout");
  err.name = "TimeoutError";
  return err;
}

describe("SailthruClient requests", () => {
  it("signs GET parameters into the query string", async () => {
    const fetchImpl = fakeFetch(jsonResponse(200, { blasts: [] }));
    const { client } = makeClient(fetchImpl);

    await expect(client.getBlasts({ status: "sent" })).resolves.toEqual({ blasts: [] });

    const [input, init] = fetchImpl.mock.calls[0] ?? [];
    const url = requestUrl(input);
    expect(url.origin + url.pathname).toBe("https://api.sailthru.com/blast");
    expect(url.searchParams.get("api_key")).toBe("test-key");
    expect(url.searchParams.get("format")).toBe("json");
    expect(url.searchParams.get("json")).toBe('{"status":"sent"}');
    expect(url.searchParams.get("sig")).toBe(
      getSignatureHash(
        { api_key: "test-key", format: "json", json: '{"status":"sent"}' },
        "test-secret",
      ),
    );
    expect(init?.method).toBe("GET");
    expect(new Headers(init?.headers).get("user-agent")).toBe("sailthru-tap-test");
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("sends POST parameters as a form body", async () => {
    const fetchImpl = fakeFetch(jsonResponse(200, { job_id: "j1" }));
    const { client } = makeClient(fetchImpl);

    await client.createJob({ job: "export_list_data", list: "Newsletter" });

    const [input, init] = fetchImpl.mock.calls[0] ?? [];
    expect(requestUrl(input).search).toBe("");
    expect(init?.method).toBe("POST");
    const form = new URLSearchParams(String(init?.body));
    expect(form.get("json")).toBe('{"job":"export_list_data","list":"Newsletter"}');
    expect(form.get("api_key")).toBe("test-key");
    expect(form.get("sig")).toHaveLength(32);
  });

  it("rejects a non-JSON success body", async () => {
    const { client } = makeClient(fakeFetch(new Response("<html>", { status: 200 })));
    await expect(client.getLists()).rejects.toThrow(
      "Unexpected non-JSON response from https://api.sailthru.com/list",
    );
  });
});

describe("SailthruClient request validation", () => {
  it.each([
    ["getBlasts", () => ({}), 'Endpoint requires either "blast_id" or "status" parameter'],
    ["getUser", () => ({ key: "sid" }), 'Required "id" parameter missing'],
    ["getJob", () => ({}), 'Required "job_id" parameter missing'],
    ["createJob", () => ({ list: "x" }), 'Required "job" type parameter missing'],
  ] as const)("%s checks its parameters before any I/O", async (method, params, message) => {
    const fetchImpl = fakeFetch();
    const { client } = makeClient(fetchImpl);
    const call = client[method].bind(client);
    await expect(call(params())).rejects.toThrow(new SailthruClientError(message));
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe("SailthruClient error handling", () => {
  it("raises client errors without retrying", async () => {
    const fetchImpl = fakeFetch(jsonResponse(401, { error: 2, errormsg: "Invalid API key" }));
    const { client, clock } = makeClient(fetchImpl);

    const err = await client.getLists().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SailthruUnauthorizedError);
    expect(err instanceof SailthruError ? err.message : "").toBe(
      "HTTP-error-code: 401, Error: 2, Message: Invalid API key",
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(clock.sleep).not.toHaveBeenCalled();
  });

  it("uses the status default when the body has no message", async () => {
    const { client } = makeClient(fakeFetch(jsonResponse(404, {})));
    await expect(client.getLists()).rejects.toThrow(
      "HTTP-error-code: 404, Error: null, Message: The resource you have specified cannot be found.",
    );
  });

  it("makes three attempts on server errors with exponential backoff", async () => {
    const fetchImpl = fakeFetch(
      jsonResponse(503, {}),
      jsonResponse(502, {}),
      jsonResponse(500, {}),
    );
    const { client, clock } = makeClient(fetchImpl);

    await expect(client.getLists()).rejects.toBeInstanceOf(SailthruServerError);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(clock.sleep.mock.calls).toEqual([[2000], [4000]]);
  });

  it("recovers when a retry succeeds", async () => {
    const fetchImpl = fakeFetch(jsonResponse(500, {}), jsonResponse(200, { lists: [] }));
    const { client } = makeClient(fetchImpl);
    await expect(client.getLists()).resolves.toEqual({ lists: [] });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("retries statistics that are not ready yet", async () => {
    const fetchImpl = fakeFetch(
      jsonResponse(400, { error: 99 }),
      jsonResponse(400, { error: 99 }),
      jsonResponse(400, { error: 99 }),
    );
    const { client } = makeClient(fetchImpl);
    await expect(client.getBlasts({ blast_id: 1 })).rejects.toBeInstanceOf(
      SailthruStatsNotReadyError,
    );
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it("makes three attempts on timeouts", async () => {
    const fetchImpl = fakeFetch(timeoutError(), timeoutError(), timeoutError());
    const { client } = makeClient(fetchImpl);
    await expect(client.getLists()).rejects.toThrow(
      "Request to https://api.sailthru.com/list timed out after 300000ms",
    );
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it("retries transport failures", async () => {
    const fetchImpl = fakeFetch(
      new TypeError("fetch failed"),
      jsonResponse(200, { repeats: [] }),
    );
    const { client } = makeClient(fetchImpl);
    await expect(client.getBlastRepeats()).resolves.toEqual({ repeats: [] });
  });

  it("gives up on transport failures after three attempts", async () => {
    const fetchImpl = fakeFetch(
      new TypeError("fetch failed"),
      new TypeError("fetch failed"),
      new TypeError("fetch failed"),
    );
    const { client } = makeClient(fetchImpl);
    await expect(client.getBlastRepeats()).rejects.toBeInstanceOf(TransportError);
  });
});

describe("SailthruClient rate limiting", () => {
  it("waits for the time the reset header gives on each retry", async () => {
    const fetchImpl = fakeFetch(
      jsonResponse(429, {}, { "x-rate-limit-reset": "7" }),
      jsonResponse(429, {}, { "x-rate-limit-reset": "3" }),
      jsonResponse(429, {}, { "x-rate-limit-reset": "5" }),
    );
    const { client, clock } = makeClient(fetchImpl);

    await expect(client.getLists()).rejects.toBeInstanceOf(SailthruRateLimitError);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(clock.sleep.mock.calls).toEqual([[7000], [3000]]);
  });

  it("reads an epoch reset as the instant the quota returns", async () => {
    const fetchImpl = fakeFetch(
      jsonResponse(429, {}, { "x-rate-limit-reset": "1700000030" }),
      jsonResponse(200, { lists: [] }),
    );
    const { client, clock } = makeClient(fetchImpl, { start: 1_700_000_000_000 });

    await expect(client.getLists()).resolves.toEqual({ lists: [] });
    expect(clock.sleep.mock.calls).toEqual([[30_000]]);
  });

  it("waits a minute when the server names no reset", async () => {
    const fetchImpl = fakeFetch(jsonResponse(429, {}), jsonResponse(200, { lists: [] }));
    const { client, clock } = makeClient(fetchImpl);

    await client.getLists();
    expect(clock.sleep.mock.calls).toEqual([[60_000]]);
  });
});

describe("SailthruClient export skips", () => {
  const refused = { error: 99, errormsg: "You may not export a blast that has been sent" };

  it("returns the body of a refused export submission and warns", async () => {
    const warn = vi.fn<Logger["warn"]>();
    const logger: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn,
      error: vi.fn(),
      child: () => logger,
    };
    const { client } = makeClient(fakeFetch(jsonResponse(403, refused)), { logger });

    await expect(
      client.createJob({ job: "blast_query", blast_id: "7" }),
    ).resolves.toEqual(refused);
    expect(warn).toHaveBeenCalledWith(
      "HTTP-error-code: 403, Error: 99, Message: You may not export a blast that has been sent",
      { response: refused },
    );
  });

  it("raises the same response on other endpoints", async () => {
    const { client } = makeClient(fakeFetch(jsonResponse(403, refused)));
    await expect(client.getLists()).rejects.toBeInstanceOf(SailthruForbiddenError);
  });
});

describe("SailthruClient request timeout", () => {
  it.each([
    [undefined, 300],
    [null, 300],
    ["", 300],
    [0, 300],
    ["0", 300],
    [100, 100],
    ["100.5", 100.5],
  ])("resolves %j to %d seconds", (requestTimeout, expected) => {
    const { client } = makeClient(fakeFetch(), { requestTimeout });
    expect(client.requestTimeout).toBe(expected);
  });

  it("applies the timeout to each request", async () => {
    const fetchImpl = fakeFetch(timeoutError(), timeoutError(), timeoutError());
    const { client } = makeClient(fetchImpl, { requestTimeout: "2.5" });
    const err = await client.getLists().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RequestTimeoutError);
    expect(err instanceof Error ? err.message : "").toBe(
      "Request to https://api.sailthru.com/list timed out after 2500ms",
    );
  });
});
