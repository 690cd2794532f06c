import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MockAgent } from "undici";
import {
  createConnectionContext,
  appendParams,
  decodeBody,
  headersForHop,
  classifyTransportError,
  MAX_REDIRECTS,
  type ConnectionContext,
  type TransportRequest,
} from "../fetcher/connection.js";
import { FetchError } from "../fetcher/errors.js";
import type { Cookie } from "../fetcher/cookies.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ORIGIN = "https://example.test";
const OTHER_ORIGIN = "https://other.test";

function makeCookie(domain: string, name: string, value: string): Cookie {
  return { domain, includeSubdomains: false, path: "/", secure: false, expiry: 0, name, value };
}

const JAR: Cookie[] = [
  makeCookie("example.test", "session", "abc"),
  makeCookie("other.test", "pref", "1"),
];

function makeRequest(overrides: Partial<TransportRequest> = {}): TransportRequest {
  return {
    url: `${ORIGIN}/page`,
    headers: { "user-agent": "test-agent" },
    followRedirects: true,
    verifyTls: true,
    timeoutMs: 5000,
    ...overrides,
  };
}

/** Await a rejected get() and return its error as a FetchError. */
async function getError(context: ConnectionContext, request: TransportRequest): Promise<FetchError> {
  const error: unknown = await context.get(request).then(
    () => undefined,
    (e: unknown) => e,
  );
  expect(error).toBeInstanceOf(FetchError);
  if (!(error instanceof FetchError)) {
    throw new Error("expected a FetchError");
  }
  return error;
}

let mockAgent: MockAgent;
let context: ConnectionContext;

beforeEach(() => {
  mockAgent = new MockAgent();
  mockAgent.disableNetConnect();
  context = createConnectionContext({ createDispatcher: () => mockAgent });
});

afterEach(async () => {
  await context.close();
});

// ---------------------------------------------------------------------------
// 1. Successful GETs
// ---------------------------------------------------------------------------
describe("ConnectionContext.get", () => {
  it("should return status, headers, raw bytes and decoded text", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/page", method: "GET" })
      .reply(200, "<html>hello</html>", { headers: { "content-type": "text/html; charset=utf-8" } });

    const response = await context.get(makeRequest());

    expect(response.statusCode).toBe(200);
    expect(response.url).toBe(`${ORIGIN}/page`);
    expect(response.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(response.text).toBe("<html>hello</html>");
    expect(response.content).toBeInstanceOf(Uint8Array);
    expect(response.content.byteLength).toBe(18);
  });

  it("should send the request headers", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/page", method: "GET", headers: { "user-agent": "test-agent" } })
      .reply(200, "matched");

    const response = await context.get(makeRequest());

    expect(response.text).toBe("matched");
  });

  it("should append query parameters to the URL", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/search", method: "GET", query: { q: "test", page: "2" } })
      .reply(200, "results");

    const response = await context.get(
      makeRequest({ url: `${ORIGIN}/search`, params: { q: "test", page: 2 } }),
    );

    expect(response.statusCode).toBe(200);
    expect(response.text).toBe("results");
  });

  it("should decode the body with the declared charset", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/page", method: "GET" })
      .reply(200, Buffer.from([0x63, 0x61, 0x66, 0xe9]), {
        headers: { "content-type": "text/plain; charset=iso-8859-1" },
      });

    const response = await context.get(makeRequest());

    expect(response.text).toBe("café");
    expect(Array.from(response.content)).toEqual([0x63, 0x61, 0x66, 0xe9]);
  });

  it("should return error statuses as responses for the caller to classify", async () => {
    mockAgent.get(ORIGIN).intercept({ path: "/page", method: "GET" }).reply(404, "missing");

    const response = await context.get(makeRequest());

    expect(response.statusCode).toBe(404);
    expect(response.text).toBe("missing");
  });
});

// ---------------------------------------------------------------------------
// 2. Redirects
// ---------------------------------------------------------------------------
describe("redirects", () => {
  it("should follow relative redirects and report the final URL", async () => {
    const pool = mockAgent.get(ORIGIN);
    pool.intercept({ path: "/old", method: "GET" }).reply(301, "", { headers: { location: "/new" } });
    pool.intercept({ path: "/new", method: "GET" }).reply(200, "moved here");

    const response = await context.get(makeRequest({ url: `${ORIGIN}/old` }));

    expect(response.statusCode).toBe(200);
    expect(response.url).toBe(`${ORIGIN}/new`);
    expect(response.text).toBe("moved here");
  });

  it("should return the 3xx itself when redirects are disabled", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/old", method: "GET" })
      .reply(302, "", { headers: { location: "/new" } });

    const response = await context.get(
      makeRequest({ url: `${ORIGIN}/old`, followRedirects: false }),
    );

    expect(response.statusCode).toBe(302);
    expect(response.url).toBe(`${ORIGIN}/old`);
    expect(response.headers.get("location")).toBe("/new");
  });

  it("should return a 3xx without a Location header as the final response", async () => {
    mockAgent.get(ORIGIN).intercept({ path: "/page", method: "GET" }).reply(304, "");

    const response = await context.get(makeRequest());

    expect(response.statusCode).toBe(304);
  });

  it("should fail with too-many-redirects on a redirect loop", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/loop", method: "GET" })
      .reply(302, "", { headers: { location: "/loop" } })
      .persist();

    const error = await getError(context, makeRequest({ url: `${ORIGIN}/loop` }));

    expect(error.kind).toBe("too-many-redirects");
    expect(error.message).toBe(`Too many redirects (max ${MAX_REDIRECTS}): ${ORIGIN}/loop`);
    expect(error.statusCode).toBe(302);
  });

  it("should match cookies per hop and drop credentials when leaving the origin", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({
        path: "/start",
        method: "GET",
        headers: { cookie: "session=abc; token=t1", authorization: "Bearer test-token" },
      })
      .reply(302, "", { headers: { location: `${OTHER_ORIGIN}/land` } });
    mockAgent
      .get(OTHER_ORIGIN)
      .intercept({
        path: "/land",
        method: "GET",
        headers: {
          cookie: "pref=1",
          authorization: (value?: string) => value === undefined,
        },
      })
      .reply(200, "landed");

    const response = await context.get(
      makeRequest({
        url: `${ORIGIN}/start`,
        headers: { "user-agent": "test-agent", Authorization: "Bearer test-token" },
        cookies: { token: "t1" },
        cookieJar: JAR,
      }),
    );

    expect(response.text).toBe("landed");
    expect(response.url).toBe(`${OTHER_ORIGIN}/land`);
  });
});

describe("headersForHop", () => {
  const request = makeRequest({
    headers: { "user-agent": "test-agent", authorization: "Bearer test-token" },
    cookies: { token: "t1", session: "override" },
    cookieJar: JAR,
  });

  it("should send jar and explicit cookies to the original origin", () => {
    expect(headersForHop(request, `${ORIGIN}/next`)).toEqual({
      "user-agent": "test-agent",
      authorization: "Bearer test-token",
      Cookie: "session=override; token=t1",
    });
  });

  it("should only send matching jar cookies to another origin", () => {
    expect(headersForHop(request, `${OTHER_ORIGIN}/land`)).toEqual({
      "user-agent": "test-agent",
      Cookie: "pref=1",
    });
  });

  it("should treat a scheme change as another origin", () => {
    expect(headersForHop(request, "http://example.test/page")).toEqual({
      "user-agent": "test-agent",
      Cookie: "session=abc",
    });
  });

  it("should add no Cookie header when nothing matches", () => {
    expect(headersForHop(makeRequest(), "https://third.test/")).toEqual({
      "user-agent": "test-agent",
    });
  });
});

// ---------------------------------------------------------------------------
// 3. Transport failures
// ---------------------------------------------------------------------------
describe("transport failures", () => {
  it("should classify a network error as connection-failure", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/page", method: "GET" })
      .replyWithError(new Error("kaboom"));

    const error = await getError(context, makeRequest());

    expect(error.kind).toBe("connection-failure");
    expect(error.message).toContain(`Connection error for ${ORIGIN}/page`);
    expect(error.retryable).toBe(true);
  });

  it("should classify a slow response as timeout", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/page", method: "GET" })
      .reply(200, "late")
      .delay(500);

    const error = await getError(context, makeRequest({ timeoutMs: 50 }));

    expect(error.kind).toBe("timeout");
    expect(error.message).toBe(`Request timed out after 50ms: ${ORIGIN}/page`);
  });

  it("should fail as unexpected once the context is closed", async () => {
    await context.close();

    const error = await getError(context, makeRequest());

    expect(error.kind).toBe("unexpected");
    expect(error.message).toBe(`Connection context is closed: ${ORIGIN}/page`);
  });
});

// ---------------------------------------------------------------------------
// 4. Dispatcher pooling
// ---------------------------------------------------------------------------
describe("dispatcher pooling", () => {
  it("should build one dispatcher per TLS/proxy combination and close them all", async () => {
    const agents: MockAgent[] = [];
    const createDispatcher = vi.fn(() => {
      const agent = new MockAgent();
      agent.disableNetConnect();
      agent.get(ORIGIN).intercept({ path: "/page", method: "GET" }).reply(200, "ok").persist();
      agents.push(agent);
      return agent;
    });
    const pooled = createConnectionContext({ createDispatcher });

    await pooled.get(makeRequest());
    await pooled.get(makeRequest());
    await pooled.get(makeRequest({ verifyTls: false }));

    expect(createDispatcher).toHaveBeenCalledTimes(2);
    expect(createDispatcher).toHaveBeenNthCalledWith(1, { proxy: undefined, verifyTls: true });
    expect(createDispatcher).toHaveBeenNthCalledWith(2, { proxy: undefined, verifyTls: false });

    const closeSpies = agents.map((agent) => vi.spyOn(agent, "close"));
    await pooled.close();
    for (const spy of closeSpies) {
      expect(spy).toHaveBeenCalledTimes(1);
    }
  });
});

// ---------------------------------------------------------------------------
// 5. Helpers
// ---------------------------------------------------------------------------
describe("appendParams", () => {
  it("should leave the URL alone without params", () => {
    expect(appendParams("https://example.test/a?x=1")).toBe("https://example.test/a?x=1");
    expect(appendParams("https://example.test/a?x=1", {})).toBe("https://example.test/a?x=1");
  });

  it("should keep existing query parameters", () => {
    expect(appendParams("https://example.test/a?x=1", { y: "two", z: true })).toBe(
      "https://example.test/a?x=1&y=two&z=true",
    );
  });
});

describe("decodeBody", () => {
  const bytes = new TextEncoder().encode("plain");

  it("should default to UTF-8", () => {
    expect(decodeBody(bytes, "")).toBe("plain");
  });

  it("should fall back to UTF-8 for an unknown charset", () => {
    expect(decodeBody(bytes, "text/html; charset=not-a-charset")).toBe("plain");
  });

  it("should accept a quoted charset", () => {
    expect(decodeBody(new Uint8Array([0xe9]), 'text/plain; charset="latin1"')).toBe("é");
  });
});

describe("classifyTransportError", () => {
  const url = "https://example.test/x";

  it("should map timeout codes to timeout", () => {
    const cause = Object.assign(new Error("connect timed out"), { code: "UND_ERR_CONNECT_TIMEOUT" });
    const error = classifyTransportError(new TypeError("fetch failed", { cause }), url);

    expect(error.kind).toBe("timeout");
    expect(error.message).toBe(`Timeout error for ${url}: fetch failed (connect timed out)`);
    expect(error.cause).toBeInstanceOf(TypeError);
  });

  it("should map other system errors to connection-failure", () => {
    const cause = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
    const error = classifyTransportError(new TypeError("fetch failed", { cause }), url);

    expect(error.kind).toBe("connection-failure");
    expect(error.message).toBe(`Connection error for ${url}: fetch failed (connect ECONNREFUSED)`);
  });

  it("should map anything else to unexpected", () => {
    const error = classifyTransportError(new RangeError("odd"), url);

    expect(error.kind).toBe("unexpected");
    expect(error.message).toBe(`Unexpected error while loading ${url}: odd`);
    expect(error.retryable).toBe(false);
  });
});
