import { Agent, ProxyAgent, fetch as undiciFetch, type Dispatcher } from 'undici';
import { buildCookieHeader, type Cookie } from './cookies.js';
import { FetchError, isSystemError } from './errors.js';

/**
 * A single GET as handed to the connection context.
 */
export interface TransportRequest {
  url: string;
  /** Sent as-is to the first hop. Should not carry a Cookie header. */
  headers: Record<string, string>;
  /** Explicit cookies; only sent to the origin of `url`. */
  cookies?: Readonly<Record<string, string>>;
  /** Matched against each hop's URL. */
  cookieJar?: readonly Cookie[];
  params?: Readonly<Record<string, string | number | boolean>>;
  followRedirects: boolean;
  verifyTls: boolean;
  proxy?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * The raw response of a GET, body fully read.
 */
export interface TransportResponse {
  statusCode: number;
  /** Final URL after redirects. */
  url: string;
  headers: Headers;
  content: Uint8Array;
  text: string;
}

/**
 * Pooled transport session. Safe to share between concurrent fetches;
 * whoever creates a context is responsible for closing it.
 *
 * Implementations throw a classified `FetchError` (`timeout`,
 * `connection-failure`, `too-many-redirects`) on transport failure.
 */
export interface ConnectionContext {
  get(request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

export interface DispatcherOptions {
  proxy?: string;
  verifyTls: boolean;
}

/**
 * Options for the undici-backed connection context.
 */
export interface ConnectionContextOptions {
  /** Max sockets per origin. */
  connections?: number;
  keepAliveTimeoutMs?: number;
  /** Override how pooled dispatchers are built (e.g. an undici MockAgent). */
  createDispatcher?: (options: DispatcherOptions) => Dispatcher;
}

/** Maximum number of redirects to follow. */
export const MAX_REDIRECTS = 10;

/** Dropped from a redirect that leaves the original origin. */
const CREDENTIAL_HEADERS = new Set(['authorization', 'cookie', 'proxy-authorization']);

/** Error codes that mean the transport gave up waiting. */
const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

/**
 * Create a connection context backed by undici connection pools.
 *
 * One dispatcher is created lazily per (proxy, verifyTls) pair and reused
 * by every request that needs it, so keep-alive sockets are shared across
 * a whole batch.
 */
export function createConnectionContext(
  options: ConnectionContextOptions = {},
): ConnectionContext {
  const dispatchers = new Map<string, Dispatcher>();
  const createDispatcher =
    options.createDispatcher ??
    ((dispatcherOptions: DispatcherOptions) =>
      createPoolDispatcher(dispatcherOptions, options));
  let closed = false;

  function dispatcherFor(request: TransportRequest): Dispatcher {
    const key = `${request.verifyTls ? 'verify' : 'insecure'}|${request.proxy ?? ''}`;
    let dispatcher = dispatchers.get(key);
    if (!dispatcher) {
      dispatcher = createDispatcher({
        proxy: request.proxy,
        verifyTls: request.verifyTls,
      });
      dispatchers.set(key, dispatcher);
    }
    return dispatcher;
  }

  return {
    async get(request: TransportRequest): Promise<TransportResponse> {
      if (closed) {
        throw new FetchError(
          'unexpected',
          `Connection context is closed: ${request.url}`,
          request.url,
        );
      }

      const dispatcher = dispatcherFor(request);
      const controller = new AbortController();
      let timedOut = false;
      const timeout = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, request.timeoutMs);

      const onCallerAbort = (): void => controller.abort(request.signal?.reason);
      if (request.signal?.aborted) {
        onCallerAbort();
      }
      request.signal?.addEventListener('abort', onCallerAbort, { once: true });

      try {
        return await getFollowingRedirects(request, dispatcher, controller.signal);
      } catch (error) {
        if (error instanceof FetchError) {
          throw error;
        }
        if (timedOut) {
          throw new FetchError(
            'timeout',
            `Request timed out after ${request.timeoutMs}ms: ${request.url}`,
            request.url,
            undefined,
            undefined,
            { cause: error },
          );
        }
        throw classifyTransportError(error, request.url);
      } finally {
        clearTimeout(timeout);
        request.signal?.removeEventListener('abort', onCallerAbort);
      }
    },

    async close(): Promise<void> {
      closed = true;
      const pools = [...dispatchers.values()];
      dispatchers.clear();
      await Promise.all(pools.map((dispatcher) => dispatcher.close()));
    },
  };
}

/**
 * Issue the GET, following up to MAX_REDIRECTS redirects by hand when
 * the request asks for it. A 3xx without a Location header is returned
 * as the final response.
 */
async function getFollowingRedirects(
  request: TransportRequest,
  dispatcher: Dispatcher,
  signal: AbortSignal,
): Promise<TransportResponse> {
  let currentUrl = appendParams(request.url, request.params);

  for (let redirectCount = 0; ; redirectCount++) {
    const response = await undiciFetch(currentUrl, {
      headers: headersForHop(request, currentUrl),
      dispatcher,
      signal,
      redirect: 'manual',
    });

    const location = response.headers.get('location');
    if (request.followRedirects && isRedirect(response.status) && location) {
      await response.body?.cancel();
      if (redirectCount === MAX_REDIRECTS) {
        throw new FetchError(
          'too-many-redirects',
          `Too many redirects (max ${MAX_REDIRECTS}): ${request.url}`,
          request.url,
          response.status,
        );
      }
      // Resolve relative redirect URLs
      currentUrl = new URL(location, currentUrl).href;
      continue;
    }

    const headers = new Headers();
    response.headers.forEach((value, key) => {
      headers.append(key, value);
    });
    const content = new Uint8Array(await response.arrayBuffer());

    return {
      statusCode: response.status,
      url: currentUrl,
      headers,
      content,
      text: decodeBody(content, headers.get('content-type') ?? ''),
    };
  }
}

/**
 * Request headers for one hop. Cookies are re-matched against the hop's
 * URL, and credentials are only sent while the hop stays on the origin
 * the request started from.
 */
export function headersForHop(
  request: TransportRequest,
  hopUrl: string,
): Record<string, string> {
  const sameOrigin = new URL(hopUrl).origin === new URL(request.url).origin;
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(request.headers)) {
    if (sameOrigin || !CREDENTIAL_HEADERS.has(name.toLowerCase())) {
      headers[name] = value;
    }
  }

  const cookieHeader = buildCookieHeader(
    hopUrl,
    sameOrigin ? request.cookies : undefined,
    request.cookieJar,
  );
  if (cookieHeader) {
    headers['Cookie'] = cookieHeader;
  }
  return headers;
}

function createPoolDispatcher(
  { proxy, verifyTls }: DispatcherOptions,
  options: ConnectionContextOptions,
): Dispatcher {
  if (proxy) {
    return new ProxyAgent({
      uri: proxy,
      connections: options.connections,
      keepAliveTimeout: options.keepAliveTimeoutMs,
      requestTls: { rejectUnauthorized: verifyTls },
    });
  }
  return new Agent({
    connections: options.connections,
    keepAliveTimeout: options.keepAliveTimeoutMs,
    connect: { rejectUnauthorized: verifyTls },
  });
}

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

/**
 * Append query parameters to a URL, keeping any already present.
 */
export function appendParams(
  url: string,
  params?: Readonly<Record<string, string | number | boolean>>,
): string {
  if (!params || Object.keys(params).length === 0) {
    return url;
  }
  const parsed = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    parsed.searchParams.append(key, String(value));
  }
  return parsed.href;
}

/**
 * Decode a body using the charset declared in its Content-Type,
 * falling back to UTF-8 when none is declared or the label is unknown.
 */
export function decodeBody(content: Uint8Array, contentType: string): string {
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType);
  const charset = match?.[1] ?? 'utf-8';

  let decoder: InstanceType<typeof TextDecoder>;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(content);
}

/**
 * Map an error thrown by undici to a FetchError. undici reports network
 * failures as `TypeError: fetch failed` with the system error as `cause`.
 */
export function classifyTransportError(error: unknown, url: string): FetchError {
  const code = findErrorCode(error);
  const detail = describeError(error);

  if (code !== undefined && TIMEOUT_CODES.has(code)) {
    return new FetchError(
      'timeout',
      `Timeout error for ${url}: ${detail}`,
      url,
      undefined,
      undefined,
      { cause: error },
    );
  }

  if (
    code !== undefined ||
    (error instanceof TypeError && error.message === 'fetch failed')
  ) {
    return new FetchError(
      'connection-failure',
      `Connection error for ${url}: ${detail}`,
      url,
      undefined,
      undefined,
      { cause: error },
    );
  }

  return new FetchError(
    'unexpected',
    `Unexpected error while loading ${url}: ${detail}`,
    url,
    undefined,
    undefined,
    { cause: error },
  );
}

function findErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (isSystemError(current)) {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  return error.cause instanceof Error
    ? `${error.message} (${error.cause.message})`
    : error.message;
}
