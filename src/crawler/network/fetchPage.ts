import { createFetchError, isCorpusError } from '../../errors.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface FetchPageOptions {
  timeoutMs: number;
  userAgent?: string;
  fetchImpl?: FetchLike;
}

export interface PageResponse {
  url: string;
  status: number;
  charset: string;
  body: string;
  raw: Buffer;
}

const FALLBACK_CHARSET = 'utf-8';

export const DEFAULT_USER_AGENT = 'RecipeCorpusBot/1.0 (+https://example.org/recipe-corpus)';

/**
 * Performs a single GET with redirects followed. The timeout covers both the
 * response headers and reading the body. Any transport fault is raised as a
 * recoverable fetch error; HTTP error statuses are returned, not thrown.
 *
 * The body is kept as received and decoded with the charset from the
 * `content-type` header, or UTF-8 when none is declared or the label is unknown.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<PageResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
  const fetchImpl = options.fetchImpl ?? fetch;

  try {
    const response = await fetchImpl(url, {
      redirect: 'follow',
      signal: controller.signal,
      headers: {
        'user-agent': options.userAgent ?? DEFAULT_USER_AGENT,
        accept: 'text/html,application/xhtml+xml,*/*;q=0.9',
        'accept-encoding': 'gzip, deflate, br',
      },
    });

    const raw = Buffer.from(await response.arrayBuffer());
    const { charset, body } = decodeBody(raw, response.headers.get('content-type'));

    return {
      url: response.url || url,
      status: response.status,
      charset,
      body,
      raw,
    };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    const timedOut = controller.signal.aborted;
    const code = extractErrorCode(err);
    const message = timedOut
      ? `Request timed out after ${options.timeoutMs}ms`
      : err.message || 'Request failed';

    throw createFetchError(
      message,
      {
        url,
        timeoutMs: options.timeoutMs,
        timedOut,
        ...(code ? { code } : {}),
      },
      { cause: err },
    );
  } finally {
    clearTimeout(timeoutId);
  }
}

export function charsetFrom(contentType: string | null): string | undefined {
  const match = contentType?.match(/charset\s*=\s*"?([^";,\s]+)"?/i);
  return match?.[1]?.toLowerCase();
}

export function decodeBody(
  raw: Uint8Array,
  contentType: string | null,
): { charset: string; body: string } {
  const declared = charsetFrom(contentType);
  if (declared) {
    try {
      const decoder = new TextDecoder(declared);
      return { charset: decoder.encoding, body: decoder.decode(raw) };
    } catch (error) {
      if (!(error instanceof RangeError)) {
        throw error;
      }
    }
  }

  return { charset: FALLBACK_CHARSET, body: new TextDecoder(FALLBACK_CHARSET).decode(raw) };
}

export function extractErrorCode(error: Error): string | undefined {
  if (isCorpusError(error)) {
    const detailsCode = error.details?.code;
    if (typeof detailsCode === 'string') {
      return detailsCode;
    }
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  if (error.cause instanceof Error) {
    return extractErrorCode(error.cause);
  }

  return undefined;
}
