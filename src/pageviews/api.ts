import { z } from "zod";

import { formatApiTimestamp, parseApiTimestamp } from "./dates.js";
import { UpstreamRequestError } from "./errors.js";
import type { AccessMethod, AgentType, DateRange, TopArticle, ViewPoint } from "./types.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface UpstreamRequest {
  url: string;
  fetch: FetchLike;
  userAgent: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

const seriesPayloadSchema = z.object({
  items: z.array(
    z.object({
      timestamp: z.string(),
      views: z.number().nonnegative()
    })
  )
});

const topPayloadSchema = z.object({
  items: z.array(
    z.object({
      articles: z.array(
        z.object({
          article: z.string(),
          views: z.number().nonnegative(),
          rank: z.number().int()
        })
      )
    })
  )
});

export function encodeArticleTitle(article: string): string {
  return encodeURIComponent(article.replace(/ /g, "_"));
}

export function buildArticleUrl(
  apiBase: string,
  project: string,
  access: AccessMethod,
  agent: AgentType,
  article: string,
  range: DateRange
): string {
  return [
    apiBase,
    "per-article",
    encodeURIComponent(project),
    access,
    agent,
    encodeArticleTitle(article),
    range.granularity,
    formatApiTimestamp(range.start),
    formatApiTimestamp(range.end)
  ].join("/");
}

export function buildProjectUrl(
  apiBase: string,
  project: string,
  access: AccessMethod,
  agent: AgentType,
  range: DateRange
): string {
  return [
    apiBase,
    "aggregate",
    encodeURIComponent(project),
    access,
    agent,
    range.granularity,
    formatApiTimestamp(range.start),
    formatApiTimestamp(range.end)
  ].join("/");
}

export function buildTopUrl(
  apiBase: string,
  project: string,
  access: AccessMethod,
  year: string,
  month: string,
  day: string
): string {
  return [apiBase, "top", encodeURIComponent(project), access, year, month, day].join("/");
}

/**
 * Fetches one time series. Resolves to null when upstream answers 404, which
 * is how the API reports an unknown title or project.
 */
export async function fetchSeries(request: UpstreamRequest): Promise<ViewPoint[] | null> {
  const payload = await fetchJson(request);
  if (payload === null) {
    return null;
  }

  const parsed = seriesPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw malformed(request.url, parsed.error.issues[0]?.message ?? "unexpected payload");
  }

  return parsed.data.items.map((item) => {
    const timestamp = parseApiTimestamp(item.timestamp);
    if (!timestamp) {
      throw malformed(request.url, `bad timestamp '${item.timestamp}'`);
    }
    return { timestamp, views: item.views };
  });
}

export async function fetchTopArticles(request: UpstreamRequest): Promise<TopArticle[]> {
  const payload = await fetchJson(request);
  if (payload === null) {
    return [];
  }

  const parsed = topPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw malformed(request.url, parsed.error.issues[0]?.message ?? "unexpected payload");
  }

  const { items } = parsed.data;
  if (items.length !== 1) {
    return [];
  }

  return items[0].articles.map((entry) => ({
    article: entry.article,
    rank: entry.rank,
    views: entry.views
  }));
}

async function fetchJson(request: UpstreamRequest): Promise<unknown> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), request.timeoutMs);
  const external = request.signal;
  const onExternalAbort = (): void => controller.abort();

  if (external?.aborted) {
    controller.abort();
  } else {
    external?.addEventListener("abort", onExternalAbort, { once: true });
  }

  try {
    let response: Response;
    try {
      response = await request.fetch(request.url, {
        headers: {
          Accept: "application/json",
          "User-Agent": request.userAgent
        },
        signal: controller.signal
      });
    } catch (error) {
      throw toTransportError(error, request, controller.signal);
    }

    if (response.status === 404) {
      return null;
    }

    if (!response.ok) {
      throw new UpstreamRequestError(
        "http",
        `HTTP ${response.status} ${response.statusText}`.trim(),
        request.url,
        response.status
      );
    }

    try {
      return await response.json();
    } catch (error) {
      if (controller.signal.aborted) {
        throw toTransportError(error, request, controller.signal);
      }
      throw malformed(request.url, "response body is not valid JSON");
    }
  } finally {
    clearTimeout(timer);
    external?.removeEventListener("abort", onExternalAbort);
  }
}

function toTransportError(error: unknown, request: UpstreamRequest, signal: AbortSignal): UpstreamRequestError {
  if (signal.aborted) {
    const reason = request.signal?.aborted ? "call deadline expired" : `no response within ${request.timeoutMs}ms`;
    return new UpstreamRequestError("timeout", `Request aborted: ${reason}`, request.url);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamRequestError("network", message, request.url);
}

function malformed(url: string, detail: string): UpstreamRequestError {
  return new UpstreamRequestError("malformed", `Malformed response: ${detail}`, url);
}
