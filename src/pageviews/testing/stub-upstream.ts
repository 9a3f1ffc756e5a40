import { setTimeout as sleep } from "node:timers/promises";

import type { FetchLike } from "../api.js";

export interface StubReply {
  status?: number;
  statusText?: string;
  body?: unknown;
  rawBody?: string;
  delayMs?: number;
  error?: Error;
}

export interface StubCall {
  url: string;
  headers: Headers;
}

export interface StubUpstream {
  fetch: FetchLike;
  calls: StubCall[];
  urls(): string[];
  peakInFlight(): number;
}

/**
 * In-process stand-in for the pageview API. Each reply may be delayed; the
 * delay honours the request's abort signal the way a real socket would.
 */
export function createStubUpstream(reply: (url: string) => StubReply): StubUpstream {
  const calls: StubCall[] = [];
  let inFlight = 0;
  let peak = 0;

  const fetchImpl: FetchLike = async (input, init) => {
    calls.push({ url: input, headers: new Headers(init?.headers) });
    inFlight += 1;
    peak = Math.max(peak, inFlight);

    try {
      const next = reply(input);
      await sleep(next.delayMs ?? 0, undefined, { signal: init?.signal ?? undefined });

      if (next.error) {
        throw next.error;
      }

      return new Response(next.rawBody ?? JSON.stringify(next.body ?? {}), {
        status: next.status ?? 200,
        statusText: next.statusText ?? "",
        headers: { "content-type": "application/json" }
      });
    } finally {
      inFlight -= 1;
    }
  };

  return {
    fetch: fetchImpl,
    calls,
    urls: () => calls.map((call) => call.url),
    peakInFlight: () => peak
  };
}

export function seriesBody(points: Array<[timestamp: string, views: number]>): unknown {
  return {
    items: points.map(([timestamp, views]) => ({
      project: "en.wikipedia",
      access: "all-access",
      agent: "all-agents",
      granularity: "daily",
      timestamp,
      views
    }))
  };
}

export function notFound(): StubReply {
  return {
    status: 404,
    statusText: "Not Found",
    body: { type: "https://mediawiki.org/wiki/HyperSwitch/errors/not_found", title: "Not found." }
  };
}
