import { enumerateBuckets } from "./dates.js";
import type { DateRange, EntityViews, TopArticle, ViewsResult } from "./types.js";

export interface PivotRow {
  timestamp: Date;
  views: Map<string, number | null>;
}

export interface OutcomeCounts {
  ok: number;
  notFound: number;
  failed: number;
}

export function totalViews(series: ReadonlyArray<{ views: number }>): number {
  return series.reduce((sum, point) => sum + point.views, 0);
}

/** Collapses outcomes to plain totals; not-found and failed entries become null. */
export function totalsOf(result: ViewsResult): Map<string, number | null> {
  const totals = new Map<string, number | null>();
  for (const [key, outcome] of result) {
    totals.set(key, outcome.status === "ok" ? outcome.views : null);
  }
  return totals;
}

export function countOutcomes(result: ViewsResult): OutcomeCounts {
  const counts: OutcomeCounts = { ok: 0, notFound: 0, failed: 0 };
  for (const outcome of result.values()) {
    if (outcome.status === "ok") {
      counts.ok += 1;
    } else if (outcome.status === "not_found") {
      counts.notFound += 1;
    } else {
      counts.failed += 1;
    }
  }
  return counts;
}

export function failuresOf(result: ViewsResult): Array<{ key: string; message: string }> {
  const failures: Array<{ key: string; message: string }> = [];
  for (const [key, outcome] of result) {
    if (outcome.status === "failed") {
      failures.push({ key, message: outcome.error.message });
    }
  }
  return failures;
}

/**
 * Turns per-entity series into one row per bucket of `range`, each row
 * holding every requested key. Keys without data for a bucket hold null, so a
 * missing value stays distinguishable from zero views.
 */
export function pivotByTimestamp(result: ViewsResult, range: DateRange): PivotRow[] {
  const keys = [...result.keys()];
  const rows = new Map<number, PivotRow>();

  const rowFor = (timestamp: Date): PivotRow => {
    const existing = rows.get(timestamp.getTime());
    if (existing) {
      return existing;
    }

    const row: PivotRow = {
      timestamp,
      views: new Map(keys.map((key): [string, number | null] => [key, null]))
    };
    rows.set(timestamp.getTime(), row);
    return row;
  };

  for (const bucket of enumerateBuckets(range.start, range.end, range.granularity)) {
    rowFor(bucket);
  }

  for (const [key, outcome] of result) {
    if (!isOk(outcome)) {
      continue;
    }
    for (const point of outcome.series) {
      rowFor(point.timestamp).views.set(key, point.views);
    }
  }

  return [...rows.values()].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

function isOk(outcome: EntityViews): outcome is Extract<EntityViews, { status: "ok" }> {
  return outcome.status === "ok";
}

/** Orders by views descending, breaking ties by article name ascending. */
export function rankTopArticles(articles: readonly TopArticle[]): TopArticle[] {
  return [...articles].sort((a, b) => {
    if (a.views !== b.views) {
      return b.views - a.views;
    }
    if (a.article === b.article) {
      return 0;
    }
    return a.article < b.article ? -1 : 1;
  });
}
