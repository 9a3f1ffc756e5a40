import type { PivotRow } from "../../pageviews/series.js";
import type {
  DateRange,
  EntityViews,
  Granularity,
  QueryProgressEvent,
  TopArticle,
  ViewsResult
} from "../../pageviews/types.js";

export type JsonEntityViews =
  | { status: "ok"; views: number }
  | { status: "not_found"; views: null }
  | { status: "failed"; views: null; error: { kind: string; status: number | null; message: string } };

export function formatProgress(event: QueryProgressEvent): string {
  const phase = event.phase.toUpperCase();
  const progress =
    typeof event.current === "number" && typeof event.total === "number"
      ? ` ${event.current}/${event.total}`
      : "";
  const stageLabel = event.stage === "warning" ? "WARN" : "INFO";

  return `[${phase}${progress}] ${stageLabel}: ${event.message}`;
}

export function formatBucket(date: Date, granularity: Granularity): string {
  const iso = date.toISOString();
  if (granularity === "hourly") {
    return `${iso.slice(0, 13)}:00`;
  }
  if (granularity === "monthly") {
    return iso.slice(0, 7);
  }
  return iso.slice(0, 10);
}

export function describeRange(range: DateRange): string {
  return `${formatBucket(range.start, "daily")} to ${formatBucket(range.end, "daily")}, ${range.granularity}`;
}

export function renderViews(result: ViewsResult): string[] {
  return [...result].map(([key, outcome]) => `${key}: ${describeViews(outcome)}`);
}

function describeViews(outcome: EntityViews): string {
  if (outcome.status === "ok") {
    return String(outcome.views);
  }
  if (outcome.status === "not_found") {
    return "not found";
  }
  return `failed (${outcome.error.kind}: ${outcome.error.message})`;
}

/** Tab-separated table: a header of keys, then one line per bucket. */
export function renderPivot(rows: readonly PivotRow[], keys: readonly string[], granularity: Granularity): string[] {
  const header = ["timestamp", ...keys].join("\t");
  const lines = rows.map((row) => {
    const cells = keys.map((key) => {
      const views = row.views.get(key);
      return typeof views === "number" ? String(views) : "-";
    });
    return [formatBucket(row.timestamp, granularity), ...cells].join("\t");
  });
  return [header, ...lines];
}

export function renderTop(articles: readonly TopArticle[]): string[] {
  if (!articles.length) {
    return ["No ranking available"];
  }

  const width = String(articles.length).length;
  return articles.map((entry, index) => {
    const position = String(index + 1).padStart(width, " ");
    return `${position}. ${entry.article} (${entry.views} views, upstream rank ${entry.rank})`;
  });
}

export function toJsonViews(result: ViewsResult): Record<string, JsonEntityViews> {
  return Object.fromEntries(
    [...result].map(([key, outcome]): [string, JsonEntityViews] => [key, toJsonEntity(outcome)])
  );
}

function toJsonEntity(outcome: EntityViews): JsonEntityViews {
  if (outcome.status === "ok") {
    return { status: "ok", views: outcome.views };
  }
  if (outcome.status === "not_found") {
    return { status: "not_found", views: null };
  }
  return {
    status: "failed",
    views: null,
    error: {
      kind: outcome.error.kind,
      status: outcome.error.status,
      message: outcome.error.message
    }
  };
}

export function toJsonPivot(rows: readonly PivotRow[], granularity: Granularity): Array<Record<string, string | number | null>> {
  return rows.map((row) => ({
    timestamp: formatBucket(row.timestamp, granularity),
    ...Object.fromEntries(row.views)
  }));
}
