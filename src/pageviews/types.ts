import type { UpstreamRequestError } from "./errors.js";

export const ACCESS_METHODS = ["all-access", "desktop", "mobile-app", "mobile-web"] as const;
export const AGENT_TYPES = ["all-agents", "user", "spider", "automated"] as const;
export const ARTICLE_GRANULARITIES = ["daily", "monthly"] as const;
export const PROJECT_GRANULARITIES = ["hourly", "daily", "monthly"] as const;

export type AccessMethod = (typeof ACCESS_METHODS)[number];

export type AgentType = (typeof AGENT_TYPES)[number];

export type Granularity = (typeof PROJECT_GRANULARITIES)[number];

export type DateInput = Date | string;

export interface ViewPoint {
  timestamp: Date;
  views: number;
}

export type EntityViews =
  | { status: "ok"; views: number; series: ViewPoint[] }
  | { status: "not_found" }
  | { status: "failed"; error: UpstreamRequestError };

/** Keyed by the caller's own strings, in first-occurrence order. */
export type ViewsResult = Map<string, EntityViews>;

export interface TopArticle {
  article: string;
  rank: number;
  views: number;
}

export interface DateRange {
  start: Date;
  end: Date;
  granularity: Granularity;
}

export type QueryProgressPhase = "articles" | "projects" | "top";

export type QueryProgressStage = "start" | "progress" | "complete" | "warning";

export interface QueryProgressEvent {
  phase: QueryProgressPhase;
  stage: QueryProgressStage;
  message: string;
  current?: number;
  total?: number;
  entity?: string;
}

export type QueryProgressHandler = (event: QueryProgressEvent) => void;

export interface RangeQueryOptions {
  access?: AccessMethod;
  agent?: AgentType;
  start?: DateInput;
  end?: DateInput;
  timeoutMs?: number;
  onProgress?: QueryProgressHandler;
}

export interface ArticleViewsOptions extends RangeQueryOptions {
  granularity?: (typeof ARTICLE_GRANULARITIES)[number];
}

export interface ProjectViewsOptions extends RangeQueryOptions {
  granularity?: Granularity;
}

export interface TopArticlesOptions {
  access?: AccessMethod;
  year?: number;
  month?: number;
  day?: number | "all-days";
  limit?: number;
  onProgress?: QueryProgressHandler;
}
