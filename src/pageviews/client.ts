import {
  buildArticleUrl,
  buildProjectUrl,
  buildTopUrl,
  fetchSeries,
  fetchTopArticles,
  type FetchLike,
  type UpstreamRequest
} from "./api.js";
import { UpstreamRequestError } from "./errors.js";
import {
  resolveArticleQuery,
  resolveClientOptions,
  resolveProjectQuery,
  resolveTopQuery,
  validateEntities,
  validateProject,
  type ResolvedClientOptions,
  type ResolvedRangeQuery
} from "./options.js";
import { fanOut } from "./pool.js";
import { rankTopArticles, totalViews } from "./series.js";
import type {
  ArticleViewsOptions,
  EntityViews,
  ProjectViewsOptions,
  QueryProgressHandler,
  QueryProgressPhase,
  TopArticle,
  TopArticlesOptions,
  ViewsResult
} from "./types.js";

export interface PageviewsClientOptions {
  /** Upper bound on requests in flight during one call. */
  parallelism?: number;
  apiBase?: string;
  userAgent?: string;
  requestTimeoutMs?: number;
  /** Deadline for a whole multi-entity call; overridable per call with `timeoutMs`. */
  callTimeoutMs?: number;
  fetch?: FetchLike;
}

interface SeriesQuery {
  phase: Exclude<QueryProgressPhase, "top">;
  noun: string;
  keys: string[];
  query: ResolvedRangeQuery;
  urlFor: (key: string) => string;
  onProgress?: QueryProgressHandler;
}

export class PageviewsClient {
  private readonly config: ResolvedClientOptions;
  private readonly fetchImpl: FetchLike;
  private requests = 0;

  constructor(options: PageviewsClientOptions = {}) {
    const { fetch: fetchImpl, ...settings } = options;
    this.config = resolveClientOptions(settings);
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get parallelism(): number {
    return this.config.parallelism;
  }

  /** Upstream requests started by this client since construction. */
  get requestCount(): number {
    return this.requests;
  }

  async articleViews(
    project: string,
    articles: readonly string[],
    options: ArticleViewsOptions = {}
  ): Promise<ViewsResult> {
    const validProject = validateProject(project);
    const keys = validateEntities(articles, "articles");
    const query = resolveArticleQuery(options);

    return this.collectSeries({
      phase: "articles",
      noun: "article",
      keys,
      query,
      onProgress: options.onProgress,
      urlFor: (article) =>
        buildArticleUrl(this.config.apiBase, validProject, query.access, query.agent, article, query.range)
    });
  }

  async projectViews(projects: readonly string[], options: ProjectViewsOptions = {}): Promise<ViewsResult> {
    const keys = validateEntities(projects, "projects");
    const query = resolveProjectQuery(options);

    return this.collectSeries({
      phase: "projects",
      noun: "project",
      keys,
      query,
      onProgress: options.onProgress,
      urlFor: (project) => buildProjectUrl(this.config.apiBase, project, query.access, query.agent, query.range)
    });
  }

  /**
   * Fetches the ranking for one day, or for a month with `day: "all-days"`.
   * An unknown project or a day without data yields an empty list; any other
   * upstream failure rejects.
   */
  async topArticles(project: string, options: TopArticlesOptions = {}): Promise<TopArticle[]> {
    const validProject = validateProject(project);
    const query = resolveTopQuery(options);
    const url = buildTopUrl(this.config.apiBase, validProject, query.access, query.year, query.month, query.day);
    const label = `${validProject} ${query.year}-${query.month}-${query.day}`;

    options.onProgress?.({
      phase: "top",
      stage: "start",
      message: `Fetching top articles for ${label}`,
      entity: validProject
    });

    const articles = await fetchTopArticles(this.requestFor(url));
    const ranked = rankTopArticles(articles).slice(0, query.limit);

    options.onProgress?.({
      phase: "top",
      stage: "complete",
      message: `Ranked ${ranked.length} article(s) for ${label}`,
      entity: validProject
    });

    return ranked;
  }

  private async collectSeries(input: SeriesQuery): Promise<ViewsResult> {
    const total = input.keys.length;
    const timeoutMs = input.query.timeoutMs ?? this.config.callTimeoutMs;

    input.onProgress?.({
      phase: input.phase,
      stage: "start",
      message: `Querying ${total} ${input.noun}(s) with up to ${this.config.parallelism} in flight`,
      current: 0,
      total
    });

    const result = await fanOut<EntityViews>({
      keys: input.keys,
      concurrency: this.config.parallelism,
      timeoutMs,
      run: async (key, signal) => {
        const series = await fetchSeries(this.requestFor(input.urlFor(key), signal));
        if (series === null) {
          return { status: "not_found" };
        }
        return { status: "ok", views: totalViews(series), series };
      },
      onError: (key, error) => ({ status: "failed", error: toUpstreamError(error, input.urlFor(key)) }),
      onTimeout: (key) => ({
        status: "failed",
        error: new UpstreamRequestError("timeout", `No response within the ${timeoutMs}ms call deadline`, input.urlFor(key))
      }),
      onSettled: (key, outcome, completed) => {
        input.onProgress?.({
          phase: input.phase,
          stage: outcome.status === "failed" ? "warning" : "progress",
          message: describeOutcome(key, outcome),
          entity: key,
          current: completed,
          total
        });
      }
    });

    input.onProgress?.({
      phase: input.phase,
      stage: "complete",
      message: `Collected ${total} ${input.noun}(s)`,
      current: total,
      total
    });

    return result;
  }

  private requestFor(url: string, signal?: AbortSignal): UpstreamRequest {
    this.requests += 1;
    return {
      url,
      fetch: this.fetchImpl,
      userAgent: this.config.userAgent,
      timeoutMs: this.config.requestTimeoutMs,
      signal
    };
  }
}

function describeOutcome(key: string, outcome: EntityViews): string {
  if (outcome.status === "ok") {
    return `Fetched ${key} (${outcome.views} views)`;
  }
  if (outcome.status === "not_found") {
    return `No data for ${key}`;
  }
  return `Failed to fetch ${key}: ${outcome.error.message}`;
}

function toUpstreamError(error: unknown, url: string): UpstreamRequestError {
  if (error instanceof UpstreamRequestError) {
    return error;
  }
  return new UpstreamRequestError("network", error instanceof Error ? error.message : String(error), url);
}
