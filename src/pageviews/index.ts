export { PageviewsClient, type PageviewsClientOptions } from "./client.js";
export { InvalidArgumentError, PageviewsError, UpstreamRequestError, type UpstreamFailureKind } from "./errors.js";
export { formatApiTimestamp, parseApiTimestamp } from "./dates.js";
export { countOutcomes, failuresOf, pivotByTimestamp, rankTopArticles, totalsOf, type PivotRow } from "./series.js";
export type { FetchLike } from "./api.js";
export {
  ACCESS_METHODS,
  AGENT_TYPES,
  ARTICLE_GRANULARITIES,
  PROJECT_GRANULARITIES
} from "./types.js";
export type {
  AccessMethod,
  AgentType,
  ArticleViewsOptions,
  DateInput,
  DateRange,
  EntityViews,
  Granularity,
  ProjectViewsOptions,
  QueryProgressEvent,
  QueryProgressHandler,
  TopArticle,
  TopArticlesOptions,
  ViewPoint,
  ViewsResult
} from "./types.js";
