export function renderHelp(): string {
  return [
    "Query the Wikimedia pageview API",
    "",
    "Usage:",
    "  pageviews articles <project> <article>... [range flags] [--table] [--json]",
    "  pageviews projects <project>... [range flags] [--table] [--json]",
    "  pageviews top <project> [--access <a>] [--year <y>] [--month <m>] [--day <d|all-days>] [--limit <n>] [--json]",
    "",
    "Range flags:",
    "  --access       all-access (default), desktop, mobile-app, mobile-web",
    "  --agent        all-agents (default), user, spider, automated",
    "  --granularity  daily (default), monthly; projects also accept hourly",
    "  --start        YYYYMMDD or YYYYMMDDHH (default: 30 days before end)",
    "  --end          YYYYMMDD or YYYYMMDDHH (default: today, UTC)",
    "  --parallelism  Requests in flight at once (default 5)",
    "  --timeout      Deadline for the whole query in milliseconds",
    "",
    "Environment:",
    "  PAGEVIEWS_API_BASE, PAGEVIEWS_USER_AGENT, PAGEVIEWS_PARALLELISM, PAGEVIEWS_TIMEOUT_MS",
    ""
  ].join("\n");
}
