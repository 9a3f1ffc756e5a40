import { Args, Command, Flags } from "@oclif/core";
import ora from "ora";

import { printJson } from "../cli-output.js";
import type { FetchLike } from "../pageviews/api.js";
import { PageviewsClient } from "../pageviews/client.js";
import {
  MAX_TIMEOUT_MS,
  resolveArticleQuery,
  resolveProjectQuery,
  type ResolvedRangeQuery
} from "../pageviews/options.js";
import { countOutcomes, pivotByTimestamp } from "../pageviews/series.js";
import {
  ACCESS_METHODS,
  AGENT_TYPES,
  ARTICLE_GRANULARITIES,
  PROJECT_GRANULARITIES,
  type QueryProgressEvent,
  type QueryProgressHandler,
  type ViewsResult
} from "../pageviews/types.js";
import { loadEnvConfig } from "./pageviews/config.js";
import {
  describeRange,
  formatProgress,
  renderPivot,
  renderTop,
  renderViews,
  toJsonPivot,
  toJsonViews
} from "./pageviews/format.js";
import { renderHelp } from "./pageviews/help.js";

const sharedFlags = {
  access: Flags.option({
    options: ACCESS_METHODS,
    default: "all-access" as const,
    description: "Access method"
  })(),
  json: Flags.boolean({
    default: false,
    description: "Output machine-readable JSON"
  })
};

const rangeFlags = {
  ...sharedFlags,
  agent: Flags.option({
    options: AGENT_TYPES,
    default: "all-agents" as const,
    description: "User agent type"
  })(),
  start: Flags.string({ description: "First day (YYYYMMDD or YYYYMMDDHH)" }),
  end: Flags.string({ description: "Last day (YYYYMMDD or YYYYMMDDHH)" }),
  parallelism: Flags.integer({ min: 1, description: "Requests in flight at once" }),
  timeout: Flags.integer({ min: 1, max: MAX_TIMEOUT_MS, description: "Deadline for the whole query (ms)" }),
  table: Flags.boolean({ default: false, description: "Print one row per timestamp" })
};

interface RangeReport {
  mode: "articles" | "projects";
  title: string;
  project?: string;
  query: ResolvedRangeQuery;
  result: ViewsResult;
  requestCount: number;
  table: boolean;
  json: boolean;
}

/** What the commands read from and write to; unset fields fall back to the process. */
export interface PageviewsCliContext {
  fetch?: FetchLike;
  env?: NodeJS.ProcessEnv;
  stdout?: (text: string) => void;
}

abstract class PageviewsCommand extends Command {
  protected cliContext: PageviewsCliContext = {};

  protected createClient(parallelism?: number, timeout?: number): PageviewsClient {
    const env = loadEnvConfig(this.cliContext.env);

    return new PageviewsClient({
      apiBase: env.apiBase,
      userAgent: env.userAgent,
      parallelism: parallelism ?? env.parallelism,
      callTimeoutMs: timeout ?? env.callTimeoutMs,
      fetch: this.cliContext.fetch
    });
  }

  protected print(line = ""): void {
    if (this.cliContext.stdout) {
      this.cliContext.stdout(`${line}\n`);
      return;
    }

    this.log(line);
  }

  protected printJson(value: unknown): void {
    printJson(value, this.cliContext.stdout);
  }

  protected async withProgress<T>(
    spinnerText: string,
    jsonMode: boolean,
    work: (onProgress: QueryProgressHandler) => Promise<T>
  ): Promise<T> {
    const hasTty = Boolean(process.stdout.isTTY) && !jsonMode;
    const spinner = hasTty ? ora({ text: spinnerText, isEnabled: true }).start() : null;

    const onProgress = (event: QueryProgressEvent): void => {
      if (jsonMode) {
        return;
      }

      const text = formatProgress(event);

      if (!spinner) {
        if (event.stage !== "progress" || event.current === event.total) {
          this.logToStderr(text);
        }
        return;
      }

      if (event.stage === "warning") {
        spinner.warn(text);
        spinner.start("Continuing");
        return;
      }

      spinner.text = text;
    };

    try {
      const value = await work(onProgress);
      spinner?.succeed("Done");
      return value;
    } catch (error) {
      spinner?.fail("Query failed");
      throw error;
    }
  }

  protected report(input: RangeReport): void {
    const { range } = input.query;
    const counts = countOutcomes(input.result);
    const rows = input.table ? pivotByTimestamp(input.result, range) : null;

    if (input.json) {
      this.printJson({
        mode: input.mode,
        ok: true,
        ...(input.project ? { project: input.project } : {}),
        range: {
          start: range.start.toISOString(),
          end: range.end.toISOString(),
          granularity: range.granularity
        },
        counts,
        requestCount: input.requestCount,
        results: toJsonViews(input.result),
        ...(rows ? { table: toJsonPivot(rows, range.granularity) } : {})
      });
      return;
    }

    this.print(`\n=== ${input.title} (${describeRange(range)}) ===`);
    for (const line of renderViews(input.result)) {
      this.print(line);
    }

    if (rows) {
      this.print("");
      for (const line of renderPivot(rows, [...input.result.keys()], range.granularity)) {
        this.print(line);
      }
    }

    this.print("");
    this.print(`Found: ${counts.ok}, not found: ${counts.notFound}, failed: ${counts.failed}`);
    this.print(`Wikimedia requests: ${input.requestCount}`);
  }
}

class ArticlesCommand extends PageviewsCommand {
  static override summary = "Total pageviews per article over a date range";

  static override strict = false;

  static override args = {
    project: Args.string({ required: true, description: "Project domain, e.g. en.wikipedia" })
  };

  static override flags = {
    ...rangeFlags,
    granularity: Flags.option({
      options: ARTICLE_GRANULARITIES,
      default: "daily" as const,
      description: "Bucket size"
    })()
  };

  async run(): Promise<void> {
    const { args, argv, flags } = await this.parse(ArticlesCommand);
    const articles = argv.filter((value): value is string => typeof value === "string").slice(1);
    const query = resolveArticleQuery({
      access: flags.access,
      agent: flags.agent,
      granularity: flags.granularity,
      start: flags.start,
      end: flags.end,
      timeoutMs: flags.timeout
    });
    const client = this.createClient(flags.parallelism, flags.timeout);

    const result = await this.withProgress(`Counting views for ${articles.length} article(s)`, flags.json, (onProgress) =>
      client.articleViews(args.project, articles, {
        access: query.access,
        agent: query.agent,
        granularity: flags.granularity,
        start: query.range.start,
        end: query.range.end,
        onProgress
      })
    );

    this.report({
      mode: "articles",
      title: `Article views: ${args.project}`,
      project: args.project,
      query,
      result,
      requestCount: client.requestCount,
      table: flags.table,
      json: flags.json
    });
  }
}

class ProjectsCommand extends PageviewsCommand {
  static override summary = "Total pageviews per project over a date range";

  static override strict = false;

  static override flags = {
    ...rangeFlags,
    granularity: Flags.option({
      options: PROJECT_GRANULARITIES,
      default: "daily" as const,
      description: "Bucket size"
    })()
  };

  async run(): Promise<void> {
    const { argv, flags } = await this.parse(ProjectsCommand);
    const projects = argv.filter((value): value is string => typeof value === "string");
    const query = resolveProjectQuery({
      access: flags.access,
      agent: flags.agent,
      granularity: flags.granularity,
      start: flags.start,
      end: flags.end,
      timeoutMs: flags.timeout
    });
    const client = this.createClient(flags.parallelism, flags.timeout);

    const result = await this.withProgress(`Counting views for ${projects.length} project(s)`, flags.json, (onProgress) =>
      client.projectViews(projects, {
        access: query.access,
        agent: query.agent,
        granularity: flags.granularity,
        start: query.range.start,
        end: query.range.end,
        onProgress
      })
    );

    this.report({
      mode: "projects",
      title: "Project views",
      query,
      result,
      requestCount: client.requestCount,
      table: flags.table,
      json: flags.json
    });
  }
}

class TopCommand extends PageviewsCommand {
  static override summary = "Most viewed articles of a project for one day or month";

  static override args = {
    project: Args.string({ required: true, description: "Project domain, e.g. en.wikipedia" })
  };

  static override flags = {
    ...sharedFlags,
    year: Flags.integer({ description: "Year (default: current, UTC)" }),
    month: Flags.integer({ description: "Month 1-12 (default: current, UTC)" }),
    day: Flags.string({ description: "Day of month, or all-days for a monthly ranking" }),
    limit: Flags.integer({ description: "Maximum number of articles (default 1000)" })
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(TopCommand);
    const client = this.createClient();
    const day = flags.day === undefined || flags.day === "all-days" ? flags.day : Number(flags.day);

    const articles = await this.withProgress(`Ranking ${args.project}`, flags.json, (onProgress) =>
      client.topArticles(args.project, {
        access: flags.access,
        year: flags.year,
        month: flags.month,
        day,
        limit: flags.limit,
        onProgress
      })
    );

    if (flags.json) {
      this.printJson({
        mode: "top",
        ok: true,
        project: args.project,
        articles
      });
      return;
    }

    this.print(`\n=== Top articles: ${args.project} ===`);
    for (const line of renderTop(articles)) {
      this.print(line);
    }
  }
}

export const PAGEVIEWS_COMMANDS = ["articles", "projects", "top"] as const;

export function isJsonModeArgv(argv: string[]): boolean {
  return argv.includes("--json");
}

function bindContext(context: PageviewsCliContext) {
  return {
    articles: class extends ArticlesCommand {
      protected override cliContext = context;
    },
    projects: class extends ProjectsCommand {
      protected override cliContext = context;
    },
    top: class extends TopCommand {
      protected override cliContext = context;
    }
  };
}

export async function runPageviewsCli(argv: string[], context: PageviewsCliContext = {}): Promise<void> {
  const [command, ...rest] = argv;

  if (command === undefined || command === "help" || command === "--help" || command === "-h") {
    process.stdout.write(renderHelp());
    return;
  }

  const commands = bindContext(context);

  if (command === "articles") {
    await commands.articles.run(rest, import.meta.url);
    return;
  }

  if (command === "projects") {
    await commands.projects.run(rest, import.meta.url);
    return;
  }

  if (command === "top") {
    await commands.top.run(rest, import.meta.url);
    return;
  }

  throw new Error(`Unknown command '${command}'. Supported commands: ${PAGEVIEWS_COMMANDS.join(", ")}`);
}
