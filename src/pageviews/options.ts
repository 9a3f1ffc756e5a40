import { z } from "zod";

import { daysBefore, parseApiTimestamp, startOfUtcDay } from "./dates.js";
import { InvalidArgumentError } from "./errors.js";
import {
  ACCESS_METHODS,
  AGENT_TYPES,
  ARTICLE_GRANULARITIES,
  PROJECT_GRANULARITIES,
  type DateRange
} from "./types.js";

export const DEFAULT_API_BASE = "https://wikimedia.org/api/rest_v1/metrics/pageviews";
export const DEFAULT_USER_AGENT = "wikimedia-pageviews/0.1 (Node.js pageview API client)";
export const DEFAULT_PARALLELISM = 5;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
export const DEFAULT_CALL_TIMEOUT_MS = 120_000;
export const DEFAULT_RANGE_DAYS = 30;
export const DEFAULT_TOP_LIMIT = 1000;
/** Longest delay a Node.js timer accepts. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const positiveInt = z.number().int().positive();
const timeoutSchema = positiveInt.max(MAX_TIMEOUT_MS);

export const clientOptionsSchema = z.object({
  parallelism: positiveInt.default(DEFAULT_PARALLELISM),
  apiBase: z
    .string()
    .url()
    .transform((value) => value.replace(/\/+$/, ""))
    .default(DEFAULT_API_BASE),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  requestTimeoutMs: timeoutSchema.default(DEFAULT_REQUEST_TIMEOUT_MS),
  callTimeoutMs: timeoutSchema.default(DEFAULT_CALL_TIMEOUT_MS)
});

export type ResolvedClientOptions = z.output<typeof clientOptionsSchema>;

const dateInputSchema = z.union([
  z.date(),
  z.string().transform((value, ctx) => {
    const parsed = parseApiTimestamp(value);
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected YYYYMMDD or YYYYMMDDHH, got '${value}'`
      });
      return z.NEVER;
    }
    return parsed;
  })
]);

const isNonBlank = (value: string): boolean => value.trim().length > 0;

const projectSchema = z.string().refine(isNonBlank, {
  message: "project must be a non-empty string"
});

const entityListSchema = z
  .array(z.string().refine(isNonBlank, { message: "entries must be non-empty strings" }))
  .min(1, { message: "at least one entry is required" });

const rangeFields = {
  access: z.enum(ACCESS_METHODS).default("all-access"),
  agent: z.enum(AGENT_TYPES).default("all-agents"),
  start: dateInputSchema.optional(),
  end: dateInputSchema.optional(),
  timeoutMs: timeoutSchema.optional()
};

const articleRangeSchema = z.object({
  ...rangeFields,
  granularity: z.enum(ARTICLE_GRANULARITIES).default("daily")
});

const projectRangeSchema = z.object({
  ...rangeFields,
  granularity: z.enum(PROJECT_GRANULARITIES).default("daily")
});

export interface ResolvedRangeQuery {
  access: (typeof ACCESS_METHODS)[number];
  agent: (typeof AGENT_TYPES)[number];
  range: DateRange;
  timeoutMs?: number;
}

export const topOptionsSchema = z.object({
  access: z.enum(ACCESS_METHODS).default("all-access"),
  year: z.number().int().min(2015).max(9999).optional(),
  month: z.number().int().min(1).max(12).optional(),
  day: z.union([z.number().int().min(1).max(31), z.literal("all-days")]).optional(),
  limit: positiveInt.default(DEFAULT_TOP_LIMIT)
});

export interface ResolvedTopQuery {
  access: (typeof ACCESS_METHODS)[number];
  year: string;
  month: string;
  day: string;
  limit: number;
}

export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(describeIssues(result.error));
  }
  return result.data;
}

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length ? issue.path.join(".") : "value";
    return `${where}: ${issue.message}`;
  });
}

export function resolveClientOptions(input: unknown): ResolvedClientOptions {
  return parseOrThrow(clientOptionsSchema, input ?? {});
}

export function validateProject(project: unknown): string {
  return parseOrThrow(z.object({ project: projectSchema }), { project }).project;
}

/**
 * Validates an entity list and collapses duplicates, keeping the first
 * occurrence's position.
 */
export function validateEntities(entities: unknown, field: string): string[] {
  const list = parseOrThrow(z.object({ [field]: entityListSchema }), { [field]: entities });
  return [...new Set(list[field])];
}

export function resolveArticleQuery(options: unknown, now: Date = new Date()): ResolvedRangeQuery {
  return resolveRange(parseOrThrow(articleRangeSchema, options ?? {}), now);
}

export function resolveProjectQuery(options: unknown, now: Date = new Date()): ResolvedRangeQuery {
  return resolveRange(parseOrThrow(projectRangeSchema, options ?? {}), now);
}

export function resolveTopQuery(options: unknown, now: Date = new Date()): ResolvedTopQuery {
  const parsed = parseOrThrow(topOptionsSchema, options ?? {});
  const year = parsed.year ?? now.getUTCFullYear();
  const month = parsed.month ?? now.getUTCMonth() + 1;
  const day = parsed.day ?? now.getUTCDate();

  if (day !== "all-days") {
    const probe = new Date(Date.UTC(year, month - 1, day));
    if (probe.getUTCMonth() !== month - 1) {
      throw new InvalidArgumentError([`day: ${year}-${month} has no day ${day}`]);
    }
  }

  return {
    access: parsed.access,
    year: String(year),
    month: String(month).padStart(2, "0"),
    day: day === "all-days" ? day : String(day).padStart(2, "0"),
    limit: parsed.limit
  };
}

function resolveRange(
  parsed: z.output<typeof articleRangeSchema> | z.output<typeof projectRangeSchema>,
  now: Date
): ResolvedRangeQuery {
  const end = parsed.end ?? startOfUtcDay(now);
  const start = parsed.start ?? daysBefore(end, DEFAULT_RANGE_DAYS);

  if (start.getTime() > end.getTime()) {
    throw new InvalidArgumentError(["start: must not be after end"]);
  }

  return {
    access: parsed.access,
    agent: parsed.agent,
    range: { start, end, granularity: parsed.granularity },
    timeoutMs: parsed.timeoutMs
  };
}
