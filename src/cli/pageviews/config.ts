import { z } from "zod";

import { describeIssues, MAX_TIMEOUT_MS } from "../../pageviews/options.js";

const envSchema = z.object({
  PAGEVIEWS_API_BASE: z.string().url().optional(),
  PAGEVIEWS_USER_AGENT: z.string().min(1).optional(),
  PAGEVIEWS_PARALLELISM: z.coerce.number().int().positive().optional(),
  PAGEVIEWS_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).optional()
});

export interface EnvConfig {
  apiBase?: string;
  userAgent?: string;
  parallelism?: number;
  callTimeoutMs?: number;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([name, value]) => name.startsWith("PAGEVIEWS_") && value !== "")
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    throw new Error(`Invalid environment: ${describeIssues(parsed.error).join("; ")}`);
  }

  return {
    apiBase: parsed.data.PAGEVIEWS_API_BASE,
    userAgent: parsed.data.PAGEVIEWS_USER_AGENT,
    parallelism: parsed.data.PAGEVIEWS_PARALLELISM,
    callTimeoutMs: parsed.data.PAGEVIEWS_TIMEOUT_MS
  };
}
