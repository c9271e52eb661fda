import { z } from "zod";
import { CrawlerError } from "../errors";

const DEFAULT_USER_AGENT = "availability-crawler/0.1 (+https://example.org/crawler)";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  DATABASE_URL: z
    .string()
    .min(1, "DATABASE_URL cannot be empty.")
    .refine((value) => value.includes("://"), "DATABASE_URL must be a connection URI.")
    .optional(),
  DATABASE_SSL: booleanFlag.default("false"),
  DB_POOL_MAX: positiveInt.default(10),

  CRAWLER_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  FETCH_TIMEOUT_MS: positiveInt.default(10_000),
  RATE_LIMIT_WINDOW_SEC: z.coerce.number().int().nonnegative().default(90),
  DEFAULT_EXPIRATION_SEC: z.coerce.number().int().nonnegative().default(120),
  MANIFEST_POLL_DEFAULT_SEC: z.coerce.number().int().nonnegative().default(180),
  CRAWL_MANIFEST_CONCURRENCY: positiveInt.default(2),
  CRAWL_LEAF_CONCURRENCY: positiveInt.default(4),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info")
}).superRefine((env, ctx) => {
  // Each in-flight fetch holds one connection under its URL lock and needs
  // another for its attempt row.
  const inFlight = env.CRAWL_MANIFEST_CONCURRENCY * env.CRAWL_LEAF_CONCURRENCY;
  if (env.DB_POOL_MAX <= inFlight) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["DB_POOL_MAX"],
      message: `must exceed CRAWL_MANIFEST_CONCURRENCY * CRAWL_LEAF_CONCURRENCY (${inFlight})`
    });
  }
});

export type Env = z.infer<typeof EnvSchema>;

export interface FetchEngineConfig {
  userAgent: string;
  timeoutMs: number;
  rateLimitWindowSec: number;
  defaultExpirationSec: number;
}

export interface CrawlConfig {
  manifestPollDefaultSec: number;
  manifestConcurrency: number;
  leafConcurrency: number;
}

export interface CrawlerConfig {
  databaseUrl: string | undefined;
  databaseSsl: boolean;
  dbPoolMax: number;
  fetch: FetchEngineConfig;
  crawl: CrawlConfig;
  logLevel: Env["LOG_LEVEL"];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CrawlerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
    );
    throw new CrawlerError("CONFIG_ERROR", `Invalid environment: ${issues.join("; ")}`, {
      details: { issues }
    });
  }

  const data = parsed.data;
  return {
    databaseUrl: data.DATABASE_URL,
    databaseSsl: data.DATABASE_SSL,
    dbPoolMax: data.DB_POOL_MAX,
    fetch: {
      userAgent: data.CRAWLER_USER_AGENT,
      timeoutMs: data.FETCH_TIMEOUT_MS,
      rateLimitWindowSec: data.RATE_LIMIT_WINDOW_SEC,
      defaultExpirationSec: data.DEFAULT_EXPIRATION_SEC
    },
    crawl: {
      manifestPollDefaultSec: data.MANIFEST_POLL_DEFAULT_SEC,
      manifestConcurrency: data.CRAWL_MANIFEST_CONCURRENCY,
      leafConcurrency: data.CRAWL_LEAF_CONCURRENCY
    },
    logLevel: data.LOG_LEVEL
  };
}

export function requireDatabaseUrl(config: CrawlerConfig): string {
  if (!config.databaseUrl) {
    throw new CrawlerError("CONFIG_ERROR", "DATABASE_URL is not set in the environment.");
  }
  return config.databaseUrl;
}
