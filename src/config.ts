import * as dotenv from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";
import { z } from "zod";

// Load env from the working directory first, then fall back to its parent (.env) if present.
const localEnvPath = path.join(process.cwd(), ".env");
if (existsSync(localEnvPath)) dotenv.config({ path: localEnvPath });
const parentEnvPath = path.resolve(process.cwd(), "..", ".env");
if (existsSync(parentEnvPath)) dotenv.config({ path: parentEnvPath, override: false });

const BoolFromString = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

const LogLevel = z.enum(["debug", "info", "warn", "error"]);
const LlmProvider = z.enum(["openai", "none"]);
const ChatMode = z.enum(["slack", "none"]);

const Ratio = z.coerce.number().min(0).max(1);

const envSchemaBase = z.object({
  LOG_LEVEL: LogLevel.default("info"),
  CONTENT_AGENT_ENABLED: BoolFromString.default("true"),
  BRAND_NAME: z.string().default("the brand"),

  // Data files
  STORE_PATH: z.string().default("data/store.json"),
  SOURCES_PATH: z.string().default("data/sources.json"),
  KEYWORDS_PATH: z.string().default("data/keywords.json"),
  TOPICS_PATH: z.string().default("data/topics.json"),
  BRAND_CONTEXT_PATH: z.string().default("data/brand_context.md"),

  // Market data for generation briefs (optional)
  MARKET_API_URL: z.preprocess((v) => (v === "" ? undefined : v), z.string().url().optional()),
  MARKET_PAIRS: z
    .string()
    .default("USDTNGN,USDTARS,USDTCOP")
    .transform((v) =>
      v
        .split(",")
        .map((p) => p.trim().toUpperCase())
        .filter(Boolean)
    ),

  // LLM
  LLM_PROVIDER: LlmProvider.default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().default("gpt-4o-mini"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_RETRIES: z.coerce.number().int().min(0).max(3).default(1),

  // X API (app-only bearer token, read access)
  TWITTER_BEARER_TOKEN: z.string().optional(),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  HTTP_RETRIES: z.coerce.number().int().min(0).max(5).default(1),

  // Ingestion
  TWEET_POLL_MINUTES: z.coerce.number().positive().default(5),
  RSS_POLL_MINUTES: z.coerce.number().positive().default(15),
  RELEVANCE_THRESHOLD: Ratio.default(0.7),
  PRIORITY1_THRESHOLD: Ratio.default(0.5),
  HIGH_URGENCY_SCORE: Ratio.default(0.9),

  // Intent routing
  INTENT_EXECUTE_THRESHOLD: Ratio.default(0.7),
  INTENT_CONFIRM_THRESHOLD: Ratio.default(0.5),
  DESTRUCTIVE_EXECUTE_THRESHOLD: Ratio.default(0.8),
  CONFIRMATION_TTL_MINUTES: z.coerce.number().positive().default(10),

  // Draft sessions
  SESSION_RETENTION_HOURS: z.coerce.number().positive().default(24),
  SESSION_SWEEP_MINUTES: z.coerce.number().positive().default(15),
  MAX_DRAFT_VERSIONS: z.coerce.number().int().min(1).default(10),

  // Chat
  CHAT_MODE: ChatMode.default("none"),
  SLACK_BOT_TOKEN: z.string().optional(),
  SLACK_APP_TOKEN: z.string().optional(),
  SLACK_CHANNEL_ID: z.string().optional()
});

function blank(v: string | undefined): boolean {
  return !v || !v.trim();
}

const envSchema = envSchemaBase.superRefine((cfg, ctx) => {
  if (cfg.CHAT_MODE === "slack") {
    for (const key of ["SLACK_BOT_TOKEN", "SLACK_APP_TOKEN", "SLACK_CHANNEL_ID"] as const) {
      if (blank(cfg[key])) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when CHAT_MODE=slack`
        });
      }
    }
  }
  if (cfg.LLM_PROVIDER === "openai" && blank(cfg.OPENAI_API_KEY)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["OPENAI_API_KEY"],
      message: "OPENAI_API_KEY is required when LLM_PROVIDER=openai"
    });
  }
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Cross-field threshold checks that zod's per-field rules cannot express.
 * Returns a list of human-readable problems (empty when consistent).
 */
export function validateThresholds(cfg: AppConfig): string[] {
  const errors: string[] = [];

  if (cfg.PRIORITY1_THRESHOLD > cfg.RELEVANCE_THRESHOLD) {
    errors.push("PRIORITY1_THRESHOLD must be <= RELEVANCE_THRESHOLD");
  }
  if (cfg.INTENT_CONFIRM_THRESHOLD > cfg.INTENT_EXECUTE_THRESHOLD) {
    errors.push("INTENT_CONFIRM_THRESHOLD must be <= INTENT_EXECUTE_THRESHOLD");
  }
  if (cfg.DESTRUCTIVE_EXECUTE_THRESHOLD < cfg.INTENT_EXECUTE_THRESHOLD) {
    errors.push("DESTRUCTIVE_EXECUTE_THRESHOLD must be >= INTENT_EXECUTE_THRESHOLD");
  }

  return errors;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`);
    throw new Error(`Config validation errors:\n${issues.map((e) => `  - ${e}`).join("\n")}`);
  }

  const cfg = parsed.data;
  const thresholdErrors = validateThresholds(cfg);
  if (thresholdErrors.length > 0) {
    throw new Error(`Config validation errors:\n${thresholdErrors.map((e) => `  - ${e}`).join("\n")}`);
  }

  return cfg;
}

export function minutesToMs(minutes: number): number {
  return Math.round(minutes * 60_000);
}
