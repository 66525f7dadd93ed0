import { z } from "zod";
import { logger } from "./logger.js";

// GitHub Actions exports unset inputs as empty strings.
function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema);
}

const PROVIDERS = ["openai", "anthropic", "gemini"] as const;
const REVIEW_STYLES = ["inline", "summary", "both"] as const;

const API_KEY_VARS = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  gemini: "GEMINI_API_KEY",
} as const satisfies Record<ProviderName, string>;

const envSchema = z
  .object({
    GITHUB_TOKEN: z.string().min(1),
    GITHUB_EVENT_PATH: z.string().default(""),
    LLM_PROVIDER: optional(z.enum(PROVIDERS).default("openai")),
    OPENAI_API_KEY: optional(z.string().optional()),
    ANTHROPIC_API_KEY: optional(z.string().optional()),
    GEMINI_API_KEY: optional(z.string().optional()),
    OPENAI_API_MODEL: optional(z.string().default("gpt-4")),
    LLM_MODEL: optional(z.string().optional()),
    INPUT_EXCLUDE: z
      .string()
      .default("")
      .transform((value) =>
        value
          .split(",")
          .map((pattern) => pattern.trim())
          .filter(Boolean)
      ),
    INPUT_MAX_FILES: optional(z.coerce.number().int().positive().default(50)),
    INPUT_MAX_CHUNK_CHARS: optional(
      z.coerce.number().int().positive().default(30_000)
    ),
    INPUT_REVIEW_STYLE: optional(z.enum(REVIEW_STYLES).default("both")),
    INPUT_CUSTOM_INSTRUCTIONS: optional(z.string().optional()),
    DRY_RUN: optional(
      z
        .enum(["true", "false"])
        .default("false")
        .transform((value) => value === "true")
    ),
    LOG_LEVEL: optional(
      z.enum(["debug", "info", "warn", "error"]).default("info")
    ),
  })
  .superRefine((env, ctx) => {
    const keyVar = API_KEY_VARS[env.LLM_PROVIDER];
    if (!env[keyVar]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [keyVar],
        message: `Required when LLM_PROVIDER is ${env.LLM_PROVIDER}`,
      });
    }
  });

export type ProviderName = (typeof PROVIDERS)[number];
export type ReviewStyle = (typeof REVIEW_STYLES)[number];
export type Config = z.infer<typeof envSchema>;

const DEFAULT_MODELS: Record<Exclude<ProviderName, "openai">, string> = {
  anthropic: "claude-3-5-sonnet-latest",
  gemini: "gemini-1.5-pro",
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment variables:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }
  return result.data;
}

let _config: Config | null = null;

export function loadConfig(): Config {
  if (_config) return _config;
  try {
    const config = parseConfig(process.env);
    _config = config;
    return config;
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    logger.error("Invalid environment variables", { issues: err.issues });
    process.exit(1);
  }
}

export function resolveModel(config: Config): string {
  if (config.LLM_MODEL) return config.LLM_MODEL;
  if (config.LLM_PROVIDER === "openai") return config.OPENAI_API_MODEL;
  return DEFAULT_MODELS[config.LLM_PROVIDER];
}

export function resolveApiKey(config: Config): string {
  const key = config[API_KEY_VARS[config.LLM_PROVIDER]];
  if (!key) {
    throw new Error(`No API key configured for ${config.LLM_PROVIDER}`);
  }
  return key;
}
