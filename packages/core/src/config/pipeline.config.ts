import { z } from "zod";

export const PIPELINE_CONFIG = Symbol("PIPELINE_CONFIG");

const LOG_LEVELS = ["error", "warn", "log", "debug", "verbose"] as const;

export type LogLevelSetting = (typeof LOG_LEVELS)[number];

const configSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("log"),
    HISTORY_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(5000),
    TREND_WINDOW_DAYS: z.coerce.number().int().min(7).max(365).default(30),
    DATA_ENCRYPTION_KEY: z
      .string()
      .regex(/^[0-9a-fA-F]{64}$/, "Expected 32 bytes as 64 hex characters")
      .optional(),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === "production" && !env.DATA_ENCRYPTION_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATA_ENCRYPTION_KEY"],
        message: "Required in production",
      });
    }
  });

export type PipelineEnv = z.infer<typeof configSchema>;

export interface PipelineConfig {
  env: PipelineEnv["NODE_ENV"];
  logLevel: LogLevelSetting;
  historyTimeoutMs: number;
  trendWindowDays: number;
  /** Absent outside production: the privacy module then generates a per-process key */
  encryptionKey: Buffer | null;
}

export function loadPipelineConfig(
  source: Record<string, string | undefined> = process.env,
): PipelineConfig {
  const parsed = configSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid pipeline configuration: ${details}`);
  }
  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    historyTimeoutMs: env.HISTORY_TIMEOUT_MS,
    trendWindowDays: env.TREND_WINDOW_DAYS,
    encryptionKey: env.DATA_ENCRYPTION_KEY
      ? Buffer.from(env.DATA_ENCRYPTION_KEY, "hex")
      : null,
  };
}

/** Nest logger levels enabled at and above the configured one. */
export function enabledLogLevels(level: LogLevelSetting): LogLevelSetting[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}
