import dotenv from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

// Load .env from monorepo root before parsing config
const __dirname = dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: resolve(__dirname, "../../../.env") });

const booleanFlag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback)
    .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  // W&B Weave
  WANDB_API_KEY: z.string().optional(),
  WEAVE_PROJECT: z.string().default("surfloop"),

  // Model API
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().optional(),
  CUA_MODEL: z.string().default("computer-use-preview"),
  DISPLAY_WIDTH: z.coerce.number().int().positive().default(440),
  DISPLAY_HEIGHT: z.coerce.number().int().positive().default(956),

  // Browser
  BROWSER_ENV: z.enum(["LOCAL", "BROWSERBASE"]).default("LOCAL"),
  BROWSER_HEADLESS: booleanFlag("true"),
  BROWSERBASE_API_KEY: z.string().optional(),
  BROWSERBASE_PROJECT_ID: z.string().optional(),

  // Loop
  MAX_CHAIN_ITERATIONS: z.coerce.number().int().positive().default(8),
  MAX_CONSECUTIVE_WAITS: z.coerce.number().int().positive().default(3),
  IMAGE_HALT_POLICY: z.enum(["off", "screenshot", "any"]).default("screenshot"),
  SAFETY_CHECK_POLICY: z.enum(["auto", "confirm"]).default("auto"),
  STRICT_COMPUTER_USE: booleanFlag("false"),

  // Redis Cloud (use rediss:// for TLS)
  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_PREFIX: z.string().default("surfloop"),
  REDIS_TTL_SECONDS: z.coerce.number().default(604800),

  // App
  SERVER_PORT: z.coerce.number().default(3001),
  WEB_BASE_URL: z.string().default("http://localhost:3000"),
  APP_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type Config = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    console.error("Invalid env:", parsed.error.flatten());
    return envSchema.parse({});
  }
  return parsed.data;
}

export const config = parseConfig(process.env);
