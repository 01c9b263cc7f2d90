import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  TELEGRAM_BOT_TOKEN: z.string().default(""),
  TELEGRAM_API_BASE_URL: z.string().url().default("https://api.telegram.org"),
  WEBHOOK_URL: z.string().default(""),
  RAPIDAPI_KEY: z.string().default(""),
  RAPIDAPI_HOST: z.string().min(1).default("twitter241.p.rapidapi.com"),
  FEED_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(20),
  POLL_INTERVAL_MS: z.coerce.number().int().min(100).default(5000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(500).default(10000),
  DISPLAY_TIMEZONE: z.string().min(1).default("Asia/Kolkata"),
  DISPLAY_TIMEZONE_LABEL: z.string().default("IST"),
  MAX_SUBSCRIPTIONS_PER_ENDPOINT: z.coerce.number().int().min(1).default(25),
  CORS_ORIGIN: z.string().default("*"),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
