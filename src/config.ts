import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  DB_PATH: z.string().min(1).default("data/heat-control.db"),
  WEATHER_API_URL: z.string().url().default("https://api.open-meteo.com/v1/forecast"),
  WEATHER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  WEATHER_REFRESH_INTERVAL_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type AppConfig = {
  port: number;
  dbPath: string;
  weatherApiUrl: string;
  weatherTimeoutMs: number;
  weatherRefreshIntervalMs: number;
  logLevel: LogLevel;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    dbPath: values.DB_PATH,
    weatherApiUrl: values.WEATHER_API_URL,
    weatherTimeoutMs: values.WEATHER_TIMEOUT_MS,
    weatherRefreshIntervalMs: values.WEATHER_REFRESH_INTERVAL_MS,
    logLevel: values.LOG_LEVEL,
  };
}
