import dotenv from "dotenv";
import { loadConfig } from "./config";
import { openDatabase } from "./db";
import { errorMessage } from "./errors";
import { HeatingDecisionEngine } from "./heatingDecision";
import { createLogger } from "./logger";
import { OwnerRepository } from "./owners";
import { RoomRepository } from "./rooms";
import { createApp } from "./server";
import { SqliteTelemetryStore } from "./telemetry";
import { OpenMeteoWeatherProvider } from "./weather";
import { WeatherRefreshLoop } from "./weatherRefresh";

dotenv.config();

function main(): void {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, "http");

  const db = openDatabase(config.dbPath);
  const owners = new OwnerRepository(db);
  const rooms = new RoomRepository(db);
  const telemetry = new SqliteTelemetryStore(db);
  const weather = new OpenMeteoWeatherProvider({
    baseUrl: config.weatherApiUrl,
    timeoutMs: config.weatherTimeoutMs,
  });
  const decisions = new HeatingDecisionEngine({ schedules: rooms, telemetry });

  const refreshLoop = new WeatherRefreshLoop({
    locations: owners,
    provider: weather,
    telemetry,
    logger: createLogger(config.logLevel, "weather"),
    intervalMs: config.weatherRefreshIntervalMs,
  });
  refreshLoop.start();

  const app = createApp({ owners, rooms, telemetry, decisions, weather, logger });
  const server = app.listen(config.port, () => {
    logger.info(`Heat control service listening on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    server.close();
    refreshLoop
      .stop()
      .then(() => db.close())
      .catch((err: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exitCode = 1;
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main();
