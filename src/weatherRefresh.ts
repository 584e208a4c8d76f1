import { setTimeout as sleep } from "timers/promises";
import { systemClock, type Clock } from "./clock";
import { errorMessage } from "./errors";
import type { Logger } from "./logger";
import type { Location, LocationDirectory } from "./owners";
import { weatherSeries, type TelemetryStore } from "./telemetry";
import type { WeatherProvider } from "./weather";

export const DEFAULT_REFRESH_INTERVAL_MS = 10 * 60 * 1000;

export type RefreshState = "idle" | "fetching-locations" | "fetching-weather" | "writing" | "sleeping";

export type CycleResult = {
  stored: number;
  failed: number;
  /** True when the location list could not be loaded and nothing was attempted. */
  aborted: boolean;
};

export type WeatherRefreshDeps = {
  locations: LocationDirectory;
  provider: WeatherProvider;
  telemetry: TelemetryStore;
  logger: Logger;
  intervalMs?: number;
  clock?: Clock;
};

/**
 * Background task that samples the outdoor temperature for every known owner
 * location, then sleeps for the interval and starts over. Failures are
 * contained per location; a cycle never rejects.
 */
export class WeatherRefreshLoop {
  private readonly locations: LocationDirectory;
  private readonly provider: WeatherProvider;
  private readonly telemetry: TelemetryStore;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly clock: Clock;

  private currentState: RefreshState = "idle";
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;

  constructor(deps: WeatherRefreshDeps) {
    this.locations = deps.locations;
    this.provider = deps.provider;
    this.telemetry = deps.telemetry;
    this.logger = deps.logger;
    this.intervalMs = deps.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.clock = deps.clock ?? systemClock;
  }

  get state(): RefreshState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  start(): void {
    if (this.running) return;

    const controller = new AbortController();
    this.controller = controller;
    this.running = this.run(controller.signal).catch((err: unknown) => {
      this.logger.error(`Weather refresh loop terminated: ${errorMessage(err)}`);
    });
  }

  /** Wakes the loop if it is sleeping and resolves once it has exited. */
  async stop(): Promise<void> {
    const running = this.running;
    if (!running) return;

    this.controller?.abort();
    await running;
    this.running = null;
    this.controller = null;
  }

  async runCycle(): Promise<CycleResult> {
    this.currentState = "fetching-locations";

    let locations: Location[];
    try {
      locations = await this.locations.listLocations();
    } catch (err: unknown) {
      this.logger.error(`Weather refresh cycle aborted, could not load locations: ${errorMessage(err)}`);
      this.currentState = "idle";
      return { stored: 0, failed: 0, aborted: true };
    }

    let stored = 0;
    for (const location of locations) {
      if (await this.refreshLocation(location)) {
        stored += 1;
      }
    }

    const failed = locations.length - stored;
    this.logger.info(`Weather refresh stored ${stored} of ${locations.length} locations`);
    this.currentState = "idle";
    return { stored, failed, aborted: false };
  }

  private async refreshLocation(location: Location): Promise<boolean> {
    try {
      this.currentState = "fetching-weather";
      const weather = await this.provider.getCurrent(location);

      this.currentState = "writing";
      await this.telemetry.append(weatherSeries(location.ownerId), weather.temperature, this.clock());
      this.logger.debug(`Weather stored for owner ${location.ownerId}: ${weather.temperature}°C`);
      return true;
    } catch (err: unknown) {
      this.logger.warn(`Weather refresh skipped owner ${location.ownerId}: ${errorMessage(err)}`);
      return false;
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    this.logger.info(`Weather refresh loop started (every ${Math.round(this.intervalMs / 1000)}s)`);

    while (!signal.aborted) {
      await this.runCycle();
      if (signal.aborted) break;

      this.currentState = "sleeping";
      try {
        await sleep(this.intervalMs, undefined, { signal });
      } catch (err: unknown) {
        if (signal.aborted) break;
        throw err;
      }
    }

    this.currentState = "idle";
    this.logger.info("Weather refresh loop stopped");
  }
}
