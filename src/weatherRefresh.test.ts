import { afterEach, describe, expect, it, vi } from "vitest";
import { ExternalProviderError, StoreUnavailableError } from "./errors";
import type { Logger } from "./logger";
import type { Location, LocationDirectory } from "./owners";
import { weatherSeries, type TelemetryStore } from "./telemetry";
import type { Coordinates, WeatherProvider } from "./weather";
import { WeatherRefreshLoop } from "./weatherRefresh";

const NOW = new Date("2026-01-15T12:00:00.000Z");

const LOCATIONS: Location[] = [
  { ownerId: 1, latitude: 52.52, longitude: 13.4 },
  { ownerId: 2, latitude: 48.14, longitude: 11.58 },
  { ownerId: 3, latitude: 53.55, longitude: 9.99 },
];

function fakeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function fakeTelemetry() {
  const append = vi.fn().mockResolvedValue(undefined);
  const telemetry: TelemetryStore = {
    append,
    appendBatch: vi.fn(),
    latest: vi.fn(),
    range: vi.fn(),
    ownerRoomRange: vi.fn(),
    deleteSeries: vi.fn(),
  };
  return { telemetry, append };
}

function directory(listLocations: LocationDirectory["listLocations"]): LocationDirectory {
  return { listLocations };
}

const TEMPERATURE_BY_LATITUDE = new Map([
  [52.52, 4.5],
  [53.55, 3.25],
]);

// Owner 2's location always fails
const flakyProvider: WeatherProvider = {
  getCurrent: vi.fn(async ({ latitude }: Coordinates) => {
    const temperature = TEMPERATURE_BY_LATITUDE.get(latitude);
    if (temperature === undefined) {
      throw new ExternalProviderError(`Weather request for ${latitude},11.58 failed: socket hang up`);
    }
    return { temperature, weatherCode: 2, time: null };
  }),
};

describe("WeatherRefreshLoop", () => {
  let loop: WeatherRefreshLoop | null = null;

  afterEach(async () => {
    await loop?.stop();
    loop = null;
  });

  describe("runCycle", () => {
    it("stores a sample for every location that succeeds", async () => {
      const { telemetry, append } = fakeTelemetry();
      const logger = fakeLogger();
      loop = new WeatherRefreshLoop({
        locations: directory(async () => LOCATIONS),
        provider: flakyProvider,
        telemetry,
        logger,
        clock: () => NOW,
      });

      const result = await loop.runCycle();

      expect(result).toEqual({ stored: 2, failed: 1, aborted: false });
      expect(append).toHaveBeenCalledTimes(2);
      expect(append).toHaveBeenNthCalledWith(1, weatherSeries(1), 4.5, NOW);
      expect(append).toHaveBeenNthCalledWith(2, weatherSeries(3), 3.25, NOW);
      expect(logger.warn).toHaveBeenCalledWith(
        "Weather refresh skipped owner 2: Weather request for 48.14,11.58 failed: socket hang up",
      );
      expect(loop.state).toBe("idle");
    });

    it("skips a location whose write fails and carries on", async () => {
      const { telemetry, append } = fakeTelemetry();
      append.mockRejectedValueOnce(new StoreUnavailableError("disk I/O error"));
      loop = new WeatherRefreshLoop({
        locations: directory(async () => [LOCATIONS[0], LOCATIONS[2]]),
        provider: flakyProvider,
        telemetry,
        logger: fakeLogger(),
        clock: () => NOW,
      });

      expect(await loop.runCycle()).toEqual({ stored: 1, failed: 1, aborted: false });
      expect(append).toHaveBeenLastCalledWith(weatherSeries(3), 3.25, NOW);
    });

    it("aborts the cycle when locations cannot be loaded", async () => {
      const { telemetry, append } = fakeTelemetry();
      const provider: WeatherProvider = { getCurrent: vi.fn() };
      const logger = fakeLogger();
      loop = new WeatherRefreshLoop({
        locations: directory(async () => {
          throw new Error("database is locked");
        }),
        provider,
        telemetry,
        logger,
      });

      expect(await loop.runCycle()).toEqual({ stored: 0, failed: 0, aborted: true });
      expect(provider.getCurrent).not.toHaveBeenCalled();
      expect(append).not.toHaveBeenCalled();
      expect(logger.error).toHaveBeenCalledWith(
        "Weather refresh cycle aborted, could not load locations: database is locked",
      );
    });
  });

  describe("start / stop", () => {
    it("runs a cycle immediately and then sleeps until stopped", async () => {
      const { telemetry, append } = fakeTelemetry();
      const listLocations = vi.fn(async () => [LOCATIONS[0]]);
      loop = new WeatherRefreshLoop({
        locations: directory(listLocations),
        provider: flakyProvider,
        telemetry,
        logger: fakeLogger(),
        intervalMs: 60_000,
      });

      loop.start();
      loop.start();
      await vi.waitFor(() => expect(loop?.state).toBe("sleeping"));

      expect(listLocations).toHaveBeenCalledTimes(1);
      expect(append).toHaveBeenCalledTimes(1);
      expect(loop.isRunning).toBe(true);

      await loop.stop();

      expect(loop.isRunning).toBe(false);
      expect(loop.state).toBe("idle");
    });

    it("keeps cycling after a cycle fails", async () => {
      const { telemetry, append } = fakeTelemetry();
      const listLocations = vi
        .fn<() => Promise<Location[]>>()
        .mockRejectedValueOnce(new Error("database is locked"))
        .mockResolvedValue([LOCATIONS[0]]);
      loop = new WeatherRefreshLoop({
        locations: directory(listLocations),
        provider: flakyProvider,
        telemetry,
        logger: fakeLogger(),
        intervalMs: 5,
      });

      loop.start();
      await vi.waitFor(() => expect(append).toHaveBeenCalledTimes(2));

      expect(listLocations.mock.calls.length).toBeGreaterThanOrEqual(3);
    });
  });
});
