import { DateTime } from "luxon";
import type { SqliteDatabase } from "./db";
import { systemClock, type Clock } from "./clock";
import { InvalidArgumentError, StoreUnavailableError, errorMessage } from "./errors";

export type SeriesFamily = "room-temperature" | "outdoor-weather";

export type SeriesKey =
  | { family: "room-temperature"; ownerId: number; roomId: number }
  | { family: "outdoor-weather"; ownerId: number };

export function roomSeries(ownerId: number, roomId: number): SeriesKey {
  return { family: "room-temperature", ownerId, roomId };
}

export function weatherSeries(ownerId: number): SeriesKey {
  return { family: "outdoor-weather", ownerId };
}

export function describeSeries(key: SeriesKey): string {
  return key.family === "room-temperature"
    ? `${key.family} owner=${key.ownerId} room=${key.roomId}`
    : `${key.family} owner=${key.ownerId}`;
}

export type SampleInput = { value: number; timestamp: Date };

export type Sample = SampleInput & { key: SeriesKey };

/**
 * One end of a query window: an instant, an ISO-8601 string, "now", or a
 * duration relative to now such as "-24h" or "-7d".
 */
export type TimeBound = Date | string;

export type TimeRange = { start?: TimeBound; end?: TimeBound };

export type ResolvedRange = { start: Date; end: Date };

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

const RELATIVE_DURATION = /^-(\d+)(ms|s|m|h|d|w)$/;

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: HOUR_MS,
  d: DAY_MS,
  w: 7 * DAY_MS,
};

/** ISO-8601 instant; strings without an offset are read as UTC. */
export function parseInstant(text: string): Date | null {
  const parsed = DateTime.fromISO(text.trim(), { zone: "utc" });
  if (!parsed.isValid) return null;
  const instant = parsed.toJSDate();
  return Number.isNaN(instant.getTime()) ? null : instant;
}

export function resolveTimeBound(bound: TimeBound, now: Date): Date {
  if (bound instanceof Date) {
    if (Number.isNaN(bound.getTime())) {
      throw new InvalidArgumentError("Invalid time bound: not a valid date");
    }
    return bound;
  }

  const text = bound.trim();
  if (text === "now") return now;

  const relative = RELATIVE_DURATION.exec(text);
  if (relative) {
    const instant = new Date(now.getTime() - Number(relative[1]) * UNIT_MS[relative[2]]);
    if (Number.isNaN(instant.getTime())) {
      throw new InvalidArgumentError(`Invalid time bound "${bound}": too far in the past`);
    }
    return instant;
  }

  const instant = parseInstant(text);
  if (!instant) {
    throw new InvalidArgumentError(`Invalid time bound "${bound}": expected ISO-8601, "now" or a duration like -24h`);
  }
  return instant;
}

export function resolveRange(range: TimeRange, now: Date): ResolvedRange {
  const end = range.end === undefined ? now : resolveTimeBound(range.end, now);
  const start = range.start === undefined ? new Date(end.getTime() - DAY_MS) : resolveTimeBound(range.start, now);

  if (start.getTime() > end.getTime()) {
    throw new InvalidArgumentError("Range start must not be after its end");
  }
  return { start, end };
}

export type TelemetryStore = {
  append(key: SeriesKey, value: number, timestamp: Date): Promise<void>;
  /** Writes every sample or none of them. */
  appendBatch(key: SeriesKey, samples: readonly SampleInput[]): Promise<void>;
  /** Most recent sample no older than `lookbackMs`, or null. */
  latest(key: SeriesKey, lookbackMs: number): Promise<Sample | null>;
  /** Samples with start <= timestamp < end, oldest first. */
  range(key: SeriesKey, range?: TimeRange): Promise<Sample[]>;
  /** Room temperature samples of every room an owner has, same window rules as `range`. */
  ownerRoomRange(ownerId: number, range?: TimeRange): Promise<Sample[]>;
  deleteSeries(key: SeriesKey): Promise<number>;
};

type SeriesParams = { series: SeriesFamily; ownerId: number; roomId: number | null };
type WindowParams = SeriesParams & { from: number; to: number };
type InsertParams = SeriesParams & { timestamp: number; value: number };
type OwnerWindowParams = { ownerId: number; from: number; to: number };
type SampleRow = { timestamp: number; value: number };
type RoomSampleRow = SampleRow & { roomId: number | null };

const SERIES_FILTER = "series = @series AND owner_id = @ownerId AND room_id IS @roomId";

function seriesParams(key: SeriesKey): SeriesParams {
  return {
    series: key.family,
    ownerId: key.ownerId,
    roomId: key.family === "room-temperature" ? key.roomId : null,
  };
}

function toMillis(timestamp: Date): number {
  const millis = timestamp.getTime();
  if (Number.isNaN(millis)) {
    throw new InvalidArgumentError("Sample timestamp is not a valid date");
  }
  return millis;
}

export class SqliteTelemetryStore implements TelemetryStore {
  private readonly insertStmt;
  private readonly latestStmt;
  private readonly rangeStmt;
  private readonly ownerRoomRangeStmt;
  private readonly deleteStmt;
  private readonly insertMany: (rows: InsertParams[]) => void;

  constructor(
    db: SqliteDatabase,
    private readonly clock: Clock = systemClock,
  ) {
    this.insertStmt = db.prepare<InsertParams>(
      "INSERT INTO samples (series, owner_id, room_id, timestamp, value) VALUES (@series, @ownerId, @roomId, @timestamp, @value)",
    );
    this.latestStmt = db.prepare<WindowParams, SampleRow>(
      `SELECT timestamp, value FROM samples
       WHERE ${SERIES_FILTER} AND timestamp >= @from AND timestamp <= @to
       ORDER BY timestamp DESC, id DESC
       LIMIT 1`,
    );
    this.rangeStmt = db.prepare<WindowParams, SampleRow>(
      `SELECT timestamp, value FROM samples
       WHERE ${SERIES_FILTER} AND timestamp >= @from AND timestamp < @to
       ORDER BY timestamp ASC, id ASC`,
    );
    this.ownerRoomRangeStmt = db.prepare<OwnerWindowParams, RoomSampleRow>(
      `SELECT room_id AS roomId, timestamp, value FROM samples
       WHERE series = 'room-temperature' AND owner_id = @ownerId AND timestamp >= @from AND timestamp < @to
       ORDER BY timestamp ASC, id ASC`,
    );
    this.deleteStmt = db.prepare<SeriesParams>(`DELETE FROM samples WHERE ${SERIES_FILTER}`);
    this.insertMany = db.transaction((rows: InsertParams[]) => {
      for (const row of rows) {
        this.insertStmt.run(row);
      }
    });
  }

  async append(key: SeriesKey, value: number, timestamp: Date): Promise<void> {
    const row = { ...seriesParams(key), timestamp: toMillis(timestamp), value };
    this.guard("append", describeSeries(key), () => this.insertStmt.run(row));
  }

  async appendBatch(key: SeriesKey, samples: readonly SampleInput[]): Promise<void> {
    if (samples.length === 0) return;
    const params = seriesParams(key);
    const rows = samples.map((sample) => ({ ...params, timestamp: toMillis(sample.timestamp), value: sample.value }));
    this.guard("batch append", describeSeries(key), () => this.insertMany(rows));
  }

  async latest(key: SeriesKey, lookbackMs: number): Promise<Sample | null> {
    const now = this.clock().getTime();
    const row = this.guard("latest query", describeSeries(key), () =>
      this.latestStmt.get({ ...seriesParams(key), from: now - lookbackMs, to: now }),
    );
    return row ? { key, value: row.value, timestamp: new Date(row.timestamp) } : null;
  }

  async range(key: SeriesKey, range: TimeRange = {}): Promise<Sample[]> {
    const { start, end } = resolveRange(range, this.clock());
    const rows = this.guard("range query", describeSeries(key), () =>
      this.rangeStmt.all({ ...seriesParams(key), from: start.getTime(), to: end.getTime() }),
    );
    return rows.map((row) => ({ key, value: row.value, timestamp: new Date(row.timestamp) }));
  }

  async ownerRoomRange(ownerId: number, range: TimeRange = {}): Promise<Sample[]> {
    const { start, end } = resolveRange(range, this.clock());
    const rows = this.guard("room range query", `room-temperature owner=${ownerId}`, () =>
      this.ownerRoomRangeStmt.all({ ownerId, from: start.getTime(), to: end.getTime() }),
    );
    return rows.flatMap((row) =>
      row.roomId === null
        ? []
        : [{ key: roomSeries(ownerId, row.roomId), value: row.value, timestamp: new Date(row.timestamp) }],
    );
  }

  async deleteSeries(key: SeriesKey): Promise<number> {
    const result = this.guard("delete", describeSeries(key), () => this.deleteStmt.run(seriesParams(key)));
    return result.changes;
  }

  private guard<T>(operation: string, target: string, work: () => T): T {
    try {
      return work();
    } catch (err) {
      throw new StoreUnavailableError(`Telemetry ${operation} failed for ${target}: ${errorMessage(err)}`, err);
    }
  }
}
