import type { SqliteDatabase } from "./db";
import { DEFAULT_SCHEDULE, type Schedule } from "./schedule";
import { roomSeries, type TelemetryStore } from "./telemetry";
import { ConflictError, NotFoundError, errorMessage } from "./errors";
import type { Logger } from "./logger";

export type Room = { id: number; ownerId: number; name: string };

/** What the decision engine needs from room storage. */
export type ScheduleStore = {
  getSchedule(ownerId: number, roomId: number): Promise<Schedule | null>;
  roomBelongsTo(ownerId: number, roomId: number): Promise<boolean>;
};

type ScheduleRow = {
  timezone: string;
  targetDay: number;
  targetNight: number;
  nightStart: string;
  nightEnd: string;
};

function hasSqliteCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

export class RoomRepository implements ScheduleStore {
  constructor(private readonly db: SqliteDatabase) {}

  async createRoom(ownerId: number, name: string): Promise<Room> {
    const insertRoom = this.db.prepare<[number, string]>("INSERT INTO rooms (owner_id, name) VALUES (?, ?)");
    const insertSettings = this.db.prepare<[number, number, string, number, number, string, string]>(
      `INSERT INTO room_settings (room_id, owner_id, timezone, target_day, target_night, night_start, night_end)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );

    const tx = this.db.transaction((): Room => {
      const result = insertRoom.run(ownerId, name);
      const roomId = Number(result.lastInsertRowid);
      const defaults = DEFAULT_SCHEDULE;
      insertSettings.run(
        roomId,
        ownerId,
        defaults.timezone,
        defaults.targetDay,
        defaults.targetNight,
        defaults.nightStart,
        defaults.nightEnd,
      );
      return { id: roomId, ownerId, name };
    });

    try {
      return tx();
    } catch (err: unknown) {
      if (hasSqliteCode(err, "SQLITE_CONSTRAINT_UNIQUE")) {
        throw new ConflictError(`Room "${name}" already exists`);
      }
      if (hasSqliteCode(err, "SQLITE_CONSTRAINT_FOREIGNKEY")) {
        throw new NotFoundError(`Owner ${ownerId} not found`);
      }
      throw err;
    }
  }

  async listRooms(ownerId: number): Promise<Room[]> {
    return this.db
      .prepare<[number], Room>("SELECT id, owner_id AS ownerId, name FROM rooms WHERE owner_id = ? ORDER BY id")
      .all(ownerId);
  }

  async roomBelongsTo(ownerId: number, roomId: number): Promise<boolean> {
    const row = this.db
      .prepare<[number, number], { id: number }>("SELECT id FROM rooms WHERE id = ? AND owner_id = ?")
      .get(roomId, ownerId);
    return row !== undefined;
  }

  async getSchedule(ownerId: number, roomId: number): Promise<Schedule | null> {
    const row = this.db
      .prepare<[number, number], ScheduleRow>(
        `
        SELECT
          s.timezone,
          s.target_day AS targetDay,
          s.target_night AS targetNight,
          s.night_start AS nightStart,
          s.night_end AS nightEnd
        FROM room_settings s
        JOIN rooms r ON r.id = s.room_id
        WHERE r.id = ? AND r.owner_id = ?;
      `,
      )
      .get(roomId, ownerId);

    return row ?? null;
  }

  async updateSchedule(ownerId: number, roomId: number, schedule: Schedule): Promise<boolean> {
    const result = this.db
      .prepare<[string, number, number, string, string, number, number]>(
        `
        UPDATE room_settings
        SET timezone = ?, target_day = ?, target_night = ?, night_start = ?, night_end = ?
        WHERE room_id = ? AND owner_id = ?
      `,
      )
      .run(
        schedule.timezone,
        schedule.targetDay,
        schedule.targetNight,
        schedule.nightStart,
        schedule.nightEnd,
        roomId,
        ownerId,
      );
    return result.changes > 0;
  }

  async deleteRoom(ownerId: number, roomId: number): Promise<boolean> {
    const result = this.db.prepare<[number, number]>("DELETE FROM rooms WHERE id = ? AND owner_id = ?").run(roomId, ownerId);
    return result.changes > 0;
  }
}

/**
 * Deletes a room together with its temperature series. Telemetry cleanup is
 * best effort: a store failure is logged and the room is removed anyway.
 */
export async function removeRoom(
  rooms: RoomRepository,
  telemetry: TelemetryStore,
  ownerId: number,
  roomId: number,
  logger: Logger,
): Promise<void> {
  if (!(await rooms.roomBelongsTo(ownerId, roomId))) {
    throw new NotFoundError(`Room ${roomId} not found`);
  }

  try {
    const removed = await telemetry.deleteSeries(roomSeries(ownerId, roomId));
    logger.debug(`Deleted ${removed} samples of room ${roomId}`);
  } catch (err: unknown) {
    logger.warn(`Could not delete samples of room ${roomId}: ${errorMessage(err)}`);
  }

  await rooms.deleteRoom(ownerId, roomId);
}
