import type { SqliteDatabase } from "./db";

export type Location = { ownerId: number; latitude: number; longitude: number };

export const DEFAULT_LOCATION = { latitude: 52.52, longitude: 13.4 };

/** Read-only view of owner coordinates used by the weather refresh loop. */
export type LocationDirectory = {
  listLocations(): Promise<Location[]>;
};

const SELECT_LOCATION = "SELECT id AS ownerId, latitude, longitude FROM owners";

export class OwnerRepository implements LocationDirectory {
  constructor(private readonly db: SqliteDatabase) {}

  async createOwner(location: { latitude: number; longitude: number } = DEFAULT_LOCATION): Promise<Location> {
    const result = this.db
      .prepare<[number, number]>("INSERT INTO owners (latitude, longitude) VALUES (?, ?)")
      .run(location.latitude, location.longitude);
    return { ownerId: Number(result.lastInsertRowid), latitude: location.latitude, longitude: location.longitude };
  }

  async getOwner(ownerId: number): Promise<Location | null> {
    const row = this.db.prepare<[number], Location>(`${SELECT_LOCATION} WHERE id = ?`).get(ownerId);
    return row ?? null;
  }

  async updateLocation(ownerId: number, latitude: number, longitude: number): Promise<boolean> {
    const result = this.db
      .prepare<[number, number, number]>("UPDATE owners SET latitude = ?, longitude = ? WHERE id = ?")
      .run(latitude, longitude, ownerId);
    return result.changes > 0;
  }

  async listLocations(): Promise<Location[]> {
    return this.db.prepare<[], Location>(`${SELECT_LOCATION} ORDER BY id`).all();
  }
}
