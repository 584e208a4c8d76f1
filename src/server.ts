import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import cors from "cors";
import { z } from "zod";
import { systemClock, type Clock } from "./clock";
import {
  HeatControlError,
  InvalidArgumentError,
  NoDataError,
  NotFoundError,
  errorMessage,
  type ErrorCode,
} from "./errors";
import { DECISION_LOOKBACK_MS, type HeatingDecisionEngine } from "./heatingDecision";
import { ingestBatch } from "./ingestion";
import type { Logger } from "./logger";
import { DEFAULT_LOCATION, type OwnerRepository } from "./owners";
import { removeRoom, type RoomRepository } from "./rooms";
import { scheduleSchema } from "./schedule";
import { parseInstant, roomSeries, weatherSeries, type Sample, type TelemetryStore, type TimeRange } from "./telemetry";
import { describeWeatherCode, type WeatherProvider } from "./weather";

export type AppDeps = {
  owners: OwnerRepository;
  rooms: RoomRepository;
  telemetry: TelemetryStore;
  decisions: HeatingDecisionEngine;
  weather: WeatherProvider;
  logger: Logger;
  clock?: Clock;
};

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  NO_DATA: 404,
  INVALID_ARGUMENT: 400,
  CONFLICT: 409,
  STORE_UNAVAILABLE: 503,
  EXTERNAL_PROVIDER_ERROR: 502,
};

const latitudeSchema = z.number().min(-90).max(90);
const longitudeSchema = z.number().min(-180).max(180);

const ownerBodySchema = z.object({
  latitude: latitudeSchema.default(DEFAULT_LOCATION.latitude),
  longitude: longitudeSchema.default(DEFAULT_LOCATION.longitude),
});

const locationBodySchema = z.object({
  latitude: latitudeSchema,
  longitude: longitudeSchema,
});

const roomBodySchema = z.object({
  name: z.string().trim().min(1, "name is required"),
});

const temperatureBodySchema = z.object({
  temperature: z.number().finite(),
});

const batchBodySchema = z.object({
  temperatures: z.array(z.number().finite()),
  timestamps: z.array(z.string().nullable()).nullish(),
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new InvalidArgumentError(problems.join("; "));
  }
  return parsed.data;
}

function parseId(value: string | undefined, name: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new InvalidArgumentError(`Invalid ${name}`);
  }
  return id;
}

function queryString(value: unknown): string | undefined {
  if (typeof value === "string" && value.length > 0) return value;
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return undefined;
}

function rangeFromQuery(req: Request): TimeRange {
  return { start: queryString(req.query.start), end: queryString(req.query.end) };
}

function sampleResponse(sample: Sample) {
  return {
    time: sample.timestamp.toISOString(),
    value: sample.value,
    roomId: sample.key.family === "room-temperature" ? sample.key.roomId : null,
  };
}

// Express 4 does not forward rejected promises; route them to the error handler
function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createApp(deps: AppDeps): express.Express {
  const { owners, rooms, telemetry, decisions, weather, logger } = deps;
  const clock = deps.clock ?? systemClock;

  const app = express();
  app.use(cors());
  app.use(express.json());

  const requireRoom = async (req: Request): Promise<{ ownerId: number; roomId: number }> => {
    const ownerId = parseId(req.params.ownerId, "ownerId");
    const roomId = parseId(req.params.roomId, "roomId");
    if (!(await rooms.roomBelongsTo(ownerId, roomId))) {
      throw new NotFoundError(`Room ${roomId} not found`);
    }
    return { ownerId, roomId };
  };

  // ---- Owners ----

  app.post(
    "/api/owners",
    route(async (req, res) => {
      const location = parseBody(ownerBodySchema, req.body);
      const owner = await owners.createOwner(location);
      res.status(201).json({ owner });
    }),
  );

  app.get(
    "/api/owners/:ownerId",
    route(async (req, res) => {
      const ownerId = parseId(req.params.ownerId, "ownerId");
      const owner = await owners.getOwner(ownerId);
      if (!owner) throw new NotFoundError(`Owner ${ownerId} not found`);
      res.json({ owner });
    }),
  );

  app.put(
    "/api/owners/:ownerId/location",
    route(async (req, res) => {
      const ownerId = parseId(req.params.ownerId, "ownerId");
      const { latitude, longitude } = parseBody(locationBodySchema, req.body);
      if (!(await owners.updateLocation(ownerId, latitude, longitude))) {
        throw new NotFoundError(`Owner ${ownerId} not found`);
      }
      res.json({ owner: { ownerId, latitude, longitude } });
    }),
  );

  // ---- Rooms and schedules ----

  app.post(
    "/api/owners/:ownerId/rooms",
    route(async (req, res) => {
      const ownerId = parseId(req.params.ownerId, "ownerId");
      const { name } = parseBody(roomBodySchema, req.body);
      const room = await rooms.createRoom(ownerId, name);
      res.status(201).json({ room });
    }),
  );

  app.get(
    "/api/owners/:ownerId/rooms",
    route(async (req, res) => {
      const ownerId = parseId(req.params.ownerId, "ownerId");
      res.json({ rooms: await rooms.listRooms(ownerId) });
    }),
  );

  app.delete(
    "/api/owners/:ownerId/rooms/:roomId",
    route(async (req, res) => {
      const ownerId = parseId(req.params.ownerId, "ownerId");
      const roomId = parseId(req.params.roomId, "roomId");
      await removeRoom(rooms, telemetry, ownerId, roomId, logger);
      res.status(204).send();
    }),
  );

  app.get(
    "/api/owners/:ownerId/rooms/:roomId/settings",
    route(async (req, res) => {
      const ownerId = parseId(req.params.ownerId, "ownerId");
      const roomId = parseId(req.params.roomId, "roomId");
      const schedule = await rooms.getSchedule(ownerId, roomId);
      if (!schedule) throw new NotFoundError(`Room ${roomId} not found`);
      res.json({ schedule });
    }),
  );

  app.put(
    "/api/owners/:ownerId/rooms/:roomId/settings",
    route(async (req, res) => {
      const ownerId = parseId(req.params.ownerId, "ownerId");
      const roomId = parseId(req.params.roomId, "roomId");
      const schedule = parseBody(scheduleSchema, req.body);
      if (!(await rooms.updateSchedule(ownerId, roomId, schedule))) {
        throw new NotFoundError(`Room ${roomId} not found`);
      }
      res.json({ schedule });
    }),
  );

  // ---- Room temperatures ----

  app.post(
    "/api/owners/:ownerId/rooms/:roomId/temperature",
    route(async (req, res) => {
      const { ownerId, roomId } = await requireRoom(req);
      const { temperature } = parseBody(temperatureBodySchema, req.body);
      await telemetry.append(roomSeries(ownerId, roomId), temperature, clock());
      res.json({ ok: true });
    }),
  );

  // Alternate GET endpoint for sensors that can only perform GET requests.
  // Example: /api/owners/1/rooms/2/temperature?temperature=21.3
  app.get(
    "/api/owners/:ownerId/rooms/:roomId/temperature",
    route(async (req, res) => {
      const { ownerId, roomId } = await requireRoom(req);
      const raw = queryString(req.query.temperature);
      const temperature = raw === undefined ? NaN : Number(raw);
      if (!Number.isFinite(temperature)) {
        throw new InvalidArgumentError("Invalid temperature");
      }
      await telemetry.append(roomSeries(ownerId, roomId), temperature, clock());
      res.json({ ok: true });
    }),
  );

  app.post(
    "/api/owners/:ownerId/rooms/:roomId/temperature/batch",
    route(async (req, res) => {
      const { ownerId, roomId } = await requireRoom(req);
      const { temperatures, timestamps } = parseBody(batchBodySchema, req.body);
      const count = await ingestBatch(telemetry, roomSeries(ownerId, roomId), temperatures, timestamps, { clock });
      res.json({ count });
    }),
  );

  app.get(
    "/api/owners/:ownerId/rooms/:roomId/temperature/history",
    route(async (req, res) => {
      const { ownerId, roomId } = await requireRoom(req);
      const samples = await telemetry.range(roomSeries(ownerId, roomId), rangeFromQuery(req));
      res.json({ history: samples.map(sampleResponse) });
    }),
  );

  app.get(
    "/api/owners/:ownerId/rooms/:roomId/temperature/latest",
    route(async (req, res) => {
      const { ownerId, roomId } = await requireRoom(req);
      const latest = await telemetry.latest(roomSeries(ownerId, roomId), DECISION_LOOKBACK_MS);
      if (!latest) throw new NoDataError(`No temperature reading for room ${roomId} in the last 7 days`);
      res.json({ latest: sampleResponse(latest) });
    }),
  );

  // Readings of all the owner's rooms, each tagged with its roomId
  app.get(
    "/api/owners/:ownerId/temperatures",
    route(async (req, res) => {
      const ownerId = parseId(req.params.ownerId, "ownerId");
      const samples = await telemetry.ownerRoomRange(ownerId, rangeFromQuery(req));
      res.json({ history: samples.map(sampleResponse) });
    }),
  );

  // ---- Heating ----

  app.get(
    "/api/owners/:ownerId/rooms/:roomId/target",
    route(async (req, res) => {
      const ownerId = parseId(req.params.ownerId, "ownerId");
      const roomId = parseId(req.params.roomId, "roomId");
      const atParam = queryString(req.query.at);
      const at = atParam === undefined ? clock() : parseInstant(atParam);
      if (!at) throw new InvalidArgumentError("at must be an ISO-8601 instant");

      const target = await decisions.getTarget(roomId, ownerId, at);
      res.json({ targetTemperature: target.temperature, period: target.period, at: at.toISOString() });
    }),
  );

  // Target and latest measured temperature in one payload
  app.get(
    "/api/owners/:ownerId/rooms/:roomId/heating",
    route(async (req, res) => {
      const ownerId = parseId(req.params.ownerId, "ownerId");
      const roomId = parseId(req.params.roomId, "roomId");
      const decision = await decisions.decide(roomId, ownerId);
      res.json({
        roomId: decision.roomId,
        heatingOn: decision.heatingOn,
        targetTemperature: decision.targetTemperature,
        period: decision.period,
        currentTemperature: decision.latestSample.value,
        currentTemperatureTimestamp: decision.latestSample.timestamp.toISOString(),
      });
    }),
  );

  // ---- Weather ----

  app.get(
    "/api/owners/:ownerId/weather/history",
    route(async (req, res) => {
      const ownerId = parseId(req.params.ownerId, "ownerId");
      const samples = await telemetry.range(weatherSeries(ownerId), rangeFromQuery(req));
      res.json({ history: samples.map(sampleResponse) });
    }),
  );

  app.get(
    "/api/owners/:ownerId/weather/current",
    route(async (req, res) => {
      const ownerId = parseId(req.params.ownerId, "ownerId");
      const owner = await owners.getOwner(ownerId);
      if (!owner) throw new NotFoundError(`Owner ${ownerId} not found`);

      const current = await weather.getCurrent(owner);
      res.json({
        temperature: current.temperature,
        weatherCondition: describeWeatherCode(current.weatherCode),
        location: `${owner.latitude},${owner.longitude}`,
        timestamp: current.time ?? clock().toISOString(),
      });
    }),
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HeatControlError) {
      const status = STATUS_BY_CODE[err.code];
      if (status >= 500) {
        logger.error(`${err.name}: ${err.message}`);
      }
      res.status(status).json({ error: err.message });
      return;
    }

    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }

    logger.error(`Unhandled error: ${errorMessage(err)}`);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
