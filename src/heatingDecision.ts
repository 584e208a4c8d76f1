import { systemClock, type Clock } from "./clock";
import { NoDataError, NotFoundError } from "./errors";
import type { ScheduleStore } from "./rooms";
import { resolveEffectiveTarget, type EffectiveTarget, type Period, type Schedule } from "./schedule";
import { DAY_MS, roomSeries, type Sample, type TelemetryStore } from "./telemetry";

// Readings older than this never drive a decision
export const DECISION_LOOKBACK_MS = 7 * DAY_MS;

export type Decision = {
  roomId: number;
  targetTemperature: number;
  period: Period;
  latestSample: Sample;
  heatingOn: boolean;
};

export type HeatingDecisionDeps = {
  schedules: ScheduleStore;
  telemetry: TelemetryStore;
  clock?: Clock;
};

/**
 * Heating recommendation: should the room's heating run right now?
 * Compares the last room reading against the schedule's current target.
 *
 * `heatingOn` is true only while the reading is strictly below target; a
 * reading equal to the target switches heating off. There is no hysteresis.
 */
export class HeatingDecisionEngine {
  private readonly schedules: ScheduleStore;
  private readonly telemetry: TelemetryStore;
  private readonly clock: Clock;

  constructor(deps: HeatingDecisionDeps) {
    this.schedules = deps.schedules;
    this.telemetry = deps.telemetry;
    this.clock = deps.clock ?? systemClock;
  }

  async decide(roomId: number, ownerId: number): Promise<Decision> {
    const schedule = await this.requireSchedule(roomId, ownerId);
    const target = resolveEffectiveTarget(schedule, this.clock());

    const latest = await this.telemetry.latest(roomSeries(ownerId, roomId), DECISION_LOOKBACK_MS);
    if (!latest) {
      throw new NoDataError(`No temperature reading for room ${roomId} in the last 7 days`);
    }

    return {
      roomId,
      targetTemperature: target.temperature,
      period: target.period,
      latestSample: latest,
      heatingOn: latest.value < target.temperature,
    };
  }

  async getTarget(roomId: number, ownerId: number, at: Date = this.clock()): Promise<EffectiveTarget> {
    const schedule = await this.requireSchedule(roomId, ownerId);
    return resolveEffectiveTarget(schedule, at);
  }

  private async requireSchedule(roomId: number, ownerId: number): Promise<Schedule> {
    const schedule = await this.schedules.getSchedule(ownerId, roomId);
    if (!schedule) {
      throw new NotFoundError(`Room ${roomId} not found`);
    }
    return schedule;
  }
}
