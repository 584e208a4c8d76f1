import { systemClock, type Clock } from "./clock";
import { InvalidArgumentError } from "./errors";
import { parseInstant, type SampleInput, type SeriesKey, type TelemetryStore } from "./telemetry";

export const MAX_BATCH_SIZE = 100;

export type IngestOptions = {
  maxBatchSize?: number;
  clock?: Clock;
};

/**
 * Stores a batch of readings in order. `timestamps[i]` applies to
 * `values[i]`; a missing or unparseable timestamp is replaced by the clock
 * reading taken for that entry, so untimed entries in one batch may share a
 * timestamp. Returns the number of values written.
 */
export async function ingestBatch(
  store: TelemetryStore,
  key: SeriesKey,
  values: readonly number[],
  timestamps?: readonly (string | null | undefined)[] | null,
  options: IngestOptions = {},
): Promise<number> {
  const maxBatchSize = options.maxBatchSize ?? MAX_BATCH_SIZE;
  const clock = options.clock ?? systemClock;

  if (values.length > maxBatchSize) {
    throw new InvalidArgumentError(`Maximum ${maxBatchSize} temperatures per request, got ${values.length}`);
  }

  const samples: SampleInput[] = values.map((value, i) => {
    const supplied = timestamps?.[i];
    const parsed = typeof supplied === "string" ? parseInstant(supplied) : null;
    return { value, timestamp: parsed ?? clock() };
  });

  await store.appendBatch(key, samples);
  return samples.length;
}
