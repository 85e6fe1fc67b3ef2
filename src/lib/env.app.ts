import * as v from 'valibot';
import { DEFAULT_CSV_SIZE_LIMIT_MB, DEFAULT_TXT_SIZE_LIMIT_MB } from './games-constants';

const limitMb = (fallback: number) =>
  v.optional(
    v.pipe(
      v.string(),
      v.trim(),
      v.transform(Number),
      v.number('must be a number'),
      v.minValue(0.001, 'must be positive')
    ),
    String(fallback)
  );

const TrackerEnvSchema = v.object({
  CSV_SIZE_LIMIT_MB: limitMb(DEFAULT_CSV_SIZE_LIMIT_MB),
  TXT_SIZE_LIMIT_MB: limitMb(DEFAULT_TXT_SIZE_LIMIT_MB),
});

export type TrackerEnv = v.InferOutput<typeof TrackerEnvSchema>;

/** Reads upload limits from an env-like record, falling back to the defaults. */
export function loadTrackerEnv(source: Record<string, string | undefined> = process.env): TrackerEnv {
  return v.parse(TrackerEnvSchema, {
    CSV_SIZE_LIMIT_MB: source.CSV_SIZE_LIMIT_MB || undefined,
    TXT_SIZE_LIMIT_MB: source.TXT_SIZE_LIMIT_MB || undefined,
  });
}

export const trackerEnv: TrackerEnv = loadTrackerEnv();
