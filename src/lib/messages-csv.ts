import Papa from 'papaparse';
import { REQUIRED_MESSAGE_COLUMNS } from './games-constants';
import { trackerEnv, type TrackerEnv } from './env.app';
import type { MessageRow } from './message-table';

const BYTES_PER_MB = 1024 * 1024;

export class InputTooLargeError extends Error {
  constructor(
    readonly sizeBytes: number,
    readonly limitMb: number,
    kind: string
  ) {
    super(`${kind} exceeds the ${limitMb} MB limit`);
    this.name = 'InputTooLargeError';
  }
}

export class MessagesCsvError extends Error {
  constructor(
    message: string,
    readonly missingColumns: string[] = [],
    readonly foundColumns: string[] = []
  ) {
    super(message);
    this.name = 'MessagesCsvError';
  }
}

export interface MessagesCsv {
  rows: MessageRow[];
  columns: string[];
}

function assertWithinLimit(sizeBytes: number, limitMb: number, kind: string): void {
  if (sizeBytes > limitMb * BYTES_PER_MB) {
    throw new InputTooLargeError(sizeBytes, limitMb, kind);
  }
}

/** Column names from REQUIRED_MESSAGE_COLUMNS that the header lacks (case-insensitive). */
export function missingMessageColumns(columns: readonly string[]): string[] {
  const present = new Set(columns.map((c) => c.toUpperCase()));
  return REQUIRED_MESSAGE_COLUMNS.filter((required) => !present.has(required));
}

/**
 * Parses a messages export. Throws when the file is over the size limit or the
 * header lacks FROM, CONTENT or DATE; malformed rows are kept and logged.
 */
export function readMessagesCsv(
  csvText: string,
  limits: Pick<TrackerEnv, 'CSV_SIZE_LIMIT_MB'> = trackerEnv
): MessagesCsv {
  assertWithinLimit(new TextEncoder().encode(csvText).length, limits.CSV_SIZE_LIMIT_MB, 'CSV file');

  const parsed = Papa.parse<Record<string, string>>(csvText, {
    header: true,
    skipEmptyLines: true,
  });

  const columns = parsed.meta.fields ?? [];
  if (columns.length === 0) {
    throw new MessagesCsvError('Could not read CSV: no header row found');
  }

  const missing = missingMessageColumns(columns);
  if (missing.length > 0) {
    throw new MessagesCsvError(
      `Missing columns: ${missing.join(', ')}. Columns found: ${columns.join(', ')}`,
      missing,
      columns
    );
  }

  // Papa Parse reports recoverable errors (field count mismatch, stray quotes);
  // the affected rows are still usable.
  if (parsed.errors.length > 0) {
    console.warn(`⚠️ CSV parsed with ${parsed.errors.length} recoverable error(s):`, parsed.errors[0].message);
  }

  return { rows: parsed.data, columns };
}

/** Decodes an uploaded conversation file; invalid UTF-8 becomes U+FFFD. */
export function decodeTranscript(
  bytes: Uint8Array,
  limits: Pick<TrackerEnv, 'TXT_SIZE_LIMIT_MB'> = trackerEnv
): string {
  assertWithinLimit(bytes.length, limits.TXT_SIZE_LIMIT_MB, 'Text file');
  return new TextDecoder('utf-8').decode(bytes);
}
