/**
 * Formats a whole number of seconds as m:ss.
 * Minutes are unpadded and grow past 59 (125 → "2:05", 3725 → "62:05").
 */
export function formatDuration(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}
