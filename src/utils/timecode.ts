/**
 * Timecode Utility Functions
 * Convert between seconds and HH:MM:SS.mmm format
 */

/**
 * Convert seconds to HH:MM:SS.mmm timecode format
 *
 * @example
 * formatTimecode(0) // "00:00:00.000"
 * formatTimecode(65.5) // "00:01:05.500"
 * formatTimecode(3661) // "01:01:01.000"
 */
export function formatTimecode(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const hours = Math.floor(totalMs / 3600000);
  const minutes = Math.floor((totalMs % 3600000) / 60000);
  const secs = Math.floor((totalMs % 60000) / 1000);
  const ms = totalMs % 1000;

  return (
    `${hours.toString().padStart(2, '0')}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${secs.toString().padStart(2, '0')}.` +
    ms.toString().padStart(3, '0')
  );
}

/**
 * Format a clip range for log output, e.g. "00:00:02.000 → 00:00:04.500"
 */
export function formatRange(startTime: number, endTime: number): string {
  return `${formatTimecode(startTime)} → ${formatTimecode(endTime)}`;
}
