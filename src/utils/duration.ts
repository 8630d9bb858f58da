import { formatDuration } from 'date-fns'

const SECONDS_PER_MINUTE = 60
const SECONDS_PER_HOUR = 60 * SECONDS_PER_MINUTE
const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR

/**
 * Formats a number of seconds as e.g. "1 day 2 hours 5 seconds".
 * Zero units are omitted; negative input (clock skew) is treated as zero.
 */
export function formatElapsed(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds))
  if (seconds === 0) return '0 seconds'

  return formatDuration(
    {
      days: Math.floor(seconds / SECONDS_PER_DAY),
      hours: Math.floor((seconds % SECONDS_PER_DAY) / SECONDS_PER_HOUR),
      minutes: Math.floor((seconds % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE),
      seconds: seconds % SECONDS_PER_MINUTE,
    },
    { format: ['days', 'hours', 'minutes', 'seconds'] },
  )
}
