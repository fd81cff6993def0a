/**
 * Converts a fixed interval into the closest node-cron expression.
 * Sub-minute intervals use the six-field (seconds) form.
 *
 * The result is rounded to whole seconds, minutes or hours, and step
 * fields restart at each minute, hour or day boundary, so only intervals
 * accepted by `isExactCronInterval` run at evenly spaced ticks. Anything
 * of a day or longer runs daily.
 */
export function intervalToCron(ms: number): string {
  const seconds = Math.max(1, Math.round(ms / 1000));
  if (seconds < 60) {
    return `*/${seconds} * * * * *`;
  }
  const minutes = Math.round(seconds / 60);
  if (minutes < 60) {
    return `*/${minutes} * * * *`;
  }
  const hours = Math.round(minutes / 60);
  if (hours < 24) {
    return `0 */${hours} * * *`;
  }
  return '0 0 * * *';
}

/**
 * True when `intervalToCron` maps `ms` to ticks exactly `ms` apart: a
 * divisor of a minute in seconds, of an hour in minutes, of a day in
 * hours, or exactly one day.
 */
export function isExactCronInterval(ms: number): boolean {
  if (ms <= 0 || ms % 1000 !== 0) return false;
  const seconds = ms / 1000;
  if (seconds < 60) return 60 % seconds === 0;
  if (seconds % 60 !== 0) return false;
  const minutes = seconds / 60;
  if (minutes < 60) return 60 % minutes === 0;
  if (minutes % 60 !== 0) return false;
  const hours = minutes / 60;
  if (hours < 24) return 24 % hours === 0;
  return hours === 24;
}
