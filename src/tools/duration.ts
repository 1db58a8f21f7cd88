import { InvalidDurationError } from "../errors.js";

const UNIT_SECONDS: Record<string, number> = {
  h: 3600,
  hr: 3600,
  hrs: 3600,
  hour: 3600,
  hours: 3600,
  m: 60,
  min: 60,
  mins: 60,
  minute: 60,
  minutes: 60,
  s: 1,
  sec: 1,
  secs: 1,
  second: 1,
  seconds: 1
};

const UNIT_PATTERN = /(\d+(?:\.\d+)?)\s*(hours?|hrs?|hr|h|minutes?|mins?|min|m|seconds?|secs?|sec|s)\b/g;

/**
 * Accepts bare seconds (`"90"`), clock notation (`"1:30"`, `"1:02:03"`) or
 * unit phrases (`"1h 30m"`, `"2 minutes and 5 seconds"`).
 */
export function parseDurationSeconds(input: string): number {
  const normalized = input.trim().toLowerCase();
  if (!normalized) {
    throw new InvalidDurationError("Duration must not be empty.");
  }

  const clockMatch = normalized.match(/^(?:(\d{1,2}):)?(\d{1,3}):([0-5]?\d)$/);
  if (clockMatch) {
    const hours = Number(clockMatch[1] ?? 0);
    const minutes = Number(clockMatch[2]);
    const seconds = Number(clockMatch[3]);
    return requirePositive(hours * 3600 + minutes * 60 + seconds);
  }

  let total = 0;
  let matchedUnits = false;
  for (const match of normalized.matchAll(UNIT_PATTERN)) {
    matchedUnits = true;
    const value = Number(match[1]);
    const multiplier = UNIT_SECONDS[match[2]];
    if (Number.isFinite(value) && multiplier !== undefined) {
      total += Math.round(value * multiplier);
    }
  }

  if (matchedUnits) {
    const leftover = normalized
      .replace(UNIT_PATTERN, " ")
      .replace(/\band\b/g, " ")
      .replace(/,/g, " ")
      .trim();
    if (/\d/.test(leftover)) {
      throw new InvalidDurationError(`Could not parse duration "${input}".`);
    }
    return requirePositive(total);
  }

  const bareSeconds = Number(normalized);
  if (Number.isFinite(bareSeconds)) {
    return requirePositive(bareSeconds);
  }

  throw new InvalidDurationError(`Could not parse duration "${input}".`);
}

function requirePositive(seconds: number): number {
  if (seconds <= 0) {
    throw new InvalidDurationError();
  }
  return seconds;
}
