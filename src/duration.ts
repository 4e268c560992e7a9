import { MeterError } from "./errors.js";

const SECONDS_PER_HOUR = 3600;
const UNIT_PATTERN = /(\d+(?:\.\d+)?)\s*(hours?|hrs?|h|minutes?|mins?|m|seconds?|secs?|s)\b/g;

/**
 * Parses a human duration into hours. Accepts bare hours ("1.5"),
 * clock notation ("1:30") and unit lists ("1h 30m", "90 minutes").
 */
export function parseDurationHours(input: string): number {
  const normalized = input.trim().toLowerCase();
  if (!normalized) {
    throw new MeterError("InvalidDuration", "Duration must not be empty.");
  }

  const clockMatch = normalized.match(/^(\d{1,3}):([0-5]\d)$/);
  if (clockMatch) {
    const total = Number(clockMatch[1]) * SECONDS_PER_HOUR + Number(clockMatch[2]) * 60;
    return toPositiveHours(total, input);
  }

  let totalFromUnits = 0;
  let matchedUnits = false;
  for (const match of normalized.matchAll(UNIT_PATTERN)) {
    matchedUnits = true;
    totalFromUnits += Number(match[1]) * unitSeconds(match[2]);
  }

  if (matchedUnits) {
    const leftover = normalized
      .replace(UNIT_PATTERN, " ")
      .replace(/\band\b/g, " ")
      .replace(/[,]/g, " ")
      .trim();
    if (leftover.length > 0) {
      throw new MeterError("InvalidDuration", `Could not parse duration "${input}".`);
    }
    return toPositiveHours(totalFromUnits, input);
  }

  const bareHours = Number(normalized);
  if (Number.isFinite(bareHours)) {
    return toPositiveHours(bareHours * SECONDS_PER_HOUR, input);
  }

  throw new MeterError("InvalidDuration", `Could not parse duration "${input}".`);
}

function unitSeconds(unit: string): number {
  if (unit.startsWith("h")) {
    return SECONDS_PER_HOUR;
  }
  if (unit.startsWith("m")) {
    return 60;
  }
  return 1;
}

function toPositiveHours(totalSeconds: number, input: string): number {
  if (totalSeconds <= 0) {
    throw new MeterError("InvalidDuration", `Duration "${input}" must be greater than zero.`);
  }
  return totalSeconds / SECONDS_PER_HOUR;
}
