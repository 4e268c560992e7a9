import { formatISO } from "date-fns";
import { v4 as uuid } from "uuid";
import { systemClock, type Clock } from "./clock.js";
import { MeterError } from "./errors.js";
import type { TimeEntry } from "./types.js";

export interface EntryPersistence {
  saveEntry(entry: TimeEntry): void | Promise<void>;
}

const MS_PER_HOUR = 3_600_000;
export const HOURS_PRECISION = 4;

export function toHours(elapsedMs: number): number {
  const factor = 10 ** HOURS_PRECISION;
  return Math.round((elapsedMs / MS_PER_HOUR) * factor) / factor;
}

export class EntryRecorder {
  constructor(
    private readonly persistence: EntryPersistence,
    private readonly clock: Clock = systemClock
  ) {}

  async record(project: string, description: string, elapsedMs: number): Promise<TimeEntry> {
    const durationHours = Number.isFinite(elapsedMs) ? toHours(elapsedMs) : 0;
    if (durationHours <= 0) {
      throw new MeterError("InvalidDuration", "A time entry needs a duration greater than zero.");
    }

    const entry: TimeEntry = {
      id: uuid(),
      project,
      description,
      durationHours,
      billed: false,
      createdAt: formatISO(this.clock.now())
    };

    await this.persistence.saveEntry(entry);
    return entry;
  }
}
