import { addMinutes, addSeconds } from "date-fns";
import type { Clock } from "../../src/clock.js";

export const T0 = new Date("2026-03-15T12:00:00Z");

export class ManualClock implements Clock {
  private current: Date;

  constructor(start: Date = T0) {
    this.current = new Date(start.getTime());
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advanceMinutes(minutes: number): void {
    this.current = addMinutes(this.current, minutes);
  }

  advanceSeconds(seconds: number): void {
    this.current = addSeconds(this.current, seconds);
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }
}

export const MINUTE = 60_000;
