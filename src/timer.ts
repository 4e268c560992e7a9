import { differenceInMilliseconds, formatISO } from "date-fns";
import { systemClock, type Clock } from "./clock.js";
import { MeterError } from "./errors.js";
import type { FinishedSession, TimerSnapshot, TimerState } from "./types.js";

interface TimeSession {
  project: string;
  description: string;
  startedAt: Date;
  accumulatedPauseMs: number;
  pauseStartedAt?: Date;
}

/**
 * Tracks a single work session. Paused time is kept out of the elapsed
 * duration; nothing is persisted here, callers hand the result of `stop()`
 * to an EntryRecorder.
 */
export class Timer {
  private session: TimeSession | null = null;
  private _state: TimerState = "idle";

  constructor(private readonly clock: Clock = systemClock) {}

  get state(): TimerState {
    return this._state;
  }

  get project(): string | undefined {
    return this.session?.project;
  }

  get description(): string | undefined {
    return this.session?.description;
  }

  start(project: string, description: string): TimerSnapshot {
    if (this._state !== "idle") {
      throw new MeterError("AlreadyRunning", `A timer is already running for "${this.session?.project ?? "unknown"}".`);
    }

    this.session = {
      project,
      description,
      startedAt: this.clock.now(),
      accumulatedPauseMs: 0
    };
    this._state = "running";
    return this.snapshot();
  }

  /** Returns false when the timer was already paused. */
  pause(): boolean {
    const session = this.requireSession();
    if (this._state !== "running") {
      return false;
    }
    session.pauseStartedAt = this.clock.now();
    this._state = "paused";
    return true;
  }

  /** Returns false when the timer was already running. */
  resume(): boolean {
    const session = this.requireSession();
    if (this._state !== "paused" || !session.pauseStartedAt) {
      return false;
    }
    session.accumulatedPauseMs += differenceInMilliseconds(this.clock.now(), session.pauseStartedAt);
    session.pauseStartedAt = undefined;
    this._state = "running";
    return true;
  }

  stop(): FinishedSession {
    const session = this.requireSession();
    const endedAt = this.clock.now();
    const elapsedMs = this.elapsedAt(session, endedAt);

    this.session = null;
    this._state = "idle";

    if (elapsedMs < 0) {
      throw new MeterError(
        "NegativeDuration",
        `The clock moved backwards while "${session.project}" was running; the session was discarded.`
      );
    }

    return {
      project: session.project,
      description: session.description,
      startedAt: session.startedAt,
      endedAt,
      elapsedMs
    };
  }

  elapsedSoFar(): number {
    if (!this.session) {
      return 0;
    }
    return this.elapsedAt(this.session, this.clock.now());
  }

  snapshot(): TimerSnapshot {
    if (!this.session) {
      return { state: "idle", elapsedMs: 0 };
    }
    return {
      state: this._state,
      project: this.session.project,
      description: this.session.description,
      startedAt: formatISO(this.session.startedAt),
      elapsedMs: this.elapsedSoFar()
    };
  }

  // A paused session is measured up to the moment it was paused.
  private elapsedAt(session: TimeSession, now: Date): number {
    const end = session.pauseStartedAt ?? now;
    return differenceInMilliseconds(end, session.startedAt) - session.accumulatedPauseMs;
  }

  private requireSession(): TimeSession {
    if (!this.session) {
      throw new MeterError("NotRunning", "No timer is running.");
    }
    return this.session;
  }
}
