import { addMinutes, differenceInMilliseconds, formatISO, isBefore } from "date-fns";
import { z } from "zod";
import { systemClock, type Clock } from "./clock.js";
import { MeterError } from "./errors.js";
import { silentSink, type NotificationSink } from "./notifications.js";
import type { Timer } from "./timer.js";
import type {
  FinishedSession,
  Notification,
  PendingTransition,
  PomodoroConfig,
  PomodoroPhase,
  PomodoroSnapshot,
  TimerSnapshot
} from "./types.js";

export const DEFAULT_POMODORO_CONFIG: PomodoroConfig = {
  enabled: false,
  workMinutes: 25,
  shortBreakMinutes: 5,
  longBreakMinutes: 15,
  cyclesBeforeLongBreak: 4
};

const minutesSchema = z.number().int().min(0).max(24 * 60);

export const pomodoroConfigSchema = z
  .object({
    enabled: z.boolean(),
    workMinutes: minutesSchema,
    shortBreakMinutes: minutesSchema,
    longBreakMinutes: minutesSchema,
    cyclesBeforeLongBreak: z.number().int().min(0).max(100)
  })
  .refine(
    config =>
      !config.enabled ||
      (config.workMinutes > 0 &&
        config.shortBreakMinutes > 0 &&
        config.longBreakMinutes > 0 &&
        config.cyclesBeforeLongBreak > 0),
    { message: "Durations and cycle count must be greater than zero when Pomodoro mode is enabled." }
  );

export const WORK_COMPLETE_MESSAGE = "Work period complete! Time for a break.";
export const BREAK_COMPLETE_MESSAGE = "Break complete! Ready to resume work?";

/**
 * Work/break cycle on top of a Timer. Phase expiry is polled: the caller's
 * event loop invokes `tick()` and gets back a notification when a phase
 * ran out. With Pomodoro mode off every call goes straight to the Timer.
 */
export class PomodoroController {
  private config: PomodoroConfig;
  private phase: PomodoroPhase = "idle";
  private awaiting: PendingTransition | undefined;
  private completedWorkCycles = 0;
  private phaseStartedAt: Date | undefined;
  private lastSession: { project: string; description: string } | undefined;

  constructor(
    private readonly timer: Timer,
    config: PomodoroConfig = DEFAULT_POMODORO_CONFIG,
    private readonly notifier: NotificationSink = silentSink,
    private readonly clock: Clock = systemClock
  ) {
    this.config = parseConfig(config);
  }

  get settings(): PomodoroConfig {
    return { ...this.config };
  }

  currentPhase(): PomodoroPhase {
    return this.phase;
  }

  timerSnapshot(): TimerSnapshot {
    return this.timer.snapshot();
  }

  start(project: string, description: string): TimerSnapshot {
    const snapshot = this.timer.start(project, description);
    this.lastSession = { project, description };
    if (this.config.enabled) {
      this.enter("working");
    }
    return snapshot;
  }

  /**
   * Stopping mid-work ends the cycle. Stopping during a break keeps the
   * cycle so the end-of-break acknowledgment starts a new session.
   */
  stop(): FinishedSession {
    try {
      return this.timer.stop();
    } finally {
      if (this.phase === "working") {
        this.resetPhase();
      }
    }
  }

  pause(): boolean {
    return this.timer.pause();
  }

  /** Ignored during breaks and while waiting for acknowledgment. */
  resume(): boolean {
    if (this.config.enabled && this.phase !== "idle" && this.phase !== "working") {
      return false;
    }
    return this.timer.resume();
  }

  tick(): Notification | null {
    if (!this.config.enabled || !this.phaseStartedAt) {
      return null;
    }

    const now = this.clock.now();
    switch (this.phase) {
      case "working": {
        if (isBefore(now, addMinutes(this.phaseStartedAt, this.config.workMinutes))) {
          return null;
        }
        if (this.timer.state === "running") {
          this.timer.pause();
        }
        this.enter("awaitingAck", "break");
        return this.signal("workComplete", WORK_COMPLETE_MESSAGE);
      }
      case "shortBreak":
      case "longBreak": {
        if (isBefore(now, addMinutes(this.phaseStartedAt, this.breakMinutes(this.phase)))) {
          return null;
        }
        this.enter("awaitingAck", "work");
        return this.signal("breakComplete", BREAK_COMPLETE_MESSAGE);
      }
      default:
        return null;
    }
  }

  /** Returns false when nothing was waiting, e.g. on a repeated key press. */
  acknowledge(): boolean {
    if (this.phase !== "awaitingAck") {
      return false;
    }

    if (this.awaiting === "break") {
      if (this.completedWorkCycles + 1 >= this.config.cyclesBeforeLongBreak) {
        this.completedWorkCycles = 0;
        this.enter("longBreak");
      } else {
        this.completedWorkCycles += 1;
        this.enter("shortBreak");
      }
      return true;
    }

    if (this.timer.state === "paused") {
      this.timer.resume();
    } else if (this.timer.state === "idle") {
      if (!this.lastSession) {
        this.resetPhase();
        return true;
      }
      this.timer.start(this.lastSession.project, this.lastSession.description);
    }
    this.enter("working");
    return true;
  }

  /**
   * Turning Pomodoro mode off only drops the phase bookkeeping; the Timer
   * session, paused or not, is left as it is.
   */
  setConfig(config: PomodoroConfig): PomodoroConfig {
    const next = parseConfig(config);
    const wasEnabled = this.config.enabled;
    this.config = next;

    if (wasEnabled && !next.enabled) {
      this.resetPhase();
    } else if (!wasEnabled && next.enabled && this.timer.state !== "idle") {
      this.enter("working");
    }
    return this.settings;
  }

  snapshot(): PomodoroSnapshot {
    return {
      enabled: this.config.enabled,
      phase: this.phase,
      awaiting: this.phase === "awaitingAck" ? this.awaiting : undefined,
      completedWorkCycles: this.completedWorkCycles,
      phaseStartedAt: this.phaseStartedAt ? formatISO(this.phaseStartedAt) : undefined,
      remainingMs: this.remainingMs()
    };
  }

  private remainingMs(): number | undefined {
    if (!this.phaseStartedAt) {
      return undefined;
    }
    let minutes: number;
    switch (this.phase) {
      case "working":
        minutes = this.config.workMinutes;
        break;
      case "shortBreak":
      case "longBreak":
        minutes = this.breakMinutes(this.phase);
        break;
      default:
        return undefined;
    }
    const endsAt = addMinutes(this.phaseStartedAt, minutes);
    return Math.max(differenceInMilliseconds(endsAt, this.clock.now()), 0);
  }

  private breakMinutes(phase: "shortBreak" | "longBreak"): number {
    return phase === "longBreak" ? this.config.longBreakMinutes : this.config.shortBreakMinutes;
  }

  private enter(phase: PomodoroPhase, awaiting?: PendingTransition): void {
    this.phase = phase;
    this.awaiting = awaiting;
    this.phaseStartedAt = this.clock.now();
  }

  private resetPhase(): void {
    this.phase = "idle";
    this.awaiting = undefined;
    this.phaseStartedAt = undefined;
    this.completedWorkCycles = 0;
  }

  private signal(kind: Notification["kind"], message: string): Notification {
    this.notifier.notify(message);
    return {
      kind,
      message,
      at: formatISO(this.clock.now())
    };
  }
}

function parseConfig(config: PomodoroConfig): PomodoroConfig {
  const result = pomodoroConfigSchema.safeParse(config);
  if (!result.success) {
    const detail = result.error.issues.map(issue => issue.message).join(" ");
    throw new MeterError("InvalidConfig", `Invalid Pomodoro settings. ${detail}`);
  }
  return result.data;
}
