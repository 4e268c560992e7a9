export type TimerState = "idle" | "running" | "paused";

export type PomodoroPhase = "idle" | "working" | "shortBreak" | "longBreak" | "awaitingAck";

export type PendingTransition = "break" | "work";

export interface TimeEntry {
  id: string;
  project: string;
  description: string;
  durationHours: number;
  billed: boolean;
  createdAt: string;
}

export interface Project {
  name: string;
  rate?: number;
  currency: string;
}

export interface PomodoroConfig {
  enabled: boolean;
  workMinutes: number;
  shortBreakMinutes: number;
  longBreakMinutes: number;
  cyclesBeforeLongBreak: number;
}

export interface BillTo {
  name: string;
  contact?: string;
  email?: string;
  address?: string;
}

export interface InvoiceSettings {
  businessName: string;
  businessEmail: string;
  businessAddress: string;
  taxId: string;
  /** "Net 30" style terms; anything else is due on receipt. */
  paymentTerms: string;
  /** Percent applied to the billed amount. */
  taxRate: number;
  paymentInstructions: string;
  nextInvoiceNumber: number;
  billTo?: BillTo;
}

export interface TimerSnapshot {
  state: TimerState;
  project?: string;
  description?: string;
  startedAt?: string;
  elapsedMs: number;
}

export interface FinishedSession {
  project: string;
  description: string;
  startedAt: Date;
  endedAt: Date;
  elapsedMs: number;
}

export interface PomodoroSnapshot {
  enabled: boolean;
  phase: PomodoroPhase;
  awaiting?: PendingTransition;
  completedWorkCycles: number;
  phaseStartedAt?: string;
  remainingMs?: number;
}

export interface Notification {
  kind: "workComplete" | "breakComplete";
  message: string;
  at: string;
}

export interface MeterData {
  entries: TimeEntry[];
  projects: Project[];
  pomodoro: PomodoroConfig;
  invoice: InvoiceSettings;
}

export interface MeterStatus {
  timer: TimerSnapshot;
  pomodoro: PomodoroSnapshot;
}

export interface MeterUpdateResult {
  message: string;
  status: MeterStatus;
  entry?: TimeEntry;
  notifications: Notification[];
}
