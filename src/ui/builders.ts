import type { MeterStatus, Notification, PomodoroSnapshot, TimeEntry } from "../types.js";

export interface InlineCard {
  surface: "inline_card";
  heading: string;
  body: string;
  badge?: string;
  cta?: {
    label: string;
    action: "pause_timer" | "resume_timer" | "acknowledge";
  };
  accessibilityLabel: string;
}

export interface InspectListRow {
  surface: "inspect";
  id: string;
  title: string;
  subtitle: string;
  status: "billed" | "pending";
  accessibilityLabel: string;
}

export type MeterStructuredContent = {
  app: string;
  inlineCard: InlineCard;
  inspect?: {
    items: InspectListRow[];
  };
  notifications?: Notification[];
};

const APP_NAME = "Meter";
const MAX_INSPECT_ROWS = 8;

export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(Math.floor(ms / 1000), 0);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) {
    return `${hours}h ${String(minutes).padStart(2, "0")}m`;
  }
  if (minutes > 0 && seconds > 0) {
    return `${minutes}m ${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes} minute${minutes === 1 ? "" : "s"}`;
  }
  return `${seconds} second${seconds === 1 ? "" : "s"}`;
}

export function buildStatusCard(status: MeterStatus): InlineCard {
  const { timer, pomodoro } = status;
  const heading = timer.state === "idle" ? APP_NAME : `${timer.project ?? ""}: ${timer.description ?? ""}`;
  const body = statusCopy(status);

  let cta: InlineCard["cta"];
  if (pomodoro.phase === "awaitingAck") {
    cta = { label: pomodoro.awaiting === "break" ? "Start break" : "Resume work", action: "acknowledge" };
  } else if (timer.state === "running") {
    cta = { label: "Pause", action: "pause_timer" };
  } else if (timer.state === "paused" && (pomodoro.phase === "idle" || pomodoro.phase === "working")) {
    cta = { label: "Resume", action: "resume_timer" };
  }

  return {
    surface: "inline_card",
    heading,
    body,
    badge: phaseBadge(pomodoro),
    cta,
    accessibilityLabel: `${heading}, ${body}`
  };
}

export function buildEntryRow(entry: TimeEntry): InspectListRow {
  const status = entry.billed ? "billed" : "pending";
  const subtitle = `${entry.durationHours.toFixed(2)} hrs · ${entry.description}`;
  return {
    surface: "inspect",
    id: entry.id,
    title: entry.project,
    subtitle,
    status,
    accessibilityLabel: `${entry.project}, ${subtitle}, ${status}`
  };
}

export function buildMeterStructuredContent(input: {
  status: MeterStatus;
  entries?: TimeEntry[];
  notifications?: Notification[];
}): MeterStructuredContent {
  const { status, entries = [], notifications = [] } = input;
  const items = entries.slice(0, MAX_INSPECT_ROWS).map(entry => buildEntryRow(entry));

  return {
    app: APP_NAME,
    inlineCard: buildStatusCard(status),
    inspect: items.length > 0 ? { items } : undefined,
    notifications: notifications.length > 0 ? notifications : undefined
  };
}

function statusCopy({ timer, pomodoro }: MeterStatus): string {
  if (pomodoro.phase === "awaitingAck") {
    return pomodoro.awaiting === "break" ? "Work period complete, break pending" : "Break complete, ready to resume";
  }
  if (pomodoro.phase === "shortBreak" || pomodoro.phase === "longBreak") {
    return `On break, ${formatDuration(pomodoro.remainingMs ?? 0)} left`;
  }

  switch (timer.state) {
    case "running":
      return `${formatDuration(timer.elapsedMs)} tracked`;
    case "paused":
      return `Paused at ${formatDuration(timer.elapsedMs)}`;
    case "idle":
    default:
      return "No timer running";
  }
}

function phaseBadge(pomodoro: PomodoroSnapshot): string | undefined {
  switch (pomodoro.phase) {
    case "working":
      return "Focus";
    case "shortBreak":
      return "Short break";
    case "longBreak":
      return "Long break";
    case "awaitingAck":
      return "Waiting";
    default:
      return undefined;
  }
}
