import { test } from "node:test";
import assert from "node:assert/strict";
import type { MeterStatus } from "../src/types.js";
import { buildEntryRow, buildMeterStructuredContent, buildStatusCard, formatDuration } from "../src/ui/builders.js";

const idle: MeterStatus = {
  timer: { state: "idle", elapsedMs: 0 },
  pomodoro: { enabled: false, phase: "idle", completedWorkCycles: 0 }
};

test("formatDuration picks the largest useful unit", () => {
  assert.equal(formatDuration(0), "0 seconds");
  assert.equal(formatDuration(1000), "1 second");
  assert.equal(formatDuration(90_000), "1m 30s");
  assert.equal(formatDuration(120_000), "2 minutes");
  assert.equal(formatDuration(3_900_000), "1h 05m");
});

test("idle status card has no call to action", () => {
  const card = buildStatusCard(idle);

  assert.equal(card.heading, "Meter");
  assert.equal(card.body, "No timer running");
  assert.equal(card.cta, undefined);
  assert.equal(card.badge, undefined);
});

test("a pending break asks for acknowledgment", () => {
  const card = buildStatusCard({
    timer: { state: "paused", project: "Acme", description: "Build", elapsedMs: 1_500_000 },
    pomodoro: { enabled: true, phase: "awaitingAck", awaiting: "break", completedWorkCycles: 0 }
  });

  assert.equal(card.heading, "Acme: Build");
  assert.equal(card.body, "Work period complete, break pending");
  assert.equal(card.badge, "Waiting");
  assert.deepEqual(card.cta, { label: "Start break", action: "acknowledge" });
});

test("a running timer offers pause", () => {
  const card = buildStatusCard({
    timer: { state: "running", project: "Acme", description: "Build", elapsedMs: 600_000 },
    pomodoro: { enabled: true, phase: "working", completedWorkCycles: 1, remainingMs: 900_000 }
  });

  assert.equal(card.body, "10 minutes tracked");
  assert.equal(card.badge, "Focus");
  assert.deepEqual(card.cta, { label: "Pause", action: "pause_timer" });
});

test("entry rows show hours and billing state", () => {
  const row = buildEntryRow({
    id: "e1",
    project: "Acme",
    description: "Build",
    durationHours: 1.5,
    billed: false,
    createdAt: "2026-03-15T12:00:00Z"
  });

  assert.equal(row.subtitle, "1.50 hrs · Build");
  assert.equal(row.status, "pending");
});

test("structured content omits empty sections", () => {
  const content = buildMeterStructuredContent({ status: idle });

  assert.equal(content.app, "Meter");
  assert.equal(content.inspect, undefined);
  assert.equal(content.notifications, undefined);
});
