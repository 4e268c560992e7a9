import { test } from "node:test";
import assert from "node:assert/strict";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createMeterServer, formatEntryLine } from "../src/server.js";
import { MeterStore } from "../src/state/meterStore.js";
import { MeterToolset } from "../src/tools/meterTool.js";
import { ManualClock } from "./helpers/manualClock.js";

async function connect() {
  const clock = new ManualClock();
  const toolset = new MeterToolset({ store: new MeterStore(), clock });
  const server = createMeterServer(toolset);
  const client = new Client({ name: "meter-test", version: "0.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    assert.ok(first && first.type === "text");
    return { text: first.text, isError: result.isError ?? false };
  }

  async function close() {
    await client.close();
    await server.close();
  }

  return { clock, call, close };
}

test("timer tools start and stop a session", async t => {
  const { clock, call, close } = await connect();
  t.after(close);

  const started = await call("timer_start", { project: "Acme", description: "Build" });
  assert.equal(started.text, "Started timer for project 'Acme'.");
  assert.equal(started.isError, false);

  clock.advanceMinutes(30);
  const stopped = await call("timer_stop");
  assert.equal(stopped.text, "Stopped timer for project 'Acme', duration 0.50 hrs.");
});

test("domain errors come back as tool errors", async t => {
  const { call, close } = await connect();
  t.after(close);

  const result = await call("timer_stop");
  assert.equal(result.isError, true);
  assert.equal(result.text, "No timer is running.");
});

test("entry_list prints one line per entry", async t => {
  const { call, close } = await connect();
  t.after(close);

  assert.equal((await call("entry_list")).text, "No entries found.");
  await call("entry_add", { project: "Acme", description: "Call", duration: "45m" });

  const listed = await call("entry_list");
  assert.match(listed.text, /^\[[0-9a-f-]{36}\] Acme \| Call \| 0\.75 hrs \| pending$/);
});

test("formatEntryLine marks billed entries", () => {
  assert.equal(
    formatEntryLine({
      id: "e1",
      project: "Acme",
      description: "Build",
      durationHours: 2,
      billed: true,
      createdAt: "2026-03-15T12:00:00Z"
    }),
    "[e1] Acme | Build | 2.00 hrs | billed"
  );
});

test("invoice tools apply settings and per-invoice overrides", async t => {
  const { call, close } = await connect();
  t.after(close);

  const saved = await call("invoice_settings", { paymentTerms: "Net 30" });
  assert.equal(saved.text, "Invoice settings saved: terms Net 30, tax 0.0%, next invoice #0001.");

  const generated = await call("invoice_generate", { year: 2026, month: 3, client: { name: "Acme Corp" } });
  const lines = generated.text.split("\n");
  assert.equal(lines[0], "Invoice #0001 for 2026-03 generated.");
  assert.equal(lines[2], "Invoice #0001 for 2026-03");
  assert.ok(lines.includes("Bill To: Acme Corp"));
  assert.ok(lines.includes("Terms: Net 30"));
});
