import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ZodError } from "zod";
import { isMeterError } from "../src/errors.js";
import { DEFAULT_INVOICE_SETTINGS } from "../src/invoice.js";
import { DEFAULT_POMODORO_CONFIG } from "../src/pomodoro.js";
import { emptyMeterData, MeterFileStorage } from "../src/state/meterStorage.js";
import { MeterStore } from "../src/state/meterStore.js";
import type { TimeEntry } from "../src/types.js";

async function createStore() {
  const dir = await mkdtemp(join(tmpdir(), "meter-store-test-"));
  const filePath = join(dir, "nested", "meter.json");
  const storage = new MeterFileStorage(filePath);
  const initialData = await storage.load();
  const store = new MeterStore({
    initialData,
    onChange: data => storage.save(data)
  });

  async function cleanup() {
    await rm(dir, { recursive: true, force: true });
  }

  return { store, storage, filePath, cleanup };
}

function entry(id: string, overrides: Partial<TimeEntry> = {}): TimeEntry {
  return {
    id,
    project: "Acme",
    description: "Build",
    durationHours: 1,
    billed: false,
    createdAt: "2026-03-15T12:00:00Z",
    ...overrides
  };
}

test("a missing data file loads as an empty document", async t => {
  const { storage, cleanup } = await createStore();
  t.after(cleanup);

  assert.deepEqual(await storage.load(), emptyMeterData());
});

test("saveEntry persists the entry and registers its project", async t => {
  const { store, filePath, cleanup } = await createStore();
  t.after(cleanup);

  await store.saveEntry(entry("e1", { durationHours: 1.5 }));

  const persisted = JSON.parse(await readFile(filePath, "utf-8"));
  assert.equal(persisted.entries.length, 1);
  assert.equal(persisted.entries[0].durationHours, 1.5);
  assert.deepEqual(persisted.projects, [{ name: "Acme", currency: "$" }]);
  assert.deepEqual(persisted.pomodoro, DEFAULT_POMODORO_CONFIG);
});

test("the saved document loads back into an equal store", async t => {
  const { store, storage, cleanup } = await createStore();
  t.after(cleanup);

  await store.saveEntry(entry("e1"));
  store.setProjectRate("Acme", 150, "€");
  store.savePomodoroConfig({ ...DEFAULT_POMODORO_CONFIG, enabled: true, workMinutes: 50 });
  store.saveInvoiceSettings({ ...DEFAULT_INVOICE_SETTINGS, taxRate: 5, billTo: { name: "Acme Corp" } });
  await store.waitForPersistence();

  const reloaded = new MeterStore({ initialData: await storage.load() });
  assert.deepEqual(reloaded.snapshot(), store.snapshot());
  assert.equal(reloaded.loadConfig().workMinutes, 50);
  assert.deepEqual(reloaded.getProject("Acme"), { name: "Acme", rate: 150, currency: "€" });
  assert.deepEqual(reloaded.loadInvoiceSettings(), {
    ...DEFAULT_INVOICE_SETTINGS,
    taxRate: 5,
    billTo: { name: "Acme Corp" }
  });
});

test("a data file without invoice settings loads the defaults", async t => {
  const { storage, filePath, cleanup } = await createStore();
  t.after(cleanup);

  await storage.save(emptyMeterData());
  await writeFile(filePath, JSON.stringify({ entries: [], projects: [] }), "utf-8");
  assert.deepEqual((await storage.load()).invoice, DEFAULT_INVOICE_SETTINGS);
});

test("listEntries filters by billed state and date range, newest first", async t => {
  const { store, cleanup } = await createStore();
  t.after(cleanup);

  await store.saveEntry(entry("march", { createdAt: "2026-03-15T12:00:00Z" }));
  await store.saveEntry(entry("april", { createdAt: "2026-04-02T12:00:00Z", billed: true }));
  await store.saveEntry(entry("may", { createdAt: "2026-05-20T12:00:00Z" }));

  assert.deepEqual(
    store.listEntries().map(e => e.id),
    ["may", "april", "march"]
  );
  assert.deepEqual(
    store.listEntries({ billed: false }).map(e => e.id),
    ["may", "march"]
  );
  assert.deepEqual(
    store
      .listEntries({ from: new Date("2026-04-01T00:00:00Z"), to: new Date("2026-04-30T23:59:59Z") })
      .map(e => e.id),
    ["april"]
  );
});

test("markBilled and markUnbilled report how many entries changed", async t => {
  const { store, cleanup } = await createStore();
  t.after(cleanup);

  await store.saveEntry(entry("e1"));
  await store.saveEntry(entry("e2"));
  await store.saveEntry(entry("e3", { billed: true }));

  assert.equal(store.markBilled(), 2);
  assert.equal(store.markBilled(), 0);
  assert.equal(store.markUnbilled("e2"), 1);
  assert.equal(store.markUnbilled("e2"), 0);
  assert.equal(store.findEntry("e2")?.billed, false);
  await store.waitForPersistence();
});

test("entries and projects handed out are copies", async t => {
  const { store, filePath, cleanup } = await createStore();
  t.after(cleanup);

  await store.saveEntry(entry("e1"));
  const found = store.findEntry("e1");
  assert.ok(found);
  found.billed = true;
  const [listed] = store.listEntries();
  listed.durationHours = 99;
  const project = store.getProject("Acme");
  assert.ok(project);
  project.rate = 500;

  assert.equal(store.findEntry("e1")?.billed, false);
  assert.equal(store.findEntry("e1")?.durationHours, 1);
  assert.equal(store.getProject("Acme")?.rate, undefined);
  assert.equal(store.markBilled("e1"), 1);
  await store.waitForPersistence();
  const persisted = JSON.parse(await readFile(filePath, "utf-8"));
  assert.equal(persisted.entries[0].billed, true);
});

test("a zero-hour entry in the data file is rejected", async t => {
  const { storage, filePath, cleanup } = await createStore();
  t.after(cleanup);

  await storage.save({ ...emptyMeterData(), entries: [entry("e1", { durationHours: 0 })] });
  await assert.rejects(storage.load(), error => error instanceof ZodError);
  assert.ok((await readFile(filePath, "utf-8")).includes('"durationHours": 0'));
});

test("unknown entry ids fail with EntryNotFound", async t => {
  const { store, cleanup } = await createStore();
  t.after(cleanup);

  assert.throws(() => store.markBilled("missing"), error => isMeterError(error, "EntryNotFound"));
  assert.throws(() => store.deleteEntry("missing"), error => isMeterError(error, "EntryNotFound"));
});

test("deleteEntry removes the entry from the data file", async t => {
  const { store, filePath, cleanup } = await createStore();
  t.after(cleanup);

  await store.saveEntry(entry("e1"));
  const removed = store.deleteEntry("e1");
  await store.waitForPersistence();

  assert.equal(removed.id, "e1");
  const persisted = JSON.parse(await readFile(filePath, "utf-8"));
  assert.deepEqual(persisted.entries, []);
});

test("setProjectRate creates projects and clears rates with null", async t => {
  const { store, cleanup } = await createStore();
  t.after(cleanup);

  assert.deepEqual(store.setProjectRate("Beta", 90), { name: "Beta", rate: 90, currency: "$" });
  assert.deepEqual(store.setProjectRate("Beta", null), { name: "Beta", currency: "$" });
  assert.deepEqual(
    store.listProjects().map(project => project.name),
    ["Beta"]
  );
  await store.waitForPersistence();
});

test("entries loaded without a project record get one", () => {
  const store = new MeterStore({
    initialData: { ...emptyMeterData(), entries: [entry("e1", { project: "Legacy" })] }
  });

  assert.deepEqual(store.getProject("Legacy"), { name: "Legacy", currency: "$" });
});

test("a malformed data file is rejected", async t => {
  const { storage, filePath, cleanup } = await createStore();
  t.after(cleanup);

  await storage.save(emptyMeterData());
  await writeFile(filePath, JSON.stringify({ entries: [{ id: "e1" }] }), "utf-8");
  await assert.rejects(storage.load());
});

test("waitForPersistence surfaces a failed write once", async () => {
  const store = new MeterStore({
    onChange: async () => {
      throw new Error("disk full");
    }
  });

  store.setProjectRate("Acme", 100);
  await assert.rejects(store.waitForPersistence(), /disk full/);
  await store.waitForPersistence();
});
