import { test } from "node:test";
import assert from "node:assert/strict";
import { homedir } from "node:os";
import { join } from "node:path";
import { loadConfig } from "../src/config.js";

test("loadConfig falls back to defaults", () => {
  const config = loadConfig({});

  assert.equal(config.port, 2091);
  assert.equal(config.tickMs, 1000);
  assert.equal(config.homeDir, join(homedir(), ".meter"));
  assert.equal(config.dataFile, join(homedir(), ".meter", "meter.json"));
});

test("loadConfig reads the environment", () => {
  const config = loadConfig({ PORT: "8080", METER_HOME: "/srv/meter", METER_TICK_MS: "250" });

  assert.equal(config.port, 8080);
  assert.equal(config.tickMs, 250);
  assert.equal(config.dataFile, join("/srv/meter", "meter.json"));
  assert.equal(config.invoiceDir, join("/srv/meter", "invoices"));
});

test("loadConfig rejects an invalid port", () => {
  assert.throws(() => loadConfig({ PORT: "not-a-port" }), /Invalid environment configuration \(PORT:/);
});
