import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(2091),
  METER_HOME: z.string().min(1).optional(),
  METER_TICK_MS: z.coerce.number().int().min(100).max(60_000).default(1000)
});

export interface MeterConfig {
  port: number;
  homeDir: string;
  dataFile: string;
  invoiceDir: string;
  tickMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MeterConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment configuration (${detail}).`);
  }

  const homeDir = parsed.data.METER_HOME ?? join(homedir(), ".meter");
  return {
    port: parsed.data.PORT,
    homeDir,
    dataFile: join(homeDir, "meter.json"),
    invoiceDir: join(homeDir, "invoices"),
    tickMs: parsed.data.METER_TICK_MS
  };
}
