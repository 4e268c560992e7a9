import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import { DEFAULT_INVOICE_SETTINGS, invoiceSettingsSchema } from "../invoice.js";
import { DEFAULT_POMODORO_CONFIG, pomodoroConfigSchema } from "../pomodoro.js";
import type { MeterData } from "../types.js";

const timeEntrySchema = z.object({
  id: z.string().min(1),
  project: z.string().min(1),
  description: z.string(),
  durationHours: z.number().positive(),
  billed: z.boolean(),
  createdAt: z.string().datetime({ offset: true })
});

const projectSchema = z.object({
  name: z.string().min(1),
  rate: z.number().nonnegative().optional(),
  currency: z.string().min(1).default("$")
});

export const meterDataSchema = z.object({
  entries: z.array(timeEntrySchema).default([]),
  projects: z.array(projectSchema).default([]),
  pomodoro: pomodoroConfigSchema.default(DEFAULT_POMODORO_CONFIG),
  invoice: invoiceSettingsSchema.default(DEFAULT_INVOICE_SETTINGS)
});

export function emptyMeterData(): MeterData {
  return {
    entries: [],
    projects: [],
    pomodoro: { ...DEFAULT_POMODORO_CONFIG },
    invoice: { ...DEFAULT_INVOICE_SETTINGS }
  };
}

export interface MeterStorage {
  load(): Promise<MeterData>;
  save(data: MeterData): Promise<void>;
}

export class MeterFileStorage implements MeterStorage {
  private pending = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async load(): Promise<MeterData> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return emptyMeterData();
      }
      throw error;
    }
    return meterDataSchema.parse(JSON.parse(raw));
  }

  async save(data: MeterData): Promise<void> {
    const serialized = JSON.stringify(data, null, 2);
    this.pending = this.pending
      .catch(() => undefined)
      .then(async () => {
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(this.filePath, serialized, "utf-8");
      });
    await this.pending;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
