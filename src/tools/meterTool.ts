import { endOfMonth, getMonth, getYear, startOfMonth } from "date-fns";
import { z } from "zod";
import { systemClock, type Clock } from "../clock.js";
import { parseDurationHours } from "../duration.js";
import {
  billToSchema,
  buildInvoice,
  formatInvoiceNumber,
  formatRate,
  invoicePeriod,
  invoiceSettingsSchema,
  writeInvoice,
  type Invoice
} from "../invoice.js";
import { silentSink, type NotificationSink } from "../notifications.js";
import { PomodoroController } from "../pomodoro.js";
import { EntryRecorder } from "../recorder.js";
import type { EntryFilter, MeterStore } from "../state/meterStore.js";
import { Timer } from "../timer.js";
import type {
  InvoiceSettings,
  MeterStatus,
  MeterUpdateResult,
  Notification,
  PomodoroConfig,
  Project,
  TimeEntry
} from "../types.js";

const MS_PER_HOUR = 3_600_000;
const MAX_ENTRY_HOURS = 24;

const projectName = z.string().trim().min(1).max(80);
const description = z.string().trim().max(200);

export const startTimerShape = {
  project: projectName,
  description: description.default("Work session")
};

export const startTimerInput = z.object(startTimerShape);

export const addEntryShape = {
  project: projectName,
  description: description.min(1),
  duration: z
    .union([z.number().positive().max(MAX_ENTRY_HOURS), z.string().min(1)])
    .describe('Hours as a number (1.5) or a string like "1h 30m" or "1:30".')
};

export const addEntryInput = z
  .object(addEntryShape)
  .transform(data => ({
    ...data,
    hours: typeof data.duration === "string" ? parseDurationHours(data.duration) : data.duration
  }))
  .refine(data => data.hours <= MAX_ENTRY_HOURS, {
    message: `A manual entry can be at most ${MAX_ENTRY_HOURS} hours.`,
    path: ["duration"]
  });

export const periodShape = {
  month: z.number().int().min(1).max(12).optional(),
  year: z.number().int().min(2000).max(2100).optional()
};

export const listEntriesShape = {
  ...periodShape,
  billed: z.boolean().optional()
};

export const listEntriesInput = z.object(listEntriesShape);

export const entryIdShape = {
  id: z.string().uuid()
};

export const entryIdInput = z.object(entryIdShape);

export const billingShape = {
  id: z.string().uuid().optional()
};

export const billingInput = z.object(billingShape);

export const projectRateShape = {
  project: projectName,
  rate: z.number().nonnegative().nullable().optional(),
  currency: z.string().trim().min(1).max(4).optional()
};

export const projectRateInput = z.object(projectRateShape);

const taxRate = z.number().min(0).max(100).describe("Tax percentage applied to the billed amount.");

export const invoiceShape = {
  ...periodShape,
  includeUnbilled: z.boolean().default(false),
  write: z.boolean().default(true),
  invoiceNumber: z.number().int().positive().optional(),
  client: billToSchema.optional().describe("Bill-to block for this invoice; defaults to the saved client."),
  taxRate: taxRate.optional()
};

export const invoiceInput = z.object(invoiceShape);

export const invoiceSettingsShape = {
  businessName: z.string().trim().max(120).optional(),
  businessEmail: z.string().trim().max(120).optional(),
  businessAddress: z.string().trim().max(500).optional(),
  taxId: z.string().trim().max(60).optional(),
  paymentTerms: z.string().trim().min(1).max(60).optional().describe('e.g. "Net 30" or "Due on receipt".'),
  taxRate: taxRate.optional(),
  paymentInstructions: z.string().max(1000).optional(),
  nextInvoiceNumber: z.number().int().positive().optional(),
  billTo: billToSchema.nullable().optional().describe("Default client; null clears it.")
};

export const invoiceSettingsInput = z.object(invoiceSettingsShape);

export const pomodoroShape = {
  enabled: z.boolean().optional(),
  workMinutes: z.number().int().positive().optional(),
  shortBreakMinutes: z.number().int().positive().optional(),
  longBreakMinutes: z.number().int().positive().optional(),
  cyclesBeforeLongBreak: z.number().int().positive().optional()
};

export const pomodoroInput = z.object(pomodoroShape);

interface MeterToolsetOptions {
  store: MeterStore;
  clock?: Clock;
  notifier?: NotificationSink;
  invoiceDir?: string;
}

export interface InvoiceResult {
  invoice: Invoice;
  filePath?: string;
  message: string;
}

export interface ProjectListing extends Project {
  formattedRate?: string;
}

export class MeterToolset {
  readonly controller: PomodoroController;
  private readonly store: MeterStore;
  private readonly recorder: EntryRecorder;
  private readonly clock: Clock;
  private readonly invoiceDir?: string;

  constructor(options: MeterToolsetOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.invoiceDir = options.invoiceDir;
    const timer = new Timer(this.clock);
    this.controller = new PomodoroController(
      timer,
      this.store.loadConfig(),
      options.notifier ?? silentSink,
      this.clock
    );
    this.recorder = new EntryRecorder(this.store, this.clock);
  }

  getStatus(): MeterStatus {
    return {
      timer: this.controller.timerSnapshot(),
      pomodoro: this.controller.snapshot()
    };
  }

  async status(): Promise<MeterUpdateResult> {
    const notifications = this.handleTick();
    const { timer } = this.getStatus();
    const message =
      timer.state === "idle"
        ? "No timer running."
        : `Tracking "${timer.project ?? ""}"${timer.state === "paused" ? " (paused)" : ""}.`;
    return this.result(message, notifications);
  }

  async startTimer(input: z.input<typeof startTimerInput>): Promise<MeterUpdateResult> {
    const notifications = this.handleTick();
    const parsed = startTimerInput.parse(input);
    this.controller.start(parsed.project, parsed.description);
    return this.result(`Started timer for project '${parsed.project}'.`, notifications);
  }

  async stopTimer(): Promise<MeterUpdateResult> {
    const notifications = this.handleTick();
    const finished = this.controller.stop();
    const entry = await this.recorder.record(finished.project, finished.description, finished.elapsedMs);
    return {
      ...this.result(
        `Stopped timer for project '${entry.project}', duration ${entry.durationHours.toFixed(2)} hrs.`,
        notifications
      ),
      entry
    };
  }

  async pauseTimer(): Promise<MeterUpdateResult> {
    const notifications = this.handleTick();
    const changed = this.controller.pause();
    return this.result(changed ? "Timer paused." : "Timer is already paused.", notifications);
  }

  async resumeTimer(): Promise<MeterUpdateResult> {
    const notifications = this.handleTick();
    const changed = this.controller.resume();
    let message = "Timer resumed.";
    if (!changed) {
      const { phase } = this.controller.snapshot();
      message = phase === "idle" || phase === "working"
        ? "Timer is already running."
        : "Timer stays paused until the break is acknowledged.";
    }
    return this.result(message, notifications);
  }

  async acknowledge(): Promise<MeterUpdateResult> {
    const notifications = this.handleTick();
    if (!this.controller.acknowledge()) {
      return this.result("Nothing to acknowledge.", notifications);
    }

    const pomodoro = this.controller.snapshot();
    const { settings } = this.controller;
    let message: string;
    switch (pomodoro.phase) {
      case "shortBreak":
        message = `Starting short break (${settings.shortBreakMinutes} min).`;
        break;
      case "longBreak":
        message = `Starting long break (${settings.longBreakMinutes} min).`;
        break;
      case "working":
        message = "Back to work.";
        break;
      default:
        message = "Ready to start the next work period.";
    }
    return this.result(message, notifications);
  }

  async configurePomodoro(input: z.input<typeof pomodoroInput>): Promise<MeterUpdateResult> {
    const notifications = this.handleTick();
    const parsed = pomodoroInput.parse(input);
    const current = this.controller.settings;
    const next: PomodoroConfig = {
      enabled: parsed.enabled ?? current.enabled,
      workMinutes: parsed.workMinutes ?? current.workMinutes,
      shortBreakMinutes: parsed.shortBreakMinutes ?? current.shortBreakMinutes,
      longBreakMinutes: parsed.longBreakMinutes ?? current.longBreakMinutes,
      cyclesBeforeLongBreak: parsed.cyclesBeforeLongBreak ?? current.cyclesBeforeLongBreak
    };

    const saved = this.controller.setConfig(next);
    this.store.savePomodoroConfig(saved);
    await this.store.waitForPersistence();

    const message = saved.enabled
      ? `Pomodoro mode enabled: ${saved.workMinutes} min work, ${saved.shortBreakMinutes}/${saved.longBreakMinutes} min breaks, long break every ${saved.cyclesBeforeLongBreak} cycles.`
      : "Pomodoro mode disabled.";
    return this.result(message, notifications);
  }

  async addEntry(input: z.input<typeof addEntryInput>): Promise<MeterUpdateResult> {
    const notifications = this.handleTick();
    const parsed = addEntryInput.parse(input);
    const entry = await this.recorder.record(parsed.project, parsed.description, parsed.hours * MS_PER_HOUR);
    return {
      ...this.result(
        `Added manual entry for project '${entry.project}', duration ${entry.durationHours.toFixed(2)} hrs.`,
        notifications
      ),
      entry
    };
  }

  listEntries(input: z.input<typeof listEntriesInput> = {}): TimeEntry[] {
    const parsed = listEntriesInput.parse(input);
    const filter: EntryFilter = { billed: parsed.billed };
    if (parsed.month !== undefined || parsed.year !== undefined) {
      const now = this.clock.now();
      const year = parsed.year ?? getYear(now);
      if (parsed.month !== undefined) {
        const anchor = new Date(year, parsed.month - 1, 1);
        filter.from = startOfMonth(anchor);
        filter.to = endOfMonth(anchor);
      } else {
        filter.from = new Date(year, 0, 1);
        filter.to = endOfMonth(new Date(year, 11, 1));
      }
    }
    return this.store.listEntries(filter);
  }

  async deleteEntry(input: z.input<typeof entryIdInput>): Promise<TimeEntry> {
    const parsed = entryIdInput.parse(input);
    const entry = this.store.deleteEntry(parsed.id);
    await this.store.waitForPersistence();
    return entry;
  }

  async billEntries(input: z.input<typeof billingInput> = {}): Promise<string> {
    const parsed = billingInput.parse(input);
    const changed = this.store.markBilled(parsed.id);
    await this.store.waitForPersistence();
    if (parsed.id) {
      return changed > 0 ? `Marked entry ${parsed.id} as billed.` : `Entry ${parsed.id} was already billed.`;
    }
    return `Marked ${changed} pending ${changed === 1 ? "entry" : "entries"} as billed.`;
  }

  async unbillEntries(input: z.input<typeof billingInput> = {}): Promise<string> {
    const parsed = billingInput.parse(input);
    const changed = this.store.markUnbilled(parsed.id);
    await this.store.waitForPersistence();
    if (parsed.id) {
      return changed > 0 ? `Marked entry ${parsed.id} as unbilled.` : `Entry ${parsed.id} was not billed.`;
    }
    return `Marked ${changed} billed ${changed === 1 ? "entry" : "entries"} as unbilled.`;
  }

  async setProjectRate(input: z.input<typeof projectRateInput>): Promise<string> {
    const parsed = projectRateInput.parse(input);
    if (parsed.rate === undefined) {
      const project = this.store.getProject(parsed.project);
      if (!project) {
        return `Project '${parsed.project}' not found.`;
      }
      const rate = formatRate(project);
      return rate ? `Rate for '${project.name}': ${rate}.` : `No rate set for '${project.name}'.`;
    }

    const project = this.store.setProjectRate(parsed.project, parsed.rate, parsed.currency);
    await this.store.waitForPersistence();
    const rate = formatRate(project);
    return rate ? `Set rate for '${project.name}' to ${rate}.` : `Rate cleared for '${project.name}'.`;
  }

  listProjects(): ProjectListing[] {
    return this.store.listProjects().map(project => ({
      ...project,
      formattedRate: formatRate(project)
    }));
  }

  async configureInvoice(input: z.input<typeof invoiceSettingsInput>): Promise<string> {
    const parsed = invoiceSettingsInput.parse(input);
    const current = this.store.loadInvoiceSettings();
    const next: InvoiceSettings = invoiceSettingsSchema.parse({
      businessName: parsed.businessName ?? current.businessName,
      businessEmail: parsed.businessEmail ?? current.businessEmail,
      businessAddress: parsed.businessAddress ?? current.businessAddress,
      taxId: parsed.taxId ?? current.taxId,
      paymentTerms: parsed.paymentTerms ?? current.paymentTerms,
      taxRate: parsed.taxRate ?? current.taxRate,
      paymentInstructions: parsed.paymentInstructions ?? current.paymentInstructions,
      nextInvoiceNumber: parsed.nextInvoiceNumber ?? current.nextInvoiceNumber,
      billTo: parsed.billTo === null ? undefined : parsed.billTo ?? current.billTo
    });
    this.store.saveInvoiceSettings(next);
    await this.store.waitForPersistence();

    const client = next.billTo ? `, bill to ${next.billTo.name}` : "";
    return `Invoice settings saved: terms ${next.paymentTerms}, tax ${next.taxRate.toFixed(1)}%, next invoice ${formatInvoiceNumber(next.nextInvoiceNumber)}${client}.`;
  }

  async generateInvoice(input: z.input<typeof invoiceInput> = {}): Promise<InvoiceResult> {
    const parsed = invoiceInput.parse(input);
    const now = this.clock.now();
    const settings = this.store.loadInvoiceSettings();
    const number = parsed.invoiceNumber ?? settings.nextInvoiceNumber;
    const invoice = buildInvoice({
      entries: this.store.listEntries(parsed.includeUnbilled ? {} : { billed: true }),
      projects: this.store.listProjects(),
      year: parsed.year ?? getYear(now),
      month: parsed.month ?? getMonth(now) + 1,
      details: {
        number,
        issuedOn: now,
        settings: { ...settings, taxRate: parsed.taxRate ?? settings.taxRate },
        billTo: parsed.client ?? settings.billTo
      }
    });

    const label = `Invoice ${formatInvoiceNumber(number)}`;
    if (!parsed.write || !this.invoiceDir) {
      return { invoice, message: `${label} for ${invoicePeriod(invoice.year, invoice.month)} generated.` };
    }

    const filePath = await writeInvoice(this.invoiceDir, invoice);
    // Numbers only advance once an invoice is written.
    if (number >= settings.nextInvoiceNumber) {
      this.store.saveInvoiceSettings({ ...settings, nextInvoiceNumber: number + 1 });
      await this.store.waitForPersistence();
    }
    return { invoice, filePath, message: `${label} written to ${filePath}` };
  }

  /** Polled by the event loop; returns the notifications raised by phase expiry. */
  handleTick(): Notification[] {
    const notification = this.controller.tick();
    return notification ? [notification] : [];
  }

  private result(message: string, notifications: Notification[]): MeterUpdateResult {
    return {
      message,
      status: this.getStatus(),
      notifications
    };
  }
}
