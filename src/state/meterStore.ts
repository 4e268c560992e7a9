import { isAfter, isBefore, parseISO } from "date-fns";
import { MeterError } from "../errors.js";
import { DEFAULT_INVOICE_SETTINGS } from "../invoice.js";
import { DEFAULT_POMODORO_CONFIG } from "../pomodoro.js";
import type { EntryPersistence } from "../recorder.js";
import type { InvoiceSettings, MeterData, PomodoroConfig, Project, TimeEntry } from "../types.js";

interface MeterStoreOptions {
  initialData?: MeterData;
  onChange?: (data: MeterData) => void | Promise<void>;
}

export interface EntryFilter {
  billed?: boolean;
  from?: Date;
  to?: Date;
}

const DEFAULT_CURRENCY = "$";

export class MeterStore implements EntryPersistence {
  private readonly entries = new Map<string, TimeEntry>();
  private readonly projects = new Map<string, Project>();
  private pomodoro: PomodoroConfig = { ...DEFAULT_POMODORO_CONFIG };
  private invoice: InvoiceSettings = { ...DEFAULT_INVOICE_SETTINGS };
  private readonly onChange?: (data: MeterData) => void | Promise<void>;
  private pendingPersist: Promise<void> = Promise.resolve();
  private lastPersistError: Error | null = null;

  constructor(options: MeterStoreOptions = {}) {
    this.onChange = options.onChange;

    if (options.initialData) {
      for (const entry of options.initialData.entries) {
        this.entries.set(entry.id, entry);
      }
      for (const project of options.initialData.projects) {
        this.projects.set(project.name, project);
      }
      // Entries written before their project was registered still get one.
      for (const entry of options.initialData.entries) {
        this.ensureProject(entry.project);
      }
      this.pomodoro = { ...options.initialData.pomodoro };
      this.invoice = copySettings(options.initialData.invoice);
    }
  }

  async waitForPersistence(): Promise<void> {
    try {
      await this.pendingPersist;
    } catch (error) {
      if (!this.lastPersistError && error instanceof Error) {
        this.lastPersistError = error;
      }
    }

    if (this.lastPersistError) {
      const error = this.lastPersistError;
      this.lastPersistError = null;
      throw error;
    }
  }

  saveEntry(entry: TimeEntry): Promise<void> {
    this.entries.set(entry.id, { ...entry });
    this.ensureProject(entry.project);
    this.emitChange();
    return this.waitForPersistence();
  }

  findEntry(id: string): TimeEntry | undefined {
    const entry = this.entries.get(id);
    return entry ? { ...entry } : undefined;
  }

  listEntries(filter: EntryFilter = {}): TimeEntry[] {
    return [...this.entries.values()]
      .filter(entry => {
        if (filter.billed !== undefined && entry.billed !== filter.billed) {
          return false;
        }
        const createdAt = parseISO(entry.createdAt);
        if (filter.from && isBefore(createdAt, filter.from)) {
          return false;
        }
        if (filter.to && isAfter(createdAt, filter.to)) {
          return false;
        }
        return true;
      })
      .sort((a, b) => parseISO(b.createdAt).getTime() - parseISO(a.createdAt).getTime())
      .map(entry => ({ ...entry }));
  }

  deleteEntry(id: string): TimeEntry {
    const entry = this.requireEntry(id);
    this.entries.delete(id);
    this.emitChange();
    return { ...entry };
  }

  /** Marks one entry, or every pending entry when no id is given. Returns how many changed. */
  markBilled(id?: string): number {
    return this.setBilled(true, id);
  }

  markUnbilled(id?: string): number {
    return this.setBilled(false, id);
  }

  listProjects(): Project[] {
    return [...this.projects.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(project => ({ ...project }));
  }

  getProject(name: string): Project | undefined {
    const project = this.projects.get(name);
    return project ? { ...project } : undefined;
  }

  setProjectRate(name: string, rate: number | null, currency?: string): Project {
    const existing = this.projects.get(name);
    const updated: Project = {
      name,
      currency: currency ?? existing?.currency ?? DEFAULT_CURRENCY
    };
    if (rate !== null) {
      updated.rate = rate;
    }

    this.projects.set(name, updated);
    this.emitChange();
    return { ...updated };
  }

  loadConfig(): PomodoroConfig {
    return { ...this.pomodoro };
  }

  savePomodoroConfig(config: PomodoroConfig): void {
    this.pomodoro = { ...config };
    this.emitChange();
  }

  loadInvoiceSettings(): InvoiceSettings {
    return copySettings(this.invoice);
  }

  saveInvoiceSettings(settings: InvoiceSettings): void {
    this.invoice = copySettings(settings);
    this.emitChange();
  }

  snapshot(): MeterData {
    return {
      entries: [...this.entries.values()].map(entry => ({ ...entry })),
      projects: this.listProjects(),
      pomodoro: this.loadConfig(),
      invoice: this.loadInvoiceSettings()
    };
  }

  private setBilled(billed: boolean, id?: string): number {
    const targets = id ? [this.requireEntry(id)] : [...this.entries.values()];
    let changed = 0;
    for (const entry of targets) {
      if (entry.billed === billed) {
        continue;
      }
      this.entries.set(entry.id, { ...entry, billed });
      changed += 1;
    }

    if (changed > 0) {
      this.emitChange();
    }
    return changed;
  }

  private ensureProject(name: string): void {
    if (!this.projects.has(name)) {
      this.projects.set(name, { name, currency: DEFAULT_CURRENCY });
    }
  }

  private requireEntry(id: string): TimeEntry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new MeterError("EntryNotFound", `Entry ${id} not found.`);
    }
    return entry;
  }

  private emitChange(): void {
    if (!this.onChange) {
      return;
    }

    const snapshot = this.snapshot();
    this.lastPersistError = null;
    const result = Promise.resolve(this.onChange(snapshot));
    this.pendingPersist = result.catch(error => {
      this.lastPersistError = error instanceof Error ? error : new Error(String(error));
      console.error("MeterStore persistence error", this.lastPersistError);
      throw this.lastPersistError;
    });
  }
}

function copySettings(settings: InvoiceSettings): InvoiceSettings {
  const { billTo, ...rest } = settings;
  return billTo ? { ...rest, billTo: { ...billTo } } : rest;
}
