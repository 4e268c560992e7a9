import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { addDays, format, getMonth, getYear, parseISO } from "date-fns";
import { z } from "zod";
import type { BillTo, InvoiceSettings, Project, TimeEntry } from "./types.js";

export const DEFAULT_INVOICE_SETTINGS: InvoiceSettings = {
  businessName: "",
  businessEmail: "",
  businessAddress: "",
  taxId: "",
  paymentTerms: "Due on receipt",
  taxRate: 0,
  paymentInstructions: "",
  nextInvoiceNumber: 1
};

export const billToSchema = z.object({
  name: z.string().trim().min(1).max(120),
  contact: z.string().trim().max(120).optional(),
  email: z.string().trim().email().optional(),
  address: z.string().trim().max(500).optional()
});

export const invoiceSettingsSchema = z.object({
  businessName: z.string().trim().max(120).default(""),
  businessEmail: z.string().trim().max(120).default(""),
  businessAddress: z.string().trim().max(500).default(""),
  taxId: z.string().trim().max(60).default(""),
  paymentTerms: z.string().trim().min(1).max(60).default(DEFAULT_INVOICE_SETTINGS.paymentTerms),
  taxRate: z.number().min(0).max(100).default(0),
  paymentInstructions: z.string().max(1000).default(""),
  nextInvoiceNumber: z.number().int().positive().default(1),
  billTo: billToSchema.optional()
});

/** Header data that turns a monthly statement into a numbered invoice. */
export interface InvoiceDetails {
  number: number;
  issuedOn: Date;
  settings: InvoiceSettings;
  billTo?: BillTo;
}

export interface InvoiceInput {
  entries: TimeEntry[];
  projects: Project[];
  year: number;
  /** 1-12 */
  month: number;
  details?: InvoiceDetails;
}

export interface InvoiceSection {
  project: string;
  rate?: number;
  currency: string;
  hours: number;
  cost?: number;
  entries: TimeEntry[];
}

export interface Invoice {
  year: number;
  month: number;
  sections: InvoiceSection[];
  totalHours: number;
  totalCost?: number;
  number?: number;
  issuedOn?: string;
  dueOn?: string;
  taxAmount?: number;
  totalDue?: number;
  text: string;
}

const DESCRIPTION_WIDTH = 20;

export function formatRate(project: Pick<Project, "rate" | "currency">): string | undefined {
  if (project.rate === undefined) {
    return undefined;
  }
  return `${project.currency}${project.rate.toFixed(2)}/hr`;
}

export function invoicePeriod(year: number, month: number): string {
  return `${year}-${String(month).padStart(2, "0")}`;
}

export function formatInvoiceNumber(number: number): string {
  return `#${String(number).padStart(4, "0")}`;
}

/** Days until payment for "Net N" terms; other terms are due on receipt. */
export function paymentTermDays(terms: string): number {
  const match = terms.match(/\bnet\s*(\d{1,3})\b/i);
  return match ? Number(match[1]) : 0;
}

export function dueDate(issuedOn: Date, terms: string): Date {
  return addDays(issuedOn, paymentTermDays(terms));
}

export function buildInvoice(input: InvoiceInput): Invoice {
  const { year, month, details } = input;
  const projects = new Map(input.projects.map(project => [project.name, project]));
  const grouped = new Map<string, TimeEntry[]>();

  for (const entry of input.entries) {
    const createdAt = parseISO(entry.createdAt);
    if (getYear(createdAt) !== year || getMonth(createdAt) + 1 !== month) {
      continue;
    }
    const bucket = grouped.get(entry.project) ?? [];
    bucket.push(entry);
    grouped.set(entry.project, bucket);
  }

  const sections: InvoiceSection[] = [...grouped.keys()]
    .sort((a, b) => a.localeCompare(b))
    .map(name => {
      const entries = (grouped.get(name) ?? []).sort(
        (a, b) => parseISO(a.createdAt).getTime() - parseISO(b.createdAt).getTime()
      );
      const project = projects.get(name);
      const hours = entries.reduce((sum, entry) => sum + entry.durationHours, 0);
      const rate = project?.rate;
      return {
        project: name,
        rate,
        currency: project?.currency ?? "$",
        hours,
        cost: rate === undefined ? undefined : hours * rate,
        entries
      };
    });

  const totalHours = sections.reduce((sum, section) => sum + section.hours, 0);
  const rated = sections.filter(section => section.cost !== undefined);
  const totalCost = rated.length > 0 ? rated.reduce((sum, section) => sum + (section.cost ?? 0), 0) : undefined;

  const period = invoicePeriod(year, month);
  const title = details ? `Invoice ${formatInvoiceNumber(details.number)} for ${period}` : `Invoice for ${period}`;
  const lines: string[] = [title, "=".repeat(25), ""];

  let issuedOn: string | undefined;
  let dueOn: string | undefined;
  if (details) {
    issuedOn = format(details.issuedOn, "yyyy-MM-dd");
    dueOn = format(dueDate(details.issuedOn, details.settings.paymentTerms), "yyyy-MM-dd");
    lines.push(...partyLines(details), `Invoice Date: ${issuedOn}`, `Due Date: ${dueOn}`);
    lines.push(`Terms: ${details.settings.paymentTerms}`, `Period: ${period}`, "");
  }

  for (const section of sections) {
    lines.push(`Project: ${section.project}`);
    const rate = formatRate(section);
    if (rate) {
      lines.push(`Rate: ${rate}`);
    }
    lines.push("-".repeat(40));

    for (const entry of section.entries) {
      const day = format(parseISO(entry.createdAt), "yyyy-MM-dd");
      lines.push(`  ${entry.description.padEnd(DESCRIPTION_WIDTH)} | ${day} | ${hoursColumn(entry.durationHours)} hrs`);
    }

    if (section.rate !== undefined && section.cost !== undefined) {
      lines.push(
        `  Subtotal: ${hoursColumn(section.hours)} hrs x ${money(section.currency, section.rate)} = ${money(section.currency, section.cost)}`
      );
    } else {
      lines.push(`  Subtotal: ${hoursColumn(section.hours)} hrs`);
    }
    lines.push("");
  }

  lines.push("=".repeat(50));
  let taxAmount: number | undefined;
  let totalDue: number | undefined;
  if (totalCost !== undefined) {
    const currencies = new Set(rated.map(section => section.currency));
    const symbol = currencies.size === 1 ? rated[0].currency : "";
    lines.push(`Total: ${hoursColumn(totalHours)} hrs | ${money(symbol, totalCost)}`);

    if (details) {
      const { taxRate } = details.settings;
      taxAmount = (totalCost * taxRate) / 100;
      totalDue = totalCost + taxAmount;
      if (taxRate > 0) {
        lines.push(`Tax (${taxRate.toFixed(1)}%): ${money(symbol, taxAmount)}`);
      }
      lines.push(`TOTAL DUE: ${money(symbol, totalDue)}`);
    }
  } else {
    lines.push(`Total: ${hoursColumn(totalHours)} hrs`);
  }

  const instructions = details?.settings.paymentInstructions.trim();
  if (instructions) {
    lines.push("", "Payment Instructions", ...indented(instructions));
  }

  return {
    year,
    month,
    sections,
    totalHours,
    totalCost,
    number: details?.number,
    issuedOn,
    dueOn,
    taxAmount,
    totalDue,
    text: `${lines.join("\n")}\n`
  };
}

function partyLines(details: InvoiceDetails): string[] {
  const lines: string[] = [];
  const { settings, billTo } = details;
  if (settings.businessName) {
    lines.push(`From: ${settings.businessName}`, ...indented(settings.businessAddress));
    if (settings.businessEmail) {
      lines.push(`  ${settings.businessEmail}`);
    }
    if (settings.taxId) {
      lines.push(`  Tax ID: ${settings.taxId}`);
    }
  }
  if (billTo) {
    lines.push(`Bill To: ${billTo.name}`);
    if (billTo.contact) {
      lines.push(`  Attn: ${billTo.contact}`);
    }
    lines.push(...indented(billTo.address ?? ""));
    if (billTo.email) {
      lines.push(`  ${billTo.email}`);
    }
  }
  if (lines.length > 0) {
    lines.push("");
  }
  return lines;
}

function indented(text: string): string[] {
  return text
    .split("\n")
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .map(line => `  ${line}`);
}

export async function writeInvoice(directory: string, invoice: Invoice): Promise<string> {
  await mkdir(directory, { recursive: true });
  const filePath = join(directory, `invoice_${invoice.year}_${String(invoice.month).padStart(2, "0")}.txt`);
  await writeFile(filePath, invoice.text, "utf-8");
  return filePath;
}

function hoursColumn(hours: number): string {
  return hours.toFixed(2).padStart(6);
}

function money(currency: string, amount: number): string {
  return `${currency}${amount.toFixed(2)}`;
}
