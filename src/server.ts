import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ZodError } from "zod";
import packageJson from "../package.json" with { type: "json" };
import { MeterError } from "./errors.js";
import {
  addEntryShape,
  billingShape,
  entryIdShape,
  invoiceSettingsShape,
  invoiceShape,
  listEntriesShape,
  pomodoroShape,
  projectRateShape,
  startTimerShape,
  type MeterToolset
} from "./tools/meterTool.js";
import type { MeterUpdateResult, TimeEntry } from "./types.js";
import { buildMeterStructuredContent } from "./ui/builders.js";

export function createMeterServer(toolset: MeterToolset): McpServer {
  const server = new McpServer(
    {
      name: "Meter",
      version: packageJson.version,
      description: "Track billable hours against projects and generate monthly invoices."
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  server.registerTool(
    "timer_start",
    {
      title: "Start timer",
      description: "Start tracking time for a project. Only one timer runs at a time.",
      inputSchema: startTimerShape,
      annotations: { readOnlyHint: false }
    },
    async input => runTool(async () => updateResult(await toolset.startTimer(input)))
  );

  server.registerTool(
    "timer_stop",
    {
      title: "Stop timer",
      description: "Stop the running timer and record the tracked time as an entry.",
      annotations: { readOnlyHint: false }
    },
    async () => runTool(async () => updateResult(await toolset.stopTimer()))
  );

  server.registerTool(
    "timer_pause",
    {
      title: "Pause timer",
      description: "Pause the running timer. Paused time is not billed.",
      annotations: { readOnlyHint: false }
    },
    async () => runTool(async () => updateResult(await toolset.pauseTimer()))
  );

  server.registerTool(
    "timer_resume",
    {
      title: "Resume timer",
      description: "Resume a paused timer.",
      annotations: { readOnlyHint: false }
    },
    async () => runTool(async () => updateResult(await toolset.resumeTimer()))
  );

  server.registerTool(
    "timer_status",
    {
      title: "Timer status",
      description: "Show the running timer and the Pomodoro phase.",
      annotations: { readOnlyHint: true }
    },
    async () => runTool(async () => updateResult(await toolset.status()))
  );

  server.registerTool(
    "pomodoro_acknowledge",
    {
      title: "Acknowledge Pomodoro",
      description: "Start the pending break, or resume work once a break is over.",
      annotations: { readOnlyHint: false }
    },
    async () => runTool(async () => updateResult(await toolset.acknowledge()))
  );

  server.registerTool(
    "pomodoro_configure",
    {
      title: "Configure Pomodoro",
      description: "Turn Pomodoro mode on or off and change work and break lengths in minutes.",
      inputSchema: pomodoroShape,
      annotations: { readOnlyHint: false }
    },
    async input => runTool(async () => updateResult(await toolset.configurePomodoro(input)))
  );

  server.registerTool(
    "entry_add",
    {
      title: "Add entry",
      description: "Record time worked without running the timer.",
      inputSchema: addEntryShape,
      annotations: { readOnlyHint: false }
    },
    async input => runTool(async () => updateResult(await toolset.addEntry(input)))
  );

  server.registerTool(
    "entry_list",
    {
      title: "List entries",
      description: "List time entries, optionally by billed status and month.",
      inputSchema: listEntriesShape,
      annotations: { readOnlyHint: true }
    },
    async input =>
      runTool(async () => {
        const entries = toolset.listEntries(input);
        const text = entries.length === 0 ? "No entries found." : entries.map(formatEntryLine).join("\n");
        return {
          content: [{ type: "text" as const, text }],
          structuredContent: buildMeterStructuredContent({ status: toolset.getStatus(), entries })
        };
      })
  );

  server.registerTool(
    "entry_delete",
    {
      title: "Delete entry",
      description: "Delete a time entry by id.",
      inputSchema: entryIdShape,
      annotations: { readOnlyHint: false, destructiveHint: true }
    },
    async input =>
      runTool(async () => {
        const entry = await toolset.deleteEntry(input);
        return textResult(`Deleted entry ${entry.id} (${entry.project}).`);
      })
  );

  server.registerTool(
    "entry_bill",
    {
      title: "Mark billed",
      description: "Mark one entry, or every pending entry, as billed.",
      inputSchema: billingShape,
      annotations: { readOnlyHint: false }
    },
    async input => runTool(async () => textResult(await toolset.billEntries(input)))
  );

  server.registerTool(
    "entry_unbill",
    {
      title: "Mark unbilled",
      description: "Mark one entry, or every billed entry, as unbilled.",
      inputSchema: billingShape,
      annotations: { readOnlyHint: false }
    },
    async input => runTool(async () => textResult(await toolset.unbillEntries(input)))
  );

  server.registerTool(
    "project_rate",
    {
      title: "Project rate",
      description: "Show a project's hourly rate, set it, or clear it with null.",
      inputSchema: projectRateShape,
      annotations: { readOnlyHint: false }
    },
    async input => runTool(async () => textResult(await toolset.setProjectRate(input)))
  );

  server.registerTool(
    "project_list",
    {
      title: "List projects",
      description: "List projects with their hourly rates.",
      annotations: { readOnlyHint: true }
    },
    async () =>
      runTool(async () => {
        const projects = toolset.listProjects();
        if (projects.length === 0) {
          return textResult("No projects found.");
        }
        const rows = projects.map(project => `${project.name.padEnd(30)} ${(project.formattedRate ?? "Not set").padEnd(15)}`);
        return textResult([`${"Project".padEnd(30)} ${"Rate".padEnd(15)}`, "-".repeat(45), ...rows].join("\n"));
      })
  );

  server.registerTool(
    "invoice_settings",
    {
      title: "Invoice settings",
      description:
        "Set the business details, default client, payment terms, tax rate, payment instructions and next invoice number.",
      inputSchema: invoiceSettingsShape,
      annotations: { readOnlyHint: false }
    },
    async input => runTool(async () => textResult(await toolset.configureInvoice(input)))
  );

  server.registerTool(
    "invoice_generate",
    {
      title: "Generate invoice",
      description:
        "Render the numbered monthly invoice from billed entries and write it to the invoices folder. Client and tax rate override the saved settings.",
      inputSchema: invoiceShape,
      annotations: { readOnlyHint: false }
    },
    async input =>
      runTool(async () => {
        const { message, invoice } = await toolset.generateInvoice(input);
        return textResult(`${message}\n\n${invoice.text}`);
      })
  );

  return server;
}

export function formatEntryLine(entry: TimeEntry): string {
  return `[${entry.id}] ${entry.project} | ${entry.description} | ${entry.durationHours.toFixed(2)} hrs | ${
    entry.billed ? "billed" : "pending"
  }`;
}

async function runTool(action: () => Promise<CallToolResult>): Promise<CallToolResult> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof MeterError) {
      return errorResult(error.message);
    }
    if (error instanceof ZodError) {
      return errorResult(error.issues.map(issue => `${issue.path.join(".") || "input"}: ${issue.message}`).join("\n"));
    }
    throw error;
  }
}

function updateResult(result: MeterUpdateResult): CallToolResult {
  const lines = [result.message, ...result.notifications.map(notification => notification.message)];
  return {
    content: [{ type: "text" as const, text: lines.join("\n") }],
    structuredContent: buildMeterStructuredContent({
      status: result.status,
      entries: result.entry ? [result.entry] : undefined,
      notifications: result.notifications
    })
  };
}

function textResult(text: string): CallToolResult {
  return {
    content: [{ type: "text" as const, text }]
  };
}

function errorResult(message: string): CallToolResult {
  return {
    content: [{ type: "text" as const, text: message }],
    isError: true
  };
}
