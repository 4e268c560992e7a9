import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export interface NotificationSink {
  notify(message: string): void;
}

export const silentSink: NotificationSink = {
  notify: () => undefined
};

export class ConsoleNotificationSink implements NotificationSink {
  notify(message: string): void {
    console.log(`[meter] ${message}`);
  }
}

/**
 * Forwards notifications to every connected MCP session as a logging
 * message. Sessions come and go, so they are looked up on each call.
 */
export class McpLoggingNotificationSink implements NotificationSink {
  constructor(private readonly servers: () => Iterable<McpServer>) {}

  notify(message: string): void {
    for (const server of this.servers()) {
      server.server
        .sendLoggingMessage({ level: "info", logger: "meter", data: message })
        .catch(error => {
          console.error("Failed to forward notification to MCP session", error);
        });
    }
  }
}

export class CompositeNotificationSink implements NotificationSink {
  constructor(private readonly sinks: NotificationSink[]) {}

  notify(message: string): void {
    for (const sink of this.sinks) {
      sink.notify(message);
    }
  }
}
