import express from "express";
import cors from "cors";
import { randomUUID } from "crypto";
import type { Request, Response } from "express";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { loadConfig } from "./config.js";
import { CompositeNotificationSink, ConsoleNotificationSink, McpLoggingNotificationSink } from "./notifications.js";
import { createMeterServer } from "./server.js";
import { MeterFileStorage } from "./state/meterStorage.js";
import { MeterStore } from "./state/meterStore.js";
import { MeterToolset } from "./tools/meterTool.js";

interface Session {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
}

async function bootstrap() {
  const config = loadConfig();
  const storage = new MeterFileStorage(config.dataFile);
  const initialData = await storage.load();
  const store = new MeterStore({
    initialData,
    onChange: data => storage.save(data)
  });

  const sessions = new Map<string, Session>();
  const toolset = new MeterToolset({
    store,
    invoiceDir: config.invoiceDir,
    notifier: new CompositeNotificationSink([
      new ConsoleNotificationSink(),
      new McpLoggingNotificationSink(() => [...sessions.values()].map(session => session.server))
    ])
  });

  const app = express();
  app.use(express.json({ limit: "2mb" }));
  app.use(
    cors({
      origin: "*",
      exposedHeaders: ["Mcp-Session-Id"]
    })
  );

  const createSession = (): Session => {
    const server = createMeterServer(toolset);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: sessionId => {
        sessions.set(sessionId, { transport, server });
      }
    });

    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (sessionId) {
        sessions.delete(sessionId);
      }
    };

    return { transport, server };
  };

  app.post("/mcp", async (req: Request, res: Response) => {
    const sessionId = req.header("mcp-session-id") ?? undefined;

    try {
      if (sessionId) {
        const existing = sessions.get(sessionId);
        if (!existing) {
          res.status(404).json({
            error: "unknown_session",
            message: "Session not found. Start a new session to initialize."
          });
          return;
        }
        await existing.transport.handleRequest(req, res, req.body);
        return;
      }

      const { transport, server } = createSession();
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error("Error handling MCP POST request", error);
      if (!res.headersSent) {
        res.status(500).json({
          error: "internal_error",
          message: "Meter encountered an unexpected error."
        });
      }
    }
  });

  const requireSession = (req: Request, res: Response, action: string): Session | undefined => {
    const sessionId = req.header("mcp-session-id") ?? undefined;
    if (!sessionId) {
      res.status(400).json({
        error: "missing_session",
        message: `Provide an MCP-Session-Id header to ${action}.`
      });
      return undefined;
    }

    const session = sessions.get(sessionId);
    if (!session) {
      res.status(404).json({
        error: "unknown_session",
        message: "Session not found."
      });
      return undefined;
    }
    return session;
  };

  app.get("/mcp", async (req: Request, res: Response) => {
    const session = requireSession(req, res, "resume streaming");
    if (!session) {
      return;
    }

    try {
      await session.transport.handleRequest(req, res);
    } catch (error) {
      console.error("Error handling MCP GET stream", error);
      if (!res.headersSent) {
        res.status(500).json({
          error: "internal_error",
          message: "Failed to stream MCP updates."
        });
      }
    }
  });

  app.delete("/mcp", async (req: Request, res: Response) => {
    const session = requireSession(req, res, "close a session");
    if (!session) {
      return;
    }

    try {
      await session.transport.handleRequest(req, res);
    } catch (error) {
      console.error("Error handling MCP DELETE request", error);
      if (!res.headersSent) {
        res.status(500).json({
          error: "internal_error",
          message: "Failed to close MCP session."
        });
      }
    } finally {
      const id = session.transport.sessionId;
      if (id) {
        sessions.delete(id);
      }
    }
  });

  // Pomodoro phases expire by polling; notifications go out through the sinks.
  const ticker = setInterval(() => {
    try {
      toolset.handleTick();
    } catch (error) {
      console.error("Pomodoro tick failed", error);
    }
  }, config.tickMs);

  const serverInstance = app.listen(config.port, () => {
    console.log(`Meter MCP HTTP server listening on port ${config.port} (data: ${config.dataFile})`);
  });

  const shutdown = async () => {
    console.log("Shutting down Meter server...");
    clearInterval(ticker);
    serverInstance.close();
    await Promise.all(
      [...sessions.values()].map(async session => {
        try {
          await session.transport.close();
        } catch (error) {
          console.error("Error closing transport", error);
        }
      })
    );
    try {
      await store.waitForPersistence();
    } catch (error) {
      console.error("Last write to the data file failed", error);
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch(error => {
      console.error("Shutdown failed", error);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

bootstrap().catch(error => {
  console.error("Failed to start Meter HTTP server", error);
  process.exit(1);
});
