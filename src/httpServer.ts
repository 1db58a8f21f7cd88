import express from "express";
import cors from "cors";
import { randomUUID } from "crypto";
import type { Request, Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { signalsFromHeaders } from "./capabilities.js";
import { loadConfig } from "./config.js";
import { NotificationCenter } from "./notifications/notificationCenter.js";
import { BackgroundRelay } from "./relay/backgroundRelay.js";
import { createTimingServer, type TimingServerContext } from "./server.js";

interface Session {
  transport: StreamableHTTPServerTransport;
  context: TimingServerContext;
}

async function bootstrap() {
  const config = loadConfig();

  // One device: a single tray and relay outlive every chat session.
  const center = new NotificationCenter({
    prompt: async () => config.notificationPermission
  });
  const relay = new BackgroundRelay({ center, assets: config.assets });

  const app = express();
  app.use(express.json({ limit: "2mb" }));
  app.use(
    cors({
      origin: "*",
      exposedHeaders: ["Mcp-Session-Id"]
    })
  );

  const sessions = new Map<string, Session>();

  const closeSession = (sessionId: string) => {
    const session = sessions.get(sessionId);
    if (!session) {
      return;
    }
    sessions.delete(sessionId);
    session.context.close();
    console.log(`Session ${sessionId} closed`);
  };

  const openSession = async (req: Request) => {
    const context = createTimingServer({
      signals: signalsFromHeaders(req.headers),
      center,
      relay,
      config
    });

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: sessionId => {
        sessions.set(sessionId, { transport, context });
        console.log(`Session ${sessionId} opened`);
      }
    });

    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (sessionId) {
        closeSession(sessionId);
      } else {
        context.close();
      }
    };

    await context.server.connect(transport);
    await context.engine.initialize();
    return transport;
  };

  const requireSession = (req: Request, res: Response, purpose: string): Session | undefined => {
    const sessionId = req.header("mcp-session-id") ?? undefined;
    if (!sessionId) {
      res.status(400).json({
        error: "missing_session",
        message: `Provide an MCP-Session-Id header to ${purpose}.`
      });
      return undefined;
    }

    const session = sessions.get(sessionId);
    if (!session) {
      res.status(404).json({
        error: "unknown_session",
        message: "Session not found. Start a new session to initialize."
      });
      return undefined;
    }
    return session;
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

      const transport = await openSession(req);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error("Error handling MCP POST request", error);
      if (!res.headersSent) {
        res.status(500).json({
          error: "internal_error",
          message: "The timing engine encountered an unexpected error."
        });
      }
    }
  });

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
      const closed = session.transport.sessionId;
      if (closed) {
        closeSession(closed);
      }
    }
  });

  const serverInstance = app.listen(config.port, () => {
    console.log(`Timing engine MCP HTTP server listening on port ${config.port}`);
  });

  const shutdown = async () => {
    console.log("Shutting down timing engine server...");
    serverInstance.close();
    await Promise.all(
      [...sessions.values()].map(async ({ transport }) => {
        try {
          await transport.close();
        } catch (error) {
          console.error("Error closing transport", error);
        }
      })
    );
    relay.close();
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

bootstrap().catch(error => {
  console.error("Failed to start timing engine HTTP server", error);
  process.exit(1);
});
