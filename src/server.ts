import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z, ZodError } from "zod";
import packageJson from "../package.json" with { type: "json" };
import type { Clock } from "./clock.js";
import type { TimingConfig } from "./config.js";
import { TimingEngine } from "./engine.js";
import { isTimingError } from "./errors.js";
import { createChatSurface, createDeviceOutputs, forwardNotifications } from "./mcpSurfaces.js";
import type { NotificationCenter } from "./notifications/notificationCenter.js";
import type { RelayHost } from "./relay/backgroundRelay.js";
import { TimingToolset } from "./tools/timingToolset.js";
import type { CommandResult, PlatformSignals } from "./types.js";
import { APP_NAME, buildStatusContent } from "./ui/builders.js";

export interface TimingServerContext {
  server: McpServer;
  engine: TimingEngine;
  toolset: TimingToolset;
  close(): void;
}

export interface TimingServerOptions {
  signals: PlatformSignals;
  center: NotificationCenter;
  relay?: RelayHost;
  config?: TimingConfig;
  clock?: Clock;
}

const idField = z.string().min(1);
const durationInput = z
  .union([z.number(), z.string().min(1)])
  .describe('Seconds, "mm:ss", or a phrase like "5 minutes" or "1h 30m".');

const alarmCommand = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("set"),
    id: idField.optional(),
    time: z.string().optional(),
    in: durationInput.optional(),
    message: z.string().optional()
  }),
  z.object({ action: z.literal("cancel"), id: idField }),
  z.object({ action: z.literal("snooze"), id: idField, message: z.string().optional() }),
  z.object({ action: z.literal("dismiss"), id: idField }),
  z.object({ action: z.literal("list") })
]);

const timerCommand = z.discriminatedUnion("action", [
  z.object({ action: z.literal("start"), id: idField.optional(), duration: durationInput, message: z.string().optional() }),
  z.object({ action: z.literal("cancel"), id: idField }),
  z.object({ action: z.literal("list") })
]);

const stopwatchCommand = z.discriminatedUnion("action", [
  z.object({ action: z.literal("start"), id: idField.optional() }),
  z.object({ action: z.enum(["pause", "resume", "lap", "reset", "stop"]), id: idField }),
  z.object({ action: z.literal("list") })
]);

const notificationCommand = z.discriminatedUnion("action", [
  z.object({ action: z.literal("respond"), tag: z.string().min(1), response: z.enum(["snooze", "dismiss", "open"]) }),
  z.object({ action: z.literal("list") })
]);

const sessionCommand = z.discriminatedUnion("action", [
  z.object({ action: z.literal("capabilities") }),
  z.object({ action: z.literal("visibility"), visibility: z.enum(["visible", "hidden"]) })
]);

export function createTimingServer(options: TimingServerOptions): TimingServerContext {
  const server = new McpServer(
    {
      name: APP_NAME,
      version: packageJson.version,
      description: "Alarms, countdown timers and stopwatches that notify even when the chat is in the background."
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  const engine = new TimingEngine({
    signals: options.signals,
    center: options.center,
    relay: options.relay,
    chat: createChatSurface(server),
    outputs: createDeviceOutputs(server),
    clock: options.clock,
    assets: options.config?.assets
  });
  const toolset = new TimingToolset(engine, options.center);
  const stopForwarding = forwardNotifications(server, options.center);

  const respond = async (run: () => CommandResult<unknown> | Promise<CommandResult<unknown>>) => {
    try {
      const result = await run();
      return buildResult(engine, result);
    } catch (error) {
      if (isTimingError(error)) {
        return buildError(error.message, error.code);
      }
      if (error instanceof ZodError) {
        return buildError(error.issues.map(issue => issue.message).join(" "), "invalid_input");
      }
      throw error;
    }
  };

  server.registerTool(
    "alarm",
    {
      title: "Alarm",
      description: "Set, cancel, snooze, dismiss, or list alarms at absolute times. Mobile devices only.",
      inputSchema: {
        action: z.enum(["set", "cancel", "snooze", "dismiss", "list"]).optional(),
        id: z.string().min(1).optional(),
        time: z.string().describe("ISO 8601 instant with offset, e.g. 2026-10-18T07:30:00+02:00.").optional(),
        in: durationInput.optional(),
        message: z.string().max(200).optional()
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input =>
      respond(() => {
        const command = alarmCommand.parse({ ...input, action: input.action ?? "list" });
        switch (command.action) {
          case "set":
            return toolset.setAlarm({ id: command.id, time: command.time, in: command.in, message: command.message });
          case "cancel":
            return toolset.cancelAlarm(command.id);
          case "snooze":
            return toolset.snoozeAlarm({ id: command.id, message: command.message });
          case "dismiss":
            return toolset.dismissAlarm(command.id);
          case "list":
          default:
            return toolset.listAlarms();
        }
      })
  );

  server.registerTool(
    "timer",
    {
      title: "Timer",
      description: "Start, cancel, or list countdown timers. Mobile devices only.",
      inputSchema: {
        action: z.enum(["start", "cancel", "list"]).optional(),
        id: z.string().min(1).optional(),
        duration: durationInput.optional(),
        message: z.string().max(200).optional()
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input =>
      respond(() => {
        const command = timerCommand.parse({ ...input, action: input.action ?? "list" });
        switch (command.action) {
          case "start":
            return toolset.startTimer({ id: command.id, duration: command.duration, message: command.message });
          case "cancel":
            return toolset.cancelTimer(command.id);
          case "list":
          default:
            return toolset.listTimers();
        }
      })
  );

  server.registerTool(
    "stopwatch",
    {
      title: "Stopwatch",
      description: "Start, pause, resume, lap, reset, stop, or list stopwatches. Mobile devices only.",
      inputSchema: {
        action: z.enum(["start", "pause", "resume", "lap", "reset", "stop", "list"]).optional(),
        id: z.string().min(1).optional()
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input =>
      respond(() => {
        const command = stopwatchCommand.parse({ ...input, action: input.action ?? "list" });
        switch (command.action) {
          case "start":
            return toolset.startStopwatch(command.id);
          case "pause":
            return toolset.pauseStopwatch(command.id);
          case "resume":
            return toolset.resumeStopwatch(command.id);
          case "lap":
            return toolset.lapStopwatch(command.id);
          case "reset":
            return toolset.resetStopwatch(command.id);
          case "stop":
            return toolset.stopStopwatch(command.id);
          case "list":
          default:
            return toolset.listStopwatches();
        }
      })
  );

  server.registerTool(
    "notification",
    {
      title: "Notification",
      description: "List visible notifications or answer one with snooze, dismiss, or open.",
      inputSchema: {
        action: z.enum(["respond", "list"]).optional(),
        tag: z.string().min(1).optional(),
        response: z.enum(["snooze", "dismiss", "open"]).optional()
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input =>
      respond(() => {
        const command = notificationCommand.parse({ ...input, action: input.action ?? "list" });
        if (command.action === "respond") {
          return toolset.respondToNotification({ tag: command.tag, action: command.response });
        }
        return toolset.listNotifications();
      })
  );

  server.registerTool(
    "session",
    {
      title: "Session",
      description: "Report device capabilities, or tell the engine whether the chat page is visible.",
      inputSchema: {
        action: z.enum(["capabilities", "visibility"]).optional(),
        visibility: z.enum(["visible", "hidden"]).optional()
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input =>
      respond(() => {
        const command = sessionCommand.parse({ ...input, action: input.action ?? "capabilities" });
        if (command.action === "visibility") {
          return toolset.setVisibility(command.visibility);
        }
        return toolset.capabilities();
      })
  );

  return {
    server,
    engine,
    toolset,
    close() {
      stopForwarding();
      engine.dispose();
    }
  };
}

function buildResult(engine: TimingEngine, result: CommandResult<unknown>) {
  return {
    content: [
      {
        type: "text" as const,
        text: result.message
      }
    ],
    structuredContent: {
      ...buildStatusContent({
        alarms: engine.alarms.list(),
        timers: engine.timers.list(),
        stopwatches: engine.stopwatches.list()
      }),
      result: result.data
    }
  };
}

function buildError(message: string, code: string) {
  return {
    content: [
      {
        type: "text" as const,
        text: message
      }
    ],
    structuredContent: {
      error: code,
      message
    },
    isError: true
  };
}
