import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { NotificationCenter } from "./notifications/notificationCenter.js";
import type { ChatSurface, DeviceOutputs, DisplayedNotification } from "./types.js";

type LoggingLevel = "debug" | "info" | "notice" | "warning" | "error" | "critical" | "alert" | "emergency";

/**
 * The session's client is the chat page: transcript lines, device cues and
 * tray updates all reach it as MCP logging messages, one logger per surface.
 */
function send(server: McpServer, level: LoggingLevel, logger: string, data: unknown): Promise<void> {
  return server.server.sendLoggingMessage({ level, logger, data });
}

export function createChatSurface(server: McpServer): ChatSurface {
  return {
    addMessage(text, role) {
      send(server, "notice", "chat", { role, text }).catch(error => {
        console.error("Failed to push chat message", error);
      });
    }
  };
}

export function createDeviceOutputs(server: McpServer): DeviceOutputs {
  return {
    vibrate(pattern) {
      send(server, "info", "device", { kind: "vibrate", pattern }).catch(error => {
        console.error("Failed to signal vibration", error);
      });
      return true;
    },
    async playSound(src, options) {
      await send(server, "info", "device", { kind: "sound", src, ...options });
      return {
        stop() {
          send(server, "info", "device", { kind: "sound-stop", src }).catch(error => {
            console.error("Failed to stop sound", error);
          });
        }
      };
    }
  };
}

/** Mirrors the notification tray to the session; returns the unsubscribe hook. */
export function forwardNotifications(server: McpServer, center: NotificationCenter): () => void {
  const forward = (event: "shown" | "closed") => (notification: DisplayedNotification) => {
    const level: LoggingLevel = event === "shown" && notification.requireInteraction ? "alert" : "info";
    send(server, level, "notifications", { event, notification }).catch(error => {
      console.error(`Failed to forward notification '${notification.tag}'`, error);
    });
  };

  const offShow = center.on("show", forward("shown"));
  const offClose = center.on("close", forward("closed"));
  return () => {
    offShow();
    offClose();
  };
}
