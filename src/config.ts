import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { NotificationAssets } from "./types.js";

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(2091),
  NOTIFICATION_PERMISSION: z.enum(["granted", "denied"]).default("granted"),
  NOTIFICATION_ICON: z.string().min(1).default("/static/img/icon.png"),
  NOTIFICATION_BADGE: z.string().min(1).default("/static/img/badge.png"),
  ALARM_SOUND_URL: z.string().min(1).default("/static/audio/alarm.mp3"),
  TIMER_SOUND_URL: z.string().min(1).default("/static/audio/timer.mp3")
});

export interface TimingConfig {
  port: number;
  notificationPermission: "granted" | "denied";
  assets: NotificationAssets;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TimingConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`));
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    notificationPermission: values.NOTIFICATION_PERMISSION,
    assets: {
      icon: values.NOTIFICATION_ICON,
      badge: values.NOTIFICATION_BADGE,
      alarmSound: values.ALARM_SOUND_URL,
      timerSound: values.TIMER_SOUND_URL
    }
  };
}

export const DEFAULT_ASSETS: NotificationAssets = loadConfig({}).assets;
