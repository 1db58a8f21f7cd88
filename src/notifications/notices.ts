import type { NotificationAction, NotificationData } from "../types.js";

export const ALARM_TITLE = "🚨 Alarm";
export const SNOOZED_ALARM_TITLE = "🚨 Alarm (Snoozed)";
export const TIMER_TITLE = "⏰ Timer";

export const ALARM_VIBRATION = [500, 200, 500, 200, 500];
export const TIMER_VIBRATION = [300, 100, 300, 100, 300];

export const SNOOZE_MS = 5 * 60 * 1000;

export const ALARM_ACTIONS: NotificationAction[] = [
  { action: "snooze", title: "😴 Snooze 5 min" },
  { action: "dismiss", title: "✅ Dismiss" }
];

export const alarmTag = (id: string) => `alarm-${id}`;
export const timerTag = (id: string) => `timer-${id}`;

/** Snoozing a snooze reuses the same id, so at most one snooze is pending per alarm. */
export function snoozeIdFor(id: string): string {
  return `${id.replace(/(?:-snooze)+$/, "")}-snooze`;
}

/** A tag can be reused by later firings; only the same firing counts as a duplicate. */
export function isSameFiring(shown: NotificationData | undefined, next: NotificationData | undefined): boolean {
  if (!shown || !next) {
    return false;
  }
  return shown.kind === next.kind && shown.id === next.id && shown.firesAt === next.firesAt;
}
