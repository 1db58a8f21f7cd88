import { formatISO } from "date-fns";
import { formatRemaining } from "../format.js";
import type { AlarmSnapshot, StopwatchSnapshot, TimerSnapshot } from "../types.js";

export interface InlineCard {
  surface: "inline_card";
  heading: string;
  body: string;
  badge?: string;
  accessibilityLabel: string;
}

export interface StatusRow {
  kind: "alarm" | "timer" | "stopwatch";
  id: string;
  title: string;
  subtitle: string;
}

export interface TimingStructuredContent {
  app: string;
  inlineCard: InlineCard;
  items: StatusRow[];
  [key: string]: unknown;
}

export const APP_NAME = "Timing Engine";

export function buildAlarmRow(alarm: AlarmSnapshot): StatusRow {
  return {
    kind: "alarm",
    id: alarm.id,
    title: alarm.message,
    subtitle: `Rings at ${formatISO(alarm.time)}`
  };
}

export function buildTimerRow(timer: TimerSnapshot): StatusRow {
  return {
    kind: "timer",
    id: timer.id,
    title: timer.message,
    subtitle: `${formatRemaining(timer.remaining)} left (was ${formatRemaining(timer.duration)})`
  };
}

export function buildStopwatchRow(stopwatch: StopwatchSnapshot): StatusRow {
  const laps = stopwatch.laps.length;
  return {
    kind: "stopwatch",
    id: stopwatch.id,
    title: stopwatch.formatted,
    subtitle: `${stopwatch.isRunning ? "Running" : "Paused"}${laps > 0 ? `, ${laps} lap${laps === 1 ? "" : "s"}` : ""}`
  };
}

export function buildStatusContent(input: {
  alarms: AlarmSnapshot[];
  timers: TimerSnapshot[];
  stopwatches: StopwatchSnapshot[];
}): TimingStructuredContent {
  const items = [
    ...input.alarms.map(buildAlarmRow),
    ...input.timers.map(buildTimerRow),
    ...input.stopwatches.map(buildStopwatchRow)
  ];

  if (items.length === 0) {
    return {
      app: APP_NAME,
      inlineCard: {
        surface: "inline_card",
        heading: APP_NAME,
        body: "Nothing is scheduled. Ask for an alarm, a timer or a stopwatch.",
        accessibilityLabel: "Nothing scheduled."
      },
      items
    };
  }

  return {
    app: APP_NAME,
    inlineCard: {
      surface: "inline_card",
      heading: "Active",
      body: items.map(item => `${item.title}: ${item.subtitle}`).join("\n"),
      badge: `${items.length}`,
      accessibilityLabel: `${items.length} active alarms, timers or stopwatches.`
    },
    items
  };
}
