import { z } from "zod";
import { addSeconds, formatISO } from "date-fns";
import { v4 as uuid } from "uuid";
import type { TimingEngine } from "../engine.js";
import { InvalidTimeError } from "../errors.js";
import { formatDurationFromSeconds, formatElapsed } from "../format.js";
import type { NotificationCenter } from "../notifications/notificationCenter.js";
import type {
  AlarmSnapshot,
  CapabilityProfile,
  CommandResult,
  DisplayedNotification,
  LapRecord,
  StopwatchSnapshot,
  TimerSnapshot,
  Visibility
} from "../types.js";
import { parseDurationSeconds } from "./duration.js";

const idField = z.string().trim().min(1).max(64);
const messageField = z.string().trim().min(1).max(200);

export const MAX_TIMER_SECONDS = 24 * 60 * 60;
export const MAX_ALARM_OFFSET_SECONDS = 7 * 24 * 60 * 60;

const durationField = (maxSeconds: number, message: string) =>
  z
    .union([z.number(), z.string()])
    .transform(value => (typeof value === "string" ? parseDurationSeconds(value) : value))
    .pipe(z.number().max(maxSeconds, { message }));

export const setAlarmInput = z
  .object({
    id: idField.optional(),
    time: z.string().datetime({ offset: true }).optional(),
    in: durationField(MAX_ALARM_OFFSET_SECONDS, "Alarms can be set at most 7 days ahead.").optional(),
    message: messageField.optional()
  })
  .refine(value => (value.time === undefined) !== (value.in === undefined), {
    message: "Provide either an alarm time or a relative duration, not both."
  });

export const snoozeAlarmInput = z.object({
  id: idField,
  message: messageField.optional()
});

export const startTimerInput = z.object({
  id: idField.optional(),
  duration: durationField(MAX_TIMER_SECONDS, "Timers can run for at most 24 hours."),
  message: messageField.optional()
});

export const notificationResponseInput = z.object({
  tag: z.string().min(1),
  action: z.enum(["snooze", "dismiss", "open"])
});

export const visibilityInput = z.enum(["visible", "hidden"]);

/**
 * Structured commands from the conversational client, each answered with a
 * one-line message the chat can show as-is.
 */
export class TimingToolset {
  constructor(
    private readonly engine: TimingEngine,
    private readonly center: NotificationCenter
  ) {}

  setAlarm(input: z.input<typeof setAlarmInput>): CommandResult<AlarmSnapshot> {
    const parsed = setAlarmInput.parse(input);
    const id = parsed.id ?? uuid();
    const time = parsed.time !== undefined ? this.parseInstant(parsed.time) : this.relativeInstant(parsed.in);

    const alarm = this.engine.alarms.set(id, time, parsed.message);
    return {
      message: `Alarm '${alarm.id}' set for ${formatISO(alarm.time)}.`,
      data: alarm
    };
  }

  cancelAlarm(id: string): CommandResult<{ cancelled: boolean }> {
    const cancelled = this.engine.alarms.cancel(idField.parse(id));
    return {
      message: cancelled ? `Alarm '${id}' cancelled.` : `No alarm named '${id}' is set.`,
      data: { cancelled }
    };
  }

  listAlarms(): CommandResult<AlarmSnapshot[]> {
    const alarms = this.engine.alarms.list();
    return {
      message: alarms.length === 0 ? "No alarms set." : `You have ${alarms.length} alarm${alarms.length === 1 ? "" : "s"} set.`,
      data: alarms
    };
  }

  snoozeAlarm(input: z.input<typeof snoozeAlarmInput>): CommandResult<AlarmSnapshot | null> {
    const parsed = snoozeAlarmInput.parse(input);
    const alarm = this.engine.alarms.snooze(parsed.id, parsed.message);
    if (!alarm) {
      return { message: `Alarm '${parsed.id}' is not ringing.`, data: null };
    }
    return {
      message: `Snoozed until ${formatISO(alarm.time)}.`,
      data: alarm
    };
  }

  dismissAlarm(id: string): CommandResult<{ dismissed: boolean }> {
    const dismissed = this.engine.alarms.dismiss(idField.parse(id));
    return {
      message: dismissed ? `Alarm '${id}' dismissed.` : `Alarm '${id}' is not ringing.`,
      data: { dismissed }
    };
  }

  startTimer(input: z.input<typeof startTimerInput>): CommandResult<TimerSnapshot> {
    const parsed = startTimerInput.parse(input);
    const timer = this.engine.timers.start(parsed.id ?? uuid(), parsed.duration, parsed.message);
    return {
      message: `Started a ${formatDurationFromSeconds(timer.duration)} timer.`,
      data: timer
    };
  }

  cancelTimer(id: string): CommandResult<{ cancelled: boolean }> {
    const cancelled = this.engine.timers.clear(idField.parse(id));
    return {
      message: cancelled ? `Timer '${id}' cancelled.` : `No timer named '${id}' is running.`,
      data: { cancelled }
    };
  }

  listTimers(): CommandResult<TimerSnapshot[]> {
    const timers = this.engine.timers.list();
    return {
      message: timers.length === 0 ? "No timers running." : "Here are the active timers.",
      data: timers
    };
  }

  startStopwatch(id?: string): CommandResult<StopwatchSnapshot> {
    const stopwatch = this.engine.stopwatches.start(id === undefined ? uuid() : idField.parse(id));
    return {
      message: `Stopwatch '${stopwatch.id}' started.`,
      data: stopwatch
    };
  }

  pauseStopwatch(id: string): CommandResult<{ paused: boolean }> {
    const paused = this.engine.stopwatches.pause(idField.parse(id));
    return {
      message: paused ? `Stopwatch '${id}' paused at ${this.elapsedCopy(id)}.` : `Stopwatch '${id}' is not running.`,
      data: { paused }
    };
  }

  resumeStopwatch(id: string): CommandResult<{ resumed: boolean }> {
    const resumed = this.engine.stopwatches.resume(idField.parse(id));
    return {
      message: resumed ? `Stopwatch '${id}' resumed.` : `Stopwatch '${id}' is not paused.`,
      data: { resumed }
    };
  }

  lapStopwatch(id: string): CommandResult<LapRecord | null> {
    const lap = this.engine.stopwatches.lap(idField.parse(id));
    return {
      message: lap ? `Lap ${lap.lapNumber}: ${formatElapsed(lap.elapsedMs)}.` : `No stopwatch named '${id}'.`,
      data: lap ?? null
    };
  }

  resetStopwatch(id: string): CommandResult<{ reset: boolean }> {
    const reset = this.engine.stopwatches.reset(idField.parse(id));
    return {
      message: reset ? `Stopwatch '${id}' reset.` : `No stopwatch named '${id}'.`,
      data: { reset }
    };
  }

  stopStopwatch(id: string): CommandResult<{ elapsedMs: number | null }> {
    const elapsedMs = this.engine.stopwatches.stop(idField.parse(id));
    return {
      message:
        elapsedMs === undefined ? `No stopwatch named '${id}'.` : `Stopwatch '${id}' stopped at ${formatElapsed(elapsedMs)}.`,
      data: { elapsedMs: elapsedMs ?? null }
    };
  }

  listStopwatches(): CommandResult<StopwatchSnapshot[]> {
    const stopwatches = this.engine.stopwatches.list();
    return {
      message: stopwatches.length === 0 ? "No stopwatches running." : "Here are the active stopwatches.",
      data: stopwatches
    };
  }

  async respondToNotification(input: z.input<typeof notificationResponseInput>): Promise<CommandResult<{ handled: boolean }>> {
    const parsed = notificationResponseInput.parse(input);
    const handled = await this.center.performAction(parsed.tag, parsed.action);
    return {
      message: handled ? `Notification '${parsed.tag}' handled: ${parsed.action}.` : `Notification '${parsed.tag}' is no longer shown.`,
      data: { handled }
    };
  }

  listNotifications(): CommandResult<DisplayedNotification[]> {
    const notifications = this.center.getNotifications();
    return {
      message: notifications.length === 0 ? "No notifications shown." : `${notifications.length} notification${notifications.length === 1 ? "" : "s"} shown.`,
      data: notifications
    };
  }

  capabilities(): CommandResult<CapabilityProfile> {
    const profile = this.engine.capabilities();
    return {
      message: profile.isMobile
        ? "Alarms, timers and stopwatches are available on this device."
        : "Alarms, timers and stopwatches are only available on mobile devices.",
      data: profile
    };
  }

  setVisibility(visibility: Visibility): CommandResult<{ visibility: Visibility }> {
    this.engine.setVisibility(visibilityInput.parse(visibility));
    return {
      message: `Page is now ${this.engine.visibility}.`,
      data: { visibility: this.engine.visibility }
    };
  }

  private parseInstant(value: string): number {
    const time = Date.parse(value);
    if (!Number.isFinite(time)) {
      throw new InvalidTimeError("Alarm time is not a valid instant.");
    }
    return time;
  }

  private relativeInstant(seconds: number | undefined): number {
    if (seconds === undefined) {
      throw new InvalidTimeError("Alarm time is missing.");
    }
    return addSeconds(this.engine.clock.now(), seconds).getTime();
  }

  private elapsedCopy(id: string): string {
    return formatElapsed(this.engine.stopwatches.elapsed(id) ?? 0);
  }
}
