import { EventEmitter } from "node:events";
import { formatISO } from "date-fns";
import { assertFeature } from "../capabilities.js";
import { scheduleAt, type Clock, type Deadline } from "../clock.js";
import { InvalidTimeError } from "../errors.js";
import type { DeliveryGateway } from "../notifications/deliveryGateway.js";
import { ALARM_ACTIONS, ALARM_TITLE, ALARM_VIBRATION, SNOOZE_MS, alarmTag, snoozeIdFor } from "../notifications/notices.js";
import type { RelayMessage } from "../relay/messages.js";
import type { RelayLink } from "../relay/relayLink.js";
import type { AlarmSnapshot, CapabilityProfile, ChatSurface } from "../types.js";

interface ActiveAlarm {
  id: string;
  time: number;
  message: string;
  created: number;
  deadline: Deadline;
}

type AlarmEvents = {
  fired: (alarm: AlarmSnapshot) => void;
};

interface AlarmSchedulerOptions {
  clock: Clock;
  gateway: DeliveryGateway;
  chat: ChatSurface;
  capabilities: () => CapabilityProfile;
}

/**
 * One-shot alarms at absolute instants. Every schedule is mirrored to the
 * background relay; whichever side fires first removes its own record before
 * showing anything, and the shared notification tag stops the other side from
 * showing a second one.
 */
export class AlarmScheduler {
  private readonly emitter = new EventEmitter();
  private readonly alarms = new Map<string, ActiveAlarm>();
  /** Fired alarms not yet snoozed or dismissed, by id, with their message. */
  private readonly ringing = new Map<string, string>();
  private readonly clock: Clock;
  private readonly gateway: DeliveryGateway;
  private readonly chat: ChatSurface;
  private readonly capabilities: () => CapabilityProfile;
  private readonly stopWatchingTray: () => void;
  private relay: RelayLink | null = null;

  constructor(options: AlarmSchedulerOptions) {
    this.clock = options.clock;
    this.gateway = options.gateway;
    this.chat = options.chat;
    this.capabilities = options.capabilities;
    this.stopWatchingTray = this.gateway.onClosed(tag => {
      for (const id of this.ringing.keys()) {
        if (alarmTag(id) === tag) {
          this.ringing.delete(id);
        }
      }
    });
  }

  on<T extends keyof AlarmEvents>(event: T, listener: AlarmEvents[T]): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  attachRelay(link: RelayLink | null): void {
    this.relay = link;
  }

  set(id: string, time: Date | number, message = "Alarm"): AlarmSnapshot {
    assertFeature(this.capabilities(), "alarm");

    const at = time instanceof Date ? time.getTime() : time;
    const now = this.clock.now();
    if (!Number.isFinite(at)) {
      throw new InvalidTimeError("Alarm time is not a valid instant.");
    }
    if (at <= now) {
      throw new InvalidTimeError();
    }

    this.clearLocal(id);

    const alarm: ActiveAlarm = {
      id,
      time: at,
      message,
      created: now,
      deadline: scheduleAt(this.clock, at, () => this.fire(id))
    };
    this.alarms.set(id, alarm);
    this.post({ type: "SCHEDULE_ALARM", data: { id, time: at, message } });

    console.log(`Alarm '${id}' set for ${formatISO(at)}`);
    return this.snapshot(alarm);
  }

  cancel(id: string): boolean {
    assertFeature(this.capabilities(), "alarm");

    const cleared = this.clearLocal(id);
    this.post({ type: "CANCEL_ALARM", data: { id } });
    if (cleared) {
      console.log(`Alarm '${id}' cleared`);
    }
    return cleared;
  }

  /**
   * Re-arms a ringing alarm five minutes from now under its snooze id, keeping
   * its message unless one is given. Returns undefined when `id` is not ringing.
   */
  snooze(id: string, message?: string): AlarmSnapshot | undefined {
    assertFeature(this.capabilities(), "alarm");

    const ringingMessage = this.ringingMessage(id);
    if (ringingMessage === undefined) {
      return undefined;
    }
    this.ringing.delete(id);
    this.gateway.dismiss(alarmTag(id));
    return this.set(snoozeIdFor(id), this.clock.now() + SNOOZE_MS, message ?? ringingMessage);
  }

  dismiss(id: string): boolean {
    assertFeature(this.capabilities(), "alarm");
    const wasRinging = this.ringing.delete(id);
    const closed = this.gateway.dismiss(alarmTag(id));
    return wasRinging || closed;
  }

  get(id: string): AlarmSnapshot | undefined {
    const alarm = this.alarms.get(id);
    return alarm ? this.snapshot(alarm) : undefined;
  }

  list(): AlarmSnapshot[] {
    return [...this.alarms.values()].map(alarm => this.snapshot(alarm));
  }

  /** Drops local deadlines only; the relay keeps its copies. */
  dispose(): void {
    for (const alarm of this.alarms.values()) {
      alarm.deadline.cancel();
    }
    this.alarms.clear();
    this.ringing.clear();
    this.stopWatchingTray();
    this.relay = null;
  }

  /** The relay may have shown the alarm after this session's record was gone. */
  private ringingMessage(id: string): string | undefined {
    const local = this.ringing.get(id);
    if (local !== undefined) {
      return local;
    }
    const shown = this.gateway.shownData(alarmTag(id));
    return shown?.kind === "alarm" ? shown.message : undefined;
  }

  private clearLocal(id: string): boolean {
    const alarm = this.alarms.get(id);
    if (!alarm) {
      return false;
    }
    alarm.deadline.cancel();
    this.alarms.delete(id);
    return true;
  }

  private fire(id: string): void {
    const alarm = this.alarms.get(id);
    if (!alarm) {
      return;
    }
    this.alarms.delete(id);
    this.ringing.set(id, alarm.message);
    this.post({ type: "CANCEL_ALARM", data: { id } });

    this.announce(alarm).catch(error => {
      console.error(`Failed to announce alarm '${id}':`, error);
    });
  }

  private async announce(alarm: ActiveAlarm): Promise<void> {
    console.log(`ALARM: ${alarm.message} (scheduled for ${formatISO(alarm.time)})`);

    const tag = alarmTag(alarm.id);
    await this.gateway.deliver({
      title: ALARM_TITLE,
      body: alarm.message,
      tag,
      urgent: true,
      vibrate: ALARM_VIBRATION,
      actions: ALARM_ACTIONS,
      data: { kind: "alarm", id: alarm.id, message: alarm.message, firesAt: alarm.time }
    });
    await this.gateway.playCue("alarm", tag);

    this.chat.addMessage(`🚨 Alarm: ${alarm.message}`, "system");
    this.emitter.emit("fired", this.snapshot(alarm));
  }

  private post(message: RelayMessage): void {
    if (!this.relay || this.relay.closed) {
      return;
    }
    this.relay.post(message);
  }

  private snapshot(alarm: ActiveAlarm): AlarmSnapshot {
    return {
      id: alarm.id,
      time: new Date(alarm.time),
      message: alarm.message,
      created: new Date(alarm.created)
    };
  }
}
