import { EventEmitter } from "node:events";
import { MessageChannel, type MessagePort } from "node:worker_threads";
import { formatISO } from "date-fns";
import { scheduleAt, systemClock, type Clock, type Deadline } from "../clock.js";
import type { RelayRegistration } from "../notifications/deliveryGateway.js";
import type { NotificationActionEvent, NotificationCenter } from "../notifications/notificationCenter.js";
import {
  ALARM_ACTIONS,
  ALARM_TITLE,
  ALARM_VIBRATION,
  SNOOZED_ALARM_TITLE,
  SNOOZE_MS,
  alarmTag,
  isSameFiring,
  snoozeIdFor
} from "../notifications/notices.js";
import type { DisplayedNotification, NotificationAssets, NotificationData, NotificationOptions } from "../types.js";
import { relayMessageSchema, type CancelAlarmData, type ScheduleAlarmData } from "./messages.js";
import { MessagePortLink, type RelayLink } from "./relayLink.js";

interface ShadowAlarm {
  id: string;
  time: number;
  message: string;
  title: string;
  deadline: Deadline;
}

type RelayEvents = {
  scheduled: (alarm: ScheduleAlarmData) => void;
  cancelled: (id: string) => void;
  fired: (notification: DisplayedNotification) => void;
  skipped: (tag: string) => void;
  snoozed: (alarm: ScheduleAlarmData) => void;
};

/** What a session needs from the relay: a message channel and a registration. */
export interface RelayHost extends RelayRegistration {
  connect(): RelayLink;
}

interface BackgroundRelayOptions {
  center: NotificationCenter;
  assets: NotificationAssets;
  clock?: Clock;
}

/**
 * Process-wide stand-in for the page's service worker. It keeps its own copy
 * of every alarm deadline, fed only by messages, so alarms still fire after
 * the session that set them is gone. It also owns notification interactions,
 * which lets a snooze be honoured without any session connected.
 */
export class BackgroundRelay implements RelayHost {
  private readonly emitter = new EventEmitter();
  private readonly shadows = new Map<string, ShadowAlarm>();
  private readonly ports = new Set<MessagePort>();
  private readonly center: NotificationCenter;
  private readonly assets: NotificationAssets;
  private readonly clock: Clock;

  constructor(options: BackgroundRelayOptions) {
    this.center = options.center;
    this.assets = options.assets;
    this.clock = options.clock ?? systemClock;
    this.center.setActionHandler(event => this.handleNotificationAction(event));
  }

  on<T extends keyof RelayEvents>(event: T, listener: RelayEvents[T]): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  connect(): RelayLink {
    const { port1, port2 } = new MessageChannel();
    port2.on("message", (raw: unknown) => this.handleMessage(raw));
    port2.once("close", () => {
      this.ports.delete(port2);
    });
    this.ports.add(port2);
    return new MessagePortLink(port1);
  }

  handleMessage(raw: unknown): void {
    const parsed = relayMessageSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn("Background relay ignored a malformed message:", parsed.error.issues);
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case "SCHEDULE_ALARM":
        this.scheduleAlarm(message.data);
        break;
      case "CANCEL_ALARM":
        this.cancelAlarm(message.data);
        break;
    }
  }

  scheduleAlarm(alarm: ScheduleAlarmData, title = ALARM_TITLE): boolean {
    if (alarm.time - this.clock.now() <= 0) {
      console.log(`Background relay ignored past alarm '${alarm.id}'`);
      return false;
    }

    this.shadows.get(alarm.id)?.deadline.cancel();
    this.shadows.delete(alarm.id);
    this.shadows.set(alarm.id, {
      ...alarm,
      title,
      deadline: scheduleAt(this.clock, alarm.time, () => this.fire(alarm.id))
    });

    console.log(`Background alarm scheduled: ${alarm.id} for ${formatISO(alarm.time)}`);
    this.emitter.emit("scheduled", { ...alarm });
    return true;
  }

  cancelAlarm({ id }: CancelAlarmData): boolean {
    const shadow = this.shadows.get(id);
    if (!shadow) {
      return false;
    }
    shadow.deadline.cancel();
    this.shadows.delete(id);
    console.log(`Background alarm cancelled: ${id}`);
    this.emitter.emit("cancelled", id);
    return true;
  }

  listShadows(): ScheduleAlarmData[] {
    return [...this.shadows.values()].map(({ id, time, message }) => ({ id, time, message }));
  }

  async showNotification(title: string, options: NotificationOptions): Promise<void> {
    await this.center.show(title, options, "background");
  }

  async handleNotificationAction({ notification, action }: NotificationActionEvent): Promise<void> {
    this.center.close(notification.tag);

    switch (action) {
      case "snooze": {
        if (notification.data?.kind !== "alarm") {
          return;
        }
        const alarm: ScheduleAlarmData = {
          id: snoozeIdFor(notification.data.id),
          time: this.clock.now() + SNOOZE_MS,
          message: notification.data.message
        };
        if (this.scheduleAlarm(alarm, SNOOZED_ALARM_TITLE)) {
          console.log("Alarm snoozed for 5 minutes");
          this.emitter.emit("snoozed", alarm);
        }
        return;
      }
      case "dismiss":
        return;
      case "open":
        console.log(`Notification '${notification.tag}' opened`);
        return;
    }
  }

  close(): void {
    for (const shadow of this.shadows.values()) {
      shadow.deadline.cancel();
    }
    this.shadows.clear();
    for (const port of this.ports) {
      port.close();
    }
    this.ports.clear();
    this.center.setActionHandler(null);
  }

  private fire(id: string): void {
    const shadow = this.shadows.get(id);
    if (!shadow) {
      return;
    }
    this.shadows.delete(id);
    this.showAlarm(shadow).catch(error => {
      console.error(`Background alarm '${id}' could not be shown:`, error);
    });
  }

  private async showAlarm(shadow: ShadowAlarm): Promise<void> {
    const tag = alarmTag(shadow.id);
    const data: NotificationData = { kind: "alarm", id: shadow.id, message: shadow.message, firesAt: shadow.time };
    if (this.center.getNotifications({ tag }).some(shown => isSameFiring(shown.data, data))) {
      this.emitter.emit("skipped", tag);
      return;
    }
    if (this.center.permission !== "granted") {
      console.warn(`Notification permission not granted, background alarm '${shadow.id}' dropped`);
      return;
    }

    const notification = await this.center.show(
      shadow.title,
      {
        body: shadow.message,
        tag,
        icon: this.assets.icon,
        badge: this.assets.badge,
        requireInteraction: true,
        vibrate: ALARM_VIBRATION,
        actions: ALARM_ACTIONS,
        data
      },
      "background"
    );
    this.emitter.emit("fired", notification);
  }
}
