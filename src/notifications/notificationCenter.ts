import { EventEmitter } from "node:events";
import { systemClock, type Clock } from "../clock.js";
import type {
  DisplayedNotification,
  NotificationActionName,
  NotificationOptions,
  NotificationOrigin,
  PermissionState
} from "../types.js";

export type NotificationInteraction = NotificationActionName | "open";

export interface NotificationActionEvent {
  notification: DisplayedNotification;
  action: NotificationInteraction;
}

export type NotificationActionHandler = (event: NotificationActionEvent) => void | Promise<void>;

type CenterEvents = {
  show: (notification: DisplayedNotification) => void;
  close: (notification: DisplayedNotification) => void;
  permission: (state: PermissionState) => void;
};

interface NotificationCenterOptions {
  permission?: PermissionState;
  prompt?: () => Promise<"granted" | "denied">;
  clock?: Clock;
}

/**
 * The device's notification tray. Both the per-session engines and the
 * background relay show notifications here; a tag identifies one visible
 * notification and showing the same tag again updates it in place.
 * Interactions with a notification are routed to a single action handler,
 * which the background relay claims.
 */
export class NotificationCenter {
  private readonly emitter = new EventEmitter();
  private readonly displayed = new Map<string, DisplayedNotification>();
  private readonly prompt?: () => Promise<"granted" | "denied">;
  private readonly clock: Clock;
  private state: PermissionState;
  private pendingPrompt: Promise<PermissionState> | null = null;
  private actionHandler: NotificationActionHandler | null = null;

  constructor(options: NotificationCenterOptions = {}) {
    this.state = options.permission ?? "unset";
    this.prompt = options.prompt;
    this.clock = options.clock ?? systemClock;
  }

  get permission(): PermissionState {
    return this.state;
  }

  on<T extends keyof CenterEvents>(event: T, listener: CenterEvents[T]): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  /**
   * Prompts at most once. A decided permission is terminal; concurrent callers
   * share the pending prompt.
   */
  async requestPermission(): Promise<PermissionState> {
    if (this.state !== "unset") {
      return this.state;
    }
    if (!this.prompt) {
      console.warn("This host cannot prompt for notification permission");
      return this.state;
    }

    if (!this.pendingPrompt) {
      const prompt = this.prompt;
      this.pendingPrompt = (async () => {
        try {
          const decision = await prompt();
          if (this.state === "unset") {
            this.state = decision;
            this.emitter.emit("permission", decision);
          }
        } catch (error) {
          console.error("Error requesting notification permission:", error);
        } finally {
          this.pendingPrompt = null;
        }
        return this.state;
      })();
    }

    return this.pendingPrompt;
  }

  async show(title: string, options: NotificationOptions, origin: NotificationOrigin): Promise<DisplayedNotification> {
    if (this.state !== "granted") {
      throw new Error("Notification permission has not been granted.");
    }

    const notification: DisplayedNotification = {
      ...options,
      vibrate: [...options.vibrate],
      actions: options.actions?.map(action => ({ ...action })),
      data: options.data ? { ...options.data } : undefined,
      title,
      origin,
      shownAt: new Date(this.clock.now())
    };

    this.displayed.delete(options.tag);
    this.displayed.set(options.tag, notification);
    this.emitter.emit("show", notification);
    return notification;
  }

  getNotifications(filter: { tag?: string } = {}): DisplayedNotification[] {
    if (filter.tag !== undefined) {
      const match = this.displayed.get(filter.tag);
      return match ? [match] : [];
    }
    return [...this.displayed.values()];
  }

  close(tag: string): boolean {
    const notification = this.displayed.get(tag);
    if (!notification) {
      return false;
    }
    this.displayed.delete(tag);
    this.emitter.emit("close", notification);
    return true;
  }

  setActionHandler(handler: NotificationActionHandler | null): void {
    this.actionHandler = handler;
  }

  /** The user interacted with a visible notification. */
  async performAction(tag: string, action: NotificationInteraction): Promise<boolean> {
    const notification = this.displayed.get(tag);
    if (!notification) {
      return false;
    }

    if (!this.actionHandler) {
      this.close(tag);
      return true;
    }

    await this.actionHandler({ notification, action });
    return true;
  }
}
