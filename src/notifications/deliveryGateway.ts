import { scheduleAt, type Clock, type Deadline } from "../clock.js";
import { DeliveryFailure, PermissionDeniedError } from "../errors.js";
import type {
  CapabilityProfile,
  DeviceOutputs,
  NotificationAction,
  NotificationAssets,
  NotificationData,
  NotificationOptions,
  SoundHandle,
  Visibility
} from "../types.js";
import type { NotificationCenter } from "./notificationCenter.js";
import { isSameFiring } from "./notices.js";

export const ALARM_CUE_CUTOFF_MS = 30_000;

export type AudioCue = "alarm" | "timer";

/** Shows notifications from the background context on behalf of a hidden page. */
export interface RelayRegistration {
  showNotification(title: string, options: NotificationOptions): Promise<void>;
}

export interface DeliveryRequest {
  title: string;
  body: string;
  tag: string;
  urgent: boolean;
  vibrate: number[];
  actions?: NotificationAction[];
  data?: NotificationData;
}

interface DeliveryGatewayOptions {
  center: NotificationCenter;
  outputs: DeviceOutputs;
  clock: Clock;
  assets: NotificationAssets;
  profile: () => Pick<CapabilityProfile, "isMobile" | "haptics">;
}

interface ActiveCue {
  tag?: string;
  handle: SoundHandle;
  cutoff: Deadline;
}

/**
 * The only path from the schedulers to the user. Owns the permission
 * transition and picks direct or relayed delivery from the page visibility.
 */
export class DeliveryGateway {
  private readonly center: NotificationCenter;
  private readonly outputs: DeviceOutputs;
  private readonly clock: Clock;
  private readonly assets: NotificationAssets;
  private readonly profile: () => Pick<CapabilityProfile, "isMobile" | "haptics">;
  private readonly unsubscribe: () => void;
  private registration: RelayRegistration | null = null;
  private currentVisibility: Visibility = "visible";
  private activeCue: ActiveCue | null = null;

  constructor(options: DeliveryGatewayOptions) {
    this.center = options.center;
    this.outputs = options.outputs;
    this.clock = options.clock;
    this.assets = options.assets;
    this.profile = options.profile;
    this.unsubscribe = this.center.on("close", notification => {
      if (this.activeCue?.tag === notification.tag) {
        this.stopCue();
      }
    });
  }

  get visibility(): Visibility {
    return this.currentVisibility;
  }

  setVisibility(visibility: Visibility): void {
    this.currentVisibility = visibility;
  }

  attachRelay(registration: RelayRegistration | null): void {
    this.registration = registration;
  }

  async requestPermission(): Promise<boolean> {
    const current = this.center.permission;
    if (current !== "unset") {
      return current === "granted";
    }
    const decided = await this.center.requestPermission();
    return decided === "granted";
  }

  async deliver(request: DeliveryRequest): Promise<boolean> {
    try {
      this.assertPermitted();
    } catch (error) {
      if (error instanceof PermissionDeniedError) {
        console.warn(`${error.message} Skipping '${request.tag}'.`);
        return false;
      }
      throw error;
    }

    if (this.center.getNotifications({ tag: request.tag }).some(shown => isSameFiring(shown.data, request.data))) {
      console.log(`Notification '${request.tag}' is already displayed`);
      return false;
    }

    const options: NotificationOptions = {
      body: request.body,
      tag: request.tag,
      icon: this.assets.icon,
      badge: this.assets.badge,
      requireInteraction: request.urgent,
      vibrate: request.vibrate,
      actions: request.actions,
      data: request.data
    };

    try {
      if (this.currentVisibility === "hidden" && this.registration) {
        await this.registration.showNotification(request.title, options);
      } else {
        await this.center.show(request.title, options, "foreground");
      }
    } catch (error) {
      const failure = new DeliveryFailure(request.tag, error);
      console.error("Error sending notification:", failure);
      return false;
    }

    this.vibrate(request.vibrate);
    return true;
  }

  /** Alarm cues loop until dismissed or cut off; timer cues play once. */
  async playCue(cue: AudioCue, tag?: string): Promise<void> {
    const src = cue === "alarm" ? this.assets.alarmSound : this.assets.timerSound;
    try {
      const handle = await this.outputs.playSound(src, {
        loop: cue === "alarm",
        volume: cue === "alarm" ? 0.8 : 0.6
      });
      if (cue !== "alarm") {
        return;
      }
      this.stopCue();
      this.activeCue = {
        tag,
        handle,
        cutoff: scheduleAt(this.clock, this.clock.now() + ALARM_CUE_CUTOFF_MS, () => this.stopCue())
      };
    } catch (error) {
      console.warn(`Could not play ${cue} sound:`, error);
    }
  }

  stopCue(): boolean {
    const cue = this.activeCue;
    if (!cue) {
      return false;
    }
    this.activeCue = null;
    cue.cutoff.cancel();
    try {
      cue.handle.stop();
    } catch (error) {
      console.warn("Could not stop sound:", error);
    }
    return true;
  }

  /** Data of the notification currently shown under `tag`, if any. */
  shownData(tag: string): NotificationData | undefined {
    return this.center.getNotifications({ tag })[0]?.data;
  }

  onClosed(listener: (tag: string) => void): () => void {
    return this.center.on("close", notification => listener(notification.tag));
  }

  /** Silences the cue and closes the visible notification for `tag`. */
  dismiss(tag: string): boolean {
    const stopped = this.activeCue?.tag === tag ? this.stopCue() : false;
    const closed = this.center.close(tag);
    return stopped || closed;
  }

  dispose(): void {
    this.stopCue();
    this.unsubscribe();
    this.registration = null;
  }

  private assertPermitted(): void {
    if (this.center.permission !== "granted") {
      throw new PermissionDeniedError();
    }
  }

  private vibrate(pattern: number[]): void {
    const profile = this.profile();
    if (!profile.isMobile || !profile.haptics) {
      return;
    }
    try {
      this.outputs.vibrate(pattern);
    } catch (error) {
      console.warn("Vibration failed:", error);
    }
  }
}
