import { classify } from "./capabilities.js";
import { systemClock, type Clock } from "./clock.js";
import { DEFAULT_ASSETS } from "./config.js";
import { DeliveryGateway } from "./notifications/deliveryGateway.js";
import type { NotificationCenter } from "./notifications/notificationCenter.js";
import type { RelayHost } from "./relay/backgroundRelay.js";
import type { RelayLink } from "./relay/relayLink.js";
import { AlarmScheduler } from "./state/alarmScheduler.js";
import { StopwatchTracker } from "./state/stopwatchTracker.js";
import { TimerScheduler } from "./state/timerScheduler.js";
import type {
  CapabilityProfile,
  ChatSurface,
  DeviceOutputs,
  NotificationAssets,
  PlatformSignals,
  Visibility
} from "./types.js";

export interface TimingEngineOptions {
  signals: PlatformSignals;
  center: NotificationCenter;
  chat: ChatSurface;
  outputs: DeviceOutputs;
  relay?: RelayHost;
  clock?: Clock;
  assets?: NotificationAssets;
}

/**
 * Everything time-based for one chat session. Construct it when the session
 * opens, `initialize()` once, and `dispose()` when it closes; alarms already
 * handed to the relay keep firing after that.
 */
export class TimingEngine {
  readonly alarms: AlarmScheduler;
  readonly timers: TimerScheduler;
  readonly stopwatches: StopwatchTracker;
  readonly gateway: DeliveryGateway;
  readonly clock: Clock;

  private readonly signals: PlatformSignals;
  private readonly center: NotificationCenter;
  private readonly relay?: RelayHost;
  private profile: CapabilityProfile;
  private link: RelayLink | null = null;
  private initializing: Promise<CapabilityProfile> | null = null;
  private disposed = false;

  constructor(options: TimingEngineOptions) {
    const clock = options.clock ?? systemClock;
    this.clock = clock;
    this.signals = options.signals;
    this.center = options.center;
    this.relay = options.relay;
    this.profile = classify(options.signals, { permission: options.center.permission });

    this.gateway = new DeliveryGateway({
      center: options.center,
      outputs: options.outputs,
      clock,
      assets: options.assets ?? DEFAULT_ASSETS,
      profile: () => this.profile
    });

    const capabilities = () => this.capabilities();
    this.alarms = new AlarmScheduler({ clock, gateway: this.gateway, chat: options.chat, capabilities });
    this.timers = new TimerScheduler({ clock, gateway: this.gateway, chat: options.chat, capabilities });
    this.stopwatches = new StopwatchTracker({ clock, capabilities });
  }

  initialize(): Promise<CapabilityProfile> {
    if (!this.initializing) {
      this.initializing = this.setUp();
    }
    return this.initializing;
  }

  capabilities(): CapabilityProfile {
    return { ...this.profile, permission: this.center.permission };
  }

  get visibility(): Visibility {
    return this.gateway.visibility;
  }

  setVisibility(visibility: Visibility): void {
    if (visibility === this.gateway.visibility) {
      return;
    }
    this.gateway.setVisibility(visibility);
    console.log(`Switched to ${visibility === "hidden" ? "background" : "foreground"} notification mode`);
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.alarms.dispose();
    this.timers.dispose();
    this.stopwatches.dispose();
    this.gateway.dispose();
    this.link?.close();
    this.link = null;
  }

  private async setUp(): Promise<CapabilityProfile> {
    await this.gateway.requestPermission();

    if (this.relay && !this.disposed) {
      this.link = this.relay.connect();
      this.alarms.attachRelay(this.link);
      this.gateway.attachRelay(this.relay);
    }

    this.profile = classify(this.signals, {
      permission: this.center.permission,
      backgroundRelay: this.link !== null
    });
    console.log(
      `Timing engine initialized - Mobile: ${this.profile.isMobile}, Permission: ${this.profile.permission}`
    );
    return this.capabilities();
  }
}
