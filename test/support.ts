import { setImmediate as nextMacrotask } from "node:timers/promises";
import type { Clock, TimerHandle } from "../src/clock.js";
import { DEFAULT_ASSETS } from "../src/config.js";
import { TimingEngine } from "../src/engine.js";
import { NotificationCenter } from "../src/notifications/notificationCenter.js";
import { BackgroundRelay } from "../src/relay/backgroundRelay.js";
import type { ChatSurface, DeviceOutputs, PermissionState, PlatformSignals, SoundHandle } from "../src/types.js";

export const START = Date.UTC(2026, 9, 18, 9, 0, 0);

export const MOBILE_SIGNALS: PlatformSignals = {
  userAgent: "Mozilla/5.0 (iPhone; CPU iPhone OS 17_5 like Mac OS X) AppleWebKit/605.1.15 Mobile/15E148",
  touchPoints: 5,
  viewportWidth: 390,
  viewportHeight: 844
};

export const DESKTOP_SIGNALS: PlatformSignals = {
  userAgent: "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 Chrome/126.0 Safari/537.36",
  touchPoints: 0,
  viewportWidth: 1920,
  viewportHeight: 1080
};

interface PendingTimeout {
  at: number;
  seq: number;
  callback: () => void;
}

/** Runs due callbacks in deadline order, then insertion order, as time is advanced. */
export class ManualClock implements Clock {
  private current: number;
  private seq = 0;
  private readonly pending = new Map<number, PendingTimeout>();

  constructor(start = START) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  setTimeout(callback: () => void, delayMs: number): TimerHandle {
    this.seq += 1;
    this.pending.set(this.seq, { at: this.current + Math.max(delayMs, 0), seq: this.seq, callback });
    return this.seq;
  }

  clearTimeout(handle: TimerHandle): void {
    if (typeof handle === "number") {
      this.pending.delete(handle);
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      let next: PendingTimeout | undefined;
      for (const entry of this.pending.values()) {
        if (entry.at > target) {
          continue;
        }
        if (!next || entry.at < next.at || (entry.at === next.at && entry.seq < next.seq)) {
          next = entry;
        }
      }
      if (!next) {
        break;
      }
      this.pending.delete(next.seq);
      this.current = next.at;
      next.callback();
    }
    this.current = target;
  }
}

export class RecordingChat implements ChatSurface {
  readonly messages: string[] = [];

  addMessage(text: string): void {
    this.messages.push(text);
  }
}

export interface RecordedSound {
  src: string;
  loop: boolean;
  volume: number;
  stopped: boolean;
}

export class RecordingOutputs implements DeviceOutputs {
  readonly vibrations: number[][] = [];
  readonly sounds: RecordedSound[] = [];
  failVibration = false;

  vibrate(pattern: number[]): boolean {
    if (this.failVibration) {
      throw new Error("vibration unavailable");
    }
    this.vibrations.push([...pattern]);
    return true;
  }

  async playSound(src: string, options: { loop: boolean; volume: number }): Promise<SoundHandle> {
    const sound: RecordedSound = { src, ...options, stopped: false };
    this.sounds.push(sound);
    return {
      stop() {
        sound.stopped = true;
      }
    };
  }
}

/** Lets pending promise chains run to completion. */
export async function settle(): Promise<void> {
  await nextMacrotask();
}

export function nextEvent<T>(subscribe: (listener: (value: T) => void) => () => void): Promise<T> {
  return new Promise(resolve => {
    const off = subscribe(value => {
      off();
      resolve(value);
    });
  });
}

export function createHarness(options: { signals?: PlatformSignals; permission?: PermissionState; relay?: boolean } = {}) {
  const clock = new ManualClock();
  const center = new NotificationCenter({ permission: options.permission ?? "granted", clock });
  const relay = options.relay ? new BackgroundRelay({ center, assets: DEFAULT_ASSETS, clock }) : undefined;
  const chat = new RecordingChat();
  const outputs = new RecordingOutputs();
  const engine = new TimingEngine({
    signals: options.signals ?? MOBILE_SIGNALS,
    center,
    relay,
    chat,
    outputs,
    clock
  });

  return {
    clock,
    center,
    relay,
    chat,
    outputs,
    engine,
    cleanup() {
      engine.dispose();
      relay?.close();
    }
  };
}
