import { EventEmitter } from "node:events";
import { assertFeature } from "../capabilities.js";
import { scheduleAt, type Clock, type Deadline, type TimerHandle } from "../clock.js";
import { InvalidDurationError } from "../errors.js";
import type { DeliveryGateway } from "../notifications/deliveryGateway.js";
import { TIMER_TITLE, TIMER_VIBRATION, timerTag } from "../notifications/notices.js";
import type { CapabilityProfile, ChatSurface, TimerSnapshot } from "../types.js";

const TICK_MS = 1000;

interface ActiveTimer {
  id: string;
  durationSeconds: number;
  startedAt: number;
  endsAt: number;
  message: string;
  deadline: Deadline;
  tick: TimerHandle | null;
}

type TimerEvents = {
  tick: (timer: TimerSnapshot) => void;
  complete: (timer: TimerSnapshot) => void;
};

interface TimerSchedulerOptions {
  clock: Clock;
  gateway: DeliveryGateway;
  chat: ChatSurface;
  capabilities: () => CapabilityProfile;
}

export function remainingSeconds(endsAt: number, now: number): number {
  return Math.max(0, Math.ceil((endsAt - now) / 1000));
}

export class TimerScheduler {
  private readonly emitter = new EventEmitter();
  private readonly timers = new Map<string, ActiveTimer>();
  private readonly clock: Clock;
  private readonly gateway: DeliveryGateway;
  private readonly chat: ChatSurface;
  private readonly capabilities: () => CapabilityProfile;

  constructor(options: TimerSchedulerOptions) {
    this.clock = options.clock;
    this.gateway = options.gateway;
    this.chat = options.chat;
    this.capabilities = options.capabilities;
  }

  on<T extends keyof TimerEvents>(event: T, listener: TimerEvents[T]): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  start(id: string, durationSeconds: number, message = "Timer finished"): TimerSnapshot {
    assertFeature(this.capabilities(), "timer");

    if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
      throw new InvalidDurationError();
    }

    this.clearLocal(id);

    const startedAt = this.clock.now();
    const endsAt = startedAt + durationSeconds * 1000;
    const timer: ActiveTimer = {
      id,
      durationSeconds,
      startedAt,
      endsAt,
      message,
      deadline: scheduleAt(this.clock, endsAt, () => this.complete(id)),
      tick: null
    };
    this.timers.set(id, timer);
    this.tick(id);

    console.log(`Timer '${id}' started for ${durationSeconds} seconds`);
    return this.snapshot(timer);
  }

  clear(id: string): boolean {
    assertFeature(this.capabilities(), "timer");

    const cleared = this.clearLocal(id);
    if (cleared) {
      console.log(`Timer '${id}' cleared`);
    }
    return cleared;
  }

  remaining(id: string): number | undefined {
    const timer = this.timers.get(id);
    return timer ? remainingSeconds(timer.endsAt, this.clock.now()) : undefined;
  }

  list(): TimerSnapshot[] {
    return [...this.timers.values()].map(timer => this.snapshot(timer));
  }

  dispose(): void {
    for (const id of [...this.timers.keys()]) {
      this.clearLocal(id);
    }
  }

  /**
   * Re-derives the remaining time from the end instant on every tick, so a
   * late or skipped callback never drifts the countdown.
   */
  private tick(id: string): void {
    const timer = this.timers.get(id);
    if (!timer) {
      return;
    }

    const remaining = remainingSeconds(timer.endsAt, this.clock.now());
    this.emitter.emit("tick", this.snapshot(timer));
    timer.tick = remaining > 0 ? this.clock.setTimeout(() => this.tick(id), TICK_MS) : null;
  }

  private clearLocal(id: string): boolean {
    const timer = this.timers.get(id);
    if (!timer) {
      return false;
    }
    timer.deadline.cancel();
    if (timer.tick !== null) {
      this.clock.clearTimeout(timer.tick);
    }
    this.timers.delete(id);
    return true;
  }

  private complete(id: string): void {
    const timer = this.timers.get(id);
    if (!timer) {
      return;
    }
    if (timer.tick !== null) {
      this.clock.clearTimeout(timer.tick);
    }
    this.timers.delete(id);

    const snapshot: TimerSnapshot = { ...this.snapshot(timer), remaining: 0 };
    this.emitter.emit("complete", snapshot);
    this.announce(timer).catch(error => {
      console.error(`Failed to announce timer '${id}':`, error);
    });
  }

  private async announce(timer: ActiveTimer): Promise<void> {
    console.log(`TIMER FINISHED: ${timer.message} (${timer.durationSeconds}s)`);

    await this.gateway.deliver({
      title: TIMER_TITLE,
      body: timer.message,
      tag: timerTag(timer.id),
      urgent: true,
      vibrate: TIMER_VIBRATION,
      data: { kind: "timer", id: timer.id, message: timer.message, firesAt: timer.endsAt }
    });
    await this.gateway.playCue("timer");

    this.chat.addMessage(`⏰ Timer finished: ${timer.message}`, "system");
  }

  private snapshot(timer: ActiveTimer): TimerSnapshot {
    return {
      id: timer.id,
      duration: timer.durationSeconds,
      remaining: remainingSeconds(timer.endsAt, this.clock.now()),
      message: timer.message,
      endTime: new Date(timer.endsAt)
    };
  }
}
