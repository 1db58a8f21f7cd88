import { EventEmitter } from "node:events";
import { assertFeature } from "../capabilities.js";
import type { Clock, TimerHandle } from "../clock.js";
import { formatElapsed } from "../format.js";
import type { CapabilityProfile, LapRecord, StopwatchSnapshot } from "../types.js";

export const DISPLAY_INTERVAL_MS = 100;

interface ActiveStopwatch {
  id: string;
  running: boolean;
  accumulatedMs: number;
  segmentStartedAt: number;
  laps: LapRecord[];
  display: TimerHandle | null;
}

type StopwatchEvents = {
  update: (update: { id: string; elapsedMs: number }) => void;
};

interface StopwatchTrackerOptions {
  clock: Clock;
  capabilities: () => CapabilityProfile;
}

export class StopwatchTracker {
  private readonly emitter = new EventEmitter();
  private readonly stopwatches = new Map<string, ActiveStopwatch>();
  private readonly clock: Clock;
  private readonly capabilities: () => CapabilityProfile;

  constructor(options: StopwatchTrackerOptions) {
    this.clock = options.clock;
    this.capabilities = options.capabilities;
  }

  on<T extends keyof StopwatchEvents>(event: T, listener: StopwatchEvents[T]): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  start(id: string): StopwatchSnapshot {
    assertFeature(this.capabilities(), "stopwatch");

    const previous = this.stopwatches.get(id);
    if (previous) {
      this.stopDisplay(previous);
    }

    const stopwatch: ActiveStopwatch = {
      id,
      running: true,
      accumulatedMs: 0,
      segmentStartedAt: this.clock.now(),
      laps: [],
      display: null
    };
    this.stopwatches.set(id, stopwatch);
    this.startDisplay(stopwatch);

    console.log(`Stopwatch '${id}' started`);
    return this.snapshot(stopwatch);
  }

  pause(id: string): boolean {
    assertFeature(this.capabilities(), "stopwatch");

    const stopwatch = this.stopwatches.get(id);
    if (!stopwatch || !stopwatch.running) {
      return false;
    }
    stopwatch.accumulatedMs += this.clock.now() - stopwatch.segmentStartedAt;
    stopwatch.running = false;
    this.stopDisplay(stopwatch);
    console.log(`Stopwatch '${id}' paused`);
    return true;
  }

  resume(id: string): boolean {
    assertFeature(this.capabilities(), "stopwatch");

    const stopwatch = this.stopwatches.get(id);
    if (!stopwatch || stopwatch.running) {
      return false;
    }
    stopwatch.segmentStartedAt = this.clock.now();
    stopwatch.running = true;
    this.startDisplay(stopwatch);
    console.log(`Stopwatch '${id}' resumed`);
    return true;
  }

  lap(id: string): LapRecord | undefined {
    assertFeature(this.capabilities(), "stopwatch");

    const stopwatch = this.stopwatches.get(id);
    if (!stopwatch) {
      return undefined;
    }
    const now = this.clock.now();
    const lap: LapRecord = {
      lapNumber: stopwatch.laps.length + 1,
      elapsedMs: this.elapsedOf(stopwatch, now),
      timestamp: new Date(now)
    };
    stopwatch.laps.push(lap);
    console.log(`Stopwatch '${id}' lap ${lap.lapNumber}: ${formatElapsed(lap.elapsedMs)}`);
    return { ...lap };
  }

  reset(id: string): boolean {
    assertFeature(this.capabilities(), "stopwatch");

    const stopwatch = this.stopwatches.get(id);
    if (!stopwatch) {
      return false;
    }
    stopwatch.segmentStartedAt = this.clock.now();
    stopwatch.accumulatedMs = 0;
    stopwatch.laps = [];
    console.log(`Stopwatch '${id}' reset`);
    return true;
  }

  stop(id: string): number | undefined {
    assertFeature(this.capabilities(), "stopwatch");

    const stopwatch = this.stopwatches.get(id);
    if (!stopwatch) {
      return undefined;
    }
    const finalMs = this.elapsedOf(stopwatch, this.clock.now());
    this.stopDisplay(stopwatch);
    this.stopwatches.delete(id);
    console.log(`Stopwatch '${id}' stopped at ${formatElapsed(finalMs)}`);
    return finalMs;
  }

  elapsed(id: string): number | undefined {
    const stopwatch = this.stopwatches.get(id);
    return stopwatch ? this.elapsedOf(stopwatch, this.clock.now()) : undefined;
  }

  list(): StopwatchSnapshot[] {
    return [...this.stopwatches.values()].map(stopwatch => this.snapshot(stopwatch));
  }

  dispose(): void {
    for (const stopwatch of this.stopwatches.values()) {
      this.stopDisplay(stopwatch);
    }
    this.stopwatches.clear();
  }

  private elapsedOf(stopwatch: ActiveStopwatch, now: number): number {
    return stopwatch.accumulatedMs + (stopwatch.running ? now - stopwatch.segmentStartedAt : 0);
  }

  // Display feedback only; elapsed is always derived from the segment start.
  private startDisplay(stopwatch: ActiveStopwatch): void {
    const update = () => {
      if (this.stopwatches.get(stopwatch.id) !== stopwatch || !stopwatch.running) {
        stopwatch.display = null;
        return;
      }
      this.emitter.emit("update", { id: stopwatch.id, elapsedMs: this.elapsedOf(stopwatch, this.clock.now()) });
      stopwatch.display = this.clock.setTimeout(update, DISPLAY_INTERVAL_MS);
    };
    this.stopDisplay(stopwatch);
    update();
  }

  private stopDisplay(stopwatch: ActiveStopwatch): void {
    if (stopwatch.display !== null) {
      this.clock.clearTimeout(stopwatch.display);
      stopwatch.display = null;
    }
  }

  private snapshot(stopwatch: ActiveStopwatch): StopwatchSnapshot {
    const elapsedMs = this.elapsedOf(stopwatch, this.clock.now());
    return {
      id: stopwatch.id,
      elapsedMs,
      formatted: formatElapsed(elapsedMs),
      isRunning: stopwatch.running,
      laps: stopwatch.laps.map(lap => ({ ...lap }))
    };
  }
}
