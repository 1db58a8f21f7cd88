import type { TimingFeature } from "./types.js";

export type TimingErrorCode =
  | "capability_denied"
  | "invalid_time"
  | "invalid_duration"
  | "permission_denied"
  | "delivery_failed"
  | "invalid_config";

export abstract class TimingError extends Error {
  abstract readonly code: TimingErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

const FEATURE_LABELS: Record<TimingFeature, string> = {
  alarm: "Alarms",
  timer: "Timers",
  stopwatch: "Stopwatches",
  notifications: "Notifications"
};

export class CapabilityDeniedError extends TimingError {
  readonly code = "capability_denied" as const;

  constructor(readonly feature: TimingFeature) {
    super(`${FEATURE_LABELS[feature]} are only available on mobile devices.`);
  }
}

export class InvalidTimeError extends TimingError {
  readonly code = "invalid_time" as const;

  constructor(message = "Alarm time must be in the future.") {
    super(message);
  }
}

export class InvalidDurationError extends TimingError {
  readonly code = "invalid_duration" as const;

  constructor(message = "Timer duration must be positive.") {
    super(message);
  }
}

export class PermissionDeniedError extends TimingError {
  readonly code = "permission_denied" as const;

  constructor() {
    super("Notification permission not granted.");
  }
}

export class DeliveryFailure extends TimingError {
  readonly code = "delivery_failed" as const;

  constructor(readonly tag: string, cause: unknown) {
    super(`Could not show notification '${tag}'.`, { cause });
  }
}

export class ConfigError extends TimingError {
  readonly code = "invalid_config" as const;

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

export function isTimingError(error: unknown): error is TimingError {
  return error instanceof TimingError;
}
