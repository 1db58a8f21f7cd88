export type PermissionState = "unset" | "granted" | "denied";

export type Visibility = "visible" | "hidden";

export type TimingFeature = "alarm" | "timer" | "stopwatch" | "notifications";

export interface PlatformSignals {
  userAgent: string;
  touchPoints: number;
  hasTouchEvents?: boolean;
  viewportWidth?: number;
  viewportHeight?: number;
  vibration?: boolean;
  mobileHint?: boolean;
}

export interface CapabilityProfile {
  isMobile: boolean;
  permission: PermissionState;
  haptics: boolean;
  backgroundRelay: boolean;
}

export interface AlarmSnapshot {
  id: string;
  time: Date;
  message: string;
  created: Date;
}

export interface TimerSnapshot {
  id: string;
  duration: number;
  remaining: number;
  message: string;
  endTime: Date;
}

export interface LapRecord {
  lapNumber: number;
  elapsedMs: number;
  timestamp: Date;
}

export interface StopwatchSnapshot {
  id: string;
  elapsedMs: number;
  formatted: string;
  isRunning: boolean;
  laps: LapRecord[];
}

export type NotificationActionName = "snooze" | "dismiss";

export interface NotificationAction {
  action: NotificationActionName;
  title: string;
}

export interface NotificationData {
  kind: "alarm" | "timer";
  id: string;
  message: string;
  /** The scheduled instant of the firing this notification announces. */
  firesAt: number;
}

export interface NotificationOptions {
  body: string;
  tag: string;
  icon?: string;
  badge?: string;
  requireInteraction: boolean;
  vibrate: number[];
  actions?: NotificationAction[];
  data?: NotificationData;
}

export type NotificationOrigin = "foreground" | "background";

export interface DisplayedNotification extends NotificationOptions {
  title: string;
  origin: NotificationOrigin;
  shownAt: Date;
}

export interface NotificationAssets {
  icon: string;
  badge: string;
  alarmSound: string;
  timerSound: string;
}

/** Where system-authored messages land in the conversation. */
export interface ChatSurface {
  addMessage(text: string, role: "system"): void;
}

export interface SoundHandle {
  stop(): void;
}

/** Haptics and audio on the device that hosts the chat page. */
export interface DeviceOutputs {
  vibrate(pattern: number[]): boolean;
  playSound(src: string, options: { loop: boolean; volume: number }): Promise<SoundHandle>;
}

export interface CommandResult<T> {
  message: string;
  data: T;
}
