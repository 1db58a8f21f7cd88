import type { IncomingHttpHeaders } from "node:http";
import { CapabilityDeniedError } from "./errors.js";
import type { CapabilityProfile, PermissionState, PlatformSignals, TimingFeature } from "./types.js";

const MOBILE_PATTERNS = [
  /android/i,
  /webos/i,
  /iphone/i,
  /ipad/i,
  /ipod/i,
  /blackberry/i,
  /windows phone/i,
  /mobile/i,
  /tablet/i
];

const SMALL_VIEWPORT_PX = 768;

const MOBILE_ONLY_FEATURES: readonly TimingFeature[] = ["alarm", "timer", "stopwatch"];

/**
 * Phones and tablets either announce themselves in the user agent or, when a
 * browser misreports it, look like a small touch screen held in portrait.
 */
export function isMobileDevice(signals: PlatformSignals): boolean {
  const isMobileUA = MOBILE_PATTERNS.some(pattern => pattern.test(signals.userAgent));

  const hasTouch = signals.touchPoints > 0 || signals.hasTouchEvents === true;
  const { viewportWidth: width, viewportHeight: height } = signals;
  const isSmallScreen =
    (width !== undefined && width <= SMALL_VIEWPORT_PX) || (height !== undefined && height <= SMALL_VIEWPORT_PX);
  const isPortrait = width !== undefined && height !== undefined && height > width;

  return isMobileUA || signals.mobileHint === true || (hasTouch && isSmallScreen && isPortrait);
}

export function classify(
  signals: PlatformSignals,
  context: { permission?: PermissionState; backgroundRelay?: boolean } = {}
): CapabilityProfile {
  const isMobile = isMobileDevice(signals);
  return {
    isMobile,
    permission: context.permission ?? "unset",
    haptics: isMobile && signals.vibration !== false,
    backgroundRelay: context.backgroundRelay ?? false
  };
}

export function isFeatureAvailable(profile: CapabilityProfile, feature: TimingFeature): boolean {
  if (feature === "notifications") {
    return profile.permission !== "denied";
  }
  return !MOBILE_ONLY_FEATURES.includes(feature) || profile.isMobile;
}

export function assertFeature(profile: CapabilityProfile, feature: TimingFeature): void {
  if (!isFeatureAvailable(profile, feature)) {
    throw new CapabilityDeniedError(feature);
  }
}

/**
 * Reads platform signals from the request that opened an MCP session. The chat
 * page reports what headers cannot carry through `X-Viewport-*` and
 * `X-Touch-Points`.
 */
export function signalsFromHeaders(headers: IncomingHttpHeaders): PlatformSignals {
  return {
    userAgent: headerValue(headers["user-agent"]) ?? "",
    touchPoints: numericHeader(headers["x-touch-points"]) ?? 0,
    viewportWidth: numericHeader(headers["x-viewport-width"]),
    viewportHeight: numericHeader(headers["x-viewport-height"]),
    mobileHint: mobileHintHeader(headers["sec-ch-ua-mobile"])
  };
}

/** Structured-header boolean: `?1` or `?0`. */
function mobileHintHeader(value: string | string[] | undefined): boolean | undefined {
  switch (headerValue(value)?.trim()) {
    case "?1":
      return true;
    case "?0":
      return false;
    default:
      return undefined;
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function numericHeader(value: string | string[] | undefined): number | undefined {
  const raw = headerValue(value);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}
