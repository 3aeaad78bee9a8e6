/**
 * Streaming platform detection for release lines such as
 * "Some Film (Netflix)".
 *
 * Detectors are evaluated in declaration order and the first match wins, so
 * broader patterns must come after the specific ones they could shadow.
 */

export const UNKNOWN_PLATFORM = "Unknown";

interface PlatformDetector {
  label: string;
  pattern: RegExp;
}

const PLATFORM_DETECTORS = [
  { label: "Netflix", pattern: /\(Netflix\)/i },
  { label: "Prime Video", pattern: /\(Prime Video\)/i },
  // "(Max)" is the service's post-rebrand name. A bare "Max)" would also
  // catch "(IMAX)" screenings.
  { label: "HBO Max", pattern: /\((?:HBO )?Max\)/i },
  { label: "Hulu", pattern: /\(Hulu\)/i },
  { label: "Disney+", pattern: /\(Disney\+\)/i },
  { label: "Paramount+", pattern: /\(Paramount\+\)/i },
  { label: "Apple TV", pattern: /\(Apple TV\)/i },
  { label: "Peacock", pattern: /\(Peacock\)/i },
  { label: "Shudder", pattern: /\(Shudder\)/i },
  { label: "Starz", pattern: /\(Starz\)/i },
  { label: "MUBI", pattern: /\(MUBI\)/i },
  { label: "VOD/Digital", pattern: /\(VOD\/Digital\)|\(PVOD\)/i },
  { label: "MGM+", pattern: /\(MGM\+\)/i },
  { label: "Criterion", pattern: /\(Criterion\)/i },
  { label: "Tubi", pattern: /\(Tubi\)/i },
] as const satisfies readonly PlatformDetector[];

export type StreamingPlatform = (typeof PLATFORM_DETECTORS)[number]["label"];

export type Platform = StreamingPlatform | typeof UNKNOWN_PLATFORM;

export const STREAMING_PLATFORMS: readonly StreamingPlatform[] = PLATFORM_DETECTORS.map(
  (d) => d.label,
);

export function classifyPlatform(line: string): Platform {
  for (const detector of PLATFORM_DETECTORS) {
    if (detector.pattern.test(line)) return detector.label;
  }
  return UNKNOWN_PLATFORM;
}

/**
 * Map a bare platform name ("Netflix", "Max") onto a label using the same
 * detector table as release lines.
 */
export function normalizePlatformName(name: string): Platform {
  return classifyPlatform(`(${name.trim()})`);
}

/** Generic placeholders that a later, specific sighting should replace. */
export function isPlaceholderPlatform(platform: string): boolean {
  return platform === "VOD/Digital" || platform === UNKNOWN_PLATFORM;
}
