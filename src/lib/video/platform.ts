import type { VideoPlatform } from "../types";

interface PlatformRule {
  platform: Exclude<VideoPlatform, "other">;
  domains: readonly string[];
}

// Evaluated in order; the first rule whose domain appears in the host wins.
const PLATFORM_RULES: readonly PlatformRule[] = [
  { platform: "youtube", domains: ["youtube.com", "youtu.be"] },
  { platform: "instagram", domains: ["instagram.com"] },
  { platform: "tiktok", domains: ["tiktok.com"] },
  { platform: "facebook", domains: ["facebook.com", "fb.watch"] },
  { platform: "vimeo", domains: ["vimeo.com"] },
];

export const VIDEO_DOMAINS: readonly string[] = PLATFORM_RULES.flatMap((rule) => rule.domains);

function hostOf(url: string): string {
  const withScheme = /^https?:\/\//i.test(url) ? url : `https://${url}`;
  try {
    return new URL(withScheme).hostname.toLowerCase();
  } catch {
    return "";
  }
}

export function detectPlatform(url: string): VideoPlatform {
  const host = hostOf(url);
  const rule = PLATFORM_RULES.find((r) => r.domains.some((domain) => host.includes(domain)));
  return rule ? rule.platform : "other";
}

export function isVideoUrl(url: string): boolean {
  const host = hostOf(url);
  return host !== "" && VIDEO_DOMAINS.some((domain) => host.includes(domain));
}
