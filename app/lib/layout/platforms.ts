import type { Platform } from "../types";

export interface PlatformProfile {
  platform: Platform;
  /** Class on the footnote reference anchor */
  anchorClass: string;
  /** Class on the generated footnote aside */
  asideClass: string;
  /** Whether the anchor carries an icon span or plain superscript text */
  icon: boolean;
  /** OPF <meta name content> entries the platform expects */
  metadata: { name: string; content: string }[];
}

const PROFILES: Record<Platform, PlatformProfile> = {
  generic: {
    platform: "generic",
    anchorClass: "footnote-ref",
    asideClass: "footnote",
    icon: true,
    metadata: [],
  },
  duokan: {
    platform: "duokan",
    anchorClass: "duokan-footnote",
    asideClass: "duokan-footnote-content",
    icon: true,
    metadata: [{ name: "duokan-body-font", content: "DK-SONGTI" }],
  },
  zhangyue: {
    platform: "zhangyue",
    anchorClass: "zhangyue-footnote",
    asideClass: "zhangyue-footnote-content",
    icon: true,
    metadata: [],
  },
  kindle: {
    platform: "kindle",
    anchorClass: "footnote-ref",
    asideClass: "footnote",
    icon: false,
    metadata: [{ name: "primary-writing-mode", content: "horizontal-lr" }],
  },
};

export function platformProfile(platform: Platform): PlatformProfile {
  return PROFILES[platform];
}
