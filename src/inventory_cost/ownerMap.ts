import type { OwnerConfig } from "./types";

export const OWNER_MAP: Readonly<Record<string, string>> = Object.freeze({
  "4": "SHOTTYS",
  "100314": "MARKETING",
  "100374": "IMPACKFUL",
});

// MARKETING is decoded and remapped but never synced.
export const ALLOWED_AREAS: ReadonlySet<string> = new Set(["SHOTTYS", "IMPACKFUL"]);

export const DEFAULT_OWNER_CONFIG: OwnerConfig = {
  ownerMap: OWNER_MAP,
  allowedAreas: ALLOWED_AREAS,
};
