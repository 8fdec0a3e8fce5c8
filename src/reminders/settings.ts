import type { PresetName, SettingKey, Settings } from "../types";
import { minutesToMs } from "../utils/dates";

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  momentumThresholdMinutes: 90,
  momentumSnoozeMinutes: 30,
  checkinMinMinutes: 20,
  checkinMaxMinutes: 40,
  completionCooldownMinutes: 5,
};

export const SETTING_KEYS: readonly SettingKey[] = [
  "momentumThresholdMinutes",
  "momentumSnoozeMinutes",
  "checkinMinMinutes",
  "checkinMaxMinutes",
  "completionCooldownMinutes",
];

export const PRESETS: Readonly<Record<PresetName, Settings>> = {
  gentle: {
    momentumThresholdMinutes: 120,
    momentumSnoozeMinutes: 45,
    checkinMinMinutes: 30,
    checkinMaxMinutes: 60,
    completionCooldownMinutes: 10,
  },
  focused: {
    momentumThresholdMinutes: 45,
    momentumSnoozeMinutes: 20,
    checkinMinMinutes: 15,
    checkinMaxMinutes: 30,
    completionCooldownMinutes: 4,
  },
  sprint: {
    momentumThresholdMinutes: 15,
    momentumSnoozeMinutes: 10,
    checkinMinMinutes: 7,
    checkinMaxMinutes: 18,
    completionCooldownMinutes: 2,
  },
};

export function isSettingKey(key: unknown): key is SettingKey {
  return SETTING_KEYS.some((k) => k === key);
}

export function isPresetName(name: unknown): name is PresetName {
  return name === "gentle" || name === "focused" || name === "sprint";
}

/** stored value when it is a finite, non-negative number; the compiled-in default otherwise */
export function readSettingMinutes(settings: Partial<Record<SettingKey, unknown>> | null | undefined, key: SettingKey): number {
  const candidate = settings?.[key];
  if (typeof candidate === "number" && Number.isFinite(candidate) && candidate >= 0) {
    return candidate;
  }
  return DEFAULT_SETTINGS[key];
}

export function readSettingMs(settings: Partial<Record<SettingKey, unknown>> | null | undefined, key: SettingKey): number {
  return minutesToMs(readSettingMinutes(settings, key));
}

export function resolveSettings(settings: Partial<Record<SettingKey, unknown>> | null | undefined): Settings {
  return {
    momentumThresholdMinutes: readSettingMinutes(settings, "momentumThresholdMinutes"),
    momentumSnoozeMinutes: readSettingMinutes(settings, "momentumSnoozeMinutes"),
    checkinMinMinutes: readSettingMinutes(settings, "checkinMinMinutes"),
    checkinMaxMinutes: readSettingMinutes(settings, "checkinMaxMinutes"),
    completionCooldownMinutes: readSettingMinutes(settings, "completionCooldownMinutes"),
  };
}

/** null for anything that is not a finite, non-negative number */
export function parseSettingInput(raw: string | number): number | null {
  const parsed = typeof raw === "number" ? raw : Number.parseFloat(raw);
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  return parsed;
}

// uniform in [low, high); an inverted range is swapped
export function randomCheckinDelay(minMs: number, maxMs: number, random: () => number): number {
  const low = Math.min(minMs, maxMs);
  const high = Math.max(minMs, maxMs);
  if (high <= low) return Math.max(low, 0);
  return low + Math.floor(random() * (high - low));
}
