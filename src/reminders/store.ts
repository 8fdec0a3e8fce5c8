import { z } from "zod";
import type { ActiveTask, ReminderState, ReminderStatePatch } from "../types";
import { DEFAULT_SETTINGS, readSettingMs } from "./settings";

export const STORAGE_KEY = "focus-nudge:reminder-state";

export type StorageLike = Pick<Storage, "getItem" | "setItem" | "removeItem">;

const timestamp = z.number().finite().nullable().catch(null);

const minutes = (fallback: number) => z.number().finite().nonnegative().catch(fallback);

const settingsSchema = z
  .object({
    momentumThresholdMinutes: minutes(DEFAULT_SETTINGS.momentumThresholdMinutes),
    momentumSnoozeMinutes: minutes(DEFAULT_SETTINGS.momentumSnoozeMinutes),
    checkinMinMinutes: minutes(DEFAULT_SETTINGS.checkinMinMinutes),
    checkinMaxMinutes: minutes(DEFAULT_SETTINGS.checkinMaxMinutes),
    completionCooldownMinutes: minutes(DEFAULT_SETTINGS.completionCooldownMinutes),
  })
  .passthrough();

// a task without an id or a start time is not a task
const activeTaskSchema = z
  .object({
    id: z.union([z.string().min(1), z.number().finite()]),
    title: z.string().catch(""),
    project: z.string().catch(""),
    area: z.string().catch(""),
    startedAt: z.number().finite(),
    lastActivityAt: timestamp,
    checkinNextAt: timestamp,
    lastNotificationAt: timestamp,
  })
  .transform((task): ActiveTask => ({ ...task, lastActivityAt: task.lastActivityAt ?? task.startedAt }));

const completionRecordsSchema = z
  .array(z.unknown())
  .catch(() => [])
  .transform((entries) => entries.filter((e): e is number => typeof e === "number" && Number.isFinite(e)));

// every field falls back on its own; unknown keys ride along untouched
const stateSchema = z
  .object({
    lastNextTaskRequest: timestamp,
    lastMomentumPrompt: timestamp,
    lastCompletionPrompt: timestamp,
    completionRecords: completionRecordsSchema,
    stopForNow: z.boolean().catch(false),
    activeTask: activeTaskSchema.nullable().catch(null),
    checkinSnoozedDay: z.string().catch(""),
    snoozes: z
      .object({ momentumUntil: timestamp })
      .passthrough()
      .catch(() => ({ momentumUntil: null })),
    lastSessionEnded: timestamp,
    settings: settingsSchema.catch(() => ({ ...DEFAULT_SETTINGS })),
  })
  .passthrough();

export function createDefaultState(): ReminderState {
  return {
    lastNextTaskRequest: null,
    lastMomentumPrompt: null,
    lastCompletionPrompt: null,
    completionRecords: [],
    stopForNow: false,
    activeTask: null,
    checkinSnoozedDay: "",
    snoozes: { momentumUntil: null },
    lastSessionEnded: null,
    settings: { ...DEFAULT_SETTINGS },
  };
}

export function parseReminderState(raw: unknown): ReminderState | null {
  const result = stateSchema.safeParse(raw);
  return result.success ? result.data : null;
}

function resolveLocalStorage(): StorageLike | null {
  if (typeof window === "undefined") return null;
  try {
    const probe = "__focus-nudge-probe__";
    window.localStorage.setItem(probe, "1");
    window.localStorage.removeItem(probe);
    return window.localStorage;
  } catch (e) {
    console.warn("[reminders] localStorage unavailable, state kept in memory", e);
    return null;
  }
}

export type ReminderStoreOptions = {
  /** null keeps state in memory only; omitted means window.localStorage */
  storage?: StorageLike | null;
  key?: string;
};

export class ReminderStore {
  readonly key: string;
  state: ReminderState;
  private readonly storage: StorageLike | null;

  constructor(options: ReminderStoreOptions = {}) {
    this.key = options.key ?? STORAGE_KEY;
    this.storage = options.storage === undefined ? resolveLocalStorage() : options.storage;
    this.state = this.load();
  }

  load(): ReminderState {
    if (!this.storage) return createDefaultState();
    try {
      const raw = this.storage.getItem(this.key);
      if (!raw) return createDefaultState();
      const state = parseReminderState(JSON.parse(raw));
      if (!state) {
        console.warn("[reminders] persisted state is not an object, using defaults");
        return createDefaultState();
      }
      return state;
    } catch (e) {
      console.warn("[reminders] state load failed:", e);
      return createDefaultState();
    }
  }

  save(): void {
    if (!this.storage) return;
    try {
      this.storage.setItem(this.key, JSON.stringify(this.state));
    } catch (e) {
      // quota exceeded or storage disabled mid-session
      console.warn("[reminders] state save failed:", e);
    }
  }

  /** top-level merge, except snoozes and settings which merge key by key */
  update(patch: ReminderStatePatch): ReminderState {
    const { snoozes, settings, ...rest } = patch;
    if (snoozes) {
      this.state.snoozes = { ...this.state.snoozes, ...snoozes };
    }
    if (settings) {
      this.state.settings = { ...this.state.settings, ...settings };
    }
    Object.assign(this.state, rest);
    this.save();
    return this.state;
  }

  setActiveTask(task: ActiveTask | null): ActiveTask | null {
    this.state.activeTask = task ? { ...task } : null;
    this.save();
    return this.state.activeTask;
  }

  clearActiveTask(): void {
    this.setActiveTask(null);
  }

  /** drops completions older than the cooldown window and returns what is left */
  pruneCompletions(now: number): number[] {
    const retention = readSettingMs(this.state.settings, "completionCooldownMinutes") || 1;
    const kept = this.state.completionRecords.filter((entry) => now - entry < retention);
    if (kept.length !== this.state.completionRecords.length) {
      this.update({ completionRecords: kept });
    }
    return this.state.completionRecords;
  }
}
