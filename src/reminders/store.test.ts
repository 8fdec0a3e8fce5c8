import { afterEach, describe, expect, it, vi } from "vitest";
import { ReminderStore, STORAGE_KEY, createDefaultState, parseReminderState, type StorageLike } from "./store";

function memoryStorage(initial: Record<string, string> = {}): StorageLike & { data: Map<string, string> } {
  const data = new Map(Object.entries(initial));
  return {
    data,
    getItem: (key) => data.get(key) ?? null,
    setItem: (key, value) => {
      data.set(key, value);
    },
    removeItem: (key) => {
      data.delete(key);
    },
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseReminderState", () => {
  it("repairs each field on its own", () => {
    const state = parseReminderState({
      stopForNow: "yes",
      completionRecords: [1, "x", 2, null],
      settings: { checkinMinMinutes: -1, momentumThresholdMinutes: 30 },
      snoozes: "later",
      activeTask: { title: "no id", startedAt: 5 },
      checkinSnoozedDay: 7,
      extra: "keep",
    });
    expect(state).not.toBeNull();
    expect(state?.stopForNow).toBe(false);
    expect(state?.completionRecords).toEqual([1, 2]);
    expect(state?.settings.checkinMinMinutes).toBe(20);
    expect(state?.settings.momentumThresholdMinutes).toBe(30);
    expect(state?.snoozes).toEqual({ momentumUntil: null });
    expect(state?.activeTask).toBeNull();
    expect(state?.checkinSnoozedDay).toBe("");
    expect(state?.lastNextTaskRequest).toBeNull();
    expect(state).toMatchObject({ extra: "keep" });
  });

  it("defaults a task's last activity to its start", () => {
    const state = parseReminderState({ activeTask: { id: 4, startedAt: 1000, checkinNextAt: "soon" } });
    expect(state?.activeTask).toEqual({
      id: 4,
      title: "",
      project: "",
      area: "",
      startedAt: 1000,
      lastActivityAt: 1000,
      checkinNextAt: null,
      lastNotificationAt: null,
    });
  });

  it("rejects non-objects", () => {
    expect(parseReminderState(42)).toBeNull();
    expect(parseReminderState(null)).toBeNull();
  });
});

describe("ReminderStore", () => {
  it("starts from defaults on unreadable JSON", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const store = new ReminderStore({ storage: memoryStorage({ [STORAGE_KEY]: "{not json" }) });
    expect(store.state).toEqual(createDefaultState());
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("merges snoozes and settings key by key and persists", () => {
    const storage = memoryStorage();
    const store = new ReminderStore({ storage });
    store.update({ settings: { checkinMaxMinutes: 50 }, snoozes: { momentumUntil: 99 }, stopForNow: true });
    store.update({ settings: { checkinMinMinutes: 10 } });

    expect(store.state.settings).toEqual({
      momentumThresholdMinutes: 90,
      momentumSnoozeMinutes: 30,
      checkinMinMinutes: 10,
      checkinMaxMinutes: 50,
      completionCooldownMinutes: 5,
    });
    expect(store.state.snoozes.momentumUntil).toBe(99);

    const reloaded = new ReminderStore({ storage });
    expect(reloaded.state.stopForNow).toBe(true);
    expect(reloaded.state.settings.checkinMaxMinutes).toBe(50);
  });

  it("keeps running when saving fails", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const storage = memoryStorage();
    storage.setItem = () => {
      throw new Error("quota");
    };
    const store = new ReminderStore({ storage });
    expect(() => store.update({ stopForNow: true })).not.toThrow();
    expect(store.state.stopForNow).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("works in memory without storage", () => {
    const store = new ReminderStore({ storage: null });
    store.update({ lastNextTaskRequest: 10 });
    expect(store.state.lastNextTaskRequest).toBe(10);
  });

  it("stores a copy of the active task and clears it", () => {
    const store = new ReminderStore({ storage: null });
    const task = {
      id: "a",
      title: "Write",
      project: "",
      area: "",
      startedAt: 1,
      lastActivityAt: 1,
      checkinNextAt: null,
      lastNotificationAt: null,
    };
    store.setActiveTask(task);
    task.title = "changed";
    expect(store.state.activeTask?.title).toBe("Write");
    store.clearActiveTask();
    expect(store.state.activeTask).toBeNull();
  });

  it("prunes completions outside the cooldown window", () => {
    const store = new ReminderStore({ storage: null });
    const now = 1_000_000;
    store.update({ completionRecords: [now - 400_000, now - 100_000] });
    expect(store.pruneCompletions(now)).toEqual([now - 100_000]);
  });

  it("keeps only same-instant completions when the cooldown is zero", () => {
    const store = new ReminderStore({ storage: null });
    store.update({ settings: { completionCooldownMinutes: 0 }, completionRecords: [99, 100] });
    expect(store.pruneCompletions(100)).toEqual([100]);
  });
});
