import { z } from "zod";
import type {
  ActiveTask,
  CheckinAction,
  NextTaskPayload,
  NotificationActionPayload,
  PresetName,
  ReminderPresentation,
  ReminderState,
  RequestPlan,
  SettingKey,
  Settings,
  TaskRef,
} from "../types";
import { dayKey, formatDuration } from "../utils/dates";
import type { ReminderPresenter } from "./dispatcher";
import {
  PRESETS,
  isPresetName,
  isSettingKey,
  parseSettingInput,
  randomCheckinDelay,
  readSettingMinutes,
  readSettingMs,
  resolveSettings,
} from "./settings";
import type { ReminderStore } from "./store";
import type { ToastController } from "./toast";

// completions inside one cooldown window that still get a prompt
export const COMPLETION_BURST_LIMIT = 2;

const MOMENTUM_MESSAGES = [
  "Want to pick up where you left off?",
  "Ready for your next task?",
  "Need a gentle nudge back into motion?",
];

const COMPLETION_MESSAGES = [
  "Nice work! Want another?",
  "Good job! Keep going?",
  "Ready for another or taking a break?",
];

const CHECKIN_ACTIONS = new Map<string, CheckinAction>([
  ["checkin_done", "done"],
  ["checkin_still", "still-going"],
  ["checkin_switch", "switch"],
  ["checkin_stop", "stop"],
  ["done", "done"],
  ["still-going", "still-going"],
  ["switch", "switch"],
  ["stop", "stop"],
]);

const planResponseSchema = z.object({
  next_task: z
    .object({
      id: z.union([z.string().min(1), z.number().finite()]),
      title: z.string().nullish(),
      project: z.string().nullish(),
      area: z.string().nullish(),
    })
    .nullish()
    .catch(null),
});

export type Clock = () => number;
export type RandomSource = () => number;
export type CompletionDelegate = (task: ActiveTask) => void;

export type ReminderControllerOptions = {
  store: ReminderStore;
  presenter: ReminderPresenter;
  toasts: ToastController;
  now?: Clock;
  random?: RandomSource;
  /** looked up on every use, so a host may define it after the engine starts */
  getRequestPlan?: () => RequestPlan | undefined;
  /** hands a finished task to the backend */
  onTaskDone?: CompletionDelegate;
};

export type ActiveTaskView = {
  title: string;
  meta: string;
  hint: string;
};

function pick<T>(items: readonly T[], random: RandomSource): T {
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[Math.max(0, index)];
}

function completionCount(detail: unknown): number {
  if (typeof detail === "object" && detail !== null && "count" in detail && typeof detail.count === "number") {
    return detail.count;
  }
  return 0;
}

export function isCheckinAction(value: unknown): value is CheckinAction {
  return value === "done" || value === "still-going" || value === "switch" || value === "stop";
}

/**
 * Decides when to nudge. One instance per page session; every entry point
 * leaves the store consistent before it returns or awaits.
 */
export class ReminderController {
  private readonly store: ReminderStore;
  private readonly presenter: ReminderPresenter;
  private readonly toasts: ToastController;
  private readonly now: Clock;
  private readonly random: RandomSource;
  private readonly getRequestPlan: () => RequestPlan | undefined;
  private readonly onTaskDone: CompletionDelegate;
  private readonly listeners = new Set<() => void>();

  constructor(options: ReminderControllerOptions) {
    this.store = options.store;
    this.presenter = options.presenter;
    this.toasts = options.toasts;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.getRequestPlan = options.getRequestPlan ?? (() => undefined);
    this.onTaskDone = options.onTaskDone ?? (() => undefined);
  }

  get state(): ReminderState {
    return this.store.state;
  }

  settings(): Settings {
    return resolveSettings(this.state.settings);
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  init(): void {
    this.recordIdleSession();
    this.evaluate(true);
  }

  /** forced runs treat "no request ever recorded" as idle time worth a nudge */
  evaluate(force = false): void {
    this.resetDailySnooze();
    this.store.pruneCompletions(this.now());
    this.maybeShowMomentum(force);
    this.maybeShowCheckin();
    this.emit();
  }

  // elapsed-time labels only
  tick(): void {
    this.emit();
  }

  endSession(): void {
    this.store.update({ lastSessionEnded: this.now() });
  }

  recordNextTaskRequest(): void {
    this.store.update({ lastNextTaskRequest: this.now(), stopForNow: false });
    this.emit();
  }

  /** returns true when a completion prompt was presented */
  recordCompletion(detail: unknown): boolean {
    if (!(completionCount(detail) >= 1)) return false;

    const now = this.now();
    this.store.update({ completionRecords: [...this.state.completionRecords, now] });
    const records = this.store.pruneCompletions(now);

    const cooldown = this.settingMs("completionCooldownMinutes");
    const lastPrompt = this.state.lastCompletionPrompt;
    const coolingDown = lastPrompt !== null && cooldown > 0 && now - lastPrompt < cooldown;
    if (this.state.stopForNow || coolingDown || records.length > COMPLETION_BURST_LIMIT) {
      this.emit();
      return false;
    }

    this.store.update({ lastCompletionPrompt: now });
    this.present(this.completionPresentation());
    this.emit();
    return true;
  }

  setActiveTask(task: TaskRef): ActiveTask | null {
    const now = this.now();
    this.store.update({ stopForNow: false });
    const active = this.store.setActiveTask({
      id: task.id,
      title: task.title || "Active task",
      project: task.project ?? "",
      area: task.area ?? "",
      startedAt: now,
      lastActivityAt: now,
      checkinNextAt: now + this.checkinDelay(),
      lastNotificationAt: null,
    });
    this.emit();
    return active;
  }

  setActiveTaskFromPayload(task: NextTaskPayload | null | undefined): ActiveTask | null {
    if (!task) return null;
    return this.setActiveTask({
      id: task.id,
      title: task.title || "Next task",
      project: task.project ?? "",
      area: task.area ?? "",
    });
  }

  clearActiveTask(): void {
    this.store.clearActiveTask();
    this.emit();
  }

  handleActiveTaskAction(action: CheckinAction): void {
    switch (action) {
      case "done":
        this.completeActiveTask();
        break;
      case "still-going":
        this.continueActiveTask();
        break;
      case "switch":
        void this.launchNextTask(true);
        break;
      case "stop":
        this.setStopForNow(true);
        this.clearActiveTask();
        break;
    }
  }

  /** action picked on a system notification, possibly one shown by an earlier page */
  handleNotificationAction(payload: NotificationActionPayload): void {
    switch (payload.type) {
      case "momentum":
        if (payload.action === "momentum_snooze") this.snoozeMomentum();
        else void this.launchNextTask();
        break;
      case "completion":
        if (payload.action === "completion_stop") this.setStopForNow(true);
        else void this.launchNextTask();
        break;
      case "checkin": {
        const action = CHECKIN_ACTIONS.get(payload.action);
        if (!action) return;
        const active = this.state.activeTask;
        if (payload.taskId !== undefined && (!active || String(active.id) !== String(payload.taskId))) {
          console.debug("[reminders] check-in action for a task that is no longer active", payload);
          return;
        }
        this.handleActiveTaskAction(action);
        break;
      }
    }
  }

  setStopForNow(stop: boolean): void {
    this.store.update({ stopForNow: stop });
    this.toasts.show(stop ? "Reminders paused." : "Reminders re-enabled.");
    this.emit();
  }

  snoozeMomentum(): void {
    const minutes = this.snoozeLabelMinutes();
    this.store.update({ snoozes: { momentumUntil: this.now() + this.settingMs("momentumSnoozeMinutes") } });
    this.toasts.show(`Momentum reminder snoozed for ${minutes} minutes.`);
    this.emit();
  }

  snoozeCheckinsForToday(): void {
    this.store.update({ checkinSnoozedDay: dayKey(this.now()) });
    this.toasts.show("Check-ins snoozed for the rest of the day.");
    this.emit();
  }

  async launchNextTask(focus = false): Promise<void> {
    const requestPlan = this.getRequestPlan();
    if (typeof requestPlan !== "function") {
      this.toasts.show("Ask for the next task from the planner to continue.");
      return;
    }
    try {
      const response = await requestPlan("next_task");
      if (!focus) return;
      const parsed = planResponseSchema.safeParse(response);
      if (parsed.success && parsed.data.next_task) {
        this.setActiveTaskFromPayload(parsed.data.next_task);
      }
    } catch (e) {
      console.debug("[reminders] requestPlan failed", e);
      this.toasts.show("Unable to request the next task right now.");
    }
  }

  applyPreset(name: string, label?: string): boolean {
    if (!isPresetName(name)) return false;
    this.store.update({ settings: { ...PRESETS[name] } });
    this.toasts.show(`Applied ${label || presetLabel(name)}.`);
    this.evaluate(true);
    return true;
  }

  /**
   * Applies a raw settings input. Returns the value the input should show:
   * the new value, or the last valid one when the input was rejected.
   */
  updateSetting(key: string, raw: string | number): number | null {
    if (!isSettingKey(key)) return null;
    const parsed = parseSettingInput(raw);
    if (parsed === null) return this.settingMinutes(key);
    const patch: Partial<Settings> = {};
    patch[key] = parsed;
    this.store.update({ settings: patch });
    this.evaluate(true);
    return parsed;
  }

  describeActiveTask(): ActiveTaskView | null {
    const task = this.state.activeTask;
    if (!task) return null;
    const now = this.now();
    const focus = task.project || task.area || "your focus";
    const elapsed = formatDuration(now - task.startedAt);
    return {
      title: task.title || "Active task",
      meta: `Working on ${focus} · started ${elapsed === "just now" ? elapsed : `${elapsed} ago`}`,
      hint: this.checkinHint(task, now),
    };
  }

  private checkinHint(task: ActiveTask, now: number): string {
    if (this.state.checkinSnoozedDay === dayKey(now)) return "Check-ins are snoozed for today.";
    const remaining = (task.checkinNextAt ?? now) - now;
    if (remaining <= 0) return "Check-in is due: tap a status.";
    return `Next check-in in ${formatDuration(remaining)}`;
  }

  private recordIdleSession() {
    const lastEnd = this.state.lastSessionEnded;
    const threshold = this.settingMs("momentumThresholdMinutes");
    if (lastEnd !== null && threshold && this.now() - lastEnd >= threshold) {
      this.maybeShowMomentum(true);
    }
    this.store.update({ lastSessionEnded: null });
  }

  private resetDailySnooze() {
    const snoozed = this.state.checkinSnoozedDay;
    if (snoozed && snoozed !== dayKey(this.now())) {
      this.store.update({ checkinSnoozedDay: "" });
    }
  }

  private maybeShowMomentum(force: boolean): boolean {
    const state = this.state;
    if (state.stopForNow || state.activeTask) return false;
    const now = this.now();
    if (now < (state.snoozes.momentumUntil ?? 0)) return false;

    const lastRequest = state.lastNextTaskRequest;
    if (lastRequest === null && !force) return false;

    const threshold = this.settingMs("momentumThresholdMinutes");
    const sinceRequest = lastRequest === null ? Infinity : now - lastRequest;
    if (threshold && sinceRequest < threshold) return false;

    const lastPrompt = state.lastMomentumPrompt;
    const sincePrompt = lastPrompt === null ? Infinity : now - lastPrompt;
    if (threshold && sincePrompt < threshold) return false;

    this.store.update({ lastMomentumPrompt: now });
    this.present(this.momentumPresentation());
    return true;
  }

  private maybeShowCheckin(): boolean {
    const task = this.state.activeTask;
    if (!task || this.state.stopForNow) return false;
    const now = this.now();
    if (this.state.checkinSnoozedDay === dayKey(now)) return false;

    let nextAt = task.checkinNextAt;
    if (nextAt === null) {
      nextAt = now + this.checkinDelay();
      this.store.setActiveTask({ ...task, checkinNextAt: nextAt });
    }
    if (now < nextAt) return false;

    // overlapping triggers (focus + visibility) must not double-fire
    const minDelay = this.settingMs("checkinMinMinutes");
    const lastNotified = task.lastNotificationAt;
    if (minDelay && lastNotified !== null && now - lastNotified < minDelay) return false;

    this.store.setActiveTask({ ...task, lastNotificationAt: now, checkinNextAt: now + this.checkinDelay() });
    this.present(this.checkinPresentation(task));
    return true;
  }

  private completeActiveTask() {
    const task = this.state.activeTask;
    if (!task) return;
    this.recordCompletion({ count: 1 });
    this.clearActiveTask();
    try {
      this.onTaskDone(task);
    } catch (e) {
      console.error("[reminders] completion handoff failed:", e);
    }
  }

  private continueActiveTask() {
    const task = this.state.activeTask;
    if (!task) return;
    const now = this.now();
    this.store.setActiveTask({ ...task, lastActivityAt: now, checkinNextAt: now + this.checkinDelay() });
    this.toasts.show("Great! Keeping the timer updated.");
    this.emit();
  }

  private momentumPresentation(): ReminderPresentation {
    const snoozeLabel = `Snooze ${this.snoozeLabelMinutes()}m`;
    return {
      kind: "momentum",
      title: "Need a nudge?",
      message: pick(MOMENTUM_MESSAGES, this.random),
      tag: "focus-nudge-momentum",
      data: { type: "momentum" },
      actions: [
        { action: "momentum_next", title: "Next task" },
        { action: "momentum_snooze", title: snoozeLabel },
      ],
      toastActions: [
        { label: "Next task", run: () => void this.launchNextTask() },
        { label: snoozeLabel, run: () => this.snoozeMomentum() },
      ],
    };
  }

  private completionPresentation(): ReminderPresentation {
    return {
      kind: "completion",
      title: "Nice work!",
      message: pick(COMPLETION_MESSAGES, this.random),
      tag: "focus-nudge-completion",
      data: { type: "completion" },
      actions: [
        { action: "completion_next", title: "Next task" },
        { action: "completion_stop", title: "Stop for now" },
      ],
      toastActions: [
        { label: "Next task", run: () => void this.launchNextTask() },
        { label: "Stop for now", run: () => this.setStopForNow(true) },
      ],
    };
  }

  private checkinPresentation(task: ActiveTask): ReminderPresentation {
    return {
      kind: "checkin",
      title: "Check in",
      message: `Still working on ${task.title || "Current focus"}?`,
      tag: "focus-nudge-checkin",
      data: { type: "checkin", taskId: task.id },
      actions: [
        { action: "checkin_done", title: "Done" },
        { action: "checkin_still", title: "Still going" },
        { action: "checkin_switch", title: "Switch" },
        { action: "checkin_stop", title: "Stop" },
      ],
      toastActions: [
        { label: "Done", run: () => this.handleActiveTaskAction("done") },
        { label: "Still going", run: () => this.handleActiveTaskAction("still-going") },
      ],
    };
  }

  private present(presentation: ReminderPresentation) {
    try {
      this.presenter.present(presentation);
    } catch (e) {
      console.error("[reminders] presenting a reminder failed:", e);
    }
  }

  private emit() {
    for (const listener of this.listeners) {
      try {
        listener();
      } catch (e) {
        console.error("[reminders] listener failed:", e);
      }
    }
  }

  private settingMinutes(key: SettingKey): number {
    return readSettingMinutes(this.state.settings, key);
  }

  private settingMs(key: SettingKey): number {
    return readSettingMs(this.state.settings, key);
  }

  private snoozeLabelMinutes(): number {
    return Math.max(1, Math.round(this.settingMinutes("momentumSnoozeMinutes")));
  }

  private checkinDelay(): number {
    return randomCheckinDelay(this.settingMs("checkinMinMinutes"), this.settingMs("checkinMaxMinutes"), this.random);
  }
}

function presetLabel(name: PresetName): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}
