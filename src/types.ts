export type SettingKey =
  | "momentumThresholdMinutes"
  | "momentumSnoozeMinutes"
  | "checkinMinMinutes"
  | "checkinMaxMinutes"
  | "completionCooldownMinutes";

export type Settings = Record<SettingKey, number>;

export type PresetName = "gentle" | "focused" | "sprint";

export type TaskId = string | number;

// what the host knows about a task before it becomes active
export type TaskRef = {
  id: TaskId;
  title: string;
  project?: string;
  area?: string;
};

export type ActiveTask = {
  id: TaskId;
  title: string;
  project: string;
  area: string;
  startedAt: number;
  lastActivityAt: number;
  checkinNextAt: number | null;
  lastNotificationAt: number | null;
};

export type Snoozes = {
  momentumUntil: number | null;
};

export type ReminderState = {
  lastNextTaskRequest: number | null;
  lastMomentumPrompt: number | null;
  lastCompletionPrompt: number | null;
  completionRecords: number[];
  stopForNow: boolean;
  activeTask: ActiveTask | null;
  checkinSnoozedDay: string; // "YYYY-MM-DD" or ""
  snoozes: Snoozes;
  lastSessionEnded: number | null;
  settings: Settings;
};

export type ReminderStatePatch = Partial<Omit<ReminderState, "snoozes" | "settings">> & {
  snoozes?: Partial<Snoozes>;
  settings?: Partial<Settings>;
};

export type ReminderKind = "momentum" | "checkin" | "completion";

export type CheckinAction = "done" | "still-going" | "switch" | "stop";

export type NotificationActionId =
  | "momentum_next"
  | "momentum_snooze"
  | "completion_next"
  | "completion_stop"
  | "checkin_done"
  | "checkin_still"
  | "checkin_switch"
  | "checkin_stop";

// carried in notification.data
export type NotificationData = {
  type: ReminderKind;
  taskId?: TaskId;
};

// what the service worker echoes back once the user picks an action
export type NotificationActionPayload = NotificationData & {
  action: string;
};

export type ToastAction = {
  label: string;
  run: () => void;
};

export type SystemNotificationOptions = NotificationOptions & {
  renotify?: boolean;
  actions?: { action: NotificationActionId; title: string }[];
};

export type ReminderPresentation = {
  kind: ReminderKind;
  title: string;
  message: string;
  tag: string;
  data: NotificationData;
  actions: { action: NotificationActionId; title: string }[];
  toastActions: ToastAction[];
};

export type NextTaskPayload = {
  id: TaskId;
  title?: string | null;
  project?: string | null;
  area?: string | null;
};

export type PlanResponse = {
  next_task?: NextTaskPayload | null;
};

export type RequestPlan = (mode: "next_task") => Promise<PlanResponse | null | undefined>;
