import type { TaskRef } from "../types";
import { isCheckinAction, type CompletionDelegate, type ReminderController } from "./controller";
import { isSettingKey } from "./settings";

// For server-rendered pages: the markup carries data attributes and this wires
// them to the controller. The React surface calls the controller directly.

export function taskFromElement(el: HTMLElement): TaskRef | null {
  const rawId = el.dataset.taskId?.trim();
  if (!rawId) return null;
  const numeric = Number(rawId);
  return {
    id: Number.isFinite(numeric) ? numeric : rawId,
    title: el.dataset.taskTitle || "Active task",
    project: el.dataset.taskProject || "",
    area: el.dataset.taskArea || "",
  };
}

export function bindReminderControls(root: ParentNode, controller: ReminderController): () => void {
  const cleanups: (() => void)[] = [];
  const on = (el: Element, type: string, fn: () => void) => {
    el.addEventListener(type, fn);
    cleanups.push(() => el.removeEventListener(type, fn));
  };

  const settingInputs = Array.from(root.querySelectorAll<HTMLInputElement>("[data-reminder-setting]"));
  const stopToggles = Array.from(root.querySelectorAll<HTMLInputElement>("[data-stop-for-now]"));

  const syncSettingInputs = () => {
    const settings = controller.settings();
    for (const input of settingInputs) {
      const key = input.dataset.reminderSetting;
      if (isSettingKey(key)) input.value = String(settings[key]);
    }
  };
  const syncStopToggles = () => {
    for (const toggle of stopToggles) toggle.checked = controller.state.stopForNow;
  };

  root.querySelectorAll<HTMLElement>("[data-start-active-task]").forEach((el) => {
    on(el, "click", () => {
      const task = taskFromElement(el);
      if (task) controller.setActiveTask(task);
      else console.debug("[reminders] start button without data-task-id", el);
    });
  });

  root.querySelectorAll<HTMLElement>("[data-active-task-action]").forEach((el) => {
    on(el, "click", () => {
      const action = el.dataset.activeTaskAction;
      if (isCheckinAction(action)) controller.handleActiveTaskAction(action);
    });
  });

  for (const input of settingInputs) {
    on(input, "change", () => {
      const shown = controller.updateSetting(input.dataset.reminderSetting ?? "", input.value);
      if (shown !== null) input.value = String(shown);
    });
  }

  root.querySelectorAll<HTMLElement>("[data-sample-config]").forEach((el) => {
    on(el, "click", () => {
      if (controller.applyPreset(el.dataset.sampleConfig ?? "", el.dataset.sampleConfigLabel)) syncSettingInputs();
    });
  });

  root.querySelectorAll<HTMLElement>("[data-snooze-momentum]").forEach((el) => {
    on(el, "click", () => controller.snoozeMomentum());
  });

  root.querySelectorAll<HTMLElement>("[data-snooze-checkin]").forEach((el) => {
    on(el, "click", () => controller.snoozeCheckinsForToday());
  });

  for (const toggle of stopToggles) {
    on(toggle, "change", () => controller.setStopForNow(toggle.checked));
  }

  syncSettingInputs();
  syncStopToggles();
  cleanups.push(controller.subscribe(syncStopToggles));

  return () => {
    for (const cleanup of cleanups) cleanup();
  };
}

/** hands a finished task to the backend the way the task list does: a plain form POST */
export function submitCompletionForm(action = "/daily-tasks"): CompletionDelegate {
  return (task) => {
    const form = document.createElement("form");
    form.method = "POST";
    form.action = action;
    form.style.display = "none";
    const input = document.createElement("input");
    input.type = "hidden";
    input.name = "task_id";
    input.value = String(task.id);
    form.appendChild(input);
    document.body.appendChild(form);
    form.submit();
  };
}
